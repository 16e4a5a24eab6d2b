import type { Clock, EmitFn, Instant, Millis, SleepOutcome, SleepSignal } from "./types.js";

interface PendingSleep {
  readonly seq: number;
  readonly fireAt: number;
  readonly durationMs: number;
  readonly fire: () => void;
}

/**
 * Controlled clock for deterministic testing
 */
export class ControlledClock implements Clock {
  private wallMs: number;
  private monoMs: number;
  private readonly emit: EmitFn | undefined;
  private readonly pending: PendingSleep[] = [];
  private nextSeq = 0;

  constructor(options?: { initialTime?: number; emit?: EmitFn }) {
    // Default to 0 for deterministic tests
    this.wallMs = options?.initialTime ?? 0;
    this.monoMs = options?.initialTime ?? 0;
    this.emit = options?.emit;
  }

  now(): Instant {
    return { wallMs: this.wallMs, monoMs: this.monoMs };
  }

  sleep(ms: Millis, signal?: SleepSignal): Promise<SleepOutcome> {
    if (signal?.isCanceled()) return Promise.resolve("canceled");
    if (ms <= 0) return Promise.resolve("elapsed");

    const startMono = this.monoMs;
    this.emit?.({
      type: "time:sleep:start",
      durationMs: ms,
      at: this.now(),
    });

    return new Promise<SleepOutcome>((resolve) => {
      let unsubscribe: () => void = () => {};

      const entry: PendingSleep = {
        seq: this.nextSeq++,
        fireAt: this.monoMs + ms,
        durationMs: ms,
        fire: () => {
          unsubscribe();
          this.emit?.({
            type: "time:sleep:end",
            durationMs: ms,
            actualMs: this.monoMs - startMono,
            at: this.now(),
          });
          resolve("elapsed");
        },
      };
      this.pending.push(entry);

      if (signal) {
        unsubscribe = signal.onCancel(() => {
          this.remove(entry);
          this.emit?.({
            type: "time:sleep:cancel",
            durationMs: ms,
            afterMs: this.monoMs - startMono,
            at: this.now(),
          });
          resolve("canceled");
        });
      }
    });
  }

  /**
   * Advance monotonic time by a specific duration, firing all due sleeps
   */
  async advanceBy(ms: Millis): Promise<void> {
    if (ms <= 0) return;

    const targetMono = this.monoMs + ms;
    this.emit?.({
      type: "time:advance",
      byMs: ms,
      fromMono: this.monoMs,
      toMono: targetMono,
    });

    await this.advanceTo(targetMono);
  }

  /**
   * Advance monotonic time to a specific time, firing all due sleeps.
   * Continuations of each fired sleep run before the next one is considered,
   * so a loop that sleeps again is rescheduled within the same advance.
   */
  async advanceTo(targetMono: number): Promise<void> {
    if (targetMono <= this.monoMs) return;

    // Let already-queued continuations register their sleeps first
    await this.flush();

    let next = this.nextDue(targetMono);
    while (next) {
      this.jumpTo(next.fireAt);
      this.remove(next);
      next.fire();
      await this.flush();
      next = this.nextDue(targetMono);
    }

    this.jumpTo(targetMono);
    await this.flush();
  }

  /**
   * Advance to the next pending sleep, if any
   */
  async tick(): Promise<void> {
    const next = this.nextDue(Infinity);
    if (next) {
      await this.advanceTo(next.fireAt);
    }
  }

  /**
   * Get the number of pending sleeps
   */
  getPendingTimerCount(): number {
    return this.pending.length;
  }

  /**
   * Await completion of callbacks fired so far (microtasks/promises queued)
   */
  async flush(): Promise<void> {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }

  private jumpTo(mono: number): void {
    if (mono <= this.monoMs) return;
    this.wallMs += mono - this.monoMs;
    this.monoMs = mono;
  }

  private nextDue(targetMono: number): PendingSleep | undefined {
    let earliest: PendingSleep | undefined;
    for (const entry of this.pending) {
      if (entry.fireAt > targetMono) continue;
      if (!earliest || entry.fireAt < earliest.fireAt || (entry.fireAt === earliest.fireAt && entry.seq < earliest.seq)) {
        earliest = entry;
      }
    }
    return earliest;
  }

  private remove(entry: PendingSleep): void {
    const index = this.pending.indexOf(entry);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }
  }
}

/**
 * Create a new controlled clock instance
 */
export function createControlledClock(options?: { initialTime?: number; emit?: EmitFn }): ControlledClock {
  return new ControlledClock(options);
}
