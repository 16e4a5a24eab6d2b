import { performance } from "node:perf_hooks";
import type { Clock, EmitFn, Instant, Millis, SleepOutcome, SleepSignal } from "./types.js";

/**
 * Real system clock implementation using Node.js timers
 */
export class SystemClock implements Clock {
  private readonly emit: EmitFn | undefined;

  constructor(options?: { emit?: EmitFn }) {
    this.emit = options?.emit;
  }

  now(): Instant {
    const monoMs = performance.now();
    const wallMs = Date.now();
    return { wallMs, monoMs };
  }

  async sleep(ms: Millis, signal?: SleepSignal): Promise<SleepOutcome> {
    if (signal?.isCanceled()) return "canceled";
    if (ms <= 0) return "elapsed";

    const startTime = this.now();
    this.emit?.({
      type: "time:sleep:start",
      durationMs: ms,
      at: startTime,
    });

    const outcome = await new Promise<SleepOutcome>((resolve) => {
      let unsubscribe: () => void = () => {};
      const id = setTimeout(() => {
        unsubscribe();
        resolve("elapsed");
      }, ms);

      if (signal) {
        unsubscribe = signal.onCancel(() => {
          clearTimeout(id);
          resolve("canceled");
        });
      }
    });

    const endTime = this.now();
    const actualMs = endTime.monoMs - startTime.monoMs;

    if (outcome === "canceled") {
      this.emit?.({
        type: "time:sleep:cancel",
        durationMs: ms,
        afterMs: actualMs,
        at: endTime,
      });
    } else {
      this.emit?.({
        type: "time:sleep:end",
        durationMs: ms,
        actualMs,
        at: endTime,
      });
    }

    return outcome;
  }
}

/**
 * Create a clock backed by setTimeout and performance.now()
 */
export function createSystemClock(options?: { emit?: EmitFn }): Clock {
  return new SystemClock(options);
}
