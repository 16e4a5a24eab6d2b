import { createSystemClock, ms } from "@cadence/clock";
import type { Clock, Millis } from "@cadence/clock";
import { createAtom } from "@cadence/atom";
import type { Atom, Change } from "@cadence/atom";
import { createCancelToken, Mutex, Notify } from "@cadence/sync";
import type { CancelToken } from "@cadence/sync";
import { invokeCallback } from "./callback.js";
import { InvalidParameterError, TimerStoppedError } from "./errors.js";
import type { TimerError } from "./errors.js";
import {
  emitCallbackError,
  emitIntervalAdjust,
  emitTimerComplete,
  emitTimerExpire,
  emitTimerPause,
  emitTimerResume,
  emitTimerStart,
  emitTimerState,
  emitTimerStop,
  emitTimerTick,
} from "./events.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";
import type { CompletionReason, EmitFn, RunMode, TimerCallback, TimerOptions, TimerState, TimerStatistics } from "./types.js";

interface TimerRun {
  readonly id: number;
  readonly cancel: CancelToken;
  readonly done: Promise<void>;
}

interface RunPlan {
  readonly id: number;
  readonly cancel: CancelToken;
  readonly callback: TimerCallback;
  readonly mode: RunMode;
  readonly expirationCount: number | undefined;
}

const emptyStatistics: TimerStatistics = Object.freeze({ executionCount: 0, elapsedMs: ms(0) });

/**
 * One logical timer driving a single background loop.
 *
 * State lives in an atom that both the control methods and the loop read, so every
 * transition is a synchronous compare-and-set. The loop is the only writer of the
 * statistics. Starting and stopping hold the lifecycle lock, which keeps at most one
 * loop attached and lets exactly one caller tear it down.
 */
export class Timer {
  readonly name: string;
  private readonly clock: Clock;
  private readonly emit: EmitFn | undefined;
  private readonly state: Atom<TimerState>;
  private readonly interval: Atom<Millis>;
  private readonly statistics: Atom<TimerStatistics>;
  private readonly pauseSignal = new Notify();
  private readonly lifecycle = new Mutex();
  private run: TimerRun | undefined;
  private nextRunId = 0;

  constructor(options: TimerOptions = {}) {
    this.name = options.name ?? "timer";
    this.clock = options.clock ?? createSystemClock();
    this.emit = options.emit;
    this.state = createAtom<TimerState>("stopped", this.clock);
    this.interval = createAtom(ms(0), this.clock);
    this.statistics = createAtom(emptyStatistics, this.clock);

    this.state.watch((change) => {
      emitTimerState(this.emit, this.name, change.from, change.to, change.at);
    });
  }

  /**
   * Run the callback once after `delay`.
   */
  startOnce(delay: Millis, callback: TimerCallback): Promise<Result<TimerError, void>> {
    return this.start(delay, callback, "once", undefined);
  }

  /**
   * Run the callback every `interval`, stopping on its own after `expirationCount` ticks when given.
   */
  startRecurring(
    interval: Millis,
    callback: TimerCallback,
    expirationCount?: number,
  ): Promise<Result<TimerError, void>> {
    return this.start(interval, callback, "recurring", expirationCount);
  }

  /**
   * Running → Paused. Pausing a paused timer is rejected like pausing a stopped one.
   */
  pause(): Result<TimerError, void> {
    if (!this.state.compareAndSet("running", "paused", { cause: "pause" })) {
      return err(new TimerStoppedError());
    }
    emitTimerPause(this.emit, this.name, this.clock.now());
    return ok(undefined);
  }

  resume(): Result<TimerError, void> {
    if (!this.state.compareAndSet("paused", "running", { cause: "resume" })) {
      return err(new InvalidParameterError("Timer is not paused."));
    }
    this.pauseSignal.notifyOne();
    emitTimerResume(this.emit, this.name, this.clock.now());
    return ok(undefined);
  }

  /**
   * Stop the timer and wait for its loop to finish. Once this resolves the callback
   * will not run again; an invocation already in flight is allowed to settle first.
   */
  stop(): Promise<Result<TimerError, void>> {
    return this.lifecycle.runExclusive(async () => {
      if (this.state.deref() === "stopped") {
        return err(new TimerStoppedError());
      }

      this.state.reset("stopped", { cause: "stop" });
      const runId = await this.teardown();
      emitTimerStop(this.emit, this.name, runId, this.clock.now());
      return ok(undefined);
    });
  }

  /**
   * Replace the interval used by the next wait. A wait already in progress keeps its duration.
   */
  adjustInterval(next: Millis): Result<TimerError, void> {
    const invalid = checkDuration(next);
    if (invalid) return err(invalid);

    const previous = this.interval.deref();
    this.interval.reset(next);
    emitIntervalAdjust(this.emit, this.name, previous, next, this.clock.now());
    return ok(undefined);
  }

  getState(): TimerState {
    return this.state.deref();
  }

  getStatistics(): TimerStatistics {
    return this.statistics.deref();
  }

  /**
   * Observe state transitions. Handlers run synchronously, inside the transition: a
   * pause(), resume() or start issued from a handler fails with AtomReentrancyError,
   * which is reported through console.error and leaves the state unchanged.
   */
  watchState(fn: (change: Change<TimerState>) => void): () => void {
    return this.state.watch(fn);
  }

  /**
   * Settles when the current run's loop exits; resolves at once when there is no run.
   * Rejects if the loop failed internally.
   */
  done(): Promise<void> {
    return this.run?.done ?? Promise.resolve();
  }

  private async start(
    interval: Millis,
    callback: TimerCallback,
    mode: RunMode,
    expirationCount: number | undefined,
  ): Promise<Result<TimerError, void>> {
    const invalid = checkDuration(interval) ?? checkExpirationCount(expirationCount);
    if (invalid) return err(invalid);

    return this.lifecycle.runExclusive(async () => {
      this.state.reset("stopped", { cause: "restart" });
      await this.teardown();

      this.statistics.reset(emptyStatistics);
      this.interval.reset(interval);
      this.state.reset("running", { cause: "start" });

      const plan: RunPlan = {
        id: this.nextRunId++,
        cancel: createCancelToken(),
        callback,
        mode,
        expirationCount,
      };
      try {
        emitTimerStart(this.emit, this.name, plan.id, mode, interval, expirationCount, this.clock.now());
      } catch (error) {
        this.state.reset("stopped", { cause: "start-failed" });
        throw error;
      }

      this.run = { id: plan.id, cancel: plan.cancel, done: this.loop(plan) };
      return ok(undefined);
    });
  }

  /**
   * Detach the current run, cancel it and wait for its loop. Returns the run's id.
   */
  private async teardown(): Promise<number | undefined> {
    const run = this.run;
    if (!run) return undefined;

    this.run = undefined;
    run.cancel.cancel("stop");
    await run.done;
    return run.id;
  }

  private async loop(plan: RunPlan): Promise<void> {
    const { id, cancel, callback, mode, expirationCount } = plan;
    const startedMono = this.clock.now().monoMs;
    let ticks = 0;
    let completion: CompletionReason | undefined;

    try {
      while (!cancel.isCanceled()) {
        const current = this.state.deref();
        if (current === "stopped") break;
        if (current === "paused") {
          await this.pauseSignal.notified(cancel);
          continue;
        }

        const outcome = await this.clock.sleep(this.interval.deref(), cancel);
        if (outcome === "canceled" || cancel.isCanceled()) break;

        // Paused or stopped during the wait: no tick
        if (this.state.deref() !== "running") continue;

        const result = await invokeCallback(callback);
        ticks++;

        const now = this.clock.now();
        if (result._tag === "Err") {
          emitCallbackError(this.emit, this.name, id, ticks, result.error, now);
        }

        const elapsedMs = ms(now.monoMs - startedMono);
        this.statistics.reset(Object.freeze({ executionCount: ticks, elapsedMs }));
        emitTimerTick(this.emit, this.name, id, ticks, elapsedMs, now);

        if (cancel.isCanceled()) break;

        if (expirationCount !== undefined && ticks >= expirationCount) {
          emitTimerExpire(this.emit, this.name, id, ticks, this.clock.now());
          completion = "expired";
          break;
        }

        if (mode === "once") {
          completion = "once";
          break;
        }
      }
    } catch (error) {
      this.detach(id);
      throw error;
    }

    if (completion !== undefined) {
      this.detach(id);
      emitTimerComplete(this.emit, this.name, id, ticks, completion, this.clock.now());
    }
  }

  /**
   * The loop ending on its own: release the handle and leave the state Stopped.
   */
  private detach(runId: number): void {
    if (this.run?.id !== runId) return;
    this.run = undefined;
    this.state.reset("stopped", { cause: "complete" });
  }
}

export function createTimer(options?: TimerOptions): Timer {
  return new Timer(options);
}

function checkDuration(value: number): InvalidParameterError | undefined {
  if (!Number.isFinite(value) || value <= 0) {
    return new InvalidParameterError("Interval must be greater than zero.");
  }
  return undefined;
}

function checkExpirationCount(value: number | undefined): InvalidParameterError | undefined {
  if (value === undefined) return undefined;
  if (!Number.isInteger(value) || value <= 0) {
    return new InvalidParameterError("Expiration count must be a positive integer.");
  }
  return undefined;
}
