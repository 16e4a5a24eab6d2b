import type { Clock, Instant, Millis } from "@cadence/clock";
import type { CallbackFailedError } from "./errors.js";
import type { Result } from "./result.js";

export type TimerState = "running" | "paused" | "stopped";

export interface TimerStatistics {
  /** Ticks run since the current run started, failed ones included */
  readonly executionCount: number;
  /** Monotonic time from the current run's start to its latest tick */
  readonly elapsedMs: Millis;
}

/**
 * Unit of work invoked on every tick. Return an Err (or throw) to report a failed
 * tick; the timer counts it and keeps going.
 */
export interface TimerCallback {
  execute(): Promise<Result<CallbackFailedError, void>> | Result<CallbackFailedError, void>;
}

export type RunMode = "once" | "recurring";

export type CompletionReason = "once" | "expired";

export interface TimerOptions {
  /** Label carried on every diagnostic event (default "timer") */
  name?: string;
  /** Time source for waits and statistics (default system clock) */
  clock?: Clock;
  emit?: EmitFn;
}

export type TimerEvent =
  | {
      type: "timer:start";
      timer: string;
      runId: number;
      mode: RunMode;
      intervalMs: number;
      expirationCount: number | undefined;
      at: Instant;
    }
  | { type: "timer:state"; timer: string; from: TimerState; to: TimerState; at: Instant }
  | { type: "timer:pause"; timer: string; at: Instant }
  | { type: "timer:resume"; timer: string; at: Instant }
  | { type: "timer:stop"; timer: string; runId: number | undefined; at: Instant }
  | { type: "timer:tick"; timer: string; runId: number; tick: number; elapsedMs: number; at: Instant }
  | {
      type: "timer:callback:error";
      timer: string;
      runId: number;
      tick: number;
      error: CallbackFailedError;
      at: Instant;
    }
  | { type: "timer:expire"; timer: string; runId: number; ticks: number; at: Instant }
  | {
      type: "timer:complete";
      timer: string;
      runId: number;
      ticks: number;
      reason: CompletionReason;
      at: Instant;
    }
  | { type: "timer:interval:adjust"; timer: string; fromMs: number; toMs: number; at: Instant };

export type EmitFn = (event: TimerEvent) => void;
