/**
 * Branded type for milliseconds to prevent mixing different time units
 */
export type Millis = number & { readonly __brand: "millis" };

/**
 * Brand a plain number as milliseconds
 */
export function ms(value: number): Millis {
  return value as Millis;
}

/**
 * Represents a point in time with both wall clock and monotonic time
 */
export interface Instant {
  /** Wall clock time in milliseconds since epoch (can jump due to system changes) */
  readonly wallMs: number;
  /** Monotonic time in milliseconds for measuring intervals (never goes backwards) */
  readonly monoMs: number;
}

/**
 * Anything that can interrupt a pending sleep. CancelToken from @cadence/sync fits.
 */
export interface SleepSignal {
  isCanceled(): boolean;
  onCancel(cb: () => void): () => void;
}

export type SleepOutcome = "elapsed" | "canceled";

/**
 * Common interface for all clock implementations
 */
export interface Clock {
  /**
   * Get the current time as an Instant
   */
  now(): Instant;

  /**
   * Sleep for a given duration in milliseconds.
   * Resolves early with "canceled" once the signal fires; the pending timer is released.
   */
  sleep(ms: Millis, signal?: SleepSignal): Promise<SleepOutcome>;
}

export type ClockEvent =
  | { type: "time:sleep:start"; durationMs: number; at: Instant }
  | { type: "time:sleep:end"; durationMs: number; actualMs: number; at: Instant }
  | { type: "time:sleep:cancel"; durationMs: number; afterMs: number; at: Instant }
  | { type: "time:advance"; byMs: number; fromMono: number; toMono: number };

/**
 * Event emitter function type
 */
export type EmitFn = (event: ClockEvent) => void;
