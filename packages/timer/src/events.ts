import type { Instant } from "@cadence/clock";
import type { CallbackFailedError } from "./errors.js";
import type { CompletionReason, EmitFn, RunMode, TimerState } from "./types.js";

export function emitTimerStart(
  emit: EmitFn | undefined,
  timer: string,
  runId: number,
  mode: RunMode,
  intervalMs: number,
  expirationCount: number | undefined,
  at: Instant,
): void {
  emit?.({
    type: "timer:start",
    timer,
    runId,
    mode,
    intervalMs,
    expirationCount,
    at,
  });
}

export function emitTimerState(
  emit: EmitFn | undefined,
  timer: string,
  from: TimerState,
  to: TimerState,
  at: Instant,
): void {
  emit?.({
    type: "timer:state",
    timer,
    from,
    to,
    at,
  });
}

export function emitTimerPause(emit: EmitFn | undefined, timer: string, at: Instant): void {
  emit?.({ type: "timer:pause", timer, at });
}

export function emitTimerResume(emit: EmitFn | undefined, timer: string, at: Instant): void {
  emit?.({ type: "timer:resume", timer, at });
}

export function emitTimerStop(emit: EmitFn | undefined, timer: string, runId: number | undefined, at: Instant): void {
  emit?.({ type: "timer:stop", timer, runId, at });
}

export function emitTimerTick(
  emit: EmitFn | undefined,
  timer: string,
  runId: number,
  tick: number,
  elapsedMs: number,
  at: Instant,
): void {
  emit?.({
    type: "timer:tick",
    timer,
    runId,
    tick,
    elapsedMs,
    at,
  });
}

export function emitCallbackError(
  emit: EmitFn | undefined,
  timer: string,
  runId: number,
  tick: number,
  error: CallbackFailedError,
  at: Instant,
): void {
  emit?.({
    type: "timer:callback:error",
    timer,
    runId,
    tick,
    error,
    at,
  });
}

export function emitTimerExpire(emit: EmitFn | undefined, timer: string, runId: number, ticks: number, at: Instant): void {
  emit?.({ type: "timer:expire", timer, runId, ticks, at });
}

export function emitTimerComplete(
  emit: EmitFn | undefined,
  timer: string,
  runId: number,
  ticks: number,
  reason: CompletionReason,
  at: Instant,
): void {
  emit?.({
    type: "timer:complete",
    timer,
    runId,
    ticks,
    reason,
    at,
  });
}

export function emitIntervalAdjust(
  emit: EmitFn | undefined,
  timer: string,
  fromMs: number,
  toMs: number,
  at: Instant,
): void {
  emit?.({
    type: "timer:interval:adjust",
    timer,
    fromMs,
    toMs,
    at,
  });
}
