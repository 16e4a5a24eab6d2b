export type {
  TimerState,
  TimerStatistics,
  TimerCallback,
  TimerOptions,
  TimerEvent,
  EmitFn,
  RunMode,
  CompletionReason,
} from "./types.js";
export type { Result } from "./result.js";
export { ok, err, isOk, isErr } from "./result.js";
export { TimerError, InvalidParameterError, TimerStoppedError, CallbackFailedError } from "./errors.js";
export type { TimerErrorTag } from "./errors.js";
export { callback } from "./callback.js";
export { Timer, createTimer } from "./timer.js";
export { TimerManager, createTimerManager } from "./manager.js";
export type { ManagerEvent, TimerManagerOptions } from "./manager.js";
