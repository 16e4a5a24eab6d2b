export type TimerErrorTag = "InvalidParameter" | "TimerStopped" | "CallbackFailed";

export abstract class TimerError extends Error {
  abstract readonly _tag: TimerErrorTag;
}

/**
 * A duration or count was out of range, or the operation is not allowed in the current state.
 */
export class InvalidParameterError extends TimerError {
  readonly _tag = "InvalidParameter" as const;

  constructor(detail: string) {
    super(`Invalid parameter: ${detail}`);
    this.name = "InvalidParameterError";
  }
}

export class TimerStoppedError extends TimerError {
  readonly _tag = "TimerStopped" as const;

  constructor() {
    super("Operation attempted on a stopped timer.");
    this.name = "TimerStoppedError";
  }
}

/**
 * Raised inside the loop when a tick's callback fails. Never returned to a caller;
 * it only reaches the diagnostic sink.
 */
export class CallbackFailedError extends TimerError {
  readonly _tag = "CallbackFailed" as const;

  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Callback execution failed: ${detail}`, options);
    this.name = "CallbackFailedError";
  }
}

export function toCallbackFailed(error: unknown): CallbackFailedError {
  if (error instanceof CallbackFailedError) return error;
  const detail = error instanceof Error ? error.message : String(error);
  return new CallbackFailedError(detail, { cause: error });
}
