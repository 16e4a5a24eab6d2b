import type { CallbackFailedError } from "./errors.js";
import { toCallbackFailed } from "./errors.js";
import { err, ok } from "./result.js";
import type { Result } from "./result.js";
import type { TimerCallback } from "./types.js";

/**
 * Wrap a plain function as a TimerCallback. A throw or rejection becomes a CallbackFailedError.
 */
export function callback(fn: () => unknown): TimerCallback {
  return {
    async execute() {
      try {
        await fn();
        return ok(undefined);
      } catch (error) {
        return err(toCallbackFailed(error));
      }
    },
  };
}

/**
 * Run one tick's callback, folding a thrown error or rejection into the result.
 */
export async function invokeCallback(cb: TimerCallback): Promise<Result<CallbackFailedError, void>> {
  try {
    return await cb.execute();
  } catch (error) {
    return err(toCallbackFailed(error));
  }
}
