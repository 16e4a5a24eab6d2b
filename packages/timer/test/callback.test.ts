import { describe, it, expect } from "vitest";
import { callback, CallbackFailedError, isErr, isOk } from "../src/index.js";

describe("callback()", () => {
  it("should report success for a function that returns", async () => {
    const result = await callback(() => 42).execute();

    expect(isOk(result)).toBe(true);
  });

  it("should await async functions", async () => {
    const order: string[] = [];
    const cb = callback(async () => {
      await Promise.resolve();
      order.push("ran");
    });

    await cb.execute();

    expect(order).toEqual(["ran"]);
  });

  it("should turn a throw into CallbackFailedError with the cause attached", async () => {
    const boom = new Error("boom");
    const result = await callback(() => {
      throw boom;
    }).execute();

    expect(isErr(result)).toBe(true);
    if (!isErr(result)) return;
    expect(result.error).toBeInstanceOf(CallbackFailedError);
    expect(result.error.message).toBe("Callback execution failed: boom");
    expect(result.error.cause).toBe(boom);
  });

  it("should turn a rejection of a non-error into CallbackFailedError", async () => {
    const result = await callback(() => Promise.reject("offline")).execute();

    expect(isErr(result) && result.error.message).toBe("Callback execution failed: offline");
  });

  it("should pass a CallbackFailedError through unchanged", async () => {
    const failure = new CallbackFailedError("quota");
    const result = await callback(() => {
      throw failure;
    }).execute();

    expect(isErr(result) && result.error).toBe(failure);
  });
});
