import { describe, it, expect } from "vitest";
import { createCancelToken, createNotify } from "../src/index.js";

const flush = () => new Promise<void>((resolve) => setImmediate(resolve));

describe("Notify", () => {
  it("should park until notifyOne is called", async () => {
    const notify = createNotify();
    let outcome: string | undefined;

    void notify.notified().then((result) => {
      outcome = result;
    });
    await flush();
    expect(outcome).toBeUndefined();
    expect(notify.waiterCount()).toBe(1);

    notify.notifyOne();
    await flush();

    expect(outcome).toBe("notified");
    expect(notify.waiterCount()).toBe(0);
  });

  it("should wake exactly one waiter in arrival order", async () => {
    const notify = createNotify();
    const woken: string[] = [];

    void notify.notified().then(() => woken.push("a"));
    void notify.notified().then(() => woken.push("b"));

    notify.notifyOne();
    await flush();
    expect(woken).toEqual(["a"]);

    notify.notifyOne();
    await flush();
    expect(woken).toEqual(["a", "b"]);
  });

  it("should store a single permit when nobody is waiting", async () => {
    const notify = createNotify();
    notify.notifyOne();
    notify.notifyOne();
    expect(notify.hasPermit()).toBe(true);

    expect(await notify.notified()).toBe("notified");
    expect(notify.hasPermit()).toBe(false);

    let second: string | undefined;
    void notify.notified().then((result) => {
      second = result;
    });
    await flush();
    expect(second).toBeUndefined();
  });

  it("should release a parked waiter when the signal is canceled", async () => {
    const notify = createNotify();
    const token = createCancelToken();

    const parked = notify.notified(token);
    token.cancel();

    expect(await parked).toBe("canceled");
    expect(notify.waiterCount()).toBe(0);

    // the canceled waiter must not swallow the next wake-up
    notify.notifyOne();
    expect(notify.hasPermit()).toBe(true);
  });

  it("should return canceled at once for an already canceled signal", async () => {
    const notify = createNotify();
    const token = createCancelToken();
    token.cancel();
    notify.notifyOne();

    expect(await notify.notified(token)).toBe("canceled");
    expect(notify.hasPermit()).toBe(true);
  });
});
