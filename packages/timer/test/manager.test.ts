import { describe, it, expect, beforeEach } from "vitest";
import { createControlledClock, ms } from "@cadence/clock";
import type { ControlledClock } from "@cadence/clock";
import { callback, createTimer, createTimerManager } from "../src/index.js";
import type { ManagerEvent, TimerManager } from "../src/index.js";

const byId = (a: number, b: number) => a - b;

describe("TimerManager", () => {
  let clock: ControlledClock;
  let manager: TimerManager;
  let events: ManagerEvent[];

  beforeEach(() => {
    clock = createControlledClock({ initialTime: 0 });
    events = [];
    manager = createTimerManager({ emit: (event) => events.push(event) });
  });

  it("should hand out increasing ids starting at zero", () => {
    const ids = [
      manager.addTimer(createTimer({ clock, name: "a" })),
      manager.addTimer(createTimer({ clock, name: "b" })),
      manager.addTimer(createTimer({ clock, name: "c" })),
    ];

    expect(ids).toEqual([0, 1, 2]);
    expect(manager.size()).toBe(3);
    expect(events[0]).toEqual({ type: "manager:add", id: 0, timer: "a" });
  });

  it("should return the stored timer itself", async () => {
    const timer = createTimer({ clock });
    const id = manager.addTimer(timer);

    expect(manager.getTimer(id)).toBe(timer);
    expect(manager.getTimer(42)).toBeUndefined();

    await manager.getTimer(id)?.startRecurring(ms(100), callback(() => {}));
    expect(timer.getState()).toBe("running");
    await timer.stop();
  });

  it("should list only timers that are not stopped, then stop them all", async () => {
    const a = createTimer({ clock });
    const b = createTimer({ clock });
    const c = createTimer({ clock });
    const idA = manager.addTimer(a);
    const idB = manager.addTimer(b);
    manager.addTimer(c);

    await a.startRecurring(ms(100), callback(() => {}));
    await b.startRecurring(ms(100), callback(() => {}));
    b.pause();

    expect(manager.listTimers().sort(byId)).toEqual([idA, idB]);

    await manager.stopAll();

    expect(manager.listTimers()).toEqual([]);
    expect(a.getState()).toBe("stopped");
    expect(b.getState()).toBe("stopped");
    expect(clock.getPendingTimerCount()).toBe(0);
    expect(events[events.length - 1]).toEqual({
      type: "manager:stop_all",
      total: 3,
      stopped: 2,
      alreadyStopped: 1,
    });
  });

  it("should drop timers from the active list when they finish on their own", async () => {
    const once = createTimer({ clock });
    const id = manager.addTimer(once);
    await once.startOnce(ms(50), callback(() => {}));

    expect(manager.listTimers()).toEqual([id]);
    await clock.advanceBy(ms(50));
    expect(manager.listTimers()).toEqual([]);
  });

  it("should never reuse ids", async () => {
    manager.addTimer(createTimer({ clock }));
    manager.addTimer(createTimer({ clock }));
    await manager.stopAll();

    expect(manager.addTimer(createTimer({ clock }))).toBe(2);
  });

  it("should tolerate stopAll on an empty manager", async () => {
    await manager.stopAll();

    expect(events).toEqual([{ type: "manager:stop_all", total: 0, stopped: 0, alreadyStopped: 0 }]);
  });
});
