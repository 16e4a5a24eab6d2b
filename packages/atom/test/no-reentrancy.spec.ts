import { describe, it, expect } from "vitest";
import { createAtom, AtomReentrancyError } from "../src/index.js";
import { createControlledClock } from "@cadence/clock";

describe("Atom Reentrancy Prevention", () => {
  it("should throw on reentrant swap in watch callback", () => {
    const clock = createControlledClock({ initialTime: 0 });
    const atom = createAtom(0, clock);
    const changes: number[] = [];
    let caught: unknown;

    atom.watch((change) => {
      changes.push(change.to);
      try {
        atom.swap((n) => n + 10);
      } catch (error) {
        caught = error;
      }
    });

    atom.swap((n) => n + 1);

    expect(caught).toBeInstanceOf(AtomReentrancyError);
    expect(atom.version()).toBe(1);
    expect(atom.deref()).toBe(1);
    expect(changes).toEqual([1]);
  });

  it("should throw on reentrant compareAndSet even when the comparison would fail", () => {
    const clock = createControlledClock({ initialTime: 0 });
    const atom = createAtom("stopped", clock);
    let caught: unknown;

    atom.watch(() => {
      try {
        atom.compareAndSet("paused", "running");
      } catch (error) {
        caught = error;
      }
    });

    atom.reset("running");

    expect(caught).toBeInstanceOf(AtomReentrancyError);
    expect(caught instanceof Error && caught.message).toBe("Cannot update atom during notification (reentrant update)");
    expect(atom.deref()).toBe("running");
  });

  it("should allow updates again once notification completes", () => {
    const clock = createControlledClock({ initialTime: 0 });
    const atom = createAtom(0, clock);
    atom.watch(() => {});

    atom.reset(1);
    atom.reset(2);

    expect(atom.deref()).toBe(2);
    expect(atom.version()).toBe(2);
  });
});
