import type { Timer } from "./timer.js";

export type ManagerEvent =
  | { type: "manager:add"; id: number; timer: string }
  | { type: "manager:stop_all"; total: number; stopped: number; alreadyStopped: number };

export interface TimerManagerOptions {
  emit?: (event: ManagerEvent) => void;
}

/**
 * Registry of timers keyed by ids handed out in increasing order, never reused.
 * Execution semantics stay with each Timer.
 */
export class TimerManager {
  private readonly timers = new Map<number, Timer>();
  private readonly emit: ((event: ManagerEvent) => void) | undefined;
  private nextId = 0;

  constructor(options: TimerManagerOptions = {}) {
    this.emit = options.emit;
  }

  addTimer(timer: Timer): number {
    const id = this.nextId++;
    this.timers.set(id, timer);
    this.emit?.({ type: "manager:add", id, timer: timer.name });
    return id;
  }

  /** The stored instance itself, so callers drive the same timer the manager sees. */
  getTimer(id: number): Timer | undefined {
    return this.timers.get(id);
  }

  /** Ids of timers that are running or paused, in no guaranteed order. */
  listTimers(): number[] {
    const active: number[] = [];
    for (const [id, timer] of this.timers) {
      if (timer.getState() !== "stopped") {
        active.push(id);
      }
    }
    return active;
  }

  /**
   * Stop every timer. A timer that is already stopped does not keep the others
   * from stopping; its TimerStopped result is dropped.
   */
  async stopAll(): Promise<void> {
    const results = await Promise.all([...this.timers.values()].map((timer) => timer.stop()));
    const stopped = results.filter((result) => result._tag === "Ok").length;

    this.emit?.({
      type: "manager:stop_all",
      total: results.length,
      stopped,
      alreadyStopped: results.length - stopped,
    });
  }

  size(): number {
    return this.timers.size;
  }
}

export function createTimerManager(options?: TimerManagerOptions): TimerManager {
  return new TimerManager(options);
}
