import type { Clock } from "@cadence/clock";
import type { Atom, AtomOptions, Change } from "./types.js";
import { AtomReentrancyError } from "./types.js";

export class AtomImpl<T> implements Atom<T> {
  private value: T;
  private _version: number;
  private readonly clock: Clock;
  private readonly equals: (a: T, b: T) => boolean;
  private readonly onWatcherError: (error: unknown, change: Change<T>) => void;
  private readonly watchers = new Set<(change: Change<T>) => void>();
  private inNotification = false;

  constructor(initialValue: T, clock: Clock, options: AtomOptions<T> = {}) {
    this.value = initialValue;
    this._version = options.baseVersion ?? 0;
    this.clock = clock;
    this.equals = options.equals ?? Object.is;
    this.onWatcherError =
      options.onWatcherError ??
      ((error) => {
        console.error("Atom watcher error:", error);
      });
  }

  deref(): T {
    return this.value;
  }

  version(): number {
    return this._version;
  }

  swap(updater: (current: T) => T, opts?: { cause?: unknown }): T {
    if (this.inNotification) {
      throw new AtomReentrancyError();
    }

    const from = this.value;
    const versionFrom = this._version;
    const to = updater(from);

    if (this.equals(from, to)) {
      return from;
    }

    this.value = to;
    this._version++;

    this.notify({
      from,
      to,
      versionFrom,
      versionTo: this._version,
      at: this.clock.now(),
      cause: opts?.cause,
    });

    return to;
  }

  reset(next: T, opts?: { cause?: unknown }): T {
    return this.swap(() => next, opts);
  }

  compareAndSet(expected: T, next: T, opts?: { cause?: unknown }): boolean {
    if (this.inNotification) {
      throw new AtomReentrancyError();
    }
    if (!this.equals(this.value, expected)) {
      return false;
    }

    this.swap(() => next, opts);
    return true;
  }

  watch(fn: (change: Change<T>) => void): () => void {
    this.watchers.add(fn);

    return () => {
      this.watchers.delete(fn);
    };
  }

  private notify(change: Change<T>): void {
    if (this.watchers.size === 0) {
      return;
    }

    this.inNotification = true;
    try {
      for (const watcher of [...this.watchers]) {
        try {
          watcher(change);
        } catch (error) {
          this.onWatcherError(error, change);
        }
      }
    } finally {
      this.inNotification = false;
    }
  }
}

export function createAtom<T>(initial: T, clock: Clock, opts?: AtomOptions<T>): Atom<T> {
  return new AtomImpl(initial, clock, opts);
}
