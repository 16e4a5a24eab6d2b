import type { Instant } from "@cadence/clock";

export interface AtomOptions<T> {
  /** Equality check to avoid no-op writes and power CAS. Defaults to Object.is */
  equals?: (a: T, b: T) => boolean;
  /** Start version (default 0) */
  baseVersion?: number;
  /** Receives errors thrown by watchers. Defaults to console.error */
  onWatcherError?: (error: unknown, change: Change<T>) => void;
}

export interface Change<T> {
  readonly from: T;
  readonly to: T;
  readonly versionFrom: number;
  readonly versionTo: number;
  readonly at: Instant; // from injected Clock
  readonly cause?: unknown; // free-form metadata
}

export interface Atom<T> {
  /** Current value */
  deref(): T;

  /** Current version (monotonically increasing) */
  version(): number;

  /** Atomic functional update; returns the new value */
  swap(updater: (current: T) => T, opts?: { cause?: unknown }): T;

  /** Replace with a specific value; returns the new value */
  reset(next: T, opts?: { cause?: unknown }): T;

  /** Compare-and-set using the configured equals() */
  compareAndSet(expected: T, next: T, opts?: { cause?: unknown }): boolean;

  /**
   * Subscribe to committed changes.
   * - Synchronous, ordered callbacks.
   * - Re-entrant updates inside a watcher throw AtomReentrancyError.
   * Returns an unsubscribe function.
   */
  watch(fn: (change: Change<T>) => void): () => void;
}

export class AtomReentrancyError extends Error {
  constructor() {
    super("Cannot update atom during notification (reentrant update)");
    this.name = "AtomReentrancyError";
  }
}
