import type { Clock, Instant } from "@cadence/clock";
import type {
  EmitFn,
  IdGenerator,
  JournalEntry,
  JournalOptions,
  JournalSnapshot,
  OverflowPolicy,
  Subscriber,
  Unsubscribe,
} from "./types.js";
import { JournalReentrancyError, JournalOverflowError } from "./types.js";

/**
 * Append-only in-memory log. Sequences keep increasing across clear() and
 * overflow drops, so a sequence number identifies one entry for the journal's lifetime.
 */
export class Journal<T> {
  private readonly clock: Clock;
  private readonly idGenerator: IdGenerator;
  private readonly emit: EmitFn | undefined;
  private readonly maxEntries: number | undefined;
  private readonly overflow: OverflowPolicy;

  private buffer: JournalEntry<T>[] = [];
  private firstSequence = 0;
  private nextSequence = 0;
  private readonly subscribers = new Set<Subscriber<T>>();
  private isProcessingSubscribers = false;
  private readonly journalId: string;
  private readonly createdAt: Instant;

  constructor(options: JournalOptions) {
    this.clock = options.clock;
    this.idGenerator = options.idGenerator ?? (() => Math.random().toString(36).slice(2));
    this.emit = options.emit;
    this.maxEntries = options.maxEntries;
    this.overflow = options.overflow ?? "none";

    this.journalId = this.idGenerator();
    this.createdAt = this.clock.now();

    this.emit?.({
      type: "journal:create",
      journalId: this.journalId,
      at: this.createdAt,
    });
  }

  append(data: T): JournalEntry<T> {
    if (this.isProcessingSubscribers) {
      throw new JournalReentrancyError();
    }

    if (this.maxEntries !== undefined && this.overflow !== "none" && this.buffer.length >= this.maxEntries) {
      this.emit?.({
        type: "journal:overflow",
        policy: this.overflow,
        maxEntries: this.maxEntries,
        ...(this.overflow === "bounded:drop_oldest" ? { droppedCount: 1 } : {}),
        at: this.clock.now(),
      });

      if (this.overflow === "bounded:error") {
        throw new JournalOverflowError(this.maxEntries);
      }

      this.buffer.shift();
      this.firstSequence++;
    }

    const entry: JournalEntry<T> = {
      id: this.idGenerator(),
      sequence: this.nextSequence++,
      timestamp: this.clock.now(),
      data,
    };
    this.buffer.push(entry);

    this.emit?.({
      type: "journal:append",
      id: entry.id,
      seq: entry.sequence,
      size: this.buffer.length,
      at: entry.timestamp,
    });

    this.notifySubscribers(entry);

    return entry;
  }

  getEntry(sequence: number): JournalEntry<T> | undefined {
    if (sequence < this.firstSequence || sequence >= this.nextSequence) {
      return undefined;
    }
    return this.buffer[sequence - this.firstSequence];
  }

  getFirst(): JournalEntry<T> | undefined {
    return this.buffer[0];
  }

  getLast(): JournalEntry<T> | undefined {
    return this.buffer[this.buffer.length - 1];
  }

  /** Entry payloads in append order */
  entries(): T[] {
    return this.buffer.map((entry) => entry.data);
  }

  size(): number {
    return this.buffer.length;
  }

  isEmpty(): boolean {
    return this.buffer.length === 0;
  }

  clear(): void {
    const previousSize = this.buffer.length;
    this.buffer = [];
    this.firstSequence = this.nextSequence;

    this.emit?.({
      type: "journal:clear",
      previousSize,
      at: this.clock.now(),
    });
  }

  subscribe(fn: Subscriber<T>): Unsubscribe {
    this.subscribers.add(fn);
    return () => {
      this.subscribers.delete(fn);
    };
  }

  /**
   * Frozen deep copy of the retained entries. Payloads must be structured-cloneable;
   * an entry holding a function (directly or via an error's `cause`) makes this throw
   * a DataCloneError.
   */
  getSnapshot(): JournalSnapshot<T> {
    return {
      firstSequence: this.firstSequence,
      lastSequence: this.nextSequence - 1,
      totalCount: this.buffer.length,
      timestamp: this.clock.now(),
      entries: deepFreeze(structuredClone(this.buffer)),
    };
  }

  private notifySubscribers(entry: JournalEntry<T>): void {
    if (this.subscribers.size === 0) return;

    this.isProcessingSubscribers = true;

    try {
      for (const subscriber of this.subscribers) {
        try {
          subscriber(entry);
        } catch (error) {
          this.emit?.({
            type: "journal:subscriber:error",
            seq: entry.sequence,
            id: entry.id,
            error,
            at: this.clock.now(),
          });
        }
      }
    } finally {
      this.isProcessingSubscribers = false;
    }
  }
}

/**
 * Adapt a journal into an emit callback, so any component's diagnostic
 * events can be recorded: `createTimer({ emit: journalSink(journal) })`.
 */
export function journalSink<T>(journal: Journal<T>): (event: T) => void {
  return (event) => {
    journal.append(event);
  };
}

function deepFreeze<T>(obj: T): T {
  if (obj === null || typeof obj !== "object") return obj;

  Object.freeze(obj);

  if (Array.isArray(obj)) {
    obj.forEach((item) => deepFreeze(item));
  } else {
    Object.values(obj).forEach((value) => deepFreeze(value));
  }

  return obj;
}
