import type { Clock, Instant } from "@cadence/clock";

export interface IdGenerator {
  (): string;
}

export interface JournalEntry<T> {
  readonly id: string;
  readonly sequence: number;
  readonly timestamp: Instant;
  readonly data: T;
}

// Backpressure policies
export type OverflowPolicy = "none" | "bounded:drop_oldest" | "bounded:error";

export interface JournalOptions {
  clock: Clock;
  idGenerator?: IdGenerator;
  emit?: EmitFn;
  maxEntries?: number;
  overflow?: OverflowPolicy;
}

export interface JournalSnapshot<T> {
  readonly firstSequence: number;
  readonly lastSequence: number;
  readonly totalCount: number;
  readonly timestamp: Instant;
  readonly entries: ReadonlyArray<Readonly<JournalEntry<T>>>;
}

export type JournalEvent =
  | {
      type: "journal:create";
      journalId: string;
      at: Instant;
    }
  | {
      type: "journal:append";
      id: string;
      seq: number;
      size: number;
      at: Instant;
    }
  | {
      type: "journal:subscriber:error";
      seq: number;
      id: string;
      error: unknown;
      at: Instant;
    }
  | {
      type: "journal:clear";
      previousSize: number;
      at: Instant;
    }
  | {
      type: "journal:overflow";
      policy: OverflowPolicy;
      maxEntries: number;
      droppedCount?: number;
      at: Instant;
    };

export type EmitFn = (event: JournalEvent) => void;

export type Subscriber<T> = (entry: JournalEntry<T>) => void;
export type Unsubscribe = () => void;

export class JournalReentrancyError extends Error {
  constructor() {
    super("Cannot append to journal while processing subscribers");
    this.name = "JournalReentrancyError";
  }
}

export class JournalOverflowError extends Error {
  constructor(maxEntries: number) {
    super(`Journal overflow: maximum entries (${maxEntries}) reached`);
    this.name = "JournalOverflowError";
  }
}
