export { Journal, journalSink } from "./journal.js";
export type {
  JournalEntry,
  JournalOptions,
  JournalSnapshot,
  IdGenerator,
  Subscriber,
  Unsubscribe,
  JournalEvent,
  OverflowPolicy,
  EmitFn,
} from "./types.js";
export { JournalReentrancyError, JournalOverflowError } from "./types.js";
