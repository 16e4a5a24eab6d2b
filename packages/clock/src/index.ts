export type { Clock, Instant, SleepSignal, SleepOutcome, ClockEvent, EmitFn } from "./types.js";
export type { Millis } from "./types.js";
export { ms } from "./types.js";
export { createSystemClock, SystemClock } from "./system-clock.js";
export { createControlledClock, ControlledClock } from "./controlled-clock.js";
