export { createCancelToken } from "./cancel-token.js";
export type { CancelToken } from "./cancel-token.js";
export { Notify, createNotify } from "./notify.js";
export type { NotifyOutcome } from "./notify.js";
export { Mutex, createMutex } from "./mutex.js";
export type { Release } from "./mutex.js";
