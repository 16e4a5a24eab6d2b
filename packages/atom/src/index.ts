export type { Atom, AtomOptions, Change } from "./types.js";
export { AtomReentrancyError } from "./types.js";
export { AtomImpl, createAtom } from "./atom.js";
