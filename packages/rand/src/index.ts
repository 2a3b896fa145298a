export type { Checkpoint, Clock, GeneratorTuning, RandomSource } from "./types.js";
export { DepthExceededError, DiscardError, InputTimeoutError } from "./errors.js";
export { DEFAULT_TUNING, SeededStream } from "./stream.js";
export type { SeededStreamOptions } from "./stream.js";
export {
  array,
  boolean,
  chain,
  constant,
  element,
  integer,
  lazy,
  map,
  nullable,
  oneOf,
  pair,
  suchThat,
  triple,
} from "./gen.js";
export type { ArrayOptions, Gen } from "./gen.js";
