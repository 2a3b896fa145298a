import { InputTimeoutError } from "./errors.js";
import type { Checkpoint, Clock, GeneratorTuning, RandomSource } from "./types.js";

const MASK_64 = (1n << 64n) - 1n;
const GOLDEN_GAMMA = 0x9e3779b97f4a7c15n;

export const DEFAULT_TUNING: GeneratorTuning = Object.freeze({
  maxDepth: 256,
  maxSize: 20,
  nullInEvery: 5,
  sizedNull: false,
  allowedDepthFailures: 10,
  allowedSizeSplitBacktracks: 10,
});

export interface SeededStreamOptions {
  readonly clock?: Clock;
  readonly tuning?: Partial<GeneratorTuning>;
}

function mix(state: bigint): bigint {
  let z = state;
  z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK_64;
  z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK_64;
  return z ^ (z >> 31n);
}

function ensureCount(field: string, value: number, minimum: number): number {
  if (!Number.isSafeInteger(value) || value < minimum) {
    throw new RangeError(`${field} must be an integer >= ${minimum}, received ${value}`);
  }
  return value;
}

/**
 * SplitMix64 stream with checkpointing and an input-generation deadline.
 * All state lives in a single 64-bit word, so a checkpoint is that word.
 */
export class SeededStream implements RandomSource {
  private state = 0n;
  private inputTimeout = 0;
  private inputStartedAt = 0;
  private currentDepth = 0;
  private settings: GeneratorTuning;
  private readonly clock: Clock;
  private readonly origin: number;

  constructor(options: SeededStreamOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.origin = this.clock();
    this.settings = DEFAULT_TUNING;
    if (options.tuning) {
      this.configure(options.tuning);
    }
  }

  get tuning(): GeneratorTuning {
    return this.settings;
  }

  get depth(): number {
    return this.currentDepth;
  }

  seed(value: bigint): void {
    this.state = BigInt.asUintN(64, value);
  }

  next(): bigint {
    this.state = (this.state + GOLDEN_GAMMA) & MASK_64;
    return mix(this.state);
  }

  /** `next()` guarded by the input deadline; generators draw through here. */
  draw(): bigint {
    if (this.inputTimeout > 0 && this.clock() - this.inputStartedAt > this.inputTimeout) {
      throw new InputTimeoutError(this.inputTimeout);
    }
    return this.next();
  }

  below(bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0) {
      throw new RangeError(`bound must be a positive safe integer, received ${bound}`);
    }
    return Number(this.draw() % BigInt(bound));
  }

  between(min: number, max: number): number {
    if (!Number.isSafeInteger(min) || !Number.isSafeInteger(max) || min > max) {
      throw new RangeError(`invalid range [${min}, ${max}]`);
    }
    const span = BigInt(max) - BigInt(min) + 1n;
    return Number(BigInt(min) + (this.draw() % span));
  }

  save(): Checkpoint {
    return Object.freeze({ algorithm: "splitmix64", state: this.state });
  }

  restore(checkpoint: Checkpoint): void {
    this.state = checkpoint.state;
    this.currentDepth = 0;
  }

  setInputTimeout(milliseconds: number): void {
    ensureCount("input timeout", milliseconds, 0);
    this.inputTimeout = milliseconds;
    this.inputStartedAt = this.clock();
  }

  /** Restarts the deadline for the next input, keeping the configured bound. */
  beginInput(): void {
    this.inputStartedAt = this.clock();
  }

  configure(tuning: Partial<GeneratorTuning>): void {
    const merged: GeneratorTuning = { ...this.settings, ...tuning };
    ensureCount("maxDepth", merged.maxDepth, 0);
    ensureCount("maxSize", merged.maxSize, 1);
    ensureCount("nullInEvery", merged.nullInEvery, 1);
    ensureCount("allowedDepthFailures", merged.allowedDepthFailures, 0);
    ensureCount("allowedSizeSplitBacktracks", merged.allowedSizeSplitBacktracks, 0);
    this.settings = Object.freeze(merged);
  }

  elapsedMilliseconds(): number {
    return this.clock() - this.origin;
  }

  enter(): number {
    this.currentDepth += 1;
    return this.currentDepth;
  }

  leave(): void {
    if (this.currentDepth > 0) {
      this.currentDepth -= 1;
    }
  }
}
