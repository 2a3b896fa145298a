export interface Checkpoint {
  readonly algorithm: "splitmix64";
  readonly state: bigint;
}

export interface GeneratorTuning {
  readonly maxDepth: number;
  readonly maxSize: number;
  readonly nullInEvery: number;
  readonly sizedNull: boolean;
  readonly allowedDepthFailures: number;
  readonly allowedSizeSplitBacktracks: number;
}

export type Clock = () => number;

/**
 * Seeded random stream consumed by the run loop. The loop never interprets
 * the generated values; it only seeds, checkpoints and rewinds the stream.
 */
export interface RandomSource {
  seed(value: bigint): void;
  next(): bigint;
  save(): Checkpoint;
  restore(checkpoint: Checkpoint): void;
  /** Milliseconds allowed for the next input generation; `0` disables the bound. */
  setInputTimeout(milliseconds: number): void;
  configure(tuning: Partial<GeneratorTuning>): void;
  elapsedMilliseconds(): number;
}
