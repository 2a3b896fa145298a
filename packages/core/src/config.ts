import { Ajv } from "ajv";
import { DEFAULT_TUNING, SeededStream, type GeneratorTuning } from "@sweepcheck/rand";

import { isLoggingLevel, LoggingLevel } from "./logging.js";
import { isProgressLevel, ProgressLevel } from "./outcome.js";
import { DEFAULT_MAX_TEST_CASES } from "./registry.js";
import { runOptionsSchema, type RunOptions } from "./schemas.js";

export interface RunConfiguration {
  readonly seed: bigint;
  readonly loggingLevel: LoggingLevel;
  readonly progressLevel: ProgressLevel;
  /** Milliseconds allowed for generating one test input; `0` is unbounded. */
  readonly inputTimeout: number;
  /** Wall-clock seconds to keep sweeping; `0` runs a single sweep. */
  readonly untilTimeout: number;
  readonly exitFast: boolean;
  readonly trap: boolean;
  readonly maxTestCases: number;
  readonly tuning: GeneratorTuning;
}

export const DEFAULT_INPUT_TIMEOUT_MS = 5000;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const ajv = new Ajv({ allErrors: true, strict: false });
const validateRunOptions = ajv.compile<RunOptions>(runOptionsSchema);

/** Seed used when none is given: one draw from a stream seeded with the clock. */
export function randomSeed(clock: () => number = Date.now): bigint {
  const stream = new SeededStream({ clock });
  stream.seed(BigInt(Math.trunc(clock())));
  return stream.next();
}

export const parseSeed = (text: string): bigint => {
  const digits = text.replace(/^0[xX]/, "");
  if (!/^[0-9a-fA-F]{1,16}$/.test(digits)) {
    throw new ConfigError(`seed must be at most 16 hex digits, received ${text}`);
  }
  return BigInt(`0x${digits}`);
};

export const formatSeed = (seed: bigint): string => seed.toString(16).padStart(16, "0");

export function createRunConfig(
  options: RunOptions = {},
  defaultSeed: () => bigint = randomSeed,
): RunConfiguration {
  if (!validateRunOptions(options)) {
    throw new ConfigError(`invalid run options: ${ajv.errorsText(validateRunOptions.errors)}`);
  }
  const loggingLevel = options.loggingLevel ?? LoggingLevel.Error;
  const progressLevel = options.progressLevel ?? ProgressLevel.All;
  if (!isLoggingLevel(loggingLevel)) {
    throw new ConfigError(`unknown logging level ${loggingLevel}`);
  }
  if (!isProgressLevel(progressLevel)) {
    throw new ConfigError(`unknown progress level ${progressLevel}`);
  }
  const config: RunConfiguration = {
    seed: options.seed === undefined ? defaultSeed() : parseSeed(options.seed),
    loggingLevel,
    progressLevel,
    inputTimeout: options.inputTimeout ?? DEFAULT_INPUT_TIMEOUT_MS,
    untilTimeout: options.untilTimeout ?? 0,
    exitFast: options.exitFast ?? false,
    trap: options.trap ?? false,
    maxTestCases: options.maxTestCases ?? DEFAULT_MAX_TEST_CASES,
    tuning: Object.freeze({ ...DEFAULT_TUNING, ...options.tuning }),
  };
  return Object.freeze(config);
}
