import type { GeneratorTuning } from "@sweepcheck/rand";

import { ConfigError, createRunConfig, type RunConfiguration } from "./config.js";
import { createRunEnvironment, type RunEnvironment } from "./environment.js";
import { stderrSink, stdoutSink, type Sink } from "./logging.js";
import { RegistryOverflowError, TestRegistry } from "./registry.js";
import { runSuite } from "./runner.js";
import type { RunOptions } from "./schemas.js";

export const HELP_TEXT = `Usage: <test-binary> [options]

  -S, --seed <hex>                        64-bit seed (random when omitted)
  --logging-level <0-3>                   diagnostics shown when replaying a failure (default 1)
  --progress-level <0-2>                  0 none, 1 final, 2 all (default 2)
  --input-timeout <ms>                    bound for generating one input, 0 = none (default 5000)
  --until-timeout <s>                     keep sweeping for this many seconds, 0 = one sweep
  --exit-fast                             stop at the first failing test
  --trap                                  break into the debugger when replaying a failure
  --max-test-cases <n>                    registry capacity (default 1000)
  --max-stack-depth <n>                   generator recursion bound
  --max-generator-size <n>                generator size bound, nonzero
  --null-in-every <n>                     nullable values are null once in n draws
  --sized-null                            scale null frequency with the size bound
  --allowed-depth-failures <n>            recursion retries per draw
  --allowed-size-split-backtracks <n>     filter retries per draw
  -h, --help                              show this message`;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export interface ParsedRunArgs {
  readonly options: RunOptions;
  readonly help: boolean;
}

const TUNING_FLAGS: Readonly<Record<string, keyof Omit<GeneratorTuning, "sizedNull">>> = {
  "--max-stack-depth": "maxDepth",
  "--max-generator-size": "maxSize",
  "--null-in-every": "nullInEvery",
  "--allowed-depth-failures": "allowedDepthFailures",
  "--allowed-size-split-backtracks": "allowedSizeSplitBacktracks",
};

const NEGATIVE_NUMBER = /^-\d/;

const parseInteger = (flag: string, value: string): number => {
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${flag} expects an integer, received ${value}`);
  }
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    throw new ConfigError(`${flag} is out of range, received ${value}`);
  }
  return parsed;
};

export function parseRunArgs(args: readonly string[]): ParsedRunArgs {
  const options: Mutable<RunOptions> = {};
  const tuning: Partial<Mutable<GeneratorTuning>> = {};
  let help = false;

  for (let index = 0; index < args.length; ) {
    const token = args[index];
    if (token === undefined) {
      break;
    }
    const [flag = token, inline] = token.startsWith("--") ? token.split("=", 2) : [token];
    const readValue = (): string => {
      if (inline !== undefined) {
        index += 1;
        return inline;
      }
      const next = args[index + 1];
      if (next === undefined || (next.startsWith("-") && !NEGATIVE_NUMBER.test(next))) {
        throw new ConfigError(`missing value for ${flag}`);
      }
      index += 2;
      return next;
    };
    const toggle = (): true => {
      if (inline !== undefined) {
        throw new ConfigError(`flag ${flag} does not take a value`);
      }
      index += 1;
      return true;
    };

    const tuningKey = TUNING_FLAGS[flag];
    if (tuningKey !== undefined) {
      const value = parseInteger(flag, readValue());
      if (tuningKey === "maxSize" && value === 0) {
        throw new ConfigError("--max-generator-size must be nonzero");
      }
      tuning[tuningKey] = value;
      continue;
    }

    switch (flag) {
      case "-S":
      case "--seed":
        options.seed = readValue();
        break;
      case "--logging-level":
        options.loggingLevel = parseInteger(flag, readValue());
        break;
      case "--progress-level":
        options.progressLevel = parseInteger(flag, readValue());
        break;
      case "--input-timeout":
        options.inputTimeout = parseInteger(flag, readValue());
        break;
      case "--until-timeout":
        options.untilTimeout = parseInteger(flag, readValue());
        break;
      case "--max-test-cases":
        options.maxTestCases = parseInteger(flag, readValue());
        break;
      case "--exit-fast":
        options.exitFast = toggle();
        break;
      case "--trap":
        options.trap = toggle();
        break;
      case "--sized-null":
        tuning.sizedNull = toggle();
        break;
      case "-h":
      case "--help":
        help = toggle();
        break;
      default:
        throw new ConfigError(`unknown flag: ${flag}`);
    }
  }

  if (Object.keys(tuning).length > 0) {
    options.tuning = tuning;
  }
  return { options, help };
}

export interface MainOptions {
  readonly argv: readonly string[];
  readonly setup: (registry: TestRegistry, env: RunEnvironment) => void;
  readonly env?: RunEnvironment;
  readonly output?: Sink;
  readonly errors?: Sink;
  readonly defaultSeed?: () => bigint;
}

/**
 * Entry point for a test binary: builds the configuration and registry,
 * runs every registered case and returns the process exit code.
 * `0` means nothing failed; `1` a failed or ungenerated case, a registry
 * overflow or a rejected option.
 */
export function runMain(main: MainOptions): number {
  const output = main.output ?? stdoutSink;
  const errors = main.errors ?? stderrSink;

  let config: RunConfiguration;
  try {
    const parsed = parseRunArgs(main.argv);
    if (parsed.help) {
      output(`${HELP_TEXT}\n`);
      return 0;
    }
    config = createRunConfig(parsed.options, main.defaultSeed);
  } catch (error) {
    if (error instanceof ConfigError) {
      errors(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  const env = main.env ?? createRunEnvironment({ sink: output });
  const registry = new TestRegistry(config.maxTestCases);
  try {
    main.setup(registry, env);
  } catch (error) {
    if (error instanceof RegistryOverflowError) {
      output(`${error.message}\n`);
      return 1;
    }
    throw error;
  }

  return runSuite(registry, config, env).exitCode;
}
