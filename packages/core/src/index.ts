export { HELP_TEXT, parseRunArgs, runMain } from "./cli.js";
export type { MainOptions, ParsedRunArgs } from "./cli.js";
export {
  ConfigError,
  createRunConfig,
  DEFAULT_INPUT_TIMEOUT_MS,
  formatSeed,
  parseSeed,
  randomSeed,
} from "./config.js";
export type { RunConfiguration } from "./config.js";
export { createRunEnvironment } from "./environment.js";
export type { RunEnvironment, RunEnvironmentInit } from "./environment.js";
export { isLoggingLevel, Logger, LoggingLevel, stderrSink, stdoutSink } from "./logging.js";
export type { Sink } from "./logging.js";
export {
  isProgressLevel,
  mergeOutcome,
  OUTCOME_LABELS,
  OUTCOMES,
  ProgressLevel,
} from "./outcome.js";
export type { Outcome } from "./outcome.js";
export { DEFAULT_MAX_DISCARD_RATIO, DEFAULT_RUNS, defineProperty } from "./property.js";
export type { PropertyDefinition } from "./property.js";
export {
  DEFAULT_MAX_TEST_CASES,
  describeError,
  invokeTest,
  qualifiedName,
  RegistryOverflowError,
  TestRegistry,
} from "./registry.js";
export type { RunnableTest, TestCase } from "./registry.js";
export { replayFailure } from "./replay.js";
export type { ReplayRequest } from "./replay.js";
export { ConsoleReporter, progressLine, summaryLine } from "./reporter.js";
export type { Reporter } from "./reporter.js";
export { exitCodeFor, ResultTable, tally } from "./results.js";
export type { Tally } from "./results.js";
export { runSuite } from "./runner.js";
export type { RunLoopDeps, RunSummary } from "./runner.js";
export type { RunOptions } from "./schemas.js";
export { runOptionsSchema } from "./schemas.js";
export { createTrap } from "./trap.js";
export type { Trap } from "./trap.js";
