import type { RandomSource } from "@sweepcheck/rand";

import type { RunConfiguration } from "./config.js";
import { LoggingLevel, type Logger } from "./logging.js";
import { ProgressLevel, type Outcome } from "./outcome.js";
import { replayFailure } from "./replay.js";
import type { Reporter } from "./reporter.js";
import { invokeTest, type TestCase, type TestRegistry } from "./registry.js";
import { exitCodeFor, ResultTable, type Tally } from "./results.js";

export interface RunLoopDeps {
  readonly random: RandomSource;
  readonly logger: Logger;
  readonly reporter: Reporter;
}

export interface RunSummary {
  readonly seed: bigint;
  readonly sweeps: number;
  readonly outcomes: readonly Outcome[];
  readonly tally: Tally;
  readonly exitCode: 0 | 1;
}

interface SweepState {
  readonly cases: readonly TestCase[];
  readonly results: ResultTable;
  readonly config: RunConfiguration;
  readonly deps: RunLoopDeps;
}

/**
 * One pass over every slot that has not failed. Returns `true` when exit-fast
 * stops the run. At progress level none a failure is recorded and frozen but
 * neither replayed nor allowed to stop the sweep.
 */
function sweep({ cases, results, config, deps }: SweepState): boolean {
  const { random, logger, reporter } = deps;
  const showStart = config.progressLevel === ProgressLevel.All;

  for (const [index, testCase] of cases.entries()) {
    if (results.isFrozen(index)) {
      continue;
    }
    if (showStart) {
      reporter.caseStarted(testCase);
    }
    const checkpoint = random.save();
    results.saveCheckpoint(index, checkpoint);
    random.setInputTimeout(config.inputTimeout);

    const outcome = invokeTest(testCase, config.progressLevel, false, logger);
    results.record(index, outcome);
    if (config.progressLevel === ProgressLevel.None) {
      continue;
    }
    reporter.caseFinished(testCase, outcome);
    if (outcome !== "fail") {
      continue;
    }

    replayFailure({
      testCase,
      checkpoint,
      random,
      logger,
      loggingLevel: config.loggingLevel,
      trap: config.trap,
    });
    reporter.replayFinished(testCase);
    if (config.exitFast) {
      return true;
    }
  }
  return false;
}

/**
 * Seeds the stream once and sweeps the registry until the wall-clock budget
 * is spent. The stream is not reseeded between sweeps, so each sweep sees
 * new inputs while the whole run stays reproducible from the seed.
 */
export function runSuite(registry: TestRegistry, config: RunConfiguration, deps: RunLoopDeps): RunSummary {
  const { random, logger, reporter } = deps;
  const cases = registry.cases();
  const results = new ResultTable(cases.length);
  logger.level = LoggingLevel.None;

  if (config.untilTimeout > 0) {
    reporter.deadline(config.untilTimeout);
  }
  reporter.seed(config.seed);
  random.seed(config.seed);
  random.configure(config.tuning);
  random.next();

  const startedAt = random.elapsedMilliseconds();
  const state: SweepState = { cases, results, config, deps };
  let sweeps = 0;

  while (true) {
    sweeps += 1;
    if (sweep(state) || config.untilTimeout === 0) {
      break;
    }
    if (cases.every((_, index) => results.isFrozen(index))) {
      break;
    }
    const elapsedSeconds = Math.floor((random.elapsedMilliseconds() - startedAt) / 1000);
    if (elapsedSeconds >= config.untilTimeout) {
      break;
    }
    reporter.rerunning(config.untilTimeout - elapsedSeconds);
  }

  const tally = results.tally();
  reporter.summary(tally);
  return {
    seed: config.seed,
    sweeps,
    outcomes: results.outcomes(),
    tally,
    exitCode: exitCodeFor(tally),
  };
}
