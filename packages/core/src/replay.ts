import type { Checkpoint, RandomSource } from "@sweepcheck/rand";

import { LoggingLevel, type Logger } from "./logging.js";
import { ProgressLevel, type Outcome } from "./outcome.js";
import { invokeTest, qualifiedName, type TestCase } from "./registry.js";

export interface ReplayRequest {
  readonly testCase: TestCase;
  readonly checkpoint: Checkpoint;
  readonly random: RandomSource;
  readonly logger: Logger;
  readonly loggingLevel: LoggingLevel;
  readonly trap: boolean;
}

/**
 * Reruns a failed test from the checkpoint taken before it ran, with
 * diagnostics enabled and no input deadline, so the same counterexample is
 * regenerated and logged.
 */
export function replayFailure(request: ReplayRequest): Outcome {
  const { testCase, checkpoint, random, logger } = request;
  logger.level = request.loggingLevel;
  try {
    random.restore(checkpoint);
    random.setInputTimeout(0);
    const outcome = invokeTest(testCase, ProgressLevel.None, request.trap, logger);
    if (outcome !== "fail") {
      logger.warn(`${qualifiedName(testCase)} did not fail on replay (got ${outcome})`);
    }
    return outcome;
  } finally {
    logger.level = LoggingLevel.None;
  }
}
