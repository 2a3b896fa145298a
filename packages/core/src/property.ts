import { inspect } from "node:util";

import { DepthExceededError, DiscardError, InputTimeoutError, type Gen } from "@sweepcheck/rand";

import type { RunEnvironment } from "./environment.js";
import { ProgressLevel, type Outcome } from "./outcome.js";
import { describeError, qualifiedName, type TestCase } from "./registry.js";

export const DEFAULT_RUNS = 100;
export const DEFAULT_MAX_DISCARD_RATIO = 10;

export interface PropertyDefinition<T> {
  readonly suite: string;
  readonly name: string;
  readonly arbitrary: Gen<T>;
  /** Returning `false` or throwing marks the input as a counterexample. */
  readonly predicate: (input: T) => boolean | void;
  readonly runs?: number;
  readonly maxDiscardRatio?: number;
}

const ensurePositive = (field: string, value: number): number => {
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new RangeError(`${field} must be a positive integer, received ${value}`);
  }
  return value;
};

const describeFailure = <T>(predicate: (input: T) => boolean | void, input: T): string | undefined => {
  try {
    return predicate(input) === false ? "property returned false" : undefined;
  } catch (error) {
    return describeError(error);
  }
};

const isDiscard = (error: unknown): boolean =>
  error instanceof DiscardError || error instanceof DepthExceededError;

/**
 * Adapts a generator and a predicate into a test case. Each run draws a
 * fresh input from the shared stream, so replaying from a checkpoint
 * regenerates the same inputs in the same order.
 */
export function defineProperty<T>(env: RunEnvironment, definition: PropertyDefinition<T>): TestCase {
  const runs = ensurePositive("runs", definition.runs ?? DEFAULT_RUNS);
  const discardLimit = runs * ensurePositive("maxDiscardRatio", definition.maxDiscardRatio ?? DEFAULT_MAX_DISCARD_RATIO);
  const { arbitrary, predicate } = definition;

  const testCase: TestCase = {
    suite: definition.suite,
    name: definition.name,
    test: {
      run(progress, trap): Outcome {
        let passed = 0;
        let discards = 0;
        const finish = (outcome: Outcome): Outcome => {
          if (progress === ProgressLevel.All) {
            env.reporter.caseProgress(testCase, passed, discards);
          } else if (progress === ProgressLevel.Final) {
            env.reporter.caseTotals(testCase, passed, discards);
          }
          return outcome;
        };

        while (passed < runs) {
          let input: T;
          try {
            env.random.beginInput();
            input = arbitrary.generate(env.random);
          } catch (error) {
            if (error instanceof InputTimeoutError) {
              env.logger.warn(`${qualifiedName(testCase)}: ${error.message}`);
              return finish("gen-fail");
            }
            if (!isDiscard(error)) {
              throw error;
            }
            discards += 1;
            if (discards > discardLimit) {
              return finish(passed === 0 ? "gen-fail" : "pass");
            }
            continue;
          }

          const failure = describeFailure(predicate, input);
          if (failure !== undefined) {
            env.logger.error(`${qualifiedName(testCase)} failed after ${passed} passing runs: ${failure}`);
            env.logger.error(`counterexample: ${inspect(input, { depth: null, breakLength: Infinity })}`);
            if (trap) {
              env.trap();
            }
            return finish("fail");
          }
          passed += 1;
        }
        return finish("pass");
      },
    },
  };
  return testCase;
}
