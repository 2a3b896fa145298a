import type { Logger } from "./logging.js";
import type { Outcome, ProgressLevel } from "./outcome.js";

export const DEFAULT_MAX_TEST_CASES = 1000;

export interface RunnableTest {
  run(progress: ProgressLevel, trap: boolean): Outcome;
}

export interface TestCase {
  readonly suite: string;
  readonly name: string;
  readonly test: RunnableTest;
}

export class RegistryOverflowError extends Error {
  readonly capacity: number;

  constructor(capacity: number) {
    super("Tried to register too many tests.");
    this.name = "RegistryOverflowError";
    this.capacity = capacity;
  }
}

const ensureLabel = (kind: string, value: string): string => {
  if (value.trim().length === 0) {
    throw new Error(`test ${kind} must not be empty`);
  }
  return value;
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? `${error.name}: ${error.message}` : String(error);

export const qualifiedName = (testCase: Pick<TestCase, "suite" | "name">): string =>
  `${testCase.suite}::${testCase.name}`;

/** Append-only table of test cases, visited by the runner in insertion order. */
export class TestRegistry {
  readonly capacity: number;
  private readonly entries: TestCase[] = [];

  constructor(capacity: number = DEFAULT_MAX_TEST_CASES) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError(`registry capacity must be a non-negative integer, received ${capacity}`);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.length;
  }

  register(suite: string, name: string, test: RunnableTest): TestCase {
    return this.add({ suite, name, test });
  }

  add(testCase: TestCase): TestCase {
    if (this.entries.length >= this.capacity) {
      throw new RegistryOverflowError(this.capacity);
    }
    const entry: TestCase = Object.freeze({
      suite: ensureLabel("suite", testCase.suite),
      name: ensureLabel("name", testCase.name),
      test: testCase.test,
    });
    this.entries.push(entry);
    return entry;
  }

  cases(): readonly TestCase[] {
    return [...this.entries];
  }
}

/** Runs a test; a thrown error counts as a failure and is logged. */
export function invokeTest(
  testCase: TestCase,
  progress: ProgressLevel,
  trap: boolean,
  logger: Logger,
): Outcome {
  try {
    return testCase.test.run(progress, trap);
  } catch (error) {
    logger.error(`${qualifiedName(testCase)} threw ${describeError(error)}`);
    return "fail";
  }
}
