import { formatSeed } from "./config.js";
import { stdoutSink, type Sink } from "./logging.js";
import { OUTCOME_LABELS, type Outcome } from "./outcome.js";
import { qualifiedName, type TestCase } from "./registry.js";
import type { Tally } from "./results.js";

export interface Reporter {
  deadline(seconds: number): void;
  seed(seed: bigint): void;
  caseStarted(testCase: TestCase): void;
  caseProgress(testCase: TestCase, runs: number, discards: number): void;
  caseTotals(testCase: TestCase, runs: number, discards: number): void;
  caseFinished(testCase: TestCase, outcome: Outcome): void;
  replayFinished(testCase: TestCase): void;
  rerunning(secondsRemaining: number): void;
  summary(result: Tally): void;
}

export const progressLine = (testCase: TestCase, runs: number, discards: number): string => {
  const label = `Testing ${qualifiedName(testCase)}:`;
  if (runs === 0 && discards === 0) {
    return label;
  }
  if (discards === 0) {
    return `${label} ${runs} runs`;
  }
  return `${label} ${runs} runs; ${discards} discarded`;
};

export const summaryLine = (result: Tally): string =>
  `cases: ${result.cases}, passed: ${result.passed}, failed: ${result.failed}, ` +
  `errored: ${result.errored}, skipped: ${result.skipped}`;

export class ConsoleReporter implements Reporter {
  private readonly write: Sink;

  constructor(write: Sink = stdoutSink) {
    this.write = write;
  }

  deadline(seconds: number): void {
    this.write(`Running until timeout of ${seconds} seconds\n`);
  }

  seed(seed: bigint): void {
    this.write(`Using seed: ${formatSeed(seed)}\n`);
  }

  caseStarted(testCase: TestCase): void {
    this.write(progressLine(testCase, 0, 0));
  }

  caseProgress(testCase: TestCase, runs: number, discards: number): void {
    this.write(`\r${progressLine(testCase, runs, discards)}`);
  }

  /** Final counts when no start line was written to overwrite. */
  caseTotals(testCase: TestCase, runs: number, discards: number): void {
    this.write(progressLine(testCase, runs, discards));
  }

  caseFinished(_testCase: TestCase, outcome: Outcome): void {
    this.write(`\n${OUTCOME_LABELS[outcome]}\n`);
  }

  replayFinished(_testCase: TestCase): void {
    this.write("\n\n");
  }

  rerunning(secondsRemaining: number): void {
    this.write(`\n${secondsRemaining} seconds remaining, rerunning tests\n\n`);
  }

  summary(result: Tally): void {
    this.write(`\nTesting Summary:\n${summaryLine(result)}\n`);
  }
}
