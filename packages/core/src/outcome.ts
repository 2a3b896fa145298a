export type Outcome = "pass" | "fail" | "gen-fail" | "skip";

export const OUTCOMES: readonly Outcome[] = ["pass", "fail", "gen-fail", "skip"];

export const OUTCOME_LABELS: Readonly<Record<Outcome, string>> = {
  pass: "PASSED",
  fail: "FAILED",
  "gen-fail": "FAILED TO GENERATE VALID INPUT",
  skip: "SKIPPED",
};

export const ProgressLevel = {
  None: 0,
  Final: 1,
  All: 2,
} as const;
export type ProgressLevel = (typeof ProgressLevel)[keyof typeof ProgressLevel];

export const isProgressLevel = (value: number): value is ProgressLevel =>
  value === ProgressLevel.None || value === ProgressLevel.Final || value === ProgressLevel.All;

/**
 * A generation failure never hides a pass already recorded for the slot.
 */
export function mergeOutcome(previous: Outcome, next: Outcome): Outcome {
  if (previous === "pass" && next === "gen-fail") {
    return previous;
  }
  return next;
}
