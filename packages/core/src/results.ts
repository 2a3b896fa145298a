import type { Checkpoint } from "@sweepcheck/rand";

import { mergeOutcome, type Outcome } from "./outcome.js";

export interface Tally {
  readonly cases: number;
  readonly passed: number;
  readonly failed: number;
  readonly errored: number;
  readonly skipped: number;
}

interface Slot {
  outcome: Outcome;
  checkpoint?: Checkpoint;
}

export function tally(outcomes: Iterable<Outcome>): Tally {
  let cases = 0;
  let passed = 0;
  let failed = 0;
  let errored = 0;
  let skipped = 0;
  for (const outcome of outcomes) {
    cases += 1;
    switch (outcome) {
      case "pass":
        passed += 1;
        break;
      case "fail":
        failed += 1;
        break;
      case "gen-fail":
        errored += 1;
        break;
      case "skip":
        skipped += 1;
        break;
    }
  }
  return { cases, passed, failed, errored, skipped };
}

export const exitCodeFor = (result: Tally): 0 | 1 =>
  result.failed === 0 && result.errored === 0 ? 0 : 1;

/**
 * Per-slot outcomes and checkpoints accumulated across sweeps. Every slot
 * starts as `skip`; `fail` is terminal.
 */
export class ResultTable {
  private readonly slots: Slot[];

  constructor(size: number) {
    this.slots = Array.from({ length: size }, (): Slot => ({ outcome: "skip" }));
  }

  get size(): number {
    return this.slots.length;
  }

  outcome(index: number): Outcome {
    return this.slot(index).outcome;
  }

  isFrozen(index: number): boolean {
    return this.slot(index).outcome === "fail";
  }

  /** Applies the merge rule and returns the outcome now stored in the slot. */
  record(index: number, outcome: Outcome): Outcome {
    const slot = this.slot(index);
    if (slot.outcome === "fail") {
      throw new Error(`slot ${index} already failed and cannot be updated`);
    }
    slot.outcome = mergeOutcome(slot.outcome, outcome);
    return slot.outcome;
  }

  saveCheckpoint(index: number, checkpoint: Checkpoint): void {
    this.slot(index).checkpoint = checkpoint;
  }

  checkpoint(index: number): Checkpoint | undefined {
    return this.slot(index).checkpoint;
  }

  outcomes(): Outcome[] {
    return this.slots.map((slot) => slot.outcome);
  }

  tally(): Tally {
    return tally(this.outcomes());
  }

  private slot(index: number): Slot {
    const slot = this.slots[index];
    if (!slot) {
      throw new RangeError(`no result slot at index ${index}`);
    }
    return slot;
  }
}
