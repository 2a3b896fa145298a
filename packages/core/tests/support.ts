import { SeededStream } from "@sweepcheck/rand";

import { createRunEnvironment, type RunEnvironment } from "../src/environment.js";
import type { Outcome, ProgressLevel } from "../src/outcome.js";
import type { RunnableTest } from "../src/registry.js";

export interface Capture {
  readonly sink: (chunk: string) => void;
  text(): string;
}

export function capture(): Capture {
  const chunks: string[] = [];
  return {
    sink: (chunk) => {
      chunks.push(chunk);
    },
    text: () => chunks.join(""),
  };
}

export interface FakeClock {
  readonly now: () => number;
  advance(ms: number): void;
}

export function fakeClock(start = 0): FakeClock {
  let current = start;
  return {
    now: () => current,
    advance(ms) {
      current += ms;
    },
  };
}

export interface ScriptedTest extends RunnableTest {
  readonly calls: Array<{ readonly progress: ProgressLevel; readonly trap: boolean }>;
}

/** Returns the scripted outcomes in order, repeating the last one. */
export function scripted(outcomes: readonly Outcome[], onRun?: () => void): ScriptedTest {
  const calls: Array<{ progress: ProgressLevel; trap: boolean }> = [];
  return {
    calls,
    run(progress, trap) {
      calls.push({ progress, trap });
      onRun?.();
      const outcome = outcomes[Math.min(calls.length - 1, outcomes.length - 1)];
      if (outcome === undefined) {
        throw new Error("scripted test needs at least one outcome");
      }
      return outcome;
    },
  };
}

export interface TestEnv {
  readonly env: RunEnvironment;
  readonly output: Capture;
  readonly clock: FakeClock;
}

export function testEnv(trap: () => void = () => {}): TestEnv {
  const output = capture();
  const clock = fakeClock(10_000);
  const env = createRunEnvironment({
    sink: output.sink,
    random: new SeededStream({ clock: clock.now }),
    trap,
  });
  return { env, output, clock };
}
