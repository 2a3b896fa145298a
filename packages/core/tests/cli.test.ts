import { describe, expect, it } from "vitest";

import { ConfigError, HELP_TEXT, parseRunArgs, runMain } from "../src/index.js";
import { capture, scripted, testEnv } from "./support.js";

describe("parseRunArgs", () => {
  it("maps every flag onto run options", () => {
    const parsed = parseRunArgs([
      "-S",
      "ff",
      "--logging-level",
      "3",
      "--progress-level=1",
      "--input-timeout",
      "250",
      "--until-timeout",
      "30",
      "--exit-fast",
      "--trap",
      "--max-test-cases",
      "50",
      "--max-stack-depth",
      "12",
      "--max-generator-size=4",
      "--null-in-every",
      "7",
      "--sized-null",
      "--allowed-depth-failures",
      "2",
      "--allowed-size-split-backtracks",
      "9",
    ]);
    expect(parsed).toEqual({
      help: false,
      options: {
        seed: "ff",
        loggingLevel: 3,
        progressLevel: 1,
        inputTimeout: 250,
        untilTimeout: 30,
        exitFast: true,
        trap: true,
        maxTestCases: 50,
        tuning: {
          maxDepth: 12,
          maxSize: 4,
          nullInEvery: 7,
          sizedNull: true,
          allowedDepthFailures: 2,
          allowedSizeSplitBacktracks: 9,
        },
      },
    });
  });

  it("returns empty options for no arguments", () => {
    expect(parseRunArgs([])).toEqual({ help: false, options: {} });
  });

  it("rejects a zero generator size", () => {
    expect(() => parseRunArgs(["--max-generator-size", "0"])).toThrow("--max-generator-size must be nonzero");
  });

  it("rejects missing values, non-integers and unknown flags", () => {
    expect(() => parseRunArgs(["--seed"])).toThrow("missing value for --seed");
    expect(() => parseRunArgs(["--input-timeout", "--exit-fast"])).toThrow("missing value for --input-timeout");
    expect(() => parseRunArgs(["--until-timeout", "soon"])).toThrow("--until-timeout expects an integer, received soon");
    expect(() => parseRunArgs(["--verbose"])).toThrow(ConfigError);
    expect(() => parseRunArgs(["--trap=yes"])).toThrow("flag --trap does not take a value");
  });

  it("rejects integers beyond the safe range", () => {
    expect(() => parseRunArgs(["--input-timeout", "99999999999999999999"])).toThrow(
      "--input-timeout is out of range, received 99999999999999999999",
    );
    expect(() => parseRunArgs(["--max-stack-depth=9007199254740993"])).toThrow(ConfigError);
  });

  it("reads a negative number as a value rather than a flag", () => {
    expect(parseRunArgs(["--logging-level", "-1"]).options).toEqual({ loggingLevel: -1 });
  });

  it("recognises help", () => {
    expect(parseRunArgs(["-h"]).help).toBe(true);
  });
});

describe("runMain", () => {
  it("runs the registered cases and returns the exit code", () => {
    const harness = testEnv();
    const code = runMain({
      argv: ["--seed", "2a", "--progress-level", "0"],
      env: harness.env,
      output: harness.output.sink,
      setup: (registry) => {
        registry.register("unit", "A", scripted(["pass"]));
      },
    });

    expect(code).toBe(0);
    expect(harness.output.text()).toBe(
      "Using seed: 000000000000002a\n" +
        "\nTesting Summary:\n" +
        "cases: 1, passed: 1, failed: 0, errored: 0, skipped: 0\n",
    );
  });

  it("fails the run when a case fails to generate input", () => {
    const harness = testEnv();
    const code = runMain({
      argv: ["-S", "1", "--progress-level", "0"],
      env: harness.env,
      output: harness.output.sink,
      setup: (registry) => {
        registry.register("unit", "B", scripted(["gen-fail"]));
      },
    });
    expect(code).toBe(1);
  });

  it("aborts before running anything when the registry overflows", () => {
    const harness = testEnv();
    const cases = Array.from({ length: 1001 }, () => scripted(["pass"]));
    const code = runMain({
      argv: [],
      env: harness.env,
      output: harness.output.sink,
      defaultSeed: () => 1n,
      setup: (registry) => {
        cases.forEach((test, index) => registry.register("bulk", `case-${index}`, test));
      },
    });

    expect(code).toBe(1);
    expect(harness.output.text()).toBe("Tried to register too many tests.\n");
    expect(cases.every((test) => test.calls.length === 0)).toBe(true);
  });

  it("uses the configured registry capacity", () => {
    const harness = testEnv();
    const code = runMain({
      argv: ["--max-test-cases", "1"],
      env: harness.env,
      output: harness.output.sink,
      setup: (registry) => {
        registry.register("s", "a", scripted(["pass"]));
        registry.register("s", "b", scripted(["pass"]));
      },
    });
    expect(code).toBe(1);
    expect(harness.output.text()).toBe("Tried to register too many tests.\n");
  });

  it("reports rejected options with exit code 1", () => {
    const errors = capture();
    const code = runMain({
      argv: ["--progress-level", "5"],
      errors: errors.sink,
      output: capture().sink,
      setup: () => {
        throw new Error("setup must not run");
      },
    });
    expect(code).toBe(1);
    expect(errors.text()).toBe("invalid run options: data/progressLevel must be <= 2\n");
  });

  it("aborts on a zero generator size", () => {
    const errors = capture();
    const code = runMain({
      argv: ["--max-generator-size", "0"],
      errors: errors.sink,
      output: capture().sink,
      setup: () => {
        throw new Error("setup must not run");
      },
    });
    expect(code).toBe(1);
    expect(errors.text()).toBe("--max-generator-size must be nonzero\n");
  });

  it("reports an out-of-range value instead of crashing", () => {
    const errors = capture();
    const timeout = runMain({ argv: ["--input-timeout", "99999999999999999999"], errors: errors.sink, setup: () => {} });
    const level = runMain({ argv: ["--logging-level", "-1"], errors: errors.sink, setup: () => {} });
    expect([timeout, level]).toEqual([1, 1]);
    expect(errors.text()).toBe(
      "--input-timeout is out of range, received 99999999999999999999\n" +
        "invalid run options: data/loggingLevel must be >= 0\n",
    );
  });

  it("prints usage for --help", () => {
    const output = capture();
    const code = runMain({ argv: ["--help"], output: output.sink, setup: () => {} });
    expect(code).toBe(0);
    expect(output.text()).toBe(`${HELP_TEXT}\n`);
  });
});
