import { describe, expect, it } from "vitest";
import { DEFAULT_TUNING } from "@sweepcheck/rand";

import { ConfigError, createRunConfig, formatSeed, parseSeed, randomSeed } from "../src/index.js";

describe("createRunConfig", () => {
  it("fills in defaults", () => {
    expect(createRunConfig({}, () => 7n)).toEqual({
      seed: 7n,
      loggingLevel: 1,
      progressLevel: 2,
      inputTimeout: 5000,
      untilTimeout: 0,
      exitFast: false,
      trap: false,
      maxTestCases: 1000,
      tuning: DEFAULT_TUNING,
    });
  });

  it("returns a frozen configuration", () => {
    const config = createRunConfig({ tuning: { maxSize: 8 } }, () => 1n);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.tuning)).toBe(true);
    expect(config.tuning.maxSize).toBe(8);
    expect(config.tuning.maxDepth).toBe(DEFAULT_TUNING.maxDepth);
  });

  it("parses hex seeds with or without a prefix", () => {
    expect(createRunConfig({ seed: "0xFF" }).seed).toBe(255n);
    expect(createRunConfig({ seed: "ffffffffffffffff" }).seed).toBe(0xffffffffffffffffn);
  });

  it("rejects malformed seeds", () => {
    expect(() => createRunConfig({ seed: "xyz" })).toThrow(ConfigError);
    expect(() => parseSeed("12345678901234567")).toThrow("seed must be at most 16 hex digits");
  });

  it("rejects a zero generator size", () => {
    expect(() => createRunConfig({ tuning: { maxSize: 0 } })).toThrow(/tuning\/maxSize must be >= 1/);
  });

  it("rejects out-of-range levels", () => {
    expect(() => createRunConfig({ progressLevel: 3 })).toThrow(/progressLevel must be <= 2/);
    expect(() => createRunConfig({ loggingLevel: -1 })).toThrow(/loggingLevel must be >= 0/);
  });

  it("rejects negative timeouts", () => {
    expect(() => createRunConfig({ untilTimeout: -1 })).toThrow(ConfigError);
  });

  it("rejects counts beyond the safe integer range", () => {
    expect(() => createRunConfig({ inputTimeout: 2 ** 53 })).toThrow(
      "invalid run options: data/inputTimeout must be <= 9007199254740991",
    );
    expect(() => createRunConfig({ tuning: { maxDepth: 2 ** 60 } })).toThrow(ConfigError);
  });
});

describe("seeds", () => {
  it("derives the default seed from one draw of a clock-seeded stream", () => {
    expect(randomSeed(() => 0)).toBe(0xe220a8397b1dcdafn);
  });

  it("formats seeds as 16 hex digits", () => {
    expect(formatSeed(0x2an)).toBe("000000000000002a");
    expect(formatSeed(0xffffffffffffffffn)).toBe("ffffffffffffffff");
  });
});
