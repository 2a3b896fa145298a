import type { JSONSchemaType } from "ajv";
import type { GeneratorTuning } from "@sweepcheck/rand";

export interface RunOptions {
  readonly seed?: string;
  readonly loggingLevel?: number;
  readonly progressLevel?: number;
  readonly inputTimeout?: number;
  readonly untilTimeout?: number;
  readonly exitFast?: boolean;
  readonly trap?: boolean;
  readonly maxTestCases?: number;
  readonly tuning?: Partial<GeneratorTuning>;
}

const count = (minimum: number) =>
  ({ type: "integer", minimum, maximum: Number.MAX_SAFE_INTEGER, nullable: true }) as const;

export const runOptionsSchema: JSONSchemaType<RunOptions> = {
  $id: "https://sweepcheck.dev/schema/run-options.json",
  type: "object",
  additionalProperties: false,
  required: [],
  properties: {
    seed: { type: "string", pattern: "^(0[xX])?[0-9a-fA-F]{1,16}$", nullable: true },
    loggingLevel: { type: "integer", minimum: 0, maximum: 3, nullable: true },
    progressLevel: { type: "integer", minimum: 0, maximum: 2, nullable: true },
    inputTimeout: count(0),
    untilTimeout: count(0),
    exitFast: { type: "boolean", nullable: true },
    trap: { type: "boolean", nullable: true },
    maxTestCases: count(0),
    tuning: {
      type: "object",
      additionalProperties: false,
      required: [],
      nullable: true,
      properties: {
        maxDepth: count(0),
        maxSize: count(1),
        nullInEvery: count(1),
        sizedNull: { type: "boolean", nullable: true },
        allowedDepthFailures: count(0),
        allowedSizeSplitBacktracks: count(0),
      },
    },
  },
};
