#!/usr/bin/env node
import { exit } from "node:process";

import { runMain } from "@sweepcheck/core";

import { registerExamples } from "./properties.js";

function main(): void {
  const exitCode = runMain({ argv: process.argv.slice(2), setup: registerExamples });
  exit(exitCode);
}

if (!process.env.VITEST) {
  main();
}
