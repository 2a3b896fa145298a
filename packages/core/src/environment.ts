import { SeededStream, type Clock } from "@sweepcheck/rand";

import { Logger, stdoutSink, type Sink } from "./logging.js";
import { ConsoleReporter, type Reporter } from "./reporter.js";
import { createTrap, type Trap } from "./trap.js";

/** Collaborators shared by the run loop and the properties it executes. */
export interface RunEnvironment {
  readonly random: SeededStream;
  readonly logger: Logger;
  readonly reporter: Reporter;
  readonly trap: Trap;
}

export interface RunEnvironmentInit {
  readonly sink?: Sink;
  readonly clock?: Clock;
  readonly random?: SeededStream;
  readonly logger?: Logger;
  readonly reporter?: Reporter;
  readonly trap?: Trap;
}

export function createRunEnvironment(init: RunEnvironmentInit = {}): RunEnvironment {
  const sink = init.sink ?? stdoutSink;
  const logger = init.logger ?? new Logger(sink);
  return {
    random: init.random ?? new SeededStream({ clock: init.clock }),
    logger,
    reporter: init.reporter ?? new ConsoleReporter(sink),
    trap: init.trap ?? createTrap(logger),
  };
}
