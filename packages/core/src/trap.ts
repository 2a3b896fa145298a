import inspector from "node:inspector";

import type { Logger } from "./logging.js";

export type Trap = () => void;

/**
 * Breaks into an attached debugger. Without an inspector session a
 * `debugger` statement is a no-op, so the request is logged instead.
 */
export function createTrap(logger: Logger, isAttached: () => boolean = () => inspector.url() !== undefined): Trap {
  if (!isAttached()) {
    return () => {
      logger.warn("trap requested but no debugger is attached (run node with --inspect)");
    };
  }
  return () => {
    // eslint-disable-next-line no-debugger
    debugger;
  };
}
