/**
 * Errors raised by the dispatch chain
 */

import type { Severity } from "./types.js";

/**
 * Hard failure raised when a terminal handler claims a message.
 * `message` is the description callers show; `text` is the original payload.
 */
export class DispatchFailure extends Error {
  constructor(
    description: string,
    readonly severity: Severity,
    readonly handler: string,
    readonly text: string
  ) {
    super(description);
    this.name = "DispatchFailure";
  }
}

/** Chain wiring mistake: duplicate handler instance or a cycle */
export class ChainConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ChainConfigError";
  }
}
