/**
 * Unclassified (catch-all) handler
 *
 * Makes "no specific handler took this" loud. Without it at the tail,
 * unmatched messages fall off the end of the chain silently.
 */

import type { LogHandler } from "./types.js";
import type { HandlerOutcome, LogMessage } from "../types.js";

export const UNPROCESSED_PREFIX = "Unprocessed message: ";

export class UnclassifiedHandler implements LogHandler {
  readonly name = "unclassified";
  readonly severity = "unclassified";

  canHandle(message: LogMessage): boolean {
    return message.severity === this.severity;
  }

  handle(message: LogMessage): HandlerOutcome {
    return { kind: "failed", reason: UNPROCESSED_PREFIX + message.text };
  }
}
