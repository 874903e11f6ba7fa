/**
 * Fatal error handler - aborts the dispatch with the message text as description
 */

import type { LogHandler } from "./types.js";
import type { HandlerOutcome, LogMessage } from "../types.js";

export class FatalErrorHandler implements LogHandler {
  readonly name = "fatal-error";
  readonly severity = "fatal-error";

  canHandle(message: LogMessage): boolean {
    return message.severity === this.severity;
  }

  handle(message: LogMessage): HandlerOutcome {
    return { kind: "failed", reason: message.text };
  }
}
