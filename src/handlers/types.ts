/**
 * Log Handler Interface
 *
 * Each handler claims exactly one severity. The chain routes a message
 * to the first handler whose canHandle() matches; that handler's outcome
 * ends the dispatch.
 */

import type { HandlerOutcome, LogMessage, Severity } from "../types.js";

export interface LogHandler {
  /** Unique name for logging and removal */
  readonly name: string;

  /** The one severity this handler claims */
  readonly severity: Severity;

  /** Check if this handler should process the message */
  canHandle(message: LogMessage): boolean;

  /** Perform the side effect. Only called when canHandle() returned true */
  handle(message: LogMessage): HandlerOutcome;
}
