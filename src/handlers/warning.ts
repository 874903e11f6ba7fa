/**
 * Warning handler - writes the message text to the diagnostic stream
 */

import type { LogHandler } from "./types.js";
import type { DiagnosticStream, HandlerOutcome, LogMessage } from "../types.js";

export class WarningHandler implements LogHandler {
  readonly name = "warning";
  readonly severity = "warning";

  constructor(private stream: DiagnosticStream = process.stderr) {}

  canHandle(message: LogMessage): boolean {
    return message.severity === this.severity;
  }

  handle(message: LogMessage): HandlerOutcome {
    this.stream.write(message.text + "\n");
    return { kind: "handled" };
  }
}
