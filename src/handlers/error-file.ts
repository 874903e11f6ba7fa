/**
 * Error File Handler - keeps the latest error message in a single-line file
 *
 * The target is truncated when the handler is constructed, and every
 * error message overwrites it with `<text>\n`.
 *
 * A target that cannot be opened does not fail the dispatch: the message
 * still counts as handled and the write is skipped. The skip is reported
 * through the logger as a warning.
 */

import { writeFileSync } from "fs";
import type { LogHandler } from "./types.js";
import type { HandlerOutcome, LogMessage } from "../types.js";
import { ConsoleLogger, type Logger } from "../logger.js";

export class ErrorFileHandler implements LogHandler {
  readonly name = "error";
  readonly severity = "error";

  constructor(
    readonly filePath: string,
    private logger: Logger = new ConsoleLogger()
  ) {
    const failure = this.write("");
    if (failure) {
      this.logger.warn(`[error-file] Could not truncate ${this.filePath}: ${failure}`);
    }
  }

  canHandle(message: LogMessage): boolean {
    return message.severity === this.severity;
  }

  handle(message: LogMessage): HandlerOutcome {
    const failure = this.write(message.text + "\n");
    if (failure) {
      this.logger.warn(`[error-file] Could not write to ${this.filePath}: ${failure}`);
    }
    return { kind: "handled" };
  }

  /**
   * Opens in truncate mode, writes, closes.
   * Returns the failure reason, or null on success.
   */
  private write(content: string): string | null {
    try {
      writeFileSync(this.filePath, content, { encoding: "utf-8", flag: "w" });
      return null;
    } catch (err) {
      return err instanceof Error ? err.message : String(err);
    }
  }
}
