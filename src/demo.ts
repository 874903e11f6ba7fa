/**
 * Demo run - sends one message of each severity through a chain and
 * reports what each one did.
 */

import { readFileSync } from "fs";
import { DispatchFailure } from "./errors.js";
import { createLogMessage } from "./log-message.js";
import type { HandlerChain } from "./chain.js";
import type { Logger } from "./logger.js";
import type { Severity } from "./types.js";

const DEMO_MESSAGES: ReadonlyArray<{ severity: Severity; text: string }> = [
  { severity: "unclassified", text: "some unknown message" },
  { severity: "warning", text: "real warning" },
  { severity: "error", text: "some_error" },
  { severity: "fatal-error", text: "fatal error" },
];

/**
 * First whitespace-delimited word of the file, or "" if it can't be read
 */
export function readFirstWord(path: string): string {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch {
    return "";
  }
  return content.trim().split(/\s+/)[0] ?? "";
}

export function runDemo(chain: HandlerChain, errorLogPath: string, out: Logger): void {
  for (const { severity, text } of DEMO_MESSAGES) {
    try {
      chain.handle(createLogMessage(severity, text));
    } catch (err) {
      if (!(err instanceof DispatchFailure)) throw err;
      out.log(err.message);
      continue;
    }

    if (severity === "error") {
      out.log(`Error = ${readFirstWord(errorLogPath)}`);
    }
  }
}
