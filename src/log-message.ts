/**
 * Log message construction and severity parsing
 */

import { SEVERITIES, type LogMessage, type Severity } from "./types.js";

const SEVERITY_ALIASES = new Map<string, Severity>([
  ["fatal", "fatal-error"],
  ["unknown", "unclassified"],
]);

export function isSeverity(value: unknown): value is Severity {
  return typeof value === "string" && SEVERITIES.some((s) => s === value);
}

/**
 * Parses user input into a severity. Case-insensitive, accepts
 * "fatal" and "unknown" as aliases. Returns null if unrecognized.
 */
export function parseSeverity(input: string): Severity | null {
  const normalized = input.trim().toLowerCase();
  if (isSeverity(normalized)) return normalized;
  return SEVERITY_ALIASES.get(normalized) ?? null;
}

/**
 * Creates an immutable log message
 */
export function createLogMessage(severity: Severity, text: string): LogMessage {
  // Guards callers that bypass the type system (parsed JSON, plain JS)
  if (!isSeverity(severity)) {
    throw new TypeError(`Unknown severity: ${String(severity)}`);
  }
  return Object.freeze({ severity, text });
}
