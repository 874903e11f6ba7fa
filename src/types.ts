/**
 * Core types for logrelay
 */

// === Messages ===

/** Closed set of severities; each handler variant claims exactly one */
export const SEVERITIES = ["warning", "error", "fatal-error", "unclassified"] as const;

export type Severity = (typeof SEVERITIES)[number];

export interface LogMessage {
  readonly severity: Severity;
  readonly text: string;
}

// === Handlers ===

export type HandlerOutcome =
  | { kind: "handled" }
  | { kind: "failed"; reason: string };

/** Anything the warning handler can write to; process.stderr by default */
export interface DiagnosticStream {
  write(chunk: string): unknown;
}

// === Configuration ===

export interface RelayConfig {
  /** Target of the error handler, truncated on every write */
  errorLogPath: string;
  /** Whether the unclassified catch-all closes the chain */
  catchAll: boolean;
}
