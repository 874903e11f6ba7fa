/**
 * Logger interface — operational output of the relay itself.
 *
 * This is not the dispatch chain: it carries degraded file writes
 * and what the CLI prints.
 * - ConsoleLogger (default) writes to stdout/stderr
 * - MemoryLogger keeps entries in a list for tests and callers that render them later
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }
  warn(message: string): void {
    console.warn(message);
  }
  error(message: string): void {
    console.error(message);
  }
}

export interface LogEntry {
  level: "log" | "warn" | "error";
  text: string;
}

export class MemoryLogger implements Logger {
  private entries: LogEntry[] = [];

  log(message: string): void {
    this.entries.push({ level: "log", text: message });
  }

  warn(message: string): void {
    this.entries.push({ level: "warn", text: message });
  }

  error(message: string): void {
    this.entries.push({ level: "error", text: message });
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  /** Entry texts at one level, in order */
  lines(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.text);
  }
}
