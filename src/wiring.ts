/**
 * Standard chain wiring: fatal -> error file -> warning -> catch-all
 */

import { HandlerChain } from "./chain.js";
import { ErrorFileHandler } from "./handlers/error-file.js";
import { FatalErrorHandler } from "./handlers/fatal.js";
import { UnclassifiedHandler } from "./handlers/unclassified.js";
import { WarningHandler } from "./handlers/warning.js";
import type { LogHandler } from "./handlers/types.js";
import type { DiagnosticStream } from "./types.js";
import type { Logger } from "./logger.js";

export interface DefaultChainOptions {
  /** Required; never defaulted */
  errorLogPath: string;
  /** Close the chain with the unclassified catch-all (default true) */
  catchAll?: boolean;
  /** Where warnings go (default process.stderr) */
  diagnostics?: DiagnosticStream;
  /** Receives the error handler's degraded-write warnings */
  logger?: Logger;
}

export function createDefaultHandlers(options: DefaultChainOptions): LogHandler[] {
  const handlers: LogHandler[] = [
    new FatalErrorHandler(),
    new ErrorFileHandler(options.errorLogPath, options.logger),
    new WarningHandler(options.diagnostics),
  ];
  if (options.catchAll ?? true) {
    handlers.push(new UnclassifiedHandler());
  }
  return handlers;
}

export function createDefaultChain(options: DefaultChainOptions): HandlerChain {
  return new HandlerChain(createDefaultHandlers(options));
}
