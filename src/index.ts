/**
 * logrelay
 * Severity-based dispatch of log messages through a handler chain
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./log-message.js";
export * from "./handlers/index.js";
export { HandlerChain, type DispatchResult } from "./chain.js";
export { ChainLink, linkHandlers } from "./chain-link.js";
export { createDefaultChain, createDefaultHandlers, type DefaultChainOptions } from "./wiring.js";
export { ConsoleLogger, MemoryLogger, type Logger, type LogEntry } from "./logger.js";
export * from "./config.js";
export { runDemo } from "./demo.js";
