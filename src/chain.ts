/**
 * Handler Chain - ordered dispatch of log messages
 *
 * Handlers are kept in registration order; the first one whose
 * canHandle() matches takes the message and dispatch stops there.
 * A message no handler claims is dropped without error or side effect;
 * reporting a drop is up to the caller.
 */

import type { LogHandler } from "./handlers/types.js";
import type { LogMessage } from "./types.js";
import { ChainConfigError, DispatchFailure } from "./errors.js";

export type DispatchResult =
  | { status: "handled"; handler: string }
  | { status: "failed"; handler: string; failure: DispatchFailure }
  | { status: "dropped" };

/**
 * Runs a handler that already matched and turns its outcome into a result
 */
export function runHandler(handler: LogHandler, message: LogMessage): DispatchResult {
  const outcome = handler.handle(message);
  if (outcome.kind === "handled") {
    return { status: "handled", handler: handler.name };
  }
  return {
    status: "failed",
    handler: handler.name,
    failure: new DispatchFailure(outcome.reason, message.severity, handler.name, message.text),
  };
}

/**
 * Throws the failure of a failed result, passes the others through
 */
export function unwrapResult(result: DispatchResult): DispatchResult {
  if (result.status === "failed") {
    throw result.failure;
  }
  return result;
}

export class HandlerChain {
  private chain: LogHandler[] = [];

  constructor(handlers: LogHandler[] = []) {
    for (const handler of handlers) {
      this.register(handler);
    }
  }

  /**
   * Register a handler (order matters - first match wins)
   */
  register(handler: LogHandler): this {
    if (this.chain.includes(handler)) {
      throw new ChainConfigError(`Handler ${handler.name} is already in the chain`);
    }
    this.chain.push(handler);
    return this;
  }

  /**
   * Removes the first handler with the given name.
   * Returns true if removed, false if not found
   */
  remove(name: string): boolean {
    const index = this.chain.findIndex((h) => h.name === name);
    if (index === -1) return false;
    this.chain.splice(index, 1);
    return true;
  }

  get handlers(): readonly LogHandler[] {
    return this.chain;
  }

  /**
   * Route a message through the chain and report what happened
   */
  dispatch(message: LogMessage): DispatchResult {
    for (const handler of this.chain) {
      if (handler.canHandle(message)) {
        return runHandler(handler, message);
      }
    }
    return { status: "dropped" };
  }

  /**
   * Like dispatch(), but a terminal failure is thrown as DispatchFailure
   */
  handle(message: LogMessage): DispatchResult {
    return unwrapResult(this.dispatch(message));
  }
}
