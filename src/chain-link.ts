/**
 * Linked form of the handler chain.
 *
 * Each link holds one handler and at most one successor. Handlers can be
 * built and wired independently; dispatch starts at the head and forwards
 * by calling the successor directly.
 */

import type { LogHandler } from "./handlers/types.js";
import type { LogMessage } from "./types.js";
import { ChainConfigError } from "./errors.js";
import { runHandler, unwrapResult, type DispatchResult } from "./chain.js";

export class ChainLink {
  private next: ChainLink | null = null;
  private prev: ChainLink | null = null;

  constructor(readonly handler: LogHandler) {}

  /**
   * Installs the successor, replacing any previous one.
   * Pass null to make this link the tail.
   *
   * Throws ChainConfigError if a link or handler from the successor's
   * chain is already at or above this link, or if the successor already
   * follows another link.
   */
  setNext(successor: ChainLink | null): void {
    if (successor) {
      const upstream = this.upstream();
      for (let link: ChainLink | null = successor; link !== null; link = link.next) {
        const current = link;
        if (upstream.some((u) => u === current || u.handler === current.handler)) {
          throw new ChainConfigError(
            `Linking ${this.handler.name} -> ${successor.handler.name} would put ${current.handler.name} in the chain twice`
          );
        }
      }
      if (successor.prev && successor.prev !== this) {
        throw new ChainConfigError(
          `${successor.handler.name} already follows ${successor.prev.handler.name}`
        );
      }
    }

    if (this.next) this.next.prev = null;
    this.next = successor;
    if (successor) successor.prev = this;
  }

  get successor(): ChainLink | null {
    return this.next;
  }

  dispatch(message: LogMessage): DispatchResult {
    if (this.handler.canHandle(message)) {
      return runHandler(this.handler, message);
    }
    if (this.next) {
      return this.next.dispatch(message);
    }
    return { status: "dropped" };
  }

  /**
   * Like dispatch(), but a terminal failure is thrown as DispatchFailure
   */
  handle(message: LogMessage): DispatchResult {
    return unwrapResult(this.dispatch(message));
  }

  /** This link and every link before it, up to the head */
  private upstream(): ChainLink[] {
    const links: ChainLink[] = [];
    for (let link: ChainLink | null = this; link !== null; link = link.prev) {
      links.push(link);
    }
    return links;
  }
}

/**
 * Wraps handlers in links, wired in array order. Returns the head,
 * or null for an empty list.
 */
export function linkHandlers(handlers: LogHandler[]): ChainLink | null {
  const links = handlers.map((handler) => new ChainLink(handler));
  for (let i = 0; i < links.length - 1; i++) {
    links[i].setNext(links[i + 1]);
  }
  return links[0] ?? null;
}
