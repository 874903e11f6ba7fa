/**
 * Tests for HandlerChain - ordered, first-match dispatch
 */

import { describe, it, expect, vi } from "vitest";
import { HandlerChain } from "./chain.js";
import { ChainConfigError, DispatchFailure } from "./errors.js";
import { FatalErrorHandler } from "./handlers/fatal.js";
import { UnclassifiedHandler } from "./handlers/unclassified.js";
import { WarningHandler } from "./handlers/warning.js";
import type { LogHandler } from "./handlers/types.js";
import { createLogMessage } from "./log-message.js";
import type { HandlerOutcome, LogMessage, Severity } from "./types.js";

/**
 * Handler that records the messages it handled
 */
function createRecordingHandler(name: string, severity: Severity): LogHandler & { seen: LogMessage[] } {
  const seen: LogMessage[] = [];
  return {
    name,
    severity,
    seen,
    canHandle: (message) => message.severity === severity,
    handle: (message): HandlerOutcome => {
      seen.push(message);
      return { kind: "handled" };
    },
  };
}

describe("HandlerChain", () => {
  describe("register", () => {
    it("keeps registration order", () => {
      const a = createRecordingHandler("a", "warning");
      const b = createRecordingHandler("b", "error");
      const chain = new HandlerChain().register(a).register(b);

      expect(chain.handlers.map((h) => h.name)).toEqual(["a", "b"]);
    });

    it("rejects the same instance twice", () => {
      const a = createRecordingHandler("a", "warning");
      const chain = new HandlerChain([a]);

      expect(() => chain.register(a)).toThrow(ChainConfigError);
      expect(() => chain.register(a)).toThrow("Handler a is already in the chain");
      expect(chain.handlers).toHaveLength(1);
    });

    it("rejects duplicates passed to the constructor", () => {
      const a = createRecordingHandler("a", "warning");
      expect(() => new HandlerChain([a, a])).toThrow(ChainConfigError);
    });
  });

  describe("remove", () => {
    it("removes a handler by name", () => {
      const chain = new HandlerChain([
        createRecordingHandler("a", "warning"),
        createRecordingHandler("b", "error"),
      ]);

      expect(chain.remove("a")).toBe(true);
      expect(chain.handlers.map((h) => h.name)).toEqual(["b"]);
    });

    it("returns false for an unknown name", () => {
      const chain = new HandlerChain([createRecordingHandler("a", "warning")]);
      expect(chain.remove("zzz")).toBe(false);
      expect(chain.handlers).toHaveLength(1);
    });
  });

  describe("dispatch", () => {
    it("routes to the matching handler only", () => {
      const warn = createRecordingHandler("warn", "warning");
      const err = createRecordingHandler("err", "error");
      const chain = new HandlerChain([warn, err]);
      const message = createLogMessage("error", "e1");

      expect(chain.dispatch(message)).toEqual({ status: "handled", handler: "err" });
      expect(err.seen).toEqual([message]);
      expect(warn.seen).toEqual([]);
    });

    it("stops at the first match", () => {
      const first = createRecordingHandler("first", "warning");
      const second = createRecordingHandler("second", "warning");
      const chain = new HandlerChain([first, second]);

      chain.dispatch(createLogMessage("warning", "w"));

      expect(first.seen).toHaveLength(1);
      expect(second.seen).toHaveLength(0);
    });

    it("does not consult handlers after the match", () => {
      const claimer = createRecordingHandler("claimer", "warning");
      const later: LogHandler = {
        name: "later",
        severity: "warning",
        canHandle: vi.fn(() => true),
        handle: vi.fn((): HandlerOutcome => ({ kind: "handled" })),
      };
      new HandlerChain([claimer, later]).dispatch(createLogMessage("warning", "w"));

      expect(later.canHandle).not.toHaveBeenCalled();
    });

    it("passes the same message object along", () => {
      const err = createRecordingHandler("err", "error");
      const chain = new HandlerChain([createRecordingHandler("warn", "warning"), err]);
      const message = createLogMessage("error", "same");

      chain.dispatch(message);

      expect(err.seen[0]).toBe(message);
    });

    it("drops unmatched messages without error", () => {
      const chain = new HandlerChain([createRecordingHandler("warn", "warning")]);
      expect(chain.dispatch(createLogMessage("error", "nobody"))).toEqual({ status: "dropped" });
    });

    it("drops everything when empty", () => {
      expect(new HandlerChain().dispatch(createLogMessage("warning", "w"))).toEqual({
        status: "dropped",
      });
    });

    it("reports a terminal failure as a result", () => {
      const chain = new HandlerChain([new FatalErrorHandler()]);
      const result = chain.dispatch(createLogMessage("fatal-error", "fatal error"));

      expect(result.status).toBe("failed");
      if (result.status !== "failed") return;
      expect(result.handler).toBe("fatal-error");
      expect(result.failure).toBeInstanceOf(DispatchFailure);
      expect(result.failure.message).toBe("fatal error");
      expect(result.failure.severity).toBe("fatal-error");
      expect(result.failure.text).toBe("fatal error");
    });

    it("lets unexpected handler exceptions propagate", () => {
      const broken: LogHandler = {
        name: "broken",
        severity: "warning",
        canHandle: () => true,
        handle: () => {
          throw new RangeError("sink exploded");
        },
      };
      const after = createRecordingHandler("after", "warning");
      const chain = new HandlerChain([broken, after]);

      expect(() => chain.dispatch(createLogMessage("warning", "w"))).toThrow("sink exploded");
      expect(after.seen).toHaveLength(0);
    });
  });

  describe("handle", () => {
    it("throws DispatchFailure for terminal handlers", () => {
      const chain = new HandlerChain([new UnclassifiedHandler()]);
      expect(() => chain.handle(createLogMessage("unclassified", "what"))).toThrow(
        new DispatchFailure("Unprocessed message: what", "unclassified", "unclassified", "what")
      );
    });

    it("returns non-failed results", () => {
      const chain = new HandlerChain([new WarningHandler({ write: vi.fn() })]);

      expect(chain.handle(createLogMessage("warning", "w"))).toEqual({
        status: "handled",
        handler: "warning",
      });
      expect(chain.handle(createLogMessage("error", "e"))).toEqual({ status: "dropped" });
    });
  });
});
