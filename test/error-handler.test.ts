import { describe, it, expect } from "vitest";
import {
  DispatchErrorCode,
  DispatchErrorHandler,
  RegistryValidationError,
  createDispatchError,
} from "../src/utils/error-handler.js";

describe("createDispatchError", () => {
  it("attaches a recovery suggestion and recoverability", () => {
    const timestamp = new Date("2024-01-01T00:00:00Z");

    expect(createDispatchError(DispatchErrorCode.AMBIGUOUS_INTENT, "Which one?", { timestamp })).toEqual({
      code: DispatchErrorCode.AMBIGUOUS_INTENT,
      message: "Which one?",
      intent: undefined,
      recovery: { type: "clarify", description: "Ask the user which of the candidate actions they meant" },
      recoverable: true,
      timestamp,
    });
  });

  it("marks registry and executor wiring errors as not recoverable", () => {
    expect(createDispatchError(DispatchErrorCode.EXECUTOR_NOT_FOUND, "none").recoverable).toBe(false);
    expect(createDispatchError(DispatchErrorCode.INVALID_TRANSITION, "bad").recoverable).toBe(false);
  });
});

describe("DispatchErrorHandler", () => {
  it("counts errors by code and intent", () => {
    const handler = new DispatchErrorHandler();
    handler.createError(DispatchErrorCode.EXECUTOR_FAILED, "a", { intent: "make_call" });
    handler.createError(DispatchErrorCode.EXECUTOR_FAILED, "b", { intent: "make_call" });
    handler.createError(DispatchErrorCode.UNRECOGNIZED, "c");

    const stats = handler.getStats();

    expect(stats.total).toBe(3);
    expect(stats.byCode).toEqual({ [DispatchErrorCode.EXECUTOR_FAILED]: 2, [DispatchErrorCode.UNRECOGNIZED]: 1 });
    expect(stats.byIntent).toEqual({ make_call: 2 });
  });

  it("keeps a bounded log", () => {
    const handler = new DispatchErrorHandler({ maxLogSize: 2 });
    handler.createError(DispatchErrorCode.UNRECOGNIZED, "first");
    handler.createError(DispatchErrorCode.UNRECOGNIZED, "second");
    handler.createError(DispatchErrorCode.UNRECOGNIZED, "third");

    expect(handler.getRecentErrors().map((e) => e.message)).toEqual(["second", "third"]);

    handler.clearLog();
    expect(handler.getStats().total).toBe(0);
  });

  it("formats errors with their recovery", () => {
    const handler = new DispatchErrorHandler();
    const error = handler.createError(DispatchErrorCode.SESSION_NOT_FOUND, "Session not found: abc");

    expect(handler.formatError(error)).toBe("[301] Session not found: abc\n  Recovery: Start a new session");
  });
});

describe("RegistryValidationError", () => {
  it("lists every issue in its message", () => {
    const error = new RegistryValidationError(["first problem", "second problem"]);

    expect(error.message).toBe("Invalid intent registry:\n  - first problem\n  - second problem");
    expect(error.code).toBe(DispatchErrorCode.REGISTRY_INVALID);
  });
});
