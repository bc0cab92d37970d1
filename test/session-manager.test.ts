import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { IntentDispatcher } from "../src/dispatcher/intent-dispatcher.js";
import { SessionManager, canTransition, type SessionEvent } from "../src/dispatcher/session-manager.js";
import { createUtterance } from "../src/nlp/normalizer.js";
import { createIntentRegistry } from "../src/registry/intent-registry.js";
import { DispatchErrorCode } from "../src/utils/error-handler.js";
import type { Entity, Utterance } from "../src/types.js";

const registry = createIntentRegistry([
  {
    name: "open_app",
    threshold: 0.5,
    schema: { required: ["app"] },
    rules: [{ kind: "regex", pattern: "^open\\s+(?<app>\\w+)$" }],
  },
  {
    name: "send_message",
    threshold: 0.7,
    schema: { required: ["contact"] },
    rules: [
      { kind: "keywords", keywords: ["message"] },
      { kind: "entity", labels: ["contact"] },
    ],
  },
  {
    name: "make_call",
    threshold: 0.7,
    schema: { required: ["contact"] },
    rules: [
      { kind: "keywords", keywords: ["call"] },
      { kind: "entity", labels: ["contact"] },
    ],
  },
]);

const start = new Date("2024-06-01T08:00:00Z");

function at(seconds: number, text: string): Utterance {
  return createUtterance(text, { timestamp: new Date(start.getTime() + seconds * 1000) });
}

function entity(label: string, value: string, text: string): Entity {
  const index = text.indexOf(value);
  return { label, value, span: { start: index, end: index + value.length } };
}

describe("SessionManager", () => {
  let manager: SessionManager;

  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    manager = new SessionManager(new IntentDispatcher(registry), {
      sessions: { sessionTimeoutMs: 60_000, maxSessions: 2 },
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("walks a session through a resolved dispatch", () => {
    const transitions: string[] = [];
    manager.on("state_change", (event: SessionEvent) => {
      transitions.push(`${String(event.data.from)}->${String(event.data.to)}`);
    });
    const session = manager.createSession(start);
    const utterance = at(1, "open chrome");

    const response = manager.dispatch(session.id, utterance, [entity("app", "chrome", utterance.text)]);

    expect(response.success).toBe(true);
    expect(response.success && response.state).toBe("resolved");
    expect(transitions).toEqual(["idle->awaiting_utterance", "awaiting_utterance->dispatching", "dispatching->resolved"]);
    expect(session.turns).toBe(1);
    expect(session.context.size).toBe(1);
  });

  it("returns a finished session to idle when the next utterance arrives", () => {
    const session = manager.createSession(start);
    const first = at(1, "open chrome");
    manager.dispatch(session.id, first, [entity("app", "chrome", first.text)]);
    expect(session.state).toBe("resolved");

    const transitions: string[] = [];
    manager.on("state_change", (event: SessionEvent) => {
      transitions.push(`${String(event.data.from)}->${String(event.data.to)}`);
    });
    const second = at(2, "open slack");
    manager.dispatch(session.id, second, [entity("app", "slack", second.text)]);

    expect(transitions).toEqual([
      "resolved->idle",
      "idle->awaiting_utterance",
      "awaiting_utterance->dispatching",
      "dispatching->resolved",
    ]);
  });

  it("returns to dispatching directly from clarifying", () => {
    const session = manager.createSession(start);
    const ambiguous = at(1, "reach john");

    const first = manager.dispatch(session.id, ambiguous, [entity("contact", "john", ambiguous.text)]);
    expect(first.success && first.state).toBe("clarifying");

    const transitions: string[] = [];
    manager.on("state_change", (event: SessionEvent) => {
      transitions.push(`${String(event.data.from)}->${String(event.data.to)}`);
    });
    const followUp = manager.dispatch(session.id, at(2, "call"));

    expect(followUp.success && followUp.result.type === "resolved" && followUp.result.intent).toBe("make_call");
    expect(transitions).toEqual(["clarifying->dispatching", "dispatching->resolved"]);
  });

  it("reports unknown sessions as errors", () => {
    const response = manager.dispatch("no-such-session", at(0, "open chrome"));

    expect(response.success).toBe(false);
    if (!response.success) {
      expect(response.error.code).toBe(DispatchErrorCode.SESSION_NOT_FOUND);
    }
  });

  it("goes back to awaiting an utterance after invalid input", () => {
    const session = manager.createSession(start);

    const response = manager.dispatch(session.id, at(1, "  "));

    expect(response.success).toBe(false);
    expect(session.state).toBe("awaiting_utterance");
    expect(manager.getErrorHandler().getStats().byCode[DispatchErrorCode.INVALID_INPUT]).toBe(1);
  });

  it("keeps sessions isolated", () => {
    const first = manager.createSession(start);
    const second = manager.createSession(start);
    const utterance = at(1, "open chrome");

    manager.dispatch(first.id, utterance, [entity("app", "chrome", utterance.text)]);

    expect(first.context.size).toBe(1);
    expect(second.context.size).toBe(0);
    expect(second.state).toBe("idle");
  });

  it("expires sessions idle longer than the session timeout", () => {
    const session = manager.createSession(start);

    expect(manager.getSession(session.id, new Date(start.getTime() + 60_000))).toBe(session);
    expect(manager.getSession(session.id, new Date(start.getTime() + 60_001))).toBeUndefined();
  });

  it("evicts the least recently active session beyond the limit", () => {
    const ended: string[] = [];
    manager.on("session_ended", (event: SessionEvent) => ended.push(event.sessionId));

    const oldest = manager.createSession(start);
    const middle = manager.createSession(new Date(start.getTime() + 1000));
    const newest = manager.createSession(new Date(start.getTime() + 2000));

    expect(ended).toEqual([oldest.id]);
    expect(manager.listSessions(new Date(start.getTime() + 3000)).map((s) => s.id)).toEqual([middle.id, newest.id]);
  });

  it("rejects transitions the state machine does not allow", () => {
    const session = manager.createSession(start);

    const error = manager.transition(session, "resolved");

    expect(error?.code).toBe(DispatchErrorCode.INVALID_TRANSITION);
    expect(session.state).toBe("idle");
    expect(canTransition("clarifying", "dispatching")).toBe(true);
    expect(canTransition("resolved", "dispatching")).toBe(false);
  });

  it("records ambiguous and unrecognized outcomes", () => {
    const session = manager.createSession(start);
    const ambiguous = at(1, "reach john");

    manager.dispatch(session.id, ambiguous, [entity("contact", "john", ambiguous.text)]);
    manager.reset(session.id);
    manager.dispatch(session.id, at(2, "sing a song"));

    const stats = manager.getErrorHandler().getStats();
    expect(stats.byCode[DispatchErrorCode.AMBIGUOUS_INTENT]).toBe(1);
    expect(stats.byCode[DispatchErrorCode.UNRECOGNIZED]).toBe(1);
    expect(session.state).toBe("unrecognized");
  });

  it("deletes sessions", () => {
    const session = manager.createSession(start);

    expect(manager.deleteSession(session.id)).toBe(true);
    expect(manager.deleteSession(session.id)).toBe(false);
    expect(manager.size).toBe(0);
  });
});
