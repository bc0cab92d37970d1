/**
 * Session Manager
 *
 * Owns one conversation context per session and drives the dialogue state
 * machine around each dispatch:
 *
 *   idle -> awaiting_utterance -> dispatching -> resolved | clarifying | unrecognized -> idle
 *
 * A session stays in its outcome state after a dispatch so callers can read
 * it; the return to idle happens when the next utterance arrives, just before
 * awaiting_utterance. A clarifying session goes straight back to dispatching
 * on its follow-up.
 * Sessions never share mutable state. Expired sessions are removed lazily
 * whenever sessions are looked up.
 */

import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { ConversationContext } from "../context/conversation-context.js";
import type { IntentDispatcher } from "./intent-dispatcher.js";
import {
  DispatchErrorCode,
  DispatchErrorHandler,
  type DispatchError,
} from "../utils/error-handler.js";
import {
  DEFAULT_DISPATCHER_CONFIG,
  type ContextSettings,
  type DispatchResult,
  type Entity,
  type SessionSettings,
  type SessionState,
  type Utterance,
} from "../types.js";

/**
 * A dialogue session
 */
export interface DispatchSession {
  /** Session ID */
  id: string;

  /** Current dialogue state */
  state: SessionState;

  /** Conversation context owned by this session */
  context: ConversationContext;

  /** When session was created */
  createdAt: Date;

  /** Last activity timestamp */
  lastActivity: Date;

  /** Number of utterances dispatched */
  turns: number;

  /** Outcome of the most recent dispatch */
  lastResult?: DispatchResult;
}

/**
 * JSON-friendly view of a session
 */
export interface SessionSummary {
  id: string;
  state: SessionState;
  turns: number;
  createdAt: string;
  lastActivity: string;
  lastIntent?: string;
  pendingCandidates?: string[];
  contextSize: number;
}

/**
 * Session manager configuration
 */
export interface SessionManagerConfig {
  sessions: SessionSettings;
  context: ContextSettings;
}

/**
 * Session event types
 */
export type SessionEventType =
  | "session_created"
  | "session_ended"
  | "state_change"
  | "dispatch";

export interface SessionEvent {
  type: SessionEventType;
  sessionId: string;
  data: Record<string, unknown>;
  timestamp: Date;
}

/**
 * Dispatch through a session succeeded
 */
export interface SessionDispatchSuccess {
  success: true;
  sessionId: string;
  state: SessionState;
  result: DispatchResult;
  warnings: DispatchError[];
}

/**
 * Dispatch through a session failed
 */
export interface SessionDispatchFailure {
  success: false;
  sessionId: string;
  state?: SessionState;
  error: DispatchError;
  warnings: DispatchError[];
}

export type SessionDispatchResponse = SessionDispatchSuccess | SessionDispatchFailure;

/**
 * Allowed state transitions
 */
const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  idle: ["awaiting_utterance"],
  awaiting_utterance: ["dispatching", "idle"],
  // back to awaiting_utterance when the input is rejected
  dispatching: ["resolved", "clarifying", "unrecognized", "awaiting_utterance"],
  resolved: ["idle"],
  clarifying: ["dispatching", "idle"],
  unrecognized: ["idle"],
};

/**
 * Whether a session may move from one state to another
 */
export function canTransition(from: SessionState, to: SessionState): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Session Manager class
 */
export class SessionManager extends EventEmitter {
  private sessions: Map<string, DispatchSession> = new Map();
  private config: SessionManagerConfig;
  private dispatcher: IntentDispatcher;
  private errorHandler: DispatchErrorHandler;

  constructor(
    dispatcher: IntentDispatcher,
    config: {
      sessions?: Partial<SessionSettings>;
      context?: Partial<ContextSettings>;
    } = {},
    errorHandler: DispatchErrorHandler = new DispatchErrorHandler()
  ) {
    super();
    this.dispatcher = dispatcher;
    this.errorHandler = errorHandler;
    this.config = {
      sessions: { ...DEFAULT_DISPATCHER_CONFIG.sessions, ...config.sessions },
      context: { ...DEFAULT_DISPATCHER_CONFIG.context, ...config.context },
    };
  }

  /**
   * Start a new session in the idle state
   */
  createSession(now: Date = new Date()): DispatchSession {
    this.cleanupExpiredSessions(now);

    const session: DispatchSession = {
      id: randomUUID(),
      state: "idle",
      context: new ConversationContext(this.config.context),
      createdAt: now,
      lastActivity: now,
      turns: 0,
    };
    this.sessions.set(session.id, session);
    this.emitEvent("session_created", session.id, {});

    this.enforceMaxSessions(session.id);

    return session;
  }

  /**
   * Get a live session
   */
  getSession(sessionId: string, now: Date = new Date()): DispatchSession | undefined {
    this.cleanupExpiredSessions(now);
    return this.sessions.get(sessionId);
  }

  /**
   * Summaries of all live sessions
   */
  listSessions(now: Date = new Date()): SessionSummary[] {
    this.cleanupExpiredSessions(now);
    return Array.from(this.sessions.values(), (session) => summarizeSession(session));
  }

  /**
   * End a session
   */
  deleteSession(sessionId: string): boolean {
    const deleted = this.sessions.delete(sessionId);
    if (deleted) {
      this.emitEvent("session_ended", sessionId, { reason: "deleted" });
    }
    return deleted;
  }

  /**
   * Number of live sessions (expired ones included until the next lookup)
   */
  get size(): number {
    return this.sessions.size;
  }

  /**
   * Move a session to a new state
   */
  transition(session: DispatchSession, to: SessionState): DispatchError | null {
    const from = session.state;
    if (!canTransition(from, to)) {
      const error = this.errorHandler.createError(
        DispatchErrorCode.INVALID_TRANSITION,
        `Session ${session.id} cannot move from ${from} to ${to}`
      );
      console.warn(`[SessionManager] ${error.message}`);
      return error;
    }

    session.state = to;
    this.emitEvent("state_change", session.id, { from, to });
    return null;
  }

  /**
   * Start listening for the next utterance. A finished dialogue returns to
   * idle first; a clarifying session keeps waiting for its follow-up.
   */
  listen(session: DispatchSession): DispatchError | null {
    if (session.state === "resolved" || session.state === "unrecognized") {
      const error = this.transition(session, "idle");
      if (error) {
        return error;
      }
    }
    if (session.state === "idle") {
      return this.transition(session, "awaiting_utterance");
    }
    return null;
  }

  /**
   * Dispatch an utterance within a session
   */
  dispatch(
    sessionId: string,
    utterance: Utterance,
    entities: readonly Entity[] = []
  ): SessionDispatchResponse {
    const session = this.getSession(sessionId, utterance.timestamp);
    if (!session) {
      const error = this.errorHandler.createError(
        DispatchErrorCode.SESSION_NOT_FOUND,
        `Session not found: ${sessionId}`
      );
      console.warn(`[SessionManager] ${error.message}`);
      return { success: false, sessionId, error, warnings: [] };
    }

    const listenError = this.listen(session);
    const dispatchingError = listenError ?? this.transition(session, "dispatching");
    if (dispatchingError) {
      return {
        success: false,
        sessionId,
        state: session.state,
        error: dispatchingError,
        warnings: [],
      };
    }

    session.lastActivity = utterance.timestamp;
    const evictionsBefore = session.context.evictionCount;
    const response = this.dispatcher.dispatch(utterance, entities, session.context);

    for (const warning of response.warnings) {
      this.errorHandler.record(warning);
      console.warn(`[SessionManager] ${warning.message}`);
    }

    const evicted = session.context.evictionCount - evictionsBefore;
    if (evicted > 0) {
      this.errorHandler.createError(
        DispatchErrorCode.CONTEXT_OVERFLOW,
        `Evicted ${evicted} context entr${evicted === 1 ? "y" : "ies"} from session ${session.id}`
      );
    }

    if (!response.success) {
      this.errorHandler.record(response.error);
      this.transition(session, "awaiting_utterance");
      return {
        success: false,
        sessionId,
        state: session.state,
        error: response.error,
        warnings: response.warnings,
      };
    }

    const { result } = response;
    this.transition(session, result.type);
    session.turns++;
    session.lastResult = result;
    this.recordOutcome(result);

    this.emitEvent("dispatch", session.id, { result });

    return {
      success: true,
      sessionId,
      state: session.state,
      result,
      warnings: response.warnings,
    };
  }

  /**
   * Return a session to idle, dropping any pending clarification
   */
  reset(sessionId: string): DispatchError | null {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return this.errorHandler.createError(
        DispatchErrorCode.SESSION_NOT_FOUND,
        `Session not found: ${sessionId}`
      );
    }
    session.context.clearPendingClarification();
    return session.state === "idle" ? null : this.transition(session, "idle");
  }

  /**
   * Error handler shared by this manager
   */
  getErrorHandler(): DispatchErrorHandler {
    return this.errorHandler;
  }

  /**
   * Get current configuration
   */
  getConfig(): SessionManagerConfig {
    return {
      sessions: { ...this.config.sessions },
      context: { ...this.config.context },
    };
  }

  /**
   * Clean up expired sessions
   */
  cleanupExpiredSessions(now: Date = new Date()): number {
    let removed = 0;

    for (const [sessionId, session] of this.sessions) {
      const age = now.getTime() - session.lastActivity.getTime();
      if (age > this.config.sessions.sessionTimeoutMs) {
        this.sessions.delete(sessionId);
        this.emitEvent("session_ended", sessionId, { reason: "expired" });
        removed++;
      }
    }

    return removed;
  }

  /**
   * Drop the least recently active sessions beyond the limit
   */
  private enforceMaxSessions(keepId: string): void {
    if (this.sessions.size <= this.config.sessions.maxSessions) {
      return;
    }

    const sessions = Array.from(this.sessions.values())
      .filter((session) => session.id !== keepId)
      .sort((a, b) => a.lastActivity.getTime() - b.lastActivity.getTime());

    const toRemove = sessions.slice(0, this.sessions.size - this.config.sessions.maxSessions);
    for (const session of toRemove) {
      this.sessions.delete(session.id);
      this.emitEvent("session_ended", session.id, { reason: "evicted" });
      console.warn(`[SessionManager] Session limit reached, evicted ${session.id}`);
    }
  }

  private recordOutcome(result: DispatchResult): void {
    if (result.type === "clarifying") {
      this.errorHandler.createError(DispatchErrorCode.AMBIGUOUS_INTENT, result.question);
    } else if (result.type === "unrecognized") {
      this.errorHandler.createError(
        DispatchErrorCode.UNRECOGNIZED,
        `Unrecognized (${result.reason}): "${result.utterance}"`,
        { intent: result.bestGuess?.intent }
      );
    }
  }

  private emitEvent(type: SessionEventType, sessionId: string, data: Record<string, unknown>): void {
    const event: SessionEvent = { type, sessionId, data, timestamp: new Date() };
    this.emit(type, event);
  }
}

/**
 * Summarize a session for listings
 */
export function summarizeSession(session: DispatchSession): SessionSummary {
  const summary = session.context.getSummary();
  return {
    id: session.id,
    state: session.state,
    turns: session.turns,
    createdAt: session.createdAt.toISOString(),
    lastActivity: session.lastActivity.toISOString(),
    lastIntent: summary.lastIntent,
    pendingCandidates: summary.pendingCandidates,
    contextSize: summary.size,
  };
}

/**
 * Create a SessionManager instance
 */
export function createSessionManager(
  dispatcher: IntentDispatcher,
  config: {
    sessions?: Partial<SessionSettings>;
    context?: Partial<ContextSettings>;
  } = {},
  errorHandler?: DispatchErrorHandler
): SessionManager {
  return new SessionManager(dispatcher, config, errorHandler);
}
