/**
 * Dispatch API Routes
 *
 * HTTP endpoints for sessions and utterance dispatch.
 */

import { Hono } from "hono";
import { summarizeSession } from "../dispatcher/session-manager.js";
import { processText, type DispatchPipeline } from "../dispatcher/pipeline.js";
import { DispatchErrorCode, type DispatchError } from "../utils/error-handler.js";
import type { Entity } from "../types.js";

interface DispatchBody {
  text: string;
  confidence?: number;
  entities?: Entity[];
  execute: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntity(raw: Record<string, unknown>): Entity {
  const span = isRecord(raw.span) ? raw.span : {};
  // Malformed fields are passed through as invalid values so the dispatcher drops them with a warning
  return {
    label: typeof raw.label === "string" ? raw.label : "",
    value: typeof raw.value === "string" ? raw.value : "",
    span: {
      start: typeof span.start === "number" ? span.start : -1,
      end: typeof span.end === "number" ? span.end : -1,
    },
  };
}

/**
 * Validate a dispatch request body
 */
export function parseDispatchBody(body: unknown): { body: DispatchBody } | { error: string } {
  if (!isRecord(body)) {
    return { error: "Request body must be a JSON object" };
  }
  if (typeof body.text !== "string") {
    return { error: "text is required" };
  }
  if (body.confidence !== undefined && typeof body.confidence !== "number") {
    return { error: "confidence must be a number" };
  }

  let entities: Entity[] | undefined;
  if (body.entities !== undefined) {
    if (!Array.isArray(body.entities) || !body.entities.every(isRecord)) {
      return { error: "entities must be an array of objects" };
    }
    entities = body.entities.map(toEntity);
  }

  return {
    body: {
      text: body.text,
      confidence: body.confidence,
      entities,
      execute: body.execute === true,
    },
  };
}

function statusFor(error: DispatchError): 400 | 404 | 409 | 500 {
  switch (error.code) {
    case DispatchErrorCode.INVALID_INPUT:
      return 400;
    case DispatchErrorCode.SESSION_NOT_FOUND:
      return 404;
    case DispatchErrorCode.INVALID_TRANSITION:
      return 409;
    default:
      return 500;
  }
}

/**
 * Build the dispatch routes for a pipeline
 */
export function createDispatchRoutes(pipeline: DispatchPipeline): Hono {
  const routes = new Hono();
  const { registry, sessions, errorHandler } = pipeline;

  /**
   * GET /health
   * Service status and error statistics
   */
  routes.get("/health", (c) => {
    return c.json({
      healthy: true,
      intents: registry.size,
      sessions: sessions.size,
      errors: errorHandler.getStats(),
    });
  });

  /**
   * GET /intents
   * List registered intents
   */
  routes.get("/intents", (c) => {
    return c.json({ intents: registry.summarize() });
  });

  /**
   * POST /sessions
   * Start a session
   */
  routes.post("/sessions", (c) => {
    const session = sessions.createSession();
    return c.json(summarizeSession(session), 201);
  });

  /**
   * GET /sessions
   * List live sessions
   */
  routes.get("/sessions", (c) => {
    return c.json({ sessions: sessions.listSessions() });
  });

  /**
   * GET /sessions/:id
   * Session state and conversation history
   */
  routes.get("/sessions/:id", (c) => {
    const session = sessions.getSession(c.req.param("id"));
    if (!session) {
      return c.json({ success: false, error: "Session not found" }, 404);
    }

    return c.json({
      ...summarizeSession(session),
      history: session.context.getHistory().map((entry) => ({
        text: entry.utterance.text,
        intent: entry.intent,
        confidence: entry.confidence,
        entities: entry.entities,
        timestamp: entry.utterance.timestamp.toISOString(),
      })),
    });
  });

  /**
   * DELETE /sessions/:id
   * End a session
   */
  routes.delete("/sessions/:id", (c) => {
    if (!sessions.deleteSession(c.req.param("id"))) {
      return c.json({ success: false, error: "Session not found" }, 404);
    }
    return c.json({ success: true });
  });

  /**
   * POST /sessions/:id/dispatch
   * Dispatch an utterance, optionally executing the resolved intent
   *
   * Body: { text, confidence?, entities?, execute? }
   */
  routes.post("/sessions/:id/dispatch", async (c) => {
    const raw: unknown = await c.req.json().catch(() => ({}));
    const parsed = parseDispatchBody(raw);
    if ("error" in parsed) {
      return c.json({ success: false, error: parsed.error }, 400);
    }

    const { text, confidence, entities, execute } = parsed.body;
    const result = await processText(pipeline, c.req.param("id"), text, {
      confidence,
      entities,
      execute,
    });

    if (!result.success) {
      return c.json(result, statusFor(result.error));
    }
    return c.json(result);
  });

  return routes;
}
