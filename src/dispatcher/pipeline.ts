/**
 * Dispatch Pipeline
 *
 * Wires the registry, dispatcher, sessions, extractor and router built from
 * one loaded configuration, and runs text through them:
 * normalize -> extract -> dispatch -> execute (optional).
 */

import type { LoadedConfig } from "../config/config-manager.js";
import { IntentDispatcher } from "./intent-dispatcher.js";
import {
  SessionManager,
  type SessionDispatchFailure,
  type SessionDispatchSuccess,
} from "./session-manager.js";
import { ActionRouter } from "../executor/action-router.js";
import {
  PatternEntityExtractor,
  extractSafely,
  type EntityExtractor,
} from "../nlp/entity-extractor.js";
import { createUtterance } from "../nlp/normalizer.js";
import type { IntentRegistry } from "../registry/intent-registry.js";
import { DispatchErrorHandler } from "../utils/error-handler.js";
import type { DispatcherConfig, Entity, ExecutionResult } from "../types.js";

/**
 * Everything needed to serve dispatch requests
 */
export interface DispatchPipeline {
  config: DispatcherConfig;
  registry: IntentRegistry;
  dispatcher: IntentDispatcher;
  sessions: SessionManager;
  extractor: EntityExtractor;
  router: ActionRouter;
  errorHandler: DispatchErrorHandler;
}

/**
 * Options for processText()
 */
export interface ProcessTextOptions {
  /** Speech engine confidence (default 1) */
  confidence?: number;

  /** Entities to use instead of running the extractor; spans refer to the normalized text */
  entities?: Entity[];

  /** Execute the intent when it resolves */
  execute?: boolean;

  /** Capture time (default now) */
  now?: Date;
}

export type PipelineResult =
  | (SessionDispatchSuccess & { execution?: ExecutionResult })
  | SessionDispatchFailure;

/**
 * Build a pipeline from a loaded configuration
 */
export function createDispatchPipeline(
  loaded: Pick<LoadedConfig, "config" | "registry">,
  options: { extractor?: EntityExtractor; errorHandler?: DispatchErrorHandler } = {}
): DispatchPipeline {
  const { config, registry } = loaded;
  const errorHandler = options.errorHandler ?? new DispatchErrorHandler();
  const dispatcher = new IntentDispatcher(registry, config.dispatcher);

  return {
    config,
    registry,
    dispatcher,
    sessions: new SessionManager(
      dispatcher,
      { sessions: config.sessions, context: config.context },
      errorHandler
    ),
    extractor: options.extractor ?? new PatternEntityExtractor(registry),
    router: new ActionRouter(registry, { errorHandler }),
    errorHandler,
  };
}

/**
 * Run raw text through a session
 */
export async function processText(
  pipeline: DispatchPipeline,
  sessionId: string,
  text: string,
  options: ProcessTextOptions = {}
): Promise<PipelineResult> {
  const utterance = createUtterance(text, {
    confidence: options.confidence,
    timestamp: options.now,
  });

  const entities =
    options.entities ?? extractSafely(pipeline.extractor, utterance).entities;

  const response = pipeline.sessions.dispatch(sessionId, utterance, entities);
  if (!response.success || !options.execute || response.result.type !== "resolved") {
    return response;
  }

  const execution = await pipeline.router.route(response.result);
  return { ...response, execution };
}
