/**
 * Voice Intent Dispatcher
 *
 * Public entry point: registry, dispatcher, sessions, extraction, routing.
 */

export * from "./types.js";
export * from "./utils/error-handler.js";
export { normalizeText, clampConfidence, createUtterance, type UtteranceOptions } from "./nlp/normalizer.js";
export { scoreRule, scorePatternStrength, tokenize, createMatchInput, type MatchInput } from "./nlp/match-rules.js";
export {
  PatternEntityExtractor,
  createEntityExtractor,
  extractSafely,
  type EntityExtractor,
  type ExtractionResult,
} from "./nlp/entity-extractor.js";
export {
  IntentRegistry,
  createIntentRegistry,
  parseIntentDefinitions,
  templatePlaceholders,
  type IntentDefinitionInput,
  type IntentSummary,
  type MatchRuleInput,
} from "./registry/intent-registry.js";
export {
  ConversationContext,
  createConversationContext,
  type ContextEntry,
  type ConversationContextSnapshot,
  type PendingClarification,
} from "./context/conversation-context.js";
export {
  IntentDispatcher,
  createIntentDispatcher,
  type DispatchExplanation,
  type DispatchFailure,
  type DispatchResponse,
  type DispatchSuccess,
} from "./dispatcher/intent-dispatcher.js";
export {
  SessionManager,
  createSessionManager,
  canTransition,
  summarizeSession,
  type DispatchSession,
  type SessionDispatchResponse,
  type SessionEvent,
  type SessionSummary,
} from "./dispatcher/session-manager.js";
export {
  createDispatchPipeline,
  processText,
  type DispatchPipeline,
  type PipelineResult,
  type ProcessTextOptions,
} from "./dispatcher/pipeline.js";
export {
  ActionRouter,
  TemplateExecutor,
  createActionRouter,
  renderTemplate,
  type ActionExecutor,
  type ActionOutcome,
} from "./executor/action-router.js";
export {
  BUNDLED_CONFIG_PATH,
  getConfigPath,
  loadDispatcherConfig,
  parseConfigText,
  validateAndMergeConfig,
  type LoadedConfig,
} from "./config/config-manager.js";
export { createApp, startServer } from "./server.js";
