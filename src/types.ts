/**
 * Intent Dispatcher TypeScript Interfaces
 *
 * Type definitions for turning recognized voice utterances into dispatched
 * actions with confidence and context tracking.
 */

import type { DispatchErrorCode } from "./utils/error-handler.js";

/**
 * A normalized spoken input delivered by the speech capture stage.
 * Created through createUtterance() and frozen.
 */
export interface Utterance {
  /** Normalized text */
  readonly text: string;

  /** When the utterance was captured */
  readonly timestamp: Date;

  /** Upstream speech engine confidence (0-1) */
  readonly confidence: number;
}

/**
 * Character offsets into the normalized utterance text (end exclusive)
 */
export interface EntitySpan {
  start: number;
  end: number;
}

/**
 * A labeled value extracted from an utterance
 */
export interface Entity {
  /** Entity label (e.g. "app", "contact") */
  label: string;

  /** Extracted value */
  value: string;

  /** Where the value sits in the utterance */
  span: EntitySpan;
}

/**
 * Which entity labels an intent must or may receive
 */
export interface EntitySchema {
  required: readonly string[];
  optional: readonly string[];
}

/**
 * Keyword-set rule: scores matched keywords up to a saturation point
 */
export interface KeywordRule {
  kind: "keywords";
  keywords: readonly string[];
  /** Matches needed for a full score (default 1) */
  minMatches?: number;
  weight: number;
}

/**
 * Regex rule: full score when the pattern matches the utterance text.
 * Named groups double as entity labels for the default extractor.
 */
export interface RegexRule {
  kind: "regex";
  pattern: RegExp;
  weight: number;
}

/**
 * Entity-presence rule: fraction of the listed labels supplied
 */
export interface EntityRule {
  kind: "entity";
  labels: readonly string[];
  weight: number;
}

export type MatchRule = KeywordRule | RegexRule | EntityRule;

export type MatchRuleKind = MatchRule["kind"];

/**
 * A registered intent category
 */
export interface IntentDefinition {
  /** Unique intent name (e.g. "open_app") */
  name: string;

  /** Human-readable description, used in clarification questions */
  description?: string;

  /** Entity labels the intent requires or accepts */
  schema: EntitySchema;

  /** Minimum confidence to resolve without clarification (0-1) */
  threshold: number;

  /** Scoring rules */
  rules: readonly MatchRule[];

  /** Reply template rendered from the bindings, e.g. "Opening {app}" */
  response?: string;
}

/**
 * A scored intent considered during dispatch
 */
export interface IntentCandidate {
  /** Intent name */
  intent: string;

  /** Final confidence (0-1) */
  confidence: number;

  /** Weighted rule score before speech confidence is mixed in (0-1) */
  patternStrength: number;
}

/**
 * Dispatch resolved to a single intent
 */
export interface ResolvedDispatch {
  type: "resolved";
  intent: string;
  confidence: number;
  /** First value per schema label */
  bindings: Record<string, string>;
  /** Accepted entities carrying schema labels, in input order */
  entities: Entity[];
  utterance: string;
}

/**
 * Dispatch needs a follow-up utterance to pick between candidates
 */
export interface ClarifyingDispatch {
  type: "clarifying";
  /** Ranked candidates, always at least two */
  candidates: IntentCandidate[];
  question: string;
  utterance: string;
}

export type UnrecognizedReason = "no_match" | "below_floor" | "low_confidence";

/**
 * Dispatch could not map the utterance to an intent
 */
export interface UnrecognizedDispatch {
  type: "unrecognized";
  reason: UnrecognizedReason;
  /** Best scoring candidate, when one existed */
  bestGuess?: IntentCandidate;
  utterance: string;
}

export type DispatchResult =
  | ResolvedDispatch
  | ClarifyingDispatch
  | UnrecognizedDispatch;

export type DispatchResultType = DispatchResult["type"];

/**
 * Scoring and resolution settings
 */
export interface DispatcherSettings {
  /** Global minimum confidence below which nothing is recognized */
  floor: number;

  /** Weight of rule matching in the final confidence */
  patternWeight: number;

  /** Weight of upstream speech confidence in the final confidence */
  speechWeight: number;

  /** Bonus for candidates of a pending clarification */
  clarificationBoost: number;
}

/**
 * Conversation context limits
 */
export interface ContextSettings {
  /** Maximum history entries kept */
  capacity: number;

  /** Entries older than this (ms) are dropped */
  idleTimeoutMs: number;
}

/**
 * Session manager limits
 */
export interface SessionSettings {
  /** Sessions idle longer than this (ms) are removed */
  sessionTimeoutMs: number;

  /** Maximum number of live sessions */
  maxSessions: number;
}

/**
 * HTTP server settings
 */
export interface ServerSettings {
  port: number;
}

/**
 * Full dispatcher configuration
 */
export interface DispatcherConfig {
  dispatcher: DispatcherSettings;
  context: ContextSettings;
  sessions: SessionSettings;
  server: ServerSettings;
}

/**
 * Default dispatcher configuration
 */
export const DEFAULT_DISPATCHER_CONFIG: DispatcherConfig = {
  dispatcher: {
    floor: 0.3,
    patternWeight: 0.8,
    speechWeight: 0.2,
    clarificationBoost: 0.1,
  },
  context: {
    capacity: 5,
    idleTimeoutMs: 5 * 60 * 1000, // 5 minutes
  },
  sessions: {
    sessionTimeoutMs: 30 * 60 * 1000, // 30 minutes
    maxSessions: 10,
  },
  server: {
    port: 3000,
  },
};

/**
 * Per-session dialogue state
 */
export type SessionState =
  | "idle"                // No dialogue in progress
  | "awaiting_utterance"  // Listening for the next utterance
  | "dispatching"         // Scoring the utterance
  | "resolved"            // Intent resolved, ready for execution
  | "clarifying"          // Waiting for a follow-up to disambiguate
  | "unrecognized";       // Nothing matched

/**
 * Result from executing a resolved intent
 */
export interface ExecutionResult {
  /** Whether execution succeeded */
  success: boolean;

  /** Message for the user */
  message?: string;

  /** Error message if failed */
  error?: string;

  /** Error code if failed */
  code?: DispatchErrorCode;

  /** Execution time in milliseconds */
  duration_ms: number;

  /** The executed intent */
  intent: string;
}
