/**
 * Intent Dispatcher
 *
 * Maps a normalized utterance and its entities to exactly one outcome:
 * a resolved intent, a clarification request, or "unrecognized".
 *
 * Confidence per candidate is a weighted mix of rule match strength and the
 * upstream speech confidence. Ranking: confidence, then most recent use in
 * the conversation, then registration order.
 *
 * Dispatch performs no I/O. Its only side effect is on the context passed in.
 */

import { ConversationContext, type PendingClarification } from "../context/conversation-context.js";
import { createMatchInput, scorePatternStrength } from "../nlp/match-rules.js";
import { clampConfidence } from "../nlp/normalizer.js";
import type { IntentRegistry } from "../registry/intent-registry.js";
import {
  createDispatchError,
  DispatchErrorCode,
  type DispatchError,
} from "../utils/error-handler.js";
import {
  DEFAULT_DISPATCHER_CONFIG,
  type DispatchResult,
  type DispatcherSettings,
  type Entity,
  type IntentCandidate,
  type IntentDefinition,
  type ResolvedDispatch,
  type Utterance,
} from "../types.js";

/**
 * Dispatch produced one of the three outcomes
 */
export interface DispatchSuccess {
  success: true;
  result: DispatchResult;
  /** Entities dropped from the input */
  warnings: DispatchError[];
}

/**
 * Dispatch rejected its input
 */
export interface DispatchFailure {
  success: false;
  error: DispatchError;
  warnings: DispatchError[];
}

export type DispatchResponse = DispatchSuccess | DispatchFailure;

/**
 * Candidate scores for an utterance, without touching the context
 */
export interface DispatchExplanation {
  candidates: IntentCandidate[];
  warnings: DispatchError[];
}

interface RankedCandidate {
  candidate: IntentCandidate;
  recency: number;
  order: number;
}

/** Confidences closer than this are ties */
const TIE_EPSILON = 1e-9;

function compareRanked(a: RankedCandidate, b: RankedCandidate): number {
  const delta = b.candidate.confidence - a.candidate.confidence;
  if (Math.abs(delta) > TIE_EPSILON) {
    return delta;
  }
  if (a.recency !== b.recency) {
    return b.recency - a.recency;
  }
  return a.order - b.order;
}

function isValidSpan(entity: Entity, textLength: number): boolean {
  const span = entity.span;
  return (
    typeof span === "object" &&
    span !== null &&
    Number.isInteger(span.start) &&
    Number.isInteger(span.end) &&
    span.start >= 0 &&
    span.start < span.end &&
    span.end <= textLength
  );
}

function describeIntent(definition: IntentDefinition | undefined, name: string): string {
  return definition?.description ?? name.replace(/_/g, " ");
}

/**
 * Intent Dispatcher class
 */
export class IntentDispatcher {
  private readonly registry: IntentRegistry;
  private readonly settings: DispatcherSettings;

  constructor(registry: IntentRegistry, settings: Partial<DispatcherSettings> = {}) {
    this.registry = registry;
    this.settings = { ...DEFAULT_DISPATCHER_CONFIG.dispatcher, ...settings };

    if (
      !(this.settings.patternWeight >= 0) ||
      !(this.settings.speechWeight >= 0) ||
      this.settings.patternWeight + this.settings.speechWeight <= 0
    ) {
      this.settings.patternWeight = DEFAULT_DISPATCHER_CONFIG.dispatcher.patternWeight;
      this.settings.speechWeight = DEFAULT_DISPATCHER_CONFIG.dispatcher.speechWeight;
    }
    this.settings.floor = clampConfidence(this.settings.floor);
    this.settings.clarificationBoost = clampConfidence(this.settings.clarificationBoost);
  }

  /**
   * Active scoring settings
   */
  getSettings(): DispatcherSettings {
    return { ...this.settings };
  }

  /**
   * Dispatch an utterance against the registry, reading and updating the
   * session's conversation context.
   */
  dispatch(
    utterance: Utterance,
    entities: readonly Entity[],
    context: ConversationContext
  ): DispatchResponse {
    if (typeof utterance.text !== "string" || utterance.text.trim().length === 0) {
      return {
        success: false,
        error: createDispatchError(DispatchErrorCode.INVALID_INPUT, "Utterance text is empty", {
          timestamp: utterance.timestamp,
        }),
        warnings: [],
      };
    }

    context.prune(utterance.timestamp);

    const { accepted, warnings } = this.validateEntities(utterance, entities);
    const pending = context.getPendingClarification();
    const carried = pending ? this.carryEntities(accepted, pending) : [];
    const merged = [...accepted, ...carried];
    const ranked = this.rank(utterance, merged, context, pending);
    const result = this.resolve(utterance, accepted, carried, ranked);

    switch (result.type) {
      case "resolved":
        context.push({
          utterance,
          intent: result.intent,
          entities: result.entities,
          confidence: result.confidence,
        });
        context.clearPendingClarification();
        break;

      case "clarifying":
        context.setPendingClarification({
          candidates: result.candidates.map((c) => c.intent),
          entities: merged,
          utterance,
        });
        break;

      case "unrecognized":
        context.clearPendingClarification();
        break;
    }

    return { success: true, result, warnings };
  }

  /**
   * Score every candidate for an utterance without changing the context
   */
  explain(
    utterance: Utterance,
    entities: readonly Entity[],
    context: ConversationContext = new ConversationContext()
  ): DispatchExplanation {
    const scratch = context.clone();
    scratch.prune(utterance.timestamp);

    const { accepted, warnings } = this.validateEntities(utterance, entities);
    const pending = scratch.getPendingClarification();
    const merged = pending ? [...accepted, ...this.carryEntities(accepted, pending)] : accepted;

    return {
      candidates: this.rank(utterance, merged, scratch, pending).map((r) => r.candidate),
      warnings,
    };
  }

  /**
   * Drop entities with unknown labels, empty values, or spans outside the text
   */
  private validateEntities(
    utterance: Utterance,
    entities: readonly Entity[]
  ): { accepted: Entity[]; warnings: DispatchError[] } {
    const accepted: Entity[] = [];
    const warnings: DispatchError[] = [];

    const drop = (entity: Entity, reason: string): void => {
      warnings.push(
        createDispatchError(
          DispatchErrorCode.ENTITY_DROPPED,
          `Dropped entity "${String(entity.label)}": ${reason}`,
          { timestamp: utterance.timestamp }
        )
      );
    };

    for (const entity of entities) {
      if (typeof entity.label !== "string" || entity.label.length === 0) {
        drop(entity, "missing label");
      } else if (!this.registry.isKnownLabel(entity.label)) {
        drop(entity, "unknown label");
      } else if (typeof entity.value !== "string" || entity.value.trim().length === 0) {
        drop(entity, "empty value");
      } else if (!isValidSpan(entity, utterance.text.length)) {
        drop(entity, "span outside the utterance");
      } else {
        accepted.push({
          label: entity.label,
          value: entity.value,
          span: { start: entity.span.start, end: entity.span.end },
        });
      }
    }

    return { accepted, warnings };
  }

  /**
   * Entities of the ambiguous utterance whose labels the follow-up lacks.
   * Their spans point into the earlier utterance, so they only ever fill
   * bindings and never appear among the follow-up's entities.
   */
  private carryEntities(accepted: Entity[], pending: PendingClarification): Entity[] {
    const present = new Set(accepted.map((e) => e.label));
    return pending.entities.filter((e) => !present.has(e.label));
  }

  private rank(
    utterance: Utterance,
    entities: readonly Entity[],
    context: ConversationContext,
    pending: PendingClarification | null
  ): RankedCandidate[] {
    const labels = new Set(entities.map((e) => e.label));
    const input = createMatchInput(utterance.text, labels);
    const { patternWeight, speechWeight, clarificationBoost } = this.settings;
    const speechConfidence = clampConfidence(utterance.confidence);
    const ranked: RankedCandidate[] = [];

    this.registry.list().forEach((definition, order) => {
      if (!definition.schema.required.every((label) => labels.has(label))) {
        return;
      }

      const patternStrength = scorePatternStrength(definition.rules, input);
      if (patternStrength <= 0) {
        return;
      }

      let confidence =
        (patternWeight * patternStrength + speechWeight * speechConfidence) /
        (patternWeight + speechWeight);

      if (pending?.candidates.includes(definition.name)) {
        confidence += clarificationBoost;
      }

      ranked.push({
        candidate: {
          intent: definition.name,
          confidence: clampConfidence(confidence),
          patternStrength,
        },
        recency: context.recencyOf(definition.name),
        order,
      });
    });

    return ranked.sort(compareRanked);
  }

  private resolve(
    utterance: Utterance,
    entities: readonly Entity[],
    carried: readonly Entity[],
    ranked: RankedCandidate[]
  ): DispatchResult {
    const best = ranked[0]?.candidate;

    if (!best) {
      return { type: "unrecognized", reason: "no_match", utterance: utterance.text };
    }

    if (best.confidence <= this.settings.floor) {
      return {
        type: "unrecognized",
        reason: "below_floor",
        bestGuess: best,
        utterance: utterance.text,
      };
    }

    const definition = this.registry.get(best.intent);
    if (!definition) {
      return { type: "unrecognized", reason: "no_match", utterance: utterance.text };
    }

    if (best.confidence < definition.threshold) {
      const eligible = ranked
        .map((r) => r.candidate)
        .filter((c) => c.confidence > this.settings.floor);

      if (eligible.length < 2) {
        return {
          type: "unrecognized",
          reason: "low_confidence",
          bestGuess: best,
          utterance: utterance.text,
        };
      }

      const candidates = eligible.slice(0, 2);
      const [first, second] = candidates.map((c) =>
        describeIntent(this.registry.get(c.intent), c.intent)
      );
      return {
        type: "clarifying",
        candidates,
        question: `Did you mean ${first} or ${second}?`,
        utterance: utterance.text,
      };
    }

    return this.bind(utterance, definition, best.confidence, entities, carried);
  }

  private bind(
    utterance: Utterance,
    definition: IntentDefinition,
    confidence: number,
    entities: readonly Entity[],
    carried: readonly Entity[]
  ): ResolvedDispatch {
    const schemaLabels = new Set([...definition.schema.required, ...definition.schema.optional]);
    const bound = entities.filter((e) => schemaLabels.has(e.label));
    const bindings: Record<string, string> = {};

    for (const entity of [...bound, ...carried.filter((e) => schemaLabels.has(e.label))]) {
      if (!Object.hasOwn(bindings, entity.label)) {
        bindings[entity.label] = entity.value;
      }
    }

    return {
      type: "resolved",
      intent: definition.name,
      confidence,
      bindings,
      entities: bound.map((e) => ({ ...e, span: { ...e.span } })),
      utterance: utterance.text,
    };
  }
}

/**
 * Create an IntentDispatcher over an immutable registry
 */
export function createIntentDispatcher(
  registry: IntentRegistry,
  settings: Partial<DispatcherSettings> = {}
): IntentDispatcher {
  return new IntentDispatcher(registry, settings);
}
