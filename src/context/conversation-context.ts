/**
 * Conversation Context
 *
 * Bounded, time-decaying record of the last N dispatched utterances for a
 * session, plus the candidates of a pending clarification. Owned by a single
 * session; never shared between sessions.
 */

import { createUtterance } from "../nlp/normalizer.js";
import {
  DEFAULT_DISPATCHER_CONFIG,
  type ContextSettings,
  type Entity,
  type Utterance,
} from "../types.js";

/**
 * A resolved turn in the conversation
 */
export interface ContextEntry {
  /** The dispatched utterance */
  utterance: Utterance;

  /** Resolved intent name */
  intent: string;

  /** Entities bound to the intent */
  entities: Entity[];

  /** Confidence the intent resolved with */
  confidence: number;
}

/**
 * Candidates awaiting a follow-up utterance
 */
export interface PendingClarification {
  /** Candidate intent names, ranked */
  candidates: string[];

  /** Entities of the ambiguous utterance, carried into the follow-up */
  entities: Entity[];

  /** The ambiguous utterance */
  utterance: Utterance;
}

interface SerializedUtterance {
  text: string;
  timestamp: string;
  confidence: number;
}

/**
 * JSON-safe form of a context
 */
export interface ConversationContextSnapshot {
  entries: Array<Omit<ContextEntry, "utterance"> & { utterance: SerializedUtterance }>;
  pending?: Omit<PendingClarification, "utterance"> & { utterance: SerializedUtterance };
  evictions: number;
}

function serializeUtterance(utterance: Utterance): SerializedUtterance {
  return {
    text: utterance.text,
    timestamp: utterance.timestamp.toISOString(),
    confidence: utterance.confidence,
  };
}

function restoreUtterance(serialized: SerializedUtterance): Utterance {
  return createUtterance(serialized.text, {
    normalized: true,
    timestamp: new Date(serialized.timestamp),
    confidence: serialized.confidence,
  });
}

function copyEntities(entities: readonly Entity[]): Entity[] {
  return entities.map((entity) => ({ ...entity, span: { ...entity.span } }));
}

/**
 * Conversation Context class
 */
export class ConversationContext {
  private entries: ContextEntry[] = [];
  private pending: PendingClarification | null = null;
  private evictions = 0;
  private settings: ContextSettings;

  constructor(settings: Partial<ContextSettings> = {}) {
    this.settings = { ...DEFAULT_DISPATCHER_CONFIG.context, ...settings };
    if (!Number.isInteger(this.settings.capacity) || this.settings.capacity < 1) {
      this.settings.capacity = DEFAULT_DISPATCHER_CONFIG.context.capacity;
    }
  }

  /**
   * Maximum entries kept
   */
  get capacity(): number {
    return this.settings.capacity;
  }

  /**
   * Current number of entries
   */
  get size(): number {
    return this.entries.length;
  }

  /**
   * Entries dropped because the context was full
   */
  get evictionCount(): number {
    return this.evictions;
  }

  /**
   * Add a resolved turn, evicting the oldest entries beyond capacity
   */
  push(entry: ContextEntry): void {
    this.entries.push({ ...entry, entities: copyEntities(entry.entities) });

    const overflow = this.entries.length - this.settings.capacity;
    if (overflow > 0) {
      this.entries.splice(0, overflow);
      this.evictions += overflow;
    }
  }

  /**
   * Drop entries and a pending clarification older than the idle timeout
   */
  prune(now: Date): void {
    const cutoff = now.getTime() - this.settings.idleTimeoutMs;

    this.entries = this.entries.filter(
      (entry) => entry.utterance.timestamp.getTime() >= cutoff
    );

    if (this.pending && this.pending.utterance.timestamp.getTime() < cutoff) {
      this.pending = null;
    }
  }

  /**
   * Whether nothing has happened within the idle timeout
   */
  isExpired(now: Date): boolean {
    const last = this.lastActivity();
    if (!last) {
      return true;
    }
    return now.getTime() - last.getTime() > this.settings.idleTimeoutMs;
  }

  /**
   * Position of the most recent use of an intent (higher is more recent),
   * or -1 when the intent is not in the history
   */
  recencyOf(intent: string): number {
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].intent === intent) {
        return i;
      }
    }
    return -1;
  }

  /**
   * Timestamp of the newest entry or pending clarification
   */
  lastActivity(): Date | undefined {
    const newest = this.entries[this.entries.length - 1]?.utterance.timestamp;
    const pending = this.pending?.utterance.timestamp;
    if (newest && pending) {
      return newest > pending ? newest : pending;
    }
    return newest ?? pending;
  }

  getPendingClarification(): PendingClarification | null {
    return this.pending;
  }

  setPendingClarification(pending: PendingClarification): void {
    this.pending = {
      candidates: [...pending.candidates],
      entities: copyEntities(pending.entities),
      utterance: pending.utterance,
    };
  }

  clearPendingClarification(): void {
    this.pending = null;
  }

  /**
   * Get conversation history, oldest first
   */
  getHistory(): ContextEntry[] {
    return this.entries.map((entry) => ({
      ...entry,
      entities: copyEntities(entry.entities),
    }));
  }

  /**
   * Clear all context
   */
  clear(): void {
    this.entries = [];
    this.pending = null;
  }

  /**
   * Get context summary for debugging
   */
  getSummary(): {
    size: number;
    capacity: number;
    evictions: number;
    lastIntent?: string;
    pendingCandidates?: string[];
    lastActivity?: Date;
  } {
    return {
      size: this.entries.length,
      capacity: this.settings.capacity,
      evictions: this.evictions,
      lastIntent: this.entries[this.entries.length - 1]?.intent,
      pendingCandidates: this.pending ? [...this.pending.candidates] : undefined,
      lastActivity: this.lastActivity(),
    };
  }

  /**
   * Serialize to a JSON-safe snapshot
   */
  toSnapshot(): ConversationContextSnapshot {
    return {
      entries: this.entries.map((entry) => ({
        ...entry,
        entities: copyEntities(entry.entities),
        utterance: serializeUtterance(entry.utterance),
      })),
      ...(this.pending && {
        pending: {
          candidates: [...this.pending.candidates],
          entities: copyEntities(this.pending.entities),
          utterance: serializeUtterance(this.pending.utterance),
        },
      }),
      evictions: this.evictions,
    };
  }

  /**
   * Restore a context from a snapshot
   */
  static fromSnapshot(
    snapshot: ConversationContextSnapshot,
    settings: Partial<ContextSettings> = {}
  ): ConversationContext {
    const context = new ConversationContext(settings);
    for (const entry of snapshot.entries) {
      context.push({
        ...entry,
        utterance: restoreUtterance(entry.utterance),
      });
    }
    if (snapshot.pending) {
      context.setPendingClarification({
        ...snapshot.pending,
        utterance: restoreUtterance(snapshot.pending.utterance),
      });
    }
    context.evictions += snapshot.evictions;
    return context;
  }

  /**
   * Independent copy with the same settings and state
   */
  clone(): ConversationContext {
    return ConversationContext.fromSnapshot(this.toSnapshot(), this.settings);
  }
}

/**
 * Create a ConversationContext instance
 */
export function createConversationContext(
  settings: Partial<ContextSettings> = {}
): ConversationContext {
  return new ConversationContext(settings);
}
