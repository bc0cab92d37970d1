/**
 * Entity Extractor
 *
 * Default extractor: runs every registry regex rule that has named capture
 * groups and turns the groups into entities with exact spans. Any other
 * extractor (an NLP service, an LLM) can stand in through the EntityExtractor
 * interface. Extraction failures degrade to an empty list.
 */

import { namedGroups } from "./match-rules.js";
import type { IntentRegistry } from "../registry/intent-registry.js";
import type { Entity, Utterance } from "../types.js";

/**
 * Delivers entities for an utterance
 */
export interface EntityExtractor {
  extract(utterance: Utterance): Entity[];
}

/**
 * Entity extraction result with metadata
 */
export interface ExtractionResult {
  success: boolean;
  entities: Entity[];
  error?: string;
  duration_ms: number;
}

interface GroupPattern {
  pattern: RegExp;
  groups: string[];
}

/**
 * Pattern Entity Extractor class
 */
export class PatternEntityExtractor implements EntityExtractor {
  private readonly patterns: GroupPattern[];

  constructor(registry: IntentRegistry) {
    this.patterns = [];
    for (const definition of registry.list()) {
      for (const rule of definition.rules) {
        if (rule.kind !== "regex") {
          continue;
        }
        const groups = namedGroups(rule.pattern);
        if (groups.length > 0) {
          // d: capture group indices for spans
          this.patterns.push({ pattern: new RegExp(rule.pattern.source, `${rule.pattern.flags}d`), groups });
        }
      }
    }
  }

  /**
   * Extract entities, ordered by span start
   */
  extract(utterance: Utterance): Entity[] {
    const seen = new Set<string>();
    const entities: Entity[] = [];

    for (const { pattern, groups } of this.patterns) {
      const match = pattern.exec(utterance.text);
      const indices = match?.indices?.groups;
      if (!match || !indices) {
        continue;
      }

      for (const label of groups) {
        const range = indices[label];
        const raw = match.groups?.[label];
        if (!range || raw === undefined) {
          continue;
        }

        // Trim the value and keep the span on the trimmed text
        const leading = raw.length - raw.trimStart().length;
        const value = raw.trim();
        if (value.length === 0) {
          continue;
        }
        const start = range[0] + leading;
        const end = start + value.length;

        const key = `${label}:${start}:${end}`;
        if (seen.has(key)) {
          continue;
        }
        seen.add(key);
        entities.push({ label, value, span: { start, end } });
      }
    }

    return entities.sort((a, b) => a.span.start - b.span.start || a.span.end - b.span.end);
  }
}

/**
 * Run any extractor, degrading to an empty list on failure
 */
export function extractSafely(
  extractor: EntityExtractor,
  utterance: Utterance
): ExtractionResult {
  const startTime = Date.now();

  try {
    return {
      success: true,
      entities: extractor.extract(utterance),
      duration_ms: Date.now() - startTime,
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : "Entity extraction failed";
    console.warn(`[EntityExtractor] ${message}, continuing without entities`);
    return {
      success: false,
      entities: [],
      error: message,
      duration_ms: Date.now() - startTime,
    };
  }
}

/**
 * Create the default extractor for a registry
 */
export function createEntityExtractor(registry: IntentRegistry): PatternEntityExtractor {
  return new PatternEntityExtractor(registry);
}
