/**
 * Intent Registry
 *
 * Immutable snapshot of the registered intents. Built once at process start
 * (from code or from the YAML config) and injected into the dispatcher.
 * Registration order is significant: it is the last tie-breaker.
 */

import { RegistryValidationError } from "../utils/error-handler.js";
import { namedGroups } from "../nlp/match-rules.js";
import type {
  EntitySchema,
  IntentDefinition,
  MatchRule,
  MatchRuleKind,
} from "../types.js";

/**
 * Rule as written in configuration. Regex patterns may be strings.
 */
export type MatchRuleInput =
  | { kind: "keywords"; keywords: string[]; minMatches?: number; weight?: number }
  | { kind: "regex"; pattern: string | RegExp; flags?: string; weight?: number }
  | { kind: "entity"; labels: string[]; weight?: number };

/**
 * Intent definition as written in configuration
 */
export interface IntentDefinitionInput {
  name: string;
  description?: string;
  threshold: number;
  schema: { required?: string[]; optional?: string[] };
  rules: MatchRuleInput[];
  response?: string;
}

/**
 * Summary of an intent for listings
 */
export interface IntentSummary {
  name: string;
  description?: string;
  threshold: number;
  required: string[];
  optional: string[];
  ruleKinds: MatchRuleKind[];
}

const RULE_KINDS: readonly MatchRuleKind[] = ["keywords", "regex", "entity"];
const ALLOWED_REGEX_FLAGS = /^[imsu]*$/;
const DEFAULT_REGEX_FLAGS = "i";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function readLabels(
  value: unknown,
  where: string,
  issues: string[]
): string[] {
  if (value === undefined) {
    return [];
  }
  if (!Array.isArray(value) || !value.every(isNonEmptyString)) {
    issues.push(`${where} must be a list of non-empty labels`);
    return [];
  }
  return value.map((label) => label.trim());
}

function readWeight(value: unknown, where: string, issues: string[]): number {
  if (value === undefined) {
    return 1;
  }
  if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
    issues.push(`${where}.weight must be a positive number`);
    return 1;
  }
  return value;
}

function parseRule(
  raw: unknown,
  where: string,
  schemaLabels: ReadonlySet<string>,
  issues: string[]
): MatchRule | null {
  if (!isRecord(raw)) {
    issues.push(`${where} must be an object`);
    return null;
  }

  const kind = raw.kind;
  const weight = readWeight(raw.weight, where, issues);

  switch (kind) {
    case "keywords": {
      const keywords = raw.keywords;
      if (!Array.isArray(keywords) || keywords.length === 0 || !keywords.every(isNonEmptyString)) {
        issues.push(`${where}.keywords must be a non-empty list of strings`);
        return null;
      }
      const minMatches = typeof raw.minMatches === "number" ? raw.minMatches : undefined;
      if (
        (raw.minMatches !== undefined && minMatches === undefined) ||
        (minMatches !== undefined && (!Number.isInteger(minMatches) || minMatches < 1))
      ) {
        issues.push(`${where}.minMatches must be a positive integer`);
        return null;
      }
      return Object.freeze({
        kind: "keywords",
        keywords: Object.freeze(keywords.map((k) => k.trim().toLowerCase())),
        ...(minMatches !== undefined && { minMatches }),
        weight,
      });
    }

    case "regex": {
      const flags = raw.flags ?? (raw.pattern instanceof RegExp ? raw.pattern.flags : DEFAULT_REGEX_FLAGS);
      if (typeof flags !== "string" || !ALLOWED_REGEX_FLAGS.test(flags)) {
        issues.push(`${where}.flags may only contain i, m, s, u`);
        return null;
      }
      const source = raw.pattern instanceof RegExp ? raw.pattern.source : raw.pattern;
      if (!isNonEmptyString(source)) {
        issues.push(`${where}.pattern must be a non-empty pattern`);
        return null;
      }
      let pattern: RegExp;
      try {
        pattern = new RegExp(source, flags);
      } catch (error) {
        issues.push(
          `${where}.pattern does not compile: ${error instanceof Error ? error.message : String(error)}`
        );
        return null;
      }
      for (const group of namedGroups(pattern)) {
        if (!schemaLabels.has(group)) {
          issues.push(`${where}.pattern captures "${group}" which is not in the schema`);
        }
      }
      return Object.freeze({ kind: "regex", pattern, weight });
    }

    case "entity": {
      const labels = readLabels(raw.labels, `${where}.labels`, issues);
      if (labels.length === 0) {
        issues.push(`${where}.labels must name at least one label`);
        return null;
      }
      for (const label of labels) {
        if (!schemaLabels.has(label)) {
          issues.push(`${where}.labels includes "${label}" which is not in the schema`);
        }
      }
      return Object.freeze({ kind: "entity", labels: Object.freeze(labels), weight });
    }

    default:
      issues.push(`${where}.kind must be one of ${RULE_KINDS.join(", ")}`);
      return null;
  }
}

function parseDefinition(
  raw: unknown,
  index: number,
  issues: string[]
): IntentDefinition | null {
  const where = `intents[${index}]`;
  if (!isRecord(raw)) {
    issues.push(`${where} must be an object`);
    return null;
  }

  if (!isNonEmptyString(raw.name)) {
    issues.push(`${where}.name must be a non-empty string`);
    return null;
  }
  const name = raw.name.trim();
  const named = `intent "${name}"`;
  const before = issues.length;

  const threshold = raw.threshold;
  if (typeof threshold !== "number" || !(threshold >= 0 && threshold <= 1)) {
    issues.push(`${named}: threshold must be a number between 0 and 1`);
  }

  let schema: EntitySchema = { required: [], optional: [] };
  if (!isRecord(raw.schema)) {
    issues.push(`${named}: schema must be an object with required/optional labels`);
  } else {
    const required = readLabels(raw.schema.required, `${named}: schema.required`, issues);
    const optional = readLabels(raw.schema.optional, `${named}: schema.optional`, issues);
    if (required.length + optional.length === 0) {
      issues.push(`${named}: schema must declare at least one entity label`);
    }
    const overlap = required.filter((label) => optional.includes(label));
    if (overlap.length > 0) {
      issues.push(`${named}: labels both required and optional: ${overlap.join(", ")}`);
    }
    schema = Object.freeze({
      required: Object.freeze([...new Set(required)]),
      optional: Object.freeze([...new Set(optional)]),
    });
  }
  const schemaLabels = new Set([...schema.required, ...schema.optional]);

  const rules: MatchRule[] = [];
  if (!Array.isArray(raw.rules) || raw.rules.length === 0) {
    issues.push(`${named}: rules must be a non-empty list`);
  } else {
    raw.rules.forEach((rule, ruleIndex) => {
      const parsed = parseRule(rule, `${named}: rules[${ruleIndex}]`, schemaLabels, issues);
      if (parsed) {
        rules.push(parsed);
      }
    });
  }

  if (raw.description !== undefined && typeof raw.description !== "string") {
    issues.push(`${named}: description must be a string`);
  }

  if (raw.response !== undefined) {
    if (typeof raw.response !== "string") {
      issues.push(`${named}: response must be a string`);
    } else {
      for (const placeholder of templatePlaceholders(raw.response)) {
        if (!schemaLabels.has(placeholder)) {
          issues.push(`${named}: response uses {${placeholder}} which is not in the schema`);
        }
      }
    }
  }

  if (issues.length > before || typeof threshold !== "number") {
    return null;
  }

  return Object.freeze({
    name,
    ...(typeof raw.description === "string" && { description: raw.description }),
    schema,
    threshold,
    rules: Object.freeze(rules),
    ...(typeof raw.response === "string" && { response: raw.response }),
  });
}

/**
 * Response template placeholder: {label} or {label|fallback}
 */
export const TEMPLATE_PLACEHOLDER = /\{(\w+)(?:\|([^}]*))?\}/g;

/**
 * Placeholder names in a response template ("Opening {app}" -> ["app"])
 */
export function templatePlaceholders(template: string): string[] {
  return Array.from(template.matchAll(TEMPLATE_PLACEHOLDER), (match) => match[1]);
}

/**
 * Validate raw intent definitions. Throws RegistryValidationError listing
 * every problem found.
 */
export function parseIntentDefinitions(raw: unknown): IntentDefinition[] {
  const issues: string[] = [];

  if (!Array.isArray(raw) || raw.length === 0) {
    throw new RegistryValidationError(["intents must be a non-empty list"]);
  }

  const definitions: IntentDefinition[] = [];
  const seen = new Set<string>();

  raw.forEach((entry, index) => {
    const definition = parseDefinition(entry, index, issues);
    if (!definition) {
      return;
    }
    if (seen.has(definition.name)) {
      issues.push(`intent "${definition.name}" is registered twice`);
      return;
    }
    seen.add(definition.name);
    definitions.push(definition);
  });

  if (issues.length > 0) {
    throw new RegistryValidationError(issues);
  }

  return definitions;
}

/**
 * Intent Registry class. Definitions are validated on construction, so every
 * instance holds non-empty schemas, thresholds in [0, 1] and stateless regexes.
 */
export class IntentRegistry {
  private readonly definitions: readonly IntentDefinition[];
  private readonly byName: ReadonlyMap<string, IntentDefinition>;
  private readonly order: ReadonlyMap<string, number>;
  private readonly labels: ReadonlySet<string>;

  constructor(input: readonly (IntentDefinition | IntentDefinitionInput)[]) {
    const definitions = parseIntentDefinitions(input);
    this.definitions = Object.freeze(definitions);
    this.byName = new Map(definitions.map((d) => [d.name, d]));
    this.order = new Map(definitions.map((d, index) => [d.name, index]));
    this.labels = new Set(
      definitions.flatMap((d) => [...d.schema.required, ...d.schema.optional])
    );
    Object.freeze(this);
  }

  /**
   * Number of registered intents
   */
  get size(): number {
    return this.definitions.length;
  }

  /**
   * All intents in registration order
   */
  list(): readonly IntentDefinition[] {
    return this.definitions;
  }

  get(name: string): IntentDefinition | undefined {
    return this.byName.get(name);
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  /**
   * Registration index, or -1 for unknown intents
   */
  indexOf(name: string): number {
    return this.order.get(name) ?? -1;
  }

  /**
   * Whether any intent's schema mentions the label
   */
  isKnownLabel(label: string): boolean {
    return this.labels.has(label);
  }

  /**
   * Every label mentioned by a schema
   */
  knownLabels(): string[] {
    return [...this.labels];
  }

  /**
   * Listing-friendly view of the registry
   */
  summarize(): IntentSummary[] {
    return this.definitions.map((d) => ({
      name: d.name,
      ...(d.description !== undefined && { description: d.description }),
      threshold: d.threshold,
      required: [...d.schema.required],
      optional: [...d.schema.optional],
      ruleKinds: d.rules.map((rule) => rule.kind),
    }));
  }
}

/**
 * Create an IntentRegistry from definitions written in code or config
 */
export function createIntentRegistry(
  definitions: readonly IntentDefinitionInput[]
): IntentRegistry {
  return new IntentRegistry(definitions);
}
