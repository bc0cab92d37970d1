/**
 * Match Rules
 *
 * Uniform scoring for the MatchRule variants. Every rule scores 0-1 and an
 * intent's pattern strength is the weighted mean of its rule scores.
 */

import type { EntityRule, KeywordRule, MatchRule, RegexRule } from "../types.js";

/**
 * What rules are evaluated against
 */
export interface MatchInput {
  /** Normalized utterance text */
  text: string;

  /** Word tokens of the text */
  tokens: readonly string[];

  /** Labels of the accepted entities */
  labels: ReadonlySet<string>;
}

/**
 * Split text into lowercase word tokens
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}']+/u)
    .filter((token) => token.length > 0);
}

/**
 * Build the rule input for a text and its entity labels
 */
export function createMatchInput(
  text: string,
  labels: Iterable<string> = []
): MatchInput {
  return {
    text,
    tokens: tokenize(text),
    labels: new Set(labels),
  };
}

function containsPhrase(tokens: readonly string[], phrase: string): boolean {
  const words = tokenize(phrase);
  if (words.length === 0) {
    return false;
  }
  if (words.length === 1) {
    return tokens.includes(words[0]);
  }
  return ` ${tokens.join(" ")} `.includes(` ${words.join(" ")} `);
}

function scoreKeywords(rule: KeywordRule, input: MatchInput): number {
  const matched = rule.keywords.filter((keyword) =>
    containsPhrase(input.tokens, keyword)
  ).length;
  const saturation = Math.max(1, Math.min(rule.minMatches ?? 1, rule.keywords.length));
  return Math.min(1, matched / saturation);
}

function scoreRegex(rule: RegexRule, input: MatchInput): number {
  return rule.pattern.test(input.text) ? 1 : 0;
}

function scoreEntities(rule: EntityRule, input: MatchInput): number {
  if (rule.labels.length === 0) {
    return 0;
  }
  const present = rule.labels.filter((label) => input.labels.has(label)).length;
  return present / rule.labels.length;
}

/**
 * Score a single rule (0-1)
 */
export function scoreRule(rule: MatchRule, input: MatchInput): number {
  switch (rule.kind) {
    case "keywords":
      return scoreKeywords(rule, input);
    case "regex":
      return scoreRegex(rule, input);
    case "entity":
      return scoreEntities(rule, input);
  }
}

/**
 * Weighted mean of rule scores (0-1). Rules without positive weight count
 * for nothing.
 */
export function scorePatternStrength(
  rules: readonly MatchRule[],
  input: MatchInput
): number {
  let weighted = 0;
  let totalWeight = 0;

  for (const rule of rules) {
    if (!(rule.weight > 0)) {
      continue;
    }
    weighted += rule.weight * scoreRule(rule, input);
    totalWeight += rule.weight;
  }

  if (totalWeight === 0) {
    return 0;
  }
  return Math.min(1, weighted / totalWeight);
}

/**
 * Names of the capture groups in a pattern, in source order
 */
export function namedGroups(pattern: RegExp): string[] {
  const names: string[] = [];
  const groupPattern = /\(\?<([A-Za-z_$][\w$]*)>/g;
  let match: RegExpExecArray | null;
  while ((match = groupPattern.exec(pattern.source)) !== null) {
    names.push(match[1]);
  }
  return names;
}
