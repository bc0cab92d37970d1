/**
 * Utterance Normalizer
 *
 * Builds immutable Utterance values from raw transcriptions. Entity spans
 * always refer to the normalized text produced here.
 */

import type { Utterance } from "../types.js";

/**
 * Options for createUtterance()
 */
export interface UtteranceOptions {
  /** Speech engine confidence, clamped to 0-1 (default 1) */
  confidence?: number;

  /** Capture time (default now) */
  timestamp?: Date;

  /** Skip normalization when the text is already normalized */
  normalized?: boolean;
}

/**
 * Normalize transcribed text: lowercase, straight quotes, single spaces,
 * no trailing sentence punctuation.
 */
export function normalizeText(raw: string): string {
  return raw
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .toLowerCase()
    .replace(/\s+/g, " ")
    .trim()
    .replace(/[.!?,;:]+$/, "")
    .trim();
}

/**
 * Clamp a score to 0-1. Non-finite values become 0.
 */
export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.min(1, Math.max(0, value));
}

/**
 * Create a frozen Utterance
 */
export function createUtterance(
  text: string,
  options: UtteranceOptions = {}
): Utterance {
  return Object.freeze({
    text: options.normalized ? text : normalizeText(text),
    timestamp: options.timestamp ?? new Date(),
    confidence: clampConfidence(options.confidence ?? 1),
  });
}
