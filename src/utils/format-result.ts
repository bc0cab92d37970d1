/**
 * Plain-text rendering of dispatch results for the CLI
 */

import type { PipelineResult } from "../dispatcher/pipeline.js";
import type { IntentSummary } from "../registry/intent-registry.js";
import type { DispatchError } from "./error-handler.js";
import type { DispatchResult } from "../types.js";

function formatScore(confidence: number): string {
  return confidence.toFixed(2);
}

/**
 * One-line summary of a dispatch outcome
 */
export function formatDispatchResult(result: DispatchResult): string {
  switch (result.type) {
    case "resolved": {
      const bindings = Object.entries(result.bindings)
        .map(([label, value]) => `${label}=${value}`)
        .join(" ");
      return `✓ ${result.intent} (${formatScore(result.confidence)})${bindings ? ` ${bindings}` : ""}`;
    }

    case "clarifying": {
      const candidates = result.candidates
        .map((c) => `${c.intent} ${formatScore(c.confidence)}`)
        .join(", ");
      return `? ${result.question} [${candidates}]`;
    }

    case "unrecognized": {
      const guess = result.bestGuess
        ? `, best guess ${result.bestGuess.intent} ${formatScore(result.bestGuess.confidence)}`
        : "";
      return `✗ unrecognized (${result.reason}${guess})`;
    }
  }
}

function formatWarnings(warnings: readonly DispatchError[]): string[] {
  return warnings.map((warning) => `  ! ${warning.message}`);
}

/**
 * Full pipeline output: outcome, execution and warnings
 */
export function formatPipelineResult(result: PipelineResult): string {
  if (!result.success) {
    return [`✗ [${result.error.code}] ${result.error.message}`, ...formatWarnings(result.warnings)].join("\n");
  }

  const lines = [formatDispatchResult(result.result)];
  if (result.execution) {
    lines.push(
      result.execution.success
        ? `  → ${result.execution.message ?? "done"}`
        : `  ✗ ${result.execution.error ?? "execution failed"}`
    );
  }
  lines.push(...formatWarnings(result.warnings));
  return lines.join("\n");
}

/**
 * Table of registered intents
 */
export function formatIntentList(intents: readonly IntentSummary[]): string {
  const width = Math.max(0, ...intents.map((intent) => intent.name.length));
  return intents
    .map((intent) => {
      const labels = [
        ...intent.required,
        ...intent.optional.map((label) => `[${label}]`),
      ].join(" ");
      return `${intent.name.padEnd(width)}  ${formatScore(intent.threshold)}  ${labels}`;
    })
    .join("\n");
}
