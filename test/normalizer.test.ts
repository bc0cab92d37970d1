import { describe, it, expect } from "vitest";
import { clampConfidence, createUtterance, normalizeText } from "../src/nlp/normalizer.js";

describe("normalizeText", () => {
  it("lowercases, collapses whitespace and strips trailing punctuation", () => {
    expect(normalizeText("  Open   Chrome!! ")).toBe("open chrome");
  });

  it("straightens smart quotes", () => {
    expect(normalizeText("What’s the weather?")).toBe("what's the weather");
  });

  it("keeps punctuation inside the text", () => {
    expect(normalizeText("Call Dr. Smith.")).toBe("call dr. smith");
  });

  it("returns an empty string for blank input", () => {
    expect(normalizeText(" \t\n ")).toBe("");
  });
});

describe("clampConfidence", () => {
  it("clamps to the unit interval", () => {
    expect(clampConfidence(1.4)).toBe(1);
    expect(clampConfidence(-0.2)).toBe(0);
    expect(clampConfidence(0.42)).toBe(0.42);
  });

  it("maps non-finite values to 0", () => {
    expect(clampConfidence(Number.NaN)).toBe(0);
    expect(clampConfidence(Number.POSITIVE_INFINITY)).toBe(0);
  });
});

describe("createUtterance", () => {
  it("normalizes text and defaults confidence to 1", () => {
    const timestamp = new Date("2024-01-01T10:00:00Z");
    const utterance = createUtterance("Open Chrome.", { timestamp });

    expect(utterance).toEqual({ text: "open chrome", timestamp, confidence: 1 });
  });

  it("clamps confidence and freezes the value", () => {
    const utterance = createUtterance("hello", { confidence: 3 });

    expect(utterance.confidence).toBe(1);
    expect(Object.isFrozen(utterance)).toBe(true);
  });

  it("leaves pre-normalized text untouched", () => {
    expect(createUtterance("Already Done.", { normalized: true }).text).toBe("Already Done.");
  });
});
