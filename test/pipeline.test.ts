import { describe, it, expect, vi, beforeAll, afterAll } from "vitest";
import { BUNDLED_CONFIG_PATH, loadDispatcherConfig, type LoadedConfig } from "../src/config/config-manager.js";
import { createDispatchPipeline, processText } from "../src/dispatcher/pipeline.js";

describe("processText", () => {
  let loaded: LoadedConfig;
  const at = new Date("2024-07-01T18:00:00Z");

  beforeAll(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    loaded = loadDispatcherConfig(BUNDLED_CONFIG_PATH);
  });

  afterAll(() => {
    vi.restoreAllMocks();
  });

  it("extracts entities, resolves and executes", async () => {
    const pipeline = createDispatchPipeline(loaded);
    const session = pipeline.sessions.createSession(at);

    const result = await processText(pipeline, session.id, "Remind me to buy milk at 5 pm", { execute: true, now: at });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.result).toMatchObject({ type: "resolved", intent: "set_reminder", bindings: { task: "buy milk", time: "5 pm" } });
      expect(result.execution?.message).toBe("Reminder set for buy milk at 5 pm");
    }
  });

  it("mixes in the speech confidence", async () => {
    const pipeline = createDispatchPipeline(loaded);
    const session = pipeline.sessions.createSession(at);

    const result = await processText(pipeline, session.id, "How are you?", { confidence: 0, now: at });

    expect(result.success && result.result.type === "resolved" && result.result.intent).toBe("general_chat");
    expect(result.success && result.result.type === "resolved" && result.result.confidence).toBeCloseTo(0.8);
  });

  it("does not execute unless asked", async () => {
    const pipeline = createDispatchPipeline(loaded);
    const session = pipeline.sessions.createSession(at);

    const result = await processText(pipeline, session.id, "call john", { now: at });

    expect(result.success && "execution" in result).toBe(false);
  });

  it("continues without entities when the extractor fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const pipeline = createDispatchPipeline(loaded, {
      extractor: {
        extract: () => {
          throw new Error("extractor crashed");
        },
      },
    });
    const session = pipeline.sessions.createSession(at);

    const result = await processText(pipeline, session.id, "open chrome", { now: at });

    expect(result.success && result.result).toEqual({ type: "unrecognized", reason: "no_match", utterance: "open chrome" });
    expect(warn).toHaveBeenCalledWith("[EntityExtractor] extractor crashed, continuing without entities");
    warn.mockRestore();
  });
});
