#!/usr/bin/env node

import { Command } from "commander";
import { readFileSync } from "node:fs";
import { createInterface } from "node:readline/promises";
import { loadDispatcherConfig } from "./config/config-manager.js";
import { createDispatchPipeline, processText } from "./dispatcher/pipeline.js";
import { createUtterance } from "./nlp/normalizer.js";
import { extractSafely } from "./nlp/entity-extractor.js";
import { startServer } from "./server.js";
import { formatIntentList, formatPipelineResult } from "./utils/format-result.js";

const program = new Command();

interface DispatchOptions {
  config?: string;
  confidence?: string;
  execute?: boolean;
  json?: boolean;
  explain?: boolean;
}

function readVersion(): string {
  const raw: unknown = JSON.parse(
    readFileSync(new URL("../package.json", import.meta.url), "utf-8")
  );
  if (typeof raw === "object" && raw !== null && "version" in raw && typeof raw.version === "string") {
    return raw.version;
  }
  return "0.0.0";
}

function parseConfidence(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const confidence = Number(value);
  if (!Number.isFinite(confidence) || confidence < 0 || confidence > 1) {
    throw new Error(`Confidence must be a number between 0 and 1, got "${value}"`);
  }
  return confidence;
}

function fail(error: unknown): never {
  if (error instanceof Error) {
    console.error(`Error: ${error.message}`);
  } else {
    console.error("An unexpected error occurred");
  }
  process.exit(1);
}

program
  .name("voice-dispatch")
  .description("Dispatch voice utterances to intents")
  .version(readVersion());

program
  .command("dispatch")
  .description("Dispatch a single utterance")
  .argument("<text...>", "Utterance text")
  .option("-c, --config <path>", "Intent registry YAML file")
  .option("--confidence <value>", "Speech engine confidence (0-1)")
  .option("-x, --execute", "Execute the intent when it resolves")
  .option("--json", "Print the raw result as JSON")
  .option("--explain", "Print every candidate's score")
  .action(async (words: string[], options: DispatchOptions) => {
    try {
      const pipeline = createDispatchPipeline(loadDispatcherConfig(options.config));
      const text = words.join(" ");
      const confidence = parseConfidence(options.confidence);

      if (options.explain) {
        const utterance = createUtterance(text, { confidence });
        const { entities } = extractSafely(pipeline.extractor, utterance);
        const explanation = pipeline.dispatcher.explain(utterance, entities);
        for (const candidate of explanation.candidates) {
          console.log(
            `${candidate.intent}  confidence=${candidate.confidence.toFixed(3)}  pattern=${candidate.patternStrength.toFixed(3)}`
          );
        }
        if (explanation.candidates.length === 0) {
          console.log("No candidates");
        }
        return;
      }

      const session = pipeline.sessions.createSession();
      const result = await processText(pipeline, session.id, text, {
        confidence,
        execute: options.execute,
      });

      console.log(options.json ? JSON.stringify(result, null, 2) : formatPipelineResult(result));
      if (!result.success) {
        process.exit(1);
      }
    } catch (error) {
      fail(error);
    }
  });

program
  .command("intents")
  .description("List registered intents")
  .option("-c, --config <path>", "Intent registry YAML file")
  .action((options: { config?: string }) => {
    try {
      const { registry } = loadDispatcherConfig(options.config);
      console.log(formatIntentList(registry.summarize()));
    } catch (error) {
      fail(error);
    }
  });

program
  .command("chat")
  .description("Dispatch utterances interactively in one session")
  .option("-c, --config <path>", "Intent registry YAML file")
  .option("-x, --execute", "Execute intents as they resolve")
  .action(async (options: { config?: string; execute?: boolean }) => {
    try {
      const pipeline = createDispatchPipeline(loadDispatcherConfig(options.config));
      const session = pipeline.sessions.createSession();
      const rl = createInterface({ input: process.stdin, output: process.stdout });

      console.log('Type an utterance, or "exit" to quit.');
      rl.setPrompt("> ");
      rl.prompt();

      for await (const line of rl) {
        const text = line.trim();
        if (text === "exit" || text === "quit") {
          break;
        }
        if (text.length > 0) {
          const result = await processText(pipeline, session.id, text, {
            execute: options.execute,
          });
          console.log(formatPipelineResult(result));
        }
        rl.prompt();
      }

      rl.close();
    } catch (error) {
      fail(error);
    }
  });

program
  .command("serve")
  .description("Start the HTTP API")
  .option("-c, --config <path>", "Intent registry YAML file")
  .option("-p, --port <port>", "Port to listen on")
  .action((options: { config?: string; port?: string }) => {
    try {
      const port = options.port === undefined ? undefined : parseInt(options.port, 10);
      if (port !== undefined && (!Number.isInteger(port) || port <= 0 || port >= 65536)) {
        throw new Error(`Invalid port: ${options.port}`);
      }
      startServer({ configPath: options.config, port });
    } catch (error) {
      fail(error);
    }
  });

program.parseAsync(process.argv).catch(fail);
