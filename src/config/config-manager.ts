/**
 * Config Manager
 *
 * Loads dispatcher settings and the intent registry from a YAML file.
 * Settings are validated field by field and merged over the defaults;
 * intent definitions must be valid or loading fails.
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { parse as parseYaml } from "yaml";
import { IntentRegistry, parseIntentDefinitions } from "../registry/intent-registry.js";
import { ConfigLoadError } from "../utils/error-handler.js";
import { DEFAULT_DISPATCHER_CONFIG, type DispatcherConfig } from "../types.js";

/**
 * Registry and settings loaded from one file
 */
export interface LoadedConfig {
  config: DispatcherConfig;
  registry: IntentRegistry;
  /** File the configuration came from */
  path: string;
}

/**
 * Registry shipped with the package
 */
export const BUNDLED_CONFIG_PATH = fileURLToPath(
  new URL("../../config/intents.yaml", import.meta.url)
);

/**
 * Resolve the config file path.
 * Explicit path, then DISPATCHER_CONFIG, then ./config/intents.yaml,
 * then the bundled registry.
 */
export function getConfigPath(explicit?: string): string {
  if (explicit) {
    return explicit;
  }
  if (process.env.DISPATCHER_CONFIG) {
    return process.env.DISPATCHER_CONFIG;
  }
  const local = join(process.cwd(), "config", "intents.yaml");
  return existsSync(local) ? local : BUNDLED_CONFIG_PATH;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isUnitInterval(value: unknown): value is number {
  return typeof value === "number" && value >= 0 && value <= 1;
}

function isPositiveInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function warnInvalid(field: string, value: unknown): void {
  console.warn(
    `[ConfigManager] Ignoring invalid ${field}: ${JSON.stringify(value)}, using default`
  );
}

/**
 * Validate settings and merge with defaults
 */
export function validateAndMergeConfig(input: unknown): DispatcherConfig {
  const config: DispatcherConfig = {
    dispatcher: { ...DEFAULT_DISPATCHER_CONFIG.dispatcher },
    context: { ...DEFAULT_DISPATCHER_CONFIG.context },
    sessions: { ...DEFAULT_DISPATCHER_CONFIG.sessions },
    server: { ...DEFAULT_DISPATCHER_CONFIG.server },
  };

  if (!isRecord(input)) {
    return config;
  }

  // Scoring (0-1 each)
  if (isRecord(input.dispatcher)) {
    const d = input.dispatcher;
    for (const key of ["floor", "patternWeight", "speechWeight", "clarificationBoost"] as const) {
      if (d[key] === undefined) {
        continue;
      }
      const value = d[key];
      if (isUnitInterval(value)) {
        config.dispatcher[key] = value;
      } else {
        warnInvalid(`dispatcher.${key}`, value);
      }
    }
    if (config.dispatcher.patternWeight + config.dispatcher.speechWeight <= 0) {
      warnInvalid("dispatcher weights", [config.dispatcher.patternWeight, config.dispatcher.speechWeight]);
      config.dispatcher.patternWeight = DEFAULT_DISPATCHER_CONFIG.dispatcher.patternWeight;
      config.dispatcher.speechWeight = DEFAULT_DISPATCHER_CONFIG.dispatcher.speechWeight;
    }
  }

  if (isRecord(input.context)) {
    const c = input.context;
    if (c.capacity !== undefined) {
      if (isPositiveInteger(c.capacity)) {
        config.context.capacity = c.capacity;
      } else {
        warnInvalid("context.capacity", c.capacity);
      }
    }
    if (c.idleTimeoutMs !== undefined) {
      if (isPositiveInteger(c.idleTimeoutMs)) {
        config.context.idleTimeoutMs = c.idleTimeoutMs;
      } else {
        warnInvalid("context.idleTimeoutMs", c.idleTimeoutMs);
      }
    }
  }

  if (isRecord(input.sessions)) {
    const s = input.sessions;
    if (s.sessionTimeoutMs !== undefined) {
      if (isPositiveInteger(s.sessionTimeoutMs)) {
        config.sessions.sessionTimeoutMs = s.sessionTimeoutMs;
      } else {
        warnInvalid("sessions.sessionTimeoutMs", s.sessionTimeoutMs);
      }
    }
    if (s.maxSessions !== undefined) {
      if (isPositiveInteger(s.maxSessions)) {
        config.sessions.maxSessions = s.maxSessions;
      } else {
        warnInvalid("sessions.maxSessions", s.maxSessions);
      }
    }
  }

  if (isRecord(input.server) && input.server.port !== undefined) {
    if (isPositiveInteger(input.server.port) && input.server.port < 65536) {
      config.server.port = input.server.port;
    } else {
      warnInvalid("server.port", input.server.port);
    }
  }

  return config;
}

/**
 * Parse YAML text into settings and a registry
 */
export function parseConfigText(text: string, path: string): LoadedConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    throw new ConfigLoadError(
      `Invalid YAML: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  if (!isRecord(document)) {
    throw new ConfigLoadError("Config must be a YAML mapping", path);
  }

  return {
    config: validateAndMergeConfig(document),
    registry: new IntentRegistry(parseIntentDefinitions(document.intents)),
    path,
  };
}

/**
 * Load configuration from disk. PORT overrides server.port.
 */
export function loadDispatcherConfig(explicitPath?: string): LoadedConfig {
  const path = getConfigPath(explicitPath);

  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    throw new ConfigLoadError(
      `Cannot read config: ${error instanceof Error ? error.message : String(error)}`,
      path
    );
  }

  const loaded = parseConfigText(text, path);

  if (process.env.PORT) {
    const port = parseInt(process.env.PORT, 10);
    if (isPositiveInteger(port) && port < 65536) {
      loaded.config.server.port = port;
    } else {
      warnInvalid("PORT", process.env.PORT);
    }
  }

  console.log(
    `[ConfigManager] Loaded ${loaded.registry.size} intent(s) from ${path}`
  );
  return loaded;
}
