import { describe, it, expect } from "vitest";
import {
  IntentRegistry,
  createIntentRegistry,
  parseIntentDefinitions,
  templatePlaceholders,
  type IntentDefinitionInput,
} from "../src/registry/intent-registry.js";
import { RegistryValidationError } from "../src/utils/error-handler.js";

const openApp: IntentDefinitionInput = {
  name: "open_app",
  description: "open an application",
  threshold: 0.8,
  schema: { required: ["app"] },
  rules: [
    { kind: "regex", pattern: "^open\\s+(?<app>\\w+)$", weight: 2 },
    { kind: "keywords", keywords: ["Open", " Launch "] },
  ],
  response: "Opening {app}",
};

const makeCall: IntentDefinitionInput = {
  name: "make_call",
  threshold: 0.8,
  schema: { required: ["contact"], optional: ["number"] },
  rules: [{ kind: "entity", labels: ["contact"] }],
};

function issuesOf(raw: unknown): string[] {
  try {
    parseIntentDefinitions(raw);
  } catch (error) {
    if (error instanceof RegistryValidationError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe("IntentRegistry", () => {
  it("keeps registration order and looks intents up by name", () => {
    const registry = createIntentRegistry([openApp, makeCall]);

    expect(registry.size).toBe(2);
    expect(registry.list().map((d) => d.name)).toEqual(["open_app", "make_call"]);
    expect(registry.indexOf("make_call")).toBe(1);
    expect(registry.indexOf("missing")).toBe(-1);
    expect(registry.get("open_app")?.description).toBe("open an application");
    expect(registry.has("missing")).toBe(false);
  });

  it("normalizes rules: lowercased keywords, default weight and case-insensitive regex", () => {
    const rules = createIntentRegistry([openApp]).get("open_app")?.rules ?? [];

    expect(rules[0]).toMatchObject({ kind: "regex", weight: 2 });
    expect(rules[0].kind === "regex" && rules[0].pattern.flags).toBe("i");
    expect(rules[1]).toEqual({ kind: "keywords", keywords: ["open", "launch"], weight: 1 });
  });

  it("collects every schema label", () => {
    const registry = createIntentRegistry([openApp, makeCall]);

    expect(registry.knownLabels()).toEqual(["app", "contact", "number"]);
    expect(registry.isKnownLabel("number")).toBe(true);
    expect(registry.isKnownLabel("topic")).toBe(false);
  });

  it("is frozen", () => {
    const registry = createIntentRegistry([openApp]);

    expect(Object.isFrozen(registry)).toBe(true);
    expect(Object.isFrozen(registry.list())).toBe(true);
    expect(Object.isFrozen(registry.get("open_app"))).toBe(true);
  });

  it("validates definitions passed straight to the constructor", () => {
    const build = (definition: IntentDefinitionInput) => () => new IntentRegistry([definition]);

    expect(build({ ...openApp, schema: {} })).toThrow(RegistryValidationError);
    expect(build({ ...openApp, threshold: 1.5 })).toThrow(RegistryValidationError);
    expect(build({ ...makeCall, threshold: -0.1 })).toThrow(RegistryValidationError);
    expect(build({ ...openApp, rules: [{ kind: "regex", pattern: /open/g }] })).toThrow(RegistryValidationError);
    expect(build({ ...openApp, rules: [{ kind: "regex", pattern: /open/y }] })).toThrow(RegistryValidationError);
    expect(build({ ...openApp, rules: [{ kind: "regex", pattern: /open/d }] })).toThrow(RegistryValidationError);
  });

  it("names the offending flag when a stateful regex is constructed", () => {
    let issues: string[] = [];
    try {
      new IntentRegistry([{ ...openApp, schema: { required: [] }, rules: [{ kind: "regex", pattern: /open/g }] }]);
    } catch (error) {
      if (error instanceof RegistryValidationError) {
        issues = error.issues;
      }
    }

    expect(issues).toEqual([
      'intent "open_app": schema must declare at least one entity label',
      'intent "open_app": rules[0].flags may only contain i, m, s, u',
      'intent "open_app": response uses {app} which is not in the schema',
    ]);
  });

  it("accepts already validated definitions", () => {
    const validated = createIntentRegistry([openApp, makeCall]);

    const rebuilt = new IntentRegistry(validated.list());

    expect(rebuilt.list()).toEqual(validated.list());
  });

  it("summarizes intents for listings", () => {
    expect(createIntentRegistry([makeCall]).summarize()).toEqual([
      {
        name: "make_call",
        threshold: 0.8,
        required: ["contact"],
        optional: ["number"],
        ruleKinds: ["entity"],
      },
    ]);
  });
});

describe("parseIntentDefinitions", () => {
  it("rejects an empty registry", () => {
    expect(issuesOf([])).toEqual(["intents must be a non-empty list"]);
  });

  it("rejects duplicate names", () => {
    expect(issuesOf([makeCall, makeCall])).toEqual(['intent "make_call" is registered twice']);
  });

  it("rejects thresholds outside 0-1", () => {
    expect(issuesOf([{ ...makeCall, threshold: 1.5 }])).toEqual([
      'intent "make_call": threshold must be a number between 0 and 1',
    ]);
  });

  it("requires at least one schema label", () => {
    expect(issuesOf([{ ...makeCall, schema: {}, rules: [{ kind: "keywords", keywords: ["call"] }] }])).toEqual([
      'intent "make_call": schema must declare at least one entity label',
    ]);
  });

  it("rejects regex groups and entity rules outside the schema", () => {
    const issues = issuesOf([
      {
        name: "set_reminder",
        threshold: 0.8,
        schema: { required: ["task"] },
        rules: [
          { kind: "regex", pattern: "remind me to (?<task>.+) at (?<time>.+)" },
          { kind: "entity", labels: ["when"] },
        ],
      },
    ]);

    expect(issues).toEqual([
      'intent "set_reminder": rules[0].pattern captures "time" which is not in the schema',
      'intent "set_reminder": rules[1].labels includes "when" which is not in the schema',
    ]);
  });

  it("rejects patterns that do not compile and unsupported flags", () => {
    const issues = issuesOf([
      {
        name: "broken",
        threshold: 0.5,
        schema: { optional: ["x"] },
        rules: [
          { kind: "regex", pattern: "(unclosed" },
          { kind: "regex", pattern: "ok", flags: "g" },
        ],
      },
    ]);

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^intent "broken": rules\[0\]\.pattern does not compile/);
    expect(issues[1]).toBe('intent "broken": rules[1].flags may only contain i, m, s, u');
  });

  it("rejects response placeholders outside the schema", () => {
    expect(issuesOf([{ ...makeCall, response: "Calling {contact} on {phone}" }])).toEqual([
      'intent "make_call": response uses {phone} which is not in the schema',
    ]);
  });

  it("lists every problem in one error", () => {
    const issues = issuesOf([
      { name: "", threshold: 0.5 },
      { ...makeCall, rules: [] },
    ]);

    expect(issues).toEqual([
      "intents[0].name must be a non-empty string",
      'intent "make_call": rules must be a non-empty list',
    ]);
  });
});

describe("templatePlaceholders", () => {
  it("finds plain and defaulted placeholders", () => {
    expect(templatePlaceholders("Weather for {location|here} at {time}")).toEqual(["location", "time"]);
  });
});
