import { describe, expect, it } from "vitest";

import { InvalidScriptNameError } from "../core/errors.js";

import {
  LocalMappingSchema,
  assertValidScriptName,
  parseRemoteMapping,
  scriptDocumentDescription,
  scriptNameProblem,
  serializeRemoteMapping,
  type ScriptEntry,
} from "./schema.js";

function entry(name: string, overrides: Partial<ScriptEntry> = {}): ScriptEntry {
  return {
    script_name: name,
    document_id: `doc-${name}`,
    created_at: "2024-05-01T10:00:00Z",
    updated_at: "2024-05-01T10:00:00Z",
    tags: [],
    ...overrides,
  };
}

describe("script names", () => {
  it.each([
    ["", "name is empty"],
    ["a/b", "name contains a path separator"],
    ["a\\b", "name contains a path separator"],
    [".", "name is a relative path segment"],
    ["..", "name is a relative path segment"],
    [" padded", "name has leading or trailing whitespace"],
  ])("rejects %j", (name, problem) => {
    expect(scriptNameProblem(name)).toBe(problem);
  });

  it("accepts case-sensitive names with dots and dashes", () => {
    expect(scriptNameProblem("Weather.v2-final")).toBeNull();
    expect(() => assertValidScriptName("weather")).not.toThrow();
  });

  it("throws a typed error for invalid names", () => {
    expect(() => assertValidScriptName("../etc")).toThrow(InvalidScriptNameError);
  });
});

describe("parseRemoteMapping", () => {
  it("accepts an empty record without a version", () => {
    expect(parseRemoteMapping('{"entries":{}}')).toEqual({ ok: true, entries: {} });
  });

  it("fills script_name from the key and normalizes tags", () => {
    const parsed = parseRemoteMapping(
      JSON.stringify({
        version: 1,
        entries: {
          weather: {
            document_id: "g1",
            created_at: "2024-05-01T10:00:00Z",
            updated_at: "2024-05-02T10:00:00Z",
            tags: ["web", "cli", "web", " "],
          },
        },
      }),
    );

    expect(parsed).toEqual({
      ok: true,
      entries: {
        weather: {
          script_name: "weather",
          document_id: "g1",
          created_at: "2024-05-01T10:00:00Z",
          updated_at: "2024-05-02T10:00:00Z",
          tags: ["cli", "web"],
        },
      },
    });
  });

  it("rejects an entry whose script_name disagrees with its key", () => {
    const parsed = parseRemoteMapping(
      JSON.stringify({ entries: { a: entry("b") } }),
    );

    expect(parsed.ok).toBe(false);
    if (!parsed.ok) {
      expect(parsed.problem).toBe('entries.a.script_name: script_name "b" does not match its key');
    }
  });

  it("rejects unknown versions, bad names and non-JSON", () => {
    expect(parseRemoteMapping('{"version":2,"entries":{}}').ok).toBe(false);
    expect(parseRemoteMapping(JSON.stringify({ entries: { "a/b": entry("a/b") } })).ok).toBe(false);
    expect(parseRemoteMapping("not json").ok).toBe(false);
    expect(parseRemoteMapping("[]").ok).toBe(false);
  });
});

describe("serializeRemoteMapping", () => {
  it("writes published entries only, sorted by name", () => {
    const content = serializeRemoteMapping({
      zeta: entry("zeta"),
      draft: entry("draft", { document_id: "" }),
      alpha: entry("alpha"),
    });

    const parsed: unknown = JSON.parse(content);
    expect(parsed).toEqual({ version: 1, entries: { alpha: entry("alpha"), zeta: entry("zeta") } });
    expect(content.indexOf('"alpha"')).toBeLessThan(content.indexOf('"zeta"'));
    expect(content.endsWith("}\n")).toBe(true);
  });
});

describe("LocalMappingSchema", () => {
  it("defaults revision and last_synced_at to null", () => {
    const parsed = LocalMappingSchema.parse({ entries: {} });

    expect(parsed).toEqual({ version: 1, entries: {}, revision: null, last_synced_at: null });
  });
});

describe("scriptDocumentDescription", () => {
  it("prefixes the script name", () => {
    expect(scriptDocumentDescription("weather", null)).toBe("[script-inventory] weather");
    expect(scriptDocumentDescription("weather", "Fetch it")).toBe(
      "[script-inventory] weather: Fetch it",
    );
  });
});
