import { z } from "zod";

import { InvalidScriptNameError } from "../core/errors.js";

/** Description carried by mapping documents and by nothing else. */
export const MAPPING_SENTINEL = "script-inventory:mapping-record:v1";
export const MAPPING_SCHEMA_VERSION = 1;
export const MAPPING_FILENAME = "script-inventory.json";
export const SCRIPT_DESCRIPTION_PREFIX = "[script-inventory]";

// =============================================================================
// SCRIPT NAMES
// =============================================================================

export function scriptNameProblem(name: string): string | null {
  if (name.length === 0) return "name is empty";
  if (name.trim() !== name) return "name has leading or trailing whitespace";
  if (/[\\/]/.test(name)) return "name contains a path separator";
  if (name === "." || name === "..") return "name is a relative path segment";
  if (/[\u0000-\u001f]/.test(name)) return "name contains control characters";
  return null;
}

export function assertValidScriptName(name: string): void {
  const problem = scriptNameProblem(name);
  if (problem) {
    throw new InvalidScriptNameError(name, problem);
  }
}

const ScriptNameSchema = z.string().superRefine((value, ctx) => {
  const problem = scriptNameProblem(value);
  if (problem) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
  }
});

const TimestampSchema = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), { message: "not a timestamp" });

// =============================================================================
// ENTRIES
// =============================================================================

export const ScriptEntrySchema = z.object({
  script_name: ScriptNameSchema.optional(),
  document_id: z.string().default(""),
  created_at: TimestampSchema,
  updated_at: TimestampSchema,
  tags: z.array(z.string()).default([]),
});

export type ScriptEntry = {
  script_name: string;
  document_id: string;
  created_at: string;
  updated_at: string;
  tags: string[];
};

const EntriesSchema = z
  .record(ScriptNameSchema, ScriptEntrySchema)
  .superRefine((entries, ctx) => {
    for (const [key, entry] of Object.entries(entries)) {
      if (entry.script_name !== undefined && entry.script_name !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, "script_name"],
          message: `script_name "${entry.script_name}" does not match its key`,
        });
      }
    }
  })
  .transform((entries) => {
    const normalized: Record<string, ScriptEntry> = {};
    for (const [key, entry] of Object.entries(entries)) {
      normalized[key] = {
        script_name: key,
        document_id: entry.document_id,
        created_at: entry.created_at,
        updated_at: entry.updated_at,
        tags: normalizeTags(entry.tags),
      };
    }
    return normalized;
  });

// =============================================================================
// RECORDS
// =============================================================================

/** Content of the remote mapping document. */
export const RemoteMappingSchema = z.object({
  version: z.literal(MAPPING_SCHEMA_VERSION).default(MAPPING_SCHEMA_VERSION),
  entries: EntriesSchema,
});

/** Content of the local mapping file. */
export const LocalMappingSchema = RemoteMappingSchema.extend({
  revision: z.string().nullable().default(null),
  last_synced_at: TimestampSchema.nullable().default(null),
});

export type MappingRecord = {
  entries: Record<string, ScriptEntry>;
  revision: string | null;
  lastSyncedAt: string | null;
};

export const PointerSchema = z
  .object({
    document_id: z.string().min(1),
    owner: z.string().min(1),
    updated_at: TimestampSchema,
  })
  .strict();

export type RemoteDocumentPointer = z.infer<typeof PointerSchema>;

export function emptyMappingRecord(): MappingRecord {
  return { entries: {}, revision: null, lastSyncedAt: null };
}

export function normalizeTags(tags: readonly string[]): string[] {
  return Array.from(new Set(tags.map((tag) => tag.trim()).filter((tag) => tag.length > 0))).sort();
}

// =============================================================================
// SERIALIZATION
// =============================================================================

export type ParsedMapping =
  | { ok: true; entries: Record<string, ScriptEntry> }
  | { ok: false; problem: string };

/** Parses remote mapping content. Never throws. */
export function parseRemoteMapping(content: string): ParsedMapping {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    return { ok: false, problem: `not JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const parsed = RemoteMappingSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, problem: describeIssues(parsed.error.issues) };
  }
  return { ok: true, entries: parsed.data.entries };
}

/** Remote content holds published entries only, keyed and ordered by name. */
export function serializeRemoteMapping(entries: Record<string, ScriptEntry>): string {
  const published: Record<string, ScriptEntry> = {};
  for (const name of Object.keys(entries).sort()) {
    const entry = entries[name];
    if (entry.document_id.length > 0) {
      published[name] = canonicalEntry(entry);
    }
  }
  return `${JSON.stringify({ version: MAPPING_SCHEMA_VERSION, entries: published }, null, 2)}\n`;
}

export function serializeLocalMapping(record: MappingRecord): unknown {
  const entries: Record<string, ScriptEntry> = {};
  for (const name of Object.keys(record.entries).sort()) {
    entries[name] = canonicalEntry(record.entries[name]);
  }
  return {
    version: MAPPING_SCHEMA_VERSION,
    revision: record.revision,
    last_synced_at: record.lastSyncedAt,
    entries,
  };
}

/** Fixed key order so serialized records compare byte for byte. */
function canonicalEntry(entry: ScriptEntry): ScriptEntry {
  return {
    script_name: entry.script_name,
    document_id: entry.document_id,
    created_at: entry.created_at,
    updated_at: entry.updated_at,
    tags: [...entry.tags],
  };
}

export function describeIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join(".") : "<root>";
      return `${location}: ${issue.message}`;
    })
    .join("; ");
}

export function scriptDocumentDescription(name: string, description: string | null): string {
  return description ? `${SCRIPT_DESCRIPTION_PREFIX} ${name}: ${description}` : `${SCRIPT_DESCRIPTION_PREFIX} ${name}`;
}
