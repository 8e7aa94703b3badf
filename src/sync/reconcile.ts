import { compareTimestamps } from "../core/utils.js";
import type { ScriptEntry } from "../inventory/schema.js";

export type SyncMode = "sync" | "push" | "pull";

export type EntryDecision =
  | "unchanged"
  | "local"
  | "remote"
  | "local_only"
  | "remote_only"
  | "dropped"
  | "removed";

export type ReconcileInput = {
  local: Record<string, ScriptEntry>;
  remote: Record<string, ScriptEntry>;
  mode: SyncMode;
  /** Names deleted on purpose; dropped from both sides. */
  removals?: readonly string[];
  /**
   * The local record was last synced against this remote document. A published
   * entry missing from it was then removed elsewhere after that sync.
   */
  tracked?: boolean;
};

export type ReconcileResult = {
  entries: Record<string, ScriptEntry>;
  decisions: Record<string, EntryDecision>;
};

/**
 * Entry-level merge. Later `updated_at` wins; ties go to the remote copy.
 * Local-only published entries are dropped on `pull`, and in every mode once
 * the record is tracked; untracked they survive `sync` and `push`.
 */
export function reconcile(input: ReconcileInput): ReconcileResult {
  const removals = new Set(input.removals ?? []);
  const names = new Set([...Object.keys(input.local), ...Object.keys(input.remote)]);
  const entries: Record<string, ScriptEntry> = {};
  const decisions: Record<string, EntryDecision> = {};

  for (const name of Array.from(names).sort()) {
    const local = input.local[name];
    const remote = input.remote[name];

    if (removals.has(name)) {
      decisions[name] = "removed";
      continue;
    }

    if (local && remote) {
      if (sameEntry(local, remote)) {
        entries[name] = remote;
        decisions[name] = "unchanged";
      } else if (compareTimestamps(local.updated_at, remote.updated_at) > 0) {
        entries[name] = local;
        decisions[name] = "local";
      } else {
        entries[name] = remote;
        decisions[name] = "remote";
      }
      continue;
    }

    if (local) {
      if (local.document_id.length > 0 && (input.mode === "pull" || input.tracked)) {
        decisions[name] = "dropped";
      } else {
        entries[name] = local;
        decisions[name] = "local_only";
      }
      continue;
    }

    if (remote) {
      entries[name] = remote;
      decisions[name] = "remote_only";
    }
  }

  return { entries, decisions };
}

function sameEntry(a: ScriptEntry, b: ScriptEntry): boolean {
  return (
    a.document_id === b.document_id &&
    a.created_at === b.created_at &&
    a.updated_at === b.updated_at &&
    a.tags.length === b.tags.length &&
    a.tags.every((tag, index) => tag === b.tags[index])
  );
}
