/*
Purpose: one bounded sync of the local mapping record against the remote mapping document.
Assumptions: the sync lock is held for the whole run; nothing local is written unless the run reaches DONE.
Usage: const result = await engine.run({ mode: "sync", signal });
*/

import {
  AmbiguousMappingError,
  RemoteNotFoundError,
  RevisionMismatchError,
  SyncCancelledError,
  SyncConflictError,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logWarning, type EventLogger } from "../core/logger.js";
import { scriptFileName } from "../core/paths.js";
import { isoNow } from "../core/utils.js";
import type { SyncLock } from "../inventory/lock.js";
import {
  MAPPING_FILENAME,
  MAPPING_SENTINEL,
  scriptDocumentDescription,
  serializeRemoteMapping,
  type MappingRecord,
  type RemoteDocumentPointer,
  type ScriptEntry,
} from "../inventory/schema.js";
import type { LocalInventoryStore } from "../inventory/store.js";
import { readHeader } from "../metadata/header.js";
import type { RemoteDocumentClient } from "../remote/client.js";

import { discoverMapping, fetchMapping, type FetchedMapping } from "./discovery.js";
import { reconcile, type EntryDecision, type SyncMode } from "./reconcile.js";

// =============================================================================
// TYPES
// =============================================================================

export type SyncState =
  | "IDLE"
  | "RESOLVING_POINTER"
  | "FETCHING"
  | "RECONCILING"
  | "PUSHING"
  | "DONE"
  | "FAILED";

export type SyncEngineDeps = {
  store: LocalInventoryStore;
  client: RemoteDocumentClient;
  lock: SyncLock;
  logger: EventLogger;
  owner: string;
  privateDocuments?: boolean;
  now?: () => Date;
};

export type SyncRequest = {
  mode?: SyncMode;
  /** Names deleted on purpose; dropped from both sides in this run. */
  removals?: string[];
  signal?: AbortSignal;
};

export type SyncResult = {
  mode: SyncMode;
  states: SyncState[];
  record: MappingRecord;
  pointer: RemoteDocumentPointer | null;
  decisions: Record<string, EntryDecision>;
  /** Scripts that received a remote document during this run. */
  published: string[];
  /** True when the remote mapping document was created or updated. */
  pushed: boolean;
};

type Target = {
  documentId: string;
  baseline: FetchedMapping | null;
};

const TERMINAL_STATES: ReadonlySet<SyncState> = new Set(["DONE", "FAILED"]);

// =============================================================================
// STATE TRACE
// =============================================================================

class StateTrace {
  readonly states: SyncState[] = ["IDLE"];

  constructor(
    private readonly logger: EventLogger,
    private readonly mode: SyncMode,
    private readonly signal: AbortSignal | undefined,
  ) {}

  get current(): SyncState {
    return this.states[this.states.length - 1];
  }

  enter(next: SyncState): void {
    if (this.signal?.aborted) {
      throw new SyncCancelledError(next);
    }
    this.record(next);
  }

  fail(error: unknown): void {
    if (TERMINAL_STATES.has(this.current)) return;
    const from = this.current;
    this.record("FAILED");
    this.logger.log({
      type: "sync.failed",
      level: "error",
      payload: {
        mode: this.mode,
        from,
        error: error instanceof Error ? error.name : "Error",
        message: formatErrorMessage(error),
      },
    });
  }

  private record(next: SyncState): void {
    const from = this.current;
    this.states.push(next);
    this.logger.log({ type: "sync.state", payload: { mode: this.mode, from, to: next } });
  }
}

// =============================================================================
// ENGINE
// =============================================================================

export class SyncEngine {
  private readonly now: () => Date;

  constructor(private readonly deps: SyncEngineDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(request: SyncRequest = {}): Promise<SyncResult> {
    const mode = request.mode ?? "sync";
    return this.deps.lock.withLock(async () => {
      const trace = new StateTrace(this.deps.logger, mode, request.signal);
      try {
        return await this.execute(mode, request, trace);
      } catch (err) {
        trace.fail(err);
        throw err;
      }
    });
  }

  private async execute(mode: SyncMode, request: SyncRequest, trace: StateTrace): Promise<SyncResult> {
    const { store, client } = this.deps;
    const local = await store.load();
    const pointer = await store.loadPointer();
    const trackedDocumentId =
      local.revision !== null && pointer?.owner === this.deps.owner ? pointer.document_id : null;

    trace.enter("RESOLVING_POINTER");
    let target = await this.resolvePointer(pointer);

    const published = new Map<string, string>();
    let rediscovered = false;
    let conflictRetried = false;

    for (;;) {
      let baseline: FetchedMapping | null = null;

      if (target) {
        trace.enter("FETCHING");
        try {
          baseline = target.baseline ?? (await fetchMapping(client, target.documentId));
        } catch (err) {
          if (!(err instanceof RemoteNotFoundError) || rediscovered) {
            throw err;
          }
          rediscovered = true;
          logWarning(this.deps.logger, "sync.pointer_stale", { document_id: target.documentId });
          target = await this.discover();
          baseline = target?.baseline ?? null;
        }
      }

      if (!baseline && mode === "pull") {
        trace.enter("DONE");
        return {
          mode,
          states: trace.states,
          record: local,
          pointer: null,
          decisions: {},
          published: [],
          pushed: false,
        };
      }

      if (baseline) {
        trace.enter("RECONCILING");
      }
      const merge = reconcile({
        local: local.entries,
        remote: baseline?.entries ?? {},
        mode,
        removals: request.removals,
        tracked: baseline !== null && baseline.documentId === trackedDocumentId,
      });
      let entries = withPublishedIds(merge.entries, published);
      const pending = mode === "pull" ? [] : await this.publishableNames(entries, published);

      let documentId = baseline?.documentId ?? null;
      let revision = baseline?.revision ?? null;
      let pushed = false;

      const remoteChanged =
        !baseline || serializeRemoteMapping(entries) !== serializeRemoteMapping(baseline.entries);

      if (mode !== "pull" && (remoteChanged || pending.length > 0)) {
        trace.enter("PUSHING");
        entries = await this.publishPending(entries, pending, published);
        const content = serializeRemoteMapping(entries);

        if (!baseline) {
          const created = await client.createDocument({
            filename: MAPPING_FILENAME,
            content,
            description: MAPPING_SENTINEL,
            isPrivate: this.deps.privateDocuments ?? true,
          });
          documentId = created.documentId;
          revision = created.revision;
          pushed = true;
          this.deps.logger.log({ type: "sync.mapping_created", payload: { document_id: documentId } });
        } else if (content !== serializeRemoteMapping(baseline.entries)) {
          try {
            revision = await client.updateDocument(baseline.documentId, content, {
              expectedRevision: baseline.revision,
            });
            pushed = true;
          } catch (err) {
            if (!(err instanceof RevisionMismatchError)) {
              throw err;
            }
            if (conflictRetried) {
              throw new SyncConflictError(baseline.documentId, err);
            }
            conflictRetried = true;
            logWarning(this.deps.logger, "sync.conflict_retry", {
              document_id: baseline.documentId,
              expected_revision: err.expectedRevision,
              actual_revision: err.actualRevision,
            });
            target = { documentId: baseline.documentId, baseline: null };
            continue;
          }
        }
      }

      trace.enter("DONE");
      const syncedAt = isoNow(this.now());
      const record: MappingRecord = { entries, revision, lastSyncedAt: syncedAt };
      await store.save(record);

      let nextPointer: RemoteDocumentPointer | null = null;
      if (documentId) {
        nextPointer = { document_id: documentId, owner: this.deps.owner, updated_at: syncedAt };
        await store.savePointer(nextPointer);
      }

      for (const [name, decision] of Object.entries(merge.decisions)) {
        if (decision === "remote" || decision === "dropped" || decision === "removed") {
          await store.removeCachedScript(name);
        }
      }

      this.deps.logger.log({
        type: "sync.complete",
        payload: {
          mode,
          document_id: documentId,
          revision,
          entries: Object.keys(entries).length,
          published: published.size,
          pushed,
        },
      });

      return {
        mode,
        states: trace.states,
        record,
        pointer: nextPointer,
        decisions: merge.decisions,
        published: Array.from(published.keys()).sort(),
        pushed,
      };
    }
  }

  // =============================================================================
  // POINTER AND DISCOVERY
  // =============================================================================

  private async resolvePointer(pointer: RemoteDocumentPointer | null): Promise<Target | null> {
    if (pointer && pointer.owner === this.deps.owner) {
      return { documentId: pointer.document_id, baseline: null };
    }
    if (pointer) {
      logWarning(this.deps.logger, "sync.pointer_owner_mismatch", {
        pointer_owner: pointer.owner,
        configured_owner: this.deps.owner,
      });
    }
    return this.discover();
  }

  private async discover(): Promise<Target | null> {
    const result = await discoverMapping(this.deps.client, {
      owner: this.deps.owner,
      logger: this.deps.logger,
    });

    switch (result.status) {
      case "none":
        return null;
      case "ambiguous":
        throw new AmbiguousMappingError(result.candidates);
      case "found":
        return {
          documentId: result.documentId,
          baseline: {
            documentId: result.documentId,
            entries: result.entries,
            revision: result.revision,
            updatedAt: result.updatedAt,
          },
        };
    }
  }

  // =============================================================================
  // PUBLISHING
  // =============================================================================

  private async publishableNames(
    entries: Record<string, ScriptEntry>,
    published: Map<string, string>,
  ): Promise<string[]> {
    const names: string[] = [];
    for (const [name, entry] of Object.entries(entries)) {
      if (entry.document_id.length > 0 || published.has(name)) continue;
      if (await this.deps.store.hasCachedScript(name)) {
        names.push(name);
      } else {
        logWarning(this.deps.logger, "sync.script_uncached", { script: name });
      }
    }
    return names.sort();
  }

  private async publishPending(
    entries: Record<string, ScriptEntry>,
    pending: string[],
    published: Map<string, string>,
  ): Promise<Record<string, ScriptEntry>> {
    const next = { ...entries };

    for (const name of pending) {
      const content = await this.deps.store.readCachedScript(name);
      const created = await this.deps.client.createDocument({
        filename: scriptFileName(name),
        content,
        description: scriptDocumentDescription(name, readHeader(content).description),
        isPrivate: this.deps.privateDocuments ?? true,
      });
      published.set(name, created.documentId);
      next[name] = { ...next[name], document_id: created.documentId };
      this.deps.logger.log({
        type: "sync.script_published",
        payload: { script: name, document_id: created.documentId },
      });
    }

    return next;
  }
}

/** Reuses documents created earlier in the same run, so a retried push never creates twice. */
function withPublishedIds(
  entries: Record<string, ScriptEntry>,
  published: Map<string, string>,
): Record<string, ScriptEntry> {
  const next: Record<string, ScriptEntry> = {};
  for (const [name, entry] of Object.entries(entries)) {
    const documentId = published.get(name);
    next[name] = documentId && entry.document_id.length === 0 ? { ...entry, document_id: documentId } : entry;
  }
  return next;
}
