/*
Purpose: script-level operations on top of the local store, the remote client and the sync engine.
Assumptions: mutations only touch local state and single script documents; the mapping document
  changes through the engine, which the CLI runs after create, update and delete.
Usage: const service = new ScriptService({ store, client, engine, runner, logger, owner });
*/

import fse from "fs-extra";

import {
  MalformedHeaderError,
  RemoteNotFoundError,
  ScriptExistsError,
  ScriptNotFoundError,
} from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logWarning, type EventLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import {
  assertValidScriptName,
  normalizeTags,
  type MappingRecord,
  type RemoteDocumentPointer,
  type ScriptEntry,
} from "../inventory/schema.js";
import type { LocalInventoryStore } from "../inventory/store.js";
import { createHeader, decodeScript, encodeScript, ensureHeader, readHeader } from "../metadata/header.js";
import type { RemoteDocumentClient } from "../remote/client.js";
import type { ScriptRunner } from "../runner/script-runner.js";
import { adoptMapping, type FetchedMapping } from "../sync/discovery.js";
import type { SyncEngine, SyncRequest, SyncResult } from "../sync/engine.js";

// =============================================================================
// TYPES
// =============================================================================

export type ScriptServiceDeps = {
  store: LocalInventoryStore;
  client: RemoteDocumentClient;
  engine: SyncEngine;
  runner: ScriptRunner;
  logger: EventLogger;
  owner: string;
  now?: () => Date;
};

export type InventoryStatus = {
  record: MappingRecord;
  pointer: RemoteDocumentPointer | null;
  drafts: string[];
  published: string[];
};

export type CreateScriptInput = {
  name: string;
  body: string;
  description?: string;
  tags?: string[];
  /** Replace an existing script instead of failing. */
  force?: boolean;
};

export type FetchedScript = {
  content: string;
  path: string;
  source: "cache" | "remote";
};

export type FetchOptions = {
  /** Download again even when a cached copy exists. */
  refresh?: boolean;
};

export type RunOptions = FetchOptions & {
  cwd?: string;
};

// =============================================================================
// SERVICE
// =============================================================================

export class ScriptService {
  private readonly now: () => Date;

  constructor(private readonly deps: ScriptServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  sync(request: SyncRequest = {}): Promise<SyncResult> {
    return this.deps.engine.run(request);
  }

  /** Points this installation at a chosen mapping document; the next sync merges it. */
  async adopt(documentId: string): Promise<FetchedMapping> {
    const { mapping } = await adoptMapping(this.deps.client, this.deps.store, {
      documentId,
      owner: this.deps.owner,
      logger: this.deps.logger,
      now: this.now(),
    });
    return mapping;
  }

  async status(): Promise<InventoryStatus> {
    const record = await this.deps.store.load();
    const pointer = await this.deps.store.loadPointer();
    const names = Object.keys(record.entries).sort();
    return {
      record,
      pointer,
      drafts: names.filter((name) => record.entries[name].document_id.length === 0),
      published: names.filter((name) => record.entries[name].document_id.length > 0),
    };
  }

  async createScript(input: CreateScriptInput): Promise<ScriptEntry> {
    const { name } = input;
    assertValidScriptName(name);

    const record = await this.deps.store.load();
    const existing = record.entries[name];
    const timestamp = isoNow(this.now());
    const tags = normalizeTags(input.tags ?? []);

    const ensured = ensureHeader(input.body, {
      description: input.description,
      tags,
      createdDate: timestamp.slice(0, 10),
    });
    if (ensured.problem) {
      throw new MalformedHeaderError(name, ensured.problem);
    }

    if (existing) {
      if (!input.force) {
        throw new ScriptExistsError(name);
      }
      const entry = await this.replaceContent(existing, ensured.text, timestamp);
      record.entries[name] = { ...entry, tags: tags.length > 0 ? tags : entry.tags };
      await this.deps.store.save(record);
      return record.entries[name];
    }

    await this.deps.store.cacheScript(name, ensured.text);
    const entry: ScriptEntry = {
      script_name: name,
      document_id: "",
      created_at: timestamp,
      updated_at: timestamp,
      tags,
    };
    record.entries[name] = entry;
    await this.deps.store.save(record);

    this.deps.logger.log({
      type: "script.created",
      payload: { script: name, header_attached: ensured.attached, tags },
    });
    return entry;
  }

  async importScript(
    name: string,
    filePath: string,
    options: Omit<CreateScriptInput, "name" | "body"> = {},
  ): Promise<ScriptEntry> {
    const body = await fse.readFile(filePath, "utf8");
    return this.createScript({ ...options, name, body });
  }

  async updateScript(name: string, content: string): Promise<ScriptEntry> {
    assertValidScriptName(name);
    const record = await this.deps.store.load();
    const existing = record.entries[name];
    if (!existing) {
      throw new ScriptNotFoundError(name);
    }

    const decoded = decodeScript(content);
    if (decoded.problem) {
      throw new MalformedHeaderError(name, decoded.problem);
    }

    const entry = await this.replaceContent(existing, content, isoNow(this.now()));
    record.entries[name] = entry;
    await this.deps.store.save(record);
    return entry;
  }

  /** Local removal plus a best-effort remote delete. The caller pushes with `removals: [name]`. */
  async deleteScript(name: string): Promise<ScriptEntry> {
    assertValidScriptName(name);
    const record = await this.deps.store.load();
    const existing = record.entries[name];
    if (!existing) {
      throw new ScriptNotFoundError(name);
    }

    delete record.entries[name];
    await this.deps.store.save(record);
    await this.deps.store.removeCachedScript(name);

    if (existing.document_id.length > 0) {
      try {
        await this.deps.client.deleteDocument(existing.document_id);
      } catch (err) {
        if (!(err instanceof RemoteNotFoundError)) {
          logWarning(this.deps.logger, "script.remote_delete_failed", {
            script: name,
            document_id: existing.document_id,
            error: formatErrorMessage(err),
          });
        }
      }
    }

    this.deps.logger.log({
      type: "script.deleted",
      payload: { script: name, document_id: existing.document_id },
    });
    return existing;
  }

  async listScripts(filter: { tag?: string } = {}): Promise<ScriptEntry[]> {
    const record = await this.deps.store.load();
    const tag = filter.tag?.trim();
    return Object.keys(record.entries)
      .sort()
      .map((name) => record.entries[name])
      .filter((entry) => !tag || entry.tags.includes(tag));
  }

  /** Header description of the cached copy; null when uncached or undescribed. */
  async cachedDescription(name: string): Promise<string | null> {
    if (!(await this.deps.store.hasCachedScript(name))) {
      return null;
    }
    const content = await this.deps.store.readCachedScript(name);
    return readHeader(content).description ?? null;
  }

  async fetchScript(name: string, options: FetchOptions = {}): Promise<FetchedScript> {
    assertValidScriptName(name);
    const record = await this.deps.store.load();
    const entry = record.entries[name];
    if (!entry) {
      throw new ScriptNotFoundError(name);
    }

    const cachedPath = this.deps.store.cachedScriptPath(name);
    const cached = await this.deps.store.hasCachedScript(name);
    if (cached && (!options.refresh || entry.document_id.length === 0)) {
      return { content: await this.deps.store.readCachedScript(name), path: cachedPath, source: "cache" };
    }

    if (entry.document_id.length === 0) {
      throw new ScriptNotFoundError(
        name,
        `Script "${name}" has no published document and no cached copy on this machine.`,
      );
    }

    let content: string;
    try {
      content = (await this.deps.client.getDocument(entry.document_id)).content;
    } catch (err) {
      if (err instanceof RemoteNotFoundError) {
        throw new ScriptNotFoundError(
          name,
          `Script "${name}" is only known locally; document ${entry.document_id} no longer exists.`,
        );
      }
      throw err;
    }

    const filePath = await this.deps.store.cacheScript(name, content);
    this.deps.logger.log({
      type: "script.downloaded",
      payload: { script: name, document_id: entry.document_id },
    });
    return { content, path: filePath, source: "remote" };
  }

  async runScript(name: string, args: string[], options: RunOptions = {}): Promise<number> {
    const fetched = await this.fetchScript(name, options);
    const decoded = decodeScript(fetched.content);

    if (decoded.problem) {
      logWarning(this.deps.logger, "header.malformed", { script: name, problem: decoded.problem });
      throw new MalformedHeaderError(name, decoded.problem);
    }

    let header = decoded.header;
    if (!header) {
      header = createHeader();
      await this.deps.store.cacheScript(name, encodeScript(header, fetched.content));
      this.deps.logger.log({ type: "header.attached", payload: { script: name } });
    }

    return this.deps.runner.run({
      scriptName: name,
      scriptPath: fetched.path,
      header,
      args,
      cwd: options.cwd,
    });
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private async replaceContent(
    existing: ScriptEntry,
    content: string,
    timestamp: string,
  ): Promise<ScriptEntry> {
    const name = existing.script_name;
    await this.deps.store.cacheScript(name, content);
    let documentId = existing.document_id;

    if (documentId.length > 0) {
      try {
        await this.deps.client.updateDocument(documentId, content);
      } catch (err) {
        if (!(err instanceof RemoteNotFoundError)) {
          throw err;
        }
        logWarning(this.deps.logger, "script.document_missing", { script: name, document_id: documentId });
        documentId = "";
      }
    }

    this.deps.logger.log({
      type: "script.updated",
      payload: { script: name, document_id: documentId },
    });
    return { ...existing, document_id: documentId, updated_at: timestamp };
  }
}
