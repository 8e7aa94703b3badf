/*
Purpose: persist the mapping record, the remote pointer and cached script bodies under the inventory root.
Assumptions: callers hold the sync lock for writes that belong to a sync; writes are temp-file-then-rename.
Usage: const store = new LocalInventoryStore(paths); const record = await store.load();
*/

import fse from "fs-extra";

import { CorruptLocalStateError, ScriptNotCachedError } from "../core/errors.js";
import { scriptCachePath, type InventoryPaths } from "../core/paths.js";
import { isErrnoCode, writeFileAtomic, writeJsonFileAtomic } from "../core/utils.js";

import {
  LocalMappingSchema,
  PointerSchema,
  assertValidScriptName,
  describeIssues,
  emptyMappingRecord,
  serializeLocalMapping,
  type MappingRecord,
  type RemoteDocumentPointer,
} from "./schema.js";

export class LocalInventoryStore {
  constructor(public readonly paths: InventoryPaths) {}

  // =============================================================================
  // MAPPING RECORD
  // =============================================================================

  async load(): Promise<MappingRecord> {
    const raw = await readJsonIfPresent(this.paths.mappingFile);
    if (raw === undefined) {
      return emptyMappingRecord();
    }

    const parsed = LocalMappingSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptLocalStateError(
        `Mapping file failed validation: ${describeIssues(parsed.error.issues)}`,
        this.paths.mappingFile,
        parsed.error,
      );
    }

    return {
      entries: parsed.data.entries,
      revision: parsed.data.revision,
      lastSyncedAt: parsed.data.last_synced_at,
    };
  }

  async save(record: MappingRecord): Promise<void> {
    await writeJsonFileAtomic(this.paths.mappingFile, serializeLocalMapping(record));
  }

  // =============================================================================
  // POINTER
  // =============================================================================

  async loadPointer(): Promise<RemoteDocumentPointer | null> {
    const raw = await readJsonIfPresent(this.paths.pointerFile);
    if (raw === undefined) {
      return null;
    }

    const parsed = PointerSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CorruptLocalStateError(
        `Pointer file failed validation: ${describeIssues(parsed.error.issues)}`,
        this.paths.pointerFile,
        parsed.error,
      );
    }
    return parsed.data;
  }

  async savePointer(pointer: RemoteDocumentPointer): Promise<void> {
    await writeJsonFileAtomic(this.paths.pointerFile, PointerSchema.parse(pointer));
  }

  // =============================================================================
  // SCRIPT CACHE
  // =============================================================================

  cachedScriptPath(scriptName: string): string {
    assertValidScriptName(scriptName);
    return scriptCachePath(this.paths, scriptName);
  }

  async cacheScript(scriptName: string, content: string): Promise<string> {
    const filePath = this.cachedScriptPath(scriptName);
    await writeFileAtomic(filePath, content);
    return filePath;
  }

  async hasCachedScript(scriptName: string): Promise<boolean> {
    return fse.pathExists(this.cachedScriptPath(scriptName));
  }

  async readCachedScript(scriptName: string): Promise<string> {
    const filePath = this.cachedScriptPath(scriptName);
    try {
      return await fse.readFile(filePath, "utf8");
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new ScriptNotCachedError(scriptName);
      }
      throw err;
    }
  }

  async removeCachedScript(scriptName: string): Promise<void> {
    await fse.remove(this.cachedScriptPath(scriptName));
  }
}

/** Undefined when the file does not exist; CorruptLocalStateError when it is not JSON. */
async function readJsonIfPresent(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fse.readFile(filePath, "utf8");
  } catch (err) {
    if (isErrnoCode(err, "ENOENT")) {
      return undefined;
    }
    throw err;
  }

  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch (err) {
    throw new CorruptLocalStateError(`${filePath} is not valid JSON.`, filePath, err);
  }
}
