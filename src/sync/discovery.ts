/*
Purpose: locate this owner's mapping document among their remote documents, or adopt one explicitly.
Assumptions: the sentinel description is the only discriminator; other owners' documents are never considered.
Usage: const result = await discoverMapping(client, { owner, logger }); if (result.status === "found") ...
*/

import {
  MalformedRemoteMappingError,
  RemoteNotFoundError,
  type MappingCandidate,
} from "../core/errors.js";
import { logWarning, type EventLogger } from "../core/logger.js";
import { isoNow } from "../core/utils.js";
import type { RemoteDocumentClient } from "../remote/client.js";
import type { LocalInventoryStore } from "../inventory/store.js";
import {
  MAPPING_SENTINEL,
  parseRemoteMapping,
  type RemoteDocumentPointer,
  type ScriptEntry,
} from "../inventory/schema.js";

export type FetchedMapping = {
  documentId: string;
  entries: Record<string, ScriptEntry>;
  revision: string;
  updatedAt: string;
};

export type DiscoveryResult =
  | { status: "none" }
  | ({ status: "found" } & FetchedMapping)
  | { status: "ambiguous"; candidates: MappingCandidate[] };

export type DiscoveryOptions = {
  owner: string;
  logger: EventLogger;
};

export async function discoverMapping(
  client: RemoteDocumentClient,
  options: DiscoveryOptions,
): Promise<DiscoveryResult> {
  const documents = await client.listOwnedDocuments();
  const candidates = documents.filter(
    (document) => document.owner === options.owner && document.description === MAPPING_SENTINEL,
  );

  const valid: FetchedMapping[] = [];
  for (const candidate of candidates) {
    try {
      valid.push(await fetchMapping(client, candidate.documentId));
    } catch (err) {
      if (err instanceof RemoteNotFoundError) {
        logWarning(options.logger, "discovery.candidate_missing", { document_id: candidate.documentId });
        continue;
      }
      if (!(err instanceof MalformedRemoteMappingError)) {
        throw err;
      }
      logWarning(options.logger, "discovery.candidate_invalid", {
        document_id: candidate.documentId,
        reason: err.message,
      });
    }
  }

  options.logger.log({
    type: "discovery.result",
    payload: {
      listed: documents.length,
      candidates: candidates.length,
      valid: valid.length,
    },
  });

  if (valid.length === 0) {
    return { status: "none" };
  }
  if (valid.length === 1) {
    return { status: "found", ...valid[0] };
  }

  const sorted = [...valid].sort(
    (a, b) => Date.parse(b.updatedAt) - Date.parse(a.updatedAt) || a.documentId.localeCompare(b.documentId),
  );
  return {
    status: "ambiguous",
    candidates: sorted.map((mapping) => ({
      documentId: mapping.documentId,
      updatedAt: mapping.updatedAt,
      entryCount: Object.keys(mapping.entries).length,
    })),
  };
}

/** Downloads and validates a mapping document. */
export async function fetchMapping(
  client: RemoteDocumentClient,
  documentId: string,
): Promise<FetchedMapping> {
  const document = await client.getDocument(documentId);
  if (document.description !== MAPPING_SENTINEL) {
    throw new MalformedRemoteMappingError(documentId, "description is not the mapping sentinel");
  }

  const parsed = parseRemoteMapping(document.content);
  if (!parsed.ok) {
    throw new MalformedRemoteMappingError(documentId, parsed.problem);
  }

  return {
    documentId,
    entries: parsed.entries,
    revision: document.revision,
    updatedAt: document.updatedAt,
  };
}

/** Validates an operator-chosen document and points this installation at it. */
export async function adoptMapping(
  client: RemoteDocumentClient,
  store: LocalInventoryStore,
  options: { documentId: string; owner: string; logger: EventLogger; now?: Date },
): Promise<{ pointer: RemoteDocumentPointer; mapping: FetchedMapping }> {
  const mapping = await fetchMapping(client, options.documentId);

  // The record's revision belongs to the old document; the next sync merges untracked.
  const previous = await store.loadPointer();
  if (previous?.document_id !== mapping.documentId) {
    const record = await store.load();
    if (record.revision !== null) {
      await store.save({ ...record, revision: null });
    }
  }

  const pointer: RemoteDocumentPointer = {
    document_id: mapping.documentId,
    owner: options.owner,
    updated_at: isoNow(options.now),
  };
  await store.savePointer(pointer);

  options.logger.log({
    type: "discovery.adopted",
    payload: { document_id: mapping.documentId, entries: Object.keys(mapping.entries).length },
  });
  return { pointer, mapping };
}
