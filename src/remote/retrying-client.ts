import type { EventLogger } from "../core/logger.js";

import type {
  CreateDocumentInput,
  CreatedDocument,
  RemoteDocument,
  RemoteDocumentClient,
  RemoteDocumentSummary,
  UpdateDocumentOptions,
} from "./client.js";
import { withRetry, type RetryPolicy } from "./retry.js";

export type RetryingClientOptions = {
  policy?: RetryPolicy;
  logger?: EventLogger;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
};

/**
 * Wraps a client so reads, updates, deletes and listings go through `withRetry`.
 * Creation is not retried: a create that timed out may still have landed.
 */
export class RetryingDocumentClient implements RemoteDocumentClient {
  constructor(
    private readonly inner: RemoteDocumentClient,
    private readonly options: RetryingClientOptions = {},
  ) {}

  createDocument(input: CreateDocumentInput): Promise<CreatedDocument> {
    return this.inner.createDocument(input);
  }

  updateDocument(
    documentId: string,
    content: string,
    options?: UpdateDocumentOptions,
  ): Promise<string> {
    return this.retry("updateDocument", () => this.inner.updateDocument(documentId, content, options));
  }

  getDocument(documentId: string): Promise<RemoteDocument> {
    return this.retry("getDocument", () => this.inner.getDocument(documentId));
  }

  deleteDocument(documentId: string): Promise<void> {
    return this.retry("deleteDocument", () => this.inner.deleteDocument(documentId));
  }

  listOwnedDocuments(): Promise<RemoteDocumentSummary[]> {
    return this.retry("listOwnedDocuments", () => this.inner.listOwnedDocuments());
  }

  private retry<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    return withRetry(fn, { ...this.options, operation });
  }
}
