/*
Purpose: the port every remote document store implements (gists in production, an in-memory fake in tests).
Assumptions: revisions are opaque tokens; only equality between them is meaningful.
Usage: const { documentId, revision } = await client.createDocument({ filename, content, description, isPrivate: true });
*/

export type CreateDocumentInput = {
  filename: string;
  content: string;
  description: string;
  isPrivate: boolean;
};

export type CreatedDocument = {
  documentId: string;
  revision: string;
};

export type RemoteDocument = {
  documentId: string;
  filename: string;
  content: string;
  revision: string;
  description: string;
  updatedAt: string;
};

export type RemoteDocumentSummary = {
  documentId: string;
  description: string;
  /** Listings do not always carry a revision. */
  revision: string | null;
  updatedAt: string;
  owner: string;
};

export type UpdateDocumentOptions = {
  /** When set, the update fails with RevisionMismatchError unless the document is still at this revision. */
  expectedRevision?: string;
};

export interface RemoteDocumentClient {
  createDocument(input: CreateDocumentInput): Promise<CreatedDocument>;
  /** Returns the new revision. */
  updateDocument(documentId: string, content: string, options?: UpdateDocumentOptions): Promise<string>;
  getDocument(documentId: string): Promise<RemoteDocument>;
  deleteDocument(documentId: string): Promise<void>;
  listOwnedDocuments(): Promise<RemoteDocumentSummary[]>;
}
