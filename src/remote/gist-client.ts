/**
 * Fetch-based GitHub Gists client implementing RemoteDocumentClient.
 *
 * Token auth, configurable API base URL (GitHub Enterprise), rate-limit header
 * tracking and `Link` pagination. Every failure surfaces as one of the typed
 * remote errors so the retry policy and the CLI can tell them apart.
 */

import { z } from "zod";

import {
  AuthenticationFailedError,
  RateLimitedError,
  RemoteError,
  RemoteNotFoundError,
  RemoteRequestError,
  RevisionMismatchError,
  TransportError,
} from "../core/errors.js";
import { logWarning, type EventLogger } from "../core/logger.js";

import type {
  CreateDocumentInput,
  CreatedDocument,
  RemoteDocument,
  RemoteDocumentClient,
  RemoteDocumentSummary,
  UpdateDocumentOptions,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type RateLimitInfo = {
  limit: number;
  remaining: number;
  /** Unix epoch seconds. */
  reset: number;
};

export type GistClientOptions = {
  token: string;
  apiBaseUrl?: string;
  timeoutMs?: number;
  logger?: EventLogger;
  rateLimitWarningThreshold?: number;
  fetch?: typeof fetch;
  now?: () => Date;
};

const GistFileSchema = z.object({
  filename: z.string().optional(),
  content: z.string().optional(),
  truncated: z.boolean().optional(),
  raw_url: z.string().optional(),
});

const GistSchema = z.object({
  id: z.string(),
  description: z.string().nullable(),
  updated_at: z.string(),
  owner: z.object({ login: z.string() }).nullable().optional(),
  files: z.record(GistFileSchema),
  history: z.array(z.object({ version: z.string() })).optional(),
});

const GistListSchema = z.array(GistSchema);

type Gist = z.infer<typeof GistSchema>;

const DEFAULT_API_BASE_URL = "https://api.github.com";
const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_RATE_LIMIT_WARNING_THRESHOLD = 10;

// =============================================================================
// CLIENT
// =============================================================================

export class GistClient implements RemoteDocumentClient {
  private readonly token: string;
  private readonly apiBaseUrl: string;
  private readonly timeoutMs: number;
  private readonly rateLimitWarningThreshold: number;
  private readonly fetchImpl: typeof fetch;
  private readonly now: () => Date;
  private lastRateLimit: RateLimitInfo | null = null;

  constructor(private readonly options: GistClientOptions) {
    if (!options.token) {
      throw new AuthenticationFailedError("A GitHub token is required.");
    }

    this.token = options.token;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.rateLimitWarningThreshold =
      options.rateLimitWarningThreshold ?? DEFAULT_RATE_LIMIT_WARNING_THRESHOLD;
    this.fetchImpl = options.fetch ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  getRateLimit(): RateLimitInfo | null {
    return this.lastRateLimit;
  }

  async createDocument(input: CreateDocumentInput): Promise<CreatedDocument> {
    const response = await this.request("POST", "/gists", {
      description: input.description,
      public: !input.isPrivate,
      files: { [input.filename]: { content: input.content } },
    });
    const gist = parseGist(await readJson(response), "POST /gists");
    return { documentId: gist.id, revision: revisionOf(gist) };
  }

  async updateDocument(
    documentId: string,
    content: string,
    options: UpdateDocumentOptions = {},
  ): Promise<string> {
    // Gists take no write precondition: read, compare, then write.
    const current = await this.fetchGist(documentId);
    const currentRevision = revisionOf(current);
    if (options.expectedRevision !== undefined && options.expectedRevision !== currentRevision) {
      throw new RevisionMismatchError(documentId, options.expectedRevision, currentRevision);
    }

    const filename = primaryFilename(current);
    const response = await this.request("PATCH", `/gists/${enc(documentId)}`, {
      files: { [filename]: { content } },
    });
    return revisionOf(parseGist(await readJson(response), `PATCH /gists/${documentId}`));
  }

  async getDocument(documentId: string): Promise<RemoteDocument> {
    const gist = await this.fetchGist(documentId);
    const filename = primaryFilename(gist);
    const file = gist.files[filename];

    let content = file.content ?? "";
    if (file.truncated && file.raw_url) {
      const raw = await this.request("GET", file.raw_url, undefined, documentId);
      content = await raw.text();
    }

    return {
      documentId: gist.id,
      filename,
      content,
      revision: revisionOf(gist),
      description: gist.description ?? "",
      updatedAt: gist.updated_at,
    };
  }

  async deleteDocument(documentId: string): Promise<void> {
    await this.request("DELETE", `/gists/${enc(documentId)}`, undefined, documentId);
  }

  async listOwnedDocuments(): Promise<RemoteDocumentSummary[]> {
    const summaries: RemoteDocumentSummary[] = [];
    let nextUrl: string | null = `/gists?per_page=100&page=1`;

    while (nextUrl) {
      const response = await this.request("GET", nextUrl);
      const parsed = GistListSchema.safeParse(await readJson(response));
      if (!parsed.success) {
        throw new RemoteError(`GET /gists returned an unexpected payload.`, response.status, parsed.error);
      }

      for (const gist of parsed.data) {
        summaries.push({
          documentId: gist.id,
          description: gist.description ?? "",
          revision: gist.history?.[0]?.version ?? null,
          updatedAt: gist.updated_at,
          owner: gist.owner?.login ?? "",
        });
      }

      nextUrl = parseLinkHeaderNext(response.headers.get("Link"));
    }

    return summaries;
  }

  // =============================================================================
  // HTTP
  // =============================================================================

  private async fetchGist(documentId: string): Promise<Gist> {
    const response = await this.request("GET", `/gists/${enc(documentId)}`, undefined, documentId);
    return parseGist(await readJson(response), `GET /gists/${documentId}`);
  }

  private async request(
    method: string,
    pathOrUrl: string,
    body?: unknown,
    documentId?: string,
  ): Promise<Response> {
    const url = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.apiBaseUrl}${pathOrUrl}`;
    const label = `${method} ${pathOrUrl}`;

    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.token}`,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
    };
    if (body !== undefined) {
      headers["Content-Type"] = "application/json";
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      if (err instanceof Error && err.name === "TimeoutError") {
        throw new TransportError(`${label} timed out after ${this.timeoutMs}ms.`, undefined, err);
      }
      throw new TransportError(
        `Network error during ${label}: ${err instanceof Error ? err.message : String(err)}`,
        undefined,
        err,
      );
    }

    const rateLimit = parseRateLimitHeaders(response.headers);
    if (rateLimit) {
      this.lastRateLimit = rateLimit;
      this.checkRateLimitWarning(rateLimit, label);
    }

    if (!response.ok) {
      await this.throwForStatus(response, rateLimit, label, documentId);
    }
    return response;
  }

  private async throwForStatus(
    response: Response,
    rateLimit: RateLimitInfo | null,
    label: string,
    documentId: string | undefined,
  ): Promise<never> {
    const detail = await readErrorMessage(response);
    const message = `${label} failed with ${response.status}: ${detail}`;
    const { status } = response;

    if (status === 401) {
      throw new AuthenticationFailedError(message, status);
    }
    if (status === 429 || (status === 403 && rateLimit?.remaining === 0)) {
      throw new RateLimitedError(message, this.retryAfterMs(response, rateLimit), status);
    }
    if (status === 403) {
      throw new AuthenticationFailedError(message, status);
    }
    if (status === 404) {
      throw new RemoteNotFoundError(message, documentId ?? "");
    }
    if (status >= 500) {
      throw new TransportError(message, status);
    }
    throw new RemoteRequestError(message, status);
  }

  private retryAfterMs(response: Response, rateLimit: RateLimitInfo | null): number | undefined {
    const retryAfter = response.headers.get("Retry-After");
    if (retryAfter !== null) {
      const seconds = Number.parseInt(retryAfter, 10);
      if (!Number.isNaN(seconds)) return Math.max(0, seconds * 1000);
    }
    if (rateLimit) {
      return Math.max(0, rateLimit.reset * 1000 - this.now().getTime());
    }
    return undefined;
  }

  private checkRateLimitWarning(rateLimit: RateLimitInfo, label: string): void {
    if (!this.options.logger) return;
    if (rateLimit.remaining > 0 && rateLimit.remaining <= this.rateLimitWarningThreshold) {
      logWarning(this.options.logger, "remote.rate_limit_low", {
        remaining: rateLimit.remaining,
        limit: rateLimit.limit,
        reset_at: new Date(rateLimit.reset * 1000).toISOString(),
        request: label,
      });
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function enc(value: string): string {
  return encodeURIComponent(value);
}

async function readJson(response: Response): Promise<unknown> {
  try {
    const value: unknown = await response.json();
    return value;
  } catch (err) {
    throw new TransportError(`Response body from ${response.url || "GitHub"} was not JSON.`, response.status, err);
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json();
    if (typeof body === "object" && body !== null && "message" in body && typeof body.message === "string") {
      return body.message;
    }
  } catch {
    // Fall back to the status text below.
  }
  return response.statusText || "request failed";
}

function parseGist(value: unknown, label: string): Gist {
  const parsed = GistSchema.safeParse(value);
  if (!parsed.success) {
    throw new RemoteError(`${label} returned an unexpected payload.`, undefined, parsed.error);
  }
  return parsed.data;
}

function revisionOf(gist: Gist): string {
  const version = gist.history?.[0]?.version;
  if (!version) {
    throw new RemoteError(`Gist ${gist.id} carries no revision history.`);
  }
  return version;
}

/** Our documents hold exactly one file; pick it deterministically if there are more. */
function primaryFilename(gist: Gist): string {
  const names = Object.keys(gist.files).sort();
  if (names.length === 0) {
    throw new RemoteError(`Gist ${gist.id} has no files.`);
  }
  return names[0];
}

export function parseRateLimitHeaders(headers: Headers): RateLimitInfo | null {
  const limit = headers.get("X-RateLimit-Limit");
  const remaining = headers.get("X-RateLimit-Remaining");
  const reset = headers.get("X-RateLimit-Reset");
  if (limit === null || remaining === null || reset === null) {
    return null;
  }

  const parsed = {
    limit: Number.parseInt(limit, 10),
    remaining: Number.parseInt(remaining, 10),
    reset: Number.parseInt(reset, 10),
  };
  if (Number.isNaN(parsed.limit) || Number.isNaN(parsed.remaining) || Number.isNaN(parsed.reset)) {
    return null;
  }
  return parsed;
}

/** Next-page URL from a `Link` header, or null on the last page. */
export function parseLinkHeaderNext(linkHeader: string | null): string | null {
  if (!linkHeader) return null;

  for (const link of linkHeader.split(",")) {
    const match = /<([^>]+)>;\s*rel="next"/.exec(link);
    if (match) {
      return match[1];
    }
  }
  return null;
}
