import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { loadInventoryConfig } from "../core/config-loader.js";
import {
  AmbiguousMappingError,
  CorruptLocalStateError,
  RateLimitedError,
  RemoteRequestError,
  SyncAlreadyInProgressError,
  SyncCancelledError,
  SyncConflictError,
  TransportError,
  UserFacingError,
  USER_FACING_ERROR_CODES,
} from "../core/errors.js";
import { exitCodeFor, toUserFacingError } from "../core/error-mapping.js";
import { LlmError } from "../llm/client.js";
import { ScriptRunnerError } from "../runner/script-runner.js";

// =============================================================================
// TEST SETUP
// =============================================================================

const tempDirs: string[] = [];

afterEach(() => {
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

function makeTempDir(prefix: string): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

// =============================================================================
// TESTS
// =============================================================================

describe("error mapping", () => {
  it("maps missing config paths to a user-facing config error", () => {
    const dir = makeTempDir("error-mapping-config-");
    const configPath = path.join(dir, "config.yaml");

    let error: unknown;
    try {
      loadInventoryConfig(configPath);
    } catch (err) {
      error = err;
    }

    expect(error).toBeInstanceOf(UserFacingError);
    const userError = toUserFacingError(error);
    expect(userError.code).toBe(USER_FACING_ERROR_CODES.config);
    expect(userError.title).toBe("Inventory config missing.");
    expect(userError.message).toBe(`No config found at ${path.resolve(configPath)}.`);
    expect(exitCodeFor(error)).toBe(2);
  });

  it("lists the candidates of an ambiguous discovery", () => {
    const error = new AmbiguousMappingError([
      { documentId: "doc-b", updatedAt: "2024-05-02T10:00:00Z", entryCount: 2 },
      { documentId: "doc-a", updatedAt: "2024-05-01T10:00:00Z", entryCount: 0 },
    ]);

    const userError = toUserFacingError(error);

    expect(userError.code).toBe(USER_FACING_ERROR_CODES.ambiguous);
    expect(userError.hint).toBe(
      "Candidates: doc-b (updated 2024-05-02T10:00:00Z, 2 entries); doc-a (updated 2024-05-01T10:00:00Z, 0 entries).",
    );
    expect(userError.next).toBe("Pick one with `script-inventory adopt <document-id>`.");
    expect(userError.cause).toBe(error);
  });

  it("rounds the rate-limit wait up to whole seconds", () => {
    const userError = toUserFacingError(new RateLimitedError("slow down", 1_200, 429));

    expect(userError.code).toBe(USER_FACING_ERROR_CODES.rateLimited);
    expect(userError.hint).toBe("Retries were exhausted. Try again in 2s.");
  });

  it("names the lock holder", () => {
    const userError = toUserFacingError(new SyncAlreadyInProgressError("/inv/sync.lock", 4242));

    expect(userError.hint).toBe("Wait for the other process (pid 4242) to finish.");
  });

  it("gives every failure class its own exit code", () => {
    const errors: unknown[] = [
      new CorruptLocalStateError("bad", "/inv/mapping.json"),
      new TransportError("offline"),
      new RemoteRequestError("unprocessable", 422),
      new SyncConflictError("doc-1"),
      new SyncCancelledError("FETCHING"),
      new Error("surprise"),
    ];

    expect(errors.map(exitCodeFor)).toEqual([3, 6, 7, 10, 130, 1]);
  });

  it("treats runner and generator failures as script errors", () => {
    expect(toUserFacingError(new ScriptRunnerError("uv missing")).code).toBe(USER_FACING_ERROR_CODES.script);
    expect(toUserFacingError(new LlmError("empty output")).code).toBe(USER_FACING_ERROR_CODES.script);
  });
});
