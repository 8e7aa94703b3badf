/*
Purpose: map typed inventory failures onto user-facing errors and process exit codes.
Assumptions: callers print the result with formatErrorLines; unknown errors fall through untouched.
Usage: const userError = toUserFacingError(err); process.exitCode = exitCodeFor(err);
*/

import {
  AmbiguousMappingError,
  AuthenticationFailedError,
  ConfigError,
  CorruptLocalStateError,
  InvalidScriptNameError,
  InventoryError,
  MalformedHeaderError,
  MalformedRemoteMappingError,
  RateLimitedError,
  RemoteError,
  RemoteNotFoundError,
  ScriptExistsError,
  ScriptNotCachedError,
  ScriptNotFoundError,
  SyncAlreadyInProgressError,
  SyncCancelledError,
  SyncConflictError,
  TransportError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorCode,
} from "./errors.js";

// =============================================================================
// EXIT CODES
// =============================================================================

const EXIT_CODES: Record<UserFacingErrorCode, number> = {
  UNKNOWN: 1,
  CONFIG_ERROR: 2,
  CORRUPT_LOCAL_STATE: 3,
  AUTHENTICATION_FAILED: 4,
  RATE_LIMITED: 5,
  TRANSPORT_ERROR: 6,
  REMOTE_ERROR: 7,
  NOT_FOUND: 8,
  AMBIGUOUS_MAPPING: 9,
  SYNC_CONFLICT: 10,
  SYNC_IN_PROGRESS: 11,
  CANCELLED: 130,
  SCRIPT_ERROR: 12,
};

export function exitCodeFor(error: unknown): number {
  return EXIT_CODES[toUserFacingError(error).code];
}

// =============================================================================
// MAPPING
// =============================================================================

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof ConfigError) {
    return wrap(error, USER_FACING_ERROR_CODES.config, "Configuration problem.", {
      hint: "Run `script-inventory init --owner <login>` or fix config.yaml.",
    });
  }

  if (error instanceof CorruptLocalStateError) {
    return wrap(error, USER_FACING_ERROR_CODES.corruptState, "Local inventory state is corrupt.", {
      hint: `Inspect or move ${error.filePath} aside; nothing was changed automatically.`,
    });
  }

  if (error instanceof AuthenticationFailedError) {
    return wrap(error, USER_FACING_ERROR_CODES.auth, "GitHub rejected the credentials.", {
      hint: "Check that the token in remote.token_env is set and has the gist scope.",
    });
  }

  if (error instanceof RateLimitedError) {
    const wait =
      error.retryAfterMs !== undefined ? ` Try again in ${Math.ceil(error.retryAfterMs / 1000)}s.` : "";
    return wrap(error, USER_FACING_ERROR_CODES.rateLimited, "GitHub rate limit reached.", {
      hint: `Retries were exhausted.${wait}`,
    });
  }

  if (error instanceof TransportError) {
    return wrap(error, USER_FACING_ERROR_CODES.transport, "Could not reach GitHub.", {
      hint: "Check the network connection or raise remote.timeout_ms.",
    });
  }

  if (error instanceof RemoteNotFoundError) {
    return wrap(error, USER_FACING_ERROR_CODES.notFound, "Remote document not found.", {
      hint: `Document ${error.documentId} no longer exists; the entry is treated as local-only.`,
    });
  }

  if (error instanceof AmbiguousMappingError) {
    const listing = error.candidates
      .map((candidate) => `${candidate.documentId} (updated ${candidate.updatedAt}, ${candidate.entryCount} entries)`)
      .join("; ");
    return wrap(error, USER_FACING_ERROR_CODES.ambiguous, "Several mapping documents found.", {
      hint: `Candidates: ${listing}.`,
      next: "Pick one with `script-inventory adopt <document-id>`.",
    });
  }

  if (error instanceof MalformedRemoteMappingError) {
    return wrap(error, USER_FACING_ERROR_CODES.remote, "Remote mapping document is malformed.", {
      hint: "Fix the gist by hand or adopt another mapping document.",
    });
  }

  if (error instanceof SyncConflictError) {
    return wrap(error, USER_FACING_ERROR_CODES.conflict, "Sync conflict.", {
      hint: "Another device kept writing the mapping; local state was left untouched.",
      next: "Run the sync again.",
    });
  }

  if (error instanceof SyncAlreadyInProgressError) {
    const holder = error.holderPid !== undefined ? ` (pid ${error.holderPid})` : "";
    return wrap(error, USER_FACING_ERROR_CODES.busy, "A sync is already running.", {
      hint: `Wait for the other process${holder} to finish.`,
    });
  }

  if (error instanceof SyncCancelledError) {
    return wrap(error, USER_FACING_ERROR_CODES.cancelled, "Sync cancelled.", {
      hint: "No local state was written.",
    });
  }

  if (
    error instanceof ScriptNotFoundError ||
    error instanceof ScriptNotCachedError ||
    error instanceof ScriptExistsError ||
    error instanceof InvalidScriptNameError ||
    error instanceof MalformedHeaderError
  ) {
    return wrap(error, USER_FACING_ERROR_CODES.script, "Script error.");
  }

  if (error instanceof RemoteError) {
    return wrap(error, USER_FACING_ERROR_CODES.remote, "GitHub request failed.");
  }

  // Runner and generator failures.
  if (error instanceof InventoryError) {
    return wrap(error, USER_FACING_ERROR_CODES.script, "Script error.");
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}

function wrap(
  error: Error,
  code: UserFacingErrorCode,
  title: string,
  extra: { hint?: string; next?: string } = {},
): UserFacingError {
  return new UserFacingError({
    code,
    title,
    message: error.message,
    hint: extra.hint,
    next: extra.next,
    cause: error,
  });
}
