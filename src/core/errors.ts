/*
Purpose: typed failures raised by the inventory core and the user-facing wrapper the CLI prints.
Assumptions: every lower-level failure reaches the caller as one of these classes, never as a bare Error.
Usage: throw new RemoteNotFoundError("..."); toUserFacingError(err) before printing.
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class InventoryError extends Error {
  readonly retryable: boolean = false;

  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "InventoryError";
  }
}

export class ConfigError extends InventoryError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

/** On-disk state exists but cannot be trusted. Never auto-repaired. */
export class CorruptLocalStateError extends InventoryError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "CorruptLocalStateError";
  }
}

export class InvalidScriptNameError extends InventoryError {
  constructor(public readonly scriptName: string, reason: string) {
    super(`Invalid script name "${scriptName}": ${reason}`);
    this.name = "InvalidScriptNameError";
  }
}

export class ScriptNotFoundError extends InventoryError {
  constructor(public readonly scriptName: string, message?: string) {
    super(message ?? `Script "${scriptName}" is not in the inventory.`);
    this.name = "ScriptNotFoundError";
  }
}

export class ScriptExistsError extends InventoryError {
  constructor(public readonly scriptName: string) {
    super(`Script "${scriptName}" already exists in the inventory.`);
    this.name = "ScriptExistsError";
  }
}

export class ScriptNotCachedError extends InventoryError {
  constructor(public readonly scriptName: string) {
    super(`No cached copy of script "${scriptName}".`);
    this.name = "ScriptNotCachedError";
  }
}

export class MalformedHeaderError extends InventoryError {
  constructor(public readonly scriptName: string, problem: string) {
    super(`Script "${scriptName}" has a malformed metadata header: ${problem}`);
    this.name = "MalformedHeaderError";
  }
}

// =============================================================================
// REMOTE ERRORS
// =============================================================================

export class RemoteError extends InventoryError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, cause);
    this.name = "RemoteError";
  }
}

export class AuthenticationFailedError extends RemoteError {
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, status, cause);
    this.name = "AuthenticationFailedError";
  }
}

export class RateLimitedError extends RemoteError {
  override readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    status?: number,
    cause?: unknown,
  ) {
    super(message, status, cause);
    this.name = "RateLimitedError";
  }
}

export class TransportError extends RemoteError {
  override readonly retryable = true;

  constructor(message: string, status?: number, cause?: unknown) {
    super(message, status, cause);
    this.name = "TransportError";
  }
}

export class RemoteNotFoundError extends RemoteError {
  constructor(
    message: string,
    public readonly documentId: string,
    cause?: unknown,
  ) {
    super(message, 404, cause);
    this.name = "RemoteNotFoundError";
  }
}

/** A client error the remote rejected for reasons retrying cannot fix. */
export class RemoteRequestError extends RemoteError {
  constructor(message: string, status?: number, cause?: unknown) {
    super(message, status, cause);
    this.name = "RemoteRequestError";
  }
}

export class RevisionMismatchError extends RemoteError {
  constructor(
    public readonly documentId: string,
    public readonly expectedRevision: string,
    public readonly actualRevision: string | null,
  ) {
    super(
      `Document ${documentId} moved from revision ${expectedRevision} to ${actualRevision ?? "unknown"}.`,
      409,
    );
    this.name = "RevisionMismatchError";
  }
}

// =============================================================================
// SYNC ERRORS
// =============================================================================

export type MappingCandidate = {
  documentId: string;
  updatedAt: string;
  entryCount: number;
};

export class AmbiguousMappingError extends InventoryError {
  constructor(public readonly candidates: MappingCandidate[]) {
    super(`Found ${candidates.length} mapping documents; refusing to pick one automatically.`);
    this.name = "AmbiguousMappingError";
  }
}

export class MalformedRemoteMappingError extends InventoryError {
  constructor(
    public readonly documentId: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Mapping document ${documentId} is not a valid mapping record: ${detail}`, cause);
    this.name = "MalformedRemoteMappingError";
  }
}

export class SyncConflictError extends InventoryError {
  constructor(
    public readonly documentId: string,
    cause?: unknown,
  ) {
    super(
      `Mapping document ${documentId} kept changing during sync; gave up after one retry.`,
      cause,
    );
    this.name = "SyncConflictError";
  }
}

export class SyncAlreadyInProgressError extends InventoryError {
  constructor(
    public readonly lockPath: string,
    public readonly holderPid?: number,
  ) {
    super(`Another sync holds the lock at ${lockPath}.`);
    this.name = "SyncAlreadyInProgressError";
  }
}

export class SyncCancelledError extends InventoryError {
  constructor(public readonly state: string) {
    super(`Sync cancelled before ${state}.`);
    this.name = "SyncCancelledError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  corruptState: "CORRUPT_LOCAL_STATE",
  auth: "AUTHENTICATION_FAILED",
  rateLimited: "RATE_LIMITED",
  transport: "TRANSPORT_ERROR",
  remote: "REMOTE_ERROR",
  notFound: "NOT_FOUND",
  ambiguous: "AMBIGUOUS_MAPPING",
  conflict: "SYNC_CONFLICT",
  busy: "SYNC_IN_PROGRESS",
  cancelled: "CANCELLED",
  script: "SCRIPT_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof InventoryError && error.retryable;
}
