/**
 * Sync Error Taxonomy
 *
 * Fatal categories (scan, credential, state, persist, config) abort a run.
 * Per-file categories (hash, delivery) are counted and the run continues.
 * Parse failures never surface: malformed lines are dropped by the normalizer.
 */

export const SYNC_ERROR_CODES = Object.freeze({
  SCAN_FAILED: "SCAN_FAILED",
  PARSE_FAILED: "PARSE_FAILED",
  HASH_FAILED: "HASH_FAILED",
  EMPTY_CONTENT: "EMPTY_CONTENT",
  DELIVERY_FAILED: "DELIVERY_FAILED",
  CREDENTIAL_UNAVAILABLE: "CREDENTIAL_UNAVAILABLE",
  STATE_INVALID: "STATE_INVALID",
  PERSIST_FAILED: "PERSIST_FAILED",
  CONFIG_INVALID: "CONFIG_INVALID",
  CANCELLED: "CANCELLED",
} as const);

export type SyncErrorCode = (typeof SYNC_ERROR_CODES)[keyof typeof SYNC_ERROR_CODES];

export class SyncError extends Error {
  readonly code: SyncErrorCode;

  constructor(code: SyncErrorCode, message: string, options: { cause?: unknown } = {}) {
    super(message, "cause" in options ? { cause: options.cause } : undefined);
    this.name = "SyncError";
    this.code = code;
  }
}

export class ScanError extends SyncError {
  constructor(rootDir: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.SCAN_FAILED, `cannot read scan root ${rootDir}: ${describeError(cause)}`, { cause });
    this.name = "ScanError";
  }
}

export class ParseError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.PARSE_FAILED, message, { cause });
    this.name = "ParseError";
  }
}

export class HashError extends SyncError {
  readonly path: string;

  constructor(path: string, message: string, options: { cause?: unknown; code?: SyncErrorCode } = {}) {
    super(options.code ?? SYNC_ERROR_CODES.HASH_FAILED, message, { cause: options.cause });
    this.name = "HashError";
    this.path = path;
  }
}

export class EmptyContentError extends HashError {
  constructor(path: string) {
    super(path, `no valid messages in file ${path}`, { code: SYNC_ERROR_CODES.EMPTY_CONTENT });
    this.name = "EmptyContentError";
  }
}

export class DeliveryError extends SyncError {
  readonly sessionId: string;

  constructor(sessionId: string, message: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.DELIVERY_FAILED, message, { cause });
    this.name = "DeliveryError";
    this.sessionId = sessionId;
  }
}

export class CredentialError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.CREDENTIAL_UNAVAILABLE, message, { cause });
    this.name = "CredentialError";
  }
}

export class StateError extends SyncError {
  constructor(path: string, message: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.STATE_INVALID, `${message} (${path})`, { cause });
    this.name = "StateError";
  }
}

export class PersistError extends SyncError {
  constructor(path: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.PERSIST_FAILED, `saving sync state to ${path}: ${describeError(cause)}`, { cause });
    this.name = "PersistError";
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super(SYNC_ERROR_CODES.CONFIG_INVALID, message, { cause });
    this.name = "ConfigError";
  }
}

export class SyncCancelledError extends SyncError {
  constructor(cause?: unknown) {
    super(SYNC_ERROR_CODES.CANCELLED, "sync cancelled", { cause });
    this.name = "SyncCancelledError";
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * True for the rejection an aborted fetch or abortable wait produces.
 * A per-request timeout surfaces as "TimeoutError" and is not a cancellation.
 */
export function isAbortError(error: unknown): boolean {
  if (error instanceof SyncCancelledError) return true;
  return error instanceof Error && error.name === "AbortError";
}

export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
