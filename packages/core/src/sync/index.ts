/**
 * Sync Module
 *
 * Incremental upload of conversation logs: scan, normalize, hash,
 * extract the delta past the watermark, upload, persist.
 */

export {
  SYNC_ERROR_CODES,
  SyncError,
  ScanError,
  ParseError,
  HashError,
  EmptyContentError,
  DeliveryError,
  CredentialError,
  StateError,
  PersistError,
  ConfigError,
  SyncCancelledError,
  describeError,
  isAbortError,
} from "./errors.js";
export type { SyncErrorCode } from "./errors.js";

export {
  LOG_EXTENSION,
  scanForLogs,
  isExcluded,
  extractSessionId,
  extractProjectPath,
} from "./scanner.js";
export type { LogFile } from "./scanner.js";

export {
  classifyLine,
  normalizeLine,
  parseMessages,
  readSessionMessages,
} from "./normalizer.js";
export type { NormalizedLine } from "./normalizer.js";

export { extractDelta, extractNewMessages } from "./delta.js";
export type { Delta, DeltaSource } from "./delta.js";

export {
  hashSession,
  serializeSession,
  serializeMessage,
  buildSessionMetadata,
  extractModels,
  calculateTotalTokens,
  calculateContentHash,
  conversationNeedsSync,
} from "./hash.js";
export type { SessionMetadata } from "./hash.js";

export {
  STATE_FILE_NAME,
  SyncStateFileSchema,
  loadSyncState,
  saveSyncState,
  createEmptySyncState,
  defaultStatePath,
  formatTimestamp,
  getLastSyncedUuid,
  updateSession,
} from "./sync-state.js";
export type { SyncState, SessionState, SyncStateFile } from "./sync-state.js";

export { writeFileAtomically } from "./atomic-write.js";
export type { AtomicWriteOptions } from "./atomic-write.js";

export { runSync, formatSummary } from "./sync-runner.js";
export type {
  SyncRunOptions,
  SyncSummary,
  SessionResult,
  SessionOutcome,
  SyncLogger,
} from "./sync-runner.js";
