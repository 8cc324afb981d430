/**
 * Sync Runner
 *
 * One pass over the data directory:
 *   credential -> load state -> scan -> remote hashes ->
 *   per file: hash -> compare -> [skip | delta -> upload -> advance watermark]
 *   -> persist state
 *
 * Files are processed one at a time. A failing file is counted and the
 * run moves on; only credential, state, scan and persist failures (and
 * cancellation) end the run.
 */

import type { ApiClient, ApiMessage, SyncResponse } from "../api/client.js";
import type { Message } from "../schema/message.js";
import { extractDelta, type Delta } from "./delta.js";
import {
  CredentialError,
  DeliveryError,
  HashError,
  SyncCancelledError,
  describeError,
  isAbortError,
} from "./errors.js";
import { conversationNeedsSync, hashSession } from "./hash.js";
import { readSessionMessages } from "./normalizer.js";
import { scanForLogs, type LogFile } from "./scanner.js";
import {
  formatTimestamp,
  getLastSyncedUuid,
  loadSyncState,
  saveSyncState,
  updateSession,
  type SyncState,
} from "./sync-state.js";

// --- Types ---

export interface SyncLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
}

export interface SyncRunOptions {
  claudeDataDir: string;
  excludePatterns: readonly string[];
  machineId: string;
  statePath: string;
  client: Pick<ApiClient, "listConversations" | "sync">;
  /** Checked once before anything else; failure aborts the run */
  getCredential: () => Promise<string>;
  signal?: AbortSignal;
  logger?: SyncLogger;
  now?: () => Date;
}

export type SessionOutcome = "synced" | "skipped" | "unchanged" | "failed";

export interface SessionResult {
  sessionId: string;
  path: string;
  outcome: SessionOutcome;
  messagesSent: number;
  error?: string;
}

export interface SyncSummary {
  filesFound: number;
  synced: number;
  skipped: number;
  errored: number;
  sessions: SessionResult[];
}

// --- Helpers ---

function toApiMessage(msg: Message): ApiMessage {
  const out: ApiMessage = {
    uuid: msg.uuid,
    timestamp: msg.timestamp,
    role: msg.role,
    content: msg.content,
  };
  if (msg.model) out.model = msg.model;
  if (msg.tokens) out.tokens = msg.tokens;
  return out;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new SyncCancelledError(signal.reason);
}

async function fetchRemoteHashes(
  client: SyncRunOptions["client"],
  logger: SyncLogger,
  signal: AbortSignal | undefined
): Promise<Map<string, string>> {
  const hashes = new Map<string, string>();
  try {
    const list = await client.listConversations(signal);
    logger.info(`Server has ${list.total} conversations`);
    for (const conv of list.conversations) {
      hashes.set(conv.sessionId, conv.hash);
    }
  } catch (err) {
    if (signal?.aborted || isAbortError(err)) throw new SyncCancelledError(err);
    logger.warn(`[sync] failed to fetch conversations list: ${describeError(err)}`);
    logger.info("Continuing with UUID-based sync (may re-process unchanged conversations)");
  }
  return hashes;
}

// --- Per-file step ---

async function deliver(
  options: SyncRunOptions,
  delta: Delta,
  now: () => Date
): Promise<SyncResponse> {
  let response: SyncResponse;
  try {
    response = await options.client.sync(
      {
        machineId: options.machineId,
        sessionId: delta.sessionId,
        projectPath: delta.projectPath,
        messages: delta.messages.map(toApiMessage),
        timestamp: formatTimestamp(now()),
      },
      options.signal
    );
  } catch (err) {
    if (options.signal?.aborted || isAbortError(err)) throw new SyncCancelledError(err);
    throw new DeliveryError(delta.sessionId, `sync failed for ${delta.sessionId}: ${describeError(err)}`, err);
  }

  if (!response.success) {
    throw new DeliveryError(delta.sessionId, `server rejected ${delta.sessionId}`);
  }
  return response;
}

async function syncFile(
  options: SyncRunOptions,
  state: SyncState,
  file: LogFile,
  remoteHashes: Map<string, string>,
  now: () => Date
): Promise<SessionResult> {
  const base = { sessionId: file.sessionId, path: file.path };

  const messages = await readSessionMessages(file.path);
  const localHash = hashSession(file.sessionId, file.projectPath, messages, file.path);

  if (!conversationNeedsSync(localHash, remoteHashes.get(file.sessionId))) {
    return { ...base, outcome: "skipped", messagesSent: 0 };
  }

  const delta = extractDelta(file, messages, getLastSyncedUuid(state, file.sessionId));
  if (!delta) {
    return { ...base, outcome: "unchanged", messagesSent: 0 };
  }

  const response = await deliver(options, delta, now);
  updateSession(state, file.sessionId, delta.newLastUuid, response.processed, now());
  return { ...base, outcome: "synced", messagesSent: response.processed };
}

// --- Run ---

/**
 * Run one sync pass. State is saved once at the end, also when some
 * sessions failed. On cancellation the watermarks already advanced in
 * memory are saved on a best-effort basis and SyncCancelledError is thrown.
 * A failed final save is thrown as PersistError.
 */
export async function runSync(options: SyncRunOptions): Promise<SyncSummary> {
  const { signal, logger = console, now = () => new Date() } = options;

  try {
    await options.getCredential();
  } catch (err) {
    if (err instanceof CredentialError) throw err;
    throw new CredentialError(describeError(err), err);
  }

  const state = await loadSyncState(options.statePath);

  logger.info(`Scanning ${options.claudeDataDir} for conversations...`);
  const files = await scanForLogs(options.claudeDataDir, options.excludePatterns);
  logger.info(`Found ${files.length} conversation files`);

  const summary: SyncSummary = { filesFound: files.length, synced: 0, skipped: 0, errored: 0, sessions: [] };

  try {
    throwIfCancelled(signal);
    const remoteHashes = await fetchRemoteHashes(options.client, logger, signal);

    for (const file of files) {
      throwIfCancelled(signal);

      let result: SessionResult;
      try {
        result = await syncFile(options, state, file, remoteHashes, now);
      } catch (err) {
        if (err instanceof SyncCancelledError) throw err;
        if (!(err instanceof HashError) && !(err instanceof DeliveryError)) throw err;

        logger.warn(err instanceof HashError ? `[sync] error processing ${file.path}: ${err.message}` : `[sync] ${err.message}`);
        result = { sessionId: file.sessionId, path: file.path, outcome: "failed", messagesSent: 0, error: err.message };
      }

      summary.sessions.push(result);
      if (result.outcome === "synced") {
        summary.synced++;
        logger.info(`  Synced ${result.messagesSent} messages from ${file.sessionId}`);
      } else if (result.outcome === "skipped") {
        summary.skipped++;
      } else if (result.outcome === "failed") {
        summary.errored++;
      }
    }
  } catch (err) {
    if (err instanceof SyncCancelledError) {
      try {
        await saveSyncState(options.statePath, state, now());
      } catch (saveErr) {
        logger.warn(`[sync] could not save state after cancellation: ${describeError(saveErr)}`);
      }
    }
    throw err;
  }

  await saveSyncState(options.statePath, state, now());
  return summary;
}

export function formatSummary(summary: SyncSummary): string {
  let line = `Sync complete: ${summary.synced} sessions synced, ${summary.skipped} skipped (unchanged)`;
  if (summary.errored > 0) {
    line += `, ${summary.errored} errors`;
  }
  return line;
}
