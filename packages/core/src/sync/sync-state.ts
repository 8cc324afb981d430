/**
 * Sync State Management
 *
 * Persists per-session watermarks to ~/.transcript-sync/state.json
 * Tracks: last delivered message uuid, message count, last sync times
 *
 * The file is the only durable record of sync progress. It is loaded once
 * per run and replaced atomically once at the end of the run.
 */

import { z } from "zod";
import { readFile } from "fs/promises";
import { join } from "path";
import { writeFileAtomically } from "./atomic-write.js";
import { isNotFoundError, PersistError, StateError } from "./errors.js";

// --- Schema (on-disk shape) ---

export const SessionStateFileSchema = z.object({
  last_synced_uuid: z.string().default(""),
  last_sync_at: z.string().default(""),
  message_count: z.number().int().min(0).default(0),
});

export const SyncStateFileSchema = z.object({
  sessions: z.record(SessionStateFileSchema).nullish(),
  last_sync_at: z.string().nullish(),
});

export type SyncStateFile = z.infer<typeof SyncStateFileSchema>;

// --- In-memory shape ---

export interface SessionState {
  lastSyncedUuid: string;
  lastSyncAt: string;
  messageCount: number;
}

export interface SyncState {
  sessions: Record<string, SessionState>;
  lastSyncAt: string;
}

export const STATE_FILE_NAME = "state.json";

export function defaultStatePath(configDir: string): string {
  return join(configDir, STATE_FILE_NAME);
}

/**
 * RFC 3339, UTC, second precision: 2024-01-01T00:00:00Z
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, "Z");
}

// --- Factory ---

export function createEmptySyncState(): SyncState {
  return { sessions: {}, lastSyncAt: "" };
}

function fromFile(file: SyncStateFile): SyncState {
  const sessions: Record<string, SessionState> = {};
  for (const [sessionId, entry] of Object.entries(file.sessions ?? {})) {
    sessions[sessionId] = {
      lastSyncedUuid: entry.last_synced_uuid,
      lastSyncAt: entry.last_sync_at,
      messageCount: entry.message_count,
    };
  }
  return { sessions, lastSyncAt: file.last_sync_at ?? "" };
}

function toFile(state: SyncState): SyncStateFile {
  const sessions: Record<string, z.infer<typeof SessionStateFileSchema>> = {};
  for (const [sessionId, entry] of Object.entries(state.sessions)) {
    sessions[sessionId] = {
      last_synced_uuid: entry.lastSyncedUuid,
      last_sync_at: entry.lastSyncAt,
      message_count: entry.messageCount,
    };
  }
  return { sessions, last_sync_at: state.lastSyncAt };
}

// --- Load / Save ---

/**
 * A missing file is a fresh state. Anything else that prevents reading
 * or parsing the file is a StateError.
 */
export async function loadSyncState(path: string): Promise<SyncState> {
  let data: string;
  try {
    data = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFoundError(err)) {
      return createEmptySyncState();
    }
    throw new StateError(path, "reading state file", err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data) as unknown;
  } catch (err) {
    throw new StateError(path, "parsing state file", err);
  }

  const parsed = SyncStateFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new StateError(path, `invalid state file: ${parsed.error.issues[0]?.message ?? "unknown"}`, parsed.error);
  }
  return fromFile(parsed.data);
}

/**
 * Stamps `lastSyncAt` on the passed state, then replaces the file atomically
 * with owner-only permissions.
 */
export async function saveSyncState(path: string, state: SyncState, now: Date = new Date()): Promise<void> {
  state.lastSyncAt = formatTimestamp(now);

  try {
    await writeFileAtomically(path, JSON.stringify(toFile(state), null, 2), { mode: 0o600 });
  } catch (err) {
    throw new PersistError(path, err);
  }
}

// --- Accessors ---

export function getLastSyncedUuid(state: SyncState, sessionId: string): string {
  return state.sessions[sessionId]?.lastSyncedUuid ?? "";
}

export function updateSession(
  state: SyncState,
  sessionId: string,
  lastUuid: string,
  messageCount: number,
  now: Date = new Date()
): void {
  state.sessions[sessionId] = {
    lastSyncedUuid: lastUuid,
    lastSyncAt: formatTimestamp(now),
    messageCount,
  };
}
