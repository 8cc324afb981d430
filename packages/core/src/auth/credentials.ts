/**
 * Credentials
 *
 * The sync engine only needs "a valid bearer token or a failure".
 * Tokens come from TRANSCRIPT_SYNC_TOKEN or from
 * ~/.transcript-sync/credentials.json (owner-only, written atomically).
 */

import { z } from "zod";
import { readFile, rm } from "fs/promises";
import { join } from "path";
import { writeFileAtomically } from "../sync/atomic-write.js";
import { CredentialError, isNotFoundError } from "../sync/errors.js";

export const CREDENTIALS_FILE_NAME = "credentials.json";
export const TOKEN_ENV_VAR = "TRANSCRIPT_SYNC_TOKEN";

// Treat a token this close to expiry as already expired
const EXPIRY_SKEW_MS = 60_000;

export const StoredCredentialsSchema = z.object({
  accessToken: z.string().min(1),
  /** ISO timestamp; absent means the token does not expire */
  expiresAt: z.string().datetime({ offset: true }).optional(),
  updatedAt: z.string().optional(),
});

export type StoredCredentials = z.infer<typeof StoredCredentialsSchema>;

export interface TokenStore {
  load: () => Promise<StoredCredentials | null>;
  save: (credentials: StoredCredentials) => Promise<void>;
  clear: () => Promise<void>;
}

export type CredentialProvider = () => Promise<string>;

export function getCredentialsFile(configDir: string): string {
  return join(configDir, CREDENTIALS_FILE_NAME);
}

/**
 * JSON file store. A missing file reads as "no credentials".
 */
export function createFileTokenStore(path: string): TokenStore {
  async function load(): Promise<StoredCredentials | null> {
    let data: string;
    try {
      data = await readFile(path, "utf-8");
    } catch (err) {
      if (isNotFoundError(err)) return null;
      throw new CredentialError(`reading credentials file ${path}`, err);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data) as unknown;
    } catch (err) {
      throw new CredentialError(`parsing credentials file ${path}`, err);
    }

    const parsed = StoredCredentialsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CredentialError(`invalid credentials file ${path}`, parsed.error);
    }
    return parsed.data;
  }

  async function save(credentials: StoredCredentials): Promise<void> {
    const record: StoredCredentials = {
      ...credentials,
      updatedAt: credentials.updatedAt ?? new Date().toISOString(),
    };
    await writeFileAtomically(path, JSON.stringify(record, null, 2), { mode: 0o600 });
  }

  async function clear(): Promise<void> {
    await rm(path, { force: true });
  }

  return { load, save, clear };
}

export function isExpired(credentials: StoredCredentials, now: Date): boolean {
  if (!credentials.expiresAt) return false;
  return now.getTime() >= Date.parse(credentials.expiresAt) - EXPIRY_SKEW_MS;
}

export interface CredentialProviderOptions {
  store: TokenStore;
  env?: Record<string, string | undefined>;
  now?: () => Date;
}

/**
 * Environment token first, then the store. Fails with CredentialError
 * when nothing usable is available.
 */
export function createCredentialProvider(options: CredentialProviderOptions): CredentialProvider {
  const { store, env = {}, now = () => new Date() } = options;

  return async () => {
    const fromEnv = env[TOKEN_ENV_VAR];
    if (fromEnv) return fromEnv;

    const stored = await store.load();
    if (!stored) {
      throw new CredentialError("not authenticated. Run: transcript-sync auth login");
    }
    if (isExpired(stored, now())) {
      throw new CredentialError("stored token has expired. Run: transcript-sync auth login");
    }
    return stored.accessToken;
  };
}
