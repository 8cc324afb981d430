/**
 * Sync Configuration
 *
 * Reads ~/.transcript-sync/config.json and applies environment overrides.
 * The result is built once at start-up and passed to every component;
 * nothing below the CLI reads the home directory, host name or env itself.
 */

import { z } from "zod";
import { readFile } from "fs/promises";
import { join } from "path";
import { writeFileAtomically } from "../sync/atomic-write.js";
import { ConfigError, isNotFoundError } from "../sync/errors.js";
import { defaultStatePath } from "../sync/sync-state.js";

export const CONFIG_DIR_NAME = ".transcript-sync";
export const CONFIG_FILE_NAME = "config.json";
export const DEFAULT_API_ENDPOINT = "https://api.transcript-sync.dev";

// --- Schema ---

export const SyncConfigSchema = z.object({
  apiEndpoint: z.string().url(),
  machineId: z.string().min(1),
  claudeDataDir: z.string().min(1),
  excludePatterns: z.array(z.string()),
  statePath: z.string().min(1),
});

export type SyncConfig = z.infer<typeof SyncConfigSchema>;

// Every key is optional on disk; other top-level sections (telemetry) are kept
export const ConfigFileSchema = SyncConfigSchema.partial().passthrough();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export type ConfigKey = keyof SyncConfig;

export const CONFIG_KEYS: readonly ConfigKey[] = [
  "apiEndpoint",
  "machineId",
  "claudeDataDir",
  "excludePatterns",
  "statePath",
];

/**
 * Process facts the defaults derive from. Captured once by the caller.
 */
export interface ConfigEnvironment {
  homeDir: string;
  hostname: string;
  env?: Record<string, string | undefined>;
}

// --- Paths ---

export function getConfigDir(homeDir: string): string {
  return join(homeDir, CONFIG_DIR_NAME);
}

export function getConfigFile(homeDir: string): string {
  return join(getConfigDir(homeDir), CONFIG_FILE_NAME);
}

function splitPatterns(value: string): string[] {
  return value
    .split(",")
    .map((pattern) => pattern.trim())
    .filter((pattern) => pattern !== "");
}

// --- Defaults ---

export function createDefaultConfig(environment: ConfigEnvironment): SyncConfig {
  return {
    apiEndpoint: DEFAULT_API_ENDPOINT,
    machineId: environment.hostname,
    claudeDataDir: join(environment.homeDir, ".claude", "projects"),
    excludePatterns: [],
    statePath: defaultStatePath(getConfigDir(environment.homeDir)),
  };
}

/**
 * TRANSCRIPT_SYNC_* variables win over the file
 */
export function applyEnvOverrides(
  config: SyncConfig,
  env: Record<string, string | undefined> = {}
): SyncConfig {
  const next = { ...config };
  if (env.TRANSCRIPT_SYNC_API_ENDPOINT) next.apiEndpoint = env.TRANSCRIPT_SYNC_API_ENDPOINT;
  if (env.TRANSCRIPT_SYNC_MACHINE_ID) next.machineId = env.TRANSCRIPT_SYNC_MACHINE_ID;
  if (env.TRANSCRIPT_SYNC_DATA_DIR) next.claudeDataDir = env.TRANSCRIPT_SYNC_DATA_DIR;
  if (env.TRANSCRIPT_SYNC_STATE_PATH) next.statePath = env.TRANSCRIPT_SYNC_STATE_PATH;
  if (env.TRANSCRIPT_SYNC_EXCLUDE) {
    next.excludePatterns = splitPatterns(env.TRANSCRIPT_SYNC_EXCLUDE);
  }
  return next;
}

// --- Load / Save ---

async function readConfigFile(path: string): Promise<ConfigFile> {
  let data: string;
  try {
    data = await readFile(path, "utf-8");
  } catch (err) {
    if (isNotFoundError(err)) return {};
    throw new ConfigError(`reading config file ${path}`, err);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data) as unknown;
  } catch (err) {
    throw new ConfigError(`parsing config file ${path}`, err);
  }

  const parsed = ConfigFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid config file ${path}: ${parsed.error.issues[0]?.message ?? "unknown"}`);
  }
  return parsed.data;
}

/**
 * Defaults, then the config file, then environment overrides.
 * A missing file is not an error.
 */
export async function loadConfig(environment: ConfigEnvironment, path?: string): Promise<SyncConfig> {
  const file = await readConfigFile(path ?? getConfigFile(environment.homeDir));
  const defaults = createDefaultConfig(environment);

  const merged: SyncConfig = {
    apiEndpoint: file.apiEndpoint ?? defaults.apiEndpoint,
    machineId: file.machineId ?? defaults.machineId,
    claudeDataDir: file.claudeDataDir ?? defaults.claudeDataDir,
    excludePatterns: file.excludePatterns ?? defaults.excludePatterns,
    statePath: file.statePath ?? defaults.statePath,
  };

  const result = SyncConfigSchema.safeParse(applyEnvOverrides(merged, environment.env));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`invalid configuration: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown"}`);
  }
  return result.data;
}

/**
 * Merge `updates` into the file, preserving unrelated sections
 */
export async function saveConfig(path: string, updates: Partial<SyncConfig>): Promise<void> {
  const existing = await readConfigFile(path);
  const next = { ...existing, ...updates };
  await writeFileAtomically(path, JSON.stringify(next, null, 2), { mode: 0o600 });
}

export function isConfigKey(key: string): key is ConfigKey {
  return CONFIG_KEYS.some((known) => known === key);
}

/**
 * Parse a CLI value for one key. `excludePatterns` takes a comma-separated list.
 */
export function parseConfigValue(key: ConfigKey, value: string): Partial<SyncConfig> {
  if (key === "excludePatterns") {
    return { excludePatterns: splitPatterns(value) };
  }

  const field = SyncConfigSchema.shape[key].safeParse(value);
  if (!field.success) {
    throw new ConfigError(`invalid value for ${key}: ${field.error.issues[0]?.message ?? "unknown"}`);
  }

  switch (key) {
    case "apiEndpoint":
      return { apiEndpoint: field.data };
    case "machineId":
      return { machineId: field.data };
    case "claudeDataDir":
      return { claudeDataDir: field.data };
    case "statePath":
      return { statePath: field.data };
  }
}
