/**
 * Process facts every command needs, captured once in the entry point.
 */

import type { TelemetryClient } from "@transcript-sync/telemetry";
import {
  createCredentialProvider,
  createFileTokenStore,
  getCredentialsFile,
  type CredentialProvider,
  type TokenStore,
} from "../auth/credentials.js";
import { getConfigDir, getConfigFile, loadConfig, type SyncConfig } from "../config/config.js";

export interface CliContext {
  homeDir: string;
  hostname: string;
  env: Record<string, string | undefined>;
  telemetry?: TelemetryClient;
}

export interface CliPaths {
  configDir: string;
  configFile: string;
  credentialsFile: string;
}

export function getCliPaths(ctx: CliContext): CliPaths {
  const configDir = getConfigDir(ctx.homeDir);
  return {
    configDir,
    configFile: getConfigFile(ctx.homeDir),
    credentialsFile: getCredentialsFile(configDir),
  };
}

export function loadCliConfig(ctx: CliContext): Promise<SyncConfig> {
  return loadConfig({ homeDir: ctx.homeDir, hostname: ctx.hostname, env: ctx.env });
}

export function getTokenStore(ctx: CliContext): TokenStore {
  return createFileTokenStore(getCliPaths(ctx).credentialsFile);
}

export function getCredentialProvider(ctx: CliContext): CredentialProvider {
  return createCredentialProvider({ store: getTokenStore(ctx), env: ctx.env });
}
