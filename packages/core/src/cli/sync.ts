/**
 * CLI Sync Commands
 *
 *   transcript-sync sync      Upload new messages
 *   transcript-sync status    Show configuration, auth and sync state
 */

import { createApiClient } from "../api/client.js";
import { SyncError, SYNC_ERROR_CODES, describeError } from "../sync/errors.js";
import { formatSummary, runSync, type SyncLogger } from "../sync/sync-runner.js";
import { loadSyncState } from "../sync/sync-state.js";
import type { SyncConfig } from "../config/config.js";
import { getCredentialProvider, loadCliConfig, type CliContext } from "./context.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface SyncCommandOptions {
  signal?: AbortSignal;
  /** Injected in tests */
  fetch?: typeof fetch;
  logger?: SyncLogger;
  now?: () => Date;
}

function errorCode(err: unknown): string {
  return err instanceof SyncError ? err.code : "UNKNOWN";
}

export async function cmdSync(ctx: CliContext, options: SyncCommandOptions = {}): Promise<number> {
  const started = Date.now();
  const logger = options.logger ?? console;

  try {
    const config = await loadCliConfig(ctx);
    const getToken = getCredentialProvider(ctx);
    const client = createApiClient({
      endpoint: config.apiEndpoint,
      machineId: config.machineId,
      getToken,
      fetch: options.fetch,
    });

    const summary = await runSync({
      claudeDataDir: config.claudeDataDir,
      excludePatterns: config.excludePatterns,
      machineId: config.machineId,
      statePath: config.statePath,
      client,
      getCredential: getToken,
      signal: options.signal,
      logger,
      now: options.now,
    });

    logger.info(formatSummary(summary));
    ctx.telemetry?.trackSyncCompleted(summary, Date.now() - started);
    return EXIT_OK;
  } catch (err) {
    ctx.telemetry?.trackSyncFailed(errorCode(err), Date.now() - started);

    if (err instanceof SyncError && err.code === SYNC_ERROR_CODES.CANCELLED) {
      console.error("\nSync cancelled.");
      return EXIT_CANCELLED;
    }
    console.error(`Error: ${describeError(err)}`);
    return EXIT_FAILURE;
  }
}

export async function cmdStatus(ctx: CliContext): Promise<number> {
  let config: SyncConfig;
  try {
    config = await loadCliConfig(ctx);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return EXIT_FAILURE;
  }

  console.log(`API endpoint: ${config.apiEndpoint}`);
  console.log(`Machine ID: ${config.machineId}`);
  console.log(`Data directory: ${config.claudeDataDir}`);

  try {
    await getCredentialProvider(ctx)();
    console.log("Auth: ready");
  } catch (err) {
    console.log(`Auth: ${describeError(err)}`);
  }

  try {
    const state = await loadSyncState(config.statePath);
    const sessionCount = Object.keys(state.sessions).length;
    console.log(`Sessions tracked: ${sessionCount}`);
    console.log(`Last sync: ${state.lastSyncAt || "never"}`);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}
