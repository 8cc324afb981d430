/**
 * Command dispatch. Returns the process exit code instead of exiting,
 * so the entry point owns process lifetime.
 */

import { initTelemetry, setConfigDir, shutdownTelemetry } from "@transcript-sync/telemetry";
import { getConfigDir } from "../config/config.js";
import { describeError } from "../sync/errors.js";
import { cmdAuthHelp, cmdAuthLogin, cmdAuthLogout, cmdAuthStatus } from "./auth.js";
import { cmdConfigHelp, cmdConfigSet, cmdConfigShow } from "./config.js";
import { loadCliConfig, type CliContext } from "./context.js";
import { cmdStatus, cmdSync } from "./sync.js";
import { cmdTelemetry } from "./telemetry.js";

export const VERSION = "0.1.0";

export function cmdHelp(): void {
  console.log(`
transcript-sync - Incremental upload of local conversation logs

Usage:
  transcript-sync sync                        Upload new messages
  transcript-sync status                      Show configuration, auth and sync state

  transcript-sync auth login [token]          Save an access token
  transcript-sync auth logout                 Remove the stored token
  transcript-sync auth status                 Show authentication status

  transcript-sync config show                 Print the effective configuration
  transcript-sync config set <key> <value>    Persist a setting

  transcript-sync telemetry on|off|status     Manage anonymous usage statistics

  transcript-sync version                     Print the version
  transcript-sync help                        Show this help

Environment Variables:
  TRANSCRIPT_SYNC_API_ENDPOINT    Override apiEndpoint
  TRANSCRIPT_SYNC_MACHINE_ID      Override machineId
  TRANSCRIPT_SYNC_DATA_DIR        Override claudeDataDir
  TRANSCRIPT_SYNC_STATE_PATH      Override statePath
  TRANSCRIPT_SYNC_EXCLUDE         Override excludePatterns (comma-separated)
  TRANSCRIPT_SYNC_TOKEN           Access token (takes precedence over auth login)
`);
}

/**
 * Run sync with SIGINT/SIGTERM wired to cancellation
 */
async function runInterruptibleSync(ctx: CliContext): Promise<number> {
  const controller = new AbortController();
  const onSignal = (): void => {
    if (!controller.signal.aborted) {
      console.error("\nInterrupted, finishing current step...");
      controller.abort();
    }
  };

  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
  try {
    return await cmdSync(ctx, { signal: controller.signal });
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

async function dispatch(ctx: CliContext, args: string[]): Promise<number> {
  const [command, subcommand] = args;

  switch (command) {
    case "sync":
      return runInterruptibleSync(ctx);
    case "status":
      return cmdStatus(ctx);
    case "auth":
      switch (subcommand) {
        case "login":
          return cmdAuthLogin(ctx, args[2]);
        case "logout":
          return cmdAuthLogout(ctx);
        case "status":
          return cmdAuthStatus(ctx);
        default:
          cmdAuthHelp();
          return subcommand === undefined ? 0 : 1;
      }
    case "config":
      switch (subcommand) {
        case "show":
          return cmdConfigShow(ctx);
        case "set":
          return cmdConfigSet(ctx, args[2], args[3]);
        default:
          cmdConfigHelp();
          return subcommand === undefined ? 0 : 1;
      }
    case "telemetry":
      if (!ctx.telemetry) {
        console.error("Telemetry is not initialized.");
        return 1;
      }
      return cmdTelemetry(ctx.telemetry, subcommand);
    case "version":
    case "--version":
      console.log(VERSION);
      return 0;
    case "help":
    case "--help":
    case undefined:
      cmdHelp();
      return 0;
    default:
      console.error(`Unknown command: ${command}`);
      cmdHelp();
      return 1;
  }
}

/**
 * Machine id the anonymous telemetry id derives from. A broken config
 * falls back to the host name; the command itself reports the config error.
 */
async function resolveMachineId(ctx: CliContext): Promise<string> {
  try {
    return (await loadCliConfig(ctx)).machineId;
  } catch {
    return ctx.hostname;
  }
}

/**
 * Set up telemetry, run one command, flush telemetry.
 */
export async function main(args: string[], ctx: CliContext): Promise<number> {
  setConfigDir(getConfigDir(ctx.homeDir));
  const telemetry =
    ctx.telemetry ??
    initTelemetry({ machineId: await resolveMachineId(ctx) });
  const withTelemetry: CliContext = { ...ctx, telemetry };

  const started = Date.now();
  let exitCode: number;
  try {
    exitCode = await dispatch(withTelemetry, args);
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    exitCode = 1;
  }

  const [command = "help", subcommand] = args;
  telemetry.trackCommand(command, subcommand, exitCode, Date.now() - started);
  await shutdownTelemetry();
  return exitCode;
}
