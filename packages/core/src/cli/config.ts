/**
 * CLI Config Commands
 *
 *   transcript-sync config show               Print the effective configuration
 *   transcript-sync config set <key> <value>  Persist one setting to config.json
 */

import { CONFIG_KEYS, isConfigKey, parseConfigValue, saveConfig } from "../config/config.js";
import { describeError } from "../sync/errors.js";
import { getCliPaths, loadCliConfig, type CliContext } from "./context.js";

export async function cmdConfigShow(ctx: CliContext): Promise<number> {
  try {
    const config = await loadCliConfig(ctx);
    console.log(JSON.stringify(config, null, 2));
    return 0;
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}

export async function cmdConfigSet(ctx: CliContext, key?: string, value?: string): Promise<number> {
  if (!key || value === undefined) {
    console.error("Usage: transcript-sync config set <key> <value>");
    console.error(`Keys: ${CONFIG_KEYS.join(", ")}`);
    return 1;
  }
  if (!isConfigKey(key)) {
    console.error(`Unknown config key: ${key}`);
    console.error(`Keys: ${CONFIG_KEYS.join(", ")}`);
    return 1;
  }

  try {
    const update = parseConfigValue(key, value);
    await saveConfig(getCliPaths(ctx).configFile, update);
    console.log(`Set ${key} = ${JSON.stringify(update[key])}`);
    return 0;
  } catch (err) {
    console.error(`Error: ${describeError(err)}`);
    return 1;
  }
}

export function cmdConfigHelp(): void {
  console.log(`
Config Commands:
  transcript-sync config show                Print the effective configuration
  transcript-sync config set <key> <value>   Persist a setting

Keys:
  apiEndpoint        Sync API base URL
  machineId          Identifier sent with every upload
  claudeDataDir      Directory scanned for conversation logs
  excludePatterns    Comma-separated globs or path fragments to skip
  statePath          Location of the sync state file
`);
}
