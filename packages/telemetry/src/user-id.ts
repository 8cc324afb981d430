/**
 * Anonymous user ID generation for telemetry
 *
 * SHA-256 of the machine id: stable per machine, not reversible.
 */

import { createHash } from "crypto";
import { homedir } from "os";
import { join } from "path";

const ID_PREFIX = "transcript-sync";

let configDir = join(homedir(), ".transcript-sync");

/**
 * Override config directory (for testing)
 */
export function setConfigDir(dir: string): void {
  configDir = dir;
}

export function getConfigDir(): string {
  return configDir;
}

/**
 * Deterministic 16-character hex id for any input
 */
export function hashForAnonymity(input: string): string {
  const hash = createHash("sha256");
  hash.update(`${ID_PREFIX}:${input}`);
  return hash.digest("hex").slice(0, 16);
}

export function getAnonymousUserId(machineId: string): string {
  return hashForAnonymity(machineId);
}
