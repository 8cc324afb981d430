/**
 * Telemetry configuration management
 *
 * Reads/writes the `telemetry` section of ~/.transcript-sync/config.json
 * Default: telemetry is ON (enabled: true)
 */

import { existsSync, readFileSync, writeFileSync, mkdirSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";
import { getConfigDir } from "./user-id.js";

export const TelemetryConfigSchema = z.object({
  enabled: z.boolean().default(true),
  anonymousId: z.string().optional(),
});

export type TelemetryConfig = z.infer<typeof TelemetryConfigSchema>;

const ConfigFileSchema = z
  .object({
    telemetry: TelemetryConfigSchema.optional(),
  })
  .passthrough();

function getConfigFile(): string {
  return join(getConfigDir(), "config.json");
}

function readConfigFile(configFile: string): z.infer<typeof ConfigFileSchema> {
  const raw: unknown = JSON.parse(readFileSync(configFile, "utf-8"));
  return ConfigFileSchema.parse(raw);
}

/**
 * Load telemetry configuration. An unreadable file leaves telemetry
 * at its default.
 */
export function loadTelemetryConfig(): TelemetryConfig {
  const configFile = getConfigFile();

  if (!existsSync(configFile)) {
    return { enabled: true };
  }

  try {
    return readConfigFile(configFile).telemetry ?? { enabled: true };
  } catch (error) {
    console.error("[telemetry] Failed to read config:", error instanceof Error ? error.message : error);
    return { enabled: true };
  }
}

/**
 * Save telemetry configuration
 *
 * Merges with existing config to preserve other settings
 */
export function saveTelemetryConfig(config: TelemetryConfig): void {
  const configFile = getConfigFile();
  const dir = dirname(configFile);

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true, mode: 0o700 });
  }

  const existingConfig = existsSync(configFile) ? readConfigFile(configFile) : {};
  const next = { ...existingConfig, telemetry: config };

  writeFileSync(configFile, JSON.stringify(next, null, 2), {
    mode: 0o600,
  });
}
