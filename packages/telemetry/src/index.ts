/**
 * @transcript-sync/telemetry - Privacy-conscious usage analytics
 *
 * Features:
 * - ON by default, opt-out via config
 * - Anonymous user ID (SHA-256 hashed machine id)
 * - Typed events with Zod schemas
 * - Graceful degradation (failures don't break a sync)
 *
 * Usage:
 * ```typescript
 * import { initTelemetry, shutdownTelemetry } from "@transcript-sync/telemetry";
 *
 * const telemetry = initTelemetry({ machineId: config.machineId });
 * telemetry.trackCommand("sync", undefined, 0, 1830);
 *
 * // On process exit
 * await shutdownTelemetry();
 * ```
 */

// Client exports
export {
  TelemetryClient,
  getTelemetryClient,
  initTelemetry,
  shutdownTelemetry,
  resetTelemetryClient,
} from "./client.js";
export type { TelemetryClientOptions, SyncRunCounts } from "./client.js";

// Event type exports
export {
  TelemetryEventSchema,
  EVENT_TYPES,
  CommandRunEventSchema,
  SyncCompletedEventSchema,
  SyncFailedEventSchema,
} from "./events.js";
export type { TelemetryEvent, EventType } from "./events.js";

// Config exports
export {
  TelemetryConfigSchema,
  loadTelemetryConfig,
  saveTelemetryConfig,
} from "./config.js";
export type { TelemetryConfig } from "./config.js";

// User ID exports
export {
  getAnonymousUserId,
  hashForAnonymity,
  setConfigDir,
  getConfigDir,
} from "./user-id.js";
