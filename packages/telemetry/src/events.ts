/**
 * Telemetry event type definitions with Zod schemas
 *
 * PRIVACY: These events track metadata only, NEVER content.
 * - Command names, not arguments
 * - Counts and durations, not session ids or paths
 * - Error codes, not error messages
 */

import { z } from "zod";

// --- CLI Events ---

export const CommandRunEventSchema = z.object({
  event: z.literal("cli.command_run"),
  properties: z.object({
    command: z.string(),
    subcommand: z.string().optional(),
    exit_code: z.number().int(),
    duration_ms: z.number().optional(),
  }),
});

// --- Sync Events ---

export const SyncCompletedEventSchema = z.object({
  event: z.literal("sync.run_completed"),
  properties: z.object({
    files_found: z.number().int().min(0),
    synced: z.number().int().min(0),
    skipped: z.number().int().min(0),
    errored: z.number().int().min(0),
    duration_ms: z.number(),
  }),
});

export const SyncFailedEventSchema = z.object({
  event: z.literal("sync.run_failed"),
  properties: z.object({
    /** Stable error code such as CREDENTIAL_UNAVAILABLE; never a message */
    error_code: z.string().regex(/^[A-Z_]+$/),
    duration_ms: z.number(),
  }),
});

// --- Union type for all events ---

export const TelemetryEventSchema = z.discriminatedUnion("event", [
  CommandRunEventSchema,
  SyncCompletedEventSchema,
  SyncFailedEventSchema,
]);

export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;

export type EventType = TelemetryEvent["event"];

export const EVENT_TYPES = {
  COMMAND_RUN: "cli.command_run",
  SYNC_COMPLETED: "sync.run_completed",
  SYNC_FAILED: "sync.run_failed",
} as const;
