/**
 * Telemetry client - PostHog wrapper with privacy controls
 *
 * Features:
 * - ON by default, opt-out via config
 * - Anonymous user ID (SHA-256 hashed machine id)
 * - Graceful degradation (failures don't break a sync)
 * - Singleton pattern for easy access
 */

import { PostHog } from "posthog-node";
import { loadTelemetryConfig, saveTelemetryConfig } from "./config.js";
import { getAnonymousUserId } from "./user-id.js";
import { TelemetryEventSchema, type TelemetryEvent } from "./events.js";

const POSTHOG_API_KEY =
  process.env.POSTHOG_API_KEY || "phc_placeholder_replace_me";
const POSTHOG_HOST =
  process.env.POSTHOG_HOST || "https://us.i.posthog.com";

const LIB_NAME = "@transcript-sync/telemetry";
const LIB_VERSION = "0.1.0";

export interface TelemetryClientOptions {
  /** Override enabled state (ignores config) */
  enabled?: boolean;
  /** Source of the anonymous id when none is saved yet */
  machineId?: string;
  /** Force a specific user ID (for testing) */
  forceUserId?: string;
  /** PostHog API key override */
  apiKey?: string;
  /** PostHog host override */
  host?: string;
}

export interface SyncRunCounts {
  filesFound: number;
  synced: number;
  skipped: number;
  errored: number;
}

function createPostHog(apiKey: string, host: string): PostHog | null {
  // Don't initialize if using placeholder key
  if (!apiKey || apiKey.includes("placeholder")) {
    return null;
  }
  return new PostHog(apiKey, {
    host,
    flushAt: 10, // Batch events
    flushInterval: 5000, // 5 seconds
  });
}

export class TelemetryClient {
  private client: PostHog | null = null;
  private userId: string;
  private enabled: boolean;
  private apiKey: string;
  private host: string;

  constructor(options: TelemetryClientOptions = {}) {
    const config = loadTelemetryConfig();

    this.enabled = options.enabled ?? config.enabled;
    this.userId =
      options.forceUserId ||
      config.anonymousId ||
      getAnonymousUserId(options.machineId ?? "unknown-machine");
    this.apiKey = options.apiKey || POSTHOG_API_KEY;
    this.host = options.host || POSTHOG_HOST;

    // Save the anonymous ID for consistency across sessions
    if (!config.anonymousId && this.enabled) {
      try {
        saveTelemetryConfig({ ...config, anonymousId: this.userId });
      } catch (error) {
        console.error("[telemetry] Failed to save anonymous id:", error instanceof Error ? error.message : error);
      }
    }

    if (this.enabled) {
      this.connect();
    }
  }

  private connect(): void {
    if (this.client) return;
    try {
      this.client = createPostHog(this.apiKey, this.host);
    } catch (error) {
      console.error("[telemetry] Failed to initialize PostHog:", error);
      this.enabled = false;
    }
  }

  /**
   * Track a telemetry event. Events that fail validation are dropped.
   */
  track(event: TelemetryEvent): void {
    if (!this.enabled || !this.client) {
      return;
    }

    const parsed = TelemetryEventSchema.safeParse(event);
    if (!parsed.success) {
      console.error(`[telemetry] Dropping invalid ${event.event} event`);
      return;
    }

    try {
      this.client.capture({
        distinctId: this.userId,
        event: parsed.data.event,
        properties: {
          ...parsed.data.properties,
          $lib: LIB_NAME,
          $lib_version: LIB_VERSION,
        },
      });
    } catch (error) {
      // Graceful degradation - don't break the sync
      console.error("[telemetry] Failed to track event:", error);
    }
  }

  trackCommand(
    command: string,
    subcommand: string | undefined,
    exitCode: number,
    durationMs?: number
  ): void {
    this.track({
      event: "cli.command_run",
      properties: {
        command,
        subcommand,
        exit_code: exitCode,
        duration_ms: durationMs,
      },
    });
  }

  trackSyncCompleted(counts: SyncRunCounts, durationMs: number): void {
    this.track({
      event: "sync.run_completed",
      properties: {
        files_found: counts.filesFound,
        synced: counts.synced,
        skipped: counts.skipped,
        errored: counts.errored,
        duration_ms: durationMs,
      },
    });
  }

  trackSyncFailed(errorCode: string, durationMs: number): void {
    this.track({
      event: "sync.run_failed",
      properties: { error_code: errorCode, duration_ms: durationMs },
    });
  }

  /**
   * Opt out of telemetry. Pending events are flushed first.
   */
  async disable(): Promise<void> {
    this.enabled = false;
    saveTelemetryConfig({ enabled: false, anonymousId: this.userId });
    await this.shutdown();
  }

  /**
   * Opt back into telemetry
   */
  enable(): void {
    this.enabled = true;
    saveTelemetryConfig({ enabled: true, anonymousId: this.userId });
    this.connect();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  getUserId(): string {
    return this.userId;
  }

  /**
   * Flush pending events and close client
   * MUST be called before process exit
   */
  async shutdown(): Promise<void> {
    if (this.client) {
      try {
        await this.client.shutdown();
      } catch (error) {
        console.error("[telemetry] Failed to shutdown:", error);
      }
      this.client = null;
    }
  }
}

// --- Singleton instance for convenience ---

let globalClient: TelemetryClient | null = null;

/**
 * Get the global telemetry client (singleton)
 */
export function getTelemetryClient(): TelemetryClient {
  if (!globalClient) {
    globalClient = new TelemetryClient();
  }
  return globalClient;
}

/**
 * Initialize telemetry with options
 * Call this early in your app to configure the client
 */
export function initTelemetry(options: TelemetryClientOptions = {}): TelemetryClient {
  globalClient = new TelemetryClient(options);
  return globalClient;
}

/**
 * Shutdown global telemetry client
 * Call before process exit to flush pending events
 */
export async function shutdownTelemetry(): Promise<void> {
  if (globalClient) {
    await globalClient.shutdown();
    globalClient = null;
  }
}

/**
 * Reset global client (for testing)
 */
export function resetTelemetryClient(): void {
  globalClient = null;
}
