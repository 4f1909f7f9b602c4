/**
 * Telemetry client - PostHog wrapper with privacy controls
 *
 * Features:
 * - ON by default, opt-out via config
 * - Anonymous user ID (SHA-256 hashed device ID)
 * - Graceful degradation (failures don't break sync)
 * - Singleton pattern for easy access
 */

import { PostHog } from "posthog-node";
import { loadTelemetryConfig, saveTelemetryConfig } from "./config.js";
import { getAnonymousUserId } from "./user-id.js";
import type { ConflictChoice, SyncErrorCategory, SyncTrigger, TelemetryEvent } from "./events.js";

// No key means no PostHog client; events are dropped
const POSTHOG_API_KEY = process.env.POSTHOG_API_KEY || "";
const POSTHOG_HOST = process.env.POSTHOG_HOST || "https://us.i.posthog.com";

const LIB_NAME = "@orbitsync/telemetry";
const LIB_VERSION = "0.1.0";

export interface TelemetryClientOptions {
  /** Override enabled state (ignores config) */
  enabled?: boolean;
  /** Force a specific user ID (for testing) */
  forceUserId?: string;
  /** PostHog API key override */
  apiKey?: string;
  /** PostHog host override */
  host?: string;
}

export class TelemetryClient {
  private client: PostHog | null = null;
  private userId: string;
  private enabled: boolean;
  private connector: string = "unknown";
  private readonly apiKey: string;
  private readonly host: string;

  constructor(options: TelemetryClientOptions = {}) {
    const config = loadTelemetryConfig();

    this.enabled = options.enabled ?? config.enabled;
    this.userId = options.forceUserId || config.anonymousId || getAnonymousUserId();
    this.apiKey = options.apiKey || POSTHOG_API_KEY;
    this.host = options.host || POSTHOG_HOST;

    // Save the anonymous ID for consistency across sessions
    if (!config.anonymousId && !options.forceUserId && this.enabled) {
      saveTelemetryConfig({ ...config, anonymousId: this.userId });
    }

    if (this.enabled) {
      this.connect();
    }
  }

  private connect(): void {
    if (this.client || !this.apiKey) {
      return;
    }

    try {
      this.client = new PostHog(this.apiKey, {
        host: this.host,
        flushAt: 10, // Batch events
        flushInterval: 5000, // 5 seconds
      });
    } catch (error) {
      // Telemetry init failed but sync continues
      console.error("[telemetry] Failed to initialize PostHog:", error);
      this.enabled = false;
    }
  }

  /**
   * Set the connector name (e.g., "cli", "daemon")
   */
  setConnector(connector: string): void {
    this.connector = connector;
  }

  /**
   * Track a telemetry event
   */
  track(event: TelemetryEvent): void {
    if (!this.enabled || !this.client) {
      return;
    }

    try {
      this.client.capture({
        distinctId: this.userId,
        event: event.event,
        properties: {
          ...event.properties,
          $lib: LIB_NAME,
          $lib_version: LIB_VERSION,
          connector: this.connector,
        },
      });
    } catch (error) {
      console.error("[telemetry] Failed to track event:", error);
    }
  }

  /**
   * Track a completed sync pass (including partial success)
   */
  trackSyncCompleted(
    trigger: SyncTrigger,
    counts: { uploaded: number; downloaded: number; failed: number },
    durationMs: number
  ): void {
    this.track({
      event: "sync.completed",
      properties: {
        trigger,
        records_uploaded: counts.uploaded,
        records_downloaded: counts.downloaded,
        records_failed: counts.failed,
        duration_ms: durationMs,
      },
    });
  }

  /**
   * Track an aborted sync pass
   */
  trackSyncFailed(trigger: SyncTrigger, errorType: SyncErrorCategory, durationMs: number): void {
    this.track({
      event: "sync.failed",
      properties: { trigger, error_type: errorType, duration_ms: durationMs },
    });
  }

  trackConflictDetected(otherDeviceType: string, localRecordCount: number): void {
    this.track({
      event: "sync.conflict_detected",
      properties: { other_device_type: otherDeviceType, local_record_count: localRecordCount },
    });
  }

  trackConflictResolved(choice: ConflictChoice, success: boolean): void {
    this.track({
      event: "sync.conflict_resolved",
      properties: { choice, success },
    });
  }

  /**
   * Opt out of telemetry
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

  /**
   * Check if telemetry is enabled
   */
  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Get the anonymous user ID
   */
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
