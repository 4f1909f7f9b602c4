/**
 * @orbitsync/telemetry - Privacy-conscious analytics for sync outcomes
 *
 * Usage:
 * ```typescript
 * import { getTelemetryClient, shutdownTelemetry } from "@orbitsync/telemetry";
 *
 * const telemetry = getTelemetryClient();
 * telemetry.setConnector("cli");
 * telemetry.trackSyncCompleted("manualSync", { uploaded: 3, downloaded: 1, failed: 0 }, 420);
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
export type { TelemetryClientOptions } from "./client.js";

// Event exports
export {
  TelemetryEventSchema,
  EVENT_TYPES,
  SyncCompletedEventSchema,
  SyncFailedEventSchema,
  ConflictDetectedEventSchema,
  ConflictResolvedEventSchema,
  SyncTriggerSchema,
  SyncErrorCategorySchema,
  ConflictChoiceSchema,
} from "./events.js";
export type {
  TelemetryEvent,
  EventType,
  SyncTrigger,
  SyncErrorCategory,
  ConflictChoice,
} from "./events.js";

// Config exports
export {
  loadTelemetryConfig,
  saveTelemetryConfig,
  isTelemetryEnabled,
  TelemetryConfigSchema,
} from "./config.js";
export type { TelemetryConfig } from "./config.js";

// User ID exports
export { getAnonymousUserId, hashForAnonymity, setConfigDir, getConfigDir } from "./user-id.js";
