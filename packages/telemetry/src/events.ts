/**
 * Telemetry event type definitions with Zod schemas
 *
 * PRIVACY: These events track metadata only, NEVER content.
 * - Counts and durations, not record data
 * - Error categories, not messages
 * - Device types, not device names
 */

import { z } from "zod";

// --- Shared enums ---

export const SyncTriggerSchema = z.enum(["fullSync", "backgroundSync", "manualSync", "conflictResolution"]);

export const SyncErrorCategorySchema = z.enum([
  "network",
  "unauthorized",
  "not_found",
  "invalid_data",
  "storage",
  "unknown",
]);

export const ConflictChoiceSchema = z.enum(["useThisDevice", "useCloudData"]);

// --- Sync Outcome Events ---

export const SyncCompletedEventSchema = z.object({
  event: z.literal("sync.completed"),
  properties: z.object({
    trigger: SyncTriggerSchema,
    records_uploaded: z.number().int().min(0),
    records_downloaded: z.number().int().min(0),
    records_failed: z.number().int().min(0),
    duration_ms: z.number().min(0),
  }),
});

export const SyncFailedEventSchema = z.object({
  event: z.literal("sync.failed"),
  properties: z.object({
    trigger: SyncTriggerSchema,
    error_type: SyncErrorCategorySchema,
    duration_ms: z.number().min(0),
  }),
});

// --- Conflict Events ---

export const ConflictDetectedEventSchema = z.object({
  event: z.literal("sync.conflict_detected"),
  properties: z.object({
    other_device_type: z.string(),
    local_record_count: z.number().int().min(0),
  }),
});

export const ConflictResolvedEventSchema = z.object({
  event: z.literal("sync.conflict_resolved"),
  properties: z.object({
    choice: ConflictChoiceSchema,
    success: z.boolean(),
  }),
});

// --- Union type for all events ---

export const TelemetryEventSchema = z.discriminatedUnion("event", [
  SyncCompletedEventSchema,
  SyncFailedEventSchema,
  ConflictDetectedEventSchema,
  ConflictResolvedEventSchema,
]);

export type TelemetryEvent = z.infer<typeof TelemetryEventSchema>;

export type SyncTrigger = z.infer<typeof SyncTriggerSchema>;
export type SyncErrorCategory = z.infer<typeof SyncErrorCategorySchema>;
export type ConflictChoice = z.infer<typeof ConflictChoiceSchema>;

// --- Event type literals for convenience ---

export type EventType = TelemetryEvent["event"];

export const EVENT_TYPES = {
  SYNC_COMPLETED: "sync.completed",
  SYNC_FAILED: "sync.failed",
  CONFLICT_DETECTED: "sync.conflict_detected",
  CONFLICT_RESOLVED: "sync.conflict_resolved",
} as const;
