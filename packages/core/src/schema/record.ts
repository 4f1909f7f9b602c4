/**
 * Record Sync Contract
 *
 * Every syncable entity exposes a stable identity, a last-modified timestamp,
 * a tombstone flag and a flat JSON serialization. Relationships are written as
 * UUID references (single field for a parent, string array for children),
 * never as nested objects.
 */

import { z } from "zod";

// --- Contract ---

export type EntityClass = "template" | "instance";

export interface SyncableRecord {
  /** Entity type name, used in remote object keys */
  readonly entityType: string;
  /** Stable UUID, never reused */
  readonly syncID: string;
  /** Advanced on every local mutation */
  lastModified: Date;
  /** Tombstone flag: deleted but retained for propagation */
  isDeleted: boolean;
  /** Creation date, used for upload prioritization */
  readonly createdAt: Date;
  /** Flat JSON document, or null on a local encoding fault */
  toSyncJSON(): string | null;
}

// --- Dates ---

/**
 * ISO-8601 with millisecond precision in UTC, e.g. 2026-01-07T09:30:00.123Z.
 * All peers format and parse through these two functions.
 */
export function formatSyncDate(date: Date): string {
  return date.toISOString();
}

export function parseSyncDate(value: string): Date | null {
  const time = Date.parse(value);
  if (Number.isNaN(time)) return null;
  return new Date(time);
}

/** Zod schema for a sync date string, transformed to a Date */
export const SyncDateSchema = z
  .string()
  .refine((value) => parseSyncDate(value) !== null, { message: "Invalid sync date" })
  .transform((value) => new Date(Date.parse(value)));

export const SyncIDSchema = z.string().uuid();

// --- Base Document ---

export const BaseSyncDocumentSchema = z.object({
  syncID: SyncIDSchema,
  lastModified: SyncDateSchema,
  isDeleted: z.boolean(),
});

/** Shape every remote record document starts with */
export const SyncDocumentHeaderSchema = z.object({
  syncID: SyncIDSchema,
  lastModified: SyncDateSchema,
  isDeleted: z.union([z.boolean(), z.enum(["true", "false"])]).transform((v) => v === true || v === "true").optional(),
});

export type SyncDocumentHeader = z.infer<typeof SyncDocumentHeaderSchema>;

// --- Encoding ---

type JSONValue = string | number | boolean | null | JSONValue[] | { [key: string]: JSONValue };

export type SyncDocument = { [key: string]: JSONValue | undefined };

/**
 * Serialize a document with sorted keys, dropping undefined optionals.
 * Returns null instead of throwing when the document cannot be built or encoded
 * (e.g. an invalid Date field).
 */
export function encodeSyncDocument(build: () => SyncDocument): string | null {
  try {
    const document = build();
    const sorted: Record<string, JSONValue> = {};
    for (const key of Object.keys(document).sort()) {
      const value = document[key];
      if (value !== undefined) {
        sorted[key] = value;
      }
    }
    return JSON.stringify(sorted);
  } catch (err) {
    console.error("[SyncRecord] Failed to encode document:", err);
    return null;
  }
}

/**
 * Parse a JSON text into an unknown value, or null when it is not JSON.
 */
export function parseSyncJSON(json: string): unknown {
  try {
    return JSON.parse(json);
  } catch {
    return null;
  }
}

/**
 * Build a minimal tombstone for a record that no longer exists locally.
 */
export function createTombstoneDocument(syncID: string, now: Date = new Date()): string {
  return JSON.stringify({
    isDeleted: true,
    lastModified: formatSyncDate(now),
    syncID,
  });
}

/**
 * Optional date helper for documents.
 */
export function optionalSyncDate(date: Date | undefined): string | undefined {
  return date ? formatSyncDate(date) : undefined;
}
