/**
 * Sync History
 *
 * Rolling log of the most recent sync passes, newest first, persisted to
 * ~/.orbitsync/sync-history.json. Write failures are logged and the
 * in-memory log keeps working.
 */

import { randomUUID } from "crypto";
import { existsSync, mkdirSync, readFileSync, writeFileSync } from "fs";
import { dirname, join } from "path";
import { z } from "zod";

export const SYNC_HISTORY_FILENAME = "sync-history.json";
export const MAX_HISTORY_ENTRIES = 100;

// --- Schema ---

export const SyncActionSchema = z.enum(["fullSync", "backgroundSync", "manualSync", "conflictResolution"]);
export type SyncAction = z.infer<typeof SyncActionSchema>;

export const SyncHistoryStatusSchema = z.enum(["success", "partialSuccess", "failed", "cancelled", "skipped"]);
export type SyncHistoryStatus = z.infer<typeof SyncHistoryStatusSchema>;

export const SyncHistoryEntrySchema = z.object({
  id: z.string(),
  timestamp: z.string(), // ISO timestamp
  action: SyncActionSchema,
  status: SyncHistoryStatusSchema,
  details: z.string(),
  recordsUploaded: z.number().int().min(0),
  recordsDownloaded: z.number().int().min(0),
  durationMs: z.number().min(0),
  errorCode: z.string().optional(),
  errorMessage: z.string().optional(),
});

export type SyncHistoryEntry = z.infer<typeof SyncHistoryEntrySchema>;

export interface SyncHistoryRecordInput {
  action: SyncAction;
  status: SyncHistoryStatus;
  details: string;
  recordsUploaded?: number;
  recordsDownloaded?: number;
  durationMs?: number;
  errorCode?: string;
  errorMessage?: string;
}

export interface SyncHistoryOptions {
  /** Directory for the history file; in-memory only when omitted */
  dir?: string;
  maxEntries?: number;
  now?: () => Date;
}

export class SyncHistory {
  private entries: SyncHistoryEntry[];
  private readonly file: string | null;
  private readonly maxEntries: number;
  private readonly now: () => Date;

  constructor(options: SyncHistoryOptions = {}) {
    this.file = options.dir ? join(options.dir, SYNC_HISTORY_FILENAME) : null;
    this.maxEntries = options.maxEntries ?? MAX_HISTORY_ENTRIES;
    this.now = options.now ?? (() => new Date());
    this.entries = this.load();
  }

  get all(): SyncHistoryEntry[] {
    return [...this.entries];
  }

  get lastSync(): SyncHistoryEntry | null {
    return this.entries[0] ?? null;
  }

  get lastSuccessfulSync(): SyncHistoryEntry | null {
    return this.entries.find((entry) => entry.status === "success" || entry.status === "partialSuccess") ?? null;
  }

  recordSync(input: SyncHistoryRecordInput): SyncHistoryEntry {
    const entry: SyncHistoryEntry = {
      id: randomUUID(),
      timestamp: this.now().toISOString(),
      action: input.action,
      status: input.status,
      details: input.details,
      recordsUploaded: input.recordsUploaded ?? 0,
      recordsDownloaded: input.recordsDownloaded ?? 0,
      durationMs: input.durationMs ?? 0,
      ...(input.errorCode !== undefined ? { errorCode: input.errorCode } : {}),
      ...(input.errorMessage !== undefined ? { errorMessage: input.errorMessage } : {}),
    };

    this.entries = [entry, ...this.entries].slice(0, this.maxEntries);
    this.save();
    return entry;
  }

  entriesMatching(status: SyncHistoryStatus): SyncHistoryEntry[] {
    return this.entries.filter((entry) => entry.status === status);
  }

  clear(): void {
    this.entries = [];
    this.save();
  }

  exportJSON(): string {
    return JSON.stringify(this.entries, null, 2);
  }

  // --- Persistence ---

  private load(): SyncHistoryEntry[] {
    if (!this.file || !existsSync(this.file)) return [];

    try {
      const parsed = z.array(SyncHistoryEntrySchema).safeParse(JSON.parse(readFileSync(this.file, "utf-8")));
      if (parsed.success) {
        return parsed.data.slice(0, this.maxEntries);
      }
      console.error("[SyncHistory] Ignoring malformed history file");
    } catch (err) {
      console.error("[SyncHistory] Failed to read history:", err);
    }
    return [];
  }

  private save(): void {
    if (!this.file) return;

    try {
      const dir = dirname(this.file);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true, mode: 0o700 });
      }
      writeFileSync(this.file, this.exportJSON(), { mode: 0o600 });
    } catch (err) {
      console.error("[SyncHistory] Failed to write history:", err);
    }
  }
}
