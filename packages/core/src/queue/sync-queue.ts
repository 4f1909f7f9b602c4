/**
 * Sync Queue Manager
 *
 * Persistent, deduplicated list of records with unconfirmed local mutations.
 * Every read-modify-write runs on a single serial chain, so entity mutations
 * enqueueing while a sync pass drains the queue cannot drop an item.
 */

import { z } from "zod";
import { entityClassOf } from "../records/codecs.js";
import { formatSyncDate, type SyncableRecord } from "../schema/record.js";
import type { QueueStorage } from "./queue-storage.js";

// --- Schema ---

export const SyncQueueItemSchema = z.object({
  syncID: z.string(),
  entityType: z.string(),
  /** Creation date of the referenced record (ISO), used for priority */
  createdAt: z.string().nullable().default(null),
  /** When this entry was (re)queued (ISO), used for FIFO order and removal */
  queuedAt: z.string().default(new Date(0).toISOString()),
});

export type SyncQueueItem = z.infer<typeof SyncQueueItemSchema>;

export interface QueueSnapshot {
  items: SyncQueueItem[];
  overflowed: boolean;
}

// --- Options ---

export const RECENT_ACTIVITY_WINDOW_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_MAX_QUEUE_SIZE = 5000;

export interface SyncQueueOptions {
  /** Instance records created within this window upload first */
  recentWindowMs?: number;
  /** Beyond this many items the queue flags overflow instead of growing */
  maxSize?: number;
  now?: () => Date;
}

/**
 * Decode a persisted queue. Anything malformed yields an empty queue.
 */
export function decodeQueueSnapshot(value: unknown): QueueSnapshot {
  const items = z.array(SyncQueueItemSchema).safeParse(value);
  if (items.success) {
    return { items: items.data, overflowed: false };
  }
  if (value !== null && value !== undefined) {
    console.error("[SyncQueue] Persisted queue is malformed, starting empty");
  }
  return { items: [], overflowed: false };
}

export class SyncQueueManager {
  private items: SyncQueueItem[];
  private overflowed: boolean;
  /** queuedAt stamp of the latest refused enqueue */
  private overflowedAt: number | null;
  private lastQueuedAt = 0;
  private chain: Promise<void> = Promise.resolve();

  private readonly storage: QueueStorage;
  private readonly recentWindowMs: number;
  private readonly maxSize: number;
  private readonly now: () => Date;

  private constructor(storage: QueueStorage, snapshot: QueueSnapshot, options: SyncQueueOptions) {
    this.storage = storage;
    this.items = snapshot.items;
    this.overflowed = snapshot.overflowed;
    this.recentWindowMs = options.recentWindowMs ?? RECENT_ACTIVITY_WINDOW_MS;
    this.maxSize = options.maxSize ?? DEFAULT_MAX_QUEUE_SIZE;
    this.now = options.now ?? (() => new Date());

    for (const item of this.items) {
      this.lastQueuedAt = Math.max(this.lastQueuedAt, Date.parse(item.queuedAt) || 0);
    }
    this.overflowedAt = snapshot.overflowed ? this.lastQueuedAt : null;
  }

  /**
   * Load the persisted queue and return a ready manager.
   */
  static async open(storage: QueueStorage, options: SyncQueueOptions = {}): Promise<SyncQueueManager> {
    let snapshot: QueueSnapshot;
    try {
      snapshot = await storage.load();
    } catch (err) {
      console.error("[SyncQueue] Failed to load queue, starting empty:", err);
      snapshot = { items: [], overflowed: false };
    }
    return new SyncQueueManager(storage, snapshot, options);
  }

  // --- Read ---

  /** Current contents, in insertion order */
  get queue(): SyncQueueItem[] {
    return this.items.map((item) => ({ ...item }));
  }

  get size(): number {
    return this.items.length;
  }

  /** Whether enqueues were refused since the last clear; a full upload is owed */
  get isOverflowed(): boolean {
    return this.overflowed;
  }

  /**
   * High-water mark of queuedAt. Anything enqueued (or refused) after this
   * call stamps a strictly greater value.
   */
  get checkpoint(): number {
    return this.lastQueuedAt;
  }

  // --- Mutations ---

  /**
   * Queue a record. An existing entry for the same syncID is replaced and moves
   * to the back of its priority group.
   */
  addToQueue(record: SyncableRecord): Promise<void> {
    return this.exclusive(async () => {
      const item: SyncQueueItem = {
        syncID: record.syncID,
        entityType: record.entityType,
        createdAt: Number.isNaN(record.createdAt.getTime()) ? null : formatSyncDate(record.createdAt),
        queuedAt: this.nextQueuedAt(),
      };

      const existing = this.items.findIndex((queued) => queued.syncID === item.syncID);
      if (existing === -1 && this.items.length >= this.maxSize) {
        if (!this.overflowed) {
          console.warn(`[SyncQueue] Queue full (${this.maxSize}); next sync uploads everything`);
        }
        this.overflowed = true;
        this.overflowedAt = Date.parse(item.queuedAt);
      } else {
        if (existing !== -1) {
          this.items.splice(existing, 1);
        }
        this.items.push(item);
      }

      await this.persist();
    });
  }

  /**
   * Remove an item after a confirmed upload. A re-queue that happened while the
   * upload was in flight carries a newer queuedAt and is kept.
   */
  removeFromQueue(item: SyncQueueItem): Promise<void> {
    return this.exclusive(async () => {
      const before = this.items.length;
      this.items = this.items.filter(
        (queued) =>
          !(
            queued.syncID === item.syncID &&
            queued.entityType === item.entityType &&
            queued.queuedAt === item.queuedAt
          )
      );
      if (this.items.length !== before) {
        await this.persist();
      }
    });
  }

  /**
   * Empty the queue and reset the overflow flag (after a full upload or reset).
   */
  clearQueue(): Promise<void> {
    return this.exclusive(async () => {
      this.items = [];
      this.overflowed = false;
      this.overflowedAt = null;
      await this.persist();
    });
  }

  /**
   * Drop entries queued at or before `checkpoint` and reset the overflow flag
   * if nothing overflowed after it. Later entries stay queued.
   */
  clearThrough(checkpoint: number): Promise<void> {
    return this.exclusive(async () => {
      this.items = this.items.filter((item) => Date.parse(item.queuedAt) > checkpoint);
      if (this.overflowedAt !== null && this.overflowedAt <= checkpoint) {
        this.overflowed = false;
        this.overflowedAt = null;
      }
      await this.persist();
    });
  }

  // --- Prioritization ---

  /**
   * Upload order:
   * 1. instance records created within the recent window
   * 2. all other instance records
   * 3. template records
   * FIFO (oldest queued first) within each group.
   */
  getPriorityQueue(): SyncQueueItem[] {
    const now = this.now().getTime();

    return this.queue
      .map((item, index) => ({ item, index, rank: this.rank(item, now) }))
      .sort((a, b) => {
        if (a.rank !== b.rank) return a.rank - b.rank;
        const byQueuedAt = Date.parse(a.item.queuedAt) - Date.parse(b.item.queuedAt);
        return byQueuedAt !== 0 && !Number.isNaN(byQueuedAt) ? byQueuedAt : a.index - b.index;
      })
      .map(({ item }) => item);
  }

  private rank(item: SyncQueueItem, now: number): number {
    if (entityClassOf(item.entityType) !== "instance") return 2;
    if (item.createdAt === null) return 1;

    const created = Date.parse(item.createdAt);
    if (Number.isNaN(created)) return 1;
    return now - created < this.recentWindowMs ? 0 : 1;
  }

  // --- File Naming ---

  /**
   * Remote object name, a pure function of identity: [EntityType]_[syncID].json
   */
  generateFilename(item: Pick<SyncQueueItem, "entityType" | "syncID">): string {
    return generateRecordFilename(item.entityType, item.syncID);
  }

  // --- Internals ---

  private nextQueuedAt(): string {
    const next = Math.max(this.now().getTime(), this.lastQueuedAt + 1);
    this.lastQueuedAt = next;
    return new Date(next).toISOString();
  }

  private async persist(): Promise<void> {
    try {
      await this.storage.save({ items: this.items, overflowed: this.overflowed });
    } catch (err) {
      // In-memory queue keeps working for this process
      console.error("[SyncQueue] Failed to persist queue:", err);
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}

export function generateRecordFilename(entityType: string, syncID: string): string {
  return `${entityType}_${syncID}.json`;
}

/**
 * Inverse of generateRecordFilename. Entity type names contain no underscore.
 */
export function parseRecordFilename(name: string): { entityType: string; syncID: string } | null {
  if (!name.endsWith(".json")) return null;
  const stem = name.slice(0, -".json".length);
  const separator = stem.indexOf("_");
  if (separator <= 0 || separator === stem.length - 1) return null;

  const syncID = stem.slice(separator + 1);
  if (!/^[0-9a-fA-F-]{36}$/.test(syncID)) return null;

  return { entityType: stem.slice(0, separator), syncID };
}
