/**
 * Record Repository
 *
 * The write path for domain code: every mutation stamps lastModified, lands in
 * the local store and enqueues the record for upload. Deletes are soft so the
 * tombstone can propagate.
 */

import type { SyncQueueManager } from "../queue/sync-queue.js";
import type { SyncableRecord } from "../schema/record.js";
import type { LocalRecordStore } from "./record-store.js";

export class RecordRepository {
  constructor(
    private readonly store: LocalRecordStore,
    private readonly queue: SyncQueueManager,
    private readonly now: () => Date = () => new Date()
  ) {}

  async insert<T extends SyncableRecord>(record: T): Promise<T> {
    const existing = await this.store.get(record.entityType, record.syncID);
    if (existing) {
      throw new Error(`${record.entityType}_${record.syncID} already exists`);
    }
    return this.save(record);
  }

  async update<T extends SyncableRecord>(record: T, mutate: (record: T) => void): Promise<T> {
    mutate(record);
    return this.save(record);
  }

  /**
   * Tombstone the record. Returns false when there is nothing live to delete.
   */
  async softDelete(entityType: string, syncID: string): Promise<boolean> {
    const record = await this.store.get(entityType, syncID);
    if (!record || record.isDeleted) return false;

    record.isDeleted = true;
    await this.save(record);
    return true;
  }

  private async save<T extends SyncableRecord>(record: T): Promise<T> {
    record.lastModified = this.now();
    await this.store.put(record);
    await this.queue.addToQueue(record);
    return record;
  }
}
