/**
 * Remote Sync Service
 *
 * The remote half of a sync pass, on top of any ObjectStore:
 *   <root>/device_registry.json            shared device registry
 *   <root>/records/<EntityType>_<id>.json  one document per record
 *
 * Per-record failures are retried with backoff and then counted, never
 * silently dropped. Listing or registry failures throw and abort the pass.
 */

import { setTimeout as delay } from "timers/promises";
import {
  createEmptyRegistry,
  DeviceRegistrySchema,
  type DeviceRegistry,
} from "../device/registry.js";
import { SyncError, SyncErrorType, errorMessage, isFatalTransferError, isSyncError } from "../errors.js";
import { decodeRecord, isKnownEntityType } from "../records/codecs.js";
import {
  createTombstoneDocument,
  parseSyncJSON,
  SyncDocumentHeaderSchema,
} from "../schema/record.js";
import type { LocalRecordStore } from "../store/record-store.js";
import {
  generateRecordFilename,
  parseRecordFilename,
  type SyncQueueItem,
  type SyncQueueManager,
} from "../queue/sync-queue.js";
import type { ObjectStore } from "./object-store.js";

export const RECORDS_FOLDER = "records";
export const DEVICE_REGISTRY_FILENAME = "device_registry.json";

// --- Retry Policy ---

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 200,
  maxDelayMs: 2000,
};

/**
 * Delay before retry number `attempt` (1-based): base, 2x base, 4x base... capped.
 */
export function getRetryDelayMs(policy: RetryPolicy, attempt: number): number {
  const backoff = policy.baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(backoff, policy.maxDelayMs);
}

function isRetryable(error: unknown): boolean {
  if (isFatalTransferError(error)) return false;
  return isSyncError(error) ? error.retryable : true;
}

// --- Reports ---

export interface UploadReport {
  uploaded: number;
  failed: number;
  /** Records that could not be serialized; they stay queued */
  skipped: number;
}

export interface ReconcileReport {
  merged: number;
  failed: number;
}

export interface RemoteSyncOptions {
  /** Key prefix (e.g. the account's user ID); empty for the bucket root */
  root?: string;
  retry?: Partial<RetryPolicy>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
}

export class RemoteSyncService {
  private readonly store: ObjectStore;
  private readonly root: string;
  private readonly retry: RetryPolicy;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => Date;

  constructor(store: ObjectStore, options: RemoteSyncOptions = {}) {
    this.store = store;
    this.root = options.root ? `${options.root.replace(/\/+$/, "")}/` : "";
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.sleep = options.sleep ?? ((ms) => delay(ms));
    this.now = options.now ?? (() => new Date());
  }

  // --- Keys ---

  registryKey(): string {
    return `${this.root}${DEVICE_REGISTRY_FILENAME}`;
  }

  recordKey(entityType: string, syncID: string): string {
    return `${this.root}${RECORDS_FOLDER}/${generateRecordFilename(entityType, syncID)}`;
  }

  // --- Device Registry ---

  /**
   * Current registry, or an empty one when no device has synced yet.
   * @throws SyncError on transport failures or an unreadable registry
   */
  async fetchDeviceRegistry(): Promise<DeviceRegistry> {
    const body = await this.withRetry(() => this.store.download(this.registryKey()));
    if (body === null) {
      return createEmptyRegistry(this.now());
    }

    const parsed = DeviceRegistrySchema.safeParse(parseSyncJSON(body));
    if (!parsed.success) {
      throw new SyncError("Device registry is malformed", SyncErrorType.INVALID_DATA);
    }
    return parsed.data;
  }

  async updateDeviceRegistry(registry: DeviceRegistry): Promise<void> {
    const body = JSON.stringify(DeviceRegistrySchema.parse(registry), null, 2);
    await this.withRetry(() => this.store.upload(this.registryKey(), body));
  }

  // --- Upload ---

  /**
   * Upload queued records in priority order. Each confirmed upload leaves the
   * queue; a record missing locally is uploaded as a tombstone.
   * @throws when every attempted record failed, or on an authorization failure
   */
  async uploadPendingRecords(queue: SyncQueueManager, local: LocalRecordStore): Promise<UploadReport> {
    const items = queue.getPriorityQueue();
    const report: UploadReport = { uploaded: 0, failed: 0, skipped: 0 };
    if (items.length === 0) return report;

    for (const item of items) {
      const body = await this.serializeForUpload(item, local);
      if (body === null) {
        report.skipped++;
        continue;
      }

      try {
        await this.withRetry(() => this.store.upload(this.recordKey(item.entityType, item.syncID), body));
        await queue.removeFromQueue(item);
        report.uploaded++;
      } catch (err) {
        if (isFatalTransferError(err)) throw err;
        report.failed++;
        console.warn(`[RemoteSync] Failed to upload ${item.entityType}_${item.syncID}: ${errorMessage(err)}`);
      }
    }

    assertNotTotalFailure("upload", report.uploaded, report.failed);
    return report;
  }

  /**
   * Upload every local record, making local state authoritative. Queue entries
   * that predate the pass and are covered by a successful upload are removed.
   */
  async uploadAllRecords(local: LocalRecordStore, queue: SyncQueueManager): Promise<UploadReport> {
    const report: UploadReport = { uploaded: 0, failed: 0, skipped: 0 };
    const checkpoint = queue.checkpoint;
    const uploadedIDs = new Set<string>();

    for (const record of await local.all()) {
      const body = record.toSyncJSON();
      if (body === null) {
        report.skipped++;
        console.warn(`[RemoteSync] Skipping unencodable ${record.entityType}_${record.syncID}`);
        continue;
      }

      try {
        await this.withRetry(() => this.store.upload(this.recordKey(record.entityType, record.syncID), body));
        uploadedIDs.add(record.syncID);
        report.uploaded++;
      } catch (err) {
        if (isFatalTransferError(err)) throw err;
        report.failed++;
        console.warn(`[RemoteSync] Failed to upload ${record.entityType}_${record.syncID}: ${errorMessage(err)}`);
      }
    }

    assertNotTotalFailure("upload", report.uploaded, report.failed);

    // Entries queued during the pass may postdate what was uploaded; they stay
    if (report.failed === 0 && report.skipped === 0) {
      await queue.clearThrough(checkpoint);
    } else {
      for (const item of queue.queue) {
        if (uploadedIDs.has(item.syncID) && Date.parse(item.queuedAt) <= checkpoint) {
          await queue.removeFromQueue(item);
        }
      }
    }
    return report;
  }

  private async serializeForUpload(item: SyncQueueItem, local: LocalRecordStore): Promise<string | null> {
    const record = await local.get(item.entityType, item.syncID);
    if (!record) {
      console.log(`[RemoteSync] ${item.entityType}_${item.syncID} deleted locally, uploading tombstone`);
      return createTombstoneDocument(item.syncID, this.now());
    }

    const body = record.toSyncJSON();
    if (body === null) {
      console.warn(`[RemoteSync] Skipping unencodable ${item.entityType}_${item.syncID}`);
    }
    return body;
  }

  // --- Reconcile ---

  /**
   * Merge remote records newer than their local copy (last-writer-wins on the
   * documents' lastModified; server upload times are never compared with
   * device clocks). Remote tombstones soft-delete local records; tombstones for
   * records never seen locally are not materialized.
   */
  async reconcileFromRemote(local: LocalRecordStore): Promise<ReconcileReport> {
    const { report } = await this.pullRecords(local, false);
    return report;
  }

  /**
   * Make the local store mirror the remote dataset: remote documents win
   * regardless of timestamps, local records absent remotely are tombstoned, and
   * unsynced local changes queued before the call are dropped from the queue.
   */
  async replaceLocalWithRemote(local: LocalRecordStore, queue: SyncQueueManager): Promise<ReconcileReport> {
    const checkpoint = queue.checkpoint;
    const { report, remoteKeys } = await this.pullRecords(local, true);
    const now = this.now();

    for (const record of await local.all()) {
      if (record.isDeleted || remoteKeys.has(`${record.entityType}_${record.syncID}`)) continue;
      record.isDeleted = true;
      record.lastModified = now;
      await local.put(record);
    }

    await queue.clearThrough(checkpoint);
    return report;
  }

  private async pullRecords(
    local: LocalRecordStore,
    remoteWins: boolean
  ): Promise<{ report: ReconcileReport; remoteKeys: Set<string> }> {
    const prefix = `${this.root}${RECORDS_FOLDER}/`;
    const entries = await this.withRetry(() => this.store.list(prefix));
    const report: ReconcileReport = { merged: 0, failed: 0 };
    const remoteKeys = new Set<string>();
    let attempted = 0;

    for (const entry of entries) {
      const parsedName = parseRecordFilename(entry.key.slice(prefix.length));
      if (!parsedName || !isKnownEntityType(parsedName.entityType)) {
        continue;
      }
      const { entityType, syncID } = parsedName;
      remoteKeys.add(`${entityType}_${syncID}`);

      attempted++;
      try {
        const body = await this.withRetry(() => this.store.download(entry.key));
        if (body === null) continue;

        if (await this.applyRemoteDocument(local, entityType, syncID, body, remoteWins)) {
          report.merged++;
        }
      } catch (err) {
        if (isFatalTransferError(err)) throw err;
        report.failed++;
        console.warn(`[RemoteSync] Failed to reconcile ${entityType}_${syncID}: ${errorMessage(err)}`);
      }
    }

    assertNotTotalFailure("download", attempted - report.failed, report.failed);
    return { report, remoteKeys };
  }

  private async applyRemoteDocument(
    local: LocalRecordStore,
    entityType: string,
    syncID: string,
    body: string,
    remoteWins: boolean
  ): Promise<boolean> {
    const header = SyncDocumentHeaderSchema.safeParse(parseSyncJSON(body));
    if (!header.success || header.data.syncID !== syncID) {
      throw new SyncError(`Invalid document for ${entityType}_${syncID}`, SyncErrorType.INVALID_DATA);
    }

    const existing = await local.get(entityType, syncID);
    if (!remoteWins && existing && header.data.lastModified <= existing.lastModified) {
      return false;
    }

    const remote = decodeRecord(entityType, body);
    if (remote) {
      if (remote.isDeleted && !existing) return false;
      await local.put(remote);
      return true;
    }

    // Minimal tombstone: flip the local record
    if (header.data.isDeleted && existing) {
      existing.isDeleted = true;
      existing.lastModified = header.data.lastModified;
      await local.put(existing);
      return true;
    }
    if (header.data.isDeleted) return false;

    throw new SyncError(`Undecodable document for ${entityType}_${syncID}`, SyncErrorType.INVALID_DATA);
  }

  // --- Retry ---

  private async withRetry<T>(operation: () => Promise<T>): Promise<T> {
    let attempt = 1;
    for (;;) {
      try {
        return await operation();
      } catch (err) {
        if (attempt >= this.retry.maxAttempts || !isRetryable(err)) {
          throw err;
        }
        await this.sleep(getRetryDelayMs(this.retry, attempt));
        attempt++;
      }
    }
  }
}

function assertNotTotalFailure(phase: "upload" | "download", succeeded: number, failed: number): void {
  if (failed > 0 && succeeded === 0) {
    throw new SyncError(`All ${failed} record ${phase}s failed`, SyncErrorType.NETWORK, true);
  }
}
