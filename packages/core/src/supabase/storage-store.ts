/**
 * Supabase Storage object store
 *
 * Backs the ObjectStore contract with a Supabase Storage bucket. Only the
 * three bucket calls used here are required, so tests can hand in a fake.
 *
 * @example
 * ```typescript
 * const client = createSyncClient(config, getConfigDir());
 * const store = new SupabaseObjectStore(client, "orbitsync");
 * const remote = new RemoteSyncService(store, { root: userId });
 * ```
 */

import { SyncError, SyncErrorType } from "../errors.js";
import type { ObjectEntry, ObjectStore } from "../remote/object-store.js";

export interface StorageErrorLike {
  message: string;
  status?: number;
}

type StorageResult<T> = PromiseLike<{ data: T | null; error: StorageErrorLike | null }>;

export interface StorageBucketApi {
  list(
    path?: string,
    options?: { limit?: number; offset?: number; search?: string }
  ): StorageResult<Array<{ name: string; id: string | null; updated_at?: string | null }>>;
  download(path: string): StorageResult<Blob>;
  upload(path: string, body: string, options?: { upsert?: boolean; contentType?: string }): StorageResult<unknown>;
}

export interface StorageClientLike {
  storage: {
    from(bucket: string): StorageBucketApi;
  };
}

const PAGE_SIZE = 1000;

export class SupabaseObjectStore implements ObjectStore {
  private readonly client: StorageClientLike;
  private readonly bucket: string;

  constructor(client: StorageClientLike, bucket: string) {
    this.client = client;
    this.bucket = bucket;
  }

  private api(): StorageBucketApi {
    return this.client.storage.from(this.bucket);
  }

  async list(prefix: string): Promise<ObjectEntry[]> {
    const folder = prefix.replace(/\/+$/, "");
    const entries: ObjectEntry[] = [];

    for (let offset = 0; ; offset += PAGE_SIZE) {
      const { data, error } = await this.api().list(folder, { limit: PAGE_SIZE, offset });
      if (error) {
        throw toSyncError(error, `Failed to list ${folder || "/"}`);
      }

      const page = data ?? [];
      for (const object of page) {
        // Folders come back without an id
        if (object.id === null) continue;
        const key = folder ? `${folder}/${object.name}` : object.name;
        if (!key.startsWith(prefix)) continue;

        const updatedAt = object.updated_at ? new Date(object.updated_at) : undefined;
        entries.push(
          updatedAt && !Number.isNaN(updatedAt.getTime()) ? { key, updatedAt } : { key }
        );
      }

      if (page.length < PAGE_SIZE) break;
    }

    return entries;
  }

  async download(key: string): Promise<string | null> {
    const { data, error } = await this.api().download(key);
    if (error) {
      if (error.status === 404 || !(await this.exists(key))) {
        return null;
      }
      throw toSyncError(error, `Failed to download ${key}`);
    }
    if (!data) return null;

    return data.text();
  }

  async upload(key: string, body: string): Promise<void> {
    const { error } = await this.api().upload(key, body, {
      upsert: true,
      contentType: "application/json",
    });
    if (error) {
      throw toSyncError(error, `Failed to upload ${key}`);
    }
  }

  private async exists(key: string): Promise<boolean> {
    const separator = key.lastIndexOf("/");
    const folder = separator === -1 ? "" : key.slice(0, separator);
    const name = key.slice(separator + 1);

    const { data, error } = await this.api().list(folder, { limit: 100, search: name });
    if (error) {
      throw toSyncError(error, `Failed to look up ${key}`);
    }
    return (data ?? []).some((object) => object.name === name);
  }
}

export function toSyncError(error: StorageErrorLike, context: string): SyncError {
  const message = `${context}: ${error.message}`;
  const status = error.status;

  if (status === 401 || status === 403) {
    return new SyncError(message, SyncErrorType.UNAUTHORIZED);
  }
  if (status === 404) {
    return new SyncError(message, SyncErrorType.NOT_FOUND);
  }
  if (status === undefined || status >= 500 || status === 429) {
    return new SyncError(message, SyncErrorType.NETWORK, true);
  }
  return new SyncError(message, SyncErrorType.STORAGE);
}
