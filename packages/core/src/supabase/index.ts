/**
 * Supabase integration: Storage-backed object store and auth session.
 *
 * @example
 * ```typescript
 * import { createSyncClient, createSupabaseSession, SupabaseObjectStore } from "@orbitsync/core";
 *
 * const client = createSyncClient({ supabaseUrl, supabaseAnonKey }, getConfigDir());
 * const session = createSupabaseSession(client);
 * const store = new SupabaseObjectStore(client, "orbitsync");
 * ```
 */

export {
  AUTH_SESSION_FILENAME,
  FileAuthStorage,
  createStaticSession,
  createSupabaseSession,
  createSyncClient,
  type AccountSession,
  type AuthClientLike,
  type SyncClientConfig,
} from "./client.js";

export {
  SupabaseObjectStore,
  toSyncError,
  type StorageBucketApi,
  type StorageClientLike,
  type StorageErrorLike,
} from "./storage-store.js";
