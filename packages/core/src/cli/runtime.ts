/**
 * CLI runtime: builds the sync services for one process from the config
 * directory. Exactly one of each service per process.
 */

import { join } from "path";
import type { SupabaseClient } from "@supabase/supabase-js";
import { initTelemetry, setConfigDir as setTelemetryConfigDir, type TelemetryClient } from "@orbitsync/telemetry";
import { getConfigDir, loadConfig, requireSupabaseConfig, type OrbitConfig } from "../config/config.js";
import { DeviceIdentity, FileSecureStore } from "../device/identity.js";
import { SyncEngine } from "../engine/sync-engine.js";
import { createFileSyncStateStore } from "../engine/sync-state.js";
import { SyncHistory } from "../history/sync-history.js";
import { FileQueueStorage } from "../queue/queue-storage.js";
import { SyncQueueManager } from "../queue/sync-queue.js";
import { RemoteSyncService } from "../remote/remote-sync.js";
import { RecordRepository } from "../store/record-repository.js";
import { FileRecordStore } from "../store/record-store.js";
import { createSupabaseSession, createSyncClient, type AccountSession } from "../supabase/client.js";
import { SupabaseObjectStore } from "../supabase/storage-store.js";

export const RECORDS_FILENAME = "records.json";

export interface SyncRuntime {
  dir: string;
  config: OrbitConfig;
  client: SupabaseClient;
  session: AccountSession;
  identity: DeviceIdentity;
  store: FileRecordStore;
  queue: SyncQueueManager;
  repository: RecordRepository;
  remote: RemoteSyncService;
  history: SyncHistory;
  telemetry: TelemetryClient;
  engine: SyncEngine;
}

export interface RuntimeOptions {
  dir?: string;
  /** CLI commands exit right after a pass; the daemon keeps the default */
  statusDisplayMs?: number;
  connector?: string;
}

export async function createRuntime(options: RuntimeOptions = {}): Promise<SyncRuntime> {
  const dir = options.dir ?? getConfigDir();
  const config = loadConfig(dir);
  const client = createSyncClient(requireSupabaseConfig(config), dir);
  const session = createSupabaseSession(client);

  const identity = DeviceIdentity.resolve({
    store: new FileSecureStore(dir),
    deviceName: config.deviceName,
    deviceType: config.deviceType,
    isSimulator: config.simulator,
  });

  const store = new FileRecordStore(join(dir, RECORDS_FILENAME));
  const queue = await SyncQueueManager.open(new FileQueueStorage(dir));
  const history = new SyncHistory({ dir });

  // Each account's objects live under its user ID
  const userId = await session.userId();
  const remote = new RemoteSyncService(new SupabaseObjectStore(client, config.bucket), {
    root: userId ?? undefined,
  });

  setTelemetryConfigDir(dir);
  const telemetry = initTelemetry({ enabled: config.telemetry.enabled });
  telemetry.setConnector(options.connector ?? "cli");

  const engine = new SyncEngine(
    {
      remote,
      queue,
      store,
      identity,
      session,
      state: createFileSyncStateStore(dir),
      history,
      telemetry,
    },
    {
      cooldownMs: config.cooldownSeconds * 1000,
      statusDisplayMs: options.statusDisplayMs,
    }
  );

  return {
    dir,
    config,
    client,
    session,
    identity,
    store,
    queue,
    repository: new RecordRepository(store, queue),
    remote,
    history,
    telemetry,
    engine,
  };
}
