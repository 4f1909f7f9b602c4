/**
 * @orbitsync/core
 *
 * Offline-first multi-device sync: record contract, upload queue, device
 * identity and registry, and the sync engine.
 */

// Errors
export { SyncError, SyncErrorType, errorMessage, isFatalTransferError, isSyncError } from "./errors.js";

// Record contract
export * from "./schema/index.js";

// Entities
export * from "./records/index.js";

// Local store
export { FileRecordStore, MemoryRecordStore, type LocalRecordStore } from "./store/record-store.js";
export { RecordRepository } from "./store/record-repository.js";

// Queue
export {
  DEFAULT_MAX_QUEUE_SIZE,
  RECENT_ACTIVITY_WINDOW_MS,
  SyncQueueItemSchema,
  SyncQueueManager,
  decodeQueueSnapshot,
  generateRecordFilename,
  parseRecordFilename,
  type QueueSnapshot,
  type SyncQueueItem,
  type SyncQueueOptions,
} from "./queue/sync-queue.js";
export {
  FileQueueStorage,
  MemoryQueueStorage,
  QUEUE_FILENAME,
  QUEUE_OVERFLOW_FILENAME,
  type QueueStorage,
} from "./queue/queue-storage.js";

// Devices
export {
  DeviceIdentity,
  DeviceTypeSchema,
  FileSecureStore,
  MemorySecureStore,
  getOrCreateDeviceID,
  readVendorIdentifier,
  type DeviceIdentityDict,
  type DeviceIdentityOptions,
  type DeviceType,
  type SecureStore,
} from "./device/identity.js";
export {
  DeviceRegistrySchema,
  RegisteredDeviceSchema,
  checkForConflict,
  createEmptyRegistry,
  isDeviceRegistered,
  lastOtherDevice,
  registerDevice,
  type ConflictCheck,
  type DeviceRegistry,
  type RegisteredDevice,
} from "./device/registry.js";

// Remote
export { MemoryObjectStore, type ObjectEntry, type ObjectStore } from "./remote/object-store.js";
export {
  DEFAULT_RETRY_POLICY,
  DEVICE_REGISTRY_FILENAME,
  RECORDS_FOLDER,
  RemoteSyncService,
  getRetryDelayMs,
  type ReconcileReport,
  type RemoteSyncOptions,
  type RetryPolicy,
  type UploadReport,
} from "./remote/remote-sync.js";
export * from "./supabase/index.js";

// Engine
export {
  DEFAULT_COOLDOWN_MS,
  DEFAULT_STATUS_DISPLAY_MS,
  SyncEngine,
  summarize,
  type SyncEngineDeps,
  type SyncEngineOptions,
  type SyncRunResult,
  type SyncSkipReason,
  type SyncStatusListener,
  type SyncTelemetry,
} from "./engine/sync-engine.js";
export {
  IDLE,
  isActive,
  statusMessage,
  type ConflictInfo,
  type ConflictResolution,
  type SyncStatus,
} from "./engine/sync-status.js";
export {
  SyncStateSchema,
  createEmptySyncState,
  createFileSyncStateStore,
  createMemorySyncStateStore,
  loadSyncState,
  markSyncComplete,
  markSyncError,
  markSyncStarted,
  saveSyncState,
  type SyncState,
  type SyncStateStore,
} from "./engine/sync-state.js";

// History
export {
  MAX_HISTORY_ENTRIES,
  SYNC_HISTORY_FILENAME,
  SyncHistory,
  SyncHistoryEntrySchema,
  type SyncAction,
  type SyncHistoryEntry,
  type SyncHistoryOptions,
  type SyncHistoryRecordInput,
  type SyncHistoryStatus,
} from "./history/sync-history.js";

// Scheduler
export {
  BackgroundSyncScheduler,
  DEFAULT_BACKGROUND_SYNC_HOUR,
  computeNextRun,
  type BackgroundSyncOptions,
} from "./scheduler/background-sync.js";

// Config
export {
  OrbitConfigSchema,
  applyEnvOverrides,
  getConfigDir,
  loadConfig,
  saveConfig,
  setConfigDir,
  type OrbitConfig,
} from "./config/config.js";
