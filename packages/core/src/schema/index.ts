export {
  BaseSyncDocumentSchema,
  SyncDateSchema,
  SyncDocumentHeaderSchema,
  SyncIDSchema,
  createTombstoneDocument,
  encodeSyncDocument,
  formatSyncDate,
  optionalSyncDate,
  parseSyncDate,
  parseSyncJSON,
  type EntityClass,
  type SyncDocument,
  type SyncDocumentHeader,
  type SyncableRecord,
} from "./record.js";
