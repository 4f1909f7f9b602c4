/**
 * Local record store
 *
 * The handle the sync layer reads and writes local records through. The
 * application's real database sits behind this interface; the sync layer only
 * needs lookup by identity, upsert and a full listing.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync, renameSync } from "fs";
import { dirname } from "path";
import { z } from "zod";
import { decodeRecord } from "../records/codecs.js";
import { parseSyncJSON, type SyncableRecord } from "../schema/record.js";

export interface LocalRecordStore {
  get(entityType: string, syncID: string): Promise<SyncableRecord | undefined>;
  put(record: SyncableRecord): Promise<void>;
  all(): Promise<SyncableRecord[]>;
  /** Number of live (non-tombstoned) records */
  count(): Promise<number>;
}

function recordKey(entityType: string, syncID: string): string {
  return `${entityType}_${syncID}`;
}

// --- In-memory ---

export class MemoryRecordStore implements LocalRecordStore {
  private records = new Map<string, SyncableRecord>();

  constructor(initial: SyncableRecord[] = []) {
    for (const record of initial) {
      this.records.set(recordKey(record.entityType, record.syncID), record);
    }
  }

  async get(entityType: string, syncID: string): Promise<SyncableRecord | undefined> {
    return this.records.get(recordKey(entityType, syncID));
  }

  async put(record: SyncableRecord): Promise<void> {
    this.records.set(recordKey(record.entityType, record.syncID), record);
  }

  async all(): Promise<SyncableRecord[]> {
    return Array.from(this.records.values());
  }

  async count(): Promise<number> {
    let live = 0;
    for (const record of this.records.values()) {
      if (!record.isDeleted) live++;
    }
    return live;
  }
}

// --- File-backed ---

const StoredRecordSchema = z.object({
  entityType: z.string(),
  document: z.string(),
});

const RecordsFileSchema = z.array(StoredRecordSchema);

/**
 * Keeps every record as its sync document in a single JSON file.
 * Entries that no longer decode are skipped on load.
 */
export class FileRecordStore extends MemoryRecordStore {
  private readonly file: string;

  constructor(file: string) {
    super(loadRecordsFile(file));
    this.file = file;
  }

  override async put(record: SyncableRecord): Promise<void> {
    await super.put(record);
    await this.flush();
  }

  private async flush(): Promise<void> {
    const entries: z.infer<typeof StoredRecordSchema>[] = [];
    for (const record of await this.all()) {
      const document = record.toSyncJSON();
      if (document === null) {
        console.warn(`[RecordStore] Skipping unencodable ${record.entityType}_${record.syncID}`);
        continue;
      }
      entries.push({ entityType: record.entityType, document });
    }

    const dir = dirname(this.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }
    const tmp = `${this.file}.tmp`;
    writeFileSync(tmp, JSON.stringify(entries, null, 2), { mode: 0o600 });
    renameSync(tmp, this.file);
  }
}

function loadRecordsFile(file: string): SyncableRecord[] {
  if (!existsSync(file)) return [];

  const parsed = RecordsFileSchema.safeParse(parseSyncJSON(readFileSync(file, "utf-8")));
  if (!parsed.success) {
    console.error(`[RecordStore] Ignoring malformed records file: ${file}`);
    return [];
  }

  const records: SyncableRecord[] = [];
  for (const entry of parsed.data) {
    const record = decodeRecord(entry.entityType, entry.document);
    if (record) {
      records.push(record);
    } else {
      console.warn(`[RecordStore] Skipping undecodable ${entry.entityType} entry`);
    }
  }
  return records;
}
