/**
 * Durable storage for the sync queue
 *
 * The queue itself is a JSON array of items under a fixed file name; overflow
 * is marked by a sibling file so the array format stays unchanged.
 */

import { existsSync } from "fs";
import { mkdir, readFile, rename, rm, writeFile } from "fs/promises";
import { dirname, join } from "path";
import { decodeQueueSnapshot, type QueueSnapshot } from "./sync-queue.js";

export const QUEUE_FILENAME = "sync-queue.json";
export const QUEUE_OVERFLOW_FILENAME = "sync-queue.overflow";

export interface QueueStorage {
  load(): Promise<QueueSnapshot>;
  save(snapshot: QueueSnapshot): Promise<void>;
}

export class FileQueueStorage implements QueueStorage {
  private readonly file: string;
  private readonly overflowFile: string;

  constructor(dir: string) {
    this.file = join(dir, QUEUE_FILENAME);
    this.overflowFile = join(dir, QUEUE_OVERFLOW_FILENAME);
  }

  async load(): Promise<QueueSnapshot> {
    if (!existsSync(this.file)) {
      return { items: [], overflowed: existsSync(this.overflowFile) };
    }

    let value: unknown = null;
    try {
      value = JSON.parse(await readFile(this.file, "utf-8"));
    } catch {
      console.error("[SyncQueue] Persisted queue is not valid JSON, starting empty");
    }

    const snapshot = decodeQueueSnapshot(value);
    return { ...snapshot, overflowed: existsSync(this.overflowFile) };
  }

  async save(snapshot: QueueSnapshot): Promise<void> {
    await mkdir(dirname(this.file), { recursive: true, mode: 0o700 });

    const tmp = `${this.file}.tmp`;
    await writeFile(tmp, JSON.stringify(snapshot.items, null, 2), { mode: 0o600 });
    await rename(tmp, this.file);

    if (snapshot.overflowed) {
      await writeFile(this.overflowFile, new Date().toISOString(), { mode: 0o600 });
    } else {
      await rm(this.overflowFile, { force: true });
    }
  }
}

export class MemoryQueueStorage implements QueueStorage {
  private snapshot: QueueSnapshot;

  constructor(initial: unknown = null) {
    this.snapshot = decodeQueueSnapshot(initial);
  }

  async load(): Promise<QueueSnapshot> {
    return { items: this.snapshot.items.map((item) => ({ ...item })), overflowed: this.snapshot.overflowed };
  }

  async save(snapshot: QueueSnapshot): Promise<void> {
    this.snapshot = { items: snapshot.items.map((item) => ({ ...item })), overflowed: snapshot.overflowed };
  }

  /** Persisted items, as another process would read them */
  get persisted(): QueueSnapshot {
    return this.snapshot;
  }
}
