/**
 * Remote object store
 *
 * The only shared medium between devices: a flat namespace of JSON objects.
 * Keys use "/" as a folder separator.
 */

export interface ObjectEntry {
  key: string;
  /** Server-side modification time, when the backend reports one */
  updatedAt?: Date;
}

export interface ObjectStore {
  /** Every object whose key starts with `prefix` */
  list(prefix: string): Promise<ObjectEntry[]>;
  /** Object body, or null when no such object exists */
  download(key: string): Promise<string | null>;
  /** Create or overwrite */
  upload(key: string, body: string): Promise<void>;
}

/**
 * In-process object store. Several engines sharing one instance behave like
 * devices sharing an account.
 */
export class MemoryObjectStore implements ObjectStore {
  private objects = new Map<string, { body: string; updatedAt: Date }>();
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async list(prefix: string): Promise<ObjectEntry[]> {
    const entries: ObjectEntry[] = [];
    for (const [key, object] of this.objects) {
      if (key.startsWith(prefix)) {
        entries.push({ key, updatedAt: object.updatedAt });
      }
    }
    return entries.sort((a, b) => a.key.localeCompare(b.key));
  }

  async download(key: string): Promise<string | null> {
    return this.objects.get(key)?.body ?? null;
  }

  async upload(key: string, body: string): Promise<void> {
    this.objects.set(key, { body, updatedAt: this.now() });
  }

  keys(): string[] {
    return Array.from(this.objects.keys()).sort();
  }

  get size(): number {
    return this.objects.size;
  }
}
