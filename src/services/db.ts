import { Dexie, type DexieOptions, type Table } from "dexie";
import { DEFAULT_DATABASE_NAME } from "@/constants/app";
import type { KeyValueStore } from "./key-value-store";

export interface CachedCollection {
  key: string;
  value: string;
  updatedAt: number;
}

export class SyncDb extends Dexie {
  collections!: Table<CachedCollection, string>;

  constructor(name: string, options?: DexieOptions) {
    super(name, options);

    this.version(1).stores({
      collections: "&key, updatedAt",
    });
  }
}

/**
 * Open the sync database. Under Node pass `indexedDB` and `IDBKeyRange`
 * (e.g. from fake-indexeddb) in `options`.
 */
export function createSyncDb(
  name: string = DEFAULT_DATABASE_NAME,
  options?: DexieOptions,
): SyncDb {
  return new SyncDb(name, options);
}

/**
 * Dexie storage adapter for collection blobs
 */
export class DexieKeyValueStore implements KeyValueStore {
  constructor(
    private readonly db: SyncDb,
    private readonly now: () => number = Date.now,
  ) {}

  async getItem(key: string): Promise<string | null> {
    const entry = await this.db.collections.get(key);
    return entry ? entry.value : null;
  }

  async setItem(key: string, value: string): Promise<void> {
    await this.db.collections.put({ key, value, updatedAt: this.now() });
  }

  async removeItem(key: string): Promise<void> {
    await this.db.collections.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return this.db.collections.where("key").startsWith(prefix).primaryKeys();
  }
}
