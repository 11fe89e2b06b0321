/**
 * Async string storage the cache persister writes collection blobs to
 */
export interface KeyValueStore {
  getItem(key: string): Promise<string | null>;
  setItem(key: string, value: string): Promise<void>;
  removeItem(key: string): Promise<void>;
  /** Keys starting with `prefix` */
  keys(prefix: string): Promise<string[]>;
}

/**
 * In-memory store for tests and hosts without IndexedDB
 */
export class MemoryKeyValueStore implements KeyValueStore {
  private store = new Map<string, string>();

  async getItem(key: string): Promise<string | null> {
    return this.store.get(key) ?? null;
  }

  async setItem(key: string, value: string): Promise<void> {
    this.store.set(key, value);
  }

  async removeItem(key: string): Promise<void> {
    this.store.delete(key);
  }

  async keys(prefix: string): Promise<string[]> {
    return Array.from(this.store.keys()).filter((key) =>
      key.startsWith(prefix),
    );
  }
}
