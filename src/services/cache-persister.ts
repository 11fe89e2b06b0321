import { CACHE_FORMAT_VERSION } from "@/constants/app";
import { createLogger } from "@/lib/logger";
import { toError, type SyncErrorReport } from "@/lib/errors";
import type { ApplyResult, ReconciledItem } from "@/types/reconcile";
import type { CollectionDefinition } from "./collection-definitions";
import type { KeyValueStore } from "./key-value-store";
import type { ReconciledCollection } from "./reconciled-collection";

const logger = createLogger("CachePersister");

export interface CachePersisterOptions {
  store: KeyValueStore;
  prefix: string;
  /** Fraction of corrupt records above which a blob is discarded */
  corruptionThreshold: number;
  now?: () => number;
  onError?: (report: SyncErrorReport) => void;
}

export interface CacheBlob {
  version: number;
  savedAt: number;
  items: unknown[];
}

export interface LoadResult {
  /** Records in the blob */
  total: number;
  /** Records that passed validation */
  valid: number;
  corrupt: number;
  /** The blob was discarded and nothing was applied */
  reset: boolean;
  applied: ApplyResult | null;
}

const EMPTY_LOAD: LoadResult = {
  total: 0,
  valid: 0,
  corrupt: 0,
  reset: false,
  applied: null,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isCacheBlob(value: unknown): value is CacheBlob {
  return (
    isRecord(value) &&
    value.version === CACHE_FORMAT_VERSION &&
    typeof value.savedAt === "number" &&
    Array.isArray(value.items)
  );
}

function toCachedItem<T>(
  value: unknown,
  definition: CollectionDefinition<T>,
): ReconciledItem<T> | null {
  if (!isRecord(value)) return null;

  const { key, payload, createdAt, localOnly, eventId } = value;
  if (typeof key !== "string" || key.length === 0) return null;
  if (typeof eventId !== "string" || eventId.length === 0) return null;
  if (typeof createdAt !== "number" || !Number.isFinite(createdAt)) return null;
  if (typeof localOnly !== "boolean") return null;
  if (!definition.isPayload(payload)) return null;

  return { key, payload, createdAt, localOnly, eventId };
}

/**
 * Saves each collection as one JSON blob per owner and reads it back
 * record by record
 */
export class CachePersister {
  private owner: string | null = null;
  private readonly store: KeyValueStore;
  private readonly prefix: string;
  private readonly corruptionThreshold: number;
  private readonly now: () => number;
  private readonly onError?: (report: SyncErrorReport) => void;

  constructor(options: CachePersisterOptions) {
    this.store = options.store;
    this.prefix = options.prefix;
    this.corruptionThreshold = options.corruptionThreshold;
    this.now = options.now ?? Date.now;
    this.onError = options.onError;
  }

  setOwner(pubkey: string | null): void {
    this.owner = pubkey;
  }

  /**
   * Storage key for a collection of the current owner
   */
  storageKey(collection: string): string | null {
    if (!this.owner) return null;
    return `${this.prefix}:${collection}:${this.owner}`;
  }

  async persist<T>(collection: ReconciledCollection<T>): Promise<void> {
    const key = this.storageKey(collection.name);
    if (!key) return;

    const blob: CacheBlob = {
      version: CACHE_FORMAT_VERSION,
      savedAt: this.now(),
      items: collection.values(),
    };

    try {
      await this.store.setItem(key, JSON.stringify(blob));
    } catch (error) {
      logger.error(`Failed to save ${collection.name}`, error);
      this.report("persist", collection.name, error);
    }
  }

  /**
   * Read a collection back from storage
   *
   * Corrupt records are skipped. When more than the threshold of records is
   * corrupt, or the blob itself cannot be read, the blob is removed and
   * nothing is applied.
   */
  async load<T>(
    collection: ReconciledCollection<T>,
    definition: CollectionDefinition<T>,
  ): Promise<LoadResult> {
    const key = this.storageKey(collection.name);
    if (!key) return { ...EMPTY_LOAD };

    let raw: string | null;
    try {
      raw = await this.store.getItem(key);
    } catch (error) {
      logger.error(`Failed to read ${collection.name}`, error);
      this.report("load", collection.name, error);
      return { ...EMPTY_LOAD };
    }
    if (raw === null) return { ...EMPTY_LOAD };
    if (this.storageKey(collection.name) !== key) {
      logger.debug(`Owner changed while reading ${collection.name}, skipping`);
      return { ...EMPTY_LOAD };
    }

    let blob: unknown;
    try {
      blob = JSON.parse(raw);
    } catch (error) {
      logger.warn(`Unreadable ${collection.name} cache, resetting`, error);
      await this.discard(key, collection.name);
      return { ...EMPTY_LOAD, reset: true };
    }

    if (!isCacheBlob(blob)) {
      logger.warn(`Unexpected ${collection.name} cache format, resetting`);
      await this.discard(key, collection.name);
      return { ...EMPTY_LOAD, reset: true };
    }

    const items: ReconciledItem<T>[] = [];
    for (const record of blob.items) {
      const item = toCachedItem(record, definition);
      if (item) items.push(item);
    }

    const total = blob.items.length;
    const corrupt = total - items.length;

    if (total > 0 && corrupt / total > this.corruptionThreshold) {
      logger.warn(
        `${corrupt}/${total} ${collection.name} records corrupt, resetting cache`,
      );
      await this.discard(key, collection.name);
      return { total, valid: items.length, corrupt, reset: true, applied: null };
    }

    if (corrupt > 0) {
      logger.warn(`Skipped ${corrupt} corrupt ${collection.name} records`);
    }

    const applied = items.length > 0 ? await collection.apply(items, "cache") : null;
    logger.debug(`Loaded ${items.length} ${collection.name} records`);

    return { total, valid: items.length, corrupt, reset: false, applied };
  }

  /**
   * Remove every collection blob of the current owner
   */
  async clearAll(): Promise<number> {
    if (!this.owner) return 0;

    const suffix = `:${this.owner}`;
    const keys = (await this.store.keys(`${this.prefix}:`)).filter((key) =>
      key.endsWith(suffix),
    );

    for (const key of keys) {
      await this.store.removeItem(key);
    }

    logger.info(`Cleared ${keys.length} cached collections`);
    return keys.length;
  }

  private async discard(key: string, collection: string): Promise<void> {
    try {
      await this.store.removeItem(key);
    } catch (error) {
      logger.error(`Failed to remove ${collection} cache`, error);
      this.report("load", collection, error);
    }
  }

  private report(
    source: SyncErrorReport["source"],
    collection: string,
    error: unknown,
  ): void {
    this.onError?.({
      source,
      collection,
      error: toError(error),
      timestamp: this.now(),
    });
  }
}
