import { BehaviorSubject } from "rxjs";
import { Mutex } from "subscription-engine";
import { resolveConflict } from "@/lib/reconcile";
import { createLogger } from "@/lib/logger";
import type {
  ApplyResult,
  CollectionName,
  ItemSource,
  ReconcileMode,
  ReconciledItem,
} from "@/types/reconcile";

const logger = createLogger("ReconciledCollection");

export interface ReconciledCollectionOptions<T> {
  name: CollectionName;
  mode: ReconcileMode;
  /**
   * Called inside the critical section after every batch that changed the
   * collection, so writes reach storage in mutation order
   */
  onChange?: (collection: ReconciledCollection<T>) => Promise<void>;
}

/**
 * Keyed set of reconciled items
 *
 * Every mutation runs under one mutex, so a cache load and a live event for
 * the same key cannot interleave their check-then-insert.
 */
export class ReconciledCollection<T> {
  readonly name: CollectionName;
  readonly mode: ReconcileMode;

  private items = new Map<string, ReconciledItem<T>>();
  /** Event ids removed by a deletion; late copies are not re-added */
  private tombstones = new Set<string>();
  /** Address keys deleted up to a created_at; older versions are not re-added */
  private deletedAddresses = new Map<string, number>();
  private lock = new Mutex();
  private onChange?: (collection: ReconciledCollection<T>) => Promise<void>;

  readonly items$ = new BehaviorSubject<ReconciledItem<T>[]>([]);

  constructor(options: ReconciledCollectionOptions<T>) {
    this.name = options.name;
    this.mode = options.mode;
    this.onChange = options.onChange;
  }

  apply(
    incoming: Iterable<ReconciledItem<T>>,
    source: ItemSource,
  ): Promise<ApplyResult> {
    return this.lock.withLock(async () => {
      const result: ApplyResult = {
        inserted: 0,
        replaced: 0,
        kept: 0,
        confirmed: 0,
        suppressed: 0,
      };

      for (const item of incoming) {
        if (this.tombstones.has(item.eventId) || this.isAddressDeleted(item)) {
          result.suppressed++;
          continue;
        }

        const existing = this.items.get(item.key);
        const decision = resolveConflict(existing, item, this.mode);

        if (decision === "insert") {
          this.items.set(item.key, item);
          result.inserted++;
        } else if (decision === "replace") {
          this.items.set(item.key, item);
          result.replaced++;
        } else if (
          existing &&
          existing.localOnly &&
          source === "live" &&
          existing.eventId === item.eventId
        ) {
          this.items.set(item.key, { ...existing, localOnly: false });
          result.confirmed++;
        } else {
          result.kept++;
        }
      }

      logger.debug(`${this.name}: applied ${source} batch`, result);

      if (result.inserted + result.replaced + result.confirmed > 0) {
        await this.commit();
      }
      return result;
    });
  }

  /**
   * Remove items by source event id and remember the ids
   */
  remove(eventIds: Iterable<string>): Promise<number> {
    return this.lock.withLock(async () => {
      const ids = new Set(eventIds);
      for (const id of ids) this.tombstones.add(id);

      let removed = 0;
      for (const [key, item] of this.items) {
        if (ids.has(item.eventId)) {
          this.items.delete(key);
          removed++;
        }
      }

      if (removed > 0) await this.commit();
      return removed;
    });
  }

  /**
   * Remove address-keyed items created at or before `deletedAt` (seconds)
   */
  removeAddresses(addresses: Iterable<string>, deletedAt: number): Promise<number> {
    return this.lock.withLock(async () => {
      let removed = 0;
      for (const address of addresses) {
        const previous = this.deletedAddresses.get(address) ?? -Infinity;
        this.deletedAddresses.set(address, Math.max(previous, deletedAt));

        const item = this.items.get(address);
        if (item && item.createdAt <= deletedAt) {
          this.items.delete(address);
          removed++;
        }
      }

      if (removed > 0) await this.commit();
      return removed;
    });
  }

  /**
   * Drop all items and tombstones without persisting
   */
  clear(): Promise<void> {
    return this.lock.withLock(() => {
      this.items.clear();
      this.tombstones.clear();
      this.deletedAddresses.clear();
      this.items$.next([]);
    });
  }

  get(key: string): ReconciledItem<T> | undefined {
    return this.items.get(key);
  }

  has(key: string): boolean {
    return this.items.has(key);
  }

  isDeleted(eventId: string): boolean {
    return this.tombstones.has(eventId);
  }

  values(): ReconciledItem<T>[] {
    return Array.from(this.items.values());
  }

  get size(): number {
    return this.items.size;
  }

  private isAddressDeleted(item: ReconciledItem<T>): boolean {
    const deletedAt = this.deletedAddresses.get(item.key);
    return deletedAt !== undefined && item.createdAt <= deletedAt;
  }

  private async commit(): Promise<void> {
    this.items$.next(this.values());
    if (!this.onChange) return;

    try {
      await this.onChange(this);
    } catch (error) {
      logger.error(`Failed to persist ${this.name}`, error);
    }
  }
}
