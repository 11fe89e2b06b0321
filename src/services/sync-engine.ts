import { Subject } from "rxjs";
import {
  SubscriptionManager,
  type SubscriptionTransport,
} from "subscription-engine";
import {
  resolveConfig,
  type SyncEngineConfig,
  type SyncEngineConfigOptions,
} from "@/lib/config";
import { ConfigError, type SyncErrorReport } from "@/lib/errors";
import { createLogger } from "@/lib/logger";
import { CachePersister } from "./cache-persister";
import {
  contactsDefinition,
  curationSetsDefinition,
  followSetsDefinition,
  reactionsDefinition,
  repostsDefinition,
  type CollectionDefinition,
} from "./collection-definitions";
import { createSyncDb, DexieKeyValueStore, type SyncDb } from "./db";
import { EventReconciler, type CollectionBinding } from "./event-reconciler";
import { MemoryKeyValueStore, type KeyValueStore } from "./key-value-store";
import { ReconciledCollection } from "./reconciled-collection";
import {
  createPoolPublisher,
  createPoolTransport,
  type EventSigner,
  type RelayPoolLike,
  type SocialPublisher,
} from "./relay-pool";
import { SocialState, type SocialBindings } from "./social-state";

const logger = createLogger("SyncEngine");

export interface SyncEngineOptions extends SyncEngineConfigOptions {
  /** Explicit transport; takes precedence over `pool` */
  transport?: SubscriptionTransport;
  pool?: RelayPoolLike;
  relays?: string[];
  /** Cache storage. Defaults to Dexie when IndexedDB exists, memory otherwise */
  store?: KeyValueStore;
  databaseName?: string;
  publisher?: SocialPublisher;
  /** Used with `pool` and `relays` to build a publisher */
  signer?: EventSigner;
}

/**
 * Subscription manager, collections, cache and social state for one host
 */
export class SyncEngine {
  readonly config: SyncEngineConfig;
  readonly manager: SubscriptionManager;
  readonly reconciler = new EventReconciler();
  readonly persister: CachePersister;
  readonly bindings: SocialBindings;
  readonly social: SocialState;
  /** Non-fatal persistence and reconciliation failures */
  readonly errors$ = new Subject<SyncErrorReport>();

  private db: SyncDb | null = null;
  private disposed = false;

  constructor(options: SyncEngineOptions = {}) {
    this.config = resolveConfig(options);

    this.manager = new SubscriptionManager({
      transport: resolveTransport(options),
      maxConcurrentSubscriptions: this.config.maxConcurrentSubscriptions,
      maxEventsPerMinute: this.config.maxEventsPerMinute,
      subscriptionTimeout: this.config.subscriptionTimeout,
      retryDelay: this.config.retryDelay,
      maxRetryAttempts: this.config.maxRetryAttempts,
      maxFilterLimit: this.config.maxFilterLimit,
      now: this.config.now,
      logger: createLogger("SubscriptionManager"),
    });

    this.persister = new CachePersister({
      store: options.store ?? this.createDefaultStore(options.databaseName),
      prefix: this.config.storageKeyPrefix,
      corruptionThreshold: this.config.corruptionThreshold,
      now: this.config.now,
      onError: (report) => this.errors$.next(report),
    });

    this.bindings = {
      reactions: this.bind(reactionsDefinition),
      reposts: this.bind(repostsDefinition),
      contacts: this.bind(contactsDefinition),
      followSets: this.bind(followSetsDefinition),
      curationSets: this.bind(curationSetsDefinition),
    };

    this.social = new SocialState({
      manager: this.manager,
      reconciler: this.reconciler,
      persister: this.persister,
      bindings: this.bindings,
      publisher: resolvePublisher(options),
      now: this.config.now,
      onError: (report) => this.errors$.next(report),
    });
  }

  /**
   * Cancel every subscription and retry. The engine cannot be restarted.
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    await this.social.stop();
    this.manager.dispose();
    this.db?.close();
    this.errors$.complete();
    logger.info("Sync engine disposed");
  }

  private createDefaultStore(databaseName?: string): KeyValueStore {
    if ("indexedDB" in globalThis) {
      this.db = createSyncDb(databaseName);
      return new DexieKeyValueStore(this.db, this.config.now);
    }

    logger.warn("IndexedDB unavailable, caching in memory only");
    return new MemoryKeyValueStore();
  }

  private bind<T>(definition: CollectionDefinition<T>): CollectionBinding<T> {
    const collection = new ReconciledCollection<T>({
      name: definition.name,
      mode: definition.mode,
      onChange: (changed) => this.persister.persist(changed),
    });
    const binding = { definition, collection };
    this.reconciler.register(binding);
    return binding;
  }
}

function resolveTransport(options: SyncEngineOptions): SubscriptionTransport {
  if (options.transport) return options.transport;

  if (!options.pool) {
    throw new ConfigError("transport", "provide a transport or a relay pool");
  }
  if (!options.relays || options.relays.length === 0) {
    throw new ConfigError("relays", "a relay pool needs at least one relay");
  }
  return createPoolTransport(options.pool, options.relays);
}

function resolvePublisher(
  options: SyncEngineOptions,
): SocialPublisher | undefined {
  if (options.publisher) return options.publisher;
  if (!options.signer) return undefined;

  if (!options.pool || !options.relays || options.relays.length === 0) {
    throw new ConfigError("signer", "publishing needs a relay pool and relays");
  }
  return createPoolPublisher(options.pool, options.relays, options.signer);
}

/**
 * Build a sync engine
 */
export function createSyncEngine(options: SyncEngineOptions = {}): SyncEngine {
  return new SyncEngine(options);
}
