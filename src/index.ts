export { SyncEngine, createSyncEngine } from "./services/sync-engine";
export type { SyncEngineOptions } from "./services/sync-engine";
export { SocialState, SOCIAL_SUBSCRIPTION_PREFIX } from "./services/social-state";
export type {
  SocialBindings,
  SocialStateOptions,
  StartOptions,
  NewFollowSet,
  FollowSetChanges,
  LikeStatus,
  FollowerStats,
} from "./services/social-state";
export { EventReconciler } from "./services/event-reconciler";
export type {
  CollectionBinding,
  IngestResult,
} from "./services/event-reconciler";
export { ReconciledCollection } from "./services/reconciled-collection";
export type { ReconciledCollectionOptions } from "./services/reconciled-collection";
export {
  reactionsDefinition,
  repostsDefinition,
  contactsDefinition,
  followSetsDefinition,
  curationSetsDefinition,
  toReconciledItem,
} from "./services/collection-definitions";
export type { CollectionDefinition } from "./services/collection-definitions";
export { CachePersister } from "./services/cache-persister";
export type {
  CacheBlob,
  CachePersisterOptions,
  LoadResult,
} from "./services/cache-persister";
export { MemoryKeyValueStore } from "./services/key-value-store";
export type { KeyValueStore } from "./services/key-value-store";
export { SyncDb, createSyncDb, DexieKeyValueStore } from "./services/db";
export type { CachedCollection } from "./services/db";
export {
  createRelayPool,
  createPoolTransport,
  createPoolPublisher,
  createSecretKeySigner,
} from "./services/relay-pool";
export type {
  EventSigner,
  PublishResponse,
  RelayPoolLike,
  SocialPublisher,
} from "./services/relay-pool";
export { resolveConfig } from "./lib/config";
export type { SyncEngineConfig, SyncEngineConfigOptions } from "./lib/config";
export {
  SyncError,
  ConfigError,
  NotAuthenticatedError,
  PublishError,
} from "./lib/errors";
export type { SyncErrorReport } from "./lib/errors";
export { createLogger } from "./lib/logger";
export { resolveConflict, mergeItems } from "./lib/reconcile";
export type { TargetEvent } from "./lib/event-builders";
export * from "./types/reconcile";
export * from "./constants/kinds";
export {
  SubscriptionManager,
  SubscriptionEngineError,
  InvalidPriorityError,
  InvalidDelayError,
  optimizeFilters,
} from "subscription-engine";
export type {
  SubscriptionRequest,
  SubscriptionTransport,
  TransportOptions,
  SubscriptionStats,
  SubscriptionStatus,
  ManagedSubscription,
} from "subscription-engine";
