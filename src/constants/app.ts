/**
 * Engine defaults. Every value can be overridden through SyncEngineOptions.
 */

export const DEFAULT_MAX_CONCURRENT_SUBSCRIPTIONS = 30;
export const DEFAULT_MAX_EVENTS_PER_MINUTE = 2000;
export const DEFAULT_SUBSCRIPTION_TIMEOUT = 15 * 60 * 1000; // 15 minutes
export const DEFAULT_RETRY_DELAY = 30 * 1000; // 30 seconds
export const DEFAULT_MAX_FILTER_LIMIT = 100;

/** One-shot count queries */
export const LIKE_COUNT_TIMEOUT = 5 * 1000;
export const FOLLOWER_STATS_TIMEOUT = 8 * 1000;
export const COUNT_QUERY_PRIORITY = 4;

/** Fraction of corrupt cache records above which a whole collection is discarded */
export const DEFAULT_CORRUPTION_THRESHOLD = 0.5;

export const DEFAULT_STORAGE_KEY_PREFIX = "vine-sync";
export const DEFAULT_DATABASE_NAME = "vine-sync";

/** Cache blob format version */
export const CACHE_FORMAT_VERSION = 1;
