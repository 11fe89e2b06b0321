import {
  DEFAULT_CORRUPTION_THRESHOLD,
  DEFAULT_MAX_CONCURRENT_SUBSCRIPTIONS,
  DEFAULT_MAX_EVENTS_PER_MINUTE,
  DEFAULT_MAX_FILTER_LIMIT,
  DEFAULT_RETRY_DELAY,
  DEFAULT_STORAGE_KEY_PREFIX,
  DEFAULT_SUBSCRIPTION_TIMEOUT,
} from "@/constants/app";
import { MAX_TIMER_DELAY } from "subscription-engine";
import { ConfigError } from "./errors";

/**
 * Tunables shared by the subscription manager, cache persister and social layer
 */
export interface SyncEngineConfigOptions {
  maxConcurrentSubscriptions?: number;
  maxEventsPerMinute?: number;
  /** Per-subscription timeout (ms) */
  subscriptionTimeout?: number;
  /** Delay before re-issuing an errored subscription (ms) */
  retryDelay?: number;
  /** Retry attempts per chain; unbounded when omitted */
  maxRetryAttempts?: number;
  maxFilterLimit?: number;
  /** Fraction of corrupt cache records above which a blob is discarded */
  corruptionThreshold?: number;
  storageKeyPrefix?: string;
  /** Clock (ms since epoch) */
  now?: () => number;
}

export interface SyncEngineConfig {
  maxConcurrentSubscriptions: number;
  maxEventsPerMinute: number;
  subscriptionTimeout: number;
  retryDelay: number;
  maxRetryAttempts: number;
  maxFilterLimit: number;
  corruptionThreshold: number;
  storageKeyPrefix: string;
  now: () => number;
}

function requirePositiveInteger(field: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(field, `expected a positive integer, got ${value}`);
  }
  return value;
}

function requireTimerDelay(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigError(field, `expected a non-negative number, got ${value}`);
  }
  if (value > MAX_TIMER_DELAY) {
    throw new ConfigError(
      field,
      `expected at most ${MAX_TIMER_DELAY} ms, got ${value}`,
    );
  }
  return value;
}

/**
 * Merge options over the defaults and validate every field
 */
export function resolveConfig(
  options: SyncEngineConfigOptions = {},
): SyncEngineConfig {
  const maxRetryAttempts = options.maxRetryAttempts ?? Infinity;
  if (
    maxRetryAttempts !== Infinity &&
    (!Number.isInteger(maxRetryAttempts) || maxRetryAttempts < 0)
  ) {
    throw new ConfigError(
      "maxRetryAttempts",
      `expected a non-negative integer, got ${maxRetryAttempts}`,
    );
  }

  const corruptionThreshold =
    options.corruptionThreshold ?? DEFAULT_CORRUPTION_THRESHOLD;
  if (
    !Number.isFinite(corruptionThreshold) ||
    corruptionThreshold < 0 ||
    corruptionThreshold > 1
  ) {
    throw new ConfigError(
      "corruptionThreshold",
      `expected a number from 0 to 1, got ${corruptionThreshold}`,
    );
  }

  const storageKeyPrefix =
    options.storageKeyPrefix ?? DEFAULT_STORAGE_KEY_PREFIX;
  if (storageKeyPrefix.length === 0) {
    throw new ConfigError("storageKeyPrefix", "must not be empty");
  }

  return {
    maxConcurrentSubscriptions: requirePositiveInteger(
      "maxConcurrentSubscriptions",
      options.maxConcurrentSubscriptions ??
        DEFAULT_MAX_CONCURRENT_SUBSCRIPTIONS,
    ),
    maxEventsPerMinute: requirePositiveInteger(
      "maxEventsPerMinute",
      options.maxEventsPerMinute ?? DEFAULT_MAX_EVENTS_PER_MINUTE,
    ),
    subscriptionTimeout: requireTimerDelay(
      "subscriptionTimeout",
      options.subscriptionTimeout ?? DEFAULT_SUBSCRIPTION_TIMEOUT,
    ),
    retryDelay: requireTimerDelay(
      "retryDelay",
      options.retryDelay ?? DEFAULT_RETRY_DELAY,
    ),
    maxRetryAttempts,
    maxFilterLimit: requirePositiveInteger(
      "maxFilterLimit",
      options.maxFilterLimit ?? DEFAULT_MAX_FILTER_LIMIT,
    ),
    corruptionThreshold,
    storageKeyPrefix,
    now: options.now ?? Date.now,
  };
}
