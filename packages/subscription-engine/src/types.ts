import type { Observable } from "rxjs";
import type { Filter, NostrEvent } from "nostr-tools";

/**
 * Lifecycle status of a managed subscription.
 */
export type SubscriptionStatus =
  | "active" // Receiving events from the transport
  | "cancelled" // Cancelled explicitly (or on dispose)
  | "timed_out" // Deadline elapsed
  | "completed" // Upstream stream completed
  | "evicted" // Displaced by a new subscription while the pool was full
  | "errored"; // Transport error, a retry is scheduled

export type TerminalSubscriptionStatus = Exclude<SubscriptionStatus, "active">;

export interface TransportOptions {
  /** Complete the stream once stored events are exhausted (EOSE) */
  closeOnEose?: boolean;
}

/**
 * Source of inbound events. Each call opens an independent stream that
 * emits events, and completes or errors when the upstream closes.
 *
 * Compatible with a thin adapter over RelayPool from applesauce-relay.
 */
export interface SubscriptionTransport {
  subscribe(filters: Filter[], options?: TransportOptions): Observable<NostrEvent>;
}

/**
 * Parameters for a managed subscription. Retries re-use the same request.
 */
export interface SubscriptionRequest {
  /** Logical name, used for logging and cancelSubscriptionsByName */
  name: string;
  /** Filters as requested, before optimization */
  filters: Filter[];
  /** Called for every event that passes the rate limiter */
  onEvent: (event: NostrEvent) => void | Promise<void>;
  /** Called when the transport errors (before the retry is scheduled) */
  onError?: (error: unknown) => void;
  /** Called when the upstream stream completes */
  onComplete?: () => void;
  /** Deadline in milliseconds (default: manager subscriptionTimeout) */
  timeout?: number;
  /** 1 = highest, 10 = lowest (default: 5) */
  priority?: number;
  /** One-shot query: complete after stored events (default: false) */
  closeOnEose?: boolean;
  /** Re-subscribe after transport errors (default: true) */
  retry?: boolean;
}

/**
 * Read-only view of an active subscription.
 */
export interface ManagedSubscription {
  id: string;
  name: string;
  /** Filters after optimization, as sent to the transport */
  filters: Filter[];
  priority: number;
  createdAt: number;
  timeout: number;
  status: SubscriptionStatus;
  /** Retry attempt that created this subscription (0 for the first) */
  attempt: number;
}

/**
 * Emitted on lifecycle$ whenever a subscription reaches a terminal status.
 */
export interface SubscriptionLifecycleEvent {
  id: string;
  name: string;
  status: TerminalSubscriptionStatus;
}

export interface SubscriptionStats {
  activeSubscriptions: number;
  maxSubscriptions: number;
  eventsLastMinute: number;
  maxEventsPerMinute: number;
  droppedEvents: number;
  pendingRetries: number;
  subscriptions: Array<{
    id: string;
    name: string;
    priority: number;
    ageMs: number;
    filterCount: number;
  }>;
}

/**
 * Minimal logger interface. Anything with console-like level methods fits.
 */
export interface SubscriptionLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, error?: unknown): void;
}

/**
 * Options for SubscriptionManager constructor.
 */
export interface SubscriptionManagerOptions {
  /** Transport used to open subscriptions */
  transport: SubscriptionTransport;

  /** Soft ceiling on concurrent subscriptions (default: 30) */
  maxConcurrentSubscriptions?: number;

  /** Delivered events allowed per sliding minute (default: 2000) */
  maxEventsPerMinute?: number;

  /** Default subscription deadline in milliseconds (default: 15 minutes) */
  subscriptionTimeout?: number;

  /** Fixed delay before re-subscribing after an error (default: 30 seconds) */
  retryDelay?: number;

  /** Retries per error chain before giving up (default: unbounded) */
  maxRetryAttempts?: number;

  /** Cap applied to every filter limit (default: 100) */
  maxFilterLimit?: number;

  /** Clock in milliseconds (default: Date.now) */
  now?: () => number;

  /** Logger for lifecycle and drop messages (default: silent) */
  logger?: SubscriptionLogger;
}
