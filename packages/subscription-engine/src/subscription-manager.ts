import { Subject, type Subscription } from "rxjs";
import type { NostrEvent } from "nostr-tools";
import {
  InvalidDelayError,
  InvalidPriorityError,
  SubscriptionEngineError,
} from "./errors.js";
import { DEFAULT_MAX_FILTER_LIMIT, optimizeFilters } from "./filter-optimizer.js";
import { Mutex } from "./mutex.js";
import { SlidingWindowRateLimiter } from "./rate-limiter.js";
import { RetrySupervisor } from "./retry-supervisor.js";
import { isValidTimerDelay } from "./timer-delay.js";
import {
  transitionSubscriptionState,
  type SubscriptionSignal,
} from "./subscription-state-machine.js";
import type {
  ManagedSubscription,
  SubscriptionLifecycleEvent,
  SubscriptionLogger,
  SubscriptionManagerOptions,
  SubscriptionRequest,
  SubscriptionStats,
  SubscriptionTransport,
} from "./types.js";

const DEFAULT_MAX_SUBSCRIPTIONS = 30;
const DEFAULT_MAX_EVENTS_PER_MINUTE = 2000;
const DEFAULT_SUBSCRIPTION_TIMEOUT = 15 * 60 * 1000; // 15 minutes
const DEFAULT_PRIORITY = 5;

const silentLogger: SubscriptionLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

interface SubscriptionEntry {
  info: ManagedSubscription;
  request: SubscriptionRequest;
  handle: Subscription | null;
  timer: ReturnType<typeof setTimeout> | null;
}

/**
 * Centralized manager for transport subscriptions.
 *
 * Keeps a soft-capped pool of concurrent subscriptions (evicting the lowest
 * priority one when full), clamps filter limits, gates delivered events
 * through a shared sliding-window rate limiter, enforces per-subscription
 * deadlines and re-subscribes after transport errors.
 *
 * Admission and eviction run inside a single mutex.
 */
export class SubscriptionManager {
  private readonly transport: SubscriptionTransport;
  private readonly maxSubscriptions: number;
  private readonly subscriptionTimeout: number;
  private readonly maxFilterLimit: number;
  private readonly now: () => number;
  private readonly logger: SubscriptionLogger;
  private readonly rateLimiter: SlidingWindowRateLimiter;
  private readonly retries: RetrySupervisor;
  private readonly lock = new Mutex();
  private readonly entries = new Map<string, SubscriptionEntry>();
  private sequence = 0;
  private droppedEvents = 0;
  private disposed = false;

  /** Emits every terminal transition. Completes on dispose. */
  readonly lifecycle$ = new Subject<SubscriptionLifecycleEvent>();

  constructor(options: SubscriptionManagerOptions) {
    this.transport = options.transport;
    this.maxSubscriptions =
      options.maxConcurrentSubscriptions ?? DEFAULT_MAX_SUBSCRIPTIONS;
    this.subscriptionTimeout =
      options.subscriptionTimeout ?? DEFAULT_SUBSCRIPTION_TIMEOUT;
    if (!isValidTimerDelay(this.subscriptionTimeout)) {
      throw new InvalidDelayError("subscriptionTimeout", this.subscriptionTimeout);
    }
    this.maxFilterLimit = options.maxFilterLimit ?? DEFAULT_MAX_FILTER_LIMIT;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? silentLogger;

    this.rateLimiter = new SlidingWindowRateLimiter({
      limit: options.maxEventsPerMinute ?? DEFAULT_MAX_EVENTS_PER_MINUTE,
      now: this.now,
    });

    this.retries = new RetrySupervisor({
      resubscribe: (request, attempt) => this.admit(request, attempt),
      retryDelay: options.retryDelay,
      maxRetryAttempts: options.maxRetryAttempts,
      now: this.now,
      logger: this.logger,
    });
  }

  /**
   * Open a managed subscription.
   *
   * When the pool is at capacity, exactly one subscription with the
   * numerically highest priority is evicted first (ties: the earliest
   * registered). The new subscription is then registered unconditionally.
   *
   * @returns The new subscription id
   */
  createSubscription(request: SubscriptionRequest): Promise<string> {
    const priority = request.priority ?? DEFAULT_PRIORITY;
    if (!Number.isInteger(priority) || priority < 1 || priority > 10) {
      return Promise.reject(new InvalidPriorityError(priority));
    }
    if (request.timeout !== undefined && !isValidTimerDelay(request.timeout)) {
      return Promise.reject(new InvalidDelayError("timeout", request.timeout));
    }
    return this.admit(request, 0);
  }

  /**
   * Cancel a specific subscription. Unknown ids are ignored.
   */
  cancelSubscription(id: string): void {
    const entry = this.entries.get(id);
    if (entry) {
      this.logger.debug(`Cancelling subscription: ${id}`);
      this.finish(entry, { type: "CANCEL" });
    }
  }

  /**
   * Cancel every subscription whose name contains `namePattern`, along with
   * pending retries for matching names.
   * @returns Number of cancelled subscriptions
   */
  cancelSubscriptionsByName(namePattern: string): number {
    const toCancel = Array.from(this.entries.values()).filter((entry) =>
      entry.info.name.includes(namePattern),
    );

    this.logger.debug(
      `Cancelling ${toCancel.length} subscriptions matching: ${namePattern}`,
    );
    for (const entry of toCancel) {
      this.finish(entry, { type: "CANCEL" });
    }
    this.retries.cancelMatching(namePattern);
    return toCancel.length;
  }

  getSubscription(id: string): ManagedSubscription | undefined {
    const entry = this.entries.get(id);
    return entry ? { ...entry.info } : undefined;
  }

  getActiveSubscriptions(): ManagedSubscription[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry.info }));
  }

  get activeCount(): number {
    return this.entries.size;
  }

  getStats(): SubscriptionStats {
    const now = this.now();
    return {
      activeSubscriptions: this.entries.size,
      maxSubscriptions: this.maxSubscriptions,
      eventsLastMinute: this.rateLimiter.count(),
      maxEventsPerMinute: this.rateLimiter.limit,
      droppedEvents: this.droppedEvents,
      pendingRetries: this.retries.pendingCount,
      subscriptions: Array.from(this.entries.values(), ({ info }) => ({
        id: info.id,
        name: info.name,
        priority: info.priority,
        ageMs: now - info.createdAt,
        filterCount: info.filters.length,
      })),
    };
  }

  /**
   * Cancel all subscriptions and pending retries.
   */
  dispose(): void {
    if (this.disposed) return;
    this.logger.debug("Disposing SubscriptionManager - cancelling all subscriptions");

    this.disposed = true;
    this.retries.cancelAll();
    for (const entry of Array.from(this.entries.values())) {
      this.finish(entry, { type: "CANCEL" });
    }
    this.lifecycle$.complete();
  }

  // --- Private ---

  private admit(request: SubscriptionRequest, attempt: number): Promise<string> {
    return this.lock.withLock(() => {
      if (this.disposed) {
        throw new SubscriptionEngineError("SubscriptionManager has been disposed");
      }

      if (this.entries.size >= this.maxSubscriptions) {
        this.evictLowestPriority();
      }

      return this.open(request, attempt);
    });
  }

  private open(request: SubscriptionRequest, attempt: number): string {
    const filters = optimizeFilters(request.filters, this.maxFilterLimit);
    const createdAt = this.now();
    const id = `${request.name}_${createdAt}_${++this.sequence}`;
    const timeout = request.timeout ?? this.subscriptionTimeout;

    const entry: SubscriptionEntry = {
      info: {
        id,
        name: request.name,
        filters,
        priority: request.priority ?? DEFAULT_PRIORITY,
        createdAt,
        timeout,
        status: "active",
        attempt,
      },
      request,
      handle: null,
      timer: null,
    };

    this.logger.info(
      `Creating managed subscription: ${id} (filters: ${filters.length}, priority: ${entry.info.priority}, active: ${this.entries.size}/${this.maxSubscriptions})`,
    );

    this.entries.set(id, entry);
    entry.timer = setTimeout(() => {
      this.logger.debug(`Subscription timeout: ${id}`);
      this.finish(entry, { type: "TIMEOUT" });
    }, timeout);

    let handle: Subscription;
    try {
      const stream = this.transport.subscribe(filters, {
        closeOnEose: request.closeOnEose ?? false,
      });
      handle = stream.subscribe({
        next: (event) => this.deliver(entry, event),
        error: (error: unknown) => this.finish(entry, { type: "ERROR", error }),
        complete: () => this.finish(entry, { type: "COMPLETE" }),
      });
    } catch (error) {
      this.logger.error(`Failed to create subscription ${id}`, error);
      this.finish(entry, { type: "CANCEL" });
      throw error;
    }

    // The stream may have ended synchronously inside subscribe()
    if (entry.info.status === "active") {
      entry.handle = handle;
    } else {
      handle.unsubscribe();
    }

    return id;
  }

  private deliver(entry: SubscriptionEntry, event: NostrEvent): void {
    if (entry.info.status !== "active") return;

    if (!this.rateLimiter.admit()) {
      this.droppedEvents++;
      this.logger.warn(`Rate limit exceeded, dropping event for ${entry.info.name}`);
      return;
    }

    this.logger.debug(
      `Event for ${entry.info.name}: ${event.id.slice(0, 8)}, kind: ${event.kind}`,
    );

    try {
      const result = entry.request.onEvent(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => {
          this.logger.error(`Event handler failed for ${entry.info.name}`, error);
        });
      }
    } catch (error) {
      this.logger.error(`Event handler failed for ${entry.info.name}`, error);
    }
  }

  private evictLowestPriority(): void {
    let target: SubscriptionEntry | undefined;
    for (const entry of this.entries.values()) {
      if (!target || entry.info.priority > target.info.priority) {
        target = entry;
      }
    }

    if (target) {
      this.logger.debug(
        `Evicting lowest priority subscription: ${target.info.id} (priority: ${target.info.priority})`,
      );
      this.finish(target, { type: "EVICT" });
    }
  }

  private finish(entry: SubscriptionEntry, signal: SubscriptionSignal): void {
    const transition = transitionSubscriptionState(entry.info.status, signal);
    if (!transition.release) return;

    const { info, request } = entry;
    const status = transition.newStatus;
    info.status = status;

    if (entry.timer) {
      clearTimeout(entry.timer);
      entry.timer = null;
    }
    entry.handle?.unsubscribe();
    entry.handle = null;
    this.entries.delete(info.id);

    this.lifecycle$.next({ id: info.id, name: info.name, status });

    if (transition.notifyComplete) {
      this.logger.info(`Subscription completed: ${info.id}`);
      this.invoke(info.name, () => request.onComplete?.());
    }

    if (transition.notifyError && signal.type === "ERROR") {
      this.logger.error(`Subscription error in ${info.id}`, signal.error);
      const error = signal.error;
      this.invoke(info.name, () => request.onError?.(error));
    }

    if (transition.scheduleRetry && request.retry !== false && !this.disposed) {
      this.retries.schedule(request, info.attempt + 1);
    }
  }

  private invoke(name: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.logger.error(`Subscription callback failed for ${name}`, error);
    }
  }
}
