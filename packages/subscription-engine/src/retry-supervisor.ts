import { InvalidDelayError } from "./errors.js";
import { isValidTimerDelay } from "./timer-delay.js";
import type { SubscriptionLogger, SubscriptionRequest } from "./types.js";

const DEFAULT_RETRY_DELAY = 30 * 1000; // 30 seconds

/**
 * A scheduled re-subscription.
 */
export interface RetryTask {
  id: string;
  request: SubscriptionRequest;
  attempt: number;
  fireAt: number;
}

export interface RetrySupervisorOptions {
  /** Re-issues a request; resolves with the new subscription id */
  resubscribe: (request: SubscriptionRequest, attempt: number) => Promise<string>;
  /** Fixed delay per attempt (default: 30 seconds) */
  retryDelay?: number;
  /** Attempts per chain before giving up (default: unbounded) */
  maxRetryAttempts?: number;
  now?: () => number;
  logger: SubscriptionLogger;
}

/**
 * Schedules a single delayed re-subscription per error.
 *
 * Delay is fixed, not exponential. Each retry creates a new subscription id,
 * so a relay that keeps erroring produces one retry chain per request.
 */
export class RetrySupervisor {
  private readonly resubscribe: RetrySupervisorOptions["resubscribe"];
  private readonly retryDelay: number;
  private readonly maxRetryAttempts: number;
  private readonly now: () => number;
  private readonly logger: SubscriptionLogger;
  private readonly tasks = new Map<
    string,
    { task: RetryTask; timer: ReturnType<typeof setTimeout> }
  >();
  private sequence = 0;

  constructor(options: RetrySupervisorOptions) {
    this.resubscribe = options.resubscribe;
    this.retryDelay = options.retryDelay ?? DEFAULT_RETRY_DELAY;
    if (!isValidTimerDelay(this.retryDelay)) {
      throw new InvalidDelayError("retryDelay", this.retryDelay);
    }
    this.maxRetryAttempts = options.maxRetryAttempts ?? Infinity;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  get pendingCount(): number {
    return this.tasks.size;
  }

  /**
   * Schedule a retry of `request`.
   * @param attempt - Attempt number the retry will carry (1 for the first retry)
   * @returns The task, or null when the attempt cap was reached
   */
  schedule(request: SubscriptionRequest, attempt: number): RetryTask | null {
    if (attempt > this.maxRetryAttempts) {
      this.logger.warn(
        `Giving up on ${request.name} after ${this.maxRetryAttempts} retries`,
      );
      return null;
    }

    const id = `${request.name}_retry_${this.now()}_${++this.sequence}`;
    const task: RetryTask = {
      id,
      request,
      attempt,
      fireAt: this.now() + this.retryDelay,
    };

    const timer = setTimeout(() => {
      this.tasks.delete(id);
      this.logger.warn(`Retrying subscription: ${request.name} (attempt ${attempt})`);
      this.resubscribe(request, attempt).catch((error) => {
        this.logger.error(`Retry failed for ${request.name}`, error);
      });
    }, this.retryDelay);

    this.tasks.set(id, { task, timer });
    return task;
  }

  /**
   * Cancel pending retries whose request name contains `namePattern`.
   * @returns Number of cancelled retries
   */
  cancelMatching(namePattern: string): number {
    let cancelled = 0;
    for (const [id, { task, timer }] of this.tasks) {
      if (task.request.name.includes(namePattern)) {
        clearTimeout(timer);
        this.tasks.delete(id);
        cancelled++;
      }
    }
    return cancelled;
  }

  /**
   * Cancel every pending retry.
   */
  cancelAll(): void {
    for (const { timer } of this.tasks.values()) {
      clearTimeout(timer);
    }
    this.tasks.clear();
  }
}
