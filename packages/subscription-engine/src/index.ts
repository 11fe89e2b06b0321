export { SubscriptionManager } from "./subscription-manager.js";
export { RetrySupervisor } from "./retry-supervisor.js";
export { SlidingWindowRateLimiter } from "./rate-limiter.js";
export { Mutex } from "./mutex.js";
export { optimizeFilters, DEFAULT_MAX_FILTER_LIMIT } from "./filter-optimizer.js";
export { transitionSubscriptionState } from "./subscription-state-machine.js";
export {
  SubscriptionEngineError,
  InvalidPriorityError,
  InvalidDelayError,
} from "./errors.js";
export { MAX_TIMER_DELAY, isValidTimerDelay } from "./timer-delay.js";
export type {
  SubscriptionSignal,
  SubscriptionTransitionResult,
} from "./subscription-state-machine.js";
export type { RetryTask, RetrySupervisorOptions } from "./retry-supervisor.js";
export type { RateLimiterOptions } from "./rate-limiter.js";
export type {
  SubscriptionStatus,
  TerminalSubscriptionStatus,
  SubscriptionTransport,
  TransportOptions,
  SubscriptionRequest,
  ManagedSubscription,
  SubscriptionLifecycleEvent,
  SubscriptionStats,
  SubscriptionLogger,
  SubscriptionManagerOptions,
} from "./types.js";
