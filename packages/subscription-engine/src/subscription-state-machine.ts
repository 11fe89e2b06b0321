import type {
  SubscriptionStatus,
  TerminalSubscriptionStatus,
} from "./types.js";

/**
 * Signals that end a subscription.
 */
export type SubscriptionSignal =
  | { type: "CANCEL" }
  | { type: "TIMEOUT" }
  | { type: "COMPLETE" }
  | { type: "EVICT" }
  | { type: "ERROR"; error: unknown };

/**
 * Result of a subscription state transition. `release` is true only for
 * moves into a terminal status.
 */
export type SubscriptionTransitionResult =
  | {
      newStatus: SubscriptionStatus;
      release: false;
      notifyComplete: false;
      notifyError: false;
      scheduleRetry: false;
    }
  | {
      /** The terminal status the subscription moves to */
      newStatus: TerminalSubscriptionStatus;
      /** The subscription must be deregistered and its handle closed */
      release: true;
      /** The request's onComplete callback should run */
      notifyComplete: boolean;
      /** The request's onError callback should run */
      notifyError: boolean;
      /** The retry supervisor should re-issue the request */
      scheduleRetry: boolean;
    };

/**
 * Pure function implementing the managed subscription lifecycle.
 *
 * Only `active` subscriptions move; every other status is terminal and
 * ignores later signals (a timeout firing after a cancel, a late error).
 */
export function transitionSubscriptionState(
  currentStatus: SubscriptionStatus,
  signal: SubscriptionSignal,
): SubscriptionTransitionResult {
  const noChange: SubscriptionTransitionResult = {
    newStatus: currentStatus,
    release: false,
    notifyComplete: false,
    notifyError: false,
    scheduleRetry: false,
  };

  const release = (
    newStatus: TerminalSubscriptionStatus,
    extra: { notifyComplete?: boolean; notifyError?: boolean; scheduleRetry?: boolean } = {},
  ): SubscriptionTransitionResult => ({
    newStatus,
    release: true,
    notifyComplete: extra.notifyComplete ?? false,
    notifyError: extra.notifyError ?? false,
    scheduleRetry: extra.scheduleRetry ?? false,
  });

  switch (currentStatus) {
    case "active":
      switch (signal.type) {
        case "CANCEL":
          return release("cancelled");
        case "TIMEOUT":
          return release("timed_out");
        case "COMPLETE":
          return release("completed", { notifyComplete: true });
        case "EVICT":
          return release("evicted");
        case "ERROR":
          return release("errored", { notifyError: true, scheduleRetry: true });
        default: {
          const _exhaustive: never = signal;
          return _exhaustive;
        }
      }

    case "cancelled":
    case "timed_out":
    case "completed":
    case "evicted":
    case "errored":
      return noChange;

    default: {
      const _exhaustive: never = currentStatus;
      return _exhaustive;
    }
  }
}
