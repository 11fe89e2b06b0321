/**
 * Base error for subscription engine failures.
 */
export class SubscriptionEngineError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SubscriptionEngineError";
  }
}

/**
 * Thrown when a subscription priority is outside 1..10.
 */
export class InvalidPriorityError extends SubscriptionEngineError {
  constructor(public readonly priority: number) {
    super(`Subscription priority must be an integer from 1 to 10, got ${priority}`);
    this.name = "InvalidPriorityError";
  }
}

/**
 * Thrown when a timeout or retry delay cannot be scheduled with setTimeout.
 */
export class InvalidDelayError extends SubscriptionEngineError {
  constructor(
    public readonly field: string,
    public readonly delay: number,
  ) {
    super(`${field} must be between 0 and 2147483647 ms, got ${delay}`);
    this.name = "InvalidDelayError";
  }
}
