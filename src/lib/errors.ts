/**
 * Error types raised by the sync engine
 */

/** Base class for every error the engine raises */
export class SyncError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SyncError";
  }
}

/** Invalid engine configuration */
export class ConfigError extends SyncError {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(`Invalid ${field}: ${message}`);
    this.name = "ConfigError";
  }
}

/** A mutation needs a signer and an active pubkey */
export class NotAuthenticatedError extends SyncError {
  constructor(message: string = "No active account") {
    super(message);
    this.name = "NotAuthenticatedError";
  }
}

/** Signing or publishing a locally built event failed */
export class PublishError extends SyncError {
  constructor(
    message: string,
    public readonly original?: unknown,
  ) {
    super(message);
    this.name = "PublishError";
  }
}

/** A non-fatal failure surfaced on `SyncEngine.errors$` */
export interface SyncErrorReport {
  source: "persist" | "load" | "reconcile";
  collection?: string;
  error: Error;
  timestamp: number;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
