/**
 * Error classes
 *
 * Fetch failures carry a `kind` so the orchestrator can report them per
 * metric kind without string matching on messages.
 */

export type FetchFailureKind = "auth" | "rate-limited" | "network" | "timeout";

/**
 * Base class for Remote Metric Source failures
 */
export abstract class FetchError extends Error {
  abstract readonly kind: FetchFailureKind;

  /** Whether the next scheduled invocation may succeed without user action */
  get retriable(): boolean {
    return this.kind !== "auth";
  }
}

export class AuthError extends FetchError {
  readonly kind = "auth";

  constructor(message: string = "Authentication rejected by remote source") {
    super(message);
    this.name = "AuthError";
  }
}

export class RateLimitedError extends FetchError {
  readonly kind = "rate-limited";
  /** Seconds until the remote accepts requests again */
  readonly retryAfterSeconds: number;

  constructor(retryAfterSeconds: number, message?: string) {
    super(message ?? `Rate limit exceeded. Retry after ${retryAfterSeconds} seconds.`);
    this.name = "RateLimitedError";
    this.retryAfterSeconds = retryAfterSeconds;
  }
}

export class NetworkError extends FetchError {
  readonly kind = "network";

  constructor(message: string) {
    super(message);
    this.name = "NetworkError";
  }
}

export class FetchTimeoutError extends FetchError {
  readonly kind = "timeout";
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Remote fetch exceeded ${timeoutMs}ms`);
    this.name = "FetchTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Persisted data failed to parse. Raised inside the store and handled there.
 */
export class StoreCorruptError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Corrupt store file ${path}: ${reason}`);
    this.name = "StoreCorruptError";
    this.path = path;
  }
}

export class SyncInProgressError extends Error {
  constructor(message: string = "Another sync is already running") {
    super(message);
    this.name = "SyncInProgressError";
  }
}

export class ConfigInvalidError extends Error {
  readonly key: string;

  constructor(key: string, reason: string) {
    super(`Invalid config value for ${key}: ${reason}`);
    this.name = "ConfigInvalidError";
    this.key = key;
  }
}

/**
 * Normalize anything a source throws into a FetchError.
 */
export function toFetchError(error: unknown): FetchError {
  if (error instanceof FetchError) {
    return error;
  }
  if (error instanceof Error) {
    return new NetworkError(error.message);
  }
  return new NetworkError(String(error));
}
