import type { RewardsFailure, RewardsFailureKind } from './types.js';

interface RewardsErrorOptions {
  cause?: unknown;
}

export abstract class RewardsError extends Error {
  abstract readonly code: RewardsFailureKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options: RewardsErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
  }
}

/** Bad email/password. Needs operator action, never retried. */
export class CredentialsInvalidError extends RewardsError {
  readonly code = 'credentials-invalid' as const;
  readonly retryable = false;
}

/** The remote rejected a bearer token that looked valid locally. */
export class TokenRejectedError extends RewardsError {
  readonly code = 'token-rejected' as const;
  readonly retryable = false;
}

export class RemoteRateLimitedError extends RewardsError {
  readonly code = 'rate-limited' as const;
  readonly retryable = true;
  readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null, options: RewardsErrorOptions = {}) {
    super(message, options);
    this.retryAfterMs = retryAfterMs;
  }
}

export class TransientNetworkError extends RewardsError {
  readonly code = 'transient-network' as const;
  readonly retryable = true;
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options: RewardsErrorOptions = {}) {
    super(message, options);
    this.status = status;
  }
}

export class RemoteApiError extends RewardsError {
  readonly code = 'remote-error' as const;
  readonly retryable = false;
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options: RewardsErrorOptions = {}) {
    super(message, options);
    this.status = status;
  }
}

export class RetryExhaustedError extends RewardsError {
  readonly code = 'retry-exhausted' as const;
  readonly retryable = false;
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempts: ${describeError(lastError)}`, { cause: lastError });
    this.attempts = attempts;
  }
}

export class CancelledError extends RewardsError {
  readonly code = 'cancelled' as const;
  readonly retryable = false;

  constructor(message = 'Operation was cancelled', options: RewardsErrorOptions = {}) {
    super(message, options);
  }
}

export class InvalidRequestError extends RewardsError {
  readonly code = 'invalid-request' as const;
  readonly retryable = false;
}

export function isRewardsError(error: unknown): error is RewardsError {
  return error instanceof RewardsError;
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

export function toRewardsFailure(error: unknown): RewardsFailure {
  if (isRewardsError(error)) {
    return {
      kind: error.code,
      message: error.message,
      retryable: error.retryable
    };
  }
  if (isAbortError(error)) {
    return {
      kind: 'cancelled',
      message: 'Operation was cancelled',
      retryable: false
    };
  }
  return {
    kind: 'remote-error',
    message: describeError(error),
    retryable: false
  };
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
