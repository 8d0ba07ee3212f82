import {
  CancelledError,
  CredentialsInvalidError,
  RemoteRateLimitedError,
  RetryExhaustedError,
  TokenRejectedError,
  describeError,
  isAbortError,
  isRewardsError
} from './errors.js';
import type { RewardsRateLimiter } from './rate-limiter.js';
import type { RewardsTokenManager } from './token-manager.js';
import type { Clock, RetryEvent, RetryEventType, RetryPolicy, RewardsToken, Sleeper } from './types.js';
import { computeBackoffDelay, rewardsLogger, sleep as defaultSleep, throwIfCancelled } from './utils.js';

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 60_000,
  jitterRatio: 0.3
};

const DEFAULT_EVENT_HISTORY = 20;

export type RemoteOperation<T> = (token: RewardsToken, signal: AbortSignal | undefined) => Promise<T>;

interface RetryExecutorConfig {
  tokens: RewardsTokenManager;
  rateLimiter: RewardsRateLimiter;
  policy?: Partial<RetryPolicy>;
  eventHistory?: number;
  clock?: Clock;
  sleep?: Sleeper;
  random?: () => number;
}

interface ExecuteOptions {
  signal?: AbortSignal;
  label?: string;
}

/**
 * Runs one idempotent remote read: limiter admission, a valid token, then the
 * operation, with jittered exponential backoff between failed attempts.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly tokens: RewardsTokenManager;
  private readonly rateLimiter: RewardsRateLimiter;
  private readonly eventHistory: number;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private readonly random: () => number;
  private readonly events: RetryEvent[] = [];

  constructor(config: RetryExecutorConfig) {
    this.tokens = config.tokens;
    this.rateLimiter = config.rateLimiter;
    this.policy = normalizePolicy({ ...DEFAULT_RETRY_POLICY, ...config.policy });
    this.eventHistory = Math.max(config.eventHistory ?? DEFAULT_EVENT_HISTORY, 1);
    this.clock = config.clock ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
    this.random = config.random ?? Math.random;
  }

  async execute<T>(operation: RemoteOperation<T>, options: ExecuteOptions = {}): Promise<T> {
    const { signal } = options;
    const label = options.label || 'request';
    let attempt = 0;
    let reauthenticated = false;
    let rejectedToken: RewardsToken | null = null;

    for (;;) {
      throwIfCancelled(signal);

      await this.rateLimiter.acquire({
        signal,
        onDenied: (retryAfterMs) => this.record('rate-limited', label, attempt, retryAfterMs, 'local rate limit')
      });

      let token: RewardsToken | null = null;
      try {
        if (rejectedToken) {
          token = await this.tokens.invalidate(rejectedToken, signal);
          rejectedToken = null;
        } else {
          token = await this.tokens.getValidToken(signal);
        }
        return await operation(token, signal);
      } catch (error) {
        if (signal?.aborted || error instanceof CancelledError || isAbortError(error)) {
          throw error instanceof CancelledError ? error : new CancelledError(undefined, { cause: error });
        }
        if (error instanceof CredentialsInvalidError) {
          throw error;
        }

        if (error instanceof TokenRejectedError && token) {
          if (reauthenticated) {
            throw error;
          }
          reauthenticated = true;
          this.record('reauthenticate', label, attempt, 0, error.message);
          // Replaced at the top of the next turn, inside the retry policy.
          rejectedToken = token;
          continue;
        }

        if (!isRewardsError(error) || !error.retryable) {
          throw error;
        }

        attempt += 1;
        if (attempt >= this.policy.maxAttempts) {
          this.record('exhausted', label, attempt, 0, error.message);
          rewardsLogger.warn('[RetryExecutor] Retries exhausted', {
            label,
            attempts: attempt,
            error: error.message
          });
          throw new RetryExhaustedError(attempt, error);
        }

        const delayMs = this.delayFor(attempt, error);
        this.record('backoff', label, attempt, delayMs, error.message);
        rewardsLogger.info('[RetryExecutor] Retrying after failure', {
          label,
          attempt,
          delayMs: Math.round(delayMs),
          error: describeError(error)
        });
        await this.sleep(delayMs, signal);
      }
    }
  }

  /** Most recent events first. */
  recentEvents(): RetryEvent[] {
    return [...this.events].reverse();
  }

  private delayFor(attempt: number, error: unknown): number {
    if (error instanceof RemoteRateLimitedError && error.retryAfterMs !== null) {
      return Math.min(error.retryAfterMs, this.policy.maxDelayMs);
    }
    return computeBackoffDelay(attempt - 1, this.policy, this.random);
  }

  private record(type: RetryEventType, label: string, attempt: number, delayMs: number, reason: string): void {
    this.events.push({ type, label, attempt, delayMs, reason, at: this.clock() });
    if (this.events.length > this.eventHistory) {
      this.events.splice(0, this.events.length - this.eventHistory);
    }
  }
}

export function createRetryExecutor(config: RetryExecutorConfig): RetryExecutor {
  return new RetryExecutor(config);
}

function normalizePolicy(policy: RetryPolicy): RetryPolicy {
  const baseDelayMs = Math.max(policy.baseDelayMs, 0);
  return {
    maxAttempts: Math.max(1, Math.floor(policy.maxAttempts)),
    baseDelayMs,
    maxDelayMs: Math.max(policy.maxDelayMs, baseDelayMs),
    jitterRatio: Math.min(Math.max(policy.jitterRatio, 0), 1)
  };
}
