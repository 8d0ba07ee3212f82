import { describe, expect, it, vi } from 'vitest';
import {
  CancelledError,
  CredentialsInvalidError,
  RemoteApiError,
  RemoteRateLimitedError,
  RetryExhaustedError,
  TokenRejectedError,
  TransientNetworkError
} from './errors.js';
import { RewardsRateLimiter } from './rate-limiter.js';
import { RetryExecutor } from './retry-executor.js';
import { RewardsTokenManager } from './token-manager.js';
import type { IssuedToken, RateWindowConfig, RetryPolicy, RewardsToken } from './types.js';
import { computeBackoffDelay } from './utils.js';

const HOUR = 60 * 60 * 1000;

interface SetupOptions {
  policy?: Partial<RetryPolicy>;
  burst?: RateWindowConfig;
  authenticate?: () => Promise<IssuedToken>;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function setup(options: SetupOptions = {}) {
  let now = 0;
  let issued = 0;
  const clock = () => now;
  const sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(
    options.sleep ??
      (async (ms: number) => {
        now += ms;
      })
  );
  const authenticate = vi.fn<() => Promise<IssuedToken>>(
    options.authenticate ??
      (async (): Promise<IssuedToken> => {
        issued += 1;
        return { token: `token-${issued}`, expiresAt: now + HOUR };
      })
  );
  const tokens = new RewardsTokenManager({ authenticator: { name: 'fake', authenticate }, clock });
  const rateLimiter = new RewardsRateLimiter({
    hourly: { capacity: 100, windowMs: HOUR },
    burst: options.burst ?? { capacity: 50, windowMs: 15 * 60 * 1000 },
    clock,
    sleep
  });
  const executor = new RetryExecutor({
    tokens,
    rateLimiter,
    // No jitter here so delays are exact; the band itself is covered above.
    policy: { maxAttempts: 3, baseDelayMs: 1_000, maxDelayMs: 60_000, jitterRatio: 0, ...options.policy },
    clock,
    sleep,
    random: () => 0.5
  });

  return { executor, sleep, authenticate, rateLimiter };
}

describe('computeBackoffDelay', () => {
  const policy: RetryPolicy = { maxAttempts: 10, baseDelayMs: 1_000, maxDelayMs: 60_000, jitterRatio: 0.3 };

  it('scales the doubled delay by a factor inside the jitter band', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBeCloseTo(700);
    expect(computeBackoffDelay(0, policy, () => 0.5)).toBeCloseTo(1_000);
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBeCloseTo(4_000);
    expect(computeBackoffDelay(2, policy, () => 0.999999)).toBeCloseTo(5_200, 0);
    expect(computeBackoffDelay(12, policy, () => 0.5)).toBeCloseTo(60_000);
  });

  it('is non-decreasing for a fixed seed and stays inside the band', () => {
    for (const seed of [0, 0.17, 0.5, 0.83, 0.999]) {
      let previous = 0;
      for (let attempt = 0; attempt < 12; attempt += 1) {
        const raw = Math.min(1_000 * 2 ** attempt, 60_000);
        const delay = computeBackoffDelay(attempt, policy, () => seed);

        expect(delay).toBeGreaterThanOrEqual(previous);
        expect(delay).toBeGreaterThanOrEqual(raw * 0.7 - 1e-6);
        expect(delay).toBeLessThanOrEqual(raw * 1.3 + 1e-6);
        previous = delay;
      }
    }
  });
});

describe('RetryExecutor', () => {
  it('backs off between transient failures and returns the eventual result', async () => {
    const { executor, sleep } = setup();
    const operation = vi
      .fn<(token: RewardsToken) => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError('Rewards graphql temporary server error: 503', 503))
      .mockRejectedValueOnce(new TransientNetworkError('Request timed out after 20000ms'))
      .mockResolvedValueOnce('ok');

    await expect(executor.execute(operation, { label: 'test' })).resolves.toBe('ok');

    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([1_000, 2_000]);
    expect(executor.recentEvents().map((event) => [event.type, event.attempt, event.delayMs])).toEqual([
      ['backoff', 2, 2_000],
      ['backoff', 1, 1_000]
    ]);
  });

  it('surfaces exhaustion with the last cause attached', async () => {
    const { executor, sleep } = setup();
    const last = new TransientNetworkError('Network request failed: connection reset');
    const operation = vi
      .fn<(token: RewardsToken) => Promise<string>>()
      .mockRejectedValueOnce(new TransientNetworkError('first'))
      .mockRejectedValueOnce(new TransientNetworkError('second'))
      .mockRejectedValueOnce(last);

    const error = await executor.execute(operation).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(RetryExhaustedError);
    expect(error).toMatchObject({
      attempts: 3,
      cause: last,
      message: 'Gave up after 3 attempts: Network request failed: connection reset'
    });
    expect(operation).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(executor.recentEvents()[0]?.type).toBe('exhausted');
  });

  it('does not retry a non-retryable remote error', async () => {
    const { executor, sleep } = setup();
    const failure = new RemoteApiError('GraphQL query failed: field not found', 200);
    const operation = vi.fn<(token: RewardsToken) => Promise<string>>().mockRejectedValue(failure);

    await expect(executor.execute(operation)).rejects.toBe(failure);
    expect(operation).toHaveBeenCalledTimes(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('re-authenticates once on a rejected token without spending an attempt', async () => {
    const { executor, authenticate, sleep } = setup({ policy: { maxAttempts: 1 } });
    const seen: string[] = [];
    const operation = vi.fn(async (token: RewardsToken) => {
      seen.push(token.value);
      if (token.value === 'token-1') {
        throw new TokenRejectedError('Bearer token rejected by the rewards API');
      }
      return 42;
    });

    await expect(executor.execute(operation)).resolves.toBe(42);

    expect(seen).toEqual(['token-1', 'token-2']);
    expect(authenticate).toHaveBeenCalledTimes(2);
    expect(sleep).not.toHaveBeenCalled();
    expect(executor.recentEvents()[0]?.type).toBe('reauthenticate');
  });

  it('gives up when the replacement token is rejected as well', async () => {
    const { executor, authenticate } = setup();
    const operation = vi.fn(async (_token: RewardsToken): Promise<number> => {
      throw new TokenRejectedError('Bearer token rejected by the rewards API');
    });

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(TokenRejectedError);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(authenticate).toHaveBeenCalledTimes(2);
  });

  it('waits the remote Retry-After before the next attempt', async () => {
    const { executor, sleep } = setup();
    const operation = vi
      .fn<(token: RewardsToken) => Promise<string>>()
      .mockRejectedValueOnce(new RemoteRateLimitedError('Rewards API rate limit reached', 5_000))
      .mockResolvedValueOnce('ok');

    await expect(executor.execute(operation)).resolves.toBe('ok');
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([5_000]);
  });

  it('waits for local limiter capacity without consuming an attempt', async () => {
    const { executor, sleep } = setup({
      policy: { maxAttempts: 1 },
      burst: { capacity: 1, windowMs: 10_000 }
    });
    const operation = vi.fn(async () => 'ok');

    await executor.execute(operation);
    await expect(executor.execute(operation)).resolves.toBe('ok');

    expect(sleep.mock.calls.map((call) => call[0])).toEqual([10_000]);
    expect(executor.recentEvents()[0]).toMatchObject({ type: 'rate-limited', delayMs: 10_000, attempt: 0 });
  });

  it('never calls the operation when credentials are rejected', async () => {
    const { executor, sleep } = setup({
      authenticate: async () => {
        throw new CredentialsInvalidError('Authentication failed: invalid email or password');
      }
    });
    const operation = vi.fn(async () => 'ok');

    await expect(executor.execute(operation)).rejects.toBeInstanceOf(CredentialsInvalidError);
    expect(operation).not.toHaveBeenCalled();
    expect(sleep).not.toHaveBeenCalled();
  });

  it('retries a transient authentication failure inside the same policy', async () => {
    let calls = 0;
    const { executor } = setup({
      authenticate: async () => {
        calls += 1;
        if (calls === 1) {
          throw new TransientNetworkError('Network request failed: getaddrinfo EAI_AGAIN');
        }
        return { token: 'token-ok', expiresAt: HOUR };
      }
    });

    await expect(executor.execute(async (token) => token.value)).resolves.toBe('token-ok');
    expect(calls).toBe(2);
  });

  it('retries a transient failure of the forced re-authentication', async () => {
    let calls = 0;
    const { executor, sleep } = setup({
      authenticate: async () => {
        calls += 1;
        if (calls === 2) {
          throw new TransientNetworkError('Network request failed: socket hang up');
        }
        return { token: `token-${calls}`, expiresAt: HOUR };
      }
    });
    const operation = vi.fn(async (token: RewardsToken) => {
      if (token.value === 'token-1') {
        throw new TokenRejectedError('Bearer token rejected by the rewards API');
      }
      return token.value;
    });

    await expect(executor.execute(operation)).resolves.toBe('token-3');

    expect(calls).toBe(3);
    expect(operation).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls.map((call) => call[0])).toEqual([1_000]);
    expect(executor.recentEvents().map((event) => event.type)).toEqual(['backoff', 'reauthenticate']);
  });

  it('reports cancellation, not exhaustion, when aborted during a backoff', async () => {
    const controller = new AbortController();
    const { executor } = setup({
      sleep: async () => {
        controller.abort();
        throw new CancelledError();
      }
    });
    const operation = vi.fn(async (): Promise<string> => {
      throw new TransientNetworkError('Rewards graphql temporary server error: 502', 502);
    });

    await expect(executor.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('maps an abort raised by the operation to a cancellation', async () => {
    const controller = new AbortController();
    const { executor } = setup();
    const operation = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new TransientNetworkError('Network request failed: This operation was aborted');
    });

    await expect(executor.execute(operation, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
  });
});
