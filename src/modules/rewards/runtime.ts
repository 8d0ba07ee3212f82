import path from 'node:path';
import { createCredentialsAuthenticator, createDisabledAuthenticator } from './authenticators.js';
import { createRewardsCoordinator, type RewardsCoordinator } from './coordinator.js';
import { createRewardsFetchOrchestrator, type RewardsFetchOrchestrator } from './fetch-orchestrator.js';
import { JsonFileLimiterStateStore, type LimiterStateStore } from './limiter-state-store.js';
import { parseCategories } from './periods.js';
import { createRewardsRateLimiter, type RewardsRateLimiter } from './rate-limiter.js';
import { createResponseCache, type ResponseCache } from './response-cache.js';
import { createRetryExecutor, type RetryExecutor } from './retry-executor.js';
import {
  DEFAULT_AUTH_URL,
  DEFAULT_GRAPHQL_URL,
  createRewardsApiClient,
  type FetchLike,
  type RewardsApiClient
} from './rewards-client.js';
import { createRewardsTokenManager, type RewardsTokenManager } from './token-manager.js';
import type { Clock, RateWindowConfig, RetryPolicy, RewardCategory, RewardCredentials, Sleeper } from './types.js';
import { describeError } from './errors.js';
import { redactId, rewardsLogger } from './utils.js';

export interface RewardsConfig {
  credentials: RewardCredentials | null;
  homeId: string | null;
  authUrl: string;
  graphqlUrl: string;
  requestTimeoutMs: number;
  tokenLifetimeMs: number;
  tokenRefreshBufferMs: number;
  scanIntervalMinutes: number;
  deviceScanIntervalHours: number;
  categories: RewardCategory[];
  statePath: string;
  hourly: RateWindowConfig;
  burst: RateWindowConfig;
  persistIntervalMs: number;
  retry: RetryPolicy;
  port: number;
}

/** Test seams; production leaves them unset. */
export interface RewardsRuntimeOverrides {
  fetchImpl?: FetchLike;
  stateStore?: LimiterStateStore;
  clock?: Clock;
  sleep?: Sleeper;
  random?: () => number;
}

export interface RewardsRuntime {
  config: RewardsConfig;
  client: RewardsApiClient;
  tokens: RewardsTokenManager;
  rateLimiter: RewardsRateLimiter;
  cache: ResponseCache;
  executor: RetryExecutor;
  orchestrator: RewardsFetchOrchestrator;
  coordinator: RewardsCoordinator;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

export function loadRewardsConfig(env: NodeJS.ProcessEnv = process.env): RewardsConfig {
  const email = env.REWARDS_EMAIL?.trim();
  const password = env.REWARDS_PASSWORD;

  return {
    credentials: email && password ? { email, password } : null,
    homeId: env.REWARDS_HOME_ID?.trim() || null,
    authUrl: env.REWARDS_AUTH_URL?.trim() || DEFAULT_AUTH_URL,
    graphqlUrl: env.REWARDS_GRAPHQL_URL?.trim() || DEFAULT_GRAPHQL_URL,
    requestTimeoutMs: parsePositiveInteger(env.REWARDS_REQUEST_TIMEOUT_MS, 20_000),
    tokenLifetimeMs: parsePositiveInteger(env.REWARDS_TOKEN_LIFETIME_MINUTES, 60) * 60 * 1000,
    tokenRefreshBufferMs: parseNonNegativeInteger(env.REWARDS_TOKEN_REFRESH_BUFFER_MINUTES, 10) * 60 * 1000,
    scanIntervalMinutes: parsePositiveLimit(env.REWARDS_SCAN_INTERVAL_MINUTES, 15, 59),
    deviceScanIntervalHours: parsePositiveLimit(env.REWARDS_DEVICE_SCAN_INTERVAL_HOURS, 12, 23),
    categories: parseCategories(env.REWARDS_CATEGORIES),
    statePath: env.REWARDS_STATE_PATH?.trim() || path.join(process.cwd(), 'data', 'rewards-state.json'),
    hourly: {
      capacity: parsePositiveInteger(env.RATE_LIMIT_HOURLY, 80),
      windowMs: 60 * 60 * 1000
    },
    burst: {
      capacity: parsePositiveInteger(env.RATE_LIMIT_BURST, 20),
      windowMs: parsePositiveInteger(env.RATE_LIMIT_BURST_WINDOW_MINUTES, 15) * 60 * 1000
    },
    persistIntervalMs: parsePositiveInteger(env.RATE_LIMIT_PERSIST_INTERVAL_SECONDS, 60) * 1000,
    retry: {
      maxAttempts: parsePositiveInteger(env.RETRY_MAX_ATTEMPTS, 3),
      baseDelayMs: parsePositiveInteger(env.RETRY_BASE_DELAY_MS, 1_000),
      maxDelayMs: parsePositiveInteger(env.RETRY_MAX_DELAY_MS, 60_000),
      jitterRatio: parseRatio(env.RETRY_JITTER_RATIO, 0.3)
    },
    port: parsePositiveLimit(env.PORT, 3000, 65_535)
  };
}

/** Builds every collaborator explicitly; nothing here is a module singleton. */
export function createRewardsRuntime(
  config: RewardsConfig,
  overrides: RewardsRuntimeOverrides = {}
): RewardsRuntime {
  const clock = overrides.clock ?? Date.now;

  const client = createRewardsApiClient({
    authUrl: config.authUrl,
    graphqlUrl: config.graphqlUrl,
    requestTimeoutMs: config.requestTimeoutMs,
    tokenLifetimeMs: config.tokenLifetimeMs,
    fetchImpl: overrides.fetchImpl,
    clock
  });

  const credentials = config.credentials;
  const authenticator = credentials
    ? createCredentialsAuthenticator({ client, getCredentials: () => credentials })
    : createDisabledAuthenticator();

  const tokens = createRewardsTokenManager({
    authenticator,
    refreshBufferMs: config.tokenRefreshBufferMs,
    clock
  });

  const rateLimiter = createRewardsRateLimiter({
    hourly: config.hourly,
    burst: config.burst,
    store: overrides.stateStore ?? new JsonFileLimiterStateStore(config.statePath),
    persistIntervalMs: config.persistIntervalMs,
    clock,
    sleep: overrides.sleep
  });

  const cache = createResponseCache({ clock });

  const executor = createRetryExecutor({
    tokens,
    rateLimiter,
    policy: config.retry,
    clock,
    sleep: overrides.sleep,
    random: overrides.random
  });

  const orchestrator = createRewardsFetchOrchestrator({
    client,
    executor,
    cache,
    tokens,
    rateLimiter,
    clock
  });

  const coordinator = createRewardsCoordinator({
    orchestrator,
    homeId: config.homeId,
    categories: config.categories,
    clock
  });

  let stopped = false;

  rewardsLogger.info('[RewardsRuntime] Runtime initialized', {
    authenticator: authenticator.name,
    homeId: config.homeId ? redactId(config.homeId) : null,
    categories: config.categories,
    statePath: config.statePath
  });

  return {
    config,
    client,
    tokens,
    rateLimiter,
    cache,
    executor,
    orchestrator,
    coordinator,
    async start() {
      await rateLimiter.load();
      rateLimiter.startPersisting();
    },
    async shutdown() {
      if (stopped) {
        return;
      }
      stopped = true;

      rateLimiter.stopPersisting();
      orchestrator.shutdown();
      tokens.shutdown();
      cache.close();
      try {
        await rateLimiter.flush();
      } catch (error) {
        rewardsLogger.warn('[RewardsRuntime] Failed to flush rate limiter state', {
          error: describeError(error)
        });
      }
      rewardsLogger.info('[RewardsRuntime] Shut down');
    }
  };
}

export function parsePositiveInteger(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw || '', 10);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return value;
}

export function parseNonNegativeInteger(raw: string | undefined, fallback: number): number {
  const value = Number.parseInt(raw || '', 10);
  if (!Number.isFinite(value) || value < 0) {
    return fallback;
  }
  return value;
}

export function parsePositiveLimit(raw: string | undefined, fallback: number, max: number): number {
  const value = Number.parseInt(raw || '', 10);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.min(value, max);
}

/** A number in `[0, 1]`. */
export function parseRatio(raw: string | undefined, fallback: number): number {
  const value = Number.parseFloat(raw || '');
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    return fallback;
  }
  return value;
}
