import { CancelledError, InvalidRequestError, describeError, toRewardsFailure } from './errors.js';
import { isRewardCategory } from './periods.js';
import type { RewardsRateLimiter } from './rate-limiter.js';
import { buildCacheKey, type CacheKey, type ResponseCache } from './response-cache.js';
import type { RetryExecutor } from './retry-executor.js';
import {
  isDeviceList,
  isGridRewardsBreakdown,
  isHomeList,
  type RewardsApiClient
} from './rewards-client.js';
import type { RewardsTokenManager } from './token-manager.js';
import type {
  CacheKind,
  Clock,
  GridRewardsBreakdown,
  RewardCategory,
  RewardPeriodRequest,
  RewardPeriodResult,
  RewardValue,
  RewardsDevice,
  RewardsDiagnostics,
  RewardsHome
} from './types.js';
import { raceWithSignal, redactId, rewardsLogger, throwIfCancelled } from './utils.js';

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_HISTORICAL_AFTER_MS = DAY_MS;

interface FetchOrchestratorConfig {
  client: RewardsApiClient;
  executor: RetryExecutor;
  cache: ResponseCache;
  tokens: RewardsTokenManager;
  rateLimiter: RewardsRateLimiter;
  /** A period whose end lies further back than this is cached as historical. */
  historicalAfterMs?: number;
  clock?: Clock;
}

interface FetchOptions {
  signal?: AbortSignal;
}

/**
 * Entry point for reward lookups. Each period goes cache, then limiter,
 * token and retry; periods never share a failure.
 */
export class RewardsFetchOrchestrator {
  private readonly client: RewardsApiClient;
  private readonly executor: RetryExecutor;
  private readonly cache: ResponseCache;
  private readonly tokens: RewardsTokenManager;
  private readonly rateLimiter: RewardsRateLimiter;
  private readonly historicalAfterMs: number;
  private readonly clock: Clock;
  private readonly lifecycle = new AbortController();
  private readonly rewardFlights = new Map<string, Promise<GridRewardsBreakdown>>();
  private readonly homeFlights = new Map<string, Promise<RewardsHome[]>>();
  private readonly deviceFlights = new Map<string, Promise<RewardsDevice[]>>();

  constructor(config: FetchOrchestratorConfig) {
    this.client = config.client;
    this.executor = config.executor;
    this.cache = config.cache;
    this.tokens = config.tokens;
    this.rateLimiter = config.rateLimiter;
    this.historicalAfterMs = Math.max(config.historicalAfterMs ?? DEFAULT_HISTORICAL_AFTER_MS, 0);
    this.clock = config.clock ?? Date.now;
  }

  get closed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  /** Runs every request concurrently; the map holds one result per request. */
  async fetchAll(
    requests: readonly RewardPeriodRequest[],
    options: FetchOptions = {}
  ): Promise<Map<RewardPeriodRequest, RewardPeriodResult>> {
    const settled = await Promise.all(requests.map((request) => this.fetchOne(request, options)));

    const results = new Map<RewardPeriodRequest, RewardPeriodResult>();
    for (const result of settled) {
      results.set(result.request, result);
    }

    const failed = settled.filter((result) => !result.ok).length;
    rewardsLogger.info('[Orchestrator] Fetched reward periods', {
      requested: requests.length,
      succeeded: settled.length - failed,
      failed
    });
    return results;
  }

  /** Never rejects: failures come back as `{ ok: false }`. */
  async fetchOne(request: RewardPeriodRequest, options: FetchOptions = {}): Promise<RewardPeriodResult> {
    try {
      throwIfCancelled(this.lifecycle.signal);
      const { from, to } = validatePeriodRequest(request);
      const key = buildCacheKey({ homeId: request.homeId, queryKind: 'grid-rewards', from, to });

      const cached = this.cache.get(key, isGridRewardsBreakdown);
      if (cached) {
        rewardsLogger.debug('[Orchestrator] Cache hit', {
          homeId: redactId(request.homeId),
          from,
          to
        });
        return {
          ok: true,
          request,
          value: pickCategory(cached, request.category),
          source: 'cache',
          retrievedAt: this.clock()
        };
      }

      const breakdown = await this.loadShared(
        this.rewardFlights,
        key,
        (signal) =>
          this.executor.execute(
            (token, attemptSignal) =>
              this.client.queryGridRewards(token.value, { homeId: request.homeId, from, to }, attemptSignal),
            { signal, label: `grid-rewards ${from}..${to}` }
          ),
        (value) => this.cache.put(key, value, this.periodKind(from, to)),
        options.signal
      );

      return {
        ok: true,
        request,
        value: pickCategory(breakdown, request.category),
        source: 'remote',
        retrievedAt: this.clock()
      };
    } catch (error) {
      const failure = toRewardsFailure(this.closed && !(error instanceof InvalidRequestError) ? new CancelledError() : error);
      rewardsLogger.warn('[Orchestrator] Reward period failed', {
        homeId: redactId(request.homeId),
        period: request.period ?? null,
        category: request.category,
        kind: failure.kind,
        error: failure.message
      });
      return { ok: false, request, failure };
    }
  }

  async fetchHomes(options: FetchOptions = {}): Promise<RewardsHome[]> {
    throwIfCancelled(this.lifecycle.signal);
    const key = buildCacheKey({ homeId: null, queryKind: 'homes', from: null, to: null });

    const cached = this.cache.get(key, isHomeList);
    if (cached) {
      return [...cached];
    }

    const homes = await this.loadShared(
      this.homeFlights,
      key,
      (signal) =>
        this.executor.execute((token, attemptSignal) => this.client.queryHomes(token.value, attemptSignal), {
          signal,
          label: 'homes'
        }),
      (loaded) => this.cache.put(key, loaded, 'home-list'),
      options.signal
    );
    // The cache holds the array itself; callers get their own copy.
    return [...homes];
  }

  async fetchDevices(homeId: string, options: FetchOptions = {}): Promise<RewardsDevice[]> {
    throwIfCancelled(this.lifecycle.signal);
    assertHomeId(homeId);
    const key = buildCacheKey({ homeId, queryKind: 'devices', from: null, to: null });

    const cached = this.cache.get(key, isDeviceList);
    if (cached) {
      return [...cached];
    }

    const devices = await this.loadShared(
      this.deviceFlights,
      key,
      (signal) =>
        this.executor.execute(
          (token, attemptSignal) => this.client.queryDevices(token.value, homeId, attemptSignal),
          { signal, label: 'devices' }
        ),
      (loaded) => this.cache.put(key, loaded, 'device-list'),
      options.signal
    );
    return [...devices];
  }

  clearCache(): void {
    const { entries } = this.cache.stats();
    this.cache.clear();
    rewardsLogger.info('[Orchestrator] Cache cleared', { entries });
  }

  invalidateHome(homeId: string): number {
    const removed = this.cache.invalidate((descriptor) => descriptor.homeId === homeId);
    rewardsLogger.info('[Orchestrator] Invalidated cached home data', {
      homeId: redactId(homeId),
      removed
    });
    return removed;
  }

  diagnostics(): RewardsDiagnostics {
    return {
      generatedAt: this.clock(),
      cache: this.cache.stats(),
      rateLimiter: this.rateLimiter.snapshot(),
      auth: this.tokens.status(),
      retries: this.executor.recentEvents()
    };
  }

  /** Aborts in-flight fetches; they settle as `cancelled`. */
  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.lifecycle.abort();
    rewardsLogger.info('[Orchestrator] Shut down', {
      inFlight: this.rewardFlights.size + this.homeFlights.size + this.deviceFlights.size
    });
  }

  private periodKind(from: string, to: string): CacheKind {
    const end = Date.parse(to);
    if (end < this.clock() - this.historicalAfterMs) {
      return 'historical-period-data';
    }
    return end - Date.parse(from) <= DAY_MS ? 'current-day-data' : 'current-month-data';
  }

  /**
   * Concurrent misses on one key share a single remote call. The shared call
   * runs under the orchestrator lifecycle; a caller's own signal only stops
   * that caller waiting.
   */
  private loadShared<T>(
    flights: Map<string, Promise<T>>,
    key: CacheKey,
    load: (signal: AbortSignal) => Promise<T>,
    store: (value: T) => void,
    callerSignal?: AbortSignal
  ): Promise<T> {
    const existing = flights.get(key.digest);
    if (existing) {
      return raceWithSignal(existing, callerSignal);
    }

    const pending = load(this.lifecycle.signal)
      .then((value) => {
        store(value);
        return value;
      })
      .finally(() => {
        flights.delete(key.digest);
      });

    flights.set(key.digest, pending);
    void pending.catch((error: unknown) => {
      rewardsLogger.debug('[Orchestrator] Shared fetch failed', {
        queryKind: key.descriptor.queryKind,
        error: describeError(error)
      });
    });
    return raceWithSignal(pending, callerSignal);
  }
}

export function createRewardsFetchOrchestrator(config: FetchOrchestratorConfig): RewardsFetchOrchestrator {
  return new RewardsFetchOrchestrator(config);
}

export function isHomeIdValid(homeId: string): boolean {
  return UUID_PATTERN.test(homeId);
}

export function pickCategory(breakdown: GridRewardsBreakdown, category: RewardCategory): RewardValue {
  const amount =
    category === 'vehicle'
      ? breakdown.vehicleRewards
      : category === 'battery'
        ? breakdown.batteryRewards
        : breakdown.totalReward;

  return {
    amount,
    currency: breakdown.currency,
    from: breakdown.from,
    to: breakdown.to
  };
}

/** Returns the period bounds normalized to canonical ISO form. */
export function validatePeriodRequest(request: RewardPeriodRequest): { from: string; to: string } {
  assertHomeId(request.homeId);
  if (!isRewardCategory(request.category)) {
    throw new InvalidRequestError(`Unknown reward category: ${String(request.category)}`);
  }

  const from = Date.parse(request.from);
  const to = Date.parse(request.to);
  if (!Number.isFinite(from) || !Number.isFinite(to)) {
    throw new InvalidRequestError('Period bounds must be ISO-8601 instants');
  }
  if (from >= to) {
    throw new InvalidRequestError('Period start must be before its end');
  }

  return { from: new Date(from).toISOString(), to: new Date(to).toISOString() };
}

function assertHomeId(homeId: string): void {
  if (!isHomeIdValid(homeId)) {
    throw new InvalidRequestError('Home id must be a UUID');
  }
}
