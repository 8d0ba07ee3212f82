import { createHash } from 'node:crypto';
import NodeCache from 'node-cache';
import type { CacheKind, CacheStats, Clock } from './types.js';
import { redactId, rewardsLogger } from './utils.js';

export type RewardsQueryKind = 'homes' | 'devices' | 'grid-rewards';

/** The logical request a cache entry answers. */
export interface CacheDescriptor {
  homeId: string | null;
  queryKind: RewardsQueryKind;
  from: string | null;
  to: string | null;
}

export interface CacheKey {
  digest: string;
  descriptor: CacheDescriptor;
}

interface CacheEntry {
  canonical: string;
  descriptor: CacheDescriptor;
  kind: CacheKind;
  value: unknown;
  storedAt: number;
  ttlMs: number;
}

export type CacheTtlTable = Record<CacheKind, number>;

const MINUTE = 60 * 1000;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

export const DEFAULT_CACHE_TTLS: CacheTtlTable = {
  'home-list': 60 * MINUTE,
  'device-list': 30 * MINUTE,
  'current-day-data': 5 * MINUTE,
  'current-month-data': 15 * MINUTE,
  'historical-period-data': 60 * MINUTE
};

interface BoundaryRule {
  /** Start of the next period after `now`, in epoch ms. */
  nextBoundary: (now: number) => number;
  withinMs: number;
  ttlMs: number;
}

/** Shorter TTLs for current data close to the end of its period. */
export const BOUNDARY_TTL_RULES: Partial<Record<CacheKind, BoundaryRule>> = {
  'current-day-data': {
    nextBoundary: (now) => {
      const date = new Date(now);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate() + 1);
    },
    withinMs: 2 * HOUR,
    ttlMs: MINUTE
  },
  'current-month-data': {
    nextBoundary: (now) => {
      const date = new Date(now);
      return Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 1);
    },
    withinMs: 3 * DAY,
    ttlMs: 5 * MINUTE
  }
};

interface ResponseCacheConfig {
  ttls?: Partial<CacheTtlTable>;
  boundaryRules?: Partial<Record<CacheKind, BoundaryRule>>;
  /** Seconds between node-cache sweeps of expired entries. */
  checkPeriodSeconds?: number;
  clock?: Clock;
}

export function buildCacheKey(descriptor: CacheDescriptor): CacheKey {
  const normalized: CacheDescriptor = {
    homeId: descriptor.homeId,
    queryKind: descriptor.queryKind,
    from: descriptor.from,
    to: descriptor.to
  };
  return {
    digest: createHash('sha256').update(canonicalize(normalized)).digest('hex'),
    descriptor: normalized
  };
}

/**
 * In-memory response cache. TTL comes from the entry's kind; every read checks
 * `now - storedAt >= ttl` against the injected clock, the node-cache sweep only
 * reclaims memory.
 */
export class ResponseCache {
  private readonly store: NodeCache;
  private readonly ttls: CacheTtlTable;
  private readonly boundaryRules: Partial<Record<CacheKind, BoundaryRule>>;
  private readonly clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(config: ResponseCacheConfig = {}) {
    this.ttls = { ...DEFAULT_CACHE_TTLS, ...config.ttls };
    this.boundaryRules = config.boundaryRules ?? BOUNDARY_TTL_RULES;
    this.clock = config.clock ?? Date.now;
    this.store = new NodeCache({
      stdTTL: 0,
      checkperiod: Math.max(config.checkPeriodSeconds ?? 120, 0),
      useClones: false
    });
  }

  /** TTL for an entry of `kind` stored at `now`; never longer than the kind's base TTL. */
  ttlFor(kind: CacheKind, now: number = this.clock()): number {
    const base = this.ttls[kind];
    const rule = this.boundaryRules[kind];
    if (rule && rule.nextBoundary(now) - now <= rule.withinMs) {
      return Math.min(base, rule.ttlMs);
    }
    return base;
  }

  get<T>(key: CacheKey, guard: (value: unknown) => value is T): T | undefined {
    const entry = this.store.get<CacheEntry>(key.digest);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }

    if (this.clock() - entry.storedAt >= entry.ttlMs) {
      this.store.del(key.digest);
      this.misses += 1;
      return undefined;
    }

    if (entry.canonical !== canonicalize(key.descriptor) || !guard(entry.value)) {
      rewardsLogger.warn('[ResponseCache] Discarding unreadable entry', {
        queryKind: key.descriptor.queryKind,
        homeId: key.descriptor.homeId ? redactId(key.descriptor.homeId) : null,
        kind: entry.kind
      });
      this.store.del(key.digest);
      this.misses += 1;
      return undefined;
    }

    this.hits += 1;
    return entry.value;
  }

  put(key: CacheKey, value: unknown, kind: CacheKind): void {
    const storedAt = this.clock();
    const ttlMs = this.ttlFor(kind, storedAt);
    const entry: CacheEntry = {
      canonical: canonicalize(key.descriptor),
      descriptor: key.descriptor,
      kind,
      value,
      storedAt,
      ttlMs
    };
    // node-cache expiry trails ours by a second so it never evicts a live entry first.
    this.store.set(key.digest, entry, Math.ceil(ttlMs / 1000) + 1);
  }

  /** Removes every entry whose descriptor matches; returns how many went. */
  invalidate(predicate: (descriptor: CacheDescriptor, kind: CacheKind) => boolean): number {
    const doomed: string[] = [];
    for (const digest of this.store.keys()) {
      const entry = this.store.get<CacheEntry>(digest);
      if (entry && predicate(entry.descriptor, entry.kind)) {
        doomed.push(digest);
      }
    }
    return doomed.length > 0 ? this.store.del(doomed) : 0;
  }

  clear(): void {
    this.store.flushAll();
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      entries: this.store.keys().length,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups
    };
  }

  close(): void {
    this.store.close();
  }
}

export function createResponseCache(config: ResponseCacheConfig = {}): ResponseCache {
  return new ResponseCache(config);
}

function canonicalize(descriptor: CacheDescriptor): string {
  return JSON.stringify([descriptor.homeId, descriptor.queryKind, descriptor.from, descriptor.to]);
}
