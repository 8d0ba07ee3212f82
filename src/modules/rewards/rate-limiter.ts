import type { LimiterStateStore } from './limiter-state-store.js';
import type {
  Clock,
  RateDecision,
  RateLimiterSnapshot,
  RateLimiterState,
  RateWindowConfig,
  RateWindowOccupancy,
  Sleeper
} from './types.js';
import { rewardsLogger, sleep as defaultSleep, throwIfCancelled } from './utils.js';

// Official limit is 100/hour; stay below it.
const DEFAULT_HOURLY: RateWindowConfig = { capacity: 80, windowMs: 60 * 60 * 1000 };
const DEFAULT_BURST: RateWindowConfig = { capacity: 20, windowMs: 15 * 60 * 1000 };
const DEFAULT_PERSIST_INTERVAL_MS = 60 * 1000;

interface RateLimiterConfig {
  hourly?: RateWindowConfig;
  burst?: RateWindowConfig;
  store?: LimiterStateStore;
  persistIntervalMs?: number;
  clock?: Clock;
  sleep?: Sleeper;
}

interface AcquireOptions {
  signal?: AbortSignal;
  onDenied?: (retryAfterMs: number) => void;
}

class RateWindow {
  count = 0;

  constructor(
    readonly capacity: number,
    readonly windowMs: number,
    public start: number
  ) {}

  /** Starts a fresh window once the current one has run its length. */
  roll(now: number): void {
    if (now - this.start >= this.windowMs || now < this.start) {
      this.count = 0;
      this.start = now;
    }
  }

  isFull(): boolean {
    return this.count >= this.capacity;
  }

  resetsIn(now: number): number {
    return Math.max(1, this.start + this.windowMs - now);
  }

  occupancy(now: number): RateWindowOccupancy {
    const expired = now - this.start >= this.windowMs || now < this.start;
    return {
      count: expired ? 0 : this.count,
      capacity: this.capacity,
      windowStart: expired ? now : this.start,
      resetsInMs: expired ? this.windowMs : this.resetsIn(now)
    };
  }
}

/**
 * Hourly plus burst window limiter. `tryAcquire` is synchronous, so the
 * read-then-increment on both counters cannot interleave with another caller.
 */
export class RewardsRateLimiter {
  private readonly hourly: RateWindow;
  private readonly burst: RateWindow;
  private readonly store: LimiterStateStore | null;
  private readonly persistIntervalMs: number;
  private readonly clock: Clock;
  private readonly sleep: Sleeper;
  private dirty = false;
  private lastPersistedAt: number | null = null;
  private persistTimer: NodeJS.Timeout | null = null;

  constructor(config: RateLimiterConfig = {}) {
    this.clock = config.clock ?? Date.now;
    this.sleep = config.sleep ?? defaultSleep;
    const now = this.clock();
    const hourly = normalizeWindow(config.hourly ?? DEFAULT_HOURLY);
    const burst = normalizeWindow(config.burst ?? DEFAULT_BURST);
    this.hourly = new RateWindow(hourly.capacity, hourly.windowMs, now);
    this.burst = new RateWindow(burst.capacity, burst.windowMs, now);
    this.store = config.store ?? null;
    this.persistIntervalMs = Math.max(config.persistIntervalMs ?? DEFAULT_PERSIST_INTERVAL_MS, 1_000);
  }

  /** Restores counters written by a previous process. */
  async load(): Promise<void> {
    if (!this.store) {
      return;
    }

    try {
      const state = await this.store.load();
      if (!state) {
        rewardsLogger.debug('[RateLimiter] No stored state, starting with empty windows');
        return;
      }

      this.hourly.count = clampCount(state.hourlyCount, this.hourly.capacity);
      this.hourly.start = state.hourlyWindowStart;
      this.burst.count = clampCount(state.burstCount, this.burst.capacity);
      this.burst.start = state.burstWindowStart;

      const now = this.clock();
      this.hourly.roll(now);
      this.burst.roll(now);

      rewardsLogger.info('[RateLimiter] Restored state', {
        hourlyCount: this.hourly.count,
        burstCount: this.burst.count
      });
    } catch (error) {
      rewardsLogger.warn('[RateLimiter] Failed to restore state', {
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }

  tryAcquire(): RateDecision {
    const now = this.clock();
    this.hourly.roll(now);
    this.burst.roll(now);

    if (!this.hourly.isFull() && !this.burst.isFull()) {
      this.hourly.count += 1;
      this.burst.count += 1;
      this.dirty = true;
      return { admitted: true };
    }

    // Admission needs both windows, so the later reset of the full ones is the earliest useful retry.
    const retryAfterMs = Math.max(
      ...[this.hourly, this.burst].filter((window) => window.isFull()).map((window) => window.resetsIn(now))
    );
    return { admitted: false, retryAfterMs };
  }

  /** Waits through denials until admitted. */
  async acquire(options: AcquireOptions = {}): Promise<void> {
    for (;;) {
      throwIfCancelled(options.signal);
      const decision = this.tryAcquire();
      if (decision.admitted) {
        return;
      }

      rewardsLogger.debug('[RateLimiter] Capacity exhausted, waiting', {
        retryAfterMs: decision.retryAfterMs
      });
      options.onDenied?.(decision.retryAfterMs);
      await this.sleep(decision.retryAfterMs, options.signal);
    }
  }

  state(): RateLimiterState {
    return {
      hourlyCount: this.hourly.count,
      hourlyWindowStart: this.hourly.start,
      burstCount: this.burst.count,
      burstWindowStart: this.burst.start
    };
  }

  snapshot(): RateLimiterSnapshot {
    const now = this.clock();
    return {
      hourly: this.hourly.occupancy(now),
      burst: this.burst.occupancy(now),
      lastPersistedAt: this.lastPersistedAt
    };
  }

  /** Saves unsaved counters every `persistIntervalMs` until `stopPersisting`. */
  startPersisting(): void {
    if (!this.store || this.persistTimer) {
      return;
    }

    this.persistTimer = setInterval(() => {
      this.flush().catch((error) => {
        rewardsLogger.warn('[RateLimiter] Failed to save state', {
          error: error instanceof Error ? error.message : String(error)
        });
      });
    }, this.persistIntervalMs);
    this.persistTimer.unref();
  }

  stopPersisting(): void {
    if (this.persistTimer) {
      clearInterval(this.persistTimer);
      this.persistTimer = null;
    }
  }

  async flush(): Promise<void> {
    if (!this.store || !this.dirty) {
      return;
    }

    const state = this.state();
    this.dirty = false;
    try {
      await this.store.save(state);
      this.lastPersistedAt = this.clock();
      rewardsLogger.debug('[RateLimiter] Saved state', { ...state });
    } catch (error) {
      this.dirty = true;
      throw error;
    }
  }

  reset(): void {
    const now = this.clock();
    this.hourly.count = 0;
    this.hourly.start = now;
    this.burst.count = 0;
    this.burst.start = now;
    this.dirty = true;
  }
}

export function createRewardsRateLimiter(config: RateLimiterConfig = {}): RewardsRateLimiter {
  return new RewardsRateLimiter(config);
}

function normalizeWindow(window: RateWindowConfig): RateWindowConfig {
  return {
    capacity: Math.max(1, Math.floor(window.capacity)),
    windowMs: Math.max(1, window.windowMs)
  };
}

function clampCount(value: number, capacity: number): number {
  return Math.min(capacity, Math.max(0, Math.floor(value)));
}
