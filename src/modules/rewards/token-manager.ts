import { CredentialsInvalidError, RemoteApiError } from './errors.js';
import type {
  Clock,
  IssuedToken,
  RewardsAuthenticator,
  RewardsToken,
  TokenRefreshReason,
  TokenStatus
} from './types.js';
import { raceWithSignal, rewardsLogger, throwIfCancelled } from './utils.js';

const DEFAULT_REFRESH_BUFFER_MS = 10 * 60 * 1000;

interface TokenManagerConfig {
  authenticator: RewardsAuthenticator;
  refreshBufferMs?: number;
  clock?: Clock;
}

/**
 * Owns the bearer token. Concurrent callers that find it missing or close to
 * expiry share one authentication exchange.
 */
export class RewardsTokenManager {
  private readonly authenticator: RewardsAuthenticator;
  private readonly refreshBufferMs: number;
  private readonly clock: Clock;
  private readonly lifecycle = new AbortController();
  private token: RewardsToken | null = null;
  private refreshPromise: Promise<RewardsToken> | null = null;
  private credentialsError: CredentialsInvalidError | null = null;
  private lastAuthenticatedAt: number | null = null;
  private authentications = 0;

  constructor(config: TokenManagerConfig) {
    this.authenticator = config.authenticator;
    this.refreshBufferMs = Math.max(config.refreshBufferMs ?? DEFAULT_REFRESH_BUFFER_MS, 0);
    this.clock = config.clock ?? Date.now;
  }

  /** True while `now < expiresAt - refreshBuffer`. */
  isUsable(token: RewardsToken | null = this.token): boolean {
    return !!token && this.clock() < token.expiresAt - this.refreshBufferMs;
  }

  async getValidToken(signal?: AbortSignal): Promise<RewardsToken> {
    throwIfCancelled(signal);

    const current = this.token;
    if (current && this.isUsable(current)) {
      return current;
    }

    return raceWithSignal(this.refresh(current ? 'expired' : 'missing'), signal);
  }

  /**
   * Called after the remote refused `rejected`. Callers holding the same stale
   * token collapse onto one exchange; a caller arriving after the swap gets the
   * replacement without another round-trip.
   */
  async invalidate(rejected: RewardsToken, signal?: AbortSignal): Promise<RewardsToken> {
    throwIfCancelled(signal);

    if (this.refreshPromise) {
      return raceWithSignal(this.refreshPromise, signal);
    }

    const current = this.token;
    if (current && current.value !== rejected.value && this.isUsable(current)) {
      return current;
    }

    this.token = null;
    return raceWithSignal(this.refresh('rejected'), signal);
  }

  refresh(reason: TokenRefreshReason = 'forced'): Promise<RewardsToken> {
    if (this.credentialsError) {
      return Promise.reject(this.credentialsError);
    }
    if (this.refreshPromise) {
      return this.refreshPromise;
    }

    this.refreshPromise = this.performRefresh(reason).finally(() => {
      this.refreshPromise = null;
    });

    return this.refreshPromise;
  }

  status(): TokenStatus {
    return {
      hasToken: !!this.token,
      expiresAt: this.token?.expiresAt ?? null,
      lastAuthenticatedAt: this.lastAuthenticatedAt,
      authentications: this.authentications,
      refreshing: !!this.refreshPromise,
      credentialsRejected: !!this.credentialsError
    };
  }

  /** Drops the token and forgets a previous credential rejection. */
  reset(): void {
    this.token = null;
    this.credentialsError = null;
  }

  shutdown(): void {
    this.lifecycle.abort();
  }

  private async performRefresh(reason: TokenRefreshReason): Promise<RewardsToken> {
    if ((reason === 'missing' || reason === 'expired') && this.token && this.isUsable(this.token)) {
      return this.token;
    }

    rewardsLogger.info('[RewardsAuth] Authenticating', {
      reason,
      authenticator: this.authenticator.name
    });

    let issued: IssuedToken;
    try {
      issued = await this.authenticator.authenticate({ reason, signal: this.lifecycle.signal });
    } catch (error) {
      if (error instanceof CredentialsInvalidError) {
        this.credentialsError = error;
        this.token = null;
      }
      rewardsLogger.error('[RewardsAuth] Authentication failed', {
        reason,
        authenticator: this.authenticator.name,
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }

    const now = this.clock();
    const value = issued.token.trim();
    if (!value) {
      throw new RemoteApiError('Authenticator returned an empty token');
    }
    if (issued.expiresAt - this.refreshBufferMs <= now) {
      rewardsLogger.warn('[RewardsAuth] Issued token expires inside the refresh buffer', {
        expiresAt: new Date(issued.expiresAt).toISOString()
      });
    }

    this.token = {
      value,
      expiresAt: issued.expiresAt,
      obtainedAt: now
    };
    this.lastAuthenticatedAt = now;
    this.authentications += 1;

    rewardsLogger.info('[RewardsAuth] Authenticated', {
      reason,
      authenticator: this.authenticator.name,
      expiresAt: new Date(issued.expiresAt).toISOString()
    });

    return this.token;
  }
}

export function createRewardsTokenManager(config: TokenManagerConfig): RewardsTokenManager {
  return new RewardsTokenManager(config);
}
