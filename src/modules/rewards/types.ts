export type RewardCategory = 'vehicle' | 'battery' | 'total';

export type CacheKind =
  | 'home-list'
  | 'device-list'
  | 'current-day-data'
  | 'current-month-data'
  | 'historical-period-data';

export type RewardPeriodName = 'current-day' | 'current-month' | 'previous-month' | 'year';

export type TokenRefreshReason = 'missing' | 'expired' | 'rejected' | 'forced';

export type RewardsFailureKind =
  | 'credentials-invalid'
  | 'token-rejected'
  | 'rate-limited'
  | 'transient-network'
  | 'remote-error'
  | 'retry-exhausted'
  | 'cancelled'
  | 'invalid-request';

export type Clock = () => number;

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RewardCredentials {
  email: string;
  password: string;
}

export interface RewardsToken {
  value: string;
  expiresAt: number;
  obtainedAt: number;
}

export interface RewardPeriodRequest {
  homeId: string;
  category: RewardCategory;
  /** ISO-8601 instant, inclusive. */
  from: string;
  /** ISO-8601 instant, exclusive. */
  to: string;
  period?: RewardPeriodName;
}

export interface RewardValue {
  amount: number | null;
  currency: string | null;
  from: string | null;
  to: string | null;
}

export interface RewardsFailure {
  kind: RewardsFailureKind;
  message: string;
  retryable: boolean;
}

export type RewardPeriodResult =
  | {
      ok: true;
      request: RewardPeriodRequest;
      value: RewardValue;
      source: 'cache' | 'remote';
      retrievedAt: number;
    }
  | {
      ok: false;
      request: RewardPeriodRequest;
      failure: RewardsFailure;
    };

/** One remote reward period, all categories at once. */
export interface GridRewardsBreakdown {
  from: string | null;
  to: string | null;
  vehicleRewards: number | null;
  batteryRewards: number | null;
  totalReward: number | null;
  currency: string | null;
}

export interface RewardsHome {
  id: string;
  timeZone: string | null;
  hasSmartMeterCapabilities: boolean;
  hasSignedEnergyDeal: boolean;
  hasConsumption: boolean;
}

export interface RewardsDevice {
  id: string;
  type: string;
  title: string | null;
  isHidden: boolean;
}

export interface RateWindowConfig {
  capacity: number;
  windowMs: number;
}

/** Persisted rate limiter record. */
export interface RateLimiterState {
  hourlyCount: number;
  hourlyWindowStart: number;
  burstCount: number;
  burstWindowStart: number;
}

export type RateDecision = { admitted: true } | { admitted: false; retryAfterMs: number };

export interface RateWindowOccupancy {
  count: number;
  capacity: number;
  windowStart: number;
  resetsInMs: number;
}

export interface RateLimiterSnapshot {
  hourly: RateWindowOccupancy;
  burst: RateWindowOccupancy;
  lastPersistedAt: number | null;
}

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterRatio: number;
}

export type RetryEventType = 'backoff' | 'rate-limited' | 'reauthenticate' | 'exhausted';

export interface RetryEvent {
  type: RetryEventType;
  label: string;
  attempt: number;
  delayMs: number;
  reason: string;
  at: number;
}

export interface CacheStats {
  entries: number;
  hits: number;
  misses: number;
  hitRate: number;
}

export interface TokenStatus {
  hasToken: boolean;
  expiresAt: number | null;
  lastAuthenticatedAt: number | null;
  authentications: number;
  refreshing: boolean;
  credentialsRejected: boolean;
}

export interface RewardsDiagnostics {
  generatedAt: number;
  cache: CacheStats;
  rateLimiter: RateLimiterSnapshot;
  auth: TokenStatus;
  retries: RetryEvent[];
}

export interface AuthenticationContext {
  reason: TokenRefreshReason;
  signal?: AbortSignal;
}

export interface IssuedToken {
  token: string;
  expiresAt: number;
}

export interface RewardsAuthenticator {
  name: string;
  authenticate(ctx: AuthenticationContext): Promise<IssuedToken>;
}
