import {
  CancelledError,
  CredentialsInvalidError,
  RemoteApiError,
  RemoteRateLimitedError,
  TokenRejectedError,
  TransientNetworkError
} from './errors.js';
import type {
  Clock,
  GridRewardsBreakdown,
  IssuedToken,
  RewardCredentials,
  RewardsDevice,
  RewardsHome
} from './types.js';
import { linkSignals, rewardsLogger } from './utils.js';

export const DEFAULT_AUTH_URL = 'https://app.tibber.com/login.credentials';
export const DEFAULT_GRAPHQL_URL = 'https://app.tibber.com/v4/gql';
const DEFAULT_TIMEOUT_MS = 20_000;
const DEFAULT_TOKEN_LIFETIME_MS = 60 * 60 * 1000;

export const HOMES_QUERY = `
{
  me {
    homes {
      id
      timeZone
      hasSmartMeterCapabilities
      hasSignedEnergyDeal
      hasConsumption
    }
  }
}
`;

export const DEVICES_QUERY = `
query GetGizmos($homeId: String!) {
  me {
    home(id: $homeId) {
      gizmos {
        __typename
        ... on Gizmo {
          id
          title
          type
          isHidden
        }
      }
    }
  }
}
`;

// The API only honours monthly resolution.
export const GRID_REWARDS_QUERY = `
query GetGridRewards($homeId: String!, $fromDate: String!, $toDate: String!) {
  me {
    home(id: $homeId) {
      gridRewardsHistoryPeriod(
        from: $fromDate,
        to: $toDate,
        resolution: monthly
      ) {
        from
        to
        batteryRewards
        vehicleRewards
        totalReward
        currency
      }
    }
  }
}
`;

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RewardsApiClientConfig {
  authUrl?: string;
  graphqlUrl?: string;
  requestTimeoutMs?: number;
  tokenLifetimeMs?: number;
  fetchImpl?: FetchLike;
  clock?: Clock;
}

export interface GridRewardsQuery {
  homeId: string;
  from: string;
  to: string;
}

/**
 * Thin transport over the rewards backend. Every failure is mapped onto the
 * error taxonomy; retrying is left to the caller.
 */
export class RewardsApiClient {
  private readonly authUrl: string;
  private readonly graphqlUrl: string;
  private readonly requestTimeoutMs: number;
  private readonly tokenLifetimeMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;

  constructor(config: RewardsApiClientConfig = {}) {
    this.authUrl = config.authUrl || DEFAULT_AUTH_URL;
    this.graphqlUrl = config.graphqlUrl || DEFAULT_GRAPHQL_URL;
    this.requestTimeoutMs = Math.max(config.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS, 1_000);
    this.tokenLifetimeMs = Math.max(config.tokenLifetimeMs ?? DEFAULT_TOKEN_LIFETIME_MS, 60_000);
    this.fetchImpl = config.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = config.clock ?? Date.now;
  }

  async authenticate(credentials: RewardCredentials, signal?: AbortSignal): Promise<IssuedToken> {
    const email = credentials.email.trim();
    if (!email.includes('@') || !credentials.password) {
      throw new CredentialsInvalidError('Email and password are required to obtain a token');
    }

    const response = await this.send(this.authUrl, { email, password: credentials.password }, undefined, signal);

    if (response.status === 400 || response.status === 401 || response.status === 403) {
      rewardsLogger.error('[RewardsAuth] Credentials rejected', { status: response.status });
      throw new CredentialsInvalidError('Authentication failed: invalid email or password');
    }
    this.ensureSuccess(response, 'login');

    const payload = parseJson(response.body, 'login');
    const token = isRecord(payload) ? readString(payload, 'token') : null;
    if (!token || !isRecord(payload)) {
      throw new RemoteApiError('Token not received from login endpoint', response.status);
    }

    return {
      token,
      expiresAt: this.readExpiry(payload)
    };
  }

  async queryHomes(token: string, signal?: AbortSignal): Promise<RewardsHome[]> {
    const data = await this.graphql(token, HOMES_QUERY, undefined, signal);
    const homes = readPath(data, ['me', 'homes']);
    if (!Array.isArray(homes)) {
      throw new RemoteApiError('Homes response is not a list');
    }

    const valid: RewardsHome[] = [];
    for (const entry of homes) {
      const home = toHome(entry);
      if (home) {
        valid.push(home);
      } else {
        rewardsLogger.warn('[RewardsApi] Dropping malformed home entry');
      }
    }
    return valid;
  }

  async queryDevices(token: string, homeId: string, signal?: AbortSignal): Promise<RewardsDevice[]> {
    const data = await this.graphql(token, DEVICES_QUERY, { homeId }, signal);
    const devices = readPath(data, ['me', 'home', 'gizmos']);
    if (!Array.isArray(devices)) {
      throw new RemoteApiError('Devices response is not a list');
    }

    const valid: RewardsDevice[] = [];
    for (const entry of devices) {
      const device = toDevice(entry);
      if (device) {
        valid.push(device);
      } else {
        rewardsLogger.warn('[RewardsApi] Dropping malformed device entry');
      }
    }
    return valid;
  }

  async queryGridRewards(token: string, query: GridRewardsQuery, signal?: AbortSignal): Promise<GridRewardsBreakdown> {
    const data = await this.graphql(token, GRID_REWARDS_QUERY, {
      homeId: query.homeId,
      fromDate: query.from,
      toDate: query.to
    }, signal);

    const period = readPath(data, ['me', 'home', 'gridRewardsHistoryPeriod']);
    if (!isRecord(period)) {
      // The backend answers null for periods without any rewards yet.
      return {
        from: null,
        to: null,
        vehicleRewards: null,
        batteryRewards: null,
        totalReward: null,
        currency: null
      };
    }

    return {
      from: readString(period, 'from'),
      to: readString(period, 'to'),
      vehicleRewards: readNumber(period, 'vehicleRewards'),
      batteryRewards: readNumber(period, 'batteryRewards'),
      totalReward: readNumber(period, 'totalReward'),
      currency: readString(period, 'currency')
    };
  }

  private async graphql(
    token: string,
    query: string,
    variables: Record<string, string> | undefined,
    signal?: AbortSignal
  ): Promise<unknown> {
    const body: Record<string, unknown> = { query };
    if (variables) {
      body.variables = variables;
    }

    const response = await this.send(this.graphqlUrl, body, token, signal);

    if (response.status === 401) {
      throw new TokenRejectedError('Bearer token rejected by the rewards API');
    }
    if (response.status === 429) {
      const retryAfterMs = parseRetryAfter(response.retryAfter, this.clock());
      throw new RemoteRateLimitedError('Rewards API rate limit reached', retryAfterMs);
    }
    this.ensureSuccess(response, 'graphql');

    const payload = parseJson(response.body, 'graphql');
    if (!isRecord(payload)) {
      throw new RemoteApiError('GraphQL response is not an object', response.status);
    }

    const errors = payload.errors;
    if (Array.isArray(errors) && errors.length > 0) {
      const messages = errors.map((entry) => (isRecord(entry) && typeof entry.message === 'string' ? entry.message : String(entry)));
      throw new RemoteApiError(`GraphQL query failed: ${messages.join(', ')}`, response.status);
    }

    return payload.data ?? {};
  }

  private async send(
    url: string,
    body: Record<string, unknown>,
    token: string | undefined,
    signal?: AbortSignal
  ): Promise<{ status: number; body: string; retryAfter: string | null }> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const timeoutController = new AbortController();
    const timeout = setTimeout(() => timeoutController.abort(), this.requestTimeoutMs);
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      Accept: 'application/json'
    };
    if (token) {
      headers.Authorization = `Bearer ${token}`;
    }

    try {
      const response = await this.fetchImpl(url, {
        method: 'POST',
        headers,
        body: JSON.stringify(body),
        signal: linkSignals(signal, timeoutController.signal)
      });

      return {
        status: response.status,
        body: await response.text(),
        retryAfter: response.headers.get('retry-after')
      };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError('Request cancelled', { cause: error });
      }
      if (timeoutController.signal.aborted) {
        throw new TransientNetworkError(`Request timed out after ${this.requestTimeoutMs}ms`, null, { cause: error });
      }
      throw new TransientNetworkError(
        `Network request failed: ${error instanceof Error ? error.message : String(error)}`,
        null,
        { cause: error }
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  private ensureSuccess(response: { status: number; body: string }, endpoint: string) {
    if (response.status >= 500) {
      throw new TransientNetworkError(`Rewards ${endpoint} temporary server error: ${response.status}`, response.status);
    }
    if (response.status >= 400) {
      const preview = response.body.slice(0, 250);
      throw new RemoteApiError(`Rewards ${endpoint} request failed (${response.status}): ${preview}`, response.status);
    }
  }

  private readExpiry(payload: Record<string, unknown>): number {
    const now = this.clock();
    const expiresAt = payload.expiresAt;
    if (typeof expiresAt === 'string') {
      const parsed = Date.parse(expiresAt);
      if (Number.isFinite(parsed) && parsed > now) {
        return parsed;
      }
    }
    const expiresIn = readNumber(payload, 'expires_in');
    if (expiresIn !== null && expiresIn > 0) {
      return now + expiresIn * 1000;
    }
    return now + this.tokenLifetimeMs;
  }
}

export function createRewardsApiClient(config: RewardsApiClientConfig = {}): RewardsApiClient {
  return new RewardsApiClient(config);
}

export function isGridRewardsBreakdown(value: unknown): value is GridRewardsBreakdown {
  if (!isRecord(value)) {
    return false;
  }
  return (
    isNullableString(value.from) &&
    isNullableString(value.to) &&
    isNullableNumber(value.vehicleRewards) &&
    isNullableNumber(value.batteryRewards) &&
    isNullableNumber(value.totalReward) &&
    isNullableString(value.currency)
  );
}

export function isHomeList(value: unknown): value is RewardsHome[] {
  return Array.isArray(value) && value.every((entry) => toHome(entry) !== null);
}

export function isDeviceList(value: unknown): value is RewardsDevice[] {
  return Array.isArray(value) && value.every((entry) => toDevice(entry) !== null);
}

/** Retry-After is either delay-seconds or an HTTP date. */
export function parseRetryAfter(raw: string | null, now: number): number | null {
  if (!raw) {
    return null;
  }
  const seconds = Number(raw.trim());
  if (Number.isFinite(seconds) && seconds >= 0) {
    return seconds * 1000;
  }
  const date = Date.parse(raw);
  if (Number.isFinite(date)) {
    return Math.max(0, date - now);
  }
  return null;
}

function toHome(value: unknown): RewardsHome | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readString(value, 'id');
  if (!id) {
    return null;
  }
  return {
    id,
    timeZone: readString(value, 'timeZone'),
    hasSmartMeterCapabilities: value.hasSmartMeterCapabilities === true,
    hasSignedEnergyDeal: value.hasSignedEnergyDeal === true,
    hasConsumption: value.hasConsumption === true
  };
}

function toDevice(value: unknown): RewardsDevice | null {
  if (!isRecord(value)) {
    return null;
  }
  const id = readString(value, 'id');
  const type = readString(value, 'type');
  if (!id || !type) {
    return null;
  }
  return {
    id,
    type,
    title: readString(value, 'title'),
    isHidden: value.isHidden === true
  };
}

function parseJson(raw: string, endpoint: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    const preview = raw.slice(0, 200);
    throw new RemoteApiError(
      `Failed to parse ${endpoint} payload: ${error instanceof Error ? error.message : String(error)} (${preview})`
    );
  }
}

function readPath(value: unknown, keys: string[]): unknown {
  let current = value;
  for (const key of keys) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function readString(record: Record<string, unknown>, key: string): string | null {
  const value = record[key];
  return typeof value === 'string' && value.length > 0 ? value : null;
}

function readNumber(record: Record<string, unknown>, key: string): number | null {
  const value = record[key];
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isNullableString(value: unknown): boolean {
  return value === null || typeof value === 'string';
}

function isNullableNumber(value: unknown): boolean {
  return value === null || (typeof value === 'number' && Number.isFinite(value));
}
