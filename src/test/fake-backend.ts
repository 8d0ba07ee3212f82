import { DEFAULT_AUTH_URL, DEFAULT_GRAPHQL_URL, type FetchLike } from '../modules/rewards/rewards-client.js';
import type { LimiterStateStore } from '../modules/rewards/limiter-state-store.js';
import { createRewardsRuntime, loadRewardsConfig, type RewardsRuntime } from '../modules/rewards/runtime.js';
import type { RateLimiterState } from '../modules/rewards/types.js';

export const HOME_ID = '5f0a8e2c-1b3d-4c5e-9f60-7a8b9c0d1e2f';
export const NOW = Date.parse('2026-10-19T12:00:00.000Z');

interface PeriodAmounts {
  vehicle: number;
  battery: number;
  total: number;
}

/** Amounts the fake backend reports, keyed by the period start it is asked for. */
export const PERIOD_AMOUNTS: Record<string, PeriodAmounts> = {
  '2026-10-19T00:00:00.000Z': { vehicle: 0.5, battery: 0.25, total: 0.75 },
  '2026-10-01T00:00:00.000Z': { vehicle: 12.5, battery: 3.25, total: 15.75 },
  '2026-09-01T00:00:00.000Z': { vehicle: 20, battery: 5, total: 25 },
  '2026-01-01T00:00:00.000Z': { vehicle: 150, battery: 40, total: 190 }
};

export interface GraphqlCall {
  query: string;
  variables: Record<string, string>;
  token: string | null;
  signal: AbortSignal | null;
}

type RewardsHandler = (call: GraphqlCall) => Response | null | Promise<Response | null>;

interface FakeBackendOptions {
  /** Return a response to override the default login reply. */
  onLogin?: (count: number) => Response | null;
  /** Return a response to override the default GraphQL reply; `null` falls through. */
  onGraphql?: RewardsHandler;
}

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers }
  });
}

/** In-process stand-in for the login and GraphQL endpoints. */
export function createFakeBackend(options: FakeBackendOptions = {}) {
  let logins = 0;
  const graphqlCalls: GraphqlCall[] = [];

  const fetchImpl: FetchLike = async (url, init) => {
    if (url === DEFAULT_AUTH_URL) {
      logins += 1;
      return options.onLogin?.(logins) ?? jsonResponse({ token: `token-${logins}` });
    }
    if (url !== DEFAULT_GRAPHQL_URL) {
      return new Response('not found', { status: 404 });
    }

    const call = readGraphqlCall(init);
    graphqlCalls.push(call);

    const override = options.onGraphql ? await options.onGraphql(call) : null;
    if (override) {
      return override;
    }
    return defaultGraphqlReply(call);
  };

  return {
    fetchImpl,
    graphqlCalls,
    get logins() {
      return logins;
    },
    get networkCalls() {
      return logins + graphqlCalls.length;
    }
  };
}

interface TestRuntimeOptions extends FakeBackendOptions {
  env?: NodeJS.ProcessEnv;
  stateStore?: LimiterStateStore;
}

/**
 * Full runtime over the fake backend with a manual clock. `sleep` advances the
 * clock instead of waiting.
 */
export function createTestRuntime(options: TestRuntimeOptions = {}) {
  let now = NOW;
  const backend = createFakeBackend(options);
  const sleeps: number[] = [];
  const config = loadRewardsConfig({
    REWARDS_EMAIL: 'user@example.com',
    REWARDS_PASSWORD: 'test-secret',
    REWARDS_HOME_ID: HOME_ID,
    ...options.env
  });

  const runtime: RewardsRuntime = createRewardsRuntime(config, {
    fetchImpl: backend.fetchImpl,
    stateStore: options.stateStore ?? new MemoryLimiterStateStore(),
    clock: () => now,
    sleep: async (ms) => {
      sleeps.push(ms);
      now += ms;
    },
    random: () => 0.5
  });

  return {
    runtime,
    backend,
    sleeps,
    advance(ms: number) {
      now += ms;
    },
    get now() {
      return now;
    }
  };
}

/** Limiter state kept in memory; `saved` is the last state written. */
export class MemoryLimiterStateStore implements LimiterStateStore {
  saves = 0;

  constructor(public saved: RateLimiterState | null = null) {}

  async load(): Promise<RateLimiterState | null> {
    return this.saved;
  }

  async save(state: RateLimiterState): Promise<void> {
    this.saves += 1;
    this.saved = { ...state };
  }
}

/** Resolves only when the request signal aborts, like a hung connection. */
export function hangUntilAborted(signal: AbortSignal | null): Promise<Response> {
  return new Promise((_resolve, reject) => {
    signal?.addEventListener('abort', () => reject(new DOMException('This operation was aborted', 'AbortError')), {
      once: true
    });
  });
}

function defaultGraphqlReply(call: GraphqlCall): Response {
  if (call.query.includes('gridRewardsHistoryPeriod')) {
    const amounts = PERIOD_AMOUNTS[call.variables.fromDate ?? ''];
    return jsonResponse({
      data: {
        me: {
          home: {
            gridRewardsHistoryPeriod: amounts
              ? {
                  from: call.variables.fromDate,
                  to: call.variables.toDate,
                  vehicleRewards: amounts.vehicle,
                  batteryRewards: amounts.battery,
                  totalReward: amounts.total,
                  currency: 'SEK'
                }
              : null
          }
        }
      }
    });
  }

  if (call.query.includes('gizmos')) {
    return jsonResponse({
      data: {
        me: {
          home: {
            gizmos: [
              { __typename: 'Gizmo', id: 'ev-1', title: 'Car', type: 'ELECTRIC_VEHICLE', isHidden: false },
              { __typename: 'Gizmo', id: 'battery-1', title: 'Battery', type: 'BATTERY', isHidden: false },
              { __typename: 'Gizmo', id: 'thermostat-1', title: 'Hallway', type: 'THERMOSTAT', isHidden: false }
            ]
          }
        }
      }
    });
  }

  return jsonResponse({
    data: {
      me: {
        homes: [
          {
            id: HOME_ID,
            timeZone: 'Europe/Stockholm',
            hasSmartMeterCapabilities: true,
            hasSignedEnergyDeal: true,
            hasConsumption: true
          }
        ]
      }
    }
  });
}

function readGraphqlCall(init: RequestInit): GraphqlCall {
  const parsed: unknown = typeof init.body === 'string' ? JSON.parse(init.body) : {};
  const query = isObject(parsed) && typeof parsed.query === 'string' ? parsed.query : '';
  const variables: Record<string, string> = {};
  const rawVariables = isObject(parsed) ? parsed.variables : undefined;
  if (isObject(rawVariables)) {
    for (const [key, value] of Object.entries(rawVariables)) {
      if (typeof value === 'string') {
        variables[key] = value;
      }
    }
  }

  const authorization = new Headers(init.headers).get('Authorization');
  return {
    query,
    variables,
    token: authorization ? authorization.replace(/^Bearer /, '') : null,
    signal: init.signal ?? null
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}
