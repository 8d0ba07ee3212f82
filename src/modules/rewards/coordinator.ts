import { InvalidRequestError, describeError, toRewardsFailure } from './errors.js';
import type { RewardsFetchOrchestrator } from './fetch-orchestrator.js';
import { REWARD_CATEGORIES, buildPeriodRequest, buildStandardPeriods } from './periods.js';
import type {
  Clock,
  RewardCategory,
  RewardPeriodName,
  RewardPeriodResult,
  RewardsDevice,
  RewardsFailure
} from './types.js';
import { redactId, rewardsLogger } from './utils.js';

export const DEVICE_TYPES_OF_INTEREST = [
  'REAL_TIME_METER',
  'INVERTER',
  'BATTERY',
  'ELECTRIC_VEHICLE',
  'EV_CHARGER'
] as const;

export type DeviceTypeOfInterest = (typeof DEVICE_TYPES_OF_INTEREST)[number];

export type DeviceGroups = Record<DeviceTypeOfInterest, RewardsDevice[]>;

export interface RewardSnapshotEntry {
  period: RewardPeriodName;
  category: RewardCategory;
  amount: number | null;
  currency: string | null;
  from: string | null;
  to: string | null;
  /** When the value was last fetched successfully. */
  updatedAt: number | null;
  stale: boolean;
  failure: RewardsFailure | null;
}

export interface RewardsSnapshot {
  homeId: string | null;
  currency: string | null;
  lastRefreshAt: number | null;
  lastSuccessAt: number | null;
  entries: RewardSnapshotEntry[];
  devices: DeviceGroups;
  devicesUpdatedAt: number | null;
  devicesStale: boolean;
}

interface RewardsCoordinatorConfig {
  orchestrator: RewardsFetchOrchestrator;
  homeId?: string | null;
  categories?: readonly RewardCategory[];
  clock?: Clock;
}

/**
 * Poll consumer. Keeps the last good value per period and category; a failed
 * refresh marks entries stale instead of clearing them.
 */
export class RewardsCoordinator {
  private readonly orchestrator: RewardsFetchOrchestrator;
  private readonly categories: readonly RewardCategory[];
  private readonly clock: Clock;
  private readonly entries = new Map<string, RewardSnapshotEntry>();
  private homeId: string | null;
  private currency: string | null = null;
  private lastRefreshAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private devices: DeviceGroups = emptyDeviceGroups();
  private devicesUpdatedAt: number | null = null;
  private devicesStale = false;
  private rewardsRefresh: Promise<RewardsSnapshot> | null = null;

  constructor(config: RewardsCoordinatorConfig) {
    this.orchestrator = config.orchestrator;
    this.homeId = config.homeId?.trim() || null;
    this.categories = config.categories && config.categories.length > 0 ? config.categories : REWARD_CATEGORIES;
    this.clock = config.clock ?? Date.now;
  }

  /** Overlapping calls share one pass. */
  refreshRewards(): Promise<RewardsSnapshot> {
    if (!this.rewardsRefresh) {
      this.rewardsRefresh = this.performRewardsRefresh().finally(() => {
        this.rewardsRefresh = null;
      });
    }
    return this.rewardsRefresh;
  }

  async refreshPeriod(period: RewardPeriodName, category: RewardCategory): Promise<RewardPeriodResult> {
    const homeId = await this.resolveHomeId();
    const result = await this.orchestrator.fetchOne(buildPeriodRequest(homeId, category, period, new Date(this.clock())));
    this.lastRefreshAt = this.clock();
    this.apply(period, category, result);
    return result;
  }

  async refreshDevices(): Promise<DeviceGroups> {
    try {
      const homeId = await this.resolveHomeId();
      const devices = await this.orchestrator.fetchDevices(homeId);
      this.devices = groupDevices(devices);
      this.devicesUpdatedAt = this.clock();
      this.devicesStale = false;
      rewardsLogger.info('[Coordinator] Devices refreshed', {
        homeId: redactId(homeId),
        devices: devices.length
      });
    } catch (error) {
      this.devicesStale = true;
      rewardsLogger.warn('[Coordinator] Device refresh failed, keeping previous list', {
        error: describeError(error)
      });
    }
    return this.devices;
  }

  snapshot(): RewardsSnapshot {
    return {
      homeId: this.homeId,
      currency: this.currency,
      lastRefreshAt: this.lastRefreshAt,
      lastSuccessAt: this.lastSuccessAt,
      entries: [...this.entries.values()].map((entry) => ({ ...entry })),
      devices: this.devices,
      devicesUpdatedAt: this.devicesUpdatedAt,
      devicesStale: this.devicesStale
    };
  }

  /** Uses the configured home, otherwise the first home on the account. */
  async resolveHomeId(): Promise<string> {
    if (this.homeId) {
      return this.homeId;
    }

    const homes = await this.orchestrator.fetchHomes();
    const first = homes[0];
    if (!first) {
      throw new InvalidRequestError('No homes found on this account');
    }

    this.homeId = first.id;
    rewardsLogger.info('[Coordinator] Using first home on the account', {
      homeId: redactId(first.id),
      homes: homes.length
    });
    return first.id;
  }

  private async performRewardsRefresh(): Promise<RewardsSnapshot> {
    let homeId: string;
    try {
      homeId = await this.resolveHomeId();
    } catch (error) {
      const failure = toRewardsFailure(error);
      for (const entry of this.entries.values()) {
        entry.stale = true;
        entry.failure = failure;
      }
      this.lastRefreshAt = this.clock();
      rewardsLogger.warn('[Coordinator] Could not resolve home', { error: failure.message });
      return this.snapshot();
    }

    const requests = buildStandardPeriods(homeId, this.categories, new Date(this.clock()));
    const results = await this.orchestrator.fetchAll(requests);

    this.lastRefreshAt = this.clock();
    let currency: string | null = null;
    for (const request of requests) {
      const result = results.get(request);
      if (!result || !request.period) {
        continue;
      }
      this.apply(request.period, request.category, result);
      if (!currency && result.ok && result.value.currency) {
        currency = result.value.currency;
      }
    }
    if (currency) {
      this.currency = currency;
    }

    return this.snapshot();
  }

  private apply(period: RewardPeriodName, category: RewardCategory, result: RewardPeriodResult): void {
    const key = `${period}:${category}`;
    const previous = this.entries.get(key);

    if (result.ok) {
      this.entries.set(key, {
        period,
        category,
        amount: result.value.amount,
        currency: result.value.currency,
        from: result.value.from ?? result.request.from,
        to: result.value.to ?? result.request.to,
        updatedAt: result.retrievedAt,
        stale: false,
        failure: null
      });
      this.lastSuccessAt = result.retrievedAt;
      if (!this.currency && result.value.currency) {
        this.currency = result.value.currency;
      }
      return;
    }

    this.entries.set(key, {
      period,
      category,
      amount: previous?.amount ?? null,
      currency: previous?.currency ?? null,
      from: previous?.from ?? result.request.from,
      to: previous?.to ?? result.request.to,
      updatedAt: previous?.updatedAt ?? null,
      stale: true,
      failure: result.failure
    });
  }
}

export function createRewardsCoordinator(config: RewardsCoordinatorConfig): RewardsCoordinator {
  return new RewardsCoordinator(config);
}

export function groupDevices(devices: readonly RewardsDevice[]): DeviceGroups {
  const groups = emptyDeviceGroups();
  for (const device of devices) {
    const type = DEVICE_TYPES_OF_INTEREST.find((candidate) => candidate === device.type);
    if (type) {
      groups[type].push(device);
    }
  }
  return groups;
}

function emptyDeviceGroups(): DeviceGroups {
  return {
    REAL_TIME_METER: [],
    INVERTER: [],
    BATTERY: [],
    ELECTRIC_VEHICLE: [],
    EV_CHARGER: []
  };
}
