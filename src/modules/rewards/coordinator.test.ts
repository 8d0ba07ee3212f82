import { afterEach, describe, expect, it } from 'vitest';
import { HOME_ID, NOW, createTestRuntime, jsonResponse } from '../../test/fake-backend.js';
import { groupDevices } from './coordinator.js';
import { InvalidRequestError } from './errors.js';
import type { RewardsRuntime } from './runtime.js';

const MINUTE = 60 * 1000;

describe('RewardsCoordinator', () => {
  const runtimes: RewardsRuntime[] = [];

  function setup(options: Parameters<typeof createTestRuntime>[0] = {}) {
    const context = createTestRuntime(options);
    runtimes.push(context.runtime);
    return context;
  }

  afterEach(async () => {
    await Promise.all(runtimes.splice(0).map((runtime) => runtime.shutdown()));
  });

  it('fills every period and category in one refresh', async () => {
    const { runtime, backend } = setup();

    const snapshot = await runtime.coordinator.refreshRewards();

    expect(snapshot.entries).toHaveLength(12);
    expect(snapshot).toMatchObject({ homeId: HOME_ID, currency: 'SEK', lastRefreshAt: NOW, lastSuccessAt: NOW });
    expect(snapshot.entries.every((entry) => !entry.stale && entry.failure === null)).toBe(true);
    expect(snapshot.entries.find((entry) => entry.period === 'current-month' && entry.category === 'vehicle')).toMatchObject({
      amount: 12.5,
      currency: 'SEK',
      updatedAt: NOW
    });
    // One query per window: categories share it, and the current day reuses the current month.
    expect(backend.graphqlCalls).toHaveLength(3);
  });

  it('limits the refresh to the configured categories', async () => {
    const { runtime } = setup({ env: { REWARDS_CATEGORIES: 'total' } });

    const snapshot = await runtime.coordinator.refreshRewards();

    expect(snapshot.entries.map((entry) => entry.amount)).toEqual([15.75, 15.75, 25, 190]);
  });

  it('keeps the last good value and marks it stale when a refresh fails', async () => {
    let failing = false;
    const { runtime, advance } = setup({
      env: { REWARDS_CATEGORIES: 'total' },
      onGraphql: () => (failing ? new Response('bad request', { status: 400 }) : null)
    });
    await runtime.coordinator.refreshRewards();

    failing = true;
    advance(61 * MINUTE);
    const snapshot = await runtime.coordinator.refreshRewards();

    expect(snapshot.lastRefreshAt).toBe(NOW + 61 * MINUTE);
    expect(snapshot.lastSuccessAt).toBe(NOW);
    expect(snapshot.entries.map((entry) => [entry.amount, entry.stale, entry.failure?.kind])).toEqual([
      [15.75, true, 'remote-error'],
      [15.75, true, 'remote-error'],
      [25, true, 'remote-error'],
      [190, true, 'remote-error']
    ]);
    expect(snapshot.entries[0]?.updatedAt).toBe(NOW);
  });

  it('shares one pass between overlapping refreshes', async () => {
    const { runtime } = setup();

    const first = runtime.coordinator.refreshRewards();

    expect(runtime.coordinator.refreshRewards()).toBe(first);
    await first;
  });

  it('uses the first home on the account when none is configured', async () => {
    const { runtime, backend } = setup({ env: { REWARDS_HOME_ID: '' } });

    const snapshot = await runtime.coordinator.refreshRewards();

    expect(snapshot.homeId).toBe(HOME_ID);
    expect(backend.graphqlCalls[0]?.query).toContain('homes');
    expect(backend.graphqlCalls).toHaveLength(4);
  });

  it('reports an account without homes', async () => {
    const { runtime } = setup({
      env: { REWARDS_HOME_ID: '' },
      onGraphql: (call) => (call.query.includes('homes') ? jsonResponse({ data: { me: { homes: [] } } }) : null)
    });

    const snapshot = await runtime.coordinator.refreshRewards();

    expect(snapshot).toMatchObject({ homeId: null, entries: [], lastRefreshAt: NOW });
    await expect(runtime.coordinator.resolveHomeId()).rejects.toThrow(InvalidRequestError);
  });

  it('refreshes a single period on demand', async () => {
    const { runtime } = setup();

    const result = await runtime.coordinator.refreshPeriod('current-month', 'battery');

    expect(result).toMatchObject({ ok: true, value: { amount: 3.25 } });
    expect(runtime.coordinator.snapshot().entries).toEqual([
      {
        period: 'current-month',
        category: 'battery',
        amount: 3.25,
        currency: 'SEK',
        from: '2026-10-01T00:00:00.000Z',
        to: '2026-11-01T00:00:00.000Z',
        updatedAt: NOW,
        stale: false,
        failure: null
      }
    ]);
  });

  it('groups devices of interest and keeps them through a failed refresh', async () => {
    let failing = false;
    const { runtime, advance } = setup({
      onGraphql: () => (failing ? new Response('bad request', { status: 400 }) : null)
    });

    const groups = await runtime.coordinator.refreshDevices();

    expect(groups.ELECTRIC_VEHICLE.map((device) => device.id)).toEqual(['ev-1']);
    expect(groups.BATTERY.map((device) => device.id)).toEqual(['battery-1']);
    expect(groups.INVERTER).toEqual([]);
    expect(runtime.coordinator.snapshot()).toMatchObject({ devicesUpdatedAt: NOW, devicesStale: false });

    failing = true;
    advance(31 * MINUTE);
    const kept = await runtime.coordinator.refreshDevices();

    expect(kept.ELECTRIC_VEHICLE.map((device) => device.id)).toEqual(['ev-1']);
    expect(runtime.coordinator.snapshot()).toMatchObject({ devicesUpdatedAt: NOW, devicesStale: true });
  });
});

describe('groupDevices', () => {
  it('drops device types outside the groups', () => {
    const groups = groupDevices([
      { id: 'meter-1', type: 'REAL_TIME_METER', title: 'Pulse', isHidden: false },
      { id: 'charger-1', type: 'EV_CHARGER', title: null, isHidden: true },
      { id: 'heat-1', type: 'HEAT_PUMP', title: 'Heat pump', isHidden: false }
    ]);

    expect(Object.values(groups).flat().map((device) => device.id)).toEqual(['meter-1', 'charger-1']);
    expect(groups.EV_CHARGER[0]?.isHidden).toBe(true);
  });
});
