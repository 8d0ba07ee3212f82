import type { RewardCategory, RewardPeriodName, RewardPeriodRequest } from './types.js';

export const REWARD_CATEGORIES: readonly RewardCategory[] = ['vehicle', 'battery', 'total'];

export const PERIOD_NAMES: readonly RewardPeriodName[] = ['current-day', 'current-month', 'previous-month', 'year'];

interface PeriodBounds {
  from: Date;
  to: Date;
}

/**
 * UTC bounds for each named period; `to` is exclusive. The year runs to date.
 * The rewards API only answers at monthly resolution, so the current day
 * reports the month to date and shares the current month's window.
 */
export function resolvePeriodBounds(period: RewardPeriodName, now: Date): PeriodBounds {
  const year = now.getUTCFullYear();
  const month = now.getUTCMonth();

  switch (period) {
    case 'current-day':
    case 'current-month':
      return { from: new Date(Date.UTC(year, month, 1)), to: new Date(Date.UTC(year, month + 1, 1)) };
    case 'previous-month':
      return { from: new Date(Date.UTC(year, month - 1, 1)), to: new Date(Date.UTC(year, month, 1)) };
    case 'year':
      return { from: new Date(Date.UTC(year, 0, 1)), to: new Date(Date.UTC(year, month + 1, 1)) };
  }
}

export function buildPeriodRequest(
  homeId: string,
  category: RewardCategory,
  period: RewardPeriodName,
  now: Date
): RewardPeriodRequest {
  const bounds = resolvePeriodBounds(period, now);
  return {
    homeId,
    category,
    period,
    from: bounds.from.toISOString(),
    to: bounds.to.toISOString()
  };
}

export function buildStandardPeriods(
  homeId: string,
  categories: readonly RewardCategory[] = REWARD_CATEGORIES,
  now: Date = new Date()
): RewardPeriodRequest[] {
  const requests: RewardPeriodRequest[] = [];
  for (const period of PERIOD_NAMES) {
    for (const category of categories) {
      requests.push(buildPeriodRequest(homeId, category, period, now));
    }
  }
  return requests;
}

export function isRewardCategory(value: unknown): value is RewardCategory {
  return value === 'vehicle' || value === 'battery' || value === 'total';
}

export function isRewardPeriodName(value: unknown): value is RewardPeriodName {
  return value === 'current-day' || value === 'current-month' || value === 'previous-month' || value === 'year';
}

/** Parses a comma separated category list, dropping unknown names and duplicates. */
export function parseCategories(raw: string | undefined, fallback: readonly RewardCategory[] = REWARD_CATEGORIES): RewardCategory[] {
  if (!raw || !raw.trim()) {
    return [...fallback];
  }

  const parsed: RewardCategory[] = [];
  for (const part of raw.split(',')) {
    const candidate = part.trim().toLowerCase();
    if (isRewardCategory(candidate) && !parsed.includes(candidate)) {
      parsed.push(candidate);
    }
  }
  return parsed.length > 0 ? parsed : [...fallback];
}
