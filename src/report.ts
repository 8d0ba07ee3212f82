import type { RewardsSnapshot } from './modules/rewards/coordinator.js';

export const formatAmount = (value: number | null, decimals = 2, fallback = 'N/A') => {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value.toFixed(decimals);
  }
  return fallback;
};

export function formatSnapshotTable(snapshot: RewardsSnapshot): string[] {
  const lines = [
    `${'Period'.padEnd(16)} ${'Category'.padEnd(10)} ${'Amount'.padEnd(12)} Status`,
    '-'.repeat(52)
  ];

  for (const entry of snapshot.entries) {
    const amount = `${formatAmount(entry.amount)}${entry.currency ? ` ${entry.currency}` : ''}`;
    const status = entry.stale ? `stale (${entry.failure?.kind ?? 'unknown'})` : 'ok';
    lines.push(`${entry.period.padEnd(16)} ${entry.category.padEnd(10)} ${amount.padEnd(12)} ${status}`);
  }

  return lines;
}
