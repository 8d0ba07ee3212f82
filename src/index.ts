#!/usr/bin/env node
import dotenv from 'dotenv';
import { describeError } from './modules/rewards/errors.js';
import { createRewardsRuntime, loadRewardsConfig, type RewardsRuntime } from './modules/rewards/runtime.js';
import { rewardsLogger } from './modules/rewards/utils.js';
import { formatSnapshotTable } from './report.js';
import { initScheduler } from './scheduler.js';
import { startServer } from './server.js';

dotenv.config();

async function runOnce(runtime: RewardsRuntime) {
  await runtime.start();
  try {
    const snapshot = await runtime.coordinator.refreshRewards();
    const devices = await runtime.coordinator.refreshDevices();

    console.log('\nGrid rewards');
    for (const line of formatSnapshotTable(snapshot)) {
      console.log(line);
    }

    const deviceCounts = Object.entries(devices)
      .filter(([, list]) => list.length > 0)
      .map(([type, list]) => `${type}=${list.length}`);
    console.log(`\nDevices: ${deviceCounts.length > 0 ? deviceCounts.join(', ') : 'none'}`);

    if (snapshot.entries.length === 0 || snapshot.entries.every((entry) => entry.stale)) {
      process.exitCode = 1;
    }
  } finally {
    await runtime.shutdown();
  }
}

async function serve(runtime: RewardsRuntime) {
  await runtime.start();

  const server = await startServer(
    { coordinator: runtime.coordinator, orchestrator: runtime.orchestrator },
    runtime.config.port
  );
  const scheduler = initScheduler(runtime.coordinator, {
    rewardsIntervalMinutes: runtime.config.scanIntervalMinutes,
    devicesIntervalHours: runtime.config.deviceScanIntervalHours
  });

  // First refresh runs now rather than at the first cron tick.
  void runtime.coordinator.refreshRewards().catch((error) => {
    rewardsLogger.error('[Main] Initial rewards refresh failed', { error: describeError(error) });
  });
  void runtime.coordinator.refreshDevices().catch((error) => {
    rewardsLogger.error('[Main] Initial device refresh failed', { error: describeError(error) });
  });

  let stopping = false;
  const stop = async (signal: string) => {
    if (stopping) {
      return;
    }
    stopping = true;
    rewardsLogger.info('[Main] Shutting down', { signal });
    scheduler.stop();
    await runtime.shutdown();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      void stop(signal).catch((error) => {
        rewardsLogger.error('[Main] Shutdown failed', { error: describeError(error) });
        process.exitCode = 1;
      });
    });
  }
}

async function main() {
  const args = process.argv.slice(2);
  const runtime = createRewardsRuntime(loadRewardsConfig());

  if (args.includes('--once')) {
    await runOnce(runtime);
    return;
  }

  await serve(runtime);
}

main().catch((error) => {
  rewardsLogger.error('[Main] Fatal error', { error: describeError(error) });
  process.exitCode = 1;
});
