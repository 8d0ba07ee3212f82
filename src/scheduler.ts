import cron, { type ScheduledTask } from 'node-cron';
import type { RewardsCoordinator } from './modules/rewards/coordinator.js';
import { describeError } from './modules/rewards/errors.js';
import { rewardsLogger } from './modules/rewards/utils.js';

export interface SchedulerOptions {
  rewardsIntervalMinutes: number;
  devicesIntervalHours: number;
  timezone?: string;
}

export interface RewardsScheduler {
  rewardsSchedule: string;
  devicesSchedule: string;
  stop(): void;
}

export function rewardsCronExpression(intervalMinutes: number): string {
  const minutes = clampInterval(intervalMinutes, 59);
  return minutes === 1 ? '* * * * *' : `*/${minutes} * * * *`;
}

export function devicesCronExpression(intervalHours: number): string {
  const hours = clampInterval(intervalHours, 23);
  return hours === 1 ? '0 * * * *' : `0 */${hours} * * *`;
}

export function initScheduler(coordinator: RewardsCoordinator, options: SchedulerOptions): RewardsScheduler {
  const rewardsSchedule = rewardsCronExpression(options.rewardsIntervalMinutes);
  const devicesSchedule = devicesCronExpression(options.devicesIntervalHours);
  const timezone = options.timezone || process.env.CRON_TZ || 'UTC';

  const tasks: ScheduledTask[] = [
    cron.schedule(rewardsSchedule, async () => {
      rewardsLogger.info('[Scheduler] Starting rewards refresh');
      try {
        const snapshot = await coordinator.refreshRewards();
        rewardsLogger.info('[Scheduler] Rewards refresh completed', {
          entries: snapshot.entries.length,
          stale: snapshot.entries.filter((entry) => entry.stale).length
        });
      } catch (error) {
        rewardsLogger.error('[Scheduler] Rewards refresh crashed', { error: describeError(error) });
      }
    }, { timezone }),

    cron.schedule(devicesSchedule, async () => {
      rewardsLogger.info('[Scheduler] Starting device refresh');
      try {
        await coordinator.refreshDevices();
      } catch (error) {
        rewardsLogger.error('[Scheduler] Device refresh crashed', { error: describeError(error) });
      }
    }, { timezone })
  ];

  rewardsLogger.info('[Scheduler] Initialized', { rewardsSchedule, devicesSchedule, timezone });

  return {
    rewardsSchedule,
    devicesSchedule,
    stop() {
      for (const task of tasks) {
        task.stop();
      }
      rewardsLogger.info('[Scheduler] Stopped');
    }
  };
}

function clampInterval(value: number, max: number): number {
  if (!Number.isFinite(value) || value < 1) {
    return 1;
  }
  return Math.min(Math.floor(value), max);
}
