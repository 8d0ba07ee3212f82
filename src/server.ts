import type { Server } from 'node:http';
import express, { type Express } from 'express';
import cors from 'cors';
import { setupOpenAPI } from './api/openapi-setup.js';
import type { RewardsCoordinator, RewardsSnapshot } from './modules/rewards/coordinator.js';
import { describeError } from './modules/rewards/errors.js';
import type { RewardsFetchOrchestrator } from './modules/rewards/fetch-orchestrator.js';
import { isRewardCategory, isRewardPeriodName } from './modules/rewards/periods.js';
import { redactId, rewardsLogger } from './modules/rewards/utils.js';

export interface ServerDependencies {
  coordinator: RewardsCoordinator;
  orchestrator: RewardsFetchOrchestrator;
  docs?: boolean;
}

export function createApp(deps: ServerDependencies): Express {
  const { coordinator, orchestrator } = deps;
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', closed: orchestrator.closed });
  });

  app.get('/api/rewards', (_req, res) => {
    res.json(redactSnapshot(coordinator.snapshot()));
  });

  // Manual refresh: one period/category when both are given, otherwise everything.
  app.post('/api/rewards/refresh', async (req, res) => {
    const body: unknown = req.body;
    const period = readField(body, 'period');
    const category = readField(body, 'category');

    if (period === undefined && category === undefined) {
      try {
        const snapshot = await coordinator.refreshRewards();
        res.json(redactSnapshot(snapshot));
      } catch (error) {
        rewardsLogger.error('[Server] Rewards refresh failed', { error: describeError(error) });
        res.status(500).json({ error: 'Failed to refresh rewards' });
      }
      return;
    }

    if (!isRewardPeriodName(period) || !isRewardCategory(category)) {
      res.status(400).json({ error: 'Both period and category are required and must be valid' });
      return;
    }

    try {
      const result = await coordinator.refreshPeriod(period, category);
      if (result.ok) {
        res.json({ ok: true, period, category, source: result.source, value: result.value });
      } else {
        res.status(502).json({ ok: false, period, category, failure: result.failure });
      }
    } catch (error) {
      rewardsLogger.error('[Server] Period refresh failed', { error: describeError(error) });
      res.status(500).json({ error: 'Failed to refresh period' });
    }
  });

  app.delete('/api/rewards/cache', (_req, res) => {
    const { entries } = orchestrator.diagnostics().cache;
    orchestrator.clearCache();
    res.json({ cleared: entries });
  });

  app.get('/api/devices', async (req, res) => {
    if (req.query.refresh === 'true') {
      await coordinator.refreshDevices();
    }
    const snapshot = coordinator.snapshot();
    res.json({
      devices: snapshot.devices,
      updatedAt: snapshot.devicesUpdatedAt,
      stale: snapshot.devicesStale
    });
  });

  app.get('/api/diagnostics', (_req, res) => {
    const snapshot = coordinator.snapshot();
    res.json({
      homeId: snapshot.homeId ? redactId(snapshot.homeId) : null,
      ...orchestrator.diagnostics()
    });
  });

  if (deps.docs !== false) {
    setupOpenAPI(app);
  }

  return app;
}

export function startServer(deps: ServerDependencies, port: number): Promise<Server> {
  const app = createApp(deps);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      rewardsLogger.info('[Server] Listening', { url: `http://localhost:${port}` });
      resolve(server);
    });
    server.once('error', reject);
  });
}

function redactSnapshot(snapshot: RewardsSnapshot): RewardsSnapshot {
  return {
    ...snapshot,
    homeId: snapshot.homeId ? redactId(snapshot.homeId) : null
  };
}

function readField(body: unknown, field: string): unknown {
  if (!body || typeof body !== 'object') {
    return undefined;
  }
  const value: unknown = Reflect.get(body, field);
  return value;
}
