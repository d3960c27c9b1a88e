import express from 'express';
import type { LoopStats } from '@validator-watch/shared';
import type { ConnectionHealth } from './connection-health.js';
import type { ReconciliationSnapshot } from './reconciliation.js';
import type { SupervisorState } from './supervisor.js';

export interface HealthSources {
  health: ConnectionHealth;
  reconciliation: () => ReconciliationSnapshot;
  supervisor: () => SupervisorState;
  loops?: () => Record<string, LoopStats>;
  now?: () => number;
}

/**
 * `GET /health`: 200 while the stream is connected (status `ok`, or
 * `degraded` with heartbeat failures), 503 otherwise.
 */
export function createHealthApp(sources: HealthSources): express.Express {
  const now = sources.now ?? Date.now;
  const app = express();

  app.get('/health', (_req, res) => {
    const connection = sources.health.snapshot();
    const reconciliation = sources.reconciliation();
    const timestamp = now();
    const ok = connection.status === 'healthy' || connection.status === 'degraded';

    res.status(ok ? 200 : 503).json({
      status: connection.status === 'healthy' ? 'ok' : connection.status,
      service: 'collector',
      supervisor: sources.supervisor().kind,
      connection,
      reconciliation: {
        tracked: reconciliation.tracked,
        pending: reconciliation.pending,
        lastTickAgeMs: reconciliation.lastTickAt === null ? null : timestamp - reconciliation.lastTickAt,
        window1h: reconciliation.window1h,
        window24h: reconciliation.window24h,
      },
      loops: sources.loops?.() ?? {},
      timestamp: new Date(timestamp).toISOString(),
    });
  });

  return app;
}
