import express from 'express';
import { collectSeries, instantQuery, renderExposition } from './series.js';
import type { RealtimeStateSnapshot } from './snapshot.js';

export interface ExporterSources {
  snapshot: () => RealtimeStateSnapshot;
  instance: string;
  /** Epoch ms of the last completed state poll, null before the first */
  lastStateCycleAt: () => number | null;
  /** Health turns 503 when the state poll is older than this */
  staleAfterMs: number;
  now?: () => number;
}

export function createExporterApp(sources: ExporterSources): express.Express {
  const now = sources.now ?? Date.now;
  const app = express();
  app.use(express.urlencoded({ extended: false }));

  const series = () => collectSeries(sources.snapshot(), sources.instance);

  app.get('/metrics', (_req, res) => {
    res.type('text/plain; version=0.0.4').send(renderExposition(series()));
  });

  // Dashboards issue the same query as GET or as a form POST
  app.get('/api/v1/query', (req, res) => {
    const query = typeof req.query.query === 'string' ? req.query.query : '';
    res.json(instantQuery(series(), query));
  });

  app.post('/api/v1/query', (req, res) => {
    const body: unknown = req.body;
    const query =
      typeof body === 'object' && body !== null && 'query' in body && typeof body.query === 'string' ? body.query : '';
    res.json(instantQuery(series(), query));
  });

  app.get('/health', (_req, res) => {
    const lastCycle = sources.lastStateCycleAt();
    const ageMs = lastCycle === null ? null : now() - lastCycle;
    const fresh = ageMs !== null && ageMs <= sources.staleAfterMs;

    res.status(fresh ? 200 : 503).json({
      status: fresh ? 'ok' : 'stale',
      service: 'state-exporter',
      state: sources.snapshot().state.name,
      lastPollAgeMs: ageMs,
    });
  });

  return app;
}
