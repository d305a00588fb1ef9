import type { Express } from 'express';

import { AggregationEngine } from '../aggregation/summarizer.js';
import { routeStore, type RouteDeps } from './helpers/deps.js';
import { toHealthResponse } from './helpers/responders.js';

export const registerHealthRoutes = (app: Express, deps: RouteDeps) => {
  app.get('/health', (_req, res) =>
    res.status(200).send({ ok: true, storage: deps.store ? 'connected' : 'unavailable' })
  );

  app.get('/v1/health/metrics', deps.authenticate, async (_req, res, next) => {
    try {
      const engine = new AggregationEngine(routeStore(deps), {
        now: deps.now,
        logger: deps.logger,
        retentionDays: deps.retentionDays,
      });
      return res.send(toHealthResponse(await engine.healthMetrics()));
    } catch (err) {
      return next(err);
    }
  });
};
