import type { Express } from 'express';
import { z } from 'zod';

import { routeStore, type RouteDeps } from './helpers/deps.js';
import { toPlayerResponse, toSummaryResponse } from './helpers/responders.js';

const PlayerParamsSchema = z.object({ playerId: z.coerce.number().int().positive() });

export const registerPlayerRoutes = (app: Express, deps: RouteDeps) => {
  app.get('/v1/players/:playerId/summaries', deps.authenticate, async (req, res, next) => {
    const params = PlayerParamsSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const store = routeStore(deps);
      const [player, summaries] = await Promise.all([
        store.getPlayer(params.data.playerId),
        store.listPeriodSummaries('player_stats', params.data.playerId),
      ]);
      return res.send({
        player_id: params.data.playerId,
        player: player ? toPlayerResponse(player) : null,
        summaries: summaries.map(toSummaryResponse),
      });
    } catch (err) {
      return next(err);
    }
  });
};
