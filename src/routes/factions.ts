import type { Express } from 'express';
import { z } from 'zod';

import { CRIME_STATUSES, type CrimeEventType } from '../store/types.js';
import { routeStore, type RouteDeps } from './helpers/deps.js';
import { toCrimeEventResponse, toCrimeResponse, toSummaryResponse } from './helpers/responders.js';

const EVENT_TYPES = [
  'created',
  'status_changed',
  'participant_joined',
  'participant_left',
  'completed',
  'failed',
  'cancelled',
] as const satisfies readonly CrimeEventType[];

const FactionParamsSchema = z.object({ factionId: z.coerce.number().int().positive() });

const CrimeQuerySchema = z.object({
  status: z.enum(CRIME_STATUSES).optional(),
});

const CrimeEventQuerySchema = z.object({
  crime_id: z.coerce.number().int().positive().optional(),
  player_id: z.coerce.number().int().positive().optional(),
  event_type: z.enum(EVENT_TYPES).optional(),
  since: z.string().datetime().optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export const registerFactionRoutes = (app: Express, deps: RouteDeps) => {
  app.get('/v1/factions/:factionId/crimes', deps.authenticate, async (req, res, next) => {
    const params = FactionParamsSchema.safeParse(req.params);
    const query = CrimeQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const crimes = await routeStore(deps).listCurrentCrimes(params.data.factionId);
      return res.send({
        faction_id: params.data.factionId,
        crimes: crimes.filter((crime) => !query.data.status || crime.status === query.data.status).map(toCrimeResponse),
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/factions/:factionId/crime-events', deps.authenticate, async (req, res, next) => {
    const params = FactionParamsSchema.safeParse(req.params);
    const query = CrimeEventQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const events = await routeStore(deps).listCrimeEvents({
        factionId: params.data.factionId,
        crimeId: query.data.crime_id,
        playerId: query.data.player_id,
        eventTypes: query.data.event_type ? [query.data.event_type] : undefined,
        since: query.data.since ? new Date(query.data.since) : undefined,
        limit: query.data.limit,
      });
      return res.send({ faction_id: params.data.factionId, events: events.map(toCrimeEventResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/factions/:factionId/summaries', deps.authenticate, async (req, res, next) => {
    const params = FactionParamsSchema.safeParse(req.params);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }

    try {
      const summaries = await routeStore(deps).listPeriodSummaries('faction', params.data.factionId);
      return res.send({ faction_id: params.data.factionId, summaries: summaries.map(toSummaryResponse) });
    } catch (err) {
      return next(err);
    }
  });
};
