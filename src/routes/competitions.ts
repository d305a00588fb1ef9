import type { Express } from 'express';
import { z } from 'zod';

import { CompetitionService } from '../competitions/service.js';
import { routeStore, type RouteDeps } from './helpers/deps.js';
import {
  toCompetitionResponse,
  toParticipantResponse,
  toStandingResponse,
  toTeamResponse,
  toTeamTotalResponse,
} from './helpers/responders.js';

const CompetitionParamsSchema = z.object({ id: z.coerce.number().int().positive() });

const CompetitionListQuerySchema = z.object({
  status: z.enum(['active', 'cancelled', 'completed']).optional(),
});

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const RankingQuerySchema = z.object({
  worst: flag,
  limit: z.coerce.number().int().min(1).max(200).optional(),
});

export const registerCompetitionRoutes = (app: Express, deps: RouteDeps) => {
  const service = () =>
    new CompetitionService(
      { store: routeStore(deps), client: deps.client, credentials: deps.credentials },
      { now: deps.now, logger: deps.logger }
    );

  app.get('/v1/competitions', deps.authenticate, async (req, res, next) => {
    const parsed = CompetitionListQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return res.status(400).send({ error: 'validation_error', details: parsed.error.flatten() });
    }

    try {
      const competitions = await service().list(parsed.data.status);
      return res.send({ competitions: competitions.map(toCompetitionResponse) });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/competitions/:id', deps.authenticate, async (req, res, next) => {
    const params = CompetitionParamsSchema.safeParse(req.params);
    const query = RankingQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const competitions = service();
      const detail = await competitions.get(params.data.id);
      const report = await competitions.status(params.data.id, query.data);
      return res.send({
        ...toCompetitionResponse(detail.competition),
        teams: detail.teams.map(toTeamResponse),
        participants: detail.participants.map(toParticipantResponse),
        rankings: report.rankings.map((standing, index) => toStandingResponse(standing, index + 1)),
      });
    } catch (err) {
      return next(err);
    }
  });

  app.get('/v1/competitions/:id/teams', deps.authenticate, async (req, res, next) => {
    const params = CompetitionParamsSchema.safeParse(req.params);
    const query = RankingQuerySchema.safeParse(req.query);
    if (!params.success) {
      return res.status(400).send({ error: 'validation_error', details: params.error.flatten() });
    }
    if (!query.success) {
      return res.status(400).send({ error: 'validation_error', details: query.error.flatten() });
    }

    try {
      const report = await service().teamStatus(params.data.id, { worst: query.data.worst });
      return res.send({
        competition_id: report.competition.competitionId,
        teams: report.teams.map((team, index) => toTeamTotalResponse(team, index + 1)),
      });
    } catch (err) {
      return next(err);
    }
  });
};
