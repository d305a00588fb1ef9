import type { Express } from 'express';

import { requireInvoker, getInvoker } from '../auth.js';
import type { CommandRegistry, CommandReply } from '../commands/registry.js';
import type { RouteDeps } from './helpers/deps.js';

const NOT_FOUND = new Set(['unknown_command', 'competition_not_found', 'tracked_faction_not_found', 'unknown_alias']);

export const replyStatus = (reply: CommandReply): number => {
  if (reply.ok) return 200;
  if (reply.error === 'forbidden' || reply.error === 'not_owner') return 403;
  if (NOT_FOUND.has(reply.error)) return 404;
  if (reply.error === 'storage_unavailable') return 503;
  if (reply.error === 'api_rate_limited') return 429;
  if (reply.error === 'internal_error') return 500;
  if (reply.error.startsWith('api_')) return 502;
  return 400;
};

export const registerCommandRoutes = (app: Express, deps: RouteDeps & { commands: CommandRegistry }) => {
  app.get('/v1/commands', deps.authenticate, (_req, res) => res.send({ commands: deps.commands.list() }));

  app.post('/v1/commands/:name', deps.authenticate, requireInvoker, async (req, res, next) => {
    const invoker = getInvoker(req);
    if (!invoker) {
      return res.status(401).send({ error: 'missing_invoker', message: 'Request does not identify an invoker.' });
    }

    try {
      const reply = await deps.commands.invoke(req.params.name, req.body ?? {}, invoker);
      return res.status(replyStatus(reply)).send(reply);
    } catch (err) {
      return next(err);
    }
  });
};
