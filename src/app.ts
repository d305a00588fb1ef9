import express from 'express';
import type { Express, ErrorRequestHandler } from 'express';

import type { ApiClient } from './api/client.js';
import { createAuthMiddleware, type AuthOptions } from './auth.js';
import type { CommandRegistry } from './commands/registry.js';
import type { CredentialRegistry } from './credentials/registry.js';
import type { Logger } from './logging.js';
import { registerCommandRoutes } from './routes/commands.js';
import { registerCompetitionRoutes } from './routes/competitions.js';
import { registerFactionRoutes } from './routes/factions.js';
import { registerHealthRoutes } from './routes/health.js';
import { registerPlayerRoutes } from './routes/players.js';
import {
  asStorageUnavailable,
  CompetitionLookupError,
  InvalidArgumentError,
  PermissionDeniedError,
  TrackedFactionLookupError,
  type TrackerStore,
} from './store/types.js';

export const serializeError = (err: unknown): {
  status: number;
  body: Record<string, unknown>;
  log?: { error: unknown; context: string };
} => {
  if (err instanceof SyntaxError && 'body' in err) {
    return { status: 400, body: { error: 'invalid_json', message: 'Request body is not valid JSON.' } };
  }

  const unavailable = asStorageUnavailable(err);
  if (unavailable) {
    return {
      status: 503,
      body: { error: 'storage_unavailable', message: unavailable.message },
      ...(unavailable === err ? {} : { log: { error: err, context: 'storage_connection_lost' } }),
    };
  }

  if (err instanceof CompetitionLookupError) {
    return {
      status: 404,
      body: {
        error: 'competition_not_found',
        message: err.message,
        ...(Object.keys(err.context).length ? { context: err.context } : {}),
      },
    };
  }

  if (err instanceof TrackedFactionLookupError) {
    return { status: 404, body: { error: 'tracked_faction_not_found', message: err.message } };
  }

  if (err instanceof PermissionDeniedError) {
    return { status: 403, body: { error: 'forbidden', message: err.message } };
  }

  if (err instanceof InvalidArgumentError) {
    return { status: 400, body: { error: err.code, message: err.message } };
  }

  return {
    status: 500,
    body: { error: 'internal_error', message: 'Unexpected error' },
    log: { error: err, context: 'unhandled_error' },
  };
};

export interface AppDeps {
  store: TrackerStore | null;
  client: ApiClient;
  credentials: CredentialRegistry;
  commands: CommandRegistry;
  auth: AuthOptions;
  retentionDays: number;
  now?: () => Date;
  logger?: Logger;
}

export const createApp = (deps: AppDeps): Express => {
  const logger = deps.logger ?? console;
  const app = express();
  app.use(express.json());

  const routeDeps = {
    store: deps.store,
    client: deps.client,
    credentials: deps.credentials,
    authenticate: createAuthMiddleware(deps.auth, logger),
    retentionDays: deps.retentionDays,
    now: deps.now,
    logger,
  };

  registerHealthRoutes(app, routeDeps);
  registerFactionRoutes(app, routeDeps);
  registerPlayerRoutes(app, routeDeps);
  registerCompetitionRoutes(app, routeDeps);
  registerCommandRoutes(app, { ...routeDeps, commands: deps.commands });

  const errorHandler: ErrorRequestHandler = (err, _req, res, next) => {
    if (res.headersSent) {
      return next(err);
    }

    const payload = serializeError(err);
    if (payload.log) {
      logger.error(payload.log.context, payload.log.error);
    }

    res.status(payload.status).json(payload.body);
  };
  app.use(errorHandler);

  return app;
};
