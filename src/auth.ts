import type { Request, RequestHandler } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';

import type { Invoker } from './commands/registry.js';
import { describeError, type Logger } from './logging.js';

export interface AuthOptions {
  sharedSecret?: string;
  disabled: boolean;
}

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  admin: z.boolean().optional(),
});

const invokers = new WeakMap<Request, Invoker>();

export const getInvoker = (req: Request): Invoker | undefined => invokers.get(req);

const headerInvoker = (req: Request): Invoker | undefined => {
  const id = req.header('x-invoker-id')?.trim();
  if (!id) return undefined;
  const admin = req.header('x-invoker-admin')?.trim().toLowerCase();
  return { id, isAdmin: admin === '1' || admin === 'true' };
};

/**
 * Verifies an HS256 bearer token and remembers its subject as the invoker.
 * With auth disabled the invoker comes from the `x-invoker-id` and
 * `x-invoker-admin` headers, when present.
 */
export const createAuthMiddleware = (options: AuthOptions, logger: Logger = console): RequestHandler => {
  const secret = options.sharedSecret;
  if (options.disabled || !secret) {
    return (req, _res, next) => {
      const invoker = headerInvoker(req);
      if (invoker) invokers.set(req, invoker);
      next();
    };
  }

  return (req, res, next) => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      return res.status(401).send({ error: 'missing_token', message: 'Authorization header missing bearer token.' });
    }

    const token = authHeader.slice('Bearer '.length);
    try {
      const claims = TokenClaimsSchema.safeParse(jwt.verify(token, secret, { algorithms: ['HS256'] }));
      if (!claims.success) {
        return res.status(401).send({ error: 'invalid_token', message: 'Token is missing a subject.' });
      }
      invokers.set(req, { id: claims.data.sub, isAdmin: claims.data.admin === true });
      return next();
    } catch (err) {
      logger.warn('auth_invalid_token', { error: describeError(err) });
      return res.status(401).send({ error: 'invalid_token', message: 'Invalid or expired token.' });
    }
  };
};

export const requireInvoker: RequestHandler = (req, res, next) => {
  if (!invokers.has(req)) {
    return res.status(401).send({ error: 'missing_invoker', message: 'Request does not identify an invoker.' });
  }
  return next();
};
