import { z } from 'zod';

import { SHARED_OWNER } from '../credentials/registry.js';
import { toCredentialResponse, toValidationResponse } from '../routes/helpers/responders.js';
import type { CommandContext } from './context.js';
import { defineCommand, fail, ok, type Command } from './registry.js';

const Alias = z.string().trim().min(1).max(64);

export const credentialCommands = (context: CommandContext): Command[] => [
  defineCommand({
    name: 'keys.add',
    description: 'Register an API key held in an environment variable',
    admin: true,
    args: z.object({
      alias: Alias,
      env_var: z.string().regex(/^[A-Z_][A-Z0-9_]*$/, 'must be an environment variable name'),
      owner: z.string().min(1).optional(),
      shared: z.boolean().default(false),
      key_type: z.string().min(1).default('user'),
      validate: z.boolean().default(true),
    }),
    async execute(args, invoker) {
      const owner = args.shared ? SHARED_OWNER : args.owner ?? invoker.id;
      const { summary, validation } = await context.credentials.register(args.alias, args.env_var, owner, {
        keyType: args.key_type,
        validate: args.validate,
      });
      const data = {
        key: toCredentialResponse(summary),
        validation: validation ? toValidationResponse(validation) : null,
      };
      if (validation && !validation.valid) {
        return ok(`Registered key '${args.alias}' but validation failed: ${validation.error}`, data);
      }
      return ok(`Registered key '${args.alias}' for ${owner}`, data);
    },
  }),

  defineCommand({
    name: 'keys.remove',
    description: 'Remove a registered API key (owner or administrator)',
    args: z.object({ alias: Alias }),
    async execute(args, invoker) {
      await context.credentials.remove(args.alias, invoker);
      return ok(`Removed key '${args.alias}'`);
    },
  }),

  defineCommand({
    name: 'keys.list',
    description: 'List the API keys visible to the invoker',
    args: z.object({}),
    async execute(_args, invoker) {
      const keys = context.credentials.list(invoker.isAdmin ? undefined : invoker.id);
      if (!keys.length) return ok('No API keys registered.', { keys: [] });
      return ok(`${keys.length} API key(s)`, { keys: keys.map(toCredentialResponse) });
    },
  }),

  defineCommand({
    name: 'keys.validate',
    description: 'Validate a key and refresh its stored permissions',
    args: z.object({ alias: Alias }),
    async execute(args) {
      const result = await context.credentials.validate(args.alias);
      if (!result.valid) {
        return fail('validation_failed', `Key '${args.alias}' failed validation: ${result.error}`);
      }
      return ok(`Key '${args.alias}' is valid (${result.tier}; ${result.scopes.length} selection(s))`, {
        validation: toValidationResponse(result),
      });
    },
  }),
];
