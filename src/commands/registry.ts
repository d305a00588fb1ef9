import type { z } from 'zod';

import { isApiError } from '../api/errors.js';
import { CredentialError } from '../credentials/registry.js';
import { describeError, type Logger } from '../logging.js';
import {
  asStorageUnavailable,
  CompetitionLookupError,
  InvalidArgumentError,
  PermissionDeniedError,
  StorageUnavailableError,
  TrackedFactionLookupError,
} from '../store/errors.js';

export interface Invoker {
  id: string;
  isAdmin: boolean;
}

export type CommandReply =
  | { ok: true; message: string; data?: unknown }
  | { ok: false; error: string; message: string; details?: unknown };

export interface CommandDefinition<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  args: S;
  admin?: boolean;
  requiresStorage?: boolean;
  execute(args: z.output<S>, invoker: Invoker): Promise<CommandReply>;
}

export interface Command {
  name: string;
  description: string;
  admin: boolean;
  requiresStorage: boolean;
  run(rawArgs: unknown, invoker: Invoker): Promise<CommandReply>;
}

export const defineCommand = <S extends z.ZodTypeAny>(definition: CommandDefinition<S>): Command => ({
  name: definition.name,
  description: definition.description,
  admin: definition.admin ?? false,
  requiresStorage: definition.requiresStorage ?? false,
  run: async (rawArgs, invoker) => {
    const parsed = definition.args.safeParse(rawArgs ?? {});
    if (!parsed.success) {
      return {
        ok: false,
        error: 'validation_error',
        message: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; '),
        details: parsed.error.flatten(),
      };
    }
    return definition.execute(parsed.data, invoker);
  },
});

export const ok = (message: string, data?: unknown): CommandReply =>
  data === undefined ? { ok: true, message } : { ok: true, message, data };

export const fail = (error: string, message: string): CommandReply => ({ ok: false, error, message });

/** Maps a thrown error onto a reply; anything unrecognised is logged and answered generically. */
export const errorReply = (err: unknown, logger: Logger, command: string): CommandReply => {
  const unavailable = asStorageUnavailable(err);
  if (unavailable) {
    if (unavailable !== err) logger.warn('storage_connection_lost', { command, error: describeError(err) });
    return fail('storage_unavailable', unavailable.message);
  }
  if (err instanceof InvalidArgumentError) return fail(err.code, err.message);
  if (err instanceof CompetitionLookupError) return fail('competition_not_found', err.message);
  if (err instanceof TrackedFactionLookupError) return fail('tracked_faction_not_found', err.message);
  if (err instanceof PermissionDeniedError) return fail('forbidden', err.message);
  if (err instanceof CredentialError) return fail(err.code, err.message);
  if (isApiError(err)) {
    if (err.kind === 'permission') {
      return fail('api_permission', `Permission denied: ${err.message}`);
    }
    if (err.kind === 'rate_limited') {
      return fail('api_rate_limited', 'Rate limit exceeded. Please try again in a minute.');
    }
    return fail(`api_${err.kind}`, `API Error: ${err.message}`);
  }

  logger.error('command_failed', { command, error: err instanceof Error ? err.stack ?? err.message : String(err) });
  return fail('internal_error', 'Unexpected error');
};

export interface CommandRegistryOptions {
  storageAvailable: () => boolean;
  logger?: Logger;
}

export class CommandRegistry {
  private readonly commands = new Map<string, Command>();
  private readonly storageAvailable: () => boolean;
  private readonly logger: Logger;

  constructor(options: CommandRegistryOptions) {
    this.storageAvailable = options.storageAvailable;
    this.logger = options.logger ?? console;
  }

  register(...commands: Command[]): this {
    for (const command of commands) {
      if (this.commands.has(command.name)) {
        throw new Error(`Command ${command.name} is already registered`);
      }
      this.commands.set(command.name, command);
    }
    return this;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  list(): Array<Pick<Command, 'name' | 'description' | 'admin'>> {
    return Array.from(this.commands.values())
      .map(({ name, description, admin }) => ({ name, description, admin }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  async invoke(name: string, rawArgs: unknown, invoker: Invoker): Promise<CommandReply> {
    const command = this.commands.get(name);
    if (!command) {
      return fail('unknown_command', `Unknown command: ${name}`);
    }
    if (command.admin && !invoker.isAdmin) {
      return fail('forbidden', 'This command requires administrator permissions.');
    }
    if (command.requiresStorage && !this.storageAvailable()) {
      return fail('storage_unavailable', new StorageUnavailableError().message);
    }

    try {
      const reply = await command.run(rawArgs, invoker);
      this.logger.log('command_invoked', { command: name, invoker: invoker.id, ok: reply.ok });
      return reply;
    } catch (err) {
      return errorReply(err, this.logger, name);
    }
  }
}
