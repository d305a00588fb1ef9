import { competitionCommands } from './competitions.js';
import type { CommandContext } from './context.js';
import { credentialCommands } from './credentials.js';
import { crimeCommands } from './crimes.js';
import { databaseCommands } from './database.js';
import { entityCommands } from './entities.js';
import { CommandRegistry } from './registry.js';

export type { CommandContext } from './context.js';
export { CommandRegistry, type CommandReply, type Invoker } from './registry.js';

export const createCommandRegistry = (context: CommandContext): CommandRegistry =>
  new CommandRegistry({ storageAvailable: () => context.store !== null, logger: context.logger }).register(
    ...crimeCommands(context),
    ...credentialCommands(context),
    ...databaseCommands(context),
    ...entityCommands(context),
    ...competitionCommands(context)
  );
