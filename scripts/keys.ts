#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { createCommandRegistry } from '../src/commands/index.js';
import { loadConfig } from '../src/config.js';
import { createRuntime } from '../src/runtime.js';
import { CLI_INVOKER, printReply } from './cli.js';

const main = async () => {
  const runtime = await createRuntime(loadConfig(), console, { withStore: false });
  const registry = createCommandRegistry(runtime.commandContext);

  await yargs(hideBin(process.argv))
    .scriptName('keys')
    .option('json', { type: 'boolean', default: false, describe: 'Print the full reply as JSON' })
    .command(
      'add <alias> <env-var>',
      'Register a key held in an environment variable',
      (y) =>
        y
          .positional('alias', { type: 'string', demandOption: true })
          .positional('env-var', { type: 'string', demandOption: true })
          .option('owner', { type: 'string', describe: 'Owning user id' })
          .option('shared', { type: 'boolean', default: false, describe: 'Usable by everyone' })
          .option('key-type', { type: 'string', default: 'user' })
          .option('validate', { type: 'boolean', default: true, describe: 'Check the key against the API' }),
      async (args) => {
        const reply = await registry.invoke(
          'keys.add',
          {
            alias: args.alias,
            env_var: args['env-var'],
            owner: args.owner,
            shared: args.shared,
            key_type: args['key-type'],
            validate: args.validate,
          },
          CLI_INVOKER
        );
        printReply(reply, args.json);
      }
    )
    .command(
      'remove <alias>',
      'Remove a registered key',
      (y) => y.positional('alias', { type: 'string', demandOption: true }),
      async (args) => printReply(await registry.invoke('keys.remove', { alias: args.alias }, CLI_INVOKER), args.json)
    )
    .command(
      'list',
      'List registered keys',
      (y) => y,
      async (args) => printReply(await registry.invoke('keys.list', {}, CLI_INVOKER), args.json)
    )
    .command(
      'validate <alias>',
      'Validate a key and refresh its permissions',
      (y) => y.positional('alias', { type: 'string', demandOption: true }),
      async (args) =>
        printReply(await registry.invoke('keys.validate', { alias: args.alias }, CLI_INVOKER), args.json)
    )
    .demandCommand(1)
    .strict()
    .help()
    .parseAsync();
};

main().catch((err) => {
  console.error('keys_failed', err);
  process.exitCode = 1;
});
