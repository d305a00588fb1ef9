#!/usr/bin/env tsx
import 'dotenv/config';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { createCommandRegistry } from '../src/commands/index.js';
import { loadConfig } from '../src/config.js';
import { createRuntime } from '../src/runtime.js';
import { CLI_INVOKER, printReply } from './cli.js';

const main = async () => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('summarize')
    .usage('$0 [options]')
    .option('year', { type: 'number', describe: 'Year to summarize (defaults to the previous month)' })
    .option('month', { type: 'number', describe: 'Month to summarize, 1-12' })
    .option('force', { type: 'boolean', default: false, describe: 'Overwrite existing summaries' })
    .option('prune-days', { type: 'number', describe: 'Also delete history older than this many days' })
    .option('json', { type: 'boolean', default: false, describe: 'Print the full reply as JSON' })
    .check((args) => {
      if ((args.year === undefined) !== (args.month === undefined)) {
        throw new Error('--year and --month must be given together');
      }
      return true;
    })
    .help()
    .parseAsync();

  const runtime = await createRuntime(loadConfig());
  const registry = createCommandRegistry(runtime.commandContext);
  const reply = await registry.invoke(
    'db.summarize',
    { year: argv.year, month: argv.month, force: argv.force, prune_days: argv['prune-days'] },
    CLI_INVOKER
  );
  printReply(reply, argv.json);
  await runtime.close();
};

main().catch((err) => {
  console.error('summarize_failed', err);
  process.exitCode = 1;
});
