#!/usr/bin/env tsx
import 'dotenv/config';
import jwt from 'jsonwebtoken';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import { loadConfig } from '../src/config.js';

const main = async () => {
  const argv = await yargs(hideBin(process.argv))
    .scriptName('mint-token')
    .usage('$0 [options]')
    .option('subject', {
      type: 'string',
      alias: 's',
      describe: 'Invoker id (sub) to embed in the token',
      demandOption: true,
    })
    .option('admin', {
      type: 'boolean',
      alias: 'a',
      describe: 'Grant administrator commands',
      default: false,
    })
    .option('expires-in', {
      type: 'number',
      alias: 'e',
      describe: 'Lifetime in seconds',
      default: 3600,
    })
    .help()
    .parseAsync();

  const sharedSecret = loadConfig().auth.sharedSecret;
  if (!sharedSecret) {
    throw new Error('COMMAND_SHARED_SECRET is not set. Please configure it in your environment.');
  }

  const now = Math.floor(Date.now() / 1000);
  const exp = now + argv['expires-in'];
  const payload: jwt.JwtPayload = { sub: argv.subject, admin: argv.admin, iat: now, exp };
  const token = jwt.sign(payload, sharedSecret, { algorithm: 'HS256' });

  console.log(JSON.stringify({ token, payload, expiresAt: new Date(exp * 1000).toISOString() }, null, 2));
};

main().catch((err) => {
  console.error('mint_token_failed', err instanceof Error ? err.message : err);
  process.exitCode = 1;
});
