import 'dotenv/config';

import { createApp } from './app.js';
import { createCommandRegistry } from './commands/index.js';
import { loadConfig } from './config.js';
import { createRuntime } from './runtime.js';

const main = async () => {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const app = createApp({
    store: runtime.store,
    client: runtime.client,
    credentials: runtime.credentials,
    commands: createCommandRegistry(runtime.commandContext),
    auth: config.auth,
    retentionDays: config.retentionDays,
  });

  if (config.auth.disabled) {
    console.warn('auth_disabled', { reason: config.auth.sharedSecret ? 'AUTH_DISABLE=1' : 'no shared secret' });
  }
  app.listen(config.port, () => console.log(`factionsync listening on :${config.port}`));
};

main().catch((err) => {
  console.error('startup_failed', err);
  process.exitCode = 1;
});
