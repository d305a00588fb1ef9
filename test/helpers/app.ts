import { createApp } from '../../src/app.js';
import type { AuthOptions } from '../../src/auth.js';
import { createCommandRegistry } from '../../src/commands/index.js';
import type { CredentialEntry } from '../../src/credentials/metadata.js';
import { MemoryStore } from '../../src/store/memory.js';
import type { TrackerStore } from '../../src/store/types.js';
import { RecordingNotifier, silentLogger, testClient, testRegistry } from './fakes.js';

export interface TestAppOptions {
  auth?: AuthOptions;
  store?: TrackerStore | null;
  keys?: Record<string, CredentialEntry>;
  env?: NodeJS.ProcessEnv;
  upstream?: (url: URL) => unknown;
  now?: () => Date;
}

export const createTestApp = async (options: TestAppOptions = {}) => {
  const store = options.store === undefined ? new MemoryStore({ now: options.now }) : options.store;
  const { client, calls } = testClient(options.upstream ?? (() => ({})));
  const credentials = await testRegistry(client, options.keys ?? {}, options.env ?? {}, options.now);
  const notifier = new RecordingNotifier();
  const commands = createCommandRegistry({
    store,
    client,
    credentials,
    notifier,
    retentionDays: 60,
    pageDelayMs: 0,
    rateLimitBackoffMs: 0,
    sleep: async () => undefined,
    now: options.now,
    logger: silentLogger,
  });
  const app = createApp({
    store,
    client,
    credentials,
    commands,
    auth: options.auth ?? { disabled: true },
    retentionDays: 60,
    now: options.now,
    logger: silentLogger,
  });
  return { app, store, credentials, notifier, calls };
};
