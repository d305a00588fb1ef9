import { ApiClient } from './api/client.js';
import { SlidingWindowRateLimiter } from './api/rate-limit.js';
import type { CommandContext } from './commands/context.js';
import type { AppConfig } from './config.js';
import { JsonFileMetadataStore } from './credentials/metadata.js';
import { CredentialRegistry } from './credentials/registry.js';
import { getPool } from './db/client.js';
import { migrateDatabase } from './db/migrations.js';
import { describeError, type Logger } from './logging.js';
import { MemoryStore } from './store/memory.js';
import { PostgresStore } from './store/postgres.js';
import type { TrackerStore } from './store/types.js';
import { ConsoleNotifier, WebhookNotifier, type Notifier } from './sync/notifications.js';

export interface Runtime {
  config: AppConfig;
  store: TrackerStore | null;
  client: ApiClient;
  credentials: CredentialRegistry;
  notifier: Notifier;
  commandContext: CommandContext;
  close(): Promise<void>;
}

/**
 * Migrates and opens Postgres when DATABASE_URL is set, otherwise an in-memory
 * store. A database that cannot be reached leaves the store `null`; storage-backed
 * commands then reply `storage_unavailable`.
 */
export const openStore = async (config: AppConfig, logger: Logger = console): Promise<TrackerStore | null> => {
  if (!config.databaseUrl) {
    logger.warn('store_in_memory', { reason: 'DATABASE_URL is not set' });
    return new MemoryStore();
  }
  try {
    const report = await migrateDatabase(getPool(), logger);
    logger.log('schema_ready', { from: report.from, to: report.to, applied: report.applied });
    return new PostgresStore();
  } catch (err) {
    logger.error('database_unavailable', { error: describeError(err) });
    return null;
  }
};

export const createRuntime = async (
  config: AppConfig,
  logger: Logger = console,
  options: { withStore?: boolean } = {}
): Promise<Runtime> => {
  const client = new ApiClient({
    baseUrl: config.api.baseUrl,
    timeoutMs: config.api.timeoutMs,
    limiter: new SlidingWindowRateLimiter({ limit: config.api.rateLimit, windowMs: config.api.rateWindowMs }),
  });
  const credentials = await CredentialRegistry.open({
    store: new JsonFileMetadataStore(config.credentialsFile),
    client,
    logger,
  });
  const notifier = config.notifyWebhookUrl ? new WebhookNotifier(config.notifyWebhookUrl) : new ConsoleNotifier(logger);
  const usesDatabase = (options.withStore ?? true) && Boolean(config.databaseUrl);
  const store = options.withStore ?? true ? await openStore(config, logger) : null;

  return {
    config,
    store,
    client,
    credentials,
    notifier,
    commandContext: {
      store,
      client,
      credentials,
      notifier,
      retentionDays: config.retentionDays,
      pageDelayMs: config.sync.pageDelayMs,
      rateLimitBackoffMs: config.sync.rateLimitBackoffMs,
      logger,
    },
    close: async () => {
      if (usesDatabase) await getPool().end();
    },
  };
};
