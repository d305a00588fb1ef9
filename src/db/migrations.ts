import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { Pool, PoolClient } from 'pg';
import { z } from 'zod';

import type { Logger } from '../logging.js';

export interface MigrationClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export interface Migration {
  version: number;
  description: string;
  apply: (client: MigrationClient) => Promise<void>;
}

const MIGRATIONS_DIR = join(process.cwd(), 'drizzle');

const sqlFile =
  (file: string) =>
  async (client: MigrationClient): Promise<void> => {
    await client.query(readFileSync(join(MIGRATIONS_DIR, file), 'utf8'));
  };

export const MIGRATIONS: readonly Migration[] = [
  { version: 1, description: 'players, factions and their history', apply: sqlFile('0001_core_entities.sql') },
  { version: 2, description: 'organized crimes, tracked factions, items', apply: sqlFile('0002_organized_crimes.sql') },
  { version: 3, description: 'period summaries', apply: sqlFile('0003_period_summaries.sql') },
  { version: 4, description: 'competitions and contributor history', apply: sqlFile('0004_competitions.sql') },
];

export const LATEST_SCHEMA_VERSION = MIGRATIONS.reduce((max, migration) => Math.max(max, migration.version), 0);

const ensureVersionTableSQL = `
CREATE TABLE IF NOT EXISTS schema_version (
  version INTEGER PRIMARY KEY,
  description TEXT NOT NULL,
  applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
`;

const VersionRowSchema = z.object({ version: z.coerce.number().int().nullable() });

export const readSchemaVersion = async (client: MigrationClient): Promise<number> => {
  const result = await client.query('SELECT MAX(version) AS version FROM schema_version');
  const row = VersionRowSchema.safeParse(result.rows[0]);
  return row.success ? row.data.version ?? 0 : 0;
};

const assertOrdered = (migrations: readonly Migration[]) => {
  migrations.forEach((migration, index) => {
    if (index > 0 && migration.version <= migrations[index - 1].version) {
      throw new Error(`Migration versions must be strictly increasing (found ${migration.version} after ${migrations[index - 1].version})`);
    }
  });
};

export interface MigrationReport {
  from: number;
  to: number;
  applied: number[];
}

export const runMigrations = async (
  client: MigrationClient,
  migrations: readonly Migration[] = MIGRATIONS,
  logger: Logger = console
): Promise<MigrationReport> => {
  assertOrdered(migrations);
  await client.query(ensureVersionTableSQL);

  const from = await readSchemaVersion(client);
  let current = from;
  const applied: number[] = [];

  for (const migration of migrations) {
    if (migration.version <= current) continue;

    logger.log('migration_applying', { version: migration.version, description: migration.description });
    await client.query('BEGIN');
    try {
      await migration.apply(client);
      await client.query('INSERT INTO schema_version (version, description) VALUES ($1, $2)', [
        migration.version,
        migration.description,
      ]);
      await client.query('COMMIT');
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    }
    current = migration.version;
    applied.push(migration.version);
  }

  return { from, to: current, applied };
};

const parsePositiveInteger = (value: string | undefined, fallback: number) => {
  const parsed = Number.parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

const RETRY_ATTEMPTS = parsePositiveInteger(process.env.DB_MIGRATE_RETRIES, 10);
const RETRY_DELAY_MS = parsePositiveInteger(process.env.DB_MIGRATE_RETRY_DELAY_MS, 5_000);

const connectWithRetry = async (pool: Pool, logger: Logger): Promise<PoolClient> => {
  let lastError: unknown;
  for (let attempt = 1; attempt <= RETRY_ATTEMPTS; attempt += 1) {
    try {
      return await pool.connect();
    } catch (err) {
      lastError = err;
      if (attempt === RETRY_ATTEMPTS) break;
      const delay = RETRY_DELAY_MS * attempt;
      logger.warn('db_connect_retry', {
        attempt,
        attempts: RETRY_ATTEMPTS,
        delayMs: delay,
        message: err instanceof Error ? err.message : String(err),
      });
      await sleep(delay);
    }
  }
  throw lastError instanceof Error ? lastError : new Error('Failed to acquire database connection');
};

export const migrateDatabase = async (pool: Pool, logger: Logger = console): Promise<MigrationReport> => {
  const client = await connectWithRetry(pool, logger);
  try {
    return await runMigrations(client, MIGRATIONS, logger);
  } finally {
    client.release();
  }
};
