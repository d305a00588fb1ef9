import 'dotenv/config';
import { getPool } from './client.js';
import { migrateDatabase } from './migrations.js';

async function main() {
  const pool = getPool();
  try {
    const report = await migrateDatabase(pool);
    if (report.applied.length) {
      console.log(`Schema migrated from version ${report.from} to ${report.to}`);
    } else {
      console.log(`Schema up to date at version ${report.to}`);
    }
  } finally {
    await pool.end().catch((err: unknown) => console.warn('db_pool_close_failed', err));
  }
}

main().catch((err) => {
  console.error('migrate_failed', err);
  process.exit(1);
});
