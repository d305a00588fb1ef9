import { getDb } from '../../db/client.js';
import { players } from '../../db/schema.js';

export type DbClient = ReturnType<typeof getDb>;

export interface PostgresStoreContext {
  db: DbClient;
  now: () => Date;
  ensurePlayer: (playerId: number, client?: DbClient) => Promise<void>;
}

const now = () => new Date();

const createEnsurePlayer = (db: DbClient, nowFn: () => Date) =>
  async (playerId: number, client: DbClient = db) => {
    await client
      .insert(players)
      .values({
        playerId,
        name: `Player ${playerId}`,
        createdAt: nowFn(),
        lastUpdated: nowFn(),
      })
      .onConflictDoNothing({ target: players.playerId });
  };

export const createPostgresContext = (db: DbClient): PostgresStoreContext => {
  const nowFn = now;
  return {
    db,
    now: nowFn,
    ensurePlayer: createEnsurePlayer(db, nowFn),
  } satisfies PostgresStoreContext;
};
