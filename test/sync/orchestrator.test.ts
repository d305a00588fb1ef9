import { test } from 'node:test';
import assert from 'node:assert/strict';

import { AggregationEngine } from '../../src/aggregation/summarizer.js';
import type { CredentialEntry } from '../../src/credentials/metadata.js';
import { MemoryStore } from '../../src/store/memory.js';
import type { PlayerStatsObservation, TrackedFactionUpsertInput } from '../../src/store/types.js';
import { CrimeSyncOrchestrator, nextOffset } from '../../src/sync/orchestrator.js';
import {
  RecordingNotifier,
  credentialEntry,
  fixedClock,
  recordingSleeper,
  silentLogger,
  testClient,
  testRegistry,
  upstreamError,
} from '../helpers/fakes.js';

const FACTION = 500;
const GUILD = 'guild-1';
const env = { KEY_ALPHA: 'alpha-secret-1111', KEY_BRAVO: 'bravo-secret-2222' };
const bothKeys = {
  alpha: credentialEntry({ envVar: 'KEY_ALPHA' }),
  bravo: credentialEntry({ envVar: 'KEY_BRAVO' }),
};

const rawCrime = (id: number, overrides: Record<string, unknown> = {}) => ({
  id,
  name: 'Pet Project',
  difficulty: 2,
  status: 'Recruiting',
  created_at: 1_700_000_000,
  slots: [{ position: 'Kidnapper', user: 11 }],
  ...overrides,
});

const crimesOf = (calls: URL[]) => calls.filter((url) => url.pathname === `/v2/faction/${FACTION}/crimes`);

interface SetupOptions {
  keys?: Record<string, CredentialEntry>;
  config?: Partial<TrackedFactionUpsertInput>;
  pageDelayMs?: number;
  retentionDays?: number;
}

const setup = async (handler: (url: URL) => unknown, options: SetupOptions = {}) => {
  const clock = fixedClock('2024-01-10T12:00:00Z');
  const store = new MemoryStore({ now: clock.now });
  const { client, calls } = testClient(handler);
  const credentials = await testRegistry(client, options.keys ?? bothKeys, env, clock.now);
  const notifier = new RecordingNotifier();
  const sleeper = recordingSleeper();
  await store.upsertTrackedFaction({ factionId: FACTION, guildId: GUILD, ...options.config });
  const aggregation =
    options.retentionDays === undefined
      ? undefined
      : new AggregationEngine(store, { now: clock.now, logger: silentLogger, retentionDays: options.retentionDays });
  const orchestrator = new CrimeSyncOrchestrator(
    { store, client, credentials, notifier, aggregation },
    {
      pageDelayMs: options.pageDelayMs ?? 250,
      rateLimitBackoffMs: 5_000,
      sleep: sleeper.sleep,
      now: clock.now,
      logger: silentLogger,
    }
  );
  return { clock, store, calls, notifier, waits: sleeper.waits, orchestrator };
};

/** Every key reports membership of the tracked faction unless overridden. */
const routes =
  (crimes: (url: URL) => unknown, extra: Record<string, unknown> = {}) =>
  (url: URL): unknown => {
    if (url.pathname === '/v2/faction') return { basic: { id: FACTION } };
    if (url.pathname === `/v2/faction/${FACTION}/crimes`) return crimes(url);
    if (url.pathname in extra) return extra[url.pathname];
    throw new Error(`unexpected request ${url.pathname}`);
  };

const levelRecord = (timestamp: string, level: number): PlayerStatsObservation => ({
  playerId: 11,
  strength: null,
  defense: null,
  speed: null,
  dexterity: null,
  totalStats: null,
  level,
  lifeMaximum: null,
  networth: null,
  dataSource: 'test',
  timestamp: new Date(timestamp),
});

test('nextOffset reads the offset from the next link', () => {
  assert.equal(nextOffset('https://api.test/v2/faction/500/crimes?offset=200&sort=DESC', 100), 200);
  assert.equal(nextOffset('https://api.test/v2/faction/500/crimes?sort=DESC', 100), 200);
  assert.equal(nextOffset('https://api.test/v2/faction/500/crimes?offset=50', 100), 200);
});

test('reports when no faction has tracking enabled', async () => {
  const clock = fixedClock('2024-01-10T12:00:00Z');
  const store = new MemoryStore({ now: clock.now });
  const { client, calls } = testClient(() => {
    throw new Error('no request expected');
  });
  const credentials = await testRegistry(client, bothKeys, env, clock.now);
  await store.upsertTrackedFaction({ factionId: FACTION, guildId: GUILD, enabled: false });
  const orchestrator = new CrimeSyncOrchestrator(
    { store, client, credentials, notifier: new RecordingNotifier() },
    { now: clock.now, logger: silentLogger }
  );

  const report = await orchestrator.runOnce();

  assert.equal(report.message, 'No factions with organized crime tracking enabled');
  assert.equal(report.outcomes.length, 0);
  assert.equal(calls.length, 0);
});

test('follows pagination links and advances the watermark', async () => {
  const { store, calls, waits, orchestrator } = await setup(
    routes((url) =>
      url.searchParams.get('offset') === '0'
        ? {
            crimes: [rawCrime(1)],
            _metadata: { links: { next: 'https://api.test/v2/faction/500/crimes?offset=100&sort=DESC' } },
          }
        : { crimes: [rawCrime(2)], _metadata: { links: { next: null } } }
    )
  );

  const report = await orchestrator.runOnce();

  assert.equal(report.message, 'Synced 1 faction(s) Updated 2 crime(s) Recorded 2 event(s)');
  assert.deepEqual(
    crimesOf(calls).map((url) => [url.searchParams.get('offset'), url.searchParams.get('from')]),
    [
      ['0', null],
      ['100', null],
    ]
  );
  assert.deepEqual(waits, [250]);
  assert.equal(report.outcomes[0].credentialAlias, 'alpha');
  assert.equal(report.outcomes[0].crimesFetched, 2);

  const config = await store.getTrackedFaction(FACTION, GUILD);
  assert.equal(config?.lastSync?.toISOString(), '2024-01-10T12:00:00.000Z');
  assert.deepEqual(
    (await store.listCurrentCrimes(FACTION)).map((crime) => crime.crimeId).sort(),
    [1, 2]
  );
});

test('the next pass asks only for crimes since the watermark', async () => {
  const { clock, calls, orchestrator } = await setup(routes(() => ({ crimes: [] })));

  await orchestrator.runOnce();
  clock.set('2024-01-10T12:05:00Z');
  await orchestrator.runOnce();

  assert.deepEqual(
    crimesOf(calls).map((url) => url.searchParams.get('from')),
    [null, '1704888000']
  );
});

test('prefers a key whose owner belongs to the faction', async () => {
  const { calls, orchestrator } = await setup((url) => {
    if (url.pathname === '/v2/faction') {
      return { basic: { id: url.searchParams.get('key') === env.KEY_BRAVO ? FACTION : 999 } };
    }
    if (url.pathname === `/v2/faction/${FACTION}/crimes`) return { crimes: [] };
    throw new Error(`unexpected request ${url.pathname}`);
  });

  const report = await orchestrator.runOnce();

  assert.equal(report.outcomes[0].credentialAlias, 'bravo');
  assert.equal(report.outcomes[0].keysTried, 1);
  assert.deepEqual(
    crimesOf(calls).map((url) => url.searchParams.get('key')),
    [env.KEY_BRAVO]
  );
});

test('rotates to the next key after a permission error', async () => {
  const { orchestrator, waits } = await setup(
    routes((url) => (url.searchParams.get('key') === env.KEY_ALPHA ? upstreamError(16) : { crimes: [rawCrime(1)] }))
  );

  const report = await orchestrator.runOnce();

  assert.equal(report.factionsSynced, 1);
  assert.equal(report.outcomes[0].credentialAlias, 'bravo');
  assert.equal(report.outcomes[0].keysTried, 2);
  assert.equal(report.outcomes[0].reason, undefined);
  assert.deepEqual(waits, []);
});

test('backs off once on a rate limit and retries with the same key', async () => {
  let attempts = 0;
  const { calls, orchestrator, waits } = await setup(
    routes(() => {
      attempts += 1;
      return attempts === 1 ? upstreamError(5) : { crimes: [rawCrime(1)] };
    })
  );

  const report = await orchestrator.runOnce();

  assert.equal(report.factionsSynced, 1);
  assert.equal(report.outcomes[0].credentialAlias, 'alpha');
  assert.equal(report.outcomes[0].keysTried, 1);
  assert.deepEqual(waits, [5_000]);
  assert.deepEqual(
    crimesOf(calls).map((url) => url.searchParams.get('key')),
    [env.KEY_ALPHA, env.KEY_ALPHA]
  );
});

test('fails the faction with the last reason once every key is exhausted', async () => {
  const { store, orchestrator } = await setup(
    routes((url) => (url.searchParams.get('key') === env.KEY_ALPHA ? upstreamError(16) : upstreamError(2, 'Incorrect key')))
  );

  const report = await orchestrator.runOnce();

  assert.equal(
    report.message,
    'Synced 0 faction(s) Updated 0 crime(s) Recorded 0 event(s) Failed to sync 1 faction(s)'
  );
  assert.deepEqual(report.factionsFailed, [
    { factionId: FACTION, guildId: GUILD, reason: "API error 2: Incorrect key (key 'bravo')", keysTried: 2 },
  ]);
  assert.equal((await store.getTrackedFaction(FACTION, GUILD))?.lastSync, null);
});

test('fails without requests when no key holds the faction scope', async () => {
  const { calls, orchestrator } = await setup(routes(() => ({ crimes: [] })), {
    keys: { alpha: credentialEntry({ envVar: 'KEY_ALPHA', scopes: ['user'] }) },
  });

  const report = await orchestrator.runOnce();

  assert.equal(report.factionsFailed[0].reason, 'No API key with faction permission available for faction 500');
  assert.equal(report.factionsFailed[0].keysTried, 0);
  assert.equal(calls.length, 0);
});

test('sends a reminder for each filled slot missing its item on every pass', async () => {
  const crime = rawCrime(1, {
    status: 'Planning',
    slots: [
      { position: 'Hacker', user: 11, item_requirement: { id: 206, is_available: false } },
      { position: 'Muscle', user: 12, item_requirement: { id: 206, is_available: true } },
      { position: 'Lookout', user: null, item_requirement: { id: 206, is_available: false } },
    ],
  });
  const { calls, notifier, store, orchestrator } = await setup(
    routes(() => ({ crimes: [crime] }), {
      '/v2/user/11/discord': { discord: { discord_id: 123456 } },
      '/v2/torn/206/items': { items: [{ id: 206, name: 'Lockpick', type: 'Tool' }] },
    }),
    { config: { missingItemChannelId: 'items-channel' } }
  );

  const first = await orchestrator.runOnce();
  const second = await orchestrator.runOnce();

  const expected = {
    channelId: 'items-channel',
    content: '<@123456> You need to get **Lockpick** for the **Hacker** slot in crime **Pet Project** (ID: 1)',
  };
  assert.deepEqual(notifier.sent, [expected, expected]);
  assert.equal(first.remindersSent, 1);
  assert.equal(second.remindersSent, 1);
  assert.equal(calls.filter((url) => url.pathname === '/v2/user/11/discord').length, 1);
  assert.equal(calls.filter((url) => url.pathname === '/v2/torn/206/items').length, 1);
  assert.equal((await store.getPlayer(11))?.discordId, '123456');
  assert.equal((await store.getItem(206))?.name, 'Lockpick');
});

test('no reminders go out without a configured channel', async () => {
  const crime = rawCrime(1, {
    slots: [{ position: 'Hacker', user: 11, item_requirement: { id: 206, is_available: false } }],
  });
  const { notifier, orchestrator } = await setup(routes(() => ({ crimes: [crime] })));

  const report = await orchestrator.runOnce();

  assert.equal(report.remindersSent, 0);
  assert.deepEqual(notifier.sent, []);
});

test('notifies leads about players above the leave threshold', async () => {
  const { notifier, store, orchestrator } = await setup(routes(() => ({ crimes: [] })), {
    config: { notificationChannelId: 'leads-channel', leadIds: ['lead-1', 'lead-2'] },
  });
  const leave = (crimeId: number, playerId: number, occurredAt: string) => ({
    factionId: FACTION,
    crimeId,
    crimeName: 'Pet Project',
    eventType: 'participant_left' as const,
    playerId,
    oldStatus: null,
    newStatus: null,
    oldParticipants: null,
    newParticipants: null,
    rewards: null,
    dataSource: null,
    occurredAt: new Date(occurredAt),
  });
  await store.appendCrimeEvents([
    leave(7, 11, '2024-01-07T08:00:00Z'),
    leave(8, 11, '2024-01-08T09:30:00Z'),
    leave(9, 11, '2024-01-09T10:15:00Z'),
    leave(9, 12, '2024-01-09T10:15:00Z'),
    leave(3, 12, '2023-11-01T00:00:00Z'),
    leave(4, 12, '2023-11-02T00:00:00Z'),
  ]);

  const report = await orchestrator.runOnce();

  assert.equal(report.leaverNotifications, 1);
  assert.deepEqual(notifier.sent, [
    {
      channelId: 'leads-channel',
      content: '<@lead-1> <@lead-2>',
      embed: {
        title: 'Frequent Crime Leaver Detected',
        description: 'Player has left 3 crime(s) in the last 30 days',
        fields: [
          { name: 'Player', value: 'ID: 11' },
          { name: 'Leaves', value: '3 (threshold: 2)' },
          {
            name: 'Recent Crimes Left',
            value: 'Crime 9 (2024-01-09 10:15)\nCrime 8 (2024-01-08 09:30)\nCrime 7 (2024-01-07 08:00)',
          },
        ],
        footer: 'Faction ID: 500',
      },
    },
  ]);
});

test('an aborted signal stops the pass before any faction', async () => {
  const { notifier, orchestrator } = await setup(routes(() => ({ crimes: [] })), {
    config: { notificationChannelId: 'leads-channel', leadIds: ['lead-1'] },
  });
  const controller = new AbortController();
  controller.abort();

  const report = await orchestrator.runOnce({ signal: controller.signal });

  assert.equal(report.aborted, true);
  assert.deepEqual(report.outcomes, []);
  assert.equal(report.leaverNotifications, 0);
  assert.deepEqual(notifier.sent, []);
});

test('aborting between pages leaves the watermark untouched', async () => {
  const controller = new AbortController();
  const { store, orchestrator } = await setup(
    routes(() => {
      controller.abort();
      return {
        crimes: [rawCrime(1)],
        _metadata: { links: { next: 'https://api.test/v2/faction/500/crimes?offset=100' } },
      };
    })
  );

  const report = await orchestrator.runOnce({ signal: controller.signal });

  assert.equal(report.aborted, true);
  assert.equal(report.outcomes[0].status, 'aborted');
  assert.equal(report.outcomes[0].reason, 'Sync aborted before completion');
  assert.equal((await store.getTrackedFaction(FACTION, GUILD))?.lastSync, null);
  assert.deepEqual(await store.listCurrentCrimes(FACTION), []);
});

test('a clean pass summarizes the previous month and prunes old history', async () => {
  const { store, orchestrator } = await setup(routes(() => ({ crimes: [] })), { retentionDays: 30 });
  await store.appendPlayerStats(levelRecord('2023-12-01T00:00:00Z', 20));
  await store.appendPlayerStats(levelRecord('2023-12-20T00:00:00Z', 24));

  const report = await orchestrator.runOnce();

  assert.deepEqual(report.maintenance, {
    period: { year: 2023, month: 12 },
    playerSummaries: 1,
    factionSummaries: 0,
    pruned: { player_stats: 1, faction: 0, contributors: 0 },
  });
  const [summary] = await store.listPeriodSummaries('player_stats', 11);
  assert.equal(summary.recordCount, 2);
  assert.deepEqual(summary.attributes.level, { start: 20, end: 24, change: 4 });

  const again = await orchestrator.runOnce();
  assert.equal(again.maintenance?.playerSummaries, 0);
  assert.equal((await store.listPeriodSummaries('player_stats', 11)).length, 1);
});

test('a pass with a failed faction leaves history alone', async () => {
  const { store, orchestrator } = await setup(routes(() => upstreamError(2, 'Incorrect key')), { retentionDays: 30 });
  await store.appendPlayerStats(levelRecord('2023-12-01T00:00:00Z', 20));

  const report = await orchestrator.runOnce();

  assert.equal(report.factionsFailed.length, 1);
  assert.equal(report.maintenance, undefined);
  assert.deepEqual(await store.listPeriodSummaries('player_stats', 11), []);
  assert.equal(await store.pruneHistory('player_stats', new Date('2023-12-02T00:00:00Z')), 1);
});
