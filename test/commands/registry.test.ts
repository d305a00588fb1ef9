import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { createCommandRegistry, type CommandRegistry, type Invoker } from '../../src/commands/index.js';
import { MemoryStore } from '../../src/store/memory.js';
import type { CrimeRecord, TrackerStore } from '../../src/store/types.js';
import {
  RecordingNotifier,
  credentialEntry,
  fixedClock,
  silentLogger,
  testClient,
  testRegistry,
} from '../helpers/fakes.js';

const admin: Invoker = { id: 'admin-1', isAdmin: true };
const member: Invoker = { id: 'user-7', isAdmin: false };

class BrokenStore extends MemoryStore {
  override async listCurrentCrimes(): Promise<CrimeRecord[]> {
    throw new Error('connection reset');
  }
}

class DisconnectedStore extends MemoryStore {
  override async listCurrentCrimes(): Promise<CrimeRecord[]> {
    throw Object.assign(new Error('terminating connection due to administrator command'), { code: '57P01' });
  }
}

const setup = async (store: TrackerStore | null) => {
  const clock = fixedClock('2024-05-01T12:00:00Z');
  const { client } = testClient(() => ({}));
  const credentials = await testRegistry(
    client,
    {
      shared: credentialEntry({ envVar: 'KEY_SHARED' }),
      mine: credentialEntry({ envVar: 'KEY_MINE', owner: 'user-7' }),
      theirs: credentialEntry({ envVar: 'KEY_THEIRS', owner: 'user-9' }),
    },
    { KEY_SHARED: 'shared-secret-0000', KEY_MINE: 'mine-secret-1111', KEY_THEIRS: 'theirs-secret-2222' },
    clock.now
  );
  return createCommandRegistry({
    store,
    client,
    credentials,
    notifier: new RecordingNotifier(),
    retentionDays: 60,
    pageDelayMs: 0,
    rateLimitBackoffMs: 0,
    sleep: async () => undefined,
    now: clock.now,
    logger: silentLogger,
    random: () => 0.999,
  });
};

let store: MemoryStore;
let commands: CommandRegistry;

beforeEach(async () => {
  store = new MemoryStore({ now: fixedClock('2024-05-01T12:00:00Z').now });
  commands = await setup(store);
});

test('lists commands by name with their admin flag', () => {
  const listed = commands.list();
  assert.deepEqual(
    listed.slice(0, 2).map((command) => [command.name, command.admin]),
    [
      ['competition.add-participants', true],
      ['competition.cancel', true],
    ]
  );
  assert.ok(listed.some((command) => command.name === 'crimes.list' && !command.admin));
});

test('unknown commands and missing permissions are refused', async () => {
  assert.deepEqual(await commands.invoke('nope', {}, admin), {
    ok: false,
    error: 'unknown_command',
    message: 'Unknown command: nope',
  });
  assert.deepEqual(await commands.invoke('crimes.track', { faction_id: 500, guild_id: 'g' }, member), {
    ok: false,
    error: 'forbidden',
    message: 'This command requires administrator permissions.',
  });
});

test('arguments are validated before running', async () => {
  const reply = await commands.invoke('crimes.list', { faction_id: 'abc' }, member);
  assert.equal(reply.ok, false);
  assert.equal(reply.ok ? null : reply.error, 'validation_error');

  const summarize = await commands.invoke('db.summarize', { year: 2024 }, admin);
  assert.equal(summarize.ok ? null : summarize.error, 'validation_error');
});

test('storage commands report the database as unavailable', async () => {
  const degraded = await setup(null);

  assert.deepEqual(await degraded.invoke('crimes.list', { faction_id: 500 }, member), {
    ok: false,
    error: 'storage_unavailable',
    message: 'Database not available.',
  });
  const keys = await degraded.invoke('keys.list', {}, admin);
  assert.equal(keys.ok, true);
  assert.equal(keys.message, '3 API key(s)');
});

test('unexpected errors are answered generically', async () => {
  const broken = await setup(new BrokenStore());
  assert.deepEqual(await broken.invoke('crimes.list', { faction_id: 500 }, member), {
    ok: false,
    error: 'internal_error',
    message: 'Unexpected error',
  });
});

test('a dropped database connection is answered as unavailable storage', async () => {
  const disconnected = await setup(new DisconnectedStore());
  assert.deepEqual(await disconnected.invoke('crimes.list', { faction_id: 500 }, member), {
    ok: false,
    error: 'storage_unavailable',
    message: 'Database not available.',
  });
});

test('frequent leavers are visible to faction leads only', async () => {
  const untracked = await commands.invoke('crimes.configure-leavers', { faction_id: 500, guild_id: 'g' }, admin);
  assert.equal(untracked.ok ? null : untracked.error, 'tracked_faction_not_found');

  const tracked = await commands.invoke('crimes.track', { faction_id: 500, guild_id: 'g' }, admin);
  assert.equal(tracked.message, 'Organized crime tracking enabled for faction 500');

  const configured = await commands.invoke(
    'crimes.configure-leavers',
    { faction_id: 500, guild_id: 'g', channel_id: 'leads', lead_ids: 'user-7, user-8', threshold: 3 },
    admin
  );
  assert.equal(
    configured.message,
    'Frequent leaver notifications configured for faction 500 (threshold: 3, window: 30 days)'
  );
  assert.deepEqual((await store.getTrackedFaction(500, 'g'))?.leadIds, ['user-7', 'user-8']);

  assert.deepEqual(await commands.invoke('crimes.frequent-leavers', { faction_id: 500, guild_id: 'g' }, { id: 'user-1', isAdmin: false }), {
    ok: false,
    error: 'forbidden',
    message: 'You must be a faction lead or server administrator to view frequent leavers.',
  });
  const lead = await commands.invoke('crimes.frequent-leavers', { faction_id: 500, guild_id: 'g' }, member);
  assert.deepEqual(lead, {
    ok: true,
    message: 'No frequent leavers found (threshold: 2, window: 30 days).',
    data: { leavers: [] },
  });
});

test('configuring leavers for an untracked faction fails', async () => {
  const reply = await commands.invoke('crimes.configure-leavers', { faction_id: 501, guild_id: 'g' }, admin);
  assert.deepEqual(reply, {
    ok: false,
    error: 'tracked_faction_not_found',
    message: 'No organized crime tracking configured for faction 501 in this server.',
  });
});

test('competition commands create, rank and reassign', async () => {
  const created = await commands.invoke(
    'competition.create',
    { name: 'Push', tracked_stat: 'revives', start_date: '2024-05-01', end_date: '2024-05-31', num_teams: 2 },
    admin
  );
  assert.equal(created.message, "Competition 'Push' created with 2 teams");
  const [competition] = await store.listCompetitions();
  const competitionId = competition.competitionId;

  assert.deepEqual(await commands.invoke('competition.status', { competition_id: competitionId }, member), {
    ok: false,
    error: 'no_participants',
    message: 'No participants found for this competition.',
  });

  await store.upsertPlayer({ playerId: 11, name: 'Alpha', factionId: 500 });
  await store.upsertPlayer({ playerId: 12, name: 'Bravo', factionId: 500 });
  await store.addCompetitionParticipant({ competitionId, playerId: 11, startValue: 100 });
  await store.addCompetitionParticipant({ competitionId, playerId: 12, startValue: 50 });
  for (const [playerId, value] of [
    [11, 400],
    [12, 650],
  ]) {
    await store.appendContributorStat({
      playerId,
      statName: 'revives',
      value,
      factionId: 500,
      dataSource: 'test',
      timestamp: new Date('2024-05-01T11:00:00Z'),
    });
  }

  const status = await commands.invoke('competition.status', { competition_id: String(competitionId) }, member);
  assert.equal(status.message, 'Push (revives)\n1. Bravo: +600\n2. Alpha: +300');

  const moved = await commands.invoke(
    'competition.update-assignment',
    { competition_id: competitionId, player_id: 11, team_id: 0 },
    admin
  );
  assert.equal(moved.message, 'Player 11 assigned to No team');

  const missing = await commands.invoke('competition.cancel', { competition_id: 9_999 }, admin);
  assert.deepEqual(missing, {
    ok: false,
    error: 'competition_not_found',
    message: 'Competition with ID 9999 not found.',
  });
});

test('keys are listed per owner and removed by their owner only', async () => {
  const listed = await commands.invoke('keys.list', {}, member);
  assert.equal(listed.message, '2 API key(s)');

  assert.deepEqual(await commands.invoke('keys.remove', { alias: 'theirs' }, member), {
    ok: false,
    error: 'not_owner',
    message: "Only the owner or an administrator can remove 'theirs'",
  });
  assert.deepEqual(await commands.invoke('keys.remove', { alias: 'mine' }, member), {
    ok: true,
    message: "Removed key 'mine'",
  });
});

test('db.summarize defaults to the previous month', async () => {
  const reply = await commands.invoke('db.summarize', {}, admin);
  assert.deepEqual(reply, {
    ok: true,
    message: 'Summarized 2024-04: 0 player summary(ies), 0 faction summary(ies)',
    data: { period: '2024-04', player_summaries: 0, faction_summaries: 0, pruned: null },
  });
});
