import { test } from 'node:test';
import assert from 'node:assert/strict';

import { MemoryStore } from '../../src/store/memory.js';
import {
  EntityRecorder,
  factionMembers,
  factionSnapshotFromProfile,
  playerSnapshotFromProfile,
} from '../../src/sync/entity-recorder.js';
import { fixedClock, silentLogger, testClient } from '../helpers/fakes.js';

const credential = { alias: 'main', secret: 'test-secret-9876' };
const RANGE = [new Date('2024-01-01T00:00:00Z'), new Date('2024-12-31T00:00:00Z')] as const;

test('player snapshots sum battle stats and read networth', () => {
  const snapshot = playerSnapshotFromProfile({
    player_id: 11,
    name: 'Alice',
    level: 30,
    faction: { faction_id: 500 },
    strength: 100,
    defense: 200,
    speed: 300,
    dexterity: 400,
    personalstats: { networth: 5_000_000 },
  });
  assert.equal(snapshot?.totalStats, 1_000);
  assert.equal(snapshot?.networth, 5_000_000);
  assert.equal(snapshot?.factionId, 500);
});

test('player snapshots leave totals unknown when a battle stat is missing', () => {
  const snapshot = playerSnapshotFromProfile({ name: 'Bob', strength: 100, faction: { faction_id: 0 } }, 12);
  assert.equal(snapshot?.playerId, 12);
  assert.equal(snapshot?.totalStats, null);
  assert.equal(snapshot?.factionId, null);
  assert.equal(playerSnapshotFromProfile({ name: 'Nobody' }), null);
});

test('faction snapshots count members', () => {
  const snapshot = factionSnapshotFromProfile(
    { name: 'Night Owls', leader: 11, 'co-leader': 0, members: { '11': {}, '12': {} } },
    500
  );
  assert.equal(snapshot.factionId, 500);
  assert.equal(snapshot.leaderId, 11);
  assert.equal(snapshot.coLeaderId, null);
  assert.equal(snapshot.memberCount, 2);
});

test('factionMembers keeps numeric keys and defaults names', () => {
  assert.deepEqual(factionMembers({ '11': { name: 'Alice', level: 30 }, '12': 'garbage', status: {} }), [
    { playerId: 11, name: 'Alice', level: 30 },
    { playerId: 12, name: 'Player 12', level: null },
  ]);
});

test('refreshPlayer upserts current state and appends one history row', async () => {
  const clock = fixedClock('2024-06-01T00:00:00Z');
  const store = new MemoryStore({ now: clock.now });
  const { client, calls } = testClient(() => ({
    player_id: 11,
    name: 'Alice',
    level: 30,
    life: { current: 500, maximum: 750 },
    personalstats: { networth: 123 },
  }));
  const recorder = new EntityRecorder(store, client, { now: clock.now, logger: silentLogger });

  const record = await recorder.refreshPlayer(11, credential);
  await recorder.refreshPlayer(11, credential);

  assert.equal(calls[0].pathname, '/user/11');
  assert.equal(calls[0].searchParams.get('selections'), 'profile,personalstats');
  assert.equal(record.name, 'Alice');
  assert.equal(record.lifeMaximum, 750);

  const [endpoints] = await store.listPeriodEndpoints('player_stats', ...RANGE);
  assert.equal(endpoints.recordCount, 2);
  assert.deepEqual(endpoints.last.values, {
    strength: null,
    defense: null,
    speed: null,
    dexterity: null,
    totalStats: null,
    level: 30,
    lifeMaximum: 750,
    networth: 123,
  });
});

test('refreshPlayer without an id reads the key owner with battle stats', async () => {
  const store = new MemoryStore();
  const { client, calls } = testClient(() => ({ player_id: 11, name: 'Alice', total: 42 }));
  const recorder = new EntityRecorder(store, client, { logger: silentLogger });

  await recorder.refreshPlayer(undefined, credential);
  assert.equal(calls[0].pathname, '/user');
  assert.equal(calls[0].searchParams.get('selections'), 'profile,battlestats,personalstats');
});

test('refreshFaction records faction history', async () => {
  const clock = fixedClock('2024-06-01T00:00:00Z');
  const store = new MemoryStore({ now: clock.now });
  const { client } = testClient(() => ({ ID: 500, name: 'Night Owls', respect: 1_000, best_chain: 250, members: { '11': {} } }));
  const recorder = new EntityRecorder(store, client, { now: clock.now, logger: silentLogger });

  const faction = await recorder.refreshFaction(500, credential);
  assert.equal(faction.name, 'Night Owls');

  const [endpoints] = await store.listPeriodEndpoints('faction', ...RANGE);
  assert.deepEqual(endpoints.first.values, { respect: 1_000, memberCount: 1, bestChain: 250 });
});

test('recordMembers assigns every member to the faction', async () => {
  const store = new MemoryStore();
  const { client } = testClient(() => ({}));
  const recorder = new EntityRecorder(store, client, { logger: silentLogger });

  await recorder.recordMembers(500, { '11': { name: 'Alice', level: 30 } });
  const player = await store.getPlayer(11);
  assert.equal(player?.factionId, 500);
  assert.equal(player?.level, 30);
});
