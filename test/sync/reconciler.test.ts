import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { MemoryStore } from '../../src/store/memory.js';
import { CrimeReconciler } from '../../src/sync/reconciler.js';
import { fixedClock, silentLogger } from '../helpers/fakes.js';

const FACTION = 500;

const rawCrime = (overrides: Record<string, unknown> = {}) => ({
  id: 1,
  name: 'Pet Project',
  difficulty: 2,
  status: 'Recruiting',
  created_at: 1_700_000_000,
  slots: [{ position: 'Kidnapper', user: 11 }, { position: 'Muscle', user: null }],
  ...overrides,
});

let clock: ReturnType<typeof fixedClock>;
let store: MemoryStore;
let reconciler: CrimeReconciler;

beforeEach(() => {
  clock = fixedClock('2024-01-10T12:00:00Z');
  store = new MemoryStore({ now: clock.now });
  reconciler = new CrimeReconciler(store, { now: clock.now, logger: silentLogger });
});

test('a new crime is recorded with a created event', async () => {
  const result = await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');

  assert.equal(result.newCrimes, 1);
  assert.equal(result.crimesUpdated, 1);
  assert.deepEqual(
    result.events.map((event) => event.eventType),
    ['created']
  );
  assert.equal(result.events[0].occurredAt.toISOString(), '2023-11-14T22:13:20.000Z');

  const [current] = await store.listCurrentCrimes(FACTION);
  assert.equal(current.status, 'planning');
  assert.deepEqual(current.participants, [11]);
  assert.equal(current.dataSource, 'main');
});

test('participant changes produce join and leave events', async () => {
  await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');
  const result = await reconciler.reconcileBatch(
    FACTION,
    [rawCrime({ slots: [{ position: 'Kidnapper', user: 12 }, { position: 'Muscle', user: 13 }] })],
    'main'
  );

  assert.deepEqual(
    result.events.map((event) => [event.eventType, event.playerId]),
    [
      ['participant_joined', 12],
      ['participant_joined', 13],
      ['participant_left', 11],
    ]
  );
  assert.deepEqual(result.events[2].oldParticipants, [11]);
  assert.deepEqual(result.events[2].newParticipants, [12, 13]);
});

test('reordered participants produce no join or leave events', async () => {
  const slots = [
    { position: 'Kidnapper', user: 11 },
    { position: 'Muscle', user: 12 },
  ];
  await reconciler.reconcileBatch(FACTION, [rawCrime({ slots })], 'main');

  const result = await reconciler.reconcileBatch(FACTION, [rawCrime({ slots: [...slots].reverse() })], 'main');

  assert.equal(result.eventsRecorded, 0);
  assert.deepEqual(result.events, []);
});

test('a planning crime gaining a readiness time and a member moves to ready', async () => {
  await reconciler.reconcileBatch(
    FACTION,
    [rawCrime({ id: 101, status: 'Planning', slots: [{ position: 'Kidnapper', user: null }] })],
    'main'
  );

  const result = await reconciler.reconcileBatch(
    FACTION,
    [
      rawCrime({
        id: 101,
        status: 'Planning',
        ready_at: 1_704_900_000,
        slots: [{ position: 'Kidnapper', user: 12 }],
      }),
    ],
    'main'
  );

  assert.deepEqual(
    result.events.map((event) => [event.eventType, event.oldStatus, event.newStatus, event.playerId]),
    [
      ['status_changed', 'planning', 'ready', null],
      ['participant_joined', null, null, 12],
    ]
  );
  assert.equal((await store.getCurrentCrime(FACTION, 101))?.status, 'ready');
});

test('an unchanged crime writes nothing until the heartbeat is due', async () => {
  await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');

  clock.set('2024-01-10T12:01:00Z');
  const quiet = await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');
  assert.equal(quiet.crimesUpdated, 0);
  assert.equal(quiet.eventsRecorded, 0);
  assert.deepEqual(quiet.events, []);
  assert.equal(quiet.existingCrimes, 1);
  assert.equal((await store.getCurrentCrime(FACTION, 1))?.lastUpdated.toISOString(), '2024-01-10T12:00:00.000Z');

  clock.set('2024-01-10T12:05:00Z');
  const heartbeat = await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');
  assert.equal(heartbeat.crimesUpdated, 0);
  assert.equal((await store.getCurrentCrime(FACTION, 1))?.lastUpdated.toISOString(), '2024-01-10T12:05:00.000Z');
});

test('a terminal crime is archived with outcomes and removed from current state', async () => {
  await reconciler.reconcileBatch(FACTION, [rawCrime()], 'main');
  const result = await reconciler.reconcileBatch(
    FACTION,
    [rawCrime({ status: 'Successful', executed_at: 1_704_888_000, rewards: { money: 2_000, respect: 10 } })],
    'main'
  );

  assert.deepEqual(
    result.events.map((event) => event.eventType),
    ['status_changed', 'completed']
  );
  const terminal = result.events[1];
  assert.equal(terminal.oldStatus, 'planning');
  assert.deepEqual(terminal.rewards, { money: 2_000, respect: 10, other: null });
  assert.equal(terminal.occurredAt.toISOString(), '2024-01-10T12:00:00.000Z');
  assert.deepEqual(await store.listCurrentCrimes(FACTION), []);

  assert.deepEqual(await store.listParticipantCrimeStats(FACTION), [
    {
      factionId: FACTION,
      playerId: 11,
      crimeType: '2',
      crimesCompleted: 1,
      crimesFailed: 0,
      totalRewardMoney: 2_000,
      totalRewardRespect: 10,
      lastCrimeAt: new Date('2024-01-10T12:00:00Z'),
    },
  ]);
});

test('a terminal crime first seen after closing is archived once', async () => {
  const batch = [rawCrime({ id: 2, status: 'Failure', executed_at: 1_704_800_000 })];
  const first = await reconciler.reconcileBatch(FACTION, batch, 'main');
  assert.deepEqual(
    first.events.map((event) => event.eventType),
    ['failed']
  );

  const second = await reconciler.reconcileBatch(FACTION, batch, 'main');
  assert.equal(second.eventsRecorded, 0);
  assert.equal(second.crimesUpdated, 0);
  const stats = await store.listParticipantCrimeStats(FACTION, 11);
  assert.equal(stats[0].crimesFailed, 1);
});

test('cancelled crimes record no participant outcomes', async () => {
  await reconciler.reconcileBatch(FACTION, [rawCrime({ id: 3, status: 'Expired' })], 'main');
  assert.deepEqual(await store.listParticipantCrimeStats(FACTION), []);
});

test('duplicates in a batch are reconciled once and bad records skipped', async () => {
  const result = await reconciler.reconcileBatch(
    FACTION,
    [rawCrime(), rawCrime({ name: 'Second copy' }), { id: 'bogus' }, 'not a crime'],
    'main'
  );

  assert.equal(result.crimes.length, 1);
  assert.equal(result.crimes[0].name, 'Pet Project');
  assert.equal(result.skipped, 3);
  assert.equal(result.eventsRecorded, 1);
});
