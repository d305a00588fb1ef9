import { test } from 'node:test';
import assert from 'node:assert/strict';

import { extractParticipantId, mapCrimeStatus, normalizeCrime } from '../../src/sync/crime-normalizer.js';

test('upstream statuses fold into the internal lifecycle', () => {
  assert.equal(mapCrimeStatus('Recruiting', null), 'planning');
  assert.equal(mapCrimeStatus('Planning', null), 'planning');
  assert.equal(mapCrimeStatus('Successful', null), 'completed');
  assert.equal(mapCrimeStatus('Failure', null), 'failed');
  assert.equal(mapCrimeStatus('Expired', null), 'cancelled');
  assert.equal(mapCrimeStatus('something new', null), 'planning');
  assert.equal(mapCrimeStatus(undefined, null), 'planning');
});

test('a readiness timestamp promotes only the planning bucket', () => {
  const readyAt = new Date('2024-03-01T00:00:00Z');
  assert.equal(mapCrimeStatus('Planning', readyAt), 'ready');
  assert.equal(mapCrimeStatus('Successful', readyAt), 'completed');
});

test('participant ids come from plain values or composite objects', () => {
  assert.equal(extractParticipantId(42), 42);
  assert.equal(extractParticipantId('42'), 42);
  assert.equal(extractParticipantId({ id: 7, joined_at: 1 }), 7);
  assert.equal(extractParticipantId({ user_id: '8' }), 8);
  assert.equal(extractParticipantId({ player_id: 9 }), 9);
  assert.equal(extractParticipantId({ name: 'nobody' }), null);
  assert.equal(extractParticipantId({ id: 'abc', user_id: 31 }), 31);
  assert.equal(extractParticipantId({ id: null, user_id: 'x', player_id: '32' }), 32);
  assert.equal(extractParticipantId('abc'), null);
  assert.equal(extractParticipantId(null), null);
});

test('normalizeCrime maps slots, times and rewards', () => {
  const result = normalizeCrime({
    id: '1001',
    name: '  Mob Mentality ',
    difficulty: 3,
    status: 'Planning',
    created_at: 1_700_000_000,
    ready_at: 1_700_086_400,
    executed_at: null,
    slots: [
      { position: 'Looter #1', user: { id: 11 }, item_requirement: { id: 206, is_available: false } },
      { position: 'Looter #2', user: null, item_requirement: null },
      { position: 'Hustler', user: 12 },
    ],
    rewards: { money: 1_500_000, respect: 25, items: [1, 2] },
  });

  assert.ok(result.ok);
  const crime = result.crime;
  assert.equal(crime.crimeId, 1001);
  assert.equal(crime.name, 'Mob Mentality');
  assert.equal(crime.crimeType, '3');
  assert.equal(crime.status, 'ready');
  assert.deepEqual(crime.participants, [11, 12]);
  assert.equal(crime.requiredParticipants, 3);
  assert.deepEqual(crime.slots[0], {
    position: 'Looter #1',
    userId: 11,
    itemRequirement: { itemId: 206, available: false },
  });
  assert.deepEqual(crime.slots[1].itemRequirement, null);
  assert.equal(crime.timeStarted?.toISOString(), '2023-11-14T22:13:20.000Z');
  assert.equal(crime.timeCompleted, null);
  assert.deepEqual(crime.rewards, { money: 1_500_000, respect: 25, other: { items: [1, 2] } });
});

test('a missing name falls back to the crime id', () => {
  const result = normalizeCrime({ id: 5, status: 'Recruiting' });
  assert.ok(result.ok);
  assert.equal(result.crime.name, 'Crime 5');
  assert.deepEqual(result.crime.participants, []);
  assert.equal(result.crime.requiredParticipants, 0);
  assert.deepEqual(result.crime.rewards, { money: null, respect: null, other: null });
});

test('records without a usable id are rejected', () => {
  assert.deepEqual(normalizeCrime({ id: 'abc' }), { ok: false, reason: 'invalid id "abc"' });
  assert.deepEqual(normalizeCrime({ name: 'no id' }), { ok: false, reason: 'invalid id null' });
  assert.deepEqual(normalizeCrime([1, 2]), { ok: false, reason: 'record is not an object' });
});
