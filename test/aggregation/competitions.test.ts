import { test } from 'node:test';
import assert from 'node:assert/strict';

import {
  buildStanding,
  factionOverview,
  formatSignedNumber,
  participantDelta,
  rankParticipants,
  teamTotals,
  type ParticipantStanding,
} from '../../src/aggregation/competitions.js';
import type { CompetitionTeamRecord } from '../../src/store/types.js';

const standing = (
  playerId: number,
  startValue: number | null,
  currentValue: number | null,
  teamId: number | null = null
): ParticipantStanding => ({
  playerId,
  playerName: `Player ${playerId}`,
  factionId: 500,
  teamId,
  startValue,
  currentValue,
  delta: participantDelta(startValue, currentValue),
});

const team = (teamId: number, teamName: string): CompetitionTeamRecord => ({
  teamId,
  competitionId: 1,
  teamName,
  captainIds: [],
});

test('participantDelta treats a missing start as no progress', () => {
  assert.equal(participantDelta(100, 250), 150);
  assert.equal(participantDelta(null, 250), 0);
  assert.equal(participantDelta(100, null), undefined);
  assert.equal(participantDelta(300, 200), -100);
});

test('buildStanding falls back to a placeholder name', () => {
  const built = buildStanding(
    {
      competitionId: 1,
      playerId: 42,
      playerName: null,
      factionId: null,
      teamId: 3,
      discordUserId: null,
      startValue: 10,
      startRecordedAt: null,
      joinedAt: new Date('2024-01-01T00:00:00Z'),
    },
    25
  );
  assert.equal(built.playerName, 'Player 42');
  assert.equal(built.delta, 15);
  assert.equal(built.teamId, 3);
});

test('rankParticipants sorts best first and keeps missing deltas last', () => {
  const standings = [standing(1, 0, 50), standing(2, 0, null), standing(3, 0, 200), standing(4, 0, -10)];

  assert.deepEqual(
    rankParticipants(standings).map((entry) => entry.playerId),
    [3, 1, 4, 2]
  );
  assert.deepEqual(
    rankParticipants(standings, { worst: true }).map((entry) => entry.playerId),
    [4, 1, 3, 2]
  );
  assert.deepEqual(
    rankParticipants(standings, { limit: 2 }).map((entry) => entry.playerId),
    [3, 1]
  );
});

test('rankParticipants defaults to ten entries', () => {
  const standings = Array.from({ length: 12 }, (_, index) => standing(index + 1, 0, index));
  assert.equal(rankParticipants(standings).length, 10);
  assert.equal(rankParticipants(standings, { limit: 0 }).length, 10);
});

test('teamTotals counts only members with both values towards the total', () => {
  const totals = teamTotals(
    [team(10, 'Team 1'), team(11, 'Team 2')],
    [
      standing(1, 100, 300, 10),
      standing(2, null, 500, 10),
      standing(3, 100, 150, 11),
      standing(4, 100, 600, 11),
      standing(5, 0, 1_000, null),
    ]
  );

  assert.deepEqual(
    totals.map((total) => [total.teamName, total.totalDelta, total.participantCount, total.participantsWithData]),
    [
      ['Team 2', 550, 2, 2],
      ['Team 1', 200, 2, 1],
    ]
  );
});

test('teamTotals ranks worst first on request', () => {
  const totals = teamTotals([team(10, 'Team 1'), team(11, 'Team 2')], [standing(1, 0, 10, 10), standing(2, 0, 5, 11)], {
    worst: true,
  });
  assert.deepEqual(
    totals.map((total) => total.teamId),
    [11, 10]
  );
});

test('factionOverview averages over participants with data', () => {
  assert.deepEqual(factionOverview([standing(1, 100, 400), standing(2, 50, 150), standing(3, null, 90)]), {
    totalDelta: 400,
    averageDelta: 200,
    participantCount: 3,
    participantsWithData: 2,
  });
  assert.deepEqual(factionOverview([]), {
    totalDelta: 0,
    averageDelta: 0,
    participantCount: 0,
    participantsWithData: 0,
  });
});

test('formatSignedNumber adds a sign and thousands separators', () => {
  assert.equal(formatSignedNumber(1_000), '+1,000');
  assert.equal(formatSignedNumber(0), '+0');
  assert.equal(formatSignedNumber(-1_234_567), '-1,234,567');
  assert.equal(formatSignedNumber(12.6), '+13');
  assert.equal(formatSignedNumber(undefined), 'N/A');
});
