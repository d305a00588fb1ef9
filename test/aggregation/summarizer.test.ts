import { beforeEach, test } from 'node:test';
import assert from 'node:assert/strict';

import { monthlyPeriod, previousMonth } from '../../src/aggregation/periods.js';
import { AggregationEngine } from '../../src/aggregation/summarizer.js';
import { MemoryStore } from '../../src/store/memory.js';
import { InvalidArgumentError, type PlayerStatsObservation } from '../../src/store/types.js';
import { fixedClock, silentLogger } from '../helpers/fakes.js';

const stats = (playerId: number, timestamp: string, values: Partial<PlayerStatsObservation> = {}): PlayerStatsObservation => ({
  playerId,
  strength: null,
  defense: null,
  speed: null,
  dexterity: null,
  totalStats: null,
  level: null,
  lifeMaximum: null,
  networth: null,
  dataSource: 'test',
  timestamp: new Date(timestamp),
  ...values,
});

const faction = (factionId: number, timestamp: string, respect: number) => ({
  factionId,
  respect,
  memberCount: 30,
  bestChain: null,
  dataSource: 'test',
  timestamp: new Date(timestamp),
});

let store: MemoryStore;
let engine: AggregationEngine;

beforeEach(async () => {
  const clock = fixedClock('2024-03-15T00:00:00Z');
  store = new MemoryStore({ now: clock.now });
  engine = new AggregationEngine(store, { now: clock.now, logger: silentLogger, retentionDays: 60 });

  await store.appendPlayerStats(stats(11, '2024-02-03T10:00:00Z', { strength: 100, totalStats: 400 }));
  await store.appendPlayerStats(stats(11, '2024-02-20T10:00:00Z', { strength: 150, totalStats: 520, networth: 1_000 }));
  await store.appendPlayerStats(stats(11, '2024-03-01T10:00:00Z', { strength: 900 }));
  await store.appendPlayerStats(stats(12, '2024-02-10T10:00:00Z', { strength: 70 }));
  await store.appendFactionHistory(faction(500, '2024-02-01T00:00:00Z', 1_000));
  await store.appendFactionHistory(faction(500, '2024-02-29T23:59:59Z', 1_300));
});

test('monthlyPeriod covers the whole UTC month', () => {
  const period = monthlyPeriod(2024, 2);
  assert.equal(period.periodStart.toISOString(), '2024-02-01T00:00:00.000Z');
  assert.equal(period.periodEnd.toISOString(), '2024-02-29T23:59:59.000Z');
  assert.equal(period.periodType, 'monthly');
  assert.throws(() => monthlyPeriod(2024, 13), InvalidArgumentError);
});

test('previousMonth wraps across the year boundary', () => {
  assert.deepEqual(previousMonth(new Date('2024-01-15T00:00:00Z')), { year: 2023, month: 12 });
  assert.deepEqual(previousMonth(new Date('2024-03-05T00:00:00Z')), { year: 2024, month: 2 });
});

test('summarizes first against last observation inside the month', async () => {
  const report = await engine.summarizeMonth(2024, 2);

  assert.equal(report.playerSummaries, 2);
  assert.equal(report.factionSummaries, 1);

  const [summary] = await store.listPeriodSummaries('player_stats', 11);
  assert.equal(summary.recordCount, 2);
  assert.deepEqual(summary.attributes.strength, { start: 100, end: 150, change: 50 });
  assert.deepEqual(summary.attributes.totalStats, { start: 400, end: 520, change: 120 });
  assert.deepEqual(summary.attributes.networth, { start: 0, end: 1_000, change: 1_000 });

  const [single] = await store.listPeriodSummaries('player_stats', 12);
  assert.equal(single.recordCount, 1);
  assert.deepEqual(single.attributes.strength, { start: 70, end: 70, change: 0 });

  const [factionSummary] = await store.listPeriodSummaries('faction', 500);
  assert.deepEqual(factionSummary.attributes.respect, { start: 1_000, end: 1_300, change: 300 });
});

test('a record in the last second of the month belongs to that month only', async () => {
  await store.appendPlayerStats(stats(21, '2024-01-01T00:00:00Z', { level: 10 }));
  await store.appendPlayerStats(stats(21, '2024-01-15T00:00:00Z', { level: 12 }));
  await store.appendPlayerStats(stats(21, '2024-01-31T23:59:59.500Z', { level: 15 }));
  await store.appendPlayerStats(stats(21, '2024-02-01T00:00:00Z', { level: 16 }));

  await engine.summarizeMonth(2024, 1);
  await engine.summarizeMonth(2024, 2);

  const [february, january] = await store.listPeriodSummaries('player_stats', 21);
  assert.equal(january.periodStart.toISOString(), '2024-01-01T00:00:00.000Z');
  assert.equal(january.recordCount, 3);
  assert.deepEqual(january.attributes.level, { start: 10, end: 15, change: 5 });
  assert.equal(february.recordCount, 1);
  assert.deepEqual(february.attributes.level, { start: 16, end: 16, change: 0 });
});

test('an existing period is skipped unless forced', async () => {
  await engine.summarizeMonth(2024, 2);
  await store.appendPlayerStats(stats(11, '2024-02-25T10:00:00Z', { strength: 175 }));

  const skipped = await engine.summarizeMonth(2024, 2);
  assert.equal(skipped.playerSummaries, 0);
  assert.equal(skipped.factionSummaries, 0);
  assert.equal((await store.listPeriodSummaries('player_stats', 11))[0].attributes.strength.end, 150);

  const forced = await engine.summarizeMonth(2024, 2, { force: true });
  assert.equal(forced.playerSummaries, 2);
  const [summary] = await store.listPeriodSummaries('player_stats', 11);
  assert.equal(summary.attributes.strength.end, 175);
  assert.equal(summary.recordCount, 3);
});

test('a month without history writes nothing', async () => {
  const report = await engine.summarizeMonth(2023, 6);
  assert.equal(report.playerSummaries, 0);
  assert.equal(report.factionSummaries, 0);
});

test('prune removes history older than the retention window', async () => {
  assert.equal(await engine.prune('player_stats', 30), 2);
  const counts = await engine.pruneAll(10);
  assert.deepEqual(counts, { player_stats: 2, faction: 2, contributors: 0 });
  await assert.rejects(engine.prune('faction', 0), InvalidArgumentError);
});

test('health metrics count rows past retention', async () => {
  const metrics = await engine.healthMetrics();
  assert.equal(metrics.retentionDays, 60);
  assert.equal(metrics.schemaVersion, null);
  const playerStats = metrics.tables.find((table) => table.table === 'player_stats_history');
  assert.equal(playerStats?.rowCount, 4);
  assert.equal(playerStats?.oldest?.toISOString(), '2024-02-03T10:00:00.000Z');
  assert.equal(playerStats?.olderThanRetention, 0);
});
