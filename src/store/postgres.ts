import { and, asc, desc, eq, gte, inArray, isNotNull, lt, sql } from 'drizzle-orm';
import type { AnyPgColumn, PgTable } from 'drizzle-orm/pg-core';

import { getDb } from '../db/client.js';
import {
  competitionParticipants,
  competitionTeams,
  competitions,
  factionHistory,
  factions,
  items,
  organizedCrimeHistory,
  organizedCrimesCurrent,
  participantCrimeStats,
  periodSummaries,
  playerContributorHistory,
  playerStatsHistory,
  players,
  schemaVersion,
  trackedFactions,
} from '../db/schema.js';
import { createPostgresContext, type DbClient, type PostgresStoreContext } from './postgres/context.js';
import {
  toCompetitionRecord,
  toCompetitionTeamRecord,
  toCrimeEventRecord,
  toCrimeRecord,
  toFactionRecord,
  toItemRecord,
  toParticipantStats,
  toPeriodSummaryRecord,
  toPlayerRecord,
  toTrackedFactionRecord,
  type CompetitionParticipantRow,
} from './postgres/rows.js';
import { combineFilters } from './postgres/sql-helpers.js';
import { TrackedFactionLookupError } from './errors.js';
import type {
  CompetitionCreateInput,
  CompetitionCreateResult,
  CompetitionParticipantInput,
  CompetitionParticipantRecord,
  CompetitionRecord,
  CompetitionStatus,
  CompetitionTeamRecord,
  ContributorObservation,
  CrimeEventInput,
  CrimeEventQuery,
  CrimeEventRecord,
  CrimeRecord,
  CrimeUpsertInput,
  FactionObservation,
  FactionRecord,
  FactionUpsertInput,
  FrequentLeaver,
  HealthMetrics,
  HistorySample,
  HistorySeries,
  HistoryTable,
  ItemRecord,
  ItemUpsertInput,
  ParticipantCrimeStats,
  ParticipantOutcomeInput,
  PeriodEndpoints,
  PeriodKey,
  PeriodSummaryInput,
  PeriodSummaryRecord,
  PlayerRecord,
  PlayerStatsObservation,
  PlayerUpsertInput,
  TableHealth,
  TrackedFactionRecord,
  TrackedFactionUpsertInput,
  TrackerStore,
} from './types.js';

const TERMINAL_EVENT_TYPES = ['completed', 'failed', 'cancelled'];

const countSql = sql<number>`count(*)::int`;

const toDate = (value: string | Date): Date => new Date(value);

type PlayerStatsRow = typeof playerStatsHistory.$inferSelect;
type FactionHistoryRow = typeof factionHistory.$inferSelect;

const playerSample = (row: PlayerStatsRow): HistorySample => ({
  entityId: row.playerId,
  timestamp: row.timestamp,
  values: {
    strength: row.strength,
    defense: row.defense,
    speed: row.speed,
    dexterity: row.dexterity,
    totalStats: row.totalStats,
    level: row.level,
    lifeMaximum: row.lifeMaximum,
    networth: row.networth,
  },
});

const factionSample = (row: FactionHistoryRow): HistorySample => ({
  entityId: row.factionId,
  timestamp: row.timestamp,
  values: {
    respect: row.respect,
    memberCount: row.memberCount,
    bestChain: row.bestChain,
  },
});

const mergeEndpoints = (
  firsts: HistorySample[],
  lasts: HistorySample[],
  counts: Array<{ entityId: number; count: number }>
): PeriodEndpoints[] => {
  const lastByEntity = new Map(lasts.map((sample) => [sample.entityId, sample]));
  const countByEntity = new Map(counts.map((row) => [row.entityId, row.count]));
  const endpoints: PeriodEndpoints[] = [];
  for (const first of firsts) {
    const last = lastByEntity.get(first.entityId);
    if (!last) continue;
    endpoints.push({ entityId: first.entityId, first, last, recordCount: countByEntity.get(first.entityId) ?? 1 });
  }
  return endpoints.sort((a, b) => a.entityId - b.entityId);
};

export class PostgresStore implements TrackerStore {
  private readonly context: PostgresStoreContext;

  constructor(private readonly db: DbClient = getDb()) {
    this.context = createPostgresContext(db);
  }

  private now() {
    return this.context.now();
  }

  async upsertPlayer(input: PlayerUpsertInput): Promise<PlayerRecord> {
    const now = this.now();
    const values = {
      name: input.name,
      level: input.level,
      rank: input.rank,
      factionId: input.factionId,
      statusState: input.statusState,
      statusDescription: input.statusDescription,
      lifeCurrent: input.lifeCurrent,
      lifeMaximum: input.lifeMaximum,
      lastUpdated: now,
    };
    const [row] = await this.db
      .insert(players)
      .values({ playerId: input.playerId, createdAt: now, ...values })
      .onConflictDoUpdate({ target: players.playerId, set: values })
      .returning();
    return toPlayerRecord(row);
  }

  async getPlayer(playerId: number): Promise<PlayerRecord | null> {
    const rows = await this.db.select().from(players).where(eq(players.playerId, playerId)).limit(1);
    const row = rows.at(0);
    return row ? toPlayerRecord(row) : null;
  }

  async setPlayerDiscordId(playerId: number, discordId: string): Promise<void> {
    await this.context.ensurePlayer(playerId);
    await this.db.update(players).set({ discordId }).where(eq(players.playerId, playerId));
  }

  async upsertFaction(input: FactionUpsertInput): Promise<FactionRecord> {
    const now = this.now();
    const values = {
      name: input.name,
      tag: input.tag,
      leaderId: input.leaderId,
      coLeaderId: input.coLeaderId,
      respect: input.respect,
      age: input.age,
      bestChain: input.bestChain,
      memberCount: input.memberCount,
      lastUpdated: now,
    };
    const [row] = await this.db
      .insert(factions)
      .values({ factionId: input.factionId, createdAt: now, ...values })
      .onConflictDoUpdate({ target: factions.factionId, set: values })
      .returning();
    return toFactionRecord(row);
  }

  async getFaction(factionId: number): Promise<FactionRecord | null> {
    const rows = await this.db.select().from(factions).where(eq(factions.factionId, factionId)).limit(1);
    const row = rows.at(0);
    return row ? toFactionRecord(row) : null;
  }

  async appendPlayerStats(observation: PlayerStatsObservation): Promise<void> {
    await this.db.insert(playerStatsHistory).values(observation);
  }

  async appendFactionHistory(observation: FactionObservation): Promise<void> {
    await this.db.insert(factionHistory).values(observation);
  }

  async appendContributorStat(observation: ContributorObservation): Promise<void> {
    await this.db.insert(playerContributorHistory).values(observation);
  }

  async getLatestContributorValue(playerId: number, statName: string): Promise<number | null> {
    const rows = await this.db
      .select({ value: playerContributorHistory.value })
      .from(playerContributorHistory)
      .where(and(eq(playerContributorHistory.playerId, playerId), eq(playerContributorHistory.statName, statName)))
      .orderBy(desc(playerContributorHistory.timestamp), desc(playerContributorHistory.id))
      .limit(1);
    return rows.at(0)?.value ?? null;
  }

  async getItem(itemId: number): Promise<ItemRecord | null> {
    const rows = await this.db.select().from(items).where(eq(items.itemId, itemId)).limit(1);
    const row = rows.at(0);
    return row ? toItemRecord(row) : null;
  }

  async upsertItem(input: ItemUpsertInput): Promise<ItemRecord> {
    const values = {
      name: input.name,
      itemType: input.itemType,
      description: input.description,
      lastUpdated: this.now(),
    };
    const [row] = await this.db
      .insert(items)
      .values({ itemId: input.itemId, ...values })
      .onConflictDoUpdate({ target: items.itemId, set: values })
      .returning();
    return toItemRecord(row);
  }

  async listCurrentCrimes(factionId: number): Promise<CrimeRecord[]> {
    const rows = await this.db
      .select()
      .from(organizedCrimesCurrent)
      .where(eq(organizedCrimesCurrent.factionId, factionId))
      .orderBy(asc(organizedCrimesCurrent.crimeId));
    return rows.map(toCrimeRecord);
  }

  async getCurrentCrime(factionId: number, crimeId: number): Promise<CrimeRecord | null> {
    const rows = await this.db
      .select()
      .from(organizedCrimesCurrent)
      .where(and(eq(organizedCrimesCurrent.factionId, factionId), eq(organizedCrimesCurrent.crimeId, crimeId)))
      .limit(1);
    const row = rows.at(0);
    return row ? toCrimeRecord(row) : null;
  }

  async upsertCurrentCrime(input: CrimeUpsertInput): Promise<CrimeRecord> {
    const values = {
      crimeName: input.name,
      crimeType: input.crimeType,
      participants: input.participants,
      participantCount: input.participants.length,
      requiredParticipants: input.requiredParticipants,
      status: input.status,
      timeStarted: input.timeStarted,
      timeCompleted: input.timeCompleted,
      readyAt: input.readyAt,
      rewardMoney: input.rewards.money,
      rewardRespect: input.rewards.respect,
      rewardOther: input.rewards.other,
      dataSource: input.dataSource,
      lastUpdated: input.lastUpdated ?? this.now(),
    };
    const [row] = await this.db
      .insert(organizedCrimesCurrent)
      .values({ factionId: input.factionId, crimeId: input.crimeId, ...values })
      .onConflictDoUpdate({
        target: [organizedCrimesCurrent.factionId, organizedCrimesCurrent.crimeId],
        set: values,
      })
      .returning();
    return toCrimeRecord(row);
  }

  async deleteCurrentCrime(factionId: number, crimeId: number): Promise<boolean> {
    const rows = await this.db
      .delete(organizedCrimesCurrent)
      .where(and(eq(organizedCrimesCurrent.factionId, factionId), eq(organizedCrimesCurrent.crimeId, crimeId)))
      .returning({ crimeId: organizedCrimesCurrent.crimeId });
    return rows.length > 0;
  }

  async appendCrimeEvents(events: CrimeEventInput[]): Promise<number> {
    if (!events.length) return 0;
    await this.db.insert(organizedCrimeHistory).values(
      events.map((event) => ({
        factionId: event.factionId,
        crimeId: event.crimeId,
        crimeName: event.crimeName,
        eventType: event.eventType,
        playerId: event.playerId,
        oldStatus: event.oldStatus,
        newStatus: event.newStatus,
        oldParticipants: event.oldParticipants,
        newParticipants: event.newParticipants,
        rewardMoney: event.rewards?.money ?? null,
        rewardRespect: event.rewards?.respect ?? null,
        rewardOther: event.rewards?.other ?? null,
        dataSource: event.dataSource,
        eventTimestamp: event.occurredAt,
        recordedAt: this.now(),
      }))
    );
    return events.length;
  }

  async listCrimeEvents(query: CrimeEventQuery): Promise<CrimeEventRecord[]> {
    const where = combineFilters([
      eq(organizedCrimeHistory.factionId, query.factionId),
      query.crimeId !== undefined && eq(organizedCrimeHistory.crimeId, query.crimeId),
      query.playerId !== undefined && eq(organizedCrimeHistory.playerId, query.playerId),
      query.eventTypes?.length ? inArray(organizedCrimeHistory.eventType, query.eventTypes) : null,
      query.since && gte(organizedCrimeHistory.eventTimestamp, query.since),
    ]);
    const base = this.db
      .select()
      .from(organizedCrimeHistory)
      .where(where)
      .orderBy(desc(organizedCrimeHistory.eventTimestamp), desc(organizedCrimeHistory.id));
    const rows = query.limit ? await base.limit(query.limit) : await base;
    return rows.map(toCrimeEventRecord);
  }

  async listTerminalCrimeIds(factionId: number, crimeIds: number[]): Promise<Set<number>> {
    if (!crimeIds.length) return new Set();
    const rows = await this.db
      .selectDistinct({ crimeId: organizedCrimeHistory.crimeId })
      .from(organizedCrimeHistory)
      .where(
        and(
          eq(organizedCrimeHistory.factionId, factionId),
          inArray(organizedCrimeHistory.crimeId, crimeIds),
          inArray(organizedCrimeHistory.eventType, TERMINAL_EVENT_TYPES)
        )
      );
    return new Set(rows.map((row) => row.crimeId));
  }

  async recordParticipantOutcome(input: ParticipantOutcomeInput): Promise<void> {
    await this.db
      .insert(participantCrimeStats)
      .values({
        factionId: input.factionId,
        playerId: input.playerId,
        crimeType: input.crimeType ?? '',
        crimesCompleted: input.completed,
        crimesFailed: input.failed,
        totalRewardMoney: input.rewardMoney,
        totalRewardRespect: input.rewardRespect,
        lastCrimeAt: input.occurredAt,
      })
      .onConflictDoUpdate({
        target: [participantCrimeStats.factionId, participantCrimeStats.playerId, participantCrimeStats.crimeType],
        set: {
          crimesCompleted: sql`${participantCrimeStats.crimesCompleted} + ${input.completed}`,
          crimesFailed: sql`${participantCrimeStats.crimesFailed} + ${input.failed}`,
          totalRewardMoney: sql`${participantCrimeStats.totalRewardMoney} + ${input.rewardMoney}`,
          totalRewardRespect: sql`${participantCrimeStats.totalRewardRespect} + ${input.rewardRespect}`,
          lastCrimeAt: input.occurredAt,
        },
      });
  }

  async listParticipantCrimeStats(factionId: number, playerId?: number): Promise<ParticipantCrimeStats[]> {
    const rows = await this.db
      .select()
      .from(participantCrimeStats)
      .where(
        combineFilters([
          eq(participantCrimeStats.factionId, factionId),
          playerId !== undefined && eq(participantCrimeStats.playerId, playerId),
        ])
      )
      .orderBy(desc(participantCrimeStats.crimesCompleted), asc(participantCrimeStats.playerId));
    return rows.map(toParticipantStats);
  }

  async listFrequentLeavers(factionId: number, threshold: number, since: Date): Promise<FrequentLeaver[]> {
    const rows = await this.db
      .select({ playerId: organizedCrimeHistory.playerId, leaveCount: countSql })
      .from(organizedCrimeHistory)
      .where(
        and(
          eq(organizedCrimeHistory.factionId, factionId),
          eq(organizedCrimeHistory.eventType, 'participant_left'),
          isNotNull(organizedCrimeHistory.playerId),
          gte(organizedCrimeHistory.eventTimestamp, since)
        )
      )
      .groupBy(organizedCrimeHistory.playerId)
      .having(sql`count(*) > ${threshold}`)
      .orderBy(desc(countSql), asc(organizedCrimeHistory.playerId));

    const leavers: FrequentLeaver[] = [];
    for (const row of rows) {
      if (row.playerId !== null) leavers.push({ playerId: row.playerId, leaveCount: row.leaveCount });
    }
    return leavers;
  }

  async listTrackedFactions(options: { enabledOnly?: boolean } = {}): Promise<TrackedFactionRecord[]> {
    const rows = await this.db
      .select()
      .from(trackedFactions)
      .where(options.enabledOnly ? eq(trackedFactions.enabled, true) : undefined)
      .orderBy(asc(trackedFactions.factionId), asc(trackedFactions.guildId));
    return rows.map(toTrackedFactionRecord);
  }

  async getTrackedFaction(factionId: number, guildId: string): Promise<TrackedFactionRecord | null> {
    const rows = await this.db
      .select()
      .from(trackedFactions)
      .where(and(eq(trackedFactions.factionId, factionId), eq(trackedFactions.guildId, guildId)))
      .limit(1);
    const row = rows.at(0);
    return row ? toTrackedFactionRecord(row) : null;
  }

  async upsertTrackedFaction(input: TrackedFactionUpsertInput): Promise<TrackedFactionRecord> {
    const now = this.now();
    const values = {
      enabled: input.enabled,
      notificationChannelId: input.notificationChannelId,
      missingItemChannelId: input.missingItemChannelId,
      leadIds: input.leadIds,
      frequentLeaverThreshold: input.frequentLeaverThreshold,
      trackingWindowDays: input.trackingWindowDays,
      updatedAt: now,
    };
    const [row] = await this.db
      .insert(trackedFactions)
      .values({ factionId: input.factionId, guildId: input.guildId, createdAt: now, ...values })
      .onConflictDoUpdate({ target: [trackedFactions.factionId, trackedFactions.guildId], set: values })
      .returning();
    return toTrackedFactionRecord(row);
  }

  async advanceTrackedFactionWatermark(factionId: number, guildId: string, syncedAt: Date): Promise<void> {
    const rows = await this.db
      .update(trackedFactions)
      .set({ lastSync: syncedAt, updatedAt: this.now() })
      .where(and(eq(trackedFactions.factionId, factionId), eq(trackedFactions.guildId, guildId)))
      .returning({ factionId: trackedFactions.factionId });
    if (!rows.length) {
      throw new TrackedFactionLookupError(`Faction ${factionId} is not tracked in guild ${guildId}`);
    }
  }

  async listPeriodEndpoints(series: HistorySeries, start: Date, end: Date): Promise<PeriodEndpoints[]> {
    if (series === 'player_stats') {
      const t = playerStatsHistory;
      const inWindow = and(gte(t.timestamp, start), lt(t.timestamp, end));
      const [firsts, lasts, counts] = await Promise.all([
        this.db.selectDistinctOn([t.playerId]).from(t).where(inWindow).orderBy(t.playerId, asc(t.timestamp), asc(t.id)),
        this.db.selectDistinctOn([t.playerId]).from(t).where(inWindow).orderBy(t.playerId, desc(t.timestamp), desc(t.id)),
        this.db.select({ entityId: t.playerId, count: countSql }).from(t).where(inWindow).groupBy(t.playerId),
      ]);
      return mergeEndpoints(firsts.map(playerSample), lasts.map(playerSample), counts);
    }

    const t = factionHistory;
    const inWindow = and(gte(t.timestamp, start), lt(t.timestamp, end));
    const [firsts, lasts, counts] = await Promise.all([
      this.db.selectDistinctOn([t.factionId]).from(t).where(inWindow).orderBy(t.factionId, asc(t.timestamp), asc(t.id)),
      this.db.selectDistinctOn([t.factionId]).from(t).where(inWindow).orderBy(t.factionId, desc(t.timestamp), desc(t.id)),
      this.db.select({ entityId: t.factionId, count: countSql }).from(t).where(inWindow).groupBy(t.factionId),
    ]);
    return mergeEndpoints(firsts.map(factionSample), lasts.map(factionSample), counts);
  }

  private periodFilter(series: HistorySeries, period: PeriodKey) {
    return and(
      eq(periodSummaries.series, series),
      eq(periodSummaries.periodStart, period.periodStart),
      eq(periodSummaries.periodEnd, period.periodEnd),
      eq(periodSummaries.periodType, period.periodType)
    );
  }

  async countPeriodSummaries(series: HistorySeries, period: PeriodKey, client: DbClient = this.db): Promise<number> {
    const rows = await client
      .select({ count: countSql })
      .from(periodSummaries)
      .where(this.periodFilter(series, period));
    return rows.at(0)?.count ?? 0;
  }

  async writePeriodSummaries(
    series: HistorySeries,
    period: PeriodKey,
    summaries: PeriodSummaryInput[],
    options: { force: boolean }
  ): Promise<number> {
    return this.db.transaction(async (tx) => {
      if (!options.force && (await this.countPeriodSummaries(series, period, tx)) > 0) {
        return 0;
      }
      if (!summaries.length) return 0;

      const createdAt = this.now();
      await tx
        .insert(periodSummaries)
        .values(
          summaries.map((summary) => ({
            series,
            entityId: summary.entityId,
            periodStart: period.periodStart,
            periodEnd: period.periodEnd,
            periodType: period.periodType,
            attributes: summary.attributes,
            recordCount: summary.recordCount,
            createdAt,
          }))
        )
        .onConflictDoUpdate({
          target: [
            periodSummaries.series,
            periodSummaries.entityId,
            periodSummaries.periodStart,
            periodSummaries.periodEnd,
            periodSummaries.periodType,
          ],
          set: {
            attributes: sql`excluded.attributes`,
            recordCount: sql`excluded.record_count`,
            createdAt: sql`excluded.created_at`,
          },
        });
      return summaries.length;
    });
  }

  async listPeriodSummaries(series: HistorySeries, entityId: number): Promise<PeriodSummaryRecord[]> {
    const rows = await this.db
      .select()
      .from(periodSummaries)
      .where(and(eq(periodSummaries.series, series), eq(periodSummaries.entityId, entityId)))
      .orderBy(desc(periodSummaries.periodStart));
    return rows.map(toPeriodSummaryRecord);
  }

  async pruneHistory(table: HistoryTable, olderThan: Date): Promise<number> {
    switch (table) {
      case 'player_stats': {
        const result = await this.db.delete(playerStatsHistory).where(lt(playerStatsHistory.timestamp, olderThan));
        return result.rowCount ?? 0;
      }
      case 'faction': {
        const result = await this.db.delete(factionHistory).where(lt(factionHistory.timestamp, olderThan));
        return result.rowCount ?? 0;
      }
      case 'contributors': {
        const result = await this.db
          .delete(playerContributorHistory)
          .where(lt(playerContributorHistory.timestamp, olderThan));
        return result.rowCount ?? 0;
      }
    }
  }

  async getHealthMetrics(options: { retentionCutoff: Date; retentionDays: number }): Promise<HealthMetrics> {
    const counted = async (table: string, source: PgTable): Promise<TableHealth> => {
      const rows = await this.db.select({ count: countSql }).from(source);
      return { table, rowCount: rows.at(0)?.count ?? 0, oldest: null, newest: null, olderThanRetention: null };
    };

    const timed = async (table: string, source: PgTable, column: AnyPgColumn): Promise<TableHealth> => {
      const rows = await this.db
        .select({
          count: countSql,
          oldest: sql`min(${column})`.mapWith(toDate),
          newest: sql`max(${column})`.mapWith(toDate),
          old: sql<number>`count(*) filter (where ${column} < ${options.retentionCutoff})::int`,
        })
        .from(source);
      const row = rows.at(0);
      return {
        table,
        rowCount: row?.count ?? 0,
        oldest: row?.oldest ?? null,
        newest: row?.newest ?? null,
        olderThanRetention: row?.old ?? 0,
      };
    };

    const versionRows = await this.db
      .select({ version: sql<number | null>`max(${schemaVersion.version})` })
      .from(schemaVersion);

    const tables = await Promise.all([
      counted('players', players),
      counted('factions', factions),
      timed('player_stats_history', playerStatsHistory, playerStatsHistory.timestamp),
      timed('faction_history', factionHistory, factionHistory.timestamp),
      timed('player_contributor_history', playerContributorHistory, playerContributorHistory.timestamp),
      counted('organized_crimes_current', organizedCrimesCurrent),
      timed('organized_crime_history', organizedCrimeHistory, organizedCrimeHistory.eventTimestamp),
      counted('period_summaries', periodSummaries),
      counted('competitions', competitions),
    ]);

    return {
      schemaVersion: versionRows.at(0)?.version ?? null,
      retentionDays: options.retentionDays,
      tables,
    };
  }

  async createCompetition(input: CompetitionCreateInput): Promise<CompetitionCreateResult> {
    return this.db.transaction(async (tx) => {
      const [competitionRow] = await tx
        .insert(competitions)
        .values({
          name: input.name,
          trackedStat: input.trackedStat,
          startDate: input.startDate,
          endDate: input.endDate,
          status: 'active',
          createdBy: input.createdBy ?? null,
          createdAt: this.now(),
        })
        .returning();

      const teamRows = input.teamNames.length
        ? await tx
            .insert(competitionTeams)
            .values(
              input.teamNames.map((teamName) => ({
                competitionId: competitionRow.competitionId,
                teamName,
                captainIds: [],
              }))
            )
            .returning()
        : [];

      return {
        competition: toCompetitionRecord(competitionRow),
        teams: teamRows.map(toCompetitionTeamRecord).sort((a, b) => a.teamId - b.teamId),
      };
    });
  }

  async getCompetition(competitionId: number): Promise<CompetitionRecord | null> {
    const rows = await this.db
      .select()
      .from(competitions)
      .where(eq(competitions.competitionId, competitionId))
      .limit(1);
    const row = rows.at(0);
    return row ? toCompetitionRecord(row) : null;
  }

  async listCompetitions(status?: CompetitionStatus): Promise<CompetitionRecord[]> {
    const rows = await this.db
      .select()
      .from(competitions)
      .where(status ? eq(competitions.status, status) : undefined)
      .orderBy(desc(competitions.createdAt), desc(competitions.competitionId));
    return rows.map(toCompetitionRecord);
  }

  async setCompetitionStatus(competitionId: number, status: CompetitionStatus): Promise<void> {
    await this.db.update(competitions).set({ status }).where(eq(competitions.competitionId, competitionId));
  }

  async listCompetitionTeams(competitionId: number): Promise<CompetitionTeamRecord[]> {
    const rows = await this.db
      .select()
      .from(competitionTeams)
      .where(eq(competitionTeams.competitionId, competitionId))
      .orderBy(asc(competitionTeams.teamId));
    return rows.map(toCompetitionTeamRecord);
  }

  async setTeamCaptains(teamId: number, captainIds: string[]): Promise<CompetitionTeamRecord | null> {
    const rows = await this.db
      .update(competitionTeams)
      .set({ captainIds })
      .where(eq(competitionTeams.teamId, teamId))
      .returning();
    const row = rows.at(0);
    return row ? toCompetitionTeamRecord(row) : null;
  }

  async addCompetitionParticipant(input: CompetitionParticipantInput): Promise<CompetitionParticipantRecord> {
    const now = this.now();
    const hasStart = input.startValue !== undefined && input.startValue !== null;
    const values = {
      teamId: input.teamId,
      discordUserId: input.discordUserId,
      startValue: input.startValue,
      startRecordedAt: hasStart ? now : undefined,
    };
    await this.db
      .insert(competitionParticipants)
      .values({ competitionId: input.competitionId, playerId: input.playerId, joinedAt: now, ...values })
      .onConflictDoUpdate({
        target: [competitionParticipants.competitionId, competitionParticipants.playerId],
        set: values,
      });

    const participants = await this.selectParticipants(
      and(
        eq(competitionParticipants.competitionId, input.competitionId),
        eq(competitionParticipants.playerId, input.playerId)
      )
    );
    const participant = participants.at(0);
    if (!participant) {
      throw new Error(`Participant ${input.playerId} missing after insert`);
    }
    return participant;
  }

  async listCompetitionParticipants(competitionId: number): Promise<CompetitionParticipantRecord[]> {
    return this.selectParticipants(eq(competitionParticipants.competitionId, competitionId));
  }

  private async selectParticipants(where: ReturnType<typeof and>): Promise<CompetitionParticipantRecord[]> {
    const rows = await this.db
      .select({
        participant: competitionParticipants,
        playerName: players.name,
        factionId: players.factionId,
      })
      .from(competitionParticipants)
      .leftJoin(players, eq(players.playerId, competitionParticipants.playerId))
      .where(where)
      .orderBy(asc(competitionParticipants.playerId));
    return rows.map((row) => toParticipantRecord(row.participant, row.playerName, row.factionId));
  }

  async setParticipantTeam(competitionId: number, playerId: number, teamId: number | null): Promise<boolean> {
    const rows = await this.db
      .update(competitionParticipants)
      .set({ teamId })
      .where(
        and(eq(competitionParticipants.competitionId, competitionId), eq(competitionParticipants.playerId, playerId))
      )
      .returning({ playerId: competitionParticipants.playerId });
    return rows.length > 0;
  }

  async setParticipantStartValue(
    competitionId: number,
    playerId: number,
    value: number,
    recordedAt: Date
  ): Promise<void> {
    await this.db
      .update(competitionParticipants)
      .set({ startValue: value, startRecordedAt: recordedAt })
      .where(
        and(eq(competitionParticipants.competitionId, competitionId), eq(competitionParticipants.playerId, playerId))
      );
  }
}

const toParticipantRecord = (
  row: CompetitionParticipantRow,
  playerName: string | null,
  factionId: number | null
): CompetitionParticipantRecord => ({
  competitionId: row.competitionId,
  playerId: row.playerId,
  playerName,
  factionId,
  teamId: row.teamId,
  discordUserId: row.discordUserId,
  startValue: row.startValue,
  startRecordedAt: row.startRecordedAt,
  joinedAt: row.joinedAt,
});
