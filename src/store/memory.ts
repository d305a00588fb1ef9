import { DEFAULT_LEAVER_THRESHOLD, DEFAULT_TRACKING_WINDOW_DAYS } from './contracts/crimes.js';
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
import { TrackedFactionLookupError } from './errors.js';

interface Stamped<T> {
  seq: number;
  row: T;
}

const crimeKey = (factionId: number, crimeId: number) => `${factionId}:${crimeId}`;
const trackedKey = (factionId: number, guildId: string) => `${factionId}:${guildId}`;
const participantKey = (competitionId: number, playerId: number) => `${competitionId}:${playerId}`;
const outcomeKey = (factionId: number, playerId: number, crimeType: string | null) =>
  `${factionId}:${playerId}:${crimeType ?? ''}`;
const periodKey = (series: HistorySeries, entityId: number, period: PeriodKey) =>
  `${series}:${entityId}:${period.periodStart.getTime()}:${period.periodEnd.getTime()}:${period.periodType}`;

const pick = <T>(next: T | undefined, current: T): T => (next === undefined ? current : next);

const cloneCrime = (crime: CrimeRecord): CrimeRecord => ({
  ...crime,
  participants: [...crime.participants],
  rewards: { ...crime.rewards, other: crime.rewards.other ? { ...crime.rewards.other } : null },
});

const playerSample = (row: PlayerStatsObservation): HistorySample => ({
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

const factionSample = (row: FactionObservation): HistorySample => ({
  entityId: row.factionId,
  timestamp: row.timestamp,
  values: {
    respect: row.respect,
    memberCount: row.memberCount,
    bestChain: row.bestChain,
  },
});

export class MemoryStore implements TrackerStore {
  private players = new Map<number, PlayerRecord>();
  private factions = new Map<number, FactionRecord>();
  private playerStats: Array<Stamped<PlayerStatsObservation>> = [];
  private factionHistory: Array<Stamped<FactionObservation>> = [];
  private contributorHistory: Array<Stamped<ContributorObservation>> = [];
  private items = new Map<number, ItemRecord>();
  private crimes = new Map<string, CrimeRecord>();
  private crimeEvents: CrimeEventRecord[] = [];
  private participantStats = new Map<string, ParticipantCrimeStats>();
  private trackedFactions = new Map<string, TrackedFactionRecord>();
  private summaries = new Map<string, PeriodSummaryRecord>();
  private competitions = new Map<number, CompetitionRecord>();
  private teams = new Map<number, CompetitionTeamRecord>();
  private participants = new Map<string, CompetitionParticipantRecord>();
  private seq = 0;
  private readonly now: () => Date;

  constructor(options: { now?: () => Date } = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async upsertPlayer(input: PlayerUpsertInput): Promise<PlayerRecord> {
    const existing = this.players.get(input.playerId);
    const now = this.now();
    const record: PlayerRecord = {
      playerId: input.playerId,
      name: input.name,
      level: pick(input.level, existing?.level ?? null),
      rank: pick(input.rank, existing?.rank ?? null),
      factionId: pick(input.factionId, existing?.factionId ?? null),
      statusState: pick(input.statusState, existing?.statusState ?? null),
      statusDescription: pick(input.statusDescription, existing?.statusDescription ?? null),
      lifeCurrent: pick(input.lifeCurrent, existing?.lifeCurrent ?? null),
      lifeMaximum: pick(input.lifeMaximum, existing?.lifeMaximum ?? null),
      discordId: existing?.discordId ?? null,
      createdAt: existing?.createdAt ?? now,
      lastUpdated: now,
    };
    this.players.set(record.playerId, record);
    return { ...record };
  }

  async getPlayer(playerId: number): Promise<PlayerRecord | null> {
    const record = this.players.get(playerId);
    return record ? { ...record } : null;
  }

  async setPlayerDiscordId(playerId: number, discordId: string): Promise<void> {
    const existing = this.players.get(playerId) ?? (await this.upsertPlayer({ playerId, name: `Player ${playerId}` }));
    this.players.set(playerId, { ...existing, discordId });
  }

  async upsertFaction(input: FactionUpsertInput): Promise<FactionRecord> {
    const existing = this.factions.get(input.factionId);
    const now = this.now();
    const record: FactionRecord = {
      factionId: input.factionId,
      name: input.name,
      tag: pick(input.tag, existing?.tag ?? null),
      leaderId: pick(input.leaderId, existing?.leaderId ?? null),
      coLeaderId: pick(input.coLeaderId, existing?.coLeaderId ?? null),
      respect: pick(input.respect, existing?.respect ?? null),
      age: pick(input.age, existing?.age ?? null),
      bestChain: pick(input.bestChain, existing?.bestChain ?? null),
      memberCount: pick(input.memberCount, existing?.memberCount ?? null),
      createdAt: existing?.createdAt ?? now,
      lastUpdated: now,
    };
    this.factions.set(record.factionId, record);
    return { ...record };
  }

  async getFaction(factionId: number): Promise<FactionRecord | null> {
    const record = this.factions.get(factionId);
    return record ? { ...record } : null;
  }

  async appendPlayerStats(observation: PlayerStatsObservation): Promise<void> {
    this.playerStats.push({ seq: ++this.seq, row: { ...observation } });
  }

  async appendFactionHistory(observation: FactionObservation): Promise<void> {
    this.factionHistory.push({ seq: ++this.seq, row: { ...observation } });
  }

  async appendContributorStat(observation: ContributorObservation): Promise<void> {
    this.contributorHistory.push({ seq: ++this.seq, row: { ...observation } });
  }

  async getLatestContributorValue(playerId: number, statName: string): Promise<number | null> {
    let latest: Stamped<ContributorObservation> | null = null;
    for (const entry of this.contributorHistory) {
      if (entry.row.playerId !== playerId || entry.row.statName !== statName) continue;
      if (
        !latest ||
        entry.row.timestamp.getTime() > latest.row.timestamp.getTime() ||
        (entry.row.timestamp.getTime() === latest.row.timestamp.getTime() && entry.seq > latest.seq)
      ) {
        latest = entry;
      }
    }
    return latest ? latest.row.value : null;
  }

  async getItem(itemId: number): Promise<ItemRecord | null> {
    const record = this.items.get(itemId);
    return record ? { ...record } : null;
  }

  async upsertItem(input: ItemUpsertInput): Promise<ItemRecord> {
    const existing = this.items.get(input.itemId);
    const record: ItemRecord = {
      itemId: input.itemId,
      name: input.name,
      itemType: pick(input.itemType, existing?.itemType ?? null),
      description: pick(input.description, existing?.description ?? null),
      lastUpdated: this.now(),
    };
    this.items.set(record.itemId, record);
    return { ...record };
  }

  async listCurrentCrimes(factionId: number): Promise<CrimeRecord[]> {
    return Array.from(this.crimes.values())
      .filter((crime) => crime.factionId === factionId)
      .sort((a, b) => a.crimeId - b.crimeId)
      .map(cloneCrime);
  }

  async getCurrentCrime(factionId: number, crimeId: number): Promise<CrimeRecord | null> {
    const crime = this.crimes.get(crimeKey(factionId, crimeId));
    return crime ? cloneCrime(crime) : null;
  }

  async upsertCurrentCrime(input: CrimeUpsertInput): Promise<CrimeRecord> {
    const record = cloneCrime({ ...input, lastUpdated: input.lastUpdated ?? this.now() });
    this.crimes.set(crimeKey(record.factionId, record.crimeId), record);
    return cloneCrime(record);
  }

  async deleteCurrentCrime(factionId: number, crimeId: number): Promise<boolean> {
    return this.crimes.delete(crimeKey(factionId, crimeId));
  }

  async appendCrimeEvents(events: CrimeEventInput[]): Promise<number> {
    const recordedAt = this.now();
    for (const event of events) {
      this.crimeEvents.push({
        ...event,
        oldParticipants: event.oldParticipants ? [...event.oldParticipants] : null,
        newParticipants: event.newParticipants ? [...event.newParticipants] : null,
        eventId: ++this.seq,
        recordedAt,
      });
    }
    return events.length;
  }

  async listCrimeEvents(query: CrimeEventQuery): Promise<CrimeEventRecord[]> {
    const types = query.eventTypes ? new Set(query.eventTypes) : null;
    const since = query.since?.getTime();
    const rows = this.crimeEvents
      .filter((event) => event.factionId === query.factionId)
      .filter((event) => query.crimeId === undefined || event.crimeId === query.crimeId)
      .filter((event) => query.playerId === undefined || event.playerId === query.playerId)
      .filter((event) => !types || types.has(event.eventType))
      .filter((event) => since === undefined || event.occurredAt.getTime() >= since)
      .sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime() || b.eventId - a.eventId)
      .map((event) => ({ ...event }));
    return query.limit ? rows.slice(0, query.limit) : rows;
  }

  async listTerminalCrimeIds(factionId: number, crimeIds: number[]): Promise<Set<number>> {
    const wanted = new Set(crimeIds);
    const found = new Set<number>();
    for (const event of this.crimeEvents) {
      if (event.factionId !== factionId || !wanted.has(event.crimeId)) continue;
      if (event.eventType === 'completed' || event.eventType === 'failed' || event.eventType === 'cancelled') {
        found.add(event.crimeId);
      }
    }
    return found;
  }

  async recordParticipantOutcome(input: ParticipantOutcomeInput): Promise<void> {
    const key = outcomeKey(input.factionId, input.playerId, input.crimeType);
    const existing = this.participantStats.get(key);
    this.participantStats.set(key, {
      factionId: input.factionId,
      playerId: input.playerId,
      crimeType: input.crimeType,
      crimesCompleted: (existing?.crimesCompleted ?? 0) + input.completed,
      crimesFailed: (existing?.crimesFailed ?? 0) + input.failed,
      totalRewardMoney: (existing?.totalRewardMoney ?? 0) + input.rewardMoney,
      totalRewardRespect: (existing?.totalRewardRespect ?? 0) + input.rewardRespect,
      lastCrimeAt: input.occurredAt,
    });
  }

  async listParticipantCrimeStats(factionId: number, playerId?: number): Promise<ParticipantCrimeStats[]> {
    return Array.from(this.participantStats.values())
      .filter((row) => row.factionId === factionId && (playerId === undefined || row.playerId === playerId))
      .sort((a, b) => b.crimesCompleted - a.crimesCompleted || a.playerId - b.playerId)
      .map((row) => ({ ...row }));
  }

  async listFrequentLeavers(factionId: number, threshold: number, since: Date): Promise<FrequentLeaver[]> {
    const counts = new Map<number, number>();
    for (const event of this.crimeEvents) {
      if (event.factionId !== factionId || event.eventType !== 'participant_left' || event.playerId === null) continue;
      if (event.occurredAt.getTime() < since.getTime()) continue;
      counts.set(event.playerId, (counts.get(event.playerId) ?? 0) + 1);
    }
    return Array.from(counts.entries())
      .filter(([, leaveCount]) => leaveCount > threshold)
      .map(([playerId, leaveCount]) => ({ playerId, leaveCount }))
      .sort((a, b) => b.leaveCount - a.leaveCount || a.playerId - b.playerId);
  }

  async listTrackedFactions(options: { enabledOnly?: boolean } = {}): Promise<TrackedFactionRecord[]> {
    return Array.from(this.trackedFactions.values())
      .filter((config) => !options.enabledOnly || config.enabled)
      .sort((a, b) => a.factionId - b.factionId || a.guildId.localeCompare(b.guildId))
      .map((config) => ({ ...config, leadIds: [...config.leadIds] }));
  }

  async getTrackedFaction(factionId: number, guildId: string): Promise<TrackedFactionRecord | null> {
    const config = this.trackedFactions.get(trackedKey(factionId, guildId));
    return config ? { ...config, leadIds: [...config.leadIds] } : null;
  }

  async upsertTrackedFaction(input: TrackedFactionUpsertInput): Promise<TrackedFactionRecord> {
    const key = trackedKey(input.factionId, input.guildId);
    const existing = this.trackedFactions.get(key);
    const now = this.now();
    const record: TrackedFactionRecord = {
      factionId: input.factionId,
      guildId: input.guildId,
      enabled: pick(input.enabled, existing?.enabled ?? true),
      lastSync: existing?.lastSync ?? null,
      notificationChannelId: pick(input.notificationChannelId, existing?.notificationChannelId ?? null),
      missingItemChannelId: pick(input.missingItemChannelId, existing?.missingItemChannelId ?? null),
      leadIds: [...pick(input.leadIds, existing?.leadIds ?? [])],
      frequentLeaverThreshold: pick(
        input.frequentLeaverThreshold,
        existing?.frequentLeaverThreshold ?? DEFAULT_LEAVER_THRESHOLD
      ),
      trackingWindowDays: pick(input.trackingWindowDays, existing?.trackingWindowDays ?? DEFAULT_TRACKING_WINDOW_DAYS),
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    };
    this.trackedFactions.set(key, record);
    return { ...record, leadIds: [...record.leadIds] };
  }

  async advanceTrackedFactionWatermark(factionId: number, guildId: string, syncedAt: Date): Promise<void> {
    const key = trackedKey(factionId, guildId);
    const existing = this.trackedFactions.get(key);
    if (!existing) {
      throw new TrackedFactionLookupError(`Faction ${factionId} is not tracked in guild ${guildId}`);
    }
    this.trackedFactions.set(key, { ...existing, lastSync: syncedAt, updatedAt: this.now() });
  }

  async listPeriodEndpoints(series: HistorySeries, start: Date, end: Date): Promise<PeriodEndpoints[]> {
    const samples: Array<Stamped<HistorySample>> =
      series === 'player_stats'
        ? this.playerStats.map((entry) => ({ seq: entry.seq, row: playerSample(entry.row) }))
        : this.factionHistory.map((entry) => ({ seq: entry.seq, row: factionSample(entry.row) }));

    const from = start.getTime();
    const to = end.getTime();
    const byEntity = new Map<number, Array<Stamped<HistorySample>>>();
    for (const sample of samples) {
      const ts = sample.row.timestamp.getTime();
      if (ts < from || ts >= to) continue;
      const bucket = byEntity.get(sample.row.entityId) ?? [];
      bucket.push(sample);
      byEntity.set(sample.row.entityId, bucket);
    }

    const endpoints: PeriodEndpoints[] = [];
    for (const [entityId, bucket] of byEntity) {
      bucket.sort((a, b) => a.row.timestamp.getTime() - b.row.timestamp.getTime() || a.seq - b.seq);
      endpoints.push({
        entityId,
        first: bucket[0].row,
        last: bucket[bucket.length - 1].row,
        recordCount: bucket.length,
      });
    }
    return endpoints.sort((a, b) => a.entityId - b.entityId);
  }

  async countPeriodSummaries(series: HistorySeries, period: PeriodKey): Promise<number> {
    let count = 0;
    for (const summary of this.summaries.values()) {
      if (summary.series === series && samePeriod(summary, period)) count += 1;
    }
    return count;
  }

  async writePeriodSummaries(
    series: HistorySeries,
    period: PeriodKey,
    summaries: PeriodSummaryInput[],
    options: { force: boolean }
  ): Promise<number> {
    if (!options.force && (await this.countPeriodSummaries(series, period)) > 0) {
      return 0;
    }
    const createdAt = this.now();
    const staged = summaries.map((summary) => ({
      key: periodKey(series, summary.entityId, period),
      record: {
        ...summary,
        ...period,
        series,
        attributes: { ...summary.attributes },
        createdAt,
      } satisfies PeriodSummaryRecord,
    }));
    for (const { key, record } of staged) {
      this.summaries.set(key, record);
    }
    return staged.length;
  }

  async listPeriodSummaries(series: HistorySeries, entityId: number): Promise<PeriodSummaryRecord[]> {
    return Array.from(this.summaries.values())
      .filter((summary) => summary.series === series && summary.entityId === entityId)
      .sort((a, b) => b.periodStart.getTime() - a.periodStart.getTime())
      .map((summary) => ({ ...summary, attributes: { ...summary.attributes } }));
  }

  async pruneHistory(table: HistoryTable, olderThan: Date): Promise<number> {
    const cutoff = olderThan.getTime();
    const keep = <T extends { timestamp: Date }>(rows: Array<Stamped<T>>) =>
      rows.filter((entry) => entry.row.timestamp.getTime() >= cutoff);

    switch (table) {
      case 'player_stats': {
        const before = this.playerStats.length;
        this.playerStats = keep(this.playerStats);
        return before - this.playerStats.length;
      }
      case 'faction': {
        const before = this.factionHistory.length;
        this.factionHistory = keep(this.factionHistory);
        return before - this.factionHistory.length;
      }
      case 'contributors': {
        const before = this.contributorHistory.length;
        this.contributorHistory = keep(this.contributorHistory);
        return before - this.contributorHistory.length;
      }
    }
  }

  async getHealthMetrics(options: { retentionCutoff: Date; retentionDays: number }): Promise<HealthMetrics> {
    const cutoff = options.retentionCutoff.getTime();
    const timed = (table: string, timestamps: Date[]): TableHealth => {
      const times = timestamps.map((ts) => ts.getTime());
      return {
        table,
        rowCount: times.length,
        oldest: times.length ? new Date(Math.min(...times)) : null,
        newest: times.length ? new Date(Math.max(...times)) : null,
        olderThanRetention: times.filter((ts) => ts < cutoff).length,
      };
    };
    const counted = (table: string, rowCount: number): TableHealth => ({
      table,
      rowCount,
      oldest: null,
      newest: null,
      olderThanRetention: null,
    });

    return {
      schemaVersion: null,
      retentionDays: options.retentionDays,
      tables: [
        counted('players', this.players.size),
        counted('factions', this.factions.size),
        timed('player_stats_history', this.playerStats.map((entry) => entry.row.timestamp)),
        timed('faction_history', this.factionHistory.map((entry) => entry.row.timestamp)),
        timed('player_contributor_history', this.contributorHistory.map((entry) => entry.row.timestamp)),
        counted('organized_crimes_current', this.crimes.size),
        timed('organized_crime_history', this.crimeEvents.map((event) => event.occurredAt)),
        counted('period_summaries', this.summaries.size),
        counted('competitions', this.competitions.size),
      ],
    };
  }

  async createCompetition(input: CompetitionCreateInput): Promise<CompetitionCreateResult> {
    const competition: CompetitionRecord = {
      competitionId: ++this.seq,
      name: input.name,
      trackedStat: input.trackedStat,
      startDate: input.startDate,
      endDate: input.endDate,
      status: 'active',
      createdBy: input.createdBy ?? null,
      createdAt: this.now(),
    };
    this.competitions.set(competition.competitionId, competition);

    const teams = input.teamNames.map((teamName) => {
      const team: CompetitionTeamRecord = {
        teamId: ++this.seq,
        competitionId: competition.competitionId,
        teamName,
        captainIds: [],
      };
      this.teams.set(team.teamId, team);
      return { ...team };
    });

    return { competition: { ...competition }, teams };
  }

  async getCompetition(competitionId: number): Promise<CompetitionRecord | null> {
    const competition = this.competitions.get(competitionId);
    return competition ? { ...competition } : null;
  }

  async listCompetitions(status?: CompetitionStatus): Promise<CompetitionRecord[]> {
    return Array.from(this.competitions.values())
      .filter((competition) => !status || competition.status === status)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || b.competitionId - a.competitionId)
      .map((competition) => ({ ...competition }));
  }

  async setCompetitionStatus(competitionId: number, status: CompetitionStatus): Promise<void> {
    const competition = this.competitions.get(competitionId);
    if (competition) {
      this.competitions.set(competitionId, { ...competition, status });
    }
  }

  async listCompetitionTeams(competitionId: number): Promise<CompetitionTeamRecord[]> {
    return Array.from(this.teams.values())
      .filter((team) => team.competitionId === competitionId)
      .sort((a, b) => a.teamId - b.teamId)
      .map((team) => ({ ...team, captainIds: [...team.captainIds] }));
  }

  async setTeamCaptains(teamId: number, captainIds: string[]): Promise<CompetitionTeamRecord | null> {
    const team = this.teams.get(teamId);
    if (!team) return null;
    const updated = { ...team, captainIds: [...captainIds] };
    this.teams.set(teamId, updated);
    return { ...updated, captainIds: [...captainIds] };
  }

  async addCompetitionParticipant(input: CompetitionParticipantInput): Promise<CompetitionParticipantRecord> {
    const key = participantKey(input.competitionId, input.playerId);
    const existing = this.participants.get(key);
    const startValue = pick(input.startValue, existing?.startValue ?? null);
    const record: CompetitionParticipantRecord = {
      competitionId: input.competitionId,
      playerId: input.playerId,
      playerName: null,
      factionId: null,
      teamId: pick(input.teamId, existing?.teamId ?? null),
      discordUserId: pick(input.discordUserId, existing?.discordUserId ?? null),
      startValue,
      startRecordedAt:
        input.startValue !== undefined && input.startValue !== null ? this.now() : existing?.startRecordedAt ?? null,
      joinedAt: existing?.joinedAt ?? this.now(),
    };
    this.participants.set(key, record);
    return this.withPlayer(record);
  }

  async listCompetitionParticipants(competitionId: number): Promise<CompetitionParticipantRecord[]> {
    return Array.from(this.participants.values())
      .filter((participant) => participant.competitionId === competitionId)
      .sort((a, b) => a.playerId - b.playerId)
      .map((participant) => this.withPlayer(participant));
  }

  async setParticipantTeam(competitionId: number, playerId: number, teamId: number | null): Promise<boolean> {
    const key = participantKey(competitionId, playerId);
    const existing = this.participants.get(key);
    if (!existing) return false;
    this.participants.set(key, { ...existing, teamId });
    return true;
  }

  async setParticipantStartValue(
    competitionId: number,
    playerId: number,
    value: number,
    recordedAt: Date
  ): Promise<void> {
    const key = participantKey(competitionId, playerId);
    const existing = this.participants.get(key);
    if (existing) {
      this.participants.set(key, { ...existing, startValue: value, startRecordedAt: recordedAt });
    }
  }

  private withPlayer(participant: CompetitionParticipantRecord): CompetitionParticipantRecord {
    const player = this.players.get(participant.playerId);
    return {
      ...participant,
      playerName: player?.name ?? null,
      factionId: player?.factionId ?? null,
    };
  }
}

const samePeriod = (a: PeriodKey, b: PeriodKey) =>
  a.periodStart.getTime() === b.periodStart.getTime() &&
  a.periodEnd.getTime() === b.periodEnd.getTime() &&
  a.periodType === b.periodType;
