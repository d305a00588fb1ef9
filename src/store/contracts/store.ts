import type {
  ContributorObservation,
  FactionObservation,
  FactionRecord,
  FactionUpsertInput,
  ItemRecord,
  ItemUpsertInput,
  PlayerRecord,
  PlayerStatsObservation,
  PlayerUpsertInput,
} from './entities.js';
import type {
  CrimeEventInput,
  CrimeEventQuery,
  CrimeEventRecord,
  CrimeRecord,
  CrimeUpsertInput,
  FrequentLeaver,
  ParticipantCrimeStats,
  ParticipantOutcomeInput,
  TrackedFactionRecord,
  TrackedFactionUpsertInput,
} from './crimes.js';
import type {
  HealthMetrics,
  HistorySeries,
  HistoryTable,
  PeriodEndpoints,
  PeriodKey,
  PeriodSummaryInput,
  PeriodSummaryRecord,
} from './summaries.js';
import type {
  CompetitionCreateInput,
  CompetitionCreateResult,
  CompetitionParticipantInput,
  CompetitionParticipantRecord,
  CompetitionRecord,
  CompetitionStatus,
  CompetitionTeamRecord,
} from './competitions.js';

export interface TrackerStore {
  // entities
  upsertPlayer(input: PlayerUpsertInput): Promise<PlayerRecord>;
  getPlayer(playerId: number): Promise<PlayerRecord | null>;
  setPlayerDiscordId(playerId: number, discordId: string): Promise<void>;
  upsertFaction(input: FactionUpsertInput): Promise<FactionRecord>;
  getFaction(factionId: number): Promise<FactionRecord | null>;
  appendPlayerStats(observation: PlayerStatsObservation): Promise<void>;
  appendFactionHistory(observation: FactionObservation): Promise<void>;
  appendContributorStat(observation: ContributorObservation): Promise<void>;
  getLatestContributorValue(playerId: number, statName: string): Promise<number | null>;
  getItem(itemId: number): Promise<ItemRecord | null>;
  upsertItem(input: ItemUpsertInput): Promise<ItemRecord>;

  // crimes
  listCurrentCrimes(factionId: number): Promise<CrimeRecord[]>;
  getCurrentCrime(factionId: number, crimeId: number): Promise<CrimeRecord | null>;
  upsertCurrentCrime(input: CrimeUpsertInput): Promise<CrimeRecord>;
  deleteCurrentCrime(factionId: number, crimeId: number): Promise<boolean>;
  appendCrimeEvents(events: CrimeEventInput[]): Promise<number>;
  listCrimeEvents(query: CrimeEventQuery): Promise<CrimeEventRecord[]>;
  listTerminalCrimeIds(factionId: number, crimeIds: number[]): Promise<Set<number>>;
  recordParticipantOutcome(input: ParticipantOutcomeInput): Promise<void>;
  listParticipantCrimeStats(factionId: number, playerId?: number): Promise<ParticipantCrimeStats[]>;
  listFrequentLeavers(factionId: number, threshold: number, since: Date): Promise<FrequentLeaver[]>;

  // tracked factions
  listTrackedFactions(options?: { enabledOnly?: boolean }): Promise<TrackedFactionRecord[]>;
  getTrackedFaction(factionId: number, guildId: string): Promise<TrackedFactionRecord | null>;
  upsertTrackedFaction(input: TrackedFactionUpsertInput): Promise<TrackedFactionRecord>;
  advanceTrackedFactionWatermark(factionId: number, guildId: string, syncedAt: Date): Promise<void>;

  // aggregation
  /** History inside `[start, end)`. */
  listPeriodEndpoints(series: HistorySeries, start: Date, end: Date): Promise<PeriodEndpoints[]>;
  countPeriodSummaries(series: HistorySeries, period: PeriodKey): Promise<number>;
  /**
   * Writes every summary for one period in a single transaction. Without `force`
   * nothing is written when any summary for the period key already exists.
   */
  writePeriodSummaries(
    series: HistorySeries,
    period: PeriodKey,
    summaries: PeriodSummaryInput[],
    options: { force: boolean }
  ): Promise<number>;
  listPeriodSummaries(series: HistorySeries, entityId: number): Promise<PeriodSummaryRecord[]>;
  pruneHistory(table: HistoryTable, olderThan: Date): Promise<number>;
  getHealthMetrics(options: { retentionCutoff: Date; retentionDays: number }): Promise<HealthMetrics>;

  // competitions
  createCompetition(input: CompetitionCreateInput): Promise<CompetitionCreateResult>;
  getCompetition(competitionId: number): Promise<CompetitionRecord | null>;
  listCompetitions(status?: CompetitionStatus): Promise<CompetitionRecord[]>;
  setCompetitionStatus(competitionId: number, status: CompetitionStatus): Promise<void>;
  listCompetitionTeams(competitionId: number): Promise<CompetitionTeamRecord[]>;
  setTeamCaptains(teamId: number, captainIds: string[]): Promise<CompetitionTeamRecord | null>;
  addCompetitionParticipant(input: CompetitionParticipantInput): Promise<CompetitionParticipantRecord>;
  listCompetitionParticipants(competitionId: number): Promise<CompetitionParticipantRecord[]>;
  setParticipantTeam(competitionId: number, playerId: number, teamId: number | null): Promise<boolean>;
  setParticipantStartValue(competitionId: number, playerId: number, value: number, recordedAt: Date): Promise<void>;
}
