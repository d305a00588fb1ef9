import type { FactionOverview, ParticipantStanding, TeamTotal } from '../../aggregation/competitions.js';
import type { CompetitionUpdateReport } from '../../competitions/stats-updater.js';
import type { CredentialSummary, ValidationResult } from '../../credentials/registry.js';
import type { CrimeSyncReport } from '../../sync/orchestrator.js';
import type {
  CompetitionParticipantRecord,
  CompetitionRecord,
  CompetitionTeamRecord,
  CrimeEventRecord,
  CrimeRecord,
  CrimeRewards,
  FactionRecord,
  FrequentLeaver,
  HealthMetrics,
  ParticipantCrimeStats,
  PeriodSummaryRecord,
  PlayerRecord,
  TrackedFactionRecord,
} from '../../store/types.js';

const toRewardsResponse = (rewards: CrimeRewards | null) =>
  rewards
    ? {
        money: rewards.money,
        respect: rewards.respect,
        other: rewards.other,
      }
    : null;

export const toCrimeResponse = (crime: CrimeRecord) => ({
  faction_id: crime.factionId,
  crime_id: crime.crimeId,
  name: crime.name,
  crime_type: crime.crimeType,
  status: crime.status,
  participants: crime.participants,
  participant_count: crime.participants.length,
  required_participants: crime.requiredParticipants,
  time_started: crime.timeStarted,
  time_completed: crime.timeCompleted,
  ready_at: crime.readyAt,
  rewards: toRewardsResponse(crime.rewards),
  last_updated: crime.lastUpdated,
});

export const toCrimeEventResponse = (event: CrimeEventRecord) => ({
  event_id: event.eventId,
  faction_id: event.factionId,
  crime_id: event.crimeId,
  crime_name: event.crimeName,
  event_type: event.eventType,
  player_id: event.playerId,
  old_status: event.oldStatus,
  new_status: event.newStatus,
  old_participants: event.oldParticipants,
  new_participants: event.newParticipants,
  rewards: toRewardsResponse(event.rewards),
  occurred_at: event.occurredAt,
  recorded_at: event.recordedAt,
});

export const toTrackedFactionResponse = (config: TrackedFactionRecord) => ({
  faction_id: config.factionId,
  guild_id: config.guildId,
  enabled: config.enabled,
  last_sync: config.lastSync,
  notification_channel_id: config.notificationChannelId,
  missing_item_channel_id: config.missingItemChannelId,
  lead_ids: config.leadIds,
  frequent_leaver_threshold: config.frequentLeaverThreshold,
  tracking_window_days: config.trackingWindowDays,
});

export const toFrequentLeaverResponse = (leaver: FrequentLeaver) => ({
  player_id: leaver.playerId,
  leave_count: leaver.leaveCount,
});

export const toParticipantCrimeStatsResponse = (stats: ParticipantCrimeStats) => ({
  faction_id: stats.factionId,
  player_id: stats.playerId,
  crime_type: stats.crimeType,
  crimes_completed: stats.crimesCompleted,
  crimes_failed: stats.crimesFailed,
  total_reward_money: stats.totalRewardMoney,
  total_reward_respect: stats.totalRewardRespect,
  last_crime_at: stats.lastCrimeAt,
});

export const toSyncReportResponse = (report: CrimeSyncReport) => ({
  started_at: report.startedAt,
  finished_at: report.finishedAt,
  factions_synced: report.factionsSynced,
  factions_failed: report.factionsFailed.map((failure) => ({
    faction_id: failure.factionId,
    guild_id: failure.guildId,
    reason: failure.reason,
    keys_tried: failure.keysTried,
  })),
  crimes_updated: report.crimesUpdated,
  events_recorded: report.eventsRecorded,
  reminders_sent: report.remindersSent,
  leaver_notifications: report.leaverNotifications,
  aborted: report.aborted,
});

export const toCredentialResponse = (summary: CredentialSummary) => ({
  alias: summary.alias,
  owner: summary.owner,
  key_type: summary.keyType,
  access_level: summary.tier,
  scopes: summary.scopes,
  last_validated: summary.lastValidated,
  masked_key: summary.maskedKey,
});

export const toValidationResponse = (result: ValidationResult) =>
  result.valid
    ? { valid: true, scopes: result.scopes, access_level: result.tier, validated_at: result.validatedAt }
    : { valid: false, error: result.error };

export const toPlayerResponse = (player: PlayerRecord) => ({
  player_id: player.playerId,
  name: player.name,
  level: player.level,
  rank: player.rank,
  faction_id: player.factionId,
  status: player.statusState ? { state: player.statusState, description: player.statusDescription } : null,
  life: player.lifeMaximum !== null ? { current: player.lifeCurrent, maximum: player.lifeMaximum } : null,
  last_updated: player.lastUpdated,
});

export const toFactionResponse = (faction: FactionRecord) => ({
  faction_id: faction.factionId,
  name: faction.name,
  tag: faction.tag,
  leader_id: faction.leaderId,
  co_leader_id: faction.coLeaderId,
  respect: faction.respect,
  age: faction.age,
  best_chain: faction.bestChain,
  member_count: faction.memberCount,
  last_updated: faction.lastUpdated,
});

export const toSummaryResponse = (summary: PeriodSummaryRecord) => ({
  series: summary.series,
  entity_id: summary.entityId,
  period_type: summary.periodType,
  period_start: summary.periodStart,
  period_end: summary.periodEnd,
  record_count: summary.recordCount,
  attributes: summary.attributes,
});

export const toHealthResponse = (metrics: HealthMetrics) => ({
  schema_version: metrics.schemaVersion,
  retention_days: metrics.retentionDays,
  tables: metrics.tables.map((table) => ({
    table: table.table,
    row_count: table.rowCount,
    oldest: table.oldest,
    newest: table.newest,
    older_than_retention: table.olderThanRetention,
  })),
});

export const toCompetitionResponse = (competition: CompetitionRecord) => ({
  competition_id: competition.competitionId,
  name: competition.name,
  tracked_stat: competition.trackedStat,
  start_date: competition.startDate,
  end_date: competition.endDate,
  status: competition.status,
  created_by: competition.createdBy,
  created_at: competition.createdAt,
});

export const toTeamResponse = (team: CompetitionTeamRecord) => ({
  team_id: team.teamId,
  competition_id: team.competitionId,
  team_name: team.teamName,
  captain_ids: team.captainIds,
});

export const toParticipantResponse = (participant: CompetitionParticipantRecord) => ({
  player_id: participant.playerId,
  player_name: participant.playerName,
  faction_id: participant.factionId,
  team_id: participant.teamId,
  start_value: participant.startValue,
  start_recorded_at: participant.startRecordedAt,
  joined_at: participant.joinedAt,
});

export const toStandingResponse = (standing: ParticipantStanding, rank: number) => ({
  rank,
  player_id: standing.playerId,
  player_name: standing.playerName,
  team_id: standing.teamId,
  start_value: standing.startValue,
  current_value: standing.currentValue,
  delta: standing.delta ?? null,
});

export const toTeamTotalResponse = (total: TeamTotal, rank: number) => ({
  rank,
  team_id: total.teamId,
  team_name: total.teamName,
  captain_ids: total.captainIds,
  total_delta: total.totalDelta,
  participant_count: total.participantCount,
  participants_with_data: total.participantsWithData,
});

export const toOverviewResponse = (overview: FactionOverview) => ({
  total_delta: overview.totalDelta,
  average_delta: overview.averageDelta,
  participant_count: overview.participantCount,
  participants_with_data: overview.participantsWithData,
});

export const toCompetitionUpdateResponse = (report: CompetitionUpdateReport) => ({
  competitions_updated: report.competitionsUpdated,
  competitions_completed: report.competitionsCompleted,
  participants_updated: report.participantsUpdated,
  factions_processed: report.factionsProcessed,
  factions_failed: report.factionsFailed.map((failure) => ({
    competition_id: failure.competitionId,
    faction_id: failure.factionId,
    reason: failure.reason,
    participant_count: failure.participantCount,
    keys_tried: failure.keysTried,
  })),
  participants_failed: report.participantsFailed.map((failure) => ({
    competition_id: failure.competitionId,
    player_id: failure.playerId,
    reason: failure.reason,
  })),
});
