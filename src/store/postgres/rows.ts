import { z } from 'zod';

import {
  competitionParticipants,
  competitionTeams,
  competitions,
  factions,
  items,
  organizedCrimeHistory,
  organizedCrimesCurrent,
  participantCrimeStats,
  periodSummaries,
  players,
  trackedFactions,
} from '../../db/schema.js';
import { CRIME_STATUSES } from '../contracts/crimes.js';
import type {
  AttributeChange,
  CompetitionRecord,
  CompetitionStatus,
  CompetitionTeamRecord,
  CrimeEventRecord,
  CrimeEventType,
  CrimeRecord,
  CrimeRewards,
  CrimeStatus,
  FactionRecord,
  HistorySeries,
  ItemRecord,
  ParticipantCrimeStats,
  PeriodSummaryRecord,
  PeriodType,
  PlayerRecord,
  TrackedFactionRecord,
} from '../types.js';

type PlayerRow = typeof players.$inferSelect;
type FactionRow = typeof factions.$inferSelect;
type ItemRow = typeof items.$inferSelect;
type CrimeRow = typeof organizedCrimesCurrent.$inferSelect;
type CrimeEventRow = typeof organizedCrimeHistory.$inferSelect;
type ParticipantStatsRow = typeof participantCrimeStats.$inferSelect;
type TrackedFactionRow = typeof trackedFactions.$inferSelect;
type PeriodSummaryRow = typeof periodSummaries.$inferSelect;
type CompetitionRow = typeof competitions.$inferSelect;
type CompetitionTeamRow = typeof competitionTeams.$inferSelect;
export type CompetitionParticipantRow = typeof competitionParticipants.$inferSelect;

const IdListSchema = z.array(z.number().int());
const StringListSchema = z.array(z.string());
const LooseRecordSchema = z.record(z.unknown());
const AttributesSchema = z.record(
  z.object({
    start: z.number(),
    end: z.number(),
    change: z.number(),
  })
);
const CrimeStatusSchema = z.enum(CRIME_STATUSES);
const CrimeEventTypeSchema = z.enum([
  'created',
  'status_changed',
  'participant_joined',
  'participant_left',
  'completed',
  'failed',
  'cancelled',
]);
const CompetitionStatusSchema = z.enum(['active', 'cancelled', 'completed']);
const SeriesSchema = z.enum(['player_stats', 'faction']);
const PeriodTypeSchema = z.enum(['monthly', 'weekly', 'custom']);

export const decodeIdList = (value: unknown): number[] => {
  const parsed = IdListSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
};

export const decodeStringList = (value: unknown): string[] => {
  const parsed = StringListSchema.safeParse(value);
  return parsed.success ? parsed.data : [];
};

export const decodeRecord = (value: unknown): Record<string, unknown> | null => {
  const parsed = LooseRecordSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

const decodeAttributes = (value: unknown): Record<string, AttributeChange> => {
  const parsed = AttributesSchema.safeParse(value);
  return parsed.success ? parsed.data : {};
};

const decodeStatus = (value: string | null): CrimeStatus | null => {
  if (value === null) return null;
  const parsed = CrimeStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
};

export const decodeEventType = (value: string): CrimeEventType => CrimeEventTypeSchema.parse(value);

export const decodeCompetitionStatus = (value: string): CompetitionStatus => {
  const parsed = CompetitionStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : 'active';
};

const rewardsFromRow = (row: {
  rewardMoney: number | null;
  rewardRespect: number | null;
  rewardOther: unknown;
}): CrimeRewards => ({
  money: row.rewardMoney,
  respect: row.rewardRespect,
  other: decodeRecord(row.rewardOther),
});

export const toPlayerRecord = (row: PlayerRow): PlayerRecord => ({
  playerId: row.playerId,
  name: row.name,
  level: row.level,
  rank: row.rank,
  factionId: row.factionId,
  statusState: row.statusState,
  statusDescription: row.statusDescription,
  lifeCurrent: row.lifeCurrent,
  lifeMaximum: row.lifeMaximum,
  discordId: row.discordId,
  createdAt: row.createdAt,
  lastUpdated: row.lastUpdated,
});

export const toFactionRecord = (row: FactionRow): FactionRecord => ({
  factionId: row.factionId,
  name: row.name,
  tag: row.tag,
  leaderId: row.leaderId,
  coLeaderId: row.coLeaderId,
  respect: row.respect,
  age: row.age,
  bestChain: row.bestChain,
  memberCount: row.memberCount,
  createdAt: row.createdAt,
  lastUpdated: row.lastUpdated,
});

export const toItemRecord = (row: ItemRow): ItemRecord => ({
  itemId: row.itemId,
  name: row.name,
  itemType: row.itemType,
  description: row.description,
  lastUpdated: row.lastUpdated,
});

export const toCrimeRecord = (row: CrimeRow): CrimeRecord => ({
  factionId: row.factionId,
  crimeId: row.crimeId,
  name: row.crimeName,
  crimeType: row.crimeType,
  participants: decodeIdList(row.participants),
  requiredParticipants: row.requiredParticipants,
  status: decodeStatus(row.status) ?? 'planning',
  timeStarted: row.timeStarted,
  timeCompleted: row.timeCompleted,
  readyAt: row.readyAt,
  rewards: rewardsFromRow(row),
  dataSource: row.dataSource,
  lastUpdated: row.lastUpdated,
});

export const toCrimeEventRecord = (row: CrimeEventRow): CrimeEventRecord => {
  const hasRewards = row.rewardMoney !== null || row.rewardRespect !== null || row.rewardOther !== null;
  return {
    eventId: row.id,
    factionId: row.factionId,
    crimeId: row.crimeId,
    crimeName: row.crimeName,
    eventType: decodeEventType(row.eventType),
    playerId: row.playerId,
    oldStatus: decodeStatus(row.oldStatus),
    newStatus: decodeStatus(row.newStatus),
    oldParticipants: row.oldParticipants === null ? null : decodeIdList(row.oldParticipants),
    newParticipants: row.newParticipants === null ? null : decodeIdList(row.newParticipants),
    rewards: hasRewards ? rewardsFromRow(row) : null,
    dataSource: row.dataSource,
    occurredAt: row.eventTimestamp,
    recordedAt: row.recordedAt,
  };
};

export const toParticipantStats = (row: ParticipantStatsRow): ParticipantCrimeStats => ({
  factionId: row.factionId,
  playerId: row.playerId,
  crimeType: row.crimeType === '' ? null : row.crimeType,
  crimesCompleted: row.crimesCompleted,
  crimesFailed: row.crimesFailed,
  totalRewardMoney: row.totalRewardMoney,
  totalRewardRespect: row.totalRewardRespect,
  lastCrimeAt: row.lastCrimeAt,
});

export const toTrackedFactionRecord = (row: TrackedFactionRow): TrackedFactionRecord => ({
  factionId: row.factionId,
  guildId: row.guildId,
  enabled: row.enabled,
  lastSync: row.lastSync,
  notificationChannelId: row.notificationChannelId,
  missingItemChannelId: row.missingItemChannelId,
  leadIds: decodeStringList(row.leadIds),
  frequentLeaverThreshold: row.frequentLeaverThreshold,
  trackingWindowDays: row.trackingWindowDays,
  createdAt: row.createdAt,
  updatedAt: row.updatedAt,
});

export const toPeriodSummaryRecord = (row: PeriodSummaryRow): PeriodSummaryRecord => ({
  series: SeriesSchema.parse(row.series) satisfies HistorySeries,
  entityId: row.entityId,
  periodStart: row.periodStart,
  periodEnd: row.periodEnd,
  periodType: PeriodTypeSchema.parse(row.periodType) satisfies PeriodType,
  attributes: decodeAttributes(row.attributes),
  recordCount: row.recordCount,
  createdAt: row.createdAt,
});

export const toCompetitionRecord = (row: CompetitionRow): CompetitionRecord => ({
  competitionId: row.competitionId,
  name: row.name,
  trackedStat: row.trackedStat,
  startDate: row.startDate,
  endDate: row.endDate,
  status: decodeCompetitionStatus(row.status),
  createdBy: row.createdBy,
  createdAt: row.createdAt,
});

export const toCompetitionTeamRecord = (row: CompetitionTeamRow): CompetitionTeamRecord => ({
  teamId: row.teamId,
  competitionId: row.competitionId,
  teamName: row.teamName,
  captainIds: decodeStringList(row.captainIds),
});
