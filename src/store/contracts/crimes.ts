export const CRIME_STATUSES = ['planning', 'ready', 'completed', 'failed', 'cancelled'] as const;
export type CrimeStatus = (typeof CRIME_STATUSES)[number];

export type TerminalCrimeStatus = Extract<CrimeStatus, 'completed' | 'failed' | 'cancelled'>;

export const isTerminalStatus = (status: CrimeStatus): status is TerminalCrimeStatus =>
  status === 'completed' || status === 'failed' || status === 'cancelled';

export interface CrimeRewards {
  money: number | null;
  respect: number | null;
  other: Record<string, unknown> | null;
}

export interface CrimeRecord {
  factionId: number;
  crimeId: number;
  name: string;
  crimeType: string | null;
  participants: number[];
  requiredParticipants: number;
  status: CrimeStatus;
  timeStarted: Date | null;
  timeCompleted: Date | null;
  readyAt: Date | null;
  rewards: CrimeRewards;
  dataSource: string | null;
  lastUpdated: Date;
}

export type CrimeUpsertInput = Omit<CrimeRecord, 'lastUpdated'> & { lastUpdated?: Date };

export type CrimeEventType =
  | 'created'
  | 'status_changed'
  | 'participant_joined'
  | 'participant_left'
  | TerminalCrimeStatus;

export interface CrimeEventInput {
  factionId: number;
  crimeId: number;
  crimeName: string | null;
  eventType: CrimeEventType;
  playerId: number | null;
  oldStatus: CrimeStatus | null;
  newStatus: CrimeStatus | null;
  oldParticipants: number[] | null;
  newParticipants: number[] | null;
  rewards: CrimeRewards | null;
  dataSource: string | null;
  occurredAt: Date;
}

export interface CrimeEventRecord extends CrimeEventInput {
  eventId: number;
  recordedAt: Date;
}

export interface CrimeEventQuery {
  factionId: number;
  crimeId?: number;
  playerId?: number;
  eventTypes?: CrimeEventType[];
  since?: Date;
  limit?: number;
}

export interface ParticipantOutcomeInput {
  factionId: number;
  playerId: number;
  crimeType: string | null;
  completed: number;
  failed: number;
  rewardMoney: number;
  rewardRespect: number;
  occurredAt: Date;
}

export interface ParticipantCrimeStats {
  factionId: number;
  playerId: number;
  crimeType: string | null;
  crimesCompleted: number;
  crimesFailed: number;
  totalRewardMoney: number;
  totalRewardRespect: number;
  lastCrimeAt: Date | null;
}

export interface FrequentLeaver {
  playerId: number;
  leaveCount: number;
}

export interface TrackedFactionRecord {
  factionId: number;
  guildId: string;
  enabled: boolean;
  lastSync: Date | null;
  notificationChannelId: string | null;
  missingItemChannelId: string | null;
  leadIds: string[];
  frequentLeaverThreshold: number;
  trackingWindowDays: number;
  createdAt: Date;
  updatedAt: Date;
}

export interface TrackedFactionUpsertInput {
  factionId: number;
  guildId: string;
  enabled?: boolean;
  notificationChannelId?: string | null;
  missingItemChannelId?: string | null;
  leadIds?: string[];
  frequentLeaverThreshold?: number;
  trackingWindowDays?: number;
}

export const DEFAULT_LEAVER_THRESHOLD = 2;
export const DEFAULT_TRACKING_WINDOW_DAYS = 30;
