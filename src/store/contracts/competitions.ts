export type CompetitionStatus = 'active' | 'cancelled' | 'completed';

export interface CompetitionRecord {
  competitionId: number;
  name: string;
  trackedStat: string;
  startDate: Date;
  endDate: Date;
  status: CompetitionStatus;
  createdBy: string | null;
  createdAt: Date;
}

export interface CompetitionCreateInput {
  name: string;
  trackedStat: string;
  startDate: Date;
  endDate: Date;
  createdBy?: string | null;
  teamNames: string[];
}

export interface CompetitionTeamRecord {
  teamId: number;
  competitionId: number;
  teamName: string;
  captainIds: string[];
}

export interface CompetitionParticipantRecord {
  competitionId: number;
  playerId: number;
  playerName: string | null;
  factionId: number | null;
  teamId: number | null;
  discordUserId: string | null;
  startValue: number | null;
  startRecordedAt: Date | null;
  joinedAt: Date;
}

export interface CompetitionParticipantInput {
  competitionId: number;
  playerId: number;
  teamId?: number | null;
  discordUserId?: string | null;
  startValue?: number | null;
}

export interface CompetitionCreateResult {
  competition: CompetitionRecord;
  teams: CompetitionTeamRecord[];
}
