import type { CompetitionParticipantRecord, CompetitionTeamRecord } from '../store/types.js';

/**
 * Progress since the recorded start value. No start value yet means no progress
 * (0); no current observation means there is nothing to show (undefined).
 */
export const participantDelta = (
  startValue: number | null | undefined,
  currentValue: number | null | undefined
): number | undefined => {
  if (startValue === null || startValue === undefined) return 0;
  if (currentValue === null || currentValue === undefined) return undefined;
  return currentValue - startValue;
};

export interface ParticipantStanding {
  playerId: number;
  playerName: string;
  factionId: number | null;
  teamId: number | null;
  startValue: number | null;
  currentValue: number | null;
  delta: number | undefined;
}

export const buildStanding = (
  participant: CompetitionParticipantRecord,
  currentValue: number | null
): ParticipantStanding => ({
  playerId: participant.playerId,
  playerName: participant.playerName ?? `Player ${participant.playerId}`,
  factionId: participant.factionId,
  teamId: participant.teamId,
  startValue: participant.startValue,
  currentValue,
  delta: participantDelta(participant.startValue, currentValue),
});

export interface RankingOptions {
  worst?: boolean;
  limit?: number;
}

export const DEFAULT_RANKING_LIMIT = 10;

/** Best first (or worst first); participants without a delta always sort last. */
export const rankParticipants = (
  standings: ParticipantStanding[],
  options: RankingOptions = {}
): ParticipantStanding[] => {
  const direction = options.worst ? 1 : -1;
  const sorted = [...standings].sort((a, b) => {
    if (a.delta === undefined || b.delta === undefined) {
      if (a.delta === b.delta) return a.playerId - b.playerId;
      return a.delta === undefined ? 1 : -1;
    }
    return direction * (a.delta - b.delta) || a.playerId - b.playerId;
  });
  const limit = options.limit && options.limit > 0 ? options.limit : DEFAULT_RANKING_LIMIT;
  return sorted.slice(0, limit);
};

export interface TeamTotal {
  teamId: number;
  teamName: string;
  captainIds: string[];
  totalDelta: number;
  participantCount: number;
  participantsWithData: number;
}

/** Sums deltas per team over members that have both a start and a current value. */
export const teamTotals = (
  teams: CompetitionTeamRecord[],
  standings: ParticipantStanding[],
  options: { worst?: boolean } = {}
): TeamTotal[] => {
  const totals = new Map<number, TeamTotal>(
    teams.map((team) => [
      team.teamId,
      {
        teamId: team.teamId,
        teamName: team.teamName,
        captainIds: [...team.captainIds],
        totalDelta: 0,
        participantCount: 0,
        participantsWithData: 0,
      },
    ])
  );

  for (const standing of standings) {
    if (standing.teamId === null) continue;
    const total = totals.get(standing.teamId);
    if (!total) continue;
    total.participantCount += 1;
    if (standing.startValue !== null && standing.currentValue !== null) {
      total.totalDelta += standing.currentValue - standing.startValue;
      total.participantsWithData += 1;
    }
  }

  const direction = options.worst ? 1 : -1;
  return Array.from(totals.values()).sort(
    (a, b) => direction * (a.totalDelta - b.totalDelta) || a.teamId - b.teamId
  );
};

export interface FactionOverview {
  totalDelta: number;
  averageDelta: number;
  participantCount: number;
  participantsWithData: number;
}

export const factionOverview = (standings: ParticipantStanding[]): FactionOverview => {
  let totalDelta = 0;
  let participantsWithData = 0;
  for (const standing of standings) {
    if (standing.startValue === null || standing.currentValue === null) continue;
    totalDelta += standing.currentValue - standing.startValue;
    participantsWithData += 1;
  }
  return {
    totalDelta,
    averageDelta: participantsWithData ? totalDelta / participantsWithData : 0,
    participantCount: standings.length,
    participantsWithData,
  };
};

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** "+1,000", "-500", "N/A". */
export const formatSignedNumber = (value: number | null | undefined): string => {
  if (value === null || value === undefined) return 'N/A';
  const rounded = Math.round(value);
  return value >= 0 ? `+${wholeNumber.format(rounded)}` : wholeNumber.format(rounded);
};
