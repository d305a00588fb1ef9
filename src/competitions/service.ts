import type { ApiClient } from '../api/client.js';
import { maskSecret, type CredentialRegistry, type ResolvedCredential } from '../credentials/registry.js';
import {
  buildStanding,
  factionOverview,
  rankParticipants,
  teamTotals,
  type FactionOverview,
  type ParticipantStanding,
  type RankingOptions,
  type TeamTotal,
} from '../aggregation/competitions.js';
import { describeError, type Logger } from '../logging.js';
import { EntityRecorder, factionSnapshotFromProfile } from '../sync/entity-recorder.js';
import { FACTION_SCOPE } from '../sync/orchestrator.js';
import {
  CompetitionLookupError,
  InvalidArgumentError,
  PermissionDeniedError,
  type CompetitionCreateResult,
  type CompetitionParticipantRecord,
  type CompetitionRecord,
  type CompetitionStatus,
  type CompetitionTeamRecord,
  type TrackerStore,
} from '../store/types.js';
import { getStatCatalog, isContributorStat, type StatCatalog } from './stats.js';

export const MIN_TEAMS = 2;
export const MAX_TEAMS = 20;
export const DEFAULT_TEAMS = 4;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Parses `YYYY-MM-DD` as a UTC calendar day; rejects impossible dates such as 2025-02-30. */
export const parseCalendarDay = (value: string): Date => {
  const match = DATE_PATTERN.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError('Invalid date format. Use YYYY-MM-DD', 'invalid_date');
  }
  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (date.toISOString().slice(0, 10) !== value.trim()) {
    throw new InvalidArgumentError(`Invalid date: ${value}`, 'invalid_date');
  }
  return date;
};

const startOfUtcDay = (date: Date) => new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate()));

const endOfUtcDay = (day: Date) => new Date(day.getTime() + 86_399_000);

export interface CreateCompetitionInput {
  name: string;
  trackedStat: string;
  startDate: string;
  endDate: string;
  teamCount?: number;
  createdBy?: string | null;
}

export interface AddParticipantsInput {
  competitionId: number;
  factionId?: number;
  playerIds?: number[];
  requester: string;
}

export interface AddParticipantsResult {
  competition: CompetitionRecord;
  factionId: number;
  factionName: string;
  memberCount: number;
  added: CompetitionParticipantRecord[];
  notInFaction: number[];
  failed: Array<{ playerId: number; error: string }>;
}

export interface CompetitionDetail {
  competition: CompetitionRecord;
  teams: CompetitionTeamRecord[];
  participants: CompetitionParticipantRecord[];
}

export interface CompetitionStatusReport {
  competition: CompetitionRecord;
  participantCount: number;
  rankings: ParticipantStanding[];
}

export interface TeamStatusReport {
  competition: CompetitionRecord;
  teams: TeamTotal[];
}

export interface Viewer {
  id: string;
  isAdmin: boolean;
}

export interface CompetitionServiceDeps {
  store: TrackerStore;
  client: ApiClient;
  credentials: CredentialRegistry;
  recorder?: EntityRecorder;
}

export interface CompetitionServiceOptions {
  now?: () => Date;
  logger?: Logger;
  random?: () => number;
  stats?: StatCatalog;
}

export class CompetitionService {
  private readonly store: TrackerStore;
  private readonly client: ApiClient;
  private readonly credentials: CredentialRegistry;
  private readonly recorder: EntityRecorder;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly random: () => number;
  private readonly stats?: StatCatalog;

  constructor(deps: CompetitionServiceDeps, options: CompetitionServiceOptions = {}) {
    this.store = deps.store;
    this.client = deps.client;
    this.credentials = deps.credentials;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.random = options.random ?? Math.random;
    this.stats = options.stats;
    this.recorder = deps.recorder ?? new EntityRecorder(deps.store, deps.client, { now: this.now, logger: this.logger });
  }

  async create(input: CreateCompetitionInput): Promise<CompetitionCreateResult> {
    const name = input.name.trim();
    if (!name) {
      throw new InvalidArgumentError('Competition name is required', 'invalid_name');
    }
    const trackedStat = input.trackedStat.trim().toLowerCase();
    const catalog = this.stats ?? getStatCatalog();
    if (!isContributorStat(trackedStat, catalog)) {
      throw new InvalidArgumentError(`Invalid stat. Must be one of: ${catalog.stats.join(', ')}`, 'invalid_stat');
    }

    const startDate = parseCalendarDay(input.startDate);
    const endDate = endOfUtcDay(parseCalendarDay(input.endDate));
    if (startDate.getTime() < startOfUtcDay(this.now()).getTime()) {
      throw new InvalidArgumentError('Start date must be today or in the future.', 'invalid_date');
    }
    if (endDate.getTime() <= startDate.getTime()) {
      throw new InvalidArgumentError('End date must be after start date.', 'invalid_date');
    }

    const teamCount = input.teamCount ?? DEFAULT_TEAMS;
    if (!Number.isInteger(teamCount) || teamCount < MIN_TEAMS || teamCount > MAX_TEAMS) {
      throw new InvalidArgumentError(
        `Number of teams must be between ${MIN_TEAMS} and ${MAX_TEAMS}.`,
        'invalid_team_count'
      );
    }

    const created = await this.store.createCompetition({
      name,
      trackedStat,
      startDate,
      endDate,
      createdBy: input.createdBy ?? null,
      teamNames: Array.from({ length: teamCount }, (_, index) => `Team ${index + 1}`),
    });
    this.logger.log('competition_created', {
      competitionId: created.competition.competitionId,
      trackedStat,
      teams: created.teams.length,
    });
    return created;
  }

  list(status?: CompetitionStatus): Promise<CompetitionRecord[]> {
    return this.store.listCompetitions(status);
  }

  async require(competitionId: number): Promise<CompetitionRecord> {
    const competition = await this.store.getCompetition(competitionId);
    if (!competition) {
      throw new CompetitionLookupError(`Competition with ID ${competitionId} not found.`, { competitionId });
    }
    return competition;
  }

  async get(competitionId: number): Promise<CompetitionDetail> {
    const competition = await this.require(competitionId);
    const [teams, participants] = await Promise.all([
      this.store.listCompetitionTeams(competitionId),
      this.store.listCompetitionParticipants(competitionId),
    ]);
    return { competition, teams, participants };
  }

  async cancel(competitionId: number): Promise<CompetitionRecord> {
    const competition = await this.require(competitionId);
    if (competition.status === 'cancelled') {
      throw new InvalidArgumentError('Competition is already cancelled.', 'already_cancelled');
    }
    await this.store.setCompetitionStatus(competitionId, 'cancelled');
    this.logger.log('competition_cancelled', { competitionId });
    return { ...competition, status: 'cancelled' };
  }

  async setCaptains(competitionId: number, teamId: number, captainIds: string[]): Promise<CompetitionTeamRecord> {
    await this.require(competitionId);
    const captains = captainIds.map((id) => id.trim()).filter(Boolean);
    if (captains.length < 1 || captains.length > 2) {
      throw new InvalidArgumentError('A team takes one or two captains.', 'invalid_captains');
    }
    await this.requireTeam(competitionId, teamId);
    const updated = await this.store.setTeamCaptains(teamId, captains);
    if (!updated) {
      throw new CompetitionLookupError(`Team with ID ${teamId} not found in this competition.`, { competitionId, teamId });
    }
    return updated;
  }

  /**
   * Pulls the faction roster, keeps the requested members that are not yet
   * participants, and deals them round-robin over the teams in random order.
   */
  async addParticipants(input: AddParticipantsInput): Promise<AddParticipantsResult> {
    const competition = await this.require(input.competitionId);
    const teams = await this.store.listCompetitionTeams(input.competitionId);
    if (!teams.length) {
      throw new InvalidArgumentError('No teams found for this competition.', 'no_teams');
    }

    const credential = this.factionCredential(input.requester);
    const factionId = input.factionId ?? (await this.ownerFaction(credential));
    const profile = await this.client.getFactionProfile(credential, factionId);
    const faction = await this.recorder.recordFaction(
      factionSnapshotFromProfile(profile, factionId),
      maskSecret(credential.secret)
    );
    const members = await this.recorder.recordMembers(factionId, profile.members);
    const memberIds = new Set(members.map((member) => member.playerId));

    let selected = members.map((member) => member.playerId);
    const notInFaction: number[] = [];
    if (input.playerIds?.length) {
      selected = input.playerIds.filter((playerId) => memberIds.has(playerId));
      notInFaction.push(...input.playerIds.filter((playerId) => !memberIds.has(playerId)));
      if (!selected.length) {
        throw new InvalidArgumentError(
          `None of the provided player IDs are members of faction ${factionId}.`,
          'not_faction_members'
        );
      }
    }

    const existing = new Set(
      (await this.store.listCompetitionParticipants(input.competitionId)).map((participant) => participant.playerId)
    );
    const fresh = Array.from(new Set(selected)).filter((playerId) => !existing.has(playerId));
    if (!fresh.length) {
      throw new InvalidArgumentError('All selected players are already participants.', 'already_participants');
    }

    const started = this.now().getTime() >= competition.startDate.getTime();
    const added: CompetitionParticipantRecord[] = [];
    const failed: AddParticipantsResult['failed'] = [];
    for (const [index, playerId] of this.shuffle(fresh).entries()) {
      try {
        let record = await this.store.addCompetitionParticipant({
          competitionId: input.competitionId,
          playerId,
          teamId: teams[index % teams.length].teamId,
        });
        if (started) {
          const current = await this.store.getLatestContributorValue(playerId, competition.trackedStat);
          if (current !== null) {
            const recordedAt = this.now();
            await this.store.setParticipantStartValue(input.competitionId, playerId, current, recordedAt);
            record = { ...record, startValue: current, startRecordedAt: recordedAt };
          }
        }
        added.push(record);
      } catch (err) {
        this.logger.warn('competition_participant_add_failed', {
          competitionId: input.competitionId,
          playerId,
          message: describeError(err),
        });
        failed.push({ playerId, error: describeError(err) });
      }
    }

    this.logger.log('competition_participants_added', {
      competitionId: input.competitionId,
      factionId,
      added: added.length,
      failed: failed.length,
    });
    return {
      competition,
      factionId,
      factionName: faction.name,
      memberCount: members.length,
      added,
      notInFaction,
      failed,
    };
  }

  /** `teamId` null removes the participant from any team. */
  async updateAssignment(competitionId: number, playerId: number, teamId: number | null): Promise<void> {
    await this.require(competitionId);
    const participants = await this.store.listCompetitionParticipants(competitionId);
    if (!participants.some((participant) => participant.playerId === playerId)) {
      throw new CompetitionLookupError(`Player ${playerId} is not a participant in this competition.`, {
        competitionId,
        playerId,
      });
    }
    if (teamId !== null) await this.requireTeam(competitionId, teamId);
    await this.store.setParticipantTeam(competitionId, playerId, teamId);
  }

  async standings(competition: CompetitionRecord): Promise<ParticipantStanding[]> {
    const participants = await this.store.listCompetitionParticipants(competition.competitionId);
    const standings: ParticipantStanding[] = [];
    for (const participant of participants) {
      const current = await this.store.getLatestContributorValue(participant.playerId, competition.trackedStat);
      standings.push(buildStanding(participant, current));
    }
    return standings;
  }

  async status(competitionId: number, options: RankingOptions = {}): Promise<CompetitionStatusReport> {
    const competition = await this.require(competitionId);
    const standings = await this.standings(competition);
    return {
      competition,
      participantCount: standings.length,
      rankings: rankParticipants(standings, options),
    };
  }

  /** A single team's totals are visible to administrators and that team's captains only. */
  async teamStatus(
    competitionId: number,
    options: { teamId?: number; worst?: boolean; viewer?: Viewer } = {}
  ): Promise<TeamStatusReport> {
    const competition = await this.require(competitionId);
    let teams = await this.store.listCompetitionTeams(competitionId);
    if (options.teamId !== undefined) {
      teams = teams.filter((team) => team.teamId === options.teamId);
      const [team] = teams;
      if (!team) {
        throw new CompetitionLookupError(`Team with ID ${options.teamId} not found.`, {
          competitionId,
          teamId: options.teamId,
        });
      }
      const viewer = options.viewer;
      if (viewer && !viewer.isAdmin && !team.captainIds.includes(viewer.id)) {
        throw new PermissionDeniedError('You must be an admin or team captain to view individual team status.');
      }
    }
    const standings = await this.standings(competition);
    return { competition, teams: teamTotals(teams, standings, { worst: options.worst }) };
  }

  async factionOverview(
    competitionId: number,
    factionId?: number
  ): Promise<{ competition: CompetitionRecord; overview: FactionOverview }> {
    const competition = await this.require(competitionId);
    const standings = (await this.standings(competition)).filter(
      (standing) => factionId === undefined || standing.factionId === factionId
    );
    return { competition, overview: factionOverview(standings) };
  }

  private async requireTeam(competitionId: number, teamId: number): Promise<CompetitionTeamRecord> {
    const team = (await this.store.listCompetitionTeams(competitionId)).find((entry) => entry.teamId === teamId);
    if (!team) {
      throw new CompetitionLookupError(`Team with ID ${teamId} not found in this competition.`, {
        competitionId,
        teamId,
      });
    }
    return team;
  }

  private factionCredential(requester: string): ResolvedCredential {
    const credential = this.credentials.selectAny(FACTION_SCOPE, requester);
    if (!credential) {
      throw new InvalidArgumentError(
        'No API key found with faction permission. Register a key with faction access first.',
        'no_credential'
      );
    }
    return credential;
  }

  private async ownerFaction(credential: ResolvedCredential): Promise<number> {
    const profile = await this.client.getUserProfile(credential);
    const factionId = profile.faction?.faction_id;
    if (!factionId) {
      throw new InvalidArgumentError('Key owner is not in a faction. Specify a faction id.', 'no_faction');
    }
    return factionId;
  }

  private shuffle<T>(values: T[]): T[] {
    const shuffled = [...values];
    for (let i = shuffled.length - 1; i > 0; i -= 1) {
      const j = Math.floor(this.random() * (i + 1));
      [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
    }
    return shuffled;
  }
}
