import type { ApiClient } from '../api/client.js';
import { ContributionSchema, type FactionContributors } from '../api/schemas.js';
import { maskSecret, type Affiliations, type CredentialRegistry, type ResolvedCredential } from '../credentials/registry.js';
import type { Logger } from '../logging.js';
import { EntityRecorder } from '../sync/entity-recorder.js';
import { attemptWithBackoff, failureReason } from '../sync/failure-policy.js';
import { FACTION_SCOPE } from '../sync/orchestrator.js';
import { sleep as defaultSleep, type Sleeper } from '../sync/sleep.js';
import type { CompetitionParticipantRecord, CompetitionRecord, TrackerStore } from '../store/types.js';
import { componentStats, getStatCatalog, type StatCatalog } from './stats.js';

/** playerId → contributed value, for the participants of one faction. */
type StatValues = Map<string, Map<number, number>>;

export interface ParticipantFailure {
  competitionId: number;
  playerId: number;
  reason: string;
}

export interface FactionFailure {
  competitionId: number;
  factionId: number;
  reason: string;
  participantCount: number;
  keysTried: number;
}

export interface CompetitionUpdateReport {
  competitionsUpdated: number;
  competitionsCompleted: number;
  participantsUpdated: number;
  factionsProcessed: number;
  factionsFailed: FactionFailure[];
  participantsFailed: ParticipantFailure[];
  message: string;
}

export interface CompetitionStatsUpdaterDeps {
  store: TrackerStore;
  client: ApiClient;
  credentials: CredentialRegistry;
  recorder?: EntityRecorder;
}

export interface CompetitionStatsUpdaterOptions {
  requestDelayMs?: number;
  rateLimitBackoffMs?: number;
  sleep?: Sleeper;
  now?: () => Date;
  logger?: Logger;
  stats?: StatCatalog;
}

/** Contributed values for `stat`, restricted to `playerIds`. */
export const extractContributions = (
  body: FactionContributors,
  stat: string,
  playerIds: Set<number>
): Map<number, number> => {
  const values = new Map<number, number>();
  const byStat = body.contributors?.[stat];
  if (!byStat || typeof byStat !== 'object' || Array.isArray(byStat)) return values;
  for (const [key, entry] of Object.entries(byStat)) {
    const playerId = Number(key);
    if (!Number.isInteger(playerId) || !playerIds.has(playerId)) continue;
    const parsed = ContributionSchema.safeParse(entry);
    if (parsed.success && parsed.data.contributed !== undefined) {
      values.set(playerId, parsed.data.contributed);
    }
  }
  return values;
};

export const updateReportMessage = (report: Omit<CompetitionUpdateReport, 'message'>) => {
  const parts = [
    `Updated stats for ${report.competitionsUpdated} competition(s) and ${report.participantsUpdated} participant(s)`,
  ];
  if (report.competitionsCompleted) parts.push(`Completed ${report.competitionsCompleted} competition(s)`);
  if (report.factionsFailed.length) parts.push(`Failed ${report.factionsFailed.length} faction(s)`);
  if (report.participantsFailed.length) parts.push(`Missing data for ${report.participantsFailed.length} participant(s)`);
  return parts.join('. ');
};

export class CompetitionStatsUpdater {
  private readonly store: TrackerStore;
  private readonly client: ApiClient;
  private readonly credentials: CredentialRegistry;
  private readonly recorder: EntityRecorder;
  private readonly requestDelayMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;
  private readonly logger: Logger;
  private readonly stats?: StatCatalog;

  constructor(deps: CompetitionStatsUpdaterDeps, options: CompetitionStatsUpdaterOptions = {}) {
    this.store = deps.store;
    this.client = deps.client;
    this.credentials = deps.credentials;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.recorder = deps.recorder ?? new EntityRecorder(deps.store, deps.client, { now: this.now, logger: this.logger });
    this.requestDelayMs = options.requestDelayMs ?? 1_100;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? 60_000;
    this.sleep = options.sleep ?? defaultSleep;
    this.stats = options.stats;
  }

  async updateActive(options: { signal?: AbortSignal } = {}): Promise<CompetitionUpdateReport> {
    const report: Omit<CompetitionUpdateReport, 'message'> = {
      competitionsUpdated: 0,
      competitionsCompleted: 0,
      participantsUpdated: 0,
      factionsProcessed: 0,
      factionsFailed: [],
      participantsFailed: [],
    };

    const active = await this.store.listCompetitions('active');
    if (!active.length) {
      return { ...report, message: 'No active competitions found' };
    }

    const now = this.now();
    const running: CompetitionRecord[] = [];
    for (const competition of active) {
      if (now.getTime() > competition.endDate.getTime()) {
        await this.store.setCompetitionStatus(competition.competitionId, 'completed');
        report.competitionsCompleted += 1;
        this.logger.log('competition_completed', { competitionId: competition.competitionId });
      } else if (now.getTime() >= competition.startDate.getTime()) {
        running.push(competition);
      }
    }

    if (running.length && !this.credentials.scoped(FACTION_SCOPE).length) {
      return { ...report, message: 'No API keys with faction permission found' };
    }

    let affiliations: Affiliations | null = null;
    for (const competition of running) {
      if (options.signal?.aborted) break;
      const participants = await this.store.listCompetitionParticipants(competition.competitionId);
      if (!participants.length) continue;
      affiliations ??= await this.credentials.buildAffiliations(FACTION_SCOPE);
      await this.updateCompetition(competition, participants, affiliations, report, options.signal);
      report.competitionsUpdated += 1;
    }

    const message = updateReportMessage(report);
    this.logger.log('competition_stats_updated', {
      competitionsUpdated: report.competitionsUpdated,
      competitionsCompleted: report.competitionsCompleted,
      participantsUpdated: report.participantsUpdated,
      factionsFailed: report.factionsFailed.length,
    });
    return { ...report, message };
  }

  private async updateCompetition(
    competition: CompetitionRecord,
    participants: CompetitionParticipantRecord[],
    affiliations: Affiliations,
    report: Omit<CompetitionUpdateReport, 'message'>,
    signal?: AbortSignal
  ): Promise<void> {
    const byFaction = new Map<number, CompetitionParticipantRecord[]>();
    for (const participant of participants) {
      if (participant.factionId === null) {
        report.participantsFailed.push({
          competitionId: competition.competitionId,
          playerId: participant.playerId,
          reason: 'Player not in any faction or faction not recorded',
        });
        continue;
      }
      const group = byFaction.get(participant.factionId) ?? [];
      group.push(participant);
      byFaction.set(participant.factionId, group);
    }

    const stats = componentStats(competition.trackedStat, this.stats ?? getStatCatalog());
    for (const [factionId, members] of byFaction) {
      const candidates = this.credentials.rankForFaction(FACTION_SCOPE, factionId, affiliations);
      let reason = 'No API key with faction permission available';
      let keysTried = 0;
      let fetched: { credential: ResolvedCredential; values: StatValues } | null = null;

      for (const credential of candidates) {
        keysTried += 1;
        const outcome = await this.fetchStats(factionId, credential, stats, new Set(members.map((m) => m.playerId)), signal);
        if (outcome.kind === 'ok') {
          fetched = { credential, values: outcome.values };
          break;
        }
        reason = outcome.reason;
        this.logger.warn('competition_stats_rotating_key', { factionId, alias: credential.alias, reason });
      }

      if (!fetched) {
        report.factionsFailed.push({
          competitionId: competition.competitionId,
          factionId,
          reason,
          participantCount: members.length,
          keysTried,
        });
        for (const member of members) {
          report.participantsFailed.push({
            competitionId: competition.competitionId,
            playerId: member.playerId,
            reason: `Faction ${factionId} failed: ${reason}`,
          });
        }
        this.logger.error('competition_faction_failed', { competitionId: competition.competitionId, factionId, reason });
        continue;
      }

      report.factionsProcessed += 1;
      await this.recordValues(competition, factionId, members, stats, fetched, report);
    }
  }

  private async fetchStats(
    factionId: number,
    credential: ResolvedCredential,
    stats: string[],
    playerIds: Set<number>,
    signal?: AbortSignal
  ): Promise<{ kind: 'ok'; values: StatValues } | { kind: 'failed'; reason: string }> {
    const values: StatValues = new Map();
    for (const [index, stat] of stats.entries()) {
      if (index > 0) await this.sleep(this.requestDelayMs, signal);
      const outcome = await attemptWithBackoff(
        () => this.client.getFactionContributors(credential, factionId, stat, { includeMembers: index === 0 }),
        {
          sleep: this.sleep,
          backoffMs: this.rateLimitBackoffMs,
          signal,
          onBackoff: () =>
            this.logger.warn('contributors_rate_limited', { factionId, alias: credential.alias, stat }),
        }
      );
      if (outcome.kind === 'failed') {
        return { kind: 'failed', reason: failureReason(credential.alias, outcome.error) };
      }
      if (index === 0) await this.recorder.recordMembers(factionId, outcome.value.members);
      values.set(stat, extractContributions(outcome.value, stat, playerIds));
    }
    return { kind: 'ok', values };
  }

  /**
   * Appends one history row per fetched stat; a derived stat is written only
   * when every component is present. Missing start values are captured here.
   */
  private async recordValues(
    competition: CompetitionRecord,
    factionId: number,
    members: CompetitionParticipantRecord[],
    stats: string[],
    fetched: { credential: ResolvedCredential; values: StatValues },
    report: Omit<CompetitionUpdateReport, 'message'>
  ): Promise<void> {
    const dataSource = maskSecret(fetched.credential.secret);
    const timestamp = this.now();
    const derived = stats.length > 1 || stats[0] !== competition.trackedStat;

    for (const member of members) {
      let total: number | null = 0;
      for (const stat of stats) {
        const value = fetched.values.get(stat)?.get(member.playerId);
        if (value === undefined) {
          total = null;
          continue;
        }
        if (total !== null) total += value;
        if (derived) {
          await this.store.appendContributorStat({
            playerId: member.playerId,
            statName: stat,
            value,
            factionId,
            dataSource,
            timestamp,
          });
        }
      }

      if (total === null) {
        report.participantsFailed.push({
          competitionId: competition.competitionId,
          playerId: member.playerId,
          reason: `No contributor value found for stat '${competition.trackedStat}' in faction ${factionId}`,
        });
        continue;
      }

      await this.store.appendContributorStat({
        playerId: member.playerId,
        statName: competition.trackedStat,
        value: total,
        factionId,
        dataSource,
        timestamp,
      });
      if (member.startValue === null) {
        await this.store.setParticipantStartValue(competition.competitionId, member.playerId, total, timestamp);
      }
      report.participantsUpdated += 1;
    }
  }
}
