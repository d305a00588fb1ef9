import { previousMonth } from '../aggregation/periods.js';
import type { AggregationEngine } from '../aggregation/summarizer.js';
import type { ApiClient } from '../api/client.js';
import type { CrimesPage } from '../api/schemas.js';
import { maskSecret, type Affiliations, type CredentialRegistry, type ResolvedCredential } from '../credentials/registry.js';
import { describeError, type Logger } from '../logging.js';
import type { HistoryTable, TrackedFactionRecord, TrackerStore } from '../store/types.js';
import type { NormalizedCrime } from './crime-normalizer.js';
import { attemptWithBackoff, failureReason, type AttemptOutcome } from './failure-policy.js';
import { frequentLeaverNotification, missingItemMessage, type Notifier } from './notifications.js';
import { CrimeReconciler } from './reconciler.js';
import { isAbortError, sleep as defaultSleep, type Sleeper } from './sleep.js';

export const FACTION_SCOPE = 'faction';
const PAGE_SIZE = 100;
const MAX_PAGES = 500;
const DAY_MS = 86_400_000;

export type FactionSyncStatus = 'synced' | 'failed' | 'aborted';

export interface FactionSyncOutcome {
  factionId: number;
  guildId: string;
  status: FactionSyncStatus;
  reason?: string;
  credentialAlias?: string;
  keysTried: number;
  crimesFetched: number;
  crimesUpdated: number;
  eventsRecorded: number;
  skipped: number;
  remindersSent: number;
}

export interface CrimeSyncReport {
  startedAt: Date;
  finishedAt: Date;
  factionsSynced: number;
  factionsFailed: Array<{ factionId: number; guildId: string; reason: string; keysTried: number }>;
  crimesUpdated: number;
  eventsRecorded: number;
  remindersSent: number;
  leaverNotifications: number;
  aborted: boolean;
  outcomes: FactionSyncOutcome[];
  /** Present when a clean pass rolled up last month and pruned history. */
  maintenance?: HistoryMaintenanceReport;
  message: string;
}

export interface HistoryMaintenanceReport {
  period: { year: number; month: number };
  playerSummaries: number;
  factionSummaries: number;
  pruned: Record<HistoryTable, number>;
}

export interface CrimeSyncDeps {
  store: TrackerStore;
  client: ApiClient;
  credentials: CredentialRegistry;
  notifier: Notifier;
  reconciler?: CrimeReconciler;
  /** Summarizes the previous month and prunes old history after a pass with no failures. */
  aggregation?: AggregationEngine;
}

export interface CrimeSyncOptions {
  pageDelayMs?: number;
  rateLimitBackoffMs?: number;
  sleep?: Sleeper;
  now?: () => Date;
  logger?: Logger;
}

/** Offset of the next page, read from the `next` link when it carries one. */
export const nextOffset = (link: string, current: number): number => {
  const match = /[?&]offset=(\d+)/.exec(link);
  const parsed = match ? Number.parseInt(match[1], 10) : Number.NaN;
  return Number.isFinite(parsed) && parsed > current ? parsed : current + PAGE_SIZE;
};

export const syncReportMessage = (report: {
  factionsSynced: number;
  crimesUpdated: number;
  eventsRecorded: number;
  failed: number;
}) => {
  const parts = [
    `Synced ${report.factionsSynced} faction(s)`,
    `Updated ${report.crimesUpdated} crime(s)`,
    `Recorded ${report.eventsRecorded} event(s)`,
  ];
  if (report.failed > 0) parts.push(`Failed to sync ${report.failed} faction(s)`);
  return parts.join(' ');
};

class SyncAborted extends Error {
  constructor() {
    super('Sync aborted');
    this.name = 'SyncAborted';
  }
}

export class CrimeSyncOrchestrator {
  private readonly store: TrackerStore;
  private readonly client: ApiClient;
  private readonly credentials: CredentialRegistry;
  private readonly notifier: Notifier;
  private readonly reconciler: CrimeReconciler;
  private readonly aggregation?: AggregationEngine;
  private readonly pageDelayMs: number;
  private readonly rateLimitBackoffMs: number;
  private readonly sleep: Sleeper;
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(deps: CrimeSyncDeps, options: CrimeSyncOptions = {}) {
    this.store = deps.store;
    this.client = deps.client;
    this.credentials = deps.credentials;
    this.notifier = deps.notifier;
    this.aggregation = deps.aggregation;
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.reconciler = deps.reconciler ?? new CrimeReconciler(deps.store, { now: this.now, logger: this.logger });
    this.pageDelayMs = options.pageDelayMs ?? 1_100;
    this.rateLimitBackoffMs = options.rateLimitBackoffMs ?? 60_000;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async runOnce(options: { signal?: AbortSignal; factionIds?: number[] } = {}): Promise<CrimeSyncReport> {
    const startedAt = this.now();
    const configs = (await this.store.listTrackedFactions({ enabledOnly: true })).filter(
      (config) => !options.factionIds || options.factionIds.includes(config.factionId)
    );

    const outcomes: FactionSyncOutcome[] = [];
    let aborted = false;

    if (configs.length) {
      const affiliations = await this.credentials.buildAffiliations(FACTION_SCOPE);
      for (const config of configs) {
        if (options.signal?.aborted) {
          aborted = true;
          break;
        }
        const outcome = await this.syncFaction(config, affiliations, options.signal);
        outcomes.push(outcome);
        if (outcome.status === 'aborted') {
          aborted = true;
          break;
        }
      }
    }

    const leaverNotifications = aborted ? 0 : await this.notifyFrequentLeavers(configs);
    const failed = outcomes
      .filter((outcome) => outcome.status === 'failed')
      .map((outcome) => ({
        factionId: outcome.factionId,
        guildId: outcome.guildId,
        reason: outcome.reason ?? 'Unknown error',
        keysTried: outcome.keysTried,
      }));

    const totals = {
      factionsSynced: outcomes.filter((outcome) => outcome.status === 'synced').length,
      crimesUpdated: outcomes.reduce((sum, outcome) => sum + outcome.crimesUpdated, 0),
      eventsRecorded: outcomes.reduce((sum, outcome) => sum + outcome.eventsRecorded, 0),
      remindersSent: outcomes.reduce((sum, outcome) => sum + outcome.remindersSent, 0),
    };

    const maintenance = !aborted && configs.length && !failed.length ? await this.maintainHistory() : undefined;

    const message = configs.length
      ? syncReportMessage({ ...totals, failed: failed.length })
      : 'No factions with organized crime tracking enabled';

    const report: CrimeSyncReport = {
      startedAt,
      finishedAt: this.now(),
      ...totals,
      factionsFailed: failed,
      leaverNotifications,
      aborted,
      outcomes,
      ...(maintenance ? { maintenance } : {}),
      message,
    };
    this.logger.log('crime_sync_finished', {
      factionsSynced: report.factionsSynced,
      factionsFailed: failed.length,
      crimesUpdated: report.crimesUpdated,
      eventsRecorded: report.eventsRecorded,
      aborted,
    });
    return report;
  }

  private async maintainHistory(): Promise<HistoryMaintenanceReport | undefined> {
    if (!this.aggregation) return undefined;
    const period = previousMonth(this.now());
    try {
      // Without force an already summarized month is left alone.
      const summary = await this.aggregation.summarizeMonth(period.year, period.month);
      const pruned = await this.aggregation.pruneAll();
      return {
        period,
        playerSummaries: summary.playerSummaries,
        factionSummaries: summary.factionSummaries,
        pruned,
      };
    } catch (err) {
      this.logger.error('history_maintenance_failed', { ...period, error: describeError(err) });
      return undefined;
    }
  }

  async syncFaction(
    config: TrackedFactionRecord,
    affiliations: Affiliations,
    signal?: AbortSignal
  ): Promise<FactionSyncOutcome> {
    // Captured before fetching so activity during the pass is picked up next time.
    const passStart = this.now();
    const outcome: FactionSyncOutcome = {
      factionId: config.factionId,
      guildId: config.guildId,
      status: 'failed',
      keysTried: 0,
      crimesFetched: 0,
      crimesUpdated: 0,
      eventsRecorded: 0,
      skipped: 0,
      remindersSent: 0,
    };

    const candidates = this.credentials.rankForFaction(FACTION_SCOPE, config.factionId, affiliations);
    if (!candidates.length) {
      outcome.reason = `No API key with ${FACTION_SCOPE} permission available for faction ${config.factionId}`;
      this.logger.error('faction_sync_failed', { factionId: config.factionId, reason: outcome.reason });
      return outcome;
    }

    const from = config.lastSync ? Math.floor(config.lastSync.getTime() / 1000) : undefined;

    try {
      for (const credential of candidates) {
        outcome.keysTried += 1;
        const fetched = await this.fetchAllPages(config.factionId, credential, from, signal);
        if (fetched.kind === 'failed') {
          outcome.reason = failureReason(credential.alias, fetched.error);
          this.logger.warn('faction_sync_rotating_key', {
            factionId: config.factionId,
            alias: credential.alias,
            reason: outcome.reason,
          });
          continue;
        }

        const tag = maskSecret(credential.secret);
        const result = await this.reconciler.reconcileBatch(config.factionId, fetched.value, tag);
        outcome.crimesFetched = fetched.value.length;
        outcome.crimesUpdated = result.crimesUpdated;
        outcome.eventsRecorded = result.eventsRecorded;
        outcome.skipped = result.skipped;
        outcome.remindersSent = await this.sendMissingItemReminders(config, result.crimes, credential, signal);

        await this.store.advanceTrackedFactionWatermark(config.factionId, config.guildId, passStart);
        outcome.status = 'synced';
        outcome.credentialAlias = credential.alias;
        delete outcome.reason;
        this.logger.log('faction_sync_succeeded', {
          factionId: config.factionId,
          alias: credential.alias,
          crimesFetched: outcome.crimesFetched,
          crimesUpdated: outcome.crimesUpdated,
          eventsRecorded: outcome.eventsRecorded,
        });
        return outcome;
      }
    } catch (err) {
      if (isAbortError(err) || err instanceof SyncAborted) {
        outcome.status = 'aborted';
        outcome.reason = 'Sync aborted before completion';
        this.logger.warn('faction_sync_aborted', { factionId: config.factionId });
        return outcome;
      }
      outcome.reason = `Unexpected error: ${describeError(err)}`;
      this.logger.error('faction_sync_failed', { factionId: config.factionId, reason: outcome.reason });
      return outcome;
    }

    this.logger.error('faction_sync_failed', {
      factionId: config.factionId,
      keysTried: outcome.keysTried,
      reason: outcome.reason,
    });
    return outcome;
  }

  private async fetchAllPages(
    factionId: number,
    credential: ResolvedCredential,
    from: number | undefined,
    signal?: AbortSignal
  ): Promise<AttemptOutcome<unknown[]>> {
    const crimes: unknown[] = [];
    let offset = 0;

    for (let page = 0; page < MAX_PAGES; page += 1) {
      if (signal?.aborted) throw new SyncAborted();
      if (page > 0) await this.sleep(this.pageDelayMs, signal);

      const outcome: AttemptOutcome<CrimesPage> = await attemptWithBackoff(
        () => this.client.getFactionCrimes(credential, factionId, { offset, from, sort: 'DESC' }),
        {
          sleep: this.sleep,
          backoffMs: this.rateLimitBackoffMs,
          signal,
          onBackoff: () =>
            this.logger.warn('crime_page_rate_limited', {
              factionId,
              alias: credential.alias,
              backoffMs: this.rateLimitBackoffMs,
            }),
        }
      );
      if (outcome.kind === 'failed') return outcome;

      crimes.push(...outcome.value.crimes);
      const next = outcome.value._metadata?.links?.next;
      if (!next || outcome.value.crimes.length === 0) {
        return { kind: 'ok', value: crimes };
      }
      offset = nextOffset(next, offset);
    }

    this.logger.warn('crime_pagination_truncated', { factionId, pages: MAX_PAGES });
    return { kind: 'ok', value: crimes };
  }

  /**
   * Level-triggered: every pass re-sends a reminder for each filled slot whose
   * required item is still unavailable.
   */
  async sendMissingItemReminders(
    config: TrackedFactionRecord,
    crimes: NormalizedCrime[],
    credential: ResolvedCredential,
    signal?: AbortSignal
  ): Promise<number> {
    const channelId = config.missingItemChannelId;
    if (!channelId) return 0;

    let sent = 0;
    for (const crime of crimes) {
      if (crime.status !== 'planning' && crime.status !== 'ready') continue;
      for (const slot of crime.slots) {
        if (!slot.itemRequirement || slot.itemRequirement.available || slot.userId === null) continue;
        if (signal?.aborted) throw new SyncAborted();
        try {
          const discordId = await this.resolveDiscordId(slot.userId, credential);
          if (!discordId) continue;
          const itemName = await this.resolveItemName(slot.itemRequirement.itemId, credential);
          await this.notifier.send({
            channelId,
            content: missingItemMessage({
              discordId,
              itemName,
              position: slot.position,
              crimeName: crime.name,
              crimeId: crime.crimeId,
            }),
          });
          sent += 1;
        } catch (err) {
          this.logger.warn('missing_item_reminder_failed', {
            factionId: config.factionId,
            crimeId: crime.crimeId,
            playerId: slot.userId,
            message: describeError(err),
          });
        }
      }
    }
    return sent;
  }

  private async resolveItemName(itemId: number, credential: ResolvedCredential): Promise<string> {
    const cached = await this.store.getItem(itemId);
    if (cached) return cached.name;
    try {
      const item = await this.client.getItem(credential, itemId);
      if (item) {
        const stored = await this.store.upsertItem({
          itemId,
          name: item.name,
          itemType: item.type ?? null,
          description: item.description ?? null,
        });
        return stored.name;
      }
    } catch (err) {
      this.logger.warn('item_lookup_failed', { itemId, message: describeError(err) });
    }
    return `Item ${itemId}`;
  }

  private async resolveDiscordId(playerId: number, credential: ResolvedCredential): Promise<string | null> {
    const player = await this.store.getPlayer(playerId);
    if (player?.discordId) return player.discordId;
    try {
      const discordId = await this.client.getUserDiscordId(credential, playerId);
      if (discordId) await this.store.setPlayerDiscordId(playerId, discordId);
      return discordId;
    } catch (err) {
      this.logger.warn('discord_lookup_failed', { playerId, message: describeError(err) });
      return null;
    }
  }

  /** One notification per player above the threshold, on every run. */
  async notifyFrequentLeavers(configs: TrackedFactionRecord[]): Promise<number> {
    let sent = 0;
    for (const config of configs) {
      const channelId = config.notificationChannelId;
      if (!channelId || !config.leadIds.length) continue;
      try {
        const since = new Date(this.now().getTime() - config.trackingWindowDays * DAY_MS);
        const leavers = await this.store.listFrequentLeavers(config.factionId, config.frequentLeaverThreshold, since);
        for (const leaver of leavers) {
          const recent = await this.store.listCrimeEvents({
            factionId: config.factionId,
            playerId: leaver.playerId,
            eventTypes: ['participant_left'],
            since,
            limit: 5,
          });
          await this.notifier.send(
            frequentLeaverNotification({
              channelId,
              factionId: config.factionId,
              playerId: leaver.playerId,
              leaveCount: leaver.leaveCount,
              threshold: config.frequentLeaverThreshold,
              windowDays: config.trackingWindowDays,
              leadIds: config.leadIds,
              recentLeaves: recent.map((event) => ({ crimeId: event.crimeId, occurredAt: event.occurredAt })),
            })
          );
          sent += 1;
        }
      } catch (err) {
        this.logger.error('frequent_leaver_check_failed', { factionId: config.factionId, message: describeError(err) });
      }
    }
    return sent;
  }
}
