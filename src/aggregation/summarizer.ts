import type { Logger } from '../logging.js';
import {
  HISTORY_TABLES,
  InvalidArgumentError,
  SERIES_ATTRIBUTES,
  type AttributeChange,
  type HealthMetrics,
  type HistorySeries,
  type HistoryTable,
  type PeriodEndpoints,
  type PeriodKey,
  type PeriodSummaryInput,
  type TrackerStore,
} from '../store/types.js';
import { daysAgo, monthlyPeriod, periodWindowEnd } from './periods.js';

/** First-versus-last deltas; attributes missing at either end count as 0. */
export const summarizeEndpoints = (series: HistorySeries, endpoints: PeriodEndpoints[]): PeriodSummaryInput[] =>
  endpoints.map((entry) => {
    const attributes: Record<string, AttributeChange> = {};
    for (const attribute of SERIES_ATTRIBUTES[series]) {
      const start = entry.first.values[attribute] ?? 0;
      const end = entry.last.values[attribute] ?? 0;
      attributes[attribute] = { start, end, change: end - start };
    }
    return { entityId: entry.entityId, attributes, recordCount: entry.recordCount };
  });

export interface MonthSummaryReport {
  period: PeriodKey;
  playerSummaries: number;
  factionSummaries: number;
}

export interface AggregationEngineOptions {
  now?: () => Date;
  logger?: Logger;
  retentionDays?: number;
}

export class AggregationEngine {
  private readonly now: () => Date;
  private readonly logger: Logger;
  readonly retentionDays: number;

  constructor(
    private readonly store: TrackerStore,
    options: AggregationEngineOptions = {}
  ) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? console;
    this.retentionDays = options.retentionDays ?? 60;
  }

  /**
   * Rolls every entity with history inside the period into one summary row.
   * Without `force` the whole call is skipped once any row exists for the period.
   */
  async summarize(series: HistorySeries, period: PeriodKey, options: { force?: boolean } = {}): Promise<number> {
    const force = options.force ?? false;
    if (period.periodEnd.getTime() < period.periodStart.getTime()) {
      throw new InvalidArgumentError('Period end precedes period start');
    }
    if (!force && (await this.store.countPeriodSummaries(series, period)) > 0) {
      this.logger.log('period_summary_exists', { series, periodStart: period.periodStart.toISOString() });
      return 0;
    }

    const endpoints = await this.store.listPeriodEndpoints(
      series,
      period.periodStart,
      periodWindowEnd(period)
    );
    const written = await this.store.writePeriodSummaries(series, period, summarizeEndpoints(series, endpoints), {
      force,
    });
    this.logger.log('period_summarized', {
      series,
      periodType: period.periodType,
      periodStart: period.periodStart.toISOString(),
      periodEnd: period.periodEnd.toISOString(),
      written,
      force,
    });
    return written;
  }

  async summarizeMonth(year: number, month: number, options: { force?: boolean } = {}): Promise<MonthSummaryReport> {
    const period = monthlyPeriod(year, month);
    const playerSummaries = await this.summarize('player_stats', period, options);
    const factionSummaries = await this.summarize('faction', period, options);
    return { period, playerSummaries, factionSummaries };
  }

  async prune(table: HistoryTable, olderThanDays: number): Promise<number> {
    if (!Number.isInteger(olderThanDays) || olderThanDays <= 0) {
      throw new InvalidArgumentError(`Retention must be a positive number of days (got ${olderThanDays})`);
    }
    const cutoff = daysAgo(this.now(), olderThanDays);
    const deleted = await this.store.pruneHistory(table, cutoff);
    this.logger.log('history_pruned', { table, cutoff: cutoff.toISOString(), deleted });
    return deleted;
  }

  async pruneAll(olderThanDays: number = this.retentionDays): Promise<Record<HistoryTable, number>> {
    const counts: Record<HistoryTable, number> = { player_stats: 0, faction: 0, contributors: 0 };
    for (const table of HISTORY_TABLES) {
      counts[table] = await this.prune(table, olderThanDays);
    }
    return counts;
  }

  healthMetrics(): Promise<HealthMetrics> {
    return this.store.getHealthMetrics({
      retentionCutoff: daysAgo(this.now(), this.retentionDays),
      retentionDays: this.retentionDays,
    });
  }
}
