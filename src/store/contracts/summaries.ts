export const SERIES_ATTRIBUTES = {
  player_stats: [
    'strength',
    'defense',
    'speed',
    'dexterity',
    'totalStats',
    'level',
    'lifeMaximum',
    'networth',
  ],
  faction: ['respect', 'memberCount', 'bestChain'],
} as const;

export type HistorySeries = keyof typeof SERIES_ATTRIBUTES;
export type SeriesAttribute<S extends HistorySeries = HistorySeries> = (typeof SERIES_ATTRIBUTES)[S][number];

export const HISTORY_TABLES = ['player_stats', 'faction', 'contributors'] as const;
export type HistoryTable = (typeof HISTORY_TABLES)[number];

export type PeriodType = 'monthly' | 'weekly' | 'custom';

export interface PeriodKey {
  periodStart: Date;
  periodEnd: Date;
  periodType: PeriodType;
}

export interface HistorySample {
  entityId: number;
  timestamp: Date;
  values: Record<string, number | null>;
}

export interface PeriodEndpoints {
  entityId: number;
  first: HistorySample;
  last: HistorySample;
  recordCount: number;
}

export interface AttributeChange {
  start: number;
  end: number;
  change: number;
}

export interface PeriodSummaryInput {
  entityId: number;
  attributes: Record<string, AttributeChange>;
  recordCount: number;
}

export interface PeriodSummaryRecord extends PeriodSummaryInput, PeriodKey {
  series: HistorySeries;
  createdAt: Date;
}

export interface TableHealth {
  table: string;
  rowCount: number;
  oldest: Date | null;
  newest: Date | null;
  olderThanRetention: number | null;
}

export interface HealthMetrics {
  schemaVersion: number | null;
  retentionDays: number;
  tables: TableHealth[];
}
