import {
  pgTable,
  text,
  timestamp,
  integer,
  bigint,
  jsonb,
  doublePrecision,
  primaryKey,
  serial,
  boolean,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';

export const schemaVersion = pgTable('schema_version', {
  version: integer('version').primaryKey(),
  description: text('description').notNull(),
  appliedAt: timestamp('applied_at', { withTimezone: true }).defaultNow().notNull(),
});

export const factions = pgTable('factions', {
  factionId: integer('faction_id').primaryKey(),
  name: text('name').notNull(),
  tag: text('tag'),
  leaderId: integer('leader_id'),
  coLeaderId: integer('co_leader_id'),
  respect: bigint('respect', { mode: 'number' }),
  age: integer('age'),
  bestChain: integer('best_chain'),
  memberCount: integer('member_count'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  lastUpdated: timestamp('last_updated', { withTimezone: true }).defaultNow().notNull(),
});

export const players = pgTable(
  'players',
  {
    playerId: integer('player_id').primaryKey(),
    name: text('name').notNull(),
    level: integer('level'),
    rank: text('rank'),
    factionId: integer('faction_id'),
    statusState: text('status_state'),
    statusDescription: text('status_description'),
    lifeCurrent: integer('life_current'),
    lifeMaximum: integer('life_maximum'),
    discordId: text('discord_id'),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    lastUpdated: timestamp('last_updated', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    factionIdx: index('players_faction_idx').on(table.factionId),
  })
);

export const playerStatsHistory = pgTable(
  'player_stats_history',
  {
    id: serial('id').primaryKey(),
    playerId: integer('player_id').notNull(),
    strength: doublePrecision('strength'),
    defense: doublePrecision('defense'),
    speed: doublePrecision('speed'),
    dexterity: doublePrecision('dexterity'),
    totalStats: doublePrecision('total_stats'),
    level: integer('level'),
    lifeMaximum: integer('life_maximum'),
    networth: doublePrecision('networth'),
    dataSource: text('data_source'),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  },
  (table) => ({
    playerTimeIdx: index('player_stats_history_player_time_idx').on(table.playerId, table.timestamp),
  })
);

export const factionHistory = pgTable(
  'faction_history',
  {
    id: serial('id').primaryKey(),
    factionId: integer('faction_id').notNull(),
    respect: bigint('respect', { mode: 'number' }),
    memberCount: integer('member_count'),
    bestChain: integer('best_chain'),
    dataSource: text('data_source'),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  },
  (table) => ({
    factionTimeIdx: index('faction_history_faction_time_idx').on(table.factionId, table.timestamp),
  })
);

export const playerContributorHistory = pgTable(
  'player_contributor_history',
  {
    id: serial('id').primaryKey(),
    playerId: integer('player_id').notNull(),
    statName: text('stat_name').notNull(),
    value: doublePrecision('value').notNull(),
    factionId: integer('faction_id'),
    dataSource: text('data_source'),
    timestamp: timestamp('timestamp', { withTimezone: true }).notNull(),
  },
  (table) => ({
    playerStatIdx: index('player_contributor_history_player_stat_idx').on(
      table.playerId,
      table.statName,
      table.timestamp
    ),
  })
);

export const items = pgTable('items', {
  itemId: integer('item_id').primaryKey(),
  name: text('name').notNull(),
  itemType: text('item_type'),
  description: text('description'),
  lastUpdated: timestamp('last_updated', { withTimezone: true }).defaultNow().notNull(),
});

export const organizedCrimesCurrent = pgTable(
  'organized_crimes_current',
  {
    factionId: integer('faction_id').notNull(),
    crimeId: integer('crime_id').notNull(),
    crimeName: text('crime_name').notNull(),
    crimeType: text('crime_type'),
    participants: jsonb('participants').notNull().default(sql`'[]'::jsonb`),
    participantCount: integer('participant_count').notNull().default(0),
    requiredParticipants: integer('required_participants').notNull().default(0),
    status: text('status').notNull(),
    timeStarted: timestamp('time_started', { withTimezone: true }),
    timeCompleted: timestamp('time_completed', { withTimezone: true }),
    readyAt: timestamp('ready_at', { withTimezone: true }),
    rewardMoney: bigint('reward_money', { mode: 'number' }),
    rewardRespect: doublePrecision('reward_respect'),
    rewardOther: jsonb('reward_other'),
    dataSource: text('data_source'),
    lastUpdated: timestamp('last_updated', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.factionId, table.crimeId] }),
  })
);

export const organizedCrimeHistory = pgTable(
  'organized_crime_history',
  {
    id: serial('id').primaryKey(),
    factionId: integer('faction_id').notNull(),
    crimeId: integer('crime_id').notNull(),
    crimeName: text('crime_name'),
    eventType: text('event_type').notNull(),
    playerId: integer('player_id'),
    oldStatus: text('old_status'),
    newStatus: text('new_status'),
    oldParticipants: jsonb('old_participants'),
    newParticipants: jsonb('new_participants'),
    rewardMoney: bigint('reward_money', { mode: 'number' }),
    rewardRespect: doublePrecision('reward_respect'),
    rewardOther: jsonb('reward_other'),
    dataSource: text('data_source'),
    eventTimestamp: timestamp('event_timestamp', { withTimezone: true }).notNull(),
    recordedAt: timestamp('recorded_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    crimeIdx: index('organized_crime_history_crime_idx').on(table.factionId, table.crimeId),
    playerIdx: index('organized_crime_history_player_idx').on(table.factionId, table.playerId, table.eventType),
  })
);

export const participantCrimeStats = pgTable(
  'participant_crime_stats',
  {
    factionId: integer('faction_id').notNull(),
    playerId: integer('player_id').notNull(),
    crimeType: text('crime_type').notNull().default(''),
    crimesCompleted: integer('crimes_completed').notNull().default(0),
    crimesFailed: integer('crimes_failed').notNull().default(0),
    totalRewardMoney: doublePrecision('total_reward_money').notNull().default(0),
    totalRewardRespect: doublePrecision('total_reward_respect').notNull().default(0),
    lastCrimeAt: timestamp('last_crime_at', { withTimezone: true }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.factionId, table.playerId, table.crimeType] }),
  })
);

export const trackedFactions = pgTable(
  'tracked_factions',
  {
    factionId: integer('faction_id').notNull(),
    guildId: text('guild_id').notNull(),
    enabled: boolean('enabled').notNull().default(true),
    lastSync: timestamp('last_sync', { withTimezone: true }),
    notificationChannelId: text('notification_channel_id'),
    missingItemChannelId: text('missing_item_channel_id'),
    leadIds: jsonb('lead_ids').notNull().default(sql`'[]'::jsonb`),
    frequentLeaverThreshold: integer('frequent_leaver_threshold').notNull().default(2),
    trackingWindowDays: integer('tracking_window_days').notNull().default(30),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.factionId, table.guildId] }),
  })
);

export const periodSummaries = pgTable(
  'period_summaries',
  {
    id: serial('id').primaryKey(),
    series: text('series').notNull(),
    entityId: integer('entity_id').notNull(),
    periodStart: timestamp('period_start', { withTimezone: true }).notNull(),
    periodEnd: timestamp('period_end', { withTimezone: true }).notNull(),
    periodType: text('period_type').notNull(),
    attributes: jsonb('attributes').notNull(),
    recordCount: integer('record_count').notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    periodKey: uniqueIndex('period_summaries_key_idx').on(
      table.series,
      table.entityId,
      table.periodStart,
      table.periodEnd,
      table.periodType
    ),
  })
);

export const competitions = pgTable('competitions', {
  competitionId: serial('competition_id').primaryKey(),
  name: text('name').notNull(),
  trackedStat: text('tracked_stat').notNull(),
  startDate: timestamp('start_date', { withTimezone: true }).notNull(),
  endDate: timestamp('end_date', { withTimezone: true }).notNull(),
  status: text('status').notNull().default('active'),
  createdBy: text('created_by'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export const competitionTeams = pgTable('competition_teams', {
  teamId: serial('team_id').primaryKey(),
  competitionId: integer('competition_id')
    .references(() => competitions.competitionId, { onDelete: 'cascade' })
    .notNull(),
  teamName: text('team_name').notNull(),
  captainIds: jsonb('captain_ids').notNull().default(sql`'[]'::jsonb`),
});

export const competitionParticipants = pgTable(
  'competition_participants',
  {
    competitionId: integer('competition_id')
      .references(() => competitions.competitionId, { onDelete: 'cascade' })
      .notNull(),
    playerId: integer('player_id').notNull(),
    teamId: integer('team_id').references(() => competitionTeams.teamId, { onDelete: 'set null' }),
    discordUserId: text('discord_user_id'),
    startValue: doublePrecision('start_value'),
    startRecordedAt: timestamp('start_recorded_at', { withTimezone: true }),
    joinedAt: timestamp('joined_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.competitionId, table.playerId] }),
  })
);
