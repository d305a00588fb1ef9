import { z } from 'zod';

import {
  toCrimeEventResponse,
  toCrimeResponse,
  toFrequentLeaverResponse,
  toParticipantCrimeStatsResponse,
  toSyncReportResponse,
  toTrackedFactionResponse,
} from '../routes/helpers/responders.js';
import {
  CRIME_STATUSES,
  DEFAULT_LEAVER_THRESHOLD,
  DEFAULT_TRACKING_WINDOW_DAYS,
  PermissionDeniedError,
  TrackedFactionLookupError,
  type TrackedFactionRecord,
  type TrackerStore,
} from '../store/types.js';
import { CrimeSyncOrchestrator } from '../sync/orchestrator.js';
import { idList, requireStore, type CommandContext } from './context.js';
import { defineCommand, ok, type Command, type Invoker } from './registry.js';

const DAY_MS = 86_400_000;
const FactionId = z.coerce.number().int().positive();
const PlayerId = z.coerce.number().int().positive();
const GuildId = z.string().min(1);
const IdListInput = z.union([z.string(), z.array(z.union([z.string(), z.number()]))]);

const requireConfig = async (store: TrackerStore, factionId: number, guildId: string): Promise<TrackedFactionRecord> => {
  const config = await store.getTrackedFaction(factionId, guildId);
  if (!config) {
    throw new TrackedFactionLookupError(
      `No organized crime tracking configured for faction ${factionId} in this server.`
    );
  }
  return config;
};

const requireLeadOrAdmin = (config: TrackedFactionRecord, invoker: Invoker) => {
  if (!invoker.isAdmin && !config.leadIds.includes(invoker.id)) {
    throw new PermissionDeniedError('You must be a faction lead or server administrator to view frequent leavers.');
  }
};

export const crimeCommands = (context: CommandContext): Command[] => [
  defineCommand({
    name: 'crimes.sync',
    description: 'Run one organized crime sync pass now',
    admin: true,
    requiresStorage: true,
    args: z.object({ faction_ids: z.array(FactionId).optional() }),
    async execute(args) {
      const orchestrator = new CrimeSyncOrchestrator(
        {
          store: requireStore(context),
          client: context.client,
          credentials: context.credentials,
          notifier: context.notifier,
        },
        {
          pageDelayMs: context.pageDelayMs,
          rateLimitBackoffMs: context.rateLimitBackoffMs,
          sleep: context.sleep,
          now: context.now,
          logger: context.logger,
        }
      );
      const report = await orchestrator.runOnce({ factionIds: args.faction_ids });
      return ok(report.message, toSyncReportResponse(report));
    },
  }),

  defineCommand({
    name: 'crimes.list',
    description: 'List current organized crimes for a faction',
    requiresStorage: true,
    args: z.object({
      faction_id: FactionId,
      status: z.enum(CRIME_STATUSES).optional(),
    }),
    async execute(args) {
      const crimes = (await requireStore(context).listCurrentCrimes(args.faction_id)).filter(
        (crime) => !args.status || crime.status === args.status
      );
      if (!crimes.length) {
        return ok(`No organized crimes found${args.status ? ` with status ${args.status}` : ''}.`, { crimes: [] });
      }
      return ok(`${crimes.length} organized crime(s) for faction ${args.faction_id}`, {
        crimes: crimes.map(toCrimeResponse),
      });
    },
  }),

  defineCommand({
    name: 'crimes.track',
    description: 'Enable or disable organized crime tracking for a faction in a server',
    admin: true,
    requiresStorage: true,
    args: z.object({
      faction_id: FactionId,
      guild_id: GuildId,
      enabled: z.boolean().default(true),
      missing_item_channel_id: z.string().min(1).nullable().optional(),
    }),
    async execute(args) {
      const config = await requireStore(context).upsertTrackedFaction({
        factionId: args.faction_id,
        guildId: args.guild_id,
        enabled: args.enabled,
        missingItemChannelId: args.missing_item_channel_id,
      });
      return ok(
        `Organized crime tracking ${config.enabled ? 'enabled' : 'disabled'} for faction ${config.factionId}`,
        toTrackedFactionResponse(config)
      );
    },
  }),

  defineCommand({
    name: 'crimes.configure-leavers',
    description: 'Configure frequent leaver notifications for a tracked faction',
    admin: true,
    requiresStorage: true,
    args: z.object({
      faction_id: FactionId,
      guild_id: GuildId,
      channel_id: z.string().min(1).nullable().optional(),
      lead_ids: IdListInput.optional(),
      threshold: z.coerce.number().int().min(1).optional(),
      window_days: z.coerce.number().int().min(1).optional(),
    }),
    async execute(args) {
      const store = requireStore(context);
      await requireConfig(store, args.faction_id, args.guild_id);
      const config = await store.upsertTrackedFaction({
        factionId: args.faction_id,
        guildId: args.guild_id,
        notificationChannelId: args.channel_id,
        leadIds: args.lead_ids === undefined ? undefined : idList(args.lead_ids),
        frequentLeaverThreshold: args.threshold,
        trackingWindowDays: args.window_days,
      });
      return ok(
        `Frequent leaver notifications configured for faction ${config.factionId} (threshold: ${config.frequentLeaverThreshold}, window: ${config.trackingWindowDays} days)`,
        toTrackedFactionResponse(config)
      );
    },
  }),

  defineCommand({
    name: 'crimes.frequent-leavers',
    description: 'List players who frequently leave crimes (faction leads only)',
    requiresStorage: true,
    args: z.object({
      faction_id: FactionId,
      guild_id: GuildId,
      threshold: z.coerce.number().int().min(1).default(DEFAULT_LEAVER_THRESHOLD),
      days: z.coerce.number().int().min(1).default(DEFAULT_TRACKING_WINDOW_DAYS),
    }),
    async execute(args, invoker) {
      const store = requireStore(context);
      requireLeadOrAdmin(await requireConfig(store, args.faction_id, args.guild_id), invoker);
      const now = (context.now ?? (() => new Date()))();
      const leavers = await store.listFrequentLeavers(
        args.faction_id,
        args.threshold,
        new Date(now.getTime() - args.days * DAY_MS)
      );
      if (!leavers.length) {
        return ok(`No frequent leavers found (threshold: ${args.threshold}, window: ${args.days} days).`, {
          leavers: [],
        });
      }
      return ok(
        `Players who left more than ${args.threshold} crimes in the last ${args.days} days: ${leavers.length}`,
        { leavers: leavers.slice(0, 20).map(toFrequentLeaverResponse), total: leavers.length }
      );
    },
  }),

  defineCommand({
    name: 'crimes.participant-stats',
    description: 'Crime statistics for one participant of a faction',
    requiresStorage: true,
    args: z.object({
      faction_id: FactionId,
      player_id: PlayerId,
      days: z.coerce.number().int().min(1).default(DEFAULT_TRACKING_WINDOW_DAYS),
    }),
    async execute(args) {
      const store = requireStore(context);
      const now = (context.now ?? (() => new Date()))();
      const since = new Date(now.getTime() - args.days * DAY_MS);
      const [stats, current, leaves] = await Promise.all([
        store.listParticipantCrimeStats(args.faction_id, args.player_id),
        store.listCurrentCrimes(args.faction_id),
        store.listCrimeEvents({
          factionId: args.faction_id,
          playerId: args.player_id,
          eventTypes: ['participant_left'],
          since,
        }),
      ]);
      const inCrimes = current.filter((crime) => crime.participants.includes(args.player_id));
      return ok(
        `Player ${args.player_id}: ${inCrimes.length} current crime(s), ${leaves.length} crime(s) left in ${args.days} days`,
        {
          player_id: args.player_id,
          faction_id: args.faction_id,
          current_crimes: inCrimes.map(toCrimeResponse),
          crimes_left: leaves.length,
          recent_leaves: leaves.slice(0, 5).map(toCrimeEventResponse),
          outcomes: stats.map(toParticipantCrimeStatsResponse),
        }
      );
    },
  }),
];
