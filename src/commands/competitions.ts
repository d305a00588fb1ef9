import { z } from 'zod';

import { formatSignedNumber } from '../aggregation/competitions.js';
import { CompetitionService } from '../competitions/service.js';
import { CompetitionStatsUpdater } from '../competitions/stats-updater.js';
import {
  toCompetitionResponse,
  toCompetitionUpdateResponse,
  toOverviewResponse,
  toParticipantResponse,
  toStandingResponse,
  toTeamResponse,
  toTeamTotalResponse,
} from '../routes/helpers/responders.js';
import { idList, requireStore, type CommandContext } from './context.js';
import { defineCommand, fail, ok, type Command } from './registry.js';

const CompetitionId = z.coerce.number().int().positive();
const PlayerIds = z.union([z.string(), z.array(z.union([z.string(), z.number()]))]);

const parsePlayerIds = (value: z.infer<typeof PlayerIds>): number[] => {
  const ids = idList(value).map(Number);
  return ids.filter((id) => Number.isInteger(id) && id > 0);
};

export const competitionCommands = (context: CommandContext): Command[] => {
  const service = () =>
    new CompetitionService(
      { store: requireStore(context), client: context.client, credentials: context.credentials },
      { now: context.now, logger: context.logger, random: context.random }
    );

  return [
    defineCommand({
      name: 'competition.create',
      description: 'Create a competition over a faction contributor stat',
      admin: true,
      requiresStorage: true,
      args: z.object({
        name: z.string().trim().min(1).max(100),
        tracked_stat: z.string().min(1),
        start_date: z.string(),
        end_date: z.string(),
        num_teams: z.coerce.number().int().optional(),
      }),
      async execute(args, invoker) {
        const { competition, teams } = await service().create({
          name: args.name,
          trackedStat: args.tracked_stat,
          startDate: args.start_date,
          endDate: args.end_date,
          teamCount: args.num_teams,
          createdBy: invoker.id,
        });
        return ok(`Competition '${competition.name}' created with ${teams.length} teams`, {
          competition: toCompetitionResponse(competition),
          teams: teams.map(toTeamResponse),
        });
      },
    }),

    defineCommand({
      name: 'competition.list',
      description: 'List competitions',
      requiresStorage: true,
      args: z.object({ status: z.enum(['active', 'cancelled', 'completed']).optional() }),
      async execute(args) {
        const competitions = await service().list(args.status);
        if (!competitions.length) {
          return ok(`No competitions found${args.status ? ` with status ${args.status}` : ''}.`, { competitions: [] });
        }
        return ok(`${competitions.length} competition(s)`, { competitions: competitions.map(toCompetitionResponse) });
      },
    }),

    defineCommand({
      name: 'competition.cancel',
      description: 'Cancel a competition',
      admin: true,
      requiresStorage: true,
      args: z.object({ competition_id: CompetitionId }),
      async execute(args) {
        const competition = await service().cancel(args.competition_id);
        return ok(`Competition '${competition.name}' has been cancelled.`, toCompetitionResponse(competition));
      },
    }),

    defineCommand({
      name: 'competition.status',
      description: 'Competition rankings by change since the start value',
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        show_worst: z.boolean().default(false),
        limit: z.coerce.number().int().positive().optional(),
      }),
      async execute(args) {
        const report = await service().status(args.competition_id, { worst: args.show_worst, limit: args.limit });
        if (!report.participantCount) {
          return fail('no_participants', 'No participants found for this competition.');
        }
        const lines = report.rankings.map(
          (standing, index) => `${index + 1}. ${standing.playerName}: ${formatSignedNumber(standing.delta)}`
        );
        return ok([`${report.competition.name} (${report.competition.trackedStat})`, ...lines].join('\n'), {
          competition: toCompetitionResponse(report.competition),
          participant_count: report.participantCount,
          rankings: report.rankings.map((standing, index) => toStandingResponse(standing, index + 1)),
        });
      },
    }),

    defineCommand({
      name: 'competition.team-status',
      description: 'Team rankings by summed change',
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        team_id: z.coerce.number().int().positive().optional(),
        show_worst: z.boolean().default(false),
      }),
      async execute(args, invoker) {
        const report = await service().teamStatus(args.competition_id, {
          teamId: args.team_id,
          worst: args.show_worst,
          viewer: invoker,
        });
        if (!report.teams.length) {
          return ok('No team data available.', { competition: toCompetitionResponse(report.competition), teams: [] });
        }
        const lines = report.teams.map(
          (team, index) =>
            `${index + 1}. ${team.teamName}: ${formatSignedNumber(team.totalDelta)} (${team.participantCount} members)`
        );
        return ok([`${report.competition.name} team rankings`, ...lines].join('\n'), {
          competition: toCompetitionResponse(report.competition),
          teams: report.teams.map((team, index) => toTeamTotalResponse(team, index + 1)),
        });
      },
    }),

    defineCommand({
      name: 'competition.faction-overview',
      description: 'Overall improvement across all participants',
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        faction_id: z.coerce.number().int().positive().optional(),
      }),
      async execute(args) {
        const { competition, overview } = await service().factionOverview(args.competition_id, args.faction_id);
        if (!overview.participantCount) {
          return fail('no_participants', 'No participants found for this competition.');
        }
        return ok(
          `Total ${formatSignedNumber(overview.totalDelta)}, average ${formatSignedNumber(overview.averageDelta)} over ${overview.participantsWithData} of ${overview.participantCount} participant(s)`,
          { competition: toCompetitionResponse(competition), overview: toOverviewResponse(overview) }
        );
      },
    }),

    defineCommand({
      name: 'competition.set-captains',
      description: 'Set one or two captains for a team',
      admin: true,
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        team_id: z.coerce.number().int().positive(),
        captain_1: z.string().min(1),
        captain_2: z.string().min(1).optional(),
      }),
      async execute(args) {
        const captains = args.captain_2 ? [args.captain_1, args.captain_2] : [args.captain_1];
        const team = await service().setCaptains(args.competition_id, args.team_id, captains);
        return ok(`Captains set for ${team.teamName}`, toTeamResponse(team));
      },
    }),

    defineCommand({
      name: 'competition.add-participants',
      description: 'Add faction members to a competition and deal them onto teams',
      admin: true,
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        faction_id: z.coerce.number().int().positive().optional(),
        player_ids: PlayerIds.optional(),
      }),
      async execute(args, invoker) {
        const result = await service().addParticipants({
          competitionId: args.competition_id,
          factionId: args.faction_id,
          playerIds: args.player_ids === undefined ? undefined : parsePlayerIds(args.player_ids),
          requester: invoker.id,
        });
        const parts = [
          `Added ${result.added.length} participant(s) from ${result.factionName} (${result.factionId}) to ${result.competition.name}`,
        ];
        if (result.notInFaction.length) parts.push(`${result.notInFaction.length} player ID(s) not found in faction`);
        if (result.failed.length) parts.push(`${result.failed.length} failed`);
        return ok(parts.join('. '), {
          faction_id: result.factionId,
          faction_name: result.factionName,
          member_count: result.memberCount,
          added: result.added.map(toParticipantResponse),
          not_in_faction: result.notInFaction,
          failed: result.failed.map((failure) => ({ player_id: failure.playerId, error: failure.error })),
        });
      },
    }),

    defineCommand({
      name: 'competition.update-assignment',
      description: 'Move a participant to another team (0 removes them from their team)',
      admin: true,
      requiresStorage: true,
      args: z.object({
        competition_id: CompetitionId,
        player_id: z.coerce.number().int().positive(),
        team_id: z.coerce.number().int().min(0),
      }),
      async execute(args) {
        const teamId = args.team_id === 0 ? null : args.team_id;
        await service().updateAssignment(args.competition_id, args.player_id, teamId);
        return ok(`Player ${args.player_id} assigned to ${teamId === null ? 'No team' : `Team ${teamId}`}`, {
          player_id: args.player_id,
          team_id: teamId,
        });
      },
    }),

    defineCommand({
      name: 'competition.update-stats',
      description: 'Fetch contributor stats for every active competition now',
      admin: true,
      requiresStorage: true,
      args: z.object({}),
      async execute() {
        const updater = new CompetitionStatsUpdater(
          { store: requireStore(context), client: context.client, credentials: context.credentials },
          {
            requestDelayMs: context.pageDelayMs,
            rateLimitBackoffMs: context.rateLimitBackoffMs,
            sleep: context.sleep,
            now: context.now,
            logger: context.logger,
          }
        );
        const report = await updater.updateActive();
        return ok(report.message, toCompetitionUpdateResponse(report));
      },
    }),
  ];
};
