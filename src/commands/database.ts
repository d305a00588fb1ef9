import { z } from 'zod';

import { previousMonth } from '../aggregation/periods.js';
import { AggregationEngine } from '../aggregation/summarizer.js';
import { toHealthResponse } from '../routes/helpers/responders.js';
import { requireStore, type CommandContext } from './context.js';
import { defineCommand, ok, type Command } from './registry.js';

export const databaseCommands = (context: CommandContext): Command[] => {
  const engine = () =>
    new AggregationEngine(requireStore(context), {
      now: context.now,
      logger: context.logger,
      retentionDays: context.retentionDays,
    });

  return [
    defineCommand({
      name: 'db.health',
      description: 'History table sizes, ages and schema version',
      admin: true,
      requiresStorage: true,
      args: z.object({}),
      async execute() {
        const metrics = await engine().healthMetrics();
        const rows = metrics.tables.reduce((sum, table) => sum + table.rowCount, 0);
        return ok(
          `Schema version ${metrics.schemaVersion ?? 'unknown'}; ${rows} row(s) across ${metrics.tables.length} table(s)`,
          toHealthResponse(metrics)
        );
      },
    }),

    defineCommand({
      name: 'db.summarize',
      description: 'Summarize a month of history and optionally prune old records',
      admin: true,
      requiresStorage: true,
      args: z
        .object({
          year: z.coerce.number().int().min(2000).max(9999).optional(),
          month: z.coerce.number().int().min(1).max(12).optional(),
          force: z.boolean().default(false),
          prune_days: z.coerce.number().int().positive().optional(),
        })
        .refine((args) => (args.year === undefined) === (args.month === undefined), {
          message: 'year and month must be given together',
        }),
      async execute(args) {
        const aggregation = engine();
        const target =
          args.year !== undefined && args.month !== undefined
            ? { year: args.year, month: args.month }
            : previousMonth((context.now ?? (() => new Date()))());
        const report = await aggregation.summarizeMonth(target.year, target.month, { force: args.force });
        const pruned = args.prune_days !== undefined ? await aggregation.pruneAll(args.prune_days) : null;

        const label = `${target.year}-${String(target.month).padStart(2, '0')}`;
        const parts = [
          `Summarized ${label}: ${report.playerSummaries} player summary(ies), ${report.factionSummaries} faction summary(ies)`,
        ];
        if (pruned) {
          parts.push(
            `Pruned ${pruned.player_stats + pruned.faction + pruned.contributors} record(s) older than ${args.prune_days} days`
          );
        }
        return ok(parts.join('. '), {
          period: label,
          player_summaries: report.playerSummaries,
          faction_summaries: report.factionSummaries,
          pruned,
        });
      },
    }),
  ];
};
