import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const STATS_FILE = join(process.cwd(), 'data', 'contributor-stats.json');

const StatCatalogSchema = z.object({
  stats: z.array(z.string().min(1)).min(1),
  derived: z.record(z.array(z.string().min(1)).min(1)).default({}),
});

export type StatCatalog = z.infer<typeof StatCatalogSchema>;

let catalog: StatCatalog | null = null;

export const loadStatCatalog = (path: string = STATS_FILE): StatCatalog =>
  StatCatalogSchema.parse(JSON.parse(readFileSync(path, 'utf8')));

export const getStatCatalog = (): StatCatalog => {
  if (!catalog) catalog = loadStatCatalog();
  return catalog;
};

export const isContributorStat = (stat: string, source: StatCatalog = getStatCatalog()): boolean =>
  source.stats.includes(stat);

/**
 * Upstream stats that make up `stat`. A derived stat (gym energy spent) is the
 * sum of its parts; anything else is fetched as itself.
 */
export const componentStats = (stat: string, source: StatCatalog = getStatCatalog()): string[] =>
  source.derived[stat] ? [...source.derived[stat]] : [stat];
