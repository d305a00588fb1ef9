#!/usr/bin/env tsx
import 'dotenv/config';

import { AggregationEngine } from '../src/aggregation/summarizer.js';
import { CompetitionStatsUpdater } from '../src/competitions/stats-updater.js';
import { loadConfig } from '../src/config.js';
import { describeError } from '../src/logging.js';
import { createRuntime } from '../src/runtime.js';
import { CrimeSyncOrchestrator } from '../src/sync/orchestrator.js';
import { isAbortError, sleep } from '../src/sync/sleep.js';

const main = async () => {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const store = runtime.store;
  if (!store) {
    throw new Error('Database not available; the sync worker needs storage.');
  }

  const controller = new AbortController();
  const stop = (signal: NodeJS.Signals) => {
    console.log('sync_worker_stopping', { signal });
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  const deps = { store, client: runtime.client, credentials: runtime.credentials };
  const options = {
    pageDelayMs: config.sync.pageDelayMs,
    rateLimitBackoffMs: config.sync.rateLimitBackoffMs,
  };
  const aggregation = new AggregationEngine(store, { retentionDays: config.retentionDays });
  const crimes = new CrimeSyncOrchestrator({ ...deps, notifier: runtime.notifier, aggregation }, options);
  const competitions = new CompetitionStatsUpdater(deps, {
    requestDelayMs: options.pageDelayMs,
    rateLimitBackoffMs: options.rateLimitBackoffMs,
  });

  console.log('sync_worker_started', { intervalMs: config.sync.intervalMs });
  while (!controller.signal.aborted) {
    try {
      const crimeReport = await crimes.runOnce({ signal: controller.signal });
      console.log('crime_sync_pass', { message: crimeReport.message });
      if (crimeReport.maintenance) {
        console.log('history_maintenance_pass', crimeReport.maintenance);
      }
      if (controller.signal.aborted) break;
      const competitionReport = await competitions.updateActive({ signal: controller.signal });
      console.log('competition_update_pass', { message: competitionReport.message });
    } catch (err) {
      if (isAbortError(err)) break;
      console.error('sync_pass_failed', { error: describeError(err) });
    }

    try {
      await sleep(config.sync.intervalMs, controller.signal);
    } catch (err) {
      if (!isAbortError(err)) throw err;
    }
  }

  await runtime.close();
  console.log('sync_worker_stopped');
};

main().catch((err) => {
  console.error('sync_worker_failed', err);
  process.exitCode = 1;
});
