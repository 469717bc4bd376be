/**
 * Scheduler: a node-cron job that triggers pipeline runs. Started by
 * `eventboard watch`. A tick that arrives while a run is still going is
 * skipped.
 */

import cron from 'node-cron';
import type { Config } from '../shared/config.js';
import { logger } from '../shared/logger.js';
import { errorMessage, resolvePath } from '../shared/utils.js';
import { runPipeline, type RunReport } from '../engine/pipeline.js';
import { withRunLock } from './runLock.js';

let runTask: cron.ScheduledTask | null = null;
let running = false;

/**
 * Run the pipeline once under the run lock, unless a scheduled run is
 * already in flight in this process. Failures are logged, never thrown.
 */
export async function runScheduled(
  config: Config,
  run: (config: Config) => Promise<RunReport> = runPipeline,
): Promise<RunReport | null> {
  if (running) {
    logger.warn('Previous run still in progress, skipping tick');
    return null;
  }

  running = true;
  logger.info('Scheduled run starting');
  try {
    const report = await withRunLock(resolvePath(config.snapshot.lock_path), () => run(config));
    logger.info({ failures: report.failures.length, events: report.stats.eventsPublished }, 'Scheduled run complete');
    return report;
  } catch (err) {
    logger.error({ error: errorMessage(err) }, 'Scheduled run failed');
    return null;
  } finally {
    running = false;
  }
}

export function startScheduler(config: Config): boolean {
  const runCron = config.schedule.run_cron;

  if (!cron.validate(runCron)) {
    logger.warn({ runCron }, 'Invalid run_cron expression, skipping scheduler');
    return false;
  }

  runTask = cron.schedule(runCron, () => {
    void runScheduled(config);
  }, { timezone: config.timezone });

  logger.info({ run_cron: runCron, timezone: config.timezone }, 'Scheduler started');
  return true;
}

/**
 * Stop all scheduled tasks (for graceful shutdown).
 */
export function stopScheduler(): void {
  runTask?.stop();
  runTask = null;
  logger.info('Scheduler stopped');
}
