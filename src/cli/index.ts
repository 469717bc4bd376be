#!/usr/bin/env node

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { loadConfig, writeDefaultConfig, type Config } from '../shared/config.js';
import { getEventboardDir, resolvePath, errorMessage, parsePositiveInt } from '../shared/utils.js';
import { isCalendarDate, todayIn } from '../shared/calendarDate.js';
import { ConfigError, EventboardError } from '../shared/errors.js';
import { loadSources } from '../source/registry.js';
import { configuredSourceEntries, runPipeline, type RunReport } from '../engine/pipeline.js';
import { SnapshotStore } from '../snapshot/store.js';
import { buildAgenda, type Agenda } from '../snapshot/view.js';
import { withRunLock } from '../schedule/runLock.js';
import { startScheduler, stopScheduler } from '../schedule/scheduler.js';
import { startServer } from '../api/server.js';

const SAMPLE_SOURCES = `url,categories
# One event listing page per line; categories are comma-separated labels.
# https://example.com/events,"music, jazz"
`;

const program = new Command();

program
  .name('eventboard')
  .description('Scrape event listing pages into a date-grouped calendar snapshot')
  .version('0.1.0')
  .option('-c, --config <path>', 'Config file (default: discovered or ~/.eventboard/config.yaml)');

// === init ===
program
  .command('init')
  .description('Create the default config and a sample sources file')
  .action(() => {
    const dir = getEventboardDir();
    const configPath = path.join(dir, 'config.yaml');
    const sourcesPath = path.join(dir, 'sources.csv');

    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log('✓ ~/.eventboard/config.yaml created');
    } else {
      log('✓ ~/.eventboard/config.yaml already exists');
    }

    if (!fs.existsSync(sourcesPath)) {
      fs.writeFileSync(sourcesPath, SAMPLE_SOURCES, 'utf-8');
      log('✓ ~/.eventboard/sources.csv created (add your listing pages there)');
    } else {
      log('✓ ~/.eventboard/sources.csv already exists');
    }
  });

// === sources ===
program
  .command('sources')
  .description('List configured sources after validation')
  .action(async () => {
    await withErrors(async () => {
      const config = await getConfig();
      const sources = loadSources(configuredSourceEntries(config));
      for (const s of sources) {
        const categories = s.categories.length > 0 ? s.categories.join(', ') : '-';
        log(`${String(s.index + 1).padStart(3)}  ${s.url}  [${categories}]`);
      }
      log(`\n${sources.length} sources total`);
    });
  });

// === run ===
program
  .command('run')
  .description('Fetch every source, extract events and publish a new snapshot')
  .option('--include-past', 'Keep events dated before the run date')
  .option('--concurrency <n>', 'Concurrent source fetches')
  .option('--run-date <date>', 'Treat this date (YYYY-MM-DD) as today')
  .action(async (opts: { includePast?: boolean; concurrency?: string; runDate?: string }) => {
    await withErrors(async () => {
      const config = await getConfig();
      if (opts.runDate !== undefined && !isCalendarDate(opts.runDate)) {
        throw new ConfigError(`Invalid --run-date: ${opts.runDate}`);
      }
      const concurrency =
        opts.concurrency !== undefined ? parsePositiveInt(opts.concurrency, '--concurrency') : undefined;

      const controller = new AbortController();
      const onSignal = (): void => {
        log('\nCancelling run...');
        controller.abort();
      };
      process.once('SIGINT', onSignal);

      try {
        log('Running pipeline...');
        const report = await withRunLock(resolvePath(config.snapshot.lock_path), () =>
          runPipeline(config, {
            runDate: opts.runDate,
            includePast: opts.includePast,
            concurrency,
            signal: controller.signal,
          }),
        );
        printReport(report, resolvePath(config.snapshot.path));
      } finally {
        process.off('SIGINT', onSignal);
      }
    });
  });

// === show ===
program
  .command('show')
  .description('Print the published snapshot grouped by day')
  .option('--from <date>', 'First date to show (YYYY-MM-DD)')
  .option('--to <date>', 'Last date to show (YYYY-MM-DD)')
  .option('--category <label>', 'Only events with this category')
  .option('--json', 'Print JSON instead of text')
  .action(async (opts: { from?: string; to?: string; category?: string; json?: boolean }) => {
    await withErrors(async () => {
      const config = await getConfig();
      for (const [flag, value] of [['--from', opts.from], ['--to', opts.to]] as const) {
        if (value !== undefined && !isCalendarDate(value)) {
          throw new ConfigError(`Invalid ${flag}: ${value}`);
        }
      }

      const store = new SnapshotStore(resolvePath(config.snapshot.path));
      const agenda = buildAgenda(store.load(), {
        today: todayIn(config.timezone),
        from: opts.from,
        to: opts.to,
        category: opts.category,
      });

      if (opts.json) {
        log(JSON.stringify(agenda, null, 2));
      } else {
        printAgenda(agenda);
      }
    });
  });

// === serve ===
program
  .command('serve')
  .description('Start the read-only HTTP API over the snapshot')
  .option('-p, --port <n>', 'Port number')
  .action(async (opts: { port?: string }) => {
    await withErrors(async () => {
      await startServer({
        port: opts.port !== undefined ? parsePositiveInt(opts.port, '--port') : undefined,
        configPath: globalConfigPath(),
      });
    });
  });

// === watch ===
program
  .command('watch')
  .description('Run the pipeline on the configured cron schedule')
  .action(async () => {
    await withErrors(async () => {
      const config = await getConfig();
      if (!startScheduler(config)) {
        process.exitCode = 1;
        return;
      }
      log(`✓ Scheduled runs at "${config.schedule.run_cron}" (${config.timezone}). Ctrl+C to stop.`);

      const shutdown = (): void => {
        stopScheduler();
        process.exit(0);
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
  });

function globalConfigPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

async function getConfig(): Promise<Config> {
  return loadConfig({ configPath: globalConfigPath() });
}

async function withErrors(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof EventboardError) {
      log(`Error [${err.code}]: ${err.message}`);
    } else {
      log(`Error: ${errorMessage(err)}`);
    }
    process.exitCode = 1;
  }
}

function printReport(report: RunReport, snapshotPath: string): void {
  const { stats } = report;
  log(`\nRun complete (${report.runDate}):`);
  log(`  Sources ok:        ${stats.sourcesSucceeded}/${stats.sourcesTotal}`);
  log(`  Listings found:    ${stats.listingsFound}`);
  log(`  Events extracted:  ${stats.eventsExtracted}`);
  log(`  Skipped (title):   ${stats.listingsSkipped.missing_title}`);
  log(`  Skipped (date):    ${stats.listingsSkipped.missing_date}`);
  log(`  Duplicates:        ${stats.duplicates}`);
  log(`  Past dropped:      ${stats.pastDropped}`);
  log(`  Published:         ${stats.eventsPublished} events on ${stats.datesPublished} dates`);
  log(`  Duration:          ${report.durationMs}ms`);

  if (report.failures.length > 0) {
    log('\nFailed sources:');
    for (const f of report.failures) {
      log(`  ${f.source}: ${f.error}`);
    }
  }
  log(`\n✓ Snapshot written to ${snapshotPath}`);
}

function printAgenda(agenda: Agenda): void {
  if (agenda.days.length === 0) {
    log('No events.');
    return;
  }
  for (const day of agenda.days) {
    const label = day.label ? ` (${day.label})` : '';
    log(`\n${day.date}${label}`);
    for (const e of day.events) {
      log(`  ${e.title}`);
      log(`    ${e.place} | ${e.categories.join(', ') || '-'}`);
      log(`    ${e.link}`);
    }
  }
  log(`\nSnapshot generated at ${agenda.generatedAt}`);
}

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync().catch((err: unknown) => {
  log(`Error: ${errorMessage(err)}`);
  process.exitCode = 1;
});
