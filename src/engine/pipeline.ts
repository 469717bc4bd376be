import type { Config } from '../shared/config.js';
import type { Event, Source } from '../source/adapter.js';
import { loadSources, readSourcesFile, type SourceEntry } from '../source/registry.js';
import { fetchAll, type PageLoaders } from '../source/fetcher.js';
import { extractEvent, type ExtractSkipReason } from '../source/extract.js';
import { aggregateWithStats } from './aggregate.js';
import { SnapshotStore } from '../snapshot/store.js';
import type { Snapshot } from '../snapshot/schema.js';
import { LlmClient, type ChatClient } from '../llm/client.js';
import { todayIn, type CalendarDate } from '../shared/calendarDate.js';
import { ConfigError, PipelineAborted, PipelineError } from '../shared/errors.js';
import { mapWithConcurrency, resolvePath } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface RunOptions {
  /** Defaults to today in the configured time zone. */
  runDate?: CalendarDate;
  /** Overrides the config's source file and inline list. */
  sources?: readonly SourceEntry[];
  includePast?: boolean;
  concurrency?: number;
  loaders?: PageLoaders;
  store?: SnapshotStore;
  llm?: ChatClient | null;
  signal?: AbortSignal;
  now?: () => Date;
}

export interface RunStats {
  sourcesTotal: number;
  sourcesSucceeded: number;
  sourcesFailed: number;
  listingsFound: number;
  eventsExtracted: number;
  listingsSkipped: Record<ExtractSkipReason, number>;
  duplicates: number;
  pastDropped: number;
  eventsPublished: number;
  datesPublished: number;
}

export interface RunReport {
  runDate: CalendarDate;
  snapshot: Snapshot;
  failures: Array<{ source: string; error: string }>;
  stats: RunStats;
  durationMs: number;
}

/**
 * Source entries for a run: the config's inline list when it has one,
 * otherwise the CSV sources file.
 */
export function configuredSourceEntries(config: Config): SourceEntry[] {
  if (config.sources.length > 0) return config.sources;
  return readSourcesFile(resolvePath(config.sources_file));
}

function checkAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new PipelineAborted(`Run cancelled during ${stage}; snapshot left unchanged`, { stage });
  }
}

/**
 * One full run: load sources, fetch them concurrently, extract listings,
 * aggregate and publish a fresh snapshot.
 *
 * Per-source fetch failures and skipped listings only reduce coverage. The
 * run fails, leaving the previous snapshot in place, when no sources are
 * configured, when every source fails, when it is cancelled, or when the
 * snapshot cannot be written.
 */
export async function runPipeline(config: Config, options: RunOptions = {}): Promise<RunReport> {
  const now = options.now ?? (() => new Date());
  const startTime = now().getTime();
  const runDate = options.runDate ?? todayIn(config.timezone, now());
  const includePast = options.includePast ?? config.aggregate.include_past;
  const concurrency = options.concurrency ?? config.fetch.concurrency;
  if (!Number.isSafeInteger(concurrency) || concurrency < 1) {
    throw new ConfigError(`Invalid fetch concurrency: ${concurrency}`);
  }

  const sources: Source[] = loadSources(options.sources ?? configuredSourceEntries(config));
  logger.info({ sources: sources.length, runDate }, 'Run starting');

  const results = await fetchAll(sources, {
    fetch: { ...config.fetch, concurrency },
    extract: config.extract,
    loaders: options.loaders,
    signal: options.signal,
  });
  checkAborted(options.signal, 'fetch');

  const llm =
    options.llm !== undefined ? options.llm : config.extract.llm_fallback ? new LlmClient(config.llm) : null;

  const stats: RunStats = {
    sourcesTotal: sources.length,
    sourcesSucceeded: 0,
    sourcesFailed: 0,
    listingsFound: 0,
    eventsExtracted: 0,
    listingsSkipped: { missing_title: 0, missing_date: 0 },
    duplicates: 0,
    pastDropped: 0,
    eventsPublished: 0,
    datesPublished: 0,
  };
  const failures: RunReport['failures'] = [];
  const events: Event[] = [];

  for (const result of results) {
    if (!result.ok) {
      stats.sourcesFailed++;
      failures.push({ source: result.source.url, error: result.error.message });
      continue;
    }

    stats.sourcesSucceeded++;
    stats.listingsFound += result.rawEvents.length;
    const outcomes = await mapWithConcurrency(result.rawEvents, llm ? config.llm.max_concurrent : 1, (raw) =>
      extractEvent(raw, { runDate, extract: config.extract, llm }),
    );
    for (const outcome of outcomes) {
      if (outcome.ok) {
        events.push(outcome.event);
      } else {
        stats.listingsSkipped[outcome.reason]++;
      }
    }
    logger.debug({ source: result.source.url, listings: result.rawEvents.length }, 'Source extracted');
  }
  stats.eventsExtracted = events.length;

  if (stats.sourcesSucceeded === 0) {
    throw new PipelineError('Every source failed; snapshot left unchanged', { failures });
  }

  const aggregated = aggregateWithStats(events, {
    runDate,
    includePast,
    sourceOrder: sources.map((s) => s.url),
  });
  stats.duplicates = aggregated.stats.duplicates;
  stats.pastDropped = aggregated.stats.past;
  stats.eventsPublished = aggregated.stats.output;
  stats.datesPublished = aggregated.events.size;

  checkAborted(options.signal, 'aggregate');

  const store = options.store ?? new SnapshotStore(resolvePath(config.snapshot.path));
  const snapshot = store.save(aggregated.events, now());

  const durationMs = now().getTime() - startTime;
  logger.info(
    {
      sourcesSucceeded: stats.sourcesSucceeded,
      sourcesFailed: stats.sourcesFailed,
      eventsPublished: stats.eventsPublished,
      datesPublished: stats.datesPublished,
      durationMs,
    },
    'Run complete',
  );

  return { runDate, snapshot, failures, stats, durationMs };
}
