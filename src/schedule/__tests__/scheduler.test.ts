import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { runScheduled, startScheduler, stopScheduler } from '../scheduler.js';
import { ConfigSchema, type Config } from '../../shared/config.js';
import type { RunReport } from '../../engine/pipeline.js';

function report(): RunReport {
  return {
    runDate: '2024-06-04',
    snapshot: { generatedAt: '2024-06-04T08:00:00.000Z', events: new Map() },
    failures: [],
    stats: {
      sourcesTotal: 1,
      sourcesSucceeded: 1,
      sourcesFailed: 0,
      listingsFound: 0,
      eventsExtracted: 0,
      listingsSkipped: { missing_title: 0, missing_date: 0 },
      duplicates: 0,
      pastDropped: 0,
      eventsPublished: 0,
      datesPublished: 0,
    },
    durationMs: 5,
  };
}

describe('runScheduled', () => {
  let tmpDir: string;
  let config: Config;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'eventboard-sched-'));
    config = ConfigSchema.parse({ snapshot: { lock_path: path.join(tmpDir, 'run.lock') } });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('runs the pipeline under the run lock', async () => {
    const run = vi.fn((cfg: Config) => {
      expect(fs.existsSync(cfg.snapshot.lock_path)).toBe(true);
      return Promise.resolve(report());
    });

    const result = await runScheduled(config, run);
    expect(result).toEqual(report());
    expect(run).toHaveBeenCalledOnce();
    expect(fs.existsSync(config.snapshot.lock_path)).toBe(false);
  });

  it('logs a failed run and returns null', async () => {
    const run = vi.fn((_cfg: Config) => Promise.reject(new Error('Every source failed')));
    expect(await runScheduled(config, run)).toBeNull();
  });

  it('skips a tick while a run is in flight', async () => {
    let finish: (value: RunReport) => void = () => undefined;
    const run = vi.fn(
      (_cfg: Config) =>
        new Promise<RunReport>((resolve) => {
          finish = resolve;
        }),
    );

    const first = runScheduled(config, run);
    expect(await runScheduled(config, run)).toBeNull();
    finish(report());
    expect(await first).toEqual(report());
    expect(run).toHaveBeenCalledOnce();
  });
});

describe('startScheduler', () => {
  afterEach(() => {
    stopScheduler();
  });

  it('rejects an invalid cron expression', () => {
    const config = ConfigSchema.parse({ schedule: { run_cron: 'every morning' } });
    expect(startScheduler(config)).toBe(false);
  });

  it('accepts a valid cron expression', () => {
    const config = ConfigSchema.parse({ schedule: { run_cron: '0 6 * * *' } });
    expect(startScheduler(config)).toBe(true);
  });
});
