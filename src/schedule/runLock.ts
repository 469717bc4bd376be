import fs from 'node:fs';
import path from 'node:path';
import { RunLockedError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface RunLock {
  readonly path: string;
  release(): void;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(fs.readFileSync(lockPath, 'utf-8').trim(), 10);
    return Number.isFinite(pid) && pid > 0 ? pid : null;
  } catch {
    return null;
  }
}

function tryCreate(lockPath: string): boolean {
  try {
    fs.writeFileSync(lockPath, `${process.pid}\n`, { flag: 'wx' });
    return true;
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'EEXIST') return false;
    throw err;
  }
}

/**
 * Take the run lock file, holding our pid. A lock left behind by a process
 * that no longer exists is taken over; a live holder raises RunLockedError.
 */
export function acquireRunLock(lockPath: string): RunLock {
  fs.mkdirSync(path.dirname(lockPath), { recursive: true });

  if (!tryCreate(lockPath)) {
    const holder = readLockPid(lockPath);
    if (holder !== null && isProcessAlive(holder)) {
      throw new RunLockedError(`Another run is in progress (pid ${holder})`, { path: lockPath, pid: holder });
    }
    logger.warn({ path: lockPath, pid: holder }, 'Removing stale run lock');
    fs.rmSync(lockPath, { force: true });
    if (!tryCreate(lockPath)) {
      throw new RunLockedError('Another run took the lock', { path: lockPath });
    }
  }

  let released = false;
  return {
    path: lockPath,
    release() {
      if (released) return;
      released = true;
      if (readLockPid(lockPath) === process.pid) {
        fs.rmSync(lockPath, { force: true });
      }
    },
  };
}

export async function withRunLock<T>(lockPath: string, fn: () => Promise<T>): Promise<T> {
  const lock = acquireRunLock(lockPath);
  try {
    return await fn();
  } finally {
    lock.release();
  }
}
