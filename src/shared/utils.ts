import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';
import { ConfigError } from './errors.js';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function getEventboardDir(): string {
  return resolvePath('~/.eventboard');
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Parse a command-line count that must be a whole number above zero.
 */
export function parsePositiveInt(raw: string, flag: string): number {
  const value = /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : NaN;
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new ConfigError(`Invalid ${flag}: ${raw}`);
  }
  return value;
}

/**
 * Run `fn` over `items` with at most `concurrency` calls in flight.
 * Results keep the input order regardless of completion order. A limit
 * below one or not a finite number runs the items one at a time.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const workers: Promise<void>[] = [];
  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;

  for (let i = 0; i < Math.min(limit, items.length); i++) {
    workers.push(
      (async () => {
        while (next < items.length) {
          const index = next++;
          const item = items[index];
          if (item !== undefined) {
            results[index] = await fn(item, index);
          }
        }
      })(),
    );
  }

  await Promise.all(workers);
  return results;
}
