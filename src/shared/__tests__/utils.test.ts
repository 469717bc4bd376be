import { describe, it, expect } from 'vitest';
import {
  resolvePath,
  generateId,
  errorMessage,
  mapWithConcurrency,
  getEventboardDir,
  parsePositiveInt,
} from '../utils.js';
import { ConfigError } from '../errors.js';
import { homedir } from 'node:os';
import path from 'node:path';

describe('resolvePath', () => {
  it('expands ~ to home directory', () => {
    expect(resolvePath('~/test')).toBe(path.join(homedir(), 'test'));
  });

  it('expands bare ~ to home directory', () => {
    expect(resolvePath('~')).toBe(path.join(homedir(), ''));
  });

  it('resolves relative paths', () => {
    expect(path.isAbsolute(resolvePath('./foo/bar'))).toBe(true);
  });

  it('returns absolute paths as-is', () => {
    expect(resolvePath('/absolute/path')).toBe('/absolute/path');
  });
});

describe('getEventboardDir', () => {
  it('lives under the home directory', () => {
    expect(getEventboardDir()).toBe(path.join(homedir(), '.eventboard'));
  });
});

describe('generateId', () => {
  it('generates 21-char IDs by default', () => {
    expect(generateId()).toHaveLength(21);
  });

  it('respects a custom size', () => {
    expect(generateId(8)).toHaveLength(8);
  });

  it('generates unique IDs', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });
});

describe('errorMessage', () => {
  it('reads Error messages and stringifies the rest', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('mapWithConcurrency', () => {
  it('keeps input order regardless of completion order', async () => {
    const delays = [30, 5, 15, 0];
    const result = await mapWithConcurrency(delays, 2, async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${i}:${ms}`;
    });
    expect(result).toEqual(['0:30', '1:5', '2:15', '3:0']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active--;
    });
    expect(peak).toBe(2);
  });

  it('runs every item one at a time when the limit is not a number', async () => {
    let active = 0;
    let peak = 0;
    const result = await mapWithConcurrency([1, 2, 3], Number.NaN, async (x) => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
      return x * 10;
    });
    expect(result).toEqual([10, 20, 30]);
    expect(peak).toBe(1);
  });

  it('handles an empty list', async () => {
    expect(await mapWithConcurrency([], 3, async (x: number) => x)).toEqual([]);
  });
});

describe('parsePositiveInt', () => {
  it('accepts whole numbers above zero', () => {
    expect(parsePositiveInt('4', '--concurrency')).toBe(4);
    expect(parsePositiveInt(' 12 ', '--concurrency')).toBe(12);
  });

  it('rejects anything else with a ConfigError', () => {
    for (const raw of ['abc', '0', '-2', '1.5', '3x', '']) {
      expect(() => parsePositiveInt(raw, '--concurrency')).toThrow(ConfigError);
    }
    expect(() => parsePositiveInt('abc', '--concurrency')).toThrow('Invalid --concurrency: abc');
  });
});
