import fs from 'node:fs';
import type { Source } from './adapter.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface SourceEntry {
  url: string;
  /** Comma-joined category labels, e.g. "music, jazz". */
  categories: string;
}

function parseCategories(raw: string, url: string): string[] {
  if (raw.trim() === '') return [];
  const labels: string[] = [];
  for (const part of raw.split(',')) {
    const label = part.trim();
    if (!label) {
      throw new ConfigError(`Empty category label for source: ${url}`, { url, categories: raw });
    }
    if (!labels.includes(label)) labels.push(label);
  }
  return labels;
}

function validateUrl(raw: string): string {
  const trimmed = raw.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ConfigError(`Malformed source URL: ${raw}`, { url: raw });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`Unsupported source URL scheme: ${raw}`, { url: raw });
  }
  return trimmed;
}

/**
 * Validate a source list into registry entries in registration order.
 * A URL listed twice is kept once, at its first position.
 */
export function loadSources(entries: readonly SourceEntry[]): Source[] {
  if (entries.length === 0) {
    throw new ConfigError('No sources configured');
  }

  const sources: Source[] = [];
  const seen = new Set<string>();
  for (const entry of entries) {
    const url = validateUrl(entry.url);
    const categories = parseCategories(entry.categories, url);
    if (seen.has(url)) {
      logger.warn({ url }, 'Duplicate source ignored');
      continue;
    }
    seen.add(url);
    sources.push({ url, categories, index: sources.length });
  }
  return sources;
}

/**
 * Split one CSV line into fields. Double quotes group a field and `""`
 * inside quotes is a literal quote.
 */
export function splitCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (inQuotes) {
      if (ch === '"') {
        if (line[i + 1] === '"') {
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  if (inQuotes) {
    throw new ConfigError(`Unterminated quote in CSV line: ${line}`);
  }
  fields.push(current);
  return fields;
}

/**
 * Parse `url,categories` CSV text. The header row is optional; blank lines and
 * lines starting with # are skipped. Categories may be spread over the
 * remaining columns when the row is not quoted.
 */
export function parseSourcesCsv(text: string): SourceEntry[] {
  const entries: SourceEntry[] = [];
  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  let firstRow = true;

  for (const rawLine of lines) {
    const line = rawLine.trim();
    if (line.length === 0 || line.startsWith('#')) continue;

    const [url = '', ...rest] = splitCsvLine(line).map((f) => f.trim());
    const isHeader = firstRow && url.toLowerCase() === 'url';
    firstRow = false;
    if (isHeader) continue;

    entries.push({ url, categories: rest.filter((f) => f.length > 0).join(',') });
  }
  return entries;
}

export function readSourcesFile(filePath: string): SourceEntry[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigError(`Sources file not found: ${filePath}`, { path: filePath });
  }
  return parseSourcesCsv(fs.readFileSync(filePath, 'utf-8'));
}
