import fs from 'node:fs';
import path from 'node:path';
import type { EventsByDate } from '../engine/aggregate.js';
import type { Event } from '../source/adapter.js';
import { isCalendarDate } from '../shared/calendarDate.js';
import { SnapshotCorrupt, SnapshotMissing, SnapshotWriteError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { errorMessage, generateId } from '../shared/utils.js';
import { SNAPSHOT_VERSION, SnapshotFileSchema, type Snapshot, type SnapshotFile } from './schema.js';

export function toSnapshotFile(snapshot: Snapshot): SnapshotFile {
  const events: SnapshotFile['events'] = {};
  for (const [date, dayEvents] of snapshot.events) {
    events[date] = dayEvents.map((e) => ({
      title: e.title,
      link: e.link,
      place: e.place,
      categories: [...e.categories],
      source: e.source,
    }));
  }
  return { version: SNAPSHOT_VERSION, generated_at: snapshot.generatedAt, events };
}

/**
 * Validate a parsed snapshot document and rebuild the in-memory mapping.
 * Any defect rejects the whole document.
 */
export function fromSnapshotFile(raw: unknown): Snapshot {
  const parsed = SnapshotFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SnapshotCorrupt('Snapshot does not match the expected schema', {
      errors: parsed.error.issues.slice(0, 10).map((i) => `${i.path.join('.')}: ${i.message}`),
    });
  }

  const events: EventsByDate = new Map();
  let previous = '';
  for (const [date, dayEvents] of Object.entries(parsed.data.events)) {
    if (!isCalendarDate(date)) {
      throw new SnapshotCorrupt(`Malformed date key in snapshot: ${date}`, { key: date });
    }
    if (date <= previous) {
      throw new SnapshotCorrupt(`Snapshot date keys out of order at ${date}`, { key: date, previous });
    }
    previous = date;
    events.set(
      date,
      dayEvents.map((e): Event => ({ ...e, date })),
    );
  }

  return { generatedAt: parsed.data.generated_at, events };
}

/**
 * File-backed snapshot. Writes replace the file atomically (temporary sibling
 * then rename), so readers see either the previous snapshot or the new one.
 * Assumes a single writer.
 */
export class SnapshotStore {
  constructor(readonly filePath: string) {}

  exists(): boolean {
    return fs.existsSync(this.filePath);
  }

  save(events: EventsByDate, generatedAt: Date = new Date()): Snapshot {
    const snapshot: Snapshot = { generatedAt: generatedAt.toISOString(), events };
    const json = `${JSON.stringify(toSnapshotFile(snapshot), null, 2)}\n`;

    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(dir, `.${path.basename(this.filePath)}.${generateId(8)}.tmp`);

    let tmpCreated = false;
    try {
      fs.mkdirSync(dir, { recursive: true });
      const fd = fs.openSync(tmpPath, 'w');
      tmpCreated = true;
      try {
        fs.writeFileSync(fd, json, 'utf-8');
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmpPath, this.filePath);
    } catch (err) {
      if (tmpCreated) fs.rmSync(tmpPath, { force: true });
      throw new SnapshotWriteError(`Failed to write snapshot: ${errorMessage(err)}`, {
        path: this.filePath,
      });
    }

    logger.debug({ path: this.filePath, dates: events.size }, 'Snapshot written');
    return snapshot;
  }

  load(): Snapshot {
    let text: string;
    try {
      text = fs.readFileSync(this.filePath, 'utf-8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new SnapshotMissing(`No snapshot at ${this.filePath}`, { path: this.filePath });
      }
      throw err;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new SnapshotCorrupt(`Snapshot is not valid JSON: ${errorMessage(err)}`, { path: this.filePath });
    }
    return fromSnapshotFile(raw);
  }
}
