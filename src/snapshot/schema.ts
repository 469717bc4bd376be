import { z } from 'zod';
import type { EventsByDate } from '../engine/aggregate.js';

export const SNAPSHOT_VERSION = 1;

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'Expected an http(s) URL');

export const SnapshotEventSchema = z.object({
  title: z.string().min(1),
  link: httpUrl,
  place: z.string(),
  categories: z.array(z.string().min(1)),
  source: httpUrl,
});

export type SnapshotEvent = z.infer<typeof SnapshotEventSchema>;

/**
 * On-disk form. `events` maps ISO calendar dates (YYYY-MM-DD) to the day's
 * events in display order; the date itself is the key, not an event field.
 */
export const SnapshotFileSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  generated_at: z.string().datetime(),
  events: z.record(z.string(), z.array(SnapshotEventSchema)),
});

export type SnapshotFile = z.infer<typeof SnapshotFileSchema>;

export interface Snapshot {
  /** ISO instant the snapshot was written. */
  generatedAt: string;
  events: EventsByDate;
}
