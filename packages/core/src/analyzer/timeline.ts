import { settings } from "../config/settings.js";
import type { TimelineBucket } from "../domain/Analysis.js";
import type { LogEntry } from "../domain/LogEntry.js";

export interface TimelineOptions {
  buckets?: number;    // default: 20
  minWidthMs?: number; // default: one minute; at least 1
}

export function bucketWidthMs(durationMs: number, opts: TimelineOptions = {}): number {
  const buckets = opts.buckets ?? settings.analysis.timelineBuckets;
  const minWidth = Math.max(1, opts.minWidthMs ?? settings.analysis.minBucketWidthMs);
  return Math.max(minWidth, Math.ceil(durationMs / buckets));
}

/**
 * Fixed-width, half-open buckets from `start`. Entries outside the covered
 * span (the inclusive window end, or adapter clock skew) are counted in the
 * nearest edge bucket, so bucket counts always sum to the entry count.
 */
export function buildTimeline(
  entries: readonly Pick<LogEntry, "timestamp">[],
  start: Date,
  end: Date,
  opts: TimelineOptions = {},
): TimelineBucket[] {
  const origin = start.getTime();
  const duration = Math.max(0, end.getTime() - origin);
  const width = bucketWidthMs(duration, opts);
  const count = Math.max(1, Math.ceil(duration / width));

  const buckets: TimelineBucket[] = Array.from({ length: count }, (_, i) => ({
    start: new Date(origin + i * width),
    end: new Date(origin + (i + 1) * width),
    count: 0,
  }));

  for (const entry of entries) {
    const index = Math.floor((entry.timestamp.getTime() - origin) / width);
    buckets[Math.min(count - 1, Math.max(0, index))].count += 1;
  }
  return buckets;
}
