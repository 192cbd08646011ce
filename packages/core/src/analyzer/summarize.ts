import type { AnalysisSummary, ClassifiedEntry } from "../domain/Analysis.js";
import type { ErrorTypeCounts } from "../domain/ErrorType.js";
import { type GroupingOptions, groupEntries } from "./grouping.js";
import { computeStatistics } from "./statistics.js";
import { type TimelineOptions, buildTimeline } from "./timeline.js";

export interface SummarizeOptions extends GroupingOptions {
  timeline?: TimelineOptions;
}

export function countByType(entries: readonly ClassifiedEntry[]): ErrorTypeCounts {
  const counts: ErrorTypeCounts = {};
  for (const entry of entries) {
    counts[entry.errorType] = (counts[entry.errorType] ?? 0) + 1;
  }
  return counts;
}

export function summarize(
  entries: readonly ClassifiedEntry[],
  range: { start: Date; end: Date },
  opts: SummarizeOptions = {},
): AnalysisSummary {
  return {
    totalEntries: entries.length,
    countsByType: countByType(entries),
    groups: groupEntries(entries, opts),
    timeline: buildTimeline(entries, range.start, range.end, opts.timeline),
    statistics: computeStatistics(entries),
  };
}
