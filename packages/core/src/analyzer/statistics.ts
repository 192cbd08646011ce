import type { LogStatistics } from "../domain/Analysis.js";
import type { LogEntry } from "../domain/LogEntry.js";

export const UNSPECIFIED_SEVERITY = "UNSPECIFIED";

function bump(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

export function computeStatistics(entries: readonly LogEntry[]): LogStatistics {
  const stats: LogStatistics = {
    totalEntries: entries.length,
    bySeverity: {},
    byLogName: {},
    uniqueTraces: 0,
    httpStatusCodes: {},
  };
  const traces = new Set<string>();

  for (const entry of entries) {
    bump(stats.bySeverity, entry.severity ?? UNSPECIFIED_SEVERITY);

    // projects/p/logs/run.googleapis.com%2Fstderr -> run.googleapis.com%2Fstderr
    const logName = entry.logName ? entry.logName.slice(entry.logName.lastIndexOf("/") + 1) : "unknown";
    bump(stats.byLogName, logName);

    if (!stats.earliest || entry.timestamp < stats.earliest) stats.earliest = entry.timestamp;
    if (!stats.latest || entry.timestamp > stats.latest) stats.latest = entry.timestamp;

    if (entry.traceId) traces.add(entry.traceId);
    if (entry.http?.status !== undefined) bump(stats.httpStatusCodes, String(entry.http.status));
  }

  stats.uniqueTraces = traces.size;
  return stats;
}
