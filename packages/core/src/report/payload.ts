import type {
  AnalysisSummary,
  CollectionInfo,
  CollectionResult,
  QueryWindow,
  TriageReport,
} from "../domain/Analysis.js";
import type { Incident } from "../domain/Incident.js";
import type { LogEntry } from "../domain/LogEntry.js";
import { renderFilter } from "../query/filter.js";

export interface PayloadOptions {
  incident?: Incident;
  projectId?: string;
  includeMetadata?: boolean; // default: true
}

const iso = (d: Date | undefined) => (d ? d.toISOString() : null);
const unixSeconds = (d: Date | undefined) => (d ? Math.floor(d.getTime() / 1000) : null);

function collectionMetadata(window: QueryWindow, info: CollectionInfo, total: number, opts: PayloadOptions) {
  return {
    collected_at: info.collectedAt.toISOString(),
    total_entries: total,
    skipped_records: info.skipped,
    truncated: info.truncated,
    project_id: opts.projectId ?? opts.incident?.projectId ?? null,
    window_start: window.start.toISOString(),
    window_end: window.end.toISOString(),
    filter: renderFilter(window),
  };
}

export function incidentMetadata(incident: Incident) {
  return {
    incident_id: incident.incidentId ?? null,
    started_at: unixSeconds(incident.startedAt),
    ended_at: unixSeconds(incident.endedAt),
    state: incident.state ?? null,
    summary: incident.summary ?? null,
    policy_name: incident.policyName ?? null,
    condition_name: incident.conditionName ?? null,
    resource: { type: incident.resource.type, labels: incident.resource.labels },
    metric: incident.metric ?? null,
    observed_value: incident.observedValue ?? null,
    threshold_value: incident.thresholdValue ?? null,
    url: incident.url ?? null,
  };
}

export function projectEntry(entry: LogEntry & { errorType?: string }) {
  return {
    timestamp: entry.timestamp.toISOString(),
    severity: entry.severity ?? null,
    message: entry.message,
    log_name: entry.logName ?? null,
    insert_id: entry.insertId ?? null,
    resource: { type: entry.resource.type, labels: entry.resource.labels },
    labels: entry.labels,
    trace: entry.traceId ?? null,
    span_id: entry.spanId ?? null,
    http_request: entry.http
      ? {
          method: entry.http.method ?? null,
          url: entry.http.url ?? null,
          status: entry.http.status ?? null,
          latency_ms: entry.http.latencyMs ?? null,
        }
      : null,
    ...(entry.errorType ? { error_type: entry.errorType } : {}),
  };
}

export function projectSummary(summary: AnalysisSummary) {
  const stats = summary.statistics;
  return {
    total_errors: summary.totalEntries,
    counts_by_type: summary.countsByType,
    groups: summary.groups.map((g) => ({
      signature: g.signature,
      error_type: g.errorType,
      count: g.count,
      first_seen: g.firstSeen.toISOString(),
      last_seen: g.lastSeen.toISOString(),
      samples: g.samples,
    })),
    timeline: summary.timeline.map((b) => ({ bucket_start: b.start.toISOString(), count: b.count })),
    statistics: {
      total_entries: stats.totalEntries,
      by_severity: stats.bySeverity,
      by_log_name: stats.byLogName,
      time_range: { earliest: iso(stats.earliest), latest: iso(stats.latest) },
      unique_traces: stats.uniqueTraces,
      http_status_codes: stats.httpStatusCodes,
    },
  };
}

function withIncident(opts: PayloadOptions) {
  return opts.includeMetadata !== false && opts.incident ? { incident_metadata: incidentMetadata(opts.incident) } : {};
}

/** `logs` payload: normalized entries without classification. */
export function buildCollectionPayload(result: CollectionResult, opts: PayloadOptions = {}) {
  return {
    collection_metadata: collectionMetadata(result.window, result.collection, result.entries.length, opts),
    ...withIncident(opts),
    logs: result.entries.map(projectEntry),
  };
}

/** Triage payload: summary plus ordered recommendation texts. */
export function buildTriagePayload(report: TriageReport, opts: PayloadOptions = {}) {
  return {
    collection_metadata: collectionMetadata(report.window, report.collection, report.entries.length, opts),
    ...withIncident(opts),
    summary: projectSummary(report.summary),
    recommendations: report.recommendations.map((r) => r.text),
    ...(report.narrative ? { narrative: report.narrative } : {}),
  };
}

export type CollectionPayload = ReturnType<typeof buildCollectionPayload>;
export type TriagePayload = ReturnType<typeof buildTriagePayload>;
