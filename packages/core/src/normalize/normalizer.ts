import { RecordParseError } from "../domain/errors.js";
import { type HttpFields, type LogEntry, type Severity, SEVERITIES, isSeverity } from "../domain/LogEntry.js";
import { type ParsedRawRecord, rawLogRecordSchema, toInstant, toLatencyMs } from "./rawRecord.js";

// Cloud Logging's numeric LogSeverity values
const NUMERIC_SEVERITY = new Map<number, Severity>(SEVERITIES.map((s, i) => [i * 100, s]));

function toSeverity(value: string | number | null | undefined): Severity | undefined | null {
  if (value === null || value === undefined || value === "") return undefined;
  if (typeof value === "number") return NUMERIC_SEVERITY.get(value) ?? null;
  const upper = value.toUpperCase();
  return isSeverity(upper) ? upper : null;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  return JSON.stringify(value) ?? String(value);
}

/** `key:value` pairs in key order, space separated. */
export function flattenPayload(payload: Record<string, unknown>): string {
  return Object.keys(payload)
    .sort()
    .map((key) => `${key}:${stringify(payload[key])}`)
    .join(" ");
}

export function extractMessage(record: Pick<ParsedRawRecord, "textPayload" | "jsonPayload">): string {
  if (record.textPayload) return record.textPayload;
  if (record.jsonPayload && Object.keys(record.jsonPayload).length > 0) return flattenPayload(record.jsonPayload);
  return "";
}

function compact(labels: Record<string, string | null | undefined> | null | undefined): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(labels ?? {})) {
    if (typeof value === "string") out[key] = value;
  }
  return out;
}

function toHttp(req: ParsedRawRecord["httpRequest"]): HttpFields | undefined {
  if (!req) return undefined;
  const http: { -readonly [K in keyof HttpFields]: HttpFields[K] } = {};
  if (req.requestMethod) http.method = req.requestMethod;
  if (req.requestUrl) http.url = req.requestUrl;
  if (req.status !== null && req.status !== undefined) {
    const status = Number(req.status);
    if (Number.isInteger(status)) http.status = status;
  }
  if (req.latency) {
    const latencyMs = toLatencyMs(req.latency);
    if (latencyMs !== undefined) http.latencyMs = latencyMs;
  }
  return Object.keys(http).length ? http : undefined;
}

/**
 * Maps one untrusted record to a LogEntry.
 * @throws RecordParseError when the record has no usable timestamp or an unknown severity
 */
export function normalizeRecord(raw: unknown, index = 0): LogEntry {
  const parsed = rawLogRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new RecordParseError(index, issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "malformed record");
  }
  const record = parsed.data;

  const timestamp = toInstant(record.timestamp);
  if (!timestamp) throw new RecordParseError(index, "timestamp is not a valid instant");

  const severity = toSeverity(record.severity);
  if (severity === null) throw new RecordParseError(index, `unknown severity ${String(record.severity)}`);

  const entry: { -readonly [K in keyof LogEntry]: LogEntry[K] } = {
    timestamp,
    message: extractMessage(record),
    resource: { type: record.resource?.type ?? "", labels: compact(record.resource?.labels) },
    labels: compact(record.labels),
  };
  if (severity) entry.severity = severity;
  if (record.trace) entry.traceId = record.trace;
  if (record.spanId) entry.spanId = record.spanId;
  if (record.insertId) entry.insertId = record.insertId;
  if (record.logName) entry.logName = record.logName;
  const http = toHttp(record.httpRequest);
  if (http) entry.http = http;
  return Object.freeze(entry);
}

export interface NormalizedBatch {
  entries: LogEntry[];
  skipped: number;
  failures: RecordParseError[];
}

/** Skips bad records instead of failing the batch. */
export function normalizeRecords(raws: readonly unknown[]): NormalizedBatch {
  const entries: LogEntry[] = [];
  const failures: RecordParseError[] = [];
  raws.forEach((raw, i) => {
    try {
      entries.push(normalizeRecord(raw, i));
    } catch (err) {
      if (!(err instanceof RecordParseError)) throw err;
      failures.push(err);
    }
  });
  return { entries, skipped: failures.length, failures };
}

/** Stable: equal timestamps keep arrival order. */
export function sortByTimestamp<T extends LogEntry>(entries: readonly T[]): T[] {
  return entries
    .map((entry, i) => ({ entry, i }))
    .sort((a, b) => a.entry.timestamp.getTime() - b.entry.timestamp.getTime() || a.i - b.i)
    .map(({ entry }) => entry);
}
