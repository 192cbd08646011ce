export const SEVERITIES = [
  "DEFAULT",
  "DEBUG",
  "INFO",
  "NOTICE",
  "WARNING",
  "ERROR",
  "CRITICAL",
  "ALERT",
  "EMERGENCY",
] as const;

export type Severity = (typeof SEVERITIES)[number];

/** Rank used for severity floors; DEFAULT is the lowest. */
export function severityRank(severity: Severity | undefined): number {
  return severity ? SEVERITIES.indexOf(severity) : 0;
}

export function isSeverity(value: string): value is Severity {
  return SEVERITIES.some((s) => s === value);
}

export interface ResourceSelector {
  readonly type: string;
  readonly labels: Readonly<Record<string, string>>;
}

export interface HttpFields {
  readonly method?: string;
  readonly url?: string;
  readonly status?: number;
  readonly latencyMs?: number;
}

/** One normalized log record. Built once per fetched record and never mutated. */
export interface LogEntry {
  readonly timestamp: Date;
  readonly severity?: Severity; // absent stays absent
  readonly message: string;
  readonly resource: ResourceSelector;
  readonly labels: Readonly<Record<string, string>>;
  readonly traceId?: string;
  readonly spanId?: string;
  readonly http?: HttpFields;
  readonly insertId?: string; // reporting only
  readonly logName?: string;
}
