import type { ErrorType, ErrorTypeCounts } from "./ErrorType.js";
import type { LogEntry, ResourceSelector, Severity } from "./LogEntry.js";

export interface QueryWindow {
  start: Date;
  end: Date;
  resource: ResourceSelector;
  filter: string; // resource predicates only; see renderFilter for the full query
  severityFloor: Severity;
  maxEntries: number;
  textSearch?: string;
  customFilter?: string;
}

export interface ClassifiedEntry extends LogEntry {
  readonly errorType: ErrorType;
}

export interface ErrorGroup {
  signature: string; // representative normalized message
  errorType: ErrorType;
  count: number;
  firstSeen: Date;
  lastSeen: Date;
  samples: string[]; // first few verbatim messages
}

export interface TimelineBucket {
  start: Date;
  end: Date;
  count: number;
}

export interface LogStatistics {
  totalEntries: number;
  bySeverity: Record<string, number>;
  byLogName: Record<string, number>;
  earliest?: Date;
  latest?: Date;
  uniqueTraces: number;
  httpStatusCodes: Record<string, number>;
}

export interface AnalysisSummary {
  totalEntries: number;
  countsByType: ErrorTypeCounts;
  groups: ErrorGroup[];
  timeline: TimelineBucket[];
  statistics: LogStatistics;
}

export type RecommendationPriority = "CRITICAL" | "HIGH" | "MEDIUM" | "LOW";

export interface Recommendation {
  errorType?: ErrorType; // absent for the empty-window notice
  count: number;
  priority: RecommendationPriority;
  action: string;
  text: string;
}

export interface CollectionInfo {
  collectedAt: Date;
  fetched: number;
  skipped: number;
  truncated: boolean;
  pages: number;
  failures: string[];
}

export interface CollectionResult {
  window: QueryWindow;
  collection: CollectionInfo;
  entries: LogEntry[];
}

export interface TriageReport {
  window: QueryWindow;
  collection: CollectionInfo;
  entries: ClassifiedEntry[];
  summary: AnalysisSummary;
  recommendations: Recommendation[];
  narrative?: string;
}
