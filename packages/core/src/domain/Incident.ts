import type { ResourceSelector } from "./LogEntry.js";

/** Parsed once per invocation from an alerting descriptor. */
export interface Incident {
  incidentId?: string;
  startedAt: Date;
  endedAt?: Date; // open incident when absent
  state?: string;
  resource: ResourceSelector;
  policyName?: string;
  conditionName?: string;
  summary?: string;
  metric?: Record<string, unknown>;
  observedValue?: number | string;
  thresholdValue?: number | string;
  url?: string;
  projectId?: string;
}
