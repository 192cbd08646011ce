import { settings } from "../config/settings.js";
import type { QueryWindow } from "../domain/Analysis.js";
import { InvalidWindowError } from "../domain/errors.js";
import type { Incident } from "../domain/Incident.js";
import type { Severity } from "../domain/LogEntry.js";
import { type Clock, systemClock } from "../ports/Clock.js";
import { buildResourceFilter, presentLabels } from "./filter.js";

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;

export interface WindowOptions {
  severityFloor?: Severity; // default: WARNING
  maxEntries?: number;      // default: settings.collection.triageMaxEntries
  textSearch?: string;
  customFilter?: string;
}

export interface HoursWindowOptions extends WindowOptions {
  hours: number;
  resourceType?: string;
  labels?: Record<string, string>;
}

export interface RangeWindowOptions extends WindowOptions {
  start: Date;
  end: Date;
  resourceType?: string;
  labels?: Record<string, string>;
}

export interface IncidentWindowOptions extends WindowOptions {
  minutesBefore?: number; // default: 5
  minutesAfter?: number;  // default: 5
}

function requireInteger(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidWindowError(`${name} must be an integer >= ${min}, got ${value}`);
  }
}

function finish(
  start: Date,
  end: Date,
  resourceType: string,
  labels: Record<string, string | null | undefined>,
  opts: WindowOptions,
): QueryWindow {
  if (Number.isNaN(start.getTime()) || Number.isNaN(end.getTime())) {
    throw new InvalidWindowError("window bounds fall outside the representable time range");
  }
  if (start.getTime() > end.getTime()) {
    throw new InvalidWindowError(`window start ${start.toISOString()} is after end ${end.toISOString()}`);
  }
  const maxEntries = opts.maxEntries ?? settings.collection.triageMaxEntries;
  requireInteger("maxEntries", maxEntries, 1);

  const resource = { type: resourceType, labels: presentLabels(labels) };
  const window: QueryWindow = {
    start,
    end,
    resource,
    filter: buildResourceFilter(resource),
    severityFloor: opts.severityFloor ?? settings.window.triageSeverityFloor,
    maxEntries,
  };
  if (opts.textSearch) window.textSearch = opts.textSearch;
  if (opts.customFilter) window.customFilter = opts.customFilter;
  return window;
}

/** Last `hours` up to now. A resource type is mandatory. */
export function buildWindowFromHours(opts: HoursWindowOptions, clock: Clock = systemClock): QueryWindow {
  requireInteger("hours", opts.hours, 1);
  if (!opts.resourceType) {
    throw new InvalidWindowError("a resource type or an incident is required to scope the query");
  }
  const end = clock.now();
  const start = new Date(end.getTime() - opts.hours * HOUR_MS);
  return finish(start, end, opts.resourceType, opts.labels ?? {}, opts);
}

/** Explicit absolute range, both ends inclusive. A resource type is mandatory. */
export function buildWindowFromRange(opts: RangeWindowOptions): QueryWindow {
  if (!opts.resourceType) {
    throw new InvalidWindowError("a resource type is required to scope the query");
  }
  return finish(opts.start, opts.end, opts.resourceType, opts.labels ?? {}, opts);
}

/**
 * Incident span widened by the before/after buffers. An open incident runs
 * until the clock's current instant.
 */
export function buildWindowFromIncident(
  incident: Incident,
  opts: IncidentWindowOptions = {},
  clock: Clock = systemClock,
): QueryWindow {
  const minutesBefore = opts.minutesBefore ?? settings.window.minutesBefore;
  const minutesAfter = opts.minutesAfter ?? settings.window.minutesAfter;
  requireInteger("minutesBefore", minutesBefore, 0);
  requireInteger("minutesAfter", minutesAfter, 0);
  if (Number.isNaN(incident.startedAt.getTime())) {
    throw new InvalidWindowError("incident start time is not a valid instant");
  }
  if (!incident.resource.type) {
    throw new InvalidWindowError("incident has no resource type");
  }

  const endAnchor = incident.endedAt ?? clock.now();
  const start = new Date(incident.startedAt.getTime() - minutesBefore * MINUTE_MS);
  const end = new Date(endAnchor.getTime() + minutesAfter * MINUTE_MS);
  return finish(start, end, incident.resource.type, incident.resource.labels, opts);
}
