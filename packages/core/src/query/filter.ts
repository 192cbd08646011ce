import type { QueryWindow } from "../domain/Analysis.js";
import type { ResourceSelector } from "../domain/LogEntry.js";

function quote(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** Labels whose value is empty are left out, never matched as wildcards. */
export function presentLabels(labels: Readonly<Record<string, string | null | undefined>>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of Object.keys(labels).sort()) {
    const value = labels[key];
    if (typeof value === "string" && value.length > 0) out[key] = value;
  }
  return out;
}

/**
 * Exact-match conjunction over the resource type and every present label,
 * labels in key order so equal selectors render identically.
 */
export function buildResourceFilter(resource: ResourceSelector): string {
  const parts = [`resource.type=${quote(resource.type)}`];
  for (const [key, value] of Object.entries(presentLabels(resource.labels))) {
    parts.push(`resource.labels.${key}=${quote(value)}`);
  }
  return parts.join(" AND ");
}

/**
 * Full Cloud Logging filter for a window. Lines are implicitly AND-ed by the
 * logging query language.
 */
export function renderFilter(window: QueryWindow): string {
  const lines = [
    window.filter,
    `timestamp>=${quote(window.start.toISOString())}`,
    `timestamp<=${quote(window.end.toISOString())}`,
  ];
  if (window.severityFloor !== "DEFAULT") lines.push(`severity>=${window.severityFloor}`);
  if (window.textSearch) lines.push(quote(window.textSearch));
  if (window.customFilter) lines.push(`(${window.customFilter})`);
  return lines.join("\n");
}
