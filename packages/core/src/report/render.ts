import type { LogStatistics, Recommendation, TriageReport } from "../domain/Analysis.js";
import type { ErrorType } from "../domain/ErrorType.js";

const RULE = "=".repeat(80);
const THIN = "-".repeat(80);

function clip(text: string, width: number): string {
  const flat = text.replace(/\s+/g, " ");
  return flat.length > width ? `${flat.slice(0, width - 3)}...` : flat;
}

/** Plain grid table, one column per header. */
export function table(headers: string[], rows: (string | number)[][]): string {
  const cells = [headers, ...rows.map((r) => r.map(String))];
  const widths = headers.map((_, c) => Math.max(...cells.map((r) => (r[c] ?? "").length)));
  const border = `+${widths.map((w) => "-".repeat(w + 2)).join("+")}+`;
  const line = (r: string[]) => `| ${widths.map((w, c) => (r[c] ?? "").padEnd(w)).join(" | ")} |`;
  const [head, ...body] = cells;
  return [border, line(head ?? []), border.replace(/-/g, "="), ...body.map(line), border].join("\n");
}

export function renderRecommendations(recommendations: readonly Recommendation[]): string {
  const lines = ["SUGGESTED NEXT STEPS", THIN];
  const typed = recommendations.filter((r) => r.errorType !== undefined);
  if (typed.length === 0) {
    lines.push(recommendations[0]?.text ?? "no errors found in window");
    return lines.join("\n");
  }
  lines.push(
    table(
      ["Priority", "Type", "Count", "Recommended Action"],
      typed.map((r) => [r.priority, r.errorType ?? "", r.count, r.action]),
    ),
  );
  return lines.join("\n");
}

export function renderSummary(report: TriageReport, opts: { topGroups?: number; recent?: number } = {}): string {
  const { summary, collection } = report;
  const out = [RULE, "ERROR TRIAGE SUMMARY", RULE, ""];
  out.push(`Window:       ${report.window.start.toISOString()} -> ${report.window.end.toISOString()}`);
  out.push(`Total errors: ${summary.totalEntries}`);
  out.push(`Skipped:      ${collection.skipped}${collection.truncated ? "   (truncated: entry cap or deadline reached)" : ""}`);
  out.push("");

  const types = Object.entries(summary.countsByType)
    .map(([type, n]): [string, number] => [type, n ?? 0])
    .sort((a, b) => b[1] - a[1]);
  out.push("Error Types Breakdown:", THIN, table(["Error Type", "Count"], types), "");

  const groups = summary.groups.slice(0, opts.topGroups ?? 10);
  out.push(
    "Top Error Groups (Similar Errors):",
    THIN,
    table(
      ["Message Pattern", "Type", "Occurrences", "Last Seen"],
      groups.map((g) => [clip(g.signature, 60), g.errorType, g.count, g.lastSeen.toISOString()]),
    ),
    "",
  );

  const recent = [...report.entries].reverse().slice(0, opts.recent ?? 20);
  out.push(
    "Recent Errors Timeline:",
    THIN,
    table(
      ["Timestamp", "Severity", "Resource", "Message"],
      recent.map((e) => [e.timestamp.toISOString(), e.severity ?? "-", e.resource.type, clip(e.message, 60)]),
    ),
    "",
  );

  const peak = Math.max(1, ...summary.timeline.map((b) => b.count));
  out.push(
    "Timeline:",
    THIN,
    ...summary.timeline.map((b) => `${b.start.toISOString()} ${String(b.count).padStart(6)} ${"#".repeat(Math.round((b.count / peak) * 40))}`),
    "",
  );

  out.push(renderRecommendations(report.recommendations));
  if (report.narrative) out.push("", "NARRATIVE", THIN, report.narrative);
  return out.join("\n");
}

export function renderDetailed(report: TriageReport, opts: { errorType?: ErrorType; limit?: number } = {}): string {
  const limit = opts.limit ?? 10;
  const pool = opts.errorType ? report.entries.filter((e) => e.errorType === opts.errorType) : report.entries;
  const chosen = [...pool].reverse().slice(0, limit);
  const out = [RULE, "DETAILED ERROR ANALYSIS", RULE];
  out.push(
    opts.errorType
      ? `Showing ${chosen.length} errors of type: ${opts.errorType}`
      : `Showing ${chosen.length} most recent errors`,
  );

  chosen.forEach((e, i) => {
    out.push("", RULE, `Error #${i + 1}`, RULE);
    out.push(`Timestamp:    ${e.timestamp.toISOString()}`);
    out.push(`Severity:     ${e.severity ?? "-"}`);
    out.push(`Type:         ${e.errorType}`);
    out.push(`Resource:     ${e.resource.type}`);
    out.push(`Service:      ${e.resource.labels["service_name"] ?? "N/A"}`);
    out.push(`Revision:     ${e.resource.labels["revision_name"] ?? "N/A"}`);
    out.push(`Insert ID:    ${e.insertId ?? "N/A"}`);
    if (e.traceId) out.push(`Trace:        ${e.traceId}`);
    if (e.http) out.push(`HTTP:         ${e.http.method ?? "?"} ${e.http.url ?? "?"} -> ${e.http.status ?? "?"}`);
    out.push("", "Message:", THIN, e.message, THIN);
    const labels = Object.entries(e.labels);
    if (labels.length) out.push("", "Labels:", ...labels.map(([k, v]) => `  ${k}: ${v}`));
  });
  return out.join("\n");
}

export function renderStatistics(stats: LogStatistics): string {
  const out = ["LOG STATISTICS", THIN];
  out.push(`Total entries: ${stats.totalEntries}`);
  out.push(`Time range: ${stats.earliest?.toISOString() ?? "-"} to ${stats.latest?.toISOString() ?? "-"}`);
  out.push(`Unique traces: ${stats.uniqueTraces}`);
  out.push("", "By severity:");
  for (const [severity, n] of Object.entries(stats.bySeverity).sort(([a], [b]) => a.localeCompare(b))) {
    out.push(`  ${severity}: ${n}`);
  }
  out.push("", "By log type:");
  for (const [name, n] of Object.entries(stats.byLogName).sort((a, b) => b[1] - a[1]).slice(0, 10)) {
    out.push(`  ${name}: ${n}`);
  }
  const codes = Object.entries(stats.httpStatusCodes).sort(([a], [b]) => Number(a) - Number(b));
  if (codes.length) {
    out.push("", "HTTP status codes:");
    for (const [code, n] of codes) out.push(`  ${code}: ${n}`);
  }
  return out.join("\n");
}
