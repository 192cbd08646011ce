import { describe, expect, it } from "vitest";
import { createAnalyzer } from "../analyzer/createAnalyzer.js";
import type { QueryWindow } from "../domain/Analysis.js";
import type { Incident } from "../domain/Incident.js";
import { fixedClock } from "../ports/Clock.js";
import { MemoryLogSource } from "../sources/MemoryLogSource.js";
import { buildCollectionPayload, buildTriagePayload, incidentMetadata } from "./payload.js";

const window: QueryWindow = {
  start: new Date("2024-05-01T10:00:00Z"),
  end: new Date("2024-05-01T10:20:00Z"),
  resource: { type: "cloud_run_revision", labels: { service_name: "api" } },
  filter: 'resource.type="cloud_run_revision" AND resource.labels.service_name="api"',
  severityFloor: "ERROR",
  maxEntries: 50,
};

const incident: Incident = {
  incidentId: "0.abc",
  startedAt: new Date("2024-05-01T10:05:00Z"),
  resource: window.resource,
  policyName: "api errors",
  projectId: "demo-project",
};

const records = [
  {
    timestamp: "2024-05-01T10:06:00Z",
    severity: "ERROR",
    insertId: "i-1",
    logName: "projects/demo-project/logs/run.googleapis.com%2Fstderr",
    resource: window.resource,
    textPayload: "connection refused by db",
    trace: "projects/demo-project/traces/t1",
    httpRequest: { requestMethod: "GET", requestUrl: "/orders", status: 502, latency: "0.250s" },
  },
];

async function analyzer() {
  return createAnalyzer({ source: new MemoryLogSource(records), clock: fixedClock(new Date("2024-05-01T11:00:00Z")) });
}

describe("incidentMetadata", () => {
  it("uses unix seconds and nulls for absent fields", () => {
    expect(incidentMetadata(incident)).toEqual({
      incident_id: "0.abc",
      started_at: 1714557900,
      ended_at: null,
      state: null,
      summary: null,
      policy_name: "api errors",
      condition_name: null,
      resource: { type: "cloud_run_revision", labels: { service_name: "api" } },
      metric: null,
      observed_value: null,
      threshold_value: null,
      url: null,
    });
  });
});

describe("buildCollectionPayload", () => {
  it("projects entries with collection and incident metadata", async () => {
    const result = await (await analyzer()).collect(window);
    const payload = buildCollectionPayload(result, { incident });

    expect(payload.collection_metadata).toEqual({
      collected_at: "2024-05-01T11:00:00.000Z",
      total_entries: 1,
      skipped_records: 0,
      truncated: false,
      project_id: "demo-project",
      window_start: "2024-05-01T10:00:00.000Z",
      window_end: "2024-05-01T10:20:00.000Z",
      filter: [
        'resource.type="cloud_run_revision" AND resource.labels.service_name="api"',
        'timestamp>="2024-05-01T10:00:00.000Z"',
        'timestamp<="2024-05-01T10:20:00.000Z"',
        "severity>=ERROR",
      ].join("\n"),
    });
    expect(payload.incident_metadata?.incident_id).toBe("0.abc");
    expect(payload.logs).toEqual([
      {
        timestamp: "2024-05-01T10:06:00.000Z",
        severity: "ERROR",
        message: "connection refused by db",
        log_name: "projects/demo-project/logs/run.googleapis.com%2Fstderr",
        insert_id: "i-1",
        resource: { type: "cloud_run_revision", labels: { service_name: "api" } },
        labels: {},
        trace: "projects/demo-project/traces/t1",
        span_id: null,
        http_request: { method: "GET", url: "/orders", status: 502, latency_ms: 250 },
      },
    ]);
  });

  it("omits incident metadata on request", async () => {
    const result = await (await analyzer()).collect(window);
    const payload = buildCollectionPayload(result, { incident, includeMetadata: false, projectId: "override" });

    expect(payload).not.toHaveProperty("incident_metadata");
    expect(payload.collection_metadata.project_id).toBe("override");
  });
});

describe("buildTriagePayload", () => {
  it("carries the summary and recommendation texts", async () => {
    const report = await (await analyzer()).triage(window);
    const payload = buildTriagePayload(report);

    expect(payload.collection_metadata.project_id).toBeNull();
    expect(payload.summary.total_errors).toBe(1);
    expect(payload.summary.counts_by_type).toEqual({ NETWORK_ERROR: 1 });
    expect(payload.summary.groups).toEqual([
      {
        signature: "connection refused by db",
        error_type: "NETWORK_ERROR",
        count: 1,
        first_seen: "2024-05-01T10:06:00.000Z",
        last_seen: "2024-05-01T10:06:00.000Z",
        samples: ["connection refused by db"],
      },
    ]);
    expect(payload.summary.statistics.http_status_codes).toEqual({ "502": 1 });
    expect(payload.recommendations).toEqual([
      "[HIGH] Network/external service errors (1): Check external service status and network connectivity. Add retry logic and circuit breakers.",
    ]);
    expect(payload).not.toHaveProperty("narrative");
  });
});
