import { describe, expect, it } from "vitest";
import { InvalidWindowError } from "../domain/errors.js";
import type { Incident } from "../domain/Incident.js";
import { fixedClock } from "../ports/Clock.js";
import { buildResourceFilter, renderFilter } from "./filter.js";
import { buildWindowFromHours, buildWindowFromIncident, buildWindowFromRange } from "./windowBuilder.js";

const T = 1_700_000_000; // unix seconds

function incident(overrides: Partial<Incident> = {}): Incident {
  return {
    incidentId: "inc-1",
    startedAt: new Date(T * 1000),
    resource: { type: "cloud_run_revision", labels: { service_name: "orders-api" } },
    ...overrides,
  };
}

describe("buildWindowFromIncident", () => {
  it("extends an open incident to now plus the after-buffer", () => {
    const clock = fixedClock((T + 600) * 1000);
    const w = buildWindowFromIncident(incident(), { minutesBefore: 5, minutesAfter: 5 }, clock);

    expect(w.start.getTime()).toBe((T - 300) * 1000);
    expect(w.end.getTime()).toBe((T + 600 + 300) * 1000);
  });

  it("uses ended_at when the incident is closed", () => {
    const clock = fixedClock((T + 86_400) * 1000);
    const w = buildWindowFromIncident(incident({ endedAt: new Date((T + 120) * 1000) }), { minutesBefore: 1, minutesAfter: 2 }, clock);

    expect(w.start.toISOString()).toBe(new Date((T - 60) * 1000).toISOString());
    expect(w.end.toISOString()).toBe(new Date((T + 120 + 120) * 1000).toISOString());
  });

  it("defaults both buffers to five minutes", () => {
    const w = buildWindowFromIncident(incident({ endedAt: new Date(T * 1000) }), {}, fixedClock(0));
    expect(w.end.getTime() - w.start.getTime()).toBe(10 * 60_000);
  });

  it("window length equals incident span plus both buffers", () => {
    const now = (T + 3_600) * 1000;
    const cases: [number, number, number | undefined][] = [
      [0, 0, undefined],
      [5, 5, undefined],
      [30, 15, T + 900],
      [0, 60, T + 10],
      [120, 0, T],
    ];
    for (const [before, after, endedAt] of cases) {
      const inc = incident(endedAt === undefined ? {} : { endedAt: new Date(endedAt * 1000) });
      const w = buildWindowFromIncident(inc, { minutesBefore: before, minutesAfter: after }, fixedClock(now));
      const anchor = endedAt === undefined ? now : endedAt * 1000;
      expect(w.end.getTime() - w.start.getTime()).toBe(anchor - T * 1000 + (before + after) * 60_000);
    }
  });

  it("rejects negative or fractional buffers", () => {
    expect(() => buildWindowFromIncident(incident(), { minutesBefore: -1 }, fixedClock(0))).toThrow(InvalidWindowError);
    expect(() => buildWindowFromIncident(incident(), { minutesAfter: 1.5 }, fixedClock(0))).toThrow(InvalidWindowError);
  });

  it("rejects a window whose start is after its end", () => {
    const inc = incident({ endedAt: new Date((T - 3_600) * 1000) });
    expect(() => buildWindowFromIncident(inc, { minutesBefore: 0, minutesAfter: 0 }, fixedClock(0))).toThrow(
      InvalidWindowError,
    );
  });

  it("rejects an end beyond the representable time range", () => {
    const inc = incident({ endedAt: new Date(1e16) });
    expect(() => buildWindowFromIncident(inc, {}, fixedClock(0))).toThrow(
      "window bounds fall outside the representable time range",
    );
  });

  it("drops empty label values from the resource filter", () => {
    const inc = incident({
      resource: { type: "cloud_run_revision", labels: { service_name: "orders-api", revision_name: "", location: "us-central1" } },
    });
    const w = buildWindowFromIncident(inc, {}, fixedClock(T * 1000));

    expect(w.resource.labels).toEqual({ location: "us-central1", service_name: "orders-api" });
    expect(w.filter).toBe(
      'resource.type="cloud_run_revision" AND resource.labels.location="us-central1" AND resource.labels.service_name="orders-api"',
    );
  });

  it("carries severity floor and cap options", () => {
    const w = buildWindowFromIncident(incident(), { severityFloor: "DEFAULT", maxEntries: 50 }, fixedClock(T * 1000));
    expect(w.severityFloor).toBe("DEFAULT");
    expect(w.maxEntries).toBe(50);
  });
});

describe("buildWindowFromHours", () => {
  const clock = fixedClock(Date.parse("2024-05-01T12:00:00.000Z"));

  it("spans the last N hours up to now", () => {
    const w = buildWindowFromHours({ hours: 2, resourceType: "gce_instance" }, clock);
    expect(w.start.toISOString()).toBe("2024-05-01T10:00:00.000Z");
    expect(w.end.toISOString()).toBe("2024-05-01T12:00:00.000Z");
    expect(w.severityFloor).toBe("WARNING");
    expect(w.maxEntries).toBe(1000);
  });

  it("requires a resource type", () => {
    expect(() => buildWindowFromHours({ hours: 1 }, clock)).toThrow(InvalidWindowError);
  });

  it("requires a positive integer number of hours", () => {
    expect(() => buildWindowFromHours({ hours: 0, resourceType: "gce_instance" }, clock)).toThrow(InvalidWindowError);
    expect(() => buildWindowFromHours({ hours: 2.5, resourceType: "gce_instance" }, clock)).toThrow(InvalidWindowError);
  });

  it("rejects a lookback that reaches before the representable time range", () => {
    expect(() => buildWindowFromHours({ hours: 3_000_000_000, resourceType: "gce_instance" }, clock)).toThrow(
      InvalidWindowError,
    );
  });

  it("rejects a non-positive entry cap", () => {
    expect(() => buildWindowFromHours({ hours: 1, resourceType: "gce_instance", maxEntries: 0 }, clock)).toThrow(
      InvalidWindowError,
    );
  });
});

describe("buildWindowFromRange", () => {
  const start = new Date("2024-05-01T10:00:00.000Z");
  const end = new Date("2024-05-01T11:30:00.000Z");

  it("uses the given bounds and resource", () => {
    const w = buildWindowFromRange({
      start,
      end,
      resourceType: "k8s_container",
      labels: { namespace_name: "payments" },
      severityFloor: "DEFAULT",
      maxEntries: 200,
    });
    expect(w.start).toBe(start);
    expect(w.end).toBe(end);
    expect(w.filter).toBe('resource.type="k8s_container" AND resource.labels.namespace_name="payments"');
    expect(w.severityFloor).toBe("DEFAULT");
    expect(w.maxEntries).toBe(200);
  });

  it("accepts a zero-length range", () => {
    expect(buildWindowFromRange({ start, end: start, resourceType: "gce_instance" }).end).toBe(start);
  });

  it("requires a resource type", () => {
    expect(() => buildWindowFromRange({ start, end })).toThrow("a resource type is required to scope the query");
  });

  it("rejects a start after the end", () => {
    expect(() => buildWindowFromRange({ start: end, end: start, resourceType: "gce_instance" })).toThrow(
      InvalidWindowError,
    );
  });

  it("rejects invalid instants", () => {
    expect(() => buildWindowFromRange({ start, end: new Date(Number.NaN), resourceType: "gce_instance" })).toThrow(
      InvalidWindowError,
    );
  });
});

describe("renderFilter", () => {
  const clock = fixedClock(Date.parse("2024-05-01T12:00:00.000Z"));

  it("renders resource, time range, severity, text and custom filter lines", () => {
    const w = buildWindowFromHours(
      {
        hours: 1,
        resourceType: "cloud_run_revision",
        labels: { service_name: "orders-api" },
        severityFloor: "ERROR",
        textSearch: "division by zero",
        customFilter: 'labels.error_type="CALCULATION_ERROR"',
      },
      clock,
    );

    expect(renderFilter(w).split("\n")).toEqual([
      'resource.type="cloud_run_revision" AND resource.labels.service_name="orders-api"',
      'timestamp>="2024-05-01T11:00:00.000Z"',
      'timestamp<="2024-05-01T12:00:00.000Z"',
      "severity>=ERROR",
      '"division by zero"',
      '(labels.error_type="CALCULATION_ERROR")',
    ]);
  });

  it("omits the severity line when every severity is wanted", () => {
    const w = buildWindowFromHours({ hours: 1, resourceType: "gce_instance", severityFloor: "DEFAULT" }, clock);
    expect(renderFilter(w)).not.toContain("severity");
  });

  it("escapes quotes in label values", () => {
    expect(buildResourceFilter({ type: "k8s_container", labels: { pod_name: 'a"b' } })).toBe(
      'resource.type="k8s_container" AND resource.labels.pod_name="a\\"b"',
    );
  });
});
