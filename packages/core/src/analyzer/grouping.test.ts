import { describe, expect, it } from "vitest";
import type { ClassifiedEntry } from "../domain/Analysis.js";
import { groupEntries, normalizeSignature } from "./grouping.js";

function entry(message: string, at: string, errorType = "EXCEPTION"): ClassifiedEntry {
  return {
    timestamp: new Date(at),
    message,
    errorType,
    resource: { type: "cloud_run_revision", labels: {} },
    labels: {},
  };
}

describe("normalizeSignature", () => {
  it("replaces numbers, quoted literals and ids with placeholders", () => {
    expect(normalizeSignature("Order 12345 failed for user 'alice'")).toBe("order <num> failed for user <str>");
    expect(normalizeSignature('Key "k-9" missing')).toBe("key <str> missing");
    expect(normalizeSignature("request 3f2c1a9e-1b2c-4d5e-8f90-123456789abc rejected")).toBe("request <id> rejected");
    expect(normalizeSignature("  Too   many\tspaces  ")).toBe("too many spaces");
  });

  it("maps messages differing only in variable data to one signature", () => {
    expect(normalizeSignature("Timeout after 30s on shard 4")).toBe(normalizeSignature("timeout after 120s on shard 7"));
  });

  it("is a fixed point on its own output", () => {
    const messages = [
      "Order 12345 failed for user 'alice'",
      "request 3f2c1a9e-1b2c-4d5e-8f90-123456789abc rejected at 0xdeadbeef",
      'ZeroDivisionError: division by zero in "calc.py", line 42',
      "plain words only",
    ];
    for (const m of messages) {
      const once = normalizeSignature(m);
      expect(normalizeSignature(once)).toBe(once);
    }
  });
});

describe("groupEntries", () => {
  const entries = [
    entry("Timeout after 30s on shard 4", "2024-05-01T10:00:00Z", "TIMEOUT"),
    entry("division by zero in batch 1", "2024-05-01T10:01:00Z", "CALCULATION_ERROR"),
    entry("Timeout after 45s on shard 2", "2024-05-01T10:02:00Z", "TIMEOUT"),
    entry("division by zero in batch 2", "2024-05-01T10:03:00Z", "CALCULATION_ERROR"),
    entry("Timeout after 10s on shard 9", "2024-05-01T10:04:00Z", "TIMEOUT"),
    entry("Timeout after 11s on shard 1", "2024-05-01T10:05:00Z", "TIMEOUT"),
    entry("disk quota warning", "2024-05-01T10:06:00Z", "UNKNOWN"),
  ];

  it("accumulates counts, first/last seen and the first three samples", () => {
    const [top] = groupEntries(entries);

    expect(top).toEqual({
      signature: "timeout after <num>s on shard <num>",
      errorType: "TIMEOUT",
      count: 4,
      firstSeen: new Date("2024-05-01T10:00:00Z"),
      lastSeen: new Date("2024-05-01T10:05:00Z"),
      samples: ["Timeout after 30s on shard 4", "Timeout after 45s on shard 2", "Timeout after 10s on shard 9"],
    });
  });

  it("sorts by count, then by most recent last-seen", () => {
    const groups = groupEntries([...entries, entry("disk quota warning", "2024-05-01T10:07:00Z", "UNKNOWN")]);
    expect(groups.map((g) => [g.signature, g.count])).toEqual([
      ["timeout after <num>s on shard <num>", 4],
      ["disk quota warning", 2],
      ["division by zero in batch <num>", 2],
    ]);
  });

  it("regrouping the representatives yields the same groups", () => {
    const groups = groupEntries(entries);
    const again = groupEntries(groups.map((g) => entry(g.signature, g.lastSeen.toISOString(), g.errorType)));

    const keys = (list: typeof groups) => list.map((g) => `${g.signature}|${g.errorType}`).sort();
    expect(keys(again)).toEqual(keys(groups));
    expect(again.every((g) => g.count === 1)).toBe(true);
  });

  it("honours a custom sample cap", () => {
    const [top] = groupEntries(entries, { samplesPerGroup: 1 });
    expect(top?.samples).toEqual(["Timeout after 30s on shard 4"]);
  });

  it("returns nothing for no entries", () => {
    expect(groupEntries([])).toEqual([]);
  });
});
