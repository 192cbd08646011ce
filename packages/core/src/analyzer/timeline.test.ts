import { describe, expect, it } from "vitest";
import { bucketWidthMs, buildTimeline } from "./timeline.js";

const start = new Date("2024-05-01T10:00:00Z");
const at = (minutes: number) => ({ timestamp: new Date(start.getTime() + minutes * 60_000) });

describe("bucketWidthMs", () => {
  it("divides the window into twenty buckets", () => {
    expect(bucketWidthMs(60 * 60_000)).toBe(3 * 60_000);
  });

  it("never goes below one millisecond even when the minimum is zero", () => {
    expect(bucketWidthMs(0, { minWidthMs: 0 })).toBe(1);
  });

  it("never goes below one minute", () => {
    expect(bucketWidthMs(10 * 60_000)).toBe(60_000);
  });
});

describe("buildTimeline", () => {
  it("builds half-open buckets from the window start", () => {
    const end = new Date(start.getTime() + 60 * 60_000);
    const buckets = buildTimeline([at(0), at(2.99), at(3), at(59)], start, end);

    expect(buckets).toHaveLength(20);
    expect(buckets[0]).toEqual({ start, end: new Date(start.getTime() + 3 * 60_000), count: 2 });
    expect(buckets[1]?.count).toBe(1);
    expect(buckets[19]?.count).toBe(1);
  });

  it("counts entries at the inclusive window end and outside it in the edge buckets", () => {
    const end = new Date(start.getTime() + 10 * 60_000);
    const buckets = buildTimeline([at(-1), at(10), at(12), at(5)], start, end);

    expect(buckets).toHaveLength(10);
    expect(buckets[0]?.count).toBe(1);
    expect(buckets[5]?.count).toBe(1);
    expect(buckets[9]?.count).toBe(2);
  });

  it("bucket counts sum to the number of entries", () => {
    const end = new Date(start.getTime() + 90 * 60_000);
    const entries = Array.from({ length: 137 }, (_, i) => at((i * 7) % 95));
    const buckets = buildTimeline(entries, start, end);

    expect(buckets.reduce((sum, b) => sum + b.count, 0)).toBe(137);
  });

  it("keeps a single bucket for an empty window", () => {
    const buckets = buildTimeline([at(0)], start, start);
    expect(buckets).toEqual([{ start, end: new Date(start.getTime() + 60_000), count: 1 }]);
  });

  it("keeps every entry of a zero-length window with a zero minimum width", () => {
    const buckets = buildTimeline([at(0), at(0)], start, start, { minWidthMs: 0 });
    expect(buckets).toEqual([{ start, end: new Date(start.getTime() + 1), count: 2 }]);
  });
});
