import { describe, expect, it, vi } from "vitest";
import type { QueryWindow } from "../domain/Analysis.js";
import { AdapterError } from "../domain/errors.js";
import type { LogSourcePort, Page, PageRequest } from "../ports/LogSourcePort.js";
import { MemoryLogSource } from "../sources/MemoryLogSource.js";
import { type Sleep, collectRecords, isRetriable } from "./collect.js";

const start = new Date("2024-05-01T10:00:00Z");

function window(maxEntries: number): QueryWindow {
  return {
    start,
    end: new Date("2024-05-01T11:00:00Z"),
    resource: { type: "cloud_run_revision", labels: {} },
    filter: 'resource.type="cloud_run_revision"',
    severityFloor: "DEFAULT",
    maxEntries,
  };
}

function records(n: number) {
  return Array.from({ length: n }, (_, i) => ({
    timestamp: new Date(start.getTime() + i * 1000).toISOString(),
    resource: { type: "cloud_run_revision" },
    textPayload: `line ${i}`,
  }));
}

const noSleep: Sleep = async () => undefined;

/** Fails the listed calls (1-based) before delegating. */
function flaky(inner: LogSourcePort, failOn: number[], error: () => unknown): LogSourcePort & { calls: PageRequest[] } {
  const calls: PageRequest[] = [];
  return {
    calls,
    async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<Page> {
      calls.push(request);
      if (failOn.includes(calls.length)) throw error();
      return inner.fetchPage(request, signal);
    },
  };
}

describe("collectRecords", () => {
  it("pages until the source is exhausted", async () => {
    const source = new MemoryLogSource(records(7));
    const out = await collectRecords(source, window(100), { pageSize: 3, sleep: noSleep });

    expect(out.records).toHaveLength(7);
    expect(out.pages).toBe(3);
    expect(out.truncated).toBe(false);
    expect(out.filter).toContain('timestamp>="2024-05-01T10:00:00.000Z"');
  });

  it("stops at the entry cap and reports truncation", async () => {
    const source = flaky(new MemoryLogSource(records(10)), [], () => undefined);
    const out = await collectRecords(source, window(5), { pageSize: 3, sleep: noSleep });

    expect(out.records).toHaveLength(5);
    expect(out.truncated).toBe(true);
    expect(source.calls.map((c) => c.pageSize)).toEqual([3, 2]);
  });

  it("is not truncated when the cap equals the number of records", async () => {
    const out = await collectRecords(new MemoryLogSource(records(4)), window(4), { pageSize: 2, sleep: noSleep });
    expect(out.records).toHaveLength(4);
    expect(out.truncated).toBe(false);
  });

  it("retries retriable failures with exponential backoff", async () => {
    const sleep = vi.fn<Sleep>(async () => undefined);
    const source = flaky(new MemoryLogSource(records(2)), [1, 2], () => new AdapterError("unavailable", { retriable: true }));
    const out = await collectRecords(source, window(10), { sleep, retry: { attempts: 4, baseDelayMs: 100 } });

    expect(out.records).toHaveLength(2);
    expect(sleep.mock.calls.map((c) => c[0])).toEqual([100, 200]);
  });

  it("surfaces partial results once retries are exhausted", async () => {
    const source = flaky(new MemoryLogSource(records(6)), [2, 3, 4], () => Object.assign(new Error("quota exceeded"), { code: 8 }));
    const failure = await collectRecords(source, window(100), {
      pageSize: 3,
      sleep: noSleep,
      retry: { attempts: 3, baseDelayMs: 1 },
    }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(AdapterError);
    if (!(failure instanceof AdapterError)) return;
    expect(failure.message).toBe("log source failed after 3 attempt(s): quota exceeded");
    expect(failure.partial).toHaveLength(3);
    expect(failure.truncated).toBe(true);
    expect(failure.attempts).toBe(3);
  });

  it("does not retry a non-retriable failure", async () => {
    const source = flaky(new MemoryLogSource(records(2)), [1], () => new AdapterError("permission denied"));
    await expect(collectRecords(source, window(10), { sleep: noSleep })).rejects.toThrow(
      "log source failed after 1 attempt(s): permission denied",
    );
    expect(source.calls).toHaveLength(1);
  });

  it("returns partial, truncated results when aborted", async () => {
    const controller = new AbortController();
    const inner = new MemoryLogSource(records(9));
    const source: LogSourcePort = {
      async fetchPage(request) {
        const page = await inner.fetchPage(request);
        controller.abort();
        return page;
      },
    };

    const out = await collectRecords(source, window(100), { pageSize: 3, signal: controller.signal, sleep: noSleep });
    expect(out.records).toHaveLength(3);
    expect(out.truncated).toBe(true);
    expect(out.pages).toBe(1);
  });
});

describe("isRetriable", () => {
  it("recognises transient failures", () => {
    expect(isRetriable(Object.assign(new Error("unavailable"), { code: 14 }))).toBe(true);
    expect(isRetriable(Object.assign(new Error("too many"), { status: 429 }))).toBe(true);
    expect(isRetriable(new Error("read ECONNRESET"))).toBe(true);
    expect(isRetriable(new AdapterError("nope", { retriable: false }))).toBe(false);
    expect(isRetriable(Object.assign(new Error("denied"), { code: 7 }))).toBe(false);
    expect(isRetriable("string failure")).toBe(false);
  });
});
