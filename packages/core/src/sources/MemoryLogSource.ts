import type { QueryWindow } from "../domain/Analysis.js";
import { AdapterError, RecordParseError } from "../domain/errors.js";
import { type LogEntry, severityRank } from "../domain/LogEntry.js";
import { normalizeRecord } from "../normalize/normalizer.js";
import type { LogSourcePort, Page, PageRequest } from "../ports/LogSourcePort.js";

/**
 * In-process log store evaluated against the structured window rather than
 * the rendered filter string. Records that fail normalization are always
 * returned, so the normalizer can count them.
 */
export class MemoryLogSource implements LogSourcePort {
  private readonly records: unknown[] = [];

  constructor(records: readonly unknown[] = []) {
    this.records.push(...records);
  }

  append(...records: unknown[]): void {
    this.records.push(...records);
  }

  get size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records.length = 0;
  }

  async fetchPage(request: PageRequest): Promise<Page> {
    if (request.window.customFilter) {
      throw new AdapterError("custom filter expressions are not supported by the in-memory source");
    }
    const offset = request.pageToken ? Number(request.pageToken) : 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new AdapterError(`invalid page token ${request.pageToken}`);
    }

    const matching = this.matching(request.window);
    const records = matching.slice(offset, offset + request.pageSize);
    const next = offset + records.length;
    return next < matching.length ? { records, nextPageToken: String(next) } : { records };
  }

  private matching(window: QueryWindow): unknown[] {
    const floor = severityRank(window.severityFloor);
    const needle = window.textSearch?.toLowerCase();
    const hits: { raw: unknown; at: number }[] = [];
    const unparsable: unknown[] = [];

    this.records.forEach((raw, i) => {
      const entry = tryNormalize(raw, i);
      if (!entry) {
        unparsable.push(raw);
        return;
      }
      const keep =
        entry.timestamp >= window.start &&
        entry.timestamp <= window.end &&
        entry.resource.type === window.resource.type &&
        Object.entries(window.resource.labels).every(([k, v]) => entry.resource.labels[k] === v) &&
        severityRank(entry.severity) >= floor &&
        (!needle || JSON.stringify(raw).toLowerCase().includes(needle));
      if (keep) hits.push({ raw, at: entry.timestamp.getTime() });
    });

    // stable sort: equal timestamps keep insertion order
    hits.sort((a, b) => a.at - b.at);
    return [...hits.map((h) => h.raw), ...unparsable];
  }
}

function tryNormalize(raw: unknown, index: number): LogEntry | undefined {
  try {
    return normalizeRecord(raw, index);
  } catch (err) {
    if (err instanceof RecordParseError) return undefined;
    throw err;
  }
}
