import { settings } from "../config/settings.js";
import type { QueryWindow } from "../domain/Analysis.js";
import { AdapterError } from "../domain/errors.js";
import type { LogSourcePort, Page, PageRequest } from "../ports/LogSourcePort.js";
import { type LoggerPort, silentLogger } from "../ports/LoggerPort.js";
import { renderFilter } from "../query/filter.js";

export interface RetryPolicy {
  attempts: number;    // total tries per page, including the first
  baseDelayMs: number; // doubled after each failed try
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface CollectOptions {
  pageSize?: number;
  retry?: Partial<RetryPolicy>;
  signal?: AbortSignal;
  logger?: LoggerPort;
  sleep?: Sleep;
}

export interface CollectedRecords {
  records: unknown[];
  truncated: boolean;
  pages: number;
  filter: string;
}

/** Resolves early, without throwing, when the signal aborts. */
export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) return resolve();
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });

// gRPC status codes worth another try
const RETRIABLE_GRPC = new Set([4, 8, 10, 13, 14]);

function numericField(err: object, key: string): number | undefined {
  const value: unknown = Reflect.get(err, key);
  return typeof value === "number" ? value : undefined;
}

export function isRetriable(err: unknown): boolean {
  if (err instanceof AdapterError) return err.retriable;
  if (typeof err !== "object" || err === null) return false;
  const code = numericField(err, "code");
  if (code !== undefined && RETRIABLE_GRPC.has(code)) return true;
  const status = numericField(err, "status") ?? 0;
  if (status === 429 || status >= 500) return true;
  const message = err instanceof Error ? err.message : "";
  return /fetch|timeout|ECONNRESET|ETIMEDOUT|EAI_AGAIN|quota/i.test(message);
}

function describe(err: unknown): string {
  if (err instanceof AdapterError && err.cause instanceof Error) return err.cause.message;
  return err instanceof Error ? err.message : String(err);
}

const ABORTED = Symbol("aborted");

interface RetryContext extends RetryPolicy {
  logger: LoggerPort;
  sleep: Sleep;
  signal: AbortSignal | undefined;
}

async function fetchWithRetry(source: LogSourcePort, request: PageRequest, ctx: RetryContext): Promise<Page> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await source.fetchPage(request, ctx.signal);
    } catch (err) {
      if (ctx.signal?.aborted) throw ABORTED;
      if (attempt + 1 >= ctx.attempts || !isRetriable(err)) {
        throw new AdapterError(describe(err), { cause: err, attempts: attempt + 1 });
      }
      const delay = ctx.baseDelayMs * 2 ** attempt;
      ctx.logger.warn("Log source page failed; retrying", { attempt: attempt + 1, delayMs: delay, error: describe(err) });
      await ctx.sleep(delay, ctx.signal);
      if (ctx.signal?.aborted) throw ABORTED;
    }
  }
}

/**
 * Pages through the source until the window is exhausted, `maxEntries` is
 * reached or the signal aborts. Each page is retried with exponential
 * backoff; once retries run out the partial result travels on the thrown
 * AdapterError.
 */
export async function collectRecords(
  source: LogSourcePort,
  window: QueryWindow,
  opts: CollectOptions = {},
): Promise<CollectedRecords> {
  const pageSize = Math.max(1, opts.pageSize ?? settings.collection.pageSize);
  const attempts = Math.max(1, opts.retry?.attempts ?? settings.collection.retryAttempts);
  const baseDelayMs = Math.max(0, opts.retry?.baseDelayMs ?? settings.collection.retryBaseDelayMs);
  const logger = opts.logger ?? silentLogger;
  const sleep = opts.sleep ?? abortableSleep;
  const signal = opts.signal;
  const filter = renderFilter(window);

  const records: unknown[] = [];
  let pageToken: string | undefined;
  let pages = 0;

  while (records.length < window.maxEntries) {
    if (signal?.aborted) {
      logger.warn("Collection aborted; returning partial results", { collected: records.length, pages });
      return { records, truncated: true, pages, filter };
    }

    const remaining = window.maxEntries - records.length;
    const request: PageRequest = { filter, window, pageSize: Math.min(pageSize, remaining), ...(pageToken ? { pageToken } : {}) };

    let page: Page;
    try {
      page = await fetchWithRetry(source, request, { attempts, baseDelayMs, logger, sleep, signal });
    } catch (err) {
      if (err === ABORTED) {
        logger.warn("Collection aborted during a page fetch", { collected: records.length, pages });
        return { records, truncated: true, pages, filter };
      }
      const attemptsMade = err instanceof AdapterError ? err.attempts : 1;
      throw new AdapterError(`log source failed after ${attemptsMade} attempt(s): ${describe(err)}`, {
        cause: err instanceof AdapterError && err.cause !== undefined ? err.cause : err,
        partial: records,
        attempts: attemptsMade,
      });
    }

    pages += 1;
    const room = window.maxEntries - records.length;
    records.push(...page.records.slice(0, room));
    logger.debug("Fetched log page", { page: pages, records: page.records.length });

    if (page.records.length > room) return { records, truncated: true, pages, filter };
    pageToken = page.nextPageToken || undefined;
    if (!pageToken) return { records, truncated: false, pages, filter };
  }

  // cap reached with a page token still outstanding
  return { records, truncated: true, pages, filter };
}
