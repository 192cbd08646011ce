import type { ClassifiedEntry, CollectionResult, QueryWindow, TriageReport } from "../domain/Analysis.js";
import type { AdapterError } from "../domain/errors.js";
import type { Classifier } from "../classify/classifier.js";
import { normalizeRecords, sortByTimestamp } from "../normalize/normalizer.js";
import type { Clock } from "../ports/Clock.js";
import type { LoggerPort } from "../ports/LoggerPort.js";
import type { LogSourcePort } from "../ports/LogSourcePort.js";
import { type CollectOptions, collectRecords } from "./collect.js";
import { type RecommendOptions, recommend } from "./recommender.js";
import { type SummarizeOptions, summarize } from "./summarize.js";

export interface PipelineDeps {
  source: LogSourcePort;
  classifier: Classifier;
  clock: Clock;
  logger: LoggerPort;
  collect?: Omit<CollectOptions, "logger" | "signal">;
  summarize?: SummarizeOptions;
  recommend?: RecommendOptions;
}

export interface RunOptions {
  signal?: AbortSignal;
}

/** Fetch, normalize and order. The `logs` path: no classification. */
export async function runCollection(window: QueryWindow, deps: PipelineDeps, run: RunOptions = {}): Promise<CollectionResult> {
  // 1) fetch every page the window and cap allow
  const fetched = await collectRecords(deps.source, window, {
    ...deps.collect,
    logger: deps.logger,
    ...(run.signal ? { signal: run.signal } : {}),
  });

  // 2) normalize; bad records are counted, not fatal
  const batch = normalizeRecords(fetched.records);
  for (const failure of batch.failures) {
    deps.logger.warn("Skipped malformed log record", { index: failure.index, reason: failure.message });
  }

  // 3) one time-ordered sequence
  const entries = sortByTimestamp(batch.entries);

  deps.logger.info("Collected log entries", {
    fetched: fetched.records.length,
    entries: entries.length,
    skipped: batch.skipped,
    truncated: fetched.truncated,
    pages: fetched.pages,
  });

  return {
    window,
    entries,
    collection: {
      collectedAt: deps.clock.now(),
      fetched: fetched.records.length,
      skipped: batch.skipped,
      truncated: fetched.truncated,
      pages: fetched.pages,
      failures: batch.failures.map((f) => f.message),
    },
  };
}

export async function runPipeline(window: QueryWindow, deps: PipelineDeps, run: RunOptions = {}): Promise<TriageReport> {
  const collected = await runCollection(window, deps, run);

  // 4) classify
  const entries: ClassifiedEntry[] = collected.entries.map((e) => ({ ...e, errorType: deps.classifier.classify(e.message) }));

  // 5) group, timeline, statistics
  const summary = summarize(entries, window, deps.summarize);

  // 6) recommendations from the type counts
  const recommendations = recommend(summary.countsByType, deps.recommend);

  if (summary.totalEntries === 0) {
    deps.logger.info("No matching log entries in window", { start: window.start.toISOString(), end: window.end.toISOString() });
  }

  return { window, collection: collected.collection, entries, summary, recommendations };
}

/**
 * What survived a failed collection: the records gathered before the source
 * gave up, normalized and always flagged truncated.
 */
export function collectionFromPartial(window: QueryWindow, error: AdapterError, clock: Clock): CollectionResult {
  const batch = normalizeRecords(error.partial);
  return {
    window,
    entries: sortByTimestamp(batch.entries),
    collection: {
      collectedAt: clock.now(),
      fetched: error.partial.length,
      skipped: batch.skipped,
      truncated: true,
      pages: 0,
      failures: [error.message, ...batch.failures.map((f) => f.message)],
    },
  };
}
