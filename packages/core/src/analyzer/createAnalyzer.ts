import type { CollectionResult, QueryWindow, TriageReport } from "../domain/Analysis.js";
import { type Classifier, createClassifier } from "../classify/classifier.js";
import type { ClassificationRule } from "../classify/rules.js";
import { type Clock, systemClock } from "../ports/Clock.js";
import { type LoggerPort, silentLogger } from "../ports/LoggerPort.js";
import type { LogSourcePort, SinkPort, SummarizerPort } from "../ports/index.js";
import type { RetryPolicy, Sleep } from "./collect.js";
import { type PipelineDeps, type RunOptions, runCollection, runPipeline } from "./pipeline.js";
import type { TimelineOptions } from "./timeline.js";

export interface AnalyzerConfig {
  source: LogSourcePort;
  rules?: readonly ClassificationRule[]; // ignored when `classifier` is given
  classifier?: Classifier;
  clock?: Clock;
  logger?: LoggerPort;
  sinks?: SinkPort[];
  summarizer?: SummarizerPort;
  pageSize?: number;
  retry?: Partial<RetryPolicy>;
  deadlineMs?: number; // aborts pagination, keeping partial results
  timeline?: TimelineOptions;
  samplesPerGroup?: number;
  sleep?: Sleep;
}

export interface Analyzer {
  triage(window: QueryWindow, opts?: RunOptions): Promise<TriageReport>;
  collect(window: QueryWindow, opts?: RunOptions): Promise<CollectionResult>;
}

function customActions(rules: readonly ClassificationRule[]): Record<string, string> {
  const actions: Record<string, string> = {};
  for (const rule of rules) {
    if (rule.recommendation && !(rule.errorType in actions)) actions[rule.errorType] = rule.recommendation;
  }
  return actions;
}

/**
 * One signal that fires on the caller's abort or on the deadline. `dispose`
 * must run once the invocation is over so the timer does not hold the process.
 */
function linkSignal(deadlineMs: number | undefined, outer: AbortSignal | undefined) {
  if (deadlineMs === undefined) return { signal: outer, dispose: () => undefined };

  const controller = new AbortController();
  const onAbort = () => controller.abort();
  const timer = setTimeout(onAbort, deadlineMs);
  if (outer?.aborted) controller.abort();
  outer?.addEventListener("abort", onAbort, { once: true });
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onAbort);
    },
  };
}

export function createAnalyzer(cfg: AnalyzerConfig): Analyzer {
  const classifier = cfg.classifier ?? createClassifier(cfg.rules);
  const clock = cfg.clock ?? systemClock;
  const logger = cfg.logger ?? silentLogger;
  const sinks = cfg.sinks ?? [];

  const deps: PipelineDeps = {
    source: cfg.source,
    classifier,
    clock,
    logger,
    collect: {
      ...(cfg.pageSize !== undefined ? { pageSize: cfg.pageSize } : {}),
      ...(cfg.retry ? { retry: cfg.retry } : {}),
      ...(cfg.sleep ? { sleep: cfg.sleep } : {}),
    },
    summarize: {
      ...(cfg.timeline ? { timeline: cfg.timeline } : {}),
      ...(cfg.samplesPerGroup !== undefined ? { samplesPerGroup: cfg.samplesPerGroup } : {}),
    },
    recommend: { customActions: customActions(classifier.rules) },
  };

  async function withDeadline<T>(opts: RunOptions, fn: (run: RunOptions) => Promise<T>): Promise<T> {
    const linked = linkSignal(cfg.deadlineMs, opts.signal);
    try {
      return await fn(linked.signal ? { signal: linked.signal } : {});
    } finally {
      linked.dispose();
    }
  }

  return {
    async triage(window, opts = {}): Promise<TriageReport> {
      const report = await withDeadline(opts, (run) => runPipeline(window, deps, run));

      if (cfg.summarizer && report.summary.totalEntries > 0) {
        try {
          report.narrative = await cfg.summarizer.summarize(report);
        } catch (err) {
          // the report stands without a narrative
          logger.warn("Summarizer failed", { error: err instanceof Error ? err.message : String(err) });
        }
      }

      await Promise.all(sinks.map((s) => s.publish(report)));
      return report;
    },

    async collect(window, opts = {}): Promise<CollectionResult> {
      return withDeadline(opts, (run) => runCollection(window, deps, run));
    },
  };
}
