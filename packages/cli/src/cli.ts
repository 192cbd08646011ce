import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
  AdapterError,
  ConfigurationError,
  IncidentParseError,
  InvalidWindowError,
  SEVERITIES,
  TriageError,
  buildCollectionPayload,
  buildWindowFromHours,
  buildWindowFromIncident,
  buildWindowFromRange,
  collectionFromPartial,
  computeStatistics,
  createAnalyzer,
  loadIncidentFile,
  makeConsoleSink,
  makeJsonFileSink,
  projectEntry,
  renderDetailed,
  renderStatistics,
  renderSummary,
  settings,
  systemClock,
} from "@logtriage/core";
import type {
  Clock,
  CollectionResult,
  Incident,
  LogSourcePort,
  LoggerPort,
  QueryWindow,
  Severity,
  SinkPort,
  Sleep,
  SummarizerPort,
  TriageReport,
} from "@logtriage/core";
import { makeCloudLoggingSource } from "@logtriage/adapter-gcp-logging";
import { makeGeminiSummarizer } from "@logtriage/adapter-gemini";
import { createLogger } from "@logtriage/adapter-winston";
import { type AppConfig, loadConfig } from "./config.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_ADAPTER = 3;

export type Write = (text: string) => void;

export interface CliDeps {
  env?: Readonly<Record<string, string | undefined>>;
  clock?: Clock;
  stdout?: Write;
  stderr?: Write;
  logger?: LoggerPort;
  createSource?: (projectId: string | undefined, config: AppConfig) => LogSourcePort;
  createSummarizer?: (config: AppConfig) => SummarizerPort;
  sleep?: Sleep;
}

interface Context {
  config: AppConfig;
  clock: Clock;
  stdout: Write;
  stderr: Write;
  logger: LoggerPort;
  createSource: NonNullable<CliDeps["createSource"]>;
  createSummarizer: NonNullable<CliDeps["createSummarizer"]>;
  sleep?: Sleep;
}

const lineWriter =
  (stream: NodeJS.WriteStream): Write =>
  (text) => {
    stream.write(text.endsWith("\n") ? text : `${text}\n`);
  };

/* ---------------- flags ---------------- */

const integer = (min: number) => z.coerce.number().int().min(min);
const severity = z
  .string()
  .transform((s) => s.toUpperCase())
  .pipe(z.enum(SEVERITIES));

const sharedFlags = {
  project: z.string().min(1).optional(),
  minutesBefore: integer(0).optional(),
  minutesAfter: integer(0).optional(),
  errorsOnly: z.boolean().default(false),
  metadata: z.boolean().default(true),
  output: z.string().min(1).optional(),
  stats: z.boolean().default(false),
};

const triageFlagsSchema = z.object({
  ...sharedFlags,
  hours: integer(1).optional(),
  incident: z.string().min(1).optional(),
  resourceType: z.string().min(1).optional(),
  label: z.array(z.string()).default([]),
  search: z.string().min(1).optional(),
  filter: z.string().min(1).optional(),
  severity: severity.optional(),
  detail: z.enum(["summary", "detailed", "raw"]).default("summary"),
  errorType: z.string().min(1).optional(),
  limit: integer(1).optional(),
  summarize: z.boolean().default(false),
});

const instant = z
  .string()
  .datetime({ offset: true, message: "must be an ISO 8601 timestamp" })
  .transform((s) => new Date(s));

const collectFlagsSchema = z.object({
  ...sharedFlags,
  incident: z.string().min(1).optional(),
  start: instant.optional(),
  end: instant.optional(),
  resourceType: z.string().min(1).optional(),
  label: z.array(z.string()).default([]),
  maxEntries: integer(1).optional(),
});

export type TriageFlags = z.infer<typeof triageFlagsSchema>;
export type CollectFlags = z.infer<typeof collectFlagsSchema>;

const kebab = (key: string) => key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);

function parseFlags<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `--${kebab(String(i.path[0] ?? ""))}: ${i.message}`);
    throw new ConfigurationError(`invalid options: ${issues.join("; ")}`);
  }
  return parsed.data;
}

/** `key=value` pairs; a repeated key keeps the last value. */
export function parseLabels(pairs: readonly string[]): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new InvalidWindowError(`label filter must look like key=value, got "${pair}"`);
    labels[pair.slice(0, eq)] = pair.slice(eq + 1);
  }
  return labels;
}

const appendValue = (value: string, previous: string[]) => [...previous, value];

/* ---------------- commands ---------------- */

async function writeJson(path: string, payload: unknown): Promise<string> {
  const resolved = resolve(path);
  await mkdir(dirname(resolved), { recursive: true });
  await writeFile(resolved, `${JSON.stringify(payload, null, 2)}\n`, "utf8");
  return resolved;
}

function rendererFor(flags: TriageFlags): (report: TriageReport) => string {
  switch (flags.detail) {
    case "detailed":
      return (report) => renderDetailed(report, flags.errorType ? { errorType: flags.errorType } : {});
    case "raw":
      return (report) => report.entries.map((e) => JSON.stringify(projectEntry(e))).join("\n");
    case "summary":
      return (report) => renderSummary(report);
  }
}

function analyzerFor(ctx: Context, source: LogSourcePort, extra: { sinks?: SinkPort[]; summarizer?: SummarizerPort } = {}) {
  return createAnalyzer({
    source,
    clock: ctx.clock,
    logger: ctx.logger,
    pageSize: ctx.config.pageSize,
    retry: ctx.config.retry,
    ...(ctx.config.deadlineMs !== undefined ? { deadlineMs: ctx.config.deadlineMs } : {}),
    ...(ctx.sleep ? { sleep: ctx.sleep } : {}),
    ...extra,
  });
}

/** On a failed collection, keep what was fetched before rethrowing. */
async function savePartial(
  ctx: Context,
  err: unknown,
  window: QueryWindow,
  output: string | undefined,
  payloadOpts: { incident?: Incident; projectId?: string; includeMetadata: boolean },
): Promise<void> {
  if (!(err instanceof AdapterError) || !output || err.partial.length === 0) return;
  const partial: CollectionResult = collectionFromPartial(window, err, ctx.clock);
  const path = await writeJson(output, buildCollectionPayload(partial, payloadOpts));
  ctx.logger.warn("Wrote partial results before failing", { path, entries: partial.entries.length });
}

async function runTriage(flags: TriageFlags, ctx: Context): Promise<TriageReport> {
  if (flags.incident && flags.hours !== undefined) {
    throw new InvalidWindowError("--hours and --incident are mutually exclusive");
  }
  const incident = flags.incident ? await loadIncidentFile(flags.incident, flags.project ? { projectId: flags.project } : {}) : undefined;
  const severityFloor: Severity =
    flags.severity ?? (flags.errorsOnly ? settings.window.errorsOnlySeverityFloor : settings.window.triageSeverityFloor);
  const windowOpts = {
    severityFloor,
    maxEntries: flags.limit ?? ctx.config.maxEntries ?? settings.collection.triageMaxEntries,
    textSearch: flags.search,
    customFilter: flags.filter,
  };

  const window = incident
    ? buildWindowFromIncident(incident, { ...windowOpts, minutesBefore: flags.minutesBefore, minutesAfter: flags.minutesAfter }, ctx.clock)
    : buildWindowFromHours(
        { ...windowOpts, hours: flags.hours ?? 24, resourceType: flags.resourceType, labels: parseLabels(flags.label) },
        ctx.clock,
      );

  const projectId = flags.project ?? incident?.projectId ?? ctx.config.projectId;
  const payloadOpts = { ...(incident ? { incident } : {}), ...(projectId ? { projectId } : {}), includeMetadata: flags.metadata };
  const sinks = [makeConsoleSink(rendererFor(flags), ctx.stdout)];
  if (flags.output) sinks.push(makeJsonFileSink(resolve(flags.output), payloadOpts));

  const analyzer = analyzerFor(ctx, ctx.createSource(projectId, ctx.config), {
    sinks,
    ...(flags.summarize ? { summarizer: ctx.createSummarizer(ctx.config) } : {}),
  });

  let report: TriageReport;
  try {
    report = await analyzer.triage(window);
  } catch (err) {
    await savePartial(ctx, err, window, flags.output, payloadOpts);
    throw err;
  }
  if (flags.stats) ctx.stdout(renderStatistics(report.summary.statistics));
  return report;
}

/** Incident window, or an explicit `--start`/`--end` range on a resource. */
async function collectWindow(flags: CollectFlags, ctx: Context): Promise<{ window: QueryWindow; incident?: Incident }> {
  const severityFloor = flags.errorsOnly ? settings.window.errorsOnlySeverityFloor : settings.window.collectSeverityFloor;
  const maxEntries = flags.maxEntries ?? settings.collection.collectMaxEntries;
  const ranged = flags.start !== undefined || flags.end !== undefined;

  if (flags.incident) {
    if (ranged) throw new InvalidWindowError("--start/--end and --incident are mutually exclusive");
    const incident = await loadIncidentFile(flags.incident, flags.project ? { projectId: flags.project } : {});
    const window = buildWindowFromIncident(
      incident,
      { minutesBefore: flags.minutesBefore, minutesAfter: flags.minutesAfter, severityFloor, maxEntries },
      ctx.clock,
    );
    return { window, incident };
  }
  if (!flags.start || !flags.end) {
    throw new InvalidWindowError("collect needs --incident, or both --start and --end");
  }
  const window = buildWindowFromRange({
    start: flags.start,
    end: flags.end,
    resourceType: flags.resourceType,
    labels: parseLabels(flags.label),
    severityFloor,
    maxEntries,
  });
  return { window };
}

async function runCollect(flags: CollectFlags, ctx: Context): Promise<CollectionResult> {
  const { window, incident } = await collectWindow(flags, ctx);
  const projectId = incident?.projectId ?? flags.project ?? ctx.config.projectId;
  const payloadOpts = { ...(incident ? { incident } : {}), ...(projectId ? { projectId } : {}), includeMetadata: flags.metadata };

  let result: CollectionResult;
  try {
    result = await analyzerFor(ctx, ctx.createSource(projectId, ctx.config)).collect(window);
  } catch (err) {
    await savePartial(ctx, err, window, flags.output, payloadOpts);
    throw err;
  }
  if (result.entries.length === 0) ctx.logger.warn("No log entries matched the window");

  const payload = buildCollectionPayload(result, payloadOpts);
  if (flags.output) {
    const path = await writeJson(flags.output, payload);
    ctx.logger.info("Wrote collected logs", { path, entries: result.entries.length });
  } else {
    ctx.stdout(JSON.stringify(payload, null, 2));
  }

  // stdout carries the payload when no output file was given
  if (flags.stats) (flags.output ? ctx.stdout : ctx.stderr)(renderStatistics(computeStatistics(result.entries)));
  return result;
}

/* ---------------- program ---------------- */

function buildProgram(ctx: Context, stderr: Write): Command {
  const program = new Command()
    .name("logtriage")
    .description("Collect and triage Cloud Logging entries around an incident")
    .version("0.1.0")
    .exitOverride()
    .configureOutput({ writeOut: ctx.stdout, writeErr: stderr });

  program
    .command("triage")
    .description("Classify, group and summarize errors for the last N hours or an incident window")
    .option("-p, --project <id>", "Google Cloud project id")
    .option("--hours <n>", "hours to look back (default: 24)")
    .option("-i, --incident <file>", "incident descriptor JSON (alert payload)")
    .option("-r, --resource-type <type>", "monitored resource type, e.g. cloud_run_revision")
    .option("--label <key=value>", "resource label filter (repeatable)", appendValue, [])
    .option("-t, --search <text>", "free-text search")
    .option("-f, --filter <expr>", "extra Cloud Logging filter expression")
    .option("-s, --severity <level>", "minimum severity (default: WARNING)")
    .option("-d, --detail <level>", "summary | detailed | raw", "summary")
    .option("-e, --error-type <type>", "restrict the detailed view to one error type")
    .option("-l, --limit <n>", "maximum entries to fetch")
    .option("-b, --minutes-before <n>", "minutes before the incident start (default: 5)")
    .option("-a, --minutes-after <n>", "minutes after the incident end (default: 5)")
    .option("--errors-only", "only ERROR and above")
    .option("--no-metadata", "leave incident metadata out of the JSON output")
    .option("-o, --output <file>", "also write the triage payload as JSON")
    .option("--stats", "print log statistics")
    .option("--summarize", "add a Gemini narrative to the report")
    .action(async (raw: unknown) => {
      await runTriage(parseFlags(triageFlagsSchema, raw), ctx);
    });

  program
    .command("collect")
    .description("Collect the logs around an incident, or in an explicit time range, into a JSON file")
    .option("-i, --incident <file>", "incident descriptor JSON (alert payload)")
    .option("--start <time>", "range start, ISO 8601 (instead of --incident)")
    .option("--end <time>", "range end, ISO 8601 (instead of --incident)")
    .option("-r, --resource-type <type>", "monitored resource type for a --start/--end range")
    .option("--label <key=value>", "resource label filter for a --start/--end range (repeatable)", appendValue, [])
    .option("-o, --output <file>", "output JSON file (default: stdout)")
    .option("-p, --project <id>", "Google Cloud project id (default: from the incident)")
    .option("-b, --minutes-before <n>", "minutes before the incident start", String(settings.window.minutesBefore))
    .option("-a, --minutes-after <n>", "minutes after the incident end", String(settings.window.minutesAfter))
    .option("-m, --max-entries <n>", "maximum entries to collect", String(settings.collection.collectMaxEntries))
    .option("-e, --errors-only", "only ERROR and above (default: all severities)")
    .option("--no-metadata", "leave incident metadata out of the output")
    .option("-s, --stats", "print statistics about the collected logs")
    .action(async (raw: unknown) => {
      await runCollect(parseFlags(collectFlagsSchema, raw), ctx);
    });

  return program;
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof CommanderError) return err.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  if (err instanceof InvalidWindowError || err instanceof IncidentParseError || err instanceof ConfigurationError) {
    return EXIT_USAGE;
  }
  if (err instanceof AdapterError) return EXIT_ADAPTER;
  return EXIT_FAILURE;
}

/** Runs one invocation and returns the process exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? lineWriter(process.stdout);
  const stderr = deps.stderr ?? lineWriter(process.stderr);
  let logger = deps.logger;

  try {
    const config = loadConfig(deps.env ?? process.env);
    logger ??= createLogger({ level: config.logLevel, format: config.logFormat });

    const ctx: Context = {
      config,
      clock: deps.clock ?? systemClock,
      stdout,
      stderr,
      logger,
      createSource: deps.createSource ?? ((projectId) => makeCloudLoggingSource(projectId ? { projectId } : {})),
      createSummarizer:
        deps.createSummarizer ?? ((cfg) => makeGeminiSummarizer({ ...cfg.gemini })),
      ...(deps.sleep ? { sleep: deps.sleep } : {}),
    };

    await buildProgram(ctx, stderr).parseAsync([...argv], { from: "user" });
    return EXIT_OK;
  } catch (err) {
    const code = exitCodeFor(err);
    // commander has already printed its own usage message
    if (err instanceof CommanderError) return code;

    logger ??= createLogger();
    const message = err instanceof Error ? err.message : String(err);
    logger.error(message, {
      code: err instanceof TriageError ? err.code : "UNEXPECTED",
      ...(err instanceof Error && err.cause instanceof Error ? { cause: err.cause.message } : {}),
      ...(err instanceof AdapterError ? { partialRecords: err.partial.length, truncated: err.truncated } : {}),
    });
    return code;
  }
}
