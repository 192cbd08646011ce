import { GoogleGenerativeAI, type GenerateContentRequest, type SingleRequestOptions } from "@google/generative-ai";
import { ConfigurationError, severityRank } from "@logtriage/core";
import type { SummarizerPort, TriageReport } from "@logtriage/core";

/** The slice of a Gemini GenerativeModel the summarizer calls. */
export interface ContentModel {
  generateContent(
    request: GenerateContentRequest,
    options?: SingleRequestOptions,
  ): Promise<{ response: { text(): string } }>;
}

export interface GeminiSummarizerOptions {
  apiKey?: string;         // default: process.env.GEMINI_API_KEY
  model?: string;          // default: process.env.GEMINI_MODEL || "gemini-1.5-flash"
  client?: ContentModel;   // replaces the Gemini model, e.g. in tests
  topGroups?: number;      // default: 5
  temperature?: number;    // default: 0.2
  maxRetries?: number;     // default: 2
  timeoutMs?: number;      // default: 15000
  sleep?: (ms: number) => Promise<void>;
}

export type Level = "error" | "warn" | "info";
export type Priority = "P0" | "P1" | "P2" | "P3";

export interface SummaryJSON {
  title: string;
  probable_cause: string;
  error_level: Level;
  priority: Priority;
  components_to_check: string[];
  commands_to_run: string[];
  checks: string[];
  fixes: string[];
  related_docs: string[];
  confidence: number;
}

const LEVELS: readonly Level[] = ["error", "warn", "info"];
const PRIORITIES: readonly Priority[] = ["P0", "P1", "P2", "P3"];

function resolveModel(opts: GeminiSummarizerOptions): ContentModel {
  if (opts.client) return opts.client;
  const apiKey = opts.apiKey || process.env.GEMINI_API_KEY;
  if (!apiKey) throw new ConfigurationError("GEMINI_API_KEY not set");

  const modelId = opts.model || process.env.GEMINI_MODEL || "gemini-1.5-flash";
  return new GoogleGenerativeAI(apiKey).getGenerativeModel({
    model: modelId,
    generationConfig: { temperature: opts.temperature ?? 0.2 },
  });
}

export function makeGeminiSummarizer(opts: GeminiSummarizerOptions = {}): SummarizerPort {
  const model = resolveModel(opts);
  const topGroups = Math.max(1, opts.topGroups ?? 5);
  const maxRetries = Math.max(0, opts.maxRetries ?? 2);
  const timeoutMs = Math.max(1000, opts.timeoutMs ?? 15000);
  const sleep = opts.sleep ?? ((ms: number) => new Promise<void>((r) => setTimeout(r, ms)));

  return {
    async summarize(report: TriageReport, hint?: string): Promise<string> {
      const prompt = buildPrompt(report, topGroups, hint);

      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), timeoutMs);

      try {
        const jsonText = await withRetries(maxRetries, sleep, async () => {
          const res = await model.generateContent(
            { contents: [{ role: "user", parts: [{ text: prompt }] }] },
            { signal: controller.signal },
          );
          return res.response.text().trim();
        });
        return formatForConsole(normalizeJSON(jsonText, report));
      } finally {
        clearTimeout(timer);
      }
    },
  };
}

/* ---------------- prompt ---------------- */

const SCHEMA_HINT = `
Return ONLY valid JSON (no backticks). Use this exact shape:
{
  "title": string,
  "probable_cause": string,
  "error_level": "error"|"warn"|"info",
  "priority": "P0"|"P1"|"P2"|"P3",
  "components_to_check": string[],
  "commands_to_run": string[],
  "checks": string[],
  "fixes": string[],
  "related_docs": string[] | [],
  "confidence": number
}`;

export function buildPrompt(report: TriageReport, topGroups: number, hint?: string): string {
  const { summary, window } = report;
  const blocks = summary.groups
    .slice(0, topGroups)
    .map((g, i) => {
      const header = `#${i + 1} [${g.errorType}] x${g.count} ${scrubPII(g.signature)}`;
      const samples = g.samples.length ? `SAMPLES:\n${g.samples.map((s) => scrubPII(s)).join("\n")}` : "";
      const seeded = extractPathsFromText(g.samples.join("\n"));
      const seedPart = seeded.length ? `SEED_FILES:\n${seeded.join("\n")}` : "";
      return [header, samples, seedPart].filter(Boolean).join("\n");
    })
    .join("\n\n");

  const steps = report.recommendations.map((r) => `- ${r.text}`).join("\n");

  return `
You are a senior SRE. Read the grouped errors from one incident window and produce a terse, actionable analysis.

Guidelines:
- Be specific about services, files or modules named in the samples.
- Include concrete CLI checks (e.g., "gcloud logging read", "kubectl logs <pod>").
- Prioritize least-risk, fastest fixes first; if unsure, propose useful checks and set confidence.
- If SEED_FILES are provided, consider them in "components_to_check".

${SCHEMA_HINT}

Window: ${window.start.toISOString()} to ${window.end.toISOString()} (${window.resource.type})
Total errors: ${summary.totalEntries}
${hint ? `Operator note: ${scrubPII(hint)}\n` : ""}
Error groups:
${blocks}

Rule-based next steps:
${steps}
`;
}

/* ---------------- helpers ---------------- */

function statusOf(err: unknown): number {
  if (typeof err !== "object" || err === null) return 0;
  const status: unknown = Reflect.get(err, "status");
  return typeof status === "number" ? status : 0;
}

async function withRetries<T>(retries: number, sleep: (ms: number) => Promise<void>, fn: () => Promise<T>): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      // retry on rate limits, 5xx and fetch failures
      const msg = err instanceof Error ? err.message : String(err);
      const status = statusOf(err);
      const retriable = status === 429 || status >= 500 || /fetch|timeout|ECONNRESET|ETIMEDOUT/i.test(msg);
      if (attempt < retries && retriable) {
        await sleep(200 * 2 ** attempt);
        continue;
      }
      if (status === 404) {
        throw new ConfigurationError(`Gemini model not found: check GEMINI_MODEL (${msg})`, { cause: err });
      }
      throw err;
    }
  }
}

export function scrubPII(text: string): string {
  return text
    // bearer/api keys
    .replace(/(bearer|api[-_ ]?key)\s+[a-z0-9_-]{8,}/gi, "$1 ****")
    // JWT
    .replace(/\beyJ[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+\.[A-Za-z0-9_-]+/g, "***.***.***")
    // emails
    .replace(/[A-Z0-9._%+-]+@[A-Z0-9.-]+\.[A-Z]{2,}/gi, "****@****")
    // IPv4
    .replace(/\b\d{1,3}(?:\.\d{1,3}){3}\b/g, "***.***.***.***");
}

function extractPathsFromText(s: string): string[] {
  if (!s) return [];
  const hits = new Set<string>();
  // file.ts:123 or /path/to/file.py:45 or src/db.ts
  const re = /(?:(?:[A-Za-z]:)?[./\w-]+?\.(?:ts|tsx|js|jsx|mjs|cjs|py|go|rb|java|cs|sql|yml|yaml|json|conf|ini))(?:[:(]\d+[:)]?)?/g;
  for (const m of s.matchAll(re)) hits.add(m[0].replace(/[(:]\d+\)?$/, ""));
  return Array.from(hits).slice(0, 10);
}

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value) ? Object.fromEntries(Object.entries(value)) : {};
}

const text = (v: unknown) => (typeof v === "string" && v.trim() ? v.trim() : undefined);
const strings = (v: unknown) => (Array.isArray(v) ? v.filter((x): x is string => typeof x === "string") : []);
const oneOf = <T extends string>(v: unknown, options: readonly T[]) => options.find((o) => o === v);

export function normalizeJSON(raw: string, report: TriageReport): SummaryJSON {
  const highestLevel = inferHighestLevel(report);
  let obj: Record<string, unknown>;
  try {
    const start = raw.indexOf("{");
    const end = raw.lastIndexOf("}");
    const candidate = start >= 0 && end >= 0 ? raw.slice(start, end + 1) : raw;
    // trailing commas occasionally appear
    const cleaned = candidate.replace(/,\s*}/g, "}").replace(/,\s*]/g, "]");
    obj = asRecord(JSON.parse(cleaned));
  } catch {
    obj = { title: "Analysis", probable_cause: raw.slice(0, 200) };
  }

  const level = oneOf(obj["error_level"], LEVELS) ?? highestLevel;
  const confidence = obj["confidence"];
  return {
    title: text(obj["title"]) ?? "Analysis",
    probable_cause:
      text(obj["probable_cause"]) ?? "Insufficient details; verify service status, connectivity, and recent changes.",
    error_level: level,
    priority: oneOf(obj["priority"], PRIORITIES) ?? defaultPriorityFromLevel(level),
    components_to_check: strings(obj["components_to_check"]),
    commands_to_run: strings(obj["commands_to_run"]),
    checks: strings(obj["checks"]),
    fixes: strings(obj["fixes"]),
    related_docs: strings(obj["related_docs"]),
    confidence: typeof confidence === "number" ? clamp01(confidence) : 0.6,
  };
}

function inferHighestLevel(report: TriageReport): Level {
  const top = Math.max(0, ...report.entries.map((e) => severityRank(e.severity)));
  if (top >= severityRank("ERROR")) return "error";
  if (top >= severityRank("WARNING")) return "warn";
  return "info";
}

function defaultPriorityFromLevel(level: Level): Priority {
  if (level === "error") return "P1";
  if (level === "warn") return "P2";
  return "P3";
}

function clamp01(n: number) {
  return Math.max(0, Math.min(1, n));
}

export function formatForConsole(j: SummaryJSON): string {
  const pad = (arr: string[]) => (arr.length ? `\n - ${arr.join("\n - ")}` : " (none)");
  return [
    `Title: ${j.title}`,
    `Probable Cause: ${j.probable_cause}`,
    `Level: ${j.error_level}   Priority: ${j.priority}   Confidence: ${Math.round(j.confidence * 100)}%`,
    `Components to Check:${pad(j.components_to_check)}`,
    `Checks:${pad(j.checks)}`,
    `Commands:${pad(j.commands_to_run)}`,
    `Fixes:${pad(j.fixes)}`,
    j.related_docs.length ? `Docs:\n - ${j.related_docs.join("\n - ")}` : undefined,
  ]
    .filter(Boolean)
    .join("\n");
}
