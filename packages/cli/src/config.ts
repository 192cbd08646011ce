import { z } from "zod";
import { ConfigurationError, settings } from "@logtriage/core";
import type { LogFormat } from "@logtriage/adapter-winston";

// unset and empty variables read the same
const blank = (value: unknown) => (typeof value === "string" && value.trim() === "" ? undefined : value);
const text = z.preprocess(blank, z.string().trim().optional());
const integer = (min: number) => z.preprocess(blank, z.coerce.number().int().min(min).optional());

const envSchema = z.object({
  LOGTRIAGE_PROJECT: text,
  GOOGLE_CLOUD_PROJECT: text,
  LOG_LEVEL: z.preprocess(blank, z.enum(["error", "warn", "info", "http", "verbose", "debug", "silly"]).default("info")),
  LOG_FORMAT: z.preprocess(blank, z.enum(["json", "cli"]).default("json")),
  LOGTRIAGE_MAX_ENTRIES: integer(1),
  LOGTRIAGE_PAGE_SIZE: integer(1),
  LOGTRIAGE_RETRY_ATTEMPTS: integer(1),
  LOGTRIAGE_RETRY_BASE_DELAY_MS: integer(0),
  LOGTRIAGE_DEADLINE_MS: integer(1),
  GEMINI_API_KEY: text,
  GEMINI_MODEL: text,
});

export interface AppConfig {
  projectId?: string;
  logLevel: string;
  logFormat: LogFormat;
  maxEntries?: number; // triage cap; collect keeps its own default
  pageSize: number;
  retry: { attempts: number; baseDelayMs: number };
  deadlineMs?: number;
  gemini: { apiKey?: string; model?: string };
}

export function loadConfig(env: Readonly<Record<string, string | undefined>>): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new ConfigurationError(`invalid environment: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  const config: AppConfig = {
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
    pageSize: e.LOGTRIAGE_PAGE_SIZE ?? settings.collection.pageSize,
    retry: {
      attempts: e.LOGTRIAGE_RETRY_ATTEMPTS ?? settings.collection.retryAttempts,
      baseDelayMs: e.LOGTRIAGE_RETRY_BASE_DELAY_MS ?? settings.collection.retryBaseDelayMs,
    },
    gemini: {},
  };
  const projectId = e.LOGTRIAGE_PROJECT ?? e.GOOGLE_CLOUD_PROJECT;
  if (projectId) config.projectId = projectId;
  if (e.LOGTRIAGE_MAX_ENTRIES !== undefined) config.maxEntries = e.LOGTRIAGE_MAX_ENTRIES;
  if (e.LOGTRIAGE_DEADLINE_MS !== undefined) config.deadlineMs = e.LOGTRIAGE_DEADLINE_MS;
  if (e.GEMINI_API_KEY) config.gemini.apiKey = e.GEMINI_API_KEY;
  if (e.GEMINI_MODEL) config.gemini.model = e.GEMINI_MODEL;
  return config;
}
