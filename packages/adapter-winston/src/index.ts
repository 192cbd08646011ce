import Transport from "winston-transport";
import winston from "winston";
import type { Severity } from "@logtriage/core";

export type LogFormat = "json" | "cli";

export interface CreateLoggerOptions {
  level?: string;     // default: "info"
  service?: string;   // default: "logtriage"
  format?: LogFormat; // default: "json"
  transports?: Transport[];
}

function formatFor(kind: LogFormat) {
  const { combine, timestamp, errors, json, colorize, printf } = winston.format;
  if (kind === "cli") {
    return combine(
      errors({ stack: true }),
      colorize(),
      printf(({ level, message, service: _service, ...meta }) => {
        const rest = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
        return `${level}: ${String(message)}${rest}`;
      }),
    );
  }
  return combine(timestamp(), errors({ stack: true }), json());
}

/**
 * Every level goes to stderr; stdout is reserved for reports and payloads.
 */
export function createLogger(opts: CreateLoggerOptions = {}): winston.Logger {
  const levels = Object.keys(winston.config.npm.levels);
  return winston.createLogger({
    level: opts.level ?? "info",
    defaultMeta: { service: opts.service ?? "logtriage" },
    format: formatFor(opts.format ?? "json"),
    transports: opts.transports ?? [new winston.transports.Console({ stderrLevels: levels })],
  });
}

/* ---------------- transport ---------------- */

/** Anything that accepts raw log records, e.g. a MemoryLogSource. */
export interface RecordSink {
  append(...records: unknown[]): void;
}

export interface TriageWinstonTransportOptions extends Transport.TransportStreamOptions {
  service?: string;      // default: "unknown"
  resourceType?: string; // default: "winston"
}

const LEVEL_SEVERITY: Readonly<Record<string, Severity>> = {
  emerg: "EMERGENCY",
  alert: "ALERT",
  crit: "CRITICAL",
  error: "ERROR",
  warn: "WARNING",
  warning: "WARNING",
  notice: "NOTICE",
  info: "INFO",
  http: "INFO",
  verbose: "DEBUG",
  debug: "DEBUG",
  silly: "DEBUG",
};

export function levelToSeverity(level: string): Severity {
  return LEVEL_SEVERITY[level] ?? "DEFAULT";
}

const RESERVED = new Set(["level", "message", "timestamp"]);

/**
 * Mirrors an application's winston records into a record sink, shaped like
 * Cloud Logging entries so the triage pipeline can read them.
 */
export class TriageWinstonTransport extends Transport {
  private readonly sink: RecordSink;
  private readonly service: string;
  private readonly resourceType: string;

  constructor(sink: RecordSink, opts: TriageWinstonTransportOptions = {}) {
    super({ ...opts, level: opts.level ?? "warn" });
    this.sink = sink;
    this.service = opts.service ?? "unknown";
    this.resourceType = opts.resourceType ?? "winston";
  }

  override log(info: winston.Logform.TransformableInfo, next: () => void): void {
    setImmediate(() => this.emit("logged", info));
    this.sink.append(this.toRecord(info));
    next();
  }

  toRecord(info: winston.Logform.TransformableInfo): Record<string, unknown> {
    // the LEVEL symbol holds the level before any colorize format ran
    const rawLevel: unknown = Reflect.get(info, Symbol.for("level"));
    const level = typeof rawLevel === "string" ? rawLevel : info.level;
    const message = typeof info.message === "string" ? info.message : JSON.stringify(info.message) ?? "";

    const meta: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(info)) {
      if (!RESERVED.has(key)) meta[key] = value;
    }

    const timestamp = typeof info["timestamp"] === "string" ? info["timestamp"] : new Date().toISOString();
    const payload = Object.keys(meta).length ? { jsonPayload: { message, ...meta } } : { textPayload: message };

    return {
      timestamp,
      severity: levelToSeverity(level),
      logName: `winston/${this.service}`,
      resource: { type: this.resourceType, labels: { service: this.service } },
      labels: { logger: "winston" },
      ...payload,
    };
  }
}
