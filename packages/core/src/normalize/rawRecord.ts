import { z } from "zod";

const protoDuration = z.object({
  seconds: z.union([z.number(), z.string()]).optional(),
  nanos: z.number().optional(),
});

const protoTimestamp = protoDuration.required({ seconds: true });

const rawTimestamp = z.union([z.string(), z.number(), z.date(), protoTimestamp]);

/**
 * Shape of a Cloud Logging `LogEntry` as JSON (camelCase). Unknown fields
 * pass through untouched.
 */
export const rawLogRecordSchema = z
  .object({
    timestamp: rawTimestamp,
    severity: z.union([z.string(), z.number()]).nullish(),
    logName: z.string().nullish(),
    insertId: z.string().nullish(),
    resource: z
      .object({
        type: z.string().nullish(),
        labels: z.record(z.string().nullish()).nullish(),
      })
      .nullish(),
    textPayload: z.string().nullish(),
    jsonPayload: z.record(z.unknown()).nullish(),
    labels: z.record(z.string().nullish()).nullish(),
    httpRequest: z
      .object({
        requestMethod: z.string().nullish(),
        requestUrl: z.string().nullish(),
        status: z.union([z.number(), z.string()]).nullish(),
        latency: z.union([z.string(), protoDuration]).nullish(),
      })
      .passthrough()
      .nullish(),
    trace: z.string().nullish(),
    spanId: z.string().nullish(),
  })
  .passthrough();

export type RawLogRecord = z.input<typeof rawLogRecordSchema>;
export type ParsedRawRecord = z.output<typeof rawLogRecordSchema>;
export type RawTimestamp = z.output<typeof rawTimestamp>;
export type ProtoDuration = z.output<typeof protoDuration>;

function protoToMs(value: ProtoDuration): number {
  const seconds = Number(value.seconds ?? 0);
  return seconds * 1000 + Math.floor((value.nanos ?? 0) / 1e6);
}

/** Returns undefined for anything that does not resolve to a valid instant. */
export function toInstant(value: RawTimestamp): Date | undefined {
  let date: Date;
  if (value instanceof Date) date = new Date(value.getTime());
  else if (typeof value === "string" || typeof value === "number") date = new Date(value);
  else date = new Date(protoToMs(value));
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/** "0.250s" or { seconds, nanos } to milliseconds. */
export function toLatencyMs(value: string | ProtoDuration): number | undefined {
  if (typeof value === "string") {
    const match = /^(-?\d+(?:\.\d+)?)s$/.exec(value.trim());
    return match ? Number(match[1]) * 1000 : undefined;
  }
  const ms = protoToMs(value);
  return Number.isFinite(ms) ? ms : undefined;
}
