export type TriageErrorCode =
  | "INVALID_WINDOW"
  | "INCIDENT_PARSE"
  | "ADAPTER"
  | "RECORD_PARSE"
  | "CONFIGURATION";

export class TriageError extends Error {
  readonly code: TriageErrorCode;

  constructor(code: TriageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad or missing time range or resource identification. */
export class InvalidWindowError extends TriageError {
  constructor(message: string) {
    super("INVALID_WINDOW", message);
  }
}

export class IncidentParseError extends TriageError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super("INCIDENT_PARSE", issues.length ? `${message}: ${issues.join("; ")}` : message, options);
    this.issues = issues;
  }
}

export interface AdapterErrorOptions {
  cause?: unknown;
  retriable?: boolean;
  partial?: unknown[];
  attempts?: number;
}

/**
 * Log source failure. When thrown by the collection loop after retries are
 * exhausted it carries whatever records were gathered before the failure.
 */
export class AdapterError extends TriageError {
  readonly retriable: boolean;
  readonly partial: unknown[];
  readonly truncated: boolean;
  readonly attempts: number;

  constructor(message: string, opts: AdapterErrorOptions = {}) {
    super("ADAPTER", message, { cause: opts.cause });
    this.retriable = opts.retriable ?? false;
    this.partial = opts.partial ?? [];
    this.truncated = opts.partial !== undefined;
    this.attempts = opts.attempts ?? 0;
  }
}

/** A single malformed record. Never fatal. */
export class RecordParseError extends TriageError {
  readonly index: number;

  constructor(index: number, message: string) {
    super("RECORD_PARSE", `record ${index}: ${message}`);
    this.index = index;
  }
}

export class ConfigurationError extends TriageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIGURATION", message, options);
  }
}
