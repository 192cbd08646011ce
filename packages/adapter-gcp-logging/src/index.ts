import { Logging } from "@google-cloud/logging";
import { AdapterError, ConfigurationError, isRetriable } from "@logtriage/core";
import type { LogSourcePort, Page, PageRequest } from "@logtriage/core";

export interface EntriesRequest {
  filter: string;
  orderBy: string;
  pageSize: number;
  pageToken?: string;
  autoPaginate: false;
  resourceNames: string[];
}

/** An entry as the Cloud Logging client hands it back: metadata plus payload. */
export interface ClientEntry {
  metadata: object;
  data?: unknown;
}

/** `[entries, nextQuery, rawResponse]`, as returned with autoPaginate off. */
export type EntriesResponse = [ReadonlyArray<ClientEntry>, unknown?, { nextPageToken?: string | null }?];

/** The part of `Logging` used here; tests pass a fake. */
export interface EntriesClient {
  getEntries(request: EntriesRequest): Promise<EntriesResponse>;
}

export interface CloudLoggingSourceOptions {
  projectId?: string;
  client?: EntriesClient; // default: new Logging({ projectId })
}

/**
 * Folds the client's split of metadata and payload back into the JSON shape
 * of a Cloud Logging `LogEntry`.
 */
export function toRawRecord(entry: ClientEntry): Record<string, unknown> {
  const { data } = entry;
  if (typeof data === "string") return { ...entry.metadata, textPayload: data };
  if (typeof data === "object" && data !== null && !Array.isArray(data)) {
    return { ...entry.metadata, jsonPayload: data };
  }
  return { ...entry.metadata };
}

/** Rejects as soon as the signal aborts; the request itself is left to settle. */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) return work;
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new AdapterError("log query aborted"));
    signal.addEventListener("abort", onAbort, { once: true });
    void work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
  });
}

export function makeCloudLoggingSource(opts: CloudLoggingSourceOptions): LogSourcePort {
  const projectId = opts.projectId;
  if (!projectId) throw new ConfigurationError("a Google Cloud project id is required");
  const client: EntriesClient = opts.client ?? new Logging({ projectId });

  return {
    async fetchPage(request: PageRequest, signal?: AbortSignal): Promise<Page> {
      if (signal?.aborted) throw new AdapterError("log query aborted");
      const query: EntriesRequest = {
        filter: request.filter,
        orderBy: "timestamp asc",
        pageSize: request.pageSize,
        autoPaginate: false,
        resourceNames: [`projects/${projectId}`],
        ...(request.pageToken ? { pageToken: request.pageToken } : {}),
      };

      try {
        const [entries, , response] = await untilAborted(client.getEntries(query), signal);
        const records = entries.map(toRawRecord);
        const next = response?.nextPageToken;
        return next ? { records, nextPageToken: next } : { records };
      } catch (err) {
        if (signal?.aborted) throw err instanceof AdapterError ? err : new AdapterError("log query aborted", { cause: err });
        const message = err instanceof Error ? err.message : String(err);
        throw new AdapterError(`Cloud Logging query failed: ${message}`, { cause: err, retriable: isRetriable(err) });
      }
    },
  };
}
