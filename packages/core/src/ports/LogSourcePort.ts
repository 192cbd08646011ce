import type { QueryWindow } from "../domain/Analysis.js";

export interface PageRequest {
  filter: string; // full rendered filter, see renderFilter
  window: QueryWindow;
  pageSize: number;
  pageToken?: string;
}

export interface Page {
  records: unknown[]; // untrusted; the normalizer validates them
  nextPageToken?: string;
}

/**
 * A paginated log store. Pages come back in timestamp-ascending order; how the
 * implementation authenticates or talks to its backend is its own business.
 */
export interface LogSourcePort {
  fetchPage(request: PageRequest, signal?: AbortSignal): Promise<Page>;
}
