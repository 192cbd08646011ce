import type { Recommendation, RecommendationPriority } from "../domain/Analysis.js";
import { type BuiltinErrorType, type ErrorType, type ErrorTypeCounts, isBuiltinErrorType } from "../domain/ErrorType.js";

export const NO_ERRORS_FOUND = "no errors found in window";

/** Tie-break order for equal counts, most urgent first. */
export const TIE_BREAK_ORDER: readonly BuiltinErrorType[] = [
  "FILE_NOT_FOUND",
  "PERMISSION_ERROR",
  "NETWORK_ERROR",
  "TIMEOUT",
  "MEMORY_ERROR",
  "CALCULATION_ERROR",
  "VALIDATION_ERROR",
  "EXCEPTION",
  "UNKNOWN",
];

export interface CatalogItem {
  priority: RecommendationPriority;
  issue: string;
  action: string;
}

export const DEFAULT_CATALOG: Readonly<Record<BuiltinErrorType, CatalogItem>> = {
  FILE_NOT_FOUND: {
    priority: "HIGH",
    issue: "File not found errors",
    action: "Check if data files are missing or paths are incorrect. Verify the deployment includes all necessary files.",
  },
  PERMISSION_ERROR: {
    priority: "HIGH",
    issue: "Permission errors",
    action: "Review IAM bindings and service account roles for the failing resource.",
  },
  NETWORK_ERROR: {
    priority: "HIGH",
    issue: "Network/external service errors",
    action: "Check external service status and network connectivity. Add retry logic and circuit breakers.",
  },
  TIMEOUT: {
    priority: "MEDIUM",
    issue: "Timeout errors",
    action: "Investigate slow queries or external calls. Raise timeout limits or optimize the slow path.",
  },
  MEMORY_ERROR: {
    priority: "CRITICAL",
    issue: "Memory errors",
    action: "Check memory limits and usage. Increase the memory allocation or reduce per-request data processing.",
  },
  CALCULATION_ERROR: {
    priority: "HIGH",
    issue: "Calculation errors",
    action: "Review data validation logic. Check for empty datasets or zero values used in calculations.",
  },
  VALIDATION_ERROR: {
    priority: "MEDIUM",
    issue: "Data validation errors",
    action: "Review input validation logic. Check request parameters and data format requirements.",
  },
  EXCEPTION: {
    priority: "LOW",
    issue: "Unhandled exceptions",
    action: "Inspect stack traces of the most frequent error groups and check recent deployments.",
  },
  UNKNOWN: {
    priority: "LOW",
    issue: "Unclassified messages",
    action: "Review raw messages; no known pattern matched the dominant entries.",
  },
};

// custom tags sit after VALIDATION_ERROR, before EXCEPTION
const CUSTOM_RANK = TIE_BREAK_ORDER.indexOf("VALIDATION_ERROR") + 0.5;

function rankOf(type: ErrorType): number {
  return isBuiltinErrorType(type) ? TIE_BREAK_ORDER.indexOf(type) : CUSTOM_RANK;
}

function catalogItem(type: ErrorType, custom: Readonly<Record<string, string>>): CatalogItem {
  if (isBuiltinErrorType(type)) return DEFAULT_CATALOG[type];
  return {
    priority: "MEDIUM",
    issue: `${type} errors`,
    action: custom[type] ?? `Review the ${type} error groups.`,
  };
}

export function compareTypes(a: [ErrorType, number], b: [ErrorType, number]): number {
  return b[1] - a[1] || rankOf(a[0]) - rankOf(b[0]) || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0);
}

export interface RecommendOptions {
  customActions?: Readonly<Record<string, string>>; // action text for rule-defined tags
}

/**
 * Highest count first, ties by TIE_BREAK_ORDER. UNKNOWN is reported only when
 * no other type outnumbers it.
 */
export function recommend(counts: ErrorTypeCounts, opts: RecommendOptions = {}): Recommendation[] {
  const present = Object.entries(counts).filter(
    (e): e is [ErrorType, number] => typeof e[1] === "number" && e[1] > 0,
  );
  if (present.length === 0) {
    return [{ count: 0, priority: "LOW", action: NO_ERRORS_FOUND, text: NO_ERRORS_FOUND }];
  }

  const top = Math.max(...present.map(([, n]) => n));
  const custom = opts.customActions ?? {};

  return present
    .filter(([type, n]) => type !== "UNKNOWN" || n >= top)
    .sort(compareTypes)
    .map(([errorType, count]) => {
      const item = catalogItem(errorType, custom);
      return {
        errorType,
        count,
        priority: item.priority,
        action: item.action,
        text: `[${item.priority}] ${item.issue} (${count}): ${item.action}`,
      };
    });
}
