import type { ErrorType } from "../domain/ErrorType.js";

export interface ClassificationRule {
  errorType: ErrorType;
  keywords: readonly string[]; // case-insensitive substrings; any one matches
  recommendation?: string;     // action text for tags the recommender does not know
}

/**
 * Default rule table. Order is significant: the first rule with a matching
 * keyword decides the type.
 */
export const DEFAULT_RULES: readonly ClassificationRule[] = [
  { errorType: "FILE_NOT_FOUND", keywords: ["not found", "no such file"] },
  { errorType: "CALCULATION_ERROR", keywords: ["division by zero", "overflow", "calculation"] },
  { errorType: "TIMEOUT", keywords: ["timeout", "timed out"] },
  { errorType: "MEMORY_ERROR", keywords: ["memory", "oom"] },
  { errorType: "NETWORK_ERROR", keywords: ["connection", "network", "unreachable"] },
  { errorType: "PERMISSION_ERROR", keywords: ["permission", "denied", "forbidden"] },
  { errorType: "VALIDATION_ERROR", keywords: ["invalid", "validation"] },
  { errorType: "EXCEPTION", keywords: ["exception", "traceback", "error"] },
];

export interface ExtendOptions {
  position?: "append" | "prepend"; // default: append
}

/**
 * Returns a new table with `extra` placed before or after `base`. Appended
 * rules only see messages no earlier rule matched.
 */
export function withRules(
  base: readonly ClassificationRule[],
  extra: readonly ClassificationRule[],
  opts: ExtendOptions = {},
): ClassificationRule[] {
  return opts.position === "prepend" ? [...extra, ...base] : [...base, ...extra];
}
