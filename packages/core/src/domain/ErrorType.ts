export const BUILTIN_ERROR_TYPES = [
  "FILE_NOT_FOUND",
  "CALCULATION_ERROR",
  "TIMEOUT",
  "MEMORY_ERROR",
  "NETWORK_ERROR",
  "PERMISSION_ERROR",
  "VALIDATION_ERROR",
  "EXCEPTION",
  "UNKNOWN",
] as const;

export type BuiltinErrorType = (typeof BUILTIN_ERROR_TYPES)[number];

/**
 * Classification tag. The built-in tags are always available; extra rules may
 * introduce their own tags, which keeps autocomplete for the built-ins.
 */
export type ErrorType = BuiltinErrorType | (string & {});

export function isBuiltinErrorType(value: string): value is BuiltinErrorType {
  return BUILTIN_ERROR_TYPES.some((t) => t === value);
}

export type ErrorTypeCounts = Partial<Record<ErrorType, number>>;
