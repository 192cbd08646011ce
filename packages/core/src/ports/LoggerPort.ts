export type LogMeta = Record<string, unknown>;

/** Structural subset of a winston logger. */
export interface LoggerPort {
  debug(message: string, meta?: LogMeta): unknown;
  info(message: string, meta?: LogMeta): unknown;
  warn(message: string, meta?: LogMeta): unknown;
  error(message: string, meta?: LogMeta): unknown;
}

export const silentLogger: LoggerPort = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
