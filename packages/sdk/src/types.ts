type LogFn = {
  (msg: string, meta?: object): void;
  (obj: object, msg?: string): void;
};

/** Structural subset of a pino logger, so engine code never depends on pino itself. */
export interface Logger {
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  debug: LogFn;
  child?(bindings: Record<string, unknown>): Logger;
}

export function childLogger(logger: Logger, bindings: Record<string, unknown>): Logger {
  return logger.child ? logger.child(bindings) : logger;
}
