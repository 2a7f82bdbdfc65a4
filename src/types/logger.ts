/** A level method: structured bindings first, or a bare message. */
export interface LogFn {
  (bindings: object, message?: string): void;
  (message: string): void;
}

/**
 * Logging port the engine, storage and network components receive.
 * `createLogger` returns a pino logger, which satisfies it.
 */
export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
  /** Logger whose lines also carry `bindings`, e.g. `{ component: 'peers' }` */
  child(bindings: Record<string, unknown>): Logger;
}
