/**
 * @module @switchboard/supervisor-contracts/logger
 * Logger contract injected into every component. There is no global logger.
 */

export type LogMeta = Record<string, unknown>;

export interface ILogger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger with extra bindings on every line */
  child?(bindings: LogMeta): ILogger;
}
