/**
 * pino-backed ILogger.
 *
 * Components receive a logger explicitly; createNoopLogger() is the default
 * so a workflow built without one stays silent.
 */

import { pino, type DestinationStream, type Level, type Logger } from 'pino';
import type { ILogger, LogMeta } from '@switchboard/supervisor-contracts';

export interface LoggerOptions {
  /** Logger name. Default: 'switchboard' */
  name?: string;
  /** Default: 'info' */
  level?: Level | 'silent';
  /** Where lines go. Default: stdout */
  destination?: DestinationStream;
}

export function createLogger(options: LoggerOptions = {}): ILogger {
  const instance = pino(
    {
      name: options.name ?? 'switchboard',
      level: options.level ?? 'info',
    },
    options.destination,
  );
  return fromPino(instance);
}

export function fromPino(instance: Logger): ILogger {
  return {
    debug: (message, meta) => write(instance, 'debug', message, meta),
    info: (message, meta) => write(instance, 'info', message, meta),
    warn: (message, meta) => write(instance, 'warn', message, meta),
    error: (message, meta) => write(instance, 'error', message, meta),
    child: (bindings) => fromPino(instance.child(bindings)),
  };
}

export function createNoopLogger(): ILogger {
  const noop = (): void => {};
  const logger: ILogger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}

function write(
  instance: Logger,
  level: 'debug' | 'info' | 'warn' | 'error',
  message: string,
  meta?: LogMeta,
): void {
  if (meta) {
    instance[level](meta, message);
  } else {
    instance[level](message);
  }
}
