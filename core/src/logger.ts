export type LogLevel = 'info' | 'debug';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

/** Destination for formatted log lines. Defaults to the global console. */
export interface LogSink {
  log(line: string): void;
  warn(line: string): void;
  error(line: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  sink?: LogSink;
}

/**
 * Console-backed logger.
 *
 * `debug` lines are dropped unless the level is 'debug'. Metadata is appended
 * as compact JSON so a line stays greppable.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const sink = options.sink ?? globalThis.console;
  const prefix = options.prefix ? `${options.prefix} ` : '';

  const format = (message: string, meta?: LogMeta): string => {
    if (!meta || Object.keys(meta).length === 0) {
      return `${prefix}${message}`;
    }
    return `${prefix}${message} ${JSON.stringify(meta)}`;
  };

  return {
    debug(message, meta) {
      if (level === 'debug') {
        sink.log(format(message, meta));
      }
    },
    info(message, meta) {
      sink.log(format(message, meta));
    },
    warn(message, meta) {
      sink.warn(format(message, meta));
    },
    error(message, meta) {
      sink.error(format(message, meta));
    },
  };
}
