import winston from 'winston';
import type { Logger } from 'winston';

export interface LoggerOptions {
  /** winston level. Default: `'info'`. */
  readonly level?: string;
  /** Added to every line as `service`. Default: `'tabingest'`. */
  readonly service?: string;
  readonly silent?: boolean;
}

/** JSON lines with a timestamp, written to the console. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return winston.createLogger({
    level: options.level ?? 'info',
    silent: options.silent ?? false,
    format: winston.format.combine(winston.format.timestamp(), winston.format.errors({ stack: true }), winston.format.json()),
    defaultMeta: { service: options.service ?? 'tabingest' },
    transports: [new winston.transports.Console()],
  });
}

/** A logger that drops everything. */
export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}
