import { Logger, logger } from '../utils/logger.js';
import { LogLevel } from '../config/types.js';

export type LogMeta = Record<string, unknown>;

export interface NetworkLogger {
  error(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  debug(message: string, meta?: LogMeta): void;
}

/** Forwards to the shared winston logger. */
export class WinstonNetworkLogger implements NetworkLogger {
  constructor(private readonly target: Logger = logger()) {}

  error(message: string, meta?: LogMeta): void {
    this.target.error(message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.target.info(message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.target.warn(message, meta);
  }

  debug(message: string, meta?: LogMeta): void {
    this.target.debug(message, meta);
  }
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  meta?: LogMeta;
}

/** Keeps every entry in memory. */
export class MemoryLogger implements NetworkLogger {
  readonly entries: LogEntry[] = [];

  error(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'error', message, meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'info', message, meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'warn', message, meta });
  }

  debug(message: string, meta?: LogMeta): void {
    this.entries.push({ level: 'debug', message, meta });
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export type LoggerFactory = () => NetworkLogger;

const defaultLoggerFactory: LoggerFactory = () => new WinstonNetworkLogger();
let loggerFactory: LoggerFactory = defaultLoggerFactory;

/**
 * Replace the logger handed to clients created from now on.
 *
 * @example setLoggerFactory(() => new MemoryLogger());
 */
export function setLoggerFactory(factory: LoggerFactory): void {
  loggerFactory = factory;
}

export function resetLoggerFactory(): void {
  loggerFactory = defaultLoggerFactory;
}

export function createNetworkLogger(): NetworkLogger {
  return loggerFactory();
}
