import winston from 'winston';
import { ConfigManager } from '../config/index.js';
import { LogLevel } from '../config/types.js';
import { mkdir } from 'fs/promises';
import { dirname } from 'path';

const LABEL = 'splitfetch';

export class Logger {
  private static instance: Logger;
  private logger: winston.Logger;

  private constructor() {
    const config = ConfigManager.getInstance().getConfig();
    this.logger = this.createLogger(config.logging);
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private createLogger(loggingConfig: { level: LogLevel; file?: string }): winston.Logger {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        // Keep stdout free for CLI output
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.label({ label: LABEL }),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, label, message, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} ${String(label)} [${String(level)}]: ${String(message)}${metaStr}`;
          })
        ),
      }),
    ];

    if (loggingConfig.file) {
      transports.push(this.createFileTransport(loggingConfig.file));
    }

    return winston.createLogger({
      level: loggingConfig.level,
      transports,
    });
  }

  private createFileTransport(filename: string): winston.transport {
    return new winston.transports.File({
      filename,
      format: winston.format.combine(
        winston.format.label({ label: LABEL }),
        winston.format.timestamp(),
        winston.format.json()
      ),
    });
  }

  public async setLogFile(filepath: string): Promise<void> {
    await mkdir(dirname(filepath), { recursive: true });

    const fileTransport = this.logger.transports.find(
      (transport) => transport instanceof winston.transports.File
    );
    if (fileTransport) {
      this.logger.remove(fileTransport);
    }

    this.logger.add(this.createFileTransport(filepath));
  }

  public error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta);
  }

  public warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta);
  }

  public info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta);
  }

  public debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta);
  }

  public setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  public getLogger(): winston.Logger {
    return this.logger;
  }
}

export const logger = (): Logger => Logger.getInstance();
