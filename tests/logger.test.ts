import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Logger, logger } from '../src/utils/logger.js';
import { ConfigManager } from '../src/config/index.js';
import {
  MemoryLogger,
  WinstonNetworkLogger,
  createNetworkLogger,
  resetLoggerFactory,
  setLoggerFactory,
} from '../src/http/logging.js';
import winston from 'winston';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

describe('Logger', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    // @ts-expect-error - accessing private static property for testing
    Logger.instance = undefined;
    // @ts-expect-error - accessing private static property for testing
    ConfigManager.instance = undefined;
  });

  afterEach(async () => {
    await fs.rm(join(tmpdir(), 'splitfetch-test.log'), { force: true });
    delete process.env.LOG_FILE;
    delete process.env.LOG_LEVEL;
  });

  it('should return singleton instance', () => {
    expect(Logger.getInstance()).toBe(logger());
  });

  it('should create logger with console transport', () => {
    const consoleTransport = Logger.getInstance()
      .getLogger()
      .transports.find((transport) => transport instanceof winston.transports.Console);

    expect(consoleTransport).toBeDefined();
  });

  it('should create logger with file transport when configured', () => {
    process.env.LOG_FILE = join(tmpdir(), 'splitfetch-test.log');

    const fileTransport = Logger.getInstance()
      .getLogger()
      .transports.find((transport) => transport instanceof winston.transports.File);

    expect(fileTransport).toBeDefined();
  });

  it('should log messages at different levels', () => {
    const loggerInstance = Logger.getInstance();
    const winstonLogger = loggerInstance.getLogger();

    const errorSpy = vi.spyOn(winstonLogger, 'error');
    const warnSpy = vi.spyOn(winstonLogger, 'warn');
    const infoSpy = vi.spyOn(winstonLogger, 'info');
    const debugSpy = vi.spyOn(winstonLogger, 'debug');

    loggerInstance.error('Error message', { code: 'ERR001' });
    loggerInstance.warn('Warning message');
    loggerInstance.info('Info message');
    loggerInstance.debug('Debug message');

    expect(errorSpy).toHaveBeenCalledWith('Error message', { code: 'ERR001' });
    expect(warnSpy).toHaveBeenCalledWith('Warning message', undefined);
    expect(infoSpy).toHaveBeenCalledWith('Info message', undefined);
    expect(debugSpy).toHaveBeenCalledWith('Debug message', undefined);
  });

  it('should set log level', () => {
    const loggerInstance = Logger.getInstance();
    const winstonLogger = loggerInstance.getLogger();

    expect(winstonLogger.level).toBe('info');

    loggerInstance.setLevel('debug');
    expect(winstonLogger.level).toBe('debug');
  });

  it('should respect log level from environment', () => {
    process.env.LOG_LEVEL = 'warn';

    expect(Logger.getInstance().getLogger().level).toBe('warn');
  });

  it('should replace the file transport', async () => {
    const loggerInstance = Logger.getInstance();
    const winstonLogger = loggerInstance.getLogger();
    const countFiles = (): number =>
      winstonLogger.transports.filter((transport) => transport instanceof winston.transports.File).length;

    expect(countFiles()).toBe(0);
    await loggerInstance.setLogFile(join(tmpdir(), 'splitfetch-test.log'));
    expect(countFiles()).toBe(1);
    await loggerInstance.setLogFile(join(tmpdir(), 'splitfetch-test.log'));
    expect(countFiles()).toBe(1);
  });
});

describe('network logger gateway', () => {
  beforeEach(() => {
    // @ts-expect-error - accessing private static property for testing
    Logger.instance = undefined;
  });

  afterEach(() => {
    resetLoggerFactory();
  });

  it('should forward every level to the winston logger', () => {
    const target = Logger.getInstance();
    const errorSpy = vi.spyOn(target, 'error');
    const debugSpy = vi.spyOn(target, 'debug');
    const gateway = new WinstonNetworkLogger(target);

    gateway.error('failed', { url: 'https://example.com' });
    gateway.debug('details');

    expect(errorSpy).toHaveBeenCalledWith('failed', { url: 'https://example.com' });
    expect(debugSpy).toHaveBeenCalledWith('details', undefined);
  });

  it('should record entries in memory', () => {
    const memory = new MemoryLogger();

    memory.info('one');
    memory.warn('two', { attempt: 1 });
    memory.error('three');

    expect(memory.messages()).toEqual(['one', 'two', 'three']);
    expect(memory.messages('warn')).toEqual(['two']);
    expect(memory.entries[1]).toEqual({ level: 'warn', message: 'two', meta: { attempt: 1 } });

    memory.clear();
    expect(memory.entries).toHaveLength(0);
  });

  it('should create loggers from the installed factory until reset', () => {
    const memory = new MemoryLogger();
    setLoggerFactory(() => memory);

    expect(createNetworkLogger()).toBe(memory);

    resetLoggerFactory();
    expect(createNetworkLogger()).toBeInstanceOf(WinstonNetworkLogger);
  });
});
