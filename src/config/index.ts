import { Config, LogLevel } from './types.js';

export const DEFAULT_USER_AGENT = 'splitfetch/1.0.0';
export const DEFAULT_PROTOCOL = 'https://';
export const DEFAULT_TIMEOUT = 30000;

const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

function parseLogLevel(value: string | undefined): LogLevel {
  return LOG_LEVELS.find((level) => level === value) ?? 'info';
}

function parseHosts(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((host) => host.trim())
    .filter((host) => host.length > 0);
}

export class ConfigManager {
  private static instance: ConfigManager;
  private config: Config;

  private constructor() {
    this.config = this.loadConfig();
  }

  public static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  public getConfig(): Config {
    return this.config;
  }

  public get<K extends keyof Config>(key: K): Config[K] {
    return this.config[key];
  }

  private loadConfig(): Config {
    return {
      network: {
        userAgent: process.env.NETWORK_USER_AGENT ?? DEFAULT_USER_AGENT,
        proxy: process.env.NETWORK_PROXY ?? '',
        protocol: process.env.NETWORK_PROTOCOL ?? DEFAULT_PROTOCOL,
        hosts: parseHosts(process.env.NETWORK_HOSTS),
        timeout: parseInt(process.env.NETWORK_TIMEOUT ?? String(DEFAULT_TIMEOUT), 10),
      },
      download: {
        autoThreadCount: parseInt(process.env.DOWNLOAD_AUTO_THREADS ?? '4', 10),
        autoMinSegmentSize: parseInt(process.env.DOWNLOAD_AUTO_MIN_SEGMENT ?? '1048576', 10),
      },
      logging: {
        level: parseLogLevel(process.env.LOG_LEVEL),
        file: process.env.LOG_FILE,
      },
    };
  }

  public updateConfig(updates: Partial<Config>): void {
    this.config = { ...this.config, ...updates };
  }
}

export const getConfig = (): Config => ConfigManager.getInstance().getConfig();
