export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface NetworkSettings {
  userAgent: string;
  /** Proxy URL, `'true'` for the system proxy, or empty for none. */
  proxy: string;
  /** Scheme prefix used by buildUrl, e.g. `https://`. */
  protocol: string;
  /** Ordered host candidates; only the first one is ever used. */
  hosts: string[];
  timeout: number; // ms
}

export interface Config {
  network: NetworkSettings;

  // Auto approach thresholds for segmented downloads
  download: {
    autoThreadCount: number;
    autoMinSegmentSize: number; // bytes
  };

  logging: {
    level: LogLevel;
    file?: string;
  };
}
