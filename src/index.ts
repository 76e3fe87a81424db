export * from './http/index.js';
export { ConfigManager, getConfig } from './config/index.js';
export {
  buildUrl,
  clearAvailableHosts,
  getAvailableHost,
  getSystemProxy,
  initialize,
  pushAvailableHost,
  setAvailableHostList,
} from './config/network.js';
export type { Config, LogLevel, NetworkSettings } from './config/types.js';
export { Logger, logger } from './utils/logger.js';
