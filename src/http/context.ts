import { getConfig } from '../config/index.js';
import { Config } from '../config/types.js';
import { AsyncExecutor, createExecutor } from './executor.js';
import { NetworkLogger, createNetworkLogger } from './logging.js';
import { createHttpTransport } from './transport.js';
import { HttpTransport } from './types.js';

/** Everything a client needs from outside; passed in at construction. */
export interface NetworkContext {
  transport: HttpTransport;
  logger: NetworkLogger;
  executor: AsyncExecutor;
  /** Read on every call, so config updates reach existing clients. */
  config: () => Config;
}

/** Fill the gaps from the process-wide factories and config. */
export function createNetworkContext(overrides: Partial<NetworkContext> = {}): NetworkContext {
  return {
    transport: overrides.transport ?? createHttpTransport(),
    logger: overrides.logger ?? createNetworkLogger(),
    executor: overrides.executor ?? createExecutor(),
    config: overrides.config ?? getConfig,
  };
}
