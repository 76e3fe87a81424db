import { ConfigManager, DEFAULT_PROTOCOL, DEFAULT_USER_AGENT, getConfig } from './index.js';
import { NetworkSettings } from './types.js';

function updateNetwork(changes: Partial<NetworkSettings>): void {
  const manager = ConfigManager.getInstance();
  manager.updateConfig({ network: { ...manager.get('network'), ...changes } });
}

/**
 * First entry of the host list, or an empty string. There is no rotation:
 * the remaining entries are only candidates for callers that manage failover.
 */
export function getAvailableHost(): string {
  return getConfig().network.hosts[0] ?? '';
}

export function setAvailableHostList(hosts: string[]): void {
  updateNetwork({ hosts: [...hosts] });
}

export function pushAvailableHost(host: string): void {
  updateNetwork({ hosts: [...getConfig().network.hosts, host] });
}

export function clearAvailableHosts(): void {
  updateNetwork({ hosts: [] });
}

/**
 * Literal `protocol + host + path`. Slashes are not de-duplicated.
 *
 * @example buildUrl('/users/123', 'api.example.com', 'https://') // 'https://api.example.com/users/123'
 */
export function buildUrl(
  path: string,
  host: string = getAvailableHost(),
  protocol: string = getConfig().network.protocol
): string {
  return protocol + host + path;
}

/**
 * Proxy from the usual environment variables, https first.
 * @example "http://proxy.example.com:8080"
 */
export function getSystemProxy(): string | undefined {
  const candidates = [
    process.env.HTTPS_PROXY,
    process.env.https_proxy,
    process.env.HTTP_PROXY,
    process.env.http_proxy,
    process.env.ALL_PROXY,
    process.env.all_proxy,
  ];
  return candidates.find((value): value is string => value !== undefined && value.length > 0);
}

/**
 * Set up the network section once at startup. Without a callback the library
 * defaults are applied, including the system proxy.
 */
export function initialize(update?: (network: NetworkSettings) => Partial<NetworkSettings>): void {
  if (update) {
    updateNetwork(update({ ...getConfig().network }));
    return;
  }
  updateNetwork({
    protocol: DEFAULT_PROTOCOL,
    userAgent: DEFAULT_USER_AGENT,
    proxy: 'true',
  });
}
