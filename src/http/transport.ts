import fetch, { FetchError, Response } from 'node-fetch';
import { HttpsProxyAgent } from 'https-proxy-agent';
import { getSystemProxy } from '../config/network.js';
import { logger } from '../utils/logger.js';
import { serializeHeaders, HeaderEntry } from './headers.js';
import { DataHandler, HttpTransport, TransportError, TransportRequest, TransportResponse } from './types.js';

const METHODS_WITHOUT_BODY = new Set(['GET', 'HEAD']);

/**
 * `''` and `'false'` disable the proxy, `'true'` picks the system proxy,
 * anything else is taken as the proxy URL.
 */
export function resolveProxyUrl(proxy: string): string | undefined {
  if (proxy === '' || proxy === 'false') {
    return undefined;
  }
  if (proxy === 'true') {
    return getSystemProxy();
  }
  return proxy;
}

function hasHeader(headers: Record<string, string>, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

function formatResponseHeaders(response: Response): string {
  const entries: HeaderEntry[] = [];
  response.headers.forEach((value, key) => {
    entries.push([key, value]);
  });
  const statusLine = `HTTP/1.1 ${response.status} ${response.statusText}`.trimEnd();
  return entries.length > 0 ? `${statusLine}\r\n${serializeHeaders(entries)}` : statusLine;
}

function describeError(error: unknown, timeout: number): TransportError {
  if (error instanceof Error && error.name === 'AbortError') {
    return { message: `Request timeout after ${timeout}ms`, detail: error.message };
  }
  if (error instanceof FetchError) {
    return {
      message: error.message,
      detail: [error.type, error.code].filter((part) => part !== undefined).join(': '),
    };
  }
  if (error instanceof Error) {
    return { message: error.message, detail: error.stack ?? error.name };
  }
  return { message: String(error), detail: '' };
}

export class NodeFetchTransport implements HttpTransport {
  private readonly agents = new Map<string, HttpsProxyAgent<string>>();

  async perform(request: TransportRequest, onData: DataHandler): Promise<TransportResponse> {
    const { method, url, timeout } = request;
    const abortController = new AbortController();
    const timeoutId = setTimeout(() => abortController.abort(), timeout);

    let statusCode = 0;
    let headers = '';

    try {
      const requestHeaders = this.buildHeaders(request);
      const response = await fetch(url, {
        method,
        headers: requestHeaders,
        body: METHODS_WITHOUT_BODY.has(method) || !request.body ? undefined : request.body,
        // Decode only encodings the caller asked for
        compress: hasHeader(request.headers, 'Accept-Encoding'),
        agent: this.agentFor(request.proxy),
        signal: abortController.signal,
      });

      statusCode = response.status;
      headers = formatResponseHeaders(response);

      if (method !== 'HEAD' && response.body) {
        for await (const chunk of response.body) {
          await onData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
        }
      }

      return { statusCode, headers };
    } catch (error) {
      const described = describeError(error, timeout);
      logger().debug('Transport failure', { url, method, statusCode, error: described.message });
      return { statusCode, headers, error: described };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private buildHeaders(request: TransportRequest): Record<string, string> {
    const headers = { ...request.headers };
    if (!hasHeader(headers, 'User-Agent') && request.userAgent) {
      headers['User-Agent'] = request.userAgent;
    }
    if (!hasHeader(headers, 'Accept-Encoding')) {
      headers['Accept-Encoding'] = 'identity';
    }
    return headers;
  }

  private agentFor(proxy: string): HttpsProxyAgent<string> | undefined {
    const proxyUrl = resolveProxyUrl(proxy);
    if (!proxyUrl) {
      return undefined;
    }
    let agent = this.agents.get(proxyUrl);
    if (!agent) {
      agent = new HttpsProxyAgent(proxyUrl);
      this.agents.set(proxyUrl, agent);
      logger().info('Created proxy agent', { proxy: proxyUrl });
    }
    return agent;
  }
}

export function createHttpTransport(): HttpTransport {
  return new NodeFetchTransport();
}
