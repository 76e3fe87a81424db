import { Config } from '../config/types.js';
import { headerBlockToRecord } from './headers.js';
import { NetworkLogger } from './logging.js';
import { NetworkErrorKind, NetworkResult } from './result.js';
import { Sink, SinkContent } from './sink.js';
import { DataHandler, HttpTransport, RequestConfig, RequestType } from './types.js';

export interface SendOutcome {
  statusCode: number;
  headers: string;
  error?: {
    kind: Extract<NetworkErrorKind, 'validation' | 'transport'>;
    message: string;
    detail: string;
  };
}

/**
 * Returns a reason when the URL cannot be sent: empty, unparseable, or
 * without a host.
 */
export function validateUrl(url: string): string | undefined {
  if (url.trim().length === 0) {
    return 'URL is empty';
  }
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return `Invalid URL: ${url}`;
  }
  if (parsed.host.length === 0) {
    return `Invalid URL, no host: ${url}`;
  }
  return undefined;
}

function errorText(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class TransportAdapter {
  constructor(
    private readonly transport: HttpTransport,
    private readonly logger: NetworkLogger,
    private readonly config: () => Config
  ) {}

  /**
   * One request with the body streamed through `onData`. Validation failures
   * return before the transport is called.
   */
  async send(request: RequestConfig, onData: DataHandler): Promise<SendOutcome> {
    const invalid = validateUrl(request.url);
    if (invalid) {
      this.logger.error(invalid, { method: request.method });
      return { statusCode: 0, headers: '', error: { kind: 'validation', message: invalid, detail: '' } };
    }

    const network = this.config().network;
    this.logger.debug('Sending request', { method: request.method, url: request.url });

    try {
      const response = await this.transport.perform(
        {
          method: request.method,
          url: request.url,
          headers: headerBlockToRecord(request.header),
          body: request.body || undefined,
          proxy: network.proxy,
          userAgent: request.userAgent || network.userAgent,
          timeout: request.timeout ?? network.timeout,
        },
        onData
      );

      if (response.error) {
        this.logger.error(`Request failed: ${response.error.message}`, {
          method: request.method,
          url: request.url,
          statusCode: response.statusCode,
        });
        return {
          statusCode: response.statusCode,
          headers: response.headers,
          error: { kind: 'transport', ...response.error },
        };
      }
      return { statusCode: response.statusCode, headers: response.headers };
    } catch (error) {
      const message = errorText(error);
      this.logger.error(`Transport threw: ${message}`, { method: request.method, url: request.url });
      return {
        statusCode: 0,
        headers: '',
        error: { kind: 'transport', message, detail: error instanceof Error ? error.stack ?? '' : '' },
      };
    }
  }

  /**
   * Run `request`, stream the body (or, for HEAD, the header block) into
   * `sink`, then close it.
   *
   * @param successCodes - attached to the result; any 2xx when omitted
   */
  async execute<T extends SinkContent>(
    request: RequestConfig,
    sink: Sink<T>,
    successCodes?: readonly number[]
  ): Promise<NetworkResult<T>> {
    let written = 0;
    const outcome = await this.send(request, async (chunk) => {
      await sink.append(chunk);
      written += chunk.length;
      request.onProgress?.(written);
    });

    let sinkError: string | undefined;
    try {
      if (request.method === RequestType.Head && outcome.headers) {
        await sink.append(Buffer.from(outcome.headers, 'utf-8'));
      }
      await sink.close();
    } catch (error) {
      sinkError = errorText(error);
    }

    const result = new NetworkResult(sink.content(), successCodes);
    result.statusCode = outcome.statusCode;
    result.headers = outcome.headers;

    if (outcome.error) {
      return result.setError(outcome.error.message, outcome.error.detail, outcome.error.kind);
    }
    if (sinkError) {
      this.logger.error(`Failed to write response: ${sinkError}`, { url: request.url });
      return result.setError(`Failed to write response: ${sinkError}`, '', 'transport');
    }
    if (!result.isSuccess()) {
      result.errorKind = 'protocol';
      result.errorMessage = `HTTP ${result.statusCode}`;
      this.logger.warn(`Unexpected status ${result.statusCode}`, { method: request.method, url: request.url });
    } else {
      this.logger.debug('Request completed', { url: request.url, statusCode: result.statusCode, bytes: written });
    }
    return result;
  }
}
