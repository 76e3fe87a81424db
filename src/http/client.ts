import { TransportAdapter } from './adapter.js';
import { NetworkContext, createNetworkContext } from './context.js';
import { AsyncExecutor } from './executor.js';
import { findHeader } from './headers.js';
import { NetworkLogger } from './logging.js';
import { NetworkResult } from './result.js';
import { RetryOrchestrator } from './retry.js';
import { SegmentedDownloader } from './segmented.js';
import { Sink, SinkContent, TextSink } from './sink.js';
import { MultiDownloadConfig, RequestConfig, RequestType, RetryConfig, createRequestConfig } from './types.js';

/**
 * Facade over single requests, retries and segmented downloads. Results are
 * text unless a sink is passed; the sink picks the content type.
 *
 * @example
 * ```typescript
 * const client = createNetworkClient();
 * const result = await client.execute(createRequestConfig({ url: 'https://example.com/data.json' }));
 * if (result.isSuccess()) {
 *   console.log(result.content);
 * }
 *
 * const file = await client.segmentedDownload(
 *   createMultiDownloadConfig({
 *     config: createRequestConfig({ url: 'https://example.com/big.iso' }),
 *     approach: DownloadApproach.Thread,
 *     segmentParam: 8,
 *   }),
 *   fileSink('/tmp/big.iso')
 * );
 * ```
 */
export class NetworkClient {
  readonly logger: NetworkLogger;
  readonly executor: AsyncExecutor;
  private readonly adapter: TransportAdapter;
  private readonly retrier: RetryOrchestrator;
  private readonly segmented: SegmentedDownloader;

  constructor(context: Partial<NetworkContext> = {}) {
    const { transport, logger, executor, config } = createNetworkContext(context);
    this.logger = logger;
    this.executor = executor;
    this.adapter = new TransportAdapter(transport, logger, config);
    this.retrier = new RetryOrchestrator(this.adapter, logger);
    this.segmented = new SegmentedDownloader(this.adapter, this.retrier, executor, logger, () => {
      const { autoThreadCount, autoMinSegmentSize } = config().download;
      return { threadCount: autoThreadCount, minSegmentSize: autoMinSegmentSize };
    });
  }

  execute(config: RequestConfig): Promise<NetworkResult<string>>;
  execute<T extends SinkContent>(config: RequestConfig, sink: Sink<T>): Promise<NetworkResult<T>>;
  execute(config: RequestConfig, sink: Sink<SinkContent> = new TextSink()): Promise<NetworkResult<SinkContent>> {
    return this.adapter.execute(config, sink);
  }

  executeAsync(config: RequestConfig): Promise<NetworkResult<string>>;
  executeAsync<T extends SinkContent>(config: RequestConfig, sink: Sink<T>): Promise<NetworkResult<T>>;
  executeAsync(config: RequestConfig, sink: Sink<SinkContent> = new TextSink()): Promise<NetworkResult<SinkContent>> {
    return this.executor.submit(() => this.adapter.execute(config, sink));
  }

  executeWithRetry(config: RetryConfig): Promise<NetworkResult<string>>;
  executeWithRetry<T extends SinkContent>(config: RetryConfig, sink: Sink<T>): Promise<NetworkResult<T>>;
  executeWithRetry(config: RetryConfig, sink: Sink<SinkContent> = new TextSink()): Promise<NetworkResult<SinkContent>> {
    return this.retrier.executeWithRetry(config, sink);
  }

  executeWithRetryAsync(config: RetryConfig): Promise<NetworkResult<string>>;
  executeWithRetryAsync<T extends SinkContent>(config: RetryConfig, sink: Sink<T>): Promise<NetworkResult<T>>;
  executeWithRetryAsync(
    config: RetryConfig,
    sink: Sink<SinkContent> = new TextSink()
  ): Promise<NetworkResult<SinkContent>> {
    return this.executor.submit(() => this.retrier.executeWithRetry(config, sink));
  }

  segmentedDownload(config: MultiDownloadConfig): Promise<NetworkResult<string>>;
  segmentedDownload<T extends SinkContent>(config: MultiDownloadConfig, sink: Sink<T>): Promise<NetworkResult<T>>;
  segmentedDownload(
    config: MultiDownloadConfig,
    sink: Sink<SinkContent> = new TextSink()
  ): Promise<NetworkResult<SinkContent>> {
    return this.segmented.download(config, sink);
  }

  segmentedDownloadAsync(config: MultiDownloadConfig): Promise<NetworkResult<string>>;
  segmentedDownloadAsync<T extends SinkContent>(
    config: MultiDownloadConfig,
    sink: Sink<T>
  ): Promise<NetworkResult<T>>;
  segmentedDownloadAsync(
    config: MultiDownloadConfig,
    sink: Sink<SinkContent> = new TextSink()
  ): Promise<NetworkResult<SinkContent>> {
    return this.executor.submit(() => this.segmented.download(config, sink));
  }

  async findUrlHeader(url: string, key: string): Promise<string | undefined> {
    const result = await this.execute(createRequestConfig({ url, method: RequestType.Head }));
    if (!result.isSuccess()) {
      this.logger.warn('HEAD request failed', { url, statusCode: result.statusCode, error: result.errorMessage });
      return undefined;
    }
    return findHeader(result.content, key);
  }

  getContentType(url: string): Promise<string | undefined> {
    return this.findUrlHeader(url, 'Content-Type');
  }

  async getContentSize(url: string): Promise<number | undefined> {
    const value = await this.findUrlHeader(url, 'Content-Length');
    if (value === undefined || !/^\d+$/.test(value)) {
      return undefined;
    }
    return Number(value);
  }
}

export function createNetworkClient(context: Partial<NetworkContext> = {}): NetworkClient {
  return new NetworkClient(context);
}
