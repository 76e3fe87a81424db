import { TransportAdapter, validateUrl } from './adapter.js';
import { AsyncExecutor } from './executor.js';
import { findHeader, withHeader } from './headers.js';
import { NetworkLogger } from './logging.js';
import { NetworkResult } from './result.js';
import { RetryOrchestrator, attemptBudget, retryUntil } from './retry.js';
import { AutoTuning, Segment, assertPartition, formatRange, planSegments, segmentLength } from './segments.js';
import { Sink, SinkContent } from './sink.js';
import { DownloadApproach, MultiDownloadConfig, RequestConfig, RequestType } from './types.js';

export interface ProbeResult {
  size?: number;
  acceptsRanges: boolean;
}

export interface SegmentOutcome {
  segment: Segment;
  statusCode: number;
  bytes: number;
  /** Why the segment was not accepted. */
  failure?: string;
}

class SegmentOverflowError extends Error {
  constructor(segment: Segment) {
    super(`Received more than ${segmentLength(segment)} bytes for ${formatRange(segment)}`);
    this.name = 'SegmentOverflowError';
  }
}

function parseSize(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) {
    return undefined;
  }
  const size = Number(value);
  return Number.isSafeInteger(size) ? size : undefined;
}

function describeParamProblem(options: MultiDownloadConfig): string | undefined {
  if (options.successCodes.length === 0) {
    return 'Multi-download config has no success codes';
  }
  if (options.approach === DownloadApproach.Auto) {
    return undefined;
  }
  if (!Number.isSafeInteger(options.segmentParam) || options.segmentParam < 1) {
    const name = options.approach === DownloadApproach.Size ? 'Segment size' : 'Segment count';
    return `${name} must be a positive integer, got ${options.segmentParam}`;
  }
  return undefined;
}

/**
 * Downloads one resource as concurrent byte ranges:
 * probe → partition → dispatch → collect → finalize.
 *
 * Failure policy is fail-fast with aggregated diagnostics: every segment is
 * awaited, and if any of them is not accepted the whole download fails with
 * the offending ranges listed. Segments are only retried when the config
 * carries a `segmentRetry` policy.
 */
export class SegmentedDownloader {
  constructor(
    private readonly adapter: TransportAdapter,
    private readonly retrier: RetryOrchestrator,
    private readonly executor: AsyncExecutor,
    private readonly logger: NetworkLogger,
    private readonly tuning: () => AutoTuning
  ) {}

  async download<T extends SinkContent>(options: MultiDownloadConfig, sink: Sink<T>): Promise<NetworkResult<T>> {
    const { config: request, successCodes } = options;

    const problem = describeParamProblem(options) ?? validateUrl(request.url);
    if (problem) {
      this.logger.error(problem, { url: request.url });
      return new NetworkResult(sink.content(), successCodes).setError(problem, '', 'validation');
    }

    const probe = await this.probe(request);
    if (probe.size === undefined || probe.size === 0 || !probe.acceptsRanges) {
      this.logger.info('Range requests unavailable, downloading in one piece', {
        url: request.url,
        size: probe.size,
        acceptsRanges: probe.acceptsRanges,
      });
      return this.downloadWhole(options, sink);
    }

    const segments = planSegments(probe.size, options.approach, options.segmentParam, this.tuning());
    assertPartition(segments, probe.size);
    if (segments.length === 1) {
      return this.downloadWhole(options, sink);
    }

    this.logger.info('Starting segmented download', {
      url: request.url,
      size: probe.size,
      segments: segments.length,
    });

    try {
      await sink.reset();
      await sink.allocate(probe.size);
    } catch (error) {
      const message = `Failed to prepare sink: ${error instanceof Error ? error.message : String(error)}`;
      this.logger.error(message, { url: request.url });
      return new NetworkResult(sink.content(), successCodes).setError(message, '', 'transport');
    }

    const outcomes = await this.dispatch(options, segments, sink);

    let closeError: string | undefined;
    try {
      await sink.close();
    } catch (error) {
      closeError = error instanceof Error ? error.message : String(error);
    }

    return this.finalize(options, outcomes, sink, closeError);
  }

  /** HEAD the resource for its size and range support. */
  async probe(request: RequestConfig): Promise<ProbeResult> {
    const outcome = await this.adapter.send(
      { ...request, method: RequestType.Head, body: '', onProgress: undefined },
      async () => {
        // HEAD has no body
      }
    );
    if (outcome.error || outcome.statusCode < 200 || outcome.statusCode >= 300) {
      this.logger.warn('Probe failed', {
        url: request.url,
        statusCode: outcome.statusCode,
        error: outcome.error?.message,
      });
      return { acceptsRanges: false };
    }

    const acceptRanges = findHeader(outcome.headers, 'Accept-Ranges') ?? '';
    return {
      size: parseSize(findHeader(outcome.headers, 'Content-Length')),
      acceptsRanges: acceptRanges.toLowerCase().split(',').some((unit) => unit.trim() === 'bytes'),
    };
  }

  private async downloadWhole<T extends SinkContent>(
    options: MultiDownloadConfig,
    sink: Sink<T>
  ): Promise<NetworkResult<T>> {
    const { config: request, successCodes, segmentRetry } = options;
    if (!segmentRetry) {
      return this.adapter.execute(request, sink, successCodes);
    }
    return this.retrier.executeWithRetry({ ...segmentRetry, config: request, successCodes }, sink);
  }

  private async dispatch<T extends SinkContent>(
    options: MultiDownloadConfig,
    segments: Segment[],
    sink: Sink<T>
  ): Promise<SegmentOutcome[]> {
    const { onProgress } = options.config;
    let totalWritten = 0;
    const report = (delta: number): void => {
      totalWritten += delta;
      onProgress?.(totalWritten);
    };

    const units = segments.map((segment) =>
      this.executor
        .submit(() => this.fetchSegmentWithPolicy(options, segment, sink, report))
        .catch((error: unknown): SegmentOutcome => ({
          segment,
          statusCode: 0,
          bytes: 0,
          failure: error instanceof Error ? error.message : String(error),
        }))
    );
    return Promise.all(units);
  }

  private async fetchSegmentWithPolicy<T extends SinkContent>(
    options: MultiDownloadConfig,
    segment: Segment,
    sink: Sink<T>,
    report: (delta: number) => void
  ): Promise<SegmentOutcome> {
    const policy = options.segmentRetry;
    if (!policy) {
      return this.fetchSegment(options, segment, sink, report);
    }

    const attempts = attemptBudget(policy);
    return retryUntil(
      () => this.fetchSegment(options, segment, sink, report),
      (outcome) => outcome.failure === undefined,
      policy,
      (outcome, attemptNumber) => {
        this.logger.warn(`Segment ${formatRange(segment)} attempt ${attemptNumber}/${attempts} failed`, {
          url: options.config.url,
          reason: outcome.failure,
        });
      }
    );
  }

  private async fetchSegment<T extends SinkContent>(
    options: MultiDownloadConfig,
    segment: Segment,
    sink: Sink<T>,
    report: (delta: number) => void
  ): Promise<SegmentOutcome> {
    const expected = segmentLength(segment);
    const request: RequestConfig = {
      ...options.config,
      header: withHeader(options.config.header, 'Range', formatRange(segment)),
      onProgress: undefined,
    };

    let written = 0;
    const outcome = await this.adapter.send(request, async (chunk) => {
      const room = expected - written;
      const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
      if (slice.length > 0) {
        await sink.writeAt(segment.start + written, slice);
        written += slice.length;
        report(slice.length);
      }
      if (slice.length < chunk.length) {
        throw new SegmentOverflowError(segment);
      }
    });

    const result: SegmentOutcome = { segment, statusCode: outcome.statusCode, bytes: written };
    if (outcome.error) {
      result.failure = outcome.error.message;
    } else if (!options.successCodes.includes(outcome.statusCode)) {
      result.failure = `HTTP ${outcome.statusCode}`;
    } else if (written !== expected) {
      result.failure = `Expected ${expected} bytes, received ${written}`;
    }

    if (result.failure !== undefined) {
      // A retry rewrites the same range, so its bytes must not be counted twice
      report(-written);
    }
    return result;
  }

  private finalize<T extends SinkContent>(
    options: MultiDownloadConfig,
    outcomes: SegmentOutcome[],
    sink: Sink<T>,
    closeError: string | undefined
  ): NetworkResult<T> {
    const { config: request, successCodes } = options;
    const result = new NetworkResult(sink.content(), successCodes);
    const failed = outcomes.filter((outcome) => outcome.failure !== undefined);

    if (failed.length > 0) {
      const detail = failed.map((outcome) => `${formatRange(outcome.segment)}: ${outcome.failure}`).join('; ');
      const message = `Segmented download failed: ${failed.length} of ${outcomes.length} segments failed`;
      this.logger.error(message, { url: request.url, detail });
      result.statusCode = failed[0].statusCode;
      return result.setError(message, detail, 'segment');
    }

    result.statusCode = outcomes.some((outcome) => outcome.statusCode === 206) ? 206 : 200;
    if (closeError) {
      this.logger.error(`Failed to close sink: ${closeError}`, { url: request.url });
      return result.setError(`Failed to close sink: ${closeError}`, '', 'transport');
    }

    this.logger.info('Segmented download completed', {
      url: request.url,
      segments: outcomes.length,
      bytes: sink.length(),
    });
    return result;
  }
}
