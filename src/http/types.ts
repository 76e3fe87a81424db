import { getConfig } from '../config/index.js';

export const RequestType = {
  Get: 'GET',
  Post: 'POST',
  Head: 'HEAD',
  Put: 'PUT',
  Delete: 'DELETE',
  Patch: 'PATCH',
  Options: 'OPTIONS',
} as const;

export type RequestMethod = (typeof RequestType)[keyof typeof RequestType];

export interface RequestConfig {
  readonly url: string;
  readonly method: RequestMethod;
  /** Raw header block, one `Key: Value` per line. */
  readonly header: string;
  /** Not sent for GET and HEAD. */
  readonly body: string;
  readonly userAgent: string;
  /** Milliseconds; falls back to the process-wide network timeout. */
  readonly timeout?: number;
  /** Receives the cumulative number of bytes written after each chunk. */
  readonly onProgress?: (bytesWritten: number) => void;
}

export interface RetryPolicy {
  /** Total number of attempts, the first one included. */
  readonly maxRetries: number;
  /** Fixed pause between attempts, in milliseconds. */
  readonly retryDelay: number;
}

export interface RetryConfig extends RetryPolicy {
  readonly config: RequestConfig;
  readonly successCodes: readonly number[];
}

export const DownloadApproach = {
  Auto: 'auto',
  Thread: 'thread',
  Size: 'size',
} as const;

export type DownloadApproach = (typeof DownloadApproach)[keyof typeof DownloadApproach];

export interface MultiDownloadConfig {
  readonly config: RequestConfig;
  readonly approach: DownloadApproach;
  /** Segment count for `thread`, bytes per segment for `size`, unused for `auto`. */
  readonly segmentParam: number;
  readonly successCodes: readonly number[];
  /** Wraps every segment (and the whole-resource fallback) in the retry policy. */
  readonly segmentRetry?: RetryPolicy;
}

export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_DELAY = 150;
export const DEFAULT_RETRY_SUCCESS_CODES: readonly number[] = [200, 204];
export const DEFAULT_MULTI_DOWNLOAD_SUCCESS_CODES: readonly number[] = [200, 206];

export function createRequestConfig(
  overrides: Partial<RequestConfig> & Pick<RequestConfig, 'url'>
): RequestConfig {
  return {
    method: RequestType.Get,
    header: '',
    body: '',
    userAgent: getConfig().network.userAgent,
    ...overrides,
  };
}

export function createRetryConfig(
  overrides: Partial<RetryConfig> & Pick<RetryConfig, 'config'>
): RetryConfig {
  return {
    maxRetries: DEFAULT_MAX_RETRIES,
    retryDelay: DEFAULT_RETRY_DELAY,
    successCodes: DEFAULT_RETRY_SUCCESS_CODES,
    ...overrides,
  };
}

export function createMultiDownloadConfig(
  overrides: Partial<MultiDownloadConfig> & Pick<MultiDownloadConfig, 'config'>
): MultiDownloadConfig {
  return {
    approach: DownloadApproach.Auto,
    segmentParam: 0,
    successCodes: DEFAULT_MULTI_DOWNLOAD_SUCCESS_CODES,
    ...overrides,
  };
}

// Transport collaborator

export interface TransportRequest {
  method: RequestMethod;
  url: string;
  headers: Record<string, string>;
  body?: string;
  proxy: string;
  userAgent: string;
  timeout: number;
}

export interface TransportError {
  message: string;
  detail: string;
}

export interface TransportResponse {
  /** 0 when no response line was received. */
  statusCode: number;
  /** Raw response header block, `Key: Value` lines. */
  headers: string;
  error?: TransportError;
}

export type DataHandler = (chunk: Buffer) => Promise<void>;

/**
 * Performs one request and streams the body through `onData`. Failures are
 * reported in the response; implementations should not reject.
 */
export interface HttpTransport {
  perform(request: TransportRequest, onData: DataHandler): Promise<TransportResponse>;
}
