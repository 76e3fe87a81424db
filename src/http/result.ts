import type { SinkContent } from './sink.js';

export type NetworkErrorKind = 'validation' | 'transport' | 'protocol' | 'segment';

function isSuccessStatus(statusCode: number, successCodes?: readonly number[]): boolean {
  if (successCodes) {
    return successCodes.includes(statusCode);
  }
  return statusCode >= 200 && statusCode < 300;
}

/**
 * Outcome of one call. Failures travel here as data, so check both
 * `hasError` and `isSuccess()`: a well-formed 404 leaves `hasError` false.
 */
export class NetworkResult<T extends SinkContent> {
  /** 0 means the request was never attempted or no status line arrived. */
  statusCode = 0;
  hasError = false;
  errorMessage = '';
  detailedErrorMessage = '';
  errorKind: NetworkErrorKind | null = null;
  /** Raw response header block. */
  headers = '';

  /**
   * @param successCodes - statuses counted as success; any 2xx when omitted
   */
  constructor(
    public content: T,
    public readonly successCodes?: readonly number[]
  ) {}

  isSuccess(): boolean {
    return !this.hasError && isSuccessStatus(this.statusCode, this.successCodes);
  }

  hasContent(): boolean {
    const content: SinkContent = this.content;
    if (typeof content === 'string') {
      return content.length > 0;
    }
    if (Buffer.isBuffer(content)) {
      return content.length > 0;
    }
    return content.size > 0;
  }

  setError(message: string, detail = '', kind: NetworkErrorKind | null = this.errorKind): this {
    this.hasError = true;
    this.errorMessage = message;
    this.detailedErrorMessage = detail;
    this.errorKind = kind;
    return this;
  }
}
