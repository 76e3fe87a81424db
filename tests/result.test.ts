import { describe, it, expect } from 'vitest';
import { NetworkResult } from '../src/http/result.js';
import {
  DownloadApproach,
  RequestType,
  createMultiDownloadConfig,
  createRequestConfig,
  createRetryConfig,
} from '../src/http/types.js';

describe('NetworkResult', () => {
  describe('isSuccess', () => {
    it('should be true for 200 without error', () => {
      const result = new NetworkResult('');
      result.statusCode = 200;

      expect(result.isSuccess()).toBe(true);
    });

    it('should be false when an error is set even with status 200', () => {
      const result = new NetworkResult('');
      result.statusCode = 200;
      result.hasError = true;

      expect(result.isSuccess()).toBe(false);
    });

    it('should be false for 400 and 500', () => {
      for (const status of [400, 500]) {
        const result = new NetworkResult('');
        result.statusCode = status;
        expect(result.isSuccess()).toBe(false);
      }
    });

    it('should be false for a result that was never attempted', () => {
      expect(new NetworkResult('').isSuccess()).toBe(false);
    });

    it('should only accept the attached success codes', () => {
      const codes = [200, 204];
      for (let status = 100; status < 600; status++) {
        for (const hasError of [false, true]) {
          const result = new NetworkResult('', codes);
          result.statusCode = status;
          result.hasError = hasError;
          expect(result.isSuccess()).toBe(codes.includes(status) && !hasError);
        }
      }
    });

    it('should reject 206 under the retry defaults and accept it under multi-download defaults', () => {
      const retry = new NetworkResult('', createRetryConfig({ config: createRequestConfig({ url: 'https://a.test' }) }).successCodes);
      retry.statusCode = 206;
      const multi = new NetworkResult(
        '',
        createMultiDownloadConfig({ config: createRequestConfig({ url: 'https://a.test' }) }).successCodes
      );
      multi.statusCode = 206;

      expect(retry.isSuccess()).toBe(false);
      expect(multi.isSuccess()).toBe(true);
    });
  });

  describe('hasContent', () => {
    it('should reflect string content', () => {
      expect(new NetworkResult('test content').hasContent()).toBe(true);
      expect(new NetworkResult('').hasContent()).toBe(false);
    });

    it('should reflect buffer content', () => {
      expect(new NetworkResult(Buffer.from([1])).hasContent()).toBe(true);
      expect(new NetworkResult(Buffer.alloc(0)).hasContent()).toBe(false);
    });

    it('should reflect file content size', () => {
      expect(new NetworkResult({ path: '/tmp/a', size: 3 }).hasContent()).toBe(true);
      expect(new NetworkResult({ path: '/tmp/a', size: 0 }).hasContent()).toBe(false);
    });
  });

  describe('setError', () => {
    it('should set the error state', () => {
      const result = new NetworkResult('').setError('Test error', 'Detailed test error', 'transport');

      expect(result.hasError).toBe(true);
      expect(result.errorMessage).toBe('Test error');
      expect(result.detailedErrorMessage).toBe('Detailed test error');
      expect(result.errorKind).toBe('transport');
    });
  });
});

describe('config factories', () => {
  it('should default a request to GET with empty header and body', () => {
    const config = createRequestConfig({ url: 'https://example.com' });

    expect(config.method).toBe(RequestType.Get);
    expect(config.header).toBe('');
    expect(config.body).toBe('');
    expect(typeof config.userAgent).toBe('string');
  });

  it('should keep custom request values', () => {
    const config = createRequestConfig({
      url: 'https://example.com',
      method: RequestType.Post,
      userAgent: 'Custom Agent',
      header: 'Content-Type: application/json',
      body: '{"key":"value"}',
    });

    expect(config.method).toBe('POST');
    expect(config.userAgent).toBe('Custom Agent');
    expect(config.header).toBe('Content-Type: application/json');
    expect(config.body).toBe('{"key":"value"}');
  });

  it('should default retry to 3 attempts, 150ms and 200/204', () => {
    const config = createRetryConfig({ config: createRequestConfig({ url: 'https://example.com' }) });

    expect(config.maxRetries).toBe(3);
    expect(config.retryDelay).toBe(150);
    expect(config.successCodes).toEqual([200, 204]);
  });

  it('should default multi-download to auto with 200/206', () => {
    const config = createMultiDownloadConfig({ config: createRequestConfig({ url: 'https://example.com' }) });

    expect(config.approach).toBe(DownloadApproach.Auto);
    expect(config.segmentParam).toBe(0);
    expect(config.successCodes).toEqual([200, 206]);
    expect(config.segmentRetry).toBeUndefined();
  });
});
