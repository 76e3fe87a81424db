import { describe, it, expect } from 'vitest';
import {
  ContentType,
  ContentTypeHeader,
  findHeader,
  headerBlockToRecord,
  parseHeaderBlock,
  withHeader,
} from '../src/http/headers.js';

describe('headers', () => {
  const block = [
    'HTTP/1.1 200 OK',
    'Content-Type: application/json; charset=utf-8',
    'content-length: 42',
    'X-Trace: a:b:c',
    '',
  ].join('\r\n');

  it('should expose content types and header lines', () => {
    expect(ContentType.json).toBe('application/json');
    expect(ContentTypeHeader.json).toBe('Content-Type: application/json');
    expect(ContentType.svg).toBe('image/svg+xml');
    expect(ContentTypeHeader.svg).toBe('Content-Type: image/svg+xml');
    expect(ContentTypeHeader.jpeg).toBe('Content-Type: image/jpeg');
  });

  it('should skip the status line and blank lines', () => {
    expect(parseHeaderBlock(block)).toEqual([
      ['Content-Type', 'application/json; charset=utf-8'],
      ['content-length', '42'],
      ['X-Trace', 'a:b:c'],
    ]);
  });

  it('should find headers case-insensitively', () => {
    expect(findHeader(block, 'content-type')).toBe('application/json; charset=utf-8');
    expect(findHeader(block, 'Content-Length')).toBe('42');
    expect(findHeader(block, 'X-Missing')).toBeUndefined();
  });

  it('should prefer the last response in a redirect chain', () => {
    const chain = 'HTTP/1.1 302 Found\nLocation: /next\nContent-Length: 0\n\nHTTP/1.1 200 OK\nContent-Length: 10\n';

    expect(findHeader(chain, 'content-length')).toBe('10');
  });

  it('should accept LF-only blocks as request headers', () => {
    expect(headerBlockToRecord('Accept: text/plain\nAuthorization: Bearer test-token')).toEqual({
      Accept: 'text/plain',
      Authorization: 'Bearer test-token',
    });
  });

  it('should replace an existing header when adding one', () => {
    const updated = withHeader('Accept: */*\r\nrange: bytes=0-1', 'Range', 'bytes=10-19');

    expect(updated).toBe('Accept: */*\r\nRange: bytes=10-19');
  });
});
