import { deflateSync } from 'node:zlib';
import { describe, expect, it } from 'vitest';
import { compress, decompress } from '../src/compression.js';
import { CompressionMethod, compressionMethodName, isCompressionMethod } from '../src/constants/compression-method.js';
import { catchArchiveError } from './helpers.js';

describe('compress', () => {
  it('stores small payloads that would grow when deflated', () => {
    const result = compress(Buffer.from('hello'));
    expect(result.method).toBe(CompressionMethod.Store);
    expect(result.stored.toString()).toBe('hello');
  });

  it('deflates repetitive payloads under auto', () => {
    const zeros = Buffer.alloc(10000);
    const result = compress(zeros);
    expect(result.method).toBe(CompressionMethod.Deflate);
    expect(result.stored.length).toBeLessThan(zeros.length);
  });

  it('always stores under the store policy', () => {
    const result = compress(Buffer.alloc(10000), { policy: 'store' });
    expect(result.method).toBe(CompressionMethod.Store);
    expect(result.stored.length).toBe(10000);
  });

  it('always deflates under the deflate policy', () => {
    const result = compress(Buffer.from('hello'), { policy: 'deflate' });
    expect(result.method).toBe(CompressionMethod.Deflate);
    expect(decompress(result.method, result.stored, 5).toString()).toBe('hello');
  });

  it('stores empty payloads under auto', () => {
    const result = compress(new Uint8Array(0));
    expect(result.method).toBe(CompressionMethod.Store);
    expect(result.stored.length).toBe(0);
  });
});

describe('decompress', () => {
  it('restores deflated payloads', () => {
    const { method, stored } = compress(Buffer.alloc(10000, 7));
    const output = decompress(method, stored, 10000);
    expect(output.equals(Buffer.alloc(10000, 7))).toBe(true);
  });

  it('rejects unknown methods', () => {
    const error = catchArchiveError(() => decompress(9, Buffer.from('abc'), 3));
    expect(error.kind).toBe('CompressionError');
    expect(error.context.method).toBe(9);
  });

  it('rejects output that does not match the expected size', () => {
    const error = catchArchiveError(() => decompress(CompressionMethod.Store, Buffer.from('abc'), 4));
    expect(error.kind).toBe('CompressionError');
    expect(error.context).toMatchObject({ expected: 4, actual: 3 });
  });

  it('rejects streams that inflate past the expected size', () => {
    const stored = deflateSync(Buffer.alloc(100));
    expect(catchArchiveError(() => decompress(CompressionMethod.Deflate, stored, 50)).kind).toBe('CompressionError');
  });

  it('rejects malformed deflate streams', () => {
    const error = catchArchiveError(() => decompress(CompressionMethod.Deflate, Buffer.from([1, 2, 3, 4, 5]), 5));
    expect(error.kind).toBe('CompressionError');
    expect(error.cause).toBeInstanceOf(Error);
  });
});

describe('compression method tags', () => {
  it('recognizes only store and deflate', () => {
    expect([0, 1, 2, 3].map(isCompressionMethod)).toEqual([true, false, true, false]);
    expect(compressionMethodName(2)).toBe('deflate');
    expect(compressionMethodName(7)).toBe('unknown(7)');
  });
});
