/**
 * Compression method tags stored in index records and in the header.
 */
export const CompressionMethod = {
  /** Bytes stored as they are. */
  Store: 0,
  /** Bytes compressed as a zlib stream. */
  Deflate: 2,
} as const;

export type CompressionMethod = (typeof CompressionMethod)[keyof typeof CompressionMethod];

/**
 * How the builder picks a method for a payload.
 * `auto` deflates and keeps the raw bytes when that does not shrink them.
 */
export type CompressionPolicy = 'auto' | 'store' | 'deflate';

export function isCompressionMethod(value: number): value is CompressionMethod {
  return value === CompressionMethod.Store || value === CompressionMethod.Deflate;
}

export function compressionMethodName(value: number): string {
  switch (value) {
    case CompressionMethod.Store:
      return 'store';
    case CompressionMethod.Deflate:
      return 'deflate';
    default:
      return `unknown(${value})`;
  }
}
