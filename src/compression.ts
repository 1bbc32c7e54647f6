/**
 * Store/deflate codec for entry payloads and the name table.
 */
import { deflateSync, inflateSync } from 'node:zlib';
import { ArchiveError } from './archive-error.js';
import {
  CompressionMethod,
  type CompressionPolicy,
  compressionMethodName,
} from './constants/compression-method.js';
import { DEFAULT_COMPRESSION_LEVEL } from './constants/defaults.js';

export interface CompressOptions {
  readonly policy?: CompressionPolicy;
  /** zlib level, 0-9. */
  readonly level?: number;
}

export interface CompressedPayload {
  readonly method: CompressionMethod;
  readonly stored: Buffer;
}

/**
 * Compresses a payload according to the policy.
 * Under `auto`, a deflated result that is not strictly smaller than the input is discarded
 * and the raw bytes are stored instead.
 */
export function compress(bytes: Uint8Array, options: CompressOptions = {}): CompressedPayload {
  const policy: CompressionPolicy = options.policy ?? 'auto';
  const level: number = options.level ?? DEFAULT_COMPRESSION_LEVEL;
  const raw = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);

  if (policy === 'store') {
    return { method: CompressionMethod.Store, stored: raw };
  }

  const deflated: Buffer = deflateSync(raw, { level });
  if (policy === 'auto' && deflated.length >= raw.length) {
    return { method: CompressionMethod.Store, stored: raw };
  }
  return { method: CompressionMethod.Deflate, stored: deflated };
}

/**
 * Restores a payload and checks it against the size recorded in the index.
 *
 * @throws {ArchiveError} `CompressionError` for an unknown method, a malformed zlib stream,
 * or an output length different from `expectedSize`.
 */
export function decompress(method: number, stored: Uint8Array, expectedSize: number): Buffer {
  const input = Buffer.from(stored.buffer, stored.byteOffset, stored.byteLength);
  let output: Buffer;

  switch (method) {
    case CompressionMethod.Store:
      output = input;
      break;
    case CompressionMethod.Deflate:
      try {
        // Output is capped one byte past the expected size so oversized streams are
        // detected without inflating them completely.
        output = inflateSync(input, { maxOutputLength: expectedSize + 1 });
      } catch (error) {
        throw new ArchiveError(
          'CompressionError',
          `Malformed deflate stream: ${error instanceof Error ? error.message : String(error)}`,
          { method, expected: expectedSize },
          error
        );
      }
      break;
    default:
      throw new ArchiveError('CompressionError', `Unsupported compression method ${compressionMethodName(method)}`, { method });
  }

  if (output.length !== expectedSize) {
    throw new ArchiveError(
      'CompressionError',
      `Decompressed size ${output.length} does not match expected size ${expectedSize}`,
      { method, expected: expectedSize, actual: output.length }
    );
  }
  return output;
}
