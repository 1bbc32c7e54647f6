/**
 * Positioned-read byte sources over memory and over an open file.
 */
import { closeSync, fstatSync, openSync, readSync } from 'node:fs';
import { ArchiveError } from './archive-error.js';
import type { ByteSource } from './types/byte-source.js';

function ensureRange(offset: number, length: number, size: number, path?: string): void {
  if (!Number.isInteger(offset) || !Number.isInteger(length) || offset < 0 || length < 0 || offset + length > size) {
    throw new ArchiveError('IoError', `Read of ${length} bytes at offset ${offset} is outside the ${size}-byte source`, {
      offset,
      expected: length,
      actual: Math.max(0, size - offset),
      path,
    });
  }
}

/**
 * Byte source over an in-memory buffer. Every read returns a copy.
 */
export class BufferByteSource implements ByteSource {
  private readonly buffer: Buffer;

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get size(): number {
    return this.buffer.length;
  }

  read(offset: number, length: number): Buffer {
    ensureRange(offset, length, this.buffer.length);
    return Buffer.from(this.buffer.subarray(offset, offset + length));
  }
}

/**
 * Byte source over a file descriptor using positioned `readSync` calls, so concurrent
 * readers never share a file cursor.
 */
export class FileByteSource implements ByteSource {
  private fd: number | null;

  private constructor(fd: number, public readonly size: number, public readonly filePath: string) {
    this.fd = fd;
  }

  /**
   * Opens a file for reading.
   * @throws {ArchiveError} `IoError` if the file cannot be opened or inspected
   */
  static open(filePath: string): FileByteSource {
    let fd: number;
    try {
      fd = openSync(filePath, 'r');
    } catch (error) {
      throw new ArchiveError('IoError', `Cannot open ${filePath}: ${error instanceof Error ? error.message : String(error)}`, { path: filePath }, error);
    }
    try {
      return new FileByteSource(fd, fstatSync(fd).size, filePath);
    } catch (error) {
      closeSync(fd);
      throw new ArchiveError('IoError', `Cannot stat ${filePath}: ${error instanceof Error ? error.message : String(error)}`, { path: filePath }, error);
    }
  }

  read(offset: number, length: number): Buffer {
    if (this.fd === null) {
      throw new ArchiveError('IoError', `File source ${this.filePath} is closed`, { path: this.filePath });
    }
    ensureRange(offset, length, this.size, this.filePath);

    const buffer = Buffer.alloc(length);
    let filled = 0;
    while (filled < length) {
      let bytesRead: number;
      try {
        bytesRead = readSync(this.fd, buffer, filled, length - filled, offset + filled);
      } catch (error) {
        throw new ArchiveError(
          'IoError',
          `Read failed in ${this.filePath} at offset ${offset + filled}: ${error instanceof Error ? error.message : String(error)}`,
          { path: this.filePath, offset: offset + filled },
          error
        );
      }
      if (bytesRead === 0) {
        throw new ArchiveError('IoError', `Unexpected end of file in ${this.filePath} at offset ${offset + filled}`, {
          path: this.filePath,
          offset: offset + filled,
          expected: length,
          actual: filled,
        });
      }
      filled += bytesRead;
    }
    return buffer;
  }

  close(): void {
    if (this.fd !== null) {
      const fd = this.fd;
      this.fd = null;
      closeSync(fd);
    }
  }
}

/**
 * Wraps raw bytes in a {@link BufferByteSource}; passes byte sources through.
 */
export function toByteSource(source: ByteSource | Uint8Array): ByteSource {
  return source instanceof Uint8Array ? new BufferByteSource(source) : source;
}
