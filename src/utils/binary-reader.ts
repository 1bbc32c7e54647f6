import { ArchiveError } from '../archive-error.js';

/**
 * Bounds-checked little-endian byte cursor.
 * Reading past the end raises `CorruptIndex` instead of a Buffer RangeError.
 */
export class BinaryReader {
  private offset = 0;

  /**
   * @param buffer - Bytes to read
   * @param label - Table name used in error messages
   */
  constructor(private readonly buffer: Buffer, private readonly label: string) {}

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.buffer.length - this.offset;
  }

  readUint32(): number {
    this.require(4);
    const value = this.buffer.readUInt32LE(this.offset);
    this.offset += 4;
    return value;
  }

  readBytes(length: number): Buffer {
    this.require(length);
    const bytes = this.buffer.subarray(this.offset, this.offset + length);
    this.offset += length;
    return bytes;
  }

  readPascalString32(): string {
    const length = this.readUint32();
    const bytes = this.readBytes(length);
    const str = bytes.toString('utf8');
    if (!Buffer.from(str, 'utf8').equals(bytes)) {
      throw new ArchiveError('CorruptIndex', `${this.label} contains a string that is not valid UTF-8`, {
        offset: this.offset - length,
      });
    }
    return str;
  }

  private require(length: number): void {
    if (length > this.remaining) {
      throw new ArchiveError(
        'CorruptIndex',
        `${this.label} truncated: needed ${length} bytes at offset ${this.offset}, ${this.remaining} available`,
        { offset: this.offset, expected: length, actual: this.remaining }
      );
    }
  }
}
