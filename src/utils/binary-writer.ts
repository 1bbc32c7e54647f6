/**
 * Growable little-endian byte cursor for variable-length tables.
 */
export class BinaryWriter {
  private buffer: Buffer;
  private offset: number;

  constructor(initialCapacity = 1024) {
    this.buffer = Buffer.alloc(initialCapacity);
    this.offset = 0;
  }

  /** Number of bytes written so far. */
  get length(): number {
    return this.offset;
  }

  writeUint32(value: number): this {
    this.ensureCapacity(4);
    this.buffer.writeUInt32LE(value >>> 0, this.offset);
    this.offset += 4;
    return this;
  }

  writeBytes(bytes: Uint8Array): this {
    this.ensureCapacity(bytes.length);
    this.buffer.set(bytes, this.offset);
    this.offset += bytes.length;
    return this;
  }

  /**
   * Writes a u32 byte length followed by the UTF-8 bytes of the string.
   */
  writePascalString32(str: string): this {
    const strBuffer = Buffer.from(str, 'utf8');
    this.writeUint32(strBuffer.length);
    return this.writeBytes(strBuffer);
  }

  /** Copy of the written bytes. */
  toBuffer(): Buffer {
    return Buffer.from(this.buffer.subarray(0, this.offset));
  }

  private ensureCapacity(additionalBytes: number): void {
    const requiredSize = this.offset + additionalBytes;
    if (requiredSize > this.buffer.length) {
      const newSize = Math.max(requiredSize, this.buffer.length * 2);
      const newBuffer = Buffer.alloc(newSize);
      this.buffer.copy(newBuffer);
      this.buffer = newBuffer;
    }
  }
}
