/**
 * The region holding entry payloads, addressed by (offset, storedSize) pairs from the index.
 */
import { ArchiveError, hex32 } from './archive-error.js';
import type { ArchiveHeader } from './types/archive-header.js';
import type { ByteSource } from './types/byte-source.js';
import type { EntryRecord } from './types/entry-record.js';

/** Location of one stored block relative to the data section start. */
export interface DataBlock {
  readonly offset: number;
  readonly storedSize: number;
}

/**
 * @throws {ArchiveError} `CorruptIndex` if the block ends past the data section
 */
export function ensureWithinDataSection(record: Pick<EntryRecord, 'nameHash' | 'offset' | 'storedSize'>, dataSize: number): void {
  if (record.offset + record.storedSize > dataSize) {
    throw new ArchiveError(
      'CorruptIndex',
      `Entry ${hex32(record.nameHash)} data extends beyond the data section: offset=${record.offset}, size=${record.storedSize}, dataSize=${dataSize}`,
      { nameHash: record.nameHash, offset: record.offset, expected: dataSize, actual: record.offset + record.storedSize }
    );
  }
}

/**
 * Accumulates stored blocks back to back during a build.
 */
export class DataSectionWriter {
  private readonly chunks: Buffer[] = [];
  private length = 0;

  /** Bytes appended so far. */
  get size(): number {
    return this.length;
  }

  /**
   * Appends a block.
   * @returns Where the block landed
   */
  append(stored: Buffer): DataBlock {
    const block: DataBlock = { offset: this.length, storedSize: stored.length };
    this.chunks.push(stored);
    this.length += stored.length;
    return block;
  }

  /** Stored blocks in append order. */
  blocks(): readonly Buffer[] {
    return this.chunks;
  }
}

/**
 * Reads the stored bytes of one entry with a single positioned read.
 */
export function readDataBlock(source: ByteSource, header: ArchiveHeader, block: DataBlock): Buffer {
  return source.read(header.dataOffset + block.offset, block.storedSize);
}
