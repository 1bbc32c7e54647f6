/**
 * Table of fixed-size entry records, keyed by name hash and kept in insertion order.
 */
import { ArchiveError, hex32 } from './archive-error.js';
import { CONTENT_HASH_SIZE, INDEX_RECORD_SIZE, RECORD_FIELD } from './constants/archive-format.js';
import { ensureWithinDataSection } from './data-section.js';
import type { EntryRecord } from './types/entry-record.js';
import { OrderedMap } from './utils/ordered-map.js';

function writeRecord(buffer: Buffer, record: EntryRecord, recordOffset: number): void {
  if (record.contentHash.length !== CONTENT_HASH_SIZE) {
    throw new ArchiveError('CorruptIndex', `Content hash must be ${CONTENT_HASH_SIZE} bytes, got ${record.contentHash.length}`, {
      nameHash: record.nameHash,
    });
  }
  buffer.writeUInt32LE(record.nameHash >>> 0, recordOffset + RECORD_FIELD.nameHash);
  buffer.writeUInt32LE(record.uncompressedSize, recordOffset + RECORD_FIELD.uncompressedSize);
  buffer.writeUInt32LE(record.storedSize, recordOffset + RECORD_FIELD.storedSize);
  buffer.writeUInt32LE(record.method, recordOffset + RECORD_FIELD.method);
  buffer.writeUInt32LE(record.checksum >>> 0, recordOffset + RECORD_FIELD.checksum);
  buffer.writeUInt32LE(record.offset, recordOffset + RECORD_FIELD.offset);
  record.contentHash.copy(buffer, recordOffset + RECORD_FIELD.contentHash);
}

function readRecord(buffer: Buffer, recordOffset: number): EntryRecord {
  const hashStart = recordOffset + RECORD_FIELD.contentHash;
  return {
    nameHash: buffer.readUInt32LE(recordOffset + RECORD_FIELD.nameHash),
    uncompressedSize: buffer.readUInt32LE(recordOffset + RECORD_FIELD.uncompressedSize),
    storedSize: buffer.readUInt32LE(recordOffset + RECORD_FIELD.storedSize),
    method: buffer.readUInt32LE(recordOffset + RECORD_FIELD.method),
    checksum: buffer.readUInt32LE(recordOffset + RECORD_FIELD.checksum),
    offset: buffer.readUInt32LE(recordOffset + RECORD_FIELD.offset),
    contentHash: Buffer.from(buffer.subarray(hashStart, hashStart + CONTENT_HASH_SIZE)),
  };
}

/**
 * Order-preserving collection of {@link EntryRecord}s with unique name hashes.
 */
export class EntryIndex implements Iterable<EntryRecord> {
  private readonly records = new OrderedMap<number, EntryRecord>();

  get size(): number {
    return this.records.size;
  }

  /**
   * Appends a record.
   * @throws {ArchiveError} `DuplicateEntryName` if the name hash is already present
   */
  add(record: EntryRecord): void {
    if (!this.records.insert(record.nameHash, record)) {
      throw new ArchiveError('DuplicateEntryName', `Duplicate name hash ${hex32(record.nameHash)} in entry index`, {
        nameHash: record.nameHash,
      });
    }
  }

  get(nameHash: number): EntryRecord | undefined {
    return this.records.get(nameHash);
  }

  has(nameHash: number): boolean {
    return this.records.has(nameHash);
  }

  indexOf(nameHash: number): number {
    return this.records.indexOf(nameHash);
  }

  at(index: number): EntryRecord | undefined {
    return this.records.at(index)?.[1];
  }

  [Symbol.iterator](): IterableIterator<EntryRecord> {
    return this.records.values();
  }

  /**
   * Serializes records in insertion order.
   */
  static encode(entries: Iterable<EntryRecord>): Buffer {
    const list: EntryRecord[] = Array.from(entries);
    const buffer = Buffer.alloc(list.length * INDEX_RECORD_SIZE);
    list.forEach((record, i) => writeRecord(buffer, record, i * INDEX_RECORD_SIZE));
    return buffer;
  }

  /**
   * Parses exactly `count` records and checks every data block against the data section.
   *
   * @param buffer - Raw index bytes
   * @param count - Declared entry count
   * @param dataSize - Length of the data section
   * @throws {ArchiveError} `CorruptIndex` on truncated input, an out-of-bounds block or a repeated name hash
   */
  static decode(buffer: Buffer, count: number, dataSize: number): EntryIndex {
    const required = count * INDEX_RECORD_SIZE;
    if (buffer.length < required) {
      throw new ArchiveError('CorruptIndex', `Entry index truncated: ${count} records need ${required} bytes, got ${buffer.length}`, {
        expected: required,
        actual: buffer.length,
      });
    }

    const index = new EntryIndex();
    for (let i = 0; i < count; i += 1) {
      const recordOffset = i * INDEX_RECORD_SIZE;
      const record = readRecord(buffer, recordOffset);
      ensureWithinDataSection(record, dataSize);
      if (index.has(record.nameHash)) {
        throw new ArchiveError('CorruptIndex', `Entry index repeats name hash ${hex32(record.nameHash)} at record ${i}`, {
          nameHash: record.nameHash,
          offset: recordOffset,
        });
      }
      index.add(record);
    }
    return index;
  }
}
