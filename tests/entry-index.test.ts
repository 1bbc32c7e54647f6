import { describe, expect, it } from 'vitest';
import { EntryIndex } from '../src/entry-index.js';
import type { EntryRecord } from '../src/types/entry-record.js';
import { catchArchiveError } from './helpers.js';

function record(nameHash: number, offset: number, storedSize: number): EntryRecord {
  return {
    nameHash,
    uncompressedSize: storedSize,
    storedSize,
    method: 0,
    checksum: 0xdeadbeef,
    offset,
    contentHash: Buffer.alloc(16, nameHash & 0xff),
  };
}

describe('EntryIndex', () => {
  it('keeps records in insertion order and looks them up by hash', () => {
    const index = new EntryIndex();
    index.add(record(0x300, 0, 4));
    index.add(record(0x100, 4, 4));
    expect(Array.from(index, (r) => r.nameHash)).toEqual([0x300, 0x100]);
    expect(index.indexOf(0x100)).toBe(1);
    expect(index.get(0x300)?.offset).toBe(0);
    expect(index.at(1)?.nameHash).toBe(0x100);
    expect(index.has(0x200)).toBe(false);
  });

  it('rejects a duplicate name hash', () => {
    const index = new EntryIndex();
    index.add(record(7, 0, 1));
    expect(catchArchiveError(() => index.add(record(7, 1, 1))).kind).toBe('DuplicateEntryName');
    expect(index.size).toBe(1);
  });

  it('encodes 40 bytes per record and decodes them back', () => {
    const records = [record(0xaabbccdd, 0, 5), record(0x11223344, 5, 7)];
    const bytes = EntryIndex.encode(records);
    expect(bytes.length).toBe(80);
    expect(bytes.readUInt32LE(0)).toBe(0xaabbccdd);
    expect(bytes.readUInt32LE(40 + 0x14)).toBe(5);

    const decoded = EntryIndex.decode(bytes, 2, 12);
    expect(Array.from(decoded)).toEqual(records);
  });

  it('rejects a truncated index', () => {
    const bytes = EntryIndex.encode([record(1, 0, 1)]);
    expect(catchArchiveError(() => EntryIndex.decode(bytes, 2, 10)).kind).toBe('CorruptIndex');
  });

  it('rejects blocks past the end of the data section', () => {
    const bytes = EntryIndex.encode([record(1, 10, 5)]);
    expect(catchArchiveError(() => EntryIndex.decode(bytes, 1, 12)).kind).toBe('CorruptIndex');
  });

  it('rejects a repeated name hash', () => {
    const bytes = EntryIndex.encode([record(1, 0, 1), record(1, 1, 1)]);
    expect(catchArchiveError(() => EntryIndex.decode(bytes, 2, 2)).kind).toBe('CorruptIndex');
  });
});
