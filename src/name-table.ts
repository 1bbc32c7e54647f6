/**
 * Maps entry name hashes back to literal names.
 *
 * Layout before optional compression: `count: u32`, then per record
 * `nameHash: u32, byteLength: u32, utf8 bytes`.
 */
import { ArchiveError, hex32 } from './archive-error.js';
import { nameHash } from './checksum.js';
import { compress, decompress } from './compression.js';
import { CompressionMethod } from './constants/compression-method.js';
import { DEFAULT_COMPRESSION_LEVEL, DEFAULT_NAME_TABLE_COMPRESSION_THRESHOLD } from './constants/defaults.js';
import { BinaryReader } from './utils/binary-reader.js';
import { BinaryWriter } from './utils/binary-writer.js';

export interface NameTableEncodeOptions {
  /** Tables larger than this many bytes are offered to the compressor. */
  readonly compressionThreshold?: number;
  readonly level?: number;
}

export interface EncodedNameTable {
  /** Stored bytes, possibly compressed. */
  readonly bytes: Buffer;
  readonly method: CompressionMethod;
  /** Uncompressed length. */
  readonly size: number;
}

/**
 * Decoded hash → name mapping.
 */
export class NameTable {
  private constructor(private readonly names: ReadonlyMap<number, string>) {}

  get size(): number {
    return this.names.size;
  }

  get(hash: number): string | undefined {
    return this.names.get(hash);
  }

  has(hash: number): boolean {
    return this.names.has(hash);
  }

  entries(): IterableIterator<[number, string]> {
    return this.names.entries();
  }

  /**
   * Serializes (hash, name) pairs in the given order.
   */
  static encode(names: Iterable<readonly [number, string]>, options: NameTableEncodeOptions = {}): EncodedNameTable {
    const threshold = options.compressionThreshold ?? DEFAULT_NAME_TABLE_COMPRESSION_THRESHOLD;
    const pairs = Array.from(names);

    const writer = new BinaryWriter();
    writer.writeUint32(pairs.length);
    for (const [hash, name] of pairs) {
      writer.writeUint32(hash);
      writer.writePascalString32(name);
    }
    const raw = writer.toBuffer();

    if (raw.length <= threshold) {
      return { bytes: raw, method: CompressionMethod.Store, size: raw.length };
    }
    const { method, stored } = compress(raw, { policy: 'auto', level: options.level ?? DEFAULT_COMPRESSION_LEVEL });
    return { bytes: stored, method, size: raw.length };
  }

  /**
   * Parses a stored name table and cross-checks it against the entry index.
   *
   * @param bytes - Stored table bytes
   * @param method - Compression method from the header
   * @param size - Uncompressed length from the header
   * @param requiredHashes - Name hashes of every index record
   * @throws {ArchiveError} `CorruptIndex` for any inconsistency, including a table that fails to decompress
   */
  static decode(bytes: Buffer, method: number, size: number, requiredHashes: Iterable<number>): NameTable {
    let raw: Buffer;
    try {
      raw = decompress(method, bytes, size);
    } catch (error) {
      throw new ArchiveError(
        'CorruptIndex',
        `Name table cannot be decoded: ${error instanceof Error ? error.message : String(error)}`,
        { method },
        error
      );
    }

    const reader = new BinaryReader(raw, 'Name table');
    const count = reader.readUint32();
    const names = new Map<number, string>();
    for (let i = 0; i < count; i += 1) {
      const recordOffset = reader.position;
      const hash = reader.readUint32();
      const name = reader.readPascalString32();
      if (nameHash(name) !== hash) {
        throw new ArchiveError('CorruptIndex', `Name "${name}" does not hash to its recorded hash ${hex32(hash)}`, {
          entryName: name,
          nameHash: hash,
          offset: recordOffset,
        });
      }
      if (names.has(hash)) {
        throw new ArchiveError('CorruptIndex', `Name table repeats hash ${hex32(hash)}`, { entryName: name, nameHash: hash, offset: recordOffset });
      }
      names.set(hash, name);
    }
    if (reader.remaining !== 0) {
      throw new ArchiveError('CorruptIndex', `Name table has ${reader.remaining} trailing bytes`, { offset: reader.position });
    }

    const required = new Set<number>(requiredHashes);
    for (const hash of required) {
      if (!names.has(hash)) {
        throw new ArchiveError('CorruptIndex', `Entry ${hex32(hash)} has no name in the name table`, { nameHash: hash });
      }
    }
    for (const [hash, name] of names) {
      if (!required.has(hash)) {
        throw new ArchiveError('CorruptIndex', `Name "${name}" is not referenced by any entry`, { entryName: name, nameHash: hash });
      }
    }

    return new NameTable(names);
  }
}
