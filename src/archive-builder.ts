/**
 * Write side of the archive engine.
 *
 * Entries are accumulated in call order and serialized on {@link ArchiveBuilder.finalize}
 * as Header + EntryIndex + NameTable + DataSection. The same sequence of `add` calls always
 * yields byte-identical output.
 */
import { ArchiveError, hex32 } from './archive-error.js';
import { contentHash, fastChecksum, nameHash } from './checksum.js';
import { compress, type CompressedPayload } from './compression.js';
import { FORMAT_VERSION, HEADER_SIZE, INDEX_RECORD_SIZE, MAX_U32 } from './constants/archive-format.js';
import type { CompressionPolicy } from './constants/compression-method.js';
import {
  DEFAULT_COMPRESSION_LEVEL,
  DEFAULT_COMPRESSION_POLICY,
  DEFAULT_DEDUPLICATE,
  DEFAULT_NAME_TABLE_COMPRESSION_THRESHOLD,
} from './constants/defaults.js';
import { type DataBlock, DataSectionWriter } from './data-section.js';
import { EntryIndex } from './entry-index.js';
import { HeaderCodec } from './header-codec.js';
import { NameTable } from './name-table.js';
import type { ArchiveHeader } from './types/archive-header.js';
import type { EntryRecord } from './types/entry-record.js';
import { OrderedMap } from './utils/ordered-map.js';

export type ArchiveBuilderState = 'empty' | 'accumulating' | 'finalized';

export interface ArchiveBuilderOptions {
  /** Method selection for entries that do not override it. Defaults to `auto`. */
  readonly compression?: CompressionPolicy;
  /** zlib level for payloads and the name table. Defaults to 6. */
  readonly level?: number;
  /** Store identical payloads once. Defaults to true. */
  readonly deduplicate?: boolean;
  /** Name tables above this many bytes are offered to the compressor. Defaults to 256. */
  readonly nameTableCompressionThreshold?: number;
}

/** Builder options with every default applied. */
export type ResolvedArchiveBuilderOptions = Required<ArchiveBuilderOptions>;

export interface AddEntryOptions {
  /** Overrides the builder-wide compression policy for this entry. */
  readonly compression?: CompressionPolicy;
}

/** What the builder recorded for an added entry. */
export interface PendingEntryInfo {
  readonly name: string;
  readonly nameHash: number;
  readonly size: number;
  readonly contentHash: Buffer;
}

interface PendingEntry extends PendingEntryInfo {
  readonly bytes: Buffer;
  readonly compression: CompressionPolicy;
}

interface StoredBlock {
  readonly block: DataBlock;
  readonly payload: CompressedPayload;
  readonly checksum: number;
}

export function resolveBuilderOptions(options: ArchiveBuilderOptions = {}): ResolvedArchiveBuilderOptions {
  const level = options.level ?? DEFAULT_COMPRESSION_LEVEL;
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new RangeError(`Compression level must be an integer from 0 to 9, got ${level}`);
  }
  return {
    compression: options.compression ?? DEFAULT_COMPRESSION_POLICY,
    level,
    deduplicate: options.deduplicate ?? DEFAULT_DEDUPLICATE,
    nameTableCompressionThreshold: options.nameTableCompressionThreshold ?? DEFAULT_NAME_TABLE_COMPRESSION_THRESHOLD,
  };
}

/**
 * @throws {ArchiveError} `InvalidEntryName` for an empty name or one containing NUL
 */
function ensureValidName(name: string): void {
  if (name.length === 0) {
    throw new ArchiveError('InvalidEntryName', 'Entry name must not be empty');
  }
  if (name.includes('\0')) {
    throw new ArchiveError('InvalidEntryName', `Entry name must not contain NUL: ${JSON.stringify(name)}`, { entryName: name });
  }
}

function ensureU32(label: string, value: number): void {
  if (value > MAX_U32) {
    throw new ArchiveError('LimitExceeded', `${label} of ${value} bytes exceeds the format limit of ${MAX_U32}`, {
      expected: MAX_U32,
      actual: value,
    });
  }
}

function dedupKey(entry: PendingEntry): string {
  return `${entry.compression}:${entry.contentHash.toString('hex')}`;
}

/**
 * Single-writer archive builder: `empty → accumulating → finalized`.
 */
export class ArchiveBuilder {
  readonly options: ResolvedArchiveBuilderOptions;
  private readonly pending = new OrderedMap<number, PendingEntry>();
  private finalized = false;

  constructor(options: ArchiveBuilderOptions = {}) {
    this.options = resolveBuilderOptions(options);
  }

  get state(): ArchiveBuilderState {
    if (this.finalized) {
      return 'finalized';
    }
    return this.pending.size === 0 ? 'empty' : 'accumulating';
  }

  /** Number of pending entries. */
  get size(): number {
    return this.pending.size;
  }

  has(name: string): boolean {
    return this.pending.get(nameHash(name))?.name === name;
  }

  /** Names in insertion order. */
  names(): string[] {
    return Array.from(this.pending.values(), (entry) => entry.name);
  }

  /**
   * Records a named payload. The bytes are copied, so the caller may reuse its buffer.
   *
   * @throws {ArchiveError} `DuplicateEntryName` when the name hash is taken (the builder stays usable),
   * `InvalidEntryName`, `LimitExceeded`, or `InvalidState` once finalized
   */
  add(name: string, bytes: Uint8Array, options: AddEntryOptions = {}): PendingEntryInfo {
    this.ensureNotFinalized('add');
    ensureValidName(name);
    ensureU32(`Entry "${name}"`, bytes.length);

    const hash = nameHash(name);
    const existing = this.pending.get(hash);
    if (existing) {
      const detail = existing.name === name ? `"${name}" was already added` : `"${name}" collides with "${existing.name}"`;
      throw new ArchiveError('DuplicateEntryName', `Duplicate entry name hash ${hex32(hash)}: ${detail}`, { entryName: name, nameHash: hash });
    }

    const copy = Buffer.from(bytes);
    const entry: PendingEntry = {
      name,
      nameHash: hash,
      size: copy.length,
      contentHash: contentHash(copy),
      bytes: copy,
      compression: options.compression ?? this.options.compression,
    };
    this.pending.insert(hash, entry);
    return { name: entry.name, nameHash: entry.nameHash, size: entry.size, contentHash: Buffer.from(entry.contentHash) };
  }

  /**
   * Drops a pending entry.
   *
   * @throws {ArchiveError} `InvalidState` unless accumulating, `EntryNotFound` for an unknown name
   */
  remove(name: string): void {
    if (this.state !== 'accumulating') {
      throw new ArchiveError('InvalidState', `Cannot remove entries from a builder in state "${this.state}"`, { entryName: name });
    }
    const hash = nameHash(name);
    if (this.pending.get(hash)?.name !== name) {
      throw new ArchiveError('EntryNotFound', `Entry not found: "${name}"`, { entryName: name, nameHash: hash });
    }
    this.pending.delete(hash);
  }

  /**
   * Serializes the archive. On failure nothing is emitted and the builder keeps its entries.
   *
   * @throws {ArchiveError} `LimitExceeded` if a table or offset does not fit its u32 field,
   * `InvalidState` if called twice
   */
  finalize(): Buffer {
    this.ensureNotFinalized('finalize');

    const data = new DataSectionWriter();
    const blocksByContent = new Map<string, StoredBlock>();
    const index = new EntryIndex();

    for (const entry of this.pending.values()) {
      const key = dedupKey(entry);
      let stored = this.options.deduplicate ? blocksByContent.get(key) : undefined;
      if (!stored) {
        const payload = compress(entry.bytes, { policy: entry.compression, level: this.options.level });
        const block = data.append(payload.stored);
        ensureU32('Data section', data.size);
        stored = { block, payload, checksum: fastChecksum(payload.stored) };
        blocksByContent.set(key, stored);
      }

      const record: EntryRecord = {
        nameHash: entry.nameHash,
        uncompressedSize: entry.size,
        storedSize: stored.block.storedSize,
        method: stored.payload.method,
        checksum: stored.checksum,
        offset: stored.block.offset,
        contentHash: entry.contentHash,
      };
      index.add(record);
    }

    const indexBytes = EntryIndex.encode(index);
    const names = NameTable.encode(
      Array.from(this.pending.values(), (entry): [number, string] => [entry.nameHash, entry.name]),
      { compressionThreshold: this.options.nameTableCompressionThreshold, level: this.options.level }
    );

    const indexOffset = HEADER_SIZE;
    const nameTableOffset = indexOffset + indexBytes.length;
    const dataOffset = nameTableOffset + names.bytes.length;
    ensureU32('Archive', dataOffset + data.size);

    const header: ArchiveHeader = {
      version: FORMAT_VERSION,
      entryCount: index.size,
      indexOffset,
      indexSize: index.size * INDEX_RECORD_SIZE,
      nameTableOffset,
      nameTableMethod: names.method,
      nameTableStoredSize: names.bytes.length,
      nameTableSize: names.size,
      dataOffset,
      dataSize: data.size,
      flags: 0,
    };

    const output = Buffer.concat([HeaderCodec.encode(header), indexBytes, names.bytes, ...data.blocks()]);
    this.finalized = true;
    return output;
  }

  private ensureNotFinalized(operation: string): void {
    if (this.finalized) {
      throw new ArchiveError('InvalidState', `Cannot ${operation}: archive builder is already finalized`);
    }
  }
}
