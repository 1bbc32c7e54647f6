/**
 * Random-access reader for resource archives.
 *
 * `open` parses the header, the entry index and the name table, in that order. After that
 * the reader state is immutable: extractions only issue positioned reads against the byte
 * source and never touch shared state, so one reader can serve independent callers.
 */
import { ArchiveError, hex32 } from './archive-error.js';
import { toByteSource } from './byte-source.js';
import { checksumMismatch, contentHash, nameHash } from './checksum.js';
import { decompress } from './compression.js';
import { HEADER_SIZE, INDEX_RECORD_SIZE } from './constants/archive-format.js';
import { CompressionMethod } from './constants/compression-method.js';
import { DEFAULT_MAX_ENTRY_SIZE } from './constants/defaults.js';
import { readDataBlock } from './data-section.js';
import { EntryIndex } from './entry-index.js';
import { HeaderCodec } from './header-codec.js';
import { NameTable } from './name-table.js';
import type { ArchiveHeader } from './types/archive-header.js';
import type { ByteSource } from './types/byte-source.js';
import type { ArchiveEntry } from './types/entry-record.js';
import { OrderedMap } from './utils/ordered-map.js';

/** An entry is addressed by its literal name or by its name hash. */
export type EntryKey = string | number;

export type ArchiveReaderState = 'opened' | 'closed';

export interface ArchiveReaderOptions {
  /** Also compare the MD5 of every extracted payload with the index. Off by default. */
  readonly verifyContentHash?: boolean;
  /** Close the byte source when the reader is closed. */
  readonly closeSource?: boolean;
  /** Largest declared size a compressed entry may inflate to. Defaults to 512 MiB. */
  readonly maxEntrySize?: number;
}

export interface VerifyOptions {
  /** Decompress every entry as well, catching corrupt streams the checksum cannot see. */
  readonly full?: boolean;
}

export interface VerifyFailure {
  readonly entry: ArchiveEntry;
  readonly error: ArchiveError;
}

export interface VerifyReport {
  readonly ok: boolean;
  readonly checked: number;
  readonly failures: readonly VerifyFailure[];
}

function ensureRegion(label: string, offset: number, size: number, sourceSize: number): void {
  if (offset + size > sourceSize) {
    throw new ArchiveError('CorruptIndex', `${label} extends beyond the archive: offset=${offset}, size=${size}, archiveSize=${sourceSize}`, {
      offset,
      expected: sourceSize,
      actual: offset + size,
    });
  }
}

/** Caller-owned copy; the reader keeps its own content hash for verification. */
function exposeEntry(entry: ArchiveEntry): ArchiveEntry {
  return { ...entry, contentHash: Buffer.from(entry.contentHash) };
}

/**
 * Re-raises a codec error with the entry it concerns.
 */
function withEntryContext(error: unknown, entry: ArchiveEntry, absoluteOffset: number): unknown {
  if (!(error instanceof ArchiveError)) {
    return error;
  }
  return new ArchiveError(
    error.kind,
    `Entry "${entry.name}": ${error.message}`,
    { ...error.context, entryName: entry.name, nameHash: entry.nameHash, offset: absoluteOffset },
    error.cause
  );
}

export class ArchiveReader {
  private currentState: ArchiveReaderState = 'opened';

  private constructor(
    private readonly source: ByteSource,
    public readonly header: ArchiveHeader,
    private readonly entries: OrderedMap<number, ArchiveEntry>,
    private readonly options: ArchiveReaderOptions
  ) {}

  /**
   * Parses an archive from a byte source or an in-memory buffer.
   *
   * @throws {ArchiveError} `InvalidMagic`, `UnsupportedVersion`, `CorruptIndex` or `IoError`,
   * whichever structural problem is met first
   */
  static open(input: ByteSource | Uint8Array, options: ArchiveReaderOptions = {}): ArchiveReader {
    const source = toByteSource(input);
    const header = HeaderCodec.decode(source.read(0, Math.min(source.size, HEADER_SIZE)));

    if (header.indexSize !== header.entryCount * INDEX_RECORD_SIZE) {
      throw new ArchiveError(
        'CorruptIndex',
        `Index size ${header.indexSize} does not match ${header.entryCount} records of ${INDEX_RECORD_SIZE} bytes`,
        { expected: header.entryCount * INDEX_RECORD_SIZE, actual: header.indexSize }
      );
    }
    ensureRegion('Entry index', header.indexOffset, header.indexSize, source.size);
    ensureRegion('Name table', header.nameTableOffset, header.nameTableStoredSize, source.size);
    ensureRegion('Data section', header.dataOffset, header.dataSize, source.size);

    const index = EntryIndex.decode(source.read(header.indexOffset, header.indexSize), header.entryCount, header.dataSize);
    const names = NameTable.decode(
      source.read(header.nameTableOffset, header.nameTableStoredSize),
      header.nameTableMethod,
      header.nameTableSize,
      Array.from(index, (record) => record.nameHash)
    );

    const entries = new OrderedMap<number, ArchiveEntry>();
    let position = 0;
    for (const record of index) {
      const name = names.get(record.nameHash);
      if (name === undefined) {
        throw new ArchiveError('CorruptIndex', `Entry ${hex32(record.nameHash)} has no name`, { nameHash: record.nameHash });
      }
      entries.insert(record.nameHash, { ...record, name, index: position });
      position += 1;
    }

    return new ArchiveReader(source, header, entries, options);
  }

  get state(): ArchiveReaderState {
    return this.currentState;
  }

  /** Number of entries. */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Entry metadata in index order. The iterable is lazy and can be iterated any number of times.
   */
  list(): Iterable<ArchiveEntry> {
    const entries = this.entries;
    return {
      *[Symbol.iterator](): Iterator<ArchiveEntry> {
        for (const entry of entries.values()) {
          yield exposeEntry(entry);
        }
      },
    };
  }

  names(): string[] {
    return Array.from(this.entries.values(), (entry) => entry.name);
  }

  has(key: EntryKey): boolean {
    return this.lookup(key) !== undefined;
  }

  /**
   * @throws {ArchiveError} `EntryNotFound`
   */
  entry(key: EntryKey): ArchiveEntry {
    return exposeEntry(this.requireEntry(key));
  }

  /**
   * @throws {ArchiveError} `EntryNotFound` when the position is out of range
   */
  entryAt(index: number): ArchiveEntry {
    return exposeEntry(this.requireEntryAt(index));
  }

  /**
   * Reads, verifies and decompresses one entry.
   *
   * @throws {ArchiveError} `EntryNotFound`, `ChecksumMismatch` (checked before decompression),
   * `CompressionError`, `IoError` or `InvalidState` after close
   */
  extract(key: EntryKey): Buffer {
    this.ensureOpen();
    return this.readEntry(this.requireEntry(key));
  }

  extractAt(index: number): Buffer {
    this.ensureOpen();
    return this.readEntry(this.requireEntryAt(index));
  }

  /**
   * Checks the stored bytes of every entry against its checksum without returning payloads.
   * Checksum and compression failures are collected; I/O failures are thrown.
   */
  verifyAll(options: VerifyOptions = {}): VerifyReport {
    this.ensureOpen();
    const failures: VerifyFailure[] = [];
    let checked = 0;
    for (const entry of this.entries.values()) {
      try {
        if (options.full) {
          this.readEntry(entry);
        } else {
          this.readStoredBytes(entry);
        }
      } catch (error) {
        if (ArchiveError.is(error, 'ChecksumMismatch') || ArchiveError.is(error, 'CompressionError')) {
          failures.push({ entry: exposeEntry(entry), error });
        } else {
          throw error;
        }
      }
      checked += 1;
    }
    return { ok: failures.length === 0, checked, failures };
  }

  /** Sum of uncompressed sizes of all entries. */
  decompressedSize(): number {
    let total = 0;
    for (const entry of this.entries.values()) {
      total += entry.uncompressedSize;
    }
    return total;
  }

  close(): void {
    if (this.currentState === 'closed') {
      return;
    }
    this.currentState = 'closed';
    if (this.options.closeSource) {
      this.source.close?.();
    }
  }

  private lookup(key: EntryKey): ArchiveEntry | undefined {
    if (typeof key === 'number') {
      return this.entries.get(key >>> 0);
    }
    const entry = this.entries.get(nameHash(key));
    // A different name can share the hash; only an exact match counts.
    return entry && entry.name === key ? entry : undefined;
  }

  private requireEntry(key: EntryKey): ArchiveEntry {
    const entry = this.lookup(key);
    if (!entry) {
      const context = typeof key === 'string' ? { entryName: key, nameHash: nameHash(key) } : { nameHash: key };
      throw new ArchiveError('EntryNotFound', `Entry not found: ${typeof key === 'string' ? `"${key}"` : hex32(key)}`, context);
    }
    return entry;
  }

  private requireEntryAt(index: number): ArchiveEntry {
    const pair = this.entries.at(index);
    if (!pair) {
      throw new ArchiveError('EntryNotFound', `No entry at index ${index} (archive has ${this.entries.size})`, { expected: this.entries.size, actual: index });
    }
    return pair[1];
  }

  private ensureOpen(): void {
    if (this.currentState !== 'opened') {
      throw new ArchiveError('InvalidState', 'Archive reader is closed');
    }
  }

  private readStoredBytes(entry: ArchiveEntry): Buffer {
    const stored = readDataBlock(this.source, this.header, entry);
    const actual = checksumMismatch(stored, entry.checksum);
    if (actual !== null) {
      throw new ArchiveError(
        'ChecksumMismatch',
        `Checksum mismatch for "${entry.name}": expected ${hex32(entry.checksum)}, got ${hex32(actual)}`,
        { entryName: entry.name, nameHash: entry.nameHash, offset: this.header.dataOffset + entry.offset, expected: entry.checksum, actual }
      );
    }
    return stored;
  }

  private readEntry(entry: ArchiveEntry): Buffer {
    const stored = this.readStoredBytes(entry);
    const absoluteOffset = this.header.dataOffset + entry.offset;

    const maxEntrySize = this.options.maxEntrySize ?? DEFAULT_MAX_ENTRY_SIZE;
    if (entry.method !== CompressionMethod.Store && entry.uncompressedSize > maxEntrySize) {
      throw new ArchiveError(
        'CompressionError',
        `Entry "${entry.name}" declares ${entry.uncompressedSize} bytes, above the ${maxEntrySize}-byte limit`,
        { entryName: entry.name, nameHash: entry.nameHash, offset: absoluteOffset, method: entry.method, expected: maxEntrySize, actual: entry.uncompressedSize }
      );
    }

    let payload: Buffer;
    try {
      payload = decompress(entry.method, stored, entry.uncompressedSize);
    } catch (error) {
      throw withEntryContext(error, entry, absoluteOffset);
    }

    if (this.options.verifyContentHash) {
      const digest = contentHash(payload);
      if (!digest.equals(entry.contentHash)) {
        throw new ArchiveError(
          'ChecksumMismatch',
          `Content hash mismatch for "${entry.name}": expected ${entry.contentHash.toString('hex')}, got ${digest.toString('hex')}`,
          {
            entryName: entry.name,
            nameHash: entry.nameHash,
            offset: absoluteOffset,
            expected: entry.contentHash.toString('hex'),
            actual: digest.toString('hex'),
          }
        );
      }
    }
    return payload;
  }
}
