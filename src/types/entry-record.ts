/**
 * One fixed-size index record.
 */
export interface EntryRecord {
  /** CRC-32/BZIP2 of the entry name. */
  readonly nameHash: number;
  readonly uncompressedSize: number;
  /** Length of the bytes persisted in the data section. */
  readonly storedSize: number;
  /** Compression method tag as read from disk; may be unknown. */
  readonly method: number;
  /** CRC-32 of the stored bytes. */
  readonly checksum: number;
  /** Offset relative to the start of the data section. */
  readonly offset: number;
  /** MD5 of the uncompressed bytes (16 bytes). */
  readonly contentHash: Buffer;
}

/**
 * Index record joined with its name, as exposed by the reader.
 */
export interface ArchiveEntry extends EntryRecord {
  readonly name: string;
  /** Position in index order. */
  readonly index: number;
}
