/**
 * Decoded archive header. Offsets are absolute file positions.
 */
export interface ArchiveHeader {
  readonly version: number;
  readonly entryCount: number;
  readonly indexOffset: number;
  readonly indexSize: number;
  readonly nameTableOffset: number;
  /** Compression method tag of the name table as a whole. */
  readonly nameTableMethod: number;
  readonly nameTableStoredSize: number;
  readonly nameTableSize: number;
  readonly dataOffset: number;
  readonly dataSize: number;
  readonly flags: number;
}
