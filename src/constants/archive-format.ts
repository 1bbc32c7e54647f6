/**
 * Fixed layout of the resource archive container.
 * All multi-byte integers are little-endian u32.
 */

/** Format tag at offset 0. */
export const ARCHIVE_MAGIC = 'RARC';

/** Version written by the builder. */
export const FORMAT_VERSION = 1;

/** Oldest and newest versions the reader accepts. */
export const MIN_SUPPORTED_VERSION = 1;
export const MAX_SUPPORTED_VERSION = 1;

export const HEADER_SIZE = 48;

/** Field offsets inside the header. */
export const HEADER_FIELD = {
  magic: 0x00,
  version: 0x04,
  entryCount: 0x08,
  indexOffset: 0x0c,
  indexSize: 0x10,
  nameTableOffset: 0x14,
  nameTableMethod: 0x18,
  nameTableStoredSize: 0x1c,
  nameTableSize: 0x20,
  dataOffset: 0x24,
  dataSize: 0x28,
  flags: 0x2c,
} as const;

export const INDEX_RECORD_SIZE = 40;

/** Field offsets inside one index record. */
export const RECORD_FIELD = {
  nameHash: 0x00,
  uncompressedSize: 0x04,
  storedSize: 0x08,
  method: 0x0c,
  checksum: 0x10,
  offset: 0x14,
  contentHash: 0x18,
} as const;

/** Length of the MD5 content hash stored in each record. */
export const CONTENT_HASH_SIZE = 16;

/** Largest value a u32 field can hold. */
export const MAX_U32 = 0xffffffff;
