/**
 * Integrity and identity digests.
 *
 * - {@link fastChecksum}: CRC-32 over the stored bytes of an entry, checked on every extraction.
 * - {@link nameHash}: CRC-32/BZIP2 over the UTF-8 entry name, the entry's lookup key.
 * - {@link contentHash}: MD5 over the uncompressed payload, used for deduplication and diffs.
 */
import { createHash } from 'node:crypto';

const REFLECTED_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i;
    for (let k = 0; k < 8; k += 1) {
      c = (c & 1) !== 0 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

const FORWARD_TABLE: Uint32Array = (() => {
  const table = new Uint32Array(256);
  for (let i = 0; i < 256; i += 1) {
    let c = i << 24;
    for (let k = 0; k < 8; k += 1) {
      c = (c & 0x80000000) !== 0 ? (c << 1) ^ 0x04c11db7 : c << 1;
    }
    table[i] = c >>> 0;
  }
  return table;
})();

/**
 * CRC-32 (ISO-HDLC, the zlib/PNG variant) of the given bytes.
 */
export function fastChecksum(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < bytes.length; i += 1) {
    crc = REFLECTED_TABLE[(crc ^ bytes[i]) & 0xff] ^ (crc >>> 8);
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * CRC-32/BZIP2 (non-reflected) of the given bytes.
 */
export function crc32Bzip2(bytes: Uint8Array): number {
  let crc = 0xffffffff;
  for (let i = 0; i < bytes.length; i += 1) {
    crc = (crc << 8) ^ FORWARD_TABLE[((crc >>> 24) ^ bytes[i]) & 0xff];
  }
  return (crc ^ 0xffffffff) >>> 0;
}

/**
 * Name hash of an entry: CRC-32/BZIP2 of its UTF-8 encoded name.
 */
export function nameHash(name: string): number {
  return crc32Bzip2(Buffer.from(name, 'utf8'));
}

/**
 * 128-bit MD5 digest of the uncompressed payload.
 */
export function contentHash(bytes: Uint8Array): Buffer {
  return createHash('md5').update(bytes).digest();
}

/**
 * Verifies stored bytes against an expected CRC-32.
 * @returns The computed checksum when it differs, otherwise null.
 */
export function checksumMismatch(bytes: Uint8Array, expected: number): number | null {
  const actual = fastChecksum(bytes);
  return actual === expected >>> 0 ? null : actual;
}
