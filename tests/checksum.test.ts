import { describe, expect, it } from 'vitest';
import { checksumMismatch, contentHash, crc32Bzip2, fastChecksum, nameHash } from '../src/checksum.js';

const CHECK_INPUT = Buffer.from('123456789', 'ascii');

describe('fastChecksum', () => {
  it('matches the CRC-32 check value', () => {
    expect(fastChecksum(CHECK_INPUT)).toBe(0xcbf43926);
  });

  it('is zero for empty input', () => {
    expect(fastChecksum(new Uint8Array(0))).toBe(0);
  });

  it('changes when a single bit flips', () => {
    const flipped = Buffer.from(CHECK_INPUT);
    flipped[4] ^= 0x01;
    expect(fastChecksum(flipped)).not.toBe(0xcbf43926);
  });
});

describe('crc32Bzip2', () => {
  it('matches the CRC-32/BZIP2 check value', () => {
    expect(crc32Bzip2(CHECK_INPUT)).toBe(0xfc891918);
  });

  it('is zero for empty input', () => {
    expect(crc32Bzip2(new Uint8Array(0))).toBe(0);
  });
});

describe('nameHash', () => {
  it('hashes the UTF-8 bytes of the name', () => {
    expect(nameHash('123456789')).toBe(0xfc891918);
    expect(nameHash('données/é.txt')).toBe(crc32Bzip2(Buffer.from('données/é.txt', 'utf8')));
  });
});

describe('contentHash', () => {
  it('returns the 16-byte MD5 digest', () => {
    expect(contentHash(new Uint8Array(0)).toString('hex')).toBe('d41d8cd98f00b204e9800998ecf8427e');
    expect(contentHash(Buffer.from('hello')).toString('hex')).toBe('5d41402abc4b2a76b9719d911017c592');
  });
});

describe('checksumMismatch', () => {
  it('returns null when the checksum matches', () => {
    expect(checksumMismatch(CHECK_INPUT, 0xcbf43926)).toBeNull();
  });

  it('returns the computed checksum when it differs', () => {
    expect(checksumMismatch(CHECK_INPUT, 0)).toBe(0xcbf43926);
  });
});
