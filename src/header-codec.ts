/**
 * Fixed 48-byte archive header.
 */
import { ArchiveError } from './archive-error.js';
import {
  ARCHIVE_MAGIC,
  HEADER_FIELD,
  HEADER_SIZE,
  MAX_SUPPORTED_VERSION,
  MIN_SUPPORTED_VERSION,
} from './constants/archive-format.js';
import type { ArchiveHeader } from './types/archive-header.js';

const MAGIC_LENGTH = ARCHIVE_MAGIC.length;

/**
 * Validates the format tag.
 * @throws {ArchiveError} `InvalidMagic` if the tag is missing or different
 */
function ensureMagic(buffer: Buffer): void {
  const magic: string = buffer.length >= MAGIC_LENGTH ? buffer.toString('latin1', 0, MAGIC_LENGTH) : '';
  if (magic !== ARCHIVE_MAGIC) {
    throw new ArchiveError('InvalidMagic', `Not a resource archive: expected magic "${ARCHIVE_MAGIC}"`, {
      offset: 0,
      expected: ARCHIVE_MAGIC,
      actual: buffer.subarray(0, MAGIC_LENGTH).toString('hex'),
    });
  }
}

function ensureVersion(version: number): void {
  if (version < MIN_SUPPORTED_VERSION || version > MAX_SUPPORTED_VERSION) {
    throw new ArchiveError(
      'UnsupportedVersion',
      `Unsupported archive version ${version} (supported: ${MIN_SUPPORTED_VERSION}-${MAX_SUPPORTED_VERSION})`,
      { offset: HEADER_FIELD.version, expected: MAX_SUPPORTED_VERSION, actual: version }
    );
  }
}

/**
 * Encoder/decoder pair for {@link ArchiveHeader}.
 */
export class HeaderCodec {
  static readonly SIZE = HEADER_SIZE;

  static encode(header: ArchiveHeader): Buffer {
    const buffer = Buffer.alloc(HEADER_SIZE);
    buffer.write(ARCHIVE_MAGIC, HEADER_FIELD.magic, 'latin1');
    buffer.writeUInt32LE(header.version, HEADER_FIELD.version);
    buffer.writeUInt32LE(header.entryCount, HEADER_FIELD.entryCount);
    buffer.writeUInt32LE(header.indexOffset, HEADER_FIELD.indexOffset);
    buffer.writeUInt32LE(header.indexSize, HEADER_FIELD.indexSize);
    buffer.writeUInt32LE(header.nameTableOffset, HEADER_FIELD.nameTableOffset);
    buffer.writeUInt32LE(header.nameTableMethod, HEADER_FIELD.nameTableMethod);
    buffer.writeUInt32LE(header.nameTableStoredSize, HEADER_FIELD.nameTableStoredSize);
    buffer.writeUInt32LE(header.nameTableSize, HEADER_FIELD.nameTableSize);
    buffer.writeUInt32LE(header.dataOffset, HEADER_FIELD.dataOffset);
    buffer.writeUInt32LE(header.dataSize, HEADER_FIELD.dataSize);
    buffer.writeUInt32LE(header.flags, HEADER_FIELD.flags);
    return buffer;
  }

  /**
   * Parses the header at the start of `buffer`. Trailing bytes are ignored.
   *
   * @throws {ArchiveError} `InvalidMagic`, `UnsupportedVersion`, or `CorruptIndex` when the
   * header is cut short after a valid tag
   */
  static decode(buffer: Buffer): ArchiveHeader {
    ensureMagic(buffer);
    if (buffer.length < HEADER_FIELD.version + 4) {
      throw new ArchiveError('CorruptIndex', `Archive header truncated: ${buffer.length} of ${HEADER_SIZE} bytes`, {
        expected: HEADER_SIZE,
        actual: buffer.length,
      });
    }
    const version: number = buffer.readUInt32LE(HEADER_FIELD.version);
    ensureVersion(version);
    if (buffer.length < HEADER_SIZE) {
      throw new ArchiveError('CorruptIndex', `Archive header truncated: ${buffer.length} of ${HEADER_SIZE} bytes`, {
        expected: HEADER_SIZE,
        actual: buffer.length,
      });
    }

    return {
      version,
      entryCount: buffer.readUInt32LE(HEADER_FIELD.entryCount),
      indexOffset: buffer.readUInt32LE(HEADER_FIELD.indexOffset),
      indexSize: buffer.readUInt32LE(HEADER_FIELD.indexSize),
      nameTableOffset: buffer.readUInt32LE(HEADER_FIELD.nameTableOffset),
      nameTableMethod: buffer.readUInt32LE(HEADER_FIELD.nameTableMethod),
      nameTableStoredSize: buffer.readUInt32LE(HEADER_FIELD.nameTableStoredSize),
      nameTableSize: buffer.readUInt32LE(HEADER_FIELD.nameTableSize),
      dataOffset: buffer.readUInt32LE(HEADER_FIELD.dataOffset),
      dataSize: buffer.readUInt32LE(HEADER_FIELD.dataSize),
      flags: buffer.readUInt32LE(HEADER_FIELD.flags),
    };
  }
}
