/**
 * Error taxonomy for archive parsing, verification and construction.
 */

/** Machine-readable category of an {@link ArchiveError}. */
export type ArchiveErrorKind =
  | 'IoError'
  | 'InvalidMagic'
  | 'UnsupportedVersion'
  | 'CorruptIndex'
  | 'ChecksumMismatch'
  | 'CompressionError'
  | 'DuplicateEntryName'
  | 'EntryNotFound'
  | 'InvalidEntryName'
  | 'InvalidState'
  | 'LimitExceeded'
  | 'UnsafeEntryPath';

/**
 * Structured diagnostic fields attached to an error.
 */
export interface ArchiveErrorContext {
  /** Literal entry name, when known. */
  readonly entryName?: string;
  /** Name hash of the entry involved. */
  readonly nameHash?: number;
  /** Absolute byte offset in the archive (or in the table being decoded). */
  readonly offset?: number;
  /** Value the format required (checksum, size, version...). */
  readonly expected?: number | string;
  /** Value actually found. */
  readonly actual?: number | string;
  /** Compression method tag involved. */
  readonly method?: number;
  /** File-system path involved. */
  readonly path?: string;
}

/**
 * Error raised by every archive operation. Malformed input is reported through
 * this type, never through a bare RangeError from the Buffer API.
 */
export class ArchiveError extends Error {
  constructor(
    public readonly kind: ArchiveErrorKind,
    message: string,
    public readonly context: ArchiveErrorContext = {},
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'ArchiveError';
  }

  /**
   * Narrows an unknown value to an ArchiveError, optionally of one kind.
   */
  static is(error: unknown, kind?: ArchiveErrorKind): error is ArchiveError {
    return error instanceof ArchiveError && (kind === undefined || error.kind === kind);
  }
}

/**
 * Formats a u32 as `0x`-prefixed, zero-padded hex for messages.
 */
export function hex32(value: number): string {
  return `0x${(value >>> 0).toString(16).padStart(8, '0')}`;
}
