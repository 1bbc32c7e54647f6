/**
 * Random-access byte source an archive is read from.
 *
 * Reads are positioned and independent of each other: an implementation must not keep a
 * shared cursor that one read could move under another.
 */
export interface ByteSource {
  /** Total length in bytes. */
  readonly size: number;
  /**
   * Reads exactly `length` bytes starting at `offset` into a fresh buffer.
   * @throws {ArchiveError} `IoError` when the range cannot be read completely
   */
  read(offset: number, length: number): Buffer;
  /** Releases the underlying handle, when there is one. */
  close?(): void;
}
