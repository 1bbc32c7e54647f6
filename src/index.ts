/**
 * Resource Archive Tools - Main entry point
 *
 * Reads, verifies and builds checksummed, compressed resource archives.
 */

// Core engine
export { ArchiveReader } from './archive-reader.js';
export type { ArchiveReaderOptions, ArchiveReaderState, EntryKey, VerifyFailure, VerifyOptions, VerifyReport } from './archive-reader.js';
export { ArchiveBuilder, resolveBuilderOptions } from './archive-builder.js';
export type {
  AddEntryOptions,
  ArchiveBuilderOptions,
  ArchiveBuilderState,
  PendingEntryInfo,
  ResolvedArchiveBuilderOptions,
} from './archive-builder.js';
export { ArchiveError, hex32 } from './archive-error.js';
export type { ArchiveErrorContext, ArchiveErrorKind } from './archive-error.js';

// Codecs
export { contentHash, crc32Bzip2, fastChecksum, nameHash } from './checksum.js';
export { compress, decompress } from './compression.js';
export type { CompressedPayload, CompressOptions } from './compression.js';
export { HeaderCodec } from './header-codec.js';
export { EntryIndex } from './entry-index.js';
export { NameTable } from './name-table.js';
export type { EncodedNameTable, NameTableEncodeOptions } from './name-table.js';
export { DataSectionWriter, readDataBlock } from './data-section.js';
export type { DataBlock } from './data-section.js';
export { CompressionMethod, compressionMethodName, isCompressionMethod } from './constants/compression-method.js';
export type { CompressionPolicy } from './constants/compression-method.js';
export { ARCHIVE_MAGIC, FORMAT_VERSION, HEADER_SIZE, INDEX_RECORD_SIZE } from './constants/archive-format.js';

// Byte sources and files
export { BufferByteSource, FileByteSource } from './byte-source.js';
export { openArchiveFile, writeArchiveFile } from './archive-file.js';
export type { WriteArchiveFileOptions } from './archive-file.js';

// Orchestration
export { enumerateFiles, extractToDirectory, packDirectory, resolveEntryPath } from './directory.js';
export type { ExtractToDirectoryOptions, PackDirectoryOptions } from './directory.js';
export { mergeArchiveFiles, mergeArchives } from './merge.js';
export type { MergeArchiveFilesOptions, MergeArchivesOptions, MergeInput, MergeSummary } from './merge.js';
export { diffArchives, isIdentical } from './diff.js';
export type { ArchiveDiff, ChangedEntry } from './diff.js';

export type { ArchiveHeader } from './types/archive-header.js';
export type { ArchiveEntry, EntryRecord } from './types/entry-record.js';
export type { ByteSource } from './types/byte-source.js';
export type { Logger } from './types/logger.js';
