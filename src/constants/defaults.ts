import type { CompressionPolicy } from './compression-method.js';

/** Default method selection for added payloads. */
export const DEFAULT_COMPRESSION_POLICY: CompressionPolicy = 'auto';

/** zlib level used for payloads and the name table. */
export const DEFAULT_COMPRESSION_LEVEL = 6;

/** Share one data block between entries with identical content. */
export const DEFAULT_DEDUPLICATE = true;

/** Name tables larger than this many bytes are offered to the compressor. */
export const DEFAULT_NAME_TABLE_COMPRESSION_THRESHOLD = 256;

/** Ceiling on the declared uncompressed size of a compressed entry. */
export const DEFAULT_MAX_ENTRY_SIZE = 512 * 1024 * 1024;
