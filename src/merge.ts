/**
 * Merge orchestrator: combines several archives into one.
 *
 * Entries keep the position of their first appearance; when a later archive carries an
 * entry with the same name, its payload replaces the earlier one (later inputs win, like a
 * load order).
 */
import { basename } from 'node:path';
import { ArchiveBuilder, type ArchiveBuilderOptions } from './archive-builder.js';
import { openArchiveFile, writeArchiveFile } from './archive-file.js';
import type { ArchiveReader } from './archive-reader.js';
import type { Logger } from './types/logger.js';
import { OrderedMap } from './utils/ordered-map.js';

export interface MergeInput {
  /** Label used in log lines. */
  readonly label: string;
  readonly reader: ArchiveReader;
}

export interface MergeArchivesOptions extends ArchiveBuilderOptions {
  readonly inputs: readonly MergeInput[];
  readonly logger?: Logger;
}

export interface MergeArchiveFilesOptions extends ArchiveBuilderOptions {
  readonly inputFiles: readonly string[];
  readonly outputFile: string;
  readonly overwrite?: boolean;
  readonly logger?: Logger;
}

export interface MergeSummary {
  readonly entryCount: number;
  /** Entries replaced by a later input with different content. */
  readonly overridden: number;
  /** Entries repeated with identical content. */
  readonly duplicates: number;
}

interface MergedEntry {
  readonly source: string;
  readonly payload: Buffer;
  readonly contentHash: Buffer;
}

/**
 * Merges archives in memory.
 *
 * @returns The merged archive bytes and counts of what was overridden
 * @throws Error when no inputs are given; archive errors from extraction propagate
 */
export function mergeArchives(options: MergeArchivesOptions): { readonly bytes: Buffer; readonly summary: MergeSummary } {
  const { inputs, logger = console, ...builderOptions } = options;
  if (inputs.length === 0) {
    throw new Error('No archives to merge');
  }

  const merged = new OrderedMap<string, MergedEntry>();
  let overridden = 0;
  let duplicates = 0;

  for (const { label, reader } of inputs) {
    logger.log(`  - ${label} (${reader.size} entries)`);
    for (const entry of reader.list()) {
      const existing = merged.get(entry.name);
      if (existing && existing.contentHash.equals(entry.contentHash)) {
        duplicates += 1;
        continue;
      }
      if (existing) {
        logger.warn(`⚠️  Conflict for "${entry.name}": ${label} replaces the copy from ${existing.source}`);
        overridden += 1;
      }
      merged.set(entry.name, { source: label, payload: reader.extract(entry.name), contentHash: entry.contentHash });
    }
  }

  const builder = new ArchiveBuilder(builderOptions);
  for (const [name, entry] of merged) {
    builder.add(name, entry.payload);
  }

  return {
    bytes: builder.finalize(),
    summary: { entryCount: merged.size, overridden, duplicates },
  };
}

/**
 * Merges archive files and writes the result atomically.
 */
export async function mergeArchiveFiles(options: MergeArchiveFilesOptions): Promise<MergeSummary> {
  const { inputFiles, outputFile, overwrite, logger = console, ...builderOptions } = options;

  logger.log(`Merging ${inputFiles.length} archives into: ${outputFile}`);
  const readers: ArchiveReader[] = [];
  try {
    for (const filePath of inputFiles) {
      readers.push(openArchiveFile(filePath));
    }
    const { bytes, summary } = mergeArchives({
      ...builderOptions,
      logger,
      inputs: readers.map((reader, i) => ({ label: basename(inputFiles[i]), reader })),
    });
    await writeArchiveFile(outputFile, bytes, { overwrite });

    logger.log(`\nMerge Summary:`);
    logger.log(`  Total entries: ${summary.entryCount}`);
    logger.log(`  Overridden by later archives: ${summary.overridden}`);
    logger.log(`  Identical duplicates skipped: ${summary.duplicates}`);
    return summary;
  } finally {
    for (const reader of readers) {
      reader.close();
    }
  }
}
