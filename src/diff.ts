/**
 * Entry-level comparison of two archives by name and content hash.
 */
import type { ArchiveReader } from './archive-reader.js';
import type { ArchiveEntry } from './types/entry-record.js';

export interface ChangedEntry {
  readonly name: string;
  readonly left: ArchiveEntry;
  readonly right: ArchiveEntry;
}

export interface ArchiveDiff {
  /** Names only in the right archive. */
  readonly added: readonly string[];
  /** Names only in the left archive. */
  readonly removed: readonly string[];
  readonly changed: readonly ChangedEntry[];
  readonly unchanged: readonly string[];
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compares two archives without reading any payload: entries are equal when their
 * uncompressed size and content hash match. All lists are sorted by name.
 */
export function diffArchives(left: ArchiveReader, right: ArchiveReader): ArchiveDiff {
  const added: string[] = [];
  const removed: string[] = [];
  const changed: ChangedEntry[] = [];
  const unchanged: string[] = [];

  for (const entry of left.list()) {
    if (!right.has(entry.name)) {
      removed.push(entry.name);
      continue;
    }
    const other = right.entry(entry.name);
    if (other.uncompressedSize === entry.uncompressedSize && other.contentHash.equals(entry.contentHash)) {
      unchanged.push(entry.name);
    } else {
      changed.push({ name: entry.name, left: entry, right: other });
    }
  }
  for (const entry of right.list()) {
    if (!left.has(entry.name)) {
      added.push(entry.name);
    }
  }

  return {
    added: added.sort(compareNames),
    removed: removed.sort(compareNames),
    changed: changed.sort((a, b) => compareNames(a.name, b.name)),
    unchanged: unchanged.sort(compareNames),
  };
}

/** True when the two archives hold the same names with the same content. */
export function isIdentical(diff: ArchiveDiff): boolean {
  return diff.added.length === 0 && diff.removed.length === 0 && diff.changed.length === 0;
}
