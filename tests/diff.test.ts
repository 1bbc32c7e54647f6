import { describe, expect, it } from 'vitest';
import { ArchiveReader } from '../src/archive-reader.js';
import { diffArchives, isIdentical } from '../src/diff.js';
import { buildArchive } from './helpers.js';

describe('diffArchives', () => {
  it('classifies entries by name and content', () => {
    const left = ArchiveReader.open(buildArchive({ 'c.txt': '3', 'a.txt': '1', 'b.txt': '2' }));
    const right = ArchiveReader.open(buildArchive({ 'd.txt': '4', 'b.txt': '2', 'c.txt': 'changed' }));

    const diff = diffArchives(left, right);

    expect(diff.added).toEqual(['d.txt']);
    expect(diff.removed).toEqual(['a.txt']);
    expect(diff.changed.map((change) => [change.name, change.left.uncompressedSize, change.right.uncompressedSize])).toEqual([['c.txt', 1, 7]]);
    expect(diff.unchanged).toEqual(['b.txt']);
    expect(isIdentical(diff)).toBe(false);
  });

  it('ignores entry order and compression settings', () => {
    const left = ArchiveReader.open(buildArchive({ 'a.txt': 'x'.repeat(500), 'b.txt': 'y' }, { compression: 'store' }));
    const right = ArchiveReader.open(buildArchive({ 'b.txt': 'y', 'a.txt': 'x'.repeat(500) }, { compression: 'deflate' }));

    const diff = diffArchives(left, right);
    expect(diff.unchanged).toEqual(['a.txt', 'b.txt']);
    expect(isIdentical(diff)).toBe(true);
  });
});
