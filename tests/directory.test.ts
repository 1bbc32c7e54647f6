import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveReader } from '../src/archive-reader.js';
import { enumerateFiles, extractToDirectory, packDirectory, resolveEntryPath } from '../src/directory.js';
import { buildArchive, catchArchiveError, catchArchiveErrorAsync, createRecordingLogger } from './helpers.js';

describe('directories', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resource-archive-directory-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function writeTree(root: string, files: Record<string, string>): Promise<void> {
    for (const [name, content] of Object.entries(files)) {
      const filePath = path.join(root, ...name.split('/'));
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(filePath, content);
    }
  }

  describe('packDirectory', () => {
    it('packs every file under sorted relative names', async () => {
      const sourceDir = path.join(tmpDir, 'source');
      await writeTree(sourceDir, { 'sub/a.txt': 'nested', 'b.txt': 'bee', 'a.txt': 'ay' });
      const logger = createRecordingLogger();

      expect(await enumerateFiles(sourceDir)).toEqual(['a.txt', 'b.txt', 'sub/a.txt']);
      const reader = ArchiveReader.open(await packDirectory({ inputDir: sourceDir, logger }));

      expect(reader.names()).toEqual(['a.txt', 'b.txt', 'sub/a.txt']);
      expect(reader.extract('sub/a.txt').toString()).toBe('nested');
      expect(logger.lines[0]).toBe(`Found 3 files in ${sourceDir}`);
      expect(logger.lines[3]).toBe('  + sub/a.txt (6 bytes)');
    });

    it('fails on a directory without files', async () => {
      const emptyDir = path.join(tmpDir, 'empty');
      await fs.mkdir(path.join(emptyDir, 'nothing-here'), { recursive: true });
      await expect(packDirectory({ inputDir: emptyDir, logger: createRecordingLogger() })).rejects.toThrow(
        `No files found in directory: ${emptyDir}`
      );
    });
  });

  describe('extractToDirectory', () => {
    it('writes entries as files and creates directories', async () => {
      const outputDir = path.join(tmpDir, 'out');
      const reader = ArchiveReader.open(buildArchive({ 'a.txt': 'hello', 'deep/er/b.txt': 'world' }));

      const written = await extractToDirectory({ reader, outputDir, logger: createRecordingLogger() });

      expect(written).toEqual([path.join(outputDir, 'a.txt'), path.join(outputDir, 'deep', 'er', 'b.txt')]);
      expect(await fs.readFile(path.join(outputDir, 'deep', 'er', 'b.txt'), 'utf8')).toBe('world');
    });

    it('extracts only the selected entries', async () => {
      const outputDir = path.join(tmpDir, 'out');
      const reader = ArchiveReader.open(buildArchive({ 'a.txt': 'hello', 'b.txt': 'world' }));

      await extractToDirectory({ reader, outputDir, entries: ['b.txt'], logger: createRecordingLogger() });
      expect(await fs.readdir(outputDir)).toEqual(['b.txt']);
    });

    it('refuses to overwrite existing files unless asked', async () => {
      const outputDir = path.join(tmpDir, 'out');
      await writeTree(outputDir, { 'a.txt': 'old' });
      const reader = ArchiveReader.open(buildArchive({ 'a.txt': 'new' }));
      const logger = createRecordingLogger();

      const error = await catchArchiveErrorAsync(() => extractToDirectory({ reader, outputDir, logger }));
      expect(error.kind).toBe('IoError');
      expect(await fs.readFile(path.join(outputDir, 'a.txt'), 'utf8')).toBe('old');

      await extractToDirectory({ reader, outputDir, overwrite: true, logger });
      expect(await fs.readFile(path.join(outputDir, 'a.txt'), 'utf8')).toBe('new');
    });

    it('writes nothing when any entry name is unsafe', async () => {
      const outputDir = path.join(tmpDir, 'out');
      const reader = ArchiveReader.open(buildArchive({ 'good.txt': 'fine', '../evil.txt': 'escape' }));

      const error = await catchArchiveErrorAsync(() => extractToDirectory({ reader, outputDir, logger: createRecordingLogger() }));
      expect(error.kind).toBe('UnsafeEntryPath');
      expect(error.context.entryName).toBe('../evil.txt');
      await expect(fs.access(path.join(outputDir, 'good.txt'))).rejects.toThrow();
      await expect(fs.access(path.join(tmpDir, 'evil.txt'))).rejects.toThrow();
    });
  });

  describe('resolveEntryPath', () => {
    it('accepts the filesystem root as the output directory', () => {
      expect(resolveEntryPath('/', 'a.txt')).toBe(path.resolve('/', 'a.txt'));
    });

    it('accepts names that only start with two dots', () => {
      expect(resolveEntryPath('/srv/out', '..hidden.txt')).toBe(path.resolve('/srv/out', '..hidden.txt'));
    });

    it('maps names below the output directory', () => {
      expect(resolveEntryPath('/srv/out', 'a/./b.txt')).toBe(path.resolve('/srv/out', 'a', 'b.txt'));
    });

    it.each(['../x', 'a/../../x', '/etc/passwd', 'C:evil.txt', '', './'])('rejects %j', (name) => {
      expect(catchArchiveError(() => resolveEntryPath('/srv/out', name)).kind).toBe('UnsafeEntryPath');
    });
  });
});
