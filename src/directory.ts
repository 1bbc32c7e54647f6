/**
 * Directory helpers: pack a directory tree into an archive, unpack an archive into a directory.
 */
import { mkdir, readdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import { ArchiveBuilder, type ArchiveBuilderOptions } from './archive-builder.js';
import { ArchiveError } from './archive-error.js';
import type { ArchiveReader } from './archive-reader.js';
import type { Logger } from './types/logger.js';

export interface PackDirectoryOptions extends ArchiveBuilderOptions {
  /** Directory whose files become archive entries. */
  readonly inputDir: string;
  readonly logger?: Logger;
}

export interface ExtractToDirectoryOptions {
  readonly reader: ArchiveReader;
  readonly outputDir: string;
  /** Replace files that already exist. */
  readonly overwrite?: boolean;
  /** Only these entry names; all entries when omitted. */
  readonly entries?: readonly string[];
  readonly logger?: Logger;
}

/**
 * Lists every regular file below `directoryPath`, as `/`-separated relative paths in
 * code-unit order so the resulting archive does not depend on directory listing order.
 */
export async function enumerateFiles(directoryPath: string): Promise<string[]> {
  const root = resolve(directoryPath);
  const files: string[] = [];

  const walk = async (current: string): Promise<void> => {
    const entries = await readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = resolve(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile()) {
        files.push(relative(root, fullPath).split(sep).join('/'));
      }
    }
  };

  await walk(root);
  return files.sort();
}

/**
 * Builds an archive from every file in a directory tree.
 *
 * @returns Serialized archive bytes
 * @throws Error if the directory holds no files
 */
export async function packDirectory(options: PackDirectoryOptions): Promise<Buffer> {
  const { inputDir, logger = console, ...builderOptions } = options;
  const resolvedInputDir = resolve(inputDir);

  const files = await enumerateFiles(resolvedInputDir);
  if (files.length === 0) {
    throw new Error(`No files found in directory: ${resolvedInputDir}`);
  }
  logger.log(`Found ${files.length} files in ${resolvedInputDir}`);

  const builder = new ArchiveBuilder(builderOptions);
  for (const name of files) {
    const bytes = await readFile(resolve(resolvedInputDir, ...name.split('/')));
    builder.add(name, bytes);
    logger.log(`  + ${name} (${bytes.length} bytes)`);
  }
  return builder.finalize();
}

/**
 * Maps an entry name to a path inside `outputDir`.
 *
 * @throws {ArchiveError} `UnsafeEntryPath` for absolute names, `..` segments, or anything
 * that would resolve outside the output directory
 */
export function resolveEntryPath(outputDir: string, name: string): string {
  const segments = name.split(/[\\/]/);
  if (isAbsolute(name) || /^[A-Za-z]:/.test(name) || segments.includes('..') || segments.every((segment) => segment === '' || segment === '.')) {
    throw new ArchiveError('UnsafeEntryPath', `Entry name cannot be used as a file path: ${JSON.stringify(name)}`, { entryName: name });
  }
  const root = resolve(outputDir);
  const target = resolve(root, ...segments.filter((segment) => segment !== '' && segment !== '.'));
  const inside = relative(root, target);
  if (inside === '' || inside === '..' || inside.startsWith(`..${sep}`) || isAbsolute(inside)) {
    throw new ArchiveError('UnsafeEntryPath', `Entry "${name}" resolves outside ${root}`, { entryName: name, path: target });
  }
  return target;
}

/**
 * Writes archive entries as files below `outputDir`, creating directories as needed.
 * Every name is validated before anything is written.
 *
 * @returns Absolute paths written, in index order
 */
export async function extractToDirectory(options: ExtractToDirectoryOptions): Promise<string[]> {
  const { reader, outputDir, overwrite = false, logger = console } = options;
  const selected = options.entries ? options.entries.map((name) => reader.entry(name)) : Array.from(reader.list());
  const targets = selected.map((entry) => ({ entry, path: resolveEntryPath(outputDir, entry.name) }));

  await mkdir(resolve(outputDir), { recursive: true });

  const written: string[] = [];
  for (const { entry, path } of targets) {
    const bytes = reader.extract(entry.name);
    await mkdir(dirname(path), { recursive: true });
    try {
      await writeFile(path, bytes, { flag: overwrite ? 'w' : 'wx' });
    } catch (error) {
      throw new ArchiveError(
        'IoError',
        `Failed to write ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { entryName: entry.name, path },
        error
      );
    }
    logger.log(`  ✓ ${entry.name} → ${path}`);
    written.push(path);
  }
  return written;
}
