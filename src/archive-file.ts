/**
 * File-system entry points: open an archive file, and write one atomically.
 */
import { randomBytes } from 'node:crypto';
import { access, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { ArchiveError } from './archive-error.js';
import { ArchiveReader, type ArchiveReaderOptions } from './archive-reader.js';
import { FileByteSource } from './byte-source.js';

export interface WriteArchiveFileOptions {
  /** Replace an existing file at the destination. */
  readonly overwrite?: boolean;
}

/**
 * Opens an archive file for random access. The returned reader owns the file handle and
 * releases it on `close()`.
 *
 * @throws {ArchiveError} `IoError` or any structural error from {@link ArchiveReader.open}
 */
export function openArchiveFile(filePath: string, options: Omit<ArchiveReaderOptions, 'closeSource'> = {}): ArchiveReader {
  const source = FileByteSource.open(filePath);
  try {
    return ArchiveReader.open(source, { ...options, closeSource: true });
  } catch (error) {
    source.close();
    if (error instanceof ArchiveError && error.context.path === undefined) {
      throw new ArchiveError(error.kind, `${filePath}: ${error.message}`, { ...error.context, path: filePath }, error.cause);
    }
    throw error;
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Writes archive bytes to a temporary sibling file and renames it into place, so an
 * interrupted write never leaves a truncated archive at `outputPath`.
 *
 * @throws {ArchiveError} `IoError` if the destination exists without `overwrite`, or the write fails
 */
export async function writeArchiveFile(outputPath: string, bytes: Uint8Array, options: WriteArchiveFileOptions = {}): Promise<void> {
  if (!options.overwrite && (await exists(outputPath))) {
    throw new ArchiveError('IoError', `Refusing to overwrite existing file: ${outputPath}`, { path: outputPath });
  }

  const tempPath = join(dirname(outputPath), `.${basename(outputPath)}.${randomBytes(6).toString('hex')}.tmp`);
  try {
    await writeFile(tempPath, bytes, { flag: 'wx' });
    await rename(tempPath, outputPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw new ArchiveError(
      'IoError',
      `Failed to write ${outputPath}: ${error instanceof Error ? error.message : String(error)}`,
      { path: outputPath },
      error
    );
  }
}
