import { ArchiveBuilder, type ArchiveBuilderOptions } from '../src/archive-builder.js';
import { ArchiveError } from '../src/archive-error.js';
import type { Logger } from '../src/types/logger.js';

/**
 * Runs `fn` and returns the ArchiveError it throws. Anything else fails the test.
 */
export function catchArchiveError(fn: () => unknown): ArchiveError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ArchiveError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an ArchiveError to be thrown');
}

export async function catchArchiveErrorAsync(fn: () => Promise<unknown>): Promise<ArchiveError> {
  try {
    await fn();
  } catch (error) {
    if (error instanceof ArchiveError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected an ArchiveError to be thrown');
}

/** Logger that records every line instead of printing it. */
export function createRecordingLogger(): Logger & { readonly lines: string[]; readonly warnings: string[] } {
  const lines: string[] = [];
  const warnings: string[] = [];
  return {
    lines,
    warnings,
    log: (message: string) => lines.push(message),
    warn: (message: string) => warnings.push(message),
  };
}

/**
 * Builds an archive from name/content pairs in object order.
 */
export function buildArchive(entries: Record<string, string | Uint8Array>, options: ArchiveBuilderOptions = {}): Buffer {
  const builder = new ArchiveBuilder(options);
  for (const [name, content] of Object.entries(entries)) {
    builder.add(name, typeof content === 'string' ? Buffer.from(content) : content);
  }
  return builder.finalize();
}
