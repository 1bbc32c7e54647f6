#!/usr/bin/env node
/**
 * Command-line front end for resource archives.
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { resolve } from 'node:path';
import { ArchiveError } from './archive-error.js';
import { openArchiveFile, writeArchiveFile } from './archive-file.js';
import { compressionMethodName, type CompressionPolicy } from './constants/compression-method.js';
import { DEFAULT_COMPRESSION_LEVEL } from './constants/defaults.js';
import { diffArchives, isIdentical } from './diff.js';
import { extractToDirectory, packDirectory } from './directory.js';
import { mergeArchiveFiles } from './merge.js';

interface BuildFlags {
  compression: CompressionPolicy;
  level: number;
  dedupe: boolean;
  overwrite?: boolean;
}

const program = new Command();

const version = '0.1.0';

function parseLevel(value: string): number {
  const level = Number(value);
  if (!Number.isInteger(level) || level < 0 || level > 9) {
    throw new InvalidArgumentError('Level must be an integer from 0 to 9.');
  }
  return level;
}

function describeError(error: unknown): string {
  if (error instanceof ArchiveError) {
    return `[${error.kind}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}

function fail(verb: string, error: unknown): never {
  console.error(`❌ ${verb} failed:`, describeError(error));
  process.exit(1);
}

function withBuildOptions(command: Command): Command {
  return command
    .addOption(new Option('--compression <policy>', 'Compression policy for entries').choices(['auto', 'store', 'deflate']).default('auto'))
    .option('--level <n>', 'zlib compression level (0-9)', parseLevel, DEFAULT_COMPRESSION_LEVEL)
    .option('--no-dedupe', 'Store identical payloads separately')
    .option('--overwrite', 'Replace the output file if it exists');
}

program
  .name('rarc')
  .description('Build, inspect and verify checksummed resource archives')
  .version(version);

withBuildOptions(
  program
    .command('create')
    .description('Pack every file below a directory into a new archive')
    .argument('<input-dir>', 'Directory whose files become archive entries')
    .argument('<output-file>', 'Path where the archive will be written')
).action(async (inputDir: string, outputFile: string, options: BuildFlags) => {
  try {
    console.log(`Packing directory: ${inputDir}`);
    console.log(`Output will be written to: ${outputFile}`);
    console.log('');

    const bytes = await packDirectory({
      inputDir: resolve(inputDir),
      compression: options.compression,
      level: options.level,
      deduplicate: options.dedupe,
    });
    await writeArchiveFile(resolve(outputFile), bytes, { overwrite: options.overwrite });

    console.log('');
    console.log(`✅ Archive written (${bytes.length} bytes)`);
  } catch (error) {
    fail('Create', error);
  }
});

program
  .command('list')
  .description('List the entries of an archive')
  .argument('<archive>', 'Archive file to inspect')
  .option('--json', 'Print entries as JSON')
  .action((archive: string, options: { json?: boolean }) => {
    try {
      const reader = openArchiveFile(resolve(archive));
      try {
        const entries = Array.from(reader.list(), (entry) => ({
          name: entry.name,
          size: entry.uncompressedSize,
          storedSize: entry.storedSize,
          method: compressionMethodName(entry.method),
          checksum: entry.checksum.toString(16).padStart(8, '0'),
          contentHash: entry.contentHash.toString('hex'),
        }));
        if (options.json) {
          console.log(JSON.stringify(entries, null, 2));
          return;
        }
        for (const entry of entries) {
          console.log(`${String(entry.size).padStart(10)} ${String(entry.storedSize).padStart(10)} ${entry.method.padEnd(8)} ${entry.checksum} ${entry.name}`);
        }
        console.log(`\n${entries.length} entries, ${reader.decompressedSize()} bytes uncompressed`);
      } finally {
        reader.close();
      }
    } catch (error) {
      fail('List', error);
    }
  });

program
  .command('extract')
  .description('Extract archive entries into a directory')
  .argument('<archive>', 'Archive file to extract')
  .argument('<output-dir>', 'Directory where entries will be written')
  .option('--overwrite', 'Replace files that already exist')
  .option('--entry <names...>', 'Only extract these entries')
  .action(async (archive: string, outputDir: string, options: { overwrite?: boolean; entry?: string[] }) => {
    try {
      console.log(`Extracting archive: ${archive}`);
      console.log(`Output will be written to: ${outputDir}`);
      console.log('');

      const reader = openArchiveFile(resolve(archive));
      try {
        const written = await extractToDirectory({
          reader,
          outputDir: resolve(outputDir),
          overwrite: options.overwrite,
          entries: options.entry,
        });
        console.log('');
        console.log(`✅ Extracted ${written.length} entries`);
      } finally {
        reader.close();
      }
    } catch (error) {
      fail('Extract', error);
    }
  });

program
  .command('verify')
  .description('Check every entry of an archive against its checksum')
  .argument('<archive>', 'Archive file to verify')
  .option('--full', 'Also decompress every entry')
  .action((archive: string, options: { full?: boolean }) => {
    try {
      const reader = openArchiveFile(resolve(archive));
      try {
        const report = reader.verifyAll({ full: options.full });
        for (const failure of report.failures) {
          console.error(`  ✗ ${failure.entry.name}: ${describeError(failure.error)}`);
        }
        if (!report.ok) {
          console.error(`❌ Verification FAILED: ${report.failures.length} of ${report.checked} entries are corrupt`);
          process.exitCode = 1;
          return;
        }
        console.log(`✅ Verification PASSED: ${report.checked} entries`);
      } finally {
        reader.close();
      }
    } catch (error) {
      fail('Verify', error);
    }
  });

withBuildOptions(
  program
    .command('merge')
    .description('Merge archives into one; later archives win on name conflicts')
    .argument('<output-file>', 'Path where the merged archive will be written')
    .argument('<archives...>', 'Archives to merge, in priority order')
).action(async (outputFile: string, archives: string[], options: BuildFlags) => {
  try {
    await mergeArchiveFiles({
      inputFiles: archives.map((archive) => resolve(archive)),
      outputFile: resolve(outputFile),
      overwrite: options.overwrite,
      compression: options.compression,
      level: options.level,
      deduplicate: options.dedupe,
    });
    console.log('');
    console.log('✅ Merge completed successfully!');
  } catch (error) {
    fail('Merge', error);
  }
});

program
  .command('diff')
  .description('Compare the entries of two archives')
  .argument('<left>', 'Baseline archive')
  .argument('<right>', 'Archive to compare against the baseline')
  .action((left: string, right: string) => {
    try {
      const leftReader = openArchiveFile(resolve(left));
      try {
        const rightReader = openArchiveFile(resolve(right));
        try {
          const diff = diffArchives(leftReader, rightReader);
          diff.added.forEach((name) => console.log(`+ ${name}`));
          diff.removed.forEach((name) => console.log(`- ${name}`));
          diff.changed.forEach(({ name, left: before, right: after }) =>
            console.log(`~ ${name} (${before.uncompressedSize} → ${after.uncompressedSize} bytes)`)
          );
          console.log(
            `\n${diff.added.length} added, ${diff.removed.length} removed, ${diff.changed.length} changed, ${diff.unchanged.length} unchanged`
          );
          if (!isIdentical(diff)) {
            process.exitCode = 1;
          }
        } finally {
          rightReader.close();
        }
      } finally {
        leftReader.close();
      }
    } catch (error) {
      fail('Diff', error);
    }
  });

await program.parseAsync();
