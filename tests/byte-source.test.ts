import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ArchiveError } from '../src/archive-error.js';
import { BufferByteSource, FileByteSource } from '../src/byte-source.js';
import { catchArchiveError } from './helpers.js';

describe('BufferByteSource', () => {
  it('returns copies of the requested range', () => {
    const backing = Buffer.from('abcdef');
    const source = new BufferByteSource(backing);
    const slice = source.read(1, 3);
    expect(slice.toString()).toBe('bcd');
    slice[0] = 0x7a;
    expect(backing.toString()).toBe('abcdef');
  });

  it('rejects reads outside the buffer', () => {
    const source = new BufferByteSource(Buffer.from('abc'));
    expect(() => source.read(2, 2)).toThrow(ArchiveError);
    expect(() => source.read(-1, 1)).toThrow(ArchiveError);
  });
});

describe('FileByteSource', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'resource-archive-byte-source-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('reads positioned ranges from a file', async () => {
    const filePath = path.join(tmpDir, 'data.bin');
    await fs.writeFile(filePath, '0123456789');
    const source = FileByteSource.open(filePath);
    try {
      expect(source.size).toBe(10);
      expect(source.read(7, 3).toString()).toBe('789');
      expect(source.read(0, 2).toString()).toBe('01');
    } finally {
      source.close();
    }
  });

  it('fails with IoError for a missing file', () => {
    const error = catchArchiveError(() => FileByteSource.open(path.join(tmpDir, 'missing.bin')));
    expect(error.kind).toBe('IoError');
    expect(error.context.path).toBe(path.join(tmpDir, 'missing.bin'));
  });

  it('refuses reads after close', async () => {
    const filePath = path.join(tmpDir, 'data.bin');
    await fs.writeFile(filePath, 'abc');
    const source = FileByteSource.open(filePath);
    source.close();
    source.close();
    expect(catchArchiveError(() => source.read(0, 1)).kind).toBe('IoError');
  });
});
