import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileNotFoundError } from '../../src/errors.js';
import { LocalFileSystem } from '../../src/fs/local.js';
import { bytes, text } from '../helpers/letters.js';

describe('LocalFileSystem', () => {
  let dir: string;
  let fs: LocalFileSystem;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'rangefs-test-'));
    fs = new LocalFileSystem({}, {});
  });

  afterEach(async () => {
    await fs.close();
    await rm(dir, { recursive: true, force: true });
  });

  it('should read back a written file', async () => {
    const path = join(dir, 'hello.txt');
    await fs.pipe(path, bytes('hello world'));

    expect(text(await fs.cat(path))).toBe('hello world');
    expect(text(await fs.cat(`file://${path}`, 6))).toBe('world');
  });

  it('should describe files with their modification time', async () => {
    const path = join(dir, 'a.bin');
    await writeFile(path, new Uint8Array([1, 2, 3]));

    const info = await fs.info(path);
    expect(info).toMatchObject({ name: path, size: 3, type: 'file' });
    expect(typeof info.mtime).toBe('number');
    await expect(fs.info(join(dir, 'missing.bin'))).rejects.toThrow(FileNotFoundError);
  });

  it('should read new content after an overwrite', async () => {
    const path = join(dir, 'data.txt');
    await fs.pipe(path, bytes('first'));
    expect(text(await fs.cat(path))).toBe('first');

    await fs.pipe(path, bytes('second version'));
    expect(text(await fs.cat(path))).toBe('second version');
  });

  it('should append to an existing file', async () => {
    const path = join(dir, 'log.txt');
    await fs.pipe(path, bytes('abc'));

    const file = await fs.open(path, 'ab');
    await file.write(bytes('def'));
    await file.close();

    expect(text(await fs.cat(path))).toBe('abcdef');
  });

  it('should create parent directories on write', async () => {
    const path = join(dir, 'nested', 'deeper', 'file.txt');
    await fs.pipe(path, bytes('deep'));

    expect(text(await fs.cat(path))).toBe('deep');
  });

  it('should leave nothing behind when an upload is discarded', async () => {
    const path = join(dir, 'draft.txt');
    const file = await fs.open(path, 'wb', { autocommit: false });
    await file.write(bytes('draft'));
    await file.close();
    await file.discard();

    expect(await fs.exists(path)).toBe(false);
    expect(await readdir(dir)).toEqual([]);
  });

  it('should read ranges, short at the end of the file', async () => {
    const path = join(dir, 'nums.bin');
    const data = new Uint8Array(100);
    for (let i = 0; i < 100; i++) data[i] = i;
    await writeFile(path, data);

    const results = await fs.readRanges(path, [
      { start: 0, end: 5 },
      { start: 50, end: 53 },
      { start: 98, end: 110 },
    ]);

    expect(results.map(r => [...r])).toEqual([[0, 1, 2, 3, 4], [50, 51, 52], [98, 99]]);
  });

  it('should list and remove entries', async () => {
    await fs.pipe(join(dir, 'a.txt'), bytes('a'));
    await fs.pipe(join(dir, 'sub', 'b.txt'), bytes('bb'));

    const listing = await fs.ls(dir);
    expect(listing.map(e => [e.name, e.type])).toEqual([
      [join(dir, 'a.txt'), 'file'],
      [join(dir, 'sub'), 'directory'],
    ]);

    await fs.rm(join(dir, 'a.txt'));
    expect(await fs.exists(join(dir, 'a.txt'))).toBe(false);
    expect((await fs.ls(dir)).map(e => e.name)).toEqual([join(dir, 'sub')]);
    await expect(fs.rm(join(dir, 'a.txt'))).rejects.toThrow(FileNotFoundError);
  });

  it('should respect maxOpenFiles', async () => {
    const pooled = new LocalFileSystem({ maxOpenFiles: 2 }, {});
    try {
      for (let i = 0; i < 4; i++) {
        const path = join(dir, `file-${i}.bin`);
        await writeFile(path, new Uint8Array([i]));
        expect([...(await pooled.cat(path))]).toEqual([i]);
      }
      expect(pooled.openHandles).toBe(2);
    } finally {
      await pooled.close();
    }
    expect(pooled.openHandles).toBe(0);
  });

  it('should share one handle between parallel range reads', async () => {
    const path = join(dir, 'letters.txt');
    await writeFile(path, 'abcdefghijklmnopqrstuvwxyz');
    const countDescriptors = async (): Promise<number> => (await readdir('/proc/self/fd')).length;

    const pooled = new LocalFileSystem({}, {});
    const before = process.platform === 'linux' ? await countDescriptors() : 0;
    const chunks = await pooled.readRanges(path, [
      { start: 0, end: 3 },
      { start: 5, end: 8 },
      { start: 10, end: 13 },
      { start: 20, end: 23 },
    ]);
    expect(chunks.map(chunk => text(chunk))).toEqual(['abc', 'fgh', 'klm', 'uvw']);
    expect(pooled.openHandles).toBe(1);

    await pooled.close();
    expect(pooled.openHandles).toBe(0);
    if (process.platform === 'linux') expect(await countDescriptors()).toBe(before);
  });

  it('should finish a read whose handle is evicted while in use', async () => {
    const a = join(dir, 'a.txt');
    const b = join(dir, 'b.txt');
    await writeFile(a, 'first file');
    await writeFile(b, 'second file');

    const pooled = new LocalFileSystem({ maxOpenFiles: 1 }, {});
    try {
      const [fromA, fromB] = await Promise.all([pooled.readRange(a, 0, 5), pooled.readRange(b, 0, 6)]);
      expect(text(fromA)).toBe('first');
      expect(text(fromB)).toBe('second');
      expect(pooled.openHandles).toBe(1);
      expect(text(await pooled.readRange(a, 6, 10))).toBe('file');
    } finally {
      await pooled.close();
    }
  });

  it('should not pool a handle for a missing file', async () => {
    await expect(fs.readRange(join(dir, 'missing.bin'), 0, 4)).rejects.toThrow(FileNotFoundError);
    expect(fs.openHandles).toBe(0);
  });
});
