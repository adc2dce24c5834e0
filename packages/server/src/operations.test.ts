import { execFileSync } from 'node:child_process';
import { existsSync, unlinkSync } from 'node:fs';
import { mkdir, mkdtemp, readFile, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import yazl from 'yazl';
import type { OperationProgress, OperationResult } from '@filework/shared';
import { InvalidRequestError } from './errors.js';
import { nodeFileSystem } from './fs.js';
import { submitOperation, validateOperationRequest } from './operations.js';

const options = { fs: nodeFileSystem };

function collectProgress(): { events: OperationProgress[]; listener: (p: OperationProgress) => void } {
  const events: OperationProgress[] = [];
  return { events, listener: (progress) => events.push(progress) };
}

describe('operations', () => {
  let root: string;
  let out: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'filework-ops-'));
    out = join(root, 'out');
    await mkdir(out);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(root, { recursive: true, force: true });
  });

  it('copies a file and a directory with two progress events and no errors', async () => {
    const fileA = join(root, 'fileA.txt');
    const dirB = join(root, 'dirB');
    await writeFile(fileA, 'A');
    await mkdir(dirB);
    await writeFile(join(dirB, 'inner.txt'), 'B');
    const progress = collectProgress();

    const handle = submitOperation(
      { kind: 'copy', sourcePaths: [fileA, dirB], destinationDir: out },
      options
    ).onProgress(progress.listener);
    const result = await handle.result;

    expect(progress.events).toEqual([
      { completedCount: 1, totalCount: 2, currentPath: fileA },
      { completedCount: 2, totalCount: 2, currentPath: dirB },
    ]);
    expect(result).toEqual({ errors: [], cancelled: false });
    expect(existsSync(join(out, 'fileA.txt'))).toBe(true);
    expect(await readFile(join(out, 'dirB', 'inner.txt'), 'utf-8')).toBe('B');
  });

  it('returns before doing any work', async () => {
    const file = join(root, 'later.txt');
    await writeFile(file, 'later');

    const handle = submitOperation({ kind: 'copy', sourcePaths: [file], destinationDir: out }, options);

    expect(existsSync(join(out, 'later.txt'))).toBe(false);
    await handle.result;
    expect(existsSync(join(out, 'later.txt'))).toBe(true);
  });

  it('records a failing item and carries on with the rest', async () => {
    const names = ['one.txt', 'two.txt', 'three.txt'];
    const sources = names.map((name) => join(root, name));
    for (const source of sources) {
      await writeFile(source, source);
    }
    await writeFile(join(out, 'two.txt'), 'already here');
    const progress = collectProgress();

    const result = await submitOperation(
      { kind: 'copy', sourcePaths: sources, destinationDir: out },
      options
    ).onProgress(progress.listener).result;

    expect(progress.events.map((event) => event.completedCount)).toEqual([1, 2, 3]);
    expect(result.errors).toEqual([
      {
        path: sources[1],
        message: `Destination already exists: ${join(out, 'two.txt')}`,
        code: 'EEXIST',
      },
    ]);
    expect(await readFile(join(out, 'three.txt'), 'utf-8')).toBe(sources[2]);
    expect(await readFile(join(out, 'two.txt'), 'utf-8')).toBe('already here');
  });

  it('reports a FIFO as an item error and copies the items after it', async () => {
    const pipe = join(root, 'pipe');
    const after = join(root, 'after.txt');
    execFileSync('mkfifo', [pipe]);
    await writeFile(after, 'after');

    const result = await submitOperation(
      { kind: 'copy', sourcePaths: [pipe, after], destinationDir: out },
      options
    ).result;

    expect(result).toEqual({
      errors: [{ path: pipe, message: `Cannot copy special file: ${pipe}`, code: 'EINVAL' }],
      cancelled: false,
    });
    expect(await readFile(join(out, 'after.txt'), 'utf-8')).toBe('after');
  });

  it('records an item that disappeared after submission', async () => {
    const keep = join(root, 'keep.txt');
    const vanish = join(root, 'vanish.txt');
    await writeFile(keep, 'keep');
    await writeFile(vanish, 'vanish');

    const handle = submitOperation({ kind: 'delete', sourcePaths: [vanish, keep] }, options);
    unlinkSync(vanish);
    const result = await handle.result;

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ path: vanish, code: 'ENOENT' });
    expect(existsSync(keep)).toBe(false);
  });

  it('stops at the next item after cancel and leaves the rest untouched', async () => {
    const sources: string[] = [];
    for (let i = 1; i <= 5; i++) {
      const source = join(root, `item-${i}.txt`);
      await writeFile(source, `item ${i}`);
      sources.push(source);
    }
    const progress = collectProgress();

    const handle = submitOperation({ kind: 'copy', sourcePaths: sources, destinationDir: out }, options);
    handle.onProgress((event) => {
      progress.listener(event);
      if (event.completedCount === 2) handle.cancel();
    });
    const result = await handle.result;

    expect(progress.events.map((event) => event.completedCount)).toEqual([1, 2]);
    expect(result).toEqual({ errors: [], cancelled: true });
    expect(existsSync(join(out, 'item-2.txt'))).toBe(true);
    for (const i of [3, 4, 5]) {
      expect(existsSync(join(out, `item-${i}.txt`))).toBe(false);
    }
  });

  it('delivers the result exactly once and replays it to late listeners', async () => {
    const file = join(root, 'once.txt');
    await writeFile(file, 'once');
    const early = vi.fn();

    const handle = submitOperation({ kind: 'delete', sourcePaths: [file] }, options).onCompleted(early);
    await handle.result;
    const late = vi.fn();
    handle.onCompleted(late);
    handle.cancel();

    expect(early).toHaveBeenCalledOnce();
    expect(late).toHaveBeenCalledOnce();
    expect(late.mock.calls[0][0]).toEqual({ errors: [], cancelled: false });
    expect(handle.completed).toBe(true);
  });

  it('runs listeners through the supplied deliver function', async () => {
    const file = join(root, 'deferred.txt');
    await writeFile(file, 'deferred');
    const deliveries: string[] = [];

    const completed = new Promise<OperationResult>((resolve) => {
      submitOperation(
        { kind: 'delete', sourcePaths: [file] },
        { fs: nodeFileSystem, deliver: (callback) => setImmediate(callback) }
      )
        .onProgress(() => deliveries.push('progress'))
        .onCompleted((result) => {
          deliveries.push('completed');
          resolve(result);
        });
    });

    expect(await completed).toEqual({ errors: [], cancelled: false });
    expect(deliveries).toEqual(['progress', 'completed']);
  });

  it('moves entries and removes only the link when deleting a directory symlink', async () => {
    const dir = join(root, 'target-dir');
    await mkdir(dir);
    await writeFile(join(dir, 'kept.txt'), 'kept');
    const link = join(root, 'dir-link');
    await symlink(dir, link);

    const result = await submitOperation({ kind: 'delete', sourcePaths: [link] }, options).result;

    expect(result.errors).toEqual([]);
    expect(existsSync(link)).toBe(false);
    expect(await readFile(join(dir, 'kept.txt'), 'utf-8')).toBe('kept');

    const moved = await submitOperation(
      { kind: 'move', sourcePaths: [dir], destinationDir: out },
      options
    ).result;
    expect(moved.errors).toEqual([]);
    expect(existsSync(dir)).toBe(false);
    expect(await readFile(join(out, 'target-dir', 'kept.txt'), 'utf-8')).toBe('kept');
  });

  it('extracts an archive next to itself when no destination is given', async () => {
    const archive = join(out, 'photos.zip');
    const zip = new yazl.ZipFile();
    zip.addBuffer(Buffer.from('jpeg bytes'), 'album/cover.jpg');
    zip.end();
    const chunks: Buffer[] = [];
    for await (const chunk of zip.outputStream) {
      chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
    }
    await writeFile(archive, Buffer.concat(chunks));

    const result = await submitOperation({ kind: 'extract', sourcePaths: [archive] }, options).result;

    expect(result.errors).toEqual([]);
    expect(await readFile(join(out, 'album', 'cover.jpg'), 'utf-8')).toBe('jpeg bytes');
  });

  it('reports a malformed archive as a single error for that archive', async () => {
    const archive = join(root, 'broken.zip');
    await writeFile(archive, 'not a zip');

    const result = await submitOperation(
      { kind: 'extract', sourcePaths: [archive], destinationDir: out },
      options
    ).result;

    expect(result.errors).toHaveLength(1);
    expect(result.errors[0]).toMatchObject({ path: archive, code: 'MALFORMED_ARCHIVE' });
  });

  describe('validateOperationRequest', () => {
    it('rejects an empty path list', () => {
      expect(() =>
        validateOperationRequest({ kind: 'delete', sourcePaths: [] })
      ).toThrow('sourcePaths: At least one source path is required');
    });

    it('rejects copy and move without a destination', () => {
      const file = join(root, 'x.txt');
      expect(() => validateOperationRequest({ kind: 'copy', sourcePaths: [file] })).toThrow(
        InvalidRequestError
      );
      expect(() => validateOperationRequest({ kind: 'move', sourcePaths: [file] })).toThrow(
        InvalidRequestError
      );
    });

    it('rejects a destination on delete', async () => {
      const file = join(root, 'x.txt');
      await writeFile(file, 'x');
      expect(() =>
        validateOperationRequest({ kind: 'delete', sourcePaths: [file], destinationDir: out })
      ).toThrow('Delete takes no destination');
    });

    it('rejects relative paths and unknown kinds', () => {
      expect(() => validateOperationRequest({ kind: 'delete', sourcePaths: ['relative.txt'] })).toThrow(
        'sourcePaths.0: Path must be absolute'
      );
      expect(() => validateOperationRequest({ kind: 'shred', sourcePaths: [root] })).toThrow(
        InvalidRequestError
      );
    });

    it('rejects a missing source', () => {
      const missing = join(root, 'missing.txt');
      expect(() =>
        validateOperationRequest({ kind: 'copy', sourcePaths: [missing], destinationDir: out })
      ).toThrow(`Source does not exist: ${missing}`);
    });

    it('rejects a destination that is not a directory', async () => {
      const file = join(root, 'x.txt');
      await writeFile(file, 'x');
      expect(() =>
        validateOperationRequest({ kind: 'copy', sourcePaths: [file], destinationDir: file })
      ).toThrow(`Destination is not a directory: ${file}`);
    });

    it('creates no handle for an invalid request', () => {
      expect(() => submitOperation({ kind: 'delete', sourcePaths: [] }, options)).toThrow(
        InvalidRequestError
      );
    });
  });
});
