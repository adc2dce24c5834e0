import { basename, dirname, isAbsolute, join, relative, resolve, sep } from 'node:path';
import { FileOperationError, errorCode } from './errors.js';
import type { FileSystem } from './fs.js';

export type MoveStrategy = 'rename' | 'copy-delete';

async function exists(path: string, fs: FileSystem): Promise<boolean> {
  try {
    await fs.lstat(path);
    return true;
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

async function assertDirectory(path: string, fs: FileSystem): Promise<void> {
  const info = await fs.stat(path);
  if (!info.isDirectory()) {
    throw new FileOperationError(`Destination is not a directory: ${path}`, 'ENOTDIR');
  }
}

function isInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel === '' || (rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel));
}

async function prepareTarget(
  source: string,
  destinationDir: string,
  fs: FileSystem
): Promise<string> {
  await assertDirectory(destinationDir, fs);
  const target = join(destinationDir, basename(source));

  if (await exists(target, fs)) {
    throw new FileOperationError(`Destination already exists: ${target}`, 'EEXIST');
  }
  if (isInside(source, target)) {
    throw new FileOperationError(`Cannot place ${source} inside itself`, 'EINVAL');
  }
  return target;
}

// links are recreated from their link text; files and directories keep mode and times
export async function copyEntry(source: string, target: string, fs: FileSystem): Promise<void> {
  const info = await fs.lstat(source);

  if (info.isSymbolicLink()) {
    await fs.symlink(await fs.readlink(source), target);
    return;
  }

  if (info.isDirectory()) {
    await fs.mkdir(target);
    for (const entry of await fs.readdir(source)) {
      await copyEntry(join(source, entry.name), join(target, entry.name), fs);
    }
  } else if (info.isFile()) {
    await fs.copyFile(source, target);
  } else {
    // FIFO, socket or device node
    throw new FileOperationError(`Cannot copy special file: ${source}`, 'EINVAL');
  }

  // after the children, so a read-only directory can still be filled
  await fs.chmod(target, info.mode & 0o7777);
  await fs.utimes(target, info.atime, info.mtime);
}

export async function deleteEntry(path: string, fs: FileSystem): Promise<void> {
  const info = await fs.lstat(path);
  if (info.isDirectory()) {
    await fs.removeTree(path);
  } else {
    await fs.unlink(path);
  }
}

export async function copyInto(
  source: string,
  destinationDir: string,
  fs: FileSystem
): Promise<string> {
  const target = await prepareTarget(source, destinationDir, fs);
  await copyEntry(source, target, fs);
  return target;
}

// same volume (by `dev`) renames; otherwise copy, then delete the source
export async function moveInto(
  source: string,
  destinationDir: string,
  fs: FileSystem
): Promise<MoveStrategy> {
  const target = await prepareTarget(source, destinationDir, fs);
  const [sourceInfo, destinationInfo] = await Promise.all([
    fs.lstat(source),
    fs.stat(dirname(target)),
  ]);

  if (sourceInfo.dev === destinationInfo.dev) {
    try {
      await fs.rename(source, target);
      return 'rename';
    } catch (error) {
      if (errorCode(error) !== 'EXDEV') throw error;
    }
  }

  await copyEntry(source, target, fs);
  await deleteEntry(source, fs);
  return 'copy-delete';
}
