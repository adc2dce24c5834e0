import type { Stats } from 'node:fs';
import { lstat, mkdir, readdir, readlink, rename } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { EntryInfo, EntryKind, EntryProperties } from '@filework/shared';
import { FileOperationError, errorCode } from './errors.js';

function entryKind(stats: Stats): EntryKind {
  if (stats.isSymbolicLink()) return 'symlink';
  if (stats.isDirectory()) return 'directory';
  if (stats.isFile()) return 'file';
  return 'other';
}

function assertPlainName(name: string): void {
  if (!name || name === '.' || name === '..' || name.includes('/') || name.includes('\\') || name.includes('\0')) {
    throw new FileOperationError(`Invalid name: ${JSON.stringify(name)}`, 'EINVAL');
  }
}

async function assertAbsent(path: string): Promise<void> {
  try {
    await lstat(path);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') return;
    throw error;
  }
  throw new FileOperationError(`Already exists: ${path}`, 'EEXIST');
}

function toEntryInfo(path: string, stats: Stats): EntryInfo {
  return {
    name: basename(path),
    path,
    kind: entryKind(stats),
    size: stats.size,
    modifiedAt: stats.mtime,
  };
}

export async function listEntries(dirPath: string): Promise<EntryInfo[]> {
  const items = await readdir(dirPath, { withFileTypes: true });
  const entries: EntryInfo[] = [];

  for (const item of items) {
    const fullPath = join(dirPath, item.name);
    try {
      entries.push(toEntryInfo(fullPath, await lstat(fullPath)));
    } catch {
      // vanished between readdir and lstat
      continue;
    }
  }

  return entries.sort((a, b) => {
    // Directories first, then alphabetically
    if (a.kind === 'directory' && b.kind !== 'directory') return -1;
    if (a.kind !== 'directory' && b.kind === 'directory') return 1;
    return a.name.localeCompare(b.name);
  });
}

export async function getProperties(path: string): Promise<EntryProperties> {
  const stats = await lstat(path);
  return {
    ...toEntryInfo(path, stats),
    mode: stats.mode & 0o7777,
    linkTarget: stats.isSymbolicLink() ? await readlink(path) : null,
  };
}

// Renames within the same directory
export async function renameEntry(path: string, newName: string): Promise<string> {
  assertPlainName(newName);
  const target = join(dirname(path), newName);
  if (target === path) return path;

  await lstat(path);
  await assertAbsent(target);
  await rename(path, target);
  console.log(`[entries] Renamed ${path} -> ${target}`);
  return target;
}

export async function createFolder(parentDir: string, name: string): Promise<string> {
  assertPlainName(name);
  const target = join(parentDir, name);
  await mkdir(target);
  console.log(`[entries] Created folder ${target}`);
  return target;
}
