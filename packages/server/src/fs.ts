import { constants, createWriteStream, type Dirent, type Stats } from 'node:fs';
import {
  chmod,
  copyFile,
  lstat,
  mkdir,
  readdir,
  readlink,
  rename,
  rm,
  stat,
  symlink,
  unlink,
  utimes,
} from 'node:fs/promises';
import type { Writable } from 'node:stream';

/**
 * Filesystem primitives the engine runs on. Everything goes through this
 * seam so tests can swap single calls (e.g. `stat` to fake volume identity).
 */
export interface FileSystem {
  lstat(path: string): Promise<Stats>;
  stat(path: string): Promise<Stats>;
  readdir(path: string): Promise<Dirent[]>;
  readlink(path: string): Promise<string>;
  symlink(target: string, path: string): Promise<void>;
  mkdir(path: string, options?: { recursive?: boolean }): Promise<void>;
  copyFile(source: string, destination: string): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  utimes(path: string, atime: Date, mtime: Date): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  removeTree(path: string): Promise<void>;
  unlink(path: string): Promise<void>;
  // both copyFile and createWriteStream fail with EEXIST instead of overwriting
  createWriteStream(path: string): Writable;
}

export const nodeFileSystem: FileSystem = {
  lstat: (path) => lstat(path),
  stat: (path) => stat(path),
  readdir: (path) => readdir(path, { withFileTypes: true }),
  readlink: (path) => readlink(path),
  symlink: (target, path) => symlink(target, path),
  mkdir: async (path, options) => {
    await mkdir(path, options);
  },
  copyFile: (source, destination) => copyFile(source, destination, constants.COPYFILE_EXCL),
  chmod: (path, mode) => chmod(path, mode),
  utimes: (path, atime, mtime) => utimes(path, atime, mtime),
  rename: (from, to) => rename(from, to),
  removeTree: (path) => rm(path, { recursive: true }),
  unlink: (path) => unlink(path),
  createWriteStream: (path) => createWriteStream(path, { flags: 'wx' }),
};
