import { dirname, isAbsolute, relative, resolve, sep } from 'node:path';
import type { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import yauzl, { type Entry, type ZipFile } from 'yauzl';
import { ArchiveError, errorMessage } from './errors.js';
import type { FileSystem } from './fs.js';

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(archivePath, { lazyEntries: true, autoClose: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(new ArchiveError(`Cannot read archive ${archivePath}: ${errorMessage(error)}`));
      } else {
        resolvePromise(zipfile);
      }
    });
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolvePromise, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(new ArchiveError(`Cannot read entry ${entry.fileName}: ${errorMessage(error)}`));
      } else {
        resolvePromise(stream);
      }
    });
  });
}

export function resolveEntryPath(destinationDir: string, fileName: string): string {
  const root = resolve(destinationDir);
  const target = resolve(root, fileName);
  const rel = relative(root, target);

  if (rel === '' || rel === '..' || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new ArchiveError(`Entry escapes the destination directory: ${fileName}`);
  }
  return target;
}

async function writeEntry(
  zipfile: ZipFile,
  entry: Entry,
  destinationDir: string,
  fs: FileSystem
): Promise<void> {
  const target = resolveEntryPath(destinationDir, entry.fileName);

  if (entry.fileName.endsWith('/')) {
    await fs.mkdir(target, { recursive: true });
    return;
  }

  await fs.mkdir(dirname(target), { recursive: true });
  const source = await openEntryStream(zipfile, entry);
  await pipeline(source, fs.createWriteStream(target));
}

// Entries already written stay if a later one fails
export async function extractZip(
  archivePath: string,
  destinationDir: string,
  fs: FileSystem
): Promise<number> {
  const info = await fs.stat(destinationDir);
  if (!info.isDirectory()) {
    throw new ArchiveError(`Destination is not a directory: ${destinationDir}`);
  }

  const zipfile = await openZip(archivePath);
  let written = 0;

  try {
    await new Promise<void>((resolvePromise, reject) => {
      zipfile.on('error', (error: unknown) => {
        reject(
          error instanceof ArchiveError
            ? error
            : new ArchiveError(`Malformed archive ${archivePath}: ${errorMessage(error)}`)
        );
      });
      zipfile.on('end', () => resolvePromise());
      zipfile.on('entry', (entry: Entry) => {
        writeEntry(zipfile, entry, destinationDir, fs).then(() => {
          written += 1;
          zipfile.readEntry();
        }, reject);
      });
      zipfile.readEntry();
    });
  } finally {
    if (zipfile.isOpen) {
      zipfile.close();
    }
  }

  console.log(`[archive] Extracted ${written} entries from ${archivePath}`);
  return written;
}
