import type { Deliver, OperationKind, SearchRequest } from '@filework/shared';
import { WatchSubscription, type WatchBackend } from '@filework/watcher';
import { nodeFileSystem, type FileSystem } from './fs.js';
import { submitOperation, type OperationHandle } from './operations.js';
import { startSearch, type SearchHandle } from './search.js';

export interface EngineOptions {
  fs?: FileSystem;
  // where listener callbacks run; inline when omitted
  deliver?: Deliver;
  debounceMs?: number;
  watchBackend?: WatchBackend;
  caseSensitiveSearch?: boolean;
}

// Every method returns immediately; work runs as one async task per handle.
export class FileEngine {
  private readonly fs: FileSystem;

  constructor(private readonly options: EngineOptions = {}) {
    this.fs = options.fs ?? nodeFileSystem;
  }

  // takes raw input (e.g. a request body) and validates it once, synchronously
  submit(request: unknown): OperationHandle {
    return submitOperation(request, { fs: this.fs, deliver: this.options.deliver });
  }

  submitOperation(
    kind: OperationKind,
    sourcePaths: readonly string[],
    destinationDir?: string
  ): OperationHandle {
    const input = destinationDir === undefined
      ? { kind, sourcePaths }
      : { kind, sourcePaths, destinationDir };
    return submitOperation(input, { fs: this.fs, deliver: this.options.deliver });
  }

  search(request: SearchRequest): SearchHandle {
    return startSearch(
      { ...request, caseSensitive: request.caseSensitive ?? this.options.caseSensitiveSearch },
      { fs: this.fs, deliver: this.options.deliver }
    );
  }

  submitSearch(rootPath: string, pattern: string): SearchHandle {
    return this.search({ rootPath, pattern });
  }

  watchDirectory(path: string): WatchSubscription {
    return new WatchSubscription(path, {
      debounceMs: this.options.debounceMs,
      backend: this.options.watchBackend,
      deliver: this.options.deliver,
    });
  }
}

export { InvalidRequestError, FileOperationError, ArchiveError } from './errors.js';
export type { FileSystem } from './fs.js';
export { nodeFileSystem } from './fs.js';
export type { OperationHandle } from './operations.js';
export type { SearchHandle } from './search.js';
export { toPasteRequest } from './clipboard.js';
