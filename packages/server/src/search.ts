import { randomUUID } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { statSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import picomatch from 'picomatch';
import {
  ListenerSet,
  deliverInline,
  type Deliver,
  type Listener,
  type SearchRequest,
  type SearchSummary,
} from '@filework/shared';
import { InvalidRequestError } from './errors.js';
import type { FileSystem } from './fs.js';

export type NameMatcher = (name: string) => boolean;

// only `*` and `?` are wildcards; every other glob character is literal
const LITERAL_GLOB_CHARS = /[\\()[\]{}!+@|^$]/g;

export function createNameMatcher(pattern: string, caseSensitive = true): NameMatcher {
  const isMatch = picomatch(pattern.replace(LITERAL_GLOB_CHARS, '\\$&'), {
    dot: true,
    nocase: !caseSensitive,
    nonegate: true,
  });
  return (name) => isMatch(name);
}

export type DirectoryListing =
  | { kind: 'entries'; entries: Dirent[] }
  | { kind: 'access-error'; error: unknown };

export async function listDirectory(path: string, fs: FileSystem): Promise<DirectoryListing> {
  try {
    return { kind: 'entries', entries: await fs.readdir(path) };
  } catch (error) {
    return { kind: 'access-error', error };
  }
}

export type WalkEvent = { type: 'match'; path: string } | { type: 'skipped'; path: string };

// Depth-first; symlinked directories can match but are never entered
export async function* walkMatches(
  root: string,
  matches: NameMatcher,
  fs: FileSystem,
  signal: AbortSignal
): AsyncGenerator<WalkEvent> {
  if (signal.aborted) return;

  const listing = await listDirectory(root, fs);
  if (listing.kind === 'access-error') {
    yield { type: 'skipped', path: root };
    return;
  }

  for (const entry of listing.entries) {
    const fullPath = join(root, entry.name);
    if (matches(entry.name)) {
      yield { type: 'match', path: fullPath };
    }
    if (entry.isDirectory()) {
      yield* walkMatches(fullPath, matches, fs, signal);
    }
  }
}

export function validateSearchRequest(request: SearchRequest): SearchRequest {
  if (typeof request.pattern !== 'string' || request.pattern.length === 0) {
    throw new InvalidRequestError('Search pattern must not be empty');
  }
  if (typeof request.rootPath !== 'string' || !isAbsolute(request.rootPath)) {
    throw new InvalidRequestError('Search root must be an absolute path');
  }
  const info = statSync(request.rootPath, { throwIfNoEntry: false });
  if (!info?.isDirectory()) {
    throw new InvalidRequestError(`Search root is not a directory: ${request.rootPath}`);
  }
  return { ...request, rootPath: resolve(request.rootPath) };
}

export interface SearchHandleOptions {
  fs: FileSystem;
  deliver?: Deliver;
}

export class SearchHandle {
  readonly id = randomUUID();
  readonly request: SearchRequest;
  readonly done: Promise<SearchSummary>;

  private readonly controller = new AbortController();
  private readonly matchListeners: ListenerSet<string>;
  private readonly completedListeners: ListenerSet<SearchSummary>;
  private summary: SearchSummary | null = null;

  constructor(request: SearchRequest, options: SearchHandleOptions) {
    const deliver = options.deliver ?? deliverInline;
    this.request = request;
    this.matchListeners = new ListenerSet('search', deliver);
    this.completedListeners = new ListenerSet('search', deliver);
    this.done = Promise.resolve().then(() => this.run(options.fs));
  }

  onMatch(listener: Listener<string>): this {
    this.matchListeners.add(listener);
    return this;
  }

  onCompleted(listener: Listener<SearchSummary>): this {
    if (this.summary) {
      this.completedListeners.deliverTo(listener, this.summary);
    } else {
      this.completedListeners.add(listener);
    }
    return this;
  }

  stop(): void {
    if (!this.summary && !this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  private async run(fs: FileSystem): Promise<SearchSummary> {
    const { rootPath, pattern, caseSensitive } = this.request;
    const matches = createNameMatcher(pattern, caseSensitive ?? true);
    let matchCount = 0;
    let skippedCount = 0;

    for await (const event of walkMatches(rootPath, matches, fs, this.controller.signal)) {
      if (event.type === 'match') {
        matchCount += 1;
        this.matchListeners.emit(event.path);
      } else {
        skippedCount += 1;
      }
    }

    const summary: SearchSummary = {
      matchCount,
      skippedCount,
      stopped: this.controller.signal.aborted,
    };
    console.log(
      `[search] ${pattern} under ${rootPath}: ${matchCount} match(es), ${skippedCount} skipped${
        summary.stopped ? ' (stopped)' : ''
      }`
    );

    this.summary = summary;
    this.completedListeners.emit(summary);
    this.matchListeners.clear();
    this.completedListeners.clear();
    return summary;
  }
}

export function startSearch(request: SearchRequest, options: SearchHandleOptions): SearchHandle {
  return new SearchHandle(validateSearchRequest(request), options);
}
