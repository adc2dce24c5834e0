export * from './listeners.js';

// Operation types
export type OperationKind = 'copy' | 'move' | 'delete' | 'extract';

export type OperationRequest =
  | { kind: 'copy' | 'move'; sourcePaths: readonly string[]; destinationDir: string }
  | { kind: 'delete'; sourcePaths: readonly string[] }
  | {
      kind: 'extract';
      sourcePaths: readonly string[];
      destinationDir?: string; // default: each archive's own directory
    };

export interface OperationProgress {
  completedCount: number;
  totalCount: number;
  currentPath: string;
}

export interface OperationError {
  path: string;
  message: string;
  code?: string;
}

export interface OperationResult {
  errors: OperationError[];
  cancelled: boolean;
}

// Search types
export interface SearchRequest {
  rootPath: string;
  pattern: string; // glob over base names
  caseSensitive?: boolean; // default: true
}

export interface SearchSummary {
  matchCount: number;
  skippedCount: number; // directories that could not be listed
  stopped: boolean;
}

// Watch types
export type WatchState = 'idle' | 'pending' | 'stopped' | 'failed';

export interface ChangeNotification {
  root: string;
  eventCount: number;
}

// Clipboard
export interface ClipboardSelection {
  paths: string[];
  mode: 'copy' | 'cut';
}

// Entry types
export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface EntryInfo {
  name: string;
  path: string;
  kind: EntryKind;
  size: number;
  modifiedAt: Date;
}

export interface EntryProperties extends EntryInfo {
  mode: number;
  linkTarget: string | null;
}

// Settings
export interface Settings {
  defaultPath: string | null;
  server: {
    host: string;
    port: number;
  };
  watch: {
    debounceMs: number;
  };
  search: {
    caseSensitive: boolean;
  };
}

// API response types
export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: {
    message: string;
    code: string;
  };
}

// SSE event types
export type OperationEvent =
  | { type: 'start'; id: string; kind: OperationKind; totalCount: number }
  | { type: 'progress'; id: string; progress: OperationProgress }
  | { type: 'complete'; id: string; result: OperationResult };

export type SearchEvent =
  | { type: 'start'; id: string; rootPath: string; pattern: string }
  | { type: 'match'; id: string; path: string }
  | { type: 'complete'; id: string; summary: SearchSummary };

export type WatchEvent =
  | { type: 'changed'; notification: ChangeNotification }
  | { type: 'error'; error: string };
