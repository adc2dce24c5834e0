export { chokidarBackend } from './backend.js';
export type { WatchBackend, WatchBackendHandle, WatchSink } from './backend.js';
export { DebounceTimer } from './debounce.js';
export {
  DEFAULT_DEBOUNCE_MS,
  WatchSubscription,
  watchDirectory,
  type WatchOptions,
} from './subscription.js';
