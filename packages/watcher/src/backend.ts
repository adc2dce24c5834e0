import { watch } from 'chokidar';

export interface WatchSink {
  event(eventName: string, path: string): void;
  error(error: unknown): void;
}

export interface WatchBackendHandle {
  // resolves on the first scan, or on close
  ready: Promise<void>;
  close(): Promise<void>;
}

export type WatchBackend = (root: string, sink: WatchSink) => WatchBackendHandle;

export const chokidarBackend: WatchBackend = (root, sink) => {
  const watcher = watch(root, {
    ignoreInitial: true,
    persistent: true,
    // an unreadable subfolder is skipped rather than reported
    ignorePermissionErrors: true,
  });

  watcher.on('all', (eventName, path) => sink.event(eventName, path));
  watcher.on('error', (error) => sink.error(error));

  let markReady: () => void = () => undefined;
  const ready = new Promise<void>((resolve) => {
    markReady = resolve;
  });
  watcher.once('ready', () => markReady());

  return {
    ready,
    close: () => {
      // a watcher closed before its initial scan never emits 'ready'
      markReady();
      return watcher.close();
    },
  };
};
