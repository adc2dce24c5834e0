import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import {
  ListenerSet,
  deliverInline,
  type ChangeNotification,
  type Deliver,
  type Listener,
  type WatchState,
} from '@filework/shared';
import { chokidarBackend, type WatchBackend, type WatchBackendHandle } from './backend.js';
import { DebounceTimer } from './debounce.js';

export const DEFAULT_DEBOUNCE_MS = 300;

function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'EACCES' || error.code === 'EPERM';
}

export interface WatchOptions {
  debounceMs?: number;
  backend?: WatchBackend;
  deliver?: Deliver;
}

/**
 * One watched root with its own debounce timer. Any number of events during a
 * quiet period produce exactly one `changed` notification.
 */
export class WatchSubscription {
  readonly root: string;
  /** Settles once the backend is watching, or once the subscription has failed. */
  readonly ready: Promise<void>;

  private currentState: WatchState = 'idle';
  private eventCount = 0;
  private failure: Error | null = null;
  private backend: WatchBackendHandle | null = null;
  private readonly timer: DebounceTimer;
  private readonly changed: ListenerSet<ChangeNotification>;
  private readonly errors: ListenerSet<Error>;

  constructor(root: string, private readonly options: WatchOptions = {}) {
    this.root = resolve(root);
    const deliver = options.deliver ?? deliverInline;
    this.changed = new ListenerSet('watch', deliver);
    this.errors = new ListenerSet('watch', deliver);
    this.timer = new DebounceTimer(options.debounceMs ?? DEFAULT_DEBOUNCE_MS, () => this.fire());
    this.ready = this.start();
  }

  get state(): WatchState {
    return this.currentState;
  }

  onChanged(listener: Listener<ChangeNotification>): this {
    this.changed.add(listener);
    return this;
  }

  onError(listener: Listener<Error>): this {
    if (this.failure) {
      this.errors.deliverTo(listener, this.failure);
    } else {
      this.errors.add(listener);
    }
    return this;
  }

  async stop(): Promise<void> {
    if (this.currentState === 'stopped') return;
    this.currentState = 'stopped';
    this.timer.cancel();
    this.changed.clear();
    this.errors.clear();
    await this.closeBackend();
  }

  private async start(): Promise<void> {
    try {
      const info = await stat(this.root);
      if (!info.isDirectory()) {
        throw new Error(`Not a directory: ${this.root}`);
      }
    } catch (error) {
      await this.fail(error);
      return;
    }

    if (this.isInert()) return;

    this.backend = (this.options.backend ?? chokidarBackend)(this.root, {
      event: (eventName, path) => this.handleEvent(eventName, path),
      error: (error) => {
        if (isPermissionError(error)) {
          console.warn(`[watch] ${this.root}: skipped unreadable path: ${String(error)}`);
          return;
        }
        this.fail(error).catch((closeError: unknown) => {
          console.error('[watch] Failed to close watcher:', closeError);
        });
      },
    });
    await this.backend.ready;
  }

  private handleEvent(eventName: string, path: string): void {
    if (this.isInert()) return;

    if (eventName === 'unlinkDir' && resolve(path) === this.root) {
      this.fail(new Error(`Watched directory was removed: ${this.root}`)).catch(
        (closeError: unknown) => {
          console.error('[watch] Failed to close watcher:', closeError);
        }
      );
      return;
    }

    this.eventCount += 1;
    this.currentState = 'pending';
    this.timer.trigger();
  }

  private fire(): void {
    if (this.isInert()) return;
    const notification: ChangeNotification = {
      root: this.root,
      eventCount: this.eventCount,
    };
    this.eventCount = 0;
    this.currentState = 'idle';
    this.changed.emit(notification);
  }

  private async fail(error: unknown): Promise<void> {
    if (this.isInert()) return;
    this.currentState = 'failed';
    this.timer.cancel();
    this.failure = error instanceof Error ? error : new Error(String(error));
    console.warn(`[watch] ${this.root}: ${this.failure.message}`);
    this.errors.emit(this.failure);
    this.errors.clear();
    this.changed.clear();
    await this.closeBackend();
  }

  private isInert(): boolean {
    return this.currentState === 'stopped' || this.currentState === 'failed';
  }

  private async closeBackend(): Promise<void> {
    const backend = this.backend;
    this.backend = null;
    if (backend) {
      await backend.close();
    }
  }
}

export function watchDirectory(path: string, options?: WatchOptions): WatchSubscription {
  return new WatchSubscription(path, options);
}
