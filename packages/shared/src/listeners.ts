// Runs a listener callback on the caller's chosen execution context
export type Deliver = (callback: () => void) => void;

export const deliverInline: Deliver = (callback) => callback();

export type Listener<T> = (value: T) => void;

export class ListenerSet<T> {
  private readonly listeners: Listener<T>[] = [];

  constructor(
    private readonly tag: string,
    private readonly deliver: Deliver = deliverInline
  ) {}

  get size(): number {
    return this.listeners.length;
  }

  add(listener: Listener<T>): void {
    this.listeners.push(listener);
  }

  emit(value: T): void {
    for (const listener of [...this.listeners]) {
      this.deliverTo(listener, value);
    }
  }

  deliverTo(listener: Listener<T>, value: T): void {
    this.deliver(() => {
      try {
        listener(value);
      } catch (error) {
        console.error(`[${this.tag}] Listener failed:`, error);
      }
    });
  }

  clear(): void {
    this.listeners.length = 0;
  }
}
