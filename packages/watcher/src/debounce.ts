/**
 * Single-shot timer that restarts on every `trigger()`. A burst of triggers
 * collapses into one firing, `delayMs` after the last of them.
 */
export class DebounceTimer {
  private handle: NodeJS.Timeout | null = null;

  constructor(
    private readonly delayMs: number,
    private readonly onFire: () => void
  ) {}

  get armed(): boolean {
    return this.handle !== null;
  }

  trigger(): void {
    if (this.handle) {
      clearTimeout(this.handle);
    }
    this.handle = setTimeout(() => {
      this.handle = null;
      this.onFire();
    }, this.delayMs);
  }

  cancel(): void {
    if (this.handle) {
      clearTimeout(this.handle);
      this.handle = null;
    }
  }
}
