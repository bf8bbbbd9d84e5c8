// packages/core/src/engine/cancellation.ts -- Stop flag shared between an owner and one worker

/**
 * One-shot stop flag. Only the owner calls `cancel()`; the worker polls
 * `isCancelled` or parks in `sleep()`. A token never resets, so each unit of
 * work gets a new one.
 */
export class CancellationToken {
  private cancelled = false;
  private readonly listeners = new Set<() => void>();

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Raise the flag and wake every listener. Calling it again does nothing. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    const pending = [...this.listeners];
    this.listeners.clear();
    for (const listener of pending) listener();
  }

  /** Run `listener` on cancel, or right away when already cancelled. Same reference registers once. */
  onCancel(listener: () => void): void {
    if (this.cancelled) {
      listener();
      return;
    }
    this.listeners.add(listener);
  }

  offCancel(listener: () => void): void {
    this.listeners.delete(listener);
  }

  /** Wait `ms`, waking early on cancel. Resolves true only when the full delay passed. */
  sleep(ms: number): Promise<boolean> {
    if (this.cancelled) return Promise.resolve(false);

    return new Promise((resolve) => {
      const wake = () => {
        clearTimeout(timer);
        resolve(false);
      };
      const timer = setTimeout(() => {
        this.offCancel(wake);
        resolve(true);
      }, ms);
      this.onCancel(wake);
    });
  }
}
