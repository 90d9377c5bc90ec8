/**
 * Unbounded FIFO with a bounded wait.
 * `take` resolves with everything queued so far, or with an empty batch
 * once the timeout passes without activity.
 */
export class Inbox<T> {
  private items: T[] = [];
  private wake: (() => void) | undefined;

  push(item: T): void {
    this.items.push(item);
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  get size(): number {
    return this.items.length;
  }

  async take(timeoutMs: number): Promise<T[]> {
    if (this.items.length === 0) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => {
          this.wake = undefined;
          resolve();
        }, timeoutMs);
        this.wake = () => {
          clearTimeout(timer);
          resolve();
        };
      });
    }
    return this.items.splice(0);
  }
}
