/** Counting semaphore; `acquire` resolves to the matching release. */
export class Semaphore {
  private permits: number;
  private queue: Array<() => void> = [];

  constructor(permits: number) {
    if (!Number.isInteger(permits) || permits < 1) throw new Error(`Semaphore needs at least 1 permit, got ${permits}`);
    this.permits = permits;
  }

  async acquire(): Promise<() => void> {
    if (this.permits > 0) {
      this.permits--;
      return this.releaser();
    }
    return new Promise((resolve) => {
      this.queue.push(() => {
        this.permits--;
        resolve(this.releaser());
      });
    });
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await task();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.permits++;
      this.queue.shift()?.();
    };
  }
}
