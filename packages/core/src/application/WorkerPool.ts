/**
 * Runs at most `size` tasks at a time. Tasks beyond that wait in FIFO order.
 *
 * A slot is released when its task settles, whether it resolved or rejected.
 */
export class WorkerPool {
  private active = 0;
  private readonly waiting: (() => void)[] = [];

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${String(size)}`);
    }
  }

  /** Number of tasks currently running. */
  get running(): number {
    return this.active;
  }

  /** Number of tasks waiting for a slot. */
  get queued(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.size) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      // The slot passes straight to the next task.
      next();
    } else {
      this.active--;
    }
  }
}
