/**
 * Worker Pool
 *
 * Fixed number of slots; tasks beyond the limit wait in FIFO order until a
 * slot frees.
 */

export class WorkerPool {
  private activeCount = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`workerLimit must be a positive integer, got ${limit}`);
    }
  }

  /** Tasks currently holding a slot */
  get active(): number {
    return this.activeCount;
  }

  /** Tasks waiting for a slot */
  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private async acquire(): Promise<void> {
    if (this.activeCount < this.limit) {
      this.activeCount++;
      return;
    }
    // The releasing task hands its slot straight to us
    await new Promise<void>((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.activeCount--;
    }
  }
}
