// ============================================================
// WorkerPool — Bounds how many tasks run at the same time.
//
// WHY: The pipeline's overall concurrency limit applies to
// jobs, not to per-job parallelism. Tasks beyond the limit wait
// in FIFO order for a free slot.
// ============================================================

export class WorkerPool {
  private activeWorkers = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly maxWorkers: number;

  constructor(maxWorkers = 4) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
  }

  /** True when a task submitted now would start without waiting. */
  get hasCapacity(): boolean {
    return this.activeWorkers < this.maxWorkers && this.waiters.length === 0;
  }

  async runTask<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  get stats() {
    return {
      active: this.activeWorkers,
      waiting: this.waiters.length,
      max: this.maxWorkers,
    };
  }

  private acquire(): Promise<void> {
    if (this.activeWorkers < this.maxWorkers) {
      this.activeWorkers++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.activeWorkers++;
        resolve();
      });
    });
  }

  private release(): void {
    this.activeWorkers--;
    this.waiters.shift()?.();
  }
}
