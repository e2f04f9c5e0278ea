import { createLogger } from "@labfleet/shared";

interface QueuedTask {
  task: () => Promise<void>;
  resolve: () => void;
  reject: (err: unknown) => void;
}

/** Runs at most `maxConcurrent` tasks at once; the rest wait in FIFO order. */
export class WorkerPool {
  private logger = createLogger("worker-pool");
  private activeCount = 0;
  private queue: QueuedTask[] = [];

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`parallelism must be a positive integer, got ${maxConcurrent}`);
    }
  }

  execute(task: () => Promise<void>): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.activeCount < this.maxConcurrent) {
        this.runTask({ task, resolve, reject });
      } else {
        this.queue.push({ task, resolve, reject });
        this.logger.debug(`Queued task (queue size: ${this.queue.length})`);
      }
    });
  }

  /** Runs every task and resolves when all have settled; rejects with the first failure. */
  async all(tasks: Array<() => Promise<void>>): Promise<void> {
    const results = await Promise.allSettled(tasks.map((task) => this.execute(task)));
    const failed = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
    if (failed) throw failed.reason;
  }

  private runTask(entry: QueuedTask): void {
    this.activeCount++;
    void entry
      .task()
      .then(entry.resolve, entry.reject)
      .finally(() => {
        this.activeCount--;
        this.processQueue();
      });
  }

  private processQueue(): void {
    if (this.activeCount >= this.maxConcurrent) return;
    const next = this.queue.shift();
    if (next) this.runTask(next);
  }

  get stats() {
    return {
      active: this.activeCount,
      queued: this.queue.length,
      max: this.maxConcurrent,
    };
  }
}
