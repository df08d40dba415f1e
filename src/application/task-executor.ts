import pLimit, { type LimitFunction } from "p-limit";

export interface TaskExecutorOptions {
  /** Maximum tasks running at once; 0 means unbounded. */
  concurrency: number;
  onTaskError?: (error: unknown) => void;
}

/**
 * Runs submitted tasks in the background, bounded by p-limit. Submitting
 * never waits for the task; `onIdle` resolves once every task has settled.
 */
export class ConcurrentTaskExecutor {
  private readonly limit: LimitFunction;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly options: TaskExecutorOptions) {
    this.limit = pLimit(options.concurrency > 0 ? options.concurrency : Number.POSITIVE_INFINITY);
  }

  submit(task: () => Promise<void>): void {
    const running = this.limit(task)
      .catch((error: unknown) => {
        this.options.onTaskError?.(error);
      })
      .finally(() => {
        this.inFlight.delete(running);
      });
    this.inFlight.add(running);
  }

  get pendingCount(): number {
    return this.inFlight.size;
  }

  async onIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Like `onIdle`, bounded. Resolves false when tasks were still running at the deadline. */
  async drain(timeoutMs: number): Promise<boolean> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<boolean>((resolve) => {
      timer = setTimeout(() => resolve(false), timeoutMs);
    });
    try {
      return await Promise.race([this.onIdle().then(() => true), expired]);
    } finally {
      clearTimeout(timer);
    }
  }
}
