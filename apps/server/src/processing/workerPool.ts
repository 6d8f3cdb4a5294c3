/**
 * Bounded async worker pool shared by every session.
 *
 * - At most `concurrency` tasks run at once.
 * - Excess tasks wait in FIFO order; saturation never fails a task.
 */

export type WorkerPoolStats = {
  concurrency: number;
  active: number;
  queued: number;
  completed: number;
  failed: number;
};

// Settles its caller's promise itself and never rejects.
type QueuedTask = () => Promise<void>;

export class WorkerPool {
  private active = 0;
  private completed = 0;
  private failed = 0;
  private readonly pending: QueuedTask[] = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Worker pool concurrency must be a positive integer (got ${concurrency}).`);
    }
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.pending.push(async () => {
        try {
          const value = await task();
          this.completed += 1;
          resolve(value);
        } catch (err) {
          this.failed += 1;
          reject(err);
        }
      });
      this.pump();
    });
  }

  stats(): WorkerPoolStats {
    return {
      concurrency: this.concurrency,
      active: this.active,
      queued: this.pending.length,
      completed: this.completed,
      failed: this.failed,
    };
  }

  private pump() {
    while (this.active < this.concurrency && this.pending.length > 0) {
      const next = this.pending.shift();
      if (!next) break;
      this.active += 1;
      void this.execute(next);
    }
  }

  private async execute(task: QueuedTask) {
    try {
      await task();
    } finally {
      this.active -= 1;
      this.pump();
    }
  }
}
