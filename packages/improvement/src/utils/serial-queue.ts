/**
 * FIFO queue that runs async tasks one at a time.
 *
 * Used for mutual exclusion around read-modify-write cycles on persisted
 * stores: many concurrent callers may enqueue, each task sees the state left
 * by the previous one.
 */
export class SerialQueue {
  private readonly queue: Array<() => Promise<void>> = [];
  private processing = false;

  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await task());
        } catch (error) {
          reject(error instanceof Error ? error : new Error(String(error)));
        }
      });
      void this.processQueue();
    });
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  private async processQueue(): Promise<void> {
    if (this.processing) return;
    this.processing = true;

    let next = this.queue.shift();
    while (next) {
      // Items settle their own promise and never throw
      await next();
      next = this.queue.shift();
    }

    this.processing = false;
  }
}
