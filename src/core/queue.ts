/**
 * FIFO task queue with bounded concurrency. With the default concurrency of 1
 * it serialises work, which is how the agent keeps a single cycle in flight.
 */
export class SerialQueue {
  private queue: Array<() => void> = [];
  private inFlight = 0;

  constructor(private concurrency = 1) {}

  get pending(): number {
    return this.queue.length + this.inFlight;
  }

  get busy(): boolean {
    return this.inFlight > 0;
  }

  async enqueue<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const run = async () => {
        this.inFlight += 1;
        try {
          const result = await task();
          resolve(result);
        } catch (error) {
          reject(error);
        } finally {
          this.inFlight = Math.max(0, this.inFlight - 1);
          this.dequeue();
        }
      };

      this.queue.push(run);
      this.dequeue();
    });
  }

  /**
   * Resolves once everything queued so far has settled.
   */
  async drain(): Promise<void> {
    await this.enqueue(async () => undefined);
  }

  private dequeue(): void {
    while (this.inFlight < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next) {
        void next();
      }
    }
  }
}
