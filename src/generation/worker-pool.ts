/**
 * Bounded async worker pool.
 * Purpose: cap how many jobs (subprocess-backed extractions and generations) run at once.
 * Assumptions: jobs start in submission order; a failing job never blocks the queue.
 * Usage: const pool = new WorkerPool(4); const value = await pool.submit(() => work());
 */

export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(public readonly maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer (received ${maxWorkers}).`);
    }
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.queue.length;
  }

  submit<T>(job: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = async (): Promise<void> => {
        this.active += 1;
        try {
          resolve(await job());
        } catch (err) {
          reject(err);
        } finally {
          this.active -= 1;
          this.drain();
        }
      };

      this.queue.push(() => void start());
      this.drain();
    });
  }

  private drain(): void {
    while (this.active < this.maxWorkers && this.queue.length > 0) {
      const next = this.queue.shift();
      next?.();
    }
  }
}
