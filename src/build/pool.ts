import os from "os";

type Job = () => void;

export function defaultPoolSize(maxParallel?: number): number {
  const cpus = Math.max(1, os.cpus().length);
  return maxParallel && maxParallel > 0 ? Math.min(cpus, maxParallel) : cpus;
}

/** FIFO pool bounding how many builds run at once. */
export class BuildPool {
  private readonly queue: Job[] = [];
  private running = 0;

  constructor(readonly size = defaultPoolSize()) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Build pool size must be a positive integer, got ${size}`);
    }
  }

  get active(): number {
    return this.running;
  }

  get pending(): number {
    return this.queue.length;
  }

  run<T>(fn: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.queue.push(() => {
        this.running += 1;
        void Promise.resolve()
          .then(fn)
          .then(resolve, reject)
          .finally(() => {
            this.running -= 1;
            this.next();
          });
      });
      this.next();
    });
  }

  private next(): void {
    while (this.running < this.size && this.queue.length > 0) {
      const job = this.queue.shift();
      job?.();
    }
  }
}
