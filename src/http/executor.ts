export type UnitOfWork<R> = () => Promise<R>;

/**
 * Runs units of work off the caller's path. `submit` never waits for the
 * unit; the caller only waits when it awaits the returned promise.
 */
export interface AsyncExecutor {
  submit<R>(work: UnitOfWork<R>): Promise<R>;
}

/** Starts every unit on the next microtask. Unbounded: no pooling, no queue. */
export class ImmediateExecutor implements AsyncExecutor {
  submit<R>(work: UnitOfWork<R>): Promise<R> {
    return Promise.resolve().then(work);
  }
}

/** Runs at most `concurrency` units at once; the rest wait in FIFO order. */
export class BoundedExecutor implements AsyncExecutor {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  constructor(public readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Executor concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  async submit<R>(work: UnitOfWork<R>): Promise<R> {
    await this.acquire();
    try {
      return await work();
    } finally {
      this.release();
    }
  }

  getActiveCount(): number {
    return this.active;
  }

  getQueuedCount(): number {
    return this.waiting.length;
  }

  private async acquire(): Promise<void> {
    if (this.active < this.concurrency) {
      this.active++;
      return;
    }
    await new Promise<void>((resolve) => this.waiting.push(resolve));
  }

  // A released slot passes straight to the next waiter so late submitters cannot jump the queue
  private release(): void {
    const next = this.waiting.shift();
    if (next) {
      next();
    } else {
      this.active--;
    }
  }
}

export type ExecutorFactory = () => AsyncExecutor;

const defaultExecutorFactory: ExecutorFactory = () => new ImmediateExecutor();
let executorFactory: ExecutorFactory = defaultExecutorFactory;

/**
 * Replace the executor handed to clients created from now on. Meant to be
 * called once at startup; clients keep the executor they were built with.
 *
 * @example setExecutorFactory(() => new BoundedExecutor(8));
 */
export function setExecutorFactory(factory: ExecutorFactory): void {
  executorFactory = factory;
}

export function resetExecutorFactory(): void {
  executorFactory = defaultExecutorFactory;
}

export function createExecutor(): AsyncExecutor {
  return executorFactory();
}
