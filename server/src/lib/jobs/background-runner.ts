import { toErrorMessage } from './errors';

type Task = {
  label: string;
  run: () => Promise<unknown>;
};

export type BackgroundRunnerOptions = {
  /** 0 (the default) runs every task as soon as it is submitted. */
  maxConcurrent?: number;
};

/**
 * In-process pool for fire-and-forget work. Submitters get no handle back; tasks report through
 * whatever shared state they write to. Tasks beyond `maxConcurrent` wait in FIFO order.
 */
export class BackgroundRunner {
  private readonly maxConcurrent: number;
  private readonly waiting: Task[] = [];
  private readonly running = new Set<Promise<void>>();
  private isShuttingDown = false;
  private idleWaiters: Array<() => void> = [];

  constructor(options: BackgroundRunnerOptions = {}) {
    this.maxConcurrent = Math.max(0, options.maxConcurrent ?? 0);
  }

  get activeCount(): number {
    return this.running.size;
  }

  get queuedCount(): number {
    return this.waiting.length;
  }

  get accepting(): boolean {
    return !this.isShuttingDown;
  }

  /** Returns false when the runner is shutting down and the task was not accepted. */
  submit(label: string, run: () => Promise<unknown>): boolean {
    if (this.isShuttingDown) {
      return false;
    }

    this.waiting.push({ label, run });
    this.pump();
    return true;
  }

  /** Stops accepting work and resolves once queued and running tasks have settled. */
  async drain(): Promise<void> {
    this.isShuttingDown = true;
    if (this.running.size === 0 && this.waiting.length === 0) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Resolves once everything submitted so far has settled, without refusing new work. */
  async whenIdle(): Promise<void> {
    if (this.running.size === 0 && this.waiting.length === 0) {
      return;
    }

    await new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private hasCapacity(): boolean {
    return this.maxConcurrent === 0 || this.running.size < this.maxConcurrent;
  }

  private pump(): void {
    while (this.waiting.length > 0 && this.hasCapacity()) {
      const task = this.waiting.shift();
      if (!task) {
        return;
      }
      this.start(task);
    }
  }

  private start(task: Task): void {
    const execution = (async () => {
      try {
        await task.run();
      } catch (error) {
        console.error(`[runner] task=${task.label} threw: ${toErrorMessage(error)}`);
      }
    })();

    this.running.add(execution);
    void execution.finally(() => {
      this.running.delete(execution);
      this.pump();
      this.notifyIfIdle();
    });
  }

  private notifyIfIdle(): void {
    if (this.running.size > 0 || this.waiting.length > 0) {
      return;
    }

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
