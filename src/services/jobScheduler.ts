import { describeError } from "../domain/errors.js";
import type { Logger } from "../infra/logging/logger.js";

export interface ScheduledTask {
  id: string;
  /** Tasks sharing a key never run at the same time; they run in submit order. */
  key: string;
  run: () => Promise<void>;
}

/**
 * Bounded worker pool for background jobs. Submitters get nothing back: the
 * outcome of a task is whatever the task itself records.
 */
export class JobScheduler {
  private readonly queue: ScheduledTask[] = [];

  private readonly activeKeys = new Set<string>();

  private running = 0;

  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly concurrency: number,
    private readonly logger: Logger,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Scheduler concurrency must be a positive integer, got ${concurrency}.`);
    }
  }

  submit(task: ScheduledTask): void {
    this.queue.push(task);
    this.pump();
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get runningCount(): number {
    return this.running;
  }

  /** Resolves once nothing is queued or running. */
  whenIdle(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private pump(): void {
    while (this.running < this.concurrency) {
      // First queued task whose key is free; later tasks with a busy key wait.
      const index = this.queue.findIndex((task) => !this.activeKeys.has(task.key));
      if (index === -1) {
        break;
      }
      const [task] = this.queue.splice(index, 1);
      this.start(task);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  private start(task: ScheduledTask): void {
    this.running += 1;
    this.activeKeys.add(task.key);

    void Promise.resolve()
      .then(() => task.run())
      .catch((error: unknown) => {
        this.logger.error("Background task failed", { taskId: task.id, error: describeError(error) });
      })
      .finally(() => {
        this.running -= 1;
        this.activeKeys.delete(task.key);
        this.pump();
      });
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }
}
