import type { FastifyBaseLogger } from "fastify";

export type DispatcherSnapshot = {
  queued: number;
  active: number;
  completed: number;
  crashed: number;
  concurrency: number;
  accepting: boolean;
};

type DispatcherOptions = {
  concurrency: number;
  run: (itemId: string) => Promise<unknown>;
  logger: FastifyBaseLogger;
};

/**
 * In-process job queue. `submit` never runs work on the caller's stack;
 * at most `concurrency` runs are in flight.
 */
export class JobDispatcher {
  private readonly queue: string[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private readonly concurrency: number;
  private active = 0;
  private completed = 0;
  private crashed = 0;
  private accepting = true;
  private pumpScheduled = false;

  constructor(private readonly options: DispatcherOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
  }

  submit(itemId: string): boolean {
    if (!this.accepting) {
      this.options.logger.warn({ item_id: itemId }, "dispatcher_submit_dropped");
      return false;
    }
    this.queue.push(itemId);
    this.schedulePump();
    return true;
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  snapshot(): DispatcherSnapshot {
    return {
      queued: this.queue.length,
      active: this.active,
      completed: this.completed,
      crashed: this.crashed,
      concurrency: this.concurrency,
      accepting: this.accepting,
    };
  }

  drain(): Promise<void> {
    if (this.isIdle()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  async close(): Promise<void> {
    this.accepting = false;
    await this.drain();
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.active === 0 && !this.pumpScheduled;
  }

  private schedulePump(): void {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    setImmediate(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const itemId = this.queue.shift();
      if (itemId === undefined) break;
      this.active += 1;
      void this.options
        .run(itemId)
        .then(
          () => {
            this.completed += 1;
          },
          (err: unknown) => {
            this.crashed += 1;
            this.options.logger.error({ err, item_id: itemId }, "pipeline_run_crashed");
          },
        )
        .finally(() => {
          this.active -= 1;
          if (this.queue.length > 0) {
            this.schedulePump();
          } else {
            this.notifyIdle();
          }
        });
    }
    this.notifyIdle();
  }

  private notifyIdle(): void {
    if (!this.isIdle()) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
