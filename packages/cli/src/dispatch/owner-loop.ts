import type { OwnerScheduler, ScheduleOptions } from "@linetap/sdk";
import { createLog } from "../debug";

const debug = createLog("dispatch");

export type Op = () => void;

/** Arranges for `run` to be called on a later turn of the owner loop. */
export type DeferFn = (run: () => void) => void;

const defaultDefer: DeferFn = (run) => {
  setImmediate(run);
};

/**
 * Runs queued operations on the owner event loop, in enqueue order.
 * Requests may come from any call site; nothing here blocks the caller.
 */
export class OwnerLoop implements OwnerScheduler {
  private queue: Op[] = [];
  private armed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(private readonly defer: DeferFn = defaultDefer) {}

  get pending(): number {
    return this.queue.length;
  }

  schedule(op: Op, options: ScheduleOptions = {}): void {
    if (this.queue.includes(op)) {
      if (!options.quiet) {
        debug("schedule: operation already queued (fromOtherContext=%s)", options.fromOtherContext === true);
      }
      return;
    }
    this.queue.push(op);
    this.arm();
  }

  /** Resolves once every queued operation has run. */
  whenIdle(): Promise<void> {
    if (this.queue.length === 0 && !this.armed) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private arm(): void {
    if (this.armed) return;
    this.armed = true;
    this.defer(() => this.drain());
  }

  private drain(): void {
    this.armed = false;
    const batch = this.queue;
    this.queue = [];
    debug("drain: running %d operation(s)", batch.length);

    for (let i = 0; i < batch.length; i++) {
      try {
        batch[i]();
      } catch (err) {
        // Keep what has not run yet ahead of anything queued meanwhile.
        this.queue = [...batch.slice(i + 1), ...this.queue];
        this.settle();
        throw err;
      }
    }

    this.settle();
  }

  private settle(): void {
    if (this.queue.length > 0) {
      this.arm();
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) resolve();
  }
}
