import { LinetapError } from "../errors";

export class LockError extends LinetapError {
  constructor(message: string) {
    super(message, "LockError");
  }
}

/**
 * Explicit mutual exclusion around a synchronous critical section.
 * The section must not call out to sinks or re-enter the lock.
 */
export class Mutex {
  private held = false;

  get locked(): boolean {
    return this.held;
  }

  runExclusive<T>(critical: () => T): T {
    if (this.held) {
      throw new LockError("Mutex is already held; nested acquisition is not supported");
    }
    this.held = true;
    try {
      return critical();
    } finally {
      this.held = false;
    }
  }
}
