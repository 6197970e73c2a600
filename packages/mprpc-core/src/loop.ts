// Cooperative loop driven by sessions and futures.
//
// Node already runs an event loop, so "running" here means "someone is
// waiting on the loop": callers start it while they wait for a result and
// the session stops it when a result, a timeout or a connection failure
// arrives. Periodic callbacks fire on every tick either way.

/** Detaches a periodic callback. */
export type Detach = () => void;

/**
 * The scheduling primitive a Session needs.
 */
export interface Loop {
  /** Whether the loop is currently running. */
  readonly running: boolean;

  /** Start (or keep) the loop running. */
  start(): void;

  /** Stop the loop and wake everyone waiting in `untilStopped()`. */
  stop(): void;

  /** Resolves on the next `stop()`. */
  untilStopped(): Promise<void>;

  /**
   * Call `callback` every `intervalMs` until detached.
   */
  attachPeriodicCallback(callback: () => void, intervalMs: number): Detach;

  /** Detach every periodic callback. */
  close(): void;
}

/**
 * Loop over Node timers.
 *
 * Intervals are armed when attached and are independent of start/stop,
 * which only wake `untilStopped()` waiters.
 */
export class EventLoop implements Loop {
  private _running = false;
  private stopWaiters: Array<() => void> = [];
  private timers = new Set<ReturnType<typeof setInterval>>();

  get running(): boolean {
    return this._running;
  }

  start(): void {
    this._running = true;
  }

  stop(): void {
    this._running = false;
    const waiters = this.stopWaiters;
    this.stopWaiters = [];
    for (const wake of waiters) {
      wake();
    }
  }

  untilStopped(): Promise<void> {
    return new Promise((resolve) => {
      this.stopWaiters.push(resolve);
    });
  }

  attachPeriodicCallback(callback: () => void, intervalMs: number): Detach {
    if (!(intervalMs > 0)) {
      throw new RangeError(`interval must be positive: ${intervalMs}`);
    }
    const timer = setInterval(callback, intervalMs);
    this.timers.add(timer);

    return () => {
      if (this.timers.delete(timer)) {
        clearInterval(timer);
      }
    };
  }

  close(): void {
    for (const timer of this.timers) {
      clearInterval(timer);
    }
    this.timers.clear();
  }
}
