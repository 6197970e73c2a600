// Deferred result of an RPC call.
//
// A Future is settled exactly once, either with a value or with an error.
// Later settlement attempts are ignored. Deadlines are checked by the
// session's timeout sweep through stepTimeout(); the future never fails
// itself.

import createDebug from "debug";
import { RpcError } from "@mprpc/wire";

import type { Loop } from "./loop.ts";

const debug = createDebug("mprpc:future");

/** Settlement state of a future. */
export type FutureOutcome<T> =
  | { status: "pending" }
  | { status: "resolved"; value: T }
  | { status: "failed"; error: Error };

export type FutureCallback<T> = (future: Future<T>) => void;

export interface FutureOptions {
  /**
   * Loop driven while joining. `null` means something else drives the
   * event loop and join() only waits for settlement.
   */
  loop: Loop | null;

  /** Seconds until the deadline; `0` disables it. */
  timeout: number;

  /** Millisecond clock. Defaults to `Date.now`. */
  clock?: () => number;
}

export class Future<T = unknown> {
  private outcome: FutureOutcome<T> = { status: "pending" };
  private callbacks: FutureCallback<T>[] = [];
  private readonly loop: Loop | null;
  private readonly clock: () => number;
  private readonly deadline: number | null;
  private readonly settledSignal: Promise<void>;
  private signalSettled: () => void = () => {};

  readonly timeout: number;

  constructor(options: FutureOptions) {
    this.loop = options.loop;
    this.timeout = options.timeout;
    this.clock = options.clock ?? (() => Date.now());
    this.deadline = options.timeout > 0 ? this.clock() + options.timeout * 1000 : null;
    this.settledSignal = new Promise((resolve) => {
      this.signalSettled = resolve;
    });
  }

  get state(): FutureOutcome<T>["status"] {
    return this.outcome.status;
  }

  get settled(): boolean {
    return this.outcome.status !== "pending";
  }

  /** The value, once resolved. */
  get result(): T | undefined {
    return this.outcome.status === "resolved" ? this.outcome.value : undefined;
  }

  /** The error, once failed. */
  get error(): Error | undefined {
    return this.outcome.status === "failed" ? this.outcome.error : undefined;
  }

  /**
   * Resolve the future. Returns false if it was already settled.
   */
  setResult(value: T): boolean {
    return this.settle({ status: "resolved", value });
  }

  /**
   * Fail the future. Returns false if it was already settled.
   */
  setError(error: Error): boolean {
    return this.settle({ status: "failed", error });
  }

  /**
   * Whether the deadline has passed. Always false without a deadline or
   * once settled.
   */
  stepTimeout(now: number = this.clock()): boolean {
    if (this.deadline === null || this.settled) return false;
    return now >= this.deadline;
  }

  /**
   * Run `callback` once the future settles (immediately if it already has).
   */
  attachCallback(callback: FutureCallback<T>): void {
    if (this.settled) {
      this.runCallback(callback);
      return;
    }
    this.callbacks.push(callback);
  }

  /**
   * Wait for settlement, driving the loop in the meantime.
   *
   * Whenever the loop is stopped while this future is still pending, it is
   * started again, so results for other calls arriving first do not leave
   * this one waiting on a stopped loop.
   */
  async join(): Promise<void> {
    const loop = this.loop;
    if (loop === null) {
      await this.settledSignal;
      return;
    }
    while (!this.settled) {
      loop.start();
      await Promise.race([loop.untilStopped(), this.settledSignal]);
    }
  }

  /**
   * Wait for the outcome: the value, or the error thrown.
   */
  async get(): Promise<T> {
    await this.join();
    const outcome = this.outcome;
    switch (outcome.status) {
      case "resolved":
        return outcome.value;
      case "failed":
        throw outcome.error;
      case "pending":
        throw new RpcError("future joined while still pending");
    }
  }

  private settle(outcome: FutureOutcome<T>): boolean {
    if (this.settled) return false;
    this.outcome = outcome;
    this.signalSettled();

    const callbacks = this.callbacks;
    this.callbacks = [];
    for (const callback of callbacks) {
      this.runCallback(callback);
    }
    return true;
  }

  private runCallback(callback: FutureCallback<T>): void {
    try {
      callback(this);
    } catch (e) {
      // Isolated from the other callbacks and from whoever settled the future
      debug("future callback failed: %O", e);
    }
  }
}
