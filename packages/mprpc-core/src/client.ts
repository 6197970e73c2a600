// Client: a Session with a periodic timeout sweep and scoped use.

import createDebug from "debug";

import type { Detach } from "./loop.ts";
import type { SessionOptions } from "./options.ts";
import { Session } from "./session.ts";

const debug = createDebug("mprpc:client");

/** Interval of the timeout sweep. */
export const TIMEOUT_SWEEP_INTERVAL_MS = 1000;

/**
 * Session that sweeps call deadlines once per second.
 *
 * @example
 * ```typescript
 * const sum = await Client.open({ address: "127.0.0.1:18800", transportBuilder }, (client) =>
 *   client.call("add", 2, 3),
 * );
 * ```
 */
export class Client extends Session {
  private detachSweep: Detach | null = null;

  constructor(options: SessionOptions) {
    super(options);
    // The transport may already have failed and closed the session
    if (this.timeout > 0 && !this.closed) {
      this.detachSweep = this.loop.attachPeriodicCallback(
        () => this.stepTimeout(),
        TIMEOUT_SWEEP_INTERVAL_MS,
      );
      debug("timeout sweep attached for %s", this.address);
    }
  }

  /**
   * Create a client, run `scope` with it, and close it afterwards.
   *
   * The client is closed whether `scope` returns or throws; a failure of
   * `scope` propagates unchanged.
   */
  static async open<R>(options: SessionOptions, scope: (client: Client) => Promise<R> | R): Promise<R> {
    const client = new Client(options);
    try {
      return await scope(client);
    } finally {
      client.close();
    }
  }

  /**
   * Stop the timeout sweep, then close the session. A loop the client
   * created itself is closed too.
   */
  close(): void {
    if (this.detachSweep) {
      this.detachSweep();
      this.detachSweep = null;
    }
    if (this.ownsLoop) {
      this.loop.close();
    }
    super.close();
  }
}
