// Session: request/response correlation over one transport.
//
// Allocates message ids, keeps the pending-call registry, matches responses
// to the calls that sent them, sweeps deadlines, and fans a connection
// failure out to every waiting call.

import createDebug from "debug";
import {
  RemoteError,
  isErrorSet,
  messageNotify,
  messageRequest,
  type MessageId,
} from "@mprpc/wire";

import type { Address } from "./address.ts";
import { SessionCaller, type Caller } from "./caller.ts";
import { ConnectionError, TimeoutError } from "./errors.ts";
import { Future } from "./future.ts";
import { MessageIdGenerator } from "./id_generator.ts";
import { EventLoop, type Loop } from "./loop.ts";
import { resolveSessionOptions, type SessionOptions } from "./options.ts";
import type { ClientTransport, TransportHandler } from "./transport.ts";

const debug = createDebug("mprpc:session");

/**
 * Completion callback for callWithCallback().
 *
 * Receives the result, or `null` when the server answered with an error.
 * Use call()/callAsync() when the error itself matters.
 */
export type ResponseCallback = (result: unknown) => void;

/**
 * An outstanding call, keyed by message id.
 *
 * - `awaiting`: a Future the caller waits on; swept for timeouts and failed
 *   on connection loss.
 * - `callback`: a fire-and-forget completion callback; never timed out and
 *   not notified of connection loss.
 */
export type PendingCall =
  | { kind: "awaiting"; method: string; future: Future<unknown> }
  | { kind: "callback"; method: string; callback: ResponseCallback };

/**
 * Session processes requests and responses over its transport.
 *
 * @example
 * ```typescript
 * const session = new Session({ address: "127.0.0.1:18800", transportBuilder: tcpBuilder });
 * const sum = await session.call("add", 2, 3);
 * const pending = session.callAsync("slow");
 * await session.notify("log", "started");
 * console.log(await pending.get());
 * session.close();
 * ```
 */
export class Session implements TransportHandler {
  private readonly _address: Address;
  private readonly externalLoop: boolean;
  private readonly clock: () => number;
  private readonly ids = new MessageIdGenerator();
  private pending = new Map<MessageId, PendingCall>();
  private transport: ClientTransport | null = null;
  private isClosed = false;
  private closedSignal: Promise<void>;
  private signalClosed: () => void = () => {};

  protected readonly timeout: number;
  protected readonly loop: Loop;
  protected readonly ownsLoop: boolean;

  constructor(options: SessionOptions) {
    const resolved = resolveSessionOptions(options);
    this._address = resolved.address;
    this.timeout = resolved.timeout;
    this.externalLoop = resolved.externalLoop;
    this.clock = resolved.clock;
    this.ownsLoop = resolved.loop === undefined;
    this.loop = resolved.loop ?? new EventLoop();
    this.closedSignal = new Promise((resolve) => {
      this.signalClosed = resolve;
    });
    const transport = resolved.transportBuilder(this, this._address, {
      reconnectLimit: resolved.reconnectLimit,
      packEncoding: resolved.packEncoding,
      unpackEncoding: resolved.unpackEncoding,
    });
    // The builder may report a failure before it returns
    if (this.isClosed) {
      transport.close();
    } else {
      this.transport = transport;
    }
  }

  /** Server endpoint. */
  get address(): Address {
    return this._address;
  }

  /** Number of calls still waiting for a response. */
  get pendingCount(): number {
    return this.pending.size;
  }

  /** Whether close() has run (directly or after a connection failure). */
  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Call a method and wait for its result.
   *
   * @throws RemoteError when the server reports an error
   * @throws TimeoutError when no response arrives in time
   * @throws ConnectionError when the connection fails or the session is closed
   */
  async call(method: string, ...args: unknown[]): Promise<unknown> {
    return this.sendRequest(method, args).get();
  }

  /**
   * Call a method without waiting; the returned future settles later.
   *
   * @throws ConnectionError if the session is closed
   */
  callAsync(method: string, ...args: unknown[]): Future<unknown> {
    return this.sendRequest(method, args);
  }

  /**
   * Call a method and hand the result to `callback`.
   *
   * The callback gets `null` if the server reports an error. There is no
   * deadline, and the callback is dropped silently if the connection fails.
   *
   * @throws ConnectionError if the session is closed
   */
  callWithCallback(method: string, args: readonly unknown[], callback: ResponseCallback): void {
    const transport = this.requireTransport();
    const msgid = this.ids.next();
    this.pending.set(msgid, { kind: "callback", method, callback });
    debug("request %d %s (callback)", msgid, method);
    transport.sendMessage(messageRequest(msgid, method, args));
  }

  /**
   * Send a notification. No response is expected.
   *
   * Resolves once the transport has sent it, the loop is stopped by a
   * connection failure, or the session closes.
   *
   * @throws ConnectionError if the session is closed
   */
  async notify(method: string, ...args: unknown[]): Promise<void> {
    const transport = this.requireTransport();
    const sent = new Promise<void>((resolve) => {
      this.startLoop();
      debug("notify %s", method);
      transport.sendMessage(messageNotify(method, args), () => {
        this.stopLoop();
        resolve();
      });
    });

    const waits = [sent, this.closedSignal];
    if (!this.externalLoop) {
      waits.push(this.loop.untilStopped());
    }
    await Promise.race(waits);
  }

  /**
   * Get a Caller for this session, for use with middleware.
   *
   * @example
   * ```typescript
   * const caller = session.asCaller().with(loggingMiddleware());
   * await caller.call({ method: "add", args: [2, 3] });
   * ```
   */
  asCaller(): Caller {
    return new SessionCaller(this);
  }

  /**
   * Close the transport and forget every pending call.
   *
   * Futures still pending are abandoned and never settle.
   */
  close(): void {
    if (this.transport) {
      this.transport.close();
      debug("closed session to %s (%d pending dropped)", this._address, this.pending.size);
    }
    this.transport = null;
    this.isClosed = true;
    this.pending = new Map();
    this.signalClosed();
  }

  /**
   * Route a response to the call that sent it.
   *
   * Called by the transport.
   */
  onResponse(msgid: MessageId, error: unknown, result: unknown): void {
    const call = this.pending.get(msgid);
    if (call === undefined) {
      // Late (timed out) or unknown id; nothing is waiting for it
      debug("discarding response for unknown msgid %d", msgid);
      return;
    }
    this.pending.delete(msgid);

    switch (call.kind) {
      case "awaiting":
        if (isErrorSet(error)) {
          call.future.setError(new RemoteError(error));
        } else {
          call.future.setResult(result);
        }
        break;
      case "callback":
        try {
          call.callback(isErrorSet(error) ? null : result);
        } catch (e) {
          // Never thrown back into the transport
          debug("response callback for %d %s failed: %O", msgid, call.method, e);
        }
        break;
    }

    this.stopLoop();
  }

  /**
   * Fail every awaiting call with `reason` and close the session.
   *
   * Called by the transport. Callback calls are not notified.
   */
  onConnectFailed(reason: Error): void {
    debug("connection to %s failed: %s", this._address, reason.message);

    const failed: Future<unknown>[] = [];
    for (const [msgid, call] of this.pending) {
      if (call.kind === "awaiting") {
        failed.push(call.future);
        this.pending.delete(msgid);
      }
    }
    for (const future of failed) {
      future.setError(reason);
    }

    this.close();
    this.stopLoop();
  }

  /**
   * Timeout sweep: fail every awaiting call whose deadline has passed.
   *
   * Run periodically by the client. Does nothing if no call expired.
   */
  stepTimeout(): void {
    const now = this.clock();
    const expired: MessageId[] = [];
    for (const [msgid, call] of this.pending) {
      if (call.kind === "awaiting" && call.future.stepTimeout(now)) {
        expired.push(msgid);
      }
    }

    if (expired.length === 0) return;

    debug("%d call(s) timed out", expired.length);

    // No result is delivered while the registry is being changed
    this.stopLoop();
    for (const msgid of expired) {
      const call = this.pending.get(msgid);
      this.pending.delete(msgid);
      if (call?.kind === "awaiting") {
        call.future.setError(new TimeoutError(msgid, this.timeout, call.method));
      }
    }
    this.startLoop();
  }

  private sendRequest(method: string, args: readonly unknown[]): Future<unknown> {
    const transport = this.requireTransport();
    const msgid = this.ids.next();
    const future = new Future<unknown>({
      loop: this.externalLoop ? null : this.loop,
      timeout: this.timeout,
      clock: this.clock,
    });
    this.pending.set(msgid, { kind: "awaiting", method, future });
    debug("request %d %s", msgid, method);
    transport.sendMessage(messageRequest(msgid, method, args));
    return future;
  }

  private requireTransport(): ClientTransport {
    if (this.transport === null) {
      throw ConnectionError.closed();
    }
    return this.transport;
  }

  private startLoop(): void {
    if (!this.externalLoop) this.loop.start();
  }

  private stopLoop(): void {
    if (!this.externalLoop) this.loop.stop();
  }
}
