// TCP transport for MessagePack-RPC sessions.
//
// MessagePack values are self-delimiting, so messages go over the socket
// back to back with no extra framing. Messages sent before the connection
// is up (or while reconnecting) are queued and flushed in order.

import net from "node:net";
import createDebug from "debug";
import {
  ConnectionError,
  type Address,
  type ClientTransport,
  type TransportBuilder,
  type TransportHandler,
  type TransportOptions,
} from "@mprpc/core";
import { MessageType, decodeMessageStream, encodeMessage, type OutboundMessage } from "@mprpc/wire";

const debug = createDebug("mprpc:tcp");

/** Connection state. */
export type ConnectionState = "connecting" | "connected" | "reconnecting" | "closed";

/** Backoff configuration for reconnection attempts. */
export interface BackoffConfig {
  /** Initial delay in milliseconds. Default: 100 */
  initial: number;
  /** Maximum delay in milliseconds. Default: 5000 */
  max: number;
  /** Multiplier for exponential backoff. Default: 2 */
  factor: number;
  /** Jitter factor (0-1) to randomize delays. Default: 0.1 */
  jitter: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  initial: 100,
  max: 5000,
  factor: 2,
  jitter: 0.1,
};

/**
 * Delay before reconnection attempt `attempt` (1-based).
 */
export function calculateBackoff(config: BackoffConfig, attempt: number): number {
  const { initial, max, factor, jitter } = config;
  const base = Math.min(initial * Math.pow(factor, attempt - 1), max);
  const jitterAmount = base * jitter * (Math.random() * 2 - 1);
  return Math.max(0, Math.floor(base + jitterAmount));
}

interface QueuedMessage {
  bytes: Uint8Array;
  onSent?: () => void;
}

/**
 * Client side of a MessagePack-RPC connection over TCP.
 *
 * Connects as soon as it is created. After a failed connect or a lost
 * connection it retries up to `reconnectLimit` times; once those are used
 * up the handler's onConnectFailed runs exactly once.
 */
export class TcpTransport implements ClientTransport {
  private state: ConnectionState = "connecting";
  private socket: net.Socket | null = null;
  private queue: QueuedMessage[] = [];
  // Written to the current socket but not yet confirmed
  private inflight: QueuedMessage[] = [];
  private retries = 0;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly backoff: BackoffConfig;

  constructor(
    private readonly handler: TransportHandler,
    private readonly address: Address,
    private readonly options: TransportOptions,
    backoff: Partial<BackoffConfig> = {},
  ) {
    this.backoff = { ...DEFAULT_BACKOFF, ...backoff };
    this.connect();
  }

  /** Get the current connection state. */
  getState(): ConnectionState {
    return this.state;
  }

  sendMessage(message: OutboundMessage, onSent?: () => void): void {
    if (this.state === "closed") {
      debug("dropping message to %s: transport closed", this.address);
      return;
    }
    const item: QueuedMessage = { bytes: encodeMessage(message, this.options), onSent };
    if (this.state === "connected" && this.socket) {
      this.write(this.socket, item);
    } else {
      this.queue.push(item);
    }
  }

  /**
   * Close the connection permanently and stop reconnecting.
   */
  close(): void {
    if (this.state === "closed" && this.socket === null) return;

    this.state = "closed";
    this.queue = [];
    this.inflight = [];
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    if (this.socket) {
      this.socket.destroy();
      this.socket = null;
    }
    debug("closed connection to %s", this.address);
  }

  private connect(): void {
    const socket = net.createConnection({ host: this.address.host, port: this.address.port });
    this.socket = socket;
    let lastError: Error | null = null;

    socket.once("connect", () => {
      if (this.socket !== socket) return;
      debug("connected to %s", this.address);
      this.state = "connected";
      this.retries = 0;
      this.flushQueue(socket);
    });

    socket.on("error", (err: Error) => {
      lastError = err;
      debug("socket error on %s: %s", this.address, err.message);
    });

    socket.once("close", () => {
      // Stale socket, or close() tore it down
      if (this.socket !== socket) return;
      this.socket = null;
      // Unconfirmed writes go out again, ahead of anything queued since
      if (this.inflight.length > 0) {
        debug("requeueing %d unconfirmed message(s) for %s", this.inflight.length, this.address);
        this.queue = [...this.inflight, ...this.queue];
        this.inflight = [];
      }
      this.onDisconnect(lastError ?? ConnectionError.io("connection lost"));
    });

    this.readLoop(socket).catch((err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      debug("read from %s failed: %s", this.address, error.message);
      lastError = error;
      socket.destroy();
    });
  }

  private async readLoop(socket: net.Socket): Promise<void> {
    for await (const message of decodeMessageStream(socket, this.options)) {
      if (this.socket !== socket) return;
      switch (message[0]) {
        case MessageType.RESPONSE:
          this.handler.onResponse(message[1], message[2], message[3]);
          break;
        case MessageType.REQUEST:
          debug("ignoring inbound request %s from %s", message[2], this.address);
          break;
        case MessageType.NOTIFY:
          debug("ignoring inbound notify %s from %s", message[1], this.address);
          break;
      }
    }
  }

  private onDisconnect(lastError: Error): void {
    if (this.state === "closed") return;

    // retries counts reconnects since the last successful connect
    if (this.retries >= this.options.reconnectLimit) {
      const error = ConnectionError.reconnectExhausted(this.retries + 1, lastError);
      debug("giving up on %s: %s", this.address, error.message);
      this.state = "closed";
      this.queue = [];
      this.handler.onConnectFailed(error);
      return;
    }

    this.retries++;
    this.state = "reconnecting";
    const delay = calculateBackoff(this.backoff, this.retries);
    debug("reconnecting to %s in %dms (attempt %d)", this.address, delay, this.retries);
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.state === "reconnecting") this.connect();
    }, delay);
  }

  private flushQueue(socket: net.Socket): void {
    const queued = this.queue;
    this.queue = [];
    for (const item of queued) {
      this.write(socket, item);
    }
  }

  private write(socket: net.Socket, item: QueuedMessage): void {
    this.inflight.push(item);
    socket.write(item.bytes, (err) => {
      // A failed write stays in flight and is requeued when the socket closes
      if (err || this.socket !== socket) return;
      const index = this.inflight.indexOf(item);
      if (index >= 0) this.inflight.splice(index, 1);
      item.onSent?.();
    });
  }
}

/**
 * Build TcpTransports with the given reconnect backoff.
 */
export function createTcpBuilder(backoff: Partial<BackoffConfig> = {}): TransportBuilder {
  return (handler, address, options) => new TcpTransport(handler, address, options, backoff);
}

/** The default transport builder. */
export const tcpBuilder: TransportBuilder = createTcpBuilder();
