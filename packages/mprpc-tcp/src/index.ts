// @mprpc/tcp - MessagePack-RPC over TCP
//
// Provides the reconnecting TCP transport and helpers that build clients
// on top of it.

import { Client, type SessionOptions } from "@mprpc/core";

import { tcpBuilder } from "./transport.ts";

export {
  TcpTransport,
  tcpBuilder,
  createTcpBuilder,
  calculateBackoff,
  DEFAULT_BACKOFF,
  type BackoffConfig,
  type ConnectionState,
} from "./transport.ts";

/** Client options; the transport defaults to TCP. */
export type ClientOptions = Omit<SessionOptions, "address" | "transportBuilder"> &
  Partial<Pick<SessionOptions, "transportBuilder">>;

/**
 * Create a client connected to `address` (`"host:port"`).
 *
 * @example
 * ```typescript
 * const client = createClient("127.0.0.1:18800", { timeout: 5 });
 * console.log(await client.call("add", 2, 3));
 * client.close();
 * ```
 */
export function createClient(address: SessionOptions["address"], options: ClientOptions = {}): Client {
  return new Client({
    ...options,
    address,
    transportBuilder: options.transportBuilder ?? tcpBuilder,
  });
}

/**
 * Run `scope` with a client connected to `address`, closing it afterwards.
 */
export function openClient<R>(
  address: SessionOptions["address"],
  options: ClientOptions,
  scope: (client: Client) => Promise<R> | R,
): Promise<R> {
  return Client.open(
    { ...options, address, transportBuilder: options.transportBuilder ?? tcpBuilder },
    scope,
  );
}

// Re-export the client surface from core
export {
  Client,
  Session,
  Address,
  RpcError,
  RemoteError,
  TimeoutError,
  ConnectionError,
  loggingMiddleware,
  type SessionOptions,
} from "@mprpc/core";
