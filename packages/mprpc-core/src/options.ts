// Session and client configuration.

import { resolveCodecOptions, type PackEncoding, type UnpackEncoding } from "@mprpc/wire";
import { Address } from "./address.ts";
import type { Loop } from "./loop.ts";
import type { TransportBuilder } from "./transport.ts";

/** Configuration for a Session. */
export interface SessionOptions {
  /** Server endpoint, as an Address or `"host:port"`. */
  address: Address | string;

  /**
   * Per-call timeout in seconds. `0` disables deadlines (and the client's
   * timeout sweep). Default: 10
   */
  timeout?: number;

  /** Reconnection attempts the transport may make. Default: 5 */
  reconnectLimit?: number;

  /** Encoding for outbound strings. Default: "utf-8" */
  packEncoding?: PackEncoding;

  /** Encoding for inbound strings; `null` keeps raw bytes. Default: "utf-8" */
  unpackEncoding?: UnpackEncoding;

  /** Loop to drive. A Client creates an EventLoop when omitted. */
  loop?: Loop;

  /**
   * The host drives the loop itself; the session never starts or stops it.
   * Default: false
   */
  externalLoop?: boolean;

  /** Creates the session's transport. */
  transportBuilder: TransportBuilder;

  /** Millisecond clock used for call deadlines. Default: Date.now */
  clock?: () => number;
}

/** Session options with defaults applied. */
export interface ResolvedSessionOptions {
  address: Address;
  timeout: number;
  reconnectLimit: number;
  packEncoding: PackEncoding;
  unpackEncoding: UnpackEncoding;
  loop: Loop | undefined;
  externalLoop: boolean;
  transportBuilder: TransportBuilder;
  clock: () => number;
}

export const DEFAULT_TIMEOUT = 10;
export const DEFAULT_RECONNECT_LIMIT = 5;

/**
 * Apply defaults and validate.
 *
 * @throws RangeError for negative or non-finite numbers
 * @throws TypeError for a malformed address
 */
export function resolveSessionOptions(options: SessionOptions): ResolvedSessionOptions {
  const timeout = options.timeout ?? DEFAULT_TIMEOUT;
  const reconnectLimit = options.reconnectLimit ?? DEFAULT_RECONNECT_LIMIT;

  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new RangeError(`timeout must be a non-negative number of seconds: ${timeout}`);
  }
  if (!Number.isInteger(reconnectLimit) || reconnectLimit < 0) {
    throw new RangeError(`reconnectLimit must be a non-negative integer: ${reconnectLimit}`);
  }

  const codec = resolveCodecOptions(options);

  return {
    address: Address.from(options.address),
    timeout,
    reconnectLimit,
    packEncoding: codec.packEncoding,
    unpackEncoding: codec.unpackEncoding,
    loop: options.loop,
    externalLoop: options.externalLoop ?? false,
    transportBuilder: options.transportBuilder,
    clock: options.clock ?? (() => Date.now()),
  };
}
