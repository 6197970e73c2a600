/**
 * Transport abstraction.
 *
 * This module defines the contract between a Session and the transport that
 * carries its messages. The Session never touches bytes: it hands message
 * tuples to `sendMessage` and receives decoded responses through its
 * TransportHandler callbacks.
 *
 * Implementations:
 * - TcpTransport (mprpc-tcp) for msgpack over TCP
 */

import type { MessageId, OutboundMessage, PackEncoding, UnpackEncoding } from "@mprpc/wire";
import type { Address } from "./address.ts";

/**
 * Interface for transports a Session sends through.
 */
export interface ClientTransport {
  /**
   * Queue a message for sending.
   *
   * `onSent` runs once the message has been handed to the connection.
   * It never runs if the connection fails first.
   */
  sendMessage(message: OutboundMessage, onSent?: () => void): void;

  /**
   * Tear the connection down. No handler callbacks run afterwards.
   */
  close(): void;
}

/**
 * Callbacks a transport invokes on its session.
 */
export interface TransportHandler {
  /** A response arrived. `error` is null/undefined on success. */
  onResponse(msgid: MessageId, error: unknown, result: unknown): void;

  /** The connection is gone for good. */
  onConnectFailed(reason: Error): void;
}

/** Options a session forwards to its transport without interpreting them. */
export interface TransportOptions {
  reconnectLimit: number;
  packEncoding: PackEncoding;
  unpackEncoding: UnpackEncoding;
}

/** Creates the transport owned by a session. */
export type TransportBuilder = (
  handler: TransportHandler,
  address: Address,
  options: TransportOptions,
) => ClientTransport;
