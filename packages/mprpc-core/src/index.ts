// @mprpc/core - MessagePack-RPC client session layer
// This package provides call correlation, deadlines and the client façade;
// transports plug in through TransportBuilder.

// RPC error types (for client-side error handling)
export { RpcError, RemoteError, ProtocolError } from "@mprpc/wire";
export { TimeoutError, ConnectionError } from "./errors.ts";

// Wire types re-exported for transports and callers
export type { MessageId, OutboundMessage, PackEncoding, UnpackEncoding } from "@mprpc/wire";

// Session building blocks
export { MessageIdGenerator, MAX_MESSAGE_ID } from "./id_generator.ts";
export { Future, type FutureOutcome, type FutureCallback, type FutureOptions } from "./future.ts";
export { EventLoop, type Loop, type Detach } from "./loop.ts";
export { Address } from "./address.ts";

// Transport abstraction
export {
  type ClientTransport,
  type TransportHandler,
  type TransportOptions,
  type TransportBuilder,
} from "./transport.ts";

// Configuration
export {
  type SessionOptions,
  type ResolvedSessionOptions,
  resolveSessionOptions,
  DEFAULT_TIMEOUT,
  DEFAULT_RECONNECT_LIMIT,
} from "./options.ts";

// Session and client
export { Session, type PendingCall, type ResponseCallback } from "./session.ts";
export { Client, TIMEOUT_SWEEP_INTERVAL_MS } from "./client.ts";

// Client middleware types
export {
  Extensions,
  type ClientContext,
  type CallRequest,
  type CallOutcome,
  type RejectionCode,
  type Rejection,
  RejectionError,
  type ClientMiddleware,
} from "./middleware.ts";

// Caller abstraction
export { type CallerRequest, type Caller, SessionCaller, MiddlewareCaller } from "./caller.ts";

// Logging middleware
export { loggingMiddleware, type LoggingOptions, type LogSink } from "./logging.ts";
