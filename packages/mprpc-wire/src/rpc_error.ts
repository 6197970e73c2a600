// RPC error types shared by every layer.
//
// RemoteError carries whatever the server put in a response's error slot,
// untouched. ProtocolError marks an inbound value that is not a message.

/** Base class for errors raised by the RPC stack. */
export class RpcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RpcError";
  }
}

/**
 * The server answered with a non-empty error field.
 *
 * `error` is the decoded value exactly as the server sent it.
 */
export class RemoteError extends RpcError {
  readonly error: unknown;

  constructor(error: unknown) {
    super(describeRemoteError(error));
    this.name = "RemoteError";
    this.error = error;
  }
}

/** An inbound value did not match any message shape. */
export class ProtocolError extends RpcError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** Render a remote error value as a message string. */
export function describeRemoteError(error: unknown): string {
  if (typeof error === "string") return error;
  // Raw strings arrive as bytes when unpackEncoding is null
  if (error instanceof Uint8Array) return new TextDecoder().decode(error);
  if (typeof error === "object" && error !== null) {
    return JSON.stringify(error, (_key, value: unknown) =>
      typeof value === "bigint" ? value.toString() : value,
    );
  }
  return String(error);
}
