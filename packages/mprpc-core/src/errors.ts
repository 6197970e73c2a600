// Errors raised by the session layer.
//
// RemoteError (server-side failures) lives in @mprpc/wire; the errors here
// are generated locally.

import { RpcError, type MessageId } from "@mprpc/wire";

/** No response arrived before the call's deadline. */
export class TimeoutError extends RpcError {
  constructor(
    public readonly msgid: MessageId,
    public readonly timeout: number,
    public readonly method: string,
  ) {
    super(`Request timed out (msgid=${msgid}, timeout=${timeout}s)`);
    this.name = "TimeoutError";
  }
}

/** Error on the connection underneath a session. */
export class ConnectionError extends RpcError {
  constructor(
    public kind: "io" | "closed" | "reconnect-exhausted",
    message: string,
    public readonly reason?: Error,
  ) {
    super(message);
    this.name = "ConnectionError";
  }

  static io(message: string, reason?: Error): ConnectionError {
    return new ConnectionError("io", message, reason);
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "session closed");
  }

  static reconnectExhausted(attempts: number, lastError: Error): ConnectionError {
    return new ConnectionError(
      "reconnect-exhausted",
      `connection failed after ${attempts} attempts: ${lastError.message}`,
      lastError,
    );
  }
}
