// MessagePack-RPC wire protocol types and codec
//
// This package contains the message tuple shapes, their msgpack codec,
// and the error types every other package raises.

// ============================================================================
// RPC Error Types
// ============================================================================

export { RpcError, RemoteError, ProtocolError, describeRemoteError } from "./rpc_error.ts";

// ============================================================================
// Wire Types
// ============================================================================

export type {
  MessageId,
  RequestMessage,
  ResponseMessage,
  NotifyMessage,
  OutboundMessage,
  Message,
} from "./types.ts";

export {
  MessageType,
  messageRequest,
  messageResponse,
  messageNotify,
  isErrorSet,
} from "./types.ts";

// ============================================================================
// Wire Codec
// ============================================================================

export {
  type PackEncoding,
  type UnpackEncoding,
  type CodecOptions,
  type ResolvedCodecOptions,
  resolveCodecOptions,
  parseMessage,
  encodeMessage,
  decodeMessage,
  decodeMessageStream,
} from "./codec.ts";
