// Wire codec for MessagePack-RPC messages.
//
// Encoding and decoding go through @msgpack/msgpack. Decoded values are
// validated against the message tuple shapes before they reach the session.

import { decode, decodeMultiStream, encode, type DecoderOptions } from "@msgpack/msgpack";

import { ProtocolError } from "./rpc_error.ts";
import { MessageType, type Message } from "./types.ts";

// ============================================================================
// Codec Options
// ============================================================================

/** Encoding used for outbound strings. MessagePack str is always UTF-8. */
export type PackEncoding = "utf-8";

/**
 * Encoding used for inbound strings.
 * `null` leaves str payloads as raw bytes (Uint8Array).
 */
export type UnpackEncoding = "utf-8" | null;

export interface CodecOptions {
  packEncoding?: PackEncoding;
  unpackEncoding?: UnpackEncoding;
}

/** Resolved codec options with defaults applied. */
export interface ResolvedCodecOptions {
  packEncoding: PackEncoding;
  unpackEncoding: UnpackEncoding;
}

export function resolveCodecOptions(options: CodecOptions = {}): ResolvedCodecOptions {
  const packEncoding = options.packEncoding ?? "utf-8";
  const unpackEncoding = options.unpackEncoding === undefined ? "utf-8" : options.unpackEncoding;

  if (packEncoding !== "utf-8") {
    throw new RangeError(`unsupported packEncoding: ${String(packEncoding)}`);
  }
  if (unpackEncoding !== "utf-8" && unpackEncoding !== null) {
    throw new RangeError(`unsupported unpackEncoding: ${String(unpackEncoding)}`);
  }
  return { packEncoding, unpackEncoding };
}

function decoderOptions(options: CodecOptions): DecoderOptions {
  const { unpackEncoding } = resolveCodecOptions(options);
  return { rawStrings: unpackEncoding === null };
}

// ============================================================================
// Message Validation
// ============================================================================

function isMessageId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/**
 * Validate a decoded value as a message.
 *
 * @throws ProtocolError if the value has no message shape
 */
export function parseMessage(value: unknown): Message {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ProtocolError("message must be a non-empty array");
  }

  // Spread into a fresh unknown[] so tuple checks below narrow by index
  const fields: unknown[] = [...value];
  const type = fields[0];

  switch (type) {
    case MessageType.REQUEST: {
      const [, msgid, method, args] = fields;
      if (fields.length !== 4 || !isMessageId(msgid) || typeof method !== "string" || !Array.isArray(args)) {
        throw new ProtocolError("malformed request message");
      }
      return [MessageType.REQUEST, msgid, method, [...args]];
    }
    case MessageType.RESPONSE: {
      const [, msgid, error, result] = fields;
      if (fields.length !== 4 || !isMessageId(msgid)) {
        throw new ProtocolError("malformed response message");
      }
      return [MessageType.RESPONSE, msgid, error, result];
    }
    case MessageType.NOTIFY: {
      const [, method, args] = fields;
      if (fields.length !== 3 || typeof method !== "string" || !Array.isArray(args)) {
        throw new ProtocolError("malformed notify message");
      }
      return [MessageType.NOTIFY, method, [...args]];
    }
    default:
      throw new ProtocolError(`unknown message type: ${String(type)}`);
  }
}

// ============================================================================
// Encoding/Decoding
// ============================================================================

/**
 * Encode a message to bytes.
 */
export function encodeMessage(message: Message, options: CodecOptions = {}): Uint8Array {
  resolveCodecOptions(options);
  return encode(message);
}

/**
 * Decode exactly one message from bytes.
 *
 * @throws ProtocolError if the decoded value is not a message
 */
export function decodeMessage(buf: Uint8Array, options: CodecOptions = {}): Message {
  return parseMessage(decode(buf, decoderOptions(options)));
}

/**
 * Decode a byte stream carrying back-to-back messages.
 *
 * Chunk boundaries need not line up with message boundaries.
 */
export async function* decodeMessageStream(
  source: AsyncIterable<Uint8Array>,
  options: CodecOptions = {},
): AsyncGenerator<Message, void, undefined> {
  for await (const value of decodeMultiStream(source, decoderOptions(options))) {
    yield parseMessage(value);
  }
}
