// MessagePack-RPC wire message types.
//
// Every message is a position-significant array whose first element is the
// message type tag. The session layer builds and consumes these tuples; the
// codec turns them into bytes.

// ============================================================================
// Message Types
// ============================================================================

/** Message type tags (first array element on the wire). */
export const MessageType = {
  REQUEST: 0,
  RESPONSE: 1,
  NOTIFY: 2,
} as const;

export type MessageType = (typeof MessageType)[keyof typeof MessageType];

/**
 * Identifier correlating a request with its response.
 *
 * Non-negative and bounded by the generator (see `MAX_MESSAGE_ID` in core).
 */
export type MessageId = number;

/** `[REQUEST, msgid, method, args]` */
export type RequestMessage = [
  type: typeof MessageType.REQUEST,
  msgid: MessageId,
  method: string,
  args: unknown[],
];

/** `[RESPONSE, msgid, error, result]` */
export type ResponseMessage = [
  type: typeof MessageType.RESPONSE,
  msgid: MessageId,
  error: unknown,
  result: unknown,
];

/** `[NOTIFY, method, args]` */
export type NotifyMessage = [type: typeof MessageType.NOTIFY, method: string, args: unknown[]];

/** Messages a client sends. */
export type OutboundMessage = RequestMessage | NotifyMessage;

/** Any well-formed message. */
export type Message = RequestMessage | ResponseMessage | NotifyMessage;

// ============================================================================
// Factory Functions
// ============================================================================

export function messageRequest(
  msgid: MessageId,
  method: string,
  args: readonly unknown[],
): RequestMessage {
  return [MessageType.REQUEST, msgid, method, [...args]];
}

export function messageResponse(msgid: MessageId, error: unknown, result: unknown): ResponseMessage {
  return [MessageType.RESPONSE, msgid, error, result];
}

export function messageNotify(method: string, args: readonly unknown[]): NotifyMessage {
  return [MessageType.NOTIFY, method, [...args]];
}

/** Whether a response's error slot carries an error. */
export function isErrorSet(error: unknown): boolean {
  return error !== null && error !== undefined;
}
