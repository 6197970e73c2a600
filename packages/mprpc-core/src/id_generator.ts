// Message ID generator for outbound requests.

import type { MessageId } from "@mprpc/wire";

/** Largest id handed out before the sequence wraps back to 0. */
export const MAX_MESSAGE_ID = 2 ** 30;

/**
 * Produces 0, 1, 2, ... MAX_MESSAGE_ID, then starts again at 0.
 *
 * Ids are unique among outstanding calls as long as fewer than
 * MAX_MESSAGE_ID + 1 calls are in flight at once. Not safe to share
 * between concurrently running callers without external locking.
 */
export class MessageIdGenerator {
  private nextId: MessageId;

  constructor(start: MessageId = 0) {
    if (!Number.isInteger(start) || start < 0 || start > MAX_MESSAGE_ID) {
      throw new RangeError(`message id start out of range: ${start}`);
    }
    this.nextId = start;
  }

  /** Allocate the next message ID. */
  next(): MessageId {
    const id = this.nextId;
    this.nextId = id >= MAX_MESSAGE_ID ? 0 : id + 1;
    return id;
  }
}
