import type { SurfaceRole } from "./roles.js";

/**
 * A routed protocol message.
 *
 * `sequence` is stamped by the writing side of a channel when the frame is
 * written; it is only used to spot drops and reordering on that channel.
 */
export interface Message {
  readonly type: string;
  readonly targetRole: SurfaceRole | null;
  readonly payload: Uint8Array;
  readonly sequence: number;
}

/** Update policy applied to a message type on its way to a surface. */
export type MessagePolicy = "normal" | "replaceable" | "high-frequency";

export interface MessageTypeDefinition {
  readonly type: string;
  readonly tag: number;
  readonly policy: MessagePolicy;
}

const EMPTY_PAYLOAD = new Uint8Array(0);

/**
 * Build an immutable message. The sequence defaults to 0 and is replaced
 * by the channel writer.
 */
export function createMessage(
  type: string,
  payload: Uint8Array = EMPTY_PAYLOAD,
  targetRole: SurfaceRole | null = null,
  sequence = 0,
): Message {
  if (!type) {
    throw new Error("createMessage: type must be a non-empty string");
  }
  return Object.freeze({ type, targetRole, payload, sequence });
}

/** Copy of `message` with a different sequence number. */
export function withSequence(message: Message, sequence: number): Message {
  return Object.freeze({ ...message, sequence });
}

/** Byte-wise payload comparison. */
export function samePayload(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
