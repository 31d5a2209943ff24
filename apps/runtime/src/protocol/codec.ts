/**
 * Binary wire codec.
 *
 * Frame layout (big-endian):
 *
 * | offset | size | field          |
 * |--------|------|----------------|
 * | 0      | 1    | format version |
 * | 1      | 2    | type tag       |
 * | 3      | 1    | target role    |
 * | 4      | 4    | sequence       |
 * | 8      | 4    | payload length |
 * | 12     | n    | payload        |
 *
 * The header layout is frozen across format versions so that a reader can
 * always skip a frame it cannot decode.
 */

import type { MessageCatalog } from "./catalog.js";
import {
  invalidRole,
  truncated,
  unknownType,
  versionMismatch,
  type CodecError,
} from "./errors.js";
import { roleCode, roleFromCode } from "./roles.js";
import type { Message } from "./types.js";

export const FORMAT_VERSION = 1;
export const HEADER_LENGTH = 12;

export type CodecResult =
  | { readonly ok: true; readonly message: Message; readonly frameLength: number }
  | { readonly ok: false; readonly error: CodecError };

export class WireCodec {
  constructor(private readonly catalog: MessageCatalog) {}

  /**
   * Encode a message into one frame.
   *
   * @throws {UnknownMessageTypeError} if the type is not in the catalog.
   */
  encode(message: Message): Uint8Array {
    const tag = this.catalog.tagOf(message.type);
    const frame = new Uint8Array(HEADER_LENGTH + message.payload.length);
    const view = new DataView(frame.buffer);
    view.setUint8(0, FORMAT_VERSION);
    view.setUint16(1, tag);
    view.setUint8(3, roleCode(message.targetRole));
    view.setUint32(4, message.sequence >>> 0);
    view.setUint32(8, message.payload.length);
    frame.set(message.payload, HEADER_LENGTH);
    return frame;
  }

  /**
   * Decode the frame at the start of `bytes`.
   *
   * Trailing bytes after the frame are ignored; `frameLength` says how many
   * were consumed. The payload is copied out of `bytes`.
   */
  decode(bytes: Uint8Array): CodecResult {
    if (bytes.length === 0) {
      return { ok: false, error: truncated(0, HEADER_LENGTH) };
    }

    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    const version = view.getUint8(0);

    if (bytes.length < HEADER_LENGTH) {
      if (version !== FORMAT_VERSION) {
        return { ok: false, error: versionMismatch(version, FORMAT_VERSION) };
      }
      return { ok: false, error: truncated(bytes.length, HEADER_LENGTH) };
    }

    const tag = view.getUint16(1);
    const code = view.getUint8(3);
    const sequence = view.getUint32(4);
    const frameLength = HEADER_LENGTH + view.getUint32(8);

    if (version !== FORMAT_VERSION) {
      return { ok: false, error: versionMismatch(version, FORMAT_VERSION, frameLength) };
    }
    if (bytes.length < frameLength) {
      return { ok: false, error: truncated(bytes.length, frameLength) };
    }

    const def = this.catalog.getByTag(tag);
    if (def === undefined) {
      return { ok: false, error: unknownType(tag, frameLength) };
    }

    const targetRole = roleFromCode(code);
    if (targetRole === undefined) {
      return { ok: false, error: invalidRole(code, frameLength) };
    }

    const message: Message = Object.freeze({
      type: def.type,
      targetRole,
      payload: bytes.slice(HEADER_LENGTH, frameLength),
      sequence,
    });
    return { ok: true, message, frameLength };
  }
}
