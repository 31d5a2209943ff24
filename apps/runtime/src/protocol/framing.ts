/**
 * Stream framing on top of {@link WireCodec}.
 *
 * Channels deliver arbitrary chunks; the decoder reassembles whole frames,
 * reports undecodable frames and skips past them using their declared
 * length, so one bad message never poisons the rest of the stream.
 */

import { HEADER_LENGTH, type WireCodec } from "./codec.js";
import type { CodecError } from "./errors.js";
import type { Message } from "./types.js";

export type FrameEvent =
  | { readonly ok: true; readonly message: Message }
  | { readonly ok: false; readonly error: CodecError };

const EMPTY = new Uint8Array(0);

export class FrameDecoder {
  private pending: Uint8Array = EMPTY;

  constructor(private readonly codec: WireCodec) {}

  /** Bytes held back waiting for the rest of a frame. */
  get buffered(): number {
    return this.pending.length;
  }

  /** Feed one chunk; returns every frame completed by it, in stream order. */
  push(chunk: Uint8Array): FrameEvent[] {
    this.pending = this.pending.length === 0 ? chunk : concat(this.pending, chunk);

    const events: FrameEvent[] = [];
    let offset = 0;
    while (this.pending.length - offset >= HEADER_LENGTH) {
      const result = this.codec.decode(this.pending.subarray(offset));
      if (result.ok) {
        events.push({ ok: true, message: result.message });
        offset += result.frameLength;
        continue;
      }
      if (result.error.kind === "truncated" || result.error.frameLength === undefined) {
        break;
      }
      // A bad frame is only skipped once all of it has arrived.
      if (this.pending.length - offset < result.error.frameLength) {
        break;
      }
      events.push({ ok: false, error: result.error });
      offset += result.error.frameLength;
    }

    this.pending = offset === 0 ? this.pending : this.pending.slice(offset);
    return events;
  }

  /** Drop any partial frame. */
  reset(): void {
    this.pending = EMPTY;
  }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
  const out = new Uint8Array(a.length + b.length);
  out.set(a, 0);
  out.set(b, a.length);
  return out;
}
