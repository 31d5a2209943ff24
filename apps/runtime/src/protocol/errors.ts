/**
 * Error values for the wire and send paths.
 *
 * Codec and send failures are per-message and never tear a channel down,
 * so they are returned as frozen values rather than thrown. Factories
 * never throw.
 */

// ---------------------------------------------------------------------------
// Codec errors
// ---------------------------------------------------------------------------

export type CodecErrorKind =
  | "truncated"
  | "unknown_type"
  | "version_mismatch"
  | "invalid_role";

export interface CodecError {
  readonly kind: CodecErrorKind;
  readonly message: string;
  /** Total frame size when the header was readable, so a reader can skip it. */
  readonly frameLength?: number;
}

/** Fewer bytes than the header or the declared payload length. */
export function truncated(available: number, required: number): Readonly<CodecError> {
  return Object.freeze({
    kind: "truncated" as const,
    message: `Truncated frame: ${available} of ${required} bytes available`,
  });
}

export function unknownType(tag: number, frameLength: number): Readonly<CodecError> {
  return Object.freeze({
    kind: "unknown_type" as const,
    message: `Unknown message type tag ${tag}`,
    frameLength,
  });
}

export function versionMismatch(
  version: number,
  supported: number,
  frameLength?: number,
): Readonly<CodecError> {
  return Object.freeze({
    kind: "version_mismatch" as const,
    message: `Unsupported format version ${version} (supported: ${supported})`,
    ...(frameLength === undefined ? {} : { frameLength }),
  });
}

export function invalidRole(code: number, frameLength: number): Readonly<CodecError> {
  return Object.freeze({
    kind: "invalid_role" as const,
    message: `Unknown target role code ${code}`,
    frameLength,
  });
}

// ---------------------------------------------------------------------------
// Send errors
// ---------------------------------------------------------------------------

export type SendErrorKind = "backpressure" | "closed";

export interface SendError {
  readonly kind: SendErrorKind;
  readonly message: string;
}

/** The destination's outbound queue is full; batch or retry, never a surface failure. */
export function backpressure(surfaceId: string, capacity: number): Readonly<SendError> {
  return Object.freeze({
    kind: "backpressure" as const,
    message: `Outbound queue for ${surfaceId} is full (${capacity} messages)`,
  });
}

export function sendClosed(surfaceId: string): Readonly<SendError> {
  return Object.freeze({
    kind: "closed" as const,
    message: `Surface ${surfaceId} no longer accepts messages`,
  });
}

export type SendResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SendError };

export const SEND_OK: SendResult = Object.freeze({ ok: true as const });

export function sendFailed(error: SendError): SendResult {
  return Object.freeze({ ok: false as const, error });
}
