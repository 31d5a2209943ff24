import { describe, expect, it } from "vitest";
import {
  backpressure,
  invalidRole,
  SEND_OK,
  sendClosed,
  sendFailed,
  truncated,
  unknownType,
  versionMismatch,
} from "../../../src/protocol/errors.js";

describe("codec error factories", () => {
  it("truncated reports available and required bytes", () => {
    const err = truncated(3, 12);
    expect(err.kind).toBe("truncated");
    expect(err.message).toBe("Truncated frame: 3 of 12 bytes available");
    expect(err.frameLength).toBeUndefined();
  });

  it("unknownType carries the frame length so the frame can be skipped", () => {
    expect(unknownType(999, 20)).toEqual({
      kind: "unknown_type",
      message: "Unknown message type tag 999",
      frameLength: 20,
    });
  });

  it("versionMismatch omits the frame length when the header was short", () => {
    expect("frameLength" in versionMismatch(2, 1)).toBe(false);
    expect(versionMismatch(2, 1, 40).frameLength).toBe(40);
    expect(versionMismatch(2, 1).message).toBe("Unsupported format version 2 (supported: 1)");
  });

  it("invalidRole names the code", () => {
    expect(invalidRole(9, 12).message).toBe("Unknown target role code 9");
  });

  it("returns frozen objects", () => {
    expect(Object.isFrozen(truncated(0, 12))).toBe(true);
    expect(Object.isFrozen(unknownType(1, 12))).toBe(true);
    expect(Object.isFrozen(versionMismatch(2, 1))).toBe(true);
    expect(Object.isFrozen(invalidRole(9, 12))).toBe(true);
  });
});

describe("send error factories", () => {
  it("backpressure names the surface and capacity", () => {
    expect(backpressure("sf_1", 64)).toEqual({
      kind: "backpressure",
      message: "Outbound queue for sf_1 is full (64 messages)",
    });
  });

  it("sendClosed names the surface", () => {
    expect(sendClosed("sf_1").kind).toBe("closed");
  });

  it("wraps errors in a failed result", () => {
    const error = sendClosed("sf_1");
    expect(sendFailed(error)).toEqual({ ok: false, error });
    expect(SEND_OK).toEqual({ ok: true });
    expect(Object.isFrozen(SEND_OK)).toBe(true);
  });
});
