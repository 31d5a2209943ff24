import { describe, expect, it } from "vitest";
import {
  HandshakeTimeoutError,
  InvalidProducerError,
  SupervisorStoppedError,
  SurfaceClosedError,
  SurfaceCreationError,
  SurfaceNotFoundError,
} from "../../../src/supervisor/errors.js";

describe("supervisor errors", () => {
  it("carry their context", () => {
    const timeout = new HandshakeTimeoutError("sf_1", "debug", 5000);
    expect(timeout.name).toBe("HandshakeTimeoutError");
    expect(timeout.message).toBe("Surface sf_1 (debug) did not send surface.ready within 5000ms");

    const creation = new SurfaceCreationError("debug", 3, timeout);
    expect(creation.cause).toBe(timeout);
    expect(creation.message).toBe(
      "Could not create debug surface after 3 attempt(s): Surface sf_1 (debug) did not send surface.ready within 5000ms",
    );
  });

  it("name themselves", () => {
    expect(new SurfaceNotFoundError("sf_1").name).toBe("SurfaceNotFoundError");
    expect(new SurfaceClosedError("sf_1").name).toBe("SurfaceClosedError");
    expect(new SupervisorStoppedError().name).toBe("SupervisorStoppedError");
    expect(new InvalidProducerError("x").message).toBe('"x" is not a producer id');
  });
});
