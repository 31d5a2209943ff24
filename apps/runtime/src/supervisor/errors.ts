import type { SurfaceRole } from "../protocol/roles.js";

export class HandshakeTimeoutError extends Error {
  constructor(
    public readonly surfaceId: string,
    public readonly role: SurfaceRole,
    public readonly timeoutMs: number,
  ) {
    super(`Surface ${surfaceId} (${role}) did not send surface.ready within ${timeoutMs}ms`);
    this.name = "HandshakeTimeoutError";
  }
}

/** Creation gave up after exhausting the retry budget. Reported to the requester only. */
export class SurfaceCreationError extends Error {
  constructor(
    public readonly role: SurfaceRole,
    public readonly attempts: number,
    public override readonly cause: Error,
  ) {
    super(`Could not create ${role} surface after ${attempts} attempt(s): ${cause.message}`);
    this.name = "SurfaceCreationError";
  }
}

export class SurfaceNotFoundError extends Error {
  constructor(public readonly surfaceId: string) {
    super(`No surface with id ${surfaceId}`);
    this.name = "SurfaceNotFoundError";
  }
}

/** The surface was closed before it became ready. */
export class SurfaceClosedError extends Error {
  constructor(public readonly surfaceId: string) {
    super(`Surface ${surfaceId} was closed before it became ready`);
    this.name = "SurfaceClosedError";
  }
}

export class SupervisorStoppedError extends Error {
  constructor() {
    super("Supervisor is shutting down or stopped");
    this.name = "SupervisorStoppedError";
  }
}

export class InvalidProducerError extends Error {
  constructor(public readonly producerId: string) {
    super(`"${producerId}" is not a producer id`);
    this.name = "InvalidProducerError";
  }
}
