/**
 * Bidirectional byte channel between the supervisor and one surface.
 *
 * The supervisor writes frames through a single pump per surface, so a
 * channel never sees two concurrent writers.
 */

import { PassThrough, type Readable, type Writable } from "node:stream";

export interface SurfaceChannel {
  readonly closed: boolean;
  /**
   * Hand bytes to the underlying stream. Resolves once the stream accepted
   * them, waiting for a drain when its buffer is full.
   */
  write(bytes: Uint8Array): Promise<void>;
  onData(listener: (chunk: Uint8Array) => void): void;
  onClose(listener: () => void): void;
  close(): void;
}

export class ChannelClosedError extends Error {
  constructor() {
    super("Channel is closed");
    this.name = "ChannelClosedError";
  }
}

/** A channel over a readable (surface → supervisor) and writable (supervisor → surface). */
export class StreamChannel implements SurfaceChannel {
  private _closed = false;
  private readonly closeListeners: Array<() => void> = [];

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
  ) {
    const markClosed = (): void => this.markClosed();
    input.once("end", markClosed);
    input.once("close", markClosed);
    output.once("close", markClosed);
    // Stream errors surface through process exit; only the channel state changes here.
    input.on("error", markClosed);
    output.on("error", markClosed);
  }

  get closed(): boolean {
    return this._closed;
  }

  write(bytes: Uint8Array): Promise<void> {
    if (this._closed) {
      return Promise.reject(new ChannelClosedError());
    }
    return new Promise<void>((resolve, reject) => {
      const accepted = this.output.write(bytes);
      if (accepted) {
        resolve();
        return;
      }
      const onDrain = (): void => {
        this.output.removeListener("close", onClose);
        resolve();
      };
      const onClose = (): void => {
        this.output.removeListener("drain", onDrain);
        reject(new ChannelClosedError());
      };
      this.output.once("drain", onDrain);
      this.output.once("close", onClose);
    });
  }

  onData(listener: (chunk: Uint8Array) => void): void {
    this.input.on("data", (chunk: Buffer | string) => {
      listener(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    });
  }

  onClose(listener: () => void): void {
    if (this._closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  close(): void {
    if (this._closed) return;
    this.output.end();
    this.input.destroy();
    this.markClosed();
  }

  private markClosed(): void {
    if (this._closed) return;
    this._closed = true;
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }
  }
}

/** Both ends of an in-process channel. */
export interface ChannelPair {
  /** Supervisor side. */
  channel: StreamChannel;
  /** What the surface reads (supervisor → surface). */
  surfaceInput: Readable;
  /** What the surface writes (surface → supervisor). */
  surfaceOutput: Writable;
}

/** An in-memory channel, for surfaces hosted in the supervisor's own process. */
export function createChannelPair(highWaterMark = 64 * 1024): ChannelPair {
  const toSurface = new PassThrough({ highWaterMark });
  const fromSurface = new PassThrough({ highWaterMark });
  return {
    channel: new StreamChannel(fromSurface, toSurface),
    surfaceInput: toSurface,
    surfaceOutput: fromSurface,
  };
}
