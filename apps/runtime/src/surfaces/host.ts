/**
 * Surface-side end of the protocol.
 *
 * A surface process creates a host over its stdio, registers listeners,
 * then announces itself with {@link SurfaceHost.ready}. Batches are unpacked
 * so listeners only ever see individual messages.
 */

import type { Readable, Writable } from "node:stream";
import { createDefaultCatalog, MessageTypes, type MessageCatalog } from "../protocol/catalog.js";
import { WireCodec } from "../protocol/codec.js";
import { PayloadDecodeError } from "../protocol/binary.js";
import type { CodecError } from "../protocol/errors.js";
import { FrameDecoder } from "../protocol/framing.js";
import { batchCodec } from "../protocol/payloads.js";
import { isSurfaceRole, type SurfaceRole } from "../protocol/roles.js";
import { createMessage, withSequence, type Message } from "../protocol/types.js";
import { StreamChannel } from "./channel.js";
import { SURFACE_ID_ENV, SURFACE_ROLE_ENV } from "./process.js";

export type HostMessageListener = (message: Message) => void;

/** A frame the host could not decode, or a batch whose payload was malformed. */
export type HostDecodeError = CodecError | PayloadDecodeError;

export interface SurfaceHostOptions {
  input: Readable;
  output: Writable;
  catalog?: MessageCatalog | undefined;
  surfaceId?: string | undefined;
  role?: SurfaceRole | undefined;
}

export class SurfaceHost {
  readonly surfaceId: string | undefined;
  readonly role: SurfaceRole | undefined;

  private readonly channel: StreamChannel;
  private readonly codec: WireCodec;
  private readonly decoder: FrameDecoder;
  private readonly listeners: HostMessageListener[] = [];
  private readonly closeListeners: Array<() => void> = [];
  private readonly errorListeners: Array<(error: HostDecodeError) => void> = [];
  private sequence = 0;
  private announced = false;

  constructor(options: SurfaceHostOptions) {
    this.surfaceId = options.surfaceId;
    this.role = options.role;
    this.codec = new WireCodec(options.catalog ?? createDefaultCatalog());
    this.decoder = new FrameDecoder(this.codec);
    this.channel = new StreamChannel(options.input, options.output);
    this.channel.onData((chunk) => this.receive(chunk));
  }

  /** Announce readiness. Must be the first message the surface sends. */
  ready(): Promise<void> {
    if (this.announced) return Promise.resolve();
    this.announced = true;
    return this.write(createMessage(MessageTypes.SurfaceReady));
  }

  /**
   * Send a message to the supervisor.
   *
   * @throws {Error} if called before {@link ready}.
   */
  send(message: Message): Promise<void> {
    if (!this.announced) {
      return Promise.reject(new Error("SurfaceHost.send called before ready()"));
    }
    return this.write(message);
  }

  onMessage(listener: HostMessageListener): void {
    this.listeners.push(listener);
  }

  /** Fires when the supervisor asks the surface to close. */
  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  onDecodeError(listener: (error: HostDecodeError) => void): void {
    this.errorListeners.push(listener);
  }

  close(): void {
    this.channel.close();
  }

  private write(message: Message): Promise<void> {
    this.sequence = (this.sequence + 1) >>> 0;
    return this.channel.write(this.codec.encode(withSequence(message, this.sequence)));
  }

  private receive(chunk: Uint8Array): void {
    for (const event of this.decoder.push(chunk)) {
      if (!event.ok) {
        this.reportError(event.error);
        continue;
      }
      try {
        this.deliver(event.message);
      } catch (error) {
        if (!(error instanceof PayloadDecodeError)) throw error;
        this.reportError(error);
      }
    }
  }

  private reportError(error: HostDecodeError): void {
    for (const listener of this.errorListeners) listener(error);
  }

  private deliver(message: Message): void {
    if (message.type === MessageTypes.SurfaceClose) {
      for (const listener of this.closeListeners) listener();
      return;
    }
    if (message.type === MessageTypes.Batch) {
      const batch = batchCodec.decode(message.payload);
      for (const item of batch.items) {
        this.emit(createMessage(batch.type, item, message.targetRole, message.sequence));
      }
      return;
    }
    this.emit(message);
  }

  private emit(message: Message): void {
    for (const listener of this.listeners) listener(message);
  }
}

/** Host over the current process's stdin/stdout, identified by its environment. */
export function createStdioSurfaceHost(catalog?: MessageCatalog): SurfaceHost {
  const role = process.env[SURFACE_ROLE_ENV];
  return new SurfaceHost({
    input: process.stdin,
    output: process.stdout,
    catalog,
    surfaceId: process.env[SURFACE_ID_ENV],
    role: isSurfaceRole(role) ? role : undefined,
  });
}
