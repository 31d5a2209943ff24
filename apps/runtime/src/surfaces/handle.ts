/**
 * Supervisor-side handle for one surface instance.
 *
 * Owns the instance's lifecycle machine, its bounded outbound queue and the
 * single pump that writes queued messages to the channel in order. Inbound
 * bytes are reassembled into messages and handed to `onMessage`; the
 * supervisor posts them onto its control loop.
 */

import { MessageTypes } from "../protocol/catalog.js";
import type { WireCodec } from "../protocol/codec.js";
import {
  backpressure,
  SEND_OK,
  sendClosed,
  sendFailed,
  type SendResult,
} from "../protocol/errors.js";
import { FrameDecoder } from "../protocol/framing.js";
import type { Geometry } from "../protocol/payloads.js";
import type { SurfaceRole } from "../protocol/roles.js";
import { createMessage, samePayload, withSequence, type Message } from "../protocol/types.js";
import { emitDiagnostic, type DiagnosticSink } from "../diagnostics/events.js";
import type { Logger } from "../diagnostics/logger.js";
import type { SurfaceChannel } from "./channel.js";
import type { SurfaceProcess } from "./process.js";
import {
  SurfaceStateMachine,
  type SurfaceEvent,
  type SurfaceState,
  type SurfaceTransitionRecord,
} from "./state_machine.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Read-only snapshot of a surface instance. */
export interface SurfaceInfo {
  id: string;
  role: SurfaceRole;
  state: SurfaceState;
  layoutKey: string;
  visible: boolean;
  geometry: Geometry | null;
  pid: number | undefined;
  alive: boolean;
  pending: number;
  createdAt: number;
  /** Id of the crashed instance this one replaces, if any. */
  replaces: string | undefined;
}

export interface CloseReport {
  /** Messages written while draining, not counting `surface.close`. */
  delivered: number;
  /** Messages still queued when the drain timeout elapsed. */
  dropped: number;
}

export interface SurfaceHandleOptions {
  id: string;
  role: SurfaceRole;
  layoutKey: string;
  codec: WireCodec;
  queueCapacity: number;
  logger: Logger;
  diagnostics: DiagnosticSink;
  onMessage: (handle: SurfaceHandle, message: Message) => void;
  replaces?: string | undefined;
}

interface ReadyWaiter {
  resolve: (id: string) => void;
  reject: (error: Error) => void;
}

// ---------------------------------------------------------------------------
// Handle
// ---------------------------------------------------------------------------

export class SurfaceHandle {
  readonly id: string;
  readonly role: SurfaceRole;
  readonly layoutKey: string;
  readonly createdAt = Date.now();
  readonly replaces: string | undefined;

  visible = true;
  geometry: Geometry | null = null;
  /** Launch attempt within the current retry budget. */
  attempt = 0;

  private readonly machine: SurfaceStateMachine;
  private readonly codec: WireCodec;
  private readonly capacity: number;
  private readonly logger: Logger;
  private readonly diagnostics: DiagnosticSink;
  private readonly onMessage: (handle: SurfaceHandle, message: Message) => void;

  private readonly queue: Message[] = [];
  private _process: SurfaceProcess | undefined;
  private channel: SurfaceChannel | undefined;
  private decoder: FrameDecoder;
  private accepting = true;
  private opened = false;
  private pumping = false;
  private outboundSequence = 0;
  private written = 0;
  private lastInboundSequence: number | undefined;
  private idleWaiters: Array<() => void> = [];
  private readyWaiters: ReadyWaiter[] = [];

  constructor(options: SurfaceHandleOptions) {
    this.id = options.id;
    this.role = options.role;
    this.layoutKey = options.layoutKey;
    this.replaces = options.replaces;
    this.codec = options.codec;
    this.capacity = options.queueCapacity;
    this.logger = options.logger;
    this.diagnostics = options.diagnostics;
    this.onMessage = options.onMessage;
    this.machine = new SurfaceStateMachine(options.id);
    this.decoder = new FrameDecoder(options.codec);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  get state(): SurfaceState {
    return this.machine.state;
  }

  get isLive(): boolean {
    return this.machine.isLive;
  }

  get history(): readonly SurfaceTransitionRecord[] {
    return this.machine.history;
  }

  get process(): SurfaceProcess | undefined {
    return this._process;
  }

  /** Number of messages waiting to be written. */
  get pending(): number {
    return this.queue.length;
  }

  can(event: SurfaceEvent): boolean {
    return this.machine.can(event);
  }

  /**
   * Apply a lifecycle event and publish the change.
   *
   * @throws {InvalidSurfaceTransitionError} if the event is not allowed.
   */
  transition(event: SurfaceEvent): SurfaceState {
    const from = this.machine.state;
    const to = this.machine.apply(event);
    this.logger.debug(`${this.id} ${from} -> ${to} (${event})`);
    emitDiagnostic(this.diagnostics, "surface.state_changed", this.id, {
      role: this.role,
      from,
      to,
      event,
    });
    return to;
  }

  /** True while a process is attached and has not exited. */
  isAlive(): boolean {
    return this._process !== undefined && !this._process.exited;
  }

  info(): SurfaceInfo {
    return {
      id: this.id,
      role: this.role,
      state: this.machine.state,
      layoutKey: this.layoutKey,
      visible: this.visible,
      geometry: this.geometry,
      pid: this._process?.pid,
      alive: this.isAlive(),
      pending: this.queue.length,
      createdAt: this.createdAt,
      replaces: this.replaces,
    };
  }

  // -------------------------------------------------------------------------
  // Process binding
  // -------------------------------------------------------------------------

  /** Bind a freshly launched process. Outbound writes start at {@link open}. */
  attach(process: SurfaceProcess): void {
    this._process = process;
    this.channel = process.channel;
    this.decoder = new FrameDecoder(this.codec);
    this.outboundSequence = 0;
    this.lastInboundSequence = undefined;

    const channel = process.channel;
    channel.onData((chunk) => {
      if (this.channel !== channel) return;
      this.receive(chunk);
    });
  }

  /** Unbind the current process (failed attempt); returns it so it can be stopped. */
  detach(): SurfaceProcess | undefined {
    const process = this._process;
    this._process = undefined;
    this.channel = undefined;
    this.opened = false;
    this.decoder.reset();
    return process;
  }

  /**
   * Start writing. The preamble goes out ahead of anything queued while the
   * surface was starting, regardless of queue capacity. A queued message
   * identical to one in the preamble is dropped.
   */
  open(preamble: readonly Message[] = []): void {
    const waiting = this.queue.filter(
      (queued) =>
        !preamble.some(
          (sent) => sent.type === queued.type && samePayload(sent.payload, queued.payload),
        ),
    );
    this.queue.length = 0;
    this.queue.push(...preamble, ...waiting);
    this.opened = true;
    this.pump();
  }

  // -------------------------------------------------------------------------
  // Outbound
  // -------------------------------------------------------------------------

  /** Enqueue `message`. Never blocks; a full queue is reported as backpressure. */
  send(message: Message): SendResult {
    if (!this.accepting) {
      return sendFailed(sendClosed(this.id));
    }
    if (this.queue.length >= this.capacity) {
      return sendFailed(backpressure(this.id, this.capacity));
    }
    this.queue.push(message);
    this.pump();
    return SEND_OK;
  }

  /**
   * Enqueue `message`, replacing a queued message of the same type in place.
   * A message already handed to the channel is never replaced.
   */
  sendReplacing(message: Message): SendResult {
    if (!this.accepting) {
      return sendFailed(sendClosed(this.id));
    }
    const index = this.queue.findIndex((queued) => queued.type === message.type);
    if (index === -1) {
      return this.send(message);
    }
    this.queue[index] = message;
    return SEND_OK;
  }

  hasPending(type: string): boolean {
    return this.queue.some((queued) => queued.type === type);
  }

  /** Drop everything queued; returns how many messages were dropped. */
  discardQueue(): number {
    const dropped = this.queue.length;
    this.queue.length = 0;
    this.notifyIdle();
    return dropped;
  }

  /**
   * Close the instance: stop accepting, ask the surface to close, drain the
   * queue for up to `drainTimeoutMs`, then stop the process.
   */
  async close(drainTimeoutMs: number, killGraceMs: number): Promise<CloseReport> {
    this.accepting = false;
    const process = this._process;
    const writtenBefore = this.written;

    if (this.opened && process !== undefined && !process.exited) {
      this.queue.push(createMessage(MessageTypes.SurfaceClose));
      this.pump();
      const drained = await this.whenIdle(drainTimeoutMs);
      if (!drained) {
        this.logger.warn(`${this.id} did not drain within ${drainTimeoutMs}ms`, {
          pending: this.queue.length,
        });
      }
    }

    const dropped = this.discardQueue();
    if (process !== undefined) {
      await process.terminate(killGraceMs);
    }
    return { delivered: this.written - writtenBefore, dropped };
  }

  private pump(): void {
    const channel = this.channel;
    if (this.pumping || !this.opened || channel === undefined) return;
    if (this.queue.length === 0) return;
    this.pumping = true;
    void this.drainTo(channel);
  }

  private async drainTo(channel: SurfaceChannel): Promise<void> {
    try {
      let next = this.queue.shift();
      while (next !== undefined && this.channel === channel && !channel.closed) {
        const sequence = (this.outboundSequence + 1) >>> 0;
        const frame = this.encode(next, sequence);
        if (frame !== undefined) {
          this.outboundSequence = sequence;
          await channel.write(frame);
          if (next.type !== MessageTypes.SurfaceClose) this.written += 1;
        }
        next = this.queue.shift();
      }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${this.id} write failed: ${reason}`);
    } finally {
      this.pumping = false;
      if (this.queue.length === 0) {
        this.notifyIdle();
      } else if (this.channel === channel && !channel.closed) {
        this.pump();
      }
    }
  }

  /** Frame for `message`, or `undefined` (reported) when it cannot be encoded. */
  private encode(message: Message, sequence: number): Uint8Array | undefined {
    try {
      return this.codec.encode(withSequence(message, sequence));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${this.id} dropped "${message.type}": ${reason}`);
      emitDiagnostic(this.diagnostics, "codec.error", this.id, {
        kind: "encode",
        type: message.type,
        message: reason,
      });
      return undefined;
    }
  }

  private whenIdle(timeoutMs: number): Promise<boolean> {
    if (this.queue.length === 0 && !this.pumping) {
      return Promise.resolve(true);
    }
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        this.idleWaiters = this.idleWaiters.filter((waiter) => waiter !== onIdle);
        resolve(false);
      }, timeoutMs);
      const onIdle = (): void => {
        clearTimeout(timer);
        resolve(true);
      };
      this.idleWaiters.push(onIdle);
    });
  }

  private notifyIdle(): void {
    if (this.pumping) return;
    for (const waiter of this.idleWaiters.splice(0)) {
      waiter();
    }
  }

  // -------------------------------------------------------------------------
  // Inbound
  // -------------------------------------------------------------------------

  private receive(chunk: Uint8Array): void {
    for (const event of this.decoder.push(chunk)) {
      if (!event.ok) {
        this.logger.warn(`${this.id} sent an undecodable frame: ${event.error.message}`);
        emitDiagnostic(this.diagnostics, "codec.error", this.id, {
          kind: event.error.kind,
          message: event.error.message,
        });
        continue;
      }

      const sequence = event.message.sequence;
      if (this.lastInboundSequence !== undefined) {
        const expected = (this.lastInboundSequence + 1) >>> 0;
        if (sequence !== expected) {
          emitDiagnostic(this.diagnostics, "sequence.gap", this.id, {
            expected,
            received: sequence,
          });
        }
      }
      this.lastInboundSequence = sequence;
      this.onMessage(this, event.message);
    }
  }

  // -------------------------------------------------------------------------
  // Readiness
  // -------------------------------------------------------------------------

  /** Resolves with the id once the instance is ready. */
  whenReady(): Promise<string> {
    if (this.machine.state === "ready") {
      return Promise.resolve(this.id);
    }
    return new Promise<string>((resolve, reject) => {
      this.readyWaiters.push({ resolve, reject });
    });
  }

  resolveReady(): void {
    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.resolve(this.id);
    }
  }

  rejectReady(error: Error): void {
    for (const waiter of this.readyWaiters.splice(0)) {
      waiter.reject(error);
    }
  }
}
