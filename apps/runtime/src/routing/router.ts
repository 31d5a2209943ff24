/**
 * Message router.
 *
 * Resolves the destinations of each inbound or produced message, runs the
 * type's handler against coordination state, and hands deliveries to the
 * update scheduler. Runs on the control loop only.
 */

import { PayloadDecodeError } from "../protocol/binary.js";
import type { MessageCatalog } from "../protocol/catalog.js";
import type { SurfaceRole } from "../protocol/roles.js";
import type { Message } from "../protocol/types.js";
import type { CoordinationState } from "../coordination/state.js";
import type { DeliveryOutcome, UpdateScheduler } from "../coordination/updates.js";
import { emitDiagnostic, type DiagnosticSink } from "../diagnostics/events.js";
import type { Logger } from "../diagnostics/logger.js";
import type { SurfaceHandle } from "../surfaces/handle.js";
import type { RoutingTable } from "./table.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Lookup of surface instances, owned by the supervisor. */
export interface SurfaceDirectory {
  get(surfaceId: string): SurfaceHandle | undefined;
  /** Live instances (requested, starting or ready), optionally of one role. */
  live(role?: SurfaceRole): SurfaceHandle[];
}

export interface HandlerContext {
  readonly sourceId: string;
  /** The sending surface; `undefined` for producers and the supervisor itself. */
  readonly source: SurfaceHandle | undefined;
  readonly state: CoordinationState;
}

/** `"consume"` stops routing after the handler; anything else forwards. */
export type HandlerOutcome = "forward" | "consume";

export type MessageHandler = (message: Message, context: HandlerContext) => HandlerOutcome | void;

export interface Delivery {
  readonly surfaceId: string;
  readonly outcome: DeliveryOutcome;
}

export interface DispatchReport {
  readonly deliveries: readonly Delivery[];
  readonly consumed: boolean;
  readonly unroutable: boolean;
}

export class DuplicateHandlerError extends Error {
  constructor(public readonly messageType: string) {
    super(`A handler is already registered for "${messageType}"`);
    this.name = "DuplicateHandlerError";
  }
}

/** Source id used for messages the supervisor originates. */
export const SUPERVISOR_SOURCE = "supervisor";

const CONSUMED: DispatchReport = Object.freeze({ deliveries: [], consumed: true, unroutable: false });
const UNROUTABLE: DispatchReport = Object.freeze({
  deliveries: [],
  consumed: false,
  unroutable: true,
});

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export class Router {
  private readonly handlers = new Map<string, MessageHandler>();

  constructor(
    private readonly table: RoutingTable,
    private readonly catalog: MessageCatalog,
    private readonly directory: SurfaceDirectory,
    private readonly scheduler: UpdateScheduler,
    private readonly state: CoordinationState,
    private readonly diagnostics: DiagnosticSink,
    private readonly logger: Logger,
  ) {}

  /**
   * Register the handler for `type`. One handler per type.
   *
   * @returns A function that removes the handler.
   * @throws {DuplicateHandlerError} if `type` already has a handler.
   */
  on(type: string, handler: MessageHandler): () => void {
    if (this.handlers.has(type)) {
      throw new DuplicateHandlerError(type);
    }
    this.handlers.set(type, handler);
    return () => {
      if (this.handlers.get(type) === handler) this.handlers.delete(type);
    };
  }

  /**
   * Route `message` from `sourceId` (a surface, a producer or the
   * supervisor). The source surface never receives its own message.
   */
  dispatch(sourceId: string, message: Message): DispatchReport {
    const handler = this.handlers.get(message.type);
    const destinations =
      message.targetRole !== null ? [message.targetRole] : this.table.destinations(message.type);

    if (handler === undefined && destinations === undefined) {
      this.logger.warn(`No route for "${message.type}" from ${sourceId}`);
      emitDiagnostic(this.diagnostics, "route.unroutable", sourceId, { type: message.type });
      return UNROUTABLE;
    }

    const delivers = destinations !== undefined && destinations.length > 0;
    if (delivers && !this.canDeliver(sourceId, message)) {
      return UNROUTABLE;
    }

    if (handler !== undefined && this.runHandler(handler, sourceId, message) === "consume") {
      return CONSUMED;
    }

    const deliveries: Delivery[] = [];
    for (const role of destinations ?? []) {
      for (const target of this.directory.live(role)) {
        if (target.id === sourceId) continue;
        deliveries.push({ surfaceId: target.id, outcome: this.deliverTo(target, message) });
      }
    }
    return { deliveries, consumed: false, unroutable: false };
  }

  /**
   * Deliver `message` to one specific instance, bypassing the table.
   * Addressing a crashed instance awaiting replacement is reported, not delivered.
   */
  sendTo(surfaceId: string, message: Message): DeliveryOutcome | undefined {
    const target = this.directory.get(surfaceId);
    if (target === undefined) {
      this.logger.warn(`Dropped "${message.type}" for unknown surface ${surfaceId}`);
      return undefined;
    }
    if (!this.canDeliver(surfaceId, message)) {
      return undefined;
    }
    if (target.state === "terminated") {
      emitDiagnostic(this.diagnostics, "surface.addressed_terminated", surfaceId, {
        role: target.role,
        type: message.type,
      });
      return undefined;
    }
    if (!target.isLive) {
      this.logger.debug(`Dropped "${message.type}" for ${target.state} surface ${surfaceId}`);
      return undefined;
    }
    return this.deliverTo(target, message);
  }

  /**
   * Run the handler registered for the message's type, if any, so state
   * stays current for messages that bypass {@link dispatch}.
   */
  applyHandler(sourceId: string, message: Message): HandlerOutcome {
    const handler = this.handlers.get(message.type);
    if (handler === undefined) return "forward";
    return this.runHandler(handler, sourceId, message) === "consume" ? "consume" : "forward";
  }

  /**
   * True if surfaces can be sent `message`. Types missing from the catalog
   * have no wire form; they are reported as unroutable.
   */
  canDeliver(sourceId: string, message: Message): boolean {
    if (this.catalog.has(message.type)) return true;
    this.logger.warn(`Cannot deliver "${message.type}" from ${sourceId}: not in the catalog`);
    emitDiagnostic(this.diagnostics, "route.unroutable", sourceId, {
      type: message.type,
      reason: "unknown_type",
    });
    return false;
  }

  /** Deliver through the update policy, reporting a full queue. */
  deliverTo(target: SurfaceHandle, message: Message): DeliveryOutcome {
    const outcome = this.scheduler.deliver(target, message);
    if (outcome.status === "rejected" && outcome.error.kind === "backpressure") {
      this.logger.warn(outcome.error.message);
      emitDiagnostic(this.diagnostics, "send.backpressure", target.id, {
        role: target.role,
        type: message.type,
      });
    }
    return outcome;
  }

  private runHandler(
    handler: MessageHandler,
    sourceId: string,
    message: Message,
  ): HandlerOutcome | void {
    const context: HandlerContext = {
      sourceId,
      source: this.directory.get(sourceId),
      state: this.state,
    };
    try {
      return handler(message, context);
    } catch (error) {
      if (!(error instanceof PayloadDecodeError)) throw error;
      this.logger.warn(`Malformed "${message.type}" payload from ${sourceId}: ${error.message}`);
      emitDiagnostic(this.diagnostics, "codec.error", sourceId, {
        kind: "payload",
        type: message.type,
        message: error.message,
      });
      return "consume";
    }
  }
}
