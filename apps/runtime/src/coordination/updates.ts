/**
 * Selective and batched update policy.
 *
 * Replaceable types skip a send when the destination was already sent the
 * same payload and nothing of that type is still queued, and otherwise
 * coalesce with a queued message of the same type. High-frequency types
 * collect per (surface, type) and go out as one `core.batch`.
 */

import { MessageTypes, type MessageCatalog } from "../protocol/catalog.js";
import type { SendError, SendResult } from "../protocol/errors.js";
import { batchCodec } from "../protocol/payloads.js";
import type { SurfaceRole } from "../protocol/roles.js";
import { createMessage, type Message } from "../protocol/types.js";
import type { CoordinationState } from "./state.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** What the scheduler needs from a destination. Implemented by SurfaceHandle. */
export interface UpdateTarget {
  readonly id: string;
  readonly role: SurfaceRole;
  send(message: Message): SendResult;
  sendReplacing(message: Message): SendResult;
  hasPending(type: string): boolean;
}

export type DeliveryOutcome =
  | { readonly status: "queued" | "suppressed" | "batched" }
  | { readonly status: "rejected"; readonly error: SendError };

export interface UpdateSchedulerOptions {
  flushIntervalMs: number;
  batchMaxItems: number;
  /** Runs flush tasks; timers must not mutate state outside the control loop. */
  post: (task: () => void) => void;
  /** Called when a flushed batch cannot be queued. */
  onFlushRejected?: ((target: UpdateTarget, type: string, error: SendError) => void) | undefined;
}

const QUEUED: DeliveryOutcome = Object.freeze({ status: "queued" as const });
const SUPPRESSED: DeliveryOutcome = Object.freeze({ status: "suppressed" as const });
const BATCHED: DeliveryOutcome = Object.freeze({ status: "batched" as const });

function outcome(result: SendResult): DeliveryOutcome {
  return result.ok ? QUEUED : { status: "rejected", error: result.error };
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export class UpdateScheduler {
  private readonly timers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly targets = new Map<string, UpdateTarget>();

  constructor(
    private readonly catalog: MessageCatalog,
    private readonly state: CoordinationState,
    private readonly options: UpdateSchedulerOptions,
  ) {}

  /** Deliver `message` to `target` according to its type's policy. */
  deliver(target: UpdateTarget, message: Message): DeliveryOutcome {
    switch (this.catalog.policyOf(message.type)) {
      case "replaceable":
        return this.deliverReplaceable(target, message);
      case "high-frequency":
        return this.deliverHighFrequency(target, message);
      case "normal":
        return outcome(target.send(message));
    }
  }

  /** Flush every pending batch of `surfaceId` now. */
  flush(surfaceId: string): void {
    const target = this.targets.get(surfaceId);
    this.clearTimer(surfaceId);
    if (target === undefined) return;
    for (const type of this.state.pendingBatchTypes(surfaceId)) {
      this.flushType(target, type);
    }
  }

  /** Drop pending batches of `surfaceId`; returns the number of items dropped. */
  cancel(surfaceId: string): number {
    this.clearTimer(surfaceId);
    this.targets.delete(surfaceId);
    return this.state.dropBatches(surfaceId);
  }

  /** Surfaces with a flush timer armed. */
  get scheduled(): number {
    return this.timers.size;
  }

  private deliverReplaceable(target: UpdateTarget, message: Message): DeliveryOutcome {
    if (
      this.state.wasSent(target.role, message.type, message.payload, target.id) &&
      !target.hasPending(message.type)
    ) {
      return SUPPRESSED;
    }
    const result = target.sendReplacing(message);
    if (result.ok) {
      this.state.recordSent(target.role, message.type, message.payload, target.id);
    }
    return outcome(result);
  }

  private deliverHighFrequency(target: UpdateTarget, message: Message): DeliveryOutcome {
    this.targets.set(target.id, target);
    const count = this.state.appendBatchItem(target.id, message.type, message.payload);
    if (count >= this.options.batchMaxItems) {
      this.flushType(target, message.type);
      if (this.state.pendingBatchTypes(target.id).length === 0) {
        this.clearTimer(target.id);
      }
      return BATCHED;
    }
    if (!this.timers.has(target.id)) {
      const timer = setTimeout(() => {
        this.options.post(() => {
          this.timers.delete(target.id);
          this.flush(target.id);
        });
      }, this.options.flushIntervalMs);
      this.timers.set(target.id, timer);
    }
    return BATCHED;
  }

  private flushType(target: UpdateTarget, type: string): void {
    const items = this.state.takeBatch(target.id, type);
    if (items.length === 0) return;
    const batch = createMessage(
      MessageTypes.Batch,
      batchCodec.encode({ type, items }),
      target.role,
    );
    const result = target.send(batch);
    if (!result.ok) {
      this.options.onFlushRejected?.(target, type, result.error);
    }
  }

  private clearTimer(surfaceId: string): void {
    const timer = this.timers.get(surfaceId);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(surfaceId);
    }
  }
}
