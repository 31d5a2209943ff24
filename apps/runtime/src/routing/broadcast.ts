/**
 * Broadcast bus: one message to every live surface matching a predicate.
 *
 * The type's handler runs first, as it would for a routed message, so
 * coordination state and later resyncs reflect the broadcast. Surfaces
 * still starting are live; the copy waits on their queue and is written
 * after their resync preamble.
 */

import type { Message } from "../protocol/types.js";
import type { SurfaceInfo } from "../surfaces/handle.js";
import { SUPERVISOR_SOURCE, type Router, type SurfaceDirectory } from "./router.js";

export type SurfacePredicate = (surface: SurfaceInfo) => boolean;

export const everySurface: SurfacePredicate = () => true;

export class BroadcastBus {
  constructor(
    private readonly directory: SurfaceDirectory,
    private readonly router: Router,
  ) {}

  /**
   * Deliver `message` to every matching live surface.
   *
   * @returns Ids of the surfaces that accepted it (queued, batched or
   *   already holding the same payload). Empty when the type is not in the
   *   catalog or its handler consumed it.
   */
  broadcast(
    message: Message,
    predicate: SurfacePredicate = everySurface,
    sourceId: string = SUPERVISOR_SOURCE,
  ): string[] {
    if (!this.router.canDeliver(sourceId, message)) return [];
    if (this.router.applyHandler(sourceId, message) === "consume") return [];

    const accepted: string[] = [];
    for (const target of this.directory.live()) {
      if (!predicate(target.info())) continue;
      const outcome = this.router.deliverTo(target, message);
      if (outcome.status !== "rejected") accepted.push(target.id);
    }
    return accepted;
  }
}
