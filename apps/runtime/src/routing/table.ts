/**
 * Static routing table: message type → destination roles.
 *
 * An entry with no destinations means "known, not forwarded" (e.g. input
 * consumed by the core engine). A type with neither an entry nor a handler
 * is unroutable.
 */

import { MessageTypes } from "../protocol/catalog.js";
import { ROLES, type SurfaceRole } from "../protocol/roles.js";

export type RoutingEntries = Readonly<Record<string, readonly SurfaceRole[]>>;

export const DEFAULT_ROUTES: RoutingEntries = {
  [MessageTypes.BreakpointAdded]: ["debug"],
  [MessageTypes.BreakpointRemoved]: ["debug"],
  [MessageTypes.SessionStarted]: ["primary", "debug"],
  [MessageTypes.SessionEnded]: ["primary", "debug"],
  [MessageTypes.EditorDiagnostics]: ["primary"],
  [MessageTypes.EditorEdit]: ["graph-view"],
  [MessageTypes.GraphRender]: ["graph-view"],
  [MessageTypes.GraphNodeSelected]: ["primary"],
  [MessageTypes.TerminalOutput]: ["terminal"],
  [MessageTypes.TerminalInput]: [],
  [MessageTypes.Notice]: ["primary"],
  [MessageTypes.ThemeChanged]: ROLES,
};

export class RoutingTable {
  private readonly routes = new Map<string, readonly SurfaceRole[]>();

  constructor(entries: RoutingEntries = DEFAULT_ROUTES) {
    for (const [type, roles] of Object.entries(entries)) {
      this.routes.set(type, roles);
    }
  }

  /** Destination roles for `type`, or `undefined` when the type has no entry. */
  destinations(type: string): readonly SurfaceRole[] | undefined {
    return this.routes.get(type);
  }

  /** Add or replace the entry for `type`. */
  set(type: string, roles: readonly SurfaceRole[]): void {
    this.routes.set(type, [...roles]);
  }

  delete(type: string): boolean {
    return this.routes.delete(type);
  }

  has(type: string): boolean {
    return this.routes.has(type);
  }
}
