/**
 * Coordination state shared by the router, the update scheduler and the
 * resync builder. Only ever touched from the supervisor's control loop.
 */

import type { Breakpoint, Geometry } from "../protocol/payloads.js";
import type { SurfaceRole } from "../protocol/roles.js";
import { samePayload } from "../protocol/types.js";

export const DEFAULT_THEME = "system";

interface LastSentEntry {
  payload: Uint8Array;
  /** Instances of the role that have been sent exactly this payload. */
  surfaceIds: Set<string>;
}

function sentKey(role: SurfaceRole, type: string): string {
  return `${role}|${type}`;
}

export class CoordinationState {
  private readonly active = new Map<SurfaceRole, string[]>();
  private readonly lastSent = new Map<string, LastSentEntry>();
  private readonly batches = new Map<string, Map<string, Uint8Array[]>>();
  private readonly breakpointLines = new Map<string, Set<number>>();
  private readonly geometries = new Map<string, Geometry>();
  private _session: string | null = null;
  private _theme: string;

  constructor(theme: string = DEFAULT_THEME) {
    this._theme = theme;
  }

  // -------------------------------------------------------------------------
  // Active surfaces
  // -------------------------------------------------------------------------

  addActive(role: SurfaceRole, surfaceId: string): void {
    const ids = this.active.get(role) ?? [];
    if (!ids.includes(surfaceId)) ids.push(surfaceId);
    this.active.set(role, ids);
  }

  removeActive(role: SurfaceRole, surfaceId: string): void {
    const ids = this.active.get(role);
    if (ids === undefined) return;
    const remaining = ids.filter((id) => id !== surfaceId);
    if (remaining.length === 0) {
      this.active.delete(role);
    } else {
      this.active.set(role, remaining);
    }
    this.forgetSurface(surfaceId);
  }

  activeIds(role: SurfaceRole): readonly string[] {
    return this.active.get(role) ?? [];
  }

  hasActive(role: SurfaceRole): boolean {
    return this.active.has(role);
  }

  // -------------------------------------------------------------------------
  // Last-sent payloads
  // -------------------------------------------------------------------------

  recordSent(role: SurfaceRole, type: string, payload: Uint8Array, surfaceId: string): void {
    const key = sentKey(role, type);
    const entry = this.lastSent.get(key);
    if (entry !== undefined && samePayload(entry.payload, payload)) {
      entry.surfaceIds.add(surfaceId);
      return;
    }
    this.lastSent.set(key, { payload, surfaceIds: new Set([surfaceId]) });
  }

  lastSentPayload(role: SurfaceRole, type: string): Uint8Array | undefined {
    return this.lastSent.get(sentKey(role, type))?.payload;
  }

  /** True if `surfaceId` was last sent exactly `payload` for `type`. */
  wasSent(role: SurfaceRole, type: string, payload: Uint8Array, surfaceId: string): boolean {
    const entry = this.lastSent.get(sentKey(role, type));
    return (
      entry !== undefined && entry.surfaceIds.has(surfaceId) && samePayload(entry.payload, payload)
    );
  }

  /** Last payload per message type sent to `role`, sorted by type. */
  lastSentFor(role: SurfaceRole): Array<[string, Uint8Array]> {
    const prefix = `${role}|`;
    const entries: Array<[string, Uint8Array]> = [];
    for (const [key, entry] of this.lastSent) {
      if (key.startsWith(prefix)) {
        entries.push([key.slice(prefix.length), entry.payload]);
      }
    }
    return entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  }

  // -------------------------------------------------------------------------
  // Pending batches
  // -------------------------------------------------------------------------

  /** Append a batch item; returns the pending count for (surface, type). */
  appendBatchItem(surfaceId: string, type: string, item: Uint8Array): number {
    let byType = this.batches.get(surfaceId);
    if (byType === undefined) {
      byType = new Map();
      this.batches.set(surfaceId, byType);
    }
    const items = byType.get(type) ?? [];
    items.push(item);
    byType.set(type, items);
    return items.length;
  }

  /** Remove and return the pending items for (surface, type). */
  takeBatch(surfaceId: string, type: string): Uint8Array[] {
    const byType = this.batches.get(surfaceId);
    const items = byType?.get(type) ?? [];
    byType?.delete(type);
    if (byType !== undefined && byType.size === 0) {
      this.batches.delete(surfaceId);
    }
    return items;
  }

  pendingBatchTypes(surfaceId: string): string[] {
    return [...(this.batches.get(surfaceId)?.keys() ?? [])];
  }

  /** Drop every pending batch for the surface; returns the number of items dropped. */
  dropBatches(surfaceId: string): number {
    const byType = this.batches.get(surfaceId);
    if (byType === undefined) return 0;
    let dropped = 0;
    for (const items of byType.values()) dropped += items.length;
    this.batches.delete(surfaceId);
    return dropped;
  }

  // -------------------------------------------------------------------------
  // Debug state
  // -------------------------------------------------------------------------

  /** Returns false if the breakpoint was already set. */
  addBreakpoint(breakpoint: Breakpoint): boolean {
    const lines = this.breakpointLines.get(breakpoint.file) ?? new Set<number>();
    if (lines.has(breakpoint.line)) return false;
    lines.add(breakpoint.line);
    this.breakpointLines.set(breakpoint.file, lines);
    return true;
  }

  /** Returns false if the breakpoint was not set. */
  removeBreakpoint(breakpoint: Breakpoint): boolean {
    const lines = this.breakpointLines.get(breakpoint.file);
    if (lines === undefined || !lines.delete(breakpoint.line)) return false;
    if (lines.size === 0) this.breakpointLines.delete(breakpoint.file);
    return true;
  }

  /** Every breakpoint, sorted by file then line. */
  breakpoints(): Breakpoint[] {
    const files = [...this.breakpointLines.keys()].sort();
    const out: Breakpoint[] = [];
    for (const file of files) {
      const lines = [...(this.breakpointLines.get(file) ?? [])].sort((a, b) => a - b);
      for (const line of lines) out.push({ file, line });
    }
    return out;
  }

  get session(): string | null {
    return this._session;
  }

  set session(sessionId: string | null) {
    this._session = sessionId;
  }

  get theme(): string {
    return this._theme;
  }

  set theme(theme: string) {
    this._theme = theme;
  }

  // -------------------------------------------------------------------------
  // Layout
  // -------------------------------------------------------------------------

  setGeometry(layoutKey: string, geometry: Geometry): void {
    this.geometries.set(layoutKey, geometry);
  }

  geometry(layoutKey: string): Geometry | undefined {
    return this.geometries.get(layoutKey);
  }

  private forgetSurface(surfaceId: string): void {
    this.batches.delete(surfaceId);
    for (const entry of this.lastSent.values()) {
      entry.surfaceIds.delete(surfaceId);
    }
  }
}
