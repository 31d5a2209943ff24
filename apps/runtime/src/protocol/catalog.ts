/**
 * Message catalog: maps namespaced message types to wire tags and update
 * policies. The codec refuses types that are not in the catalog.
 */

import type { MessagePolicy, MessageTypeDefinition } from "./types.js";

// ---------------------------------------------------------------------------
// Built-in message types
// ---------------------------------------------------------------------------

export const MessageTypes = {
  SurfaceReady: "surface.ready",
  SurfaceClose: "surface.close",
  SurfaceGeometry: "surface.geometry",
  ResyncBegin: "surface.resync_begin",
  ResyncEnd: "surface.resync_end",
  Batch: "core.batch",
  ThemeChanged: "app.theme_changed",
  Notice: "app.notice",
  BreakpointAdded: "debug.breakpoint_added",
  BreakpointRemoved: "debug.breakpoint_removed",
  BreakpointsSet: "debug.breakpoints_set",
  SessionStarted: "debug.session_started",
  SessionEnded: "debug.session_ended",
  EditorDiagnostics: "editor.diagnostics",
  EditorEdit: "editor.edit",
  GraphRender: "graph.render",
  GraphNodeSelected: "graph.node_selected",
  TerminalOutput: "terminal.output",
  TerminalInput: "terminal.input",
} as const;

export type BuiltinMessageType = (typeof MessageTypes)[keyof typeof MessageTypes];

export const BUILTIN_MESSAGE_TYPES: readonly MessageTypeDefinition[] = [
  { type: MessageTypes.SurfaceReady, tag: 1, policy: "normal" },
  { type: MessageTypes.SurfaceClose, tag: 2, policy: "normal" },
  { type: MessageTypes.SurfaceGeometry, tag: 3, policy: "replaceable" },
  { type: MessageTypes.ResyncBegin, tag: 4, policy: "normal" },
  { type: MessageTypes.ResyncEnd, tag: 5, policy: "normal" },
  { type: MessageTypes.Batch, tag: 6, policy: "normal" },
  { type: MessageTypes.ThemeChanged, tag: 7, policy: "replaceable" },
  { type: MessageTypes.Notice, tag: 8, policy: "normal" },
  { type: MessageTypes.BreakpointAdded, tag: 16, policy: "normal" },
  { type: MessageTypes.BreakpointRemoved, tag: 17, policy: "normal" },
  { type: MessageTypes.BreakpointsSet, tag: 18, policy: "replaceable" },
  { type: MessageTypes.SessionStarted, tag: 19, policy: "normal" },
  { type: MessageTypes.SessionEnded, tag: 20, policy: "normal" },
  { type: MessageTypes.EditorDiagnostics, tag: 32, policy: "replaceable" },
  { type: MessageTypes.EditorEdit, tag: 33, policy: "high-frequency" },
  { type: MessageTypes.GraphRender, tag: 48, policy: "replaceable" },
  { type: MessageTypes.GraphNodeSelected, tag: 49, policy: "normal" },
  { type: MessageTypes.TerminalOutput, tag: 64, policy: "high-frequency" },
  { type: MessageTypes.TerminalInput, tag: 65, policy: "normal" },
];

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class UnknownMessageTypeError extends Error {
  constructor(public readonly messageType: string) {
    super(`Message type "${messageType}" is not in the catalog`);
    this.name = "UnknownMessageTypeError";
  }
}

export class DuplicateMessageTypeError extends Error {
  constructor(field: "type" | "tag", value: string | number) {
    super(`Message ${field} ${JSON.stringify(value)} is already registered`);
    this.name = "DuplicateMessageTypeError";
  }
}

// ---------------------------------------------------------------------------
// Catalog
// ---------------------------------------------------------------------------

/** Type names are lowercase dotted segments: `namespace.name`. */
const TYPE_NAME_RE = /^[a-z][a-z0-9_-]*(\.[a-z][a-z0-9_-]*)+$/;

const MAX_TAG = 0xffff;

export class MessageCatalog {
  private readonly byType = new Map<string, MessageTypeDefinition>();
  private readonly byTag = new Map<number, MessageTypeDefinition>();

  constructor(definitions: readonly MessageTypeDefinition[] = []) {
    for (const def of definitions) {
      this.register(def);
    }
  }

  /**
   * Add a message type.
   *
   * @throws {DuplicateMessageTypeError} when the type or tag is taken.
   */
  register(def: MessageTypeDefinition): void {
    if (!TYPE_NAME_RE.test(def.type)) {
      throw new Error(
        `Invalid message type "${def.type}": expected dotted lowercase segments`,
      );
    }
    if (!Number.isInteger(def.tag) || def.tag <= 0 || def.tag > MAX_TAG) {
      throw new RangeError(`Message tag must be an integer in 1..${MAX_TAG}, got ${def.tag}`);
    }
    if (this.byType.has(def.type)) {
      throw new DuplicateMessageTypeError("type", def.type);
    }
    if (this.byTag.has(def.tag)) {
      throw new DuplicateMessageTypeError("tag", def.tag);
    }
    const frozen = Object.freeze({ ...def });
    this.byType.set(def.type, frozen);
    this.byTag.set(def.tag, frozen);
  }

  has(type: string): boolean {
    return this.byType.has(type);
  }

  get(type: string): MessageTypeDefinition | undefined {
    return this.byType.get(type);
  }

  getByTag(tag: number): MessageTypeDefinition | undefined {
    return this.byTag.get(tag);
  }

  /** Tag for a type; a missing type is a programming error. */
  tagOf(type: string): number {
    const def = this.byType.get(type);
    if (def === undefined) {
      throw new UnknownMessageTypeError(type);
    }
    return def.tag;
  }

  /** Update policy for a type; unknown types are treated as `normal`. */
  policyOf(type: string): MessagePolicy {
    return this.byType.get(type)?.policy ?? "normal";
  }

  list(): MessageTypeDefinition[] {
    return [...this.byType.values()];
  }
}

/** A fresh catalog holding the built-in types. */
export function createDefaultCatalog(
  extra: readonly MessageTypeDefinition[] = [],
): MessageCatalog {
  return new MessageCatalog([...BUILTIN_MESSAGE_TYPES, ...extra]);
}
