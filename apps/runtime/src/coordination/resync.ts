/**
 * Resync preamble for a freshly created or recreated surface.
 *
 * The set is deterministic for a given coordination state and role:
 * begin marker, theme, role-specific state, the last payload of every
 * replaceable type previously sent to the role (by type name), end marker.
 * Surfaces apply it idempotently.
 */

import { MessageTypes } from "../protocol/catalog.js";
import { breakpointListCodec, textCodec } from "../protocol/payloads.js";
import type { SurfaceRole } from "../protocol/roles.js";
import { createMessage, type Message } from "../protocol/types.js";
import type { CoordinationState } from "./state.js";

export function buildResync(role: SurfaceRole, state: CoordinationState): Message[] {
  const body: Message[] = [
    createMessage(MessageTypes.ThemeChanged, textCodec.encode(state.theme), role),
  ];

  if (role === "debug" || role === "primary") {
    body.push(
      createMessage(
        MessageTypes.BreakpointsSet,
        breakpointListCodec.encode(state.breakpoints()),
        role,
      ),
    );
    if (state.session !== null) {
      body.push(createMessage(MessageTypes.SessionStarted, textCodec.encode(state.session), role));
    }
  }

  const covered = new Set(body.map((message) => message.type));
  for (const [type, payload] of state.lastSentFor(role)) {
    if (!covered.has(type)) {
      body.push(createMessage(type, payload, role));
    }
  }

  return [
    createMessage(MessageTypes.ResyncBegin, textCodec.encode(role), role),
    ...body,
    createMessage(MessageTypes.ResyncEnd, textCodec.encode(role), role),
  ];
}
