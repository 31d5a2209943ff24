/**
 * Built-in handlers: keep coordination state current as messages pass
 * through the router, so any secondary can be resynced after a crash.
 */

import { MessageTypes } from "../protocol/catalog.js";
import { breakpointCodec, geometryCodec, textCodec } from "../protocol/payloads.js";
import type { MessageHandler, Router } from "../routing/router.js";

const onBreakpointAdded: MessageHandler = (message, { state }) => {
  state.addBreakpoint(breakpointCodec.decode(message.payload));
};

const onBreakpointRemoved: MessageHandler = (message, { state }) => {
  state.removeBreakpoint(breakpointCodec.decode(message.payload));
};

const onSessionStarted: MessageHandler = (message, { state }) => {
  state.session = textCodec.decode(message.payload);
};

const onSessionEnded: MessageHandler = (_message, { state }) => {
  state.session = null;
};

const onThemeChanged: MessageHandler = (message, { state }) => {
  state.theme = textCodec.decode(message.payload);
};

/** Geometry is supervisor-only: recorded for the layout, never forwarded. */
const onGeometry: MessageHandler = (message, { source, state }) => {
  const geometry = geometryCodec.decode(message.payload);
  if (source !== undefined) {
    source.geometry = geometry;
    source.visible = geometry.visible;
    state.setGeometry(source.layoutKey, geometry);
  }
  return "consume";
};

export function registerCoordinationHandlers(router: Router): void {
  router.on(MessageTypes.BreakpointAdded, onBreakpointAdded);
  router.on(MessageTypes.BreakpointRemoved, onBreakpointRemoved);
  router.on(MessageTypes.SessionStarted, onSessionStarted);
  router.on(MessageTypes.SessionEnded, onSessionEnded);
  router.on(MessageTypes.ThemeChanged, onThemeChanged);
  router.on(MessageTypes.SurfaceGeometry, onGeometry);
}
