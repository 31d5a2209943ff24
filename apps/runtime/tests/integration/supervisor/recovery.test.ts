import { afterEach, describe, expect, it, vi } from "vitest";
import { MessageTypes } from "../../../src/protocol/catalog.js";
import {
  breakpointCodec,
  breakpointListCodec,
  textCodec,
} from "../../../src/protocol/payloads.js";
import { createMessage } from "../../../src/protocol/types.js";
import type { Supervisor } from "../../../src/supervisor/supervisor.js";
import { createTestSupervisor } from "../../helpers/fake_surfaces.js";

const FILE = "src/main.ts";

function breakpointAdded(line: number) {
  return createMessage(MessageTypes.BreakpointAdded, breakpointCodec.encode({ file: FILE, line }));
}

let running: Supervisor | undefined;

afterEach(async () => {
  await running?.shutdown("test finished");
  running = undefined;
});

describe("Supervisor: crash recovery", () => {
  it("recreates a crashed debug surface and resyncs its breakpoints", async () => {
    const { supervisor, launcher, diagnostics } = createTestSupervisor();
    running = supervisor;
    const primaryId = await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");
    const debug = launcher.byId(debugId);

    await supervisor.dispatch(primaryId, breakpointAdded(10));
    await vi.waitFor(() => expect(debug.receivedTypes()).toContain(MessageTypes.BreakpointAdded));

    debug.crash();

    await vi.waitFor(() => expect(launcher.of("debug")).toHaveLength(2));
    const fresh = launcher.latest("debug");
    await vi.waitFor(() => expect(fresh.receivedTypes()).toContain(MessageTypes.ResyncEnd));

    expect(fresh.id).not.toBe(debugId);
    expect(supervisor.surface(fresh.id)?.state).toBe("ready");
    expect(supervisor.surface(fresh.id)?.replaces).toBe(debugId);
    expect(supervisor.surface(debugId)).toBeUndefined();
    expect(fresh.receivedTypes()).toEqual([
      MessageTypes.ResyncBegin,
      MessageTypes.ThemeChanged,
      MessageTypes.BreakpointsSet,
      MessageTypes.ResyncEnd,
    ]);
    const set = fresh.received[2];
    expect(set && breakpointListCodec.decode(set.payload)).toEqual([{ file: FILE, line: 10 }]);
    expect(diagnostics.ofTopic("surface.unexpected_termination")).toHaveLength(1);
  });

  it("treats a non-zero exit of a ready surface as a crash", async () => {
    const { supervisor, launcher, diagnostics } = createTestSupervisor();
    running = supervisor;
    const primaryId = await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");
    await supervisor.dispatch(primaryId, breakpointAdded(7));

    launcher.byId(debugId).exitWith(1);

    await vi.waitFor(() => expect(launcher.of("debug")).toHaveLength(2));
    const fresh = launcher.latest("debug");
    await vi.waitFor(() => expect(fresh.receivedTypes()).toContain(MessageTypes.ResyncEnd));

    const terminations = diagnostics.ofTopic("surface.unexpected_termination");
    expect(terminations).toHaveLength(1);
    expect(terminations[0]?.surfaceId).toBe(debugId);
    expect(terminations[0]?.payload).toMatchObject({ role: "debug", code: 1, signal: null });
    const transitions = diagnostics
      .ofTopic("surface.state_changed")
      .filter((event) => event.surfaceId === fresh.id)
      .map((event) => [event.payload["from"], event.payload["to"]]);
    expect(transitions).toEqual([
      ["requested", "starting"],
      ["starting", "ready"],
    ]);
    expect(supervisor.surface(fresh.id)?.replaces).toBe(debugId);
    const set = fresh.received[2];
    expect(set && breakpointListCodec.decode(set.payload)).toEqual([{ file: FILE, line: 7 }]);
  });

  it("resyncs the theme most recently broadcast", async () => {
    const { supervisor, launcher } = createTestSupervisor();
    running = supervisor;
    await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");
    const debug = launcher.byId(debugId);

    await supervisor.setTheme("dark");
    await vi.waitFor(() => expect(debug.receivedTypes()).toContain(MessageTypes.ThemeChanged));
    expect(supervisor.state.theme).toBe("dark");

    debug.crash();

    await vi.waitFor(() => expect(launcher.of("debug")).toHaveLength(2));
    const fresh = launcher.latest("debug");
    await vi.waitFor(() => expect(fresh.receivedTypes()).toContain(MessageTypes.ResyncEnd));
    const theme = fresh.received[1];
    expect(theme?.type).toBe(MessageTypes.ThemeChanged);
    expect(theme && textCodec.decode(theme.payload)).toBe("dark");
  });

  it("queues messages for the role while the replacement starts", async () => {
    const { supervisor, launcher } = createTestSupervisor();
    running = supervisor;
    const primaryId = await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");
    await supervisor.dispatch(primaryId, breakpointAdded(10));

    launcher.setBehavior("debug", { autoReady: false });
    launcher.byId(debugId).crash();
    await vi.waitFor(() => expect(launcher.of("debug")).toHaveLength(2));
    const fresh = launcher.latest("debug");

    await supervisor.dispatch(primaryId, breakpointAdded(20));
    await fresh.host.ready();

    await vi.waitFor(() => expect(fresh.receivedTypes()).toContain(MessageTypes.BreakpointAdded));
    expect(fresh.receivedTypes()).toEqual([
      MessageTypes.ResyncBegin,
      MessageTypes.ThemeChanged,
      MessageTypes.BreakpointsSet,
      MessageTypes.ResyncEnd,
      MessageTypes.BreakpointAdded,
    ]);
    const set = fresh.received[2];
    expect(set && breakpointListCodec.decode(set.payload)).toEqual([
      { file: FILE, line: 10 },
      { file: FILE, line: 20 },
    ]);
    const added = fresh.received[4];
    expect(added && breakpointCodec.decode(added.payload)).toEqual({ file: FILE, line: 20 });
  });

  it("reports messages addressed to a crashed instance awaiting replacement", async () => {
    const { supervisor, launcher, diagnostics } = createTestSupervisor();
    running = supervisor;
    await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");

    launcher.setBehavior("debug", { autoReady: false });
    launcher.byId(debugId).crash();
    await vi.waitFor(() => expect(supervisor.surface(debugId)?.state).toBe("terminated"));

    const outcome = await supervisor.sendTo(debugId, breakpointAdded(5));

    expect(outcome).toBeUndefined();
    const events = diagnostics.ofTopic("surface.addressed_terminated");
    expect(events).toHaveLength(1);
    expect(events[0]?.surfaceId).toBe(debugId);
  });

  it("gives up the crashed instance when its replacement cannot start", async () => {
    const { supervisor, launcher, diagnostics } = createTestSupervisor();
    running = supervisor;
    const primaryId = await supervisor.start();
    const debugId = await supervisor.requestSurface("debug");

    launcher.setBehavior("debug", { failSpawn: true });
    launcher.byId(debugId).crash();

    await vi.waitFor(() => expect(diagnostics.ofTopic("surface.creation_failed")).toHaveLength(1));
    expect(supervisor.surface(debugId)).toBeUndefined();
    expect(supervisor.live("debug")).toEqual([]);
    await vi.waitFor(() =>
      expect(launcher.byId(primaryId).receivedTypes()).toContain(MessageTypes.Notice),
    );
  });
});
