import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { MemoryLogger } from "../../../src/diagnostics/logger.js";
import { InMemorySettingsStore, JsonSettingsStore } from "../../../src/config/store.js";
import { SETTINGS_SCHEMA } from "../../../src/config/schema.js";
import { InvalidSettingError, SettingsManager } from "../../../src/config/settings.js";
import { resolveSupervisorConfig } from "../../../src/config/supervisor.js";
import type { SettingChangeEvent, SettingsStore } from "../../../src/config/types.js";

let tempDir: string;
let filePath: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "settings-mgr-"));
  filePath = join(tempDir, "settings.json");
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

function createManager(logger = new MemoryLogger("settings")) {
  const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
  return new SettingsManager(SETTINGS_SCHEMA, store, logger);
}

describe("SettingsManager: init and defaults", () => {
  it("returns defaults on fresh init", async () => {
    const mgr = createManager();
    await mgr.init();
    expect(mgr.get("theme")).toBe("system");
    expect(mgr.get("supervisor.handshake_timeout_ms")).toBe(5000);
    expect(mgr.get("surface.outbound_queue_capacity")).toBe(1024);
    mgr.dispose();
  });

  it("ignores persisted values that fail validation", async () => {
    const logger = new MemoryLogger("settings");
    const store = new InMemorySettingsStore({ theme: "purple", "updates.batch_max_items": 32 });
    const mgr = new SettingsManager(SETTINGS_SCHEMA, store, logger);
    await mgr.init();
    expect(mgr.get("theme")).toBe("system");
    expect(mgr.get("updates.batch_max_items")).toBe(32);
    expect(logger.messages("warn")).toEqual([
      "Ignoring persisted value: theme: expected one of [dark, light, system]",
    ]);
  });
});

describe("SettingsManager: set / validation", () => {
  it("sets a valid value and returns change event", async () => {
    const mgr = createManager();
    await mgr.init();
    const evt = await mgr.set("theme", "dark");
    expect(evt).toEqual({ key: "theme", oldValue: "system", newValue: "dark", reloadPolicy: "hot" });
    expect(mgr.get("theme")).toBe("dark");
    mgr.dispose();
  });

  it("rejects invalid value", async () => {
    const mgr = createManager();
    await mgr.init();
    await expect(mgr.set("theme", "purple")).rejects.toBeInstanceOf(InvalidSettingError);
    expect(mgr.get("theme")).toBe("system");
    mgr.dispose();
  });

  it("rejects null value", async () => {
    const mgr = createManager();
    await mgr.init();
    await expect(mgr.set("supervisor.kill_grace_ms", null)).rejects.toThrow(
      "supervisor.kill_grace_ms: value must not be null or undefined",
    );
    mgr.dispose();
  });

  it("rejects out-of-range number", async () => {
    const mgr = createManager();
    await mgr.init();
    await expect(mgr.set("supervisor.handshake_timeout_ms", 10)).rejects.toThrow();
    mgr.dispose();
  });

  it("allows setting unknown key (forward-compat)", async () => {
    const mgr = createManager();
    await mgr.init();
    const evt = await mgr.set("future.key", "value");
    expect(evt.newValue).toBe("value");
    mgr.dispose();
  });
});

describe("SettingsManager: persistence", () => {
  it("persists settings across restart", async () => {
    const mgr1 = createManager();
    await mgr1.init();
    await mgr1.set("theme", "dark");
    mgr1.dispose();

    const mgr2 = createManager();
    await mgr2.init();
    expect(mgr2.get("theme")).toBe("dark");
    mgr2.dispose();
  });
});

describe("SettingsManager: reset", () => {
  it("resets to default", async () => {
    const mgr = createManager();
    await mgr.init();
    await mgr.set("theme", "dark");
    const evt = await mgr.reset("theme");
    expect(evt.newValue).toBe("system");
    expect(mgr.get("theme")).toBe("system");
    mgr.dispose();
  });
});

describe("SettingsManager: change events", () => {
  it("direct subscriber receives all change events", async () => {
    const events: SettingChangeEvent[] = [];
    const mgr = createManager();
    await mgr.init();
    mgr.onSettingChanged((e) => events.push(e));
    await mgr.set("theme", "dark");
    await mgr.set("supervisor.spawn_retry_budget", 5);
    expect(events.map((e) => [e.key, e.reloadPolicy])).toEqual([
      ["theme", "hot"],
      ["supervisor.spawn_retry_budget", "restart"],
    ]);
    mgr.dispose();
  });

  it("stops notifying after unsubscribe", async () => {
    const events: SettingChangeEvent[] = [];
    const mgr = createManager();
    await mgr.init();
    const off = mgr.onSettingChanged((e) => events.push(e));
    off();
    await mgr.set("theme", "dark");
    expect(events).toEqual([]);
    mgr.dispose();
  });

  it("emits changes found when the store reports an external edit", async () => {
    let notify: () => void = () => undefined;
    const backing = new InMemorySettingsStore();
    const store: SettingsStore = {
      load: () => backing.load(),
      save: (values) => backing.save(values),
      watch: (callback) => {
        notify = callback;
        return () => undefined;
      },
    };
    const mgr = new SettingsManager(SETTINGS_SCHEMA, store, new MemoryLogger());
    await mgr.init();
    const events: SettingChangeEvent[] = [];
    mgr.onSettingChanged((e) => events.push(e));

    await backing.save({ theme: "light" });
    notify();

    await vi.waitFor(() => expect(events).toHaveLength(1));
    expect(events[0]).toEqual({
      key: "theme",
      oldValue: "system",
      newValue: "light",
      reloadPolicy: "hot",
    });
    expect(mgr.get("theme")).toBe("light");
  });

  it("logs a reload that fails", async () => {
    let notify: () => void = () => undefined;
    let failing = false;
    const store: SettingsStore = {
      load: () => (failing ? Promise.reject(new Error("EACCES")) : Promise.resolve({})),
      save: () => Promise.resolve(),
      watch: (callback) => {
        notify = callback;
        return () => undefined;
      },
    };
    const logger = new MemoryLogger("settings");
    const mgr = new SettingsManager(SETTINGS_SCHEMA, store, logger);
    await mgr.init();

    failing = true;
    notify();

    await vi.waitFor(() =>
      expect(logger.messages("warn")).toEqual(["Reload after external edit failed: EACCES"]),
    );
  });
});

describe("SettingsManager: restart required", () => {
  it("isRestartRequired returns false initially", async () => {
    const mgr = createManager();
    await mgr.init();
    expect(mgr.isRestartRequired()).toBe(false);
    mgr.dispose();
  });

  it("isRestartRequired returns true after restart-required change", async () => {
    const logger = new MemoryLogger("settings");
    const mgr = createManager(logger);
    await mgr.init();
    await mgr.set("supervisor.drain_timeout_ms", 250);
    expect(mgr.isRestartRequired()).toBe(true);
    expect(mgr.getChangedRestartSettings()).toEqual(["supervisor.drain_timeout_ms"]);
    expect(logger.messages("info")).toEqual([
      "supervisor.drain_timeout_ms changed; takes effect after restart",
    ]);
    mgr.dispose();
  });
});

describe("SettingsManager: getAll", () => {
  it("returns snapshot of all settings", async () => {
    const mgr = createManager();
    await mgr.init();
    const all = mgr.getAll();
    expect(all["theme"]).toBe("system");
    expect(Object.keys(all).sort()).toEqual(Object.keys(SETTINGS_SCHEMA).sort());
    mgr.dispose();
  });
});

describe("resolveSupervisorConfig", () => {
  it("reads every supervisor setting from a snapshot", () => {
    expect(
      resolveSupervisorConfig({
        "supervisor.handshake_timeout_ms": 300,
        "supervisor.spawn_timeout_ms": 400,
        "supervisor.spawn_retry_budget": 2,
        "supervisor.drain_timeout_ms": 50,
        "supervisor.kill_grace_ms": 20,
        "surface.outbound_queue_capacity": 8,
        "updates.flush_interval_ms": 4,
        "updates.batch_max_items": 16,
      }),
    ).toEqual({
      handshakeTimeoutMs: 300,
      spawnTimeoutMs: 400,
      spawnRetryBudget: 2,
      drainTimeoutMs: 50,
      killGraceMs: 20,
      queueCapacity: 8,
      flushIntervalMs: 4,
      batchMaxItems: 16,
    });
  });

  it("falls back to defaults for invalid values", () => {
    const config = resolveSupervisorConfig({ "supervisor.spawn_retry_budget": -1 });
    expect(config.spawnRetryBudget).toBe(3);
    expect(console.warn).toHaveBeenCalledWith(
      "[settings] Ignoring invalid value for supervisor.spawn_retry_budget, using default.",
    );
  });
});
