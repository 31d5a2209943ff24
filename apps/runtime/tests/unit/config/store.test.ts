import { describe, expect, it, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  InMemorySettingsStore,
  isMissingFile,
  JsonSettingsStore,
  writeFileAtomic,
} from "../../../src/config/store.js";
import { SETTINGS_SCHEMA } from "../../../src/config/schema.js";

let tempDir: string;
let filePath: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "settings-store-"));
  filePath = join(tempDir, "settings.json");
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

async function readJson(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, "utf-8"));
}

describe("JsonSettingsStore", () => {
  it("returns empty object when file is missing", async () => {
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    const data = await store.load();
    expect(data).toEqual({});
  });

  it("round-trips known settings through save/load", async () => {
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    await store.save({ theme: "dark", "supervisor.spawn_retry_budget": 5 });
    const loaded = await store.load();
    expect(loaded["theme"]).toBe("dark");
    expect(loaded["supervisor.spawn_retry_budget"]).toBe(5);
  });

  it("returns empty on corrupted JSON", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await writeFile(filePath, "not json {{{", "utf-8");
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    expect(await store.load()).toEqual({});
    expect(warn).toHaveBeenCalledWith(`[settings] Corrupted JSON in ${filePath}, returning empty.`);
  });

  it("returns empty when the file holds something other than an object", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    await writeFile(filePath, "[1, 2, 3]", "utf-8");
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    expect(await store.load()).toEqual({});
  });

  it("preserves unknown keys through save/load", async () => {
    await writeFile(filePath, JSON.stringify({ theme: "dark", "future.setting": 42 }), "utf-8");
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    const loaded = await store.load();
    // Unknown keys stay out of the loaded values but survive a save.
    expect(loaded["future.setting"]).toBeUndefined();
    await store.save(loaded);
    expect(await readJson(filePath)).toEqual({ theme: "dark", "future.setting": 42 });
  });

  it("reports unknown keys via getUnknownKeys()", async () => {
    await writeFile(
      filePath,
      JSON.stringify({ "future.a": 1, "future.b": 2, theme: "dark" }),
      "utf-8",
    );
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    await store.load();
    expect(store.getUnknownKeys().sort()).toEqual(["future.a", "future.b"]);
  });

  it("watch returns unsubscribe function", async () => {
    await writeFile(filePath, "{}", "utf-8");
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    const unsub = store.watch(() => undefined);
    expect(typeof unsub).toBe("function");
    unsub();
  });

  it("does not watch a file that does not exist yet", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    const unsub = store.watch(() => undefined);
    expect(warn).toHaveBeenCalledTimes(1);
    unsub();
  });

  it("re-creates file on save after deletion", async () => {
    const store = new JsonSettingsStore(filePath, SETTINGS_SCHEMA);
    await store.save({ theme: "light" });
    await rm(filePath);
    await store.save({ theme: "dark" });
    expect(await readJson(filePath)).toEqual({ theme: "dark" });
  });
});

describe("writeFileAtomic", () => {
  it("creates missing directories", async () => {
    const nested = join(tempDir, "a", "b", "file.txt");
    await writeFileAtomic(nested, "hello");
    expect(await readFile(nested, "utf-8")).toBe("hello");
  });
});

describe("isMissingFile", () => {
  it("recognizes ENOENT only", async () => {
    const missing: unknown = await readFile(join(tempDir, "nope")).catch((error: unknown) => error);
    expect(isMissingFile(missing)).toBe(true);
    expect(isMissingFile(new Error("other"))).toBe(false);
    expect(isMissingFile("ENOENT")).toBe(false);
  });
});

describe("InMemorySettingsStore", () => {
  it("keeps a copy of what was saved", async () => {
    const store = new InMemorySettingsStore({ theme: "dark" });
    const values = { theme: "light" };
    await store.save(values);
    values.theme = "dark";
    expect(await store.load()).toEqual({ theme: "light" });
  });
});
