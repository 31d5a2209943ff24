import { watch as fsWatch, type FSWatcher } from "node:fs";
import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { SettingsSchema, SettingsStore } from "./types.js";

const settingsFileSchema = z.record(z.string(), z.unknown());

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Write `contents` to `filePath` atomically: temp file in the same
 * directory, then rename over the target.
 */
export async function writeFileAtomic(filePath: string, contents: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmp = join(dir, `.${process.pid}.${Date.now()}.tmp`);
  await writeFile(tmp, contents, "utf-8");
  await rename(tmp, filePath);
}

/**
 * JSON-file-backed settings store with in-memory unknown-key preservation
 * and external-edit detection via fs.watch.
 */
export class JsonSettingsStore implements SettingsStore {
  private readonly filePath: string;
  private readonly schema: SettingsSchema;
  private unknownKeys: Record<string, unknown> = {};
  private lastWriteTs = 0;
  private static readonly DEBOUNCE_MS = 200;

  constructor(filePath: string, schema: SettingsSchema) {
    this.filePath = filePath;
    this.schema = schema;
  }

  // ── SettingsStore interface ───────────────────────────────────────────

  async load(): Promise<Record<string, unknown>> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch {
      console.warn(`[settings] Corrupted JSON in ${this.filePath}, returning empty.`);
      return {};
    }

    const parsed = settingsFileSchema.safeParse(json);
    if (!parsed.success) {
      console.warn(`[settings] ${this.filePath} is not a JSON object, returning empty.`);
      return {};
    }

    // Separate known vs unknown keys.
    const known: Record<string, unknown> = {};
    this.unknownKeys = {};

    for (const [k, v] of Object.entries(parsed.data)) {
      if (k in this.schema) {
        known[k] = v;
      } else {
        this.unknownKeys[k] = v;
      }
    }

    return known;
  }

  async save(values: Record<string, unknown>): Promise<void> {
    const merged: Record<string, unknown> = { ...values, ...this.unknownKeys };
    await writeFileAtomic(this.filePath, JSON.stringify(merged, null, 2) + "\n");
    this.lastWriteTs = Date.now();
  }

  watch(callback: () => void): () => void {
    let debounceTimer: ReturnType<typeof setTimeout> | null = null;
    let watcher: FSWatcher;

    try {
      watcher = fsWatch(this.filePath, () => {
        // Ignore events triggered by our own writes.
        if (Date.now() - this.lastWriteTs < JsonSettingsStore.DEBOUNCE_MS) {
          return;
        }
        if (debounceTimer) clearTimeout(debounceTimer);
        debounceTimer = setTimeout(callback, JsonSettingsStore.DEBOUNCE_MS);
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      console.warn(`[settings] Not watching ${this.filePath}: ${reason}`);
      return () => undefined;
    }

    return () => {
      if (debounceTimer) clearTimeout(debounceTimer);
      watcher.close();
    };
  }

  // ── Unknown key helpers ───────────────────────────────────────────────

  /** Return keys present in the file but absent from the schema. */
  getUnknownKeys(): string[] {
    return Object.keys(this.unknownKeys);
  }
}

/** Settings held in memory only; `watch` never fires. */
export class InMemorySettingsStore implements SettingsStore {
  constructor(private values: Record<string, unknown> = {}) {}

  load(): Promise<Record<string, unknown>> {
    return Promise.resolve({ ...this.values });
  }

  save(values: Record<string, unknown>): Promise<void> {
    this.values = { ...values };
    return Promise.resolve();
  }

  watch(_callback: () => void): () => void {
    return () => undefined;
  }
}
