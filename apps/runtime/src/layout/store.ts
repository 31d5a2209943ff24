import { readFile } from "node:fs/promises";
import { isMissingFile, writeFileAtomic } from "../config/store.js";
import { parseLayout, type LayoutRecord } from "./schema.js";

export interface LayoutStore {
  /** Load the persisted layout; invalid entries are skipped. */
  load(): Promise<LayoutRecord>;
  save(record: LayoutRecord): Promise<void>;
}

export class InMemoryLayoutStore implements LayoutStore {
  constructor(public record: LayoutRecord = {}) {}

  load(): Promise<LayoutRecord> {
    return Promise.resolve({ ...this.record });
  }

  save(record: LayoutRecord): Promise<void> {
    this.record = { ...record };
    return Promise.resolve();
  }
}

/** Layout persisted as a JSON file, written atomically. */
export class JsonLayoutStore implements LayoutStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<LayoutRecord> {
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
      console.warn(`[layout] Corrupted JSON in ${this.filePath}, starting with no layout.`);
      return {};
    }

    const { record, skipped } = parseLayout(json);
    if (skipped.length > 0) {
      console.warn(`[layout] Skipped invalid entries: ${skipped.join(", ")}`);
    }
    return record;
  }

  async save(record: LayoutRecord): Promise<void> {
    await writeFileAtomic(this.filePath, JSON.stringify(record, null, 2) + "\n");
  }
}
