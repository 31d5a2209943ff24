import type { Logger } from "../diagnostics/logger.js";
import { createConsoleLogger } from "../diagnostics/logger.js";
import type {
  SettingsSchema,
  SettingsStore,
  SettingChangeEvent,
} from "./types.js";
import { getAllDefaults, validateValue } from "./schema.js";

type ChangeListener = (event: SettingChangeEvent) => void;

export class InvalidSettingError extends Error {
  constructor(public readonly key: string, reason: string) {
    super(reason);
    this.name = "InvalidSettingError";
  }
}

/**
 * Settings with validation, change detection, hot-reload propagation,
 * and restart-required tracking.
 */
export class SettingsManager {
  private readonly schema: SettingsSchema;
  private readonly store: SettingsStore;
  private readonly logger: Logger;

  private cache: Record<string, unknown> = {};
  private listeners: Set<ChangeListener> = new Set();
  private changedRestartKeys: Set<string> = new Set();
  private unwatch: (() => void) | undefined;

  constructor(schema: SettingsSchema, store: SettingsStore, logger?: Logger) {
    this.schema = schema;
    this.store = store;
    this.logger = logger ?? createConsoleLogger("settings");
  }

  /** Load persisted values, fill missing keys from defaults, wire file watch. */
  async init(): Promise<void> {
    const defaults = getAllDefaults(this.schema);
    const persisted = await this.store.load();
    this.cache = { ...defaults, ...this.validOnly(persisted) };

    this.unwatch = this.store.watch(() => {
      this.handleExternalChange().catch((error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Reload after external edit failed: ${reason}`);
      });
    });
  }

  /** Get a single setting value from in-memory cache. */
  get(key: string): unknown {
    if (key in this.cache) {
      return this.cache[key];
    }
    return this.schema[key]?.default;
  }

  /**
   * Set a setting value. Validates, persists, emits events.
   *
   * @throws {InvalidSettingError} if the value fails schema validation.
   */
  async set(key: string, value: unknown): Promise<SettingChangeEvent> {
    const def = this.schema[key];

    const result = validateValue(key, value, this.schema);
    if (!result.valid) {
      throw new InvalidSettingError(key, result.reason ?? `Invalid value for ${key}`);
    }

    const oldValue: unknown = this.cache[key];
    this.cache[key] = value;
    await this.store.save(this.cache);

    const event: SettingChangeEvent = {
      key,
      oldValue,
      newValue: value,
      reloadPolicy: def?.reloadPolicy ?? "hot",
    };

    this.emitChange(event);
    return event;
  }

  /** Return full settings snapshot. */
  getAll(): Record<string, unknown> {
    return { ...this.cache };
  }

  /** Reset a key to its schema default. */
  async reset(key: string): Promise<SettingChangeEvent> {
    return this.set(key, this.schema[key]?.default);
  }

  /** Subscribe to all setting changes. Returns unsubscribe function. */
  onSettingChanged(callback: ChangeListener): () => void {
    this.listeners.add(callback);
    return () => {
      this.listeners.delete(callback);
    };
  }

  /** True if any restart-required setting has changed since startup. */
  isRestartRequired(): boolean {
    return this.changedRestartKeys.size > 0;
  }

  /** List keys of changed restart-required settings. */
  getChangedRestartSettings(): string[] {
    return [...this.changedRestartKeys];
  }

  /** Tear down file watcher. */
  dispose(): void {
    this.unwatch?.();
  }

  // ── Private helpers ───────────────────────────────────────────────────

  private validOnly(values: Record<string, unknown>): Record<string, unknown> {
    const kept: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(values)) {
      const result = validateValue(key, value, this.schema);
      if (result.valid) {
        kept[key] = value;
      } else {
        this.logger.warn(`Ignoring persisted value: ${result.reason ?? key}`);
      }
    }
    return kept;
  }

  private emitChange(event: SettingChangeEvent): void {
    if (event.reloadPolicy === "restart") {
      this.changedRestartKeys.add(event.key);
      this.logger.info(`${event.key} changed; takes effect after restart`);
    }

    for (const listener of this.listeners) {
      listener(event);
    }
  }

  private async handleExternalChange(): Promise<void> {
    const persisted = this.validOnly(await this.store.load());
    const merged = { ...getAllDefaults(this.schema), ...persisted };

    for (const key of Object.keys(merged)) {
      const oldValue = this.cache[key];
      const newValue = merged[key];
      if (oldValue !== newValue) {
        this.cache[key] = newValue;
        this.emitChange({
          key,
          oldValue,
          newValue,
          reloadPolicy: this.schema[key]?.reloadPolicy ?? "hot",
        });
      }
    }
  }
}
