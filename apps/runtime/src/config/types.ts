/** Whether a change applies immediately or on the next start. */
export type ReloadPolicy = "hot" | "restart";

interface SettingBase {
  key: string;
  description: string;
  reloadPolicy: ReloadPolicy;
}

/** Numeric setting with an optional range check. */
export interface NumberSettingDefinition extends SettingBase {
  type: "number";
  default: number;
  validation?: (value: number) => boolean;
}

/** One of a fixed set of strings. */
export interface EnumSettingDefinition extends SettingBase {
  type: "enum";
  default: string;
  enumValues: readonly string[];
}

export type SettingDefinition = NumberSettingDefinition | EnumSettingDefinition;

export type SettingType = SettingDefinition["type"];

export type SettingsSchema = Record<string, SettingDefinition>;

/** Emitted when a setting value changes. */
export interface SettingChangeEvent {
  key: string;
  oldValue: unknown;
  newValue: unknown;
  reloadPolicy: ReloadPolicy;
}

/** Where settings persist. `watch` reports edits made outside the process. */
export interface SettingsStore {
  load(): Promise<Record<string, unknown>>;
  save(values: Record<string, unknown>): Promise<void>;
  watch(callback: () => void): () => void;
}
