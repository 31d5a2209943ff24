import type { SettingDefinition, SettingsSchema } from "./types.js";

function integerBetween(min: number, max: number): (value: number) => boolean {
  return (value) => Number.isInteger(value) && value >= min && value <= max;
}

/** Settings schema of the coordination runtime. */
export const SETTINGS_SCHEMA: SettingsSchema = {
  theme: {
    key: "theme",
    type: "enum",
    enumValues: ["dark", "light", "system"] as const,
    default: "system",
    description: "Application color theme, broadcast to every surface on change",
    reloadPolicy: "hot",
  },
  "supervisor.handshake_timeout_ms": {
    key: "supervisor.handshake_timeout_ms",
    type: "number",
    default: 5000,
    description: "How long a started surface has to send surface.ready",
    reloadPolicy: "restart",
    validation: integerBetween(100, 120_000),
  },
  "supervisor.spawn_timeout_ms": {
    key: "supervisor.spawn_timeout_ms",
    type: "number",
    default: 5000,
    description: "How long the OS has to report a surface process spawn",
    reloadPolicy: "restart",
    validation: integerBetween(100, 120_000),
  },
  "supervisor.spawn_retry_budget": {
    key: "supervisor.spawn_retry_budget",
    type: "number",
    default: 3,
    description: "Launch attempts per surface creation before giving up",
    reloadPolicy: "restart",
    validation: integerBetween(1, 10),
  },
  "supervisor.drain_timeout_ms": {
    key: "supervisor.drain_timeout_ms",
    type: "number",
    default: 1000,
    description: "How long a closing surface's queue may drain before it is discarded",
    reloadPolicy: "restart",
    validation: integerBetween(0, 60_000),
  },
  "supervisor.kill_grace_ms": {
    key: "supervisor.kill_grace_ms",
    type: "number",
    default: 5000,
    description: "Delay between SIGTERM and SIGKILL when stopping a surface process",
    reloadPolicy: "restart",
    validation: integerBetween(0, 60_000),
  },
  "surface.outbound_queue_capacity": {
    key: "surface.outbound_queue_capacity",
    type: "number",
    default: 1024,
    description: "Messages a surface's outbound queue holds before reporting backpressure",
    reloadPolicy: "restart",
    validation: integerBetween(1, 1_000_000),
  },
  "updates.flush_interval_ms": {
    key: "updates.flush_interval_ms",
    type: "number",
    default: 16,
    description: "Flush interval for batched high-frequency updates",
    reloadPolicy: "restart",
    validation: integerBetween(1, 1000),
  },
  "updates.batch_max_items": {
    key: "updates.batch_max_items",
    type: "number",
    default: 256,
    description: "Items that force an early batch flush",
    reloadPolicy: "restart",
    validation: integerBetween(1, 65_535),
  },
};

/** Return the default value for a schema key, or undefined if unknown. */
export function getDefault(key: string): unknown {
  const def: SettingDefinition | undefined = SETTINGS_SCHEMA[key];
  return def?.default;
}

/** Return a map of all schema keys to their default values. */
export function getAllDefaults(schema: SettingsSchema = SETTINGS_SCHEMA): Record<string, unknown> {
  const defaults: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(schema)) {
    defaults[k] = v.default;
  }
  return defaults;
}

/** Validate a value against the schema for the given key. */
export function validateValue(
  key: string,
  value: unknown,
  schema: SettingsSchema = SETTINGS_SCHEMA,
): { valid: boolean; reason?: string } {
  const def: SettingDefinition | undefined = schema[key];

  // Unknown keys are always valid (forward-compat preservation).
  if (!def) {
    return { valid: true };
  }

  if (value === null || value === undefined) {
    return { valid: false, reason: `${key}: value must not be null or undefined` };
  }

  switch (def.type) {
    case "number": {
      if (typeof value !== "number" || !Number.isFinite(value)) {
        return { valid: false, reason: `${key}: expected finite number` };
      }
      if (def.validation && !def.validation(value)) {
        return { valid: false, reason: `${key}: failed range validation` };
      }
      break;
    }
    case "enum": {
      if (typeof value !== "string" || !def.enumValues.includes(value)) {
        return { valid: false, reason: `${key}: expected one of [${def.enumValues.join(", ")}]` };
      }
      break;
    }
  }

  return { valid: true };
}
