import { getDefault, validateValue } from "./schema.js";

/** Typed view of the settings the supervisor reads at startup. */
export interface SupervisorConfig {
  handshakeTimeoutMs: number;
  spawnTimeoutMs: number;
  spawnRetryBudget: number;
  drainTimeoutMs: number;
  killGraceMs: number;
  queueCapacity: number;
  flushIntervalMs: number;
  batchMaxItems: number;
}

const KEYS: Readonly<Record<keyof SupervisorConfig, string>> = {
  handshakeTimeoutMs: "supervisor.handshake_timeout_ms",
  spawnTimeoutMs: "supervisor.spawn_timeout_ms",
  spawnRetryBudget: "supervisor.spawn_retry_budget",
  drainTimeoutMs: "supervisor.drain_timeout_ms",
  killGraceMs: "supervisor.kill_grace_ms",
  queueCapacity: "surface.outbound_queue_capacity",
  flushIntervalMs: "updates.flush_interval_ms",
  batchMaxItems: "updates.batch_max_items",
};

function numberSetting(values: Readonly<Record<string, unknown>>, key: string): number {
  const value = values[key];
  if (typeof value === "number" && validateValue(key, value).valid) {
    return value;
  }
  if (value !== undefined) {
    console.warn(`[settings] Ignoring invalid value for ${key}, using default.`);
  }
  const fallback = getDefault(key);
  if (typeof fallback !== "number") {
    throw new Error(`No numeric default for setting ${key}`);
  }
  return fallback;
}

/** Resolve a settings snapshot into supervisor configuration; invalid values fall back to defaults. */
export function resolveSupervisorConfig(
  values: Readonly<Record<string, unknown>> = {},
): SupervisorConfig {
  return {
    handshakeTimeoutMs: numberSetting(values, KEYS.handshakeTimeoutMs),
    spawnTimeoutMs: numberSetting(values, KEYS.spawnTimeoutMs),
    spawnRetryBudget: numberSetting(values, KEYS.spawnRetryBudget),
    drainTimeoutMs: numberSetting(values, KEYS.drainTimeoutMs),
    killGraceMs: numberSetting(values, KEYS.killGraceMs),
    queueCapacity: numberSetting(values, KEYS.queueCapacity),
    flushIntervalMs: numberSetting(values, KEYS.flushIntervalMs),
    batchMaxItems: numberSetting(values, KEYS.batchMaxItems),
  };
}

export const DEFAULT_SUPERVISOR_CONFIG: Readonly<SupervisorConfig> = Object.freeze(
  resolveSupervisorConfig(),
);
