import { SETTINGS_SCHEMA } from "./config/schema.js";
import { SettingsManager } from "./config/settings.js";
import { InMemorySettingsStore, JsonSettingsStore } from "./config/store.js";
import { resolveSupervisorConfig } from "./config/supervisor.js";
import type { SettingsStore } from "./config/types.js";
import type { DiagnosticSink } from "./diagnostics/events.js";
import { createConsoleLogger, type Logger } from "./diagnostics/logger.js";
import { JsonLayoutStore, type LayoutStore } from "./layout/store.js";
import type { MessageCatalog } from "./protocol/catalog.js";
import type { RoutingTable } from "./routing/table.js";
import type { SurfaceLauncher } from "./surfaces/process.js";
import { Supervisor, type ExitInfo } from "./supervisor/supervisor.js";

export type SwitchyardOptions = {
  launcher: SurfaceLauncher;
  /** JSON settings file; settings stay in memory when omitted. */
  settingsPath?: string;
  settingsStore?: SettingsStore;
  /** JSON layout file; layout is not persisted when omitted. */
  layoutPath?: string;
  layoutStore?: LayoutStore;
  logger?: Logger;
  diagnostics?: DiagnosticSink;
  catalog?: MessageCatalog;
  routes?: RoutingTable;
};

export type Switchyard = {
  supervisor: Supervisor;
  settings: SettingsManager;
  /** Create the primary surface and restore the layout. */
  start(): Promise<string>;
  stop(reason?: string): Promise<ExitInfo>;
};

/**
 * Load settings and build a supervisor from them. Theme changes are
 * broadcast to every live surface while the supervisor runs.
 */
export async function createSwitchyard(options: SwitchyardOptions): Promise<Switchyard> {
  const logger = options.logger ?? createConsoleLogger("switchyard");

  const settingsStore =
    options.settingsStore ??
    (options.settingsPath !== undefined
      ? new JsonSettingsStore(options.settingsPath, SETTINGS_SCHEMA)
      : new InMemorySettingsStore());
  const settings = new SettingsManager(SETTINGS_SCHEMA, settingsStore, logger.child("settings"));
  await settings.init();

  const theme = settings.get("theme");
  const supervisor = new Supervisor({
    launcher: options.launcher,
    config: resolveSupervisorConfig(settings.getAll()),
    theme: typeof theme === "string" ? theme : undefined,
    catalog: options.catalog,
    routes: options.routes,
    logger: logger.child("supervisor"),
    diagnostics: options.diagnostics,
    layoutStore:
      options.layoutStore ??
      (options.layoutPath !== undefined ? new JsonLayoutStore(options.layoutPath) : undefined),
  });

  const unsubscribe = settings.onSettingChanged((event) => {
    if (event.key !== "theme" || typeof event.newValue !== "string") return;
    void supervisor.setTheme(event.newValue).then(
      (delivered) => logger.debug(`Theme "${String(event.newValue)}" sent to ${delivered.length} surface(s)`),
      (error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn(`Theme broadcast failed: ${reason}`);
      },
    );
  });

  supervisor.onExit(() => {
    unsubscribe();
    settings.dispose();
  });

  return {
    supervisor,
    settings,
    start: () => supervisor.start(),
    stop: (reason) => supervisor.shutdown(reason),
  };
}

export { Supervisor, SUPERVISOR_SOURCE } from "./supervisor/supervisor.js";
export type {
  ExitInfo,
  RequestSurfaceOptions,
  SupervisorOptions,
  SupervisorStatus,
} from "./supervisor/supervisor.js";
export * from "./supervisor/errors.js";
export { ControlLoop } from "./supervisor/control_loop.js";

export { SETTINGS_SCHEMA } from "./config/schema.js";
export { SettingsManager, InvalidSettingError } from "./config/settings.js";
export { InMemorySettingsStore, JsonSettingsStore } from "./config/store.js";
export { DEFAULT_SUPERVISOR_CONFIG, resolveSupervisorConfig } from "./config/supervisor.js";
export type { SupervisorConfig } from "./config/supervisor.js";
export type {
  SettingChangeEvent,
  SettingDefinition,
  SettingType,
  SettingsSchema,
  SettingsStore,
} from "./config/types.js";

export { CoordinationState } from "./coordination/state.js";
export { buildResync } from "./coordination/resync.js";
export { UpdateScheduler } from "./coordination/updates.js";
export type { DeliveryOutcome, UpdateTarget } from "./coordination/updates.js";

export * from "./diagnostics/events.js";
export * from "./diagnostics/logger.js";

export { InMemoryLayoutStore, JsonLayoutStore } from "./layout/store.js";
export type { LayoutStore } from "./layout/store.js";
export { layoutKeyFor, parseLayout, roleFromLayoutKey } from "./layout/schema.js";
export type { LayoutEntry, LayoutRecord } from "./layout/schema.js";

export * from "./protocol/catalog.js";
export * from "./protocol/codec.js";
export * from "./protocol/errors.js";
export * from "./protocol/framing.js";
export * from "./protocol/payloads.js";
export * from "./protocol/roles.js";
export * from "./protocol/types.js";
export { PayloadDecodeError } from "./protocol/binary.js";

export { BroadcastBus, everySurface } from "./routing/broadcast.js";
export type { SurfacePredicate } from "./routing/broadcast.js";
export { Router, DuplicateHandlerError } from "./routing/router.js";
export type {
  DispatchReport,
  HandlerContext,
  HandlerOutcome,
  MessageHandler,
  SurfaceDirectory,
} from "./routing/router.js";
export { DEFAULT_ROUTES, RoutingTable } from "./routing/table.js";

export { createChannelPair, ChannelClosedError, StreamChannel } from "./surfaces/channel.js";
export type { SurfaceChannel } from "./surfaces/channel.js";
export type { CloseReport, SurfaceInfo } from "./surfaces/handle.js";
export {
  ChildProcessLauncher,
  describeExit,
  isAbnormalExit,
  SpawnError,
} from "./surfaces/process.js";
export type {
  LaunchSpec,
  SurfaceCommand,
  SurfaceExit,
  SurfaceLauncher,
  SurfaceProcess,
} from "./surfaces/process.js";
export { InvalidSurfaceTransitionError } from "./surfaces/state_machine.js";
export type { SurfaceState, SurfaceEvent } from "./surfaces/state_machine.js";
