/**
 * Surface supervisor.
 *
 * Owns every surface instance: creates them, performs the readiness
 * handshake, detects crashes, recovers recoverable roles with a resync
 * preamble, and shuts down with the primary last. All state mutation runs
 * on a single {@link ControlLoop}; process events, channel data and timers
 * post tasks to it.
 */

import { generateSurfaceId, isIdOf } from "@switchyard/ids";
import { buildResync } from "../coordination/resync.js";
import { registerCoordinationHandlers } from "../coordination/handlers.js";
import { CoordinationState } from "../coordination/state.js";
import { UpdateScheduler } from "../coordination/updates.js";
import type { SupervisorConfig } from "../config/supervisor.js";
import { DEFAULT_SUPERVISOR_CONFIG } from "../config/supervisor.js";
import { emitDiagnostic, NoOpDiagnosticSink, type DiagnosticSink } from "../diagnostics/events.js";
import { createConsoleLogger, type Logger } from "../diagnostics/logger.js";
import {
  entryToGeometry,
  layoutKeyFor,
  roleFromLayoutKey,
  type LayoutRecord,
} from "../layout/schema.js";
import type { LayoutStore } from "../layout/store.js";
import { createDefaultCatalog, MessageTypes, type MessageCatalog } from "../protocol/catalog.js";
import { WireCodec } from "../protocol/codec.js";
import {
  noticeCodec,
  textCodec,
  type Geometry,
  type NoticeLevel,
} from "../protocol/payloads.js";
import { isSecondary, ROLE_POLICIES, type SurfaceRole } from "../protocol/roles.js";
import { createMessage, type Message } from "../protocol/types.js";
import { BroadcastBus, everySurface, type SurfacePredicate } from "../routing/broadcast.js";
import {
  Router,
  SUPERVISOR_SOURCE,
  type DispatchReport,
  type SurfaceDirectory,
} from "../routing/router.js";
import { RoutingTable } from "../routing/table.js";
import type { DeliveryOutcome } from "../coordination/updates.js";
import { SurfaceHandle, type CloseReport, type SurfaceInfo } from "../surfaces/handle.js";
import {
  describeExit,
  isAbnormalExit,
  SpawnError,
  type SurfaceExit,
  type SurfaceLauncher,
  type SurfaceProcess,
} from "../surfaces/process.js";
import { ControlLoop } from "./control_loop.js";
import {
  HandshakeTimeoutError,
  InvalidProducerError,
  SupervisorStoppedError,
  SurfaceClosedError,
  SurfaceCreationError,
  SurfaceNotFoundError,
} from "./errors.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type SupervisorStatus = "idle" | "running" | "stopping" | "stopped";

export interface ExitInfo {
  reason: string;
  /** True when the application stops because the primary failed. */
  fatal: boolean;
}

export interface SupervisorOptions {
  launcher: SurfaceLauncher;
  config?: Partial<SupervisorConfig> | undefined;
  catalog?: MessageCatalog | undefined;
  routes?: RoutingTable | undefined;
  logger?: Logger | undefined;
  diagnostics?: DiagnosticSink | undefined;
  layoutStore?: LayoutStore | undefined;
  theme?: string | undefined;
}

export interface RequestSurfaceOptions {
  /** Layout slot; defaults to the role (or the next free `floating#n`). */
  layoutKey?: string | undefined;
  geometry?: Geometry | undefined;
}

export { SUPERVISOR_SOURCE };

// ---------------------------------------------------------------------------
// Supervisor
// ---------------------------------------------------------------------------

export class Supervisor implements SurfaceDirectory {
  readonly config: Readonly<SupervisorConfig>;
  readonly catalog: MessageCatalog;
  readonly state: CoordinationState;
  readonly router: Router;
  readonly bus: BroadcastBus;

  private readonly launcher: SurfaceLauncher;
  private readonly codec: WireCodec;
  private readonly loop: ControlLoop;
  private readonly scheduler: UpdateScheduler;
  private readonly logger: Logger;
  private readonly diagnostics: DiagnosticSink;
  private readonly layoutStore: LayoutStore | undefined;

  private readonly surfaces = new Map<string, SurfaceHandle>();
  private readonly handshakeTimers = new Map<string, ReturnType<typeof setTimeout>>();
  private readonly closing = new Map<string, Promise<void>>();
  private readonly exitListeners: Array<(info: ExitInfo) => void> = [];
  private _status: SupervisorStatus = "idle";
  private stopping: Promise<ExitInfo> | undefined;

  constructor(options: SupervisorOptions) {
    this.config = { ...DEFAULT_SUPERVISOR_CONFIG, ...options.config };
    this.launcher = options.launcher;
    this.catalog = options.catalog ?? createDefaultCatalog();
    this.codec = new WireCodec(this.catalog);
    this.logger = options.logger ?? createConsoleLogger("supervisor");
    this.diagnostics = options.diagnostics ?? new NoOpDiagnosticSink();
    this.layoutStore = options.layoutStore;
    this.state = new CoordinationState(options.theme);
    this.loop = new ControlLoop(this.logger.child("loop"));
    this.scheduler = new UpdateScheduler(this.catalog, this.state, {
      flushIntervalMs: this.config.flushIntervalMs,
      batchMaxItems: this.config.batchMaxItems,
      post: (task) => this.loop.post(task),
      onFlushRejected: (target, type, error) => {
        this.logger.warn(`Batch of "${type}" for ${target.id} dropped: ${error.message}`);
        if (error.kind === "backpressure") {
          emitDiagnostic(this.diagnostics, "send.backpressure", target.id, {
            role: target.role,
            type: MessageTypes.Batch,
          });
        }
      },
    });
    this.router = new Router(
      options.routes ?? new RoutingTable(),
      this.catalog,
      this,
      this.scheduler,
      this.state,
      this.diagnostics,
      this.logger.child("router"),
    );
    this.bus = new BroadcastBus(this, this.router);
    registerCoordinationHandlers(this.router);
  }

  get status(): SupervisorStatus {
    return this._status;
  }

  private get isShuttingDown(): boolean {
    return this._status === "stopping" || this._status === "stopped";
  }

  // -------------------------------------------------------------------------
  // Directory
  // -------------------------------------------------------------------------

  get(surfaceId: string): SurfaceHandle | undefined {
    return this.surfaces.get(surfaceId);
  }

  live(role?: SurfaceRole): SurfaceHandle[] {
    const handles: SurfaceHandle[] = [];
    for (const handle of this.surfaces.values()) {
      if (handle.isLive && (role === undefined || handle.role === role)) {
        handles.push(handle);
      }
    }
    return handles;
  }

  /** Snapshot of one instance, tombstones included. */
  surface(surfaceId: string): SurfaceInfo | undefined {
    return this.surfaces.get(surfaceId)?.info();
  }

  /** Snapshot of every known instance, tombstones included. */
  list(): SurfaceInfo[] {
    return [...this.surfaces.values()].map((handle) => handle.info());
  }

  // -------------------------------------------------------------------------
  // Lifecycle API
  // -------------------------------------------------------------------------

  /**
   * Create the primary, then restore the persisted layout.
   *
   * @returns The primary's SurfaceId.
   * @throws {SurfaceCreationError} if the primary cannot be created; the
   *   supervisor shuts down.
   */
  async start(): Promise<string> {
    if (this._status !== "idle") {
      throw new Error(`Supervisor cannot start while ${this._status}`);
    }
    this._status = "running";

    const layout = await this.loadLayout();
    const primaryEntry = layout.primary;
    const primaryId = await this.requestSurface("primary", {
      geometry: primaryEntry === undefined ? undefined : entryToGeometry(primaryEntry),
    });
    await this.restoreLayout(layout);
    return primaryId;
  }

  /**
   * Ensure a surface of `role` exists and is ready.
   *
   * Single-instance roles with a live instance resolve with its id, without
   * creating anything. Floating surfaces are created on every call.
   *
   * @throws {SurfaceCreationError} when the retry budget is exhausted.
   * @throws {SurfaceClosedError} if the surface is closed while starting.
   * @throws {SupervisorStoppedError} once shutdown has begun.
   */
  async requestSurface(role: SurfaceRole, options: RequestSurfaceOptions = {}): Promise<string> {
    return this.loop.run(() => this.ensureSurface(role, options));
  }

  /**
   * Close one surface. Closing the primary shuts the application down.
   *
   * @throws {SurfaceNotFoundError} if no such surface exists.
   */
  async closeSurface(surfaceId: string): Promise<void> {
    await this.loop.run((): Promise<unknown> => {
      const handle = this.surfaces.get(surfaceId);
      if (handle === undefined) {
        throw new SurfaceNotFoundError(surfaceId);
      }
      if (handle.role === "primary") {
        return this.shutdown("primary surface closed");
      }
      return this.beginClose(handle);
    });
  }

  /**
   * Close every secondary, then the primary. Idempotent: later calls
   * return the first call's result.
   */
  shutdown(reason = "shutdown requested", fatal = false): Promise<ExitInfo> {
    this.stopping ??= this.runShutdown({ reason, fatal });
    return this.stopping;
  }

  /** Fires once, after the primary has closed. */
  onExit(listener: (info: ExitInfo) => void): void {
    this.exitListeners.push(listener);
  }

  // -------------------------------------------------------------------------
  // Messaging API
  // -------------------------------------------------------------------------

  /** Route a message as if `sourceId` had sent it. */
  dispatch(sourceId: string, message: Message): Promise<DispatchReport> {
    return this.loop.run(() => this.router.dispatch(sourceId, message));
  }

  /**
   * Route a message from a content producer.
   *
   * @throws {InvalidProducerError} if `producerId` is not a producer id.
   */
  submit(producerId: string, message: Message): Promise<DispatchReport> {
    if (!isIdOf("producer", producerId)) {
      return Promise.reject(new InvalidProducerError(producerId));
    }
    return this.dispatch(producerId, message);
  }

  /** Deliver to one specific instance. */
  sendTo(surfaceId: string, message: Message): Promise<DeliveryOutcome | undefined> {
    return this.loop.run(() => this.router.sendTo(surfaceId, message));
  }

  broadcast(message: Message, predicate: SurfacePredicate = everySurface): Promise<string[]> {
    return this.loop.run(() => this.bus.broadcast(message, predicate));
  }

  /** Broadcast `app.theme_changed` to every live surface; its handler records the theme. */
  setTheme(theme: string): Promise<string[]> {
    return this.broadcast(createMessage(MessageTypes.ThemeChanged, textCodec.encode(theme)));
  }

  /** Current layout: every live surface's slot and last-known geometry. */
  layoutSnapshot(): Promise<LayoutRecord> {
    return this.loop.run(() => this.snapshotLayout());
  }

  // -------------------------------------------------------------------------
  // Creation
  // -------------------------------------------------------------------------

  private ensureSurface(role: SurfaceRole, options: RequestSurfaceOptions): Promise<string> {
    if (this.isShuttingDown) {
      throw new SupervisorStoppedError();
    }
    if (!ROLE_POLICIES[role].multiInstance) {
      const existing = this.live(role)[0];
      if (existing !== undefined) {
        return existing.whenReady();
      }
    }

    const handle = this.createHandle(role, options.layoutKey ?? this.nextLayoutKey(role));
    if (options.geometry !== undefined) {
      this.applyGeometry(handle, options.geometry);
    }
    const ready = handle.whenReady();
    this.launch(handle);
    return ready;
  }

  private createHandle(role: SurfaceRole, layoutKey: string, replaces?: string): SurfaceHandle {
    const handle = new SurfaceHandle({
      id: generateSurfaceId(),
      role,
      layoutKey,
      replaces,
      codec: this.codec,
      queueCapacity: this.config.queueCapacity,
      logger: this.logger.child(role),
      diagnostics: this.diagnostics,
      onMessage: (source, message) => this.loop.post(() => this.onInbound(source, message)),
    });
    this.surfaces.set(handle.id, handle);
    this.state.addActive(role, handle.id);

    const saved = this.state.geometry(layoutKey);
    if (saved !== undefined) {
      handle.geometry = saved;
      handle.visible = saved.visible;
    }
    return handle;
  }

  private nextLayoutKey(role: SurfaceRole): string {
    const used = new Set(this.live(role).map((handle) => handle.layoutKey));
    let index = 1;
    while (used.has(layoutKeyFor(role, index))) index++;
    return layoutKeyFor(role, index);
  }

  private applyGeometry(handle: SurfaceHandle, geometry: Geometry): void {
    handle.geometry = geometry;
    handle.visible = geometry.visible;
    this.state.setGeometry(handle.layoutKey, geometry);
  }

  private launch(handle: SurfaceHandle): void {
    handle.attempt += 1;
    const attempt = handle.attempt;
    handle.transition("launch");
    this.logger.debug(`Launching ${handle.role} ${handle.id} (attempt ${attempt})`);

    void this.launcher.launch({ surfaceId: handle.id, role: handle.role, attempt }).then(
      (process) => this.loop.post(() => this.onLaunched(handle, attempt, process)),
      (error: unknown) =>
        this.loop.post(() => this.onLaunchFailed(handle, attempt, toError(error, handle.role))),
    );
  }

  private onLaunched(handle: SurfaceHandle, attempt: number, process: SurfaceProcess): void {
    if (handle.state !== "starting" || handle.attempt !== attempt) {
      this.logger.debug(`Stopping process for ${handle.id}: no longer starting`);
      this.stopProcess(process);
      return;
    }

    handle.attach(process);
    process.onExit((exit) => this.loop.post(() => this.onProcessExit(handle, process, exit)));

    const timer = setTimeout(() => {
      this.loop.post(() => this.onHandshakeTimeout(handle, attempt));
    }, this.config.handshakeTimeoutMs);
    this.handshakeTimers.set(handle.id, timer);
  }

  private onHandshakeTimeout(handle: SurfaceHandle, attempt: number): void {
    if (handle.state !== "starting" || handle.attempt !== attempt) return;
    this.onLaunchFailed(
      handle,
      attempt,
      new HandshakeTimeoutError(handle.id, handle.role, this.config.handshakeTimeoutMs),
    );
  }

  private onLaunchFailed(handle: SurfaceHandle, attempt: number, error: Error): void {
    if (handle.state !== "starting" || handle.attempt !== attempt) return;

    this.clearHandshake(handle.id);
    const process = handle.detach();
    if (process !== undefined && !process.exited) {
      this.stopProcess(process);
    }

    const budget = this.config.spawnRetryBudget;
    this.logger.warn(
      `Launch attempt ${attempt}/${budget} for ${handle.role} ${handle.id} failed: ${error.message}`,
    );

    if (attempt < budget && !this.isShuttingDown) {
      handle.transition("launch_failed");
      this.launch(handle);
      return;
    }

    handle.transition("give_up");
    this.forget(handle);
    const failure = new SurfaceCreationError(handle.role, attempt, error);
    this.logger.error(failure.message);
    emitDiagnostic(this.diagnostics, "surface.creation_failed", handle.id, {
      role: handle.role,
      attempts: attempt,
      reason: error.message,
    });
    handle.rejectReady(failure);

    if (handle.replaces !== undefined) {
      this.giveUpTombstone(handle.replaces);
      this.notifyPrimary("error", `The ${handle.role} surface could not be recovered`);
    }
    if (handle.role === "primary") {
      this.inBackground(this.shutdown("primary surface could not be created", true), "Shutdown");
    }
  }

  private onInbound(handle: SurfaceHandle, message: Message): void {
    if (message.type === MessageTypes.SurfaceReady) {
      if (handle.state === "starting") {
        this.completeHandshake(handle);
      } else {
        this.logger.debug(`Ignoring repeated surface.ready from ${handle.id}`);
      }
      return;
    }

    switch (handle.state) {
      case "ready":
      case "closing":
        this.router.dispatch(handle.id, message);
        return;
      case "starting":
        this.logger.warn(`Dropped "${message.type}" from ${handle.id}: sent before surface.ready`);
        return;
      default:
        this.logger.debug(`Dropped "${message.type}" from ${handle.state} surface ${handle.id}`);
    }
  }

  private completeHandshake(handle: SurfaceHandle): void {
    this.clearHandshake(handle.id);
    handle.transition("handshake_ok");

    const preamble = buildResync(handle.role, this.state);
    for (const message of preamble) {
      if (this.catalog.policyOf(message.type) === "replaceable") {
        this.state.recordSent(handle.role, message.type, message.payload, handle.id);
      }
    }
    handle.open(preamble);

    if (handle.replaces !== undefined) {
      const old = this.surfaces.get(handle.replaces);
      if (old !== undefined && old.state === "terminated") {
        old.transition("retire");
        this.surfaces.delete(old.id);
      }
      this.logger.info(`Recovered ${handle.role}: ${handle.replaces} -> ${handle.id}`);
    } else {
      this.logger.info(`Surface ready: ${handle.role} ${handle.id}`, {
        pid: handle.process?.pid,
      });
    }
    handle.resolveReady();
  }

  // -------------------------------------------------------------------------
  // Termination
  // -------------------------------------------------------------------------

  private onProcessExit(handle: SurfaceHandle, process: SurfaceProcess, exit: SurfaceExit): void {
    if (handle.process !== process) return;

    switch (handle.state) {
      case "starting":
        this.onLaunchFailed(
          handle,
          handle.attempt,
          new SpawnError(`Surface exited during startup (${describeExit(exit)})`, handle.role),
        );
        return;
      case "ready":
        if (isAbnormalExit(exit)) {
          this.onCrash(handle, exit);
        } else if (handle.role === "primary") {
          this.logger.info("Primary surface exited");
          this.inBackground(this.shutdown("primary surface exited"), "Shutdown");
        } else {
          this.logger.info(`Surface ${handle.role} ${handle.id} exited`);
          this.inBackground(this.beginClose(handle), `Closing ${handle.id}`);
        }
        return;
      default:
        return;
    }
  }

  private onCrash(handle: SurfaceHandle, exit: SurfaceExit): void {
    handle.transition("crash");
    const dropped = this.scheduler.cancel(handle.id) + handle.discardQueue();
    this.state.removeActive(handle.role, handle.id);

    this.logger.error(
      `UnexpectedTermination: ${handle.role} ${handle.id} (${describeExit(exit)})`,
      { dropped },
    );
    emitDiagnostic(this.diagnostics, "surface.unexpected_termination", handle.id, {
      role: handle.role,
      code: exit.code,
      signal: exit.signal,
      dropped,
    });

    if (handle.role === "primary") {
      handle.transition("give_up");
      this.surfaces.delete(handle.id);
      this.inBackground(this.shutdown("primary surface terminated unexpectedly", true), "Shutdown");
      return;
    }

    if (ROLE_POLICIES[handle.role].autoRecover && !this.isShuttingDown) {
      const replacement = this.createHandle(handle.role, handle.layoutKey, handle.id);
      this.launch(replacement);
      return;
    }

    handle.transition("give_up");
    this.surfaces.delete(handle.id);
    this.notifyPrimary("warning", `The ${handle.role} surface ${handle.id} terminated unexpectedly`);
  }

  private beginClose(handle: SurfaceHandle): Promise<void> {
    const pending = this.closing.get(handle.id);
    if (pending !== undefined) return pending;

    if (handle.state === "closed") return Promise.resolve();
    if (handle.state === "terminated") {
      this.giveUpTombstone(handle.id);
      const replacement = this.live(handle.role).find((other) => other.replaces === handle.id);
      return replacement === undefined ? Promise.resolve() : this.beginClose(replacement);
    }

    this.clearHandshake(handle.id);
    this.scheduler.flush(handle.id);
    handle.transition("close_request");
    this.scheduler.cancel(handle.id);
    this.state.removeActive(handle.role, handle.id);
    handle.rejectReady(new SurfaceClosedError(handle.id));

    const done = handle.close(this.config.drainTimeoutMs, this.config.killGraceMs).then(
      (report) => this.loop.run(() => this.finishClose(handle, report)),
      (error: unknown) =>
        this.loop.run(() => {
          const reason = error instanceof Error ? error.message : String(error);
          this.logger.error(`Closing ${handle.id} failed: ${reason}`);
          this.finishClose(handle, { delivered: 0, dropped: handle.pending });
        }),
    );
    this.closing.set(handle.id, done);
    return done;
  }

  private finishClose(handle: SurfaceHandle, report: CloseReport): void {
    handle.transition("close_complete");
    this.surfaces.delete(handle.id);
    this.closing.delete(handle.id);
    if (handle.replaces !== undefined) {
      this.giveUpTombstone(handle.replaces);
    }
    this.logger.info(`Closed ${handle.role} ${handle.id}`, { ...report });
  }

  private async runShutdown(info: ExitInfo): Promise<ExitInfo> {
    this._status = "stopping";
    this.logger.info(`Shutting down: ${info.reason}`);

    await this.saveLayout();

    const secondaries = await this.loop.run(() =>
      [...this.surfaces.values()]
        .filter((handle) => handle.role !== "primary")
        .map((handle) => this.beginClose(handle)),
    );
    this.reportFailures(await Promise.allSettled(secondaries));

    const primary = await this.loop.run(() =>
      [...this.surfaces.values()]
        .filter((handle) => handle.role === "primary")
        .map((handle) => this.beginClose(handle)),
    );
    this.reportFailures(await Promise.allSettled(primary));

    this._status = "stopped";
    emitDiagnostic(this.diagnostics, "app.exit", null, { ...info });
    for (const listener of this.exitListeners.splice(0)) {
      listener(info);
    }
    return info;
  }

  private reportFailures(results: PromiseSettledResult<void>[]): void {
    for (const result of results) {
      if (result.status === "rejected") {
        const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
        this.logger.error(`Shutdown step failed: ${reason}`);
      }
    }
  }

  // -------------------------------------------------------------------------
  // Layout
  // -------------------------------------------------------------------------

  private async loadLayout(): Promise<LayoutRecord> {
    if (this.layoutStore === undefined) return {};
    try {
      return await this.layoutStore.load();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Layout could not be loaded: ${reason}`);
      emitDiagnostic(this.diagnostics, "layout.restore_failed", null, { reason });
      return {};
    }
  }

  private async restoreLayout(layout: LayoutRecord): Promise<void> {
    const entries: Array<[string, SurfaceRole, Geometry]> = [];
    for (const key of Object.keys(layout).sort()) {
      const role = roleFromLayoutKey(key);
      const entry = layout[key];
      if (role === undefined || !isSecondary(role) || entry === undefined) {
        continue;
      }
      entries.push([key, role, entryToGeometry(entry)]);
    }

    const results = await Promise.allSettled(
      entries.map(([layoutKey, role, geometry]) =>
        this.requestSurface(role, { layoutKey, geometry }),
      ),
    );

    results.forEach((result, index) => {
      if (result.status === "fulfilled") return;
      const layoutKey = entries[index]?.[0];
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      this.logger.warn(`Could not restore ${layoutKey ?? "surface"}: ${reason}`);
      emitDiagnostic(this.diagnostics, "layout.restore_failed", null, { layoutKey, reason });
    });
  }

  private snapshotLayout(): LayoutRecord {
    const record: LayoutRecord = {};
    for (const handle of this.live()) {
      const geometry = handle.geometry ?? this.state.geometry(handle.layoutKey);
      record[handle.layoutKey] =
        geometry === undefined
          ? { visible: handle.visible, x: 0, y: 0, width: 0, height: 0 }
          : { ...geometry, visible: handle.visible };
    }
    return record;
  }

  private async saveLayout(): Promise<void> {
    if (this.layoutStore === undefined) return;
    try {
      await this.layoutStore.save(await this.layoutSnapshot());
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Layout could not be saved: ${reason}`);
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private inBackground(task: Promise<unknown>, what: string): void {
    void task.catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`${what} failed: ${reason}`);
    });
  }

  private forget(handle: SurfaceHandle): void {
    this.clearHandshake(handle.id);
    this.scheduler.cancel(handle.id);
    this.state.removeActive(handle.role, handle.id);
    this.surfaces.delete(handle.id);
  }

  private giveUpTombstone(surfaceId: string): void {
    const tombstone = this.surfaces.get(surfaceId);
    if (tombstone !== undefined && tombstone.state === "terminated") {
      tombstone.transition("give_up");
      this.surfaces.delete(surfaceId);
    }
  }

  private clearHandshake(surfaceId: string): void {
    const timer = this.handshakeTimers.get(surfaceId);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.handshakeTimers.delete(surfaceId);
    }
  }

  private notifyPrimary(level: NoticeLevel, text: string): void {
    this.router.dispatch(
      SUPERVISOR_SOURCE,
      createMessage(MessageTypes.Notice, noticeCodec.encode({ level, text })),
    );
  }

  private stopProcess(process: SurfaceProcess): void {
    void process.terminate(this.config.killGraceMs).then(
      (exit) => {
        this.logger.debug(`Stopped process ${process.pid ?? "?"} (${describeExit(exit)})`);
      },
      (error: unknown) => {
        const reason = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed to stop process ${process.pid ?? "?"}: ${reason}`);
      },
    );
  }
}

function toError(error: unknown, role: SurfaceRole): Error {
  if (error instanceof Error) return error;
  return new SpawnError(String(error), role);
}
