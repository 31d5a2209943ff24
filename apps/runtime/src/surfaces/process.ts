/**
 * Surface process lifecycle: spawning, exit detection and termination.
 *
 * A surface runs as its own OS process and speaks the wire protocol over
 * its stdin/stdout. stderr is inherited so surface logs reach the terminal.
 */

import { spawn, type SpawnOptions } from "node:child_process";
import type { Readable, Writable } from "node:stream";
import { createConsoleLogger, type Logger } from "../diagnostics/logger.js";
import type { SurfaceRole } from "../protocol/roles.js";
import { StreamChannel, type SurfaceChannel } from "./channel.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface SurfaceExit {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface LaunchSpec {
  surfaceId: string;
  role: SurfaceRole;
  /** 1-based attempt number within the current retry budget. */
  attempt: number;
}

export interface SurfaceProcess {
  readonly pid: number | undefined;
  readonly channel: SurfaceChannel;
  readonly exited: boolean;
  /** Register an exit listener. Fires once; fires immediately if already exited. */
  onExit(listener: (exit: SurfaceExit) => void): void;
  /**
   * Stop the process. Sends SIGTERM, waits up to `graceMs`, then escalates
   * to SIGKILL. Idempotent.
   */
  terminate(graceMs: number): Promise<SurfaceExit>;
}

export interface SurfaceLauncher {
  launch(spec: LaunchSpec): Promise<SurfaceProcess>;
}

export interface SurfaceCommand {
  command: string;
  args?: string[] | undefined;
  env?: Record<string, string> | undefined;
  cwd?: string | undefined;
}

/** The subset of a spawned child the launcher relies on. */
export interface SpawnedChild {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "spawn", listener: () => void): unknown;
  once(event: "error", listener: (error: Error) => void): unknown;
  once(
    event: "exit",
    listener: (code: number | null, signal: NodeJS.Signals | null) => void,
  ): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptions,
) => SpawnedChild;

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

export class SpawnError extends Error {
  constructor(
    message: string,
    public readonly role: SurfaceRole,
    public override readonly cause?: unknown,
  ) {
    super(message);
    this.name = "SpawnError";
  }
}

export function isAbnormalExit(exit: SurfaceExit): boolean {
  return exit.signal !== null || exit.code !== 0;
}

export function describeExit(exit: SurfaceExit): string {
  if (exit.signal !== null) return `signal ${exit.signal}`;
  return `code ${exit.code ?? "unknown"}`;
}

// ---------------------------------------------------------------------------
// Child process surface
// ---------------------------------------------------------------------------

class ChildSurfaceProcess implements SurfaceProcess {
  readonly channel: StreamChannel;
  private _exit: SurfaceExit | undefined;
  private readonly exitListeners: Array<(exit: SurfaceExit) => void> = [];
  private terminating: Promise<SurfaceExit> | undefined;

  constructor(
    private readonly child: SpawnedChild,
    stdin: Writable,
    stdout: Readable,
  ) {
    this.channel = new StreamChannel(stdout, stdin);
    child.once("exit", (code, signal) => {
      const exit = { code, signal };
      this._exit = exit;
      for (const listener of this.exitListeners.splice(0)) {
        listener(exit);
      }
    });
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get exited(): boolean {
    return this._exit !== undefined;
  }

  onExit(listener: (exit: SurfaceExit) => void): void {
    if (this._exit !== undefined) {
      listener(this._exit);
      return;
    }
    this.exitListeners.push(listener);
  }

  terminate(graceMs: number): Promise<SurfaceExit> {
    if (this._exit !== undefined) return Promise.resolve(this._exit);
    this.terminating ??= this.escalate(graceMs);
    return this.terminating;
  }

  private async escalate(graceMs: number): Promise<SurfaceExit> {
    const exited = new Promise<SurfaceExit>((resolve) => this.onExit(resolve));
    this.channel.close();
    this.child.kill("SIGTERM");

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), graceMs);
    });
    const result = await Promise.race([exited, timeout]);
    clearTimeout(timer);

    if (result === "timeout") {
      this.child.kill("SIGKILL");
      return exited;
    }
    return result;
  }
}

// ---------------------------------------------------------------------------
// Launcher
// ---------------------------------------------------------------------------

export interface ChildProcessLauncherOptions {
  /** Command per role. */
  commands: Partial<Record<SurfaceRole, SurfaceCommand>>;
  /** How long to wait for the OS to report the spawn. */
  spawnTimeoutMs: number;
  spawnFn?: SpawnFunction | undefined;
  logger?: Logger | undefined;
}

/** Environment variables every surface process receives. */
export const SURFACE_ID_ENV = "SWITCHYARD_SURFACE_ID";
export const SURFACE_ROLE_ENV = "SWITCHYARD_SURFACE_ROLE";

const defaultSpawn: SpawnFunction = (command, args, options) =>
  spawn(command, args, options);

export class ChildProcessLauncher implements SurfaceLauncher {
  private readonly spawnFn: SpawnFunction;
  private readonly logger: Logger;

  constructor(private readonly options: ChildProcessLauncherOptions) {
    this.spawnFn = options.spawnFn ?? defaultSpawn;
    this.logger = options.logger ?? createConsoleLogger("surface-process");
  }

  /**
   * Spawn the process configured for `spec.role`.
   *
   * @throws {SpawnError} if no command is configured, the OS refuses the
   *   spawn, or the spawn is not reported within the timeout.
   */
  launch(spec: LaunchSpec): Promise<SurfaceProcess> {
    const command = this.options.commands[spec.role];
    if (command === undefined) {
      return Promise.reject(
        new SpawnError(`No command configured for role "${spec.role}"`, spec.role),
      );
    }

    let child: SpawnedChild;
    try {
      child = this.spawnFn(command.command, command.args ?? [], {
        stdio: ["pipe", "pipe", "inherit"],
        cwd: command.cwd,
        env: {
          ...process.env,
          ...command.env,
          [SURFACE_ID_ENV]: spec.surfaceId,
          [SURFACE_ROLE_ENV]: spec.role,
        },
      });
    } catch (error) {
      return Promise.reject(
        new SpawnError(`Failed to spawn "${command.command}"`, spec.role, error),
      );
    }

    return new Promise<SurfaceProcess>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        child.kill("SIGKILL");
        reject(
          new SpawnError(
            `Spawn of "${command.command}" not reported within ${this.options.spawnTimeoutMs}ms`,
            spec.role,
          ),
        );
      }, this.options.spawnTimeoutMs);

      // Keep a listener attached for the life of the child; an unhandled
      // "error" event would otherwise crash the supervisor.
      child.on("error", (error) => {
        if (settled) {
          this.logger.warn(`${spec.surfaceId}: ${error.message}`);
          return;
        }
        settled = true;
        clearTimeout(timer);
        reject(new SpawnError(`Failed to spawn "${command.command}"`, spec.role, error));
      });

      child.once("spawn", () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (child.stdin === null || child.stdout === null) {
          child.kill("SIGKILL");
          reject(new SpawnError("Surface process has no stdio pipes", spec.role));
          return;
        }
        resolve(new ChildSurfaceProcess(child, child.stdin, child.stdout));
      });
    });
  }
}
