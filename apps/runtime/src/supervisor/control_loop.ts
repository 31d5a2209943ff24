/**
 * Serial inbox for every state mutation in the supervisor.
 *
 * Tasks are synchronous and run one at a time in post order. I/O
 * completions, timers and process events never touch state directly; they
 * post a task here.
 */

import type { Logger } from "../diagnostics/logger.js";

export type Task = () => void;

export class ControlLoop {
  private readonly inbox: Task[] = [];
  private scheduled = false;

  constructor(private readonly logger: Logger) {}

  /** Number of tasks waiting to run. */
  get depth(): number {
    return this.inbox.length;
  }

  post(task: Task): void {
    this.inbox.push(task);
    if (!this.scheduled) {
      this.scheduled = true;
      queueMicrotask(() => this.drain());
    }
  }

  /** Post `task` and resolve with its result (or reject with what it throws). */
  run<T>(task: () => T): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.post(() => {
        try {
          resolve(task());
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  private drain(): void {
    let task = this.inbox.shift();
    while (task !== undefined) {
      try {
        task();
      } catch (error) {
        const reason = error instanceof Error ? (error.stack ?? error.message) : String(error);
        this.logger.error(`Task failed: ${reason}`);
      }
      task = this.inbox.shift();
    }
    this.scheduled = false;
  }
}
