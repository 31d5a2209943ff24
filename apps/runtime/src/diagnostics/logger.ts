/**
 * Tagged logging.
 *
 * Lines are prefixed with their subsystem tag (`[supervisor] ...`), the
 * convention the rest of the runtime writes to the console with.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFields = Record<string, unknown>;

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  /** Logger for a sub-component, tagged `parent:child`. */
  child(tag: string): Logger;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const CONSOLE_METHOD: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: (...args) => console.debug(...args),
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
};

export function createConsoleLogger(tag: string, minLevel: LogLevel = "info"): Logger {
  const write = (level: LogLevel, message: string, fields?: LogFields): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    const line = `[${tag}] ${message}`;
    if (fields !== undefined && Object.keys(fields).length > 0) {
      CONSOLE_METHOD[level](line, fields);
    } else {
      CONSOLE_METHOD[level](line);
    }
  };

  return {
    debug: (message, fields) => write("debug", message, fields),
    info: (message, fields) => write("info", message, fields),
    warn: (message, fields) => write("warn", message, fields),
    error: (message, fields) => write("error", message, fields),
    child: (childTag) => createConsoleLogger(`${tag}:${childTag}`, minLevel),
  };
}

export interface LogEntry {
  readonly level: LogLevel;
  readonly tag: string;
  readonly message: string;
  readonly fields: LogFields | undefined;
}

/** Records entries instead of printing them. Children share the parent's entry list. */
export class MemoryLogger implements Logger {
  constructor(
    private readonly tag = "test",
    readonly entries: LogEntry[] = [],
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.entries.push({ level: "debug", tag: this.tag, message, fields });
  }

  info(message: string, fields?: LogFields): void {
    this.entries.push({ level: "info", tag: this.tag, message, fields });
  }

  warn(message: string, fields?: LogFields): void {
    this.entries.push({ level: "warn", tag: this.tag, message, fields });
  }

  error(message: string, fields?: LogFields): void {
    this.entries.push({ level: "error", tag: this.tag, message, fields });
  }

  child(tag: string): Logger {
    return new MemoryLogger(`${this.tag}:${tag}`, this.entries);
  }

  messages(level?: LogLevel): string[] {
    return this.entries
      .filter((entry) => level === undefined || entry.level === level)
      .map((entry) => entry.message);
  }
}
