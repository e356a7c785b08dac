import { JobKeeperError } from "../errors.js";
import type { Logger } from "../interfaces/logger.js";

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "debug",
  [LogLevel.INFO]: "info",
  [LogLevel.WARN]: "warn",
  [LogLevel.ERROR]: "error",
};

const ALL_LEVELS = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR] as const;
const RESERVED_FIELDS = new Set(["time", "level", "msg", "component"]);

/** Parse a level name ("debug", "info", ...) case-insensitively. */
export function parseLogLevel(name: string): LogLevel | undefined {
  const lower = name.toLowerCase();
  return ALL_LEVELS.find((level) => LEVEL_NAMES[level] === lower);
}

export interface StructuredLoggerOptions {
  writer?: (line: string) => void;
  level?: LogLevel;
  component?: string;
  /** Fields merged into every entry, e.g. a job's pid. */
  bindings?: Record<string, unknown>;
}

/** JSON-lines logger. Writes to stderr unless a writer is injected. */
export class StructuredLogger implements Logger {
  private writer: (line: string) => void;
  private level: LogLevel;
  private component: string | undefined;
  private bindings: Record<string, unknown>;

  constructor(options: StructuredLoggerOptions = {}) {
    this.writer = options.writer ?? ((line) => process.stderr.write(`${line}\n`));
    this.level = options.level ?? LogLevel.INFO;
    this.component = options.component;
    this.bindings = options.bindings ?? {};
  }

  /** Derive a logger sharing this one's writer and level, with extra bound fields. */
  child(bindings: Record<string, unknown>, component = this.component): StructuredLogger {
    return new StructuredLogger({
      writer: this.writer,
      level: this.level,
      component,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.DEBUG, msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.INFO, msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.WARN, msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.write(LogLevel.ERROR, msg, ctx);
  }

  private write(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (level < this.level) return;

    const entry: Record<string, unknown> = {
      time: new Date().toISOString(),
      level: LEVEL_NAMES[level],
      msg,
    };
    if (this.component) entry.component = this.component;

    for (const [key, value] of Object.entries({ ...this.bindings, ...ctx })) {
      if (RESERVED_FIELDS.has(key)) continue;
      if (value instanceof Error) {
        entry[key] = value.message;
        entry[`${key}Stack`] = value.stack;
        if (value instanceof JobKeeperError) entry[`${key}Code`] = value.code;
      } else {
        entry[key] = value;
      }
    }

    let line: string;
    try {
      line = JSON.stringify(entry);
    } catch {
      // Circular reference or BigInt in ctx
      line = JSON.stringify({
        time: entry.time,
        level: entry.level,
        msg,
        serializationError: true,
      });
    }
    this.writer(line);
  }
}
