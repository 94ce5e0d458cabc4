// src/logger.ts
import { inspect } from "node:util";

export type LogLevel = "debug" | "info" | "warn" | "error";
export const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

type Meta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Meta;
}

export interface Logger {
  child(scope: string): Logger;
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  sink?: LogSink;
  /** Entries below this level are dropped before reaching sink or echo. */
  minLevel?: LogLevel;
  /** Entries at or above this level are also passed to `echo`. */
  echoLevel?: LogLevel;
  /** Defaults to one formatted line on stderr. */
  echo?: LogSink;
  clock?: () => number;
}

const RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const LABEL: Record<LogLevel, string> = {
  debug: "DEBUG",
  info: "INFO ",
  warn: "WARN ",
  error: "ERROR",
};

export function levelAtOrAbove(
  desired: LogLevel,
  candidate: LogLevel,
): boolean {
  return RANK[candidate] >= RANK[desired];
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const normalized = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((lvl) => lvl === normalized) ?? fallback;
}

function serializeMeta(meta: Meta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    // cycles, BigInt
    return inspect(meta, { depth: 4 });
  }
}

/** `LEVEL [scope] message {"meta":...}` */
export function formatLogEntry({ level, scope, message, meta }: LogEntry): string {
  let line = `${LABEL[level]} ${scope ? `[${scope}] ` : ""}${message}`;
  if (meta && Object.keys(meta).length) line += ` ${serializeMeta(meta)}`;
  return line;
}

// DIRMIRROR_DISABLE_LOG_ECHO=1 silences stderr; "0" and "false" do not.
function echoDisabled(): boolean {
  const raw = process.env.DIRMIRROR_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!raw && raw !== "0" && raw !== "false";
}

const writeToStderr: LogSink = (entry) => {
  if (echoDisabled()) return;
  process.stderr.write(formatLogEntry(entry) + "\n");
};

export class StructuredLogger implements Logger {
  constructor(private readonly opts: LoggerOptions = {}) {}

  child(scope: string): Logger {
    const parent = this.opts.scope;
    return new StructuredLogger({
      ...this.opts,
      scope: parent ? `${parent}.${scope}` : scope,
    });
  }

  debug(message: string, meta?: Meta): void {
    this.emit("debug", message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.emit("info", message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.emit("warn", message, meta);
  }

  error(message: string, meta?: Meta): void {
    this.emit("error", message, meta);
  }

  private emit(level: LogLevel, message: string, meta?: Meta): void {
    const { scope, sink, minLevel, echoLevel, echo, clock } = this.opts;
    if (minLevel && !levelAtOrAbove(minLevel, level)) return;
    const entry: LogEntry = {
      ts: clock ? clock() : Date.now(),
      level,
      scope,
      message,
      meta: meta && Object.keys(meta).length ? meta : undefined,
    };
    sink?.(entry);
    if (echoLevel && levelAtOrAbove(echoLevel, level)) {
      (echo ?? writeToStderr)(entry);
    }
  }
}

/** Logs `minLevel` and above to stderr. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ minLevel, echoLevel: minLevel });
  }
}

/** Default for library callers that pass no logger. */
export const silentLogger: Logger = {
  child: () => silentLogger,
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
