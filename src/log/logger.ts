export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogFn = (msg: string, data?: unknown) => void;

export interface Logger {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

export interface LogSink {
  log: LogFn;
  warn: LogFn;
  error: LogFn;
}

const RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(RANK, value);
}

/**
 * Leveled logger over an injectable sink. Messages are prefixed with their
 * level and an optional scope, e.g. `[debug] [schema] registered class User`.
 */
export function createLogger(level: LogLevel = "warn", sink: LogSink = console, scope?: string): Logger {
  const emit = (msgLevel: Exclude<LogLevel, "silent">, out: LogFn): LogFn => {
    return (msg, data) => {
      if (RANK[msgLevel] < RANK[level]) return;
      const line = scope ? `[${msgLevel}] [${scope}] ${msg}` : `[${msgLevel}] ${msg}`;
      if (data === undefined) {
        out(line);
      } else {
        out(line, data);
      }
    };
  };

  return {
    debug: emit("debug", sink.log),
    info: emit("info", sink.log),
    warn: emit("warn", sink.warn),
    error: emit("error", sink.error),
  };
}

export const silentLogger: Logger = createLogger("silent");
