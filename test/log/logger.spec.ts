import { describe, it, expect } from "vitest";
import { createLogger, isLogLevel, silentLogger, type LogLevel, type LogSink } from "../../src/log/logger";

function recorder(): { sink: LogSink; calls: [string, unknown[]][] } {
  const calls: [string, unknown[]][] = [];
  const sink: LogSink = {
    log: (...args) => calls.push(["log", args]),
    warn: (...args) => calls.push(["warn", args]),
    error: (...args) => calls.push(["error", args]),
  };
  return { sink, calls };
}

function emitAll(level: LogLevel, sink: LogSink, scope?: string): void {
  const log = createLogger(level, sink, scope);
  log.debug("d");
  log.info("i");
  log.warn("w");
  log.error("e", { code: 1 });
}

describe("createLogger", () => {

  it("drops messages below its level", () => {
    const { sink, calls } = recorder();
    emitAll("warn", sink);
    expect(calls).toEqual([
      ["warn", ["[warn] w"]],
      ["error", ["[error] e", { code: 1 }]],
    ]);
  });

  it("routes debug and info to the log channel", () => {
    const { sink, calls } = recorder();
    emitAll("debug", sink, "schema");
    expect(calls.slice(0, 2)).toEqual([
      ["log", ["[debug] [schema] d"]],
      ["log", ["[info] [schema] i"]],
    ]);
    expect(calls).toHaveLength(4);
  });

  it("emits nothing when silent", () => {
    const { sink, calls } = recorder();
    emitAll("silent", sink);
    expect(calls).toEqual([]);
    expect(() => silentLogger.error("ignored")).not.toThrow();
  });
});

describe("isLogLevel", () => {

  it("accepts only known levels", () => {
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("silent")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel("toString")).toBe(false);
  });
});
