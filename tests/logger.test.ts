/**
 * Tests for structured logging.
 */
import { afterEach, describe, test, expect } from "vitest";

import {
  createLogger,
  LogLevel,
  setLogHandler,
  setLogLevel,
  type LogEntry,
} from "../src/logger.js";

function capture(): LogEntry[] {
  const entries: LogEntry[] = [];
  setLogHandler((entry) => entries.push(entry));
  return entries;
}

afterEach(() => {
  setLogLevel(LogLevel.Info);
});

describe("logger", () => {
  test("entries below the minimum level are dropped", () => {
    const entries = capture();
    const log = createLogger({ component: "test" });
    log.debug("hidden");
    log.info("shown");
    log.error("also shown");
    expect(entries.map((e) => [e.level, e.message])).toEqual([
      [LogLevel.Info, "shown"],
      [LogLevel.Error, "also shown"],
    ]);
  });

  test("setLogLevel lowers and raises the threshold", () => {
    const entries = capture();
    const log = createLogger();
    setLogLevel(LogLevel.Debug);
    log.debug("one");
    setLogLevel(LogLevel.Warn);
    log.info("two");
    log.warn("three");
    expect(entries.map((e) => e.message)).toEqual(["one", "three"]);
  });

  test("child loggers merge context", () => {
    const entries = capture();
    const log = createLogger({ component: "pipeline" }).child({ root: "/assets" });
    log.info("scan started", { files: 3 });
    expect(entries[0].context).toEqual({
      component: "pipeline",
      root: "/assets",
      files: 3,
    });
    expect(Number.isNaN(Date.parse(entries[0].timestamp))).toBe(false);
  });
});
