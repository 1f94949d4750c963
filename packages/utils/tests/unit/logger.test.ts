import { afterEach, describe, expect, it } from "vitest";

import { createLogger, formatLogRecord, logger, LogLevel, parseLogLevel, type LogRecord } from "../../src/logger";

describe("logger sink routing", () => {
  afterEach(() => {
    logger.clearSink();
    logger.setLevel(null);
  });

  it("routes INFO records to the sink with stringified fields", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.DEBUG);
    logger.setSink({ write: r => records.push(r) });

    logger.info("hello", { a: 1, b: "two", skipped: undefined });

    expect(records).toHaveLength(1);
    expect(records[0]?.level).toBe(LogLevel.INFO);
    expect(records[0]?.message).toBe("hello");
    expect(records[0]?.fields).toEqual({ a: "1", b: "two" });
    expect(records[0]?.scope).toBeUndefined();
  });

  it("tags records from scoped loggers", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.DEBUG);
    logger.setSink({ write: r => records.push(r) });

    createLogger("dydx").warn("book dropped", { reason: "crossed" });

    expect(records[0]?.scope).toBe("dydx");
    expect(records[0]?.level).toBe(LogLevel.WARN);
  });

  it("drops records below the active level", () => {
    const records: LogRecord[] = [];
    logger.setLevel(LogLevel.WARN);
    logger.setSink({ write: r => records.push(r) });

    logger.info("quiet");
    logger.debug("quieter");
    logger.error("loud");

    expect(records.map(r => r.message)).toEqual(["loud"]);
  });
});

describe("formatLogRecord", () => {
  it("appends fields as key=value pairs", () => {
    expect(formatLogRecord({ tsMs: 0, level: LogLevel.INFO, message: "m", fields: { a: "1", b: "x" } })).toBe(
      "m a=1 b=x",
    );
  });

  it("returns the bare message without fields", () => {
    expect(formatLogRecord({ tsMs: 0, level: LogLevel.INFO, message: "m" })).toBe("m");
  });
});

describe("parseLogLevel", () => {
  it("accepts case-insensitive names", () => {
    expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
    expect(parseLogLevel("WARN")).toBe(LogLevel.WARN);
  });

  it("returns null for unknown values", () => {
    expect(parseLogLevel("verbose")).toBeNull();
    expect(parseLogLevel(undefined)).toBeNull();
  });
});
