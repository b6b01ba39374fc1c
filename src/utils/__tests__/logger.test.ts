import { describe, expect, it } from "vitest";
import { LOG_LEVEL, create_logger, describe_error } from "../logger";

const NOW = new Date("2024-01-01T00:00:00.000Z");

function capture(level: LOG_LEVEL) {
  const lines: string[] = [];
  const logger = create_logger(level, (line) => lines.push(line), () => NOW);
  return { lines, logger };
}

describe("logger", () => {
  it("prefixes lines with a timestamp and level", () => {
    const { lines, logger } = capture(LOG_LEVEL.INFO);
    logger.info("started");
    expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] INFO started"]);
  });

  it("drops messages above the configured level", () => {
    const { lines, logger } = capture(LOG_LEVEL.INFO);
    logger.debug("point 1/101");
    logger.error("failed");
    expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] ERROR failed"]);
  });

  it("writes debug lines at DEBUG", () => {
    const { lines, logger } = capture(LOG_LEVEL.DEBUG);
    logger.debug("point 1/101");
    expect(lines).toEqual(["[2024-01-01T00:00:00.000Z] DEBUG point 1/101"]);
  });

  it("writes nothing when silent", () => {
    const { lines, logger } = capture(LOG_LEVEL.SILENT);
    logger.error("failed", new Error("boom"));
    logger.info("started");
    expect(lines).toEqual([]);
  });

  it("appends the error message", () => {
    const { lines, logger } = capture(LOG_LEVEL.ERROR);
    logger.error("TABLE_FULL", new Error("no room"));
    logger.error("bad input", "not a number");
    expect(lines).toEqual([
      "[2024-01-01T00:00:00.000Z] ERROR TABLE_FULL: no room",
      "[2024-01-01T00:00:00.000Z] ERROR bad input: not a number",
    ]);
  });

  it("exposes its level", () => {
    expect(capture(LOG_LEVEL.DEBUG).logger.level).toBe(LOG_LEVEL.DEBUG);
    expect(create_logger().level).toBe(LOG_LEVEL.INFO);
  });

  it("describe_error handles non-errors", () => {
    expect(describe_error(new Error("x"))).toBe("x");
    expect(describe_error(42)).toBe("42");
    expect(describe_error(null)).toBe("");
  });
});
