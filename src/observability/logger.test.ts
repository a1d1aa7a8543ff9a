import { describe, expect, it } from "vitest";
import { isLogLevel, Logger } from "./logger";
import { LogLevel } from "./types";

function capture(): { lines: Array<{ level: LogLevel; payload: unknown }>; writer: (line: string, level: LogLevel) => void } {
  const lines: Array<{ level: LogLevel; payload: unknown }> = [];
  return {
    lines,
    writer: (line, level) => {
      lines.push({ level, payload: JSON.parse(line) });
    },
  };
}

describe("Logger", () => {
  it("writes JSON lines with the run context and fields", () => {
    const { lines, writer } = capture();
    const logger = new Logger({ component: "scheduler", runId: "run_test", writer });

    logger.info("run_complete", { total: 3 });

    expect(lines).toHaveLength(1);
    expect(lines[0].level).toBe("info");
    expect(lines[0].payload).toMatchObject({
      level: "info",
      msg: "run_complete",
      component: "scheduler",
      runId: "run_test",
      total: 3,
    });
  });

  it("drops lines below the configured level", () => {
    const { lines, writer } = capture();
    const logger = new Logger({ component: "cli", runId: "run_test", level: "warn", writer });

    logger.debug("hidden");
    logger.info("hidden");
    logger.warn("shown");
    logger.error("shown");

    expect(lines.map((line) => line.level)).toEqual(["warn", "error"]);
  });

  it("keeps level and writer in children and swaps the writer on request", () => {
    const first = capture();
    const second = capture();
    const logger = new Logger({ component: "cli", runId: "run_test", level: "error", writer: first.writer });

    logger.child("api").info("hidden");
    logger.child("api").error("child");
    logger.withWriter(second.writer).error("redirected");

    expect(first.lines.map((line) => line.payload)).toMatchObject([{ component: "api", msg: "child" }]);
    expect(second.lines.map((line) => line.payload)).toMatchObject([{ component: "cli", msg: "redirected" }]);
  });
});

describe("isLogLevel", () => {
  it("accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("error")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
