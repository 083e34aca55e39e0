import { describe, expect, test } from "vitest";
import { createLogger } from "./log.js";

describe("createLogger", () => {
  test("filters by level and prefixes the scope", () => {
    const lines: string[] = [];
    const sink = {
      log: (line: string) => lines.push(`log ${line}`),
      warn: (line: string) => lines.push(`warn ${line}`),
      error: (line: string) => lines.push(`error ${line}`),
    };
    const logger = createLogger({ level: "info", sink });

    logger.debug("hidden");
    logger.info("shown");
    logger.child("engine").warn("careful");
    logger.error("broken");

    expect(lines).toEqual([
      "log [read-loop] shown",
      "warn [read-loop:engine] careful",
      "error [read-loop] broken",
    ]);
  });

  test("child loggers inherit the level", () => {
    const lines: string[] = [];
    const sink = {
      log: (line: string) => lines.push(line),
      warn: (line: string) => lines.push(line),
      error: () => {},
    };
    const logger = createLogger({ level: "warn", scope: "app", sink }).child("notify");

    logger.info("quiet");
    logger.warn("loud");

    expect(lines).toEqual(["[app:notify] loud"]);
  });
});
