import * as fs from "fs";
import * as path from "path";
import { describe, expect, it, vi } from "vitest";
import { makeTempDir } from "../test/fixtures";
import { createLogger, errorMessage } from "./logger";

const ONE_MB = 1024 * 1024;

describe("createLogger", () => {
  it("rotates the log file once it passes 1 MB", async () => {
    const dir = path.join(makeTempDir(), "logs", "nested");
    const file = path.join(dir, "search.log");
    const logger = createLogger({ level: "info", file });
    const padding = "x".repeat(1000);

    for (let i = 0; i < 2500; i++) {
      logger.info({ line: i, padding }, "filler");
    }

    const logFiles = () => fs.readdirSync(dir).filter((name) => name.endsWith("search.log"));
    const lineCount = () =>
      logFiles().reduce(
        (total, name) => total + fs.readFileSync(path.join(dir, name), "utf8").split("\n").filter(Boolean).length,
        0
      );

    await vi.waitFor(
      () => {
        expect(lineCount()).toBe(2500);
        expect(fs.statSync(file).size).toBeLessThan(ONE_MB);
      },
      { timeout: 10_000, interval: 50 }
    );

    const rotated = logFiles().filter((name) => name !== "search.log");
    expect(rotated.length).toBeGreaterThanOrEqual(2);
    for (const name of rotated) {
      expect(name).toMatch(/^\d{8}-\d{4}-\d{2}-search\.log$/);
      expect(fs.statSync(path.join(dir, name)).size).toBeGreaterThanOrEqual(ONE_MB);
    }
  });

  it("writes JSON records at the configured level", async () => {
    const file = path.join(makeTempDir(), "levels.log");
    const logger = createLogger({ level: "warn", file });

    logger.info("dropped");
    logger.warn({ engine: "yahoo" }, "kept");

    await vi.waitFor(() => {
      expect(fs.existsSync(file) && fs.readFileSync(file, "utf8").trim().length > 0).toBe(true);
    });
    const records = fs
      .readFileSync(file, "utf8")
      .trim()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({ level: 40, app: "multisearch", engine: "yahoo", msg: "kept" });
  });
});

describe("errorMessage", () => {
  it("uses the message of an Error", () => {
    expect(errorMessage(new Error("socket hang up"))).toBe("socket hang up");
  });

  it("stringifies anything else", () => {
    expect(errorMessage("timeout")).toBe("timeout");
    expect(errorMessage(429)).toBe("429");
  });
});
