import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createLogger, createSilentLogger } from "../../src/logging/logger.js";

describe("createLogger", () => {
  it("creates a logger with default level", () => {
    const logger = createLogger({ json: true });
    expect(logger.level).toBe("info");
  });

  it("creates a logger with custom level", () => {
    const logger = createLogger({ level: "debug", json: true });
    expect(logger.level).toBe("debug");
  });

  it("creates a child logger", () => {
    const logger = createLogger({ level: "warn", json: true });
    const child = logger.child({ component: "engine" });
    expect(child.level).toBe("warn");
  });

  it("creates a silent logger", () => {
    expect(createSilentLogger().level).toBe("silent");
  });

  describe("file destination", () => {
    let dir: string;

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), "learnloop-log-"));
    });

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("writes JSON lines to the file", () => {
      const file = join(dir, "learn.log");
      const logger = createLogger({ level: "info", file });
      logger.info({ userId: "alice" }, "cycle done");
      logger.flush();

      const [line] = readFileSync(file, "utf-8").trim().split("\n");
      const record: unknown = JSON.parse(line ?? "{}");
      expect(record).toMatchObject({ name: "learnloop", msg: "cycle done", userId: "alice" });
    });
  });
});
