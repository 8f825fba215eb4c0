import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createLogger, isLogLevel } from "./logger.js";
import { generateRunId, getRunId, initRunId } from "./run-id.js";

describe("run ids", () => {
  it("prefix the date to a random suffix", () => {
    assert.match(generateRunId(new Date("2026-01-02T03:04:05Z")), /^20260102-[0-9a-f]{6}$/);
  });

  it("accept an explicit id for replays", () => {
    assert.equal(initRunId("replay-1"), "replay-1");
    assert.equal(getRunId(), "replay-1");
  });
});

describe("createLogger", () => {
  it("recognizes log levels", () => {
    assert.equal(isLogLevel("warn"), true);
    assert.equal(isLogLevel("verbose"), false);
    assert.equal(isLogLevel("toString"), false);
  });

  it("writes tagged entries above the level with merged bindings", () => {
    const dir = mkdtempSync(join(tmpdir(), "logger-"));
    try {
      initRunId("run-test");
      const logger = createLogger({
        level: "info",
        console: false,
        file: true,
        logDir: join(dir, "logs"),
        logFile: "test.log",
        bindings: { app: "engine" },
      });
      logger.debug("dropped");
      logger.child({ candidateId: "water" }).warn("scored", { n: 1 });
      logger.info("plain");

      const lines = readFileSync(join(dir, "logs", "test.log"), "utf-8").trimEnd().split("\n");
      assert.equal(lines.length, 2);
      assert.match(lines[0] ?? "", /^\[[^\]]+\] \[WARN \] \[run-test\] scored \{"app":"engine","candidateId":"water","n":1\}$/);
      assert.match(lines[1] ?? "", /^\[[^\]]+\] \[INFO \] \[run-test\] plain \{"app":"engine"\}$/);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
