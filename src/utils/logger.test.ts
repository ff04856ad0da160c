/**
 * Logger Unit Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { createLogger, getTraceContext, runWithTraceAsync } from "./logger.js";

describe("Logger", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskvault-logs-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function written(): unknown[] {
    const files = fs.readdirSync(dir);
    expect(files).toHaveLength(1);
    const [file] = files;
    return fs
      .readFileSync(path.join(dir, file ?? ""), "utf-8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
  }

  it("drops entries below the configured level", () => {
    const logger = createLogger({ level: "warn", logsPath: dir, quiet: true });

    logger.debug("dropped");
    logger.info("dropped too");
    logger.warn("kept");

    expect(written()).toEqual([expect.objectContaining({ level: "warn", message: "kept" })]);
  });

  it("tags layer lines and redacts secret-looking keys", () => {
    const logger = createLogger({ logsPath: dir, quiet: true });

    logger.forLayer("audit").info("appended", { apiToken: "test-secret", target: "TASK_A" });

    expect(written()).toEqual([
      expect.objectContaining({
        layer: "audit",
        context: { apiToken: "[REDACTED]", target: "TASK_A" },
      }),
    ]);
  });

  it("carries the trace id of the surrounding cycle", async () => {
    const logger = createLogger({ logsPath: dir, quiet: true });

    const traceId = await runWithTraceAsync("cycle", async () => {
      logger.info("inside");
      return getTraceContext()?.traceId;
    });

    expect(traceId).toBeDefined();
    expect(written()).toEqual([expect.objectContaining({ message: "inside", traceId, layer: "cycle" })]);
  });
});
