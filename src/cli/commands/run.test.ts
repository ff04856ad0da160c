/**
 * Run command tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import type { CycleReport } from "../../orchestrator/index.js";
import { ExitCode } from "../types.js";
import { formatOutput } from "../utils/output.js";
import { exitCodeFor, runCommand } from "./run.js";

function report(overrides: Partial<CycleReport> = {}): CycleReport {
  return {
    startedAt: "2026-03-02T09:00:00.000Z",
    admitted: [],
    skipped: 0,
    processed: 0,
    coolingDown: [],
    awaitingApproval: [],
    requeued: [],
    deferred: [],
    resolvedAlerts: [],
    finished: [],
    archived: [],
    errors: [],
    fatalErrors: [],
    aborted: false,
    ...overrides,
  };
}

describe("exitCodeFor", () => {
  it("is OK when only escalated errors occurred", () => {
    expect(exitCodeFor(report({ errors: ["PLAN_A: auth: denied"] }))).toBe(0);
  });

  it("signals fatal errors", () => {
    expect(exitCodeFor(report({ fatalErrors: ["PLAN_A: validation: bad payload"] }))).toBe(2);
  });
});

describe("formatOutput", () => {
  it("renders JSON with two-space indentation", () => {
    expect(formatOutput({ admitted: 1 }, "json")).toBe('{\n  "admitted": 1\n}');
  });
});

describe("runCommand", () => {
  let dir: string;
  let vaultRoot: string;
  let configPath: string;
  let logged: string[];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskvault-cli-"));
    vaultRoot = path.join(dir, "vault");
    configPath = path.join(dir, "config.json");
    fs.writeFileSync(configPath, JSON.stringify({ vaultRoot: "./vault", logsPath: "./logs" }));
    logged = [];
    vi.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      logged.push(args.map(String).join(" "));
    });
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("runs a cycle over an empty vault and prints the report", async () => {
    const code = await runCommand({ config: configPath, json: true });

    expect(code).toBe(ExitCode.OK);
    const [output] = logged;
    expect(output).toBeDefined();
    const parsed: unknown = JSON.parse(output ?? "");
    expect(parsed).toMatchObject({ admitted: [], processed: 0, fatalErrors: [], aborted: false });
    expect(fs.existsSync(path.join(vaultRoot, "dashboard.md"))).toBe(true);
    expect(fs.existsSync(path.join(vaultRoot, ".cycle.lock"))).toBe(false);
  });

  it("exits with LOCK_HELD while another live process holds the vault", async () => {
    fs.mkdirSync(vaultRoot, { recursive: true });
    fs.writeFileSync(
      path.join(vaultRoot, ".cycle.lock"),
      JSON.stringify({ pid: process.pid, startedAt: "2026-03-02T08:59:00.000Z" })
    );

    const code = await runCommand({ config: configPath, json: true });

    expect(code).toBe(ExitCode.LOCK_HELD);
    expect(logged).toEqual([]);
  });

  it("exits with STATE_STORE on an invalid configuration", async () => {
    fs.writeFileSync(configPath, JSON.stringify({ logLevel: "loud" }));

    const code = await runCommand({ config: configPath, json: true });

    expect(code).toBe(ExitCode.STATE_STORE);
    expect(console.error).toHaveBeenCalledTimes(1);
  });
});
