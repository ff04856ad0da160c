/**
 * Config and table loader tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { ConfigError } from "../utils/errors.js";
import { getDefaultConfig, loadConfig } from "./index.js";
import { loadRuleTable, loadSignalTable } from "./tables.js";

const ENV_KEYS = [
  "TASKVAULT_CONFIG",
  "TASKVAULT_VAULT_ROOT",
  "TASKVAULT_LOG_LEVEL",
  "TASKVAULT_MAX_RETRIES",
  "TASKVAULT_EXECUTION_TIMEOUT_MS",
];

describe("loadConfig", () => {
  let dir: string;
  let saved: Record<string, string | undefined>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskvault-config-"));
    saved = Object.fromEntries(ENV_KEYS.map((key) => [key, process.env[key]]));
    for (const key of ENV_KEYS) {
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const file = path.join(dir, "config.json");
    fs.writeFileSync(file, typeof content === "string" ? content : JSON.stringify(content));
    return file;
  }

  it("uses defaults when the file does not exist", () => {
    const config = loadConfig(path.join(dir, "missing.json"));

    expect(config).toEqual(getDefaultConfig());
    expect(config.transientRetry).toEqual({ maxRetries: 5, baseDelayMs: 1000, backoffFactor: 2 });
    expect(config.retryCooldownMs).toBe(3600000);
  });

  it("merges the file over defaults and resolves the vault against the file", () => {
    const file = writeConfig({
      vaultRoot: "./vault",
      maxRetries: 1,
      transientRetry: { baseDelayMs: 10 },
      failureClasses: { quota: "transient" },
    });

    const config = loadConfig(file);

    expect(config.vaultRoot).toBe(path.join(dir, "vault"));
    expect(config.maxRetries).toBe(1);
    expect(config.transientRetry).toEqual({ maxRetries: 5, baseDelayMs: 10, backoffFactor: 2 });
    expect(config.failureClasses.quota).toBe("transient");
    expect(config.failureClasses.auth).toBe("critical");
  });

  it("lets environment variables win over the file", () => {
    const file = writeConfig({ maxRetries: 1, logLevel: "warn" });
    process.env.TASKVAULT_MAX_RETRIES = "7";
    process.env.TASKVAULT_LOG_LEVEL = "debug";
    process.env.TASKVAULT_VAULT_ROOT = path.join(dir, "elsewhere");

    const config = loadConfig(file);

    expect(config.maxRetries).toBe(7);
    expect(config.logLevel).toBe("debug");
    expect(config.vaultRoot).toBe(path.join(dir, "elsewhere"));
  });

  it("reads the path from TASKVAULT_CONFIG", () => {
    const file = writeConfig({ recentActivityLimit: 3 });
    process.env.TASKVAULT_CONFIG = file;

    expect(loadConfig().recentActivityLimit).toBe(3);
  });

  it("rejects malformed JSON", () => {
    const file = writeConfig("{ nope");

    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it("rejects values outside the schema", () => {
    const file = writeConfig({ failureClasses: { quota: "sometimes" } });

    expect(() => loadConfig(file)).toThrow(ConfigError);
  });

  it("rejects an invalid environment override", () => {
    process.env.TASKVAULT_LOG_LEVEL = "loud";

    expect(() => loadConfig(path.join(dir, "missing.json"))).toThrow(ConfigError);
  });
});

describe("tables", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "taskvault-tables-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled tables", () => {
    const signals = loadSignalTable();
    const rules = loadRuleTable();

    expect(signals.defaultCategory).toBe("general");
    expect(signals.categories.map((c) => c.name)).toEqual([
      "payment",
      "external-communication",
      "scheduling",
      "bug/fix",
      "documentation",
      "research",
    ]);
    expect(rules.rules.map((r) => r.id)).toEqual([
      "messaging-payment",
      "messaging-personal-money",
      "social-contact",
      "email-invoice-contract",
      "dual-domain-split",
      "urgent-escalation",
    ]);
  });

  it("fills rule action defaults", () => {
    const rule = loadRuleTable().rules.find((r) => r.id === "dual-domain-split");

    expect(rule?.then).toEqual({ split: true, forceApproval: false, crossChecks: [] });
  });

  it("rejects a table with an invalid pattern", () => {
    const file = path.join(dir, "signals.json");
    const table = { ...loadSignalTable(), monetaryPattern: "(unclosed" };
    fs.writeFileSync(file, JSON.stringify(table));

    expect(() => loadSignalTable(file)).toThrow(ConfigError);
  });

  it("rejects a rule table with duplicate ids", () => {
    const file = path.join(dir, "rules.json");
    const rule = { id: "twice", description: "d", when: {}, then: {} };
    fs.writeFileSync(file, JSON.stringify({ version: 1, rules: [rule, rule] }));

    expect(() => loadRuleTable(file)).toThrow(/duplicate rule id twice/);
  });

  it("rejects a missing table file", () => {
    expect(() => loadRuleTable(path.join(dir, "nope.json"))).toThrow(ConfigError);
  });
});
