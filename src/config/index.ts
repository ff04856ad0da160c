// Configuration loader and validator

import fs from "fs";
import path from "path";
import { homedir } from "os";
import type { ZodIssue } from "zod";
import { ConfigError } from "../utils/errors.js";
import { PartialConfigSchema, SystemConfigSchema, type SystemConfig } from "./schema.js";

const DEFAULT_BASE = path.join(homedir(), ".taskvault");
const DEFAULT_CONFIG_PATH = path.join(DEFAULT_BASE, "config.json");

export function getDefaultConfig(): SystemConfig {
  return {
    vaultRoot: path.join(DEFAULT_BASE, "vault"),
    logLevel: "info",
    logsPath: path.join(DEFAULT_BASE, "logs"),
    maxRetries: 3,
    retryCooldownMs: 60 * 60 * 1000,
    transientRetry: {
      maxRetries: 5,
      baseDelayMs: 1000,
      backoffFactor: 2,
    },
    executionTimeoutMs: 30000,
    recentActivityLimit: 10,
    failureClasses: {
      rate_limit: "transient",
      connection: "transient",
      timeout: "transient",
      rejected: "non_critical",
      not_found: "non_critical",
      auth: "critical",
      missing_credential: "critical",
      service_outage: "critical",
      disk_full: "critical",
      validation: "logic",
      logic: "logic",
    },
    errorCodeAliases: {
      ECONNRESET: "connection",
      ECONNREFUSED: "connection",
      ENOTFOUND: "connection",
      EPIPE: "connection",
      ETIMEDOUT: "timeout",
      ENOSPC: "disk_full",
      EACCES: "auth",
    },
    actions: {
      payment: { critical: true, service: "payments" },
      send_message: { critical: false, service: "messaging" },
      record_task: { critical: false, service: "vault" },
    },
  };
}

export function getConfigPath(): string {
  return process.env.TASKVAULT_CONFIG || DEFAULT_CONFIG_PATH;
}

/**
 * Load configuration.
 * Priority: env > config file > defaults. A missing file means defaults;
 * an unreadable or invalid file is a ConfigError.
 */
export function loadConfig(configPath?: string): SystemConfig {
  const filePath = configPath || getConfigPath();
  const defaults = getDefaultConfig();

  if (!fs.existsSync(filePath)) {
    return validate(applyEnvironmentVariables(defaults));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read config ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config ${filePath}`, formatIssues(parsed.error.issues));
  }

  const fileConfig = parsed.data;
  const merged = {
    ...defaults,
    ...fileConfig,
    transientRetry: { ...defaults.transientRetry, ...fileConfig.transientRetry },
    failureClasses: { ...defaults.failureClasses, ...fileConfig.failureClasses },
    errorCodeAliases: { ...defaults.errorCodeAliases, ...fileConfig.errorCodeAliases },
    actions: { ...defaults.actions, ...fileConfig.actions },
  };

  // Relative vault/log paths resolve against the config file's directory
  const baseDir = path.dirname(path.resolve(filePath));
  merged.vaultRoot = path.resolve(baseDir, merged.vaultRoot);
  if (merged.logsPath) {
    merged.logsPath = path.resolve(baseDir, merged.logsPath);
  }

  return validate(applyEnvironmentVariables(merged));
}

/**
 * Apply environment variables to config
 */
function applyEnvironmentVariables(config: unknown): unknown {
  if (typeof config !== "object" || config === null) {
    return config;
  }
  const result: Record<string, unknown> = { ...config };

  if (process.env.TASKVAULT_VAULT_ROOT) {
    result.vaultRoot = path.resolve(process.env.TASKVAULT_VAULT_ROOT);
  }

  if (process.env.TASKVAULT_LOG_LEVEL) {
    result.logLevel = process.env.TASKVAULT_LOG_LEVEL;
  }

  if (process.env.TASKVAULT_MAX_RETRIES) {
    const maxRetries = parseInt(process.env.TASKVAULT_MAX_RETRIES, 10);
    if (!isNaN(maxRetries)) {
      result.maxRetries = maxRetries;
    }
  }

  if (process.env.TASKVAULT_EXECUTION_TIMEOUT_MS) {
    const timeout = parseInt(process.env.TASKVAULT_EXECUTION_TIMEOUT_MS, 10);
    if (!isNaN(timeout)) {
      result.executionTimeoutMs = timeout;
    }
  }

  return result;
}

function validate(candidate: unknown): SystemConfig {
  const result = SystemConfigSchema.safeParse(candidate);
  if (!result.success) {
    throw new ConfigError("Invalid configuration", formatIssues(result.error.issues));
  }
  return result.data;
}

export function formatIssues(issues: ZodIssue[]): string[] {
  return issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

export { SystemConfigSchema, type SystemConfig } from "./schema.js";
