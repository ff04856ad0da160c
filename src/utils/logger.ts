// Logger with service-layer tagging and per-cycle trace context

import fs from "fs";
import path from "path";
import { AsyncLocalStorage } from "async_hooks";
import type { LogEntry, LogLevel, ServiceLayer, TraceContext } from "../types/index.js";

/**
 * Generate a short unique ID for trace/span identification.
 */
function generateId(): string {
  return Math.random().toString(36).substring(2, 10) + Date.now().toString(36);
}

const traceStorage = new AsyncLocalStorage<TraceContext>();

export function getTraceContext(): TraceContext | undefined {
  return traceStorage.getStore();
}

/**
 * Run an async function within a trace context.
 * A nested call keeps the parent's trace id and opens a child span.
 */
export async function runWithTraceAsync<T>(
  layer: ServiceLayer,
  fn: () => Promise<T>
): Promise<T> {
  const parentContext = getTraceContext();
  const context: TraceContext = {
    traceId: parentContext?.traceId ?? generateId(),
    spanId: generateId(),
    parentSpanId: parentContext?.spanId,
    layer,
    startTime: Date.now(),
  };

  return traceStorage.run(context, fn);
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m",
  info: "\x1b[32m",
  warn: "\x1b[33m",
  error: "\x1b[31m",
};

const LAYER_COLORS: Record<ServiceLayer, string> = {
  cycle: "\x1b[34m",
  ingestion: "\x1b[96m",
  classifier: "\x1b[33m",
  rules: "\x1b[33m",
  planner: "\x1b[93m",
  state: "\x1b[94m",
  approval: "\x1b[91m",
  escalation: "\x1b[35m",
  execution: "\x1b[36m",
  audit: "\x1b[90m",
  dashboard: "\x1b[32m",
  config: "\x1b[90m",
  cli: "\x1b[95m",
};

export interface LoggerOptions {
  /** Directory for the JSON-lines log file; console only when omitted */
  logsPath?: string;
  level?: LogLevel;
  /** Suppress console output (file output still applies) */
  quiet?: boolean;
}

export class Logger {
  private logFile: string | null = null;
  private readonly minLevel: LogLevel;
  private quiet: boolean;
  private fileErrorLogged = false;
  private defaultLayer?: ServiceLayer;

  constructor(options: LoggerOptions = {}, defaultLayer?: ServiceLayer) {
    this.defaultLayer = defaultLayer;
    this.minLevel = options.level ?? "info";
    this.quiet = options.quiet ?? false;
    if (options.logsPath) {
      const date = new Date().toISOString().split("T")[0];
      this.logFile = path.join(options.logsPath, `taskvault-${date}.log`);
    }
  }

  /**
   * Create a child logger bound to a specific service layer.
   */
  forLayer(layer: ServiceLayer): LayerLogger {
    return new LayerLogger(this, layer);
  }

  log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    layer?: ServiceLayer
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const traceCtx = getTraceContext();
    const effectiveLayer = layer ?? this.defaultLayer ?? traceCtx?.layer;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context: context ? toRecord(sanitizeForLog(context)) : undefined,
      layer: effectiveLayer,
      traceId: traceCtx?.traceId,
      spanId: traceCtx?.spanId,
      parentSpanId: traceCtx?.parentSpanId,
    };

    if (!this.quiet) {
      const reset = "\x1b[0m";
      const dim = "\x1b[2m";
      const levelPrefix = `${LEVEL_COLORS[level]}[${level.toUpperCase().padEnd(5)}]${reset}`;
      const layerPrefix = effectiveLayer
        ? `${LAYER_COLORS[effectiveLayer]}[${effectiveLayer.toUpperCase().padEnd(10)}]${reset}`
        : "[          ]";
      const tracePrefix = traceCtx ? `${dim}[${traceCtx.traceId.substring(0, 8)}]${reset} ` : "";
      const line = `${levelPrefix} ${layerPrefix} ${tracePrefix}${message}`;

      if (level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    }

    if (this.logFile) {
      try {
        fs.mkdirSync(path.dirname(this.logFile), { recursive: true });
        fs.appendFileSync(this.logFile, JSON.stringify(entry) + "\n");
      } catch (err) {
        if (!this.fileErrorLogged) {
          console.error(`[LOGGER ERROR] Failed to write to log file: ${this.logFile}`, err);
          this.fileErrorLogged = true;
        }
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("debug", message, context, layer);
  }

  info(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("info", message, context, layer);
  }

  warn(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("warn", message, context, layer);
  }

  error(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("error", message, context, layer);
  }
}

/**
 * Layer-specific logger that tags every line with a service layer.
 */
export class LayerLogger {
  constructor(
    private parent: Logger,
    private layer: ServiceLayer
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, context, this.layer);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, context, this.layer);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, context, this.layer);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, context, this.layer);
  }

  /**
   * Log an operation failure with error details and duration.
   */
  logError(operation: string, error: unknown, startTime?: number): void {
    const durationMs = startTime ? Date.now() - startTime : undefined;
    this.error(`✗ ${operation} failed${durationMs ? ` (${durationMs}ms)` : ""}`, {
      error: error instanceof Error ? { name: error.name, message: error.message } : error,
      durationMs,
    });
  }
}

function toRecord(value: unknown): Record<string, unknown> {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return { value };
}

/**
 * Truncate large values and redact secret-looking keys before logging.
 */
export function sanitizeForLog(data: unknown, maxDepth = 3, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]";
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === "string") {
    return data.length > 500 ? data.substring(0, 500) + "...[truncated]" : data;
  }

  if (typeof data !== "object") {
    return data;
  }

  if (Array.isArray(data)) {
    const items = data.slice(0, 10).map((item) => sanitizeForLog(item, maxDepth, currentDepth + 1));
    return data.length > 10 ? [...items, `...[${data.length - 10} more]`] : items;
  }

  const sensitiveKeys = ["password", "token", "secret", "apikey", "api_key", "authorization", "credential"];
  const entries = Object.entries(data);
  const sanitized: Record<string, unknown> = {};

  for (const [key, value] of entries.slice(0, 20)) {
    sanitized[key] = sensitiveKeys.some((sk) => key.toLowerCase().includes(sk))
      ? "[REDACTED]"
      : sanitizeForLog(value, maxDepth, currentDepth + 1);
  }
  if (entries.length > 20) {
    sanitized["..."] = `[${entries.length - 20} more keys]`;
  }

  return sanitized;
}

export function createLogger(options?: LoggerOptions, defaultLayer?: ServiceLayer): Logger {
  return new Logger(options, defaultLayer);
}
