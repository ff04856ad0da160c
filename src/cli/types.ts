/**
 * CLI types and interfaces
 */

/** Global CLI options */
export interface CliOptions {
  json?: boolean;
  verbose?: boolean;
  /** Path to the config file */
  config?: string;
}

/** Output format */
export type OutputFormat = "table" | "json";

/** Audit command options */
export interface AuditOptions extends CliOptions {
  /** Segment date, YYYY-MM-DD */
  date?: string;
  lines?: number;
}

/** Process exit codes for `run` */
export const ExitCode = {
  OK: 0,
  STATE_STORE: 1,
  FATAL_ERRORS: 2,
  LOCK_HELD: 3,
} as const;
