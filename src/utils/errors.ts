/**
 * Typed errors raised inside the orchestrator and by its collaborators.
 */

/**
 * Base class for all taskvault errors.
 */
export class TaskvaultError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = "TaskvaultError";
    this.code = code;
    Object.setPrototypeOf(this, TaskvaultError.prototype);
  }
}

/**
 * The State Store could not be read or written. Fatal for the cycle.
 */
export class StateStoreError extends TaskvaultError {
  public readonly filePath: string;

  constructor(message: string, filePath: string) {
    super(`${message}: ${filePath}`, "STATE_STORE");
    this.name = "StateStoreError";
    this.filePath = filePath;
    Object.setPrototypeOf(this, StateStoreError.prototype);
  }
}

/**
 * Another cycle currently holds the run lock.
 */
export class LockHeldError extends TaskvaultError {
  public readonly holder: string;

  constructor(lockPath: string, holder: string) {
    super(`Run lock held by ${holder}: ${lockPath}`, "LOCK_HELD");
    this.name = "LockHeldError";
    this.holder = holder;
    Object.setPrototypeOf(this, LockHeldError.prototype);
  }
}

/**
 * Configuration, rule table or signal table failed validation.
 */
export class ConfigError extends TaskvaultError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message, "CONFIG");
    this.name = "ConfigError";
    this.issues = issues;
    Object.setPrototypeOf(this, ConfigError.prototype);
  }
}

/**
 * A state transition outside the allowed table. Always a logic error.
 */
export class InvalidTransitionError extends TaskvaultError {
  public readonly from: string;
  public readonly to: string;

  constructor(taskName: string, from: string, to: string) {
    super(`Invalid transition for ${taskName}: ${from} -> ${to}`, "INVALID_TRANSITION");
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
    Object.setPrototypeOf(this, InvalidTransitionError.prototype);
  }
}

/**
 * Failure reported by an external collaborator. `errorClass` keys into the
 * failure-classification table (rate_limit, connection, auth, ...).
 */
export class ActionError extends TaskvaultError {
  public readonly errorClass: string;
  public readonly service?: string;

  constructor(message: string, errorClass: string, service?: string) {
    super(message, "ACTION_FAILED");
    this.name = "ActionError";
    this.errorClass = errorClass;
    this.service = service;
    Object.setPrototypeOf(this, ActionError.prototype);
  }
}

/**
 * A collaborator call exceeded the caller-supplied timeout.
 */
export class ExecutionTimeoutError extends ActionError {
  public readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`, "timeout");
    this.name = "ExecutionTimeoutError";
    this.timeoutMs = timeoutMs;
    Object.setPrototypeOf(this, ExecutionTimeoutError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
