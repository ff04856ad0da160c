// External collaborators the orchestrator hands work to

import type { ActionPayload, CrossCheckKind, Plan, Task } from "../types/index.js";

export interface CallOptions {
  /** Aborted when the caller's timeout elapses */
  signal: AbortSignal;
}

/**
 * Performs the externally visible action (send, post, pay, ...).
 * Failures should be thrown as ActionError with an errorClass the
 * failure-classification table knows.
 */
export interface ActionExecutor {
  execute(payload: ActionPayload, options: CallOptions): Promise<void>;
}

export interface CrossCheckResult {
  ok: boolean;
  detail: string;
}

/**
 * Read-only lookups against an external ledger (invoices, balances, contacts).
 */
export interface LedgerClient {
  check(kind: CrossCheckKind, task: Task, options: CallOptions): Promise<CrossCheckResult>;
}

/**
 * Drafts the outgoing content placed in approval requests and payloads.
 */
export interface ContentDrafter {
  draft(task: Task, plan: Plan, options: CallOptions): Promise<string>;
}
