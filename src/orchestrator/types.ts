/**
 * Orchestrator Types
 */

import type { ApprovalRequest, TaskStatus } from "../types/index.js";

/**
 * Decisions observed on the approval pools this cycle, keyed by request id.
 */
export type DecisionMap = Map<string, ApprovalRequest>;

export interface FinishedTask {
  name: string;
  status: TaskStatus;
}

/**
 * Summary of one processing cycle.
 */
export interface CycleReport {
  traceId?: string;
  startedAt: string;
  finishedAt?: string;
  admitted: string[];
  skipped: number;
  processed: number;
  /** Retry tasks skipped because their cooldown has not elapsed */
  coolingDown: string[];
  awaitingApproval: string[];
  requeued: string[];
  deferred: string[];
  resolvedAlerts: string[];
  finished: FinishedTask[];
  archived: string[];
  /** Per-task errors that were escalated and did not stop the cycle */
  errors: string[];
  /** Logic or validation errors that need a code or config fix */
  fatalErrors: string[];
  aborted: boolean;
}

export interface CycleOptions {
  /** Checked between task iterations */
  signal?: AbortSignal;
}

export function createReport(startedAt: string): CycleReport {
  return {
    startedAt,
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
  };
}
