/**
 * TaskStateMachine
 *
 * Owns task status changes. Each transition is validated against the table,
 * persisted, then recorded as exactly one `status_transition` audit entry.
 */

import type { AuditLog } from "../audit/AuditLog.js";
import type { StateStore } from "../store/StateStore.js";
import type { Clock, PlanStatus, Task, TaskSidecar, TaskStatus } from "../types/index.js";
import { InvalidTransitionError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";

export type TaskChanges = Partial<Omit<TaskSidecar, "name" | "status" | "timestamps" | "dedupKey">>;

const VALID_TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  pending: ["processing"],
  processing: ["awaiting_approval", "ready_to_execute"],
  awaiting_approval: ["complete", "rejected", "partial", "retry_queued", "deferred"],
  ready_to_execute: ["complete", "partial", "retry_queued", "deferred"],
  retry_queued: ["ready_to_execute"],
  deferred: ["complete", "partial"],
  complete: [],
  rejected: [],
  partial: [],
};

export function isValidTransition(from: TaskStatus, to: TaskStatus): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Terminal tasks are ready for the archive. A deferred task only becomes
 * terminal once a human dismisses it.
 */
export function isTerminal(task: Pick<TaskSidecar, "status" | "dismissed">): boolean {
  switch (task.status) {
    case "complete":
    case "rejected":
    case "partial":
      return true;
    case "deferred":
      return task.dismissed === true;
    default:
      return false;
  }
}

const FINAL_PLAN_STATUSES: readonly PlanStatus[] = ["complete", "rejected", "dismissed"];

export interface PlanResolution {
  status: TaskStatus;
  dismissed: boolean;
}

/**
 * Fold plan statuses into the owning task's status.
 * Returns null while any plan can still progress on its own.
 */
export function resolvePlanStatuses(statuses: readonly PlanStatus[]): PlanResolution | null {
  if (statuses.length === 0) {
    return null;
  }
  if (statuses.some((s) => s === "open" || s === "approved" || s === "awaiting_approval")) {
    return null;
  }
  if (statuses.some((s) => !FINAL_PLAN_STATUSES.includes(s))) {
    // Some plan sits in the deferred queue waiting on a human
    return { status: "deferred", dismissed: false };
  }
  if (statuses.every((s) => s === "complete")) {
    return { status: "complete", dismissed: false };
  }
  if (statuses.every((s) => s === "rejected")) {
    return { status: "rejected", dismissed: false };
  }
  if (statuses.every((s) => s === "dismissed")) {
    return { status: "deferred", dismissed: true };
  }
  return { status: "partial", dismissed: false };
}

export class TaskStateMachine {
  private clock: Clock;
  private logger?: LayerLogger;

  constructor(
    private store: StateStore,
    private audit: AuditLog,
    deps: { clock?: Clock; logger?: LayerLogger } = {}
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  /**
   * Move a task to a new status. Write first, then audit.
   */
  async transition(task: Task, to: TaskStatus, actor: string, changes: TaskChanges = {}): Promise<Task> {
    const from = task.status;
    if (!isValidTransition(from, to)) {
      throw new InvalidTransitionError(task.name, from, to);
    }

    const updated: Task = {
      ...task,
      ...changes,
      status: to,
      timestamps: { ...task.timestamps, lastUpdated: this.clock().toISOString() },
    };

    await this.store.saveTask(updated);
    await this.audit.statusTransition(actor, task.name, from, to);
    this.logger?.info(`${task.name}: ${from} -> ${to}`);
    return updated;
  }

  /**
   * Persist field changes that do not move the status.
   */
  async update(task: Task, changes: TaskChanges): Promise<Task> {
    const updated: Task = {
      ...task,
      ...changes,
      timestamps: { ...task.timestamps, lastUpdated: this.clock().toISOString() },
    };
    await this.store.saveTask(updated);
    return updated;
  }
}
