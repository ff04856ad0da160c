// Dashboard projection: a pure fold over the State Store and recent audit entries

import type { AuditLog } from "../audit/AuditLog.js";
import type { ApprovalGate } from "../approval/ApprovalGate.js";
import type { ApprovalPool } from "../approval/types.js";
import type { DeferredQueue } from "../store/DeferredQueue.js";
import type { StateStore } from "../store/StateStore.js";
import { isTerminal } from "../orchestrator/TaskStateMachine.js";
import type {
  ApprovalRequest,
  AuditEntry,
  Clock,
  DeferredEntry,
  Plan,
  TaskSidecar,
  TaskStatus,
} from "../types/index.js";
import { writeFileAtomic } from "../utils/fs.js";
import type { LayerLogger } from "../utils/logger.js";

export interface DashboardSnapshot {
  activeTasks: TaskSidecar[];
  archivedTasks: TaskSidecar[];
  plans: Plan[];
  approvals: Record<ApprovalPool, ApprovalRequest[]>;
  deferred: DeferredEntry[];
}

export interface DashboardView {
  generatedAt: string;
  counts: {
    active: number;
    awaitingApproval: number;
    retryQueued: number;
    deferred: number;
    completed: number;
    openAlerts: number;
  };
  pending: Array<{ name: string; status: TaskStatus; source: string; domain: string; priority: string; received: string }>;
  approvals: Array<{ id: string; kind: string; action: string; sourceTask: string; priority: string; pool: ApprovalPool }>;
  plans: Array<{ id: string; taskRef: string; domain: string; category: string; status: string; progress: string }>;
  completed: Array<{ name: string; status: TaskStatus; archived: string }>;
  retryQueue: Array<{ name: string; retryCount: number; retryAfter: string; cooldown: string }>;
  deferred: Array<{ id: string; action: string; service: string; errorClass: string; status: string; alertRef: string; queuedAt: string }>;
  recentActivity: Array<{ timestamp: string; actionType: string; target: string; result: string }>;
}

const COMPLETED_LIMIT = 20;

/**
 * Builds the view from scratch on every call; nothing here is authoritative.
 */
export function project(snapshot: DashboardSnapshot, recent: AuditEntry[], now: Date): DashboardView {
  const active = snapshot.activeTasks;
  const finished = snapshot.archivedTasks
    .filter((t) => isTerminal(t))
    .sort((a, b) => (b.timestamps.archived ?? "").localeCompare(a.timestamps.archived ?? ""));
  const retrying = active.filter((t) => t.status === "retry_queued");
  const openDeferred = snapshot.deferred.filter((e) => e.status === "deferred" || e.status === "retried");

  return {
    generatedAt: now.toISOString(),
    counts: {
      active: active.length,
      awaitingApproval: active.filter((t) => t.status === "awaiting_approval").length,
      retryQueued: retrying.length,
      deferred: active.filter((t) => t.status === "deferred").length,
      completed: finished.length,
      openAlerts: snapshot.approvals.pending.filter((r) => r.kind === "alert").length,
    },
    pending: active
      .filter((t) => t.status !== "retry_queued")
      .map((t) => ({
        name: t.name,
        status: t.status,
        source: t.source,
        domain: t.domain,
        priority: t.priority,
        received: t.timestamps.received,
      })),
    approvals: (["pending", "approved", "rejected"] as const).flatMap((pool) =>
      snapshot.approvals[pool].map((r) => ({
        id: r.id,
        kind: r.kind,
        action: r.action,
        sourceTask: r.sourceTask,
        priority: r.priority,
        pool,
      }))
    ),
    plans: snapshot.plans
      .filter((p) => !["complete", "rejected", "dismissed"].includes(p.status))
      .map((p) => ({
        id: p.id,
        taskRef: p.taskRef,
        domain: p.domain,
        category: p.category,
        status: p.status,
        progress: `${p.checklist.filter((i) => i.done).length}/${p.checklist.length}`,
      })),
    completed: finished.slice(0, COMPLETED_LIMIT).map((t) => ({
      name: t.name,
      status: t.status,
      archived: t.timestamps.archived ?? "",
    })),
    retryQueue: retrying.map((t) => ({
      name: t.name,
      retryCount: t.retryCount,
      retryAfter: t.retryAfter ?? "",
      cooldown: formatCooldown(t.retryAfter, now),
    })),
    deferred: openDeferred.map((e) => ({
      id: e.id,
      action: e.action,
      service: e.service,
      errorClass: e.errorClass,
      status: e.status,
      alertRef: e.alertRef,
      queuedAt: e.queuedAt,
    })),
    recentActivity: recent.map((e) => ({
      timestamp: e.timestamp,
      actionType: e.actionType,
      target: e.target,
      result: e.result,
    })),
  };
}

/**
 * Remaining cooldown, e.g. "45m" or "1h 5m"; "ready" once elapsed.
 */
export function formatCooldown(retryAfter: string | null, now: Date): string {
  if (!retryAfter) {
    return "ready";
  }
  const remainingMs = new Date(retryAfter).getTime() - now.getTime();
  if (remainingMs <= 0) {
    return "ready";
  }
  const minutes = Math.ceil(remainingMs / 60000);
  const hours = Math.floor(minutes / 60);
  return hours > 0 ? `${hours}h ${minutes % 60}m` : `${minutes}m`;
}

function table(headers: string[], rows: string[][]): string[] {
  if (rows.length === 0) {
    return ["_None_"];
  }
  const escape = (cell: string): string => cell.replace(/\|/g, "\\|").replace(/\n/g, " ");
  return [
    `| ${headers.join(" | ")} |`,
    `|${headers.map(() => "---").join("|")}|`,
    ...rows.map((row) => `| ${row.map(escape).join(" | ")} |`),
  ];
}

export function renderDashboard(view: DashboardView): string {
  const { counts } = view;
  const lines = [
    "# Dashboard",
    "",
    `_Generated ${view.generatedAt}. Rebuilt every cycle; edits are overwritten._`,
    "",
    "## Summary",
    "",
    ...table(
      ["Active", "Awaiting approval", "Retry queued", "Deferred", "Completed", "Open alerts"],
      [[counts.active, counts.awaitingApproval, counts.retryQueued, counts.deferred, counts.completed, counts.openAlerts].map(String)]
    ),
    "",
    "## Pending",
    "",
    ...table(
      ["Task", "Status", "Source", "Domain", "Priority", "Received"],
      view.pending.map((r) => [r.name, r.status, r.source, r.domain, r.priority, r.received])
    ),
    "",
    "## Approvals",
    "",
    ...table(
      ["ID", "Kind", "Action", "Task", "Priority", "Pool"],
      view.approvals.map((r) => [r.id, r.kind, r.action, r.sourceTask, r.priority, r.pool])
    ),
    "",
    "## Plans",
    "",
    ...table(
      ["Plan", "Task", "Domain", "Category", "Status", "Progress"],
      view.plans.map((r) => [r.id, r.taskRef, r.domain, r.category, r.status, r.progress])
    ),
    "",
    "## Retry Queue",
    "",
    ...table(
      ["Task", "Retries", "Retry after", "Cooldown"],
      view.retryQueue.map((r) => [r.name, String(r.retryCount), r.retryAfter, r.cooldown])
    ),
    "",
    "## Deferred",
    "",
    ...table(
      ["Entry", "Action", "Service", "Error class", "Status", "Alert"],
      view.deferred.map((r) => [r.id, r.action, r.service, r.errorClass, r.status, r.alertRef])
    ),
    "",
    "## Completed",
    "",
    ...table(
      ["Task", "Status", "Archived"],
      view.completed.map((r) => [r.name, r.status, r.archived])
    ),
    "",
    "## Recent Activity",
    "",
    ...table(
      ["Time", "Action", "Target", "Result"],
      view.recentActivity.map((r) => [r.timestamp, r.actionType, r.target, r.result])
    ),
  ];
  return lines.join("\n") + "\n";
}

export class DashboardProjector {
  constructor(
    private sources: {
      store: StateStore;
      deferredQueue: DeferredQueue;
      gate: ApprovalGate;
      audit: AuditLog;
    },
    private options: { recentActivityLimit: number; clock?: Clock; logger?: LayerLogger }
  ) {}

  async snapshot(): Promise<DashboardSnapshot> {
    const { store, deferredQueue, gate } = this.sources;
    return {
      activeTasks: await store.listActiveTasks(),
      archivedTasks: await store.listArchivedTasks(),
      plans: await store.listPlans(),
      approvals: {
        pending: await gate.list("pending"),
        approved: await gate.list("approved"),
        rejected: await gate.list("rejected"),
      },
      deferred: await deferredQueue.list(),
    };
  }

  async build(): Promise<DashboardView> {
    const now = (this.options.clock ?? (() => new Date()))();
    const recent = await this.sources.audit.recent(this.options.recentActivityLimit);
    return project(await this.snapshot(), recent, now);
  }

  /**
   * Rebuild the view and overwrite the dashboard file.
   */
  async rebuild(): Promise<DashboardView> {
    const view = await this.build();
    await writeFileAtomic(this.sources.store.paths.dashboard, renderDashboard(view));
    this.options.logger?.debug("Dashboard rebuilt", { ...view.counts });
    return view;
  }
}
