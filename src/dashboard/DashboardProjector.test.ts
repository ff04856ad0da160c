/**
 * DashboardProjector Unit Tests
 */

import { describe, it, expect, afterEach } from "vitest";
import fs from "fs/promises";
import os from "os";
import path from "path";
import { ApprovalGate } from "../approval/ApprovalGate.js";
import { FileApprovalPools } from "../approval/FileApprovalPools.js";
import { AuditLog } from "../audit/AuditLog.js";
import { DeferredQueue } from "../store/DeferredQueue.js";
import { StateStore } from "../store/StateStore.js";
import type { ApprovalRequest, AuditEntry, DeferredEntry, Plan, TaskSidecar } from "../types/index.js";
import {
  DashboardProjector,
  formatCooldown,
  project,
  renderDashboard,
  type DashboardSnapshot,
} from "./DashboardProjector.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");

function task(name: string, overrides: Partial<TaskSidecar> = {}): TaskSidecar {
  return {
    name,
    dedupKey: `key-${name}`,
    status: "pending",
    source: "inbox",
    domain: "personal",
    sensitive: false,
    priority: "medium",
    retryCount: 0,
    retryAfter: null,
    planRefs: [],
    category: "general",
    ruleApplied: "none",
    metadata: {},
    timestamps: { received: "2026-03-02T08:00:00.000Z", lastUpdated: "2026-03-02T08:00:00.000Z" },
    ...overrides,
  };
}

function plan(id: string, overrides: Partial<Plan> = {}): Plan {
  return {
    id,
    taskRef: "TASK_A",
    category: "payment",
    source: "business-messaging",
    sensitive: true,
    domain: "business",
    status: "open",
    ruleApplied: "none",
    crossChecks: [],
    checklist: [
      { text: "Review", done: true },
      { text: "Execute", done: false },
    ],
    originalContent: "Pay it",
    agentNotes: [],
    createdAt: "2026-03-02T08:00:00.000Z",
    updatedAt: "2026-03-02T08:00:00.000Z",
    ...overrides,
  };
}

function approval(id: string, kind: "action" | "alert"): ApprovalRequest {
  return {
    id,
    kind,
    action: "payment",
    sourceTask: "TASK_A",
    priority: "high",
    status: "pending",
    draftContent: "draft",
    riskTable: [],
    createdAt: "2026-03-02T08:00:00.000Z",
  };
}

function deferred(id: string, status: DeferredEntry["status"]): DeferredEntry {
  return {
    id,
    action: "payment",
    service: "payments",
    error: "credentials revoked",
    errorClass: "auth",
    actor: "escalation",
    payload: {
      action: "payment",
      service: "payments",
      critical: true,
      taskRef: "TASK_C",
      planRef: "PLAN_TASK_C",
      domain: "business",
      source: "business-messaging",
      priority: "high",
      content: "Pay it",
      draft: "Pay it",
      metadata: {},
    },
    queuedAt: "2026-03-02T08:00:00.000Z",
    updatedAt: "2026-03-02T08:00:00.000Z",
    status,
    alertRef: `ALERT_${id}`,
  };
}

function emptySnapshot(): DashboardSnapshot {
  return {
    activeTasks: [],
    archivedTasks: [],
    plans: [],
    approvals: { pending: [], approved: [], rejected: [] },
    deferred: [],
  };
}

describe("formatCooldown", () => {
  it("is ready without a retry time", () => {
    expect(formatCooldown(null, NOW)).toBe("ready");
  });

  it("is ready once the time has passed", () => {
    expect(formatCooldown("2026-03-02T08:59:00.000Z", NOW)).toBe("ready");
  });

  it("rounds remaining minutes up", () => {
    expect(formatCooldown("2026-03-02T09:45:00.000Z", NOW)).toBe("45m");
    expect(formatCooldown("2026-03-02T09:00:01.000Z", NOW)).toBe("1m");
  });

  it("shows hours past the first", () => {
    expect(formatCooldown("2026-03-02T10:05:00.000Z", NOW)).toBe("1h 5m");
    expect(formatCooldown("2026-03-02T11:00:00.000Z", NOW)).toBe("2h 0m");
  });
});

describe("project", () => {
  const snapshot: DashboardSnapshot = {
    activeTasks: [
      task("TASK_A", { status: "awaiting_approval" }),
      task("TASK_B", { status: "retry_queued", retryCount: 1, retryAfter: "2026-03-02T10:05:00.000Z" }),
      task("TASK_C", { status: "deferred" }),
    ],
    archivedTasks: [
      task("TASK_D", { status: "complete", timestamps: { received: "r", lastUpdated: "u", archived: "2026-03-02T08:00:00.000Z" } }),
      task("TASK_E", { status: "partial", timestamps: { received: "r", lastUpdated: "u", archived: "2026-03-02T08:30:00.000Z" } }),
      task("TASK_F", { status: "deferred", timestamps: { received: "r", lastUpdated: "u", archived: "2026-03-02T08:45:00.000Z" } }),
      task("TASK_G", {
        status: "deferred",
        dismissed: true,
        timestamps: { received: "r", lastUpdated: "u", archived: "2026-03-02T07:00:00.000Z" },
      }),
    ],
    plans: [plan("PLAN_TASK_A"), plan("PLAN_TASK_D", { status: "complete" })],
    approvals: {
      pending: [approval("ALERT_1", "alert"), approval("APPROVAL_1", "action")],
      approved: [approval("APPROVAL_2", "action")],
      rejected: [],
    },
    deferred: [deferred("DEFERRED_1", "deferred"), deferred("DEFERRED_2", "resolved")],
  };

  it("counts each bucket", () => {
    expect(project(snapshot, [], NOW).counts).toEqual({
      active: 3,
      awaitingApproval: 1,
      retryQueued: 1,
      deferred: 1,
      completed: 3,
      openAlerts: 1,
    });
  });

  it("keeps retry-queued tasks out of pending and lists them with a cooldown", () => {
    const view = project(snapshot, [], NOW);

    expect(view.pending.map((r) => r.name)).toEqual(["TASK_A", "TASK_C"]);
    expect(view.retryQueue).toEqual([
      { name: "TASK_B", retryCount: 1, retryAfter: "2026-03-02T10:05:00.000Z", cooldown: "1h 5m" },
    ]);
  });

  it("lists finished tasks newest first and skips undismissed deferrals", () => {
    const view = project(snapshot, [], NOW);

    expect(view.completed.map((r) => r.name)).toEqual(["TASK_E", "TASK_D", "TASK_G"]);
  });

  it("shows open plans with checklist progress", () => {
    expect(project(snapshot, [], NOW).plans).toEqual([
      { id: "PLAN_TASK_A", taskRef: "TASK_A", domain: "business", category: "payment", status: "open", progress: "1/2" },
    ]);
  });

  it("lists approvals by pool and only open deferred entries", () => {
    const view = project(snapshot, [], NOW);

    expect(view.approvals.map((r) => [r.id, r.pool])).toEqual([
      ["ALERT_1", "pending"],
      ["APPROVAL_1", "pending"],
      ["APPROVAL_2", "approved"],
    ]);
    expect(view.deferred.map((r) => r.id)).toEqual(["DEFERRED_1"]);
  });
});

describe("renderDashboard", () => {
  it("renders empty sections as _None_", () => {
    const markdown = renderDashboard(project(emptySnapshot(), [], NOW));

    expect(markdown.startsWith("# Dashboard\n\n_Generated 2026-03-02T09:00:00.000Z.")).toBe(true);
    expect(markdown).toContain("| 0 | 0 | 0 | 0 | 0 | 0 |");
    expect(markdown).toContain("## Pending\n\n_None_\n");
    expect(markdown.endsWith("## Recent Activity\n\n_None_\n")).toBe(true);
  });

  it("escapes pipes inside cells", () => {
    const entry: AuditEntry = {
      timestamp: "2026-03-02T08:59:00.000Z",
      actionType: "file_write",
      actor: "ingestor",
      target: "a|b",
      parameters: {},
      approvalStatus: "n_a",
      result: "success",
      error: null,
    };

    const markdown = renderDashboard(project(emptySnapshot(), [entry], NOW));

    expect(markdown).toContain("| 2026-03-02T08:59:00.000Z | file_write | a\\|b | success |");
  });
});

describe("DashboardProjector", () => {
  let root: string | undefined;

  afterEach(async () => {
    if (root) {
      await fs.rm(root, { recursive: true, force: true });
    }
  });

  it("rebuilds the dashboard file from the vault", async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "taskvault-dash-"));
    const clock = () => NOW;
    const store = new StateStore(root, { clock });
    await store.init();
    const audit = new AuditLog(store.paths.audit, { clock });
    const projector = new DashboardProjector(
      {
        store,
        deferredQueue: new DeferredQueue(store.paths.deferredQueue, { clock }),
        gate: new ApprovalGate(new FileApprovalPools(store.paths.approvals), audit, { clock }),
        audit,
      },
      { recentActivityLimit: 5, clock }
    );

    const view = await projector.rebuild();

    expect(view.counts.active).toBe(0);
    const written = await fs.readFile(store.paths.dashboard, "utf-8");
    expect(written).toBe(renderDashboard(view));
  });
});
