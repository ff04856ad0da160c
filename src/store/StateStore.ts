// File-backed State Store for tasks and plans

import path from "path";
import fs from "fs/promises";
import { PlanSchema, TaskSidecarSchema } from "../types/schemas.js";
import type { Clock, Plan, Task, TaskSidecar } from "../types/index.js";
import {
  listDir,
  readJsonDocument,
  readTextIfExists,
  removeIfExists,
  writeFileAtomic,
  writeJsonAtomic,
} from "../utils/fs.js";
import { StateStoreError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";

const SIDECAR_SUFFIX = ".meta.json";
const CONTENT_SUFFIX = ".md";

export interface VaultPaths {
  root: string;
  inbox: string;
  needsAction: string;
  done: string;
  plans: string;
  approvals: {
    pending: string;
    approved: string;
    rejected: string;
  };
  deferredQueue: string;
  audit: string;
  dashboard: string;
  lock: string;
}

export function resolveVaultPaths(root: string): VaultPaths {
  const approvalsRoot = path.join(root, "approvals");
  return {
    root,
    inbox: path.join(root, "inbox"),
    needsAction: path.join(root, "needs_action"),
    done: path.join(root, "done"),
    plans: path.join(root, "plans"),
    approvals: {
      pending: path.join(approvalsRoot, "pending"),
      approved: path.join(approvalsRoot, "approved"),
      rejected: path.join(approvalsRoot, "rejected"),
    },
    deferredQueue: path.join(root, "deferred_queue.json"),
    audit: path.join(root, "audit"),
    dashboard: path.join(root, "dashboard.md"),
    lock: path.join(root, ".cycle.lock"),
  };
}

export type DedupLocation = "active" | "archived";

/**
 * Tasks live as two co-located artifacts: `<name>.md` holds the raw content
 * and `<name>.meta.json` the sidecar. The sidecar is written last, so a task
 * exists only once its sidecar does.
 */
export class StateStore {
  readonly paths: VaultPaths;
  private clock: Clock;
  private logger?: LayerLogger;

  constructor(vaultRoot: string, deps: { clock?: Clock; logger?: LayerLogger } = {}) {
    this.paths = resolveVaultPaths(vaultRoot);
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  /**
   * Create the vault directory layout.
   */
  async init(): Promise<void> {
    const dirs = [
      this.paths.inbox,
      this.paths.needsAction,
      this.paths.done,
      this.paths.plans,
      this.paths.approvals.pending,
      this.paths.approvals.approved,
      this.paths.approvals.rejected,
      this.paths.audit,
    ];
    try {
      for (const dir of dirs) {
        await fs.mkdir(dir, { recursive: true });
      }
    } catch (error) {
      throw new StateStoreError(
        `Failed to initialize vault (${error instanceof Error ? error.message : String(error)})`,
        this.paths.root
      );
    }
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /**
   * Active tasks, oldest first.
   */
  async listActiveTasks(): Promise<Task[]> {
    const tasks: Task[] = [];
    for (const name of await this.sidecarNames(this.paths.needsAction)) {
      const task = await this.readTask(this.paths.needsAction, name);
      if (task) {
        tasks.push(task);
      }
    }
    return tasks.sort(byReceived);
  }

  async listArchivedTasks(): Promise<TaskSidecar[]> {
    const sidecars: TaskSidecar[] = [];
    for (const name of await this.sidecarNames(this.paths.done)) {
      const sidecar = await readJsonDocument(this.sidecarPath(this.paths.done, name), TaskSidecarSchema);
      if (sidecar) {
        sidecars.push(sidecar);
      }
    }
    return sidecars.sort(byReceived);
  }

  async getTask(name: string): Promise<Task | null> {
    return this.readTask(this.paths.needsAction, name);
  }

  /**
   * Persist an active task: content first, then the sidecar.
   */
  async saveTask(task: Task): Promise<void> {
    const { content, ...sidecar } = task;
    await writeFileAtomic(this.contentPath(this.paths.needsAction, task.name), content);
    await writeJsonAtomic(this.sidecarPath(this.paths.needsAction, task.name), sidecar);
  }

  /**
   * Move a task to the archive. The archived copy is complete before the
   * active copy is removed, so a crash in between leaves a duplicate, never a loss.
   */
  async archiveTask(task: Task): Promise<Task> {
    const archived: Task = {
      ...task,
      timestamps: { ...task.timestamps, archived: this.clock().toISOString() },
    };
    const { content, ...sidecar } = archived;

    await writeFileAtomic(this.contentPath(this.paths.done, task.name), content);
    await writeJsonAtomic(this.sidecarPath(this.paths.done, task.name), sidecar);
    await removeIfExists(this.sidecarPath(this.paths.needsAction, task.name));
    await removeIfExists(this.contentPath(this.paths.needsAction, task.name));

    this.logger?.debug("Task archived", { task: task.name, status: task.status });
    return archived;
  }

  /**
   * Where a task with this identity already lives, if anywhere.
   */
  async findDedupKey(dedupKey: string): Promise<DedupLocation | null> {
    const archived = await this.listArchivedTasks();
    if (archived.some((t) => t.dedupKey === dedupKey)) {
      return "archived";
    }
    const active = await this.listActiveTasks();
    if (active.some((t) => t.dedupKey === dedupKey)) {
      return "active";
    }
    return null;
  }

  // ==========================================================================
  // Plans
  // ==========================================================================

  /**
   * Write a plan document and its rendered markdown companion.
   */
  async savePlan(plan: Plan, rendered: string): Promise<void> {
    await writeJsonAtomic(path.join(this.paths.plans, `${plan.id}.json`), plan);
    await writeFileAtomic(path.join(this.paths.plans, `${plan.id}.md`), rendered);
  }

  async getPlan(id: string): Promise<Plan | null> {
    return readJsonDocument(path.join(this.paths.plans, `${id}.json`), PlanSchema);
  }

  async listPlans(): Promise<Plan[]> {
    const plans: Plan[] = [];
    const files = (await listDir(this.paths.plans)).filter((f) => f.endsWith(".json"));
    for (const file of files) {
      const plan = await readJsonDocument(path.join(this.paths.plans, file), PlanSchema);
      if (plan) {
        plans.push(plan);
      }
    }
    return plans;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async readTask(dir: string, name: string): Promise<Task | null> {
    const sidecar = await readJsonDocument(this.sidecarPath(dir, name), TaskSidecarSchema);
    if (!sidecar) {
      return null;
    }
    const contentPath = this.contentPath(dir, name);
    const content = await readTextIfExists(contentPath);
    if (content === null) {
      throw new StateStoreError("Task content artifact missing", contentPath);
    }
    return { ...sidecar, content };
  }

  private async sidecarNames(dir: string): Promise<string[]> {
    const files = await listDir(dir);
    return files.filter((f) => f.endsWith(SIDECAR_SUFFIX)).map((f) => f.slice(0, -SIDECAR_SUFFIX.length));
  }

  private sidecarPath(dir: string, name: string): string {
    return path.join(dir, `${name}${SIDECAR_SUFFIX}`);
  }

  private contentPath(dir: string, name: string): string {
    return path.join(dir, `${name}${CONTENT_SUFFIX}`);
  }
}

function byReceived(a: TaskSidecar, b: TaskSidecar): number {
  if (a.timestamps.received !== b.timestamps.received) {
    return a.timestamps.received < b.timestamps.received ? -1 : 1;
  }
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}
