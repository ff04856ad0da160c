// Deduplicated admission of raw items into the State Store

import type { AuditLog } from "../audit/AuditLog.js";
import type { StateStore } from "../store/StateStore.js";
import type { Clock, IngestItem, Task } from "../types/index.js";
import type { LayerLogger } from "../utils/logger.js";
import { computeDedupKey, taskName } from "./identity.js";

export type SkipReason = "archived" | "in_flight";

export type AdmitResult =
  | { status: "accepted"; task: Task }
  | { status: "skipped"; reason: SkipReason; dedupKey: string };

const ACTOR = "ingestor";

export class Ingestor {
  constructor(
    private store: StateStore,
    private audit: AuditLog,
    private deps: { clock?: Clock; logger?: LayerLogger } = {}
  ) {}

  /**
   * Admit an item as a new pending task unless a task with the same identity
   * is archived or still in flight. Repeating a call is a no-op, never an error.
   */
  async admit(item: IngestItem): Promise<AdmitResult> {
    const dedupKey = computeDedupKey(item.source, item.content);
    const target = item.origin ?? dedupKey;

    const existing = await this.store.findDedupKey(dedupKey);
    if (existing) {
      const reason: SkipReason = existing === "archived" ? "archived" : "in_flight";
      await this.audit.append({
        actionType: "dedup_skip",
        actor: ACTOR,
        target,
        parameters: { dedupKey, reason, source: item.source },
        result: "skip",
      });
      this.deps.logger?.info("Skipped duplicate item", { target, reason });
      return { status: "skipped", reason, dedupKey };
    }

    const now = (this.deps.clock ?? (() => new Date()))();
    const received = now.toISOString();
    const task: Task = {
      name: taskName(dedupKey, now),
      dedupKey,
      status: "pending",
      source: item.source,
      domain: "personal",
      sensitive: false,
      priority: "medium",
      retryCount: 0,
      retryAfter: null,
      planRefs: [],
      category: "",
      ruleApplied: "",
      metadata: { ...item.metadata },
      timestamps: { received, lastUpdated: received },
      content: item.content,
    };

    await this.store.saveTask(task);
    await this.audit.append({
      actionType: "file_write",
      actor: ACTOR,
      target: task.name,
      parameters: { dedupKey, source: item.source, origin: item.origin ?? null },
    });
    this.deps.logger?.info("Admitted task", { task: task.name, source: item.source });
    return { status: "accepted", task };
  }
}
