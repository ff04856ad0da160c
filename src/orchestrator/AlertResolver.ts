/**
 * AlertResolver
 *
 * Acts on human decisions about tier-3 alerts: an approved alert re-runs
 * the stored payload, a rejected one dismisses the deferred entry.
 */

import type { AuditLog } from "../audit/AuditLog.js";
import type { DeferredQueue } from "../store/DeferredQueue.js";
import type { StateStore } from "../store/StateStore.js";
import type { EscalationLadder } from "../escalation/EscalationLadder.js";
import type { ActionExecutor } from "../execution/types.js";
import { withTimeout } from "../execution/withTimeout.js";
import { executeItem, tickItem } from "../planner/PlanBuilder.js";
import type { Clock, DeferredEntry, PlanStatus, SystemConfig } from "../types/index.js";
import type { LayerLogger } from "../utils/logger.js";
import type { TaskPipeline } from "./TaskPipeline.js";
import type { CycleReport, DecisionMap } from "./types.js";

const ACTOR = "orchestrator";

export interface AlertResolverDeps {
  config: SystemConfig;
  store: StateStore;
  audit: AuditLog;
  deferredQueue: DeferredQueue;
  ladder: EscalationLadder;
  pipeline: TaskPipeline;
  executor: ActionExecutor;
  clock: Clock;
  logger?: LayerLogger;
}

export class AlertResolver {
  constructor(private deps: AlertResolverDeps) {}

  async resolve(decisions: DecisionMap, report: CycleReport, signal?: AbortSignal): Promise<void> {
    const waiting = await this.deps.deferredQueue.listByStatus("deferred");

    for (const entry of waiting) {
      if (signal?.aborted) {
        report.aborted = true;
        return;
      }
      const decision = decisions.get(entry.alertRef);
      if (!decision) {
        continue;
      }

      await this.deps.audit.append({
        actionType: "approval_observed",
        actor: "human",
        target: decision.id,
        parameters: { deferredRef: entry.id, planRef: entry.payload.planRef },
        approvalStatus: decision.status,
      });

      if (decision.status === "rejected") {
        await this.dismiss(entry, report);
      } else if (decision.status === "approved") {
        await this.retry(entry, report);
      }
    }
  }

  private async dismiss(entry: DeferredEntry, report: CycleReport): Promise<void> {
    await this.deps.deferredQueue.update(entry.id, { status: "dismissed" });
    await this.deps.audit.append({
      actionType: "deferred_dismissed",
      actor: "human",
      target: entry.id,
      parameters: { action: entry.action, planRef: entry.payload.planRef },
      approvalStatus: "rejected",
    });
    this.deps.logger?.info("Deferred entry dismissed", { id: entry.id });
    report.resolvedAlerts.push(entry.id);
    await this.settlePlan(entry, "dismissed", `Dismissed by human (${entry.alertRef})`, report);
  }

  /**
   * Re-run the stored payload as-is; the source task is never consulted.
   */
  private async retry(entry: DeferredEntry, report: CycleReport): Promise<void> {
    const { deferredQueue, ladder, executor, config, audit } = this.deps;
    const retried = await deferredQueue.update(entry.id, { status: "retried" });
    const { payload } = retried;

    const result = await ladder.attempt(
      payload,
      () =>
        withTimeout(`${payload.action} for ${payload.planRef}`, config.executionTimeoutMs, (signal) =>
          executor.execute(payload, { signal })
        ),
      // Already past the requeue tier: any failure goes back to a human
      config.maxRetries
    );

    if (result.outcome !== "succeeded") {
      const updated = await ladder.redefer(retried, result.failure);
      report.deferred.push(updated.id);
      report.errors.push(`${entry.id}: ${result.failure.errorClass}: ${result.failure.message}`);
      return;
    }

    await deferredQueue.update(entry.id, { status: "resolved" });
    await audit.append({
      actionType: "deferred_resolved",
      actor: ACTOR,
      target: entry.id,
      parameters: { action: payload.action, attempts: result.attempts, planRef: payload.planRef },
      approvalStatus: "approved",
    });
    await audit.append({
      actionType: "action_executed",
      actor: ACTOR,
      target: payload.planRef,
      parameters: { action: payload.action, service: payload.service, attempts: result.attempts, deferredRef: entry.id },
      approvalStatus: "approved",
    });
    report.resolvedAlerts.push(entry.id);
    await this.settlePlan(entry, "complete", `Executed from deferred entry ${entry.id}`, report);
  }

  /**
   * Update the plan behind an entry and re-resolve its owning task, if still active.
   */
  private async settlePlan(entry: DeferredEntry, status: PlanStatus, note: string, report: CycleReport): Promise<void> {
    const { store, pipeline, logger } = this.deps;
    const plan = await store.getPlan(entry.payload.planRef);
    if (!plan) {
      logger?.warn("Plan for deferred entry no longer exists", { id: entry.id, plan: entry.payload.planRef });
      return;
    }

    const ticked = status === "complete" ? tickItem(plan, executeItem(plan.category), this.deps.clock) : plan;
    await pipeline.settle(ticked, status, note);

    const task = await store.getTask(plan.taskRef);
    if (!task) {
      logger?.warn("Task for deferred entry is not active", { id: entry.id, task: plan.taskRef });
      return;
    }
    const plans = await pipeline.loadPlans(task);
    await pipeline.applyResolution(task, plans.map((p) => p.status), report);
  }
}
