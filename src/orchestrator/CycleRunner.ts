/**
 * CycleRunner
 *
 * One full pass over the vault under the run lock:
 * ingest -> poll approvals -> process tasks -> resolve alerts -> archive -> project.
 * Abort is honoured between task iterations; each task's state changes are
 * write-then-audit, so stopping early never leaves a half-applied transition.
 */

import type { AuditLog } from "../audit/AuditLog.js";
import type { ApprovalGate } from "../approval/ApprovalGate.js";
import type { DashboardProjector } from "../dashboard/DashboardProjector.js";
import type { FailureClassifier } from "../escalation/FailureClassifier.js";
import type { Ingestor } from "../ingestion/Ingestor.js";
import type { InboxItem } from "../ingestion/InboxReader.js";
import { CHECKLIST, renderPlan, tickItem } from "../planner/PlanBuilder.js";
import type { RunLock } from "../store/RunLock.js";
import type { StateStore } from "../store/StateStore.js";
import type { Clock } from "../types/index.js";
import { StateStoreError } from "../utils/errors.js";
import { getTraceContext, runWithTraceAsync, type LayerLogger } from "../utils/logger.js";
import type { AlertResolver } from "./AlertResolver.js";
import type { TaskPipeline } from "./TaskPipeline.js";
import { isTerminal } from "./TaskStateMachine.js";
import { createReport, type CycleOptions, type CycleReport, type DecisionMap } from "./types.js";

const ACTOR = "orchestrator";

/**
 * Source of raw items for ingestion; the vault inbox by default.
 */
export interface ItemSource {
  read(): Promise<InboxItem[]>;
  acknowledge(item: InboxItem): Promise<void>;
}

export interface CycleRunnerDeps {
  lock: RunLock;
  store: StateStore;
  audit: AuditLog;
  items: ItemSource;
  ingestor: Ingestor;
  gate: ApprovalGate;
  pipeline: TaskPipeline;
  alerts: AlertResolver;
  projector: DashboardProjector;
  failures: FailureClassifier;
  clock: Clock;
  logger?: LayerLogger;
}

export class CycleRunner {
  constructor(private deps: CycleRunnerDeps) {}

  /**
   * Run exactly one cycle. Throws LockHeldError when another cycle holds the
   * lock and StateStoreError when the vault cannot be read or written.
   */
  async run(options: CycleOptions = {}): Promise<CycleReport> {
    const { lock } = this.deps;
    await lock.acquire();
    try {
      return await runWithTraceAsync("cycle", () => this.runLocked(options.signal));
    } finally {
      await lock.release();
    }
  }

  private async runLocked(signal?: AbortSignal): Promise<CycleReport> {
    const { store, audit, logger, clock } = this.deps;
    const report = createReport(clock().toISOString());
    report.traceId = getTraceContext()?.traceId;

    await store.init();
    await audit.append({ actionType: "cycle_start", actor: ACTOR, target: "cycle", parameters: { traceId: report.traceId } });
    logger?.info("Cycle started");

    await this.ingest(report, signal);

    if (!report.aborted) {
      const decisions = await this.pollDecisions();
      await this.processTasks(decisions, report, signal);
      if (!report.aborted) {
        await this.deps.alerts.resolve(decisions, report, signal);
      }
    }

    if (!report.aborted) {
      await this.archiveTerminal(report);
      await this.deps.projector.rebuild();
    }

    report.finishedAt = clock().toISOString();
    await audit.append({
      actionType: "cycle_end",
      actor: ACTOR,
      target: "cycle",
      parameters: {
        admitted: report.admitted.length,
        skipped: report.skipped,
        processed: report.processed,
        archived: report.archived.length,
        errors: report.errors.length,
        fatalErrors: report.fatalErrors.length,
        aborted: report.aborted,
      },
      result: report.fatalErrors.length > 0 ? "fail" : "success",
    });
    logger?.info("Cycle finished", {
      admitted: report.admitted.length,
      processed: report.processed,
      archived: report.archived.length,
      fatalErrors: report.fatalErrors.length,
      aborted: report.aborted,
    });
    return report;
  }

  private async ingest(report: CycleReport, signal?: AbortSignal): Promise<void> {
    const { items, ingestor } = this.deps;
    for (const item of await items.read()) {
      if (signal?.aborted) {
        report.aborted = true;
        return;
      }
      const result = await ingestor.admit(item);
      if (result.status === "accepted") {
        report.admitted.push(result.task.name);
      } else {
        report.skipped++;
      }
      await items.acknowledge(item);
    }
  }

  private async pollDecisions(): Promise<DecisionMap> {
    const { approved, rejected } = await this.deps.gate.poll();
    const decisions: DecisionMap = new Map();
    for (const request of [...approved, ...rejected]) {
      decisions.set(request.id, request);
    }
    return decisions;
  }

  private async processTasks(decisions: DecisionMap, report: CycleReport, signal?: AbortSignal): Promise<void> {
    const { store, pipeline, failures, audit, logger } = this.deps;
    const tasks = await store.listActiveTasks();

    for (const task of tasks) {
      if (signal?.aborted) {
        report.aborted = true;
        logger?.warn("Cycle aborted between tasks", { next: task.name });
        return;
      }
      try {
        await pipeline.process(task, decisions, report);
        report.processed++;
      } catch (error) {
        if (error instanceof StateStoreError) {
          throw error;
        }
        const failure = failures.classify(error);
        logger?.logError(`processing ${task.name}`, error);
        await audit.append({
          actionType: "error",
          actor: ACTOR,
          target: task.name,
          parameters: { errorClass: failure.errorClass, tier: failure.tier },
          result: "fail",
          error: failure.message,
        });
        const line = `${task.name}: ${failure.errorClass}: ${failure.message}`;
        if (failure.tier === "logic") {
          report.fatalErrors.push(line);
        } else {
          report.errors.push(line);
        }
      }
    }
  }

  private async archiveTerminal(report: CycleReport): Promise<void> {
    const { store, audit, clock } = this.deps;
    for (const task of await store.listActiveTasks()) {
      if (!isTerminal(task)) {
        continue;
      }
      for (const ref of task.planRefs) {
        const plan = await store.getPlan(ref);
        if (plan) {
          const ticked = tickItem(plan, CHECKLIST.archive, clock);
          if (ticked !== plan) {
            await store.savePlan(ticked, renderPlan(ticked));
          }
        }
      }
      await store.archiveTask(task);
      await audit.append({
        actionType: "archive",
        actor: ACTOR,
        target: task.name,
        parameters: { status: task.status, dismissed: task.dismissed ?? false },
      });
      report.archived.push(task.name);
    }
  }
}
