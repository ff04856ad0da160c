/**
 * Escalation ladder
 *
 * Tier 1 retries transient failures in place with exponential backoff.
 * Tier 2 requeues a non-critical action as a new task after a cooldown.
 * Tier 3 preserves the full payload in the deferred queue and raises an alert.
 *
 * `nextStep` is the whole decision table; the class only performs the
 * side effects each step calls for.
 */

import type { AuditLog } from "../audit/AuditLog.js";
import type { ApprovalGate } from "../approval/ApprovalGate.js";
import type { DeferredQueue } from "../store/DeferredQueue.js";
import type { StateStore } from "../store/StateStore.js";
import type { TaskStateMachine } from "../orchestrator/TaskStateMachine.js";
import type {
  ActionPayload,
  Clock,
  DeferredEntry,
  FailureTier,
  RiskRow,
  Sleeper,
  SystemConfig,
  Task,
} from "../types/index.js";
import { compactTimestamp, retryTaskName } from "../ingestion/identity.js";
import { renderPlan } from "../planner/PlanBuilder.js";
import type { LayerLogger } from "../utils/logger.js";
import type { FailureClassifier, FailureInfo } from "./FailureClassifier.js";

const ACTOR = "escalation";

export interface LadderPolicy {
  /** Additional in-place attempts after the first (tier 1) */
  maxTransientRetries: number;
  baseDelayMs: number;
  backoffFactor: number;
  /** Cooldown requeues allowed before tier 3 (tier 2 ceiling) */
  maxRetries: number;
}

export interface LadderPosition {
  /** 1-based number of the attempt that just failed */
  attempt: number;
  critical: boolean;
  retryCount: number;
}

export type LadderStep =
  | { kind: "retry"; delayMs: number; nextAttempt: number }
  | { kind: "requeue" }
  | { kind: "degrade" };

export type LadderResult =
  | { outcome: "succeeded"; attempts: number }
  | { outcome: "requeue" | "degrade"; attempts: number; failure: FailureInfo };

export function policyFromConfig(config: Pick<SystemConfig, "transientRetry" | "maxRetries">): LadderPolicy {
  return {
    maxTransientRetries: config.transientRetry.maxRetries,
    baseDelayMs: config.transientRetry.baseDelayMs,
    backoffFactor: config.transientRetry.backoffFactor,
    maxRetries: config.maxRetries,
  };
}

/**
 * Wait before the retry that follows a failed attempt (1-based).
 */
export function backoffDelay(policy: LadderPolicy, attempt: number): number {
  return policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt - 1);
}

export function backoffSchedule(policy: LadderPolicy): number[] {
  return Array.from({ length: policy.maxTransientRetries }, (_, i) => backoffDelay(policy, i + 1));
}

/**
 * Decide what follows a failed attempt.
 */
export function nextStep(policy: LadderPolicy, position: LadderPosition, tier: FailureTier | "unknown"): LadderStep {
  switch (tier) {
    case "transient":
      if (position.attempt <= policy.maxTransientRetries) {
        return {
          kind: "retry",
          delayMs: backoffDelay(policy, position.attempt),
          nextAttempt: position.attempt + 1,
        };
      }
      return escalate(policy, position);
    case "non_critical":
      return escalate(policy, position);
    case "critical":
    case "logic":
    case "unknown":
      return { kind: "degrade" };
  }
}

function escalate(policy: LadderPolicy, position: LadderPosition): LadderStep {
  if (!position.critical && position.retryCount < policy.maxRetries) {
    return { kind: "requeue" };
  }
  return { kind: "degrade" };
}

export interface EscalationDeps {
  policy: LadderPolicy;
  retryCooldownMs: number;
  classifier: FailureClassifier;
  audit: AuditLog;
  store: StateStore;
  stateMachine: TaskStateMachine;
  deferredQueue: DeferredQueue;
  gate: ApprovalGate;
  sleep: Sleeper;
  clock?: Clock;
  logger?: LayerLogger;
}

export class EscalationLadder {
  private clock: Clock;

  constructor(private deps: EscalationDeps) {
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Run an action through tier 1. Every attempt is audited before any wait.
   */
  async attempt(
    payload: ActionPayload,
    run: (attempt: number) => Promise<void>,
    retryCount: number
  ): Promise<LadderResult> {
    const { audit, classifier, policy, logger } = this.deps;
    let attempt = 1;

    for (;;) {
      try {
        await run(attempt);
      } catch (error) {
        const failure = classifier.classify(error);
        logger?.warn(`Attempt ${attempt} of ${payload.action} failed`, {
          plan: payload.planRef,
          errorClass: failure.errorClass,
          tier: failure.tier,
          error: failure.message,
        });
        await audit.append({
          actionType: "action_attempt",
          actor: ACTOR,
          target: payload.planRef,
          parameters: { attempt, action: payload.action, service: payload.service, errorClass: failure.errorClass },
          result: "fail",
          error: failure.message,
        });

        const step = nextStep(policy, { attempt, critical: payload.critical, retryCount }, failure.tier);
        if (step.kind === "retry") {
          await this.deps.sleep(step.delayMs);
          attempt = step.nextAttempt;
          continue;
        }
        return { outcome: step.kind, attempts: attempt, failure };
      }

      await audit.append({
        actionType: "action_attempt",
        actor: ACTOR,
        target: payload.planRef,
        parameters: { attempt, action: payload.action, service: payload.service },
      });
      return { outcome: "succeeded", attempts: attempt };
    }
  }

  /**
   * Tier 2: archive the failed task and create its retry copy with a cooldown.
   * The copy keeps the plans, so finished plans and approvals carry over.
   */
  async requeue(task: Task, failure: FailureInfo): Promise<{ archived: Task; retry: Task }> {
    const { store, stateMachine, audit, logger } = this.deps;
    const now = this.clock();
    const retryCount = task.retryCount + 1;
    const retryAfter = new Date(now.getTime() + this.deps.retryCooldownMs).toISOString();

    const retry: Task = {
      ...task,
      name: retryTaskName(task.dedupKey, retryCount, now),
      status: "retry_queued",
      retryCount,
      retryAfter,
      parentTask: task.name,
      requeuedAs: undefined,
      timestamps: { received: task.timestamps.received, lastUpdated: now.toISOString() },
    };

    await store.saveTask(retry);
    await audit.append({
      actionType: "retry_queued",
      actor: ACTOR,
      target: retry.name,
      parameters: { parentTask: task.name, retryCount, retryAfter, errorClass: failure.errorClass },
      result: "fail",
      error: failure.message,
    });

    for (const planRef of task.planRefs) {
      const plan = await store.getPlan(planRef);
      if (plan) {
        const moved = {
          ...plan,
          taskRef: retry.name,
          agentNotes: [...plan.agentNotes, `Requeued as ${retry.name} until ${retryAfter} (${failure.errorClass})`],
          updatedAt: now.toISOString(),
        };
        await store.savePlan(moved, renderPlan(moved));
      }
    }

    const original = await stateMachine.transition(task, "retry_queued", ACTOR, { requeuedAs: retry.name });
    const archived = await store.archiveTask(original);
    logger?.info("Task requeued", { task: task.name, retry: retry.name, retryAfter });
    return { archived, retry };
  }

  /**
   * Tier 3: preserve the payload and raise a human-addressed alert.
   */
  async degrade(payload: ActionPayload, failure: FailureInfo): Promise<DeferredEntry> {
    const now = this.clock();
    const id = `DEFERRED_${compactTimestamp(now)}_${payload.planRef}`;
    const entry: DeferredEntry = {
      id,
      action: payload.action,
      service: payload.service,
      error: failure.message,
      errorClass: failure.errorClass,
      actor: ACTOR,
      payload,
      queuedAt: now.toISOString(),
      updatedAt: now.toISOString(),
      status: "deferred",
      alertRef: `ALERT_${id}`,
    };

    await this.deps.deferredQueue.add(entry);
    await this.auditDeferred(entry, failure);
    await this.raiseAlert(entry, failure);
    this.deps.logger?.error("Action deferred for human attention", {
      id,
      action: entry.action,
      errorClass: failure.errorClass,
    });
    return entry;
  }

  /**
   * A human-approved retry failed again: back to deferred with a fresh alert.
   */
  async redefer(entry: DeferredEntry, failure: FailureInfo): Promise<DeferredEntry> {
    const alertRef = `ALERT_${entry.id}_${compactTimestamp(this.clock())}`;
    const updated = await this.deps.deferredQueue.update(entry.id, {
      status: "deferred",
      error: failure.message,
      errorClass: failure.errorClass,
      alertRef,
    });
    await this.auditDeferred(updated, failure);
    await this.raiseAlert(updated, failure);
    return updated;
  }

  private async auditDeferred(entry: DeferredEntry, failure: FailureInfo): Promise<void> {
    await this.deps.audit.append({
      actionType: "deferred",
      actor: ACTOR,
      target: entry.id,
      parameters: {
        action: entry.action,
        service: entry.service,
        errorClass: failure.errorClass,
        tier: failure.tier,
        taskRef: entry.payload.taskRef,
        planRef: entry.payload.planRef,
      },
      result: "fail",
      error: failure.message,
    });
  }

  private async raiseAlert(entry: DeferredEntry, failure: FailureInfo): Promise<void> {
    await this.deps.gate.create({
      id: entry.alertRef,
      kind: "alert",
      action: entry.action,
      sourceTask: entry.payload.taskRef,
      planRef: entry.payload.planRef,
      deferredRef: entry.id,
      priority: "high",
      draftContent: JSON.stringify(entry.payload, null, 2),
      riskTable: alertRiskTable(entry, failure),
    });
  }
}

function alertRiskTable(entry: DeferredEntry, failure: FailureInfo): RiskRow[] {
  return [
    {
      risk: "Action not performed",
      level: entry.payload.critical ? "High" : "Medium",
      notes: `${entry.action} via ${entry.service} did not complete`,
    },
    {
      risk: "Failure",
      level: failure.tier === "transient" ? "Medium" : "High",
      notes: `${failure.errorClass}: ${failure.message.replace(/\|/g, "/")}`,
    },
    {
      risk: "Retry side effects",
      level: "Medium",
      notes: "Approving re-sends the stored payload unchanged",
    },
  ];
}
