/**
 * TaskPipeline
 *
 * Moves one task as far as it can go in a cycle: classification and routing
 * for new tasks, cooldown checks for retries, then approval observation and
 * execution of each plan.
 */

import type { AuditLog } from "../audit/AuditLog.js";
import type { ApprovalGate } from "../approval/ApprovalGate.js";
import type { DomainClassifier } from "../classifier/DomainClassifier.js";
import type { RuleEngine } from "../rules/RuleEngine.js";
import {
  CHECKLIST,
  executeItem,
  renderPlan,
  tickItem,
  type CrossCheckOutcome,
  type PlanBuilder,
} from "../planner/PlanBuilder.js";
import type { StateStore } from "../store/StateStore.js";
import type { EscalationLadder } from "../escalation/EscalationLadder.js";
import { nextStep, policyFromConfig } from "../escalation/EscalationLadder.js";
import type { FailureClassifier, FailureInfo } from "../escalation/FailureClassifier.js";
import type { ActionExecutor, ContentDrafter, LedgerClient } from "../execution/types.js";
import { withTimeout } from "../execution/withTimeout.js";
import { actionForCategory, buildActionPayload } from "../execution/payload.js";
import type {
  ActionSpec,
  ApprovalRequest,
  Clock,
  CrossCheckKind,
  Plan,
  PlanStatus,
  RiskRow,
  Sleeper,
  SystemConfig,
  Task,
} from "../types/index.js";
import { StateStoreError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";
import { resolvePlanStatuses, type TaskStateMachine } from "./TaskStateMachine.js";
import type { CycleReport, DecisionMap } from "./types.js";

const ACTOR = "orchestrator";

export interface PipelineDeps {
  config: SystemConfig;
  store: StateStore;
  audit: AuditLog;
  gate: ApprovalGate;
  classifier: DomainClassifier;
  rules: RuleEngine;
  planner: PlanBuilder;
  stateMachine: TaskStateMachine;
  ladder: EscalationLadder;
  failures: FailureClassifier;
  executor: ActionExecutor;
  ledger?: LedgerClient;
  drafter?: ContentDrafter;
  sleep: Sleeper;
  clock: Clock;
  logger?: LayerLogger;
}

type PlanRun =
  | { kind: "done"; plan: Plan }
  | { kind: "requeue"; plan: Plan; failure: FailureInfo };

export class TaskPipeline {
  constructor(private deps: PipelineDeps) {}

  async process(task: Task, decisions: DecisionMap, report: CycleReport): Promise<void> {
    let current = task;

    // A task still in processing was interrupted mid-route; routing is
    // deterministic and its writes are keyed by id, so it is redone
    if (current.status === "pending" || current.status === "processing") {
      current = await this.route(current);
    }

    if (current.status === "retry_queued") {
      const now = this.deps.clock();
      if (current.retryAfter && now.getTime() < new Date(current.retryAfter).getTime()) {
        this.deps.logger?.debug("Retry still cooling down", { task: current.name, retryAfter: current.retryAfter });
        report.coolingDown.push(current.name);
        return;
      }
      current = await this.deps.stateMachine.transition(current, "ready_to_execute", ACTOR);
    }

    if (current.status === "awaiting_approval" || current.status === "ready_to_execute") {
      current = await this.advance(current, decisions, report);
    }

    if (current.status === "awaiting_approval") {
      report.awaitingApproval.push(current.name);
    }
  }

  // ==========================================================================
  // Routing: pending -> processing -> awaiting_approval | ready_to_execute
  // ==========================================================================

  private async route(task: Task): Promise<Task> {
    const { stateMachine, classifier, rules, planner, store, audit, logger } = this.deps;
    let processing = task;
    if (task.status === "processing") {
      logger?.warn("Resuming interrupted routing", { task: task.name });
    } else {
      processing = await stateMachine.transition(task, "processing", ACTOR);
    }

    const classification = classifier.classify(task.content, task.source, task.metadata);
    const decision = rules.evaluate({
      text: classifier.inspectedText(task.content, task.metadata),
      classification,
    });
    await audit.append({
      actionType: "classification",
      actor: "classifier",
      target: task.name,
      parameters: {
        domain: decision.domain,
        sensitive: classification.sensitive,
        category: classification.category,
        ruleApplied: decision.ruleApplied,
        priority: decision.priority,
      },
    });
    logger?.info("Task classified", { task: task.name, domain: decision.domain, rule: decision.ruleApplied });

    const crossChecks: CrossCheckOutcome[] = [];
    for (const kind of decision.crossChecks) {
      crossChecks.push(await this.crossCheck(processing, kind));
    }
    const requiresApproval =
      classification.sensitive || decision.forceApproval || crossChecks.some((c) => !c.ok);

    const routed: Task = {
      ...processing,
      domain: decision.domain,
      sensitive: requiresApproval,
      priority: decision.priority,
      category: classification.category,
      ruleApplied: decision.ruleApplied,
    };

    const plans = planner.build({ task: routed, classification, decision, crossChecks, requiresApproval });
    const planRefs: string[] = [];
    for (const built of plans) {
      let plan = built;
      if (requiresApproval) {
        plan = { ...plan, approvalRef: `APPROVAL_${plan.id}` };
      }
      await this.savePlan(plan);
      await audit.append({
        actionType: "plan_created",
        actor: "planner",
        target: plan.id,
        parameters: { taskRef: task.name, domain: plan.domain, category: plan.category, status: plan.status },
      });
      if (requiresApproval) {
        await this.requestApproval(routed, plan);
      }
      planRefs.push(plan.id);
    }

    return stateMachine.transition(processing, requiresApproval ? "awaiting_approval" : "ready_to_execute", ACTOR, {
      domain: routed.domain,
      sensitive: routed.sensitive,
      priority: routed.priority,
      category: routed.category,
      ruleApplied: routed.ruleApplied,
      planRefs,
    });
  }

  private async requestApproval(task: Task, plan: Plan): Promise<void> {
    const draft = await this.draft(task, plan);
    const action = actionForCategory(plan.category);
    await this.deps.gate.create({
      id: plan.approvalRef ?? `APPROVAL_${plan.id}`,
      kind: "action",
      action,
      sourceTask: task.name,
      planRef: plan.id,
      priority: task.priority,
      draftContent: draft,
      riskTable: [
        {
          risk: "External side effect",
          level: this.specFor(action).critical ? "High" : "Medium",
          notes: `${action} in the ${plan.domain} domain`,
        },
        {
          risk: "Rule",
          level: task.priority === "high" ? "High" : "Low",
          notes: plan.ruleApplied,
        },
        ...plan.crossChecks.map((kind): RiskRow => {
          const note = plan.agentNotes.find((n) => n.startsWith(`${kind} check`));
          return {
            risk: `Cross-check: ${kind}`,
            level: note?.includes(" passed") ? "Low" : "High",
            notes: note ?? "not run",
          };
        }),
      ],
    });
  }

  private async crossCheck(task: Task, kind: CrossCheckKind): Promise<CrossCheckOutcome> {
    const { ledger, config, audit, failures, logger } = this.deps;
    if (!ledger) {
      await audit.append({
        actionType: "cross_check",
        actor: ACTOR,
        target: task.name,
        parameters: { kind },
        result: "skip",
      });
      return { kind, ok: false, note: `${kind} check not run: no ledger configured, approval required` };
    }

    const policy = policyFromConfig(config);
    for (let attempt = 1; ; attempt++) {
      try {
        const result = await withTimeout(`${kind} cross-check`, config.executionTimeoutMs, (signal) =>
          ledger.check(kind, task, { signal })
        );
        await audit.append({
          actionType: "cross_check",
          actor: ACTOR,
          target: task.name,
          parameters: { kind, attempt, detail: result.detail },
          result: result.ok ? "success" : "fail",
        });
        return { kind, ok: result.ok, note: `${kind} check ${result.ok ? "passed" : "failed"}: ${result.detail}` };
      } catch (error) {
        const failure = failures.classify(error);
        logger?.warn(`${kind} cross-check attempt ${attempt} failed`, { task: task.name, error: failure.message });
        const step = nextStep(policy, { attempt, critical: true, retryCount: 0 }, failure.tier);
        if (step.kind === "retry") {
          await this.deps.sleep(step.delayMs);
          continue;
        }
        await audit.append({
          actionType: "cross_check",
          actor: ACTOR,
          target: task.name,
          parameters: { kind, attempt, errorClass: failure.errorClass },
          result: "fail",
          error: failure.message,
        });
        return { kind, ok: false, note: `${kind} check unavailable (${failure.errorClass}), approval required` };
      }
    }
  }

  // ==========================================================================
  // Approval observation and execution
  // ==========================================================================

  private async advance(task: Task, decisions: DecisionMap, report: CycleReport): Promise<Task> {
    const plans = await this.loadPlans(task);

    for (const [index, original] of plans.entries()) {
      let plan = original;
      let approved: ApprovalRequest | undefined;

      if (plan.status === "awaiting_approval") {
        const decision = plan.approvalRef ? decisions.get(plan.approvalRef) : undefined;
        if (!decision) {
          continue;
        }
        await this.deps.audit.append({
          actionType: "approval_observed",
          actor: "human",
          target: decision.id,
          parameters: { planRef: plan.id, taskRef: task.name },
          approvalStatus: decision.status,
        });
        if (decision.status === "rejected") {
          plan = await this.settle(plan, "rejected", `Rejected by human (${decision.id})`);
          plans[index] = plan;
          continue;
        }
        plan = await this.settle(tickItem(plan, CHECKLIST.approval, this.deps.clock), "approved", `Approved by human (${decision.id})`);
        approved = decision;
      } else if (plan.status === "approved" && plan.approvalRef) {
        approved = decisions.get(plan.approvalRef);
      }

      if (plan.status === "open" || plan.status === "approved") {
        const run = await this.execute(task, plan, approved, report);
        plans[index] = run.plan;
        if (run.kind === "requeue") {
          const { retry } = await this.deps.ladder.requeue(task, run.failure);
          report.requeued.push(retry.name);
          // The original now lives in the archive as the retry's parent
          return { ...task, status: "retry_queued", requeuedAs: retry.name };
        }
      } else {
        plans[index] = plan;
      }
    }

    return this.applyResolution(task, plans.map((p) => p.status), report);
  }

  private async execute(
    task: Task,
    plan: Plan,
    approved: ApprovalRequest | undefined,
    report: CycleReport
  ): Promise<PlanRun> {
    const { ladder, executor, config, audit } = this.deps;
    const action = actionForCategory(plan.category);
    const spec = this.specFor(action);
    const draft = approved?.draftContent ?? (await this.draft(task, plan));
    const payload = buildActionPayload(task, plan, spec, draft);

    const result = await ladder.attempt(
      payload,
      () => withTimeout(`${action} for ${plan.id}`, config.executionTimeoutMs, (signal) => executor.execute(payload, { signal })),
      task.retryCount
    );

    if (result.outcome === "succeeded") {
      await audit.append({
        actionType: "action_executed",
        actor: ACTOR,
        target: plan.id,
        parameters: { action, service: spec.service, attempts: result.attempts, taskRef: task.name },
        approvalStatus: approved ? "approved" : "n_a",
      });
      const done = await this.settle(
        tickItem(plan, executeItem(plan.category), this.deps.clock),
        "complete",
        `${action} executed after ${result.attempts} attempt(s)`
      );
      return { kind: "done", plan: done };
    }

    if (result.outcome === "requeue") {
      report.errors.push(`${plan.id}: ${result.failure.errorClass}: ${result.failure.message}`);
      return { kind: "requeue", plan, failure: result.failure };
    }

    const entry = await ladder.degrade(payload, result.failure);
    report.deferred.push(entry.id);
    const line = `${plan.id}: ${result.failure.errorClass}: ${result.failure.message}`;
    if (result.failure.tier === "logic") {
      report.fatalErrors.push(line);
    } else {
      report.errors.push(line);
    }
    const deferred = await this.settle(
      { ...plan, deferredRef: entry.id },
      "deferred",
      `Deferred as ${entry.id}; alert ${entry.alertRef} awaits a human`
    );
    return { kind: "done", plan: deferred };
  }

  /**
   * Fold plan statuses into the task status once no plan can progress on its own.
   */
  async applyResolution(task: Task, statuses: PlanStatus[], report?: CycleReport): Promise<Task> {
    const resolution = resolvePlanStatuses(statuses);
    if (!resolution) {
      return task;
    }

    let updated = task;
    if (resolution.status !== task.status) {
      updated = await this.deps.stateMachine.transition(task, resolution.status, ACTOR, {
        dismissed: resolution.dismissed ? true : undefined,
      });
    } else if (resolution.dismissed && !task.dismissed) {
      updated = await this.deps.stateMachine.update(task, { dismissed: true });
    }

    if (report && updated.status !== task.status) {
      report.finished.push({ name: updated.name, status: updated.status });
    }
    return updated;
  }

  /**
   * Set a plan's status, note why, and persist it.
   */
  async settle(plan: Plan, status: PlanStatus, note: string): Promise<Plan> {
    const updated: Plan = {
      ...plan,
      status,
      agentNotes: [...plan.agentNotes, note],
      updatedAt: this.deps.clock().toISOString(),
    };
    await this.savePlan(updated);
    return updated;
  }

  async loadPlans(task: Task): Promise<Plan[]> {
    const plans: Plan[] = [];
    for (const ref of task.planRefs) {
      const plan = await this.deps.store.getPlan(ref);
      if (!plan) {
        throw new StateStoreError(`Plan ${ref} of ${task.name} is missing`, this.deps.store.paths.plans);
      }
      plans.push(plan);
    }
    return plans;
  }

  private async savePlan(plan: Plan): Promise<void> {
    await this.deps.store.savePlan(plan, renderPlan(plan));
  }

  private specFor(action: string): ActionSpec {
    const spec = this.deps.config.actions[action];
    if (!spec) {
      // Unconfigured actions are treated as critical so a failure goes straight to a human
      return { critical: true, service: action };
    }
    return spec;
  }

  private async draft(task: Task, plan: Plan): Promise<string> {
    const { drafter, config, logger } = this.deps;
    if (!drafter) {
      return task.content;
    }
    try {
      return await withTimeout(`draft for ${plan.id}`, config.executionTimeoutMs, (signal) =>
        drafter.draft(task, plan, { signal })
      );
    } catch (error) {
      logger?.warn("Drafting failed, using the original content", {
        plan: plan.id,
        error: error instanceof Error ? error.message : String(error),
      });
      return task.content;
    }
  }
}
