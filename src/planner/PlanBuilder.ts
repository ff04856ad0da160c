// Builds plans (checklists) from a routed task and renders them as markdown

import type { ChecklistItem, Classification, Clock, CrossCheckKind, Domain, Plan, RuleDecision, Task } from "../types/index.js";
import { actionForCategory } from "../execution/payload.js";

export const CHECKLIST = {
  review: "Review task content and classification",
  approval: "Obtain human approval",
  archive: "Archive task",
} as const;

const CROSS_CHECK_LABELS: Record<CrossCheckKind, string> = {
  invoice: "Cross-check invoice against the ledger",
  bank_balance: "Verify bank balance covers the amount",
  contact: "Confirm sender is a known business contact",
};

export function crossCheckItem(kind: CrossCheckKind): string {
  return CROSS_CHECK_LABELS[kind];
}

export function executeItem(category: string): string {
  return `Execute ${actionForCategory(category)}`;
}

export interface CrossCheckOutcome {
  kind: CrossCheckKind;
  ok: boolean;
  note: string;
}

export interface PlanRequest {
  task: Task;
  classification: Classification;
  decision: RuleDecision;
  crossChecks: CrossCheckOutcome[];
  requiresApproval: boolean;
}

export function planIdsFor(taskName: string, split: boolean): string[] {
  return split ? [`PLAN_PERSONAL_${taskName}`, `PLAN_BUSINESS_${taskName}`] : [`PLAN_${taskName}`];
}

export class PlanBuilder {
  constructor(private clock: Clock = () => new Date()) {}

  /**
   * One plan per task, or one per domain when the rule splits it.
   */
  build(request: PlanRequest): Plan[] {
    const { task, decision } = request;
    const domains: Domain[] = decision.split ? ["personal", "business"] : [decision.domain];
    const ids = planIdsFor(task.name, decision.split);
    return domains.map((domain, index) => this.buildOne(request, ids[index] ?? `PLAN_${task.name}`, domain));
  }

  private buildOne(request: PlanRequest, id: string, domain: Domain): Plan {
    const { task, classification, decision, crossChecks, requiresApproval } = request;
    const now = this.clock().toISOString();

    const checklist: ChecklistItem[] = [{ text: CHECKLIST.review, done: true }];
    for (const outcome of crossChecks) {
      checklist.push({ text: crossCheckItem(outcome.kind), done: outcome.ok });
    }
    if (requiresApproval) {
      checklist.push({ text: CHECKLIST.approval, done: false });
    }
    checklist.push({ text: executeItem(classification.category), done: false });
    checklist.push({ text: CHECKLIST.archive, done: false });

    const notes = [
      `Rule applied: ${decision.ruleApplied} (${decision.description})`,
      `Signals: ${describeSignals(classification)}`,
      ...crossChecks.map((c) => c.note),
    ];
    if (decision.split) {
      notes.push(`Split from ${task.name}: ${domain} side`);
    }

    return {
      id,
      taskRef: task.name,
      category: classification.category,
      source: task.source,
      sensitive: requiresApproval,
      domain,
      status: requiresApproval ? "awaiting_approval" : "open",
      ruleApplied: decision.ruleApplied,
      crossChecks: crossChecks.map((c) => c.kind),
      checklist,
      originalContent: task.content,
      agentNotes: notes,
      createdAt: now,
      updatedAt: now,
    };
  }
}

function describeSignals(classification: Classification): string {
  const { signals } = classification;
  const parts = [
    ...Object.keys(signals.business).map((c) => `business:${c}`),
    ...Object.keys(signals.personal).map((c) => `personal:${c}`),
  ];
  if (signals.monetary) parts.push("monetary");
  if (signals.urgent) parts.push("urgent");
  if (signals.actionVerb) parts.push("action-verb");
  return parts.length > 0 ? parts.join(", ") : "none";
}

/**
 * Mark a checklist item done. Returns the plan unchanged when no item matches.
 */
export function tickItem(plan: Plan, text: string, clock: Clock = () => new Date()): Plan {
  if (!plan.checklist.some((item) => item.text === text && !item.done)) {
    return plan;
  }
  return {
    ...plan,
    checklist: plan.checklist.map((item) => (item.text === text ? { ...item, done: true } : item)),
    updatedAt: clock().toISOString(),
  };
}

export function renderPlan(plan: Plan): string {
  const lines = [
    `# ${plan.id}`,
    "",
    "| Field | Value |",
    "|-------|-------|",
    `| Task | ${plan.taskRef} |`,
    `| Status | ${plan.status} |`,
    `| Category | ${plan.category} |`,
    `| Source | ${plan.source} |`,
    `| Domain | ${plan.domain} |`,
    `| Sensitive | ${plan.sensitive ? "yes" : "no"} |`,
    `| Rule | ${plan.ruleApplied} |`,
  ];
  if (plan.approvalRef) {
    lines.push(`| Approval | ${plan.approvalRef} |`);
  }
  if (plan.deferredRef) {
    lines.push(`| Deferred | ${plan.deferredRef} |`);
  }

  lines.push("", "## Checklist", "");
  for (const item of plan.checklist) {
    lines.push(`- [${item.done ? "x" : " "}] ${item.text}`);
  }

  lines.push("", "## Original Content", "", plan.originalContent.trim(), "", "## Agent Notes", "");
  for (const note of plan.agentNotes) {
    lines.push(`- ${note}`);
  }

  return lines.join("\n") + "\n";
}
