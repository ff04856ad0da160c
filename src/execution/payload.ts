import type { ActionPayload, ActionSpec, Plan, Task } from "../types/index.js";

const ACTION_BY_CATEGORY: Record<string, string> = {
  payment: "payment",
  "external-communication": "send_message",
};

export const DEFAULT_ACTION = "record_task";

export function actionForCategory(category: string): string {
  return ACTION_BY_CATEGORY[category] ?? DEFAULT_ACTION;
}

/**
 * Everything needed to re-attempt the action later without the source task.
 */
export function buildActionPayload(task: Task, plan: Plan, spec: ActionSpec, draft: string): ActionPayload {
  return {
    action: actionForCategory(plan.category),
    service: spec.service,
    critical: spec.critical,
    taskRef: task.name,
    planRef: plan.id,
    domain: plan.domain,
    source: task.source,
    priority: task.priority,
    content: task.content,
    draft,
    metadata: { ...task.metadata },
  };
}
