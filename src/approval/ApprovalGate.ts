// Human approval checkpoint. Purely reactive: it publishes requests and
// observes decisions, and never changes a request's status itself.

import type { AuditLog } from "../audit/AuditLog.js";
import type { ApprovalRequest, Clock } from "../types/index.js";
import type { LayerLogger } from "../utils/logger.js";
import type { ApprovalPool, ApprovalSignalSource, NewApprovalRequest, PollResult } from "./types.js";

const ACTOR = "approval-gate";

export class ApprovalGate {
  private clock: Clock;
  private logger?: LayerLogger;

  constructor(
    private source: ApprovalSignalSource,
    private audit: AuditLog,
    deps: { clock?: Clock; logger?: LayerLogger } = {}
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.logger = deps.logger;
  }

  /**
   * Publish a request into the pending pool. Idempotent: a request whose
   * artifact already exists in any pool is left where it is.
   */
  async create(input: NewApprovalRequest): Promise<string> {
    const existing = await this.source.locate(input.id);
    if (existing) {
      this.logger?.debug("Approval request already exists", { id: input.id, pool: existing });
      return input.id;
    }

    const request: ApprovalRequest = {
      ...input,
      status: "pending",
      createdAt: this.clock().toISOString(),
    };
    await this.source.publish(request, renderApprovalRequest(request));
    await this.audit.append({
      actionType: input.kind === "alert" ? "alert_created" : "approval_created",
      actor: ACTOR,
      target: request.id,
      parameters: { action: request.action, sourceTask: request.sourceTask, priority: request.priority },
      approvalStatus: "pending",
    });
    this.logger?.info("Approval requested", { id: request.id, kind: request.kind });
    return request.id;
  }

  /**
   * Observe decisions. An artifact's pool is the decision; a status field
   * flipped on a sidecar still in the pending pool counts too. A request found
   * in both decided pools counts as rejected.
   */
  async poll(): Promise<PollResult> {
    const approved = new Map<string, ApprovalRequest>();
    const rejected = new Map<string, ApprovalRequest>();

    for (const id of await this.source.listIds("approved")) {
      const request = await this.readDecided(id, "approved");
      if (request) {
        approved.set(id, { ...request, status: "approved" });
      }
    }
    for (const id of await this.source.listIds("rejected")) {
      const request = await this.readDecided(id, "rejected");
      if (request) {
        approved.delete(id);
        rejected.set(id, { ...request, status: "rejected" });
      }
    }
    for (const id of await this.source.listIds("pending")) {
      if (approved.has(id) || rejected.has(id)) {
        continue;
      }
      const request = await this.source.readRequest(id, "pending");
      if (request?.status === "approved") {
        approved.set(id, request);
      } else if (request?.status === "rejected") {
        rejected.set(id, request);
      }
    }

    return { approved: [...approved.values()], rejected: [...rejected.values()] };
  }

  /**
   * Requests whose artifact sits in a pool, with the status that pool implies.
   */
  async list(pool: ApprovalPool): Promise<ApprovalRequest[]> {
    const requests: ApprovalRequest[] = [];
    for (const id of await this.source.listIds(pool)) {
      const request = (await this.source.readRequest(id, pool)) ?? (await this.source.readRequest(id, "pending"));
      if (request) {
        requests.push(pool === "pending" ? request : { ...request, status: pool });
      }
    }
    return requests;
  }

  private async readDecided(id: string, pool: "approved" | "rejected"): Promise<ApprovalRequest | null> {
    const request = (await this.source.readRequest(id, pool)) ?? (await this.source.readRequest(id, "pending"));
    if (!request) {
      this.logger?.warn("Decided approval artifact has no sidecar; ignoring", { id, pool });
    }
    return request;
  }
}

export function renderApprovalRequest(request: ApprovalRequest): string {
  const title = request.kind === "alert" ? `ALERT: ${request.action} failed` : `Approval required: ${request.action}`;
  const lines = [
    `# ${title}`,
    "",
    "| Field | Value |",
    "|-------|-------|",
    `| ID | ${request.id} |`,
    `| Action | ${request.action} |`,
    `| Source task | ${request.sourceTask} |`,
    `| Priority | ${request.priority} |`,
    `| Status | ${request.status} |`,
    `| Created | ${request.createdAt} |`,
  ];
  if (request.planRef) {
    lines.push(`| Plan | ${request.planRef} |`);
  }
  if (request.deferredRef) {
    lines.push(`| Deferred entry | ${request.deferredRef} |`);
  }

  lines.push("", request.kind === "alert" ? "## Action Payload" : "## Draft", "");
  lines.push(request.kind === "alert" ? "```json\n" + request.draftContent + "\n```" : request.draftContent);

  lines.push("", "## Risk Assessment", "", "| Risk | Level | Notes |", "|------|-------|-------|");
  for (const row of request.riskTable) {
    lines.push(`| ${row.risk} | ${row.level} | ${row.notes} |`);
  }

  lines.push("", "## Instructions", "");
  if (request.kind === "alert") {
    lines.push(
      "- Move this file to `approvals/approved/` to retry the action with the stored payload.",
      "- Move this file to `approvals/rejected/` to dismiss it."
    );
  } else {
    lines.push(
      "- Move this file to `approvals/approved/` to approve.",
      "- Move this file to `approvals/rejected/` to reject."
    );
  }

  return lines.join("\n") + "\n";
}
