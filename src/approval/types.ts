// Approval gate types

import type { ApprovalRequest } from "../types/index.js";

export type ApprovalPool = "pending" | "approved" | "rejected";

export const APPROVAL_POOLS: readonly ApprovalPool[] = ["pending", "approved", "rejected"];

/**
 * Where human decisions are observed. The human acts by relocating a
 * request artifact between pools (or flipping its status field); the
 * orchestrator only reads.
 */
export interface ApprovalSignalSource {
  /** Ids of request artifacts currently in a pool */
  listIds(pool: ApprovalPool): Promise<string[]>;
  /** Machine-readable sidecar stored in a pool, if present */
  readRequest(id: string, pool: ApprovalPool): Promise<ApprovalRequest | null>;
  /** Pool currently holding the request artifact */
  locate(id: string): Promise<ApprovalPool | null>;
  /** Publish a new request into the pending pool */
  publish(request: ApprovalRequest, rendered: string): Promise<void>;
}

export type NewApprovalRequest = Omit<ApprovalRequest, "status" | "createdAt">;

export interface PollResult {
  approved: ApprovalRequest[];
  rejected: ApprovalRequest[];
}
