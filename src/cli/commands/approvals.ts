/**
 * Approvals commands
 *
 * Read-only: decisions are made by moving request files between pools.
 */

import { APPROVAL_POOLS } from "../../approval/types.js";
import { createCommandContext } from "../context.js";
import type { CliOptions } from "../types.js";
import { formatOutput, printInfo } from "../utils/output.js";

/** Approvals list command */
export async function approvalsList(options: CliOptions): Promise<number> {
  const context = createCommandContext(options);
  if (!context) {
    return 1;
  }

  const { gate, store } = context.orchestrator;
  const rows = [];
  for (const pool of APPROVAL_POOLS) {
    for (const request of await gate.list(pool)) {
      rows.push({
        id: request.id,
        kind: request.kind,
        action: request.action,
        task: request.sourceTask,
        priority: request.priority,
        pool,
        created: request.createdAt,
      });
    }
  }

  if (rows.length === 0) {
    if (options.json) {
      console.log("[]");
    } else {
      printInfo("No approval requests");
    }
    return 0;
  }

  console.log(formatOutput(rows, options.json ? "json" : "table"));
  if (!options.json) {
    printInfo(`Move a file from ${store.paths.approvals.pending} to approved/ or rejected/ to decide`);
  }
  return 0;
}
