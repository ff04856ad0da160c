/**
 * Deferred queue commands
 */

import { createCommandContext } from "../context.js";
import type { CliOptions } from "../types.js";
import { formatOutput, printInfo } from "../utils/output.js";

export async function deferredList(options: CliOptions): Promise<number> {
  const context = createCommandContext(options);
  if (!context) {
    return 1;
  }

  const entries = await context.orchestrator.deferredQueue.list();
  if (options.json) {
    console.log(formatOutput(entries, "json"));
    return 0;
  }
  if (entries.length === 0) {
    printInfo("Deferred queue is empty");
    return 0;
  }

  console.log(
    formatOutput(
      entries.map((e) => ({
        id: e.id,
        action: e.action,
        service: e.service,
        errorClass: e.errorClass,
        status: e.status,
        alert: e.alertRef,
        queued: e.queuedAt,
      }))
    )
  );
  return 0;
}
