/**
 * Status command: the projected dashboard
 */

import Table from "cli-table3";
import chalk from "chalk";
import { createCommandContext } from "../context.js";
import type { CliOptions } from "../types.js";
import { formatOutput, formatStatus, printHeader, printInfo } from "../utils/output.js";

export async function statusCommand(options: CliOptions): Promise<number> {
  const context = createCommandContext(options);
  if (!context) {
    return 1;
  }

  const view = await context.orchestrator.projector.build();

  if (options.json) {
    console.log(formatOutput(view, "json"));
    return 0;
  }

  printHeader("Summary");
  console.log(formatOutput(view.counts));

  printHeader("Pending");
  if (view.pending.length === 0) {
    printInfo("No active tasks");
  } else {
    const table = new Table({ head: ["Task", "Status", "Source", "Domain", "Priority"].map((h) => chalk.cyan(h)) });
    for (const row of view.pending) {
      table.push([row.name, formatStatus(row.status), row.source, row.domain, row.priority]);
    }
    console.log(table.toString());
  }

  if (view.retryQueue.length > 0) {
    printHeader("Retry Queue");
    console.log(formatOutput(view.retryQueue));
  }

  if (view.deferred.length > 0) {
    printHeader("Deferred");
    console.log(formatOutput(view.deferred));
  }

  printHeader("Recent Activity");
  if (view.recentActivity.length === 0) {
    printInfo("No activity recorded");
  } else {
    const table = new Table({ head: ["Time", "Action", "Target", "Result"].map((h) => chalk.cyan(h)) });
    for (const row of view.recentActivity) {
      table.push([row.timestamp, row.actionType, row.target, formatStatus(row.result)]);
    }
    console.log(table.toString());
  }

  return 0;
}
