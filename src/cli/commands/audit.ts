/**
 * Audit command: print audit entries
 */

import chalk from "chalk";
import type { AuditEntry } from "../../types/index.js";
import { createCommandContext } from "../context.js";
import type { AuditOptions } from "../types.js";
import { formatStatus, printError, printInfo } from "../utils/output.js";

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** One audit entry as a console line */
export function formatAuditLine(entry: AuditEntry): string {
  const error = entry.error ? ` ${chalk.red(entry.error)}` : "";
  const approval = entry.approvalStatus === "n_a" ? "" : ` [${entry.approvalStatus}]`;
  return `${chalk.gray(entry.timestamp)} ${entry.actionType.padEnd(18)} ${entry.target} ${formatStatus(entry.result)}${approval}${error}`;
}

export async function auditCommand(options: AuditOptions): Promise<number> {
  if (options.date && !DATE_PATTERN.test(options.date)) {
    printError(`Invalid date ${options.date}; expected YYYY-MM-DD`);
    return 1;
  }

  const context = createCommandContext(options);
  if (!context) {
    return 1;
  }

  const { audit } = context.orchestrator;
  const lines = options.lines ?? 50;
  const entries = options.date
    ? (await audit.readSegment(options.date)).slice(-lines)
    : (await audit.recent(lines)).reverse();

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return 0;
  }
  if (entries.length === 0) {
    printInfo("No audit entries");
    return 0;
  }
  for (const entry of entries) {
    console.log(formatAuditLine(entry));
  }
  return 0;
}
