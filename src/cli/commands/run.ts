/**
 * Run command: one processing cycle
 */

import { LockHeldError, StateStoreError } from "../../utils/errors.js";
import type { CycleReport } from "../../orchestrator/index.js";
import { createCommandContext } from "../context.js";
import { ExitCode, type CliOptions } from "../types.js";
import { formatOutput, printError, printSuccess, printWarning } from "../utils/output.js";

/** Map a finished cycle onto the process exit code */
export function exitCodeFor(report: CycleReport): number {
  return report.fatalErrors.length > 0 ? ExitCode.FATAL_ERRORS : ExitCode.OK;
}

export async function runCommand(options: CliOptions): Promise<number> {
  const context = createCommandContext(options);
  if (!context) {
    return ExitCode.STATE_STORE;
  }

  const controller = new AbortController();
  const onSigint = (): void => controller.abort();
  process.once("SIGINT", onSigint);

  try {
    const report = await context.orchestrator.runner.run({ signal: controller.signal });

    if (options.json) {
      console.log(formatOutput(report, "json"));
    } else {
      console.log(
        formatOutput({
          admitted: report.admitted.length,
          skipped: report.skipped,
          processed: report.processed,
          awaitingApproval: report.awaitingApproval.length,
          coolingDown: report.coolingDown.length,
          requeued: report.requeued.length,
          deferred: report.deferred.length,
          archived: report.archived.length,
          errors: report.errors.length,
          fatalErrors: report.fatalErrors.length,
        })
      );
      for (const line of report.fatalErrors) {
        printError(line);
      }
      if (report.aborted) {
        printWarning("Cycle aborted between tasks");
      } else if (report.fatalErrors.length === 0) {
        printSuccess("Cycle complete");
      }
    }

    return exitCodeFor(report);
  } catch (error) {
    if (error instanceof LockHeldError) {
      printError(error.message);
      return ExitCode.LOCK_HELD;
    }
    if (error instanceof StateStoreError) {
      printError(`State store failure: ${error.message}`);
      return ExitCode.STATE_STORE;
    }
    throw error;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}
