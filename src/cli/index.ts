/**
 * taskvault CLI - Main entry point
 */

import { Command, InvalidArgumentError } from "commander";
import type { CliOptions } from "./types.js";
import { runCommand } from "./commands/run.js";
import { statusCommand } from "./commands/status.js";
import { approvalsList } from "./commands/approvals.js";
import { deferredList } from "./commands/deferred.js";
import { auditCommand } from "./commands/audit.js";

/** Helper to get CLI options from a command */
function getCliOptions(command: Command): CliOptions {
  const opts = command.opts<{ json?: boolean; verbose?: boolean; config?: string }>();
  return {
    json: opts.json ?? false,
    verbose: opts.verbose ?? false,
    config: opts.config,
  };
}

function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

/** Create CLI program */
export function createCli(): Command {
  const program = new Command();

  program
    .name("taskvault")
    .description("File-backed task orchestrator with human approval gates")
    .version("0.1.0");

  // Global options
  program.option("--json", "Output in JSON format");
  program.option("--config <path>", "Path to config file");
  program.option("--verbose", "Verbose output");

  program.command("run")
    .description("Run one processing cycle")
    .action(async () => {
      process.exitCode = await runCommand(getCliOptions(program));
    });

  program.command("status")
    .description("Show the dashboard summary")
    .action(async () => {
      process.exitCode = await statusCommand(getCliOptions(program));
    });

  // Approvals commands
  const approvalsCmd = program.command("approvals")
    .description("Approval requests");

  approvalsCmd.command("list")
    .description("List approval requests in every pool")
    .action(async () => {
      process.exitCode = await approvalsList(getCliOptions(program));
    });

  // Deferred commands
  const deferredCmd = program.command("deferred")
    .description("Deferred actions");

  deferredCmd.command("list")
    .description("List deferred entries")
    .action(async () => {
      process.exitCode = await deferredList(getCliOptions(program));
    });

  program.command("audit")
    .description("Show audit entries")
    .option("-d, --date <date>", "Day segment to show (YYYY-MM-DD)")
    .option("-l, --lines <n>", "Number of entries to show", parsePositiveInt, 50)
    .action(async (options: { date?: string; lines: number }) => {
      process.exitCode = await auditCommand({ ...getCliOptions(program), ...options });
    });

  return program;
}

/** Run CLI */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}
