/**
 * Shared setup for CLI commands: config, logger and the wired orchestrator.
 */

import { loadConfig } from "../config/index.js";
import { LocalExecutor } from "../execution/LocalExecutor.js";
import { createOrchestrator, type Orchestrator } from "../orchestrator/index.js";
import type { SystemConfig } from "../types/index.js";
import { ConfigError } from "../utils/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import type { CliOptions } from "./types.js";
import { printError } from "./utils/output.js";

export interface CommandContext {
  config: SystemConfig;
  logger: Logger;
  orchestrator: Orchestrator;
}

/**
 * Returns null after printing the problem when the configuration or the
 * data tables are invalid.
 */
export function createCommandContext(options: CliOptions): CommandContext | null {
  let config: SystemConfig;
  try {
    config = loadConfig(options.config);
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      return null;
    }
    throw error;
  }

  const logger = createLogger({
    level: options.verbose ? "debug" : config.logLevel,
    logsPath: config.logsPath,
    quiet: options.json ?? false,
  });

  try {
    const orchestrator = createOrchestrator(
      config,
      { executor: new LocalExecutor(logger.forLayer("execution")) },
      { logger }
    );
    return { config, logger, orchestrator };
  } catch (error) {
    if (error instanceof ConfigError) {
      printError(error.message);
      return null;
    }
    throw error;
  }
}
