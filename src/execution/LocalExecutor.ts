// Executor used when no external integrations are wired in

import type { ActionPayload } from "../types/index.js";
import { ActionError } from "../utils/errors.js";
import type { LayerLogger } from "../utils/logger.js";
import type { ActionExecutor, CallOptions } from "./types.js";
import { DEFAULT_ACTION } from "./payload.js";

/**
 * Completes vault-local bookkeeping actions and refuses anything that needs
 * an external service, so those actions are deferred for a human.
 */
export class LocalExecutor implements ActionExecutor {
  constructor(private logger?: LayerLogger) {}

  async execute(payload: ActionPayload, options: CallOptions): Promise<void> {
    if (options.signal.aborted) {
      throw new ActionError(`${payload.action} aborted`, "timeout", payload.service);
    }
    if (payload.action === DEFAULT_ACTION) {
      this.logger?.info("Recorded task locally", { plan: payload.planRef });
      return;
    }
    throw new ActionError(
      `No integration configured for ${payload.service}`,
      "missing_credential",
      payload.service
    );
  }
}
