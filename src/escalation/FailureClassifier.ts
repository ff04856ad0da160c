// FailureClassifier - maps errors onto escalation tiers via the configured table

import type { FailureTier, SystemConfig } from "../types/index.js";
import { ActionError, ConfigError, InvalidTransitionError } from "../utils/errors.js";
import { ErrorSanitizer } from "../utils/error-sanitizer.js";

export const UNKNOWN_CLASS = "unknown";

export interface FailureInfo {
  errorClass: string;
  /** "unknown" when the class is not in the table; never retried blindly */
  tier: FailureTier | "unknown";
  /** Sanitized message, safe for audit entries and alerts */
  message: string;
}

export class FailureClassifier {
  constructor(private config: Pick<SystemConfig, "failureClasses" | "errorCodeAliases">) {}

  classify(error: unknown): FailureInfo {
    const errorClass = this.resolveClass(error);
    return {
      errorClass,
      tier: this.tierOf(errorClass),
      message: ErrorSanitizer.message(error),
    };
  }

  tierOf(errorClass: string): FailureTier | "unknown" {
    return Object.hasOwn(this.config.failureClasses, errorClass)
      ? this.config.failureClasses[errorClass] ?? "unknown"
      : "unknown";
  }

  private resolveClass(error: unknown): string {
    if (error instanceof ActionError) {
      return error.errorClass;
    }
    if (error instanceof InvalidTransitionError || error instanceof ConfigError) {
      return "logic";
    }
    if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
      const alias = this.config.errorCodeAliases[error.code];
      if (alias) {
        return alias;
      }
    }
    return UNKNOWN_CLASS;
  }
}
