// Configuration schema (zod)

import { z } from "zod";

/**
 * Escalation tier an error class maps to.
 * - transient: retried in place with backoff
 * - non_critical: requeued with cooldown, bounded by maxRetries
 * - critical: deferred for a human immediately
 * - logic: never retried; deferred and reported as a fatal cycle error
 */
export const FailureTierSchema = z.enum(["transient", "non_critical", "critical", "logic"]);

export type FailureTier = z.infer<typeof FailureTierSchema>;

export const ActionSpecSchema = z.object({
  critical: z.boolean(),
  service: z.string().min(1),
});

export type ActionSpec = z.infer<typeof ActionSpecSchema>;

export const SystemConfigSchema = z.object({
  vaultRoot: z.string().min(1),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
  logsPath: z.string().min(1).optional(),
  /** Ceiling for cooldown requeues before a task is deferred */
  maxRetries: z.number().int().min(0),
  retryCooldownMs: z.number().int().positive(),
  transientRetry: z.object({
    maxRetries: z.number().int().min(0),
    baseDelayMs: z.number().int().min(0),
    backoffFactor: z.number().min(1),
  }),
  executionTimeoutMs: z.number().int().positive(),
  recentActivityLimit: z.number().int().positive(),
  failureClasses: z.record(FailureTierSchema),
  /** Node errno / vendor codes mapped onto failure classes */
  errorCodeAliases: z.record(z.string().min(1)),
  actions: z.record(ActionSpecSchema),
  signalsPath: z.string().min(1).optional(),
  rulesPath: z.string().min(1).optional(),
});

export type SystemConfig = z.infer<typeof SystemConfigSchema>;

export const PartialConfigSchema = SystemConfigSchema.deepPartial();
