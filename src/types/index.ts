// Core types for the taskvault orchestrator

import type {
  TaskSidecar,
  TaskSource,
  Domain,
  Priority,
  CrossCheckKind,
} from "./schemas.js";

export type {
  TaskSource,
  Domain,
  Priority,
  TaskStatus,
  TaskSidecar,
  PlanStatus,
  ChecklistItem,
  CrossCheckKind,
  Plan,
  ActionPayload,
  ApprovalStatus,
  RiskRow,
  ApprovalRequest,
  DeferredStatus,
  DeferredEntry,
  DeferredQueueDocument,
  AuditActionType,
  AuditEntry,
} from "./schemas.js";

export type { SystemConfig, FailureTier, ActionSpec } from "../config/schema.js";

/**
 * A Task as held in memory: the sidecar plus its raw content artifact.
 */
export interface Task extends TaskSidecar {
  content: string;
}

/**
 * A raw item offered for admission.
 */
export interface IngestItem {
  source: TaskSource;
  content: string;
  /** Free-form header fields (subject, sender, title, ...) */
  metadata?: Record<string, string>;
  /** Where the item came from, for the audit trail (e.g. inbox file name) */
  origin?: string;
}

/**
 * Keyword hits per signal category, in table order.
 */
export type SignalHits = Record<string, string[]>;

export interface Signals {
  business: SignalHits;
  personal: SignalHits;
  monetary: boolean;
  urgent: boolean;
  actionVerb: boolean;
  source: TaskSource;
}

export interface Classification {
  domain: Domain;
  sensitive: boolean;
  category: string;
  signals: Signals;
}

/**
 * Routing decision produced by the rule engine.
 */
export interface RuleDecision {
  ruleApplied: string;
  description: string;
  domain: Domain;
  priority: Priority;
  forceApproval: boolean;
  crossChecks: CrossCheckKind[];
  split: boolean;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export type ServiceLayer =
  | "cycle"
  | "ingestion"
  | "classifier"
  | "rules"
  | "planner"
  | "state"
  | "approval"
  | "escalation"
  | "execution"
  | "audit"
  | "dashboard"
  | "config"
  | "cli";

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  layer?: ServiceLayer;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
}

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  layer: ServiceLayer;
  startTime: number;
}

/** Source of the current time; injected so cooldowns and segments are testable. */
export type Clock = () => Date;

/** Waits for the given number of milliseconds. */
export type Sleeper = (ms: number) => Promise<void>;
