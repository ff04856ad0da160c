// TypeBox schemas for every document the State Store persists.
// The static types below are the in-memory shapes of those documents.

import { Type, type Static } from "@sinclair/typebox";

export const TaskSourceSchema = Type.Union([
  Type.Literal("inbox"),
  Type.Literal("external-email"),
  Type.Literal("external-social"),
  Type.Literal("business-messaging"),
  Type.Literal("personal-messaging"),
  Type.Literal("manual"),
]);

export type TaskSource = Static<typeof TaskSourceSchema>;

export const DomainSchema = Type.Union([
  Type.Literal("personal"),
  Type.Literal("business"),
  Type.Literal("both"),
]);

export type Domain = Static<typeof DomainSchema>;

export const PrioritySchema = Type.Union([
  Type.Literal("low"),
  Type.Literal("medium"),
  Type.Literal("high"),
]);

export type Priority = Static<typeof PrioritySchema>;

export const TaskStatusSchema = Type.Union([
  Type.Literal("pending"),
  Type.Literal("processing"),
  Type.Literal("awaiting_approval"),
  Type.Literal("ready_to_execute"),
  Type.Literal("complete"),
  Type.Literal("rejected"),
  Type.Literal("partial"),
  Type.Literal("retry_queued"),
  Type.Literal("deferred"),
]);

export type TaskStatus = Static<typeof TaskStatusSchema>;

// ============================================================================
// Task sidecar
// ============================================================================

export const TaskSidecarSchema = Type.Object({
  /** Task identity; also the base name of the content artifact */
  name: Type.String({ minLength: 1 }),
  /** Stable identity derived from source + content, used for deduplication */
  dedupKey: Type.String({ minLength: 1 }),
  status: TaskStatusSchema,
  source: TaskSourceSchema,
  domain: DomainSchema,
  sensitive: Type.Boolean(),
  priority: PrioritySchema,
  retryCount: Type.Integer({ minimum: 0 }),
  retryAfter: Type.Union([Type.String(), Type.Null()]),
  planRefs: Type.Array(Type.String()),
  category: Type.String(),
  ruleApplied: Type.String(),
  metadata: Type.Record(Type.String(), Type.String()),
  parentTask: Type.Optional(Type.String()),
  requeuedAs: Type.Optional(Type.String()),
  dismissed: Type.Optional(Type.Boolean()),
  timestamps: Type.Object({
    received: Type.String(),
    lastUpdated: Type.String(),
    archived: Type.Optional(Type.String()),
  }),
});

export type TaskSidecar = Static<typeof TaskSidecarSchema>;

// ============================================================================
// Plan
// ============================================================================

export const PlanStatusSchema = Type.Union([
  Type.Literal("open"),
  Type.Literal("awaiting_approval"),
  Type.Literal("approved"),
  Type.Literal("complete"),
  Type.Literal("rejected"),
  Type.Literal("deferred"),
  Type.Literal("dismissed"),
]);

export type PlanStatus = Static<typeof PlanStatusSchema>;

export const ChecklistItemSchema = Type.Object({
  text: Type.String(),
  done: Type.Boolean(),
});

export type ChecklistItem = Static<typeof ChecklistItemSchema>;

export const CrossCheckKindSchema = Type.Union([
  Type.Literal("invoice"),
  Type.Literal("bank_balance"),
  Type.Literal("contact"),
]);

export type CrossCheckKind = Static<typeof CrossCheckKindSchema>;

export const PlanSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  taskRef: Type.String({ minLength: 1 }),
  category: Type.String(),
  source: TaskSourceSchema,
  sensitive: Type.Boolean(),
  domain: DomainSchema,
  status: PlanStatusSchema,
  ruleApplied: Type.String(),
  crossChecks: Type.Array(CrossCheckKindSchema),
  checklist: Type.Array(ChecklistItemSchema),
  originalContent: Type.String(),
  agentNotes: Type.Array(Type.String()),
  approvalRef: Type.Optional(Type.String()),
  deferredRef: Type.Optional(Type.String()),
  createdAt: Type.String(),
  updatedAt: Type.String(),
});

export type Plan = Static<typeof PlanSchema>;

// ============================================================================
// Action payload (what the execution collaborator receives)
// ============================================================================

export const ActionPayloadSchema = Type.Object({
  action: Type.String({ minLength: 1 }),
  service: Type.String({ minLength: 1 }),
  critical: Type.Boolean(),
  taskRef: Type.String(),
  planRef: Type.String(),
  domain: DomainSchema,
  source: TaskSourceSchema,
  priority: PrioritySchema,
  content: Type.String(),
  draft: Type.String(),
  metadata: Type.Record(Type.String(), Type.String()),
});

export type ActionPayload = Static<typeof ActionPayloadSchema>;

// ============================================================================
// Approval request sidecar
// ============================================================================

export const ApprovalStatusSchema = Type.Union([
  Type.Literal("pending"),
  Type.Literal("approved"),
  Type.Literal("rejected"),
]);

export type ApprovalStatus = Static<typeof ApprovalStatusSchema>;

export const RiskRowSchema = Type.Object({
  risk: Type.String(),
  level: Type.Union([Type.Literal("Low"), Type.Literal("Medium"), Type.Literal("High")]),
  notes: Type.String(),
});

export type RiskRow = Static<typeof RiskRowSchema>;

export const ApprovalRequestSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  kind: Type.Union([Type.Literal("action"), Type.Literal("alert")]),
  action: Type.String(),
  sourceTask: Type.String(),
  planRef: Type.Optional(Type.String()),
  deferredRef: Type.Optional(Type.String()),
  priority: PrioritySchema,
  status: ApprovalStatusSchema,
  draftContent: Type.String(),
  riskTable: Type.Array(RiskRowSchema),
  createdAt: Type.String(),
});

export type ApprovalRequest = Static<typeof ApprovalRequestSchema>;

// ============================================================================
// Deferred queue
// ============================================================================

export const DeferredStatusSchema = Type.Union([
  Type.Literal("deferred"),
  Type.Literal("retried"),
  Type.Literal("resolved"),
  Type.Literal("dismissed"),
]);

export type DeferredStatus = Static<typeof DeferredStatusSchema>;

export const DeferredEntrySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  action: Type.String(),
  service: Type.String(),
  error: Type.String(),
  errorClass: Type.String(),
  actor: Type.String(),
  payload: ActionPayloadSchema,
  queuedAt: Type.String(),
  updatedAt: Type.String(),
  status: DeferredStatusSchema,
  alertRef: Type.String(),
});

export type DeferredEntry = Static<typeof DeferredEntrySchema>;

export const DeferredQueueDocumentSchema = Type.Object({
  entries: Type.Array(DeferredEntrySchema),
});

export type DeferredQueueDocument = Static<typeof DeferredQueueDocumentSchema>;

// ============================================================================
// Audit entry
// ============================================================================

export const AuditActionTypeSchema = Type.Union([
  Type.Literal("file_write"),
  Type.Literal("dedup_skip"),
  Type.Literal("status_transition"),
  Type.Literal("classification"),
  Type.Literal("plan_created"),
  Type.Literal("cross_check"),
  Type.Literal("approval_created"),
  Type.Literal("approval_observed"),
  Type.Literal("action_attempt"),
  Type.Literal("action_executed"),
  Type.Literal("retry_queued"),
  Type.Literal("deferred"),
  Type.Literal("deferred_resolved"),
  Type.Literal("deferred_dismissed"),
  Type.Literal("alert_created"),
  Type.Literal("archive"),
  Type.Literal("cycle_start"),
  Type.Literal("cycle_end"),
  Type.Literal("error"),
]);

export type AuditActionType = Static<typeof AuditActionTypeSchema>;

export const AuditEntrySchema = Type.Object({
  timestamp: Type.String(),
  actionType: AuditActionTypeSchema,
  actor: Type.String(),
  target: Type.String(),
  parameters: Type.Record(Type.String(), Type.Unknown()),
  approvalStatus: Type.Union([ApprovalStatusSchema, Type.Literal("n_a")]),
  result: Type.Union([Type.Literal("success"), Type.Literal("fail"), Type.Literal("skip")]),
  error: Type.Union([Type.String(), Type.Null()]),
});

export type AuditEntry = Static<typeof AuditEntrySchema>;
