// Main entry point

export * from "./types/index.js";
export { loadConfig, getDefaultConfig, getConfigPath } from "./config/index.js";
export { loadRuleTable, loadSignalTable, type RuleTable, type SignalTable } from "./config/tables.js";
export * from "./orchestrator/index.js";
export { AuditLog, type AuditInput } from "./audit/AuditLog.js";
export { StateStore, resolveVaultPaths, type VaultPaths } from "./store/StateStore.js";
export { DeferredQueue } from "./store/DeferredQueue.js";
export { RunLock } from "./store/RunLock.js";
export { Ingestor, type AdmitResult } from "./ingestion/Ingestor.js";
export { InboxReader, type InboxItem } from "./ingestion/InboxReader.js";
export { DomainClassifier } from "./classifier/DomainClassifier.js";
export { RuleEngine } from "./rules/RuleEngine.js";
export { PlanBuilder, renderPlan } from "./planner/PlanBuilder.js";
export { ApprovalGate } from "./approval/ApprovalGate.js";
export { FileApprovalPools } from "./approval/FileApprovalPools.js";
export type { ApprovalPool, ApprovalSignalSource } from "./approval/types.js";
export { EscalationLadder, nextStep, backoffSchedule } from "./escalation/EscalationLadder.js";
export { FailureClassifier } from "./escalation/FailureClassifier.js";
export type { ActionExecutor, LedgerClient, ContentDrafter, CallOptions } from "./execution/types.js";
export { LocalExecutor } from "./execution/LocalExecutor.js";
export { DashboardProjector, project, renderDashboard } from "./dashboard/DashboardProjector.js";
export * from "./utils/errors.js";
export { createLogger, Logger, LayerLogger } from "./utils/logger.js";
