/**
 * Orchestrator Module
 *
 * Wires the State Store, audit log, approval gate, escalation ladder and
 * pipeline into a CycleRunner for one vault.
 */

import { AuditLog } from "../audit/AuditLog.js";
import { ApprovalGate } from "../approval/ApprovalGate.js";
import { FileApprovalPools } from "../approval/FileApprovalPools.js";
import { DomainClassifier } from "../classifier/DomainClassifier.js";
import { loadRuleTable, loadSignalTable, type RuleTable, type SignalTable } from "../config/tables.js";
import { DashboardProjector } from "../dashboard/DashboardProjector.js";
import { EscalationLadder, policyFromConfig } from "../escalation/EscalationLadder.js";
import { FailureClassifier } from "../escalation/FailureClassifier.js";
import type { ActionExecutor, ContentDrafter, LedgerClient } from "../execution/types.js";
import { InboxReader } from "../ingestion/InboxReader.js";
import { Ingestor } from "../ingestion/Ingestor.js";
import { PlanBuilder } from "../planner/PlanBuilder.js";
import { RuleEngine } from "../rules/RuleEngine.js";
import { DeferredQueue } from "../store/DeferredQueue.js";
import { RunLock } from "../store/RunLock.js";
import { StateStore } from "../store/StateStore.js";
import type { Clock, Sleeper, SystemConfig } from "../types/index.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { AlertResolver } from "./AlertResolver.js";
import { CycleRunner, type ItemSource } from "./CycleRunner.js";
import { TaskPipeline } from "./TaskPipeline.js";
import { TaskStateMachine } from "./TaskStateMachine.js";

export { CycleRunner, type ItemSource } from "./CycleRunner.js";
export { TaskPipeline } from "./TaskPipeline.js";
export { AlertResolver } from "./AlertResolver.js";
export { TaskStateMachine, isTerminal, isValidTransition, resolvePlanStatuses } from "./TaskStateMachine.js";
export type { CycleReport, CycleOptions, DecisionMap, FinishedTask } from "./types.js";

export interface Collaborators {
  executor: ActionExecutor;
  ledger?: LedgerClient;
  drafter?: ContentDrafter;
  /** Defaults to the vault inbox */
  items?: ItemSource;
}

export interface OrchestratorOptions {
  logger?: Logger;
  clock?: Clock;
  sleep?: Sleeper;
  signals?: SignalTable;
  rules?: RuleTable;
}

export interface Orchestrator {
  runner: CycleRunner;
  store: StateStore;
  audit: AuditLog;
  gate: ApprovalGate;
  deferredQueue: DeferredQueue;
  projector: DashboardProjector;
}

const defaultSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Build everything a cycle needs for the vault at `config.vaultRoot`.
 */
export function createOrchestrator(
  config: SystemConfig,
  collaborators: Collaborators,
  options: OrchestratorOptions = {}
): Orchestrator {
  const logger = options.logger ?? createLogger({ level: config.logLevel, logsPath: config.logsPath });
  const clock = options.clock ?? (() => new Date());
  const sleep = options.sleep ?? defaultSleep;

  const signals = options.signals ?? loadSignalTable(config.signalsPath);
  const rules = options.rules ?? loadRuleTable(config.rulesPath);

  const store = new StateStore(config.vaultRoot, { clock, logger: logger.forLayer("state") });
  const audit = new AuditLog(store.paths.audit, { clock, logger: logger.forLayer("audit") });
  const deferredQueue = new DeferredQueue(store.paths.deferredQueue, { clock, logger: logger.forLayer("escalation") });
  const gate = new ApprovalGate(new FileApprovalPools(store.paths.approvals), audit, {
    clock,
    logger: logger.forLayer("approval"),
  });
  const stateMachine = new TaskStateMachine(store, audit, { clock, logger: logger.forLayer("state") });
  const failures = new FailureClassifier(config);
  const ladder = new EscalationLadder({
    policy: policyFromConfig(config),
    retryCooldownMs: config.retryCooldownMs,
    classifier: failures,
    audit,
    store,
    stateMachine,
    deferredQueue,
    gate,
    sleep,
    clock,
    logger: logger.forLayer("escalation"),
  });

  const pipeline = new TaskPipeline({
    config,
    store,
    audit,
    gate,
    classifier: new DomainClassifier(signals),
    rules: new RuleEngine(rules),
    planner: new PlanBuilder(clock),
    stateMachine,
    ladder,
    failures,
    executor: collaborators.executor,
    ledger: collaborators.ledger,
    drafter: collaborators.drafter,
    sleep,
    clock,
    logger: logger.forLayer("cycle"),
  });

  const projector = new DashboardProjector(
    { store, deferredQueue, gate, audit },
    { recentActivityLimit: config.recentActivityLimit, clock, logger: logger.forLayer("dashboard") }
  );

  const runner = new CycleRunner({
    lock: new RunLock(store.paths.lock, logger.forLayer("state")),
    store,
    audit,
    items: collaborators.items ?? new InboxReader(store.paths.inbox, logger.forLayer("ingestion")),
    ingestor: new Ingestor(store, audit, { clock, logger: logger.forLayer("ingestion") }),
    gate,
    pipeline,
    alerts: new AlertResolver({
      config,
      store,
      audit,
      deferredQueue,
      ladder,
      pipeline,
      executor: collaborators.executor,
      clock,
      logger: logger.forLayer("escalation"),
    }),
    projector,
    failures,
    clock,
    logger: logger.forLayer("cycle"),
  });

  return { runner, store, audit, gate, deferredQueue, projector };
}

