/**
 * PlanBuilder Unit Tests
 */

import { describe, it, expect } from "vitest";
import { loadRuleTable, loadSignalTable } from "../config/tables.js";
import { DomainClassifier } from "../classifier/DomainClassifier.js";
import { RuleEngine } from "../rules/RuleEngine.js";
import type { Task } from "../types/index.js";
import { CHECKLIST, PlanBuilder, planIdsFor, renderPlan, tickItem, type CrossCheckOutcome } from "./PlanBuilder.js";

const NOW = new Date("2026-03-02T09:00:00.000Z");
const clock = () => NOW;
const classifier = new DomainClassifier(loadSignalTable());
const rules = new RuleEngine(loadRuleTable());
const builder = new PlanBuilder(clock);

function task(content: string, source: Task["source"]): Task {
  return {
    name: "TASK_20260302T090000_abcd1234",
    dedupKey: "abcd1234abcd1234",
    status: "processing",
    source,
    domain: "personal",
    sensitive: false,
    priority: "medium",
    retryCount: 0,
    retryAfter: null,
    planRefs: [],
    category: "",
    ruleApplied: "",
    metadata: {},
    timestamps: { received: NOW.toISOString(), lastUpdated: NOW.toISOString() },
    content,
  };
}

function buildFor(content: string, source: Task["source"], crossChecks: CrossCheckOutcome[] = []) {
  const classification = classifier.classify(content, source);
  const decision = rules.evaluate({ text: classifier.inspectedText(content, {}), classification });
  const requiresApproval = classification.sensitive || decision.forceApproval || crossChecks.some((c) => !c.ok);
  return builder.build({ task: task(content, source), classification, decision, crossChecks, requiresApproval });
}

describe("planIdsFor", () => {
  it("names one plan, or one per domain when split", () => {
    expect(planIdsFor("TASK_X", false)).toEqual(["PLAN_TASK_X"]);
    expect(planIdsFor("TASK_X", true)).toEqual(["PLAN_PERSONAL_TASK_X", "PLAN_BUSINESS_TASK_X"]);
  });
});

describe("PlanBuilder", () => {
  it("builds an approval checklist for a sensitive payment", () => {
    const [plan, ...rest] = buildFor("Please wire $500 to vendor X, urgent", "business-messaging");

    expect(rest).toEqual([]);
    expect(plan).toMatchObject({
      id: "PLAN_TASK_20260302T090000_abcd1234",
      taskRef: "TASK_20260302T090000_abcd1234",
      category: "payment",
      domain: "business",
      status: "awaiting_approval",
      sensitive: true,
      ruleApplied: "urgent-escalation",
      createdAt: NOW.toISOString(),
    });
    expect(plan?.checklist).toEqual([
      { text: CHECKLIST.review, done: true },
      { text: CHECKLIST.approval, done: false },
      { text: "Execute payment", done: false },
      { text: CHECKLIST.archive, done: false },
    ]);
    expect(plan?.agentNotes).toEqual([
      "Rule applied: urgent-escalation (Urgent business task: immediate escalation to a human)",
      "Signals: business:operations, monetary, urgent",
    ]);
  });

  it("splits a dual-domain task into personal and business plans", () => {
    const plans = buildFor("Book a vendor dinner for the family", "manual");

    expect(plans.map((p) => [p.id, p.domain, p.status])).toEqual([
      ["PLAN_PERSONAL_TASK_20260302T090000_abcd1234", "personal", "open"],
      ["PLAN_BUSINESS_TASK_20260302T090000_abcd1234", "business", "open"],
    ]);
    expect(plans[0]?.checklist.map((i) => i.text)).toEqual([
      CHECKLIST.review,
      "Execute record_task",
      CHECKLIST.archive,
    ]);
    expect(plans[1]?.agentNotes).toContain("Split from TASK_20260302T090000_abcd1234: business side");
  });

  it("records cross-check outcomes as checklist items and notes", () => {
    const outcome: CrossCheckOutcome = { kind: "invoice", ok: false, note: "invoice check failed: no match" };
    const [plan] = buildFor("See attached invoice", "external-email", [outcome]);

    expect(plan?.crossChecks).toEqual(["invoice"]);
    expect(plan?.checklist[1]).toEqual({ text: "Cross-check invoice against the ledger", done: false });
    expect(plan?.agentNotes).toContain("invoice check failed: no match");
  });
});

describe("tickItem", () => {
  it("marks a matching open item done", () => {
    const [plan] = buildFor("Water the plants", "manual");
    if (!plan) throw new Error("no plan built");

    const ticked = tickItem(plan, "Execute record_task", clock);

    expect(ticked.checklist.find((i) => i.text === "Execute record_task")?.done).toBe(true);
  });

  it("returns the same plan when nothing changes", () => {
    const [plan] = buildFor("Water the plants", "manual");
    if (!plan) throw new Error("no plan built");

    expect(tickItem(plan, CHECKLIST.review, clock)).toBe(plan);
    expect(tickItem(plan, "Not an item", clock)).toBe(plan);
  });
});

describe("renderPlan", () => {
  it("renders the checklist as markdown boxes", () => {
    const [plan] = buildFor("Water the plants", "manual");
    if (!plan) throw new Error("no plan built");

    const markdown = renderPlan(plan);

    expect(markdown.startsWith("# PLAN_TASK_20260302T090000_abcd1234\n")).toBe(true);
    expect(markdown).toContain("- [x] Review task content and classification\n- [ ] Execute record_task\n- [ ] Archive task");
    expect(markdown).toContain("## Original Content\n\nWater the plants\n");
  });
});
