// Ordered cross-domain rule table, first match wins

import type { Rule, RuleCondition, RuleTable } from "../config/tables.js";
import type { Classification, Priority, RuleDecision } from "../types/index.js";
import { countHits } from "../classifier/DomainClassifier.js";

export const NO_RULE = "none";

export interface RuleInput {
  /** Lower-cased text the classifier inspected (content plus header fields) */
  text: string;
  classification: Classification;
}

export class RuleEngine {
  constructor(private table: RuleTable) {}

  get rules(): readonly Rule[] {
    return this.table.rules;
  }

  /**
   * Evaluate rules in table order. Without a match the task routes by
   * sensitivity alone.
   */
  evaluate(input: RuleInput): RuleDecision {
    const { classification } = input;
    const match = this.table.rules.find((rule) => matches(rule.when, input));

    if (!match) {
      return {
        ruleApplied: NO_RULE,
        description: "No special routing",
        domain: classification.domain,
        priority: defaultPriority(classification),
        forceApproval: false,
        crossChecks: [],
        split: false,
      };
    }

    const domain = match.then.domain ?? classification.domain;
    return {
      ruleApplied: match.id,
      description: match.description,
      domain,
      priority: match.then.priority ?? defaultPriority(classification),
      forceApproval: match.then.forceApproval,
      crossChecks: [...match.then.crossChecks],
      // Splitting only makes sense once the task actually spans both domains
      split: match.then.split && domain === "both",
    };
  }
}

function defaultPriority(classification: Classification): Priority {
  return classification.signals.urgent ? "high" : "medium";
}

/**
 * Every condition present on the rule must hold.
 */
export function matches(when: RuleCondition, input: RuleInput): boolean {
  const { signals, domain } = input.classification;

  if (when.sources && !when.sources.includes(signals.source)) {
    return false;
  }
  if (when.domains && !when.domains.includes(domain)) {
    return false;
  }
  if (when.monetary !== undefined && signals.monetary !== when.monetary) {
    return false;
  }
  if (when.urgent !== undefined && signals.urgent !== when.urgent) {
    return false;
  }
  if (when.businessCategories && !when.businessCategories.some((c) => (signals.business[c]?.length ?? 0) > 0)) {
    return false;
  }
  if (when.anyPersonalSignal !== undefined && countHits(signals.personal) > 0 !== when.anyPersonalSignal) {
    return false;
  }
  if (when.contentKeywords && !when.contentKeywords.some((kw) => input.text.includes(kw))) {
    return false;
  }
  return true;
}
