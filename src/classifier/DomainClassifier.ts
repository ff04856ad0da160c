// Domain and sensitivity classification over fixed signal tables

import type { SignalTable } from "../config/tables.js";
import type { Classification, Domain, SignalHits, Signals, TaskSource } from "../types/index.js";

/**
 * Pure: the same content, source and metadata always classify the same way.
 */
export class DomainClassifier {
  private monetary: RegExp;
  private actionVerb: RegExp;

  constructor(private table: SignalTable) {
    this.monetary = new RegExp(table.monetaryPattern, "i");
    this.actionVerb = new RegExp(table.actionVerbPattern, "i");
  }

  classify(content: string, source: TaskSource, metadata: Record<string, string> = {}): Classification {
    const signals = this.detectSignals(content, source, metadata);
    const category = this.categorize(this.inspectedText(content, metadata));
    return {
      domain: decideDomain(signals),
      sensitive: this.isSensitive(category, signals),
      category,
      signals,
    };
  }

  /**
   * Content plus the metadata fields the table names, lower-cased.
   */
  inspectedText(content: string, metadata: Record<string, string>): string {
    const parts = [content];
    for (const field of this.table.metadataFields) {
      const value = metadata[field];
      if (value) {
        parts.push(value);
      }
    }
    return parts.join("\n").toLowerCase();
  }

  detectSignals(content: string, source: TaskSource, metadata: Record<string, string> = {}): Signals {
    const text = this.inspectedText(content, metadata);
    return {
      business: matchCategories(text, this.table.business),
      personal: matchCategories(text, this.table.personal),
      monetary: this.monetary.test(text),
      urgent: this.table.urgentKeywords.some((kw) => text.includes(kw)),
      actionVerb: this.actionVerb.test(text),
      source,
    };
  }

  private categorize(text: string): string {
    for (const category of this.table.categories) {
      if (category.keywords.some((kw) => text.includes(kw))) {
        return category.name;
      }
    }
    return this.table.defaultCategory;
  }

  private isSensitive(category: string, signals: Signals): boolean {
    return (
      this.table.sensitiveCategories.includes(category) ||
      this.table.sensitiveSources.includes(signals.source) ||
      signals.actionVerb ||
      signals.monetary
    );
  }
}

function matchCategories(text: string, categories: Record<string, string[]>): SignalHits {
  const hits: SignalHits = {};
  for (const [name, keywords] of Object.entries(categories)) {
    const matched = keywords.filter((kw) => text.includes(kw));
    if (matched.length > 0) {
      hits[name] = matched;
    }
  }
  return hits;
}

export function countHits(hits: SignalHits): number {
  return Object.values(hits).reduce((sum, kws) => sum + kws.length, 0);
}

/**
 * Business only -> business, personal only -> personal, both -> both,
 * neither -> personal.
 */
export function decideDomain(signals: Pick<Signals, "business" | "personal">): Domain {
  const business = countHits(signals.business) > 0;
  const personal = countHits(signals.personal) > 0;
  if (business && personal) {
    return "both";
  }
  return business ? "business" : "personal";
}
