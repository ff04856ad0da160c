// Loader for the versioned classification and routing tables under data/

import fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";
import type { CrossCheckKind, Domain, Priority, TaskSource } from "../types/index.js";
import { ConfigError } from "../utils/errors.js";
import { formatIssues } from "./index.js";

const DEFAULT_SIGNALS_PATH = fileURLToPath(new URL("../../data/signals.json", import.meta.url));
const DEFAULT_RULES_PATH = fileURLToPath(new URL("../../data/rules.json", import.meta.url));

const SourceSchema: z.ZodType<TaskSource> = z.enum([
  "inbox",
  "external-email",
  "external-social",
  "business-messaging",
  "personal-messaging",
  "manual",
]);

const DomainSchema: z.ZodType<Domain> = z.enum(["personal", "business", "both"]);

const PrioritySchema: z.ZodType<Priority> = z.enum(["low", "medium", "high"]);

const CrossCheckSchema: z.ZodType<CrossCheckKind> = z.enum(["invoice", "bank_balance", "contact"]);

const KeywordListSchema = z.array(z.string().min(1).transform((kw) => kw.toLowerCase()));

const PatternSchema = z.string().min(1).refine(
  (pattern) => {
    try {
      new RegExp(pattern, "i");
      return true;
    } catch {
      return false;
    }
  },
  { message: "not a valid regular expression" }
);

export const SignalTableSchema = z.object({
  version: z.number().int().positive(),
  business: z.record(KeywordListSchema),
  personal: z.record(KeywordListSchema),
  categories: z.array(z.object({ name: z.string().min(1), keywords: KeywordListSchema })),
  defaultCategory: z.string().min(1),
  urgentKeywords: KeywordListSchema,
  monetaryPattern: PatternSchema,
  actionVerbPattern: PatternSchema,
  sensitiveCategories: z.array(z.string().min(1)),
  sensitiveSources: z.array(SourceSchema),
  metadataFields: z.array(z.string().min(1)),
});

export type SignalTable = z.infer<typeof SignalTableSchema>;

export const RuleConditionSchema = z
  .object({
    sources: z.array(SourceSchema).optional(),
    domains: z.array(DomainSchema).optional(),
    monetary: z.boolean().optional(),
    urgent: z.boolean().optional(),
    /** Matches when any of these business categories has a hit */
    businessCategories: z.array(z.string().min(1)).optional(),
    anyPersonalSignal: z.boolean().optional(),
    /** Matches when the classified text contains any of these keywords */
    contentKeywords: KeywordListSchema.optional(),
  })
  .strict();

export type RuleCondition = z.infer<typeof RuleConditionSchema>;

export const RuleActionSchema = z
  .object({
    domain: DomainSchema.optional(),
    priority: PrioritySchema.optional(),
    forceApproval: z.boolean().default(false),
    crossChecks: z.array(CrossCheckSchema).default([]),
    split: z.boolean().default(false),
  })
  .strict();

export type RuleAction = z.infer<typeof RuleActionSchema>;

export const RuleSchema = z.object({
  id: z.string().min(1),
  description: z.string().min(1),
  when: RuleConditionSchema,
  then: RuleActionSchema,
});

export type Rule = z.infer<typeof RuleSchema>;

export const RuleTableSchema = z
  .object({
    version: z.number().int().positive(),
    rules: z.array(RuleSchema),
  })
  .superRefine((table, ctx) => {
    const seen = new Set<string>();
    for (const [index, rule] of table.rules.entries()) {
      if (rule.id === "none") {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["rules", index, "id"], message: '"none" is reserved' });
      }
      if (seen.has(rule.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["rules", index, "id"], message: `duplicate rule id ${rule.id}` });
      }
      seen.add(rule.id);
    }
  });

export type RuleTable = z.infer<typeof RuleTableSchema>;

export function loadSignalTable(filePath: string = DEFAULT_SIGNALS_PATH): SignalTable {
  return loadTable(filePath, SignalTableSchema);
}

export function loadRuleTable(filePath: string = DEFAULT_RULES_PATH): RuleTable {
  return loadTable(filePath, RuleTableSchema);
}

function loadTable<T extends z.ZodTypeAny>(filePath: string, schema: T): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to read table ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid table ${filePath}`, formatIssues(result.error.issues));
  }
  return result.data;
}
