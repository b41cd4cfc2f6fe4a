import { promises as fs } from "node:fs";
import { z } from "zod";

import type { ComplaintCase, EngineResult } from "../models/complaint.js";
import type { ConditionValue, OperatorCondition, PolicyRule, RuleCondition } from "../models/policy.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";
import { decisionSchema } from "../db/schemas.js";
import { caseFieldValue } from "./caseFields.js";

const conditionValueSchema: z.ZodType<ConditionValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(conditionValueSchema)])
);

/** `op` defaults to "eq"; operators the engine does not know never fail a rule. */
const operatorConditionSchema: z.ZodType<OperatorCondition, z.ZodTypeDef, unknown> = z.object({
  op: z.string().default("eq"),
  value: conditionValueSchema.default(null),
});

const ruleSchema = z.object({
  id: z.string(),
  description: z.string().optional(),
  conditions: z.record(z.union([operatorConditionSchema, conditionValueSchema])).default({}),
  decision: decisionSchema.default("escalate"),
  confidence: z.number().min(0).max(1).default(0.85),
  reason: z.string().default("Policy rule applied"),
  category: z.string().optional(),
});

const policyFileSchema = z.union([z.array(ruleSchema), z.object({ rules: z.array(ruleSchema) })]);

export function parsePolicyRules(raw: unknown): PolicyRule[] {
  const parsed = policyFileSchema.parse(raw);
  return Array.isArray(parsed) ? parsed : parsed.rules;
}

/**
 * A missing or unreadable policy file leaves the engine with no rules.
 */
export async function loadPolicyRules(filePath: string, log: Logger = rootLogger): Promise<PolicyRule[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (error) {
    log.warn("Policy file not readable", { path: filePath, error: describeError(error) });
    return [];
  }
  try {
    const rules = parsePolicyRules(JSON.parse(raw));
    log.info("Loaded policy rules", { count: rules.length, path: filePath });
    return rules;
  } catch (error) {
    log.error("Error loading policy rules", { path: filePath, error: describeError(error) });
    return [];
  }
}

function isOperatorCondition(condition: RuleCondition): condition is OperatorCondition {
  return typeof condition === "object" && condition !== null && !Array.isArray(condition) && "op" in condition;
}

function compareOrdered(actual: unknown, expected: ConditionValue): number | null {
  if (typeof actual === "number" && typeof expected === "number") {
    return actual - expected;
  }
  if (typeof actual === "string" && typeof expected === "string") {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return null;
}

function valuesEqual(actual: unknown, expected: ConditionValue): boolean {
  if (Array.isArray(expected)) {
    return (
      Array.isArray(actual) &&
      actual.length === expected.length &&
      expected.every((value, index) => valuesEqual(actual[index], value))
    );
  }
  return actual === expected;
}

function conditionHolds(actual: unknown, condition: RuleCondition): boolean {
  if (!isOperatorCondition(condition)) {
    return valuesEqual(actual, condition);
  }

  const { op, value } = condition;
  switch (op) {
    case "eq":
      return valuesEqual(actual, value);
    case "ne":
      return !valuesEqual(actual, value);
    case "gt":
    case "gte":
    case "lt":
    case "lte": {
      if (actual === undefined || actual === null) return false;
      const diff = compareOrdered(actual, value);
      if (diff === null) return false;
      if (op === "gt") return diff > 0;
      if (op === "gte") return diff >= 0;
      if (op === "lt") return diff < 0;
      return diff <= 0;
    }
    case "in":
      if (Array.isArray(value)) return value.some((entry) => valuesEqual(actual, entry));
      if (typeof value === "string") return typeof actual === "string" && value.includes(actual);
      return false;
    case "contains":
      return String(actual).includes(String(value));
    default:
      return true;
  }
}

export function matchRule(rule: PolicyRule, complaintCase: ComplaintCase): boolean {
  return Object.entries(rule.conditions).every(([field, condition]) =>
    conditionHolds(caseFieldValue(complaintCase, field), condition)
  );
}

export class PolicyEngine {
  constructor(
    private rules: PolicyRule[],
    private readonly log: Logger = rootLogger
  ) {}

  get ruleCount(): number {
    return this.rules.length;
  }

  replaceRules(rules: PolicyRule[]): void {
    this.rules = rules;
  }

  /** First matching rule wins. */
  apply(complaintCase: ComplaintCase): EngineResult | null {
    for (const rule of this.rules) {
      if (matchRule(rule, complaintCase)) {
        this.log.info("Rule matched", { ruleId: rule.id, orderId: complaintCase.orderId });
        return {
          decision: rule.decision,
          confidence: rule.confidence,
          source: "policy",
          reason: rule.reason,
          ruleId: rule.id,
          category: rule.category ?? complaintCase.orderStatus,
        };
      }
    }
    return null;
  }
}
