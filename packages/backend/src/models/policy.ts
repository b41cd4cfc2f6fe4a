import type { Decision } from "./complaint.js";

export type ConditionValue = string | number | boolean | null | ConditionValue[];

export interface OperatorCondition {
  /** eq, ne, gt, gte, lt, lte, in or contains; any other operator is ignored. */
  op: string;
  value: ConditionValue;
}

export type RuleCondition = ConditionValue | OperatorCondition;

export interface PolicyRule {
  id: string;
  description?: string;
  /** Case field name (snake_case, as written in the policy file) to expected value. */
  conditions: Record<string, RuleCondition>;
  decision: Decision;
  confidence: number;
  reason: string;
  category?: string;
}
