export type Decision = "refund" | "deny" | "escalate";

export const DECISIONS: readonly Decision[] = ["refund", "deny", "escalate"];

export type DecisionSource = "policy" | "ml" | "system";

export type Severity = "critical" | "high" | "medium" | "low";

export const SEVERITIES: readonly Severity[] = ["critical", "high", "medium", "low"];

export type FraudRisk = "low" | "medium" | "high" | "critical";

export const ANONYMOUS_CUSTOMER = "anonymous";

export interface ComplaintCase {
  orderId: string;
  /** Issue type, either supplied by the requester or detected from the text. */
  orderStatus: string;
  complaintText: string;
  refundHistory30d: number;
  handoffPhoto: boolean;
  courierRating: number;
  orderValue: number;
  customerId: string;
  evidenceCount: number;
}

export interface EngineResult {
  decision: Decision;
  confidence: number;
  source: DecisionSource;
  reason: string;
  ruleId: string | null;
  category: string;
}

export interface ComplaintRecord {
  complaintId: string;
  orderId: string;
  customerId: string;
  timestamp: string;
  decision: Decision;
  confidence: number;
  source: DecisionSource;
  ruleId: string | null;
  severity: Severity;
  categories: string[];
  rootCause: string;
  fraudRisk: FraudRisk;
  fraudScore: number;
  slaDeadline: string;
  resolvedAt: string | null;
  caseData: ComplaintCase;
  createdAt: string;
}

export function isDecision(value: unknown): value is Decision {
  return DECISIONS.some((decision) => decision === value);
}
