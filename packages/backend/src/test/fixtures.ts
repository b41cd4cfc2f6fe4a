import path from "node:path";

import type { ComplaintCase, ComplaintRecord } from "../models/complaint.js";
import type { PolicyRule } from "../models/policy.js";
import { Logger } from "../lib/logger.js";

export const PATTERNS_PATH = path.resolve(__dirname, "../../../../data/intelligence-patterns.json");
export const POLICY_PATH = path.resolve(__dirname, "../../../../policies/policy_rules_base.json");

export const FIXED_NOW = new Date("2026-03-10T12:00:00.000Z");

export const quietLogger = new Logger({ level: "error", environment: "test" });

export function hoursBefore(now: Date, hours: number): string {
  return new Date(now.getTime() - hours * 60 * 60 * 1000).toISOString();
}

export function makeCase(overrides: Partial<ComplaintCase> = {}): ComplaintCase {
  return {
    orderId: "ORD-1",
    orderStatus: "missing_delivery",
    complaintText: "My order never arrived",
    refundHistory30d: 0,
    handoffPhoto: false,
    courierRating: 4.6,
    orderValue: 20,
    customerId: "cust-1",
    evidenceCount: 0,
    ...overrides,
  };
}

export function makeRecord(overrides: Partial<ComplaintRecord> = {}): ComplaintRecord {
  const timestamp = overrides.timestamp ?? FIXED_NOW.toISOString();
  const customerId = overrides.customerId ?? "cust-1";
  return {
    complaintId: "C-1",
    orderId: "ORD-1",
    customerId,
    timestamp,
    decision: "refund",
    confidence: 0.9,
    source: "policy",
    ruleId: "missing_no_photo_refund",
    severity: "medium",
    categories: ["missing_delivery"],
    rootCause: "unknown",
    fraudRisk: "low",
    fraudScore: 0,
    slaDeadline: new Date(Date.parse(timestamp) + 480 * 60_000).toISOString(),
    resolvedAt: null,
    caseData: makeCase({ customerId }),
    createdAt: timestamp,
    ...overrides,
  };
}

/** Rules used by the service and route tests. */
export const TEST_RULES: PolicyRule[] = [
  {
    id: "refund_abuse_deny",
    conditions: { refund_history_30d: { op: "gte", value: 5 } },
    decision: "deny",
    confidence: 0.92,
    reason: "Refund limit exceeded",
  },
  {
    id: "missing_no_photo_refund",
    conditions: {
      order_status: "missing_delivery",
      handoff_photo: false,
      refund_history_30d: { op: "lte", value: 2 },
    },
    decision: "refund",
    confidence: 0.9,
    reason: "Order reported missing and no proof of delivery was captured",
  },
];
