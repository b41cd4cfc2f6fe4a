import { z } from "zod";

import type { ComplaintCase, ComplaintRecord } from "../models/complaint.js";
import type { CustomerProfile } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";

export const decisionSchema = z.enum(["refund", "deny", "escalate"]);
export const severitySchema = z.enum(["critical", "high", "medium", "low"]);
export const fraudRiskSchema = z.enum(["low", "medium", "high", "critical"]);
export const decisionSourceSchema = z.enum(["policy", "ml", "system"]);
export const riskTierSchema = z.enum(["vip", "trusted", "normal", "watch", "flagged", "unknown"]);

export const complaintCaseSchema: z.ZodType<ComplaintCase> = z.object({
  orderId: z.string(),
  orderStatus: z.string(),
  complaintText: z.string(),
  refundHistory30d: z.number(),
  handoffPhoto: z.boolean(),
  courierRating: z.number(),
  orderValue: z.number(),
  customerId: z.string(),
  evidenceCount: z.number(),
});

export const complaintRecordSchema: z.ZodType<ComplaintRecord> = z.object({
  complaintId: z.string(),
  orderId: z.string(),
  customerId: z.string(),
  timestamp: z.string(),
  decision: decisionSchema,
  confidence: z.number(),
  source: decisionSourceSchema,
  ruleId: z.string().nullable(),
  severity: severitySchema,
  categories: z.array(z.string()),
  rootCause: z.string(),
  fraudRisk: fraudRiskSchema,
  fraudScore: z.number(),
  slaDeadline: z.string(),
  resolvedAt: z.string().nullable(),
  caseData: complaintCaseSchema,
  createdAt: z.string(),
});

export const feedbackRecordSchema: z.ZodType<FeedbackRecord> = z.object({
  complaintId: z.string(),
  originalDecision: decisionSchema,
  correctedDecision: decisionSchema,
  reason: z.string(),
  agent: z.string(),
  timestamp: z.string(),
});

export const customerProfileSchema: z.ZodType<CustomerProfile> = z.object({
  customerId: z.string(),
  email: z.string().nullable(),
  totalComplaints: z.number(),
  totalRefunds: z.number(),
  totalDenials: z.number(),
  fraudFlags: z.number(),
  lifetimeValue: z.number(),
  riskTier: riskTierSchema,
  firstSeen: z.string(),
  lastSeen: z.string(),
});
