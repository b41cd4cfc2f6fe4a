import { createHash, randomUUID } from "node:crypto";
import { parse } from "csv-parse/sync";
import { z } from "zod";

import {
  ANONYMOUS_CUSTOMER,
  type ComplaintCase,
  type ComplaintRecord,
  type Decision,
  type DecisionSource,
  type EngineResult,
  type FraudRisk,
  type Severity,
} from "../models/complaint.js";
import { BadRequestError } from "../lib/errors.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";
import { titleCase } from "../lib/text.js";
import type { AuditLogService } from "./auditLogService.js";
import type { CustomerHistoryService, CustomerSummary } from "./customerHistoryService.js";
import type { FraudAssessment, FraudDetector, FraudFlag } from "./fraudDetector.js";
import type { ExplanationFactor, HybridEngine } from "./hybridEngine.js";
import type { ComplaintAnalysis, ComplaintIntelligence, Sentiment, SuggestedAction } from "./intelligenceService.js";
import type { MailerService } from "./mailerService.js";

export const SLA_MINUTES: Record<Severity, number> = {
  critical: 30,
  high: 120,
  medium: 480,
  low: 1440,
};

const TRUTHY_FLAGS = ["true", "yes", "1"];

function isTruthyFlag(value: unknown): boolean {
  return TRUTHY_FLAGS.includes(String(value ?? "unknown").trim().toLowerCase());
}

/** Absent, empty or zero values fall back to the default. */
function numberField(fallback: number) {
  return z.preprocess(
    (value) => (value === undefined || value === null || value === "" || value === 0 || value === false ? fallback : value),
    z.coerce.number().finite()
  );
}

const textField = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

export const decideRequestSchema = z.object({
  order_id: textField,
  complaint_text: textField,
  issue_type: textField,
  email: textField,
  customer_id: textField,
  handoff_photo: z.unknown().transform(isTruthyFlag),
  refund_history_30d: numberField(0).transform((value) => Math.max(0, Math.trunc(value))),
  courier_rating: numberField(4.5),
  order_value: numberField(15),
  evidence_files: z.array(z.string()).default([]),
});

export type DecideRequest = z.infer<typeof decideRequestSchema>;

export interface AgentSummary {
  headline: string;
  key_facts: string[];
  recommendation: string;
  confidence_level: "High" | "Medium" | "Low";
}

export interface ResponseTemplate {
  id: string;
  title: string;
  text: string;
}

export interface AlternativeDecision {
  decision: Decision;
  reason: string;
  confidence_impact: number;
}

export interface DecisionDocument {
  complaint_id: string;
  order_id: string;
  timestamp: string;
  decision: Decision;
  confidence: number;
  source: DecisionSource;
  rule_id: string | null;
  reason: string;
  severity: Severity;
  sla_deadline: string;
  sla_minutes: number;
  categories: string[];
  root_cause: string;
  sentiment: Sentiment;
  explanation: string;
  suggested_actions: SuggestedAction[];
  decision_factors: ExplanationFactor[];
  fraud_risk: FraudRisk;
  fraud_score: number;
  fraud_flags: FraudFlag[];
  customer_history: {
    total_complaints: number;
    recent_complaints: number;
    refund_rate: number;
    lifetime_value: number;
    risk_tier: string;
  };
  agent_summary: AgentSummary;
  response_templates: ResponseTemplate[];
  alternative_decisions: AlternativeDecision[];
  email_sent: boolean;
}

export interface BatchResult {
  order_id: string;
  decision: Decision;
  confidence: number;
  severity: Severity;
  categories: string[];
}

const RESPONSE_TEMPLATES: Record<Decision, ResponseTemplate[]> = {
  refund: [
    {
      id: "full_refund",
      title: "Full Refund",
      text: "We apologize for the inconvenience. A full refund of ${amount} has been processed to your original payment method. Please allow 3-5 business days for it to appear.",
    },
    {
      id: "partial_refund",
      title: "Partial Refund",
      text: "We've processed a partial refund of ${amount} for the affected items. The amount will appear in your account within 3-5 business days.",
    },
    {
      id: "credit",
      title: "Account Credit",
      text: "We've added ${amount} in store credit to your account as compensation. This credit will be automatically applied to your next order.",
    },
  ],
  deny: [
    {
      id: "policy",
      title: "Policy Explanation",
      text: "After reviewing your request, we're unable to process a refund at this time as the order was delivered as described. If you have additional information, please share it with us.",
    },
    {
      id: "abuse_warning",
      title: "Account Warning",
      text: "We've noticed multiple refund requests from your account recently. Please note that misuse of our refund policy may result in account restrictions.",
    },
  ],
  escalate: [
    {
      id: "escalate_ack",
      title: "Escalation Acknowledgment",
      text: "Your case has been escalated to our senior support team for further review. You'll receive an update within 24-48 hours.",
    },
    {
      id: "more_info",
      title: "Request More Info",
      text: "To help us resolve your issue, could you please provide additional details or photos of the problem?",
    },
  ],
};

export function responseTemplatesFor(decision: Decision): ResponseTemplate[] {
  return RESPONSE_TEMPLATES[decision];
}

export function alternativesFor(decision: Decision): AlternativeDecision[] {
  const alternatives: AlternativeDecision[] = [];
  if (decision !== "refund") {
    alternatives.push({
      decision: "refund",
      reason: "Customer has good history and issue seems legitimate",
      confidence_impact: -0.1,
    });
  }
  if (decision !== "deny") {
    alternatives.push({
      decision: "deny",
      reason: "Pattern suggests potential abuse or policy violation",
      confidence_impact: -0.15,
    });
  }
  if (decision !== "escalate") {
    alternatives.push({ decision: "escalate", reason: "Case complexity requires human review", confidence_impact: 0 });
  }
  return alternatives;
}

export function confidenceLevel(confidence: number): AgentSummary["confidence_level"] {
  if (confidence > 0.8) return "High";
  if (confidence > 0.6) return "Medium";
  return "Low";
}

export function buildAgentSummary(
  complaintCase: ComplaintCase,
  result: EngineResult,
  analysis: ComplaintAnalysis,
  fraud: FraudAssessment
): AgentSummary {
  return {
    headline: `${result.decision.toUpperCase()} - ${analysis.severity.toUpperCase()} priority`,
    key_facts: [
      `Order: ${complaintCase.orderId}`,
      `Issue: ${titleCase(complaintCase.orderStatus)}`,
      `Refund history: ${complaintCase.refundHistory30d} in 30 days`,
      `Photo proof: ${complaintCase.handoffPhoto ? "Yes" : "No"}`,
      `Fraud risk: ${fraud.riskLevel.toUpperCase()}`,
    ],
    recommendation: result.reason || "Review case manually",
    confidence_level: confidenceLevel(result.confidence),
  };
}

export function customerIdFor(request: Pick<DecideRequest, "customer_id" | "email">): string {
  if (request.customer_id) return request.customer_id;
  if (request.email) return createHash("md5").update(request.email).digest("hex").slice(0, 12);
  return ANONYMOUS_CUSTOMER;
}

/** COMP-YYYYMMDDHHMMSS in UTC. */
export function defaultOrderId(now: Date): string {
  return `COMP-${now.toISOString().replace(/[-:T]/g, "").slice(0, 14)}`;
}

function historyDocument(summary: CustomerSummary): DecisionDocument["customer_history"] {
  return {
    total_complaints: summary.totalComplaints,
    recent_complaints: summary.recentComplaints,
    refund_rate: summary.refundRate,
    lifetime_value: summary.lifetimeValue,
    risk_tier: summary.riskTier,
  };
}

const batchRowsSchema = z.array(z.record(z.string()));

function parseOr(raw: string | undefined, fallback: number): number {
  const trimmed = raw?.trim() ?? "";
  const value = trimmed === "" ? Number.NaN : Number(trimmed);
  return Number.isFinite(value) ? value : fallback;
}

export interface DecisionServiceDeps {
  engine: HybridEngine;
  intelligence: ComplaintIntelligence;
  fraud: FraudDetector;
  history: CustomerHistoryService;
  audit: AuditLogService;
  mailer: MailerService;
  log?: Logger;
  clock?: () => Date;
}

/**
 * Runs one complaint through the engine, the intelligence layer, fraud
 * scoring and customer history, records it, and mails the requester.
 */
export class DecisionService {
  private readonly log: Logger;

  private readonly clock: () => Date;

  constructor(private readonly deps: DecisionServiceDeps) {
    this.log = (deps.log ?? rootLogger).child({ component: "decision-service" });
    this.clock = deps.clock ?? (() => new Date());
  }

  buildCase(request: DecideRequest, now: Date): ComplaintCase {
    return {
      orderId: request.order_id || defaultOrderId(now),
      orderStatus: request.issue_type || this.deps.intelligence.detectIssueType(request.complaint_text),
      complaintText: request.complaint_text,
      refundHistory30d: request.refund_history_30d,
      handoffPhoto: request.handoff_photo,
      courierRating: request.courier_rating,
      orderValue: request.order_value,
      customerId: customerIdFor(request),
      evidenceCount: request.evidence_files.length,
    };
  }

  async decide(body: unknown): Promise<DecisionDocument> {
    const request = decideRequestSchema.parse(body ?? {});
    const now = this.clock();
    const complaintCase = this.buildCase(request, now);
    const { engine, intelligence, fraud, history, audit, mailer } = this.deps;

    const result = engine.predict(complaintCase);
    const analysis = intelligence.analyze(complaintCase.complaintText, complaintCase);
    const fraudResult = await fraud.assess(complaintCase.customerId, complaintCase.orderValue, now);
    const summary = await history.getSummary(complaintCase.customerId, now);

    const slaMinutes = SLA_MINUTES[analysis.severity];
    const slaDeadline = new Date(now.getTime() + slaMinutes * 60_000).toISOString();
    const timestamp = now.toISOString();
    const complaintId = randomUUID().slice(0, 12).toUpperCase();

    const record: ComplaintRecord = {
      complaintId,
      orderId: complaintCase.orderId,
      customerId: complaintCase.customerId,
      timestamp,
      decision: result.decision,
      confidence: result.confidence,
      source: result.source,
      ruleId: result.ruleId,
      severity: analysis.severity,
      categories: analysis.categories,
      rootCause: analysis.rootCause,
      fraudRisk: fraudResult.riskLevel,
      fraudScore: fraudResult.score,
      slaDeadline,
      resolvedAt: null,
      caseData: complaintCase,
      createdAt: timestamp,
    };
    await audit.logComplaint(record);

    const emailSent = await mailer.sendDecisionEmail(request.email, {
      orderId: complaintCase.orderId,
      decision: result.decision,
      confidence: result.confidence,
      reason: analysis.explanation,
      category: analysis.categories[0] ?? "general",
      severity: analysis.severity,
    });

    this.log.info("Complaint decided", {
      complaintId,
      orderId: complaintCase.orderId,
      decision: result.decision,
      source: result.source,
      severity: analysis.severity,
      fraudScore: fraudResult.score,
    });

    return {
      complaint_id: complaintId,
      order_id: complaintCase.orderId,
      timestamp,
      decision: result.decision,
      confidence: result.confidence,
      source: result.source,
      rule_id: result.ruleId,
      reason: result.reason,
      severity: analysis.severity,
      sla_deadline: slaDeadline,
      sla_minutes: slaMinutes,
      categories: analysis.categories,
      root_cause: analysis.rootCause,
      sentiment: analysis.sentiment,
      explanation: analysis.explanation,
      suggested_actions: analysis.suggestedActions,
      decision_factors: engine.factors(complaintCase),
      fraud_risk: fraudResult.riskLevel,
      fraud_score: fraudResult.score,
      fraud_flags: fraudResult.flags,
      customer_history: historyDocument(summary),
      agent_summary: buildAgentSummary(complaintCase, result, analysis, fraudResult),
      response_templates: responseTemplatesFor(result.decision),
      alternative_decisions: alternativesFor(result.decision),
      email_sent: emailSent,
    };
  }

  /** Classifies CSV rows without recording them. */
  classifyBatch(csvText: string): { processed: number; results: BatchResult[] } {
    if (!csvText.trim()) {
      throw new BadRequestError("Invalid file. Please upload a CSV.");
    }
    let parsedCsv: unknown;
    try {
      parsedCsv = parse(csvText, { columns: true, skip_empty_lines: true, trim: true, relax_column_count: true });
    } catch (error) {
      throw new BadRequestError("Invalid file. Please upload a CSV.", describeError(error));
    }
    const rows = batchRowsSchema.parse(parsedCsv);
    const { engine, intelligence } = this.deps;

    const results = rows.map((row): BatchResult => {
      const text = row.complaint_text || row.text || "";
      const complaintCase: ComplaintCase = {
        orderId: row.order_id ?? "",
        orderStatus: row.issue_type || row.order_status || intelligence.detectIssueType(text),
        complaintText: text,
        refundHistory30d: Math.max(0, Math.trunc(parseOr(row.refund_history_30d, 0))),
        handoffPhoto: isTruthyFlag(row.handoff_photo ?? ""),
        courierRating: parseOr(row.courier_rating, 4.5),
        orderValue: parseOr(row.order_value, 15),
        customerId: row.customer_id || ANONYMOUS_CUSTOMER,
        evidenceCount: 0,
      };
      const result = engine.predict(complaintCase);
      const analysis = intelligence.analyze(text, complaintCase);
      return {
        order_id: complaintCase.orderId,
        decision: result.decision,
        confidence: result.confidence,
        severity: analysis.severity,
        categories: analysis.categories,
      };
    });

    this.log.info("Batch classified", { processed: results.length });
    return { processed: results.length, results };
  }
}
