import { createClient, type PostgrestError, type SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";

import type { ComplaintRecord } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";
import { applyActivity, applyProfilePatch } from "./records.js";
import {
  complaintCaseSchema,
  decisionSchema,
  decisionSourceSchema,
  fraudRiskSchema,
  riskTierSchema,
  severitySchema,
} from "./schemas.js";
import type { ComplaintPage, ComplaintQuery, ComplaintStore, CustomerActivity, PageOptions } from "./types.js";

export interface SupabaseConfig {
  url: string;
  key: string;
}

const COMPLAINTS = "complaints";
const FEEDBACK = "complaint_feedback";
const CUSTOMERS = "customers";

const complaintRowSchema = z.object({
  complaint_id: z.string(),
  order_id: z.string(),
  customer_id: z.string(),
  timestamp: z.string(),
  decision: decisionSchema,
  confidence: z.coerce.number(),
  source: decisionSourceSchema,
  rule_id: z.string().nullable(),
  severity: severitySchema,
  categories: z.array(z.string()),
  root_cause: z.string(),
  fraud_risk: fraudRiskSchema,
  fraud_score: z.coerce.number(),
  sla_deadline: z.string(),
  resolved_at: z.string().nullable(),
  case_data: complaintCaseSchema,
  created_at: z.string(),
});

const feedbackRowSchema = z.object({
  complaint_id: z.string(),
  original_decision: decisionSchema,
  corrected_decision: decisionSchema,
  reason: z.string(),
  agent: z.string(),
  timestamp: z.string(),
});

const customerRowSchema = z.object({
  customer_id: z.string(),
  email: z.string().nullable(),
  total_complaints: z.coerce.number(),
  total_refunds: z.coerce.number(),
  total_denials: z.coerce.number(),
  fraud_flags: z.coerce.number(),
  lifetime_value: z.coerce.number(),
  risk_tier: riskTierSchema,
  first_seen: z.string(),
  last_seen: z.string(),
});

type ComplaintRow = z.infer<typeof complaintRowSchema>;
type FeedbackRow = z.infer<typeof feedbackRowSchema>;
type CustomerRow = z.infer<typeof customerRowSchema>;

function mapComplaint(raw: unknown): ComplaintRecord {
  const row = complaintRowSchema.parse(raw);
  return {
    complaintId: row.complaint_id,
    orderId: row.order_id,
    customerId: row.customer_id,
    timestamp: row.timestamp,
    decision: row.decision,
    confidence: row.confidence,
    source: row.source,
    ruleId: row.rule_id,
    severity: row.severity,
    categories: row.categories,
    rootCause: row.root_cause,
    fraudRisk: row.fraud_risk,
    fraudScore: row.fraud_score,
    slaDeadline: row.sla_deadline,
    resolvedAt: row.resolved_at,
    caseData: row.case_data,
    createdAt: row.created_at,
  };
}

function complaintToRow(record: ComplaintRecord): ComplaintRow {
  return {
    complaint_id: record.complaintId,
    order_id: record.orderId,
    customer_id: record.customerId,
    timestamp: record.timestamp,
    decision: record.decision,
    confidence: record.confidence,
    source: record.source,
    rule_id: record.ruleId,
    severity: record.severity,
    categories: record.categories,
    root_cause: record.rootCause,
    fraud_risk: record.fraudRisk,
    fraud_score: record.fraudScore,
    sla_deadline: record.slaDeadline,
    resolved_at: record.resolvedAt,
    case_data: record.caseData,
    created_at: record.createdAt,
  };
}

function mapFeedback(raw: unknown): FeedbackRecord {
  const row = feedbackRowSchema.parse(raw);
  return {
    complaintId: row.complaint_id,
    originalDecision: row.original_decision,
    correctedDecision: row.corrected_decision,
    reason: row.reason,
    agent: row.agent,
    timestamp: row.timestamp,
  };
}

function feedbackToRow(record: FeedbackRecord): FeedbackRow {
  return {
    complaint_id: record.complaintId,
    original_decision: record.originalDecision,
    corrected_decision: record.correctedDecision,
    reason: record.reason,
    agent: record.agent,
    timestamp: record.timestamp,
  };
}

function mapCustomer(raw: unknown): CustomerProfile {
  const row = customerRowSchema.parse(raw);
  return {
    customerId: row.customer_id,
    email: row.email,
    totalComplaints: row.total_complaints,
    totalRefunds: row.total_refunds,
    totalDenials: row.total_denials,
    fraudFlags: row.fraud_flags,
    lifetimeValue: row.lifetime_value,
    riskTier: row.risk_tier,
    firstSeen: row.first_seen,
    lastSeen: row.last_seen,
  };
}

function customerToRow(profile: CustomerProfile): CustomerRow {
  return {
    customer_id: profile.customerId,
    email: profile.email,
    total_complaints: profile.totalComplaints,
    total_refunds: profile.totalRefunds,
    total_denials: profile.totalDenials,
    fraud_flags: profile.fraudFlags,
    lifetime_value: profile.lifetimeValue,
    risk_tier: profile.riskTier,
    first_seen: profile.firstSeen,
    last_seen: profile.lastSeen,
  };
}

async function withRetry<T>(fn: () => Promise<T>, attempts = 3): Promise<T> {
  let lastError: unknown;
  for (let i = 0; i < attempts; i += 1) {
    try {
      return await fn();
    } catch (error) {
      lastError = error;
      await new Promise((resolve) => setTimeout(resolve, (i + 1) * 200));
    }
  }
  throw lastError;
}

function formatError(error: PostgrestError): string {
  return `${error.message} (${error.code})`;
}

/** Schema lives in `supabase/schema.sql`. */
export class SupabaseStore implements ComplaintStore {
  private readonly client: SupabaseClient;

  constructor(config: SupabaseConfig) {
    this.client = createClient(config.url, config.key, {
      auth: { persistSession: false },
    });
  }

  async saveComplaint(record: ComplaintRecord): Promise<ComplaintRecord> {
    const result = await withRetry(async () =>
      this.client
        .from(COMPLAINTS)
        .upsert(complaintToRow(record), { onConflict: "complaint_id" })
        .select("*")
        .single()
    );
    if (result.error) {
      throw new Error(`Supabase upsert failed: ${formatError(result.error)}`);
    }
    return mapComplaint(result.data);
  }

  async getComplaint(complaintId: string): Promise<ComplaintRecord | null> {
    const result = await withRetry(async () =>
      this.client.from(COMPLAINTS).select("*").eq("complaint_id", complaintId).maybeSingle()
    );
    if (result.error) {
      throw new Error(`Supabase select failed: ${formatError(result.error)}`);
    }
    return result.data ? mapComplaint(result.data) : null;
  }

  async markResolved(complaintId: string, resolvedAt: string): Promise<ComplaintRecord | null> {
    const result = await withRetry(async () =>
      this.client
        .from(COMPLAINTS)
        .update({ resolved_at: resolvedAt })
        .eq("complaint_id", complaintId)
        .select("*")
        .maybeSingle()
    );
    if (result.error) {
      throw new Error(`Supabase update failed: ${formatError(result.error)}`);
    }
    return result.data ? mapComplaint(result.data) : null;
  }

  async queryComplaints(query: ComplaintQuery, page?: PageOptions): Promise<ComplaintPage> {
    const result = await withRetry(async () => {
      let request = this.client.from(COMPLAINTS).select("*", { count: "exact" });
      if (query.since !== undefined) request = request.gte("timestamp", query.since);
      if (query.customerId !== undefined) request = request.eq("customer_id", query.customerId);
      if (query.excludeCustomerId !== undefined) request = request.neq("customer_id", query.excludeCustomerId);
      if (query.decision !== undefined) request = request.eq("decision", query.decision);
      if (query.severity !== undefined) request = request.eq("severity", query.severity);
      request = request.order("timestamp", { ascending: false });
      if (page) {
        const offset = page.offset ?? 0;
        request = request.range(offset, offset + page.limit - 1);
      }
      return request;
    });
    if (result.error) {
      throw new Error(`Supabase select failed: ${formatError(result.error)}`);
    }
    const items = (result.data ?? []).map(mapComplaint);
    return { items, total: result.count ?? items.length };
  }

  async saveFeedback(record: FeedbackRecord): Promise<FeedbackRecord> {
    const result = await withRetry(async () =>
      this.client.from(FEEDBACK).insert(feedbackToRow(record)).select("*").single()
    );
    if (result.error) {
      throw new Error(`Supabase insert failed: ${formatError(result.error)}`);
    }
    return mapFeedback(result.data);
  }

  async listFeedback(limit: number): Promise<FeedbackRecord[]> {
    const result = await withRetry(async () =>
      this.client.from(FEEDBACK).select("*").order("timestamp", { ascending: false }).limit(limit)
    );
    if (result.error) {
      throw new Error(`Supabase select failed: ${formatError(result.error)}`);
    }
    return (result.data ?? []).map(mapFeedback);
  }

  async getCustomer(customerId: string): Promise<CustomerProfile | null> {
    const result = await withRetry(async () =>
      this.client.from(CUSTOMERS).select("*").eq("customer_id", customerId).maybeSingle()
    );
    if (result.error) {
      throw new Error(`Supabase select failed: ${formatError(result.error)}`);
    }
    return result.data ? mapCustomer(result.data) : null;
  }

  async recordCustomerActivity(activity: CustomerActivity): Promise<CustomerProfile> {
    const existing = await this.getCustomer(activity.customerId);
    return this.writeCustomer(applyActivity(existing, activity));
  }

  async updateCustomer(customerId: string, patch: CustomerProfilePatch): Promise<CustomerProfile | null> {
    const existing = await this.getCustomer(customerId);
    if (!existing) return null;
    return this.writeCustomer(applyProfilePatch(existing, patch));
  }

  async ping(): Promise<boolean> {
    const result = await this.client.from(COMPLAINTS).select("complaint_id", { count: "exact", head: true });
    return !result.error;
  }

  private async writeCustomer(profile: CustomerProfile): Promise<CustomerProfile> {
    const result = await withRetry(async () =>
      this.client
        .from(CUSTOMERS)
        .upsert(customerToRow(profile), { onConflict: "customer_id" })
        .select("*")
        .single()
    );
    if (result.error) {
      throw new Error(`Supabase upsert failed: ${formatError(result.error)}`);
    }
    return mapCustomer(result.data);
  }
}
