import type { ComplaintStore } from "../db/types.js";
import { ANONYMOUS_CUSTOMER, type ComplaintRecord, type Decision, type Severity } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch, RiskTier } from "../models/customer.js";
import { NotFoundError } from "../lib/errors.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";

export interface CustomerSummary {
  totalComplaints: number;
  recentComplaints: number;
  refundRate: number;
  lifetimeValue: number;
  riskTier: RiskTier;
}

export interface CustomerStats {
  totalComplaints: number;
  refunds: number;
  denials: number;
  escalations: number;
  refundRate: number;
  avgConfidence: number;
  firstComplaint: string | null;
  lastComplaint: string | null;
}

export interface CustomerRecentComplaint {
  complaintId: string;
  orderId: string;
  timestamp: string;
  decision: Decision;
  severity: Severity;
  categories: string[];
}

export interface CustomerHistory {
  customerId: string;
  profile: CustomerProfile | null;
  stats: CustomerStats;
  riskTier: RiskTier;
  categories: Record<string, number>;
  severities: Record<string, number>;
  fraudHistory: Record<string, number>;
  recentComplaints: CustomerRecentComplaint[];
}

export interface TopComplainer {
  customerId: string;
  complaints: number;
  refunds: number;
  refundRate: number;
  fraudFlags: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const LIFETIME_VALUE_PER_COMPLAINT = 25;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function tally(values: string[]): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

function countDecision(records: ComplaintRecord[], decision: Decision): number {
  return records.filter((record) => record.decision === decision).length;
}

/** Tier from complaint volume and refund rate; stricter tiers are checked first. */
export function calculateRiskTier(totalComplaints: number, refundRate: number): RiskTier {
  if (totalComplaints === 0) return "normal";
  if (refundRate > 0.5 && totalComplaints >= 5) return "flagged";
  if (refundRate > 0.3) return "watch";
  if (refundRate < 0.05 && totalComplaints >= 20) return "vip";
  if (refundRate < 0.1 && totalComplaints >= 10) return "trusted";
  return "normal";
}

export class CustomerHistoryService {
  private readonly log: Logger;

  constructor(
    private readonly store: ComplaintStore,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: "customer-history" });
  }

  async getSummary(customerId: string, now: Date = new Date()): Promise<CustomerSummary> {
    if (!customerId || customerId === ANONYMOUS_CUSTOMER) {
      return { totalComplaints: 0, recentComplaints: 0, refundRate: 0, lifetimeValue: 0, riskTier: "unknown" };
    }

    try {
      const [{ items }, profile] = await Promise.all([
        this.store.queryComplaints({ customerId }),
        this.store.getCustomer(customerId),
      ]);
      const total = items.length;
      const cutoff = new Date(now.getTime() - 30 * DAY_MS).toISOString();
      const refundRate = total > 0 ? countDecision(items, "refund") / total : 0;
      const storedValue = profile?.lifetimeValue ?? 0;

      return {
        totalComplaints: total,
        recentComplaints: items.filter((record) => record.timestamp >= cutoff).length,
        refundRate: round3(refundRate),
        lifetimeValue: storedValue > 0 ? storedValue : total * LIFETIME_VALUE_PER_COMPLAINT,
        riskTier: calculateRiskTier(total, refundRate),
      };
    } catch (error) {
      this.log.error("Error getting customer summary", { customerId, error: describeError(error) });
      return { totalComplaints: 0, recentComplaints: 0, refundRate: 0, lifetimeValue: 0, riskTier: "normal" };
    }
  }

  async getFullHistory(customerId: string): Promise<CustomerHistory> {
    const [{ items }, profile] = await Promise.all([
      this.store.queryComplaints({ customerId }),
      this.store.getCustomer(customerId),
    ]);

    const total = items.length;
    const refunds = countDecision(items, "refund");
    const refundRate = total > 0 ? refunds / total : 0;
    const avgConfidence = total > 0 ? items.reduce((sum, record) => sum + record.confidence, 0) / total : 0;

    return {
      customerId,
      profile,
      stats: {
        totalComplaints: total,
        refunds,
        denials: countDecision(items, "deny"),
        escalations: countDecision(items, "escalate"),
        refundRate: round3(refundRate),
        avgConfidence: round3(avgConfidence),
        // items are newest first
        firstComplaint: total > 0 ? items[total - 1].timestamp : null,
        lastComplaint: total > 0 ? items[0].timestamp : null,
      },
      riskTier: calculateRiskTier(total, refundRate),
      categories: tally(items.map((record) => record.categories.join(","))),
      severities: tally(items.map((record) => record.severity)),
      fraudHistory: tally(items.map((record) => record.fraudRisk)),
      recentComplaints: items.slice(0, 10).map((record) => ({
        complaintId: record.complaintId,
        orderId: record.orderId,
        timestamp: record.timestamp,
        decision: record.decision,
        severity: record.severity,
        categories: record.categories,
      })),
    };
  }

  async getTopComplainers(days = 30, limit = 20, now: Date = new Date()): Promise<TopComplainer[]> {
    const since = new Date(now.getTime() - days * DAY_MS).toISOString();
    const { items } = await this.store.queryComplaints({ since, excludeCustomerId: ANONYMOUS_CUSTOMER });

    const byCustomer = new Map<string, TopComplainer>();
    for (const record of items) {
      const entry = byCustomer.get(record.customerId) ?? {
        customerId: record.customerId,
        complaints: 0,
        refunds: 0,
        refundRate: 0,
        fraudFlags: 0,
      };
      entry.complaints += 1;
      if (record.decision === "refund") entry.refunds += 1;
      if (record.fraudRisk === "high" || record.fraudRisk === "critical") entry.fraudFlags += 1;
      entry.refundRate = entry.refunds / entry.complaints;
      byCustomer.set(record.customerId, entry);
    }

    return [...byCustomer.values()]
      .sort((a, b) => b.complaints - a.complaints || a.customerId.localeCompare(b.customerId))
      .slice(0, limit);
  }

  async updateProfile(customerId: string, patch: CustomerProfilePatch): Promise<CustomerProfile> {
    const updated = await this.store.updateCustomer(customerId, patch);
    if (!updated) {
      throw new NotFoundError("Customer not found");
    }
    this.log.info("Customer profile updated", { customerId, fields: Object.keys(patch) });
    return updated;
  }
}
