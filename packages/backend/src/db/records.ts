import type { ComplaintRecord } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";
import type { ComplaintPage, ComplaintQuery, CustomerActivity, PageOptions } from "./types.js";

export function matchesQuery(record: ComplaintRecord, query: ComplaintQuery): boolean {
  if (query.since !== undefined && record.timestamp < query.since) return false;
  if (query.customerId !== undefined && record.customerId !== query.customerId) return false;
  if (query.excludeCustomerId !== undefined && record.customerId === query.excludeCustomerId) return false;
  if (query.decision !== undefined && record.decision !== query.decision) return false;
  if (query.severity !== undefined && record.severity !== query.severity) return false;
  return true;
}

export function selectPage(
  records: Iterable<ComplaintRecord>,
  query: ComplaintQuery,
  page?: PageOptions
): ComplaintPage {
  const matches = [...records]
    .filter((record) => matchesQuery(record, query))
    .sort((a, b) => (a.timestamp < b.timestamp ? 1 : a.timestamp > b.timestamp ? -1 : 0));
  if (!page) {
    return { items: matches, total: matches.length };
  }
  const offset = page.offset ?? 0;
  return { items: matches.slice(offset, offset + page.limit), total: matches.length };
}

export function newestFeedback(records: Iterable<FeedbackRecord>, limit: number): FeedbackRecord[] {
  return [...records].sort((a, b) => (a.timestamp < b.timestamp ? 1 : -1)).slice(0, limit);
}

export function applyActivity(existing: CustomerProfile | null, activity: CustomerActivity): CustomerProfile {
  const refund = activity.decision === "refund" ? 1 : 0;
  const denial = activity.decision === "deny" ? 1 : 0;
  const flagged = activity.fraudRisk === "high" || activity.fraudRisk === "critical" ? 1 : 0;

  if (!existing) {
    return {
      customerId: activity.customerId,
      email: null,
      totalComplaints: 1,
      totalRefunds: refund,
      totalDenials: denial,
      fraudFlags: flagged,
      lifetimeValue: 0,
      riskTier: "normal",
      firstSeen: activity.at,
      lastSeen: activity.at,
    };
  }

  return {
    ...existing,
    totalComplaints: existing.totalComplaints + 1,
    totalRefunds: existing.totalRefunds + refund,
    totalDenials: existing.totalDenials + denial,
    fraudFlags: existing.fraudFlags + flagged,
    lastSeen: activity.at,
  };
}

export function applyProfilePatch(existing: CustomerProfile, patch: CustomerProfilePatch): CustomerProfile {
  return {
    ...existing,
    email: patch.email !== undefined ? patch.email : existing.email,
    lifetimeValue: patch.lifetimeValue ?? existing.lifetimeValue,
    riskTier: patch.riskTier ?? existing.riskTier,
  };
}
