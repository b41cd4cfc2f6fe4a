import type { ComplaintPage, ComplaintStore } from "../db/types.js";
import {
  ANONYMOUS_CUSTOMER,
  SEVERITIES,
  type ComplaintRecord,
  type Decision,
  type DecisionSource,
  type Severity,
} from "../models/complaint.js";
import type { FeedbackRecord, TrainingFeedback } from "../models/feedback.js";
import { NotFoundError } from "../lib/errors.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";

export type TimeseriesMetric = "volume" | "decision" | "severity" | "fraud";

export interface DailyCount {
  day: string;
  count: number;
}

export interface ComplaintStats {
  total: number;
  byDecision: Partial<Record<Decision, number>>;
  bySeverity: Partial<Record<Severity, number>>;
  byCategory: Record<string, number>;
  bySource: Partial<Record<DecisionSource, number>>;
  avgConfidence: number;
  fraudFlagged: number;
  slaCompliance: number;
  dailyTrend: DailyCount[];
}

export type Timeseries =
  | { metric: "volume"; labels: string[]; values: number[] }
  | { metric: "decision"; labels: string[]; datasets: Record<Decision, number[]> }
  | { metric: "severity"; labels: Severity[]; values: number[] }
  | { metric: "fraud"; labels: string[]; flagged: number[]; total: number[] };

export interface RootCauseStats {
  causes: Array<{ cause: string; count: number }>;
}

export interface RecentComplaint {
  complaintId: string;
  orderId: string;
  timestamp: string;
  decision: Decision;
  severity: Severity;
  categories: string[];
  confidence: number;
  source: DecisionSource;
}

export interface ComplaintListOptions {
  page?: number;
  limit?: number;
  status?: Decision | "all";
  severity?: Severity | "all";
}

export interface PagedComplaints extends ComplaintPage {
  page: number;
  pages: number;
}

export interface FeedbackInput {
  complaintId: string;
  correctedDecision: Decision;
  reason: string;
  agent: string;
  originalDecision?: Decision;
  timestamp?: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function dayOf(timestamp: string): string {
  return timestamp.slice(0, 10);
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

function increment<K extends string>(counts: Partial<Record<K, number>>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function isFlagged(record: ComplaintRecord): boolean {
  return record.fraudRisk === "high" || record.fraudRisk === "critical";
}

/**
 * Share of due complaints (deadline passed, or already resolved) that were
 * resolved by their deadline. With nothing due yet the desk is compliant.
 */
export function slaCompliance(records: ComplaintRecord[], now: Date): number {
  const nowIso = now.toISOString();
  const due = records.filter((record) => record.resolvedAt !== null || record.slaDeadline <= nowIso);
  if (due.length === 0) {
    return 1;
  }
  const met = due.filter((record) => record.resolvedAt !== null && record.resolvedAt <= record.slaDeadline);
  return round3(met.length / due.length);
}

export class AuditLogService {
  private readonly log: Logger;

  constructor(
    private readonly store: ComplaintStore,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: "audit-log" });
  }

  /** Upserts the complaint and bumps the customer's counters. */
  async logComplaint(record: ComplaintRecord): Promise<ComplaintRecord> {
    const saved = await this.store.saveComplaint(record);
    if (record.customerId && record.customerId !== ANONYMOUS_CUSTOMER) {
      await this.store.recordCustomerActivity({
        customerId: record.customerId,
        decision: record.decision,
        fraudRisk: record.fraudRisk,
        at: record.timestamp,
      });
    }
    this.log.debug("Complaint logged", { complaintId: record.complaintId, decision: record.decision });
    return saved;
  }

  /** Stores agent feedback and marks the complaint resolved. */
  async logFeedback(input: FeedbackInput): Promise<FeedbackRecord> {
    const complaint = await this.store.getComplaint(input.complaintId);
    if (!complaint) {
      throw new NotFoundError("Complaint not found");
    }
    const timestamp = input.timestamp ?? new Date().toISOString();
    const record = await this.store.saveFeedback({
      complaintId: input.complaintId,
      originalDecision: input.originalDecision ?? complaint.decision,
      correctedDecision: input.correctedDecision,
      reason: input.reason,
      agent: input.agent,
      timestamp,
    });
    if (complaint.resolvedAt === null) {
      await this.store.markResolved(input.complaintId, timestamp);
    }
    this.log.info("Feedback logged", {
      complaintId: record.complaintId,
      from: record.originalDecision,
      to: record.correctedDecision,
      agent: record.agent,
    });
    return record;
  }

  async getStats(days = 30, now: Date = new Date()): Promise<ComplaintStats> {
    const records = await this.since(days, now);
    const byDecision: Partial<Record<Decision, number>> = {};
    const bySeverity: Partial<Record<Severity, number>> = {};
    const bySource: Partial<Record<DecisionSource, number>> = {};
    const byCategory: Record<string, number> = {};
    const byDay: Record<string, number> = {};

    for (const record of records) {
      increment(byDecision, record.decision);
      increment(bySeverity, record.severity);
      increment(bySource, record.source);
      record.categories.forEach((category) => increment(byCategory, category));
      increment(byDay, dayOf(record.timestamp));
    }

    const confidenceSum = records.reduce((sum, record) => sum + record.confidence, 0);
    return {
      total: records.length,
      byDecision,
      bySeverity,
      byCategory,
      bySource,
      avgConfidence: records.length > 0 ? round3(confidenceSum / records.length) : 0,
      fraudFlagged: records.filter(isFlagged).length,
      slaCompliance: slaCompliance(records, now),
      dailyTrend: Object.keys(byDay)
        .sort()
        .map((day) => ({ day, count: byDay[day] })),
    };
  }

  async getTimeseries(days = 30, metric: TimeseriesMetric = "volume", now: Date = new Date()): Promise<Timeseries> {
    const records = await this.since(days, now);
    const labels = [...new Set(records.map((record) => dayOf(record.timestamp)))].sort();
    const perDay = (predicate: (record: ComplaintRecord) => boolean): number[] =>
      labels.map((day) => records.filter((record) => dayOf(record.timestamp) === day && predicate(record)).length);

    switch (metric) {
      case "volume":
        return { metric, labels, values: perDay(() => true) };
      case "decision":
        return {
          metric,
          labels,
          datasets: {
            refund: perDay((record) => record.decision === "refund"),
            deny: perDay((record) => record.decision === "deny"),
            escalate: perDay((record) => record.decision === "escalate"),
          },
        };
      case "severity": {
        const present = SEVERITIES.filter((severity) => records.some((record) => record.severity === severity));
        return {
          metric,
          labels: present,
          values: present.map((severity) => records.filter((record) => record.severity === severity).length),
        };
      }
      case "fraud":
        return { metric, labels, flagged: perDay(isFlagged), total: perDay(() => true) };
    }
  }

  async getRootCauseStats(days = 30, now: Date = new Date()): Promise<RootCauseStats> {
    const counts: Record<string, number> = {};
    for (const record of await this.since(days, now)) {
      if (record.rootCause) increment(counts, record.rootCause);
    }
    return {
      causes: Object.entries(counts)
        .map(([cause, count]) => ({ cause, count }))
        .sort((a, b) => b.count - a.count),
    };
  }

  async getRecent(limit = 10): Promise<RecentComplaint[]> {
    const { items } = await this.store.queryComplaints({}, { limit });
    return items.map((record) => ({
      complaintId: record.complaintId,
      orderId: record.orderId,
      timestamp: record.timestamp,
      decision: record.decision,
      severity: record.severity,
      categories: record.categories,
      confidence: record.confidence,
      source: record.source,
    }));
  }

  async getComplaints(options: ComplaintListOptions = {}): Promise<PagedComplaints> {
    const page = Math.max(1, options.page ?? 1);
    const limit = Math.max(1, options.limit ?? 20);
    const status = options.status ?? "all";
    const severity = options.severity ?? "all";
    const result = await this.store.queryComplaints(
      {
        ...(status !== "all" ? { decision: status } : {}),
        ...(severity !== "all" ? { severity } : {}),
      },
      { limit, offset: (page - 1) * limit }
    );
    return { ...result, page, pages: Math.ceil(result.total / limit) };
  }

  async getCustomerComplaints(customerId: string, page = 1, limit = 20): Promise<PagedComplaints> {
    const current = Math.max(1, page);
    const result = await this.store.queryComplaints({ customerId }, { limit, offset: (current - 1) * limit });
    return { ...result, page: current, pages: Math.ceil(result.total / limit) };
  }

  /** Feedback joined with the case it corrects; feedback for unknown complaints is skipped. */
  async getFeedbackForTraining(limit = 1000): Promise<TrainingFeedback[]> {
    const feedback = await this.store.listFeedback(limit);
    const joined: TrainingFeedback[] = [];
    for (const entry of feedback) {
      const complaint = await this.store.getComplaint(entry.complaintId);
      if (complaint) {
        joined.push({ ...entry, caseData: complaint.caseData });
      }
    }
    return joined;
  }

  async exportRows(limit = 10000): Promise<ComplaintRecord[]> {
    const { items } = await this.store.queryComplaints({}, { limit });
    return items;
  }

  async isHealthy(): Promise<boolean> {
    try {
      return await this.store.ping();
    } catch (error) {
      this.log.error("Store health check failed", { error: describeError(error) });
      return false;
    }
  }

  private async since(days: number, now: Date): Promise<ComplaintRecord[]> {
    const since = new Date(now.getTime() - days * DAY_MS).toISOString();
    const { items } = await this.store.queryComplaints({ since });
    return items;
  }
}
