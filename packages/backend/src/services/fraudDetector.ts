import type { ComplaintStore } from "../db/types.js";
import { ANONYMOUS_CUSTOMER, type ComplaintRecord, type FraudRisk } from "../models/complaint.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";

export type FraudLabel = "normal" | "watch" | "suspicious" | "high_risk";

export interface FraudThresholds {
  complaints30d: number;
  complaints24h: number;
  refundRate: number;
  accountAgeDaysMin: number;
}

export interface FraudWeights {
  excessiveComplaints: number;
  burstActivity: number;
  highRefundRate: number;
  veryNewAccount: number;
  highValuePattern: number;
}

export interface FraudFlag {
  type: "excessive_complaints" | "burst_activity" | "high_refund_rate" | "very_new_account" | "high_value_order";
  description: string;
  severity: "high" | "medium";
}

export interface FraudHistory {
  totalComplaints: number;
  totalRefunds: number;
  complaints30d: number;
  complaints24h: number;
  refundRate: number;
  accountAgeDays: number;
  firstSeen: string | null;
}

export interface FraudAssessment {
  score: number;
  label: FraudLabel;
  riskLevel: FraudRisk;
  flags: FraudFlag[];
  history: FraudHistory | null;
}

export const DEFAULT_THRESHOLDS: FraudThresholds = {
  complaints30d: 3,
  complaints24h: 2,
  refundRate: 0.6,
  accountAgeDaysMin: 7,
};

export const DEFAULT_WEIGHTS: FraudWeights = {
  excessiveComplaints: 25,
  burstActivity: 20,
  highRefundRate: 25,
  veryNewAccount: 15,
  highValuePattern: 15,
};

const HIGH_VALUE_ORDER = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

const RISK_LEVELS: Record<FraudLabel, FraudRisk> = {
  normal: "low",
  watch: "medium",
  suspicious: "high",
  high_risk: "critical",
};

export function classifyScore(score: number): FraudLabel {
  if (score >= 70) return "high_risk";
  if (score >= 40) return "suspicious";
  if (score >= 20) return "watch";
  return "normal";
}

export function riskLevelFor(label: FraudLabel): FraudRisk {
  return RISK_LEVELS[label];
}

function emptyHistory(): FraudHistory {
  return {
    totalComplaints: 0,
    totalRefunds: 0,
    complaints30d: 0,
    complaints24h: 0,
    refundRate: 0,
    accountAgeDays: 0,
    firstSeen: null,
  };
}

export interface FraudDetectorOptions {
  thresholds?: Partial<FraudThresholds>;
  weights?: Partial<FraudWeights>;
  log?: Logger;
}

/**
 * Weighted abuse scoring over a customer's earlier complaints.
 */
export class FraudDetector {
  readonly thresholds: FraudThresholds;

  readonly weights: FraudWeights;

  private readonly log: Logger;

  constructor(
    private readonly store: ComplaintStore,
    options: FraudDetectorOptions = {}
  ) {
    this.thresholds = { ...DEFAULT_THRESHOLDS, ...options.thresholds };
    this.weights = { ...DEFAULT_WEIGHTS, ...options.weights };
    this.log = (options.log ?? rootLogger).child({ component: "fraud-detector" });
  }

  async assess(customerId: string | null, orderValue = 0, now: Date = new Date()): Promise<FraudAssessment> {
    if (!customerId || customerId === ANONYMOUS_CUSTOMER) {
      return { score: 0, label: "normal", riskLevel: "low", flags: [], history: null };
    }

    const history = await this.getHistory(customerId, now);
    const flags: FraudFlag[] = [];
    let score = 0;

    if (history.complaints30d >= this.thresholds.complaints30d) {
      flags.push({
        type: "excessive_complaints",
        description: `${history.complaints30d} complaints in last 30 days`,
        severity: "high",
      });
      score += this.weights.excessiveComplaints;
    }

    if (history.complaints24h >= this.thresholds.complaints24h) {
      flags.push({
        type: "burst_activity",
        description: `${history.complaints24h} complaints in last 24 hours`,
        severity: "high",
      });
      score += this.weights.burstActivity;
    }

    if (history.totalComplaints >= 3 && history.refundRate >= this.thresholds.refundRate) {
      const percent = Math.round(history.refundRate * 1000) / 10;
      flags.push({
        type: "high_refund_rate",
        description: `Refund rate ${percent}% over ${history.totalComplaints} complaints`,
        severity: "high",
      });
      score += this.weights.highRefundRate;
    }

    if (history.accountAgeDays < this.thresholds.accountAgeDaysMin && history.totalComplaints > 0) {
      flags.push({
        type: "very_new_account",
        description: `Account age ${history.accountAgeDays} days with ${history.totalComplaints} complaints`,
        severity: "medium",
      });
      score += this.weights.veryNewAccount;
    }

    const value = Number.isFinite(orderValue) ? orderValue : 0;
    if (value >= HIGH_VALUE_ORDER) {
      flags.push({
        type: "high_value_order",
        description: `High-value complaint ($${value})`,
        severity: "medium",
      });
      score += this.weights.highValuePattern;
    }

    score = Math.max(0, Math.min(100, score));
    const label = classifyScore(score);
    return { score, label, riskLevel: riskLevelFor(label), flags, history };
  }

  private async getHistory(customerId: string, now: Date): Promise<FraudHistory> {
    let records: ComplaintRecord[];
    try {
      ({ items: records } = await this.store.queryComplaints({ customerId }));
    } catch (error) {
      this.log.error("Error fetching customer history", { customerId, error: describeError(error) });
      return emptyHistory();
    }
    if (records.length === 0) {
      return emptyHistory();
    }

    const cutoff30d = new Date(now.getTime() - 30 * DAY_MS).toISOString();
    const cutoff24h = new Date(now.getTime() - DAY_MS).toISOString();
    const totalRefunds = records.filter((record) => record.decision === "refund").length;
    const firstSeen = records.reduce((min, record) => (record.timestamp < min ? record.timestamp : min), records[0].timestamp);
    const firstSeenMs = Date.parse(firstSeen);

    return {
      totalComplaints: records.length,
      totalRefunds,
      complaints30d: records.filter((record) => record.timestamp >= cutoff30d).length,
      complaints24h: records.filter((record) => record.timestamp >= cutoff24h).length,
      refundRate: totalRefunds / records.length,
      accountAgeDays: Number.isNaN(firstSeenMs) ? 0 : Math.max(0, Math.floor((now.getTime() - firstSeenMs) / DAY_MS)),
      firstSeen,
    };
  }
}
