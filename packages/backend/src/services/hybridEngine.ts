import type { ComplaintCase, Decision, EngineResult } from "../models/complaint.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";
import type { Classifier } from "./classifier.js";
import type { PolicyEngine } from "./policyEngine.js";

export type FactorImpact = "positive" | "negative" | "neutral";

export interface ExplanationFactor {
  factor: string;
  value: number | boolean;
  impact: FactorImpact;
  description: string;
}

export interface DecisionExplanation {
  decision: Decision;
  factors: ExplanationFactor[];
}

export const FALLBACK_REASON = "No matching rule or model prediction - escalating for review";

/**
 * Combines policy rules with the trained classifier. Rules are checked
 * first, then the model, and anything left over is escalated to a human.
 */
export class HybridEngine {
  private readonly log: Logger;

  constructor(
    private readonly policy: PolicyEngine,
    private classifier: Classifier | null,
    log: Logger = rootLogger
  ) {
    this.log = log.child({ component: "hybrid-engine" });
  }

  isReady(): boolean {
    return true;
  }

  hasModel(): boolean {
    return this.classifier !== null;
  }

  get ruleCount(): number {
    return this.policy.ruleCount;
  }

  reloadModel(classifier: Classifier | null): void {
    this.classifier = classifier;
    this.log.info("Classifier model swapped", { loaded: classifier !== null });
  }

  predict(complaintCase: ComplaintCase): EngineResult {
    const ruleResult = this.policy.apply(complaintCase);
    if (ruleResult) {
      return ruleResult;
    }

    const mlResult = this.applyModel(complaintCase);
    if (mlResult) {
      return mlResult;
    }

    return {
      decision: "escalate",
      confidence: 0.5,
      source: "system",
      reason: FALLBACK_REASON,
      ruleId: null,
      category: complaintCase.orderStatus || "unknown",
    };
  }

  explain(complaintCase: ComplaintCase): DecisionExplanation {
    return { decision: this.predict(complaintCase).decision, factors: this.factors(complaintCase) };
  }

  /** Case facts that pushed toward or against a refund. */
  factors(complaintCase: ComplaintCase): ExplanationFactor[] {
    const factors: ExplanationFactor[] = [];

    if (complaintCase.refundHistory30d >= 3) {
      factors.push({
        factor: "High refund history",
        value: complaintCase.refundHistory30d,
        impact: "negative",
        description: "Multiple refund requests in last 30 days",
      });
    }

    if (!complaintCase.handoffPhoto) {
      factors.push({
        factor: "No delivery photo",
        value: false,
        impact: complaintCase.orderStatus === "missing_delivery" ? "positive" : "neutral",
        description: "No proof of delivery available",
      });
    }

    if (complaintCase.courierRating < 4.0) {
      factors.push({
        factor: "Low courier rating",
        value: complaintCase.courierRating,
        impact: "positive",
        description: "Courier has below-average rating",
      });
    }

    return factors;
  }

  private applyModel(complaintCase: ComplaintCase): EngineResult | null {
    if (!this.classifier) {
      return null;
    }
    try {
      const { label, confidence } = this.classifier.predict(complaintCase);
      const percent = Math.round(confidence * 100);
      this.log.info("ML prediction", { orderId: complaintCase.orderId, decision: label, confidence });
      return {
        decision: label,
        confidence,
        source: "ml",
        reason: `ML classification (${percent}% confidence)`,
        ruleId: null,
        category: complaintCase.orderStatus || "unknown",
      };
    } catch (error) {
      this.log.error("ML prediction error", { error: describeError(error) });
      return null;
    }
  }
}
