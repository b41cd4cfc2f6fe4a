import type { ClassifierArtifact } from "../models/classifier.js";
import type { ComplaintCase } from "../models/complaint.js";
import { Classifier, type Prediction } from "../services/classifier.js";
import { FALLBACK_REASON, HybridEngine } from "../services/hybridEngine.js";
import { PolicyEngine } from "../services/policyEngine.js";
import { TEST_RULES, makeCase, quietLogger } from "../test/fixtures.js";

/** Model whose weights ignore the input and always lean towards "deny". */
const DENY_MODEL: ClassifierArtifact = {
  version: 1,
  trainedAt: "2026-03-10T12:00:00.000Z",
  exampleCount: 2,
  classes: ["deny", "refund"],
  categorical: {},
  numeric: {},
  weights: [
    [0, 0],
    [0, 0],
  ],
  bias: [2, 0],
};

class BrokenClassifier extends Classifier {
  predict(_complaintCase: ComplaintCase): Prediction {
    throw new Error("model exploded");
  }
}

describe("HybridEngine", () => {
  const policy = new PolicyEngine(TEST_RULES, quietLogger);

  it("prefers a matching policy rule over the model", () => {
    const engine = new HybridEngine(policy, new Classifier(DENY_MODEL), quietLogger);
    const result = engine.predict(makeCase({ refundHistory30d: 1 }));

    expect(result.source).toBe("policy");
    expect(result.decision).toBe("refund");
    expect(result.ruleId).toBe("missing_no_photo_refund");
  });

  it("uses the model when no rule matches", () => {
    const engine = new HybridEngine(policy, new Classifier(DENY_MODEL), quietLogger);
    const result = engine.predict(makeCase({ orderStatus: "wrong_item", refundHistory30d: 3 }));

    expect(result.decision).toBe("deny");
    expect(result.source).toBe("ml");
    expect(result.confidence).toBeCloseTo(0.8808, 4);
    expect(result.reason).toBe("ML classification (88% confidence)");
    expect(result.category).toBe("wrong_item");
  });

  it("escalates when there is neither a rule nor a model", () => {
    const engine = new HybridEngine(policy, null, quietLogger);

    expect(engine.predict(makeCase({ orderStatus: "", refundHistory30d: 3 }))).toEqual({
      decision: "escalate",
      confidence: 0.5,
      source: "system",
      reason: FALLBACK_REASON,
      ruleId: null,
      category: "unknown",
    });
  });

  it("escalates when the model fails", () => {
    const engine = new HybridEngine(policy, new BrokenClassifier(DENY_MODEL), quietLogger);
    const result = engine.predict(makeCase({ orderStatus: "wrong_item" }));

    expect(result.source).toBe("system");
    expect(result.decision).toBe("escalate");
  });

  it("swaps the model at runtime", () => {
    const engine = new HybridEngine(policy, null, quietLogger);
    expect(engine.hasModel()).toBe(false);

    engine.reloadModel(new Classifier(DENY_MODEL));
    expect(engine.hasModel()).toBe(true);
    expect(engine.predict(makeCase({ orderStatus: "wrong_item" })).source).toBe("ml");
    expect(engine.ruleCount).toBe(2);
  });

  it("explains the case facts behind a decision", () => {
    const engine = new HybridEngine(policy, null, quietLogger);
    const explanation = engine.explain(makeCase({ refundHistory30d: 3, courierRating: 3.5 }));

    expect(explanation.decision).toBe("escalate");
    expect(explanation.factors).toEqual([
      {
        factor: "High refund history",
        value: 3,
        impact: "negative",
        description: "Multiple refund requests in last 30 days",
      },
      { factor: "No delivery photo", value: false, impact: "positive", description: "No proof of delivery available" },
      { factor: "Low courier rating", value: 3.5, impact: "positive", description: "Courier has below-average rating" },
    ]);
  });

  it("treats a missing photo as neutral outside missing deliveries", () => {
    const engine = new HybridEngine(policy, null, quietLogger);
    expect(engine.factors(makeCase({ orderStatus: "late_delivery" }))).toEqual([
      { factor: "No delivery photo", value: false, impact: "neutral", description: "No proof of delivery available" },
    ]);
  });
});
