import type { ComplaintPage } from "../db/types.js";
import { MemoryStore } from "../db/memoryStore.js";
import { FraudDetector, classifyScore, riskLevelFor } from "../services/fraudDetector.js";
import { FIXED_NOW, hoursBefore, makeRecord, quietLogger } from "../test/fixtures.js";

class UnavailableStore extends MemoryStore {
  async queryComplaints(): Promise<ComplaintPage> {
    throw new Error("store offline");
  }
}

describe("FraudDetector", () => {
  let store: MemoryStore;
  let detector: FraudDetector;

  beforeEach(() => {
    store = new MemoryStore();
    detector = new FraudDetector(store, { log: quietLogger });
  });

  it("scores anonymous customers as normal", async () => {
    await expect(detector.assess("anonymous", 500, FIXED_NOW)).resolves.toEqual({
      score: 0,
      label: "normal",
      riskLevel: "low",
      flags: [],
      history: null,
    });
  });

  it("flags bursts of refunded complaints on a new account", async () => {
    await store.saveComplaint(makeRecord({ complaintId: "A", customerId: "c1", timestamp: hoursBefore(FIXED_NOW, 1) }));
    await store.saveComplaint(makeRecord({ complaintId: "B", customerId: "c1", timestamp: hoursBefore(FIXED_NOW, 2) }));
    await store.saveComplaint(makeRecord({ complaintId: "C", customerId: "c1", timestamp: hoursBefore(FIXED_NOW, 72) }));

    const assessment = await detector.assess("c1", 60, FIXED_NOW);

    expect(assessment.score).toBe(100);
    expect(assessment.label).toBe("high_risk");
    expect(assessment.riskLevel).toBe("critical");
    expect(assessment.flags).toEqual([
      { type: "excessive_complaints", description: "3 complaints in last 30 days", severity: "high" },
      { type: "burst_activity", description: "2 complaints in last 24 hours", severity: "high" },
      { type: "high_refund_rate", description: "Refund rate 100% over 3 complaints", severity: "high" },
      { type: "very_new_account", description: "Account age 3 days with 3 complaints", severity: "medium" },
      { type: "high_value_order", description: "High-value complaint ($60)", severity: "medium" },
    ]);
    expect(assessment.history).toEqual({
      totalComplaints: 3,
      totalRefunds: 3,
      complaints30d: 3,
      complaints24h: 2,
      refundRate: 1,
      accountAgeDays: 3,
      firstSeen: hoursBefore(FIXED_NOW, 72),
    });
  });

  it("leaves an established quiet customer alone", async () => {
    await store.saveComplaint(
      makeRecord({ complaintId: "old", customerId: "c2", decision: "deny", timestamp: hoursBefore(FIXED_NOW, 40 * 24) })
    );

    const assessment = await detector.assess("c2", 20, FIXED_NOW);

    expect(assessment.score).toBe(0);
    expect(assessment.label).toBe("normal");
    expect(assessment.flags).toEqual([]);
    expect(assessment.history?.accountAgeDays).toBe(40);
    expect(assessment.history?.complaints30d).toBe(0);
  });

  it("applies weight overrides", async () => {
    const tuned = new FraudDetector(store, { weights: { highValuePattern: 30 }, log: quietLogger });
    const assessment = await tuned.assess("first-timer", 80, FIXED_NOW);

    expect(assessment.score).toBe(30);
    expect(assessment.label).toBe("watch");
    expect(assessment.riskLevel).toBe("medium");
  });

  it("scores on empty history when the store is unavailable", async () => {
    const offline = new FraudDetector(new UnavailableStore(), { log: quietLogger });
    const assessment = await offline.assess("c3", 10, FIXED_NOW);

    expect(assessment.score).toBe(0);
    expect(assessment.history).toEqual({
      totalComplaints: 0,
      totalRefunds: 0,
      complaints30d: 0,
      complaints24h: 0,
      refundRate: 0,
      accountAgeDays: 0,
      firstSeen: null,
    });
  });
});

describe("classifyScore", () => {
  it.each([
    [70, "high_risk"],
    [69, "suspicious"],
    [40, "suspicious"],
    [20, "watch"],
    [19, "normal"],
  ])("labels %i as %s", (score, label) => {
    expect(classifyScore(score)).toBe(label);
  });

  it("maps labels to risk levels", () => {
    expect(riskLevelFor("suspicious")).toBe("high");
    expect(riskLevelFor("normal")).toBe("low");
  });
});
