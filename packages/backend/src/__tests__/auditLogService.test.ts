import { MemoryStore } from "../db/memoryStore.js";
import { NotFoundError } from "../lib/errors.js";
import { AuditLogService, slaCompliance } from "../services/auditLogService.js";
import { FIXED_NOW, makeRecord, quietLogger } from "../test/fixtures.js";

describe("AuditLogService", () => {
  let store: MemoryStore;
  let audit: AuditLogService;

  beforeEach(() => {
    store = new MemoryStore();
    audit = new AuditLogService(store, quietLogger);
  });

  async function seedWindow(): Promise<void> {
    await audit.logComplaint(
      makeRecord({
        complaintId: "R1",
        customerId: "c1",
        timestamp: "2026-03-09T10:00:00.000Z",
        decision: "refund",
        severity: "high",
        categories: ["late_delivery"],
        source: "policy",
        confidence: 0.9,
        rootCause: "restaurant_error",
        slaDeadline: "2026-03-09T12:00:00.000Z",
        resolvedAt: "2026-03-09T11:00:00.000Z",
      })
    );
    await audit.logComplaint(
      makeRecord({
        complaintId: "R2",
        customerId: "c1",
        timestamp: "2026-03-09T15:00:00.000Z",
        decision: "deny",
        severity: "medium",
        categories: ["wrong_item", "damaged_item"],
        source: "ml",
        confidence: 0.7,
        fraudRisk: "high",
        rootCause: "restaurant_error",
        slaDeadline: "2026-03-09T23:00:00.000Z",
      })
    );
    await audit.logComplaint(
      makeRecord({
        complaintId: "R3",
        customerId: "anonymous",
        timestamp: "2026-03-10T11:00:00.000Z",
        decision: "escalate",
        severity: "critical",
        categories: ["general_complaint"],
        source: "system",
        confidence: 0.5,
        fraudRisk: "medium",
        rootCause: "unknown",
        slaDeadline: "2026-03-10T13:00:00.000Z",
      })
    );
    await audit.logComplaint(
      makeRecord({ complaintId: "OLD", customerId: "c9", timestamp: "2026-01-01T09:00:00.000Z", decision: "deny" })
    );
  }

  it("tracks customer counters for identified customers only", async () => {
    await seedWindow();

    const profile = await store.getCustomer("c1");
    expect(profile).toMatchObject({
      totalComplaints: 2,
      totalRefunds: 1,
      totalDenials: 1,
      fraudFlags: 1,
      firstSeen: "2026-03-09T10:00:00.000Z",
      lastSeen: "2026-03-09T15:00:00.000Z",
    });
    await expect(store.getCustomer("anonymous")).resolves.toBeNull();
  });

  it("aggregates stats over the window", async () => {
    await seedWindow();

    await expect(audit.getStats(30, FIXED_NOW)).resolves.toEqual({
      total: 3,
      byDecision: { refund: 1, deny: 1, escalate: 1 },
      bySeverity: { high: 1, medium: 1, critical: 1 },
      byCategory: { late_delivery: 1, wrong_item: 1, damaged_item: 1, general_complaint: 1 },
      bySource: { policy: 1, ml: 1, system: 1 },
      avgConfidence: 0.7,
      fraudFlagged: 1,
      slaCompliance: 0.5,
      dailyTrend: [
        { day: "2026-03-09", count: 2 },
        { day: "2026-03-10", count: 1 },
      ],
    });
  });

  it("builds each timeseries metric", async () => {
    await seedWindow();

    await expect(audit.getTimeseries(30, "volume", FIXED_NOW)).resolves.toEqual({
      metric: "volume",
      labels: ["2026-03-09", "2026-03-10"],
      values: [2, 1],
    });
    await expect(audit.getTimeseries(30, "decision", FIXED_NOW)).resolves.toEqual({
      metric: "decision",
      labels: ["2026-03-09", "2026-03-10"],
      datasets: { refund: [1, 0], deny: [1, 0], escalate: [0, 1] },
    });
    await expect(audit.getTimeseries(30, "severity", FIXED_NOW)).resolves.toEqual({
      metric: "severity",
      labels: ["critical", "high", "medium"],
      values: [1, 1, 1],
    });
    await expect(audit.getTimeseries(30, "fraud", FIXED_NOW)).resolves.toEqual({
      metric: "fraud",
      labels: ["2026-03-09", "2026-03-10"],
      flagged: [1, 0],
      total: [2, 1],
    });
  });

  it("ranks root causes", async () => {
    await seedWindow();

    await expect(audit.getRootCauseStats(30, FIXED_NOW)).resolves.toEqual({
      causes: [
        { cause: "restaurant_error", count: 2 },
        { cause: "unknown", count: 1 },
      ],
    });
  });

  it("pages and filters complaints newest first", async () => {
    await seedWindow();

    const firstPage = await audit.getComplaints({ page: 1, limit: 2 });
    expect(firstPage.total).toBe(4);
    expect(firstPage.pages).toBe(2);
    expect(firstPage.items.map((record) => record.complaintId)).toEqual(["R3", "R2"]);

    const denials = await audit.getComplaints({ status: "deny" });
    expect(denials.items.map((record) => record.complaintId)).toEqual(["R2", "OLD"]);

    const critical = await audit.getComplaints({ severity: "critical" });
    expect(critical.total).toBe(1);

    const customer = await audit.getCustomerComplaints("c1", 2, 1);
    expect(customer).toMatchObject({ total: 2, page: 2, pages: 2 });
    expect(customer.items.map((record) => record.complaintId)).toEqual(["R1"]);
  });

  it("records feedback and resolves the complaint", async () => {
    await seedWindow();

    const feedback = await audit.logFeedback({
      complaintId: "R2",
      correctedDecision: "refund",
      reason: "Driver confirmed the wrong bag",
      agent: "agent",
      timestamp: "2026-03-10T08:00:00.000Z",
    });

    expect(feedback.originalDecision).toBe("deny");
    expect((await store.getComplaint("R2"))?.resolvedAt).toBe("2026-03-10T08:00:00.000Z");

    const training = await audit.getFeedbackForTraining();
    expect(training).toHaveLength(1);
    expect(training[0].correctedDecision).toBe("refund");
    expect(training[0].caseData.orderStatus).toBe("missing_delivery");
  });

  it("rejects feedback for an unknown complaint", async () => {
    await expect(
      audit.logFeedback({ complaintId: "missing", correctedDecision: "deny", reason: "", agent: "agent" })
    ).rejects.toBeInstanceOf(NotFoundError);
  });

  it("reports the store health", async () => {
    await expect(audit.isHealthy()).resolves.toBe(true);
  });
});

describe("slaCompliance", () => {
  it("is fully compliant with nothing due", () => {
    expect(slaCompliance([], FIXED_NOW)).toBe(1);
    expect(slaCompliance([makeRecord({ slaDeadline: "2026-03-10T20:00:00.000Z" })], FIXED_NOW)).toBe(1);
  });

  it("counts late resolutions as misses", () => {
    const late = makeRecord({ slaDeadline: "2026-03-10T10:00:00.000Z", resolvedAt: "2026-03-10T11:00:00.000Z" });
    const onTime = makeRecord({ slaDeadline: "2026-03-10T10:00:00.000Z", resolvedAt: "2026-03-10T09:00:00.000Z" });
    expect(slaCompliance([late, onTime], FIXED_NOW)).toBe(0.5);
  });
});
