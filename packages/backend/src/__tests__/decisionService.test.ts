import { ZodError } from "zod";

import { MemoryStore } from "../db/memoryStore.js";
import { BadRequestError } from "../lib/errors.js";
import { AuditLogService } from "../services/auditLogService.js";
import { CustomerHistoryService } from "../services/customerHistoryService.js";
import {
  DecisionService,
  alternativesFor,
  customerIdFor,
  decideRequestSchema,
  defaultOrderId,
} from "../services/decisionService.js";
import { FraudDetector } from "../services/fraudDetector.js";
import { FALLBACK_REASON, HybridEngine } from "../services/hybridEngine.js";
import { ComplaintIntelligence, loadIntelligencePatterns } from "../services/intelligenceService.js";
import { MailerService, StubEmailProvider } from "../services/mailerService.js";
import { PolicyEngine } from "../services/policyEngine.js";
import { FIXED_NOW, PATTERNS_PATH, TEST_RULES, quietLogger } from "../test/fixtures.js";

describe("decideRequestSchema", () => {
  it("applies defaults for absent and falsy values", () => {
    expect(decideRequestSchema.parse({ courier_rating: 0, order_value: "" })).toEqual({
      order_id: "",
      complaint_text: "",
      issue_type: "",
      email: "",
      customer_id: "",
      handoff_photo: false,
      refund_history_30d: 0,
      courier_rating: 4.5,
      order_value: 15,
      evidence_files: [],
    });
  });

  it.each([
    [true, true],
    ["YES", true],
    ["1", true],
    ["no", false],
    [undefined, false],
  ])("reads handoff_photo %p as %p", (raw, expected) => {
    expect(decideRequestSchema.parse({ handoff_photo: raw }).handoff_photo).toBe(expected);
  });

  it("truncates and clamps refund history", () => {
    expect(decideRequestSchema.parse({ refund_history_30d: "2.9" }).refund_history_30d).toBe(2);
    expect(decideRequestSchema.parse({ refund_history_30d: -3 }).refund_history_30d).toBe(0);
  });

  it("rejects non-numeric values", () => {
    expect(() => decideRequestSchema.parse({ courier_rating: "abc" })).toThrow(ZodError);
  });
});

describe("decision helpers", () => {
  it("derives customer ids", () => {
    expect(customerIdFor({ customer_id: "cust-9", email: "jane@example.com" })).toBe("cust-9");
    expect(customerIdFor({ customer_id: "", email: "jane@example.com" })).toBe("9e26471d35a7");
    expect(customerIdFor({ customer_id: "", email: "" })).toBe("anonymous");
  });

  it("builds a timestamped order id", () => {
    expect(defaultOrderId(FIXED_NOW)).toBe("COMP-20260310120000");
  });

  it("offers the other decisions as alternatives", () => {
    expect(alternativesFor("deny").map((alternative) => [alternative.decision, alternative.confidence_impact])).toEqual([
      ["refund", -0.1],
      ["escalate", 0],
    ]);
  });
});

describe("DecisionService", () => {
  let store: MemoryStore;
  let stub: StubEmailProvider;
  let service: DecisionService;

  beforeEach(async () => {
    store = new MemoryStore();
    stub = new StubEmailProvider(quietLogger);
    const intelligence = new ComplaintIntelligence(await loadIntelligencePatterns(PATTERNS_PATH));
    service = new DecisionService({
      engine: new HybridEngine(new PolicyEngine(TEST_RULES, quietLogger), null, quietLogger),
      intelligence,
      fraud: new FraudDetector(store, { log: quietLogger }),
      history: new CustomerHistoryService(store, quietLogger),
      audit: new AuditLogService(store, quietLogger),
      mailer: new MailerService({
        provider: stub,
        settings: {
          provider: "stub",
          smtp: { host: "localhost", port: 465, user: "", password: "", timeoutMs: 1000 },
          fromEmail: "desk@example.com",
          fromName: "Test Desk",
        },
        log: quietLogger,
      }),
      log: quietLogger,
      clock: () => FIXED_NOW,
    });
  });

  it("decides, records and mails a complaint", async () => {
    const doc = await service.decide({
      order_id: "ORD-1",
      complaint_text: "My order never arrived",
      email: "jane@example.com",
      handoff_photo: "no",
      refund_history_30d: "1",
      order_value: 22,
    });

    expect(doc.complaint_id).toMatch(/^[0-9A-F]{8}-[0-9A-F]{3}$/);
    expect(doc).toMatchObject({
      order_id: "ORD-1",
      timestamp: "2026-03-10T12:00:00.000Z",
      decision: "refund",
      confidence: 0.9,
      source: "policy",
      rule_id: "missing_no_photo_refund",
      reason: "Order reported missing and no proof of delivery was captured",
      severity: "medium",
      sla_minutes: 480,
      sla_deadline: "2026-03-10T20:00:00.000Z",
      categories: ["missing_delivery"],
      root_cause: "unknown",
      sentiment: "neutral",
      explanation: "This is a medium severity complaint about missing delivery.",
      fraud_risk: "low",
      fraud_score: 0,
      fraud_flags: [],
      customer_history: {
        total_complaints: 0,
        recent_complaints: 0,
        refund_rate: 0,
        lifetime_value: 0,
        risk_tier: "normal",
      },
      email_sent: true,
    });
    expect(doc.agent_summary).toEqual({
      headline: "REFUND - MEDIUM priority",
      key_facts: [
        "Order: ORD-1",
        "Issue: Missing Delivery",
        "Refund history: 1 in 30 days",
        "Photo proof: No",
        "Fraud risk: LOW",
      ],
      recommendation: "Order reported missing and no proof of delivery was captured",
      confidence_level: "High",
    });
    expect(doc.suggested_actions.map((action) => action.action)).toEqual(["request_photo_proof"]);
    expect(doc.decision_factors.map((factor) => [factor.factor, factor.impact])).toEqual([["No delivery photo", "positive"]]);
    expect(doc.response_templates.map((template) => template.id)).toEqual(["full_refund", "partial_refund", "credit"]);
    expect(doc.alternative_decisions.map((alternative) => alternative.decision)).toEqual(["deny", "escalate"]);

    const record = await store.getComplaint(doc.complaint_id);
    expect(record?.customerId).toBe("9e26471d35a7");
    expect(record?.caseData.orderStatus).toBe("missing_delivery");
    await expect(store.getCustomer("9e26471d35a7")).resolves.toMatchObject({ totalComplaints: 1, totalRefunds: 1 });

    expect(stub.sent).toHaveLength(1);
    expect(stub.sent[0].to).toBe("jane@example.com");
    expect(stub.sent[0].subject).toBe("Test Desk: REFUND - Order ORD-1");
  });

  it("escalates an empty anonymous complaint", async () => {
    const doc = await service.decide({});

    expect(doc).toMatchObject({
      order_id: "COMP-20260310120000",
      decision: "escalate",
      confidence: 0.5,
      source: "system",
      reason: FALLBACK_REASON,
      severity: "medium",
      categories: ["general_complaint"],
      email_sent: false,
    });
    expect(doc.customer_history.risk_tier).toBe("unknown");
    expect(doc.agent_summary.confidence_level).toBe("Low");
    expect(stub.sent).toEqual([]);
  });

  it("sees earlier complaints from the same customer", async () => {
    await service.decide({ complaint_text: "my order never arrived", customer_id: "repeat" });
    const doc = await service.decide({ complaint_text: "my order never arrived", customer_id: "repeat" });

    expect(doc.customer_history.total_complaints).toBe(1);
    expect(doc.customer_history.refund_rate).toBe(1);
  });

  it("rejects malformed input", async () => {
    await expect(service.decide({ courier_rating: "abc" })).rejects.toBeInstanceOf(ZodError);
  });

  describe("classifyBatch", () => {
    it("classifies each CSV row", () => {
      const csv = [
        "order_id,issue_type,complaint_text,refund_history_30d,handoff_photo,courier_rating",
        "B-1,missing_delivery,never came,0,false,4.8",
        "B-2,,the food was cold,7,true,",
      ].join("\n");

      expect(service.classifyBatch(csv)).toEqual({
        processed: 2,
        results: [
          { order_id: "B-1", decision: "refund", confidence: 0.9, severity: "medium", categories: ["missing_delivery"] },
          { order_id: "B-2", decision: "deny", confidence: 0.92, severity: "medium", categories: ["damaged_item"] },
        ],
      });
    });

    it("rejects an empty upload", () => {
      expect(() => service.classifyBatch("  \n")).toThrow(BadRequestError);
    });

    it("rejects a malformed CSV as a bad request", () => {
      const csv = 'order_id,complaint_text\nB-1,"never came';
      expect(() => service.classifyBatch(csv)).toThrow(new BadRequestError("Invalid file. Please upload a CSV."));
    });
  });
});
