import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";

import { MemoryStore } from "../db/memoryStore.js";
import { retrainModel } from "../jobs/retrainModel.js";
import { BadRequestError } from "../lib/errors.js";
import { AuditLogService } from "../services/auditLogService.js";
import { loadClassifier } from "../services/classifier.js";
import { HybridEngine } from "../services/hybridEngine.js";
import { PolicyEngine } from "../services/policyEngine.js";
import { makeCase, makeRecord, quietLogger } from "../test/fixtures.js";

const TRAINING_CSV = [
  "order_status,refund_history_30d,handoff_photo,courier_rating,label",
  "missing_delivery,0,false,4.8,refund",
  "missing_delivery,1,false,4.1,refund",
  "late_delivery,5,true,4.9,deny",
  "late_delivery,6,true,4.6,deny",
  "wrong_item,2,true,4.5,unsure",
].join("\n");

describe("retrainModel", () => {
  let dir: string;
  let audit: AuditLogService;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "retrain-"));
    audit = new AuditLogService(new MemoryStore(), quietLogger);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("trains on the CSV plus agent feedback and swaps the model in", async () => {
    const csvPath = path.join(dir, "training.csv");
    const modelPath = path.join(dir, "models", "classifier.json");
    await fs.writeFile(csvPath, TRAINING_CSV, "utf8");

    await audit.logComplaint(
      makeRecord({ complaintId: "F1", decision: "refund", caseData: makeCase({ orderStatus: "wrong_item" }) })
    );
    await audit.logFeedback({ complaintId: "F1", correctedDecision: "escalate", reason: "Needs review", agent: "agent" });

    const engine = new HybridEngine(new PolicyEngine([], quietLogger), null, quietLogger);
    const summary = await retrainModel({
      auditLogService: audit,
      trainingCsvPath: csvPath,
      modelPath,
      engine,
      options: { iterations: 100 },
      log: quietLogger,
    });

    expect(summary).toMatchObject({
      modelPath,
      classes: ["deny", "escalate", "refund"],
      csvExamples: 4,
      feedbackExamples: 1,
      skippedRows: 1,
    });
    expect(engine.hasModel()).toBe(true);

    const saved = await loadClassifier(modelPath, quietLogger);
    expect(saved?.artifact.exampleCount).toBe(5);
  });

  it("trains on feedback alone when the CSV is missing", async () => {
    await audit.logComplaint(makeRecord({ complaintId: "F1", decision: "refund" }));
    await audit.logComplaint(makeRecord({ complaintId: "F2", decision: "refund" }));
    await audit.logFeedback({ complaintId: "F1", correctedDecision: "deny", reason: "", agent: "agent" });
    await audit.logFeedback({ complaintId: "F2", correctedDecision: "refund", reason: "", agent: "agent" });

    const summary = await retrainModel({
      auditLogService: audit,
      trainingCsvPath: path.join(dir, "absent.csv"),
      modelPath: path.join(dir, "model.json"),
      options: { iterations: 10 },
      log: quietLogger,
    });

    expect(summary.csvExamples).toBe(0);
    expect(summary.feedbackExamples).toBe(2);
  });

  it("fails without any training data", async () => {
    await expect(
      retrainModel({
        auditLogService: audit,
        trainingCsvPath: path.join(dir, "absent.csv"),
        modelPath: path.join(dir, "model.json"),
        log: quietLogger,
      })
    ).rejects.toBeInstanceOf(BadRequestError);
  });
});
