import express from "express";
import { z } from "zod";

import { decisionSchema } from "../db/schemas.js";
import { currentSession } from "../middleware/auth.js";
import type { AuditLogService } from "../services/auditLogService.js";

const feedbackSchema = z.object({
  complaint_id: z.string().trim().min(1),
  original_decision: decisionSchema.optional(),
  corrected_decision: decisionSchema,
  reason: z.string().default(""),
});

export function createFeedbackRouter(auditLogService: AuditLogService) {
  const router = express.Router();

  router.post("/", async (req, res, next) => {
    try {
      const parsed = feedbackSchema.parse(req.body);
      const feedback = await auditLogService.logFeedback({
        complaintId: parsed.complaint_id,
        originalDecision: parsed.original_decision,
        correctedDecision: parsed.corrected_decision,
        reason: parsed.reason,
        agent: currentSession(res).username,
      });
      res.json({ success: true, message: "Feedback recorded", feedback });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
