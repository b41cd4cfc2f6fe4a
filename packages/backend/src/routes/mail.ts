import express from "express";
import { z } from "zod";

import type { SessionService } from "../services/sessionService.js";
import type { MailerService } from "../services/mailerService.js";
import { requireRole } from "../middleware/auth.js";

const smtpTestSchema = z.object({
  email: z.string().trim().email().optional(),
});

export function createMailRouter(mailer: MailerService, sessions: SessionService) {
  const router = express.Router();
  const adminOnly = requireRole(sessions, "admin");

  router.get("/debug/email", ...adminOnly, async (_req, res, next) => {
    try {
      res.json({ sender: mailer.sender, ...(await mailer.testConnection()) });
    } catch (error) {
      next(error);
    }
  });

  router.post("/smtp/test", ...adminOnly, async (req, res, next) => {
    try {
      const { email } = smtpTestSchema.parse(req.body ?? {});
      const result = await mailer.testConnection();
      if (!email || !result.connection_ok) {
        res.json(result);
        return;
      }
      const sent = await mailer.sendDecisionEmail(email, {
        orderId: "TEST-001",
        decision: "refund",
        confidence: 0.95,
        reason: "This is a test email from the complaint desk",
        category: "test",
        severity: "low",
      });
      res.json({ ...result, test_email_sent: sent });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
