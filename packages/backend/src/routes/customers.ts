import express from "express";
import { z } from "zod";

import { riskTierSchema } from "../db/schemas.js";
import type { CustomerProfilePatch } from "../models/customer.js";
import { requireRole, requireSession } from "../middleware/auth.js";
import type { AuditLogService } from "../services/auditLogService.js";
import type { CustomerHistoryService } from "../services/customerHistoryService.js";
import type { SessionService } from "../services/sessionService.js";
import { daysQuerySchema, pageQuerySchema } from "./queries.js";

const profilePatchSchema = z
  .object({
    email: z.string().trim().email().nullable().optional(),
    lifetime_value: z.number().nonnegative().optional(),
    risk_tier: riskTierSchema.optional(),
  })
  .refine((patch) => Object.values(patch).some((value) => value !== undefined), {
    message: "Provide at least one of email, lifetime_value, risk_tier",
  });

const topQuerySchema = daysQuerySchema.extend({
  limit: z.coerce.number().int().positive().max(500).default(20),
});

export interface CustomersDeps {
  history: CustomerHistoryService;
  auditLogService: AuditLogService;
  sessions: SessionService;
}

export function createCustomersRouter({ history, auditLogService, sessions }: CustomersDeps) {
  const router = express.Router();
  const signedIn = requireSession(sessions);

  router.get("/customer/:customerId", signedIn, async (req, res, next) => {
    try {
      res.json(await history.getFullHistory(req.params.customerId));
    } catch (error) {
      next(error);
    }
  });

  router.get("/customer/:customerId/complaints", signedIn, async (req, res, next) => {
    try {
      const { page, limit } = pageQuerySchema.parse(req.query);
      res.json(await auditLogService.getCustomerComplaints(req.params.customerId, page, limit));
    } catch (error) {
      next(error);
    }
  });

  router.patch("/customer/:customerId", ...requireRole(sessions, "admin"), async (req, res, next) => {
    try {
      const parsed = profilePatchSchema.parse(req.body);
      const patch: CustomerProfilePatch = {};
      if (parsed.email !== undefined) patch.email = parsed.email;
      if (parsed.lifetime_value !== undefined) patch.lifetimeValue = parsed.lifetime_value;
      if (parsed.risk_tier !== undefined) patch.riskTier = parsed.risk_tier;
      res.json({ profile: await history.updateProfile(req.params.customerId, patch) });
    } catch (error) {
      next(error);
    }
  });

  router.get("/customers/top", signedIn, async (req, res, next) => {
    try {
      const { days, limit } = topQuerySchema.parse(req.query);
      res.json({ customers: await history.getTopComplainers(days, limit) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
