import express from "express";
import { z } from "zod";

import type { AuditLogService } from "../services/auditLogService.js";
import { daysQuerySchema } from "./queries.js";

const timeseriesQuerySchema = daysQuerySchema.extend({
  metric: z.enum(["volume", "decision", "severity", "fraud"]).default("volume"),
});

export function createAnalyticsRouter(auditLogService: AuditLogService) {
  const router = express.Router();

  router.get("/overview", async (req, res, next) => {
    try {
      const { days } = daysQuerySchema.parse(req.query);
      const stats = await auditLogService.getStats(days);
      res.json({
        total_complaints: stats.total,
        by_decision: stats.byDecision,
        by_severity: stats.bySeverity,
        by_category: stats.byCategory,
        by_source: stats.bySource,
        avg_confidence: stats.avgConfidence,
        fraud_flagged: stats.fraudFlagged,
        sla_compliance: stats.slaCompliance,
        trend: stats.dailyTrend,
      });
    } catch (error) {
      next(error);
    }
  });

  router.get("/timeseries", async (req, res, next) => {
    try {
      const { days, metric } = timeseriesQuerySchema.parse(req.query);
      res.json(await auditLogService.getTimeseries(days, metric));
    } catch (error) {
      next(error);
    }
  });

  router.get("/root-causes", async (req, res, next) => {
    try {
      const { days } = daysQuerySchema.parse(req.query);
      res.json(await auditLogService.getRootCauseStats(days));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
