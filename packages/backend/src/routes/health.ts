import express from "express";

import type { AuditLogService } from "../services/auditLogService.js";
import type { HybridEngine } from "../services/hybridEngine.js";

export interface HealthDeps {
  engine: HybridEngine;
  auditLogService: AuditLogService;
  version: string;
}

export function createHealthRouter({ engine, auditLogService, version }: HealthDeps) {
  const router = express.Router();

  router.get("/", async (_req, res, next) => {
    try {
      const database = await auditLogService.isHealthy();
      res.json({
        status: database && engine.isReady() ? "healthy" : "degraded",
        version,
        timestamp: new Date().toISOString(),
        components: {
          engine: engine.isReady(),
          model: engine.hasModel(),
          rules: engine.ruleCount,
          database,
          fraud_detector: true,
        },
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
