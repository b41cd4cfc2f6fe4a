import express from "express";

import type { Logger } from "./lib/logger.js";
import type { RetrainSummary } from "./jobs/retrainModel.js";
import { requireRole, requireSession } from "./middleware/auth.js";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler.js";
import { rateLimit } from "./middleware/rateLimit.js";
import { requestLogger } from "./middleware/requestLogger.js";
import { createAdminRouter } from "./routes/admin.js";
import { createAnalyticsRouter } from "./routes/analytics.js";
import { createAuditRouter } from "./routes/audit.js";
import { createBatchRouter } from "./routes/batch.js";
import { createCustomersRouter } from "./routes/customers.js";
import { createDecisionsRouter } from "./routes/decisions.js";
import { createEvidenceRouter } from "./routes/evidence.js";
import { createFeedbackRouter } from "./routes/feedback.js";
import { createHealthRouter } from "./routes/health.js";
import { createMailRouter } from "./routes/mail.js";
import { createModelRouter } from "./routes/model.js";
import { createRewriteRouter } from "./routes/rewrite.js";
import type { AuditLogService } from "./services/auditLogService.js";
import type { CustomerHistoryService } from "./services/customerHistoryService.js";
import type { DecisionService } from "./services/decisionService.js";
import type { HybridEngine } from "./services/hybridEngine.js";
import type { ComplaintIntelligence } from "./services/intelligenceService.js";
import type { MailerService } from "./services/mailerService.js";
import type { SessionService } from "./services/sessionService.js";

/** Requests allowed per client per minute. */
export interface RateLimits {
  decide: number;
  rewrite: number;
  upload: number;
}

export const DEFAULT_RATE_LIMITS: RateLimits = { decide: 60, rewrite: 30, upload: 20 };

export interface AppDeps {
  decisionService: DecisionService;
  engine: HybridEngine;
  intelligence: ComplaintIntelligence;
  auditLogService: AuditLogService;
  history: CustomerHistoryService;
  mailer: MailerService;
  sessions: SessionService;
  retrain: () => Promise<RetrainSummary>;
  uploadDir: string;
  log: Logger;
  version?: string;
  rateLimits?: Partial<RateLimits>;
  /** Honour X-Forwarded-For when keying rate limits. */
  trustProxy?: boolean;
}

const MINUTE_MS = 60_000;

export function createApp(deps: AppDeps) {
  const { sessions, auditLogService, log } = deps;
  const limits = { ...DEFAULT_RATE_LIMITS, ...deps.rateLimits };
  const app = express();

  app.disable("x-powered-by");
  app.set("trust proxy", deps.trustProxy ?? false);
  app.use(requestLogger(log));
  app.use(express.json({ limit: "1mb" }));

  const decisions = createDecisionsRouter(deps.decisionService);
  const decideLimit = rateLimit({ maxRequests: limits.decide, windowMs: MINUTE_MS });
  app.use("/api/decide", decideLimit, decisions);
  app.use("/api/classify", decideLimit, decisions);

  const health = createHealthRouter({ engine: deps.engine, auditLogService, version: deps.version ?? "1.0.0" });
  app.use("/api/health", health);
  app.use("/health", health);

  app.use("/admin", createAdminRouter({ sessions, auditLogService, mailer: deps.mailer, engine: deps.engine, log }));
  app.use("/api", createMailRouter(deps.mailer, sessions));
  app.use("/api/audit", requireSession(sessions), createAuditRouter(auditLogService));
  app.use("/api/analytics", requireSession(sessions), createAnalyticsRouter(auditLogService));
  app.use("/api/feedback", requireSession(sessions), createFeedbackRouter(auditLogService));
  app.use("/api/batch", ...requireRole(sessions, "admin", "agent"), createBatchRouter(deps.decisionService));
  app.use("/api/model", ...requireRole(sessions, "admin"), createModelRouter(deps.retrain));
  app.use(
    "/api/rewrite",
    rateLimit({ maxRequests: limits.rewrite, windowMs: MINUTE_MS }),
    createRewriteRouter(deps.intelligence)
  );
  app.use(
    "/api/upload/evidence",
    rateLimit({ maxRequests: limits.upload, windowMs: MINUTE_MS }),
    createEvidenceRouter(deps.uploadDir, log)
  );
  app.use("/static/uploads", express.static(deps.uploadDir));
  app.use("/api", createCustomersRouter({ history: deps.history, auditLogService, sessions }));

  app.use(notFoundHandler());
  app.use(errorHandler(log));

  return app;
}
