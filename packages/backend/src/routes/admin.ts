import express from "express";
import { z } from "zod";

import { AuthenticationError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";
import { bearerToken, currentSession, requireRole, requireSession } from "../middleware/auth.js";
import type { AuditLogService } from "../services/auditLogService.js";
import { SLA_MINUTES } from "../services/decisionService.js";
import type { HybridEngine } from "../services/hybridEngine.js";
import type { MailerService } from "../services/mailerService.js";
import type { SessionService } from "../services/sessionService.js";
import { complaintListQuerySchema } from "./queries.js";

export interface AdminDeps {
  sessions: SessionService;
  auditLogService: AuditLogService;
  mailer: MailerService;
  engine: HybridEngine;
  log: Logger;
}

const loginSchema = z.object({
  username: z.string().trim().min(1),
  password: z.string().trim().min(1),
});

export function createAdminRouter({ sessions, auditLogService, mailer, engine, log }: AdminDeps) {
  const router = express.Router();

  router.post("/login", (req, res, next) => {
    try {
      const { username, password } = loginSchema.parse(req.body);
      const session = sessions.login(username, password);
      if (!session) {
        log.warn("Failed login attempt", { username });
        throw new AuthenticationError("Invalid username or password");
      }
      log.info("User logged in", { username, role: session.role });
      res.json({ token: session.token, username: session.username, role: session.role, expiresAt: session.expiresAt });
    } catch (error) {
      next(error);
    }
  });

  router.get("/login", (req, res) => {
    const token = bearerToken(req);
    const session = token ? sessions.resolve(token) : null;
    res.json(
      session
        ? { authenticated: true, username: session.username, role: session.role, expiresAt: session.expiresAt }
        : { authenticated: false }
    );
  });

  router.post("/logout", (req, res) => {
    const token = bearerToken(req);
    const session = token ? sessions.resolve(token) : null;
    if (token && session) {
      sessions.logout(token);
      log.info("User logged out", { username: session.username });
    }
    res.status(204).send();
  });

  router.get("/dashboard", requireSession(sessions), async (_req, res, next) => {
    try {
      const [stats, recent] = await Promise.all([auditLogService.getStats(30), auditLogService.getRecent(10)]);
      res.json({ user: currentSession(res).username, stats, recent, sla_config: SLA_MINUTES });
    } catch (error) {
      next(error);
    }
  });

  router.get("/complaints", requireSession(sessions), async (req, res, next) => {
    try {
      const query = complaintListQuerySchema.parse(req.query);
      res.json(await auditLogService.getComplaints(query));
    } catch (error) {
      next(error);
    }
  });

  router.get("/settings", ...requireRole(sessions, "admin"), async (_req, res, next) => {
    try {
      res.json({
        smtp: await mailer.testConnection(),
        engine: { model_loaded: engine.hasModel(), rule_count: engine.ruleCount },
        sla_config: SLA_MINUTES,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
