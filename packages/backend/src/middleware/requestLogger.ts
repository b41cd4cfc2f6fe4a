import { randomUUID } from "node:crypto";
import type { NextFunction, Request, RequestHandler, Response } from "express";

import type { Logger } from "../lib/logger.js";

export function requestLogger(log: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID().slice(0, 8);
    const started = process.hrtime.bigint();
    res.setHeader("X-Request-Id", requestId);
    res.on("finish", () => {
      const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
      log.info(`[${requestId}] ${req.method} ${req.path} - ${res.statusCode} (${durationMs.toFixed(1)}ms)`);
    });
    next();
  };
}
