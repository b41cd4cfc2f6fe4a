import type { ErrorRequestHandler, RequestHandler } from "express";
import { ZodError } from "zod";

import { HttpError } from "../lib/errors.js";
import { describeError, type Logger } from "../lib/logger.js";

export function notFoundHandler(): RequestHandler {
  return (_req, res) => {
    res.status(404).json({ error: "Not found" });
  };
}

export function errorHandler(log: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, _next) => {
    if (error instanceof ZodError) {
      res.status(400).json({ error: "Invalid request", details: error.issues });
      return;
    }
    if (error instanceof HttpError) {
      res.status(error.status).json(error.details === undefined ? { error: error.message } : { error: error.message, details: error.details });
      return;
    }
    // body-parser marks malformed payloads with a status
    if (error instanceof SyntaxError && "status" in error && error.status === 400) {
      res.status(400).json({ error: "Malformed request body" });
      return;
    }
    log.error("Server error", { method: req.method, path: req.path, error: describeError(error) });
    res.status(500).json({ error: "Internal server error" });
  };
}
