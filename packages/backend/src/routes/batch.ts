import express from "express";

import { BadRequestError } from "../lib/errors.js";
import type { DecisionService } from "../services/decisionService.js";

export function createBatchRouter(decisionService: DecisionService) {
  const router = express.Router();

  router.post("/classify", express.text({ type: ["text/csv", "text/plain"], limit: "16mb" }), (req, res, next) => {
    try {
      const body: unknown = req.body;
      if (typeof body !== "string") {
        throw new BadRequestError("Invalid file. Please upload a CSV.");
      }
      res.json(decisionService.classifyBatch(body));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
