import express from "express";

import type { DecisionService } from "../services/decisionService.js";

export function createDecisionsRouter(decisionService: DecisionService) {
  const router = express.Router();

  router.post("/", async (req, res, next) => {
    try {
      const decision = await decisionService.decide(req.body);
      res.json(decision);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
