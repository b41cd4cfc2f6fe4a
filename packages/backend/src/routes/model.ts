import express from "express";

import type { RetrainSummary } from "../jobs/retrainModel.js";

export function createModelRouter(retrain: () => Promise<RetrainSummary>) {
  const router = express.Router();

  router.post("/retrain", async (_req, res, next) => {
    try {
      res.json({ success: true, ...(await retrain()) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
