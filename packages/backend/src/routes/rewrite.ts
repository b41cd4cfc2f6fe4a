import express from "express";
import { z } from "zod";

import { BadRequestError } from "../lib/errors.js";
import type { ComplaintIntelligence } from "../services/intelligenceService.js";

const rewriteSchema = z.object({ text: z.string().default("") });

export function createRewriteRouter(intelligence: ComplaintIntelligence) {
  const router = express.Router();

  router.post("/", (req, res, next) => {
    try {
      const { text } = rewriteSchema.parse(req.body ?? {});
      if (!text) {
        throw new BadRequestError("No text provided");
      }
      const rewritten = intelligence.rewriteComplaint(text);
      res.json({ original: text, rewritten, improvements: intelligence.getImprovements(text, rewritten) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
