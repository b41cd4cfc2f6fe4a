import { randomBytes, randomUUID } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import express from "express";
import { z } from "zod";

import { BadRequestError } from "../lib/errors.js";
import type { Logger } from "../lib/logger.js";

export const ALLOWED_EXTENSIONS = ["png", "jpg", "jpeg", "gif", "pdf", "webp"];

export const MAX_UPLOAD_BYTES = 16 * 1024 * 1024;

const uploadQuerySchema = z.object({
  filename: z.string().trim().default(""),
  complaint_id: z
    .string()
    .trim()
    .regex(/^[A-Za-z0-9_-]+$/, "complaint_id may only contain letters, digits, '-' and '_'")
    .optional(),
});

export function extensionOf(filename: string): string | null {
  const dot = filename.lastIndexOf(".");
  if (dot === -1) return null;
  const ext = filename.slice(dot + 1).toLowerCase();
  return ALLOWED_EXTENSIONS.includes(ext) ? ext : null;
}

/**
 * Raw-body upload. The original name comes from `?filename=` or the
 * `X-Filename` header and is only used for its extension.
 */
export function createEvidenceRouter(uploadDir: string, log: Logger) {
  const router = express.Router();

  router.post("/", express.raw({ type: () => true, limit: MAX_UPLOAD_BYTES }), async (req, res, next) => {
    try {
      const query = uploadQuerySchema.parse({ ...req.query, filename: req.query.filename ?? req.get("x-filename") });
      const body: unknown = req.body;
      if (!Buffer.isBuffer(body) || body.length === 0) {
        throw new BadRequestError("No file provided");
      }
      if (!query.filename) {
        throw new BadRequestError("No file selected");
      }
      const ext = extensionOf(query.filename);
      if (!ext) {
        throw new BadRequestError("File type not allowed");
      }

      const complaintId = query.complaint_id ?? randomUUID().slice(0, 12);
      const filename = `${complaintId}_${randomBytes(4).toString("hex")}.${ext}`;
      await fs.mkdir(uploadDir, { recursive: true });
      await fs.writeFile(path.join(uploadDir, filename), body);
      log.info("Evidence uploaded", { filename, complaintId, bytes: body.length });

      res.json({ success: true, filename, url: `/static/uploads/${filename}`, complaint_id: complaintId });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
