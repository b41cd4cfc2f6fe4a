import { stringify } from "csv-stringify/sync";
import express from "express";

import type { AuditLogService } from "../services/auditLogService.js";
import { complaintListQuerySchema } from "./queries.js";

export const EXPORT_COLUMNS = ["complaint_id", "order_id", "decision", "severity", "confidence", "timestamp"];

export function createAuditRouter(auditLogService: AuditLogService) {
  const router = express.Router();

  router.get("/", async (req, res, next) => {
    try {
      const query = complaintListQuerySchema.parse(req.query);
      res.json(await auditLogService.getComplaints(query));
    } catch (error) {
      next(error);
    }
  });

  router.get("/export.csv", async (_req, res, next) => {
    try {
      const rows = await auditLogService.exportRows(10000);
      const csv = stringify(
        rows.map((row) => [row.complaintId, row.orderId, row.decision, row.severity, row.confidence, row.timestamp]),
        { header: true, columns: EXPORT_COLUMNS }
      );
      res.setHeader("Content-Type", "text/csv; charset=utf-8");
      res.setHeader("Content-Disposition", "attachment;filename=complaints_export.csv");
      res.send(csv);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
