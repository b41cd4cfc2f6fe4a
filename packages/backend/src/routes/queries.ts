import { z } from "zod";

import { decisionSchema, severitySchema } from "../db/schemas.js";

export const daysQuerySchema = z.object({
  days: z.coerce.number().int().positive().max(3650).default(30),
});

export const pageQuerySchema = z.object({
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(500).default(20),
});

export const complaintListQuerySchema = pageQuerySchema.extend({
  status: z.union([decisionSchema, z.literal("all")]).default("all"),
  severity: z.union([severitySchema, z.literal("all")]).default("all"),
});
