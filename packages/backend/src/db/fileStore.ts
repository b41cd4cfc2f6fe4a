import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

import type { ComplaintRecord } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";
import { applyActivity, applyProfilePatch, newestFeedback, selectPage } from "./records.js";
import { complaintRecordSchema, customerProfileSchema, feedbackRecordSchema } from "./schemas.js";
import type { ComplaintPage, ComplaintQuery, ComplaintStore, CustomerActivity, PageOptions } from "./types.js";

const FILE_LOCK = new Map<string, Promise<void>>();

const storeFileSchema = z.object({
  complaints: z.array(complaintRecordSchema),
  feedback: z.array(feedbackRecordSchema),
  customers: z.array(customerProfileSchema),
});

interface StoreFile {
  complaints: ComplaintRecord[];
  feedback: FeedbackRecord[];
  customers: CustomerProfile[];
}

function emptyFile(): StoreFile {
  return { complaints: [], feedback: [], customers: [] };
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function withLock<T>(filePath: string, action: () => Promise<T>): Promise<T> {
  const previous = FILE_LOCK.get(filePath) ?? Promise.resolve();
  const current = previous.then(action);
  const settled = current.then(
    () => undefined,
    () => undefined
  );
  FILE_LOCK.set(filePath, settled);

  try {
    return await current;
  } finally {
    if (FILE_LOCK.get(filePath) === settled) {
      FILE_LOCK.delete(filePath);
    }
  }
}

/**
 * Keeps complaints, feedback and customer profiles in one JSON document.
 * Writes are serialised per file and land through a temp file + rename.
 */
export class FileStore implements ComplaintStore {
  constructor(private readonly filePath: string) {}

  async saveComplaint(record: ComplaintRecord): Promise<ComplaintRecord> {
    return this.mutate((data) => {
      const index = data.complaints.findIndex((item) => item.complaintId === record.complaintId);
      if (index === -1) {
        data.complaints.push(record);
      } else {
        data.complaints[index] = record;
      }
      return record;
    });
  }

  async getComplaint(complaintId: string): Promise<ComplaintRecord | null> {
    const data = await this.readAll();
    return data.complaints.find((item) => item.complaintId === complaintId) ?? null;
  }

  async markResolved(complaintId: string, resolvedAt: string): Promise<ComplaintRecord | null> {
    return this.mutate((data) => {
      const index = data.complaints.findIndex((item) => item.complaintId === complaintId);
      if (index === -1) return null;
      const updated: ComplaintRecord = { ...data.complaints[index], resolvedAt };
      data.complaints[index] = updated;
      return updated;
    });
  }

  async queryComplaints(query: ComplaintQuery, page?: PageOptions): Promise<ComplaintPage> {
    const data = await this.readAll();
    return selectPage(data.complaints, query, page);
  }

  async saveFeedback(record: FeedbackRecord): Promise<FeedbackRecord> {
    return this.mutate((data) => {
      data.feedback.push(record);
      return record;
    });
  }

  async listFeedback(limit: number): Promise<FeedbackRecord[]> {
    const data = await this.readAll();
    return newestFeedback(data.feedback, limit);
  }

  async getCustomer(customerId: string): Promise<CustomerProfile | null> {
    const data = await this.readAll();
    return data.customers.find((item) => item.customerId === customerId) ?? null;
  }

  async recordCustomerActivity(activity: CustomerActivity): Promise<CustomerProfile> {
    return this.mutate((data) => {
      const index = data.customers.findIndex((item) => item.customerId === activity.customerId);
      const profile = applyActivity(index === -1 ? null : data.customers[index], activity);
      if (index === -1) {
        data.customers.push(profile);
      } else {
        data.customers[index] = profile;
      }
      return profile;
    });
  }

  async updateCustomer(customerId: string, patch: CustomerProfilePatch): Promise<CustomerProfile | null> {
    return this.mutate((data) => {
      const index = data.customers.findIndex((item) => item.customerId === customerId);
      if (index === -1) return null;
      const updated = applyProfilePatch(data.customers[index], patch);
      data.customers[index] = updated;
      return updated;
    });
  }

  async ping(): Promise<boolean> {
    try {
      await this.readAll();
      return true;
    } catch {
      return false;
    }
  }

  private async mutate<T>(change: (data: StoreFile) => T): Promise<T> {
    return withLock(this.filePath, async () => {
      const data = await this.readAll();
      const result = change(data);
      await this.saveAll(data);
      return result;
    });
  }

  /** A file that does not exist yet reads as an empty store. */
  private async readAll(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return emptyFile();
      throw error;
    }
    return storeFileSchema.parse(JSON.parse(raw));
  }

  private async saveAll(data: StoreFile): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(data, null, 2), "utf8");
    await fs.rename(tempPath, this.filePath);
  }
}
