import type { ComplaintRecord } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";
import { applyActivity, applyProfilePatch, newestFeedback, selectPage } from "./records.js";
import type { ComplaintPage, ComplaintQuery, ComplaintStore, CustomerActivity, PageOptions } from "./types.js";

export class MemoryStore implements ComplaintStore {
  private readonly complaints = new Map<string, ComplaintRecord>();
  private readonly feedback: FeedbackRecord[] = [];
  private readonly customers = new Map<string, CustomerProfile>();

  async saveComplaint(record: ComplaintRecord): Promise<ComplaintRecord> {
    this.complaints.set(record.complaintId, record);
    return record;
  }

  async getComplaint(complaintId: string): Promise<ComplaintRecord | null> {
    return this.complaints.get(complaintId) ?? null;
  }

  async markResolved(complaintId: string, resolvedAt: string): Promise<ComplaintRecord | null> {
    const existing = this.complaints.get(complaintId);
    if (!existing) return null;
    const updated: ComplaintRecord = { ...existing, resolvedAt };
    this.complaints.set(complaintId, updated);
    return updated;
  }

  async queryComplaints(query: ComplaintQuery, page?: PageOptions): Promise<ComplaintPage> {
    return selectPage(this.complaints.values(), query, page);
  }

  async saveFeedback(record: FeedbackRecord): Promise<FeedbackRecord> {
    this.feedback.push(record);
    return record;
  }

  async listFeedback(limit: number): Promise<FeedbackRecord[]> {
    return newestFeedback(this.feedback, limit);
  }

  async getCustomer(customerId: string): Promise<CustomerProfile | null> {
    return this.customers.get(customerId) ?? null;
  }

  async recordCustomerActivity(activity: CustomerActivity): Promise<CustomerProfile> {
    const profile = applyActivity(this.customers.get(activity.customerId) ?? null, activity);
    this.customers.set(profile.customerId, profile);
    return profile;
  }

  async updateCustomer(customerId: string, patch: CustomerProfilePatch): Promise<CustomerProfile | null> {
    const existing = this.customers.get(customerId);
    if (!existing) return null;
    const updated = applyProfilePatch(existing, patch);
    this.customers.set(customerId, updated);
    return updated;
  }

  async ping(): Promise<boolean> {
    return true;
  }
}
