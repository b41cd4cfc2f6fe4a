import type { ComplaintRecord, Decision, FraudRisk, Severity } from "../models/complaint.js";
import type { CustomerProfile, CustomerProfilePatch } from "../models/customer.js";
import type { FeedbackRecord } from "../models/feedback.js";

export interface ComplaintQuery {
  /** Inclusive lower bound on `timestamp` (ISO-8601). */
  since?: string;
  customerId?: string;
  excludeCustomerId?: string;
  decision?: Decision;
  severity?: Severity;
}

export interface PageOptions {
  limit: number;
  offset?: number;
}

export interface ComplaintPage {
  items: ComplaintRecord[];
  total: number;
}

export interface CustomerActivity {
  customerId: string;
  decision: Decision;
  fraudRisk: FraudRisk;
  at: string;
}

export interface ComplaintStore {
  /** Inserts or replaces the complaint with the same `complaintId`. */
  saveComplaint(record: ComplaintRecord): Promise<ComplaintRecord>;
  getComplaint(complaintId: string): Promise<ComplaintRecord | null>;
  markResolved(complaintId: string, resolvedAt: string): Promise<ComplaintRecord | null>;
  /** Newest first. Without `page` every match is returned. */
  queryComplaints(query: ComplaintQuery, page?: PageOptions): Promise<ComplaintPage>;
  saveFeedback(record: FeedbackRecord): Promise<FeedbackRecord>;
  /** Newest first. */
  listFeedback(limit: number): Promise<FeedbackRecord[]>;
  getCustomer(customerId: string): Promise<CustomerProfile | null>;
  recordCustomerActivity(activity: CustomerActivity): Promise<CustomerProfile>;
  updateCustomer(customerId: string, patch: CustomerProfilePatch): Promise<CustomerProfile | null>;
  ping(): Promise<boolean>;
}
