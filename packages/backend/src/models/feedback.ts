import type { ComplaintCase, Decision } from "./complaint.js";

export interface FeedbackRecord {
  complaintId: string;
  originalDecision: Decision;
  correctedDecision: Decision;
  reason: string;
  agent: string;
  timestamp: string;
}

export interface TrainingFeedback extends FeedbackRecord {
  caseData: ComplaintCase;
}
