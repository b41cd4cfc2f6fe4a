import type { ComplaintCase } from "../models/complaint.js";

/**
 * Policy files and training data name case fields in snake_case.
 */
export function caseFieldValue(complaintCase: ComplaintCase, field: string): unknown {
  switch (field) {
    case "order_id":
      return complaintCase.orderId;
    case "order_status":
    case "issue_type":
      return complaintCase.orderStatus;
    case "complaint_text":
      return complaintCase.complaintText;
    case "refund_history_30d":
      return complaintCase.refundHistory30d;
    case "handoff_photo":
      return complaintCase.handoffPhoto;
    case "courier_rating":
      return complaintCase.courierRating;
    case "order_value":
      return complaintCase.orderValue;
    case "customer_id":
      return complaintCase.customerId;
    case "evidence_count":
      return complaintCase.evidenceCount;
    default:
      return undefined;
  }
}
