export type RiskTier = "vip" | "trusted" | "normal" | "watch" | "flagged" | "unknown";

export interface CustomerProfile {
  customerId: string;
  email: string | null;
  totalComplaints: number;
  totalRefunds: number;
  totalDenials: number;
  fraudFlags: number;
  lifetimeValue: number;
  riskTier: RiskTier;
  firstSeen: string;
  lastSeen: string;
}

export interface CustomerProfilePatch {
  email?: string | null;
  lifetimeValue?: number;
  riskTier?: RiskTier;
}
