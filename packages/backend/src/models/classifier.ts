import type { Decision } from "./complaint.js";

export interface NumericScaling {
  mean: number;
  std: number;
}

export interface ClassifierArtifact {
  version: number;
  trainedAt: string;
  exampleCount: number;
  classes: Decision[];
  /** Known values per categorical feature, in one-hot column order. */
  categorical: Record<string, string[]>;
  numeric: Record<string, NumericScaling>;
  /** One row per class, one column per encoded feature. */
  weights: number[][];
  bias: number[];
}

export interface TrainingExample {
  orderStatus: string;
  refundHistory30d: number;
  handoffPhoto: boolean;
  courierRating: number;
  label: Decision;
}
