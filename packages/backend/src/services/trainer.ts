import { parse } from "csv-parse/sync";
import { z } from "zod";

import type { ClassifierArtifact, NumericScaling, TrainingExample } from "../models/classifier.js";
import { isDecision, type ComplaintCase, type Decision } from "../models/complaint.js";
import type { TrainingFeedback } from "../models/feedback.js";
import { BadRequestError } from "../lib/errors.js";
import {
  CATEGORICAL_FEATURES,
  NUMERIC_FEATURES,
  classLogits,
  encodeFeatures,
  type FeatureRow,
  softmax,
} from "./classifier.js";

export interface TrainOptions {
  iterations?: number;
  learningRate?: number;
  l2?: number;
}

export interface ParsedTrainingData {
  examples: TrainingExample[];
  skipped: number;
}

const csvRowsSchema = z.array(z.array(z.string()));

const TRUTHY = new Set(["1", "true", "yes", "y", "t"]);

function parseNumber(raw: string | undefined): number {
  const trimmed = raw?.trim() ?? "";
  return trimmed === "" ? Number.NaN : Number(trimmed);
}

export function normalizeOrderStatus(raw: string): string {
  return raw.toLowerCase().replace(/ /g, "_").replace(/-/g, "_");
}

/** Parses a training CSV with `order_status`, `refund_history_30d`, `handoff_photo`, `courier_rating` and `label` columns. */
export function loadTrainingCsv(text: string): ParsedTrainingData {
  const rows = csvRowsSchema.parse(parse(text, { skip_empty_lines: true, trim: true, relax_column_count: true }));
  const [header, ...body] = rows;
  if (!header || !header.includes("label")) {
    throw new BadRequestError("CSV must have 'label' with: deny|refund|escalate");
  }
  const column = (row: string[], name: string): string | undefined => {
    const index = header.indexOf(name);
    return index === -1 ? undefined : row[index];
  };

  const examples: TrainingExample[] = [];
  let skipped = 0;
  for (const row of body) {
    const label = (column(row, "label") ?? "").toLowerCase();
    if (!isDecision(label)) {
      skipped += 1;
      continue;
    }
    const refunds = parseNumber(column(row, "refund_history_30d"));
    const rating = parseNumber(column(row, "courier_rating"));
    examples.push({
      orderStatus: normalizeOrderStatus(column(row, "order_status") ?? ""),
      refundHistory30d: Number.isNaN(refunds) ? 0 : Math.trunc(refunds),
      handoffPhoto: TRUTHY.has((column(row, "handoff_photo") ?? "").toLowerCase()),
      courierRating: Number.isNaN(rating) ? 4.7 : rating,
      label,
    });
  }
  return { examples, skipped };
}

export function exampleFromCase(complaintCase: ComplaintCase, label: Decision): TrainingExample {
  return {
    orderStatus: complaintCase.orderStatus,
    refundHistory30d: complaintCase.refundHistory30d,
    handoffPhoto: complaintCase.handoffPhoto,
    courierRating: complaintCase.courierRating,
    label,
  };
}

export function examplesFromFeedback(feedback: TrainingFeedback[]): TrainingExample[] {
  return feedback.map((entry) => exampleFromCase(entry.caseData, entry.correctedDecision));
}

function toFeatureRow(example: TrainingExample): FeatureRow {
  return {
    order_status: example.orderStatus || "unknown",
    handoff_photo: String(example.handoffPhoto),
    refund_history_30d: example.refundHistory30d,
    courier_rating: example.courierRating,
  };
}

function scalingFor(values: number[]): NumericScaling {
  const mean = values.reduce((sum, value) => sum + value, 0) / values.length;
  const variance = values.reduce((sum, value) => sum + (value - mean) ** 2, 0) / values.length;
  const std = Math.sqrt(variance);
  return { mean, std: std === 0 ? 1 : std };
}

/**
 * Multinomial logistic regression fitted by batch gradient descent from zero
 * weights, so the same examples always produce the same model.
 */
export function trainClassifier(examples: TrainingExample[], options: TrainOptions = {}): ClassifierArtifact {
  const iterations = options.iterations ?? 500;
  const learningRate = options.learningRate ?? 0.5;
  const l2 = options.l2 ?? 0.001;

  const classes = [...new Set(examples.map((example) => example.label))].sort();
  if (classes.length < 2) {
    throw new BadRequestError("Training data needs at least two distinct labels");
  }

  const rows = examples.map(toFeatureRow);
  const categorical: Record<string, string[]> = {};
  for (const feature of CATEGORICAL_FEATURES) {
    categorical[feature] = [...new Set(rows.map((row) => row[feature]))].sort();
  }
  const numeric: Record<string, NumericScaling> = {};
  for (const feature of NUMERIC_FEATURES) {
    numeric[feature] = scalingFor(rows.map((row) => row[feature]));
  }

  const inputs = rows.map((row) => encodeFeatures({ categorical, numeric }, row));
  const targets = examples.map((example) => classes.indexOf(example.label));
  const width = inputs[0].length;
  const weights = classes.map(() => new Array<number>(width).fill(0));
  const bias = new Array<number>(classes.length).fill(0);
  const n = inputs.length;

  for (let iteration = 0; iteration < iterations; iteration += 1) {
    const gradW = classes.map(() => new Array<number>(width).fill(0));
    const gradB = new Array<number>(classes.length).fill(0);

    inputs.forEach((vector, i) => {
      const probabilities = softmax(classLogits(weights, bias, vector));
      probabilities.forEach((probability, k) => {
        const error = probability - (targets[i] === k ? 1 : 0);
        gradB[k] += error / n;
        for (let d = 0; d < width; d += 1) {
          gradW[k][d] += (error * vector[d]) / n;
        }
      });
    });

    for (let k = 0; k < classes.length; k += 1) {
      bias[k] -= learningRate * gradB[k];
      for (let d = 0; d < width; d += 1) {
        weights[k][d] -= learningRate * (gradW[k][d] + l2 * weights[k][d]);
      }
    }
  }

  return {
    version: 1,
    trainedAt: new Date().toISOString(),
    exampleCount: examples.length,
    classes,
    categorical,
    numeric,
    weights,
    bias,
  };
}
