import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";

import type { ClassifierArtifact } from "../models/classifier.js";
import type { ComplaintCase, Decision } from "../models/complaint.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";
import { decisionSchema } from "../db/schemas.js";

export const CATEGORICAL_FEATURES = ["order_status", "handoff_photo"] as const;
export const NUMERIC_FEATURES = ["refund_history_30d", "courier_rating"] as const;

export type CategoricalFeature = (typeof CATEGORICAL_FEATURES)[number];
export type NumericFeature = (typeof NUMERIC_FEATURES)[number];

export interface FeatureRow {
  order_status: string;
  handoff_photo: string;
  refund_history_30d: number;
  courier_rating: number;
}

export interface Prediction {
  label: Decision;
  confidence: number;
  probabilities: Partial<Record<Decision, number>>;
}

const artifactSchema: z.ZodType<ClassifierArtifact> = z.object({
  version: z.number(),
  trainedAt: z.string(),
  exampleCount: z.number(),
  classes: z.array(decisionSchema).min(2),
  categorical: z.record(z.array(z.string())),
  numeric: z.record(z.object({ mean: z.number(), std: z.number() })),
  weights: z.array(z.array(z.number())),
  bias: z.array(z.number()),
});

export function featureCount(artifact: Pick<ClassifierArtifact, "categorical">): number {
  const oneHot = CATEGORICAL_FEATURES.reduce((sum, feature) => sum + (artifact.categorical[feature]?.length ?? 0), 0);
  return oneHot + NUMERIC_FEATURES.length;
}

export function parseClassifierArtifact(raw: unknown): ClassifierArtifact {
  const artifact = artifactSchema.parse(raw);
  const width = featureCount(artifact);
  if (artifact.weights.length !== artifact.classes.length || artifact.bias.length !== artifact.classes.length) {
    throw new Error("Classifier artifact has one weight row and one bias per class");
  }
  if (artifact.weights.some((row) => row.length !== width)) {
    throw new Error(`Classifier weight rows must have ${width} columns`);
  }
  return artifact;
}

export function featureRowFromCase(complaintCase: ComplaintCase): FeatureRow {
  return {
    order_status: complaintCase.orderStatus || "unknown",
    handoff_photo: String(complaintCase.handoffPhoto),
    refund_history_30d: Math.trunc(complaintCase.refundHistory30d),
    courier_rating: complaintCase.courierRating,
  };
}

/** One-hot categorical columns (unknown values encode as all zeros), then standard-scaled numerics. */
export function encodeFeatures(
  artifact: Pick<ClassifierArtifact, "categorical" | "numeric">,
  row: FeatureRow
): number[] {
  const vector: number[] = [];
  for (const feature of CATEGORICAL_FEATURES) {
    for (const known of artifact.categorical[feature] ?? []) {
      vector.push(row[feature] === known ? 1 : 0);
    }
  }
  for (const feature of NUMERIC_FEATURES) {
    const scaling = artifact.numeric[feature] ?? { mean: 0, std: 1 };
    const std = scaling.std === 0 ? 1 : scaling.std;
    vector.push((row[feature] - scaling.mean) / std);
  }
  return vector;
}

export function softmax(logits: number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((value) => Math.exp(value - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
}

export function classLogits(weights: number[][], bias: number[], vector: number[]): number[] {
  return weights.map((row, k) => row.reduce((sum, weight, d) => sum + weight * vector[d], bias[k]));
}

export class Classifier {
  constructor(readonly artifact: ClassifierArtifact) {}

  predictProba(complaintCase: ComplaintCase): number[] {
    const vector = encodeFeatures(this.artifact, featureRowFromCase(complaintCase));
    return softmax(classLogits(this.artifact.weights, this.artifact.bias, vector));
  }

  predict(complaintCase: ComplaintCase): Prediction {
    const probabilities = this.predictProba(complaintCase);
    let best = 0;
    for (let k = 1; k < probabilities.length; k += 1) {
      if (probabilities[k] > probabilities[best]) best = k;
    }
    const byClass: Partial<Record<Decision, number>> = {};
    this.artifact.classes.forEach((label, k) => {
      byClass[label] = probabilities[k];
    });
    return { label: this.artifact.classes[best], confidence: probabilities[best], probabilities: byClass };
  }
}

/**
 * Returns null when there is no model on disk or the artifact is unusable;
 * the engine then runs on policy rules alone.
 */
export async function loadClassifier(filePath: string, log: Logger = rootLogger): Promise<Classifier | null> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch {
    log.warn("No classifier model found", { path: filePath });
    return null;
  }
  try {
    const classifier = new Classifier(parseClassifierArtifact(JSON.parse(raw)));
    log.info("Loaded classifier model", {
      path: filePath,
      classes: classifier.artifact.classes,
      trainedAt: classifier.artifact.trainedAt,
    });
    return classifier;
  } catch (error) {
    log.warn("Could not load classifier model", { path: filePath, error: describeError(error) });
    return null;
  }
}

export async function saveClassifier(filePath: string, artifact: ClassifierArtifact): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, JSON.stringify(artifact, null, 2), "utf8");
}
