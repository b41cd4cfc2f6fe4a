import { promises as fs } from "node:fs";

import type { AuditLogService } from "../services/auditLogService.js";
import { Classifier, saveClassifier } from "../services/classifier.js";
import type { HybridEngine } from "../services/hybridEngine.js";
import { examplesFromFeedback, loadTrainingCsv, trainClassifier, type TrainOptions } from "../services/trainer.js";
import { BadRequestError } from "../lib/errors.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";

export interface RetrainJobDeps {
  auditLogService: AuditLogService;
  trainingCsvPath: string;
  modelPath: string;
  engine?: HybridEngine;
  feedbackLimit?: number;
  options?: TrainOptions;
  log?: Logger;
}

export interface RetrainSummary {
  modelPath: string;
  trainedAt: string;
  classes: string[];
  csvExamples: number;
  feedbackExamples: number;
  skippedRows: number;
}

async function readCsv(filePath: string, log: Logger): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (error) {
    log.warn("Training CSV not readable", { path: filePath, error: describeError(error) });
    return "";
  }
}

/**
 * Fits a new classifier on the training CSV plus agent corrections, writes
 * the artifact and swaps it into the running engine.
 */
export async function retrainModel({
  auditLogService,
  trainingCsvPath,
  modelPath,
  engine,
  feedbackLimit = 1000,
  options,
  log = rootLogger,
}: RetrainJobDeps): Promise<RetrainSummary> {
  const text = await readCsv(trainingCsvPath, log);
  const csv = text.trim() ? loadTrainingCsv(text) : { examples: [], skipped: 0 };
  const feedback = examplesFromFeedback(await auditLogService.getFeedbackForTraining(feedbackLimit));
  const examples = [...csv.examples, ...feedback];
  if (examples.length === 0) {
    throw new BadRequestError("No training data available");
  }

  const artifact = trainClassifier(examples, options);
  await saveClassifier(modelPath, artifact);
  engine?.reloadModel(new Classifier(artifact));

  log.info("Model retrained", {
    path: modelPath,
    csvExamples: csv.examples.length,
    feedbackExamples: feedback.length,
    classes: artifact.classes,
  });

  return {
    modelPath,
    trainedAt: artifact.trainedAt,
    classes: artifact.classes,
    csvExamples: csv.examples.length,
    feedbackExamples: feedback.length,
    skippedRows: csv.skipped,
  };
}
