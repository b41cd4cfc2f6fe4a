import { promises as fs } from "node:fs";
import { z } from "zod";

import type { ComplaintCase, Severity } from "../models/complaint.js";

export type Sentiment = "very_negative" | "negative" | "neutral" | "positive";

export const GENERAL_COMPLAINT = "general_complaint";

const patternTableSchema = z.record(z.array(z.string()));

export const intelligencePatternsSchema = z.object({
  issues: patternTableSchema,
  severity: z.object({
    critical: z.array(z.string()),
    high: z.array(z.string()),
    medium: z.array(z.string()),
    low: z.array(z.string()),
  }),
  rootCauses: patternTableSchema,
  sentiment: z.object({
    very_negative: z.array(z.string()),
    negative: z.array(z.string()),
    neutral: z.array(z.string()),
    positive: z.array(z.string()),
  }),
  issueStatements: z.record(z.string()),
  informalWords: z.array(z.string()),
});

export type IntelligencePatterns = z.infer<typeof intelligencePatternsSchema>;

export type SeverityContext = Partial<Pick<ComplaintCase, "orderValue" | "orderStatus" | "refundHistory30d" | "handoffPhoto">>;

export interface SuggestedAction {
  action: string;
  priority: "urgent" | "high" | "medium" | "low";
  description: string;
}

export interface ComplaintAnalysis {
  severity: Severity;
  categories: string[];
  rootCause: string;
  sentiment: Sentiment;
  isMultiIssue: boolean;
  explanation: string;
  suggestedActions: SuggestedAction[];
}

type CompiledTable = Array<[string, RegExp[]]>;

function compile(patterns: string[]): RegExp[] {
  return patterns.map((pattern) => new RegExp(pattern, "i"));
}

function compileTable(table: Record<string, string[]>): CompiledTable {
  return Object.entries(table).map(([name, patterns]) => [name, compile(patterns)]);
}

function countMatches(patterns: RegExp[], text: string): number {
  return patterns.filter((pattern) => pattern.test(text)).length;
}

function humanize(label: string): string {
  return label.replace(/_/g, " ");
}

function isAllCaps(text: string): boolean {
  return text === text.toUpperCase() && text !== text.toLowerCase();
}

export async function loadIntelligencePatterns(filePath: string): Promise<IntelligencePatterns> {
  const raw = await fs.readFile(filePath, "utf8");
  return intelligencePatternsSchema.parse(JSON.parse(raw));
}

/**
 * Keyword and pattern analysis of free-text complaints: issue categories,
 * severity, root cause, sentiment, and a rewritten professional version.
 */
export class ComplaintIntelligence {
  private readonly issues: CompiledTable;

  private readonly rootCauses: CompiledTable;

  private readonly severity: Record<Severity, RegExp[]>;

  constructor(private readonly patterns: IntelligencePatterns) {
    this.issues = compileTable(patterns.issues);
    this.rootCauses = compileTable(patterns.rootCauses);
    this.severity = {
      critical: compile(patterns.severity.critical),
      high: compile(patterns.severity.high),
      medium: compile(patterns.severity.medium),
      low: compile(patterns.severity.low),
    };
  }

  analyze(text: string, context: SeverityContext = {}): ComplaintAnalysis {
    const lower = text.toLowerCase();
    const categories = this.detectIssues(lower);
    return {
      severity: this.detectSeverity(lower, context),
      categories,
      rootCause: this.detectRootCause(lower),
      sentiment: this.analyzeSentiment(lower),
      isMultiIssue: categories.length > 1,
      explanation: this.generateExplanation(lower, context),
      suggestedActions: this.suggestActions(lower, context),
    };
  }

  /** Multi-label, in table order. */
  detectIssues(text: string): string[] {
    const detected = this.issues
      .filter(([, patterns]) => patterns.some((pattern) => pattern.test(text)))
      .map(([issue]) => issue);
    return detected.length > 0 ? detected : [GENERAL_COMPLAINT];
  }

  detectIssueType(text: string): string {
    return this.detectIssues(text.toLowerCase())[0];
  }

  detectSeverity(text: string, context: SeverityContext = {}): Severity {
    if (this.severity.critical.some((pattern) => pattern.test(text))) {
      return "critical";
    }

    let score = 50;
    score += 20 * countMatches(this.severity.high, text);
    score += 5 * countMatches(this.severity.medium, text);
    score -= 15 * countMatches(this.severity.low, text);

    const orderValue = context.orderValue ?? 15;
    if (orderValue > 50) {
      score += 10;
    } else if (orderValue > 30) {
      score += 5;
    }
    if (context.orderStatus === "missing_delivery") {
      score += 15;
    }
    if ((context.refundHistory30d ?? 0) === 0) {
      score += 5;
    }

    if (score >= 80) return "high";
    if (score >= 50) return "medium";
    return "low";
  }

  /** Cause with the most pattern hits; earlier table entries win ties. */
  detectRootCause(text: string): string {
    let best = "unknown";
    let bestHits = 0;
    for (const [cause, patterns] of this.rootCauses) {
      const hits = countMatches(patterns, text);
      if (hits > bestHits) {
        best = cause;
        bestHits = hits;
      }
    }
    return best;
  }

  analyzeSentiment(text: string): Sentiment {
    const words = text.toLowerCase().split(/\s+/).filter(Boolean);
    const count = (list: string[]): number => words.filter((word) => list.includes(word)).length;
    const { sentiment } = this.patterns;

    if (count(sentiment.very_negative) > 0) return "very_negative";
    const negative = count(sentiment.negative);
    const positive = count(sentiment.positive);
    if (negative > positive) return "negative";
    if (positive > negative) return "positive";
    return "neutral";
  }

  generateExplanation(text: string, context: SeverityContext = {}): string {
    const issues = this.detectIssues(text).map(humanize).join(", ");
    const severity = this.detectSeverity(text, context);
    const rootCause = this.detectRootCause(text);

    let explanation = `This is a ${severity} severity complaint about ${issues}.`;
    if (rootCause !== "unknown") {
      explanation += ` The root cause appears to be ${humanize(rootCause)}.`;
    }
    if ((context.refundHistory30d ?? 0) >= 3) {
      explanation += " Note: Customer has multiple recent refund requests.";
    }
    if (!context.handoffPhoto && text.includes("missing")) {
      explanation += " No delivery photo is available to verify delivery.";
    }
    return explanation;
  }

  suggestActions(text: string, context: SeverityContext = {}): SuggestedAction[] {
    const actions: SuggestedAction[] = [];
    const issues = this.detectIssues(text);

    if (this.detectSeverity(text, context) === "critical") {
      actions.push({
        action: "immediate_escalation",
        priority: "urgent",
        description: "Escalate to supervisor immediately due to health/safety concern",
      });
    }
    if (issues.includes("missing_delivery") && !context.handoffPhoto) {
      actions.push({
        action: "request_photo_proof",
        priority: "high",
        description: "Request delivery photo from driver or check GPS logs",
      });
    }
    if ((context.refundHistory30d ?? 0) >= 3) {
      actions.push({
        action: "review_account",
        priority: "medium",
        description: "Review customer account for potential abuse pattern",
      });
    }
    if (issues.includes("driver_issue")) {
      actions.push({
        action: "driver_feedback",
        priority: "medium",
        description: "Flag delivery partner for quality review",
      });
    }
    if (this.detectRootCause(text) === "restaurant_error") {
      actions.push({
        action: "restaurant_feedback",
        priority: "low",
        description: "Send feedback to restaurant partner",
      });
    }
    return actions;
  }

  rewriteComplaint(text: string): string {
    if (!text) {
      return "";
    }
    const [mainIssue] = this.detectIssues(text.toLowerCase());
    const statements = this.patterns.issueStatements;
    const statement = statements[mainIssue] ?? statements[GENERAL_COMPLAINT] ?? "I have an issue with my order";

    let rewritten = `${statement}. `;
    const duration = /(\d+)\s*(minutes?|hours?|mins?|hrs?)/i.exec(text);
    if (duration) {
      rewritten += `The delay was approximately ${duration[1]} ${duration[2]}. `;
    }
    rewritten += "I would appreciate your assistance in resolving this matter.";
    return rewritten;
  }

  getImprovements(original: string, rewritten: string): string[] {
    const improvements: string[] = [];
    if (rewritten.length < original.length) {
      improvements.push("Made more concise");
    }
    if (isAllCaps(original)) {
      improvements.push("Removed all-caps (less aggressive)");
    }
    const lower = original.toLowerCase();
    if (this.patterns.informalWords.some((word) => lower.includes(word))) {
      improvements.push("Removed informal language");
    }
    improvements.push("Added professional tone", "Structured with clear issue statement");
    return improvements;
  }
}
