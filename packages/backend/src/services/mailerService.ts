import nodemailer, { type Transporter } from "nodemailer";
import type SMTPTransport from "nodemailer/lib/smtp-transport";

import type { Decision, Severity } from "../models/complaint.js";
import { describeError, logger as rootLogger, type Logger } from "../lib/logger.js";
import { titleCase } from "../lib/text.js";

export type SendEmailArgs = {
  to: string;
  from: string;
  subject: string;
  text: string;
  html: string;
};

export type SendEmailResult = {
  provider: string;
  providerMessageId: string | null;
};

export interface EmailProvider {
  readonly name: string;
  send(args: SendEmailArgs): Promise<SendEmailResult>;
  /** Resolves when the provider can accept mail, rejects with the reason otherwise. */
  verify(): Promise<void>;
}

export interface SmtpSettings {
  host: string;
  port: number;
  user: string;
  password: string;
  timeoutMs: number;
}

export type MailProviderName = "smtp" | "stub";

export interface MailSettings {
  provider: MailProviderName;
  smtp: SmtpSettings;
  fromEmail: string;
  fromName: string;
}

export class SmtpEmailProvider implements EmailProvider {
  readonly name = "smtp";

  private readonly transporter: Transporter<SMTPTransport.SentMessageInfo>;

  constructor(settings: SmtpSettings) {
    // 465 is implicit TLS; other ports upgrade with STARTTLS.
    this.transporter = nodemailer.createTransport({
      host: settings.host,
      port: settings.port,
      secure: settings.port === 465,
      requireTLS: settings.port !== 465,
      auth: { user: settings.user, pass: settings.password },
      connectionTimeout: settings.timeoutMs,
      greetingTimeout: settings.timeoutMs,
      socketTimeout: settings.timeoutMs,
    });
  }

  async send(args: SendEmailArgs): Promise<SendEmailResult> {
    const info = await this.transporter.sendMail({
      from: args.from,
      to: args.to,
      subject: args.subject,
      text: args.text,
      html: args.html,
    });
    return { provider: this.name, providerMessageId: info.messageId || null };
  }

  async verify(): Promise<void> {
    await this.transporter.verify();
  }
}

/** Logs instead of sending, and keeps what it was given. */
export class StubEmailProvider implements EmailProvider {
  readonly name = "stub";

  readonly sent: SendEmailArgs[] = [];

  constructor(private readonly log: Logger = rootLogger) {}

  async send(args: SendEmailArgs): Promise<SendEmailResult> {
    this.sent.push(args);
    this.log.info("[EMAIL:STUB]", { to: args.to, from: args.from, subject: args.subject, preview: args.text.slice(0, 220) });
    return { provider: this.name, providerMessageId: null };
  }

  async verify(): Promise<void> {
    return undefined;
  }
}

/** SMTP needs credentials; without them there is no provider and mail is skipped. */
export function getEmailProvider(settings: MailSettings, log: Logger = rootLogger): EmailProvider | null {
  if (settings.provider === "stub") {
    return new StubEmailProvider(log);
  }
  if (!settings.smtp.user || !settings.smtp.password) {
    return null;
  }
  return new SmtpEmailProvider(settings.smtp);
}

export interface DecisionEmailDetails {
  orderId: string;
  decision: Decision;
  confidence: number;
  reason: string;
  category: string;
  severity: Severity;
}

export interface RenderedEmail {
  subject: string;
  text: string;
  html: string;
}

interface DecisionStyle {
  background: string;
  border: string;
  color: string;
  title: string;
  message: string;
}

const DECISION_STYLES: Record<Decision, DecisionStyle> = {
  refund: {
    background: "#dcfce7",
    border: "#22c55e",
    color: "#166534",
    title: "Refund Approved",
    message: "Your refund request has been approved.",
  },
  deny: {
    background: "#fee2e2",
    border: "#ef4444",
    color: "#991b1b",
    title: "Request Declined",
    message: "We are unable to process a refund for this order.",
  },
  escalate: {
    background: "#fef3c7",
    border: "#f59e0b",
    color: "#92400e",
    title: "Under Review",
    message: "Your case has been escalated for manual review.",
  },
};

const SEVERITY_COLORS: Record<Severity, string> = {
  critical: "#dc2626",
  high: "#ea580c",
  medium: "#ca8a04",
  low: "#16a34a",
};

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

export function displayCategory(category: string): string {
  return category ? titleCase(category) : "General";
}

const PROCESSED_FORMAT = new Intl.DateTimeFormat("en-US", { dateStyle: "long", timeStyle: "short", timeZone: "UTC" });

export function renderDecisionEmail(
  details: DecisionEmailDetails,
  brand: string,
  now: Date = new Date()
): RenderedEmail {
  const style = DECISION_STYLES[details.decision];
  const label = details.decision.toUpperCase();
  const confidence = details.confidence ? `${Math.round(details.confidence * 100)}%` : "N/A";
  const processed = `${PROCESSED_FORMAT.format(now)} UTC`;
  const orderId = escapeHtml(details.orderId);
  const cell = "padding:12px 0;border-bottom:1px solid #f3f4f6";

  const html = `<!DOCTYPE html><html><head><meta charset="UTF-8"></head>
<body style="margin:0;padding:24px;font-family:-apple-system,sans-serif;background:#f3f4f6">
<table width="600" align="center" style="background:#fff;border-radius:16px">
<tr><td style="background:#111827;padding:32px;text-align:center">
<h1 style="margin:0;color:#fff">${escapeHtml(brand)}</h1>
<p style="margin:8px 0 0;color:#9ca3af">Complaint Resolution Center</p></td></tr>
<tr><td style="padding:32px">
<div style="background:${style.background};border:2px solid ${style.border};border-radius:16px;padding:24px;text-align:center">
<h2 style="margin:0;color:${style.color}">${style.title}</h2>
<p style="margin:12px 0 0;color:${style.color}">${style.message}</p></div></td></tr>
<tr><td style="padding:0 32px 24px"><table width="100%">
<tr><td style="${cell};color:#6b7280">Order ID</td><td style="${cell};font-weight:600">${orderId}</td></tr>
<tr><td style="${cell};color:#6b7280">Category</td><td style="${cell};font-weight:600">${escapeHtml(displayCategory(details.category))}</td></tr>
<tr><td style="${cell};color:#6b7280">Priority</td><td style="${cell}"><span style="background:${SEVERITY_COLORS[details.severity]};color:#fff;padding:4px 12px;border-radius:12px">${details.severity.toUpperCase()}</span></td></tr>
<tr><td style="${cell};color:#6b7280">Confidence</td><td style="${cell};font-weight:600">${confidence}</td></tr>
<tr><td style="padding:12px 0;color:#6b7280">Processed</td><td style="padding:12px 0">${processed}</td></tr></table></td></tr>
<tr><td style="padding:0 32px 32px"><div style="background:#f8fafc;border-left:4px solid ${style.border};padding:16px">
<h4 style="margin:0 0 8px">Reason</h4><p style="margin:0;color:#4b5563">${escapeHtml(details.reason)}</p></div></td></tr>
<tr><td style="background:#f9fafb;padding:24px 32px"><p style="margin:0;font-size:12px;color:#6b7280">Reference: ${orderId}</p></td></tr>
</table></body></html>`;

  return {
    subject: `${brand}: ${label} - Order ${details.orderId}`,
    text: `Decision: ${label}\nOrder: ${details.orderId}\nReason: ${details.reason}`,
    html,
  };
}

export interface SmtpTestResult {
  configured: boolean;
  provider: string | null;
  host: string;
  port: number;
  connection_ok: boolean;
  error: string | null;
}

export interface MailerOptions {
  provider: EmailProvider | null;
  settings: MailSettings;
  log?: Logger;
}

export class MailerService {
  private readonly provider: EmailProvider | null;

  private readonly settings: MailSettings;

  private readonly log: Logger;

  constructor(options: MailerOptions) {
    this.provider = options.provider;
    this.settings = options.settings;
    this.log = (options.log ?? rootLogger).child({ component: "mailer" });
  }

  get isConfigured(): boolean {
    return this.provider !== null;
  }

  get sender(): string {
    const address = this.settings.fromEmail || this.settings.smtp.user;
    return `${this.settings.fromName} <${address}>`;
  }

  /** Never throws; false means nothing was sent. */
  async sendDecisionEmail(to: string | null | undefined, details: DecisionEmailDetails): Promise<boolean> {
    if (!to) {
      return false;
    }
    if (!this.provider) {
      this.log.warn("SMTP not configured");
      return false;
    }
    try {
      const email = renderDecisionEmail(details, this.settings.fromName);
      await this.provider.send({ to, from: this.sender, ...email });
      this.log.info("Email sent", { to, orderId: details.orderId, provider: this.provider.name });
      return true;
    } catch (error) {
      this.log.error("Email error", { to, orderId: details.orderId, error: describeError(error) });
      return false;
    }
  }

  async testConnection(): Promise<SmtpTestResult> {
    const result: SmtpTestResult = {
      configured: this.provider !== null,
      provider: this.provider?.name ?? null,
      host: this.settings.smtp.host,
      port: this.settings.smtp.port,
      connection_ok: false,
      error: null,
    };
    if (!this.provider) {
      return { ...result, error: "SMTP not configured" };
    }
    try {
      await this.provider.verify();
      return { ...result, connection_ok: true };
    } catch (error) {
      return { ...result, error: describeError(error) };
    }
  }
}
