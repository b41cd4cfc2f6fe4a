import 'dotenv/config';

import path from 'node:path';

import {
  DEFAULT_RATE_LIMITS,
  logger,
  type Logger,
  type MailProviderName,
  type MailSettings,
  type RateLimits,
  type UserCredential,
} from '../packages/backend/src/index.js';

export interface AppConfig {
  port: number;
  rulesPath: string;
  modelPath: string;
  trainingCsvPath: string;
  patternsPath: string;
  dataFilePath: string;
  uploadDir: string;
  supabaseUrl?: string;
  supabaseKey?: string;
  mail: MailSettings;
  users: UserCredential[];
  rateLimits: RateLimits;
  trustProxy: boolean;
}

function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  return ['1', 'true', 'yes', 'on'].includes(raw.toLowerCase());
}

function getIntEnv(key: string, defaultValue: number): number {
  const raw = process.env[key];
  if (!raw) return defaultValue;
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    throw new Error(`Invalid integer env value for ${key}: ${raw}`);
  }
  return value;
}

function getPathEnv(key: string, defaultValue: string): string {
  return path.resolve(process.cwd(), process.env[key]?.trim() || defaultValue);
}

function getMailProvider(log: Logger): MailProviderName {
  const raw = (process.env.MAIL_PROVIDER ?? 'smtp').trim().toLowerCase();
  if (raw === 'smtp' || raw === 'stub') return raw;
  log.warn(`Unknown MAIL_PROVIDER "${raw}", using smtp`);
  return 'smtp';
}

function required(key: string, log: Logger): string {
  const value = process.env[key];
  if (!value) {
    log.warn(`Missing required environment variable: ${key}`);
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value.trim();
}

function loadUsers(log: Logger): UserCredential[] {
  const users: UserCredential[] = [
    { username: process.env.ADMIN_USER?.trim() || 'admin', password: process.env.ADMIN_PASSWORD ?? '', role: 'admin' },
    { username: 'agent', password: process.env.AGENT_PASSWORD ?? '', role: 'agent' },
    { username: 'viewer', password: process.env.VIEWER_PASSWORD ?? '', role: 'viewer' },
  ];
  for (const user of users) {
    if (!user.password) {
      log.warn(`No password set for ${user.role} user; login disabled`, { username: user.username });
    }
  }
  return users;
}

export function loadConfig(log: Logger = logger): AppConfig {
  const supabaseUrl = process.env.SUPABASE_URL?.trim() || undefined;
  const smtpUser = process.env.SMTP_USER ?? '';

  return {
    port: getIntEnv('PORT', 8081),
    rulesPath: getPathEnv('RULES_PATH', 'policies/policy_rules_base.json'),
    modelPath: getPathEnv('MODEL_PATH', 'models/complaint_classifier.json'),
    trainingCsvPath: getPathEnv('TRAIN_CSV', 'data/training.csv'),
    patternsPath: getPathEnv('PATTERNS_PATH', 'data/intelligence-patterns.json'),
    dataFilePath: getPathEnv('DATA_FILE', 'data/complaints.json'),
    uploadDir: getPathEnv('UPLOAD_DIR', 'static/uploads'),
    supabaseUrl,
    supabaseKey: supabaseUrl ? required('SUPABASE_KEY', log) : undefined,
    mail: {
      provider: getMailProvider(log),
      smtp: {
        host: process.env.SMTP_HOST?.trim() || 'localhost',
        port: getIntEnv('SMTP_PORT', 465),
        user: smtpUser,
        password: process.env.SMTP_PASS ?? '',
        timeoutMs: getIntEnv('SMTP_TIMEOUT', 30) * 1000,
      },
      fromEmail: process.env.SMTP_FROM?.trim() || smtpUser,
      fromName: process.env.SMTP_FROM_NAME?.trim() || 'Complaint Desk Support',
    },
    users: loadUsers(log),
    rateLimits: {
      decide: getIntEnv('RATE_LIMIT_DECIDE', DEFAULT_RATE_LIMITS.decide),
      rewrite: getIntEnv('RATE_LIMIT_REWRITE', DEFAULT_RATE_LIMITS.rewrite),
      upload: getIntEnv('RATE_LIMIT_UPLOAD', DEFAULT_RATE_LIMITS.upload),
    },
    trustProxy: getBooleanEnv('TRUST_PROXY', false),
  };
}
