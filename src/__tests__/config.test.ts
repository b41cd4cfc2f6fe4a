import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import { FileStore, Logger } from '../../packages/backend/src/index.js';
import { loadConfig } from '../config.js';
import { createContext } from '../lib/context.js';

const ENV_KEYS = [
  'PORT',
  'RULES_PATH',
  'MODEL_PATH',
  'TRAIN_CSV',
  'PATTERNS_PATH',
  'DATA_FILE',
  'UPLOAD_DIR',
  'SUPABASE_URL',
  'SUPABASE_KEY',
  'MAIL_PROVIDER',
  'SMTP_HOST',
  'SMTP_PORT',
  'SMTP_USER',
  'SMTP_PASS',
  'SMTP_FROM',
  'SMTP_FROM_NAME',
  'SMTP_TIMEOUT',
  'ADMIN_USER',
  'ADMIN_PASSWORD',
  'AGENT_PASSWORD',
  'VIEWER_PASSWORD',
  'RATE_LIMIT_DECIDE',
  'RATE_LIMIT_REWRITE',
  'RATE_LIMIT_UPLOAD',
  'TRUST_PROXY',
];

const repoRoot = path.resolve(__dirname, '../..');
const log = new Logger({ level: 'error', environment: 'test' });

describe('loadConfig', () => {
  const saved: Record<string, string | undefined> = {};

  beforeEach(() => {
    for (const key of ENV_KEYS) {
      saved[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    for (const key of ENV_KEYS) {
      const value = saved[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  it('uses defaults without environment overrides', () => {
    const config = loadConfig(log);

    expect(config.port).toBe(8081);
    expect(config.rulesPath).toBe(path.resolve(process.cwd(), 'policies/policy_rules_base.json'));
    expect(config.supabaseUrl).toBeUndefined();
    expect(config.mail).toEqual({
      provider: 'smtp',
      smtp: { host: 'localhost', port: 465, user: '', password: '', timeoutMs: 30_000 },
      fromEmail: '',
      fromName: 'Complaint Desk Support',
    });
    expect(config.users.map((user) => [user.username, user.role, user.password])).toEqual([
      ['admin', 'admin', ''],
      ['agent', 'agent', ''],
      ['viewer', 'viewer', ''],
    ]);
    expect(config.rateLimits).toEqual({ decide: 60, rewrite: 30, upload: 20 });
    expect(config.trustProxy).toBe(false);
  });

  it('reads overrides from the environment', () => {
    process.env.PORT = '9090';
    process.env.MAIL_PROVIDER = 'STUB';
    process.env.SMTP_USER = 'desk@example.com';
    process.env.SMTP_TIMEOUT = '5';
    process.env.ADMIN_USER = 'root';
    process.env.ADMIN_PASSWORD = 'test-secret';
    process.env.RATE_LIMIT_REWRITE = '3';
    process.env.TRUST_PROXY = 'yes';

    const config = loadConfig(log);

    expect(config.port).toBe(9090);
    expect(config.mail.provider).toBe('stub');
    expect(config.mail.fromEmail).toBe('desk@example.com');
    expect(config.mail.smtp.timeoutMs).toBe(5000);
    expect(config.users[0]).toEqual({ username: 'root', password: 'test-secret', role: 'admin' });
    expect(config.rateLimits.rewrite).toBe(3);
    expect(config.trustProxy).toBe(true);
  });

  it('requires a key when Supabase is configured', () => {
    process.env.SUPABASE_URL = 'https://example.supabase.co';
    expect(() => loadConfig(log)).toThrow('Missing required environment variable: SUPABASE_KEY');
  });

  it('rejects a malformed port', () => {
    process.env.PORT = 'eighty';
    expect(() => loadConfig(log)).toThrow('Invalid integer env value for PORT: eighty');
  });
});

describe('createContext', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'desk-context-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('wires a file-backed desk from configuration', async () => {
    const base = loadConfig(log);
    const config = {
      ...base,
      rulesPath: path.join(repoRoot, 'policies/policy_rules_base.json'),
      patternsPath: path.join(repoRoot, 'data/intelligence-patterns.json'),
      modelPath: path.join(dir, 'model.json'),
      dataFilePath: path.join(dir, 'complaints.json'),
      uploadDir: path.join(dir, 'uploads'),
      supabaseUrl: undefined,
      supabaseKey: undefined,
    };

    const context = await createContext(config, log);
    expect(context.store).toBeInstanceOf(FileStore);
    expect(context.engine.ruleCount).toBe(6);
    expect(context.engine.hasModel()).toBe(false);
    expect(context.mailer.isConfigured).toBe(false);

    const doc = await context.decisionService.decide({
      order_id: 'CTX-1',
      complaint_text: 'Order never arrived',
      refund_history_30d: 1,
    });
    expect(doc.rule_id).toBe('missing_no_photo_refund');

    const persisted = await new FileStore(config.dataFilePath).getComplaint(doc.complaint_id);
    expect(persisted?.orderId).toBe('CTX-1');
  });
});
