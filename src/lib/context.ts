import {
  AuditLogService,
  ComplaintIntelligence,
  CustomerHistoryService,
  DecisionService,
  FileStore,
  FraudDetector,
  HybridEngine,
  MailerService,
  PolicyEngine,
  SessionService,
  SupabaseStore,
  getEmailProvider,
  loadClassifier,
  loadIntelligencePatterns,
  loadPolicyRules,
  retrainModel,
  type ComplaintStore,
  type Logger,
  type RetrainSummary,
} from '../../packages/backend/src/index.js';
import type { AppConfig } from '../config.js';

export interface AppContext {
  config: AppConfig;
  store: ComplaintStore;
  logger: Logger;
  engine: HybridEngine;
  intelligence: ComplaintIntelligence;
  auditLogService: AuditLogService;
  history: CustomerHistoryService;
  mailer: MailerService;
  sessions: SessionService;
  decisionService: DecisionService;
  retrain: () => Promise<RetrainSummary>;
}

export async function createContext(config: AppConfig, logger: Logger): Promise<AppContext> {
  const store: ComplaintStore = config.supabaseUrl && config.supabaseKey
    ? new SupabaseStore({ url: config.supabaseUrl, key: config.supabaseKey })
    : new FileStore(config.dataFilePath);

  const [rules, classifier, patterns] = await Promise.all([
    loadPolicyRules(config.rulesPath, logger),
    loadClassifier(config.modelPath, logger),
    loadIntelligencePatterns(config.patternsPath),
  ]);

  const engine = new HybridEngine(new PolicyEngine(rules, logger), classifier, logger);
  const intelligence = new ComplaintIntelligence(patterns);
  const auditLogService = new AuditLogService(store, logger);
  const history = new CustomerHistoryService(store, logger);
  const mailer = new MailerService({ provider: getEmailProvider(config.mail, logger), settings: config.mail, log: logger });

  const decisionService = new DecisionService({
    engine,
    intelligence,
    fraud: new FraudDetector(store, { log: logger }),
    history,
    audit: auditLogService,
    mailer,
    log: logger,
  });

  return {
    config,
    store,
    logger,
    engine,
    intelligence,
    auditLogService,
    history,
    mailer,
    sessions: new SessionService(config.users),
    decisionService,
    retrain: () =>
      retrainModel({
        auditLogService,
        trainingCsvPath: config.trainingCsvPath,
        modelPath: config.modelPath,
        engine,
        log: logger,
      }),
  };
}
