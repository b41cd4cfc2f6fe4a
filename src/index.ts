import { createApp, logger } from '../packages/backend/src/index.js';
import { loadConfig } from './config.js';
import { createContext } from './lib/context.js';

async function bootstrap(): Promise<void> {
  const config = loadConfig(logger);
  const context = await createContext(config, logger);

  logger.info('Starting complaint desk', {
    usingSupabase: Boolean(config.supabaseUrl),
    modelLoaded: context.engine.hasModel(),
    rules: context.engine.ruleCount,
    mailConfigured: context.mailer.isConfigured,
  });

  const app = createApp({
    decisionService: context.decisionService,
    engine: context.engine,
    intelligence: context.intelligence,
    auditLogService: context.auditLogService,
    history: context.history,
    mailer: context.mailer,
    sessions: context.sessions,
    retrain: context.retrain,
    uploadDir: config.uploadDir,
    log: logger,
    rateLimits: config.rateLimits,
    trustProxy: config.trustProxy,
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', { reason: reason instanceof Error ? reason.message : String(reason) });
  });

  const server = app.listen(config.port, () => {
    logger.info('Listening', { port: config.port });
  });

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

bootstrap().catch((error) => {
  logger.error('Failed to bootstrap complaint desk', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
