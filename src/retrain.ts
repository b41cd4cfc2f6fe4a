import { logger } from '../packages/backend/src/index.js';
import { loadConfig } from './config.js';
import { createContext } from './lib/context.js';

async function main(): Promise<void> {
  const context = await createContext(loadConfig(logger), logger);
  const summary = await context.retrain();
  logger.info('Retrain complete', { ...summary });
}

main().catch((error) => {
  logger.error('Retrain failed', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exit(1);
});
