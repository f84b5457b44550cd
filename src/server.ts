/**
 * SMC Trade Analyst - Server entry point
 * Loads environment and engine configuration, wires the scorer and store,
 * and starts the HTTP API.
 */

import 'dotenv/config';

import { createApp, VERSION } from './app.js';
import { loadEngineConfig, ConfigError } from './config/engineConfig.js';
import { getEnabledInstruments } from './config/universe.js';
import { createEngineContext } from './engine/decisionEngine.js';
import { loadLogisticModel } from './engine/probabilityScorer.js';
import { initDb, closeDb, runMigrations } from './db/client.js';
import { InMemoryAnalysisStore, KyselyAnalysisStore } from './storage/analysisStore.js';
import { StaticNewsProvider, loadNewsCalendar } from './services/newsCalendar.js';
import type { AnalysisStore } from './types/collaborators.js';
import { EnvSchema } from './validation/schemas.js';
import { createLogger } from './services/logger.js';

const logger = createLogger('Server');

async function main(): Promise<void> {
  const env = EnvSchema.parse(process.env);

  const config = loadEngineConfig(env.ENGINE_CONFIG_PATH);
  const model = env.MODEL_PATH ? loadLogisticModel(env.MODEL_PATH) : null;
  const context = createEngineContext(config, { model });

  let store: AnalysisStore;
  if (env.DATABASE_URL) {
    const db = await initDb(env.DATABASE_URL);
    await runMigrations(db);
    store = new KyselyAnalysisStore(db);
  } else {
    logger.warn('DATABASE_URL not set - using in-memory store');
    store = new InMemoryAnalysisStore();
  }

  const news = env.NEWS_CALENDAR_PATH
    ? new StaticNewsProvider(loadNewsCalendar(env.NEWS_CALENDAR_PATH), {
        currency: config.news.currency,
        impact: config.news.impact,
      })
    : undefined;

  const app = createApp({ context, store, news });

  const server = app.listen(env.PORT, () => {
    logger.info(`SMC Trade Analyst v${VERSION}`);
    logger.info(`Server running on port ${env.PORT}`);
    logger.info(`Scoring: ${context.scorer.source}`);
    logger.info(`Instruments: ${getEnabledInstruments(config).map(i => i.displayName).join(', ') || 'none configured'}`);
  });

  const shutdown = (): void => {
    logger.info('Shutting down...');
    server.close(() => {
      closeDb()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown', { error });
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error('Fatal startup error', { error });
  }
  process.exit(1);
});
