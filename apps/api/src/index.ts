/**
 * Clinigraph API Server
 *
 * Fastify HTTP surface for question answering and graph health.
 */

import {
  ConfigurationError,
  createGraphStore,
  createLogger,
  loadApiConfig,
  logSecretsStatus,
} from '@clinigraph/core';
import { createOpenAIQueryTranslator } from '@clinigraph/integrations';

import { buildApp } from './app.js';

const logger = createLogger({ name: 'api' });

async function main(): Promise<void> {
  const config = loadApiConfig();
  logSecretsStatus(logger);

  const translator = createOpenAIQueryTranslator(config.translator, logger);
  if (!translator) {
    logger.warn('OPENAI_API_KEY not configured, translated questions are disabled');
  }

  const app = await buildApp({
    openGraphStore: () => createGraphStore(config.graph),
    translator,
    logLevel: config.logLevel,
    isProduction: config.env === 'production',
    corsOrigin: config.corsOrigin,
    logger,
  });

  let isShuttingDown = false;
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  for (const signal of signals) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger.info({ signal }, 'Shutdown already in progress, ignoring duplicate signal');
        return;
      }
      isShuttingDown = true;
      logger.info({ signal }, 'Received shutdown signal');
      app
        .close()
        .then(() => {
          logger.info('Server closed gracefully');
          process.exit(0);
        })
        .catch((err: unknown) => {
          logger.error({ err }, 'Error during shutdown');
          process.exit(1);
        });
    });
  }

  const address = await app.listen({
    port: config.server.port,
    host: config.server.host,
  });
  logger.info({ address, env: config.env }, 'Clinigraph API server started');
}

main().catch((error: unknown) => {
  if (error instanceof ConfigurationError) {
    logger.fatal({ missingKeys: error.missingKeys }, error.message);
  } else {
    logger.fatal({ err: error }, 'Fatal error during startup');
  }
  process.exit(1);
});
