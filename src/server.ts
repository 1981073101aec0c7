// Server entry point
// Bootstrap and start the HTTP server

import 'dotenv/config';
import { createApp } from '@/api/app.js';
import { ScoringService } from '@/application/scoring/ScoringService.js';
import { ScoresheetStore } from '@/application/scoring/ScoresheetStore.js';
import { createRuleCatalog } from '@/domain/scoring/catalog.js';
import { buildAppConfig, toRuleOptions, validateConfig } from '@/utils/config.js';
import { serverLogger as logger, setLogLevel } from '@/utils/logger.js';

function main(): void {
  // Build configuration from environment
  const config = buildAppConfig(process.env);

  // Validate configuration
  const errors = validateConfig(config, process.env);
  if (errors.length > 0) {
    console.error('Configuration errors:');
    errors.forEach((err) => console.error(`  - ${err}`));
    process.exit(1);
  }

  setLogLevel(config.server.logLevel);

  // One catalog for the whole process, shared by every scoresheet
  const catalog = createRuleCatalog(toRuleOptions(config.rules));
  const scoringService = new ScoringService(catalog);
  const store = new ScoresheetStore();

  logger.info('Scoring server starting', {
    nodeEnv: config.server.nodeEnv,
    port: config.server.port,
    jokerRule: catalog.options.jokerRule,
    fullHouseAcceptsYahtzee: catalog.options.fullHouseAcceptsYahtzee,
    yahtzeeBonus: catalog.bonus.points,
  });

  const app = createApp({
    corsOrigins: config.server.corsOrigins,
    trustProxy: config.server.nodeEnv === 'production',
    logFormat: config.server.nodeEnv === 'production' ? 'combined' : 'dev',
    scoringService,
    store,
  });

  // Start server
  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info(`Server running at http://${config.server.host}:${config.server.port}`);
  });

  // Graceful shutdown
  const shutdown = (signal: string) => {
    logger.info(`${signal} received. Starting graceful shutdown...`);
    server.close(() => {
      logger.info('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      logger.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.on('uncaughtException', (err) => {
    logger.error('Uncaught exception', { message: err.message, stack: err.stack });
    shutdown('uncaughtException');
  });
}

main();
