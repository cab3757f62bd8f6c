/**
 * Main server entry point
 */

import { createApp } from './app';
import { loadConfigFromEnvironment } from './config';
import { logger } from './utils/logger';

const config = loadConfigFromEnvironment();
if (config.logLevel) {
  logger.setLevel(config.logLevel);
}

const app = createApp(config);

app.listen(config.port, () => {
  logger.info(`Server started on port ${config.port}`, {
    port: config.port,
    nodeEnv: config.nodeEnv,
    corsOrigins: config.corsOrigins.length > 0 ? config.corsOrigins : '*',
    maxSearchSteps: config.solver.maxSearchSteps ?? 'unlimited',
  });

  if (!config.airtable) {
    logger.warn('AIRTABLE_TOKEN or AIRTABLE_BASE_ID not set, course catalog disabled; requests must send courses inline');
  }
});
