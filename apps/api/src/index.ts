import { serve } from '@hono/node-server';
import { authEvents } from '@payflow/auth';
import { domainEvents } from '@payflow/core';
import { createDatabase } from '@payflow/database';
import { logger } from '@payflow/observability';
import { createApp } from './app.js';
import { ConfigError, loadApiConfig, type ApiConfig } from './config.js';
import { initializeAuditLogging } from './lib/audit-logger.js';
import { createDrizzleRepositories, createServices } from './services/index.js';

function loadConfigOrExit(): ApiConfig {
  try {
    return loadApiConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ problems: error.problems }, error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = loadConfigOrExit();
logger.level = config.logLevel;

if (!config.databaseUrl) {
  logger.fatal('DATABASE_URL is required to start the server');
  process.exit(1);
}

const database = createDatabase({ connectionString: config.databaseUrl });
const services = createServices(createDrizzleRepositories(database.db), {
  authEvents,
  domainEvents,
});

initializeAuditLogging({ authEvents, domainEvents });
services.dispatcher.register({ authEvents, domainEvents });

const app = createApp(services, config);

logger.info({ port: config.port }, 'Starting server');

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info({ port: info.port }, 'Server running');
});

function shutdown(signal: NodeJS.Signals) {
  logger.info({ signal }, 'Shutting down');
  server.close(() => {
    database.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err }, 'Failed to close database pool');
        process.exit(1);
      }
    );
  });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
