import dotenv from 'dotenv';
import { loadConfig, logger, setLogLevel } from '@ticketdesk/core';
import { destroyConnection, getConnection } from '@ticketdesk/database';
import { createApp } from '@ticketdesk/product-api';

dotenv.config();

async function createServer(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const knex = getConnection(config.database);
  const app = createApp({ knex, config });

  const server = app.listen(config.port, config.host, () => {
    logger.info(`> Ready on http://${config.host}:${config.port}`);
    logger.info(`> Environment: ${config.env}`);
  });

  server.on('error', (err) => {
    logger.error('Express server error', { error: err.message });
  });

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info(`Received ${signal}, shutting down`);
    server.close(() => {
      destroyConnection()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Failed to close database connection', {
            error: error instanceof Error ? error.message : String(error),
          });
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

createServer().catch((error: unknown) => {
  logger.error('Error starting server', { error: error instanceof Error ? error.stack ?? error.message : String(error) });
  process.exit(1);
});
