/**
 * Runs the schema migrations against the configured database.
 *
 *   npm run migrate            # latest
 *   npm run migrate -- down    # roll back the last batch
 */

import dotenv from 'dotenv';
import { loadConfig, logger, setLogLevel } from '@ticketdesk/core';
import { destroyConnection, getConnection, migrationSource } from '@ticketdesk/database';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const knex = getConnection(config.database);

  try {
    if (process.argv[2] === 'down') {
      const [batch, names] = await knex.migrate.rollback({ migrationSource });
      logger.info(`Rolled back batch ${batch}`, { migrations: names });
    } else {
      const [batch, names] = await knex.migrate.latest({ migrationSource });
      logger.info(names.length > 0 ? `Ran batch ${batch}` : 'Already up to date', { migrations: names });
    }
  } finally {
    await destroyConnection();
  }
}

main().catch((error: unknown) => {
  logger.error('Migration failed', { error: error instanceof Error ? error.stack ?? error.message : String(error) });
  process.exit(1);
});
