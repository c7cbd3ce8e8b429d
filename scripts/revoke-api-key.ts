/**
 * Deactivates an API key.
 *
 *   npm run revoke-api-key -- <apiKeyId>
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { loadConfig, logger, setLogLevel } from '@ticketdesk/core';
import { destroyConnection, getConnection } from '@ticketdesk/database';
import { revokeApiKey } from '@ticketdesk/users';

dotenv.config();

const argsSchema = z.tuple([z.coerce.number().int().positive()]);

async function main(): Promise<void> {
  const parsed = argsSchema.safeParse(process.argv.slice(2));
  if (!parsed.success) {
    throw new Error('Usage: revoke-api-key <apiKeyId>');
  }
  const [apiKeyId] = parsed.data;

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const knex = getConnection(config.database);

  try {
    if (!(await revokeApiKey(knex, apiKeyId))) {
      throw new Error(`No active API key with id ${apiKeyId}`);
    }
    logger.info(`API key ${apiKeyId} revoked`);
  } finally {
    await destroyConnection();
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to revoke API key', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
