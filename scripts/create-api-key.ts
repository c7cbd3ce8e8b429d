/**
 * Issues an API key for a user and prints it once.
 *
 *   npm run create-api-key -- <userId> [description]
 */

import dotenv from 'dotenv';
import { z } from 'zod';
import { loadConfig, logger, setLogLevel } from '@ticketdesk/core';
import { destroyConnection, getConnection } from '@ticketdesk/database';
import { UserModel, issueApiKey } from '@ticketdesk/users';

dotenv.config();

const argsSchema = z.tuple([z.coerce.number().int().positive(), z.string().optional()]);

async function main(): Promise<void> {
  const parsed = argsSchema.safeParse(process.argv.slice(2));
  if (!parsed.success) {
    throw new Error('Usage: create-api-key <userId> [description]');
  }
  const [userId, description] = parsed.data;

  const config = loadConfig();
  setLogLevel(config.logLevel);
  const knex = getConnection(config.database);

  try {
    const user = await UserModel.get(knex, userId);
    if (!user) {
      throw new Error(`User ${userId} not found`);
    }

    const apiKey = await issueApiKey(knex, user.id, description ?? null);
    logger.info(`API key issued for ${user.name}`, { userId: user.id });
    process.stdout.write(`${apiKey}\n`);
  } finally {
    await destroyConnection();
  }
}

main().catch((error: unknown) => {
  logger.error('Failed to create API key', { error: error instanceof Error ? error.message : String(error) });
  process.exit(1);
});
