import crypto from 'crypto';
import type { Knex } from 'knex';
import type { IUser } from '@ticketdesk/types';
import ApiKeyModel from '../models/apiKey';
import UserModel from '../models/user';

/**
 * Generate a new API key
 * @returns A cryptographically secure random string
 */
export function generateApiKey(): string {
  return crypto.randomBytes(32).toString('hex');
}

/**
 * Keys are stored as SHA-256 hex digests; the plaintext is shown once at issue time.
 */
export function hashApiKey(apiKey: string): string {
  return crypto.createHash('sha256').update(apiKey).digest('hex');
}

export async function issueApiKey(
  knex: Knex,
  userId: number,
  description: string | null = null
): Promise<string> {
  const apiKey = generateApiKey();
  await ApiKeyModel.create(knex, userId, hashApiKey(apiKey), description);
  return apiKey;
}

/**
 * Resolves the user an API key belongs to, stamping its last use.
 * Returns null for unknown or deactivated keys.
 */
export async function authenticateApiKey(knex: Knex, apiKey: string): Promise<IUser | null> {
  return knex.transaction(async (trx) => {
    const keyRecord = await ApiKeyModel.findActiveByHash(trx, hashApiKey(apiKey));
    if (!keyRecord) {
      return null;
    }

    const user = await UserModel.get(trx, keyRecord.user_id);
    if (!user) {
      return null;
    }

    await ApiKeyModel.touch(trx, keyRecord.id);
    return user;
  });
}

/**
 * Deactivates a key by id. False when no active key has that id.
 */
export async function revokeApiKey(knex: Knex, apiKeyId: number): Promise<boolean> {
  const updated = await ApiKeyModel.deactivate(knex, apiKeyId);
  return updated > 0;
}
