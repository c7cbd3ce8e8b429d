/**
 * Process-wide knex connection management.
 *
 * One pool per process. Every service operation opens its own transaction
 * on it through `withTransaction`.
 */

import Knex, { type Knex as KnexType } from 'knex';
import { logger, type DatabaseSettings } from '@ticketdesk/core';
import type { PoolConfig } from './types';

let sharedKnexInstance: KnexType | null = null;

export function buildKnexConfig(settings: DatabaseSettings): KnexType.Config {
  const pool: PoolConfig = {
    min: 0,
    max: settings.poolMax,
    idleTimeoutMillis: 30000,
    reapIntervalMillis: 1000,
    createTimeoutMillis: 30000,
    destroyTimeoutMillis: 5000,
    afterCreate: (conn, done) => {
      if (conn && typeof conn === 'object' && 'on' in conn && typeof conn.on === 'function') {
        conn.on('error', (err: Error) => {
          logger.error('[database] connection error', { error: err.message });
        });
      }
      done(null, conn);
    },
  };

  return {
    client: 'pg',
    connection: settings.connectionString ?? {
      host: settings.host,
      port: settings.port,
      database: settings.database,
      user: settings.user,
      password: settings.password,
    },
    pool,
  };
}

/**
 * Returns the shared connection, creating it on first use.
 */
export function getConnection(settings: DatabaseSettings): KnexType {
  if (!sharedKnexInstance) {
    sharedKnexInstance = Knex(buildKnexConfig(settings));
    logger.info('[database] connection pool created', {
      host: settings.connectionString ? 'DATABASE_URL' : settings.host,
      database: settings.database,
      poolMax: settings.poolMax,
    });
  }
  return sharedKnexInstance;
}

/**
 * Execute a callback within a database transaction.
 */
export async function withTransaction<T>(
  knex: KnexType,
  callback: (trx: KnexType.Transaction) => Promise<T>
): Promise<T> {
  return knex.transaction(callback);
}

/**
 * Destroy the shared connection pool. Used on graceful shutdown.
 */
export async function destroyConnection(): Promise<void> {
  if (sharedKnexInstance) {
    await sharedKnexInstance.destroy();
    sharedKnexInstance = null;
  }
}
