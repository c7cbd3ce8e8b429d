/**
 * @ticketdesk/database
 *
 * Knex connection management, transactions, migrations and the helpers
 * models use to normalise rows across pg and SQLite.
 */

export {
  buildKnexConfig,
  getConnection,
  withTransaction,
  destroyConnection,
} from './connection';

export { BaseService } from './lib/baseService';

export { migrationSource, migrateLatest } from './migrations';

export {
  nowIso,
  toIsoString,
  toNullableIsoString,
  toBoolean,
  insertReturningId,
} from './lib/rows';

export type { KnexOrTrx, DbBoolean, DbTimestamp, PoolConfig } from './types';

export type { Knex } from 'knex';
