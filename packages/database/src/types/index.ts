import type { Knex } from 'knex';

/**
 * Either a connection or an open transaction; models accept both.
 */
export type KnexOrTrx = Knex | Knex.Transaction;

/**
 * pg hands timestamps back as Date, SQLite as the stored string.
 */
export type DbTimestamp = string | Date;

/**
 * SQLite stores booleans as 0/1.
 */
export type DbBoolean = boolean | number;

/**
 * Pool configuration with additional lifecycle hooks
 */
export interface PoolConfig extends Knex.PoolConfig {
  afterCreate?: (
    connection: unknown,
    done: (err: Error | null, connection: unknown) => void
  ) => void;
}
