/**
 * Base Service Class
 * Holds the connection and runs each operation in its own transaction.
 */

import type { Knex } from 'knex';
import { withTransaction } from '../connection';

export abstract class BaseService {
  protected readonly knex: Knex;

  constructor(knex: Knex) {
    this.knex = knex;
  }

  /**
   * Everything an operation reads and writes goes through `trx`, so the
   * operation either commits as a whole or not at all.
   */
  protected async transaction<T>(callback: (trx: Knex.Transaction) => Promise<T>): Promise<T> {
    return withTransaction(this.knex, callback);
  }
}
