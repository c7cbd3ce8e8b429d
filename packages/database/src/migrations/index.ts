import type { Knex } from 'knex';
import * as createTicketingSchema from './20261019090000_create_ticketing_schema';

const migrations: Record<string, Knex.Migration> = {
  '20261019090000_create_ticketing_schema': createTicketingSchema,
};

/**
 * Migrations are registered in code so the same list runs under tsx, in
 * tests and against any dialect, without knex scanning a directory.
 */
export const migrationSource: Knex.MigrationSource<string> = {
  async getMigrations() {
    return Object.keys(migrations).sort();
  },
  getMigrationName(name) {
    return name;
  },
  async getMigration(name) {
    const migration = migrations[name];
    if (!migration) {
      throw new Error(`Unknown migration ${name}`);
    }
    return migration;
  },
};

export async function migrateLatest(knex: Knex): Promise<string[]> {
  const [, applied] = await knex.migrate.latest({ migrationSource });
  return applied;
}
