import type { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { migrationSource } from './index';
import { createTestDatabase, seedProjectMember, seedProject, seedUser, seedTeam, seedTeamMember } from '../test-utils';

describe('ticketing schema migration', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('creates every table', async () => {
    for (const table of ['users', 'teams', 'projects', 'project_teams', 'user_teams', 'project_users', 'tickets', 'api_keys']) {
      expect(await db.schema.hasTable(table)).toBe(true);
    }
  });

  it('keeps team membership unique per user and team', async () => {
    const userId = await seedUser(db, 'Ada');
    const teamId = await seedTeam(db, 'Support');
    await seedTeamMember(db, teamId, userId, 'admin');

    await expect(seedTeamMember(db, teamId, userId, 'member')).rejects.toThrow();
    const rows = await db('user_teams').where({ team_id: teamId, user_id: userId });
    expect(rows).toHaveLength(1);
  });

  it('keeps project membership unique per user and project', async () => {
    const userId = await seedUser(db, 'Ada');
    const projectId = await seedProject(db, 'Portal');
    await seedProjectMember(db, projectId, userId, 'member');

    await expect(seedProjectMember(db, projectId, userId, 'admin')).rejects.toThrow();
  });

  it('rolls back cleanly', async () => {
    await db.migrate.rollback({ migrationSource }, true);
    expect(await db.schema.hasTable('tickets')).toBe(false);
  });
});
