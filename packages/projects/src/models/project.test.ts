import type { Knex } from 'knex';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  createTestDatabase,
  seedProject,
  seedProjectMember,
  seedTeam,
  seedUser,
} from '@ticketdesk/database/test-utils';
import ProjectModel, { toContainsPattern } from './project';

describe('ProjectModel', () => {
  let db: Knex;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('escapes LIKE wildcards in name fragments', () => {
    expect(toContainsPattern('An_na%')).toBe('%an\\_na\\%%');
  });

  it('matches member names case-insensitively by substring, lowest id first', async () => {
    const projectId = await seedProject(db, 'Portal');
    const outsider = await seedUser(db, 'Annabel Outside');
    const anna = await seedUser(db, 'Anna Karenina');
    const joanna = await seedUser(db, 'Joanna Smith');
    await seedProjectMember(db, projectId, joanna);
    await seedProjectMember(db, projectId, anna);

    expect(outsider).toBeLessThan(anna);
    expect(await ProjectModel.findMemberByName(db, projectId, 'ANNA')).toEqual({ id: anna, name: 'Anna Karenina' });
    expect(await ProjectModel.findMemberByName(db, projectId, 'smith')).toEqual({ id: joanna, name: 'Joanna Smith' });
    expect(await ProjectModel.findMemberByName(db, projectId, 'annabel')).toBeNull();
  });

  it('does not treat underscores as wildcards', async () => {
    const projectId = await seedProject(db, 'Portal');
    const userId = await seedUser(db, 'Bob');
    await seedProjectMember(db, projectId, userId);

    expect(await ProjectModel.findMemberByName(db, projectId, '_o_')).toBeNull();
  });

  it('lists memberships only in projects associated with the team', async () => {
    const teamId = await seedTeam(db, 'Support');
    const otherTeamId = await seedTeam(db, 'Sales');
    const inTeam = await seedProject(db, 'Portal', { teamIds: [teamId] });
    const elsewhere = await seedProject(db, 'CRM', { teamIds: [otherTeamId] });
    const userId = await seedUser(db, 'Ada');
    await seedProjectMember(db, inTeam, userId, 'worker');
    await seedProjectMember(db, elsewhere, userId, 'admin');

    expect(await ProjectModel.listMembershipsForUserInTeam(db, teamId, userId)).toEqual([
      { project_id: inTeam, project_name: 'Portal', role: 'worker' },
    ]);
  });
});
