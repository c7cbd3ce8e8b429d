/**
 * In-memory SQLite database for tests, migrated with the production
 * migrations. Each call returns an isolated database; destroy it in afterEach.
 */

import knex, { type Knex } from 'knex';
import type { ProjectRole, TeamRole } from '@ticketdesk/types';
import { migrateLatest } from '../migrations';
import { insertReturningId } from '../lib/rows';

export async function createTestDatabase(): Promise<Knex> {
  const db = knex({
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
  });
  await migrateLatest(db);
  return db;
}

let emailSequence = 0;

export async function seedUser(
  db: Knex,
  name: string,
  options: { isAvailable?: boolean; email?: string } = {}
): Promise<number> {
  emailSequence += 1;
  return insertReturningId(db, 'users', {
    name,
    email: options.email ?? `user${emailSequence}@example.test`,
    is_available: options.isAvailable ?? true,
    created_at: new Date().toISOString(),
  });
}

export async function seedTeam(db: Knex, name: string): Promise<number> {
  return insertReturningId(db, 'teams', { name, created_at: new Date().toISOString() });
}

export async function seedProject(
  db: Knex,
  name: string,
  options: { workerTeamId?: number | null; teamIds?: number[] } = {}
): Promise<number> {
  const projectId = await insertReturningId(db, 'projects', {
    name,
    worker_team_id: options.workerTeamId ?? null,
    created_at: new Date().toISOString(),
  });
  for (const teamId of options.teamIds ?? []) {
    await db('project_teams').insert({ project_id: projectId, team_id: teamId });
  }
  return projectId;
}

export async function seedTeamMember(
  db: Knex,
  teamId: number,
  userId: number,
  role: TeamRole = 'member',
  joinedAt: string = new Date().toISOString()
): Promise<void> {
  await db('user_teams').insert({ team_id: teamId, user_id: userId, role, joined_at: joinedAt });
}

export async function seedProjectMember(
  db: Knex,
  projectId: number,
  userId: number,
  role: ProjectRole = 'member'
): Promise<void> {
  await db('project_users').insert({ project_id: projectId, user_id: userId, role });
}
