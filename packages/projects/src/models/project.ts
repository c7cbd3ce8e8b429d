/**
 * @ticketdesk/projects - Project Model
 *
 * Data access for projects and their role-tagged memberships.
 */

import type { DbTimestamp, KnexOrTrx } from '@ticketdesk/database';
import { toIsoString } from '@ticketdesk/database';
import type {
  IProject,
  IProjectMembershipInTeam,
  IProjectUser,
  IUserBrief,
  ProjectRole,
} from '@ticketdesk/types';

interface ProjectRecord {
  id: number;
  name: string;
  worker_team_id: number | null;
  created_at: DbTimestamp;
}

interface ProjectUserRecord {
  id: number;
  user_id: number;
  project_id: number;
  role: ProjectRole;
}

/**
 * Escapes LIKE wildcards so a name fragment only ever matches literally.
 */
export function toContainsPattern(fragment: string): string {
  return `%${fragment.toLowerCase().replace(/[\\%_]/g, '\\$&')}%`;
}

const ProjectModel = {
  get: async (knexOrTrx: KnexOrTrx, projectId: number): Promise<IProject | null> => {
    const record = await knexOrTrx<ProjectRecord>('projects')
      .where({ id: projectId })
      .first();

    if (!record) {
      return null;
    }
    return {
      id: record.id,
      name: record.name,
      worker_team_id: record.worker_team_id,
      created_at: toIsoString(record.created_at),
    };
  },

  getMembership: async (
    knexOrTrx: KnexOrTrx,
    projectId: number,
    userId: number
  ): Promise<IProjectUser | null> => {
    const record = await knexOrTrx<ProjectUserRecord>('project_users')
      .where({ project_id: projectId, user_id: userId })
      .first();
    return record ?? null;
  },

  /**
   * First project member whose name contains `fragment`, case-insensitively.
   * Ties resolve to the lowest user id.
   */
  findMemberByName: async (
    knexOrTrx: KnexOrTrx,
    projectId: number,
    fragment: string
  ): Promise<IUserBrief | null> => {
    const [member] = await knexOrTrx('users')
      .join('project_users', 'project_users.user_id', 'users.id')
      .where('project_users.project_id', projectId)
      .whereRaw(`LOWER(users.name) LIKE ? ESCAPE '\\'`, [toContainsPattern(fragment)])
      .orderBy('users.id', 'asc')
      .limit(1)
      .select<IUserBrief[]>('users.id', 'users.name');

    return member ?? null;
  },

  /**
   * The user's project memberships, limited to projects associated with the team.
   */
  listMembershipsForUserInTeam: async (
    knexOrTrx: KnexOrTrx,
    teamId: number,
    userId: number
  ): Promise<IProjectMembershipInTeam[]> => {
    return knexOrTrx('project_users')
      .join('projects', 'projects.id', 'project_users.project_id')
      .join('project_teams', 'project_teams.project_id', 'projects.id')
      .where('project_teams.team_id', teamId)
      .andWhere('project_users.user_id', userId)
      .orderBy('projects.id', 'asc')
      .select<IProjectMembershipInTeam[]>(
        'project_users.project_id',
        'projects.name as project_name',
        'project_users.role'
      );
  },
};

export default ProjectModel;
