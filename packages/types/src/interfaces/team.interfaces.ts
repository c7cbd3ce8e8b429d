import type { IUserBrief } from './user.interfaces';
import type { ProjectRole } from './project.interfaces';

export const TEAM_ROLES = ['admin', 'member'] as const;
export type TeamRole = (typeof TEAM_ROLES)[number];

export interface ITeam {
  id: number;
  name: string;
  created_at: string;
}

export interface ITeamBrief {
  id: number;
  name: string;
}

export interface ITeamMembership {
  user_id: number;
  team_id: number;
  role: TeamRole;
  joined_at: string;
}

/**
 * A team as seen by one of its members.
 */
export interface ITeamForUser {
  id: number;
  name: string;
  role: TeamRole;
  joined_at: string;
}

export interface IProjectMembershipInTeam {
  project_id: number;
  project_name: string;
  role: ProjectRole;
}

export interface IUserInTeamWithProjects {
  user: IUserBrief;
  role: TeamRole;
  joined_at: string;
  projects: IProjectMembershipInTeam[];
}
