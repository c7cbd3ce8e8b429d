// 'worker' members belong to the project's worker team side and can receive reassigned tickets.
export const PROJECT_ROLES = ['admin', 'member', 'worker'] as const;
export type ProjectRole = (typeof PROJECT_ROLES)[number];

export interface IProject {
  id: number;
  name: string;
  worker_team_id: number | null;
  created_at: string;
}

export interface IProjectUser {
  id: number;
  user_id: number;
  project_id: number;
  role: ProjectRole;
}
