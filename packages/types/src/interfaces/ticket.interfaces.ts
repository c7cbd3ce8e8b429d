import type { ITeamBrief } from './team.interfaces';
import type { IUserBrief } from './user.interfaces';

export const TICKET_STATUSES = ['open', 'in_progress', 'closed'] as const;
export type TicketStatus = (typeof TICKET_STATUSES)[number];

export const TICKET_PRIORITIES = ['low', 'medium', 'high'] as const;
export type TicketPriority = (typeof TICKET_PRIORITIES)[number];

/**
 * `worker` tickets are routed to the project's worker team; `admin` tickets
 * are handled by the project admins and carry no worker team by default.
 */
export const TICKET_TYPES = ['worker', 'admin'] as const;
export type TicketType = (typeof TICKET_TYPES)[number];

/**
 * Stored ticket row, timestamps as ISO strings.
 */
export interface ITicket {
  id: number;
  title: string;
  description: string;
  type: TicketType;
  priority: TicketPriority;
  status: TicketStatus;
  created_by: number;
  assigned_to: number | null;
  worker_team_id: number | null;
  team_id: number;
  project_id: number;
  feedback: string | null;
  confirmed: boolean;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

/**
 * Ticket as returned to callers: ids of related users and teams are
 * replaced by their briefs.
 */
export interface ITicketOut {
  id: number;
  title: string;
  description: string;
  type: TicketType;
  status: TicketStatus;
  priority: TicketPriority;
  project_id: number;
  team_id: number;
  creator: IUserBrief;
  assignee: IUserBrief | null;
  worker_team: ITeamBrief | null;
  feedback: string | null;
  confirmed: boolean;
  created_at: string;
  updated_at: string;
  closed_at: string | null;
}

export interface ICreateTicketInput {
  title: string;
  description: string;
  type?: TicketType;
  priority?: TicketPriority;
  team_id?: number | null;
  assigned_to_name?: string | null;
  assigned_to?: number | null;
  worker_team_id?: number | null;
}

export interface ITicketFeedbackInput {
  feedback?: string | null;
  confirmed: boolean;
}

/**
 * Whose project role gates a reassignment: the new assignee's (the
 * historical behaviour) or the acting user's.
 */
export const REASSIGN_ADMIN_CHECKS = ['assignee', 'caller'] as const;
export type ReassignAdminCheck = (typeof REASSIGN_ADMIN_CHECKS)[number];
