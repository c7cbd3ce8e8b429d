/**
 * @ticketdesk/tickets - Ticket Model
 *
 * Data access layer for tickets. Reads that leave the model are hydrated
 * with creator, assignee and worker team briefs.
 */

import type { DbBoolean, DbTimestamp, KnexOrTrx } from '@ticketdesk/database';
import { insertReturningId, toBoolean, toIsoString, toNullableIsoString } from '@ticketdesk/database';
import type {
  ITicket,
  ITicketOut,
  TicketPriority,
  TicketStatus,
  TicketType,
} from '@ticketdesk/types';

interface TicketRecord {
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
  confirmed: DbBoolean;
  created_at: DbTimestamp;
  updated_at: DbTimestamp;
  closed_at: DbTimestamp | null;
}

interface HydratedTicketRow extends TicketRecord {
  creator_name: string;
  assignee_name: string | null;
  worker_team_name: string | null;
}

export type NewTicket = Omit<ITicket, 'id'>;

export type TicketChanges = Partial<
  Pick<ITicket, 'status' | 'assigned_to' | 'feedback' | 'confirmed' | 'updated_at' | 'closed_at'>
>;

export interface TicketListFilters {
  createdBy?: number;
  assignedTo?: number;
  statuses?: readonly TicketStatus[];
}

function toTicket(record: TicketRecord): ITicket {
  return {
    id: record.id,
    title: record.title,
    description: record.description,
    type: record.type,
    priority: record.priority,
    status: record.status,
    created_by: record.created_by,
    assigned_to: record.assigned_to,
    worker_team_id: record.worker_team_id,
    team_id: record.team_id,
    project_id: record.project_id,
    feedback: record.feedback,
    confirmed: toBoolean(record.confirmed),
    created_at: toIsoString(record.created_at),
    updated_at: toIsoString(record.updated_at),
    closed_at: toNullableIsoString(record.closed_at),
  };
}

function toTicketOut(row: HydratedTicketRow): ITicketOut {
  return {
    id: row.id,
    title: row.title,
    description: row.description,
    type: row.type,
    status: row.status,
    priority: row.priority,
    project_id: row.project_id,
    team_id: row.team_id,
    creator: { id: row.created_by, name: row.creator_name },
    assignee: row.assigned_to !== null && row.assignee_name !== null
      ? { id: row.assigned_to, name: row.assignee_name }
      : null,
    worker_team: row.worker_team_id !== null && row.worker_team_name !== null
      ? { id: row.worker_team_id, name: row.worker_team_name }
      : null,
    feedback: row.feedback,
    confirmed: toBoolean(row.confirmed),
    created_at: toIsoString(row.created_at),
    updated_at: toIsoString(row.updated_at),
    closed_at: toNullableIsoString(row.closed_at),
  };
}

function hydratedQuery(knexOrTrx: KnexOrTrx) {
  return knexOrTrx('tickets')
    .join('users as creator', 'creator.id', 'tickets.created_by')
    .leftJoin('users as assignee', 'assignee.id', 'tickets.assigned_to')
    .leftJoin('teams as worker_team', 'worker_team.id', 'tickets.worker_team_id')
    .select<HydratedTicketRow[]>(
      'tickets.*',
      'creator.name as creator_name',
      'assignee.name as assignee_name',
      'worker_team.name as worker_team_name'
    );
}

const TicketModel = {
  /**
   * Plain ticket row, scoped to a project.
   */
  get: async (knexOrTrx: KnexOrTrx, projectId: number, ticketId: number): Promise<ITicket | null> => {
    const record = await knexOrTrx<TicketRecord>('tickets')
      .where({ id: ticketId, project_id: projectId })
      .first();
    return record ? toTicket(record) : null;
  },

  /**
   * Hydrated ticket; scoped to a project when one is given.
   */
  getHydrated: async (
    knexOrTrx: KnexOrTrx,
    ticketId: number,
    projectId?: number
  ): Promise<ITicketOut | null> => {
    const query = hydratedQuery(knexOrTrx).where('tickets.id', ticketId);
    if (projectId !== undefined) {
      query.andWhere('tickets.project_id', projectId);
    }

    const [row] = await query;
    return row ? toTicketOut(row) : null;
  },

  listHydrated: async (
    knexOrTrx: KnexOrTrx,
    projectId: number,
    filters: TicketListFilters = {}
  ): Promise<ITicketOut[]> => {
    const query = hydratedQuery(knexOrTrx)
      .where('tickets.project_id', projectId)
      .orderBy('tickets.id', 'asc');

    if (filters.createdBy !== undefined) {
      query.andWhere('tickets.created_by', filters.createdBy);
    }
    if (filters.assignedTo !== undefined) {
      query.andWhere('tickets.assigned_to', filters.assignedTo);
    }
    if (filters.statuses && filters.statuses.length > 0) {
      query.whereIn('tickets.status', [...filters.statuses]);
    }

    const rows = await query;
    return rows.map(toTicketOut);
  },

  insert: async (knexOrTrx: KnexOrTrx, ticket: NewTicket): Promise<number> => {
    return insertReturningId(knexOrTrx, 'tickets', { ...ticket });
  },

  update: async (knexOrTrx: KnexOrTrx, ticketId: number, changes: TicketChanges): Promise<number> => {
    return knexOrTrx<TicketRecord>('tickets')
      .where({ id: ticketId })
      .update(changes);
  },

  delete: async (knexOrTrx: KnexOrTrx, ticketId: number): Promise<number> => {
    return knexOrTrx<TicketRecord>('tickets')
      .where({ id: ticketId })
      .del();
  },
};

export default TicketModel;
