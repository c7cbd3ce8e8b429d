/**
 * Ticket lifecycle: creation, scoped reads, status transitions, feedback,
 * reassignment and deletion.
 *
 * Each operation runs in one transaction and mutations answer with the
 * ticket read back from storage once the transaction has committed.
 */

import type { Knex } from 'knex';
import { BadRequestError, ForbiddenError, NotFoundError, logger } from '@ticketdesk/core';
import { BaseService, nowIso } from '@ticketdesk/database';
import { ProjectModel } from '@ticketdesk/projects';
import { TeamModel } from '@ticketdesk/teams';
import type {
  ICreateTicketInput,
  IProject,
  ITicketFeedbackInput,
  ITicketOut,
  ProjectContext,
  ProjectRole,
  ReassignAdminCheck,
  TicketStatus,
} from '@ticketdesk/types';
import { UserModel } from '@ticketdesk/users';
import { canTransition } from '../lib/statusTransitions';
import TicketModel, { type TicketChanges } from '../models/ticket';

export interface TicketServiceOptions {
  /**
   * `assignee` checks that the new assignee is a project admin, which is how
   * the service has always behaved; `caller` checks the acting user instead.
   */
  reassignAdminCheck?: ReassignAdminCheck;
}

const REASSIGNABLE_ROLES: readonly ProjectRole[] = ['member', 'worker'];
const ACTIVE_STATUSES: readonly TicketStatus[] = ['open', 'in_progress'];

export class TicketService extends BaseService {
  private readonly reassignAdminCheck: ReassignAdminCheck;

  constructor(knex: Knex, options: TicketServiceOptions = {}) {
    super(knex);
    this.reassignAdminCheck = options.reassignAdminCheck ?? 'assignee';
  }

  async create(
    input: ICreateTicketInput,
    context: ProjectContext,
    teamOverride?: number | null
  ): Promise<ITicketOut> {
    const ticketId = await this.transaction(async (trx) => {
      const teamId = teamOverride ?? input.team_id ?? (await TeamModel.getFirstTeamIdForUser(trx, context.userId));
      if (teamId === null || teamId === undefined) {
        throw new NotFoundError('No team found for this user; team_id must be provided');
      }

      const team = await TeamModel.get(trx, teamId);
      if (!team) {
        throw new NotFoundError('Team not found');
      }
      const project = await ProjectModel.get(trx, context.projectId);
      if (!project) {
        throw new NotFoundError('Project not found');
      }

      const authorLink = await ProjectModel.getMembership(trx, project.id, context.userId);
      if (!authorLink) {
        throw new ForbiddenError('You are not a member of this project');
      }

      const assignedTo = await this.resolveAssignee(trx, input, project.id);
      const workerTeamId = this.resolveWorkerTeam(input, project);
      const now = nowIso();

      return TicketModel.insert(trx, {
        title: input.title,
        description: input.description,
        type: input.type ?? 'worker',
        priority: input.priority ?? 'medium',
        status: 'open',
        created_by: context.userId,
        assigned_to: assignedTo,
        worker_team_id: workerTeamId,
        team_id: team.id,
        project_id: project.id,
        feedback: null,
        confirmed: false,
        created_at: now,
        updated_at: now,
        closed_at: null,
      });
    });

    logger.info('[TicketService] ticket created', {
      ticketId,
      projectId: context.projectId,
      createdBy: context.userId,
    });
    return this.loadTicket(ticketId);
  }

  async getById(ticketId: number, context: ProjectContext): Promise<ITicketOut> {
    const ticket = await this.transaction((trx) => TicketModel.getHydrated(trx, ticketId, context.projectId));
    if (!ticket) {
      throw new NotFoundError(`Ticket ${ticketId} not found`);
    }
    return ticket;
  }

  async listAll(context: ProjectContext): Promise<ITicketOut[]> {
    return this.transaction((trx) => TicketModel.listHydrated(trx, context.projectId));
  }

  async listCreatedBy(context: ProjectContext): Promise<ITicketOut[]> {
    return this.transaction((trx) =>
      TicketModel.listHydrated(trx, context.projectId, { createdBy: context.userId })
    );
  }

  /**
   * Open and in-progress tickets assigned to the actor.
   */
  async listAssigned(context: ProjectContext): Promise<ITicketOut[]> {
    return this.transaction(async (trx) => {
      const membership = await ProjectModel.getMembership(trx, context.projectId, context.userId);
      if (!membership) {
        throw new ForbiddenError('Not a project member');
      }

      return TicketModel.listHydrated(trx, context.projectId, {
        assignedTo: context.userId,
        statuses: ACTIVE_STATUSES,
      });
    });
  }

  async updateStatus(ticketId: number, status: TicketStatus, context: ProjectContext): Promise<ITicketOut> {
    const previous = await this.transaction(async (trx) => {
      const ticket = await this.requireTicket(trx, ticketId, context);
      if (ticket.assigned_to !== context.userId) {
        throw new ForbiddenError('Only assignee can update');
      }
      if (!canTransition(ticket.status, status)) {
        throw new BadRequestError(`Cannot go from ${ticket.status} to ${status}`);
      }

      const now = nowIso();
      const changes: TicketChanges = { status, updated_at: now };
      if (status === 'closed') {
        changes.closed_at = now;
      }
      await TicketModel.update(trx, ticket.id, changes);
      return ticket.status;
    });

    logger.info('[TicketService] ticket status changed', { ticketId, from: previous, to: status });
    return this.loadTicket(ticketId);
  }

  async leaveFeedback(
    ticketId: number,
    input: ITicketFeedbackInput,
    context: ProjectContext
  ): Promise<ITicketOut> {
    await this.transaction(async (trx) => {
      const ticket = await this.requireTicket(trx, ticketId, context);
      if (ticket.created_by !== context.userId) {
        throw new ForbiddenError('Only creator can leave feedback');
      }
      if (ticket.status !== 'closed') {
        throw new BadRequestError('Feedback only after close');
      }

      const changes: TicketChanges = { confirmed: input.confirmed, updated_at: nowIso() };
      // an empty or missing value keeps the feedback already on the ticket
      if (input.feedback) {
        changes.feedback = input.feedback;
      }
      await TicketModel.update(trx, ticket.id, changes);
    });

    return this.loadTicket(ticketId);
  }

  /**
   * Moves the ticket to another project member. `updated_at` is not touched.
   */
  async reassign(ticketId: number, assigneeId: number, context: ProjectContext): Promise<ITicketOut> {
    await this.transaction(async (trx) => {
      const ticket = await this.requireTicket(trx, ticketId, context);

      const adminCandidate = this.reassignAdminCheck === 'caller' ? context.userId : assigneeId;
      const adminLink = await ProjectModel.getMembership(trx, context.projectId, adminCandidate);
      if (!adminLink || adminLink.role !== 'admin') {
        throw new ForbiddenError('Only project admin can reassign');
      }

      const user = await UserModel.get(trx, assigneeId);
      if (!user || !user.is_available) {
        throw new BadRequestError('User not available');
      }

      const roleLink = await ProjectModel.getMembership(trx, context.projectId, assigneeId);
      if (!roleLink || !REASSIGNABLE_ROLES.includes(roleLink.role)) {
        throw new ForbiddenError('Must be member or worker');
      }

      await TicketModel.update(trx, ticket.id, { assigned_to: assigneeId });
    });

    logger.info('[TicketService] ticket reassigned', {
      ticketId,
      assigneeId,
      by: context.userId,
      adminCheck: this.reassignAdminCheck,
    });
    return this.loadTicket(ticketId);
  }

  async delete(ticketId: number, context: ProjectContext): Promise<void> {
    await this.transaction(async (trx) => {
      const ticket = await this.requireTicket(trx, ticketId, context);

      const isCreator = ticket.created_by === context.userId;
      const membership = await ProjectModel.getMembership(trx, context.projectId, context.userId);
      const isAdmin = membership?.role === 'admin';
      if (!isCreator && !isAdmin) {
        throw new ForbiddenError('Not permitted');
      }

      await TicketModel.delete(trx, ticket.id);
    });

    logger.info('[TicketService] ticket deleted', { ticketId, by: context.userId });
  }

  private async requireTicket(trx: Knex.Transaction, ticketId: number, context: ProjectContext) {
    const ticket = await TicketModel.get(trx, context.projectId, ticketId);
    if (!ticket) {
      throw new NotFoundError('Ticket not found');
    }
    return ticket;
  }

  private async resolveAssignee(
    trx: Knex.Transaction,
    input: ICreateTicketInput,
    projectId: number
  ): Promise<number | null> {
    if (input.assigned_to_name) {
      const member = await ProjectModel.findMemberByName(trx, projectId, input.assigned_to_name);
      if (!member) {
        throw new NotFoundError('Assignee not found in this project');
      }
      return member.id;
    }

    if (input.assigned_to !== undefined && input.assigned_to !== null) {
      const membership = await ProjectModel.getMembership(trx, projectId, input.assigned_to);
      if (!membership) {
        throw new NotFoundError('Assignee not found in this project');
      }
      return input.assigned_to;
    }

    return null;
  }

  private resolveWorkerTeam(input: ICreateTicketInput, project: IProject): number | null {
    if (input.worker_team_id !== undefined && input.worker_team_id !== null) {
      if (project.worker_team_id !== input.worker_team_id) {
        throw new BadRequestError('Worker team not assigned to this project');
      }
      return input.worker_team_id;
    }

    if ((input.type ?? 'worker') === 'worker') {
      if (project.worker_team_id === null) {
        throw new BadRequestError('No worker team assigned to project');
      }
      return project.worker_team_id;
    }

    return null;
  }

  private async loadTicket(ticketId: number): Promise<ITicketOut> {
    const ticket = await TicketModel.getHydrated(this.knex, ticketId);
    if (!ticket) {
      throw new NotFoundError(`Ticket ${ticketId} not found`);
    }
    return ticket;
  }
}
