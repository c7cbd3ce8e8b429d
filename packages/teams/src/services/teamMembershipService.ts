/**
 * Team membership: member listings, per-user detail, self-service
 * availability and admin-only membership changes.
 *
 * Read operations trust the caller to have checked team membership
 * (see `assertTeamMember`); mutations check the actor themselves.
 */

import type { Knex } from 'knex';
import { BadRequestError, ForbiddenError, NotFoundError, logger } from '@ticketdesk/core';
import { BaseService, nowIso } from '@ticketdesk/database';
import { ProjectModel } from '@ticketdesk/projects';
import type {
  ActorContext,
  ITeamForUser,
  ITeamMembership,
  IUserAvailability,
  IUserBrief,
  IUserInTeamWithProjects,
  TeamRole,
} from '@ticketdesk/types';
import { UserModel, toUserAvailability, toUserBrief } from '@ticketdesk/users';
import TeamModel from '../models/team';

export class TeamMembershipService extends BaseService {
  async listMemberBriefs(teamId: number): Promise<IUserBrief[]> {
    return this.transaction((trx) => TeamModel.listMemberBriefs(trx, teamId));
  }

  async listAvailableAdmins(teamId: number): Promise<IUserBrief[]> {
    return this.listAvailableMembersByRole(teamId, 'admin');
  }

  async listAvailableMembersByRole(teamId: number, role: TeamRole): Promise<IUserBrief[]> {
    return this.transaction((trx) => TeamModel.listAvailableMemberBriefs(trx, teamId, role));
  }

  async listTeamsForUser(userId: number): Promise<ITeamForUser[]> {
    return this.transaction((trx) => TeamModel.listForUser(trx, userId));
  }

  async getUserInTeamWithProjectMemberships(teamId: number, userId: number): Promise<IUserInTeamWithProjects> {
    return this.transaction(async (trx) => {
      const membership = await TeamModel.getMembership(trx, teamId, userId);
      if (!membership) {
        throw new NotFoundError('User not in this team');
      }

      const user = await UserModel.get(trx, userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }

      const projects = await ProjectModel.listMembershipsForUserInTeam(trx, teamId, userId);

      return {
        user: toUserBrief(user),
        role: membership.role,
        joined_at: membership.joined_at,
        projects,
      };
    });
  }

  async setAvailability(userId: number, isAvailable: boolean): Promise<IUserAvailability> {
    return this.transaction(async (trx) => {
      const updated = await UserModel.setAvailability(trx, userId, isAvailable);
      const user = updated ? await UserModel.get(trx, userId) : null;
      if (!user) {
        throw new NotFoundError('User not found');
      }

      logger.info('[TeamMembershipService] availability updated', { userId, isAvailable });
      return toUserAvailability(user);
    });
  }

  async addMember(
    teamId: number,
    userId: number,
    role: TeamRole,
    context: ActorContext
  ): Promise<ITeamMembership> {
    return this.transaction(async (trx) => {
      await this.assertTeamAdmin(trx, teamId, context.userId);

      const existing = await TeamModel.getMembership(trx, teamId, userId);
      if (existing) {
        throw new BadRequestError('User already in team');
      }

      const user = await UserModel.get(trx, userId);
      if (!user) {
        throw new NotFoundError('User not found');
      }

      await TeamModel.addMember(trx, teamId, userId, role, nowIso());
      const membership = await TeamModel.getMembership(trx, teamId, userId);
      if (!membership) {
        throw new Error(`Membership of user ${userId} in team ${teamId} missing after insert`);
      }

      logger.info('[TeamMembershipService] member added', { teamId, userId, role, by: context.userId });
      return membership;
    });
  }

  async removeMember(teamId: number, userId: number, context: ActorContext): Promise<void> {
    await this.transaction(async (trx) => {
      await this.assertTeamAdmin(trx, teamId, context.userId);

      const deleted = await TeamModel.removeMember(trx, teamId, userId);
      if (!deleted) {
        throw new NotFoundError('User not in this team');
      }

      logger.info('[TeamMembershipService] member removed', { teamId, userId, by: context.userId });
    });
  }

  async assertTeamMember(teamId: number, userId: number): Promise<void> {
    const membership = await TeamModel.getMembership(this.knex, teamId, userId);
    if (!membership) {
      throw new ForbiddenError('Team not available.');
    }
  }

  private async assertTeamAdmin(trx: Knex.Transaction, teamId: number, userId: number): Promise<void> {
    const membership = await TeamModel.getMembership(trx, teamId, userId);
    if (!membership || membership.role !== 'admin') {
      throw new ForbiddenError('Requires team admin role.');
    }
  }
}
