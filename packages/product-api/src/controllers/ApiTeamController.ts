/**
 * API Team Controller
 * Team listings, self availability and membership management.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { TeamMembershipService } from '@ticketdesk/teams';
import {
  addMemberQuerySchema,
  availabilityQuerySchema,
  teamParamsSchema,
  teamUserParamsSchema,
} from '../schemas/teamSchemas';
import { validateParams, validateQuery } from '../middleware/validationMiddleware';
import { getActorContext } from '../utils/requestContext';
import { sendData, sendNoContent } from '../utils/response';

export class ApiTeamController {
  constructor(private readonly teamService: TeamMembershipService) {}

  listMyTeams(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { userId } = getActorContext(req);
        sendData(res, await this.teamService.listTeamsForUser(userId));
      } catch (error) {
        next(error);
      }
    };
  }

  listUsers(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const teamId = await this.requireTeamMember(req);
        sendData(res, await this.teamService.listMemberBriefs(teamId));
      } catch (error) {
        next(error);
      }
    };
  }

  listAvailableAdmins(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const teamId = await this.requireTeamMember(req);
        sendData(res, await this.teamService.listAvailableAdmins(teamId));
      } catch (error) {
        next(error);
      }
    };
  }

  listAvailableUsers(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const teamId = await this.requireTeamMember(req);
        sendData(res, await this.teamService.listAvailableMembersByRole(teamId, 'member'));
      } catch (error) {
        next(error);
      }
    };
  }

  getUser(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { userId } = getActorContext(req);
        const { team_id, user_id } = validateParams(req, teamUserParamsSchema);
        await this.teamService.assertTeamMember(team_id, userId);

        sendData(res, await this.teamService.getUserInTeamWithProjectMemberships(team_id, user_id));
      } catch (error) {
        next(error);
      }
    };
  }

  /**
   * Sets the caller's own availability.
   */
  updateAvailability(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { userId } = getActorContext(req);
        validateParams(req, teamParamsSchema);
        const { is_available } = validateQuery(req, availabilityQuerySchema);

        sendData(res, await this.teamService.setAvailability(userId, is_available));
      } catch (error) {
        next(error);
      }
    };
  }

  addMember(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getActorContext(req);
        const { team_id, user_id } = validateParams(req, teamUserParamsSchema);
        const { role } = validateQuery(req, addMemberQuerySchema);

        const membership = await this.teamService.addMember(team_id, user_id, role, context);
        sendData(res, membership, 201);
      } catch (error) {
        next(error);
      }
    };
  }

  removeMember(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getActorContext(req);
        const { team_id, user_id } = validateParams(req, teamUserParamsSchema);

        await this.teamService.removeMember(team_id, user_id, context);
        sendNoContent(res);
      } catch (error) {
        next(error);
      }
    };
  }

  private async requireTeamMember(req: Request): Promise<number> {
    const { userId } = getActorContext(req);
    const { team_id } = validateParams(req, teamParamsSchema);
    await this.teamService.assertTeamMember(team_id, userId);
    return team_id;
  }
}
