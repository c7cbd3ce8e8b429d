/**
 * API Ticket Controller
 * Each method returns the express handler for one ticket route.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { TicketService } from '@ticketdesk/tickets';
import {
  createTicketQuerySchema,
  createTicketSchema,
  reassignTicketSchema,
  ticketFeedbackSchema,
  ticketIdParamsSchema,
  updateTicketStatusSchema,
} from '../schemas/ticketSchemas';
import { validateBody, validateParams, validateQuery } from '../middleware/validationMiddleware';
import { getProjectContext } from '../utils/requestContext';
import { sendData, sendNoContent } from '../utils/response';

export class ApiTicketController {
  constructor(private readonly ticketService: TicketService) {}

  create(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const data = validateBody(req, createTicketSchema);
        const query = validateQuery(req, createTicketQuerySchema);

        const ticket = await this.ticketService.create(data, context, query.team_id);
        sendData(res, ticket, 201);
      } catch (error) {
        next(error);
      }
    };
  }

  getById(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const { id } = validateParams(req, ticketIdParamsSchema);

        sendData(res, await this.ticketService.getById(id, context));
      } catch (error) {
        next(error);
      }
    };
  }

  list(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        sendData(res, await this.ticketService.listAll(getProjectContext(req)));
      } catch (error) {
        next(error);
      }
    };
  }

  listMine(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        sendData(res, await this.ticketService.listCreatedBy(getProjectContext(req)));
      } catch (error) {
        next(error);
      }
    };
  }

  listAssigned(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        sendData(res, await this.ticketService.listAssigned(getProjectContext(req)));
      } catch (error) {
        next(error);
      }
    };
  }

  updateStatus(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const { id } = validateParams(req, ticketIdParamsSchema);
        const { status } = validateBody(req, updateTicketStatusSchema);

        sendData(res, await this.ticketService.updateStatus(id, status, context));
      } catch (error) {
        next(error);
      }
    };
  }

  leaveFeedback(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const { id } = validateParams(req, ticketIdParamsSchema);
        const data = validateBody(req, ticketFeedbackSchema);

        sendData(res, await this.ticketService.leaveFeedback(id, data, context));
      } catch (error) {
        next(error);
      }
    };
  }

  reassign(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const { id } = validateParams(req, ticketIdParamsSchema);
        const { assigned_to } = validateBody(req, reassignTicketSchema);

        sendData(res, await this.ticketService.reassign(id, assigned_to, context));
      } catch (error) {
        next(error);
      }
    };
  }

  delete(): RequestHandler {
    return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const context = getProjectContext(req);
        const { id } = validateParams(req, ticketIdParamsSchema);

        await this.ticketService.delete(id, context);
        sendNoContent(res);
      } catch (error) {
        next(error);
      }
    };
  }
}
