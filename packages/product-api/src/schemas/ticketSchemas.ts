/**
 * Ticket API Schemas
 * Validation schemas for ticket-related API endpoints
 */

import { z } from 'zod';
import { TICKET_PRIORITIES, TICKET_STATUSES, TICKET_TYPES } from '@ticketdesk/types';
import { commonValidations } from '../middleware/validationMiddleware';

const idSchema = commonValidations.id;
const bodyIdSchema = commonValidations.bodyId;

export const ticketIdParamsSchema = z.object({
  id: idSchema,
});

export const createTicketSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(255),
  description: z.string().min(1, 'Description is required'),
  type: z.enum(TICKET_TYPES).optional(),
  priority: z.enum(TICKET_PRIORITIES).optional(),
  team_id: bodyIdSchema.nullish(),
  assigned_to_name: z.string().trim().min(1).nullish(),
  assigned_to: bodyIdSchema.nullish(),
  worker_team_id: bodyIdSchema.nullish(),
});

export const createTicketQuerySchema = z.object({
  team_id: idSchema.optional(),
});

export const updateTicketStatusSchema = z.object({
  status: z.enum(TICKET_STATUSES),
});

export const ticketFeedbackSchema = z.object({
  feedback: z.string().nullish(),
  confirmed: z.boolean(),
});

export const reassignTicketSchema = z.object({
  assigned_to: bodyIdSchema,
});
