/**
 * Team API Schemas
 */

import { z } from 'zod';
import { TEAM_ROLES } from '@ticketdesk/types';
import { commonValidations } from '../middleware/validationMiddleware';

export const teamParamsSchema = z.object({
  team_id: commonValidations.id,
});

export const teamUserParamsSchema = z.object({
  team_id: commonValidations.id,
  user_id: commonValidations.id,
});

export const availabilityQuerySchema = z.object({
  is_available: commonValidations.booleanQuery,
});

export const addMemberQuerySchema = z.object({
  role: z.enum(TEAM_ROLES).default('member'),
});
