import type { NextFunction, Request, Response } from 'express';
import { BadRequestError } from '@ticketdesk/core';
import { commonValidations } from './validationMiddleware';

/**
 * Reads the project scope of ticket routes from `x-project-id`.
 */
export function projectContext(req: Request, _res: Response, next: NextFunction): void {
  const header = req.get('x-project-id');
  if (!header) {
    next(new BadRequestError('x-project-id header required'));
    return;
  }

  const parsed = commonValidations.id.safeParse(header);
  if (!parsed.success) {
    next(new BadRequestError('x-project-id header must be a positive integer'));
    return;
  }

  req.context = { requestId: req.context?.requestId ?? '', userId: req.context?.userId, projectId: parsed.data };
  next();
}
