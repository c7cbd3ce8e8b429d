import type { Request } from 'express';
import { BadRequestError, UnauthorizedError } from '@ticketdesk/core';
import type { ActorContext, ProjectContext } from '@ticketdesk/types';

export function getActorContext(req: Request): ActorContext {
  const userId = req.context?.userId;
  if (userId === undefined) {
    throw new UnauthorizedError('Authentication required');
  }
  return { userId };
}

export function getProjectContext(req: Request): ProjectContext {
  const { userId } = getActorContext(req);
  const projectId = req.context?.projectId;
  if (projectId === undefined) {
    throw new BadRequestError('x-project-id header required');
  }
  return { userId, projectId };
}
