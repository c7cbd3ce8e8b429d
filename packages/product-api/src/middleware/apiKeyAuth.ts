/**
 * API key authentication
 *
 * The `x-api-key` header is resolved to the acting user. Every route except
 * the health check sits behind it.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Knex } from 'knex';
import { UnauthorizedError, logger } from '@ticketdesk/core';
import { authenticateApiKey } from '@ticketdesk/users';

export function createApiKeyAuth(knex: Knex): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
    try {
      const apiKey = req.get('x-api-key');
      if (!apiKey) {
        throw new UnauthorizedError('API key required');
      }

      const user = await authenticateApiKey(knex, apiKey);
      if (!user) {
        logger.warn('[apiKeyAuth] rejected API key', { requestId: req.context?.requestId, path: req.originalUrl });
        throw new UnauthorizedError('Invalid API key');
      }

      req.context = { requestId: req.context?.requestId ?? '', userId: user.id };
      next();
    } catch (error) {
      next(error);
    }
  };
}
