/**
 * Express application: health check, API key authentication, ticket and
 * team routes, error rendering.
 */

import './types';
import express, { type Express } from 'express';
import type { Knex } from 'knex';
import type { AppConfig } from '@ticketdesk/core';
import { TeamMembershipService } from '@ticketdesk/teams';
import { TicketService } from '@ticketdesk/tickets';
import { ApiTeamController } from './controllers/ApiTeamController';
import { ApiTicketController } from './controllers/ApiTicketController';
import { createApiKeyAuth } from './middleware/apiKeyAuth';
import { createErrorHandler } from './middleware/errorHandler';
import { requestLogger } from './middleware/requestLogger';
import { createTeamRouter } from './routes/teams';
import { createTicketRouter } from './routes/tickets';
import { createErrorBody } from './utils/response';

export interface CreateAppOptions {
  knex: Knex;
  config: Pick<AppConfig, 'env' | 'tickets'>;
}

export function createApp({ knex, config }: CreateAppOptions): Express {
  const app = express();

  const ticketController = new ApiTicketController(
    new TicketService(knex, { reassignAdminCheck: config.tickets.reassignAdminCheck })
  );
  const teamController = new ApiTeamController(new TeamMembershipService(knex));

  app.disable('x-powered-by');
  app.use(requestLogger);
  app.use(express.json());

  app.get('/healthz', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  app.use(createApiKeyAuth(knex));
  app.use('/tickets', createTicketRouter(ticketController));
  app.use('/teams', createTeamRouter(teamController));

  app.use((req, res) => {
    res.status(404).json(createErrorBody('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
  });
  app.use(createErrorHandler(config.env));

  return app;
}
