import { Router } from 'express';
import type { ApiTicketController } from '../controllers/ApiTicketController';
import { projectContext } from '../middleware/projectContext';

export function createTicketRouter(controller: ApiTicketController): Router {
  const router = Router();

  router.use(projectContext);

  router.post('/', controller.create());
  router.get('/', controller.list());
  // literal paths ahead of /:id
  router.get('/mine', controller.listMine());
  router.get('/assigned', controller.listAssigned());
  router.get('/:id', controller.getById());
  router.patch('/:id/status', controller.updateStatus());
  router.patch('/:id/feedback', controller.leaveFeedback());
  router.patch('/:id/assignee', controller.reassign());
  router.delete('/:id', controller.delete());

  return router;
}
